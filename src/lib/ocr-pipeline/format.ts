import { promises as fs } from "node:fs";
import path from "node:path";
import { ConversionFailure, InvalidInput, PipelineError, getErrorMessage } from "./errors";
import { isSupportedExtension, isWordProcessorExtension } from "./filename";
import type { DocumentConverter } from "./types";

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/** Same directory and base name, `.pdf` suffix */
export function derivePdfPath(filePath: string): string {
    const { dir, name } = path.parse(filePath);
    return path.join(dir, `${name}.pdf`);
}

/**
 * Produce a path to a PDF version of the document.
 *
 * PDFs are returned unchanged.  Word-processor documents are converted next
 * to the input (which is left in place).
 *
 * @throws ConversionFailure if the converter fails or writes no output
 */
export async function normalizeFormat(
    filePath: string,
    extension: string,
    converter: DocumentConverter
): Promise<string> {
    const ext = extension.toLowerCase();
    if (!isSupportedExtension(ext)) {
        throw new InvalidInput(`Unsupported document type: ${extension}`);
    }

    if (!isWordProcessorExtension(ext)) {
        return filePath;
    }

    const outputPath = derivePdfPath(filePath);

    try {
        await converter.convert(filePath, outputPath);
    } catch (error) {
        if (error instanceof PipelineError) {
            throw error;
        }
        throw new ConversionFailure(`PDF conversion failed: ${getErrorMessage(error)}`, error);
    }

    if (!(await fileExists(outputPath))) {
        throw new ConversionFailure(`PDF conversion failed, output file not found: ${outputPath}`);
    }

    return outputPath;
}
