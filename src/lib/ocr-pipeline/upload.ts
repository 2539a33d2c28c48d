/**
 * OCR Pipeline: Upload Handler
 *
 * Boundary between the HTTP route and the pipeline.  Validates the upload,
 * writes it into a per-request temp directory, converts word-processor
 * documents to PDF, runs the pipeline and removes the directory again on
 * every exit path.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { ConversionFailure, getErrorMessage } from "./errors";
import { getExtension, isSupportedExtension, sanitizeFileName } from "./filename";
import { normalizeFormat } from "./format";
import type { DocumentPipeline } from "./pipeline";
import type { DocumentConverter, ProcessingResult, SupportedExtension } from "./types";

export const UNSUPPORTED_TYPE_DETAIL =
    "Unsupported document type. Only PDF, DOC, and DOCX files are allowed.";
export const INTERNAL_ERROR_DETAIL = "Internal server error";
export const MALFORMED_FORM_DETAIL = "Malformed multipart/form-data body.";

/** Prefix of the per-request directories created under `tmpDir` */
export const UPLOAD_DIR_PREFIX = "ocr-upload-";

export interface UploadDependencies {
    pipeline: DocumentPipeline;
    converter: DocumentConverter;
    tmpDir: string;
    maxBytes: number;
}

export type UploadResponseBody = ProcessingResult | { detail: string };

export interface UploadResponse {
    status: number;
    body: UploadResponseBody;
}

function reject(status: number, detail: string): UploadResponse {
    return { status, body: { detail } };
}

function formatMegabytes(bytes: number): string {
    return (bytes / 1024 / 1024).toFixed(1);
}

async function processUpload(
    file: File,
    ext: SupportedExtension,
    deps: UploadDependencies
): Promise<ProcessingResult> {
    const workDir = await fs.mkdtemp(path.join(deps.tmpDir, UPLOAD_DIR_PREFIX));

    try {
        const uploadPath = path.join(workDir, sanitizeFileName(file.name, ext));
        await fs.writeFile(uploadPath, Buffer.from(await file.arrayBuffer()));

        let pdfPath: string;
        try {
            pdfPath = await normalizeFormat(uploadPath, ext, deps.converter);
        } catch (error) {
            if (error instanceof ConversionFailure) {
                console.error(`[UploadHandler] ${error.message}`);
                return { status: "failed", message: error.message };
            }
            throw error;
        }

        return await deps.pipeline.process(pdfPath);
    } finally {
        await fs.rm(workDir, { recursive: true, force: true });
    }
}

/**
 * Handle a `POST /upload` request carrying one document in the "file" field.
 *
 * @param resolveDeps  Supplies the process-wide services; called only once the
 *                     upload has passed validation
 */
export async function handleUpload(
    request: Request,
    resolveDeps: () => UploadDependencies
): Promise<UploadResponse> {
    try {
        const contentType = request.headers.get("content-type") ?? "";
        if (!contentType.includes("multipart/form-data")) {
            return reject(415, "Invalid content type. Expected multipart/form-data.");
        }

        let formData: FormData;
        try {
            formData = await request.formData();
        } catch (error) {
            console.warn(`[UploadHandler] Could not parse form data: ${getErrorMessage(error)}`);
            return reject(400, MALFORMED_FORM_DETAIL);
        }

        const entry = formData.get("file");
        if (entry === null || typeof entry === "string") {
            return reject(400, "No file provided. Upload a document using the 'file' form field.");
        }

        const ext = getExtension(entry.name);
        if (!isSupportedExtension(ext)) {
            return reject(400, UNSUPPORTED_TYPE_DETAIL);
        }

        if (entry.size === 0) {
            return reject(400, "File is empty.");
        }

        const deps = resolveDeps();
        if (entry.size > deps.maxBytes) {
            return reject(
                413,
                `File exceeds the ${formatMegabytes(deps.maxBytes)} MB limit (${formatMegabytes(entry.size)} MB).`
            );
        }

        console.log("[UploadHandler] Processing upload:", { fileName: entry.name, size: entry.size });

        const result = await processUpload(entry, ext, deps);
        return { status: result.status === "processed" ? 200 : 500, body: result };
    } catch (error) {
        console.error(`[UploadHandler] Unhandled error: ${getErrorMessage(error)}`);
        return reject(500, INTERNAL_ERROR_DETAIL);
    }
}
