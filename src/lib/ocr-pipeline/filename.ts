import path from "node:path";
import type { SupportedExtension } from "./types";

export const SUPPORTED_EXTENSIONS: readonly SupportedExtension[] = [".pdf", ".doc", ".docx"];

/** Lower-cased extension of a declared file name, including the dot ("" if none) */
export function getExtension(fileName: string): string {
    return path.extname(fileName).toLowerCase();
}

export function isSupportedExtension(ext: string): ext is SupportedExtension {
    return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

export function isWordProcessorExtension(ext: SupportedExtension): boolean {
    return ext === ".doc" || ext === ".docx";
}

/**
 * Reduce an uploaded file name to a safe, flat name:
 * 1. Decompose accents and drop non-ASCII characters
 * 2. Turn path separators into whitespace, whitespace runs into "_"
 * 3. Drop everything outside [A-Za-z0-9_.-]
 * 4. Strip leading / trailing dots and underscores
 *
 * If the result no longer ends with `ext`, `document<ext>` is used instead.
 */
export function sanitizeFileName(fileName: string, ext: SupportedExtension): string {
    const flattened = fileName
        .normalize("NFKD")
        .replace(/[^\x00-\x7F]/g, "")
        .replace(/[/\\]/g, " ")
        .split(/\s+/)
        .filter(Boolean)
        .join("_")
        .replace(/[^A-Za-z0-9_.-]/g, "")
        .replace(/^[._]+|[._]+$/g, "");

    if (!flattened.toLowerCase().endsWith(ext) || flattened.length === ext.length) {
        return `document${ext}`;
    }

    return flattened;
}
