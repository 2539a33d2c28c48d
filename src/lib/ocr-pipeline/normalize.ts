/**
 * OCR Pipeline: Text Normalization
 *
 * Cleans raw text pulled out of word-processor documents before it is laid
 * out into a PDF, so the OCR service sees consistent paragraphs.
 */

/**
 * Normalize a raw text string:
 * 1. Remove null bytes and form-feeds
 * 2. Replace non-breaking spaces / zero-width chars with a regular space
 * 3. Merge broken lines (single newlines become spaces)
 * 4. Collapse blank-line runs and horizontal whitespace
 * 5. Trim every line and the whole text
 */
export function normalizeText(raw: string): string {
    return raw
        .replace(/\r\n?/g, "\n")
        .replace(/[\x00\x0C]/g, "")
        .replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, " ")
        .replace(/(?<=[^\n])\n(?=[^\n])/g, " ")
        .replace(/\n{3,}/g, "\n\n")
        .replace(/[ \t]+/g, " ")
        .split("\n")
        .map((line) => line.trim())
        .join("\n")
        .trim();
}

/** Split normalized text into its non-empty paragraphs */
export function toParagraphs(raw: string): string[] {
    return normalizeText(raw)
        .split(/\n{2,}/)
        .map((paragraph) => paragraph.trim())
        .filter((paragraph) => paragraph.length > 0);
}
