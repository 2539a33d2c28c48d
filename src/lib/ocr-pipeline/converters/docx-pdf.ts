/**
 * OCR Pipeline: DOCX → PDF Converter
 *
 * Uses `mammoth` to pull the raw text out of a word-processor document, then
 * lays the paragraphs out onto A4 pages with `pdf-lib` so the document can go
 * through the same PDF analysis path as native uploads.
 */

import { promises as fs } from "node:fs";
import mammoth from "mammoth";
import { PDFDocument, PDFFont, PDFPage, PageSizes, StandardFonts } from "pdf-lib";
import { toParagraphs } from "../normalize";
import type { DocumentConverter } from "../types";

const FONT_SIZE = 11;
const LINE_HEIGHT = 14;
const PARAGRAPH_GAP = 8;
const MARGIN = 56;

/** Code points of the WinAnsi 0x80-0x9F block */
const WIN_ANSI_EXTRAS = new Set(
    "\u20AC\u201A\u0192\u201E\u2026\u2020\u2021\u02C6\u2030\u0160\u2039\u0152\u017D" +
        "\u2018\u2019\u201C\u201D\u2022\u2013\u2014\u02DC\u2122\u0161\u203A\u0153\u017E\u0178"
);

function isWinAnsi(char: string): boolean {
    const code = char.codePointAt(0) ?? 0;
    return (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || WIN_ANSI_EXTRAS.has(char);
}

/**
 * Map text onto what the standard Helvetica font can encode (WinAnsi).
 * Tabs become spaces; every other code point outside the set becomes "?".
 */
export function toWinAnsi(text: string): string {
    return Array.from(text.replace(/\t/g, " "), (char) => (isWinAnsi(char) ? char : "?")).join("");
}

/** Break a paragraph into lines no wider than `maxWidth` */
export function wrapParagraph(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
    const lines: string[] = [];
    let current = "";

    const fits = (candidate: string) => font.widthOfTextAtSize(candidate, size) <= maxWidth;

    for (const word of text.split(" ").filter(Boolean)) {
        const candidate = current ? `${current} ${word}` : word;
        if (fits(candidate)) {
            current = candidate;
            continue;
        }

        if (current) {
            lines.push(current);
            current = "";
        }

        // A single word wider than the line is hard-broken, one glyph at a time
        let width = 0;
        for (const char of word) {
            const charWidth = font.widthOfTextAtSize(char, size);
            if (current && width + charWidth > maxWidth) {
                lines.push(current);
                current = "";
                width = 0;
            }
            current += char;
            width += charWidth;
        }
    }

    if (current) {
        lines.push(current);
    }

    return lines;
}

export class DocxPdfConverter implements DocumentConverter {
    readonly name = "DocxPdfConverter";

    async convert(inputPath: string, outputPath: string): Promise<void> {
        const { value, messages } = await mammoth.extractRawText({ path: inputPath });
        const warnings = messages.filter((m) => m.type === "warning");
        if (warnings.length > 0) {
            console.warn(`[DocxPdfConverter] ${warnings.length} warning(s) while reading document`);
        }

        const paragraphs = toParagraphs(value).map(toWinAnsi);
        const bytes = await this.render(paragraphs);
        await fs.writeFile(outputPath, bytes);

        console.log("[DocxPdfConverter] Converted document:", {
            paragraphs: paragraphs.length,
            bytes: bytes.length,
        });
    }

    private async render(paragraphs: string[]): Promise<Uint8Array> {
        const pdf = await PDFDocument.create();
        const font = await pdf.embedFont(StandardFonts.Helvetica);
        const [pageWidth, pageHeight] = PageSizes.A4;
        const maxWidth = pageWidth - MARGIN * 2;

        let page: PDFPage = pdf.addPage(PageSizes.A4);
        let y = pageHeight - MARGIN;

        for (const paragraph of paragraphs) {
            for (const line of wrapParagraph(paragraph, font, FONT_SIZE, maxWidth)) {
                if (y - LINE_HEIGHT < MARGIN) {
                    page = pdf.addPage(PageSizes.A4);
                    y = pageHeight - MARGIN;
                }
                y -= LINE_HEIGHT;
                page.drawText(line, { x: MARGIN, y, size: FONT_SIZE, font });
            }
            y -= PARAGRAPH_GAP;
        }

        return pdf.save();
    }
}
