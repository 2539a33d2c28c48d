import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { PDFDocument, PageSizes, StandardFonts } from "pdf-lib";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DocxPdfConverter, toWinAnsi, wrapParagraph } from "@/lib/ocr-pipeline/converters/docx-pdf";
import { ConversionFailure, InvalidInput } from "@/lib/ocr-pipeline/errors";
import { derivePdfPath, normalizeFormat } from "@/lib/ocr-pipeline/format";
import type { DocumentConverter } from "@/lib/ocr-pipeline/types";
import { SilentConverter, buildDocx } from "../helpers/fakes";

let workDir: string;

beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "format-test-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
});

async function writeDocx(name: string, paragraphs: string[]): Promise<string> {
    const filePath = path.join(workDir, name);
    await fs.writeFile(filePath, Buffer.from(await buildDocx(paragraphs)));
    return filePath;
}

describe("derivePdfPath", () => {
    it("keeps directory and base name", () => {
        expect(derivePdfPath("/tmp/job/report.final.docx")).toBe("/tmp/job/report.final.pdf");
    });
});

describe("normalizeFormat", () => {
    it("returns a PDF path unchanged without converting", async () => {
        const converter = new SilentConverter();
        const input = path.join(workDir, "sample.pdf");

        await expect(normalizeFormat(input, ".pdf", converter)).resolves.toBe(input);
        expect(converter.calls).toHaveLength(0);
    });

    it("converts word-processor documents next to the input", async () => {
        const input = path.join(workDir, "sample.docx");
        const converter: DocumentConverter = {
            name: "WritingConverter",
            convert: async (_inputPath, outputPath) => fs.writeFile(outputPath, "%PDF-1.7"),
        };

        const output = await normalizeFormat(input, ".DOCX", converter);

        expect(output).toBe(path.join(workDir, "sample.pdf"));
    });

    it("fails when the converter leaves no output file", async () => {
        const converter = new SilentConverter();
        const input = path.join(workDir, "sample.doc");
        const expectedOutput = path.join(workDir, "sample.pdf");

        const error = await normalizeFormat(input, ".doc", converter).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConversionFailure);
        expect(error).toHaveProperty(
            "message",
            `PDF conversion failed, output file not found: ${expectedOutput}`
        );
        expect(converter.calls).toEqual([{ inputPath: input, outputPath: expectedOutput }]);
    });

    it("wraps converter errors", async () => {
        const cause = new Error("corrupt archive");
        const converter: DocumentConverter = {
            name: "BrokenConverter",
            convert: async () => {
                throw cause;
            },
        };

        const error = await normalizeFormat(path.join(workDir, "a.docx"), ".docx", converter).catch(
            (e: unknown) => e
        );

        expect(error).toBeInstanceOf(ConversionFailure);
        expect(error).toHaveProperty("message", "PDF conversion failed: corrupt archive");
        expect(error).toHaveProperty("cause", cause);
    });

    it("rejects unsupported extensions", async () => {
        await expect(normalizeFormat("/tmp/notes.txt", ".txt", new SilentConverter())).rejects.toBeInstanceOf(
            InvalidInput
        );
    });
});

describe("DocxPdfConverter", () => {
    it("renders a DOCX into a loadable PDF and keeps the input", async () => {
        const input = await writeDocx("letter.docx", ["Invoice 42", "Total due: 120 EUR"]);

        const output = await normalizeFormat(input, ".docx", new DocxPdfConverter());

        const bytes = await fs.readFile(output);
        expect(bytes.subarray(0, 5).toString("latin1")).toBe("%PDF-");
        const pdf = await PDFDocument.load(bytes);
        expect(pdf.getPageCount()).toBe(1);
        await expect(fs.access(input)).resolves.toBeUndefined();
    });

    it("breaks long documents across pages", async () => {
        const paragraphs = Array.from({ length: 120 }, (_, i) => `Line ${i + 1}`);
        const input = await writeDocx("long.docx", paragraphs);

        const output = await normalizeFormat(input, ".docx", new DocxPdfConverter());

        const pdf = await PDFDocument.load(await fs.readFile(output));
        expect(pdf.getPageCount()).toBe(4);
    });

    it("converts a document holding one very long word", async () => {
        const input = await writeDocx("blob.docx", ["x".repeat(10000)]);

        const output = await normalizeFormat(input, ".docx", new DocxPdfConverter());

        const pdf = await PDFDocument.load(await fs.readFile(output));
        expect(pdf.getPageCount()).toBe(3);
    }, 2000);

    it("fails with ConversionFailure for files mammoth cannot read", async () => {
        const input = path.join(workDir, "legacy.doc");
        await fs.writeFile(input, "not a zip archive");

        const error = await normalizeFormat(input, ".doc", new DocxPdfConverter()).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConversionFailure);
        expect(error).toHaveProperty("message", expect.stringMatching(/^PDF conversion failed: /));
        await expect(fs.access(path.join(workDir, "legacy.pdf"))).rejects.toThrow();
    });
});

describe("toWinAnsi", () => {
    it("keeps the WinAnsi punctuation block and replaces the rest", () => {
        expect(toWinAnsi("\u201CQuote\u201D \u2013 caf\u00E9\tok \u4E2D")).toBe(
            "\u201CQuote\u201D \u2013 caf\u00E9 ok ?"
        );
    });

    it("passes the euro, trademark and ligature signs through", () => {
        expect(toWinAnsi("\u20AC5 \u2122 \u0152uvre")).toBe("\u20AC5 \u2122 \u0152uvre");
    });

    it("replaces a character outside the BMP with a single ?", () => {
        expect(toWinAnsi("a\u{1F600}b")).toBe("a?b");
    });
});

describe("wrapParagraph", () => {
    it("hard-breaks an unbroken word into full-width lines", async () => {
        const pdf = await PDFDocument.create();
        const font = await pdf.embedFont(StandardFonts.Helvetica);
        const maxWidth = PageSizes.A4[0] - 112;

        // "x" is 5.5pt wide at 11pt: 87 fit in 483.28pt
        const lines = wrapParagraph("x".repeat(10000), font, 11, maxWidth);

        expect(lines).toHaveLength(115);
        expect(lines[0]).toBe("x".repeat(87));
        expect(lines[114]).toBe("x".repeat(82));
    });

    it("continues after a broken word on the same line", async () => {
        const pdf = await PDFDocument.create();
        const font = await pdf.embedFont(StandardFonts.Helvetica);

        // 10 x 5.5pt fit in 57pt
        const lines = wrapParagraph("x".repeat(13) + " ab", font, 11, 57);

        expect(lines).toEqual(["x".repeat(10), "xxx ab"]);
    });
});
