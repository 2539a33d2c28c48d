/**
 * OCR Pipeline: Azure Document Intelligence Extractor
 *
 * Submits the PDF to the "prebuilt-document" model and waits for the
 * long-running analysis to finish.  Each page's lines are joined with single
 * spaces, in the order the service reports them.
 */

import { promises as fs } from "node:fs";
import { AzureKeyCredential, DocumentAnalysisClient } from "@azure/ai-form-recognizer";
import { ExtractionFailure, getErrorMessage } from "../errors";
import type { DocumentAnalysis, DocumentAnalysisBackend, PageText, TextExtractor } from "../types";

interface AzureDocumentExtractorOptions {
    /** Pre-built client; when given, endpoint and key are not needed */
    client?: DocumentAnalysisBackend;
    endpoint?: string;
    apiKey?: string;
    modelId?: string;
}

/** Convert an analysis result into zero-based, ordered page texts */
export function toPageTexts(analysis: DocumentAnalysis): PageText[] {
    return (analysis.pages ?? [])
        .map((page) => ({
            index: page.pageNumber - 1,
            text: (page.lines ?? []).map((line) => line.content).join(" "),
        }))
        .sort((a, b) => a.index - b.index);
}

export class AzureDocumentExtractor implements TextExtractor {
    readonly name = "AzureDocumentExtractor";

    private readonly client: DocumentAnalysisBackend;
    private readonly modelId: string;

    constructor(options: AzureDocumentExtractorOptions = {}) {
        this.modelId = options.modelId ?? "prebuilt-document";

        if (options.client) {
            this.client = options.client;
            return;
        }

        if (!options.endpoint || !options.apiKey) {
            throw new Error(
                "[AzureDocumentExtractor] Missing AZURE_OCR_ENDPOINT or AZURE_OCR_KEY. Pass them via options or environment variables."
            );
        }

        this.client = new DocumentAnalysisClient(options.endpoint, new AzureKeyCredential(options.apiKey));
    }

    async extract(pdfPath: string): Promise<PageText[]> {
        try {
            const document = await fs.readFile(pdfPath);
            const poller = await this.client.beginAnalyzeDocument(this.modelId, document);
            const analysis = await poller.pollUntilDone();
            const pages = toPageTexts(analysis);

            console.log(`[AzureDocumentExtractor] Analysis complete: ${pages.length} page(s)`);
            return pages;
        } catch (error) {
            const message = getErrorMessage(error);
            console.error(`[AzureDocumentExtractor] Analysis failed: ${message}`);
            throw new ExtractionFailure(`Document analysis failed: ${message}`, error);
        }
    }
}
