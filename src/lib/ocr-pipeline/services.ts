/**
 * OCR Pipeline: Service Wiring
 *
 * Builds the process-wide OCR and language-model clients on first use and
 * reuses them across requests.  Nothing is built until the first upload that
 * passes validation; a missing key fails that request.
 */

import { loadConfig } from "./config";
import { DocxPdfConverter } from "./converters/docx-pdf";
import { OpenAiCorrector } from "./correctors/openai-corrector";
import { AzureDocumentExtractor } from "./extractors/azure-document";
import { DocumentPipeline } from "./pipeline";
import type { UploadDependencies } from "./upload";

let dependencies: UploadDependencies | null = null;

export function getUploadDependencies(): UploadDependencies {
    if (dependencies) {
        return dependencies;
    }

    const config = loadConfig();

    const pipeline = new DocumentPipeline({
        extractor: new AzureDocumentExtractor({
            endpoint: config.azure.endpoint,
            apiKey: config.azure.apiKey,
            modelId: config.azure.modelId,
        }),
        corrector: new OpenAiCorrector({
            apiKey: config.openai.apiKey,
            model: config.openai.model,
            maxTokens: config.openai.maxTokens,
        }),
    });

    dependencies = {
        pipeline,
        converter: new DocxPdfConverter(),
        tmpDir: config.upload.tmpDir,
        maxBytes: config.upload.maxBytes,
    };

    return dependencies;
}
