/**
 * OCR Pipeline: Public API
 *
 * Barrel export: import everything from `@/lib/ocr-pipeline`.
 */

export { loadConfig } from "./config";
export type { PipelineConfig } from "./config";
export { DocxPdfConverter } from "./converters/docx-pdf";
export { OpenAiCorrector } from "./correctors/openai-corrector";
export {
    ConversionFailure,
    CorrectionFailure,
    ExtractionFailure,
    InvalidInput,
    PipelineError,
    getErrorMessage,
} from "./errors";
export { AzureDocumentExtractor } from "./extractors/azure-document";
export { normalizeFormat } from "./format";
export { DocumentPipeline, NO_DATA_MESSAGE } from "./pipeline";
export { getUploadDependencies } from "./services";
export { handleUpload } from "./upload";
export type { UploadDependencies, UploadResponse, UploadResponseBody } from "./upload";
export type {
    CorrectedPage,
    DocumentConverter,
    PageEntry,
    PageText,
    ProcessingResult,
    TextCorrector,
    TextExtractor,
} from "./types";
