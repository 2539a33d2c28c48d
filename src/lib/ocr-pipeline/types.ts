/**
 * OCR Pipeline: Type Definitions
 *
 * Shared types and interfaces for the upload → convert → OCR → correct
 * pipeline.  The external services are modelled as narrow interfaces so the
 * process-wide clients can be injected (and replaced by fakes in tests).
 */

import type { PipelineError } from "./errors";

// ---------------------------------------------------------------------------
// Page Types
// ---------------------------------------------------------------------------

/** Text recognised on a single page */
export interface PageText {
  /** Zero-based page index */
  index: number;
  /** Page lines joined with single spaces */
  text: string;
}

/** Language-model corrected text for a page; `index` matches its PageText */
export interface CorrectedPage {
  index: number;
  text: string;
}

/** Wire shape of a page: a single-key record such as `{ "0": "..." }` */
export type PageEntry = Record<string, string>;

// ---------------------------------------------------------------------------
// Result Types
// ---------------------------------------------------------------------------

export type SupportedExtension = ".pdf" | ".doc" | ".docx";

/** Externally visible result of processing one document */
export type ProcessingResult =
  | {
      status: "processed";
      json_data: PageEntry[];
      ocr_output: PageEntry[];
      /** ISO-8601, UTC */
      processed_date: string;
    }
  | { status: "failed"; message: string };

/** Outcome of a single pipeline stage */
export type StageOutcome<T> =
  | { success: true; value: T }
  | { success: false; error: PipelineError };

// ---------------------------------------------------------------------------
// Component Interfaces
// ---------------------------------------------------------------------------

/** Converts a word-processor document into a PDF written at `outputPath` */
export interface DocumentConverter {
  readonly name: string;
  convert(inputPath: string, outputPath: string): Promise<void>;
}

/** Turns a PDF on disk into per-page text */
export interface TextExtractor {
  readonly name: string;
  extract(pdfPath: string): Promise<PageText[]>;
}

/** Cleans OCR artifacts out of extracted pages */
export interface TextCorrector {
  readonly name: string;
  correct(pages: PageText[]): Promise<CorrectedPage[]>;
}

// ---------------------------------------------------------------------------
// External Service Clients
// ---------------------------------------------------------------------------

/** The parts of a document-analysis result the extractor reads */
export interface DocumentAnalysis {
  pages?: Array<{
    /** 1-based, as reported by the service */
    pageNumber: number;
    lines?: Array<{ content: string }>;
  }>;
}

/**
 * Long-running analysis client.  `DocumentAnalysisClient` from
 * `@azure/ai-form-recognizer` satisfies this interface.
 */
export interface DocumentAnalysisBackend {
  beginAnalyzeDocument(
    modelId: string,
    document: Buffer
  ): Promise<{ pollUntilDone(): Promise<DocumentAnalysis> }>;
}

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
}

export interface ChatCompletionReply {
  choices: Array<{ message?: { content?: string | null } }>;
}

/** Chat-completion client.  The `OpenAI` SDK client satisfies this interface. */
export interface ChatCompletionBackend {
  chat: {
    completions: {
      create(body: ChatCompletionRequest): Promise<ChatCompletionReply>;
    };
  };
}
