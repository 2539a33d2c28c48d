/**
 * OCR Pipeline: Document Pipeline
 *
 * Sequences extraction and correction for an already-normalized PDF and
 * shapes the result.  `process` never throws: every failure becomes a
 * `failed` ProcessingResult.
 *
 *   extract ──▶ (no pages → failed "No data extracted")
 *           └─▶ correct ──▶ processed
 */

import { CorrectionFailure, ExtractionFailure, PipelineError, getErrorMessage } from "./errors";
import type {
    CorrectedPage,
    PageEntry,
    PageText,
    ProcessingResult,
    StageOutcome,
    TextCorrector,
    TextExtractor,
} from "./types";

export const NO_DATA_MESSAGE = "No data extracted";

interface DocumentPipelineOptions {
    extractor: TextExtractor;
    corrector: TextCorrector;
    /** Completion clock, injectable for tests */
    now?: () => Date;
}

/** Wire shape: `[{ "0": "..." }, { "1": "..." }]` */
export function toPageEntries(pages: Array<PageText | CorrectedPage>): PageEntry[] {
    return pages.map((page) => ({ [String(page.index)]: page.text }));
}

/**
 * Run a stage, turning a thrown value into a failed outcome.  Errors that are
 * not already a PipelineError are wrapped with `toFailure`.
 */
async function runStage<T>(
    stage: () => Promise<T>,
    toFailure: (message: string, cause: unknown) => PipelineError
): Promise<StageOutcome<T>> {
    try {
        return { success: true, value: await stage() };
    } catch (error) {
        return {
            success: false,
            error: error instanceof PipelineError ? error : toFailure(getErrorMessage(error), error),
        };
    }
}

export class DocumentPipeline {
    private readonly extractor: TextExtractor;
    private readonly corrector: TextCorrector;
    private readonly now: () => Date;

    constructor(options: DocumentPipelineOptions) {
        this.extractor = options.extractor;
        this.corrector = options.corrector;
        this.now = options.now ?? (() => new Date());
    }

    async process(pdfPath: string): Promise<ProcessingResult> {
        const extracted = await runStage(
            () => this.extractor.extract(pdfPath),
            (message, cause) => new ExtractionFailure(message, cause)
        );
        if (!extracted.success) {
            return this.fail(this.extractor.name, extracted.error);
        }

        const pages = extracted.value;
        if (pages.length === 0) {
            console.warn("[DocumentPipeline] Extraction returned no pages");
            return { status: "failed", message: NO_DATA_MESSAGE };
        }

        const corrected = await runStage(
            () => this.corrector.correct(pages),
            (message, cause) => new CorrectionFailure(message, cause)
        );
        if (!corrected.success) {
            return this.fail(this.corrector.name, corrected.error);
        }

        console.log(`[DocumentPipeline] Processed ${pages.length} page(s)`);

        return {
            status: "processed",
            json_data: toPageEntries(corrected.value),
            ocr_output: toPageEntries(pages),
            processed_date: this.now().toISOString(),
        };
    }

    private fail(stage: string, error: PipelineError): ProcessingResult {
        console.error(`[DocumentPipeline] ${stage} failed (${error.code}): ${error.message}`);
        return { status: "failed", message: error.message };
    }
}
