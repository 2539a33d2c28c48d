/**
 * OCR Pipeline: Error Taxonomy
 *
 * `InvalidInput` is the only user-correctable failure (HTTP 400).  The
 * conversion, extraction and correction failures end up as a `failed`
 * ProcessingResult; anything else is an internal error at the HTTP boundary.
 */

export type PipelineErrorCode =
    | "INVALID_INPUT"
    | "CONVERSION_FAILURE"
    | "EXTRACTION_FAILURE"
    | "CORRECTION_FAILURE";

export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
        this.code = code;
    }
}

export class InvalidInput extends PipelineError {
    constructor(message: string) {
        super("INVALID_INPUT", message);
    }
}

export class ConversionFailure extends PipelineError {
    constructor(message: string, cause?: unknown) {
        super("CONVERSION_FAILURE", message, cause);
    }
}

export class ExtractionFailure extends PipelineError {
    constructor(message: string, cause?: unknown) {
        super("EXTRACTION_FAILURE", message, cause);
    }
}

export class CorrectionFailure extends PipelineError {
    constructor(message: string, cause?: unknown) {
        super("CORRECTION_FAILURE", message, cause);
    }
}

/** Safely extract an error message from an unknown thrown value */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
