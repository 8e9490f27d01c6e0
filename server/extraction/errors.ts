/**
 * Error taxonomy for extraction requests.
 *
 * Request-level errors (bad input, unknown document) abort before any
 * pipeline runs. Pipeline-level errors are caught by the orchestrator and
 * stored in that pipeline's result slot.
 */

export abstract class ExtractionError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends ExtractionError {
  readonly code = "INVALID_REQUEST";
  readonly status = 400;
}

export class DocumentNotFoundError extends ExtractionError {
  readonly code = "DOCUMENT_NOT_FOUND";
  readonly status = 404;

  constructor(readonly documentId: string) {
    super("File not found");
  }
}

/**
 * An optional collaborator (PDF library, canvas, OCR engine) is not
 * installed or failed to load in this runtime.
 */
export class DependencyUnavailableError extends ExtractionError {
  readonly code = "DEPENDENCY_UNAVAILABLE";
  readonly status = 503;

  constructor(readonly dependency: string, cause?: unknown) {
    super(`${dependency} is not available on this server`, { cause });
  }
}

export class PipelineExecutionError extends ExtractionError {
  readonly code = "EXECUTION_FAILED";
  readonly status = 500;
}

/**
 * Check if an error is an AbortError (from AbortController.abort()).
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Throw an AbortError if the signal has been triggered.
 */
export function checkAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    if (signal.reason instanceof Error) {
      throw signal.reason;
    }
    const error = new Error("Operation cancelled");
    error.name = "AbortError";
    throw error;
  }
}

export function getErrorMessage(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}
