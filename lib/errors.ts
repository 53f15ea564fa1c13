/**
 * Error hierarchy for the pipeline and its API surface.
 *
 * Empty input and out-of-range Top-N are not errors: the first yields an
 * empty table, the second is clamped (see lib/rank.ts).
 */

export class PipelineError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** A document that fails the RawDocument schema; skipped per document */
export class MalformedDocumentError extends PipelineError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Malformed document: ${reason}`, 'MALFORMED_DOCUMENT', 422, context);
  }
}

export class InvalidImportError extends PipelineError {
  constructor(message: string, source?: string) {
    super(message, 'INVALID_IMPORT', 400, source ? { source } : undefined);
  }
}

export class PipelineBusyError extends PipelineError {
  constructor(runId: string) {
    super(`Pipeline run ${runId} is still in progress`, 'PIPELINE_BUSY', 409, { runId });
  }
}

export class PipelineRunError extends PipelineError {
  constructor(runId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Pipeline run ${runId} failed: ${reason}`, 'PIPELINE_FAILED', 500, { runId });
    this.cause = cause;
  }
}

export class NoResultsError extends PipelineError {
  constructor() {
    super('No ranked output yet. Run the pipeline first.', 'NO_RESULTS', 404);
  }
}
