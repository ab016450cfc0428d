/**
 * Error hierarchy for the ingestion pipeline.
 *
 * `retryable` tells the stream consumer whether leaving the entry
 * unacknowledged can ever succeed.
 */
export class PipelineError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    retryable: boolean,
    options?: { cause?: unknown; context?: Record<string, unknown> },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.retryable = retryable;
    this.context = options?.context;
  }
}

/** Publishing to the stream failed or timed out at the edge. */
export class CaptureError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'CAPTURE_FAILED', false, options);
  }
}

/** Malformed envelope, or data the store refuses. Redelivering it cannot help. */
export class ValidationError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'INVALID_SUBMISSION', false, { cause, context });
  }
}

/** Store unavailable, throttled, or too slow. Safe to redeliver. */
export class TransientStoreError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'STORE_UNAVAILABLE', true, options);
  }
}
