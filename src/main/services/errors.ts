/**
 * Custom Error Classes for the download engine
 *
 * Provides categorized error types for each stage of a run so failures can be
 * logged with context and folded into per-item outcomes.
 */

/**
 * Error categories. `SourceUnavailable` is fatal to a run; the rest are
 * per-item and end up in a `Failed` outcome.
 */
export type ErrorCategory =
  | 'SourceUnavailable'
  | 'NoMatch'
  | 'StreamUnavailable'
  | 'TranscodeError'
  | 'TagWriteError'
  | 'APIError';

/** Context accepted by every PipelineError */
export interface ErrorContext {
  /** Source item the error belongs to (video id) */
  itemId?: string;
  /** Task step that raised the error */
  step?: string;
  /** Underlying error */
  cause?: Error;
}

/**
 * Base class for all songbridge errors.
 */
export class PipelineError extends Error {
  readonly category: ErrorCategory;
  /** Source item being processed when the error occurred (if any) */
  readonly itemId: string | null;
  readonly step: string;
  override readonly cause: Error | null;
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: ErrorContext) {
    super(message);
    this.name = category;
    this.category = category;
    this.itemId = options?.itemId ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    itemId: string | null;
    step: string;
    timestamp: string;
    stack: string | undefined;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      itemId: this.itemId,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * Returns a one-line message without stack traces.
   */
  toUserMessage(): string {
    const itemInfo = this.itemId ? ` [${this.itemId}]` : '';
    return `${this.category}${itemInfo}: ${this.message}`;
  }
}

/**
 * The source URL could not be resolved to any items (bad URL, private or
 * deleted playlist, platform unreachable). Aborts the run before any task starts.
 */
export class SourceUnavailableError extends PipelineError {
  readonly sourceUrl: string;

  constructor(message: string, sourceUrl: string, options?: ErrorContext) {
    super(message, 'SourceUnavailable', { step: 'resolving', ...options });
    this.sourceUrl = sourceUrl;
  }
}

/**
 * The catalog returned no candidate, or none above the similarity threshold.
 */
export class NoMatchError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'NoMatch', { step: 'matching', ...options });
  }
}

/**
 * The matched track has no stream, or the stream download failed.
 */
export class StreamUnavailableError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'StreamUnavailable', { step: 'downloading', ...options });
  }
}

/**
 * Conversion to MP3 failed: unsupported input, missing ffmpeg, unreadable output.
 */
export class TranscodeError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'TranscodeError', { step: 'transcoding', ...options });
  }
}

/**
 * Tags or artwork could not be written to the converted file.
 */
export class TagWriteError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'TagWriteError', { step: 'tagging', ...options });
  }
}

/**
 * An HTTP call to a remote service failed.
 */
export class APIError extends PipelineError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;
  /** Name of the service that failed */
  readonly service: string | null;

  constructor(
    message: string,
    options?: ErrorContext & {
      statusCode?: number;
      service?: string;
    },
  ) {
    super(message, 'APIError', {
      step: 'api_call',
      ...options,
    });
    this.statusCode = options?.statusCode ?? null;
    this.service = options?.service ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & {
    statusCode: number | null;
    service: string | null;
  } {
    return {
      ...super.toLogObject(),
      statusCode: this.statusCode,
      service: this.service,
    };
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Wraps a generic error in the given PipelineError category.
 * If the error is already a PipelineError, it is returned as-is.
 */
export function wrapError(
  error: unknown,
  category: Exclude<ErrorCategory, 'SourceUnavailable'>,
  options?: {
    itemId?: string;
    step?: string;
  },
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'NoMatch':
      return new NoMatchError(message, { ...options, cause });
    case 'StreamUnavailable':
      return new StreamUnavailableError(message, { ...options, cause });
    case 'TranscodeError':
      return new TranscodeError(message, { ...options, cause });
    case 'TagWriteError':
      return new TagWriteError(message, { ...options, cause });
    case 'APIError':
      return new APIError(message, { ...options, cause });
  }
}
