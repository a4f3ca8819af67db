/**
 * Error taxonomy for download tasks.
 *
 * Design:
 * - RejectedError is returned synchronously from enqueue, never thrown later
 * - Every accepted task ends with at most one DownloadError subclass
 * - `type` is the stable classification used for user messages and escalation
 */

// ============================================================================
// Types
// ============================================================================

export type RejectionReason = "queue_full" | "user_limit" | "duplicate" | "shutting_down";

export type DownloadErrorType =
  | "transient_network"
  | "source_unavailable"
  | "format_unavailable"
  | "output_too_large"
  | "timeout"
  | "unknown";

export type ErrorContext = Record<string, unknown>;

// ============================================================================
// Base
// ============================================================================

export class BotError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BotError";
    this.context = context;
  }
}

// ============================================================================
// Enqueue rejection
// ============================================================================

export class RejectedError extends BotError {
  constructor(
    public readonly reason: RejectionReason,
    message: string,
    context: ErrorContext = {},
  ) {
    super(message, context);
    this.name = "RejectedError";
  }
}

// ============================================================================
// Task failures
// ============================================================================

export class DownloadError extends BotError {
  constructor(
    public readonly type: DownloadErrorType,
    message: string,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "DownloadError";
  }

  /** Only transient network failures are worth another attempt. */
  get retryable(): boolean {
    return this.type === "transient_network";
  }
}

export class ExtractionError extends DownloadError {
  constructor(
    type: "source_unavailable" | "format_unavailable",
    message: string,
    context: ErrorContext = {},
  ) {
    super(type, message, context);
    this.name = "ExtractionError";
  }
}

export class SourceUnavailableError extends ExtractionError {
  constructor(message: string, context: ErrorContext = {}) {
    super("source_unavailable", message, context);
    this.name = "SourceUnavailableError";
  }
}

export class FormatUnavailableError extends ExtractionError {
  constructor(message: string, context: ErrorContext = {}) {
    super("format_unavailable", message, context);
    this.name = "FormatUnavailableError";
  }
}

export class TransientNetworkError extends DownloadError {
  constructor(message: string, context: ErrorContext = {}) {
    super("transient_network", message, context);
    this.name = "TransientNetworkError";
  }
}

export class OutputTooLargeError extends DownloadError {
  constructor(
    public readonly sizeBytes: number | null,
    public readonly limitBytes: number,
    context: ErrorContext = {},
  ) {
    super(
      "output_too_large",
      sizeBytes === null
        ? `Output exceeds the ${limitBytes} byte limit`
        : `Output of ${sizeBytes} bytes exceeds the ${limitBytes} byte limit`,
      { ...context, sizeBytes, limitBytes },
    );
    this.name = "OutputTooLargeError";
  }
}

export class TaskTimeoutError extends DownloadError {
  constructor(
    public readonly timeoutMs: number,
    context: ErrorContext = {},
  ) {
    super("timeout", `Timed out after ${timeoutMs}ms`, { ...context, timeoutMs });
    this.name = "TimeoutError";
  }
}

export class UnknownError extends DownloadError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super("unknown", message, context, options);
    this.name = "UnknownError";
  }
}

/**
 * Raised by the extractor when its abort signal fires. Not a task failure:
 * the queue turns it into the Cancelled state.
 */
export class CancelledError extends BotError {
  constructor(message = "Operation cancelled", context: ErrorContext = {}) {
    super(message, context);
    this.name = "CancelledError";
  }
}

// ============================================================================
// Normalisation
// ============================================================================

/**
 * Normalise anything thrown into a DownloadError.
 * Pure function.
 */
export function toDownloadError(err: unknown, context: ErrorContext = {}): DownloadError {
  if (err instanceof DownloadError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new UnknownError(message, context, { cause: err });
}

/**
 * Best-effort stack or message for operator diagnostics.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.stack ?? `${err.name}: ${err.message}`;
  return String(err);
}
