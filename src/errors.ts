/**
 * Error taxonomy for the fetch pipeline.
 * Only ConfigError is meant to reach the process entry point.
 */

export type PipelineErrorCode =
  | "CONFIG_INVALID"
  | "UPSTREAM_TRANSIENT"
  | "CHUNK_FAILED"
  | "SINK_WRITE_FAILED"
  | "CANCELLED";

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid or missing configuration. Fatal at startup. */
export class ConfigError extends PipelineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG_INVALID", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

/**
 * How an upstream request went wrong:
 * - transport: the request never produced a response
 * - status: the response had a non-success status
 * - malformed: a success status with a body that could not be understood
 */
export type UpstreamFailureKind = "transport" | "status" | "malformed";

export class TransientUpstreamError extends PipelineError {
  public readonly kind: UpstreamFailureKind;
  public readonly status?: number;
  /** First characters of the response body, for diagnosing garbled payloads */
  public readonly bodyExcerpt?: string;

  constructor(
    kind: UpstreamFailureKind,
    message: string,
    details: { status?: number; bodyExcerpt?: string; cause?: unknown } = {}
  ) {
    super("UPSTREAM_TRANSIENT", message, { cause: details.cause });
    this.kind = kind;
    if (details.status !== undefined) this.status = details.status;
    if (details.bodyExcerpt !== undefined) this.bodyExcerpt = details.bodyExcerpt;
  }
}

export type ChunkFailureReason = "transport" | "count_mismatch";

export class ChunkFailure extends PipelineError {
  public readonly reason: ChunkFailureReason;

  constructor(reason: ChunkFailureReason, message: string, options?: { cause?: unknown }) {
    super("CHUNK_FAILED", message, options);
    this.reason = reason;
  }
}

export class SinkFailure extends PipelineError {
  public readonly identifier: string;

  constructor(identifier: string, message: string, options?: { cause?: unknown }) {
    super("SINK_WRITE_FAILED", message, options);
    this.identifier = identifier;
  }
}

export class CancelledError extends PipelineError {
  constructor(message = "cancelled") {
    super("CANCELLED", message);
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Keep a short prefix of a response body for logs and error details. */
export function excerpt(text: string, max = 300): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
