/**
 * Structured error types for stratus.
 *
 * Error boundaries wrap failures in a StratusError rather than passing
 * e.message around, so callers can branch on `kind` and loggers get
 * consistent fields.
 */

export type StratusErrorKind =
  | "transport_failure"
  | "endpoint_unavailable"
  | "malformed_response"
  | "file_access_failure"
  | "file_parse_failure"
  | "watch_setup_failure"
  | "watch_failure"
  | "stream_truncated"
  | "engine_busy"
  | "config_error";

export interface StratusErrorOptions {
  retryable?: boolean;
  /** HTTP status of the response that caused the failure. */
  status?: number;
  latency_ms?: number;
  /** File the failure relates to (telemetry file, data directory). */
  path?: string;
  cause?: unknown;
}

export class StratusError extends Error {
  readonly kind: StratusErrorKind;
  readonly retryable: boolean;
  readonly status?: number;
  readonly latency_ms?: number;
  readonly path?: string;

  constructor(kind: StratusErrorKind, message: string, opts: StratusErrorOptions = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "StratusError";
    this.kind = kind;
    this.retryable = opts.retryable ?? false;
    if (opts.status !== undefined) this.status = opts.status;
    if (opts.latency_ms !== undefined) this.latency_ms = opts.latency_ms;
    if (opts.path) this.path = opts.path;
  }
}

/**
 * Create a StratusError with structured fields.
 */
export function stratusError(
  kind: StratusErrorKind,
  message: string,
  opts: StratusErrorOptions = {},
): StratusError {
  return new StratusError(kind, message, opts);
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

export function isStratusError(e: unknown, kind?: StratusErrorKind): e is StratusError {
  if (!(e instanceof StratusError)) return false;
  return kind === undefined || e.kind === kind;
}

/**
 * Format a StratusError for structured logging.
 * Returns a plain object suitable for JSON.stringify.
 */
export function errorLogFields(e: StratusError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.status !== undefined) fields.status = e.status;
  if (e.latency_ms !== undefined) fields.latency_ms = e.latency_ms;
  if (e.path) fields.path = e.path;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
