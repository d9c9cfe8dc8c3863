/**
 * Error classes for tool invocations
 *
 * Every failure a tool call can surface carries a stable error code and a
 * structured context object, so the MCP layer can serialize it without
 * inspecting the message text.
 */

export type ToolErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UPSTREAM_ERROR"
  | "NETWORK_ERROR";

/**
 * Base error class for all tool-scoped failures
 */
export class ToolError extends Error {
  public readonly code: ToolErrorCode;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: ToolErrorCode, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "ToolError";
    this.code = code;
    this.context = context;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a tool argument is missing or malformed. Always raised before
 * any upstream request is made.
 */
export class ValidationError extends ToolError {
  constructor(message: string, field: string, value: unknown) {
    super(message, "VALIDATION_ERROR", { field, value });
    this.name = "ValidationError";
  }
}

export type NotFoundKind = "place" | "taxon";

/**
 * Thrown when a name lookup or an id lookup yields no match
 */
export class NotFoundError extends ToolError {
  constructor(message: string, kind: NotFoundKind, query: string | number) {
    super(message, "NOT_FOUND", { kind, query });
    this.name = "NotFoundError";
  }
}

/**
 * Thrown when the upstream API answers with a non-2xx status and no retry
 * is left (or the status is not retryable)
 */
export class UpstreamError extends ToolError {
  public readonly statusCode: number | undefined;
  public readonly endpoint: string;

  constructor(message: string, endpoint: string, statusCode?: number) {
    super(message, "UPSTREAM_ERROR", { endpoint, status_code: statusCode });
    this.name = "UpstreamError";
    this.statusCode = statusCode;
    this.endpoint = endpoint;
  }
}

/**
 * Thrown when the upstream API cannot be reached at all, or when the caller
 * cancelled the request
 */
export class NetworkError extends ToolError {
  public readonly endpoint: string;
  public readonly cancelled: boolean;

  constructor(message: string, endpoint: string, cancelled = false) {
    super(message, "NETWORK_ERROR", { endpoint, cancelled });
    this.name = "NetworkError";
    this.endpoint = endpoint;
    this.cancelled = cancelled;
  }
}

export function isToolError(error: unknown): error is ToolError {
  return error instanceof ToolError;
}
