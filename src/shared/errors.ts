import { err, type ToolError, type ToolErrorCode } from "./Result.js";

/** A required secret or setting is missing. Never retried; the environment must be fixed. */
export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Trello answered with a non-2xx status. `body` is the raw response text. */
export class UpstreamError extends Error {
  readonly code = "UPSTREAM_ERROR";

  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`Trello API error ${status}: ${body}`);
    this.name = "UpstreamError";
  }
}

/**
 * The request never produced an HTTP response. `reason` carries the low-level
 * error code (ECONNREFUSED, ETIMEDOUT, ENOTFOUND, ...) when one was reported.
 */
export class TransportError extends Error {
  readonly code = "TRANSPORT_ERROR";

  constructor(
    message: string,
    readonly reason?: string
  ) {
    super(message);
    this.name = "TransportError";
  }
}

export class ValidationError extends Error {
  readonly code = "INVALID_PARAMETER";

  constructor(
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export function upstreamCode(status: number): ToolErrorCode {
  if (status === 400 || status === 422) {
    return "INVALID_PARAMETER";
  }
  if (status === 401 || status === 403 || status === 404) {
    return "NOT_FOUND";
  }
  if (status === 429) {
    return "RATE_LIMIT";
  }
  return "UPSTREAM_ERROR";
}

export function toToolError(error: unknown): ToolError {
  if (error instanceof UpstreamError) {
    return err(upstreamCode(error.status), error.message, { status: error.status, body: error.body });
  }
  if (error instanceof ConfigurationError) {
    return err("CONFIGURATION_ERROR", error.message);
  }
  if (error instanceof TransportError) {
    return err("TRANSPORT_ERROR", error.message, error.reason ? { reason: error.reason } : undefined);
  }
  if (error instanceof ValidationError) {
    return err("INVALID_PARAMETER", error.message, error.details);
  }
  const message = error instanceof Error ? error.message : String(error);
  return err("UNKNOWN", message);
}
