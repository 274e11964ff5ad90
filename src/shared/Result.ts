export type ToolErrorCode =
  | "INVALID_PARAMETER"
  | "NOT_FOUND"
  | "RATE_LIMIT"
  | "CONFIGURATION_ERROR"
  | "UPSTREAM_ERROR"
  | "TRANSPORT_ERROR"
  | "PARTIAL_FAILURE"
  | "UNKNOWN";

export type ToolSuccess<T> = { isError: false; data: T };
export type ToolError = { isError: true; code: ToolErrorCode; message: string; details?: unknown };
export type Result<T> = ToolSuccess<T> | ToolError;

export function ok<T>(data: T): ToolSuccess<T> {
  return { isError: false, data };
}

export function err(code: ToolErrorCode, message: string, details?: unknown): ToolError {
  const payload: ToolError = { isError: true, code, message };
  if (typeof details !== "undefined") {
    payload.details = details;
  }
  return payload;
}
