import { ValidationError } from "../../shared/errors.js";

/** Null, undefined, blank strings, empty arrays and empty plain objects count as missing. */
export function isMissing(value: unknown): boolean {
  if (value === null || typeof value === "undefined") {
    return true;
  }
  if (typeof value === "string") {
    return value.trim().length === 0;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length === 0;
  }
  return false;
}

export function missingParameters(params: Record<string, unknown>, required: readonly string[]): string[] {
  return required.filter(key => isMissing(params[key]));
}

export function validateRequired(params: Record<string, unknown>, required: readonly string[]): void {
  const missing = missingParameters(params, required);
  if (missing.length > 0) {
    throw new ValidationError(`Missing required parameter(s): ${missing.join(", ")}`, { missing });
  }
}
