import type { BodyMap, QueryMap } from "../infrastructure/trello/TrelloGateway.js";

type ScalarParam = string | number | boolean | null | undefined;

export type ParamBag = Record<string, ScalarParam | readonly string[]>;

function toParamString(value: ScalarParam | readonly string[]): string | undefined {
  if (value === null || typeof value === "undefined") {
    return undefined;
  }
  if (typeof value === "string") {
    return value.trim().length > 0 ? value : undefined;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  const items = value.map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items.join(",") : undefined;
}

/** Drops absent and blank values; lists become comma-separated strings, as Trello expects. */
export function compactParams(params: ParamBag): QueryMap {
  const result: QueryMap = {};
  for (const [key, value] of Object.entries(params)) {
    const normalised = toParamString(value);
    if (typeof normalised !== "undefined") {
      result[key] = normalised;
    }
  }
  return result;
}

export function compactBody(params: ParamBag): BodyMap {
  return compactParams(params);
}

export function pathSegment(value: string): string {
  return encodeURIComponent(value.trim());
}
