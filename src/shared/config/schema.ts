import { URL } from "node:url";
import { TRELLO_BASE_URL } from "../../config/constants.js";
import { ConfigurationError } from "../errors.js";

export const TRELLO_API_KEY_VAR = "TRELLO_API_KEY";
export const TRELLO_API_TOKEN_VAR = "TRELLO_API_TOKEN";
export const BASE_PATH_VAR = "BASE_PATH";

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Non-secret settings. Credentials are not held here; they are resolved
 * per request through a CredentialProvider.
 */
export type AppConfig = {
  baseUrl: string;
  requestTimeoutMs: number;
};

type EnvSource = Record<string, string | undefined>;

function toOptionalString(value: string | undefined | null): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

/** Plain HTTP is accepted only for a loopback host. Throws ConfigurationError otherwise. */
export function normaliseBaseUrl(value: string | undefined): string {
  const raw = toOptionalString(value);
  if (!raw) {
    return TRELLO_BASE_URL;
  }
  const prefixed = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
  let url: URL;
  try {
    url = new URL(prefixed);
  } catch {
    return TRELLO_BASE_URL;
  }
  if (url.protocol === "http:" && !LOOPBACK_HOSTS.has(url.hostname)) {
    throw new ConfigurationError(`TRELLO_BASE_URL must use https: ${url.origin}`);
  }
  url.hash = "";
  url.search = "";
  return url.toString().replace(/\/+$/, "");
}

function resolveRequestTimeout(value: string | undefined): number {
  const raw = toOptionalString(value);
  if (!raw) {
    return DEFAULT_TIMEOUT_MS;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return DEFAULT_TIMEOUT_MS;
  }
  return parsed;
}

export function fromEnv(env: EnvSource = process.env): AppConfig {
  return {
    baseUrl: normaliseBaseUrl(env.TRELLO_BASE_URL),
    requestTimeoutMs: resolveRequestTimeout(env.REQUEST_TIMEOUT_MS)
  };
}
