export type StdioTransportConfig = { kind: "stdio" };

export type HttpTransportConfig = {
  kind: "http";
  host: string;
  port: number;
  corsAllowOrigin: string;
  corsAllowHeaders: string;
  corsAllowMethods: string;
  enableJsonResponse: boolean;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type RuntimeConfig = {
  logLevel: LogLevel;
  transport: StdioTransportConfig | HttpTransportConfig;
};

const allowedLevels: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const DEFAULT_HTTP_PORT = 3000;
const DEFAULT_HTTP_HOST = "0.0.0.0";

function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = allowedLevels.find(level => level === normalized);
  return match ?? "info";
}

export function parsePositiveInt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return undefined;
  }
  return parsed;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  return defaultValue;
}

function resolveHttpTransport(env: NodeJS.ProcessEnv): HttpTransportConfig {
  const host = env.MCP_HTTP_HOST?.trim() || DEFAULT_HTTP_HOST;
  const port = parsePositiveInt(env.MCP_HTTP_PORT ?? env.PORT) ?? DEFAULT_HTTP_PORT;
  const corsAllowOrigin = env.MCP_HTTP_CORS_ALLOW_ORIGIN?.trim() || "*";
  const corsAllowHeaders =
    env.MCP_HTTP_CORS_ALLOW_HEADERS?.trim() || "Content-Type, MCP-Session-Id, MCP-Protocol-Version";
  const corsAllowMethods = env.MCP_HTTP_CORS_ALLOW_METHODS?.trim() || "GET,POST,DELETE,OPTIONS";
  const enableJsonResponse = parseBoolean(env.MCP_HTTP_ENABLE_JSON_RESPONSE, true);
  return { kind: "http", host, port, corsAllowOrigin, corsAllowHeaders, corsAllowMethods, enableJsonResponse };
}

function resolveTransport(env: NodeJS.ProcessEnv): RuntimeConfig["transport"] {
  const value = env.MCP_TRANSPORT?.trim().toLowerCase();
  if (value === "http") {
    return resolveHttpTransport(env);
  }
  return { kind: "stdio" };
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return { logLevel: resolveLogLevel(env.LOG_LEVEL), transport: resolveTransport(env) };
}
