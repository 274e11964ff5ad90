import { describe, expect, it } from "vitest";
import "./setup.js";
import { loadRuntimeConfig, parsePositiveInt } from "../src/config/runtime.js";
import { fromEnv, normaliseBaseUrl } from "../src/shared/config/schema.js";
import { ConfigurationError } from "../src/shared/errors.js";

describe("loadRuntimeConfig", () => {
  it("defaults to stdio at info level", () => {
    expect(loadRuntimeConfig({})).toEqual({ logLevel: "info", transport: { kind: "stdio" } });
  });

  it("ignores unknown log levels", () => {
    expect(loadRuntimeConfig({ LOG_LEVEL: "verbose" }).logLevel).toBe("info");
    expect(loadRuntimeConfig({ LOG_LEVEL: " DEBUG " }).logLevel).toBe("debug");
  });

  it("builds the HTTP transport settings", () => {
    expect(
      loadRuntimeConfig({ MCP_TRANSPORT: "HTTP", PORT: "8080", MCP_HTTP_ENABLE_JSON_RESPONSE: "no" }).transport
    ).toEqual({
      kind: "http",
      host: "0.0.0.0",
      port: 8080,
      corsAllowOrigin: "*",
      corsAllowHeaders: "Content-Type, MCP-Session-Id, MCP-Protocol-Version",
      corsAllowMethods: "GET,POST,DELETE,OPTIONS",
      enableJsonResponse: false
    });
  });

  it("prefers MCP_HTTP_PORT over PORT", () => {
    const config = loadRuntimeConfig({ MCP_TRANSPORT: "http", MCP_HTTP_PORT: "9000", PORT: "8080", MCP_HTTP_HOST: "127.0.0.1" });
    expect(config.transport).toMatchObject({ kind: "http", host: "127.0.0.1", port: 9000 });
  });
});

describe("parsePositiveInt", () => {
  it.each<[string | undefined, number | undefined]>([
    [undefined, undefined],
    ["", undefined],
    ["0", undefined],
    ["-3", undefined],
    ["abc", undefined],
    ["12", 12]
  ])("parses %j as %j", (input, expected) => {
    expect(parsePositiveInt(input)).toBe(expected);
  });
});

describe("fromEnv", () => {
  it("uses the public Trello API and a 30s timeout by default", () => {
    expect(fromEnv({})).toEqual({ baseUrl: "https://api.trello.com/1", requestTimeoutMs: 30000 });
  });

  it("reads overrides", () => {
    expect(fromEnv({ TRELLO_BASE_URL: "http://localhost:9999/", REQUEST_TIMEOUT_MS: "1500" })).toEqual({
      baseUrl: "http://localhost:9999",
      requestTimeoutMs: 1500
    });
  });

  it("refuses plain HTTP for a remote host", () => {
    expect(() => fromEnv({ TRELLO_BASE_URL: "http://proxy.example.test/1" })).toThrow(ConfigurationError);
    expect(() => fromEnv({ TRELLO_BASE_URL: "http://proxy.example.test/1" })).toThrow(
      "TRELLO_BASE_URL must use https: http://proxy.example.test"
    );
  });

  it.each(["http://localhost:9999", "http://127.0.0.1:9999", "http://[::1]:9999"])("allows plain HTTP for %s", baseUrl => {
    expect(fromEnv({ TRELLO_BASE_URL: baseUrl }).baseUrl).toBe(baseUrl);
  });

  it("falls back on an invalid timeout", () => {
    expect(fromEnv({ REQUEST_TIMEOUT_MS: "-5" }).requestTimeoutMs).toBe(30000);
  });
});

describe("normaliseBaseUrl", () => {
  it("adds a scheme and strips query, hash and trailing slashes", () => {
    expect(normaliseBaseUrl("proxy.internal:8443/trello/1/?x=1#top")).toBe("https://proxy.internal:8443/trello/1");
  });

  it("falls back to the public API for blank values", () => {
    expect(normaliseBaseUrl("   ")).toBe("https://api.trello.com/1");
  });
});
