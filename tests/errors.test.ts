import { describe, expect, it } from "vitest";
import "./setup.js";
import {
  ConfigurationError,
  TransportError,
  UpstreamError,
  ValidationError,
  toToolError,
  upstreamCode
} from "../src/shared/errors.js";

describe("error classes", () => {
  it("stay distinguishable with instanceof", () => {
    const errors = [
      new ConfigurationError("missing"),
      new UpstreamError(500, "boom"),
      new TransportError("reset")
    ];
    expect(errors.map(error => error instanceof UpstreamError)).toEqual([false, true, false]);
    expect(errors.map(error => error.name)).toEqual(["ConfigurationError", "UpstreamError", "TransportError"]);
    expect(errors.every(error => error instanceof Error)).toBe(true);
  });

  it("keeps the upstream body verbatim", () => {
    const error = new UpstreamError(422, '{"message":"invalid value for pos"}');
    expect(error.body).toBe('{"message":"invalid value for pos"}');
    expect(error.message).toBe('Trello API error 422: {"message":"invalid value for pos"}');
  });
});

describe("toToolError", () => {
  it.each<[number, string]>([
    [400, "INVALID_PARAMETER"],
    [403, "NOT_FOUND"],
    [404, "NOT_FOUND"],
    [422, "INVALID_PARAMETER"],
    [429, "RATE_LIMIT"],
    [502, "UPSTREAM_ERROR"]
  ])("maps status %i to %s", (status, code) => {
    expect(upstreamCode(status)).toBe(code);
  });

  it("omits details for a transport error without a reason", () => {
    expect(toToolError(new TransportError("socket hang up"))).toEqual({
      isError: true,
      code: "TRANSPORT_ERROR",
      message: "socket hang up"
    });
  });

  it("keeps validation details", () => {
    expect(toToolError(new ValidationError("bad", { missing: ["idCard"] }))).toEqual({
      isError: true,
      code: "INVALID_PARAMETER",
      message: "bad",
      details: { missing: ["idCard"] }
    });
  });

  it("maps anything else to UNKNOWN", () => {
    expect(toToolError("plain string")).toEqual({ isError: true, code: "UNKNOWN", message: "plain string" });
  });
});
