import { describe, expect, it } from "vitest";
import "./setup.js";
import {
  EnvCredentialProvider,
  StaticCredentialProvider
} from "../src/infrastructure/credentials/CredentialProvider.js";
import { decodeEnvelope, splitPath, withAcceptHeader } from "../src/infrastructure/trello/TrelloGateway.js";
import { ConfigurationError, TransportError, UpstreamError } from "../src/shared/errors.js";
import { makeGateway, recordingTransport, reply } from "./helpers/trello.js";

describe("TrelloGateway.execute", () => {
  it("puts credentials in the query for GET and sends no body", async () => {
    const { calls, transport } = recordingTransport([reply(200, '{"id":"b1"}')]);
    const gateway = makeGateway(transport);
    const data = await gateway.execute("GET", "/boards/b1", { fields: "name" });
    expect(data).toEqual({ id: "b1" });
    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe("GET");
    expect(calls[0].url).toBe("https://api.trello.com/1/boards/b1?fields=name&key=test-key&token=test-token");
    expect(calls[0].json).toBeUndefined();
    expect(calls[0].form).toBeUndefined();
  });

  it("puts credentials in the body for non-GET methods and keeps them out of the query", async () => {
    const { calls, transport } = recordingTransport([reply(200, '{"id":"c1"}')]);
    const gateway = makeGateway(transport);
    await gateway.execute("POST", "/cards", { source: "tool" }, { idList: "l1", name: "Card" });
    expect(calls[0].url).toBe("https://api.trello.com/1/cards?source=tool");
    expect(calls[0].json).toEqual({ idList: "l1", name: "Card", key: "test-key", token: "test-token" });
  });

  it.each(["PUT", "DELETE"] as const)("sends credentials in the %s body", async method => {
    const { calls, transport } = recordingTransport([reply(200, "{}")]);
    const gateway = makeGateway(transport);
    await gateway.execute(method, "/cards/c1");
    expect(calls[0].url).toBe("https://api.trello.com/1/cards/c1");
    expect(calls[0].json).toEqual({ key: "test-key", token: "test-token" });
  });

  it("lets credentials overwrite caller values with the same name", async () => {
    const { calls, transport } = recordingTransport([reply(200, "{}")]);
    const gateway = makeGateway(transport);
    await gateway.execute("GET", "/members/me", { key: "caller-key", token: "caller-token" });
    await gateway.execute("POST", "/cards", {}, { key: "caller-key" });
    expect(calls[0].url).toBe("https://api.trello.com/1/members/me?key=test-key&token=test-token");
    expect(calls[1].json).toEqual({ key: "test-key", token: "test-token" });
  });

  it("appends credentials to a path that already carries a query string", async () => {
    const { calls, transport } = recordingTransport([reply(200, "[]")]);
    const gateway = makeGateway(transport);
    await gateway.execute("GET", "/boards/b1/cards?limit=5");
    expect(calls[0].url).toBe("https://api.trello.com/1/boards/b1/cards?limit=5&key=test-key&token=test-token");
  });

  it("lets credentials overwrite key and token embedded in the path", async () => {
    const { calls, transport } = recordingTransport([reply(200, "{}")]);
    const gateway = makeGateway(transport);
    await gateway.execute("GET", "/members/me?key=caller-key&fields=id&token=caller-token");
    const sent = new URL(calls[0].url);
    expect(sent.searchParams.getAll("key")).toEqual(["test-key"]);
    expect(sent.searchParams.getAll("token")).toEqual(["test-token"]);
    expect(calls[0].url).toBe("https://api.trello.com/1/members/me?key=test-key&fields=id&token=test-token");
  });

  it("prefers explicit query values over ones embedded in the path", async () => {
    const { calls, transport } = recordingTransport([reply(200, "[]")]);
    const gateway = makeGateway(transport);
    await gateway.execute("GET", "/boards/b1/cards?limit=5", { limit: "10" });
    expect(calls[0].url).toBe("https://api.trello.com/1/boards/b1/cards?limit=10&key=test-key&token=test-token");
  });

  it("drops embedded credentials from the query of a non-GET request", async () => {
    const { calls, transport } = recordingTransport([reply(200, "{}")]);
    const gateway = makeGateway(transport);
    await gateway.execute("POST", "/cards?key=caller-key&pos=top", {}, { idList: "l1" });
    expect(calls[0].url).toBe("https://api.trello.com/1/cards?pos=top");
    expect(calls[0].json).toEqual({ idList: "l1", key: "test-key", token: "test-token" });
  });

  it("forces the Accept header and passes other headers through", async () => {
    const { calls, transport } = recordingTransport([reply(200, "{}")]);
    const gateway = makeGateway(transport);
    await gateway.execute("GET", "/boards/b1", {}, {}, { accept: "text/html", "X-Trace": "abc" });
    expect(calls[0].headers).toEqual({ "X-Trace": "abc", Accept: "application/json" });
  });

  it("raises ConfigurationError before any network call when a credential is missing", async () => {
    const { calls, transport } = recordingTransport([reply(200, "{}")]);
    const gateway = makeGateway(transport, new StaticCredentialProvider({ TRELLO_API_KEY: "test-key" }));
    const failure = await gateway.execute("GET", "/boards/b1").catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(ConfigurationError);
    expect(failure).toHaveProperty("message", "Missing required environment variable: TRELLO_API_TOKEN");
    expect(calls).toHaveLength(0);
  });

  it("re-reads credentials on every call", async () => {
    const env: Record<string, string | undefined> = { TRELLO_API_KEY: "test-key", TRELLO_API_TOKEN: "first-token" };
    const { calls, transport } = recordingTransport([reply(200, "{}")]);
    const gateway = makeGateway(transport, new EnvCredentialProvider(env));
    await gateway.execute("GET", "/members/me");
    env.TRELLO_API_TOKEN = "second-token";
    await gateway.execute("GET", "/members/me");
    expect(calls[0].url).toBe("https://api.trello.com/1/members/me?key=test-key&token=first-token");
    expect(calls[1].url).toBe("https://api.trello.com/1/members/me?key=test-key&token=second-token");
  });

  it("decodes an empty successful body to an empty object", async () => {
    const { transport } = recordingTransport([reply(200, "")]);
    const gateway = makeGateway(transport);
    await expect(gateway.execute("PUT", "/cards/c1/closed", {}, { value: "true" })).resolves.toEqual({});
  });

  it("wraps a non-JSON successful body as raw text", async () => {
    const { transport } = recordingTransport([reply(200, "<html>ok</html>")]);
    const gateway = makeGateway(transport);
    await expect(gateway.execute("GET", "/boards/b1")).resolves.toEqual({ raw: "<html>ok</html>" });
  });

  it("raises UpstreamError with the status and raw body on non-2xx", async () => {
    const { calls, transport } = recordingTransport([reply(404, "not found")]);
    const gateway = makeGateway(transport);
    const failure = await gateway.execute("GET", "/boards/missing").catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(UpstreamError);
    if (!(failure instanceof UpstreamError)) {
      throw new Error("Expected UpstreamError");
    }
    expect(failure.status).toBe(404);
    expect(failure.body).toBe("not found");
    expect(failure.message).toBe("Trello API error 404: not found");
    expect(calls).toHaveLength(1);
  });

  it("raises TransportError when no response arrives", async () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:443"), { code: "ECONNREFUSED" });
    const { calls, transport } = recordingTransport([refused]);
    const gateway = makeGateway(transport);
    const failure = await gateway.execute("GET", "/boards/b1").catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(TransportError);
    if (!(failure instanceof TransportError)) {
      throw new Error("Expected TransportError");
    }
    expect(failure.message).toBe("connect ECONNREFUSED 127.0.0.1:443");
    expect(failure.reason).toBe("ECONNREFUSED");
    expect(calls).toHaveLength(1);
  });

  it("returns identical envelopes for identical calls", async () => {
    const { transport } = recordingTransport([reply(200, '{"id":"b1","lists":[{"id":"l1"}]}')]);
    const gateway = makeGateway(transport);
    const first = await gateway.execute("GET", "/boards/b1", { lists: "open" });
    const second = await gateway.execute("GET", "/boards/b1", { lists: "open" });
    expect(second).toEqual(first);
  });

  it("round-trips a structured body through a JSON echo", async () => {
    const { transport } = recordingTransport([request => reply(200, JSON.stringify(request.json))]);
    const gateway = makeGateway(transport);
    const body = { name: "Release", idLabels: ["l1", "l2"], prefs: { permissionLevel: "private", voting: null } };
    const echoed = await gateway.execute("POST", "/boards", {}, body);
    expect(echoed).toEqual({ ...body, key: "test-key", token: "test-token" });
  });

  it("switches to multipart when the body carries a file", async () => {
    const { calls, transport } = recordingTransport([reply(200, '{"id":"a1"}')]);
    const gateway = makeGateway(transport);
    const content = new TextEncoder().encode("hello");
    await gateway.execute("POST", "/cards/c1/attachments", {}, {
      name: "notes.txt",
      setCover: false,
      file: { filename: "notes.txt", content, contentType: "text/plain" }
    });
    expect(calls[0].json).toBeUndefined();
    const form = calls[0].form;
    expect(form).toBeInstanceOf(FormData);
    if (!form) {
      throw new Error("Expected multipart body");
    }
    expect(form.get("name")).toBe("notes.txt");
    expect(form.get("setCover")).toBe("false");
    expect(form.get("key")).toBe("test-key");
    expect(form.get("token")).toBe("test-token");
    expect(form.get("file")).toBeInstanceOf(Blob);
  });
});

describe("response helpers", () => {
  it("decodes JSON scalars and arrays", () => {
    expect(decodeEnvelope("42")).toBe(42);
    expect(decodeEnvelope("[1,2]")).toEqual([1, 2]);
    expect(decodeEnvelope('"text"')).toBe("text");
  });

  it("splits and decodes an embedded query string", () => {
    expect(splitPath("/search?query=due%20soon&modelTypes=cards", {})).toEqual({
      path: "/search",
      query: { query: "due soon", modelTypes: "cards" }
    });
    expect(splitPath("/boards/b1", { fields: "name" })).toEqual({ path: "/boards/b1", query: { fields: "name" } });
  });

  it("replaces every casing of Accept", () => {
    expect(withAcceptHeader({ ACCEPT: "*/*", Accept: "text/plain" })).toEqual({ Accept: "application/json" });
  });
});
