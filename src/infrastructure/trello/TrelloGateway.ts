import { HttpClient, type HttpMethod, type HttpRequest, type HttpResponse } from "../http/HttpClient.js";
import {
  resolveTrelloCredentials,
  type CredentialProvider,
  type TrelloCredentials
} from "../credentials/CredentialProvider.js";
import { TransportError, UpstreamError } from "../../shared/errors.js";
import { createLogger } from "../../shared/logging.js";
import { normaliseBaseUrl } from "../../shared/config/schema.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type FileUpload = {
  filename: string;
  content: Uint8Array;
  contentType?: string;
};

export type QueryMap = Record<string, string>;

export type BodyValue = JsonValue | FileUpload;

export type BodyMap = Record<string, BodyValue>;

export type RequestDescriptor = {
  method: HttpMethod;
  path: string;
  query: QueryMap;
  body: BodyMap;
};

export type RawEnvelope = { raw: string };

/** Decoded JSON, `{}` for an empty body, or the raw text when the body is not JSON. */
export type ResponseEnvelope = JsonValue | RawEnvelope;

export type TrelloGatewayConfig = {
  baseUrl: string;
  timeoutMs: number;
};

const logger = createLogger("infra.trello.gateway");

export function isFileUpload(value: unknown): value is FileUpload {
  if (!value || typeof value !== "object") {
    return false;
  }
  return "filename" in value && typeof value.filename === "string" && "content" in value && value.content instanceof Uint8Array;
}

const CREDENTIAL_PARAMS = new Set(["key", "token"]);

/** Splits an embedded query string off `path`; entries in `query` win over embedded ones. */
export function splitPath(path: string, query: QueryMap): { path: string; query: QueryMap } {
  const marker = path.indexOf("?");
  if (marker === -1) {
    return { path, query: { ...query } };
  }
  const embedded: QueryMap = {};
  for (const [name, value] of new URLSearchParams(path.slice(marker + 1))) {
    embedded[name] = value;
  }
  return { path: path.slice(0, marker), query: { ...embedded, ...query } };
}

function withoutCredentials(query: QueryMap): QueryMap {
  const result: QueryMap = {};
  for (const [name, value] of Object.entries(query)) {
    if (!CREDENTIAL_PARAMS.has(name)) {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Merges credentials into the query for GET and into the body otherwise.
 * Credential keys overwrite caller-supplied values of the same name, including
 * ones embedded in the path's own query string.
 */
export function buildRequestDescriptor(
  method: HttpMethod,
  path: string,
  query: QueryMap,
  body: BodyMap,
  credentials: TrelloCredentials
): RequestDescriptor {
  const auth = { key: credentials.key, token: credentials.token };
  const target = splitPath(path, query);
  if (method === "GET") {
    return { method, path: target.path, query: { ...target.query, ...auth }, body: { ...body } };
  }
  return { method, path: target.path, query: withoutCredentials(target.query), body: { ...body, ...auth } };
}

export function withAcceptHeader(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === "accept") {
      continue;
    }
    result[name] = value;
  }
  result.Accept = "application/json";
  return result;
}

export function decodeEnvelope(text: string): ResponseEnvelope {
  if (text.length === 0) {
    return {};
  }
  try {
    const decoded: JsonValue = JSON.parse(text);
    return decoded;
  } catch {
    return { raw: text };
  }
}

function toFormData(body: BodyMap): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(body)) {
    if (isFileUpload(value)) {
      const blob = new Blob([value.content], { type: value.contentType ?? "application/octet-stream" });
      form.append(name, blob, value.filename);
    } else if (value === null) {
      continue;
    } else if (typeof value === "object") {
      form.append(name, JSON.stringify(value));
    } else {
      form.append(name, String(value));
    }
  }
  return form;
}

function encodeBody(descriptor: RequestDescriptor): Pick<HttpRequest, "json" | "form"> {
  if (descriptor.method === "GET") {
    return {};
  }
  const values = Object.values(descriptor.body);
  if (values.some(isFileUpload)) {
    return { form: toFormData(descriptor.body) };
  }
  return { json: descriptor.body };
}

function transportReason(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status <= 299;
}

export class TrelloGateway {
  private readonly baseUrl: string;

  constructor(
    private readonly client: HttpClient,
    private readonly credentials: CredentialProvider,
    private readonly cfg: TrelloGatewayConfig
  ) {
    this.baseUrl = normaliseBaseUrl(cfg.baseUrl);
    logger.info("trello_gateway_init", { baseUrl: this.baseUrl });
  }

  private buildUrl(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  /**
   * Sends one authenticated request. Throws ConfigurationError before any
   * network activity when credentials are missing, UpstreamError on a non-2xx
   * status and TransportError when no response was received.
   */
  async execute(
    method: HttpMethod,
    path: string,
    query: QueryMap = {},
    body: BodyMap = {},
    headers: Record<string, string> = {}
  ): Promise<ResponseEnvelope> {
    const descriptor = buildRequestDescriptor(method, path, query, body, resolveTrelloCredentials(this.credentials));
    const request: HttpRequest = {
      method,
      url: this.buildUrl(descriptor.path),
      headers: withAcceptHeader(headers),
      params: descriptor.query,
      timeoutMs: this.cfg.timeoutMs,
      ...encodeBody(descriptor)
    };
    let response: HttpResponse;
    try {
      response = await this.client.request(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const reason = transportReason(error);
      logger.error("trello_transport_error", { method, path, message, reason });
      throw new TransportError(message, reason);
    }
    if (!isSuccess(response.status)) {
      logger.warn("trello_upstream_error", { method, path, status: response.status });
      throw new UpstreamError(response.status, response.text);
    }
    logger.debug("trello_request_completed", { method, path, status: response.status });
    return decodeEnvelope(response.text);
  }
}
