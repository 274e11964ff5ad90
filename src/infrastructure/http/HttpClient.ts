import axios from "axios";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | ReadonlyArray<string | number>;

export type QueryParams = Record<string, QueryValue | null | undefined>;

export type HttpRequest = {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  params?: QueryParams;
  json?: unknown;
  form?: FormData;
  timeoutMs?: number;
};

/** `text` is the undecoded response body; decoding belongs to the caller. */
export type HttpResponse = {
  status: number;
  headers: Record<string, string>;
  text: string;
};

export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

const defaultTransport: HttpTransport = async request => {
  const response = await axios.request<string>({
    method: request.method,
    url: request.url,
    headers: request.headers,
    data: request.form ?? request.json,
    timeout: request.timeoutMs,
    responseType: "text",
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true
  });
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(response.headers ?? {})) {
    if (typeof value === "undefined" || value === null) {
      continue;
    }
    const lowerKey = key.toLowerCase();
    if (Array.isArray(value)) {
      headers[lowerKey] = value.join(", ");
    } else {
      headers[lowerKey] = String(value);
    }
  }
  const text = typeof response.data === "string" ? response.data : "";
  return { status: response.status, headers, text };
};

// Keys keep insertion order.
export function buildQuery(params?: QueryParams): string {
  if (!params) {
    return "";
  }
  const parts: string[] = [];
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === "undefined" || value === null) {
      continue;
    }
    const name = encodeURIComponent(key);
    if (Array.isArray(value)) {
      const joined = value.map(item => encodeURIComponent(String(item))).join(",");
      parts.push(`${name}=${joined}`);
    } else {
      parts.push(`${name}=${encodeURIComponent(String(value))}`);
    }
  }
  if (parts.length === 0) {
    return "";
  }
  return `?${parts.join("&")}`;
}

/** `url` is absolute; `params` are appended as its query string. */
export class HttpClient {
  private readonly timeoutMs: number | undefined;
  private readonly transport: HttpTransport;

  constructor(opts: { timeoutMs?: number; transport?: HttpTransport } = {}) {
    this.timeoutMs = opts.timeoutMs;
    this.transport = opts.transport ?? defaultTransport;
  }

  /** Sends exactly one request. Non-2xx responses are returned, not thrown. */
  async request(req: HttpRequest): Promise<HttpResponse> {
    return this.transport({
      method: req.method,
      url: `${req.url}${buildQuery(req.params)}`,
      headers: { ...(req.headers ?? {}) },
      json: req.json,
      form: req.form,
      timeoutMs: req.timeoutMs ?? this.timeoutMs
    });
  }
}
