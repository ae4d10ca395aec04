// Minimal JSON-over-HTTP helper (global fetch).
//
// - Non-2xx responses throw HttpJsonError carrying status and parsed body.
// - Bodies that are not JSON come back as { _non_json: text }.
// - Every call carries a timeout; fetch is injectable for tests.

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpJsonOptions = {
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
};

export class HttpJsonError extends Error {
  public readonly status: number;
  public readonly body: unknown;

  constructor(status: number, statusText: string, body: unknown, text: string) {
    super(`http ${status} ${statusText}: ${text.slice(0, 500)}`);
    this.name = "HttpJsonError";
    this.status = status;
    this.body = body;
  }
}

const DEFAULT_TIMEOUT_MS = 10_000;

async function httpJson(url: string, init: RequestInit, opts: HttpJsonOptions): Promise<unknown> {
  const headers: Record<string, string> = { Accept: "application/json" };
  if (init.body) headers["Content-Type"] = "application/json";
  const doFetch = opts.fetchImpl ?? fetch;

  const res = await doFetch(url, {
    ...init,
    headers: { ...headers, ...opts.headers },
    signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  });
  const text = await res.text();
  let obj: unknown;
  try {
    obj = text ? JSON.parse(text) : {};
  } catch {
    obj = { _non_json: text };
  }
  if (!res.ok) throw new HttpJsonError(res.status, res.statusText, obj, text);
  return obj;
}

export function postJson(url: string, body: unknown, opts: HttpJsonOptions = {}): Promise<unknown> {
  return httpJson(url, { method: "POST", body: JSON.stringify(body) }, opts);
}

export function getJson(url: string, opts: HttpJsonOptions = {}): Promise<unknown> {
  return httpJson(url, { method: "GET" }, opts);
}

export function basicAuthHeader(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString("base64")}`;
}

/** Short description for logs: status for HttpJsonError, message otherwise. */
export function describeHttpError(err: unknown): string {
  if (err instanceof HttpJsonError) return `HTTP ${err.status}`;
  if (err instanceof Error) return err.name === "TimeoutError" ? "timeout" : err.message;
  return String(err);
}
