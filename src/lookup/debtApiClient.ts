/**
 * HTTP transport for the debt lookup service.
 *
 * One call = one HTTP exchange. Every response (or failure to get one) is
 * classified into an ApiReply; nothing here retries or throws for remote
 * conditions.
 *
 * Wire format:
 *   GET {baseUrl}?type=ip&number={identifier}&token={token}
 *   { "status": 200, "count": 1, "records": [{ "sum": "1500.50" }] }
 *   { "error": "602", "message": "..." }   access denied
 *   { "error": "498", "message": "..." }   balance exhausted
 */

import type { Logger } from "../logger.js";

export type ApiReply =
  | { kind: "found"; amount: number }
  | { kind: "not_found" }
  | { kind: "transient"; cause: string; status?: number }
  | { kind: "rate_limited"; cause: string; retryAfterMs?: number }
  | { kind: "invalid_identifier"; message: string; status?: number }
  | { kind: "rejected"; message: string; status?: number }
  | { kind: "malformed"; message: string }
  | { kind: "auth_rejected"; message: string; status?: number }
  | { kind: "insufficient_balance"; message: string }
  | { kind: "aborted" };

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface DebtApiClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}

const ACCESS_DENIED_CODE = "602";
const NO_BALANCE_CODE = "498";

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parse a money amount as the service writes it: number, "1500.50",
 * "1500,50" or "1 500,50".
 */
export function parseAmount(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string") return undefined;
  const normalized = value.replace(/\s/g, "").replace(",", ".");
  if (!/^-?\d+(\.\d+)?$/.test(normalized)) return undefined;
  return Number(normalized);
}

/**
 * Retry-After as delay in ms: delta-seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

// A number or an all-digit string; anything else is not a count
function parseCount(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function hasRemoteError(body: JsonRecord): boolean {
  const err = body.error;
  return err !== undefined && err !== null && err !== "" && err !== 0 && err !== "0";
}

/**
 * Classify a parsed 2xx response body
 */
export function classifyBody(body: unknown): ApiReply {
  if (!isRecord(body)) {
    return { kind: "malformed", message: "response is not a JSON object" };
  }

  if (hasRemoteError(body)) {
    const code = String(body.error);
    const message = typeof body.message === "string" ? body.message : "";
    if (code === ACCESS_DENIED_CODE) {
      return { kind: "auth_rejected", message: message || `remote error ${code}` };
    }
    if (code === NO_BALANCE_CODE) {
      return { kind: "insufficient_balance", message: message || `remote error ${code}` };
    }
    return { kind: "rejected", message: message ? `remote error ${code}: ${message}` : `remote error ${code}` };
  }

  if (Number(body.status) !== 200) {
    return { kind: "transient", cause: `remote status ${String(body.status)}` };
  }

  const count = parseCount(body.count);
  if (count === undefined) {
    return { kind: "malformed", message: `unexpected count: ${JSON.stringify(body.count) ?? "missing"}` };
  }
  if (count === 0) {
    return { kind: "not_found" };
  }

  const records = body.records;
  if (!Array.isArray(records) || records.length === 0) {
    return { kind: "malformed", message: `count is ${count} but records are missing` };
  }

  let total = 0;
  for (const record of records) {
    const amount = isRecord(record) ? parseAmount(record.sum) : undefined;
    if (amount === undefined) {
      return { kind: "malformed", message: "record without a readable sum" };
    }
    total += amount;
  }
  // Sums are in currency units with kopecks; keep two decimals
  return { kind: "found", amount: Math.round(total * 100) / 100 };
}

/**
 * Classify a non-2xx HTTP status
 */
export function classifyHttpStatus(status: number, retryAfter: string | null): ApiReply {
  if (status === 429) {
    return { kind: "rate_limited", cause: "HTTP 429", retryAfterMs: parseRetryAfter(retryAfter) };
  }
  if (status >= 500) {
    return { kind: "transient", cause: `HTTP ${status}`, status };
  }
  if (status === 401 || status === 403) {
    return { kind: "auth_rejected", message: `HTTP ${status}`, status };
  }
  if (status === 400 || status === 422) {
    return { kind: "invalid_identifier", message: `HTTP ${status}`, status };
  }
  return { kind: "rejected", message: `HTTP ${status}`, status };
}

export class DebtApiClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger?: Logger;

  constructor(options: DebtApiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger;
  }

  buildUrl(identifier: string): URL {
    const url = new URL(this.baseUrl);
    url.searchParams.set("type", "ip");
    url.searchParams.set("number", identifier);
    url.searchParams.set("token", this.token);
    return url;
  }

  /**
   * Request URL with the token masked, safe for logs
   */
  describe(identifier: string): string {
    const url = this.buildUrl(identifier);
    url.searchParams.set("token", "***");
    return url.toString();
  }

  /**
   * Perform one request. `signal` is the run's hard-stop signal; the
   * per-request timeout is applied here.
   */
  async query(identifier: string, signal?: AbortSignal): Promise<ApiReply> {
    if (signal?.aborted) return { kind: "aborted" };

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onOuterAbort = () => controller.abort();
    signal?.addEventListener("abort", onOuterAbort, { once: true });

    this.logger?.debug(`GET ${this.describe(identifier)}`);
    try {
      const res = await this.fetchFn(this.buildUrl(identifier).toString(), {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal
      });

      if (!res.ok) {
        const reply = classifyHttpStatus(res.status, res.headers.get("retry-after"));
        // Release the connection; the body of an error reply is not used
        await res.body?.cancel();
        return reply;
      }

      const text = await res.text();
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch {
        return { kind: "malformed", message: "response is not valid JSON" };
      }
      return classifyBody(body);
    } catch (err) {
      if (timedOut) {
        return { kind: "transient", cause: `timeout after ${this.timeoutMs}ms` };
      }
      if (signal?.aborted) {
        return { kind: "aborted" };
      }
      const message = err instanceof Error ? err.message : String(err);
      return { kind: "transient", cause: `network error: ${message}` };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onOuterAbort);
    }
  }
}
