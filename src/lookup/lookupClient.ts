import { FatalRunError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Permit } from "../rateLimiter.js";
import type { Identifier, LookupOutcome } from "../types.js";
import type { ApiReply } from "./debtApiClient.js";

export type LookupResult =
  | { kind: "outcome"; outcome: LookupOutcome }
  // Hard stop arrived before a terminal outcome; the identifier stays pending
  | { kind: "abandoned"; attempts: number }
  | { kind: "fatal"; error: FatalRunError };

export interface LookupTransport {
  query(identifier: Identifier, signal?: AbortSignal): Promise<ApiReply>;
}

export interface PermitSource {
  acquire(signal?: AbortSignal): Promise<Permit>;
  release(permit: Permit): void;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio?: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export interface LookupClientOptions {
  transport: LookupTransport;
  limiter: PermitSource;
  policy: RetryPolicy;
  logger?: Logger;
  sleep?: SleepFn;
  randomFn?: () => number;
}

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Delay before the next attempt after `attempt` failed (1-based).
 * Exponential from baseDelayMs, or the server's Retry-After when given,
 * plus up to jitterRatio of jitter, never above maxDelayMs.
 */
export function computeBackoff(
  attempt: number,
  policy: RetryPolicy,
  randomFn: () => number = Math.random,
  retryAfterMs?: number
): number {
  const { baseDelayMs, maxDelayMs, jitterRatio = 0.2 } = policy;
  const backoff = retryAfterMs != null
    ? Math.min(maxDelayMs, retryAfterMs)
    : Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
  // small jitter to avoid thundering herd
  const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
  return Math.min(maxDelayMs, backoff + jitter);
}

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export function isWellFormedIdentifier(identifier: Identifier): boolean {
  const trimmed = identifier.trim();
  return trimmed.length > 0 && trimmed.length <= 128 && !CONTROL_CHARS.test(trimmed);
}

const outcome = (value: LookupOutcome): LookupResult => ({ kind: "outcome", outcome: value });

/**
 * Resolves one identifier to a LookupOutcome: rate-limited attempts with
 * bounded exponential backoff. Per-identifier problems come back as
 * `failed` outcomes; only credential problems come back as `fatal`.
 */
export class LookupClient {
  private readonly transport: LookupTransport;
  private readonly limiter: PermitSource;
  private readonly policy: RetryPolicy;
  private readonly logger?: Logger;
  private readonly sleep: SleepFn;
  private readonly randomFn: () => number;

  constructor(options: LookupClientOptions) {
    if (!Number.isInteger(options.policy.maxAttempts) || options.policy.maxAttempts < 1) {
      throw new Error("maxAttempts must be an integer >= 1");
    }
    this.transport = options.transport;
    this.limiter = options.limiter;
    this.policy = options.policy;
    this.logger = options.logger;
    this.sleep = options.sleep ?? sleep;
    this.randomFn = options.randomFn ?? Math.random;
  }

  async lookup(identifier: Identifier, signal?: AbortSignal): Promise<LookupResult> {
    if (!isWellFormedIdentifier(identifier)) {
      return outcome({
        status: "failed",
        reason: "invalid_identifier",
        attempts: 0,
        message: "identifier is blank or contains control characters"
      });
    }

    const { maxAttempts } = this.policy;
    let attempts = 0;

    while (attempts < maxAttempts) {
      if (signal?.aborted) return { kind: "abandoned", attempts };

      const permit = await this.acquirePermit(signal);
      if (!permit) return { kind: "abandoned", attempts };

      attempts += 1;
      let reply: ApiReply;
      try {
        reply = await this.transport.query(identifier, signal);
      } finally {
        // The permit covers one request only, never the backoff sleep
        this.limiter.release(permit);
      }

      switch (reply.kind) {
        case "found":
          return outcome({ status: "found", amount: reply.amount, attempts });
        case "not_found":
          return outcome({ status: "not_found", attempts });
        case "invalid_identifier":
          return outcome({ status: "failed", reason: "invalid_identifier", attempts, message: reply.message });
        case "rejected":
          return outcome({ status: "failed", reason: "rejected", attempts, message: reply.message });
        case "malformed":
          return outcome({ status: "failed", reason: "malformed_response", attempts, message: reply.message });
        case "auth_rejected":
          return { kind: "fatal", error: new FatalRunError("auth_rejected", reply.message, identifier) };
        case "insufficient_balance":
          return { kind: "fatal", error: new FatalRunError("insufficient_balance", reply.message, identifier) };
        case "aborted":
          return { kind: "abandoned", attempts };
        case "transient":
        case "rate_limited": {
          if (attempts >= maxAttempts) {
            this.logger?.debug(`${identifier}: giving up after ${attempts} attempt(s): ${reply.cause}`);
            return outcome({
              status: "failed",
              reason: "exhausted",
              attempts,
              message: `gave up after ${attempts} attempt(s): ${reply.cause}`
            });
          }
          const retryAfterMs = reply.kind === "rate_limited" ? reply.retryAfterMs : undefined;
          const delayMs = computeBackoff(attempts, this.policy, this.randomFn, retryAfterMs);
          this.logger?.retry(identifier, attempts, maxAttempts, delayMs, reply.cause);
          const slept = await this.sleep(delayMs, signal);
          if (!slept) return { kind: "abandoned", attempts };
          break;
        }
        default: {
          const unhandled: never = reply;
          throw new Error(`Unhandled reply: ${JSON.stringify(unhandled)}`);
        }
      }
    }

    // Only reachable if the loop never ran
    return outcome({ status: "failed", reason: "exhausted", attempts, message: "no attempts made" });
  }

  private async acquirePermit(signal?: AbortSignal): Promise<Permit | null> {
    try {
      return await this.limiter.acquire(signal);
    } catch (err) {
      if (signal?.aborted) return null;
      throw err;
    }
  }
}
