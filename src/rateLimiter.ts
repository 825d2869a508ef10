export interface Permit {
  readonly id: number;
}

export interface RateLimiterOptions {
  requestsPerSecond: number;
  // Tokens available at once; defaults to requestsPerSecond
  burst?: number;
  // Cap on permits held at the same time; unlimited when omitted
  maxConcurrent?: number;
}

export interface RateLimiterStats {
  inFlight: number;
  peakInFlight: number;
  queued: number;
  granted: number;
  tokens: number;
}

type Waiter = {
  grant: (permit: Permit) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("Rate limiter acquire aborted");
}

/**
 * Token bucket plus concurrency cap. A permit costs one token and occupies
 * one in-flight slot until released. Waiters are served strictly FIFO.
 */
export class RateLimiter {
  private readonly capacity: number;
  private tokens: number;
  private readonly maxConcurrent: number;
  private readonly queue: Waiter[];
  private readonly held = new Set<number>();
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null;
  private nextPermitId = 1;
  private peakInFlight = 0;
  private granted = 0;

  constructor(options: RateLimiterOptions) {
    const rps = Math.max(1, Math.floor(options.requestsPerSecond));
    this.capacity = Math.max(1, Math.floor(options.burst ?? rps));
    this.tokens = this.capacity;
    this.maxConcurrent = options.maxConcurrent != null
      ? Math.max(1, Math.floor(options.maxConcurrent))
      : Number.POSITIVE_INFINITY;
    this.queue = [];
    this.intervalMs = Math.max(1, Math.floor(1000 / rps)); // e.g., 500ms for 2 rps
    this.timer = setInterval(() => {
      // Refill one token per tick up to capacity
      if (this.tokens < this.capacity) {
        this.tokens += 1;
      }
      this.drain();
    }, this.intervalMs);
    // Do not keep the event loop alive just for the limiter
    this.timer.unref();
  }

  async acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    if (this.timer === null) {
      throw new Error("Rate limiter is stopped");
    }
    // Only take the fast path when nobody is waiting, so arrivals cannot overtake the queue
    if (this.queue.length === 0 && this.canGrant()) {
      return this.grant();
    }

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) this.queue.splice(index, 1);
          reject(abortReason(signal));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
    });
  }

  /**
   * Return a permit. Unknown or already-released permits are ignored.
   */
  release(permit: Permit): void {
    if (!this.held.delete(permit.id)) return;
    this.drain();
  }

  stats(): RateLimiterStats {
    return {
      inFlight: this.held.size,
      peakInFlight: this.peakInFlight,
      queued: this.queue.length,
      granted: this.granted,
      tokens: this.tokens
    };
  }

  /**
   * Stop refilling and fail anyone still waiting
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    const waiting = this.queue.splice(0, this.queue.length);
    for (const waiter of waiting) {
      this.detach(waiter);
      waiter.reject(new Error("Rate limiter is stopped"));
    }
  }

  private canGrant(): boolean {
    return this.tokens > 0 && this.held.size < this.maxConcurrent;
  }

  private grant(): Permit {
    this.tokens -= 1;
    const permit: Permit = { id: this.nextPermitId++ };
    this.held.add(permit.id);
    this.granted += 1;
    this.peakInFlight = Math.max(this.peakInFlight, this.held.size);
    return permit;
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }

  private drain(): void {
    while (this.queue.length > 0 && this.canGrant()) {
      const next = this.queue.shift();
      if (!next) break;
      this.detach(next);
      next.grant(this.grant());
    }
  }
}
