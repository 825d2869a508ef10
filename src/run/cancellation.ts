/**
 * Orderly shutdown for a run.
 *
 *   running → cancel_requested → draining → stopped
 *
 * A soft cancel stops new work and lets in-flight lookups finish. A hard
 * stop (second request, grace deadline, fatal error) also aborts `signal`,
 * which in-flight lookups observe at their next suspension point.
 */

export type CancellationState = "running" | "cancel_requested" | "draining" | "stopped";

export type CancellationListener = (state: CancellationState, reason: string) => void;

/** Anything signals can be subscribed on; `process` in production */
export interface SignalTarget {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

const ORDER: Record<CancellationState, number> = {
  running: 0,
  cancel_requested: 1,
  draining: 2,
  stopped: 3
};

export class CancellationController {
  private state: CancellationState = "running";
  private readonly hardStop = new AbortController();
  private readonly listeners = new Set<CancellationListener>();
  private graceTimer: NodeJS.Timeout | null = null;
  private reason = "";

  /** Aborted on hard stop */
  get signal(): AbortSignal {
    return this.hardStop.signal;
  }

  getState(): CancellationState {
    return this.state;
  }

  getReason(): string {
    return this.reason;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  isHardStopped(): boolean {
    return this.hardStop.signal.aborted;
  }

  /**
   * First call requests a soft cancel. Any later call while cancelling
   * escalates to a hard stop.
   */
  requestCancel(reason = "cancel requested"): void {
    if (this.state === "running") {
      this.transition("cancel_requested", reason);
      return;
    }
    if (this.state === "stopped") return;
    this.stopNow(`${reason} while already cancelling`);
  }

  /**
   * Stop taking new work. When `graceMs` is given, a hard stop follows if
   * the run has not stopped by then.
   */
  beginDrain(graceMs?: number): void {
    if (this.state !== "cancel_requested") return;
    this.transition("draining", this.reason);
    if (graceMs != null && !this.hardStop.signal.aborted) {
      this.graceTimer = setTimeout(() => {
        this.graceTimer = null;
        this.stopNow(`grace period of ${graceMs}ms elapsed`);
      }, graceMs);
      this.graceTimer.unref();
    }
  }

  /**
   * Hard stop from any active state
   */
  stopNow(reason: string): void {
    if (this.state === "stopped") return;
    if (this.state === "running") this.transition("cancel_requested", reason);
    if (this.state === "cancel_requested") this.transition("draining", reason);
    if (!this.hardStop.signal.aborted) {
      this.hardStop.abort(new Error(reason));
    }
  }

  markStopped(): void {
    this.clearGraceTimer();
    if (this.state === "stopped") return;
    this.transition("stopped", this.reason || "stopped");
  }

  onChange(listener: CancellationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Route OS signals to requestCancel. Returns a detach function.
   */
  attachProcessSignals(
    signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
    target: SignalTarget = process
  ): () => void {
    const handlers = signals.map(sig => {
      const handler = () => this.requestCancel(`received ${sig}`);
      target.on(sig, handler);
      return { sig, handler };
    });
    return () => {
      for (const { sig, handler } of handlers) {
        target.off(sig, handler);
      }
    };
  }

  private transition(next: CancellationState, reason: string): void {
    if (ORDER[next] <= ORDER[this.state]) return;
    this.state = next;
    if (next === "cancel_requested") {
      this.reason = reason;
    }
    for (const listener of [...this.listeners]) {
      listener(next, reason);
    }
  }

  private clearGraceTimer(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
  }
}
