import { CheckpointTracker } from "../checkpoint/tracker.js";
import type { SnapshotStatus } from "../checkpoint/types.js";
import { FatalRunError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { LookupResult } from "../lookup/lookupClient.js";
import { buildRunSummary } from "../summary.js";
import type { Identifier, LookupOutcome, RunResult, WorkItem } from "../types.js";
import { CancellationController } from "./cancellation.js";
import { RunState } from "./runState.js";

export interface Lookuper {
  lookup(identifier: Identifier, signal?: AbortSignal): Promise<LookupResult>;
}

export interface LookupSchedulerOptions {
  client: Lookuper;
  tracker: CheckpointTracker;
  cancellation?: CancellationController;
  workerCount: number;
  // Hard stop this long after a soft cancel; none when omitted
  graceMs?: number;
  // Rows left out of the run because their amount was already known
  skipped?: number;
  warnings?: string[];
  logger?: Logger;
  now?: () => number;
}

/**
 * Fixed pool of async workers draining one RunState in input order.
 */
export class LookupScheduler {
  private readonly options: LookupSchedulerOptions;
  private readonly cancellation: CancellationController;
  private readonly now: () => number;

  constructor(options: LookupSchedulerOptions) {
    if (!Number.isInteger(options.workerCount) || options.workerCount < 1) {
      throw new Error("workerCount must be an integer >= 1");
    }
    this.options = options;
    this.cancellation = options.cancellation ?? new CancellationController();
    this.now = options.now ?? Date.now;
  }

  async run(state: RunState): Promise<RunResult> {
    const { client, tracker, logger, graceMs } = this.options;
    const cancellation = this.cancellation;
    const startedAt = this.now();
    const fatalErrors: FatalRunError[] = [];
    const unexpectedErrors: unknown[] = [];

    const drainOnCancel = (reason: string) => {
      logger?.warn(`Stopping: ${reason}. Waiting for in-flight lookups to finish…`);
      cancellation.beginDrain(graceMs);
    };
    const unsubscribe = cancellation.onChange((next, reason) => {
      if (next === "cancel_requested") drainOnCancel(reason);
    });
    if (cancellation.getState() === "cancel_requested") {
      drainOnCancel(cancellation.getReason());
    }

    const handle = (item: WorkItem, result: LookupResult) => {
      switch (result.kind) {
        case "outcome":
          tracker.record(item, result.outcome);
          this.logOutcome(item.identifier, result.outcome);
          return;
        case "abandoned":
          state.abandon(item);
          return;
        case "fatal":
          state.abandon(item);
          fatalErrors.push(result.error);
          cancellation.stopNow(result.error.message);
          return;
      }
    };

    const worker = async () => {
      while (cancellation.isRunning()) {
        const item = state.next();
        if (!item) return;
        let result: LookupResult;
        try {
          result = await client.lookup(item.identifier, cancellation.signal);
        } catch (err) {
          state.abandon(item);
          unexpectedErrors.push(err);
          cancellation.stopNow(`unexpected error while checking ${item.identifier}`);
          return;
        }
        handle(item, result);
      }
    };

    const poolSize = Math.min(this.options.workerCount, state.pendingCount);
    logger?.debug(`Starting ${poolSize} worker(s) for ${state.pendingCount} item(s)`);
    await Promise.all(Array.from({ length: poolSize }, () => worker()));
    unsubscribe();

    const remaining = state.remaining();
    const partial = remaining.length > 0;
    const status: SnapshotStatus = fatalErrors.length > 0 || unexpectedErrors.length > 0
      ? "aborted"
      : partial ? "partial" : "complete";

    try {
      await tracker.flush(status);
    } catch (err) {
      if (fatalErrors.length === 0 && unexpectedErrors.length === 0) throw err;
      const message = err instanceof Error ? err.message : String(err);
      logger?.error(`Final checkpoint write failed: ${message}`);
    } finally {
      cancellation.markStopped();
    }

    const [fatal] = fatalErrors;
    if (fatal) throw fatal;
    if (unexpectedErrors.length > 0) throw unexpectedErrors[0];

    const progress = tracker.reportProgress();
    const results = state.resultSet();
    return {
      results,
      partial,
      remaining,
      summary: buildRunSummary({
        results,
        total: progress.total,
        completed: progress.completed,
        remaining: remaining.length,
        skipped: this.options.skipped,
        partial,
        startedAt,
        endedAt: this.now(),
        warnings: this.options.warnings
      })
    };
  }

  private logOutcome(identifier: Identifier, outcome: LookupOutcome): void {
    const { logger } = this.options;
    if (!logger) return;
    switch (outcome.status) {
      case "found":
        logger.stepFound(identifier, outcome.amount, outcome.attempts);
        break;
      case "not_found":
        logger.stepNotFound(identifier);
        break;
      case "failed":
        logger.stepFailed(identifier, outcome.reason, outcome.message);
        break;
    }
  }
}

export interface RunLookupsDeps {
  client: Lookuper;
  workerCount?: number;
  seed?: Iterable<[Identifier, LookupOutcome]>;
  cancellation?: CancellationController;
  graceMs?: number;
  logger?: Logger;
}

/**
 * Check a plain list of identifiers without persisting anything.
 * Positions follow list order.
 */
export async function runLookups(identifiers: readonly Identifier[], deps: RunLookupsDeps): Promise<RunResult> {
  const state = new RunState(
    identifiers.map((identifier, position) => ({ position, identifier })),
    deps.seed
  );
  const tracker = new CheckpointTracker({
    state,
    meta: { jobId: "in-memory" },
    everyCompletions: 1
  });
  const scheduler = new LookupScheduler({
    client: deps.client,
    tracker,
    cancellation: deps.cancellation,
    workerCount: deps.workerCount ?? 20,
    graceMs: deps.graceMs,
    logger: deps.logger
  });
  return scheduler.run(state);
}
