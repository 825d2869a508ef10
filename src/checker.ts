import path from "node:path";
import { CheckpointManager, calculateFileHash, findLastJob } from "./checkpoint/manager.js";
import { deserializeResultSet } from "./checkpoint/serialization.js";
import { CheckpointTracker } from "./checkpoint/tracker.js";
import type { ApiSettings, RunConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { collectFailures, type FailureRecord } from "./errorsOut.js";
import { readInputFile } from "./io/inputReader.js";
import { buildResultRows, writeResultsCsv } from "./io/resultsWriter.js";
import type { Logger } from "./logger.js";
import { DebtApiClient, type FetchFn } from "./lookup/debtApiClient.js";
import { LookupClient, type SleepFn } from "./lookup/lookupClient.js";
import { RateLimiter } from "./rateLimiter.js";
import type { CancellationController } from "./run/cancellation.js";
import { planWork } from "./run/plan.js";
import { RunState } from "./run/runState.js";
import { LookupScheduler } from "./run/scheduler.js";
import type { Identifier, LookupOutcome, ProgressCounts, RunResult } from "./types.js";

export type CheckDebtsOptions = {
  // May be omitted on resume; the checkpoint remembers it
  inputPath?: string;
  outputPath?: string;
  idColumn?: string;
  config: RunConfig;
  api: ApiSettings;
  // Checkpointing is off when neither jobId nor resume is given
  jobId?: string;
  // true: most recent job in checkpointDir
  resume?: string | true;
  checkpointDir?: string;
  logger: Logger;
  cancellation?: CancellationController;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  onStart?: (counts: ProgressCounts) => void;
  onProgress?: (counts: ProgressCounts) => void;
};

export type CheckDebtsResult = {
  run: RunResult;
  outputPath: string;
  failures: FailureRecord[];
  jobId: string | null;
  checkpointPath: string | null;
  checkpointWrites: { written: number; failed: number };
};

export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}_with_debt.csv`);
}

async function openCheckpoint(
  options: CheckDebtsOptions
): Promise<{ manager: CheckpointManager | null; seed: Map<Identifier, LookupOutcome> | undefined }> {
  const { logger } = options;

  if (options.resume) {
    const jobId = typeof options.resume === "string" ? options.resume : await findLastJob(options.checkpointDir);
    if (!jobId) {
      throw new ConfigError(["No checkpoint found to resume. Use --job-id to start a new job."]);
    }
    logger.log(`Resuming job: ${jobId}`);
    const manager = await CheckpointManager.resume(jobId, options.checkpointDir);
    const snapshot = manager.getLoadedSnapshot();
    const seed = snapshot ? deserializeResultSet(snapshot.results) : new Map<Identifier, LookupOutcome>();
    if (snapshot) {
      logger.log(
        `Checkpoint loaded: ${snapshot.progress.completed}/${snapshot.progress.total} checked, ${snapshot.remaining.length} remaining (status: ${snapshot.status})`
      );
    }
    return { manager, seed };
  }

  // A new job must not overwrite an earlier job's progress
  if (options.jobId && (await CheckpointManager.exists(options.jobId, options.checkpointDir))) {
    throw new ConfigError([`Job "${options.jobId}" already has a checkpoint. Use --resume ${options.jobId} to continue it.`]);
  }
  return { manager: null, seed: undefined };
}

/**
 * Read the input file, check every identifier that still needs it, and
 * write the merged results. Rejects with FatalRunError when the service
 * refuses the credential; the checkpoint then holds what was resolved.
 */
export async function checkDebtsFromCsv(options: CheckDebtsOptions): Promise<CheckDebtsResult> {
  const { config, logger } = options;
  const warnings: string[] = [];

  const opened = await openCheckpoint(options);
  let manager = opened.manager;

  const storedInput = manager?.getMeta().inputPath ?? undefined;
  const inputPath = options.inputPath ? path.resolve(options.inputPath) : storedInput;
  if (!inputPath) {
    throw new ConfigError(["--csv <path> is required."]);
  }

  const input = await readInputFile(inputPath, { idColumn: options.idColumn });
  warnings.push(...input.warnings);
  logger.log(`Loaded ${input.rows.length} number(s) from ${inputPath}`);

  const checkpointing = Boolean(options.jobId || options.resume);
  const inputHash = checkpointing ? await calculateFileHash(inputPath) : null;
  if (manager) {
    const change = manager.describeInputChange(inputHash);
    if (change) {
      warnings.push(change);
      logger.warn(`WARNING: ${change}. Resuming with a modified file may produce unexpected results.`);
    }
  } else if (options.jobId) {
    manager = await CheckpointManager.create({
      jobId: options.jobId,
      inputPath,
      inputHash,
      checkpointDir: options.checkpointDir
    });
    logger.log(`Checkpoint created: ${manager.getCheckpointDir()}`);
  }

  const plan = planWork(input.rows, config, opened.seed);
  if (plan.skipped > 0) {
    logger.log(`${plan.skipped} row(s) already have an amount; not checking them again`);
  }
  if (plan.carriedOver > 0) {
    logger.log(`${plan.carriedOver} row(s) resolved by the previous run`);
  }
  if (plan.duplicatesDropped > 0) {
    logger.log(`${plan.duplicatesDropped} duplicate row(s) share a lookup with an earlier row`);
  }

  const limiter = new RateLimiter({
    requestsPerSecond: config.requestsPerSecond,
    burst: config.burst,
    maxConcurrent: config.maxInFlight
  });
  const transport = new DebtApiClient({
    baseUrl: options.api.baseUrl,
    token: options.api.token,
    timeoutMs: config.timeoutMs,
    fetchFn: options.fetchFn,
    logger
  });
  const client = new LookupClient({
    transport,
    limiter,
    policy: {
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs
    },
    logger,
    sleep: options.sleep
  });

  const state = new RunState(plan.items, opened.seed);
  // Later snapshots carry the hash of the file this run actually read
  const meta = manager ? { ...manager.getMeta(), inputHash } : { jobId: "in-memory", inputPath, inputHash };
  const tracker = new CheckpointTracker({
    state,
    meta,
    store: manager,
    everyCompletions: config.checkpointInterval,
    everyMs: config.checkpointIntervalMs,
    logger,
    onProgress: options.onProgress
  });
  const scheduler = new LookupScheduler({
    client,
    tracker,
    cancellation: options.cancellation,
    workerCount: config.workerCount,
    graceMs: config.graceMs,
    skipped: plan.skipped,
    warnings,
    logger
  });

  options.onStart?.(tracker.reportProgress());

  let run: RunResult;
  try {
    run = await scheduler.run(state);
  } finally {
    limiter.stop();
    logger.debug(`Rate limiter: ${JSON.stringify(limiter.stats())}`);
    const writes = tracker.stats();
    if (writes.failed > 0) {
      logger.warn(`${writes.failed} checkpoint write(s) failed; ${writes.written} succeeded`);
    } else if (manager) {
      logger.debug(`Checkpoint writes: ${writes.written}`);
    }
  }

  const outputPath = options.outputPath ? path.resolve(options.outputPath) : defaultOutputPath(inputPath);
  await writeResultsCsv(outputPath, buildResultRows(input.rows, run.results, config.existingAmounts));

  return {
    run,
    outputPath,
    failures: collectFailures(run.results),
    jobId: manager?.getJobId() ?? null,
    checkpointPath: manager?.getCheckpointPath() ?? null,
    checkpointWrites: tracker.stats()
  };
}
