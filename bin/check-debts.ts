#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import path from "node:path";
import { checkDebtsFromCsv } from "../src/checker.js";
import { DEFAULT_CHECKPOINT_DIR } from "../src/checkpoint/manager.js";
import { loadApiSettings, resolveRunConfig, type RunConfigInput } from "../src/config.js";
import { ConfigError, FatalRunError, errorMessage } from "../src/errors.js";
import { writeErrorsOut } from "../src/errorsOut.js";
import { createLogger } from "../src/logger.js";
import { CancellationController } from "../src/run/cancellation.js";
import { renderSummaryBox } from "../src/summary.js";
import type { DuplicatePolicy, ExistingAmountPolicy } from "../src/types.js";
import { ProgressUI } from "../src/ui/progressUI.js";

const EXIT_OK = 0;
const EXIT_FATAL = 1;
const EXIT_USAGE = 2;
const EXIT_INTERRUPTED = 130;

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseDuplicates(value: string): DuplicatePolicy {
  if (value === "process" || value === "once") return value;
  throw new InvalidArgumentError('Expected "process" or "once".');
}

function parseExisting(value: string): ExistingAmountPolicy {
  if (value === "skip" || value === "reverify") return value;
  throw new InvalidArgumentError('Expected "skip" or "reverify".');
}

const program = new Command();

program
  .name("check-debts")
  .description("Check enforcement-procedure numbers for outstanding debt")
  .option("--csv <path>", "CSV file with the numbers to check (optional with --resume)")
  .option("--out <path>", "Results CSV (default: <input>_with_debt.csv)")
  .option("--errors-out <path>", "Write failed lookups to a CSV or JSON file")
  .option("--id-column <name>", "Column holding the numbers (default: number, else the first column)")
  .option("--concurrency <n>", "Parallel workers (default: 20)", parseInteger)
  .option("--timeout <ms>", "Per-request timeout in ms (default: 60000)", parseInteger)
  .option("--max-attempts <n>", "Attempts per number before giving up (default: 3)", parseInteger)
  .option("--rps <n>", "Requests per second (default: 2)", parseInteger)
  .option("--burst <n>", "Requests allowed at once after an idle period (default: rps)", parseInteger)
  .option("--max-in-flight <n>", "Cap on concurrent requests (default: concurrency)", parseInteger)
  .option("--grace <ms>", "After an interrupt, hard stop after this long (default: 30000)", parseInteger)
  .option("--duplicates <policy>", "process | once (default: process)", parseDuplicates)
  .option("--existing <policy>", "Rows that already have an amount: skip | reverify (default: skip)", parseExisting)
  .option("--job-id <id>", "Job identifier; enables checkpoints")
  .option("--resume [job-id]", "Resume from checkpoint (auto-detects last job if no ID provided)")
  .option("--checkpoint-dir <path>", `Checkpoint storage directory (default: ${DEFAULT_CHECKPOINT_DIR})`)
  .option("--checkpoint-interval <n>", "Save a checkpoint every N completions (default: 10)", parseInteger)
  .option("--log-file <path>", "Also append every log line to this file")
  .option("--quiet", "Suppress per-number output", false)
  // Bad flags are usage errors, like a bad config value
  .exitOverride(err => process.exit(err.exitCode === 0 ? EXIT_OK : EXIT_USAGE))
  .parse(process.argv);

async function main(): Promise<number> {
  const opts = program.opts<{
    csv?: string;
    out?: string;
    errorsOut?: string;
    idColumn?: string;
    concurrency?: number;
    timeout?: number;
    maxAttempts?: number;
    rps?: number;
    burst?: number;
    maxInFlight?: number;
    grace?: number;
    duplicates?: DuplicatePolicy;
    existing?: ExistingAmountPolicy;
    jobId?: string;
    resume?: string | boolean;
    checkpointDir?: string;
    checkpointInterval?: number;
    logFile?: string;
    quiet?: boolean;
  }>();

  const ui = new ProgressUI({ quiet: opts.quiet });
  const logger = createLogger({
    // A live bar owns the terminal; per-number lines go to the log file only
    quiet: Boolean(opts.quiet) || ui.interactive,
    debug: Boolean(process.env.DEBUG),
    logFile: opts.logFile ? path.resolve(opts.logFile) : undefined
  });

  const cancellation = new CancellationController();
  const detachSignals = cancellation.attachProcessSignals();
  cancellation.onChange((state, reason) => {
    logger.debug(`Run state: ${state} (${reason})`);
  });

  try {
    if (!opts.csv && !opts.resume) {
      throw new ConfigError(["--csv <path> is required."]);
    }
    if (opts.jobId && opts.resume) {
      throw new ConfigError(["Provide only one of --job-id or --resume."]);
    }

    const api = loadApiSettings();
    const overrides: RunConfigInput = {
      workerCount: opts.concurrency,
      timeoutMs: opts.timeout,
      maxAttempts: opts.maxAttempts,
      requestsPerSecond: opts.rps,
      burst: opts.burst,
      maxInFlight: opts.maxInFlight,
      graceMs: opts.grace,
      checkpointInterval: opts.checkpointInterval,
      duplicates: opts.duplicates,
      existingAmounts: opts.existing
    };
    const { config, warnings } = resolveRunConfig(overrides);
    for (const warning of warnings) {
      logger.warn(`Warning: ${warning}`);
    }

    const { run, outputPath, failures, jobId } = await checkDebtsFromCsv({
      inputPath: opts.csv,
      outputPath: opts.out,
      idColumn: opts.idColumn,
      config,
      api,
      jobId: opts.jobId,
      resume: opts.resume || undefined,
      checkpointDir: opts.checkpointDir,
      logger,
      cancellation,
      onStart: counts => ui.start(counts),
      onProgress: counts => ui.update(counts)
    });
    ui.stop();

    logger.log(`Results written to: ${outputPath}`);
    if (opts.errorsOut && failures.length > 0) {
      const errorsOutPath = path.resolve(opts.errorsOut);
      await writeErrorsOut(errorsOutPath, failures);
      logger.warn(`Wrote ${failures.length} failed lookup(s) to: ${errorsOutPath}`);
    }

    // Print summary to stderr to be visible even when quiet
    // eslint-disable-next-line no-console
    console.error(renderSummaryBox(run.summary));

    if (run.partial) {
      const resumeHint = jobId ? ` Resume with: --resume ${jobId}` : "";
      logger.warn(`Interrupted: ${run.remaining.length} number(s) were not checked.${resumeHint}`);
      return EXIT_INTERRUPTED;
    }
    return EXIT_OK;
  } catch (err) {
    ui.stop();
    // eslint-disable-next-line no-console
    console.error(`Fatal error: ${errorMessage(err)}`);
    if (err instanceof ConfigError) return EXIT_USAGE;
    if (err instanceof FatalRunError) {
      logger.error("Run aborted; results resolved so far are kept in the checkpoint, if one was enabled.");
    }
    return EXIT_FATAL;
  } finally {
    detachSignals();
    await logger.close();
  }
}

main().then(
  code => process.exit(code),
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(`Fatal error: ${errorMessage(err)}`);
    process.exit(EXIT_FATAL);
  }
);
