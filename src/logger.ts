import fs from "node:fs";
import path from "node:path";

type LoggerOptions = {
  quiet?: boolean;
  // Drop console output entirely (tests, embedding)
  silent?: boolean;
  debug?: boolean;
  logFile?: string;
};

export type Logger = ReturnType<typeof createLogger>;

function formatArgs(args: unknown[]): string {
  return args
    .map(a => (a instanceof Error ? a.stack ?? a.message : typeof a === "string" ? a : JSON.stringify(a)))
    .join(" ");
}

export function createLogger(options: LoggerOptions = {}) {
  const quiet = Boolean(options.quiet);
  const silent = Boolean(options.silent);
  const debugEnabled = Boolean(options.debug);

  let fileStream: fs.WriteStream | null = null;
  if (options.logFile) {
    fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
    const logFile = options.logFile;
    const stream = fs.createWriteStream(logFile, { flags: "a", encoding: "utf8" });
    // Drop the file sink on its first error; the console keeps working
    stream.on("error", err => {
      if (fileStream !== stream) return;
      fileStream = null;
      if (!silent) {
        // eslint-disable-next-line no-console
        console.error(`Log file ${logFile} is not writable (${err.message}); logging to the console only`);
      }
    });
    fileStream = stream;
  }

  const toFile = (level: string, args: unknown[]) => {
    if (!fileStream) return;
    fileStream.write(`${new Date().toISOString()} ${level.padEnd(5)} ${formatArgs(args)}\n`);
  };

  const log = (...args: unknown[]) => {
    toFile("INFO", args);
    if (!quiet && !silent) {
      // eslint-disable-next-line no-console
      console.log(...args);
    }
  };
  const warn = (...args: unknown[]) => {
    toFile("WARN", args);
    if (!silent) {
      // eslint-disable-next-line no-console
      console.warn(...args);
    }
  };
  const error = (...args: unknown[]) => {
    toFile("ERROR", args);
    if (!silent) {
      // eslint-disable-next-line no-console
      console.error(...args);
    }
  };
  const debug = (...args: unknown[]) => {
    if (!debugEnabled) return;
    toFile("DEBUG", args);
    if (!silent) {
      // eslint-disable-next-line no-console
      console.log(...args);
    }
  };
  const stepFound = (identifier: string, amount: number, attempts: number) => {
    log(`✔ ${identifier}: debt ${amount.toFixed(2)} (attempts: ${attempts})`);
  };
  const stepNotFound = (identifier: string) => {
    log(`○ ${identifier}: no debt`);
  };
  const stepFailed = (identifier: string, reason: string, message: string) => {
    warn(`✖ ${identifier}: ${reason} (${message})`);
  };
  const retry = (identifier: string, attempt: number, maxAttempts: number, delayMs: number, cause: string) => {
    debug(`↻ ${identifier}: attempt ${attempt}/${maxAttempts} failed (${cause}); retrying in ${delayMs} ms`);
  };
  const close = async (): Promise<void> => {
    const stream = fileStream;
    if (!stream) return;
    fileStream = null;
    if (stream.destroyed) return;
    await new Promise<void>(resolve => {
      // A write error was already reported by the stream's error listener
      stream.once("error", () => resolve());
      stream.end(() => resolve());
    });
  };
  return {
    log,
    warn,
    error,
    debug,
    stepFound,
    stepNotFound,
    stepFailed,
    retry,
    close
  };
}
