import chalk from "chalk";
import type { ResultSet, RunSummary } from "./types.js";

function supportsColor(): boolean {
  if (process.env.NO_COLOR) return false;
  return Boolean(process.stderr && process.stderr.isTTY);
}

function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 1) return `${ms.toFixed(0)} ms`;
  return `${seconds.toFixed(1)} s`;
}

export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

export type SummaryInput = {
  results: ResultSet;
  total: number;
  completed: number;
  remaining: number;
  skipped?: number;
  partial: boolean;
  startedAt: number;
  endedAt: number;
  warnings?: string[];
};

/**
 * Tally a ResultSet. Counts are per identifier, so with duplicate input
 * rows they may be lower than `completed`.
 */
export function buildRunSummary(input: SummaryInput): RunSummary {
  let found = 0;
  let notFound = 0;
  let failed = 0;
  let attempts = 0;
  // Kopecks, to keep the sum exact
  let debtCents = 0;

  for (const outcome of input.results.values()) {
    attempts += outcome.attempts;
    switch (outcome.status) {
      case "found":
        found += 1;
        debtCents += Math.round(outcome.amount * 100);
        break;
      case "not_found":
        notFound += 1;
        break;
      case "failed":
        failed += 1;
        break;
    }
  }

  return {
    total: input.total,
    completed: input.completed,
    found,
    notFound,
    failed,
    attempts,
    totalDebt: debtCents / 100,
    remaining: input.remaining,
    skipped: input.skipped ?? 0,
    partial: input.partial,
    startedAt: input.startedAt,
    endedAt: input.endedAt,
    warnings: input.warnings ?? []
  };
}

export type RunStatus = "Success" | "Completed with errors" | "Partial" | "Failed";

export function computeStatus(summary: RunSummary): RunStatus {
  if (summary.partial) return "Partial";
  const resolved = summary.found + summary.notFound;
  if (summary.failed === 0 && (resolved > 0 || summary.total === 0)) return "Success";
  if (summary.failed > 0 && resolved > 0) return "Completed with errors";
  return "Failed";
}

export function renderSummaryBox(summary: RunSummary): string {
  const status = computeStatus(summary);
  const duration = formatDuration(summary.endedAt - summary.startedAt);

  const content = [
    "SUMMARY",
    `Status: ${status}`,
    `Checked: ${summary.completed}/${summary.total}`,
    `With debt: ${summary.found}`,
    `Without debt: ${summary.notFound}`,
    `Total debt: ${formatAmount(summary.totalDebt)}`,
    `Requests: ${summary.attempts}`,
    `Duration: ${duration}`,
    `Warnings: ${summary.warnings.length}`,
    `Errors: ${summary.failed}`
  ];
  if (summary.skipped > 0) {
    content.splice(5, 0, `Already known: ${summary.skipped}`);
  }
  if (summary.partial) {
    content.push(`Remaining: ${summary.remaining}`);
  }

  // Compute max content width and render a neatly padded box
  const maxLen = content.reduce((m, s) => Math.max(m, s.length), 0);
  const horizontal = "─".repeat(maxLen + 2);
  const top = `┌${horizontal}┐`;
  const bottom = `└${horizontal}┘`;
  const body = content.map((line) => `│ ${line.padEnd(maxLen, " ")} │`);
  const box = [top, ...body, bottom].join("\n");

  if (!supportsColor()) return box;
  if (status === "Success") return chalk.green(box);
  if (status === "Partial") return chalk.yellow(box);
  return chalk.red(box);
}
