/**
 * CLI progress bar with colors
 * Falls back to periodic plain-text lines in non-interactive environments
 */

import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { ProgressCounts } from '../types.js';

export interface ProgressUIOptions {
  quiet?: boolean;
  // Plain-text mode prints a line every this many completions
  textEvery?: number;
  now?: () => number;
  write?: (line: string) => void;
}

export class ProgressUI {
  private bar: cliProgress.SingleBar | null = null;
  private readonly isInteractive: boolean;
  private readonly quiet: boolean;
  private readonly textEvery: number;
  private readonly now: () => number;
  private readonly write: (line: string) => void;
  private startTime: number;
  private startCompleted = 0;
  private lastPrinted = -1;

  constructor(options: ProgressUIOptions = {}) {
    this.quiet = Boolean(options.quiet);
    this.textEvery = Math.max(1, options.textEvery ?? 50);
    this.now = options.now ?? Date.now;
    // eslint-disable-next-line no-console
    this.write = options.write ?? ((line) => console.log(line));
    this.startTime = this.now();
    // Only draw a bar in an interactive terminal
    this.isInteractive = options.write === undefined
      && Boolean(process.stdout.isTTY)
      && !this.quiet
      && !process.env.NO_COLOR
      && !process.env.CI;
  }

  /** True when a live bar is drawn; per-line console output would break it */
  get interactive(): boolean {
    return this.isInteractive;
  }

  start(counts: ProgressCounts): void {
    this.startTime = this.now();
    this.startCompleted = counts.completed;

    if (!this.isInteractive) {
      if (!this.quiet) {
        const resumed = counts.completed > 0 ? ` (${counts.completed} already done)` : '';
        this.write(`Checking ${counts.total} number(s)${resumed}`);
      }
      return;
    }

    this.bar = new cliProgress.SingleBar({
      format: `${chalk.bold.cyan('Checked')} |{bar}| {percentage}% | {value}/{total} | ETA {eta_formatted}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true
    }, cliProgress.Presets.shades_classic);
    this.bar.start(counts.total, counts.completed);
  }

  update(counts: ProgressCounts): void {
    if (this.bar) {
      this.bar.update(counts.completed);
      return;
    }
    if (this.quiet) return;
    const isLast = counts.completed >= counts.total;
    if (!isLast && counts.completed - Math.max(this.lastPrinted, this.startCompleted) < this.textEvery) return;
    this.lastPrinted = counts.completed;
    this.write(this.formatLine(counts));
  }

  formatLine(counts: ProgressCounts): string {
    const { completed, total } = counts;
    const percentage = total > 0 ? Math.round((completed / total) * 100) : 100;
    const done = completed - this.startCompleted;
    const elapsed = this.now() - this.startTime;
    const eta = done > 0 ? Math.round((elapsed / done) * (total - completed)) : 0;
    return `Progress: ${completed}/${total} (${percentage}%) - ETA: ${formatDuration(eta)}`;
  }

  stop(): void {
    if (this.bar) {
      this.bar.stop();
      this.bar = null;
    }
  }
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) return `${minutes}m ${remainingSeconds}s`;

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}
