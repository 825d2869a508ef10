/**
 * Records terminal outcomes into the run state, reports progress, and
 * persists snapshots on a completion-count or elapsed-time cadence.
 */

import type { Logger } from '../logger.js';
import type { RunState } from '../run/runState.js';
import type { LookupOutcome, ProgressCounts, WorkItem } from '../types.js';
import { serializeResultSet } from './serialization.js';
import {
  SNAPSHOT_VERSION,
  type CheckpointSnapshot,
  type SnapshotMeta,
  type SnapshotStatus,
  type SnapshotStore
} from './types.js';

export type ProgressListener = (counts: ProgressCounts) => void;

export interface CheckpointTrackerOptions {
  state: RunState;
  meta: SnapshotMeta;
  // Without a store the tracker records and reports but persists nothing
  store?: SnapshotStore | null;
  everyCompletions: number;
  // 0 disables the time-based trigger
  everyMs?: number;
  logger?: Logger;
  onProgress?: ProgressListener;
  now?: () => number;
}

export class CheckpointTracker {
  private readonly state: RunState;
  private readonly meta: SnapshotMeta;
  private readonly store: SnapshotStore | null;
  private readonly everyCompletions: number;
  private readonly everyMs: number;
  private readonly logger?: Logger;
  private readonly onProgress?: ProgressListener;
  private readonly now: () => number;
  private readonly createdAt: number;

  // Serializes snapshot writes so an older snapshot never lands after a newer one
  private saveChain: Promise<void> = Promise.resolve();
  private sinceLastSave = 0;
  private lastSaveAt: number;
  private savesWritten = 0;
  private saveFailures = 0;

  constructor(options: CheckpointTrackerOptions) {
    if (!Number.isInteger(options.everyCompletions) || options.everyCompletions < 1) {
      throw new Error('everyCompletions must be an integer >= 1');
    }
    this.state = options.state;
    this.meta = options.meta;
    this.store = options.store ?? null;
    this.everyCompletions = options.everyCompletions;
    this.everyMs = options.everyMs ?? 0;
    this.logger = options.logger;
    this.onProgress = options.onProgress;
    this.now = options.now ?? Date.now;
    this.createdAt = options.meta.createdAt ?? this.now();
    this.lastSaveAt = this.now();
  }

  /**
   * Store one terminal outcome. Synchronous: the state update and progress
   * report happen before the caller's next await; a due snapshot is queued.
   */
  record(item: WorkItem, outcome: LookupOutcome): void {
    this.state.resolve(item, outcome);
    this.sinceLastSave += 1;
    this.onProgress?.(this.reportProgress());

    if (this.store && this.isSaveDue()) {
      this.queueSave(this.snapshot('running'));
    }
  }

  /**
   * Counts for the whole job, carried-over outcomes included
   */
  reportProgress(): ProgressCounts {
    return {
      completed: this.state.seeded + this.state.completed,
      total: this.state.seeded + this.state.total
    };
  }

  snapshot(status: SnapshotStatus = 'running'): CheckpointSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      jobId: this.meta.jobId,
      inputPath: this.meta.inputPath ?? null,
      inputHash: this.meta.inputHash ?? null,
      createdAt: this.createdAt,
      updatedAt: this.now(),
      status,
      progress: this.reportProgress(),
      results: serializeResultSet(this.state.resultSet()),
      remaining: this.state.remaining()
    };
  }

  /**
   * Wait for queued writes, then write a final snapshot. Unlike periodic
   * writes, a failure here is thrown.
   */
  async flush(status: SnapshotStatus): Promise<void> {
    await this.saveChain;
    if (!this.store) return;
    await this.store.save(this.snapshot(status));
    this.markSaved();
  }

  stats(): { written: number; failed: number } {
    return { written: this.savesWritten, failed: this.saveFailures };
  }

  private isSaveDue(): boolean {
    if (this.sinceLastSave >= this.everyCompletions) return true;
    return this.everyMs > 0 && this.now() - this.lastSaveAt >= this.everyMs;
  }

  private queueSave(snapshot: CheckpointSnapshot): void {
    const store = this.store;
    if (!store) return;
    this.sinceLastSave = 0;
    this.lastSaveAt = this.now();
    this.saveChain = this.saveChain
      .then(() => store.save(snapshot))
      .then(
        () => {
          this.savesWritten += 1;
        },
        (err: unknown) => {
          this.saveFailures += 1;
          const message = err instanceof Error ? err.message : String(err);
          this.logger?.warn(`Checkpoint write failed (run continues): ${message}`);
        }
      );
  }

  private markSaved(): void {
    this.savesWritten += 1;
    this.sinceLastSave = 0;
    this.lastSaveAt = this.now();
  }
}
