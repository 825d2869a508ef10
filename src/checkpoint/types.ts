/**
 * Checkpoint snapshot types for resumable runs
 */

import type { FailureReason, Identifier, LookupOutcome, ProgressCounts } from '../types.js';

export const SNAPSHOT_VERSION = 1;

export type SnapshotStatus = 'running' | 'complete' | 'partial' | 'aborted';

export interface SerializedOutcome {
  identifier: Identifier;
  outcome: LookupOutcome;
}

export interface CheckpointSnapshot {
  version: typeof SNAPSHOT_VERSION;
  jobId: string;
  inputPath: string | null;
  inputHash: string | null; // SHA-256 of the input file
  createdAt: number; // timestamp (ms)
  updatedAt: number; // timestamp (ms)
  status: SnapshotStatus;
  progress: ProgressCounts;
  results: SerializedOutcome[];
  // Not yet terminated: never dispatched, in flight or abandoned
  remaining: Identifier[];
}

export interface SnapshotMeta {
  jobId: string;
  inputPath?: string | null;
  inputHash?: string | null;
  createdAt?: number;
}

export interface SnapshotStore {
  save(snapshot: CheckpointSnapshot): Promise<void>;
}

export interface CreateCheckpointOptions {
  jobId: string;
  inputPath?: string | null;
  inputHash?: string | null;
  checkpointDir?: string;
}

export const FAILURE_REASONS: readonly FailureReason[] = [
  'exhausted',
  'invalid_identifier',
  'rejected',
  'malformed_response'
];
