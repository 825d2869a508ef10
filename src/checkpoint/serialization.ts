/**
 * ResultSet <-> JSON. Parsing validates every field, so a hand-edited or
 * truncated checkpoint fails loudly instead of seeding bad outcomes.
 */

import type { FailureReason, Identifier, LookupOutcome, ResultSet } from '../types.js';
import {
  FAILURE_REASONS,
  SNAPSHOT_VERSION,
  type CheckpointSnapshot,
  type SerializedOutcome,
  type SnapshotStatus
} from './types.js';

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isAttemptCount = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

const isFailureReason = (value: unknown): value is FailureReason =>
  FAILURE_REASONS.some(reason => reason === value);

const SNAPSHOT_STATUSES: readonly SnapshotStatus[] = ['running', 'complete', 'partial', 'aborted'];

const isSnapshotStatus = (value: unknown): value is SnapshotStatus =>
  SNAPSHOT_STATUSES.some(status => status === value);

export function serializeResultSet(results: ResultSet): SerializedOutcome[] {
  const out: SerializedOutcome[] = [];
  for (const [identifier, outcome] of results) {
    out.push({ identifier, outcome: { ...outcome } });
  }
  return out;
}

export function parseOutcome(value: unknown): LookupOutcome {
  if (!isRecord(value)) {
    throw new Error('outcome must be an object');
  }
  const { status, attempts, amount, reason, message } = value;
  if (!isAttemptCount(attempts)) {
    throw new Error(`outcome attempts must be a non-negative integer (got ${String(attempts)})`);
  }

  switch (status) {
    case 'found': {
      if (typeof amount !== 'number' || !Number.isFinite(amount)) {
        throw new Error(`found outcome needs a finite amount (got ${String(amount)})`);
      }
      return { status: 'found', amount, attempts };
    }
    case 'not_found':
      return { status: 'not_found', attempts };
    case 'failed': {
      if (!isFailureReason(reason)) {
        throw new Error(`unknown failure reason: ${String(reason)}`);
      }
      return { status: 'failed', reason, attempts, message: typeof message === 'string' ? message : '' };
    }
    default:
      throw new Error(`unknown outcome status: ${String(status)}`);
  }
}

export function deserializeResultSet(entries: unknown): Map<Identifier, LookupOutcome> {
  if (!Array.isArray(entries)) {
    throw new Error('results must be an array');
  }
  const results = new Map<Identifier, LookupOutcome>();
  entries.forEach((entry, index) => {
    if (!isRecord(entry) || typeof entry.identifier !== 'string') {
      throw new Error(`results[${index}] must have a string identifier`);
    }
    try {
      results.set(entry.identifier, parseOutcome(entry.outcome));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`results[${index}] (${entry.identifier}): ${message}`);
    }
  });
  return results;
}

/**
 * Validate a parsed checkpoint document
 */
export function parseSnapshot(value: unknown): CheckpointSnapshot {
  if (!isRecord(value)) {
    throw new Error('checkpoint must be a JSON object');
  }
  if (value.version !== SNAPSHOT_VERSION) {
    throw new Error(`unsupported checkpoint version: ${String(value.version)}`);
  }
  const { jobId, status, progress } = value;
  if (typeof jobId !== 'string' || jobId === '') {
    throw new Error('checkpoint jobId is missing');
  }
  if (!isSnapshotStatus(status)) {
    throw new Error(`unknown checkpoint status: ${String(status)}`);
  }
  if (!isRecord(progress)) {
    throw new Error('checkpoint progress is invalid');
  }
  const { completed, total } = progress;
  if (!isAttemptCount(completed) || !isAttemptCount(total)) {
    throw new Error('checkpoint progress is invalid');
  }
  const rawRemaining = value.remaining;
  const remaining: string[] = [];
  if (!Array.isArray(rawRemaining)) {
    throw new Error('checkpoint remaining must be an array of strings');
  }
  for (const id of rawRemaining) {
    if (typeof id !== 'string') {
      throw new Error('checkpoint remaining must be an array of strings');
    }
    remaining.push(id);
  }
  const optionalString = (v: unknown): string | null => (typeof v === 'string' ? v : null);
  const timestamp = (v: unknown): number => (typeof v === 'number' && Number.isFinite(v) ? v : 0);

  return {
    version: SNAPSHOT_VERSION,
    jobId,
    inputPath: optionalString(value.inputPath),
    inputHash: optionalString(value.inputHash),
    createdAt: timestamp(value.createdAt),
    updatedAt: timestamp(value.updatedAt),
    status,
    progress: { completed, total },
    results: serializeResultSet(deserializeResultSet(value.results)),
    remaining
  };
}
