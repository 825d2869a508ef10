import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import { silentLogger } from '../../__tests__/helpers.js';
import { RunState } from '../../run/runState.js';
import type { LookupOutcome, ProgressCounts, WorkItem } from '../../types.js';
import { CheckpointTracker } from '../tracker.js';
import type { CheckpointSnapshot, SnapshotStore } from '../types.js';

const notFound: LookupOutcome = { status: 'not_found', attempts: 1 };

class RecordingStore implements SnapshotStore {
  readonly saved: CheckpointSnapshot[] = [];
  failNext = false;

  async save(snapshot: CheckpointSnapshot): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error('disk full');
    }
    this.saved.push(snapshot);
  }
}

function setup(count: number, options: { everyCompletions: number; everyMs?: number; now?: () => number }) {
  const state = new RunState(Array.from({ length: count }, (_, position) => ({ position, identifier: `ID-${position}` })));
  const store = new RecordingStore();
  const progress: ProgressCounts[] = [];
  const tracker = new CheckpointTracker({
    state,
    meta: { jobId: 'job-t', inputPath: 'numbers.csv', inputHash: 'hash-1', createdAt: 100 },
    store,
    logger: silentLogger(),
    onProgress: counts => progress.push(counts),
    ...options
  });
  const complete = () => {
    const item: WorkItem | undefined = state.next();
    if (!item) throw new Error('no work left');
    tracker.record(item, notFound);
  };
  return { state, store, progress, tracker, complete };
}

describe('CheckpointTracker', () => {
  it('saves every N completions and not in between', async () => {
    const { store, tracker, complete } = setup(7, { everyCompletions: 3 });

    for (let i = 0; i < 7; i++) complete();
    await tracker.flush('complete');

    assert.deepEqual(store.saved.map(s => [s.status, s.progress.completed]), [
      ['running', 3],
      ['running', 6],
      ['complete', 7]
    ]);
    assert.deepEqual(tracker.stats(), { written: 3, failed: 0 });
  });

  it('also saves when the time interval has passed', async () => {
    let clock = 0;
    const { store, tracker, complete } = setup(3, { everyCompletions: 100, everyMs: 1_000, now: () => clock });

    complete();
    clock = 1_500;
    complete();
    complete();
    await tracker.flush('complete');

    assert.deepEqual(store.saved.map(s => s.progress.completed), [2, 3]);
    assert.equal(store.saved[0].updatedAt, 1_500);
  });

  it('reports monotonic progress on every completion', () => {
    const { progress, complete } = setup(3, { everyCompletions: 10 });
    complete();
    complete();
    complete();
    assert.deepEqual(progress, [
      { completed: 1, total: 3 },
      { completed: 2, total: 3 },
      { completed: 3, total: 3 }
    ]);
  });

  it('builds snapshots with metadata, results and remaining work', () => {
    const { tracker, complete } = setup(3, { everyCompletions: 10, now: () => 900 });
    complete();

    assert.deepEqual(tracker.snapshot('partial'), {
      version: 1,
      jobId: 'job-t',
      inputPath: 'numbers.csv',
      inputHash: 'hash-1',
      createdAt: 100,
      updatedAt: 900,
      status: 'partial',
      progress: { completed: 1, total: 3 },
      results: [{ identifier: 'ID-0', outcome: notFound }],
      remaining: ['ID-1', 'ID-2']
    });
  });

  it('keeps running when a periodic save fails', async () => {
    const { store, tracker, complete } = setup(2, { everyCompletions: 1 });
    store.failNext = true;

    complete();
    complete();
    await tracker.flush('complete');

    assert.deepEqual(store.saved.map(s => s.progress.completed), [2, 2]);
    assert.deepEqual(tracker.stats(), { written: 2, failed: 1 });
  });

  it('throws when the final save fails', async () => {
    const { store, tracker, complete } = setup(1, { everyCompletions: 10 });
    complete();
    store.failNext = true;
    await assert.rejects(tracker.flush('complete'), /disk full/);
  });

  it('persists nothing without a store', async () => {
    const state = new RunState([{ position: 0, identifier: 'A' }]);
    const tracker = new CheckpointTracker({ state, meta: { jobId: 'job-x' }, everyCompletions: 1 });
    const item = state.next();
    if (!item) throw new Error('no work left');
    tracker.record(item, notFound);
    await tracker.flush('complete');
    assert.deepEqual(tracker.stats(), { written: 0, failed: 0 });
    assert.deepEqual(tracker.reportProgress(), { completed: 1, total: 1 });
  });

  it('rejects a zero completion interval', () => {
    assert.throws(
      () => new CheckpointTracker({ state: new RunState([]), meta: { jobId: 'j' }, everyCompletions: 0 }),
      /everyCompletions must be an integer >= 1/
    );
  });
});
