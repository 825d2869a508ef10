/**
 * Tests for the checkpoint file store and snapshot serialization
 */

import { strict as assert } from 'node:assert';
import fs from 'node:fs';
import path from 'node:path';
import { after, describe, it } from 'node:test';
import { makeTempDir, removeDir } from '../../__tests__/helpers.js';
import type { LookupOutcome } from '../../types.js';
import { CheckpointManager, calculateFileHash, findLastJob } from '../manager.js';
import { deserializeResultSet, parseSnapshot, serializeResultSet } from '../serialization.js';
import { SNAPSHOT_VERSION, type CheckpointSnapshot } from '../types.js';

const outcomes = new Map<string, LookupOutcome>([
  ['77001/21/01-IP', { status: 'found', amount: 1500.5, attempts: 2 }],
  ['77002/21/01-IP', { status: 'not_found', attempts: 1 }],
  ['77003/21/01-IP', { status: 'failed', reason: 'exhausted', attempts: 3, message: 'gave up after 3 attempt(s): HTTP 503' }],
  ['bad id', { status: 'failed', reason: 'invalid_identifier', attempts: 0, message: 'identifier is blank' }]
]);

function snapshotFor(jobId: string, overrides: Partial<CheckpointSnapshot> = {}): CheckpointSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    jobId,
    inputPath: '/data/numbers.csv',
    inputHash: 'abc123',
    createdAt: 1_000,
    updatedAt: 2_000,
    status: 'running',
    progress: { completed: 4, total: 6 },
    results: serializeResultSet(outcomes),
    remaining: ['77004/21/01-IP', '77005/21/01-IP'],
    ...overrides
  };
}

describe('snapshot serialization', () => {
  it('round-trips every outcome exactly', () => {
    const restored = deserializeResultSet(JSON.parse(JSON.stringify(serializeResultSet(outcomes))));
    assert.deepEqual(restored, outcomes);
  });

  it('rejects an outcome with an unknown status', () => {
    assert.throws(
      () => deserializeResultSet([{ identifier: 'A', outcome: { status: 'maybe', attempts: 1 } }]),
      /results\[0\] \(A\): unknown outcome status: maybe/
    );
  });

  it('rejects a found outcome without an amount', () => {
    assert.throws(
      () => deserializeResultSet([{ identifier: 'A', outcome: { status: 'found', attempts: 1 } }]),
      /found outcome needs a finite amount/
    );
  });

  it('rejects another snapshot version', () => {
    assert.throws(() => parseSnapshot({ ...snapshotFor('job-a'), version: 2 }), /unsupported checkpoint version: 2/);
  });
});

describe('CheckpointManager', () => {
  const root = makeTempDir('debt-checkpoints');
  after(() => removeDir(root));

  it('saves atomically and loads the same snapshot back', async () => {
    const manager = await CheckpointManager.create(
      { jobId: 'job-a', inputPath: '/data/numbers.csv', inputHash: 'abc123', checkpointDir: root },
      () => 1_000
    );
    const snapshot = snapshotFor('job-a');

    await manager.save(snapshot);

    assert.equal(manager.getCheckpointPath(), path.join(root, 'job-a', 'checkpoint.json'));
    assert.equal(fs.existsSync(`${manager.getCheckpointPath()}.tmp`), false);
    assert.deepEqual(await manager.load(), snapshot);
    assert.equal(await CheckpointManager.exists('job-a', root), true);
  });

  it('resumes with the stored metadata', async () => {
    const manager = await CheckpointManager.create({ jobId: 'job-b', checkpointDir: root });
    await manager.save(snapshotFor('job-b', { createdAt: 5_000, inputHash: 'def456' }));

    const resumed = await CheckpointManager.resume('job-b', root);

    assert.deepEqual(resumed.getMeta(), {
      jobId: 'job-b',
      inputPath: '/data/numbers.csv',
      inputHash: 'def456',
      createdAt: 5_000
    });
    assert.equal(resumed.getLoadedSnapshot()?.remaining.length, 2);
    assert.equal(resumed.describeInputChange('def456'), null);
    assert.match(resumed.describeInputChange('0123456789abcdef') ?? '', /^Input file changed since job job-b was checkpointed/);
  });

  it('fails to resume a missing or corrupt checkpoint', async () => {
    await assert.rejects(CheckpointManager.resume('job-none', root), /Checkpoint not found for job: job-none/);

    fs.mkdirSync(path.join(root, 'job-corrupt'), { recursive: true });
    fs.writeFileSync(path.join(root, 'job-corrupt', 'checkpoint.json'), '{"version": 1, "jobId": ', 'utf8');
    await assert.rejects(CheckpointManager.resume('job-corrupt', root), /is not valid JSON/);
  });

  it('refuses job ids that would escape the checkpoint directory', async () => {
    await assert.rejects(CheckpointManager.create({ jobId: '../outside', checkpointDir: root }), /Invalid job id/);
  });

  it('refuses to save another job\'s snapshot', async () => {
    const manager = await CheckpointManager.create({ jobId: 'job-c', checkpointDir: root });
    await assert.rejects(manager.save(snapshotFor('job-other')), /cannot be saved under job "job-c"/);
  });

  it('deletes the job directory', async () => {
    const manager = await CheckpointManager.create({ jobId: 'job-d', checkpointDir: root });
    await manager.save(snapshotFor('job-d'));
    await manager.delete();
    assert.equal(await CheckpointManager.exists('job-d', root), false);
  });
});

describe('findLastJob', () => {
  it('returns the most recently written job', async () => {
    const dir = makeTempDir('debt-last-job');
    try {
      assert.equal(await findLastJob(path.join(dir, 'missing')), null);

      const older = await CheckpointManager.create({ jobId: 'older', checkpointDir: dir });
      await older.save(snapshotFor('older'));
      const newer = await CheckpointManager.create({ jobId: 'newer', checkpointDir: dir });
      await newer.save(snapshotFor('newer'));
      const past = new Date(Date.now() - 60_000);
      fs.utimesSync(older.getCheckpointPath(), past, past);

      assert.equal(await findLastJob(dir), 'newer');
    } finally {
      removeDir(dir);
    }
  });
});

describe('calculateFileHash', () => {
  it('hashes file contents with SHA-256', async () => {
    const dir = makeTempDir('debt-hash');
    try {
      const file = path.join(dir, 'input.csv');
      fs.writeFileSync(file, 'abc', 'utf8');
      assert.equal(
        await calculateFileHash(file),
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
      );
    } finally {
      removeDir(dir);
    }
  });
});
