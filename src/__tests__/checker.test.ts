import { strict as assert } from 'node:assert';
import fs from 'node:fs';
import path from 'node:path';
import { after, describe, it } from 'node:test';
import { checkDebtsFromCsv, defaultOutputPath } from '../checker.js';
import { CheckpointManager, calculateFileHash } from '../checkpoint/manager.js';
import { resolveRunConfig } from '../config.js';
import { FatalRunError } from '../errors.js';
import type { FetchFn } from '../lookup/debtApiClient.js';
import { instantSleep, jsonResponse, makeTempDir, removeDir, silentLogger } from './helpers.js';

const api = { token: 'test-token', baseUrl: 'https://debts.example.test/api/fssp.php' };
const { config } = resolveRunConfig({ workerCount: 2, requestsPerSecond: 1000, maxAttempts: 3 }, {});

function fakeService(requested: string[]): FetchFn {
  return async url => {
    const number = new URL(url).searchParams.get('number') ?? '';
    requested.push(number);
    switch (number) {
      case 'A-1':
        return jsonResponse({ status: 200, count: 1, records: [{ sum: '100,00' }] });
      case 'A-2':
        return jsonResponse({ status: 200, count: 0, records: [] });
      default:
        return new Response('unavailable', { status: 503 });
    }
  };
}

describe('checkDebtsFromCsv', () => {
  const dir = makeTempDir('debt-checker');
  after(() => removeDir(dir));

  const input = path.join(dir, 'numbers.csv');
  fs.writeFileSync(input, ['number,debt_amount', 'A-1,', 'A-2,', 'A-3,99', 'A-4,'].join('\n'), 'utf8');

  it('checks the file and writes merged results and a checkpoint', async () => {
    const requested: string[] = [];
    const checkpointDir = path.join(dir, 'checkpoints');

    const result = await checkDebtsFromCsv({
      inputPath: input,
      config,
      api,
      jobId: 'job-1',
      checkpointDir,
      logger: silentLogger(),
      fetchFn: fakeService(requested),
      sleep: instantSleep()
    });

    assert.equal(result.outputPath, path.join(dir, 'numbers_with_debt.csv'));
    assert.equal(
      fs.readFileSync(result.outputPath, 'utf8'),
      [
        'number,debt_amount,status,attempts,error',
        'A-1,100.00,found,1,',
        'A-2,0.00,not_found,1,',
        'A-3,99.00,existing,,',
        'A-4,,failed,3,exhausted: gave up after 3 attempt(s): HTTP 503',
        ''
      ].join('\n')
    );
    assert.deepEqual([...requested].sort(), ['A-1', 'A-2', 'A-4', 'A-4', 'A-4']);
    assert.equal(result.run.summary.skipped, 1);
    assert.equal(result.failures.length, 1);
    assert.equal(result.jobId, 'job-1');
    assert.deepEqual(result.checkpointWrites, { written: 1, failed: 0 });

    const saved = await (await CheckpointManager.resume('job-1', checkpointDir)).load();
    assert.equal(saved.status, 'complete');
    assert.equal(saved.results.length, 3);
    assert.deepEqual(saved.remaining, []);
  });

  it('resumes a job and only checks what is left', async () => {
    const checkpointDir = path.join(dir, 'resume-checkpoints');
    const manager = await CheckpointManager.create({ jobId: 'job-r', inputPath: input, checkpointDir });
    await manager.save({
      version: 1,
      jobId: 'job-r',
      inputPath: input,
      inputHash: 'stale-hash',
      createdAt: 1,
      updatedAt: 2,
      status: 'partial',
      progress: { completed: 1, total: 3 },
      results: [{ identifier: 'A-1', outcome: { status: 'found', amount: 100, attempts: 1 } }],
      remaining: ['A-2', 'A-4']
    });
    const requested: string[] = [];
    const output = path.join(dir, 'resumed.csv');

    const result = await checkDebtsFromCsv({
      outputPath: output,
      config,
      api,
      resume: 'job-r',
      checkpointDir,
      logger: silentLogger(),
      fetchFn: fakeService(requested),
      sleep: instantSleep()
    });

    assert.deepEqual([...new Set(requested)].sort(), ['A-2', 'A-4']);
    assert.equal(result.run.results.size, 3);
    assert.deepEqual(result.run.summary.total, 3);
    assert.match(fs.readFileSync(output, 'utf8'), /^A-1,100\.00,found,1,$/m);

    const saved = await (await CheckpointManager.resume('job-r', checkpointDir)).load();
    assert.equal(saved.inputHash, await calculateFileHash(input));
    assert.equal(saved.status, 'complete');
  });

  it('stops on a rejected token and writes no results', async () => {
    const output = path.join(dir, 'denied.csv');
    const fetchFn: FetchFn = async () => jsonResponse({ error: '602', message: 'token not allowed' });

    await assert.rejects(
      checkDebtsFromCsv({ inputPath: input, outputPath: output, config, api, logger: silentLogger(), fetchFn }),
      FatalRunError
    );
    assert.equal(fs.existsSync(output), false);
  });

  it('refuses to start a job id that already has a checkpoint', async () => {
    await assert.rejects(
      checkDebtsFromCsv({
        inputPath: input,
        config,
        api,
        jobId: 'job-1',
        checkpointDir: path.join(dir, 'checkpoints'),
        logger: silentLogger(),
        fetchFn: fakeService([])
      }),
      /already has a checkpoint/
    );
  });
});

describe('defaultOutputPath', () => {
  it('puts the results next to the input', () => {
    assert.equal(defaultOutputPath(path.join('data', 'numbers.csv')), path.join('data', 'numbers_with_debt.csv'));
  });
});
