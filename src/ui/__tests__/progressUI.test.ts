import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import { ProgressUI, formatDuration } from '../progressUI.js';

describe('ProgressUI (plain text)', () => {
  it('prints a start line and every Nth completion', () => {
    let clock = 0;
    const lines: string[] = [];
    const ui = new ProgressUI({ textEvery: 2, now: () => clock, write: line => lines.push(line) });

    ui.start({ completed: 0, total: 4 });
    clock = 1_000;
    ui.update({ completed: 1, total: 4 });
    clock = 2_000;
    ui.update({ completed: 2, total: 4 });
    ui.update({ completed: 3, total: 4 });
    clock = 4_000;
    ui.update({ completed: 4, total: 4 });

    assert.equal(ui.interactive, false);
    assert.deepEqual(lines, [
      'Checking 4 number(s)',
      'Progress: 2/4 (50%) - ETA: 2s',
      'Progress: 4/4 (100%) - ETA: 0s'
    ]);
  });

  it('counts ETA from where a resumed run started', () => {
    let clock = 0;
    const lines: string[] = [];
    const ui = new ProgressUI({ textEvery: 1, now: () => clock, write: line => lines.push(line) });

    ui.start({ completed: 6, total: 10 });
    clock = 3_000;
    ui.update({ completed: 7, total: 10 });

    assert.deepEqual(lines, ['Checking 10 number(s) (6 already done)', 'Progress: 7/10 (70%) - ETA: 9s']);
  });

  it('stays silent when quiet', () => {
    const lines: string[] = [];
    const ui = new ProgressUI({ quiet: true, write: line => lines.push(line) });
    ui.start({ completed: 0, total: 1 });
    ui.update({ completed: 1, total: 1 });
    assert.deepEqual(lines, []);
  });
});

describe('formatDuration', () => {
  it('uses the largest sensible units', () => {
    assert.equal(formatDuration(59_999), '59s');
    assert.equal(formatDuration(61_000), '1m 1s');
    assert.equal(formatDuration(3_720_000), '1h 2m');
  });
});
