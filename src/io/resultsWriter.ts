/**
 * Writes results back in input order.
 *
 * Each input row gets the outcome stored for its identifier. Rows left out
 * of the run for an already-known amount keep that amount; rows still
 * waiting for a lookup (interrupted run) are marked `pending`.
 */

import fs from 'node:fs';
import path from 'node:path';
import { stringify } from 'csv-stringify';
import { formatAmount } from '../summary.js';
import type { ExistingAmountPolicy, InputRow, ResultSet } from '../types.js';

export const RESULT_COLUMNS = ['number', 'debt_amount', 'status', 'attempts', 'error'] as const;

export type ResultRowStatus = 'found' | 'not_found' | 'failed' | 'existing' | 'pending';

export interface ResultRow {
  number: string;
  debt_amount: string;
  status: ResultRowStatus;
  attempts: string;
  error: string;
}

export function buildResultRows(
  rows: readonly InputRow[],
  results: ResultSet,
  existingAmounts: ExistingAmountPolicy = 'skip'
): ResultRow[] {
  return [...rows]
    .sort((a, b) => a.position - b.position)
    .map((row): ResultRow => {
      const base = { number: row.identifier, debt_amount: '', attempts: '', error: '' };
      if (existingAmounts === 'skip' && row.existingAmount !== undefined) {
        return { ...base, debt_amount: formatAmount(row.existingAmount), status: 'existing' };
      }
      const outcome = results.get(row.identifier);
      if (!outcome) {
        return { ...base, status: 'pending' };
      }
      const attempts = String(outcome.attempts);
      switch (outcome.status) {
        case 'found':
          return { ...base, debt_amount: formatAmount(outcome.amount), status: 'found', attempts };
        case 'not_found':
          return { ...base, debt_amount: formatAmount(0), status: 'not_found', attempts };
        case 'failed':
          return { ...base, status: 'failed', attempts, error: `${outcome.reason}: ${outcome.message}` };
      }
    });
}

export async function writeResultsCsv(outputPath: string, rows: readonly ResultRow[]): Promise<void> {
  await fs.promises.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });

  return new Promise((resolve, reject) => {
    const output = fs.createWriteStream(outputPath);
    const stringifier = stringify({
      header: true,
      columns: [...RESULT_COLUMNS]
    });

    output.on('finish', () => resolve());
    output.on('error', (err) => reject(err));
    stringifier.on('error', (err) => reject(err));

    stringifier.pipe(output);
    for (const row of rows) {
      stringifier.write(row);
    }
    stringifier.end();
  });
}
