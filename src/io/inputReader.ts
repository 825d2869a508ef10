/**
 * Reads the identifiers to check from a CSV file.
 *
 * The identifier column is `number` unless another is named; without a
 * `number` column the first column is used. An existing amount may be
 * given in `debt_amount` or `Debt Amount`.
 */

import fs from 'node:fs';
import { parse } from 'csv-parse';
import { ConfigError } from '../errors.js';
import { parseAmount } from '../lookup/debtApiClient.js';
import type { InputRow } from '../types.js';

export const DEFAULT_ID_COLUMN = 'number';
export const AMOUNT_COLUMNS = ['debt_amount', 'Debt Amount'] as const;

export interface InputReadOptions {
  idColumn?: string;
}

export interface InputFile {
  rows: InputRow[];
  columns: string[];
  idColumn: string;
  amountColumn: string | null;
  // Data records with an empty identifier (not part of `rows`)
  blankRows: number;
  warnings: string[];
}

const isStringRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function pickIdColumn(columns: string[], requested: string | undefined): string {
  if (requested) {
    if (!columns.includes(requested)) {
      throw new ConfigError([`Input file has no "${requested}" column (columns: ${columns.join(', ')})`]);
    }
    return requested;
  }
  if (columns.includes(DEFAULT_ID_COLUMN)) return DEFAULT_ID_COLUMN;
  const [first] = columns;
  if (first === undefined) {
    throw new ConfigError(['Input file has no header row']);
  }
  return first;
}

export async function readInputFile(inputPath: string, options: InputReadOptions = {}): Promise<InputFile> {
  if (!fs.existsSync(inputPath)) {
    throw new ConfigError([`Input file not found: ${inputPath}`]);
  }

  const parser = fs.createReadStream(inputPath).pipe(
    parse({
      columns: true,
      bom: true,
      skip_empty_lines: true,
      trim: true
    })
  );

  const rows: InputRow[] = [];
  const warnings: string[] = [];
  let columns: string[] = [];
  let idColumn = '';
  let amountColumn: string | null = null;
  let position = -1;
  let blankRows = 0;
  let badAmounts = 0;

  for await (const record of parser) {
    if (!isStringRecord(record)) continue;
    position += 1;

    if (position === 0) {
      columns = Object.keys(record);
      idColumn = pickIdColumn(columns, options.idColumn);
      amountColumn = AMOUNT_COLUMNS.find(name => columns.includes(name)) ?? null;
    }

    const rawId = record[idColumn];
    const identifier = typeof rawId === 'string' ? rawId.trim() : '';
    if (identifier === '') {
      blankRows += 1;
      continue;
    }

    const row: InputRow = { position, identifier };
    if (amountColumn) {
      const rawAmount = record[amountColumn];
      if (typeof rawAmount === 'string' && rawAmount !== '') {
        const amount = parseAmount(rawAmount);
        if (amount === undefined) {
          badAmounts += 1;
        } else {
          row.existingAmount = amount;
        }
      }
    }
    rows.push(row);
  }

  if (position === -1) {
    idColumn = options.idColumn ?? DEFAULT_ID_COLUMN;
    warnings.push(`Input file ${inputPath} has no data rows`);
  }
  if (blankRows > 0) {
    warnings.push(`Skipped ${blankRows} row(s) with an empty "${idColumn}" value`);
  }
  if (badAmounts > 0) {
    warnings.push(`Ignored ${badAmounts} unreadable "${amountColumn ?? ''}" value(s); those rows will be checked`);
  }

  return { rows, columns, idColumn, amountColumn, blankRows, warnings };
}
