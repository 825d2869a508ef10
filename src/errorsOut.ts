import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { FailureReason, Identifier, ResultSet } from "./types.js";

export type FailureRecord = {
  identifier: Identifier;
  reason: FailureReason;
  attempts: number;
  message: string;
};

export function collectFailures(results: ResultSet): FailureRecord[] {
  const failures: FailureRecord[] = [];
  for (const [identifier, outcome] of results) {
    if (outcome.status !== "failed") continue;
    failures.push({
      identifier,
      reason: outcome.reason,
      attempts: outcome.attempts,
      message: outcome.message
    });
  }
  return failures;
}

/**
 * Write failed lookups as CSV (by extension) or JSON. Nothing is written
 * when there are no failures.
 */
export async function writeErrorsOut(outPath: string, failures: FailureRecord[]): Promise<void> {
  if (failures.length === 0) return;
  await fs.promises.mkdir(path.dirname(path.resolve(outPath)), { recursive: true });
  const ext = path.extname(outPath).toLowerCase();
  if (ext === ".csv") {
    const csv = stringify(failures, {
      header: true,
      columns: ["identifier", "reason", "attempts", "message"]
    });
    await fs.promises.writeFile(outPath, csv, "utf8");
  } else {
    await fs.promises.writeFile(outPath, JSON.stringify(failures, null, 2), "utf8");
  }
}
