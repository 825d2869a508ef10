import type { DuplicatePolicy, ExistingAmountPolicy, Identifier, InputRow, LookupOutcome, WorkItem } from "../types.js";

export interface PlanOptions {
  duplicates: DuplicatePolicy;
  existingAmounts: ExistingAmountPolicy;
}

export interface WorkPlan {
  items: WorkItem[];
  // Rows left out because the input already carries an amount
  skipped: number;
  // Rows left out because a previous run already resolved the identifier
  carriedOver: number;
  // Later occurrences dropped under duplicates=once
  duplicatesDropped: number;
}

/**
 * Decide which input rows need a lookup
 */
export function planWork(
  rows: readonly InputRow[],
  options: PlanOptions,
  seed?: ReadonlyMap<Identifier, LookupOutcome>
): WorkPlan {
  const items: WorkItem[] = [];
  const queued = new Set<Identifier>();
  let skipped = 0;
  let carriedOver = 0;
  let duplicatesDropped = 0;

  for (const row of rows) {
    if (options.existingAmounts === "skip" && row.existingAmount !== undefined) {
      skipped += 1;
      continue;
    }
    if (seed?.has(row.identifier)) {
      carriedOver += 1;
      continue;
    }
    if (options.duplicates === "once" && queued.has(row.identifier)) {
      duplicatesDropped += 1;
      continue;
    }
    queued.add(row.identifier);
    items.push({ position: row.position, identifier: row.identifier });
  }

  return { items, skipped, carriedOver, duplicatesDropped };
}
