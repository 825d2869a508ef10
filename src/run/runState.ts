import type { Identifier, LookupOutcome, ResultSet, WorkItem } from "../types.js";

type Slot = {
  // -1 for outcomes carried over from a previous run
  position: number;
  outcome: LookupOutcome;
};

/**
 * Mutable state of one run: the work queue, what is in flight, and the
 * accumulated results. Owned by a single run and mutated only through
 * these methods, each of which runs to completion without awaiting.
 */
export class RunState {
  private readonly items: WorkItem[];
  private cursor = 0;
  private readonly inFlight = new Map<number, WorkItem>();
  private readonly abandoned = new Map<number, WorkItem>();
  private readonly resolvedPositions = new Set<number>();
  private readonly slots = new Map<Identifier, Slot>();
  private completedCount = 0;
  private readonly seededCount: number = 0;

  constructor(items: WorkItem[], seed?: Iterable<[Identifier, LookupOutcome]>) {
    const positions = new Set<number>();
    for (const item of items) {
      if (positions.has(item.position)) {
        throw new Error(`Duplicate work item position: ${item.position}`);
      }
      positions.add(item.position);
    }
    this.items = [...items].sort((a, b) => a.position - b.position);
    if (seed) {
      for (const [identifier, outcome] of seed) {
        this.slots.set(identifier, { position: -1, outcome });
      }
      this.seededCount = this.slots.size;
    }
  }

  /** Number of work items submitted to this run */
  get total(): number {
    return this.items.length;
  }

  /** Work items with a terminal outcome in this run (monotonic) */
  get completed(): number {
    return this.completedCount;
  }

  /** Outcomes carried over from a previous run */
  get seeded(): number {
    return this.seededCount;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get pendingCount(): number {
    return this.items.length - this.cursor;
  }

  /**
   * Take the next item in input order and mark it in flight
   */
  next(): WorkItem | undefined {
    if (this.cursor >= this.items.length) return undefined;
    const item = this.items[this.cursor];
    this.cursor += 1;
    this.inFlight.set(item.position, item);
    return item;
  }

  /**
   * Store the terminal outcome of an in-flight item. When an identifier
   * occurs more than once, its slot keeps the outcome of the earliest input
   * position, whatever order the lookups finish in.
   */
  resolve(item: WorkItem, outcome: LookupOutcome): void {
    if (this.resolvedPositions.has(item.position)) {
      throw new Error(`Work item at position ${item.position} (${item.identifier}) already has an outcome`);
    }
    if (!this.inFlight.delete(item.position)) {
      throw new Error(`Work item at position ${item.position} (${item.identifier}) is not in flight`);
    }
    this.resolvedPositions.add(item.position);
    this.completedCount += 1;

    const existing = this.slots.get(item.identifier);
    if (!existing || item.position < existing.position) {
      this.slots.set(item.identifier, { position: item.position, outcome });
    }
  }

  /**
   * An in-flight item that was stopped before finishing stays pending
   */
  abandon(item: WorkItem): void {
    if (this.inFlight.delete(item.position)) {
      this.abandoned.set(item.position, item);
    }
  }

  outcomeOf(identifier: Identifier): LookupOutcome | undefined {
    return this.slots.get(identifier)?.outcome;
  }

  /** Snapshot copy of the results accumulated so far */
  resultSet(): ResultSet {
    const out = new Map<Identifier, LookupOutcome>();
    for (const [identifier, slot] of this.slots) {
      out.set(identifier, slot.outcome);
    }
    return out;
  }

  /**
   * Identifiers without a terminal outcome: never dispatched, in flight,
   * or abandoned. Input order, duplicates kept.
   */
  remaining(): Identifier[] {
    const open: WorkItem[] = [
      ...this.inFlight.values(),
      ...this.abandoned.values(),
      ...this.items.slice(this.cursor)
    ];
    return open.sort((a, b) => a.position - b.position).map(item => item.identifier);
  }
}
