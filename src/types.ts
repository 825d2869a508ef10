/** Enforcement-procedure number, e.g. "12345/21/77001-ИП" */
export type Identifier = string;

export type FailureReason =
  | "exhausted"
  | "invalid_identifier"
  | "rejected"
  | "malformed_response";

export type LookupOutcome =
  | { status: "found"; amount: number; attempts: number }
  | { status: "not_found"; attempts: number }
  | { status: "failed"; reason: FailureReason; attempts: number; message: string };

export type ResultSet = ReadonlyMap<Identifier, LookupOutcome>;

/** One unit of work: an identifier at a given input position (0-indexed) */
export type WorkItem = {
  position: number;
  identifier: Identifier;
};

export type InputRow = {
  position: number;
  identifier: Identifier;
  // Amount already present in the input file, if any
  existingAmount?: number;
};

export type DuplicatePolicy = "process" | "once";
export type ExistingAmountPolicy = "skip" | "reverify";

export type RunSummary = {
  total: number;
  completed: number;
  found: number;
  notFound: number;
  failed: number;
  attempts: number;
  totalDebt: number;
  remaining: number;
  // Rows not queried because the input already carried an amount
  skipped: number;
  partial: boolean;
  startedAt: number;
  endedAt: number;
  warnings: string[];
};

export type RunResult = {
  results: ResultSet;
  partial: boolean;
  // Identifiers that never reached a terminal outcome (cancelled runs only)
  remaining: Identifier[];
  summary: RunSummary;
};

export type ProgressCounts = {
  completed: number;
  total: number;
};
