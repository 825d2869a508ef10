export type FatalRunCode = "auth_rejected" | "insufficient_balance";

const FATAL_PREFIX: Record<FatalRunCode, string> = {
  auth_rejected: "authentication rejected by the lookup service",
  insufficient_balance: "lookup service account balance is exhausted"
};

/**
 * A failure that invalidates the whole run (bad credentials, no balance).
 * Never produced for a single identifier's problem.
 */
export class FatalRunError extends Error {
  readonly code: FatalRunCode;
  readonly identifier?: string;

  constructor(code: FatalRunCode, detail: string, identifier?: string) {
    super(detail ? `${FATAL_PREFIX[code]}: ${detail}` : FATAL_PREFIX[code]);
    this.name = "FatalRunError";
    this.code = code;
    this.identifier = identifier;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(problems.length === 1 ? problems[0] : `Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
    this.problems = problems;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
