/**
 * Failure taxonomy for a deck run. Each class carries the process exit code
 * the CLI reports for it:
 *   1 = runtime failure (upstream API, invalid outline, output I/O)
 *   2 = usage or configuration error
 */
export class DeckError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class UsageError extends DeckError {
  constructor(message: string) {
    super(message, 2);
  }
}

export class ConfigError extends DeckError {
  constructor(message: string) {
    super(message, 2);
  }
}

/** Chat or image API failure: network, auth, quota, malformed reply. */
export class UpstreamError extends DeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1, options);
  }
}

/** Planner output that does not fit the outline structure. */
export class OutlineError extends DeckError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(message, 1, options);
    this.issues = issues;
  }
}

export class OutputError extends DeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1, options);
  }
}

/** Best-effort message for an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
