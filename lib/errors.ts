/**
 * Error taxonomy for reconciliation passes.
 *
 * - parse: a malformed calendar, commit or attendance record. The record is skipped.
 * - network: one external call failed. The unit is recorded as failed and the pass continues.
 * - configuration: identity or credentials missing. The pass never starts.
 * - inconsistency: time that could not be attributed. Dropped and logged.
 */

export type ReconcileErrorKind = "parse" | "network" | "configuration" | "inconsistency";

export class ReconcileError extends Error {
  readonly kind: ReconcileErrorKind;

  constructor(message: string, kind: ReconcileErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = "ReconcileError";
    this.kind = kind;
  }
}

export class ParseError extends ReconcileError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "parse", options);
    this.name = "ParseError";
  }
}

export class NetworkError extends ReconcileError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super(message, "network", options);
    this.name = "NetworkError";
    this.status = status;
  }
}

export class ConfigurationError extends ReconcileError {
  readonly problems: string[];

  constructor(problems: string[], options?: ErrorOptions) {
    super(`Invalid configuration: ${problems.join("; ")}`, "configuration", options);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

export class ReconciliationInconsistency extends ReconcileError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "inconsistency", options);
    this.name = "ReconciliationInconsistency";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

// ============================================================================
// Trace
// ============================================================================

export interface Trace {
  lines: string[];
  log: (message: string) => void;
}

/**
 * Collects trace lines for a pass and forwards each one to an optional
 * progress callback.
 */
export function createTrace(onProgress?: (message: string) => void): Trace {
  const lines: string[] = [];
  return {
    lines,
    log(message: string) {
      lines.push(message);
      onProgress?.(message);
    },
  };
}

/**
 * Record a skipped or dropped unit in the trace, tagged with its error kind.
 */
export function traceError(trace: Trace, error: unknown): void {
  if (error instanceof ReconcileError) {
    trace.log(`[${error.kind}] ${error.message}`);
    return;
  }
  trace.log(`[error] ${errorMessage(error)}`);
}

// ============================================================================
// Unit Outcomes
// ============================================================================

export interface UnitOutcome {
  /** What was attempted, e.g. "commits:42" or "worklogs:ABC-1" */
  unit: string;
  status: "ok" | "failed";
  message: string;
}

/**
 * Run one unit of external work. A failure is recorded and traced instead
 * of propagating, so the pass continues with the next unit.
 */
export async function runUnit<T>(
  unit: string,
  outcomes: UnitOutcome[],
  trace: Trace,
  work: () => Promise<T>
): Promise<T | null> {
  try {
    const result = await work();
    outcomes.push({ unit, status: "ok", message: "" });
    return result;
  } catch (error) {
    outcomes.push({ unit, status: "failed", message: errorMessage(error) });
    traceError(trace, error);
    return null;
  }
}

export function countFailures(outcomes: readonly UnitOutcome[]): number {
  return outcomes.filter(o => o.status === "failed").length;
}
