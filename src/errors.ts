/**
 * converge: Error Types
 *
 * Every failure the engine reports is a ReconcileError with a discriminating
 * `kind`. Graph, diff and scheduling errors abort a run before any mutation;
 * provider errors are scoped to a single operation.
 */

export type ErrorKind =
  | "CycleDetected"
  | "UnresolvedReference"
  | "TypeMismatch"
  | "LockHeld"
  | "StaleLock"
  | "TransientProviderError"
  | "FatalProviderError"
  | "ValidationError"
  | "StalePlan"
  | "ConfigError";

// =============================================================================
// Base
// =============================================================================

export class ReconcileError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

/** Narrow an unknown error to a ReconcileError, optionally of a given kind. */
export function isReconcileError(error: unknown, kind?: ErrorKind): error is ReconcileError {
  if (!(error instanceof ReconcileError)) return false;
  return kind === undefined || error.kind === kind;
}

// =============================================================================
// Graph
// =============================================================================

export class CycleDetectedError extends ReconcileError {
  /** Cycle path; the first member is repeated at the end. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CycleDetected", `Dependency cycle detected: ${cycle.join(" → ")}`);
    this.cycle = cycle;
  }
}

export class UnresolvedReferenceError extends ReconcileError {
  readonly from: string;
  readonly target: string;
  readonly attribute?: string;

  constructor(from: string, target: string, attribute?: string) {
    const ref = attribute ? `${target}.${attribute}` : target;
    super("UnresolvedReference", `Resource "${from}" references "${ref}", which does not exist`);
    this.from = from;
    this.target = target;
    this.attribute = attribute;
  }
}

export class ValidationError extends ReconcileError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("ValidationError", issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.issues = issues;
  }
}

// =============================================================================
// Diff
// =============================================================================

export class TypeMismatchError extends ReconcileError {
  readonly address: string;
  readonly recorded: string;
  readonly declared: string;

  constructor(address: string, recorded: string, declared: string) {
    super(
      "TypeMismatch",
      `Resource "${address}" is recorded as ${recorded} but declared as ${declared}; migrate the state explicitly`,
    );
    this.address = address;
    this.recorded = recorded;
    this.declared = declared;
  }
}

// =============================================================================
// State
// =============================================================================

export class LockHeldError extends ReconcileError {
  readonly scope: string;
  readonly holder?: string;
  readonly acquiredAt?: string;

  constructor(scope: string, holder?: string, acquiredAt?: string) {
    const by = holder ? ` by ${holder}${acquiredAt ? ` since ${acquiredAt}` : ""}` : "";
    super("LockHeld", `Scope "${scope}" is locked${by}`);
    this.scope = scope;
    this.holder = holder;
    this.acquiredAt = acquiredAt;
  }
}

export class StaleLockError extends ReconcileError {
  readonly scope: string;
  readonly lockId: string;

  constructor(scope: string, lockId: string) {
    super("StaleLock", `Lock ${lockId} no longer holds scope "${scope}"`);
    this.scope = scope;
    this.lockId = lockId;
  }
}

export class StalePlanError extends ReconcileError {
  constructor(message: string) {
    super("StalePlan", message);
  }
}

export class ConfigError extends ReconcileError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("ConfigError", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

// =============================================================================
// Provider
// =============================================================================

export class TransientProviderError extends ReconcileError {
  /** Server-suggested delay before the next attempt, if any. */
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super("TransientProviderError", message, { cause: options?.cause });
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class FatalProviderError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FatalProviderError", message, options);
  }
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Format any thrown value into a one-line message, prefixed by its kind when known.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (error instanceof ReconcileError) return `[${error.kind}] ${error.message}`;
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? `[${error.code}] ` : "";
    return `${code}${error.message}`;
  }
  return String(error);
}
