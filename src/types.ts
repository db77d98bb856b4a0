/**
 * converge: Type Definitions
 *
 * Desired-state graph, resource schemas, state snapshots, change sets,
 * execution plans and run reports.
 */

import type { Logger } from "./logging/index.js";

// ── Attribute Values ────────────────────────────────────────────

/** A concrete value as recorded in state and passed to handlers. */
export type ScalarValue = string | number | boolean;

export type ScalarKind = "string" | "number" | "bool";

/** Declared attribute value: a typed literal or a reference to another resource's attribute. */
export type AttributeValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "ref"; target: string; attribute: string };

export type ResolvedAttributes = Record<string, ScalarValue>;

// ── Resource Schemas ────────────────────────────────────────────

export interface AttributeSpec {
  type: ScalarKind;
  required?: boolean;
  /** A change to this attribute destroys and re-creates the resource. */
  replaceOnChange?: boolean;
  /** Produced by the handler; may be referenced but never declared. */
  computed?: boolean;
  description?: string;
}

export interface ResourceTypeSchema {
  type: string;
  /** Bumped when the recorded attribute layout changes; mismatches need a migration. */
  schemaVersion: number;
  attributes: Record<string, AttributeSpec>;
}

// ── Desired-State Graph ─────────────────────────────────────────

export type ResourceStatus = "planned" | "applying" | "applied" | "failed" | "destroyed";

export interface ResourceNode {
  /** `<type>.<name>` */
  address: string;
  type: string;
  name: string;
  attributes: Record<string, AttributeValue>;
  /** Explicit `dependsOn` entries. */
  dependsOn: string[];
  /** Explicit and inferred dependencies (addresses this node depends on). */
  dependencies: string[];
  status: ResourceStatus;
}

// ── State ───────────────────────────────────────────────────────

export interface ResourceRecord {
  address: string;
  type: string;
  name: string;
  schemaVersion: number;
  /** Provider-assigned identifier. */
  externalId: string;
  /** Resolved inputs as last applied. */
  attributes: ResolvedAttributes;
  /** Handler results, always including `id`. */
  outputs: ResolvedAttributes;
  dependencies: string[];
  updatedAt: string;
}

export interface StateSnapshot {
  scope: string;
  /** Monotonically increasing per scope; 0 for a snapshot not yet committed. */
  version: number;
  createdAt: string;
  /** Run that wrote this snapshot. */
  runId?: string;
  /** False for incremental commits written while a run was still applying. */
  complete: boolean;
  resources: Record<string, ResourceRecord>;
}

/** Snapshot content as handed to the store; the store assigns version and timestamp. */
export type SnapshotDraft = Pick<StateSnapshot, "runId" | "complete" | "resources">;

export interface SnapshotVersionInfo {
  version: number;
  createdAt: string;
  runId?: string;
  complete: boolean;
  resourceCount: number;
}

// ── Locks ───────────────────────────────────────────────────────

export interface LockToken {
  id: string;
  scope: string;
  /** Lock generation; strictly increasing per scope, including across reclamations. */
  fence: number;
  holder: string;
  operation: string;
  acquiredAt: string;
  leaseExpiresAt: string;
}

export type LockWaitStrategy =
  | { mode: "fail-fast" }
  | { mode: "wait"; timeoutMs: number; pollIntervalMs?: number };

export interface AcquireLockOptions {
  operation?: string;
  holder?: string;
  wait?: LockWaitStrategy;
}

// ── Change Set ──────────────────────────────────────────────────

export type ChangeKind = "create" | "update" | "destroy" | "noop";

export interface AttributeChange {
  attribute: string;
  before: ScalarValue | undefined;
  /** `undefined` with `unknown: true` means "known after apply". */
  after: ScalarValue | undefined;
  unknown: boolean;
  replaceTrigger: boolean;
}

export type ChangeOperation =
  | {
      kind: "create";
      address: string;
      type: string;
      before: null;
      after: Record<string, AttributeValue>;
      replace: boolean;
    }
  | {
      kind: "update";
      address: string;
      type: string;
      before: ResolvedAttributes;
      after: Record<string, AttributeValue>;
      changes: AttributeChange[];
    }
  | {
      kind: "destroy";
      address: string;
      type: string;
      before: ResolvedAttributes;
      after: null;
      replace: boolean;
      /** Present on the destroy half of a replacement. */
      changes?: AttributeChange[];
    }
  | {
      kind: "noop";
      address: string;
      type: string;
    };

export interface ChangeSet {
  scope: string;
  /** Version of the snapshot the diff was computed against (0 when none). */
  baseVersion: number;
  operations: ChangeOperation[];
}

// ── Execution Plan ──────────────────────────────────────────────

export type PlanPhase = "destroy" | "apply";

export interface PlanEntry {
  /** `<address>#<phase>`, unique within a plan. */
  key: string;
  address: string;
  phase: PlanPhase;
  operation: Exclude<ChangeOperation, { kind: "noop" }>;
}

export interface PlanWave {
  index: number;
  entries: PlanEntry[];
}

export interface ExecutionPlan {
  id: string;
  scope: string;
  baseVersion: number;
  createdAt: string;
  waves: PlanWave[];
}

export interface PlanSummary {
  creates: number;
  updates: number;
  destroys: number;
  replaces: number;
  waves: number;
}

// ── Handlers ────────────────────────────────────────────────────

export interface HandlerContext {
  scope: string;
  address: string;
  attempt: number;
  signal: AbortSignal;
  logger: Logger;
}

export interface HandlerResult {
  externalId: string;
  attributes: ResolvedAttributes;
}

/** Provider-agnostic handler for one resource type. */
export interface ResourceHandler {
  readonly type: string;
  readonly schema: ResourceTypeSchema;

  create(attributes: ResolvedAttributes, ctx: HandlerContext): Promise<HandlerResult>;
  /** Current attributes of an existing resource, or null when it is gone. */
  read?(externalId: string, ctx: HandlerContext): Promise<ResolvedAttributes | null>;
  update(
    externalId: string,
    attributes: ResolvedAttributes,
    prior: ResourceRecord,
    ctx: HandlerContext,
  ): Promise<HandlerResult>;
  destroy(externalId: string, prior: ResourceRecord, ctx: HandlerContext): Promise<void>;
  /** Classify errors that are neither Transient- nor FatalProviderError. */
  isRetryable?(error: unknown): boolean;
}

// ── Execution Results ───────────────────────────────────────────

export type OperationStatus = "pending" | "in-progress" | "succeeded" | "failed" | "skipped";

export interface OperationResult {
  key: string;
  address: string;
  kind: Exclude<ChangeKind, "noop">;
  phase: PlanPhase;
  wave: number;
  status: OperationStatus;
  attempts: number;
  durationMs: number;
  error?: {
    kind: string;
    message: string;
  };
  startedAt?: string;
  completedAt?: string;
}

export type RunStatus = "applied" | "partially-applied" | "cancelled";

export interface RunReport {
  runId: string;
  planId: string;
  scope: string;
  status: RunStatus;
  operations: OperationResult[];
  failures: OperationResult[];
  /** Version of the last snapshot this run committed, if any. */
  finalVersion?: number;
  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
}

// ── Verification ────────────────────────────────────────────────

export interface VerifyFinding {
  address: string;
  status: "in-sync" | "missing" | "diverged" | "unreadable" | "unsupported";
  differences?: Array<{ attribute: string; recorded: ScalarValue | undefined; actual: ScalarValue | undefined }>;
  error?: string;
}

export interface VerifyReport {
  scope: string;
  version: number;
  checkedAt: string;
  findings: VerifyFinding[];
}
