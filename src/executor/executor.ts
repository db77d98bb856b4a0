/**
 * Executor
 *
 * Runs an execution plan wave by wave:
 * - waves strictly in sequence, up to `concurrency` operations at once inside a wave
 * - transient provider failures retried with backoff
 * - every success committed to the state store before the operation counts as done
 * - any failure drains the wave and stops the run (partially applied)
 * - cancellation stops new work and reaches in-flight handlers through their signal
 */

import { randomUUID } from "node:crypto";
import {
  FatalProviderError,
  isReconcileError,
  UnresolvedReferenceError,
} from "../errors.js";
import type { ResourceGraph } from "../graph/graph.js";
import { getLogger, type Logger } from "../logging/index.js";
import { planEntries } from "../plan/scheduler.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { StateStore } from "../state/store.js";
import type {
  AttributeValue,
  ExecutionPlan,
  HandlerContext,
  HandlerResult,
  LockToken,
  OperationResult,
  PlanEntry,
  PlanWave,
  ResolvedAttributes,
  ResourceRecord,
  RunReport,
  RunStatus,
  StateSnapshot,
} from "../types.js";
import { resolveRetryConfig, shouldRetry, withRetry, type RetryConfig, type RetryOptions } from "./retry.js";

export const DEFAULT_CONCURRENCY = 4;

export type ExecutorOptions = {
  registry: ProviderRegistry;
  store: StateStore;
  /** Operations running at once inside a wave. */
  concurrency?: number;
  retry?: RetryOptions;
  logger?: Logger;
  now?: () => Date;
  /** Jitter source for backoff delays. */
  random?: () => number;
  onOperationStart?: (entry: PlanEntry, wave: number) => void;
  onOperationComplete?: (result: OperationResult) => void;
};

export type ExecuteOptions = {
  /** Lock held for the plan's scope. */
  token: LockToken;
  /** Snapshot the plan was computed against. */
  snapshot: StateSnapshot | null;
  /** Desired graph; supplies names and dependencies of applied resources. */
  graph: ResourceGraph;
  signal?: AbortSignal;
  runId?: string;
};

type RunState = {
  plan: ExecutionPlan;
  runId: string;
  token: LockToken;
  graph: ResourceGraph;
  signal: AbortSignal;
  log: Logger;
  /** Records as actually applied so far. */
  working: Record<string, ResourceRecord>;
  /** Tail of the serialized commit chain. */
  commits: Promise<void>;
  finalVersion?: number;
  halted: boolean;
};

export class Executor {
  private registry: ProviderRegistry;
  private store: StateStore;
  private concurrency: number;
  private retry: RetryConfig;
  private log: Logger;
  private now: () => Date;
  private random: () => number;
  private onOperationStart: (entry: PlanEntry, wave: number) => void;
  private onOperationComplete: (result: OperationResult) => void;

  constructor(options: ExecutorOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.retry = resolveRetryConfig(options.retry);
    this.log = options.logger ?? getLogger("executor");
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
    this.onOperationStart = options.onOperationStart ?? (() => {});
    this.onOperationComplete = options.onOperationComplete ?? (() => {});
  }

  /**
   * Apply a plan. Operation failures end up in the report; only a failed
   * final snapshot write is thrown.
   */
  async execute(plan: ExecutionPlan, options: ExecuteOptions): Promise<RunReport> {
    const startedAt = this.now();
    const runId = options.runId ?? randomUUID();
    const state: RunState = {
      plan,
      runId,
      token: options.token,
      graph: options.graph,
      signal: options.signal ?? new AbortController().signal,
      log: this.log.withContext({ scope: plan.scope, runId }),
      working: structuredClone(options.snapshot?.resources ?? {}),
      commits: Promise.resolve(),
      halted: false,
    };

    const results = new Map<string, OperationResult>();
    for (const entry of planEntries(plan)) {
      results.set(entry.key, {
        key: entry.key,
        address: entry.address,
        kind: entry.operation.kind,
        phase: entry.phase,
        wave: entry.wave,
        status: "pending",
        attempts: 0,
        durationMs: 0,
      });
    }

    state.log.info("Run started", { planId: plan.id, waves: plan.waves.length, operations: results.size });

    for (const wave of plan.waves) {
      if (state.halted || state.signal.aborted) break;
      state.log.debug(`Wave ${wave.index} started`, { operations: wave.entries.length });
      await this.runWave(wave, state, results);
    }

    const operations = [...results.values()];
    for (const result of operations) {
      if (result.status === "pending") result.status = "skipped";
    }
    const failures = operations.filter((r) => r.status === "failed");

    let status: RunStatus = "applied";
    if (state.signal.aborted) status = "cancelled";
    else if (failures.length > 0) status = "partially-applied";

    await state.commits;
    if (status === "applied" && operations.length > 0) {
      await this.commit(state, true);
    }

    const completedAt = this.now();
    const report: RunReport = {
      runId,
      planId: plan.id,
      scope: plan.scope,
      status,
      operations,
      failures,
      finalVersion: state.finalVersion,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      totalDurationMs: completedAt.getTime() - startedAt.getTime(),
    };

    const summary = { status, failures: failures.length, finalVersion: state.finalVersion };
    if (status === "applied") state.log.info("Run finished", summary);
    else state.log.warn("Run finished", summary);
    return report;
  }

  // ---------------------------------------------------------------------------
  // Waves
  // ---------------------------------------------------------------------------

  private async runWave(wave: PlanWave, state: RunState, results: Map<string, OperationResult>): Promise<void> {
    const queue = [...wave.entries];

    const worker = async (): Promise<void> => {
      for (;;) {
        // After a failure or cancellation, in-flight work drains but nothing new starts
        if (state.halted || state.signal.aborted) return;
        const entry = queue.shift();
        if (!entry) return;
        const result = results.get(entry.key);
        if (result) await this.runEntry(entry, wave.index, result, state);
      }
    };

    const workers = Math.min(this.concurrency, queue.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));
  }

  private async runEntry(entry: PlanEntry, wave: number, result: OperationResult, state: RunState): Promise<void> {
    const log = state.log.withContext({ address: entry.address });
    const started = this.now();
    result.status = "in-progress";
    result.startedAt = started.toISOString();
    const node = state.graph.getNode(entry.address);
    if (node) node.status = "applying";
    this.onOperationStart(entry, wave);

    const handler = this.registry.get(entry.operation.type);
    const isRetryable = handler?.isRetryable;
    const classify = isRetryable ? (error: unknown) => isRetryable.call(handler, error) : undefined;

    const outcome = await withRetry((attempt) => this.perform(entry, state, attempt, log), {
      ...this.retry,
      signal: state.signal,
      random: this.random,
      isRetryable: classify,
      onRetry: ({ attempt, delayMs, error }) => {
        log.warn("Retrying operation", {
          key: entry.key,
          attempt,
          delayMs: Math.round(delayMs),
          error: error instanceof Error ? error.message : String(error),
        });
      },
    });
    result.attempts = outcome.attempts;

    let failure: unknown = outcome.ok ? undefined : outcome.error;
    if (outcome.ok) {
      try {
        await this.commit(state, false);
      } catch (err) {
        failure = err;
      }
    }

    const completed = this.now();
    result.completedAt = completed.toISOString();
    result.durationMs = completed.getTime() - started.getTime();

    if (failure === undefined) {
      result.status = "succeeded";
      if (node) node.status = entry.phase === "apply" ? "applied" : "destroyed";
      log.info(`${capitalize(entry.operation.kind)} succeeded`, { attempts: result.attempts });
    } else {
      result.status = "failed";
      if (node) node.status = "failed";
      result.error = describeFailure(failure, classify);
      state.halted = true;
      log.error(`${capitalize(entry.operation.kind)} failed`, {
        attempts: result.attempts,
        kind: result.error.kind,
        error: result.error.message,
      });
    }
    this.onOperationComplete({ ...result });
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  /** One attempt. The working records change only after the handler succeeds. */
  private async perform(entry: PlanEntry, state: RunState, attempt: number, logger: Logger): Promise<void> {
    const op = entry.operation;
    const handler = this.registry.require(op.type);
    const ctx: HandlerContext = {
      scope: state.plan.scope,
      address: entry.address,
      attempt,
      signal: state.signal,
      logger,
    };
    const prior = state.working[entry.address];

    switch (op.kind) {
      case "destroy": {
        if (!prior) {
          logger.warn("Resource already absent from state; nothing to destroy");
          return;
        }
        await handler.destroy(prior.externalId, prior, ctx);
        delete state.working[entry.address];
        return;
      }
      case "create": {
        const attributes = resolveAttributes(entry.address, op.after, state.working);
        const created = await handler.create(attributes, ctx);
        state.working[entry.address] = this.toRecord(entry, state, handler.schema.schemaVersion, attributes, created, prior);
        return;
      }
      case "update": {
        if (!prior) {
          throw new FatalProviderError(`No recorded state for ${entry.address}; cannot update it`);
        }
        const attributes = resolveAttributes(entry.address, op.after, state.working);
        const updated = await handler.update(prior.externalId, attributes, prior, ctx);
        state.working[entry.address] = this.toRecord(entry, state, handler.schema.schemaVersion, attributes, updated, prior);
        return;
      }
    }
  }

  private toRecord(
    entry: PlanEntry,
    state: RunState,
    schemaVersion: number,
    attributes: ResolvedAttributes,
    result: HandlerResult,
    prior: ResourceRecord | undefined,
  ): ResourceRecord {
    const node = state.graph.getNode(entry.address);
    return {
      address: entry.address,
      type: entry.operation.type,
      name: node?.name ?? entry.address.slice(entry.address.indexOf(".") + 1),
      schemaVersion,
      externalId: result.externalId,
      attributes,
      outputs: { ...result.attributes, id: result.externalId },
      dependencies: node ? [...node.dependencies].sort() : prior?.dependencies ?? [],
      updatedAt: this.now().toISOString(),
    };
  }

  /** Queue a snapshot of the working records; commits land in call order. */
  private commit(state: RunState, complete: boolean): Promise<StateSnapshot> {
    const draft = { runId: state.runId, complete, resources: structuredClone(state.working) };
    const write = state.commits.then(() => this.store.writeSnapshot(state.plan.scope, draft, state.token));
    state.commits = write.then(
      (snapshot) => {
        state.finalVersion = snapshot.version;
      },
      () => undefined,
    );
    return write;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Resolve declared attributes against applied records. A reference to an
 * attribute that is not (yet) recorded cannot be applied.
 */
export function resolveAttributes(
  address: string,
  declared: Record<string, AttributeValue>,
  records: Record<string, ResourceRecord>,
): ResolvedAttributes {
  const resolved: ResolvedAttributes = {};
  for (const [name, value] of Object.entries(declared)) {
    if (value.kind !== "ref") {
      resolved[name] = value.value;
      continue;
    }
    const target = records[value.target];
    const actual = target?.outputs[value.attribute] ?? target?.attributes[value.attribute];
    if (actual === undefined) {
      throw new UnresolvedReferenceError(address, value.target, value.attribute);
    }
    resolved[name] = actual;
  }
  return resolved;
}

function describeFailure(error: unknown, isRetryable?: (error: unknown) => boolean): { kind: string; message: string } {
  const message = error instanceof Error ? error.message : String(error);
  if (isReconcileError(error)) return { kind: error.kind, message };
  const kind = shouldRetry(error, isRetryable) ? "TransientProviderError" : "FatalProviderError";
  return { kind, message };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
