/**
 * Reconciler
 *
 * Ties the pipeline together for one scope: document → graph → diff → plan →
 * locked execution. Planning never locks; apply, destroy and saved-plan
 * application hold the scope lock for the whole run and always release it.
 */

import { StalePlanError } from "./errors.js";
import { Executor, type ExecutorOptions } from "./executor/executor.js";
import type { RetryOptions } from "./executor/retry.js";
import { diff } from "./diff/diff.js";
import { buildGraph } from "./graph/builder.js";
import type { ResourceGraph } from "./graph/graph.js";
import { getLogger, type Logger } from "./logging/index.js";
import { schedule } from "./plan/scheduler.js";
import type { ProviderRegistry } from "./providers/registry.js";
import { InMemoryStateStorage, SQLiteStateStorage, type StateStorage } from "./state/storage.js";
import { StateStore } from "./state/store.js";
import type { ConvergeConfig } from "./config.js";
import { lockWaitStrategy } from "./config.js";
import type {
  ChangeSet,
  ExecutionPlan,
  LockToken,
  LockWaitStrategy,
  ResolvedAttributes,
  ResourceRecord,
  RunReport,
  StateSnapshot,
  VerifyFinding,
  VerifyReport,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type ReconcilerOptions = {
  registry: ProviderRegistry;
  store: StateStore;
  concurrency?: number;
  retry?: RetryOptions;
  /** How apply and destroy wait for a held lock; fail-fast by default. */
  lockWait?: LockWaitStrategy;
  holder?: string;
  logger?: Logger;
  /** Hooks and clocks passed through to the executor. */
  executor?: Pick<ExecutorOptions, "onOperationStart" | "onOperationComplete" | "now" | "random">;
};

export type PlanResult = {
  graph: ResourceGraph;
  snapshot: StateSnapshot | null;
  changeSet: ChangeSet;
  plan: ExecutionPlan;
};

export type ApplyOptions = {
  /** Previously reviewed plan; rejected when the state or document moved on. */
  savedPlan?: ExecutionPlan;
  signal?: AbortSignal;
  /** Overrides the reconciler's lock wait strategy for this run. */
  wait?: LockWaitStrategy;
};

export type ApplyResult = {
  plan: ExecutionPlan;
  report: RunReport;
};

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  readonly registry: ProviderRegistry;
  readonly store: StateStore;
  private executor: Executor;
  private lockWait: LockWaitStrategy;
  private holder?: string;
  private log: Logger;

  constructor(options: ReconcilerOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.lockWait = options.lockWait ?? { mode: "fail-fast" };
    this.holder = options.holder;
    this.log = options.logger ?? getLogger("reconciler");
    this.executor = new Executor({
      registry: options.registry,
      store: options.store,
      concurrency: options.concurrency,
      retry: options.retry,
      logger: this.log.child("executor"),
      ...options.executor,
    });
  }

  /** Compute the plan for `document` against the latest snapshot, without locking. */
  async plan(document: unknown, scope: string): Promise<PlanResult> {
    const snapshot = await this.store.readSnapshot(scope);
    return this.compute(document, scope, snapshot);
  }

  /**
   * Apply `document` to `scope`.
   *
   * @throws LockHeldError when another run holds the scope
   * @throws StalePlanError when a saved plan no longer matches the state or document
   */
  async apply(document: unknown, scope: string, options: ApplyOptions = {}): Promise<ApplyResult> {
    return this.locked(scope, "apply", options.wait, async (token) => {
      const snapshot = await this.store.readSnapshot(scope);
      const computed = this.compute(document, scope, snapshot);
      const plan = options.savedPlan ? checkSavedPlan(options.savedPlan, computed.plan, scope) : computed.plan;

      const report = await this.executor.execute(plan, {
        token,
        snapshot,
        graph: computed.graph,
        signal: options.signal,
      });
      return { plan, report };
    });
  }

  /** Destroy every resource recorded for `scope`. */
  async destroyAll(scope: string, options: Omit<ApplyOptions, "savedPlan"> = {}): Promise<ApplyResult> {
    return this.apply({ resources: [] }, scope, options);
  }

  /**
   * Read every recorded resource back through its handler and compare it with
   * the recorded attributes. Never changes state.
   */
  async verify(scope: string): Promise<VerifyReport> {
    const snapshot = await this.store.readSnapshot(scope);
    const findings: VerifyFinding[] = [];
    const records = snapshot?.resources ?? {};

    for (const address of Object.keys(records).sort()) {
      findings.push(await this.verifyRecord(scope, records[address]));
    }

    const report: VerifyReport = {
      scope,
      version: snapshot?.version ?? 0,
      checkedAt: new Date().toISOString(),
      findings,
    };
    const drifted = findings.filter((f) => f.status !== "in-sync").length;
    this.log.info("Verification finished", { scope, resources: findings.length, drifted });
    return report;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private compute(document: unknown, scope: string, snapshot: StateSnapshot | null): PlanResult {
    const graph = buildGraph(document, this.registry);
    const changeSet = diff(graph, snapshot, this.registry, scope);
    const plan = schedule(changeSet, graph, snapshot, { scope });
    return { graph, snapshot, changeSet, plan };
  }

  private async locked<T>(
    scope: string,
    operation: string,
    wait: LockWaitStrategy | undefined,
    fn: (token: LockToken) => Promise<T>,
  ): Promise<T> {
    const token = await this.store.acquireLock(scope, {
      operation,
      holder: this.holder,
      wait: wait ?? this.lockWait,
    });
    try {
      return await fn(token);
    } finally {
      const released = await this.store.releaseLock(scope, token);
      if (!released) {
        this.log.warn("Lock was no longer held at release", { scope, lockId: token.id });
      }
    }
  }

  private async verifyRecord(scope: string, record: ResourceRecord): Promise<VerifyFinding> {
    const handler = this.registry.get(record.type);
    if (!handler?.read) {
      return { address: record.address, status: "unsupported" };
    }

    let actual: ResolvedAttributes | null;
    try {
      actual = await handler.read(record.externalId, {
        scope,
        address: record.address,
        attempt: 1,
        signal: new AbortController().signal,
        logger: this.log.withContext({ scope, address: record.address }),
      });
    } catch (err) {
      return { address: record.address, status: "unreadable", error: err instanceof Error ? err.message : String(err) };
    }

    if (actual === null) return { address: record.address, status: "missing" };

    const differences = compareRecorded(record.attributes, actual);
    return differences.length === 0
      ? { address: record.address, status: "in-sync" }
      : { address: record.address, status: "diverged", differences };
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** Compare recorded inputs with what the handler reads back; attributes it does not report are skipped. */
function compareRecorded(
  recorded: ResolvedAttributes,
  actual: ResolvedAttributes,
): NonNullable<VerifyFinding["differences"]> {
  return Object.keys(recorded)
    .sort()
    .filter((attribute) => attribute in actual && recorded[attribute] !== actual[attribute])
    .map((attribute) => ({ attribute, recorded: recorded[attribute], actual: actual[attribute] }));
}

/**
 * A saved plan applies only to the scope and state version it was computed
 * against, and only while the document still yields the same operations.
 */
function checkSavedPlan(saved: ExecutionPlan, fresh: ExecutionPlan, scope: string): ExecutionPlan {
  if (saved.scope !== scope) {
    throw new StalePlanError(`Saved plan ${saved.id} targets scope "${saved.scope}", not "${scope}"`);
  }
  if (saved.baseVersion !== fresh.baseVersion) {
    throw new StalePlanError(
      `Saved plan ${saved.id} was computed against version ${saved.baseVersion}; scope "${scope}" is at version ${fresh.baseVersion}`,
    );
  }
  if (fingerprint(saved) !== fingerprint(fresh)) {
    throw new StalePlanError(`Saved plan ${saved.id} no longer matches the desired state; plan again`);
  }
  return saved;
}

/** Canonical JSON of a plan's waves, independent of id, timestamp and key order. */
function fingerprint(plan: ExecutionPlan): string {
  return JSON.stringify(plan.waves, (_key, value: unknown) => {
    if (value === null || typeof value !== "object" || Array.isArray(value)) return value;
    return Object.fromEntries(Object.entries(value).sort(([a], [b]) => a.localeCompare(b)));
  });
}

// =============================================================================
// Factory
// =============================================================================

export function createStateStorage(config: ConvergeConfig): StateStorage {
  return config.state.backend === "sqlite" ? new SQLiteStateStorage(config.state.path) : new InMemoryStateStorage();
}

/** Reconciler wired from configuration; call `store.initialize()` before use. */
export function createReconciler(config: ConvergeConfig, registry: ProviderRegistry, storage?: StateStorage): Reconciler {
  const store = new StateStore(storage ?? createStateStorage(config), {
    leaseMs: config.state.leaseMs,
    defaultWait: lockWaitStrategy(config),
    holder: config.state.holder,
  });
  return new Reconciler({
    registry,
    store,
    concurrency: config.executor.concurrency,
    retry: config.executor.retry,
    lockWait: lockWaitStrategy(config),
    holder: config.state.holder,
  });
}
