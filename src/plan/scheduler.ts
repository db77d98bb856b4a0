/**
 * Plan Scheduler
 *
 * Layers a change set into waves (Kahn's algorithm). Creates and updates run
 * after the entries they depend on; destroys run after the destroys of
 * everything that depends on them. A replacement is split into a destroy-phase
 * and an apply-phase entry joined by a strict edge.
 */

import { randomUUID } from "node:crypto";
import { CycleDetectedError } from "../errors.js";
import type { ResourceGraph } from "../graph/graph.js";
import { getLogger } from "../logging/index.js";
import type { ChangeSet, ExecutionPlan, PlanEntry, PlanPhase, PlanSummary, PlanWave, StateSnapshot } from "../types.js";
import { deepFreeze } from "../utils.js";

export type ScheduleOptions = {
  /** Defaults to the change set's scope. */
  scope?: string;
  /** Defaults to the change set's base version. */
  baseVersion?: number;
  id?: string;
  now?: () => Date;
};

const PHASE_ORDER: Record<PlanPhase, number> = { destroy: 0, apply: 1 };

export function entryKey(address: string, phase: PlanPhase): string {
  return `${address}#${phase}`;
}

/**
 * Order a change set into an immutable execution plan.
 *
 * @throws CycleDetectedError when the ordering edges cannot be layered
 */
export function schedule(
  changeSet: ChangeSet,
  graph: ResourceGraph,
  snapshot: StateSnapshot | null,
  options: ScheduleOptions = {},
): ExecutionPlan {
  const entries = new Map<string, PlanEntry>();
  for (const operation of changeSet.operations) {
    if (operation.kind === "noop") continue;
    const phase: PlanPhase = operation.kind === "destroy" ? "destroy" : "apply";
    const key = entryKey(operation.address, phase);
    entries.set(key, { key, address: operation.address, phase, operation });
  }

  const records = snapshot?.resources ?? {};
  const desiredDeps = (address: string): string[] =>
    graph.hasNode(address) ? graph.dependenciesOf(address) : records[address]?.dependencies ?? [];
  const recordedDeps = (address: string): string[] =>
    records[address]?.dependencies ?? (graph.hasNode(address) ? graph.dependenciesOf(address) : []);

  // before → entries that must wait for it
  const successors = new Map<string, Set<string>>();
  const inDegree = new Map<string, number>();
  for (const key of entries.keys()) {
    successors.set(key, new Set());
    inDegree.set(key, 0);
  }
  const addEdge = (before: string, after: string): void => {
    const next = successors.get(before);
    if (!next || next.has(after) || before === after) return;
    next.add(after);
    inDegree.set(after, (inDegree.get(after) ?? 0) + 1);
  };

  for (const entry of entries.values()) {
    if (entry.phase === "apply") {
      for (const dep of nearestWithEntry(entry.address, desiredDeps, "apply", entries)) {
        addEdge(entryKey(dep, "apply"), entry.key);
      }
      const destroyKey = entryKey(entry.address, "destroy");
      if (entries.has(destroyKey)) addEdge(destroyKey, entry.key);
    } else {
      for (const dep of nearestWithEntry(entry.address, recordedDeps, "destroy", entries)) {
        addEdge(entry.key, entryKey(dep, "destroy"));
      }
    }
  }

  const waves = layer(entries, successors, inDegree);
  const plan: ExecutionPlan = {
    id: options.id ?? randomUUID(),
    scope: options.scope ?? changeSet.scope,
    baseVersion: options.baseVersion ?? changeSet.baseVersion,
    createdAt: (options.now?.() ?? new Date()).toISOString(),
    waves,
  };

  getLogger("plan").debug("Plan scheduled", { scope: plan.scope, entries: entries.size, waves: waves.length });
  return deepFreeze(plan);
}

/** Count operations by kind; a replacement counts once, as a replace. */
export function summarizePlan(plan: ExecutionPlan): PlanSummary {
  const summary: PlanSummary = { creates: 0, updates: 0, destroys: 0, replaces: 0, waves: plan.waves.length };
  for (const wave of plan.waves) {
    for (const { operation } of wave.entries) {
      if (operation.kind === "update") summary.updates++;
      else if (operation.kind === "create" && !operation.replace) summary.creates++;
      else if (operation.kind === "destroy") {
        if (operation.replace) summary.replaces++;
        else summary.destroys++;
      }
    }
  }
  return summary;
}

/** Every entry of a plan, in wave order. */
export function planEntries(plan: ExecutionPlan): Array<PlanEntry & { wave: number }> {
  return plan.waves.flatMap((wave) => wave.entries.map((entry) => ({ ...entry, wave: wave.index })));
}

// ── Internals ───────────────────────────────────────────────────

/**
 * Dependencies of `address` that have an entry in `phase`, looking through
 * dependencies without one (noop nodes) transitively.
 */
function nearestWithEntry(
  address: string,
  depsOf: (address: string) => string[],
  phase: PlanPhase,
  entries: Map<string, PlanEntry>,
): string[] {
  const found = new Set<string>();
  const seen = new Set<string>([address]);
  const queue = [...depsOf(address)];

  while (queue.length > 0) {
    const dep = queue.shift();
    if (dep === undefined || seen.has(dep)) continue;
    seen.add(dep);
    if (entries.has(entryKey(dep, phase))) {
      found.add(dep);
    } else {
      queue.push(...depsOf(dep));
    }
  }
  return [...found].sort();
}

function layer(
  entries: Map<string, PlanEntry>,
  successors: Map<string, Set<string>>,
  inDegree: Map<string, number>,
): PlanWave[] {
  const remaining = new Map(inDegree);
  const waves: PlanWave[] = [];

  while (remaining.size > 0) {
    const ready = [...remaining].filter(([, d]) => d === 0).map(([key]) => key);
    if (ready.length === 0) {
      throw new CycleDetectedError(findCycle(remaining, successors));
    }

    const waveEntries: PlanEntry[] = [];
    for (const key of ready) {
      remaining.delete(key);
      const entry = entries.get(key);
      if (entry) waveEntries.push(entry);
    }
    for (const key of ready) {
      for (const next of successors.get(key) ?? []) {
        const d = remaining.get(next);
        if (d !== undefined) remaining.set(next, d - 1);
      }
    }

    waveEntries.sort((a, b) =>
      a.address === b.address ? PHASE_ORDER[a.phase] - PHASE_ORDER[b.phase] : a.address < b.address ? -1 : 1,
    );
    waves.push({ index: waves.length, entries: waveEntries });
  }
  return waves;
}

/**
 * Every stalled entry waits on another stalled entry, so walking predecessors
 * from any of them must revisit one.
 */
function findCycle(remaining: Map<string, number>, successors: Map<string, Set<string>>): string[] {
  const predecessorOf = (key: string): string | undefined => {
    for (const [before, next] of successors) {
      if (remaining.has(before) && next.has(key)) return before;
    }
    return undefined;
  };

  const path: string[] = [];
  let current: string | undefined = [...remaining.keys()].sort()[0];
  while (current !== undefined && !path.includes(current)) {
    path.push(current);
    current = predecessorOf(current);
  }
  if (current === undefined) return path;

  const cycle = path.slice(path.indexOf(current)).reverse();
  return [...cycle, cycle[0]];
}
