/**
 * Diff Engine
 *
 * Compares the desired graph with the last committed snapshot and produces a
 * change set: one operation per address (two for a replacement). References
 * to resources that will be created or replaced, and to computed attributes of
 * resources updated in place, are unknown until apply and count as changes.
 */

import { TypeMismatchError } from "../errors.js";
import { getLogger } from "../logging/index.js";
import type { ResourceGraph } from "../graph/graph.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type {
  AttributeChange,
  AttributeValue,
  ChangeOperation,
  ChangeSet,
  ResourceNode,
  ResourceRecord,
  ScalarValue,
  StateSnapshot,
} from "../types.js";

export const DEFAULT_SCOPE = "default";

/** A value known at plan time, or one only known after apply. */
export type Resolution = { known: true; value: ScalarValue } | { known: false };

const UNKNOWN: Resolution = { known: false };

/**
 * Compute the change set that moves `snapshot` to the desired `graph`.
 *
 * @throws TypeMismatchError when a recorded resource has another type or schema version
 */
export function diff(
  graph: ResourceGraph,
  snapshot: StateSnapshot | null,
  registry: ProviderRegistry,
  scope: string = snapshot?.scope ?? DEFAULT_SCOPE,
): ChangeSet {
  const records = snapshot?.resources ?? {};
  checkTypes(graph, records, registry);

  const recreated = new Set<string>();
  const updated = new Set<string>();
  const resolved = new Map<string, Map<string, Resolution>>();
  const operations: ChangeOperation[] = [];

  const resolveRef = (target: string, attribute: string): Resolution => {
    if (recreated.has(target)) return UNKNOWN;
    if (updated.has(target) && isComputed(graph, registry, target, attribute)) return UNKNOWN;
    const declared = resolved.get(target)?.get(attribute);
    if (declared) return declared;
    const record = records[target];
    const value = record?.outputs[attribute] ?? record?.attributes[attribute];
    return value === undefined ? UNKNOWN : { known: true, value };
  };

  // Dependencies first, so every reference target is settled before its dependents
  for (const address of graph.topologicalOrder()) {
    const node = graph.getNode(address);
    if (!node) continue;

    const values = new Map<string, Resolution>();
    for (const [name, value] of Object.entries(node.attributes)) {
      values.set(name, resolveValue(value, resolveRef));
    }
    resolved.set(address, values);

    const record = records[address];
    if (!record) {
      recreated.add(address);
      operations.push(createOp(node, false));
      continue;
    }

    const changes = compareAttributes(node, record, values, registry);
    if (changes.length === 0) {
      operations.push({ kind: "noop", address, type: node.type });
    } else if (changes.some((c) => c.replaceTrigger)) {
      recreated.add(address);
      operations.push({
        kind: "destroy",
        address,
        type: record.type,
        before: { ...record.attributes },
        after: null,
        replace: true,
        changes,
      });
      operations.push(createOp(node, true));
    } else {
      updated.add(address);
      operations.push({
        kind: "update",
        address,
        type: node.type,
        before: { ...record.attributes },
        after: { ...node.attributes },
        changes,
      });
    }
  }

  for (const address of Object.keys(records).sort()) {
    if (graph.hasNode(address)) continue;
    const record = records[address];
    operations.push({
      kind: "destroy",
      address,
      type: record.type,
      before: { ...record.attributes },
      after: null,
      replace: false,
    });
  }

  const changeSet: ChangeSet = { scope, baseVersion: snapshot?.version ?? 0, operations };
  getLogger("diff").debug("Change set computed", { scope, ...countKinds(changeSet) });
  return changeSet;
}

/** Whether applying the change set would do anything. */
export function hasChanges(changeSet: ChangeSet): boolean {
  return changeSet.operations.some((op) => op.kind !== "noop");
}

/** Resolve a declared value against already-resolved targets. */
export function resolveValue(
  value: AttributeValue,
  resolveRef: (target: string, attribute: string) => Resolution,
): Resolution {
  if (value.kind === "ref") return resolveRef(value.target, value.attribute);
  return { known: true, value: value.value };
}

// ── Internals ───────────────────────────────────────────────────

function checkTypes(graph: ResourceGraph, records: Record<string, ResourceRecord>, registry: ProviderRegistry): void {
  for (const node of graph.getNodes()) {
    const record = records[node.address];
    if (!record) continue;
    if (record.type !== node.type) {
      throw new TypeMismatchError(node.address, record.type, node.type);
    }
    const schema = registry.getSchema(node.type);
    if (schema && schema.schemaVersion !== record.schemaVersion) {
      throw new TypeMismatchError(
        node.address,
        `${record.type} (schema v${record.schemaVersion})`,
        `${node.type} (schema v${schema.schemaVersion})`,
      );
    }
  }
}

// The external id survives an in-place update; other computed outputs may not
function isComputed(graph: ResourceGraph, registry: ProviderRegistry, target: string, attribute: string): boolean {
  if (attribute === "id") return false;
  const type = graph.getNode(target)?.type;
  if (!type) return false;
  return registry.getSchema(type)?.attributes[attribute]?.computed ?? false;
}

function compareAttributes(
  node: ResourceNode,
  record: ResourceRecord,
  values: Map<string, Resolution>,
  registry: ProviderRegistry,
): AttributeChange[] {
  const schema = registry.getSchema(node.type);
  const names = new Set([...values.keys(), ...Object.keys(record.attributes)]);
  const changes: AttributeChange[] = [];

  for (const name of [...names].sort()) {
    const attrSpec = schema?.attributes[name];
    if (attrSpec?.computed) continue;

    const before = record.attributes[name];
    const desired = values.get(name);
    const replaceTrigger = attrSpec?.replaceOnChange ?? false;

    let after: ScalarValue | undefined;
    if (desired) {
      if (!desired.known) {
        changes.push({ attribute: name, before, after: undefined, unknown: true, replaceTrigger });
        continue;
      }
      after = desired.value;
    }
    if (after !== before) {
      changes.push({ attribute: name, before, after, unknown: false, replaceTrigger });
    }
  }
  return changes;
}

function createOp(node: ResourceNode, replace: boolean): ChangeOperation {
  return {
    kind: "create",
    address: node.address,
    type: node.type,
    before: null,
    after: { ...node.attributes },
    replace,
  };
}

function countKinds(changeSet: ChangeSet): Record<string, number> {
  const counts: Record<string, number> = { create: 0, update: 0, destroy: 0, noop: 0 };
  for (const op of changeSet.operations) counts[op.kind]++;
  return counts;
}
