/**
 * Resource Graph Builder
 *
 * Turns a validated desired-state document into a ResourceGraph:
 * - validates every declaration against its resource type schema
 * - turns references and `dependsOn` entries into dependency edges
 * - rejects references to missing resources and dependency cycles
 *
 * Pure transformation; nothing is read or written.
 */

import { CycleDetectedError, UnresolvedReferenceError, ValidationError } from "../errors.js";
import { getLogger } from "../logging/index.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { AttributeValue, ResourceNode, ResourceTypeSchema } from "../types.js";
import { formatAddress, parseDocument, toAttributeValue } from "./document.js";
import { ResourceGraph } from "./graph.js";

/** Attribute every resource exposes once applied. */
export const ID_ATTRIBUTE = "id";

/**
 * Build and validate the dependency graph of a desired-state document.
 *
 * @throws ValidationError when declarations do not match their schemas
 * @throws UnresolvedReferenceError when a reference or dependsOn target is missing
 * @throws CycleDetectedError when the dependencies form a cycle
 */
export function buildGraph(input: unknown, registry: ProviderRegistry): ResourceGraph {
  const document = parseDocument(input);
  const graph = new ResourceGraph();
  const issues: string[] = [];

  for (const decl of document.resources) {
    const address = formatAddress(decl.type, decl.name);
    if (graph.hasNode(address)) {
      issues.push(`${address}: declared more than once`);
      continue;
    }

    const attributes: Record<string, AttributeValue> = {};
    for (const [name, raw] of Object.entries(decl.attributes)) {
      attributes[name] = toAttributeValue(raw);
    }

    const schema = registry.getSchema(decl.type);
    if (!schema) {
      issues.push(`${address}: unknown resource type "${decl.type}"`);
    } else {
      issues.push(...validateAttributes(address, attributes, schema));
    }

    graph.addNode({
      address,
      type: decl.type,
      name: decl.name,
      attributes,
      dependsOn: [...new Set(decl.dependsOn)],
      dependencies: [],
      status: "planned",
    });
  }

  if (issues.length > 0) {
    throw new ValidationError("Invalid desired state", issues);
  }

  for (const node of graph.getNodes()) {
    wireDependencies(graph, node, registry);
  }

  const cycle = graph.findCycle();
  if (cycle) {
    throw new CycleDetectedError(cycle);
  }

  getLogger("graph").debug("Graph built", { nodes: graph.size, edges: graph.edgeCount() });
  return graph;
}

/**
 * Check declared attributes against a type schema. Returns issue messages.
 */
export function validateAttributes(
  address: string,
  attributes: Record<string, AttributeValue>,
  schema: ResourceTypeSchema,
): string[] {
  const issues: string[] = [];

  for (const [name, value] of Object.entries(attributes)) {
    const attrSpec = schema.attributes[name];
    if (!attrSpec) {
      issues.push(`${address}: unknown attribute "${name}" for type "${schema.type}"`);
      continue;
    }
    if (attrSpec.computed) {
      issues.push(`${address}: attribute "${name}" is computed and cannot be set`);
      continue;
    }
    if (value.kind !== "ref" && value.kind !== attrSpec.type) {
      issues.push(`${address}: attribute "${name}" must be ${attrSpec.type}, got ${value.kind}`);
    }
  }

  for (const [name, attrSpec] of Object.entries(schema.attributes)) {
    if (attrSpec.required && !attrSpec.computed && !(name in attributes)) {
      issues.push(`${address}: missing required attribute "${name}"`);
    }
  }

  return issues;
}

function wireDependencies(graph: ResourceGraph, node: ResourceNode, registry: ProviderRegistry): void {
  for (const target of node.dependsOn) {
    if (!graph.hasNode(target)) {
      throw new UnresolvedReferenceError(node.address, target);
    }
    graph.addDependency(node.address, target);
  }

  for (const value of Object.values(node.attributes)) {
    if (value.kind !== "ref") continue;

    const target = graph.getNode(value.target);
    if (!target) {
      throw new UnresolvedReferenceError(node.address, value.target, value.attribute);
    }
    if (!exposesAttribute(registry.getSchema(target.type), value.attribute)) {
      throw new UnresolvedReferenceError(node.address, value.target, value.attribute);
    }
    graph.addDependency(node.address, value.target);
  }
}

function exposesAttribute(schema: ResourceTypeSchema | undefined, attribute: string): boolean {
  if (attribute === ID_ATTRIBUTE) return true;
  return schema !== undefined && attribute in schema.attributes;
}
