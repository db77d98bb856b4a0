/**
 * Resource Graph
 *
 * Directed dependency graph over resource nodes. An edge `from → to` means
 * `from` depends on `to`. Cycle detection and a stable topological order.
 */

import type { ResourceNode } from "../types.js";

export class ResourceGraph {
  private nodes = new Map<string, ResourceNode>();
  /** address → addresses it depends on */
  private edges = new Map<string, Set<string>>();
  /** address → addresses depending on it */
  private reverseEdges = new Map<string, Set<string>>();

  addNode(node: ResourceNode): void {
    if (this.nodes.has(node.address)) {
      throw new Error(`Node "${node.address}" already exists`);
    }
    this.nodes.set(node.address, node);
    this.edges.set(node.address, new Set());
    this.reverseEdges.set(node.address, new Set());
  }

  /**
   * Record that `from` depends on `to`. Both nodes must already exist.
   */
  addDependency(from: string, to: string): void {
    const deps = this.edges.get(from);
    const dependents = this.reverseEdges.get(to);
    if (!deps || !dependents) {
      throw new Error(`Cannot add edge ${from} → ${to}: unknown node`);
    }
    deps.add(to);
    dependents.add(from);

    const node = this.nodes.get(from);
    if (node && !node.dependencies.includes(to)) {
      node.dependencies.push(to);
    }
  }

  getNode(address: string): ResourceNode | undefined {
    return this.nodes.get(address);
  }

  hasNode(address: string): boolean {
    return this.nodes.has(address);
  }

  getNodes(): ResourceNode[] {
    return [...this.nodes.values()];
  }

  addresses(): string[] {
    return [...this.nodes.keys()];
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Direct dependencies of a node, sorted. */
  dependenciesOf(address: string): string[] {
    return [...(this.edges.get(address) ?? [])].sort();
  }

  /** Direct dependents of a node, sorted. */
  dependentsOf(address: string): string[] {
    return [...(this.reverseEdges.get(address) ?? [])].sort();
  }

  edgeCount(): number {
    let count = 0;
    for (const deps of this.edges.values()) count += deps.size;
    return count;
  }

  /**
   * Find one dependency cycle, as a path whose first member is repeated at
   * the end (`a → b → a`). Returns null for an acyclic graph.
   */
  findCycle(): string[] | null {
    const WHITE = 0;
    const GRAY = 1;
    const BLACK = 2;
    const color = new Map<string, number>();
    for (const address of this.nodes.keys()) color.set(address, WHITE);

    const stack: string[] = [];

    const visit = (address: string): string[] | null => {
      color.set(address, GRAY);
      stack.push(address);

      for (const dep of this.dependenciesOf(address)) {
        const c = color.get(dep);
        if (c === GRAY) {
          return [...stack.slice(stack.indexOf(dep)), dep];
        }
        if (c === WHITE) {
          const found = visit(dep);
          if (found) return found;
        }
      }

      stack.pop();
      color.set(address, BLACK);
      return null;
    };

    for (const address of [...this.nodes.keys()].sort()) {
      if (color.get(address) === WHITE) {
        const cycle = visit(address);
        if (cycle) return cycle;
      }
    }
    return null;
  }

  /**
   * Dependencies-first order (Kahn's algorithm, alphabetical tie-breaking).
   * Assumes an acyclic graph; nodes on a cycle are left out.
   */
  topologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    for (const [address, deps] of this.edges) remaining.set(address, deps.size);

    const ready = [...remaining].filter(([, d]) => d === 0).map(([a]) => a).sort();
    const order: string[] = [];

    while (ready.length > 0) {
      const current = ready.shift();
      if (current === undefined) break;
      order.push(current);

      for (const dependent of this.dependentsOf(current)) {
        const left = (remaining.get(dependent) ?? 1) - 1;
        remaining.set(dependent, left);
        if (left === 0) {
          const at = ready.findIndex((a) => a > dependent);
          if (at === -1) ready.push(dependent);
          else ready.splice(at, 0, dependent);
        }
      }
    }

    return order;
  }

  /** Graphviz rendering, edges pointing from dependent to dependency. */
  toDOT(): string {
    const lines = ["digraph resources {"];
    for (const address of [...this.nodes.keys()].sort()) {
      lines.push(`  "${address}";`);
    }
    for (const address of [...this.edges.keys()].sort()) {
      for (const dep of this.dependenciesOf(address)) {
        lines.push(`  "${address}" -> "${dep}";`);
      }
    }
    lines.push("}");
    return lines.join("\n");
  }
}
