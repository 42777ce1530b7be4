/**
 * Provisioning Order
 *
 * Topological sort in which every node comes after everything it depends on.
 * Among nodes that are ready at the same time the lowest provisioning weight
 * goes first, then the lowest id, so identical inputs give identical orders.
 */

import { CycleError, InvariantError } from '../errors.js';

export interface OrderableNode {
  readonly id: string;
  readonly weight: number;
}

export interface OrderableEdge {
  /** The dependent */
  readonly from: string;
  /** What it depends on */
  readonly to: string;
}

function compareReady(a: OrderableNode, b: OrderableNode): number {
  if (a.weight !== b.weight) return a.weight - b.weight;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Detect cycles in the dependency graph using DFS. Each cycle is returned as a
 * path that starts and ends on the same node.
 */
export function detectCycles(nodes: readonly OrderableNode[], edges: readonly OrderableEdge[]): string[][] {
  const cycles: string[][] = [];
  const visited = new Set<string>();
  const recursionStack = new Set<string>();
  const dependencies = new Map<string, string[]>(nodes.map(n => [n.id, []]));
  for (const edge of edges) {
    dependencies.get(edge.from)?.push(edge.to);
  }
  for (const targets of dependencies.values()) targets.sort();

  function dfs(id: string, path: string[]): void {
    if (recursionStack.has(id)) {
      const cycleStart = path.indexOf(id);
      cycles.push([...path.slice(cycleStart), id]);
      return;
    }

    if (visited.has(id)) {
      return;
    }

    visited.add(id);
    recursionStack.add(id);

    for (const dep of dependencies.get(id) ?? []) {
      dfs(dep, [...path, id]);
    }

    recursionStack.delete(id);
  }

  for (const node of [...nodes].sort(compareReady)) {
    if (!visited.has(node.id)) {
      dfs(node.id, []);
    }
  }

  return cycles;
}

/**
 * Kahn's algorithm over the reversed edges. Throws CycleError naming the first
 * cycle found when some nodes can never become ready.
 */
export function orderTopologically(nodes: readonly OrderableNode[], edges: readonly OrderableEdge[]): string[] {
  const pending = new Map<string, number>(nodes.map(n => [n.id, 0]));
  const dependents = new Map<string, string[]>(nodes.map(n => [n.id, []]));

  for (const edge of edges) {
    const count = pending.get(edge.from);
    const waiting = dependents.get(edge.to);
    if (count === undefined || waiting === undefined) {
      throw new InvariantError(`edge ${edge.from} -> ${edge.to} references a node outside the graph`, {
        from: edge.from,
        to: edge.to,
      });
    }
    pending.set(edge.from, count + 1);
    waiting.push(edge.from);
  }

  const byNodeId = new Map(nodes.map(n => [n.id, n]));
  const ready: OrderableNode[] = nodes.filter(n => pending.get(n.id) === 0);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort(compareReady);
    const next = ready.shift();
    if (!next) break;
    order.push(next.id);

    for (const dependent of dependents.get(next.id) ?? []) {
      const remaining = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, remaining);
      const node = byNodeId.get(dependent);
      if (remaining === 0 && node) {
        ready.push(node);
      }
    }
  }

  if (order.length < nodes.length) {
    const placed = new Set(order);
    const stuck = nodes.filter(n => !placed.has(n.id));
    const stuckIds = new Set(stuck.map(n => n.id));
    const [cycle] = detectCycles(
      stuck,
      edges.filter(e => stuckIds.has(e.from) && stuckIds.has(e.to))
    );
    throw new CycleError(cycle ?? stuck.map(n => n.id));
  }

  return order;
}
