/**
 * Descendant counting over the advisor → student graph.
 * Iterative BFS with a visited set, so advisor loops in the source data terminate.
 */

import type { GenealogyGraph } from './types.js';

/**
 * IDs reachable from `source` through outgoing edges, excluding `source` itself
 */
export const descendantsOf = (graph: GenealogyGraph, source: number): number[] => {
  if (!graph.nodes.has(source)) return [];

  const visited = new Set<number>([source]);
  const reached: number[] = [];
  const queue: number[] = [source];

  for (let head = 0; head < queue.length; head++) {
    const children = graph.nodes.get(queue[head])?.children ?? [];
    for (const child of children) {
      // a cycle back to the source is not a descendant of itself
      if (visited.has(child)) continue;
      visited.add(child);
      reached.push(child);
      queue.push(child);
    }
  }

  return reached;
};

export const countDescendants = (graph: GenealogyGraph, source: number): number =>
  descendantsOf(graph, source).length;

export const descendantCounts = (graph: GenealogyGraph): Map<number, number> => {
  const counts = new Map<number, number>();
  for (const id of graph.nodes.keys()) {
    counts.set(id, countDescendants(graph, id));
  }
  return counts;
};
