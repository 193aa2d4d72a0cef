/**
 * Build the directed advisor → student graph from fetched records
 */

import type { MathematicianRecord } from '@mathlineage/shared';
import type { GenealogyGraph, GraphNode } from './types.js';

const ascending = (a: number, b: number): number => a - b;

export const buildGraph = (records: Iterable<MathematicianRecord>): GenealogyGraph => {
  const nodes = new Map<number, GraphNode>();
  const ensure = (id: number): GraphNode => {
    let node = nodes.get(id);
    if (!node) {
      node = { children: [], parents: [] };
      nodes.set(id, node);
    }
    return node;
  };

  const edges = new Set<string>();
  for (const record of records) {
    const student = ensure(record.id);
    for (const advisorId of record.advisors) {
      // self-loops and repeated edges are tolerated but not stored
      if (advisorId === record.id) continue;
      const key = `${advisorId}>${record.id}`;
      if (edges.has(key)) continue;
      edges.add(key);
      // advisors without a fetched record still become (edge-only) nodes
      ensure(advisorId).children.push(record.id);
      student.parents.push(advisorId);
    }
  }

  const sorted = new Map<number, GraphNode>();
  for (const id of [...nodes.keys()].sort(ascending)) {
    const node = ensure(id);
    node.children.sort(ascending);
    node.parents.sort(ascending);
    sorted.set(id, node);
  }

  return { nodes: sorted, edgeCount: edges.size };
};

export const outDegree = (graph: GenealogyGraph, id: number): number =>
  graph.nodes.get(id)?.children.length ?? 0;

export default buildGraph;
