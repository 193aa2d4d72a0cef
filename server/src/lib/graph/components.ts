/**
 * Connectivity of the genealogy graph, treating every edge as undirected
 */

import type { ConnectivitySummary } from '@mathlineage/shared';
import type { GenealogyGraph } from './types.js';

const TOP_COMPONENTS = 5;

/**
 * Connected components, largest first (ties by smallest member id).
 * Members of each component are in ascending order.
 */
export const connectedComponents = (graph: GenealogyGraph): number[][] => {
  const seen = new Set<number>();
  const components: number[][] = [];

  for (const start of graph.nodes.keys()) {
    if (seen.has(start)) continue;
    seen.add(start);
    const component: number[] = [];
    const stack: number[] = [start];

    while (stack.length) {
      const id = stack.pop();
      if (id === undefined) break;
      component.push(id);
      const node = graph.nodes.get(id);
      if (!node) continue;
      for (const neighbor of [...node.children, ...node.parents]) {
        if (seen.has(neighbor)) continue;
        seen.add(neighbor);
        stack.push(neighbor);
      }
    }

    component.sort((a, b) => a - b);
    components.push(component);
  }

  return components.sort((a, b) => b.length - a.length || a[0] - b[0]);
};

export const isolatedVertices = (graph: GenealogyGraph): number[] =>
  [...graph.nodes.entries()]
    .filter(([, node]) => node.children.length === 0 && node.parents.length === 0)
    .map(([id]) => id);

export const connectivity = (graph: GenealogyGraph): ConnectivitySummary => {
  const components = connectedComponents(graph);
  const vertexCount = graph.nodes.size;
  const giantComponentSize = components[0]?.length ?? 0;
  const giantComponentShare = vertexCount > 0 ? giantComponentSize / vertexCount : 0;

  return {
    vertexCount,
    edgeCount: graph.edgeCount,
    isolatedCount: isolatedVertices(graph).length,
    componentCount: components.length,
    giantComponentSize,
    giantComponentShare,
    isGiant: giantComponentShare > 0.5,
    topComponentSizes: components.slice(0, TOP_COMPONENTS).map((c) => c.length),
  };
};
