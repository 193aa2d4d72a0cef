/**
 * Unit tests for lib/graph/components
 */

import { describe, it, expect } from 'vitest';
import { buildGraph } from '../../../server/src/lib/graph/buildGraph.js';
import { connectedComponents, connectivity, isolatedVertices } from '../../../server/src/lib/graph/components.js';
import { createRecord, sampleRecords } from '../../utils/fixtures.js';

describe('connectedComponents', () => {
  it('splits two disjoint edges into two components', () => {
    // 1 -> 2 and 3 -> 4; only the students were fetched
    const graph = buildGraph([
      createRecord({ id: 2, advisors: [1] }),
      createRecord({ id: 4, advisors: [3] }),
    ]);

    expect(connectedComponents(graph)).toEqual([[1, 2], [3, 4]]);
    expect(connectivity(graph)).toEqual({
      vertexCount: 4,
      edgeCount: 2,
      isolatedCount: 0,
      componentCount: 2,
      giantComponentSize: 2,
      giantComponentShare: 0.5,
      isGiant: false,
      topComponentSizes: [2, 2],
    });
  });

  it('ignores edge direction', () => {
    // 1 -> 3 <- 2: 1 and 2 are only connected through their shared student
    const graph = buildGraph([createRecord({ id: 3, advisors: [1, 2] })]);
    expect(connectedComponents(graph)).toEqual([[1, 2, 3]]);
  });

  it('orders components by size, then by smallest member', () => {
    const graph = buildGraph([
      createRecord({ id: 9 }),
      createRecord({ id: 20, advisors: [10] }),
      createRecord({ id: 21, advisors: [10] }),
      createRecord({ id: 6 }),
    ]);

    expect(connectedComponents(graph)).toEqual([[10, 20, 21], [6], [9]]);
  });

  it('sizes sum to the vertex count', () => {
    const graph = buildGraph(sampleRecords().values());
    const components = connectedComponents(graph);

    const total = components.reduce((sum, c) => sum + c.length, 0);
    expect(total).toBe(graph.nodes.size);
    expect(components[0].length).toBeLessThanOrEqual(graph.nodes.size);
  });
});

describe('isolatedVertices', () => {
  it('lists nodes with neither advisor nor students', () => {
    const graph = buildGraph(sampleRecords().values());
    expect(isolatedVertices(graph)).toEqual([5]);
  });

  it('treats a self-advised record as isolated', () => {
    const graph = buildGraph([createRecord({ id: 3, advisors: [3] })]);
    expect(isolatedVertices(graph)).toEqual([3]);
  });
});

describe('connectivity', () => {
  it('summarizes the sample genealogy', () => {
    const graph = buildGraph(sampleRecords().values());

    expect(connectivity(graph)).toEqual({
      vertexCount: 6,
      edgeCount: 4,
      isolatedCount: 1,
      componentCount: 2,
      giantComponentSize: 5,
      giantComponentShare: 5 / 6,
      isGiant: true,
      topComponentSizes: [5, 1],
    });
  });

  it('reports an empty graph without dividing by zero', () => {
    const summary = connectivity(buildGraph([]));

    expect(summary.vertexCount).toBe(0);
    expect(summary.componentCount).toBe(0);
    expect(summary.giantComponentSize).toBe(0);
    expect(summary.giantComponentShare).toBe(0);
    expect(summary.isGiant).toBe(false);
    expect(summary.topComponentSizes).toEqual([]);
  });

  it('keeps only the five largest component sizes', () => {
    const records = [1, 2, 3, 4, 5, 6, 7].map((id) => createRecord({ id }));
    const summary = connectivity(buildGraph(records));

    expect(summary.componentCount).toBe(7);
    expect(summary.topComponentSizes).toEqual([1, 1, 1, 1, 1]);
  });
});
