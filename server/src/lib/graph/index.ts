/**
 * Graph construction and analytics for the academic genealogy
 */

export { buildGraph, outDegree } from './buildGraph.js';
export { descendantsOf, countDescendants, descendantCounts } from './descendants.js';
export { connectedComponents, isolatedVertices, connectivity } from './components.js';
export { topAdvisors, topUniversities, topDescendants, resolveName, UNKNOWN_NAME } from './rankings.js';
export type { GenealogyGraph, GraphNode } from './types.js';
