/**
 * Types for the advisor → student genealogy graph
 */

export interface GraphNode {
  children: number[];   // students, ascending
  parents: number[];    // advisors, ascending
}

export interface GenealogyGraph {
  nodes: Map<number, GraphNode>;
  edgeCount: number;
}
