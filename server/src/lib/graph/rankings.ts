/**
 * Top-N rankings: advisors by direct students, universities by doctorates,
 * mathematicians by descendant count
 */

import type {
  MathematicianRecord,
  RankedAdvisor,
  RankedDescendants,
  RankedUniversity,
  RecordMap,
} from '@mathlineage/shared';
import type { GenealogyGraph } from './types.js';
import { descendantCounts } from './descendants.js';

export const UNKNOWN_NAME = 'Unknown name';

/**
 * Display name for an id: its own record, else how a student's record lists it
 */
export const resolveName = (records: RecordMap, id: number): string => {
  const own = records.get(id);
  if (own) return own.name;
  const key = String(id);
  for (const record of records.values()) {
    const listed = record.advisorNames[key];
    if (listed) return listed;
  }
  return UNKNOWN_NAME;
};

export const topAdvisors = (graph: GenealogyGraph, records: RecordMap, n: number): RankedAdvisor[] =>
  [...graph.nodes.entries()]
    .filter(([, node]) => node.children.length > 0)
    .map(([id, node]) => ({ id, students: node.children.length }))
    .sort((a, b) => b.students - a.students || a.id - b.id)
    .slice(0, Math.max(0, n))
    .map(({ id, students }) => ({ id, name: resolveName(records, id), students }));

export const topUniversities = (
  records: Iterable<MathematicianRecord>,
  n: number,
  match: (university: string) => boolean = () => true
): RankedUniversity[] => {
  const counts = new Map<string, number>();
  for (const record of records) {
    if (!record.university || !match(record.university)) continue;
    counts.set(record.university, (counts.get(record.university) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([name, doctorates]) => ({ name, doctorates }))
    .sort((a, b) => b.doctorates - a.doctorates || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, Math.max(0, n));
};

export const topDescendants = (
  graph: GenealogyGraph,
  records: RecordMap,
  n: number,
  counts: Map<number, number> = descendantCounts(graph)
): RankedDescendants[] =>
  [...records.values()]
    .map((record) => ({ id: record.id, name: record.name, descendants: counts.get(record.id) ?? 0 }))
    .sort((a, b) => b.descendants - a.descendants || a.id - b.id)
    .slice(0, Math.max(0, n));
