/**
 * Builds the genealogy graph from a record set and summarizes it
 */

import type { AnalysisReport, MathematicianRecord, RecordMap } from '@mathlineage/shared';
import {
  buildGraph,
  connectivity,
  descendantCounts,
  topAdvisors,
  topDescendants,
  topUniversities,
  type GenealogyGraph,
} from '../lib/graph/index.js';

export const DEFAULT_TOP = 10;

export interface AnalyzeOptions {
  country: string;
  top?: number;
  universityFilter?: (university: string) => boolean;
  now?: () => Date;
}

export interface Analysis {
  graph: GenealogyGraph;
  descendantCounts: Map<number, number>;
  report: AnalysisReport;
}

/**
 * Matches universities whose name mentions any of the given names
 */
export const universityMatcher = (names: string[]) => (university: string): boolean =>
  names.some((name) => university.includes(name));

export const withoutAdviseesCount = (records: Iterable<MathematicianRecord>): number => {
  let count = 0;
  for (const record of records) {
    if (record.advisees.length === 0) count++;
  }
  return count;
};

/**
 * Record with the highest MGP-reported descendant count (smallest id wins a tie)
 */
export const mostReportedDescendants = (
  records: Iterable<MathematicianRecord>
): AnalysisReport['mostReportedDescendants'] => {
  let best: MathematicianRecord | undefined;
  for (const record of records) {
    const count = record.reportedDescendantCount;
    if (count <= 0) continue;
    if (!best || count > best.reportedDescendantCount ||
        (count === best.reportedDescendantCount && record.id < best.id)) {
      best = record;
    }
  }
  return best
    ? { id: best.id, name: best.name, reportedDescendantCount: best.reportedDescendantCount }
    : null;
};

export function analyze(records: RecordMap, options: AnalyzeOptions): Analysis {
  const { country, top = DEFAULT_TOP, universityFilter, now = () => new Date() } = options;
  const graph = buildGraph(records.values());
  const counts = descendantCounts(graph);

  const report: AnalysisReport = {
    generatedAt: now().toISOString(),
    country,
    recordCount: records.size,
    topAdvisors: topAdvisors(graph, records, top),
    topUniversities: topUniversities(records.values(), top, universityFilter),
    topDescendants: topDescendants(graph, records, top, counts),
    mostReportedDescendants: mostReportedDescendants(records.values()),
    withoutAdviseesCount: withoutAdviseesCount(records.values()),
    connectivity: connectivity(graph),
  };

  return { graph, descendantCounts: counts, report };
}

export const analysisService = {
  analyze,
};
