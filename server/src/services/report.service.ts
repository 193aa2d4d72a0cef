/**
 * Read-only access to the analysis for the HTTP API.
 * Records are reloaded from the source on every call so a finished CLI run
 * is picked up without restarting the server.
 */

import type { AnalysisReport, MathematicianDetail, RecordMap } from '@mathlineage/shared';
import { descendantsOf } from '../lib/graph/index.js';
import { analyze, universityMatcher, type Analysis } from './analysis.service.js';
import { CacheStore } from './cache.service.js';
import { exportService } from './export.service.js';

export interface RecordSource {
  load(): RecordMap | Promise<RecordMap>;
}

export interface ReportServiceOptions {
  country: string;
  countryNames?: string[];
}

export interface ReportService {
  getReport(top?: number): Promise<AnalysisReport>;
  getMathematician(id: number): Promise<MathematicianDetail | null>;
  getDescendants(id: number): Promise<number[] | null>;
  exportCsv(): Promise<string>;
}

export const cacheRecordSource = (file: string): RecordSource => ({
  load: () => CacheStore.load(file).records(),
});

export function createReportService(
  source: RecordSource,
  { country, countryNames = [country] }: ReportServiceOptions
): ReportService {
  const run = async (top?: number): Promise<Analysis & { records: RecordMap }> => {
    const records = await source.load();
    const analysis = analyze(records, { country, top, universityFilter: universityMatcher(countryNames) });
    return { ...analysis, records };
  };

  return {
    async getReport(top) {
      return (await run(top)).report;
    },

    async getMathematician(id) {
      const { records, graph, descendantCounts } = await run();
      const record = records.get(id);
      if (!record) return null;
      return {
        record,
        descendantCount: descendantCounts.get(id) ?? 0,
        students: graph.nodes.get(id)?.children ?? [],
      };
    },

    async getDescendants(id) {
      const { records, graph } = await run();
      if (!records.has(id) && !graph.nodes.has(id)) return null;
      return descendantsOf(graph, id).sort((a, b) => a - b);
    },

    async exportCsv() {
      const { records, graph, descendantCounts } = await run();
      return exportService.toCsv(exportService.buildExportRows(graph, records, descendantCounts));
    },
  };
}
