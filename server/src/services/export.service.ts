import fs from 'fs';
import path from 'path';
import type { AnalysisReport, ExportRow, RecordMap } from '@mathlineage/shared';
import { descendantCounts, outDegree, type GenealogyGraph } from '../lib/graph/index.js';

export const CSV_HEADER = ['id', 'name', 'descendant_count', 'direct_student_count'] as const;

export const csvField = (value: string | number): string => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

/**
 * One row per fetched mathematician, ascending by id
 */
export const buildExportRows = (
  graph: GenealogyGraph,
  records: RecordMap,
  counts: Map<number, number> = descendantCounts(graph)
): ExportRow[] =>
  [...records.values()]
    .sort((a, b) => a.id - b.id)
    .map((record) => ({
      id: record.id,
      name: record.name,
      descendantCount: counts.get(record.id) ?? 0,
      directStudentCount: outDegree(graph, record.id),
    }));

export const toCsv = (rows: ExportRow[]): string => {
  const lines = [CSV_HEADER.join(',')];
  for (const row of rows) {
    lines.push([row.id, row.name, row.descendantCount, row.directStudentCount].map(csvField).join(','));
  }
  return `${lines.join('\n')}\n`;
};

export const exportFileNames = (country: string): { csv: string; json: string } => {
  const slug = country.trim().toLowerCase().replace(/\s+/g, '_');
  return { csv: `mathematicians_${slug}.csv`, json: `report_${slug}.json` };
};

export const exportService = {
  toCsv,
  buildExportRows,

  exportJson(report: AnalysisReport): string {
    return JSON.stringify(report, null, 2);
  },

  writeExports(
    outputDir: string,
    country: string,
    rows: ExportRow[],
    report: AnalysisReport
  ): { csvPath: string; jsonPath: string } {
    const names = exportFileNames(country);
    fs.mkdirSync(outputDir, { recursive: true });
    const csvPath = path.join(outputDir, names.csv);
    const jsonPath = path.join(outputDir, names.json);
    fs.writeFileSync(csvPath, toCsv(rows));
    fs.writeFileSync(jsonPath, exportService.exportJson(report));
    return { csvPath, jsonPath };
  },
};
