/**
 * Builders for MGP payloads and cached records
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { MathematicianRecord, RecordMap } from '@mathlineage/shared';

export interface PayloadDegree {
  advisors?: Record<number, string>;
  schools?: string[];
}

/**
 * Create a minimal `/acad` response for testing
 */
export const createMgpPayload = (overrides: Partial<{
  id: number | string;
  givenName: string;
  familyName: string;
  advisors: Record<number, string>;
  schools: string[];
  degrees: PayloadDegree[];
  advisees: Record<number, string> | string[];
  descendantCount: number;
}> = {}): Record<string, unknown> => {
  const {
    id = 1000,
    givenName = 'Test',
    familyName = 'Mathematician',
    advisors = {},
    schools = ['Universidade de São Paulo, Brazil'],
    advisees = {},
    descendantCount = 0,
  } = overrides;

  const degrees = overrides.degrees ?? [{ advisors, schools }];

  return {
    MGP_academic: {
      ID: id,
      given_name: givenName,
      family_name: familyName,
      student_data: {
        degrees: degrees.map((degree) => ({
          'advised by': degree.advisors ?? {},
          schools: degree.schools ?? [],
        })),
        descendants: {
          advisees,
          descendant_count: descendantCount,
        },
      },
    },
  };
};

/**
 * Create a record as it would sit in the cache
 */
export const createRecord = (
  overrides: Partial<MathematicianRecord> & { id: number }
): MathematicianRecord => {
  const record: MathematicianRecord = {
    name: `Mathematician ${overrides.id}`,
    advisors: [],
    advisorNames: {},
    schools: overrides.university ? [overrides.university] : [],
    country: 'Brazil',
    advisees: [],
    reportedDescendantCount: 0,
    ...overrides,
  };
  return record;
};

export const toRecordMap = (records: MathematicianRecord[]): RecordMap =>
  new Map(records.map((record) => [record.id, record]));

/**
 * Fresh temporary directory, removed by the returned cleanup function
 */
export const createTempDir = (): { dir: string; cleanup: () => void } => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mathlineage-'));
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
};

/**
 * Small genealogy used across graph, service and API tests:
 *
 *   1 ─┬─> 2 ──> 4 <── 99 (foreign advisor, never fetched)
 *      └─> 3
 *   5 (no advisor, no students)
 */
export const sampleRecords = (): RecordMap => toRecordMap([
  createRecord({
    id: 1,
    name: 'Ana Souza',
    university: 'Universidade de São Paulo, Brazil',
    advisees: [2, 3],
    reportedDescendantCount: 40,
  }),
  createRecord({
    id: 2,
    name: 'Bruno Lima',
    advisors: [1],
    advisorNames: { '1': 'Ana Souza' },
    university: 'Universidade de São Paulo, Brazil',
    advisees: [4],
    reportedDescendantCount: 3,
  }),
  createRecord({
    id: 3,
    name: 'Carla Dias',
    advisors: [1],
    advisorNames: { '1': 'Ana Souza' },
    university: 'IMPA, Brasil',
  }),
  createRecord({
    id: 4,
    name: 'Davi Rocha',
    advisors: [2, 99],
    advisorNames: { '2': 'Bruno Lima', '99': 'Pierre Dupont' },
    university: 'IMPA, Brasil',
  }),
  createRecord({
    id: 5,
    name: 'Eva Nunes',
    university: 'MIT',
  }),
]);
