/**
 * Convert a raw MGP `/acad` payload into a MathematicianRecord.
 *
 * Payload shape (only the fields read here):
 *
 *   { MGP_academic: {
 *       ID, given_name, family_name,
 *       student_data: {
 *         degrees: [{ 'advised by': { [id]: name }, schools: [name] }],
 *         descendants: { advisees: { [id]: name }, descendant_count }
 *       }
 *   } }
 */

import type { MathematicianRecord } from '@mathlineage/shared';

type Json = Record<string, unknown>;

const isObject = (value: unknown): value is Json =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asObject = (value: unknown): Json => (isObject(value) ? value : {});

const asString = (value: unknown): string =>
  typeof value === 'string' ? value.trim() : '';

export const parseId = (value: unknown): number | null => {
  const n = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value;
  return typeof n === 'number' && Number.isSafeInteger(n) && n > 0 ? n : null;
};

const sortedIds = (ids: Iterable<number>): number[] => [...new Set(ids)].sort((a, b) => a - b);

// advisees come as { id: name } or, for people without students, [""]
const parseAdvisees = (value: unknown): number[] => {
  if (Array.isArray(value)) {
    return sortedIds(value.map(parseId).filter((id): id is number => id !== null));
  }
  return sortedIds(Object.keys(asObject(value)).map(parseId).filter((id): id is number => id !== null));
};

const parseSchools = (value: unknown): string[] => {
  const list = Array.isArray(value) ? value : [value];
  return list.map(asString).filter(Boolean);
};

/**
 * Pick the school that names the country (or an alias), else the first one
 */
export const pickUniversity = (schools: string[], countryNames: string[]): string | undefined =>
  schools.find((school) => countryNames.some((name) => school.includes(name))) ?? schools[0];

export const json2mathematician = (
  payload: unknown,
  country: string,
  countryNames: string[] = [country]
): MathematicianRecord | null => {
  if (!isObject(payload) || !isObject(payload.MGP_academic)) return null;
  const academic = payload.MGP_academic;

  const id = parseId(academic.ID);
  if (id === null) return null;

  const studentData = asObject(academic.student_data);
  const degrees = Array.isArray(studentData.degrees) ? studentData.degrees.filter(isObject) : [];
  const descendants = asObject(studentData.descendants);

  const advisorNames: Record<string, string> = {};
  const schools: string[] = [];
  for (const degree of degrees) {
    for (const [key, name] of Object.entries(asObject(degree['advised by']))) {
      const advisorId = parseId(key);
      if (advisorId === null) continue;
      advisorNames[String(advisorId)] = asString(name);
    }
    schools.push(...parseSchools(degree.schools));
  }

  const name = `${asString(academic.given_name)} ${asString(academic.family_name)}`.trim();
  const reported = Number(descendants.descendant_count);

  const record: MathematicianRecord = {
    id,
    name: name || 'Unknown',
    advisors: sortedIds(Object.keys(advisorNames).map(Number)),
    advisorNames,
    schools,
    country,
    advisees: parseAdvisees(descendants.advisees),
    reportedDescendantCount: Number.isFinite(reported) && reported > 0 ? reported : 0,
  };

  const university = pickUniversity(schools, countryNames);
  if (university) record.university = university;

  return record;
};

export default json2mathematician;
