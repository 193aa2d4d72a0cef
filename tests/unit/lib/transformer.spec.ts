/**
 * Unit tests for lib/mgp/transformer
 * Tests MGP `/acad` payload transformation to records
 */

import { describe, it, expect } from 'vitest';
import { json2mathematician, parseId, pickUniversity } from '../../../server/src/lib/mgp/transformer.js';
import { createMgpPayload } from '../../utils/fixtures.js';

describe('json2mathematician', () => {
  describe('basic transformation', () => {
    it('extracts id, name, advisors, schools and descendants', () => {
      const payload = createMgpPayload({
        id: 100,
        givenName: 'Ana',
        familyName: 'Souza',
        advisors: { 7: 'Carlos Lima', 3: 'Marie Curie' },
        schools: ['Universidade de São Paulo, Brazil'],
        advisees: { 200: 'Student Two', 150: 'Student One' },
        descendantCount: 12,
      });

      expect(json2mathematician(payload, 'Brazil')).toEqual({
        id: 100,
        name: 'Ana Souza',
        advisors: [3, 7],
        advisorNames: { '3': 'Marie Curie', '7': 'Carlos Lima' },
        schools: ['Universidade de São Paulo, Brazil'],
        university: 'Universidade de São Paulo, Brazil',
        country: 'Brazil',
        advisees: [150, 200],
        reportedDescendantCount: 12,
      });
    });

    it('merges advisors and schools across degrees', () => {
      const payload = createMgpPayload({
        id: 10,
        degrees: [
          { advisors: { 5: 'First Advisor' }, schools: ['Sorbonne'] },
          { advisors: { 5: 'First Advisor', 9: 'Second Advisor' }, schools: ['Instituto de Matemática Pura e Aplicada, Brasil'] },
        ],
      });

      const record = json2mathematician(payload, 'Brazil', ['Brazil', 'Brasil']);
      expect(record?.advisors).toEqual([5, 9]);
      expect(record?.schools).toEqual(['Sorbonne', 'Instituto de Matemática Pura e Aplicada, Brasil']);
      expect(record?.university).toBe('Instituto de Matemática Pura e Aplicada, Brasil');
    });

    it('falls back to the first school when none names the country', () => {
      const payload = createMgpPayload({
        degrees: [
          { schools: ['Sorbonne'] },
          { schools: ['Instituto de Matemática Pura e Aplicada, Brasil'] },
        ],
      });

      expect(json2mathematician(payload, 'Brazil')?.university).toBe('Sorbonne');
    });

    it('omits university when there are no schools', () => {
      const record = json2mathematician(createMgpPayload({ schools: [] }), 'Brazil');
      expect(record).not.toBeNull();
      expect(record).not.toHaveProperty('university');
    });

    it('accepts a numeric string ID', () => {
      expect(json2mathematician(createMgpPayload({ id: '42' }), 'Brazil')?.id).toBe(42);
    });
  });

  describe('edge cases', () => {
    it('returns null for non-object payloads', () => {
      expect(json2mathematician(null, 'Brazil')).toBeNull();
      expect(json2mathematician('oops', 'Brazil')).toBeNull();
      expect(json2mathematician([], 'Brazil')).toBeNull();
    });

    it('returns null without MGP_academic', () => {
      expect(json2mathematician({ something: 'else' }, 'Brazil')).toBeNull();
    });

    it('returns null when ID is missing or not an integer', () => {
      expect(json2mathematician({ MGP_academic: { given_name: 'No Id' } }, 'Brazil')).toBeNull();
      expect(json2mathematician(createMgpPayload({ id: 'abc' }), 'Brazil')).toBeNull();
    });

    it('uses Unknown when both name parts are empty', () => {
      const payload = createMgpPayload({ givenName: '', familyName: '  ' });
      expect(json2mathematician(payload, 'Brazil')?.name).toBe('Unknown');
    });

    it('treats the [""] advisee marker as no advisees', () => {
      const payload = createMgpPayload({ advisees: [''] });
      expect(json2mathematician(payload, 'Brazil')?.advisees).toEqual([]);
    });

    it('ignores advisor keys that are not ids', () => {
      const payload = {
        MGP_academic: {
          ID: 20,
          student_data: {
            degrees: [{ 'advised by': { 4: 'Real Advisor', x: 'Garbage' }, schools: [] }],
          },
        },
      };

      const record = json2mathematician(payload, 'Brazil');
      expect(record?.advisors).toEqual([4]);
      expect(record?.advisorNames).toEqual({ '4': 'Real Advisor' });
    });

    it('defaults a missing descendant count to 0', () => {
      const record = json2mathematician({ MGP_academic: { ID: 5 } }, 'Brazil');
      expect(record).toEqual({
        id: 5,
        name: 'Unknown',
        advisors: [],
        advisorNames: {},
        schools: [],
        country: 'Brazil',
        advisees: [],
        reportedDescendantCount: 0,
      });
    });
  });
});

describe('parseId', () => {
  it('accepts positive integers and digit strings', () => {
    expect(parseId(17)).toBe(17);
    expect(parseId('17')).toBe(17);
  });

  it('rejects everything else', () => {
    expect(parseId(0)).toBeNull();
    expect(parseId(-3)).toBeNull();
    expect(parseId(1.5)).toBeNull();
    expect(parseId('')).toBeNull();
    expect(parseId('12a')).toBeNull();
    expect(parseId(undefined)).toBeNull();
  });
});

describe('pickUniversity', () => {
  it('prefers a school naming any of the country names', () => {
    expect(pickUniversity(['MIT', 'UFRJ, Brasil'], ['Brazil', 'Brasil'])).toBe('UFRJ, Brasil');
  });

  it('returns undefined for an empty list', () => {
    expect(pickUniversity([], ['Brazil'])).toBeUndefined();
  });
});
