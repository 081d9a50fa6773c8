import { describe, it, expect } from 'vitest';
import { normalize, normalizeCell, normalizeRecords, type AuditRecord } from './normalize';

describe('normalize', () => {
  it('maps non-finite numbers to null', () => {
    expect(normalize(Number.NaN)).toBeNull();
    expect(normalize(Number.POSITIVE_INFINITY)).toBeNull();
    expect(normalize(Number.NEGATIVE_INFINITY)).toBeNull();
  });

  it('keeps finite numbers, strings and booleans', () => {
    expect(normalize(42)).toBe(42);
    expect(normalize(-0.5)).toBe(-0.5);
    expect(normalize('text')).toBe('text');
    expect(normalize(false)).toBe(false);
  });

  it('maps undefined to null', () => {
    expect(normalize(undefined)).toBeNull();
    expect(normalize(null)).toBeNull();
  });

  it('converts bigint to a native number', () => {
    expect(normalize(BigInt(7))).toBe(7);
  });

  it('maps invalid dates to null and keeps valid ones', () => {
    expect(normalize(new Date('not a date'))).toBeNull();
    const valid = new Date('2024-03-01T00:00:00.000Z');
    expect(normalize(valid)).toBe(valid);
  });

  it('walks nested objects and arrays', () => {
    const input = {
      score: Number.NaN,
      tags: ['a', Number.POSITIVE_INFINITY, 3],
      nested: { ok: true, missing: undefined },
    };
    expect(normalize(input)).toEqual({
      score: null,
      tags: ['a', null, 3],
      nested: { ok: true, missing: null },
    });
  });

  it('preserves key order', () => {
    const out = normalize({ b: 1, a: 2, c: Number.NaN });
    expect(JSON.stringify(out)).toBe('{"b":1,"a":2,"c":null}');
  });

  it('is idempotent', () => {
    const samples: unknown[] = [
      Number.NaN,
      BigInt(12),
      [1, Number.NEGATIVE_INFINITY, { x: undefined }],
      { 'Question ID': 'Q1', Score: Number.NaN, Flags: [true, null] },
      'plain',
    ];
    for (const sample of samples) {
      const once = normalize(sample);
      expect(normalize(once)).toEqual(once);
    }
  });

  it('does not mutate its input', () => {
    const input = { score: Number.NaN };
    normalize(input);
    expect(input.score).toBeNaN();
  });
});

describe('normalizeCell', () => {
  it('nulls non-finite numbers and undefined', () => {
    expect(normalizeCell(Number.NaN)).toBeNull();
    expect(normalizeCell(undefined)).toBeNull();
    expect(normalizeCell(3.5)).toBe(3.5);
    expect(normalizeCell('')).toBe('');
  });
});

describe('normalizeRecords', () => {
  it('returns new records and leaves the input untouched', () => {
    const records: AuditRecord[] = [{ 'Question ID': 'Q1', Score: Number.NaN }];
    const out = normalizeRecords(records);

    expect(out).toEqual([{ 'Question ID': 'Q1', Score: null }]);
    expect(out[0]).not.toBe(records[0]);
    expect(records[0].Score).toBeNaN();
  });
});
