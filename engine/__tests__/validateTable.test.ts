import { describe, expect, it } from '@jest/globals';
import { isValidNumber, validateNumberArray } from '../validateTable';

describe('isValidNumber', () => {
  it('accepts finite numbers', () => {
    expect(isValidNumber(0)).toBe(true);
    expect(isValidNumber(-12.5)).toBe(true);
    expect(isValidNumber(Number.MAX_VALUE)).toBe(true);
  });

  it('rejects booleans, non-finite numbers and other types', () => {
    expect(isValidNumber(true)).toBe(false);
    expect(isValidNumber(false)).toBe(false);
    expect(isValidNumber(Number.NaN)).toBe(false);
    expect(isValidNumber(Number.NEGATIVE_INFINITY)).toBe(false);
    expect(isValidNumber('1')).toBe(false);
    expect(isValidNumber(null)).toBe(false);
    expect(isValidNumber(undefined)).toBe(false);
  });
});

describe('validateNumberArray', () => {
  it('returns a copy of an all-numeric array', () => {
    const input = [1, 2.5, -3];
    const result = validateNumberArray(input);
    expect(result).toEqual({ ok: true, values: [1, 2.5, -3] });
    if (result.ok) {
      expect(result.values).not.toBe(input);
    }
  });

  it('accepts an empty array; emptiness is a shape concern', () => {
    expect(validateNumberArray([])).toEqual({ ok: true, values: [] });
  });

  it('rejects values that are not arrays', () => {
    expect(validateNumberArray({ a: 1 })).toEqual({ ok: false, code: 'E301' });
    expect(validateNumberArray('[1]')).toEqual({ ok: false, code: 'E301' });
    expect(validateNumberArray(null)).toEqual({ ok: false, code: 'E301' });
  });

  it('reports the first boolean entry', () => {
    expect(validateNumberArray([1, true, 3, 4])).toEqual({ ok: false, code: 'E304', index: 1 });
  });

  it('reports non-finite entries', () => {
    expect(validateNumberArray([1, Number.POSITIVE_INFINITY])).toEqual({
      ok: false,
      code: 'E303',
      index: 1
    });
    expect(validateNumberArray([Number.NaN])).toEqual({ ok: false, code: 'E303', index: 0 });
  });

  it('reports non-numeric entries', () => {
    expect(validateNumberArray(['1', 2])).toEqual({ ok: false, code: 'E302', index: 0 });
    expect(validateNumberArray([1, null])).toEqual({ ok: false, code: 'E302', index: 1 });
    expect(validateNumberArray([[1], 2])).toEqual({ ok: false, code: 'E302', index: 0 });
  });

  it('stops at the first bad entry', () => {
    expect(validateNumberArray([1, 'x', true])).toEqual({ ok: false, code: 'E302', index: 1 });
  });
});
