import { describe, it, expect } from 'vitest';
import { comparePeriods, normalizePeriods, parsePeriod } from '../lib/period';

const fmt = (v: Parameters<typeof parsePeriod>[0]) => parsePeriod(v)?.format('YYYY-MM-DD') ?? null;

describe('parsePeriod', () => {
  it('reads ISO, slash and compact forms', () => {
    expect(fmt('2024-03-15')).toBe('2024-03-15');
    expect(fmt('2024-3')).toBe('2024-03-01');
    expect(fmt('2024/07/04')).toBe('2024-07-04');
    expect(fmt('20240215')).toBe('2024-02-15');
    expect(fmt(202403)).toBe('2024-03-01');
    expect(fmt('2024-05-01T10:00:00Z')).toBe('2024-05-01');
  });

  it('reads quarters and ISO weeks', () => {
    expect(fmt('2024Q2')).toBe('2024-04-01');
    expect(fmt('2024-q4')).toBe('2024-10-01');
    expect(fmt('2024-W01')).toBe('2024-01-01');
  });

  it('reads spreadsheet serial days', () => {
    expect(fmt(45292)).toBe('2024-01-01');
  });

  it('returns null for unrecognised values', () => {
    expect(fmt('n/a')).toBeNull();
    expect(fmt('')).toBeNull();
    expect(fmt(null)).toBeNull();
    expect(fmt('2024-13-01')).toBeNull();
  });
});

describe('normalizePeriods', () => {
  it('uses month granularity when every date shares a day', () => {
    expect(normalizePeriods(['2024-01-15', '2024-02-15', null])).toEqual(['2024-01', '2024-02', null]);
  });

  it('keeps full dates otherwise and leaves unparsed text', () => {
    expect(normalizePeriods(['2024-01-01', '2024-01-15', ' n/a '])).toEqual(['2024-01-01', '2024-01-15', 'n/a']);
  });
});

describe('comparePeriods', () => {
  it('orders chronologically when both parse', () => {
    expect(comparePeriods('2024-02', '2024-10')).toBeLessThan(0);
    expect(comparePeriods('2024Q3', '2024-06')).toBeGreaterThan(0);
  });

  it('falls back to text order', () => {
    expect(comparePeriods('alpha', 'beta')).toBeLessThan(0);
  });
});
