import dayjs, { type Dayjs } from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import isoWeek from 'dayjs/plugin/isoWeek';
import utc from 'dayjs/plugin/utc';
import type { CellValue } from './types';

dayjs.extend(customParseFormat);
dayjs.extend(isoWeek);
dayjs.extend(utc);

// Spreadsheet serial day 0 (1900 date system, leap-year bug included)
const SERIAL_EPOCH = dayjs.utc('1899-12-30');

const QUARTER = /^(\d{4})-?[Qq]([1-4])$/;
const ISO_WEEK = /^(\d{4})-?[Ww](\d{1,2})$/;
const YMD_COMPACT = /^\d{8}$/;
const YM_COMPACT = /^\d{6}$/;
const ISO_DATE = /^\d{4}-\d{1,2}(-\d{1,2})?([T ].*)?$/;
const SLASH_DATE = /^\d{4}\/\d{1,2}(\/\d{1,2})?$/;

function strict(s: string, fmt: string): Dayjs | null {
  const d = dayjs.utc(s, fmt, true);
  return d.isValid() ? d : null;
}

function fromQuarter(year: number, q: number): Dayjs {
  return dayjs.utc(`${year}-01-01`).add((q - 1) * 3, 'month');
}

function fromIsoWeek(year: number, week: number): Dayjs | null {
  if (week < 1 || week > 53) return null;
  // Jan 4th always sits in ISO week 1
  const d = dayjs.utc(`${year}-01-04`).isoWeek(week).isoWeekday(1);
  return d.isValid() ? d : null;
}

/** Parse one raw period value into a UTC calendar date, or null when unrecognised. */
export function parsePeriod(value: CellValue | undefined): Dayjs | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const digits = String(Math.trunc(value));
    if (Number.isInteger(value) && YMD_COMPACT.test(digits)) return strict(digits, 'YYYYMMDD');
    if (Number.isInteger(value) && YM_COMPACT.test(digits)) return strict(digits, 'YYYYMM');
    return SERIAL_EPOCH.add(Math.floor(value), 'day');
  }

  const s = value.trim();
  if (!s) return null;

  const q = QUARTER.exec(s);
  if (q) return fromQuarter(Number(q[1]), Number(q[2]));

  const w = ISO_WEEK.exec(s);
  if (w) return fromIsoWeek(Number(w[1]), Number(w[2]));

  if (YMD_COMPACT.test(s)) return strict(s, 'YYYYMMDD');
  if (YM_COMPACT.test(s)) return strict(s, 'YYYYMM');

  if (ISO_DATE.test(s)) {
    const datePart = s.split(/[T ]/)[0];
    return strict(datePart, 'YYYY-MM-DD') ?? strict(datePart, 'YYYY-M-D') ?? strict(datePart, 'YYYY-MM') ?? strict(datePart, 'YYYY-M');
  }
  if (SLASH_DATE.test(s)) {
    return strict(s, 'YYYY/MM/DD') ?? strict(s, 'YYYY/M/D') ?? strict(s, 'YYYY/MM') ?? strict(s, 'YYYY/M');
  }
  return null;
}

/**
 * Normalise a period column: YYYY-MM when every parsed value falls on the same
 * day of month, YYYY-MM-DD otherwise. Unparseable values keep their trimmed text.
 */
export function normalizePeriods(values: CellValue[]): CellValue[] {
  const parsed = values.map(parsePeriod);
  const days = new Set<number>();
  for (const d of parsed) if (d) days.add(d.date());
  const fmt = days.size > 1 ? 'YYYY-MM-DD' : 'YYYY-MM';
  return values.map((v, i) => {
    const d = parsed[i];
    if (d) return d.format(fmt);
    if (v === null) return null;
    return String(v).trim();
  });
}

/** Parse for comparisons inside checks; normalised strings round-trip through here. */
export function periodTime(value: CellValue | undefined): number | null {
  const d = parsePeriod(value);
  return d ? d.valueOf() : null;
}

/** Chronological where both sides parse, text order otherwise. */
export function comparePeriods(a: CellValue | undefined, b: CellValue | undefined): number {
  const ta = periodTime(a);
  const tb = periodTime(b);
  if (ta !== null && tb !== null) return ta - tb;
  return String(a ?? '').localeCompare(String(b ?? ''));
}
