import type { CellValue, Dataset } from './types';

export const EPS = 1e-9;

export type Series = (number | null)[];

export function toNumber(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'boolean') return v ? 1 : 0;
  if (typeof v !== 'string') return null;
  const s = v.trim().replace(/,/g, '');
  if (s === '') return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function column(rows: Dataset, name: string): Series {
  return rows.map((r) => toNumber(r[name]));
}

export function hasColumn(rows: Dataset, name: string): boolean {
  return rows.some((r) => Object.prototype.hasOwnProperty.call(r, name));
}

export function columnNames(rows: Dataset): string[] {
  const seen = new Set<string>();
  for (const r of rows) for (const k of Object.keys(r)) seen.add(k);
  return Array.from(seen);
}

export function present(xs: Series): number[] {
  const out: number[] = [];
  for (const x of xs) if (x !== null) out.push(x);
  return out;
}

export function sum(xs: number[]): number {
  let s = 0;
  for (const x of xs) s += x;
  return s;
}

export function mean(xs: number[]): number | null {
  return xs.length ? sum(xs) / xs.length : null;
}

// Population variance (ddof = 0)
export function variance(xs: number[]): number | null {
  const m = mean(xs);
  if (m === null) return null;
  return sum(xs.map((x) => (x - m) ** 2)) / xs.length;
}

export function std(xs: number[]): number | null {
  const v = variance(xs);
  return v === null ? null : Math.sqrt(v);
}

export function median(xs: number[]): number | null {
  if (!xs.length) return null;
  const s = [...xs].sort((a, b) => a - b);
  const mid = Math.floor(s.length / 2);
  return s.length % 2 ? s[mid] : (s[mid - 1] + s[mid]) / 2;
}

// no spread into Math.min/max: large columns exceed the argument limit
export function minOf(xs: number[]): number | null {
  if (!xs.length) return null;
  let m = xs[0];
  for (const x of xs) if (x < m) m = x;
  return m;
}

export function maxOf(xs: number[]): number | null {
  if (!xs.length) return null;
  let m = xs[0];
  for (const x of xs) if (x > m) m = x;
  return m;
}

export function safeDiv(a: number, b: number): number {
  return a / (Math.abs(b) < EPS ? EPS : b);
}

/** Pearson correlation over positions where both sides are present. */
export function pearson(a: Series, b: Series): number | null {
  const xs: number[] = [];
  const ys: number[] = [];
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i];
    const y = b[i];
    if (x === null || y === null) continue;
    xs.push(x);
    ys.push(y);
  }
  if (xs.length < 2) return null;
  const mx = sum(xs) / xs.length;
  const my = sum(ys) / ys.length;
  let cov = 0;
  let vx = 0;
  let vy = 0;
  for (let i = 0; i < xs.length; i++) {
    cov += (xs[i] - mx) * (ys[i] - my);
    vx += (xs[i] - mx) ** 2;
    vy += (ys[i] - my) ** 2;
  }
  if (vx === 0 || vy === 0) return null;
  return cov / Math.sqrt(vx * vy);
}

/** Period-over-period change; null where either side is missing or the base is zero. */
export function pctChange(xs: Series): Series {
  return xs.map((x, i) => {
    if (i === 0) return null;
    const prev = xs[i - 1];
    if (x === null || prev === null || prev === 0) return null;
    return (x - prev) / Math.abs(prev);
  });
}

export function diff(xs: Series): Series {
  return xs.map((x, i) => {
    if (i === 0) return null;
    const prev = xs[i - 1];
    return x === null || prev === null ? null : x - prev;
  });
}

/** Trailing mean over `window` values, current included; null until `minPeriods` values are seen. */
export function rollingMean(xs: Series, window: number, minPeriods = window): Series {
  return xs.map((_, i) => {
    const slice = present(xs.slice(Math.max(0, i - window + 1), i + 1));
    if (slice.length < minPeriods) return null;
    return sum(slice) / slice.length;
  });
}

/** Least-squares slope of y against 0..n-1. */
export function slope(ys: number[]): number | null {
  const n = ys.length;
  if (n < 2) return null;
  const mx = (n - 1) / 2;
  const my = sum(ys) / n;
  let num = 0;
  let den = 0;
  for (let i = 0; i < n; i++) {
    num += (i - mx) * (ys[i] - my);
    den += (i - mx) ** 2;
  }
  return den === 0 ? null : num / den;
}

export function round(n: number, digits = 3): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

/** Group key for a cell; null cells get their own group, apart from the string 'null'. */
export type GroupKey = string | null;

export function groupRows(rows: Dataset, by?: string): Map<GroupKey, Dataset> {
  const groups = new Map<GroupKey, Dataset>();
  if (!by || !hasColumn(rows, by)) {
    groups.set('all', rows);
    return groups;
  }
  for (const r of rows) {
    const v = r[by];
    const key = v === null || v === undefined ? null : String(v);
    const bucket = groups.get(key);
    if (bucket) bucket.push(r);
    else groups.set(key, [r]);
  }
  return groups;
}

export function keyOf(v: CellValue | undefined): string {
  return v === null || v === undefined ? 'null' : String(v);
}
