/*
  Cross-domain series helpers
  -------------------------------------
  Metric lookup over resolved domain datasets, per-period aggregation and
  time alignment across domains. Metric definitions (which domains to look in,
  which column names to try) live in config/metrics.json.
*/

import { z } from 'zod';
import rawMetrics from '../config/metrics.json';
import { PERIOD_INTENT } from './intent-resolver';
import { comparePeriods, periodTime } from './period';
import { keyOf, pctChange, present, sum, toNumber, type Series } from './series';
import { DOMAINS, type Dataset, type Domain } from './types';

export type Datasets = Partial<Record<Domain, Dataset>>;

const metricSchema = z.object({
  domains: z.array(z.enum(DOMAINS)).min(1),
  keys: z.array(z.string().min(1)).min(1),
  agg: z.enum(['sum', 'mean']).default('sum'),
});

export type MetricDef = z.infer<typeof metricSchema>;
export type MetricKey = keyof typeof rawMetrics;

const metricTable: Record<string, MetricDef> = z.record(z.string(), metricSchema).parse(rawMetrics);

export function metricDef(key: MetricKey): MetricDef {
  return metricTable[key];
}

// --------------------------
// Column lookup
// --------------------------
const lc = (s: string) => s.trim().toLowerCase().replace(/[\s-]+/g, '_');

/** Exact (normalised) name first, then a column whose name contains one of the keys. */
export function findColumn(rows: Dataset, keys: readonly string[]): string | null {
  if (!rows.length) return null;
  const byLc = new Map<string, string>();
  for (const r of rows) for (const c of Object.keys(r)) if (!byLc.has(lc(c))) byLc.set(lc(c), c);
  const wanted = keys.map(lc);
  for (const k of wanted) {
    const hit = byLc.get(k);
    if (hit !== undefined) return hit;
  }
  for (const k of wanted) {
    for (const [name, orig] of byLc) if (name.includes(k)) return orig;
  }
  return null;
}

// --------------------------
// Series
// --------------------------
export interface MetricSeries {
  metric: MetricKey;
  domain: Domain;
  column: string;
  periods: string[];
  values: Series;
}

/** One value per period (sum or mean of the rows sharing it); chronological when every period parses. */
export function periodSeries(rows: Dataset, col: string, agg: 'sum' | 'mean'): { periods: string[]; values: Series } {
  const buckets = new Map<string, Series>();
  rows.forEach((r, i) => {
    const p = r[PERIOD_INTENT];
    const key = p === null || p === undefined ? String(i + 1) : keyOf(p);
    const bucket = buckets.get(key) ?? [];
    bucket.push(toNumber(r[col]));
    buckets.set(key, bucket);
  });
  let periods = Array.from(buckets.keys());
  if (periods.every((p) => periodTime(p) !== null)) periods = [...periods].sort(comparePeriods);
  const values = periods.map((p) => {
    const xs = present(buckets.get(p) ?? []);
    if (!xs.length) return null;
    return agg === 'sum' ? sum(xs) : sum(xs) / xs.length;
  });
  return { periods, values };
}

export type Lookup = { ok: true; series: MetricSeries[] } | { ok: false; reason: string };

const title = (d: string) => d.charAt(0).toUpperCase() + d.slice(1);

function findSeries(data: Datasets, key: MetricKey): MetricSeries | null {
  const def = metricDef(key);
  for (const domain of def.domains) {
    const rows = data[domain];
    if (!rows?.length) continue;
    const column = findColumn(rows, def.keys);
    if (column !== null) return { metric: key, domain, column, ...periodSeries(rows, column, def.agg) };
  }
  return null;
}

/**
 * Resolves each metric (in the order given) to the first of its domains that
 * is present and carries a matching column. Missing domains are reported
 * before missing columns.
 */
export function lookupMetrics(data: Datasets, keys: readonly MetricKey[]): Lookup {
  const absent = new Set<Domain>();
  for (const k of keys) {
    const { domains } = metricDef(k);
    if (!domains.some((d) => data[d]?.length)) domains.forEach((d) => absent.add(d));
  }
  if (absent.size) return { ok: false, reason: `Requires ${Array.from(absent).map(title).join(', ')}` };

  const series: MetricSeries[] = [];
  const missing: MetricKey[] = [];
  for (const k of keys) {
    const hit = findSeries(data, k);
    if (hit) series.push(hit);
    else missing.push(k);
  }
  if (missing.length) return { ok: false, reason: `Columns not found (${missing.join('/')})` };
  return { ok: true, series };
}

// --------------------------
// Alignment
// --------------------------
export interface Aligned {
  periods: string[];
  values: Series[];
  byPeriod: boolean;
}

/**
 * Common periods (chronological) when the series share at least two of them,
 * otherwise position by position, truncated to the shortest.
 */
export function align(series: MetricSeries[]): Aligned {
  const [first] = series;
  if (!first) return { periods: [], values: [], byPeriod: false };
  const common = first.periods.filter((p) => series.every((s) => s.periods.includes(p)));

  if (common.length >= 2) {
    const periods = common.every((p) => periodTime(p) !== null) ? [...common].sort(comparePeriods) : common;
    const values = series.map((s) => periods.map((p) => s.values[s.periods.indexOf(p)] ?? null));
    return { periods, values, byPeriod: true };
  }

  const n = Math.min(...series.map((s) => s.values.length));
  return { periods: first.periods.slice(0, n), values: series.map((s) => s.values.slice(0, n)), byPeriod: false };
}

// --------------------------
// Growth flags
// --------------------------
export function growthFlags(xs: Series, up: number, down: number): { up: boolean[]; down: boolean[] } {
  const changes = pctChange(xs);
  return {
    up: changes.map((c) => c !== null && c > up),
    down: changes.map((c) => c !== null && c < down),
  };
}

export const countTrue = (flags: boolean[]) => flags.filter(Boolean).length;

export function both(a: boolean[], b: boolean[]): boolean[] {
  return a.map((x, i) => x && (b[i] ?? false));
}

export function ratioSeries(num: Series, den: Series): Series {
  return num.map((n, i) => {
    const d = den[i];
    return n === null || d === null || d === undefined || d === 0 ? null : n / d;
  });
}
