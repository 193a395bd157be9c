import { z } from 'zod';
import { compile, evaluate, ExpressionError, type Expr } from '../expression';
import { PERIOD_INTENT } from '../intent-resolver';
import { EPS, column, groupRows, keyOf, maxOf, mean, median, minOf, present, safeDiv, slope, std, toNumber, type GroupKey } from '../series';
import type { Dataset, Details } from '../types';
import { bounded, col, defineCheck, groupBy, missingColumns, num, perGroup, soft } from './shared';

// Experience upper bounds (years, inclusive) for bands 1..5
const EXPERIENCE_BANDS = [
  { band: 1, upTo: 2 },
  { band: 2, upTo: 5 },
  { band: 3, upTo: 8 },
  { band: 4, upTo: 12 },
  { band: 5, upTo: 99 },
];

function expectedBand(years: number): number | null {
  if (years <= -1) return null;
  return EXPERIENCE_BANDS.find((b) => years <= b.upTo)?.band ?? null;
}

function trimmed(xs: number[], pct: number): number[] {
  const sorted = [...xs].sort((a, b) => a - b);
  const t = Math.floor(sorted.length * pct);
  return sorted.length > 2 * t ? sorted.slice(t, sorted.length - t) : sorted;
}

function medianByGroup(rows: Dataset, value: string, group: string): Map<GroupKey, number> {
  const out = new Map<GroupKey, number>();
  for (const [k, g] of groupRows(rows, group)) {
    const m = median(present(column(g, value)));
    if (m !== null) out.set(k, m);
  }
  return out;
}

function sumOf(rows: Dataset, name: string): number {
  return present(column(rows, name)).reduce((s, x) => s + x, 0);
}

export const peopleChecks = {
  // Per period after the first: |Δheadcount - (hires - exits + transfers)| <= tolerance * |headcount|
  headcount_flow_consistency: defineCheck(
    z.object({
      headcount: col.default('headcount_total_intent'),
      hires: col.default('new_hires_intent'),
      exits: col.default('exits_intent'),
      transfers: col.optional(),
      group_by: groupBy,
      tolerance_abs: num.nonnegative().default(0.05),
    }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.headcount, p.hires, p.exits]);
      if (missing) return missing;
      return perGroup(rows, p.group_by, (g) => {
        const periods: Details[] = [];
        let ok = true;
        let maxErr = 0;
        for (let i = 1; i < g.length; i++) {
          const hc = toNumber(g[i][p.headcount]);
          const prev = toNumber(g[i - 1][p.headcount]);
          if (hc === null || prev === null) continue;
          const flow =
            (toNumber(g[i][p.hires]) ?? 0) -
            (toNumber(g[i][p.exits]) ?? 0) +
            (p.transfers ? toNumber(g[i][p.transfers]) ?? 0 : 0);
          const err = Math.abs(hc - prev - flow);
          const pass = err <= p.tolerance_abs * (Math.abs(hc) + EPS);
          ok = ok && pass;
          maxErr = Math.max(maxErr, err);
          periods.push({ period: keyOf(g[i][PERIOD_INTENT] ?? String(i + 1)), status: pass ? 'pass' : 'fail', err });
        }
        return { ok, details: { maxErr, periods } };
      });
    }
  ),

  attrition_rate_bounds: defineCheck(
    z.object({
      exits: col,
      headcount: col,
      annualize: z.boolean().default(true),
      low: num.default(0),
      high: num.default(0.3),
    }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.exits, p.headcount]);
      if (missing) return missing;
      const hc = column(rows, p.headcount);
      const ex = column(rows, p.exits);
      const rates: number[] = [];
      ex.forEach((e, i) => {
        const base = (i > 0 ? hc[i - 1] : null) ?? hc[i];
        if (e === null || base === null) return;
        rates.push(safeDiv(e, base) * (p.annualize ? 12 : 1));
      });
      const ok = rates.every((r) => r >= p.low && r <= p.high);
      return bounded(ok, rates.length ? { min: minOf(rates), max: maxOf(rates) } : {});
    }
  ),

  training_hours_bounds: defineCheck(
    z.object({ training_hours: col, headcount: col, low: num, high: num }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.training_hours, p.headcount]);
      if (missing) return missing;
      const avgs: number[] = [];
      for (const r of rows) {
        const t = toNumber(r[p.training_hours]);
        const h = toNumber(r[p.headcount]);
        if (t !== null && h !== null) avgs.push(safeDiv(t, h));
      }
      const ok = avgs.every((a) => a >= p.low && a <= p.high);
      return bounded(ok, avgs.length ? { minAvg: minOf(avgs), maxAvg: maxOf(avgs) } : {});
    }
  ),

  // Promotion rate per tenure quantile bin should not fall as tenure grows
  promotion_rate_trend: defineCheck(
    z.object({ tenure: col, promoted: col, min_trend_slope: num.default(0) }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.tenure, p.promoted]);
      if (missing) return missing;
      const pairs: { tenure: number; promoted: number }[] = [];
      for (const r of rows) {
        const t = toNumber(r[p.tenure]);
        const pr = toNumber(r[p.promoted]);
        if (t !== null && pr !== null) pairs.push({ tenure: t, promoted: pr });
      }
      if (pairs.length < 2) return soft('insufficient_points');
      pairs.sort((a, b) => a.tenure - b.tenure);
      const bins = Math.min(5, pairs.length);
      const buckets: number[][] = Array.from({ length: bins }, () => []);
      pairs.forEach((x, i) => buckets[Math.floor((i * bins) / pairs.length)].push(x.promoted));
      const rates = buckets.map((b) => mean(b)).filter((m): m is number => m !== null);
      const s = slope(rates) ?? 0;
      return bounded(s >= p.min_trend_slope, { slope: s, rates });
    }
  ),

  band_variance_bound: defineCheck(
    z.object({ value: col, band: col, max_std_over_mean: num.nonnegative(), trim_pct: num.min(0).max(0.5).default(0.05) }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.value, p.band]);
      if (missing) return missing;
      return perGroup(rows, p.band, (g) => {
        const xs = trimmed(present(column(g, p.value)), p.trim_pct);
        const m = mean(xs);
        const sd = std(xs);
        const ratio = m === null || sd === null || m === 0 ? 0 : sd / (Math.abs(m) + EPS);
        return { ok: ratio <= p.max_std_over_mean, details: { stdOverMean: ratio } };
      });
    }
  ),

  median_gap_bound: defineCheck(z.object({ value: col, group: col, max_gap_pct: num.nonnegative() }), (rows, p) => {
    const missing = missingColumns(rows, [p.value, p.group]);
    if (missing) return missing;
    const meds = Array.from(medianByGroup(rows, p.value, p.group).values());
    const center = median(meds);
    const hi = maxOf(meds);
    const lo = minOf(meds);
    const gap = center === null || hi === null || lo === null ? 0 : (hi - lo) / (Math.abs(center) + EPS);
    return bounded(gap <= p.max_gap_pct, { medianGapPct: gap });
  }),

  // Compares the first two condition groups (e.g. fresh hires vs tenured) within each grade
  median_gap_bound_grouped: defineCheck(
    z.object({
      value: col,
      group: col,
      condition_groups: z
        .record(z.string(), z.object({ filter: z.string().min(1) }))
        .refine((g) => Object.keys(g).length >= 2, 'Need at least two condition groups'),
      max_gap_pct: num.nonnegative(),
    }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.value, p.group]);
      if (missing) return missing;
      const [[nameA, specA], [nameB, specB]] = Object.entries(p.condition_groups);
      let filterA: Expr;
      let filterB: Expr;
      try {
        filterA = compile(specA.filter);
        filterB = compile(specB.filter);
      } catch (e) {
        if (e instanceof ExpressionError) return soft('evaluation_error', { error: e.message });
        throw e;
      }
      const subset = (f: Expr) => rows.filter((r) => {
        const v = evaluate(f, r);
        return v !== null && v !== 0;
      });
      const medA = medianByGroup(subset(filterA), p.value, p.group);
      const medB = medianByGroup(subset(filterB), p.value, p.group);
      let gap = 0;
      for (const [grade, a] of medA) {
        const b = medB.get(grade);
        if (b === undefined) continue;
        gap = Math.max(gap, Math.abs((a - b) / (Math.abs(b) + EPS)));
      }
      return bounded(gap <= p.max_gap_pct, { maxGapPct: gap, compared: [nameA, nameB] });
    }
  ),

  band_alignment_check: defineCheck(
    z.object({ experience: col, band: col, tolerance_bands: z.number().int().nonnegative().default(1) }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.experience, p.band]);
      if (missing) return missing;
      let maxBandGap = 0;
      for (const r of rows) {
        const years = toNumber(r[p.experience]);
        const band = toNumber(r[p.band]);
        if (years === null || band === null) continue;
        const expected = expectedBand(years);
        if (expected === null) continue;
        maxBandGap = Math.max(maxBandGap, Math.abs(expected - Math.trunc(band)));
      }
      return bounded(maxBandGap <= p.tolerance_bands, { maxBandGap });
    }
  ),

  onboarding_completion_rate: defineCheck(
    z.object({ numerator: col, denominator: col, min_rate: num }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.numerator, p.denominator]);
      if (missing) return missing;
      const rate = sumOf(rows, p.numerator) / (sumOf(rows, p.denominator) + EPS);
      return bounded(rate >= p.min_rate, { rate });
    }
  ),
};
