import { z } from 'zod';
import { comparePeriods } from '../period';
import { EPS, keyOf, safeDiv, toNumber } from '../series';
import type { CellValue, CheckOutcome, Dataset } from '../types';
import { bounded, col, colList, defineCheck, groupBy, missingColumns, num, perGroup } from './shared';

function mixChange(
  rows: Dataset,
  part: string,
  total: string,
  key: string,
  period: string,
  maxChange: number
): CheckOutcome {
  const missing = missingColumns(rows, [part, total, key, period]);
  if (missing) return missing;

  const shares: { key: string; period: CellValue; share: number }[] = [];
  for (const r of rows) {
    const pv = toNumber(r[part]);
    const tv = toNumber(r[total]);
    if (pv === null || tv === null) continue;
    shares.push({ key: keyOf(r[key]), period: r[period] ?? null, share: safeDiv(pv, tv) });
  }

  // baseline = earliest period's share for each key
  const baseline = new Map<string, number>();
  for (const s of [...shares].sort((a, b) => comparePeriods(a.period, b.period))) {
    if (!baseline.has(s.key)) baseline.set(s.key, s.share);
  }

  let maxDev = 0;
  for (const s of shares) {
    const base = baseline.get(s.key) ?? s.share;
    maxDev = Math.max(maxDev, Math.abs(s.share - base) / (Math.abs(base) + EPS));
  }
  return bounded(maxDev <= maxChange, { maxDev });
}

/** 1 for truthy flags (non-zero numbers, "true", "yes", "y"), else 0. */
function flagValue(v: CellValue | undefined): number {
  if (typeof v === 'number') return v !== 0 ? 1 : 0;
  if (typeof v === 'string') {
    const s = v.trim().toLowerCase();
    if (['true', 'yes', 'y'].includes(s)) return 1;
    const n = toNumber(s);
    return n !== null && n !== 0 ? 1 : 0;
  }
  return 0;
}

export const compositionChecks = {
  sum_reconciliation_intents: defineCheck(
    z.object({ total: col, parts: colList, tolerance_abs: num.nonnegative().default(0.01), group_by: groupBy }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.total, ...p.parts]);
      if (missing) return missing;
      return perGroup(rows, p.group_by, (g) => {
        let ok = true;
        let maxAbsErr = 0;
        let maxRelErr = 0;
        for (const r of g) {
          const t = toNumber(r[p.total]);
          if (t === null) continue;
          let s = 0;
          for (const c of p.parts) s += toNumber(r[c]) ?? 0;
          const err = Math.abs(t - s);
          if (err > p.tolerance_abs * (Math.abs(t) + EPS)) ok = false;
          maxAbsErr = Math.max(maxAbsErr, err);
          maxRelErr = Math.max(maxRelErr, err / (Math.abs(t) + EPS));
        }
        return { ok, details: { maxAbsErr, maxRelErr } };
      });
    }
  ),

  mix_change_bounds: defineCheck(
    z.object({ part: col, total: col, key: col, period: col, max_change_pct_of_baseline: num.nonnegative() }),
    (rows, p) => mixChange(rows, p.part, p.total, p.key, p.period, p.max_change_pct_of_baseline)
  ),

  department_mix_change_bounds: defineCheck(
    z.object({
      dept_headcount: col,
      total_headcount: col,
      department: col,
      period: col,
      max_change_pct_of_baseline: num.nonnegative(),
    }),
    (rows, p) =>
      mixChange(rows, p.dept_headcount, p.total_headcount, p.department, p.period, p.max_change_pct_of_baseline)
  ),

  presence_rate: defineCheck(z.object({ flag: col, weight: col, min_rate: num }), (rows, p) => {
    const missing = missingColumns(rows, [p.flag, p.weight]);
    if (missing) return missing;
    let hit = 0;
    let total = 0;
    for (const r of rows) {
      const w = toNumber(r[p.weight]) ?? 0;
      hit += w * flagValue(r[p.flag]);
      total += w;
    }
    const rate = hit / (total + EPS);
    return bounded(rate >= p.min_rate, { rate });
  }),
};
