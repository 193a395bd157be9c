import { z } from 'zod';
import { EPS, column, hasColumn, maxOf, median, present, rollingMean, safeDiv, toNumber, variance } from '../series';
import type { Details } from '../types';
import { bounded, col, colList, defineCheck, missingColumns, num, soft } from './shared';

const varianceParams = z.object({
  columns: colList.optional(),
  column: col.optional(),
  min_variance: num.optional(),
  max_var: num.optional(),
});

export const varianceChecks = {
  deviation_from_rolling_mean: defineCheck(
    z.object({ column: col, window: z.number().int().positive().default(3), max_dev_pct: num.nonnegative().default(0.2) }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.column]);
      if (missing) return missing;
      const x = column(rows, p.column);
      const roll = rollingMean(x, p.window, 1);
      let maxDev = 0;
      x.forEach((v, i) => {
        const m = roll[i];
        if (v === null || m === null) return;
        maxDev = Math.max(maxDev, Math.abs(v - m) / (Math.abs(m) + EPS));
      });
      return bounded(maxDev <= p.max_dev_pct, { window: p.window, maxDeviationPct: maxDev });
    }
  ),

  variance_threshold: defineCheck(varianceParams, (rows, p) => {
    const names = p.columns ?? (p.column ? [p.column] : []);
    if (!names.length) return soft('variance_no_columns');
    const details: Record<string, Details> = {};
    let ok = true;
    for (const c of names) {
      if (!hasColumn(rows, c)) {
        details[c] = { variance: null, missing: true };
        ok = false;
        continue;
      }
      const v = variance(present(column(rows, c)));
      details[c] = { variance: v };
      if (v === null) continue;
      if (p.min_variance !== undefined && v < p.min_variance) ok = false;
      if (p.max_var !== undefined && v > p.max_var) ok = false;
    }
    return bounded(ok, { columns: details });
  }),

  rolling_mean_range: defineCheck(
    z.object({ column: col, low_factor: num, high_factor: num, window: z.number().int().positive().default(3) }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.column]);
      if (missing) return missing;
      const x = column(rows, p.column);
      const m = rollingMean(x, p.window);
      let outside = 0;
      x.forEach((v, i) => {
        const mean = m[i];
        if (v === null || mean === null) return;
        if (v < mean * p.low_factor || v > mean * p.high_factor) outside++;
      });
      return bounded(outside === 0, { outside });
    }
  ),

  ratio_consistency: defineCheck(
    z.object({ numerator: col, denominator: col, tolerance_abs: num.nonnegative() }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.numerator, p.denominator]);
      if (missing) return missing;
      const ratios: number[] = [];
      for (const r of rows) {
        const n = toNumber(r[p.numerator]);
        const d = toNumber(r[p.denominator]);
        if (n !== null && d !== null) ratios.push(safeDiv(n, d));
      }
      const med = median(ratios);
      if (med === null) return soft('insufficient_points');
      const maxDev = maxOf(ratios.map((x) => Math.abs(x - med) / (Math.abs(med) + EPS))) ?? 0;
      return bounded(maxDev <= p.tolerance_abs, { medianRatio: med, maxDev });
    }
  ),
};
