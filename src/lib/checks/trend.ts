import { z } from 'zod';
import { column, diff, maxOf, pctChange, pearson, present, type Series } from '../series';
import type { CheckOutcome, Dataset } from '../types';
import { bounded, col, defineCheck, missingColumns, num, soft } from './shared';

function correlationCheck(rows: Dataset, left: string, right: string, min?: number, max?: number): CheckOutcome {
  const missing = missingColumns(rows, [left, right]);
  if (missing) return missing;
  const xl = column(rows, left);
  const xr = column(rows, right);
  if (present(xl).length < 2 || present(xr).length < 2) return soft('insufficient_points');
  const corr = pearson(xl, xr);
  if (corr === null) return soft('insufficient_points', { reason: 'constant series' });
  const ok = (min === undefined || corr >= min) && (max === undefined || corr <= max);
  return bounded(ok, { corr });
}

/** increasing_N / decreasing_N: true when the series moves that way on N consecutive steps. */
function hasRun(xs: Series, token: string): boolean {
  const m = /^(increasing|decreasing)_(\d+)$/.exec(token.trim().toLowerCase());
  if (!m) return false;
  const n = Number(m[2]);
  let streak = 0;
  for (const d of diff(xs)) {
    if (d === null) continue;
    const moved = m[1] === 'increasing' ? d > 0 : d < 0;
    streak = moved ? streak + 1 : 0;
    if (streak >= n) return true;
  }
  return false;
}

const trendSide = z.object({ column: col, condition: z.string().min(1) });

export const trendChecks = {
  pct_change_range: defineCheck(z.object({ column: col, min_abs_pct: num.nonnegative() }), (rows, p) => {
    const missing = missingColumns(rows, [p.column]);
    if (missing) return missing;
    const changes = present(pctChange(column(rows, p.column))).map(Math.abs);
    const maxAbsPct = maxOf(changes);
    return bounded(changes.some((c) => c >= p.min_abs_pct), { maxAbsPct });
  }),

  trend_correlation_intents: defineCheck(
    z.object({ left: col, right: col, min_corr: num.optional(), max_corr: num.optional() }),
    (rows, p) => correlationCheck(rows, p.left, p.right, p.min_corr, p.max_corr)
  ),

  correlation_threshold: defineCheck(
    z.object({ x: col, y: col, min_corr: num.optional(), max_corr: num.optional() }),
    (rows, p) => correlationCheck(rows, p.x, p.y, p.min_corr, p.max_corr)
  ),

  // left is expected to trail right by up to max_lag_periods rows
  lead_lag_correlation: defineCheck(
    z.object({ left: col, right: col, max_lag_periods: z.number().int().nonnegative().default(1), min_corr: num }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.left, p.right]);
      if (missing) return missing;
      const xl = column(rows, p.left);
      const xr = column(rows, p.right);
      let best: { lag: number; corr: number } | null = null;
      for (let lag = 0; lag <= p.max_lag_periods; lag++) {
        const a = xl.slice(lag);
        const b = xr.slice(0, a.length);
        const corr = pearson(a, b);
        if (corr === null) continue;
        if (!best || Math.abs(corr) > Math.abs(best.corr)) best = { lag, corr };
      }
      if (!best) return soft('insufficient_points');
      return bounded(Math.abs(best.corr) >= p.min_corr, { bestCorr: best.corr, bestLag: best.lag });
    }
  ),

  conditional_trend_flag_intents: defineCheck(z.object({ left: trendSide, right: trendSide }), (rows, p) => {
    const missing = missingColumns(rows, [p.left.column, p.right.column]);
    if (missing) return missing;
    const leftHit = hasRun(column(rows, p.left.column), p.left.condition);
    const rightHit = hasRun(column(rows, p.right.column), p.right.condition);
    return bounded(!(leftHit && rightHit), { leftHit, rightHit });
  }),
};
