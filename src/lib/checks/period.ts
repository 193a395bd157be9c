import { z } from 'zod';
import { parsePeriod, periodTime } from '../period';
import { PERIOD_INTENT } from '../intent-resolver';
import type { Dayjs } from 'dayjs';
import type { Dataset } from '../types';
import { bounded, col, cols, defineCheck, missingColumns, num, soft } from './shared';

const DAY_MS = 24 * 60 * 60 * 1000;

function parsedDates(rows: Dataset, name: string): Dayjs[] {
  const out: Dayjs[] = [];
  for (const r of rows) {
    const d = parsePeriod(r[name]);
    if (d) out.push(d);
  }
  return out;
}

export const periodChecks = {
  monotonic_time_intents: defineCheck(z.object({ column: col.default(PERIOD_INTENT) }), (rows, p) => {
    const missing = missingColumns(rows, [p.column]);
    if (missing) return missing;
    const times = rows.map((r) => periodTime(r[p.column]));
    const parsed = times.filter((t): t is number => t !== null);
    if (!parsed.length) return soft('evaluation_error', { column: p.column, error: 'No parseable periods' });
    const ok = parsed.every((t, i) => i === 0 || t >= parsed[i - 1]);
    return bounded(ok, { unparsed: times.length - parsed.length });
  }),

  fiscal_year_close_present: defineCheck(z.object({ period_column: col.default(PERIOD_INTENT) }), (rows, p) => {
    const missing = missingColumns(rows, [p.period_column]);
    if (missing) return missing;
    const months = Array.from(new Set(parsedDates(rows, p.period_column).map((d) => d.month() + 1))).sort((a, b) => a - b);
    return bounded(months.includes(3) || months.includes(12), { monthsPresent: months });
  }),

  period_gap_check: defineCheck(
    z.object({ column: col.default(PERIOD_INTENT), max_gap_months: num.positive() }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.column]);
      if (missing) return missing;
      const times = parsedDates(rows, p.column)
        .map((d) => d.valueOf())
        .sort((a, b) => a - b);
      let maxGap = 0;
      for (let i = 1; i < times.length; i++) {
        maxGap = Math.max(maxGap, (times[i] - times[i - 1]) / DAY_MS / 30);
      }
      return bounded(maxGap <= p.max_gap_months, { maxGapMonths: maxGap });
    }
  ),

  period_alignment_multi: defineCheck(z.object({ columns: cols }), (rows, p) => {
    const missing = missingColumns(rows, p.columns);
    if (missing) return missing;
    const sets = p.columns.map((c) => new Set(parsedDates(rows, c).map((d) => d.format('YYYY-MM-DD'))));
    const [first, ...rest] = sets;
    const common = Array.from(first).filter((d) => rest.every((s) => s.has(d)));
    const ok = sets.every((s) => s.size === common.length);
    return bounded(ok, { commonPeriods: common.length, columns: p.columns });
  }),
};
