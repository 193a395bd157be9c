import { describe, it, expect } from 'vitest';
import { align, findColumn, lookupMetrics, periodSeries } from '../lib/cross-helpers';
import {
  CROSS_HEURISTICS,
  crossAggregate,
  evaluateCrossRules,
  runHeuristic,
  DEFAULT_CROSS_THRESHOLDS,
  type CrossHeuristic,
} from '../lib/cross-rules';
import type { CrossFinding, Dataset } from '../lib/types';

const periods = ['2024-01', '2024-02', '2024-03', '2024-04'];

// revenue +5%, orders -8%, spend +12% per period
const finance: Dataset = periods.map((period, i) => ({
  period,
  revenue: 100 * 1.05 ** i,
  orders: 100 * 0.92 ** i,
}));
const marketing: Dataset = periods.map((period, i) => ({ period, spend: 100 * 1.12 ** i }));

const byId = (findings: CrossFinding[], id: string) => findings.find((f) => f.ruleId === id);

function only(id: string): CrossHeuristic[] {
  return CROSS_HEURISTICS.filter((h) => h.id === id);
}

describe('cross-domain helpers', () => {
  it('prefers exact column names over partial ones', () => {
    const rows = [{ 'Net Revenue': 1, revenue: 2 }];
    expect(findColumn(rows, ['revenue'])).toBe('revenue');
    expect(findColumn([{ 'Net Revenue': 1 }], ['revenue'])).toBe('Net Revenue');
    expect(findColumn([{ 'Gross-Margin': 1 }], ['gross_margin'])).toBe('Gross-Margin');
    expect(findColumn([], ['revenue'])).toBeNull();
  });

  it('aggregates rows per period in date order', () => {
    const rows = [
      { period_intent: '2024-02', x: 1 },
      { period_intent: '2024-01', x: 2 },
      { period_intent: '2024-02', x: 3 },
    ];
    expect(periodSeries(rows, 'x', 'sum')).toEqual({ periods: ['2024-01', '2024-02'], values: [2, 4] });
    expect(periodSeries(rows, 'x', 'mean').values).toEqual([2, 2]);
  });

  it('names absent domains before missing columns', () => {
    expect(lookupMetrics({ finance }, ['spend', 'revenue'])).toEqual({ ok: false, reason: 'Requires Marketing' });
    expect(lookupMetrics({ finance, marketing }, ['revenue', 'attributed_revenue'])).toEqual({
      ok: false,
      reason: 'Columns not found (attributed_revenue)',
    });
  });

  it('aligns by position when periods do not overlap', () => {
    const a = { metric: 'spend' as const, domain: 'marketing' as const, column: 'x', periods: ['1', '2', '3'], values: [1, 2, 3] };
    const b = { metric: 'revenue' as const, domain: 'finance' as const, column: 'y', periods: ['2024-01', '2024-02'], values: [5, 6] };
    expect(align([a, b])).toEqual({ periods: ['1', '2'], values: [[1, 2], [5, 6]], byPeriod: false });
  });
});

describe('cross-domain heuristics', () => {
  it('has a unique id per heuristic', () => {
    const ids = CROSS_HEURISTICS.map((h) => h.id);
    expect(ids).toHaveLength(25);
    expect(new Set(ids).size).toBe(25);
    expect(ids[0]).toBe('CROSS-R-101');
    expect(ids[24]).toBe('CROSS-R-125');
  });

  it('fails the adverse funnel pattern', () => {
    const report = evaluateCrossRules({ finance, marketing }, { heuristics: only('CROSS-R-101') });
    expect(report.findings).toEqual([
      {
        ruleId: 'CROSS-R-101',
        title: 'Marketing spend up while orders and revenue fall',
        severity: 'block',
        status: 'fail',
        score: 0,
        detail: '3 adverse funnel periods',
      },
    ]);
    expect(report.aggregateScore).toBe(0);
  });

  it('lets thresholds be overridden per call', () => {
    const report = evaluateCrossRules(
      { finance, marketing },
      { heuristics: only('CROSS-R-101'), thresholds: { minAdversePeriods: 4 } }
    );
    expect(report.findings[0]).toMatchObject({ status: 'warn', score: 0.6, detail: '3 adverse funnel periods' });
  });

  it('passes a flat funnel', () => {
    const flatFinance = periods.map((period) => ({ period, revenue: 100, orders: 50 }));
    const flatMarketing = periods.map((period) => ({ period, spend: 20 }));
    const [f] = evaluateCrossRules({ finance: flatFinance, marketing: flatMarketing }, { heuristics: only('CROSS-R-101') }).findings;
    expect(f).toMatchObject({ status: 'pass', detail: 'No adverse funnel pattern' });
  });

  it('is not applicable without the domains it reads', () => {
    const [f] = evaluateCrossRules({ finance }, { heuristics: only('CROSS-R-101') }).findings;
    expect(f).toMatchObject({ status: 'na', score: 0, detail: 'Requires Marketing' });
  });

  it('needs at least two aligned periods for trend rules', () => {
    const [f] = evaluateCrossRules(
      { finance: finance.slice(0, 1), marketing: marketing.slice(0, 1) },
      { heuristics: only('CROSS-R-101') }
    ).findings;
    expect(f).toMatchObject({ status: 'na', detail: 'Insufficient aligned periods (1)' });
  });

  it('compares attributed and booked revenue', () => {
    const mk = (attributed: number) => periods.slice(0, 2).map((period) => ({ period, spend: 10, attributed_revenue: attributed }));
    const fin = periods.slice(0, 2).map((period) => ({ period, revenue: 100 }));
    const run = (attributed: number) =>
      evaluateCrossRules({ finance: fin, marketing: mk(attributed) }, { heuristics: only('CROSS-R-102') }).findings[0];
    expect(run(60)).toMatchObject({ status: 'pass', detail: 'Attributed <= Revenue' });
    expect(run(99.5)).toMatchObject({ status: 'warn', detail: 'Attributed close to revenue (199 vs 200)' });
    expect(run(1500)).toMatchObject({ status: 'fail', detail: 'Attributed 3,000 > Revenue 200' });
  });

  it('checks the cash-flow identity', () => {
    const rows = [
      { period: '2024-01', operating_cashflow: 100, investing_cashflow: -30, financing_cashflow: 10, net_change_in_cash: 80 },
      { period: '2024-02', operating_cashflow: 100, investing_cashflow: -30, financing_cashflow: 10, net_change_in_cash: 200 },
    ];
    const [f] = evaluateCrossRules({ finance: rows }, { heuristics: only('CROSS-R-108') }).findings;
    expect(f).toMatchObject({ status: 'fail', detail: '1 periods violate cashflow identity' });
  });

  it('bounds LTV:CAC', () => {
    const run = (ltv: number[]) =>
      evaluateCrossRules(
        { marketing: ltv.map((x, i) => ({ period: periods[i], ltv: x, cac: 100 })) },
        { heuristics: only('CROSS-R-122') }
      ).findings[0];
    expect(run([300, 90])).toMatchObject({ status: 'pass' });
    expect(run([50, 80])).toMatchObject({ status: 'fail', detail: '2 periods LTV:CAC < 1' });
  });

  it('records a heuristic that throws as an error finding', () => {
    const broken: CrossHeuristic = {
      id: 'CROSS-X',
      title: 'Broken',
      severity: 'warn',
      evaluate: () => {
        throw new Error('boom');
      },
    };
    expect(runHeuristic(broken, { data: {}, t: DEFAULT_CROSS_THRESHOLDS })).toEqual({
      ruleId: 'CROSS-X',
      title: 'Broken',
      severity: 'warn',
      status: 'error',
      score: 0,
      detail: 'Error: boom',
      error: { name: 'Error', message: 'boom' },
    });
  });

  it('runs the whole catalogue on empty input', () => {
    const report = evaluateCrossRules({});
    expect(report.meta).toEqual({ engine: 'heuristic', rulesCount: 25, status: 'ok', error: null });
    expect(report.findings.every((f) => f.status === 'na')).toBe(true);
    expect(report.aggregateScore).toBeNull();
  });
});

describe('crossAggregate', () => {
  it('averages scored findings only', () => {
    const f = (status: CrossFinding['status'], score: number): CrossFinding => ({
      ruleId: status,
      title: status,
      severity: 'warn',
      status,
      score,
      detail: '',
    });
    expect(crossAggregate([f('pass', 1), f('warn', 0.6), f('na', 0), f('error', 0)])).toBe(0.8);
    expect(crossAggregate([f('na', 0)])).toBeNull();
  });
});
