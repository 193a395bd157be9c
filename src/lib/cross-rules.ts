/*
  Cross-domain rules
  -------------------------------------
  A fixed catalogue of heuristics (CROSS-R-101 .. CROSS-R-125) that read
  aligned metric series from two or more domains at once.

  Every heuristic returns one of pass | warn | fail | na:
  - na when a domain or column it needs is absent, or there are too few periods
  - error only when it throws; the exception is caught here and recorded

  Thresholds are plain data (CrossThresholds) and can be overridden per call.
*/

import * as logger from 'firebase-functions/logger';
import {
  align,
  both,
  countTrue,
  growthFlags,
  lookupMetrics,
  ratioSeries,
  type Datasets,
  type MetricKey,
} from './cross-helpers';
import { errorMessage, errorName } from './errors';
import { defaultIntentConfig, resolveIntents, type IntentConfig } from './intent-resolver';
import { mean, pctChange, pearson, present, round, sum, type Series } from './series';
import { DOMAINS, type CrossFinding, type CrossReport, type Severity } from './types';

// --------------------------
// Thresholds
// --------------------------
export interface CrossThresholds {
  adverseShare: number;
  minAdversePeriods: number;
  growthUp: number;
  growthDown: number;
  mildUp: number;
  slightUp: number;
  marginDown: number;
  defectUp: number;
  runwayDown: number;
  rpeDrop: number;
  attributionFailRatio: number;
  attributionWarnRatio: number;
  cashflowTolerance: number;
  cashflowFailShare: number;
  forecastTolerance: number;
  priceVolumeCorr: number;
  runwayFloorMonths: number;
  ltvCacFloor: number;
  ltvCacCeiling: number;
  funnelFailShare: number;
  paybackMinMonths: number;
  paybackMaxMonths: number;
  paidOrganicMax: number;
  ratioVolatility: number;
}

export const DEFAULT_CROSS_THRESHOLDS: Readonly<CrossThresholds> = Object.freeze({
  adverseShare: 0.3,
  minAdversePeriods: 2,
  growthUp: 0.1,
  growthDown: -0.05,
  mildUp: 0.05,
  slightUp: 0.02,
  marginDown: -0.01,
  defectUp: 0.01,
  runwayDown: -0.02,
  rpeDrop: -0.15,
  attributionFailRatio: 1.02,
  attributionWarnRatio: 0.98,
  cashflowTolerance: 0.05,
  cashflowFailShare: 0.2,
  forecastTolerance: 0.15,
  priceVolumeCorr: 0.4,
  runwayFloorMonths: 6,
  ltvCacFloor: 1,
  ltvCacCeiling: 10,
  funnelFailShare: 0.25,
  paybackMinMonths: 0.2,
  paybackMaxMonths: 24,
  paidOrganicMax: 5,
  ratioVolatility: 0.5,
});

// --------------------------
// Types
// --------------------------
type VerdictStatus = 'pass' | 'warn' | 'fail' | 'na';

export interface Verdict {
  status: VerdictStatus;
  detail: string;
}

export interface CrossContext {
  data: Datasets;
  t: CrossThresholds;
}

export interface CrossHeuristic {
  id: string;
  title: string;
  severity: Severity;
  evaluate(ctx: CrossContext): Verdict;
}

const STATUS_SCORE: Readonly<Record<CrossFinding['status'], number>> = {
  pass: 1.0,
  warn: 0.6,
  fail: 0.0,
  na: 0.0,
  error: 0.0,
};

// --------------------------
// Helpers
// --------------------------
const pass = (detail: string): Verdict => ({ status: 'pass', detail });
const warn = (detail: string): Verdict => ({ status: 'warn', detail });
const fail = (detail: string): Verdict => ({ status: 'fail', detail });
const na = (detail: string): Verdict => ({ status: 'na', detail });

/**
 * Looks the metrics up, aligns them and hands the series (in key order) to
 * `fn`. Fewer than `minPeriods` aligned periods is na.
 */
function withSeries(
  ctx: CrossContext,
  keys: readonly MetricKey[],
  fn: (values: Series[], n: number) => Verdict,
  minPeriods = 2
): Verdict {
  const found = lookupMetrics(ctx.data, keys);
  if (!found.ok) return na(found.reason);
  const { periods, values } = align(found.series);
  if (periods.length < minPeriods) return na(`Insufficient aligned periods (${periods.length})`);
  return fn(values, periods.length);
}

/** fail at max(floor, ceil(share * n)) hits, warn on any hit. */
function byShare(hits: number, n: number, floor: number, share: number, details: { fail: string; warn: string; pass: string }): Verdict {
  if (hits >= Math.max(floor, Math.ceil(share * n))) return fail(details.fail);
  if (hits > 0) return warn(details.warn);
  return pass(details.pass);
}

const fill0 = (xs: Series): number[] => xs.map((x) => x ?? 0);

function forwardFill(xs: Series, skipZero = false): Series {
  let last: number | null = null;
  return xs.map((x) => {
    if (x !== null && !(skipZero && x === 0)) last = x;
    return last;
  });
}

const up = (xs: Series, threshold: number) => growthFlags(xs, threshold, -Infinity).up;
const down = (xs: Series, threshold: number) => growthFlags(xs, Infinity, threshold).down;

const money = (x: number) => Math.round(x).toLocaleString('en-US');
const corr2 = (c: number) => c.toFixed(2);

/** Periods where each flag series is set. */
function joint(...flags: boolean[][]): number {
  const [first, ...rest] = flags;
  return first ? countTrue(rest.reduce(both, first)) : 0;
}

function revenuePerEmployee(revenue: Series, headcount: Series): Series {
  return ratioSeries(fill0(revenue), forwardFill(headcount, true));
}

// --------------------------
// Catalogue
// --------------------------
export const CROSS_HEURISTICS: readonly CrossHeuristic[] = [
  {
    id: 'CROSS-R-101',
    title: 'Marketing spend up while orders and revenue fall',
    severity: 'block',
    evaluate: (ctx) =>
      withSeries(ctx, ['spend', 'orders', 'revenue'], ([spend, orders, revenue], n) => {
        const { t } = ctx;
        const spendUp = up(spend, t.growthUp);
        const ordersDown = down(orders, t.growthDown);
        const revenueDown = down(revenue, t.growthDown);
        const efficiencyDown = down(ratioSeries(revenue, spend), t.growthDown);
        const revenueWeak = revenueDown.map((x, i) => x || efficiencyDown[i]);
        const bad = joint(spendUp, ordersDown, revenueWeak);
        return byShare(bad, n, t.minAdversePeriods, t.adverseShare, {
          fail: `${bad} adverse funnel periods`,
          warn: `${bad} adverse funnel periods`,
          pass: 'No adverse funnel pattern',
        });
      }),
  },
  {
    id: 'CROSS-R-102',
    title: 'Attributed revenue does not exceed booked revenue',
    severity: 'block',
    evaluate: (ctx) =>
      withSeries(
        ctx,
        ['attributed_revenue', 'revenue'],
        ([attributed, revenue]) => {
          const a = sum(present(attributed));
          const r = sum(present(revenue));
          if (a > r * ctx.t.attributionFailRatio) return fail(`Attributed ${money(a)} > Revenue ${money(r)}`);
          if (a > r * ctx.t.attributionWarnRatio) return warn(`Attributed close to revenue (${money(a)} vs ${money(r)})`);
          return pass('Attributed <= Revenue');
        },
        1
      ),
  },
  {
    id: 'CROSS-R-103',
    title: 'Marketing payback within a realistic range',
    severity: 'warn',
    evaluate: (ctx) => {
      const withMargin = lookupMetrics(ctx.data, ['spend', 'attributed_revenue', 'gross_margin_pct']).ok;
      const keys: MetricKey[] = withMargin ? ['spend', 'attributed_revenue', 'gross_margin_pct'] : ['spend', 'attributed_revenue'];
      return withSeries(
        ctx,
        keys,
        ([spend, attributed, margin], n) => {
          const m = margin ? present(margin).map((x) => (x > 1 ? x / 100 : x)) : [];
          const fallbackMargin = mean(m) ?? 1;
          const payback = fill0(spend).map((s, i) => {
            const raw = margin?.[i];
            const pct = raw === null || raw === undefined ? fallbackMargin : raw > 1 ? raw / 100 : raw;
            const profit = (attributed[i] ?? 0) * pct;
            return profit === 0 ? Infinity : s / profit;
          });
          const low = payback.filter((p) => p < ctx.t.paybackMinMonths).length;
          const high = payback.filter((p) => p > ctx.t.paybackMaxMonths).length;
          return byShare(low + high, n, ctx.t.minAdversePeriods, ctx.t.adverseShare, {
            fail: `Unrealistic payback in ${low + high} periods`,
            warn: `${low} very-low and ${high} very-high payback periods`,
            pass: 'Payback looks realistic',
          });
        },
        1
      );
    },
  },
  {
    id: 'CROSS-R-104',
    title: 'Returns dampening revenue despite order growth',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['orders', 'returns', 'revenue'], ([orders, returns, revenue]) => {
        const { t } = ctx;
        const bad = joint(up(orders, t.growthUp), up(returns, t.growthUp), down(revenue, t.growthDown));
        return bad >= t.minAdversePeriods
          ? warn(`${bad} periods: returns dampened revenue despite order growth`)
          : pass('No strong returns-dampening pattern');
      }),
  },
  {
    id: 'CROSS-R-105',
    title: 'Hires minus exits matches headcount change',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['headcount', 'hires', 'exits'], ([headcount, hires, exits]) => {
        const h = fill0(forwardFill(headcount));
        const j = fill0(hires);
        const x = fill0(exits);
        const tol = Math.max(1, 0.2 * (mean(h) || 1));
        let off = 0;
        for (let i = 1; i < h.length; i++) {
          if (Math.abs(j[i] - x[i] - (h[i] - h[i - 1])) > tol) off++;
        }
        return off >= ctx.t.minAdversePeriods
          ? warn(`${off} periods where hires minus exits differs from headcount change`)
          : pass('Hires minus exits aligns with net headcount change');
      }),
  },
  {
    id: 'CROSS-R-106',
    title: 'Runway under pressure from payroll and hiring',
    severity: 'block',
    evaluate: (ctx) =>
      withSeries(ctx, ['runway_months', 'payroll', 'hires'], ([runway, payroll, hires]) => {
        const { t } = ctx;
        const bad = joint(down(fill0(runway), t.runwayDown), up(fill0(payroll), t.growthUp), up(fill0(hires), t.growthUp));
        if (bad >= t.minAdversePeriods) return fail('Runway falling while payroll and hiring rise');
        if (bad > 0) return warn('Runway pressure with payroll or hiring up');
        return pass('Runway vs payroll and hiring looks OK');
      }),
  },
  {
    id: 'CROSS-R-107',
    title: 'Efficiency paradox: spend and headcount up, orders down',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['spend', 'headcount', 'orders'], ([spend, headcount, orders]) => {
        const { t } = ctx;
        const bad = joint(up(spend, t.growthUp), up(headcount, t.growthUp), down(orders, t.growthDown));
        return bad >= t.minAdversePeriods
          ? warn(`${bad} periods show efficiency paradox`)
          : pass('No persistent efficiency paradox');
      }),
  },
  {
    id: 'CROSS-R-108',
    title: 'Cash-flow identity holds',
    severity: 'block',
    evaluate: (ctx) =>
      withSeries(
        ctx,
        ['operating_cashflow', 'investing_cashflow', 'financing_cashflow', 'net_change_in_cash'],
        ([op, inv, fin, net], n) => {
          const o = fill0(op);
          const i = fill0(inv);
          const f = fill0(fin);
          const bad = fill0(net).filter((c, k) => Math.abs(o[k] + i[k] + f[k] - c) > Math.max(1, Math.abs(c) * ctx.t.cashflowTolerance)).length;
          return byShare(bad, n, 1, ctx.t.cashflowFailShare, {
            fail: `${bad} periods violate cashflow identity`,
            warn: `${bad} borderline periods`,
            pass: 'Cashflow identity holds',
          });
        },
        1
      ),
  },
  {
    id: 'CROSS-R-109',
    title: 'Margin compression from rising spend',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['spend', 'gross_margin_pct'], ([spend, margin]) => {
        const bad = joint(up(spend, ctx.t.mildUp), down(margin, ctx.t.marginDown));
        return bad >= ctx.t.minAdversePeriods
          ? warn(`${bad} periods of margin compression with rising spend`)
          : pass('No persistent margin compression from spend');
      }),
  },
  {
    id: 'CROSS-R-110',
    title: 'Attrition rising with operational backlog',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['attrition_rate', 'backlog'], ([attrition, backlog]) => {
        const bad = joint(up(attrition, ctx.t.slightUp), up(backlog, ctx.t.mildUp));
        return bad >= ctx.t.minAdversePeriods
          ? warn(`${bad} periods where attrition likely driving backlog`)
          : pass('Attrition vs backlog not strongly linked');
      }),
  },
  {
    id: 'CROSS-R-111',
    title: 'Training effort not reducing defects',
    severity: 'info',
    evaluate: (ctx) =>
      withSeries(ctx, ['training_hours', 'defects'], ([training, defects]) => {
        const bad = joint(up(training, ctx.t.mildUp), up(defects, ctx.t.defectUp));
        return bad >= ctx.t.minAdversePeriods
          ? warn(`${bad} periods: training up but defects up`)
          : pass('Training effect on defects acceptable');
      }),
  },
  {
    id: 'CROSS-R-112',
    title: 'Inventory build-up draining operating cash flow',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['inventory', 'operating_cashflow'], ([inventory, op]) => {
        const bad = joint(up(inventory, ctx.t.mildUp), down(op, ctx.t.growthDown));
        return bad >= ctx.t.minAdversePeriods
          ? warn(`${bad} periods show inventory rising while operating cash flow falls`)
          : pass('No sustained inventory drag');
      }),
  },
  {
    id: 'CROSS-R-113',
    title: 'Revenue per employee vs payroll growth',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['headcount', 'payroll', 'revenue'], ([headcount, payroll, revenue]) => {
        const rpeDown = pctChange(revenuePerEmployee(revenue, headcount)).filter((c) => c !== null && c < ctx.t.rpeDrop).length;
        const payUp = countTrue(up(payroll, ctx.t.growthUp));
        return rpeDown >= ctx.t.minAdversePeriods && payUp >= ctx.t.minAdversePeriods
          ? warn('Revenue per employee falling while payroll grows')
          : pass('Headcount, payroll and revenue broadly aligned');
      }),
  },
  {
    id: 'CROSS-R-114',
    title: 'Attrition and recruitment spend rising together',
    severity: 'info',
    evaluate: (ctx) =>
      withSeries(ctx, ['attrition_rate', 'recruitment_spend'], ([attrition, recruitment]) => {
        const bad = joint(up(attrition, ctx.t.slightUp), up(recruitment, ctx.t.growthUp));
        return bad >= ctx.t.minAdversePeriods
          ? warn(`${bad} periods: attrition and recruitment spend rising together`)
          : pass('Attrition vs recruitment spend acceptable');
      }),
  },
  {
    id: 'CROSS-R-115',
    title: 'Paid vs organic traffic balance',
    severity: 'info',
    evaluate: (ctx) =>
      withSeries(
        ctx,
        ['paid_traffic', 'organic_traffic'],
        ([paid, organic]) => {
          const ratio = ratioSeries(paid.map((x) => (x === 0 ? null : x)), organic);
          if (!present(ratio).length) return na('Insufficient numeric data');
          const high = ratio.filter((r) => r !== null && r > ctx.t.paidOrganicMax).length;
          const volatile = pctChange(ratio).filter((c) => c !== null && Math.abs(c) > ctx.t.ratioVolatility).length;
          return high >= 2 || volatile >= 3
            ? warn('Paid vs organic looks imbalanced or volatile')
            : pass('Paid vs organic balance reasonable');
        },
        1
      ),
  },
  {
    id: 'CROSS-R-116',
    title: 'Lead to SQL to order funnel is monotone',
    severity: 'block',
    evaluate: (ctx) =>
      withSeries(
        ctx,
        ['leads', 'sql', 'orders'],
        ([leads, sql, orders], n) => {
          const l = fill0(leads);
          const s = fill0(sql);
          const o = fill0(orders);
          const v = l.filter((_, i) => l[i] + 1e-6 < s[i] - 1e-6 || s[i] + 1e-6 < o[i] - 1e-6).length;
          return byShare(v, n, ctx.t.minAdversePeriods, ctx.t.funnelFailShare, {
            fail: `Funnel inconsistency in ${v}/${n} periods`,
            warn: `Minor funnel inconsistency in ${v}/${n} periods`,
            pass: 'Lead to SQL to order funnel consistent',
          });
        },
        1
      ),
  },
  {
    id: 'CROSS-R-117',
    title: 'Revenue forecast vs actual',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(
        ctx,
        ['revenue_forecast', 'revenue'],
        ([forecast, actual], n) => {
          const f = fill0(forecast);
          const bad = fill0(actual).filter((a, i) => Math.abs(f[i] - a) > Math.max(1, Math.abs(a) * ctx.t.forecastTolerance)).length;
          return byShare(bad, n, ctx.t.minAdversePeriods, ctx.t.adverseShare, {
            fail: `${bad} periods outside tolerance`,
            warn: `${bad} periods borderline forecast error`,
            pass: 'Forecast vs actual within tolerance',
          });
        },
        1
      ),
  },
  {
    id: 'CROSS-R-118',
    title: 'Price-volume correlation is plausible',
    severity: 'info',
    evaluate: (ctx) =>
      withSeries(ctx, ['revenue', 'orders'], ([revenue, orders]) => {
        const volume = forwardFill(orders, true);
        const price = ratioSeries(fill0(revenue), volume);
        const c = pearson(price, volume);
        if (c === null) return na('Insufficient overlap to compute correlation');
        return c > ctx.t.priceVolumeCorr
          ? warn(`Positive price-volume correlation (corr ${corr2(c)})`)
          : pass(`Elasticity plausible (corr ${corr2(c)})`);
      }),
  },
  {
    id: 'CROSS-R-119',
    title: 'Complaints move with backlog',
    severity: 'info',
    evaluate: (ctx) =>
      withSeries(ctx, ['backlog', 'complaints'], ([backlog, complaints]) => {
        const c = pearson(fill0(backlog), fill0(complaints));
        if (c === null) return na('Insufficient overlap to compute correlation');
        return c < 0
          ? warn(`Backlog up with complaints down (corr ${corr2(c)})`)
          : pass(`Complaints move with backlog (corr ${corr2(c)})`);
      }),
  },
  {
    id: 'CROSS-R-120',
    title: 'Maintenance spend vs defects',
    severity: 'info',
    evaluate: (ctx) =>
      withSeries(ctx, ['maintenance_spend', 'defects'], ([maintenance, defects]) => {
        const bad = joint(up(maintenance, ctx.t.mildUp), up(defects, ctx.t.defectUp));
        return bad >= ctx.t.minAdversePeriods
          ? warn(`${bad} periods: maintenance spend up but defects up`)
          : pass('Maintenance spend aligns with defect trend');
      }),
  },
  {
    id: 'CROSS-R-121',
    title: 'Revenue per employee vs hiring velocity',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['headcount', 'hires', 'revenue'], ([headcount, hires, revenue]) => {
        const rpeDown = pctChange(revenuePerEmployee(revenue, headcount)).filter((c) => c !== null && c < ctx.t.rpeDrop).length;
        const hiringUp = countTrue(up(hires, ctx.t.growthUp));
        return rpeDown >= ctx.t.minAdversePeriods && hiringUp >= ctx.t.minAdversePeriods
          ? warn('Revenue per employee falling while hiring velocity increases')
          : pass('Revenue per employee vs hiring velocity acceptable');
      }),
  },
  {
    id: 'CROSS-R-122',
    title: 'LTV:CAC within realistic bounds',
    severity: 'block',
    evaluate: (ctx) =>
      withSeries(
        ctx,
        ['ltv', 'cac'],
        ([ltv, cac]) => {
          const ratio = present(ratioSeries(ltv.map((x) => (x === 0 ? null : x)), cac));
          if (!ratio.length) return na('Insufficient LTV or CAC data');
          const low = ratio.filter((r) => r < ctx.t.ltvCacFloor).length;
          const extreme = ratio.filter((r) => r > ctx.t.ltvCacCeiling).length;
          if (low >= ctx.t.minAdversePeriods) return fail(`${low} periods LTV:CAC < ${ctx.t.ltvCacFloor}`);
          if (extreme >= ctx.t.minAdversePeriods) return warn(`${extreme} periods LTV:CAC unusually high`);
          return pass('LTV:CAC within reasonable bounds');
        },
        1
      ),
  },
  {
    id: 'CROSS-R-123',
    title: 'Spend growth vs lead quality',
    severity: 'warn',
    evaluate: (ctx) =>
      withSeries(ctx, ['spend', 'leads', 'lead_quality'], ([spend, , quality]) => {
        const bad = joint(up(spend, ctx.t.growthUp), down(quality, ctx.t.growthDown));
        return bad >= ctx.t.minAdversePeriods
          ? warn(`${bad} periods: spend up while lead quality down`)
          : pass('Spend vs lead quality stable');
      }),
  },
  {
    id: 'CROSS-R-124',
    title: 'Overtime improving SLA outcomes',
    severity: 'info',
    evaluate: (ctx) =>
      withSeries(ctx, ['overtime', 'sla_breaches'], ([overtime, breaches]) => {
        const breachesDown = down(breaches, ctx.t.growthDown);
        const miss = joint(up(overtime, ctx.t.mildUp), breachesDown.map((x) => !x));
        return miss >= ctx.t.minAdversePeriods
          ? warn(`${miss} periods: overtime up without SLA improvement`)
          : pass('Overtime seems to help SLA outcomes');
      }),
  },
  {
    id: 'CROSS-R-125',
    title: 'Runway vs spend and hiring',
    severity: 'block',
    evaluate: (ctx) =>
      withSeries(ctx, ['runway_months', 'spend', 'hires'], ([runway, spend, hires]) => {
        const { t } = ctx;
        const low = present(runway).filter((r) => r < t.runwayFloorMonths).length;
        const spendUp = countTrue(up(fill0(spend), t.growthUp));
        const hiresUp = countTrue(up(fill0(hires), t.growthUp));
        const floor = t.minAdversePeriods;
        if (low >= floor && spendUp >= floor && hiresUp >= floor) {
          return fail('Low runway while spend and hiring rise across multiple periods');
        }
        if (low >= 1 && (spendUp >= 1 || hiresUp >= 1)) return warn('Runway tight with rising spend or hiring');
        return pass('Runway vs spend and hiring looks reasonable');
      }),
  },
];

// --------------------------
// Engine
// --------------------------
export interface CrossOptions {
  thresholds?: Partial<CrossThresholds>;
  intentConfig?: IntentConfig;
  // inputs are raw unless the caller already resolved them
  resolved?: boolean;
  heuristics?: readonly CrossHeuristic[];
}

export function runHeuristic(h: CrossHeuristic, ctx: CrossContext): CrossFinding {
  const base = { ruleId: h.id, title: h.title, severity: h.severity };
  try {
    const v = h.evaluate(ctx);
    return { ...base, status: v.status, score: STATUS_SCORE[v.status], detail: v.detail };
  } catch (e) {
    const error = { name: errorName(e), message: errorMessage(e) };
    logger.warn('Cross-domain heuristic failed', { ruleId: h.id, ...error });
    return { ...base, status: 'error', score: STATUS_SCORE.error, detail: `${error.name}: ${error.message}`, error };
  }
}

export function crossAggregate(findings: CrossFinding[]): number | null {
  const scored = findings.filter((f) => f.status === 'pass' || f.status === 'warn' || f.status === 'fail');
  return scored.length ? round(sum(scored.map((f) => f.score)) / scored.length) : null;
}

export function evaluateCrossRules(datasets: Datasets, options: CrossOptions = {}): CrossReport {
  const heuristics = options.heuristics ?? CROSS_HEURISTICS;
  const config = options.intentConfig ?? defaultIntentConfig;
  const data: Datasets = {};
  for (const d of DOMAINS) {
    const rows = datasets[d];
    if (rows) data[d] = options.resolved ? rows : resolveIntents(rows, d, config);
  }
  const ctx: CrossContext = { data, t: { ...DEFAULT_CROSS_THRESHOLDS, ...options.thresholds } };
  const findings = heuristics.map((h) => runHeuristic(h, ctx));
  return {
    meta: { engine: 'heuristic', rulesCount: heuristics.length, status: 'ok', error: null },
    findings,
    aggregateScore: crossAggregate(findings),
  };
}
