/*
  Scoring
  -------------------------------------
  Per-domain aggregation, run labels and the two composite schemes:

    standard  -> combineDomains()      weighted by domain, Healthy / Caution / Critical
    granular  -> orchestrationIndex()  equal weights + cross score, Healthy / Watch / Critical / Severe

  Both only look at domains whose report state is `evaluated`. penaltyIndex()
  is the 0-100 view of the same run: every failing rule takes points off its
  domain, cross findings take a reduced share off all of them, and each domain
  gets templated insight lines.
*/

import { z } from 'zod';
import rawInsights from '../config/insights.json';
import {
  byDomain,
  DOMAINS,
  type CompositeIndex,
  type CrossFinding,
  type Domain,
  type DomainReport,
  type InsightLevel,
  type PenaltyIndex,
  type RiskItem,
  type RuleResult,
} from './types';
import { round } from './series';

export const DEFAULT_DOMAIN_WEIGHTS: Readonly<Record<Domain, number>> = {
  finance: 0.25,
  operations: 0.25,
  marketing: 0.2,
  people: 0.15,
  talent: 0.15,
};

const SEVERITY_WEIGHTS: Readonly<Record<string, number>> = { block: 1.0, warn: 0.6, info: 0.3 };

export function severityWeight(severity: string): number {
  return SEVERITY_WEIGHTS[severity.trim().toLowerCase()] ?? 0.5;
}

/** Severity-weighted mean of rule scores; 0 when there is nothing to weigh. */
export function aggregateScores(results: Pick<RuleResult, 'severity' | 'score'>[]): number {
  let num = 0;
  let den = 0;
  for (const r of results) {
    const w = severityWeight(r.severity);
    num += w * r.score;
    den += w;
  }
  return den > 0 ? round(num / den) : 0;
}

export const RUN_LABELS = {
  blocked: { label: 'Blocked (critical issues)', rationale: 'One or more blocking rules failed.' },
  attention: { label: 'Needs attention', rationale: 'Non-blocking issues detected.' },
  ok: { label: 'Authentic enough', rationale: 'All active rules passed.' },
} as const;

export function runLabel(results: Pick<RuleResult, 'severity' | 'status'>[]): { label: string; rationale: string } {
  if (results.some((r) => r.severity === 'block' && r.status === 'fail')) return RUN_LABELS.blocked;
  if (results.some((r) => r.status !== 'pass')) return RUN_LABELS.attention;
  return RUN_LABELS.ok;
}

// --------------------------
// Composite
// --------------------------
const evaluatedReports = (reports: Partial<Record<Domain, DomainReport>>): DomainReport[] =>
  DOMAINS.map((d) => reports[d]).filter((r): r is DomainReport => r !== undefined && r.state === 'evaluated');

/** The `limit` lowest-scoring rules across evaluated domains; ties keep domain order. */
export function topRisks(reports: Partial<Record<Domain, DomainReport>>, limit = 5): RiskItem[] {
  const items: RiskItem[] = evaluatedReports(reports).flatMap((rep) =>
    rep.breakdown.map((r) => ({
      domain: rep.domain,
      ruleId: r.id,
      title: r.title,
      severity: r.severity,
      status: r.status,
      score: r.score,
    }))
  );
  return items
    .map((item, i) => ({ item, i }))
    .sort((a, b) => a.item.score - b.item.score || a.i - b.i)
    .slice(0, limit)
    .map(({ item }) => item);
}

function labelFor(score: number, bands: readonly (readonly [number, string])[], fallback: string): string {
  return bands.find(([min]) => score >= min)?.[1] ?? fallback;
}

const STANDARD_BANDS = [[0.85, 'Healthy'], [0.7, 'Caution']] as const;
const GRANULAR_BANDS = [[0.75, 'Healthy'], [0.55, 'Watch'], [0.4, 'Critical']] as const;

export function combineDomains(
  reports: Partial<Record<Domain, DomainReport>>,
  weights: Partial<Record<Domain, number>> = DEFAULT_DOMAIN_WEIGHTS
): CompositeIndex {
  const included = evaluatedReports(reports);
  let num = 0;
  let den = 0;
  const used: Record<string, number> = {};
  for (const rep of included) {
    const w = weights[rep.domain] ?? 0;
    if (w <= 0) continue;
    num += w * rep.score;
    den += w;
    used[rep.domain] = w;
  }
  const score = den > 0 ? round(num / den) : null;
  return {
    scheme: 'standard',
    score,
    label: score === null ? 'No data' : labelFor(score, STANDARD_BANDS, 'Critical'),
    weights: used,
    domainsIncluded: Object.keys(used),
    topRisks: topRisks(reports),
  };
}

export function orchestrationIndex(
  reports: Partial<Record<Domain, DomainReport>>,
  crossScore: number | null = null
): CompositeIndex {
  const included = evaluatedReports(reports);
  const parts = included.map((r) => r.score);
  if (crossScore !== null) parts.push(crossScore);
  const score = parts.length ? round(parts.reduce((s, x) => s + x, 0) / parts.length) : null;
  const weights: Record<string, number> = {};
  for (const r of included) weights[r.domain] = round(1 / parts.length);
  if (crossScore !== null) weights.cross = round(1 / parts.length);
  return {
    scheme: 'granular',
    score,
    label: score === null ? 'No data' : labelFor(score, GRANULAR_BANDS, 'Severe'),
    weights,
    domainsIncluded: included.map((r) => r.domain),
    topRisks: topRisks(reports),
  };
}

// --------------------------
// Penalty index
// --------------------------
export interface PenaltyWeights {
  block: number;
  warn: number;
  // share of a cross finding's penalty charged to every domain
  commonFactor: number;
  bucketPenalty: number;
}

export const DEFAULT_PENALTY_WEIGHTS: Readonly<PenaltyWeights> = { block: 10, warn: 5, commonFactor: 0.5, bucketPenalty: 3 };

const levelTemplates = z.object({ high: z.string(), medium: z.string(), low: z.string() }).partial();

export const insightTemplatesSchema = z.record(
  z.string(),
  z.object({ topline: levelTemplates.default({}), buckets: z.record(z.string(), levelTemplates).default({}) })
);

export type InsightTemplates = z.infer<typeof insightTemplatesSchema>;

export const defaultInsightTemplates: InsightTemplates = insightTemplatesSchema.parse(rawInsights);

export const UNSPECIFIED_BUCKET = 'unspecified';
export const CROSS_BUCKET = 'cross_domain';

/** A failing rule; `domain: null` marks a cross-domain finding. */
export interface PenaltyFinding {
  domain: Domain | null;
  severity: string;
  bucket?: string;
}

/** Non-passing rules of evaluated domains plus warn/fail cross findings. */
export function penaltyFindings(
  reports: Partial<Record<Domain, DomainReport>>,
  cross: Pick<CrossFinding, 'severity' | 'status'>[] = []
): PenaltyFinding[] {
  const out: PenaltyFinding[] = evaluatedReports(reports).flatMap((rep) =>
    rep.breakdown
      .filter((r) => r.status !== 'pass')
      .map((r) => ({ domain: rep.domain, severity: r.severity, bucket: r.bucket }))
  );
  for (const f of cross) {
    if (f.status === 'fail' || f.status === 'warn') out.push({ domain: null, severity: f.severity, bucket: CROSS_BUCKET });
  }
  return out;
}

export function insightLevel(score: number): InsightLevel {
  if (score >= 85) return 'high';
  return score >= 60 ? 'medium' : 'low';
}

export function penaltyIndex(
  findings: PenaltyFinding[],
  weights: Partial<PenaltyWeights> = {},
  templates: InsightTemplates = defaultInsightTemplates
): PenaltyIndex {
  const w = { ...DEFAULT_PENALTY_WEIGHTS, ...weights };
  const penalties = byDomain(() => 0);
  const bucketFails = byDomain(() => new Map<string, number>());
  let anyBlock = false;
  let anyWarn = false;

  for (const f of findings) {
    const base = f.severity === 'block' ? w.block : w.warn;
    const targets = f.domain === null ? DOMAINS : [f.domain];
    const factor = f.domain === null ? w.commonFactor : 1;
    const bucket = f.bucket ?? UNSPECIFIED_BUCKET;
    for (const d of targets) {
      penalties[d] += base * factor;
      bucketFails[d].set(bucket, (bucketFails[d].get(bucket) ?? 0) + 1);
    }
    if (f.severity === 'block') anyBlock = true;
    else if (f.severity === 'warn') anyWarn = true;
  }

  const domainIndices = byDomain((d) => Math.max(0, 100 - penalties[d]));
  const bucketScores = byDomain((d) => {
    const scores: Record<string, number> = {};
    for (const [bucket, count] of bucketFails[d]) scores[bucket] = Math.max(0, 100 - count * w.bucketPenalty);
    return scores;
  });

  const insights = byDomain((d) => {
    const tpl = templates[d];
    if (!tpl) return [];
    const lines: string[] = [];
    const topline = tpl.topline[insightLevel(domainIndices[d])];
    if (topline) lines.push(topline);
    for (const [bucket, score] of Object.entries(bucketScores[d])) {
      const line = tpl.buckets[bucket]?.[insightLevel(score)];
      if (line) lines.push(line);
    }
    return lines;
  });

  const label = anyBlock
    ? RUN_LABELS.blocked.label
    : anyWarn
      ? RUN_LABELS.attention.label
      : RUN_LABELS.ok.label;

  return {
    label,
    index: round(DOMAINS.reduce((acc, d) => acc + domainIndices[d], 0) / DOMAINS.length, 2),
    domainIndices: byDomain((d) => round(domainIndices[d], 2)),
    bucketScores,
    insights,
  };
}
