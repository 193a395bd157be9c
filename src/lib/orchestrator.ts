/*
  Orchestrator
  -------------------------------------
  One evaluation run over every supplied domain:

    1. load rule banks (read-only, shared)
    2. evaluate domains through a bounded pool; each domain on its own copy
    3. join, then the cross-domain pass
    4. composite index (scheme chosen by configuration) and penalty index
    5. reality overlay

  The report always carries all five domains and every top-level block. A
  domain that throws is reported with state `error` and left out of the
  composite; nothing here rejects for bad data.
*/

import * as logger from 'firebase-functions/logger';
import { DEFAULT_CONFIG } from './config';
import { evaluateCrossRules, type CrossThresholds } from './cross-rules';
import type { Datasets } from './cross-helpers';
import { describeError } from './errors';
import { defaultIntentConfig, type IntentConfig } from './intent-resolver';
import { emptyFeasibility, evaluateReality } from './reality';
import { loadDomainRules } from './rule-loader';
import { flattenInput, RuleEngine } from './rules-engine';
import { combineDomains, orchestrationIndex, penaltyFindings, penaltyIndex, type PenaltyWeights } from './scoring';
import {
  byDomain,
  DOMAINS,
  type CompositeIndex,
  type CompositeScheme,
  type CrossReport,
  type Domain,
  type DomainInput,
  type DomainInputs,
  type DomainReport,
  type EvaluationReport,
  type RealityReport,
} from './types';
import { runPool } from './worker-pool';

export interface EvaluateOptions {
  rulesDir?: string;
  signalsDir?: string;
  workerPoolSize?: number;
  scheme?: CompositeScheme;
  domainWeights?: Partial<Record<Domain, number>>;
  crossThresholds?: Partial<CrossThresholds>;
  penaltyWeights?: Partial<PenaltyWeights>;
  intentConfig?: IntentConfig;
  cross?: boolean;
  reality?: boolean;
  // YYYY-MM-DD; signals valid until before this day are ignored
  asOf?: string;
}

const hasRows = (input: DomainInput) => flattenInput(input).length > 0;

function emptyReport(domain: Domain, state: 'skipped' | 'error', rationale: string, error?: string): DomainReport {
  return {
    domain,
    state,
    label: state === 'skipped' ? 'Not evaluated' : 'Evaluation error',
    rationale,
    score: 0,
    rulesCount: 0,
    findings: [],
    breakdown: [],
    loadErrors: [],
    ...(error === undefined ? {} : { error }),
  };
}

export async function evaluateDomain(
  domain: Domain,
  input: DomainInput,
  rulesDir: string,
  intentConfig: IntentConfig = defaultIntentConfig
): Promise<DomainReport> {
  const { rules, errors } = await loadDomainRules(rulesDir, domain);
  const engine = new RuleEngine(domain, rules, { intentConfig });
  const res = engine.evaluate(input);
  return {
    domain,
    state: 'evaluated',
    label: res.label,
    rationale: res.rationale,
    score: res.score,
    rulesCount: engine.activeRules.length,
    findings: res.findings,
    breakdown: res.breakdown,
    loadErrors: errors,
  };
}

function skippedCross(): CrossReport {
  return { meta: { engine: 'heuristic', rulesCount: 0, status: 'skipped', error: null }, findings: [], aggregateScore: null };
}

function runCross(inputs: DomainInputs, options: EvaluateOptions): CrossReport {
  if (options.cross === false) return skippedCross();
  try {
    const datasets: Datasets = {};
    for (const d of DOMAINS) {
      const input = inputs[d];
      if (input) datasets[d] = flattenInput(input);
    }
    return evaluateCrossRules(datasets, { thresholds: options.crossThresholds, intentConfig: options.intentConfig });
  } catch (e) {
    logger.error('Cross-domain pass failed', { error: describeError(e) });
    return { ...skippedCross(), meta: { engine: 'heuristic', rulesCount: 0, status: 'error', error: describeError(e) } };
  }
}

export function compositeFor(
  scheme: CompositeScheme,
  reports: Record<Domain, DomainReport>,
  cross: CrossReport,
  weights?: Partial<Record<Domain, number>>
): CompositeIndex {
  return scheme === 'granular' ? orchestrationIndex(reports, cross.aggregateScore) : combineDomains(reports, weights);
}

export async function evaluateAll(inputs: DomainInputs, options: EvaluateOptions = {}): Promise<EvaluationReport> {
  const rulesDir = options.rulesDir ?? DEFAULT_CONFIG.rulesDir;
  const signalsDir = options.signalsDir ?? DEFAULT_CONFIG.signalsDir;
  const workerPoolSize = options.workerPoolSize ?? DEFAULT_CONFIG.workerPoolSize;
  const scheme = options.scheme ?? DEFAULT_CONFIG.scheme;
  const intentConfig = options.intentConfig ?? defaultIntentConfig;

  const supplied = DOMAINS.filter((d) => {
    const input = inputs[d];
    return input !== undefined && hasRows(input);
  });

  const evaluated = await runPool(supplied, workerPoolSize, async (domain) => {
    const input = inputs[domain];
    if (!input) return emptyReport(domain, 'skipped', 'No data supplied for this domain.');
    try {
      return await evaluateDomain(domain, input, rulesDir, intentConfig);
    } catch (e) {
      logger.error('Domain evaluation failed', { domain, error: describeError(e) });
      return emptyReport(domain, 'error', 'Domain evaluation failed.', describeError(e));
    }
  });

  const domains = byDomain(
    (d) => evaluated.find((r) => r.domain === d) ?? emptyReport(d, 'skipped', 'No data supplied for this domain.')
  );

  const cross = runCross(inputs, options);
  const composite = compositeFor(scheme, domains, cross, options.domainWeights ?? DEFAULT_CONFIG.domainWeights);
  const penalty = penaltyIndex(penaltyFindings(domains, cross.findings), options.penaltyWeights);

  const reality: RealityReport = options.reality === false
    ? {
        meta: { status: 'skipped', error: null, signalsDir, asOf: options.asOf ?? '' },
        signals: [],
        expired: [],
        loadErrors: [],
        feasibility: emptyFeasibility(),
      }
    : await evaluateReality(signalsDir, domains, options.asOf);

  logger.info('Evaluation finished', {
    domains: supplied,
    scheme,
    composite: composite.score,
    label: composite.label,
    penaltyIndex: penalty.index,
    crossStatus: cross.meta.status,
    realityStatus: reality.meta.status,
  });

  return { domains, cross, composite, penalty, reality, options: { scheme, workerPoolSize } };
}
