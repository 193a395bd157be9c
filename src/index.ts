export * from './lib/types';
export { resolveIntents, buildIntentConfig, defaultIntentConfig, PERIOD_INTENT, type IntentConfig } from './lib/intent-resolver';
export { compile, evaluate, splitEquation, ExpressionError, type Expr } from './lib/expression';
export { CHECK_KINDS, dispatch, isCheckKind, runCheckOutcome, suggestCheckKind, type CheckKind } from './lib/checks';
export { isLegacyKind, runLegacyCheck, type LegacyResult } from './lib/legacy-checks';
export { flattenInput, RuleEngine, type DomainEvaluation, type EngineOptions } from './lib/rules-engine';
export { loadDomainRules, parseRuleFile } from './lib/rule-loader';
export {
  aggregateScores,
  combineDomains,
  DEFAULT_DOMAIN_WEIGHTS,
  DEFAULT_PENALTY_WEIGHTS,
  defaultInsightTemplates,
  insightLevel,
  orchestrationIndex,
  penaltyFindings,
  penaltyIndex,
  runLabel,
  severityWeight,
  topRisks,
  type InsightTemplates,
  type PenaltyFinding,
  type PenaltyWeights,
} from './lib/scoring';
export {
  CROSS_HEURISTICS,
  DEFAULT_CROSS_THRESHOLDS,
  evaluateCrossRules,
  type CrossHeuristic,
  type CrossThresholds,
} from './lib/cross-rules';
export { computeFeasibility, evaluateReality, loadRealitySignals, parseSignalFile } from './lib/reality';
export { evaluateAll, evaluateDomain, type EvaluateOptions } from './lib/orchestrator';
export { loadConfig, DEFAULT_CONFIG, type EngineConfig } from './lib/config';
export { loadDomainInputs, parseCsv, parseJsonInput } from './lib/dataset-loader';
