/*
  Check registry
  -------------------------------------
  Every check kind has a parameter schema and an implementation. The kind list
  is closed: adding a name to CHECK_KINDS without an implementation does not
  compile.

  dispatch() normalises parameter synonyms, validates, runs, and folds every
  outcome into { status, score, details } with the fixed pass 1.0 / warn 0.6 /
  fail 0.0 mapping. It never throws.
*/

import levenshtein from 'js-levenshtein';
import { describeError } from '../errors';
import type { CheckOutcome, CheckResult, CheckSpec, Dataset } from '../types';
import { compositionChecks } from './composition';
import { integrityChecks } from './integrity';
import { peopleChecks } from './people';
import { periodChecks } from './period';
import { ratioChecks } from './ratio';
import { soft, toCheckResult, type CheckDefinition } from './shared';
import { trendChecks } from './trend';
import { varianceChecks } from './variance';

export const CHECK_KINDS = [
  // ratio / equation / value
  'ratio_bounds_intents',
  'ratio_bounds_intents_grouped',
  'equation_intents',
  'equation_intents_tolerance',
  'equation_tolerance_optional',
  'equation_intents_absolute',
  'value_bounds',
  'value_in_range',
  'derived_metric',
  // period
  'monotonic_time_intents',
  'fiscal_year_close_present',
  'period_gap_check',
  'period_alignment_multi',
  // variance / rolling
  'deviation_from_rolling_mean',
  'variance_threshold',
  'variance_bounds',
  'rolling_mean_range',
  'ratio_consistency',
  // trend / correlation
  'pct_change_range',
  'trend_correlation_intents',
  'correlation_threshold',
  'lead_lag_correlation',
  'conditional_trend_flag_intents',
  // composition
  'sum_reconciliation_intents',
  'mix_change_bounds',
  'department_mix_change_bounds',
  'presence_rate',
  // integrity
  'duplicate_values',
  'duplicate_values_multi',
  'identical_rows_across_periods',
  'outlier_sigma_intents',
  'non_negative',
  'min_value',
  'policy_presence',
  'policy_age_max_days',
  'pii_scan',
  'document_metadata_check',
  'mapping_consistency',
  'heuristic_flag',
  // people
  'headcount_flow_consistency',
  'attrition_rate_bounds',
  'training_hours_bounds',
  'promotion_rate_trend',
  'band_variance_bound',
  'median_gap_bound',
  'median_gap_bound_grouped',
  'band_alignment_check',
  'onboarding_completion_rate',
] as const;

export type CheckKind = (typeof CHECK_KINDS)[number];

const registry: Record<CheckKind, CheckDefinition> = {
  ...ratioChecks,
  ...periodChecks,
  ...varianceChecks,
  variance_bounds: varianceChecks.variance_threshold,
  ...trendChecks,
  ...compositionChecks,
  ...integrityChecks,
  ...peopleChecks,
};

// Parameter spellings accepted in rule files, mapped to the canonical name
const PARAM_SYNONYMS: Readonly<Record<string, string>> = {
  tolerance: 'tolerance_abs',
  tol: 'tolerance_abs',
  tol_abs: 'tolerance_abs',
  abs_tol: 'tolerance_abs',
  lhs: 'left',
  rhs: 'right',
  min_var: 'min_variance',
  max_variance: 'max_var',
};

export function isCheckKind(type: string): type is CheckKind {
  return CHECK_KINDS.some((k) => k === type);
}

export function normalizeParams(spec: CheckSpec): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(spec)) {
    if (key === 'type') continue;
    const canonical = PARAM_SYNONYMS[key] ?? key;
    // an explicit canonical key wins over its synonyms
    if (canonical !== key && canonical in spec) continue;
    if (!(canonical in out)) out[canonical] = value;
  }
  return out;
}

/** Closest registered kind within edit distance 3, for "did you mean" hints. */
export function suggestCheckKind(type: string): string | null {
  let best: { kind: string; dist: number } | null = null;
  for (const kind of CHECK_KINDS) {
    const d = levenshtein(type.toLowerCase(), kind);
    if (!best || d < best.dist) best = { kind, dist: d };
  }
  return best && best.dist <= 3 ? best.kind : null;
}

export function runCheckOutcome(spec: CheckSpec, rows: Dataset): CheckOutcome {
  if (!isCheckKind(spec.type)) {
    return soft('unknown_check_type', { type: spec.type, suggestion: suggestCheckKind(spec.type) });
  }
  try {
    return registry[spec.type].run(rows, normalizeParams(spec));
  } catch (e) {
    return soft('check_threw', { type: spec.type, error: describeError(e) });
  }
}

export function dispatch(spec: CheckSpec, rows: Dataset): CheckResult {
  return toCheckResult(runCheckOutcome(spec, rows));
}

export { STATUS_SCORE, toCheckResult, worstStatus } from './shared';
