import { z } from 'zod';
import { hasColumn, groupRows } from '../series';
import type { CheckOutcome, CheckResult, CheckStatus, Dataset, Details, DerivedColumn } from '../types';

// --------------------------
// Outcomes
// --------------------------
export const STATUS_SCORE: Readonly<Record<CheckStatus, number>> = { pass: 1.0, warn: 0.6, fail: 0.0 };
const STATUS_RANK: Readonly<Record<CheckStatus, number>> = { fail: 0, warn: 1, pass: 2 };

export function worstStatus(statuses: CheckStatus[]): CheckStatus {
  let worst: CheckStatus = 'pass';
  for (const s of statuses) if (STATUS_RANK[s] < STATUS_RANK[worst]) worst = s;
  return worst;
}

export const evaluated = (status: CheckStatus, details: Details = {}, derived?: DerivedColumn): CheckOutcome =>
  derived ? { kind: 'evaluated', status, details, derived } : { kind: 'evaluated', status, details };

export const soft = (reason: string, details: Details = {}): CheckOutcome => ({ kind: 'soft', reason, details });

/** pass when ok, otherwise the violation status (fail unless the check is advisory). */
export function bounded(ok: boolean, details: Details = {}, violation: 'fail' | 'warn' = 'fail'): CheckOutcome {
  return evaluated(ok ? 'pass' : violation, details);
}

export function missingColumns(rows: Dataset, cols: (string | undefined)[]): CheckOutcome | null {
  const missing = cols.filter((c): c is string => c !== undefined && !hasColumn(rows, c));
  return missing.length ? soft('missing_columns', { missing }) : null;
}

export function toCheckResult(outcome: CheckOutcome): CheckResult {
  if (outcome.kind === 'soft') {
    return { status: 'warn', score: STATUS_SCORE.warn, details: { note: outcome.reason, ...outcome.details } };
  }
  return { status: outcome.status, score: STATUS_SCORE[outcome.status], details: outcome.details };
}

/** Evaluate each group; the worst group decides. */
export function perGroup(
  rows: Dataset,
  groupBy: string | undefined,
  evalGroup: (group: Dataset) => { ok: boolean; details: Details },
  violation: 'fail' | 'warn' = 'fail'
): CheckOutcome {
  const byGroup: Record<string, Details> = {};
  let nullGroup: Details | undefined;
  let ok = true;
  for (const [key, group] of groupRows(rows, groupBy)) {
    const res = evalGroup(group);
    if (key === null) nullGroup = res.details;
    else byGroup[key] = res.details;
    ok = ok && res.ok;
  }
  return bounded(ok, nullGroup ? { byGroup, nullGroup } : { byGroup }, violation);
}

// --------------------------
// Definitions
// --------------------------
export interface CheckDefinition {
  run(rows: Dataset, params: Record<string, unknown>): CheckOutcome;
}

export function defineCheck<P>(
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  run: (rows: Dataset, params: P) => CheckOutcome
): CheckDefinition {
  return {
    run(rows, params) {
      const parsed = schema.safeParse(params);
      if (!parsed.success) {
        return soft('invalid_params', {
          issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
        });
      }
      return run(rows, parsed.data);
    },
  };
}

// Common parameter pieces
export const col = z.string().min(1);
export const cols = z.array(col).min(1);
export const groupBy = z.string().min(1).optional();
export const num = z.number();

/** Accept a single name wherever a list is expected. */
export const colList = z.preprocess((v) => (typeof v === 'string' ? [v] : v), cols);
