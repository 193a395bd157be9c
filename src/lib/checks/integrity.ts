/*
  Integrity checks
  -------------------------------------
  Duplicates, identical streaks, outliers, sign and floor checks, policy
  coverage, PII detection, metadata presence, key mapping conflicts and
  free-form flag conditions.

  Duplicates, missing policies and missing metadata are reported as `warn`;
  everything else fails.
*/

import { z } from 'zod';
import isEmail from 'validator/lib/isEmail';
import { isSupportedCountry, parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';
import { compile, evaluate, references, ExpressionError, type Expr } from '../expression';
import { PERIOD_INTENT } from '../intent-resolver';
import { EPS, column, columnNames, hasColumn, keyOf, maxOf, mean, minOf, present, std, toNumber } from '../series';
import type { CellValue, Dataset, Details, Row } from '../types';
import { bounded, col, colList, cols, defineCheck, groupBy, missingColumns, num, perGroup, soft } from './shared';

// --------------------------
// Helpers
// --------------------------
function duplicateCount(keys: string[]): number {
  const counts = new Map<string, number>();
  for (const k of keys) counts.set(k, (counts.get(k) ?? 0) + 1);
  return keys.filter((k) => (counts.get(k) ?? 0) > 1).length;
}

function rowSignature(r: Row, names: string[]): string {
  return JSON.stringify(names.map((n) => r[n] ?? null));
}

function numericColumns(rows: Dataset): string[] {
  return columnNames(rows).filter((c) => {
    if (c === PERIOD_INTENT) return false;
    const vals = rows.map((r) => r[c]).filter((v) => v !== null && v !== undefined);
    return vals.length > 0 && vals.every((v) => typeof v === 'number');
  });
}

const PHONE_CANDIDATE = /\+?\d[\d\s().-]{6,}\d/g;

function looksLikeEmail(text: string): boolean {
  return text.split(/[\s,;<>()]+/).some((tok) => tok.includes('@') && isEmail(tok));
}

function looksLikePhone(text: string, region: CountryCode): boolean {
  for (const cand of text.match(PHONE_CANDIDATE) ?? []) {
    const phone = parsePhoneNumberFromString(cand, region);
    if (phone && phone.isValid()) return true;
  }
  return false;
}

function compileAll(exprs: string[]): Expr[] | string {
  try {
    return exprs.map((e) => compile(e));
  } catch (e) {
    if (e instanceof ExpressionError) return e.message;
    throw e;
  }
}

const countryCode = z.string().transform((s, ctx): CountryCode => {
  const code = s.trim().toUpperCase();
  if (isSupportedCountry(code)) return code;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported region ${s}` });
  return z.NEVER;
});

// --------------------------
// Checks
// --------------------------
export const integrityChecks = {
  duplicate_values: defineCheck(z.object({ column: col }), (rows, p) => {
    const missing = missingColumns(rows, [p.column]);
    if (missing) return missing;
    const duplicates = duplicateCount(rows.map((r) => keyOf(r[p.column])));
    return bounded(duplicates === 0, { duplicates }, 'warn');
  }),

  duplicate_values_multi: defineCheck(z.object({ columns: cols }), (rows, p) => {
    const missing = missingColumns(rows, p.columns);
    if (missing) return missing;
    const duplicates = duplicateCount(rows.map((r) => rowSignature(r, p.columns)));
    return bounded(duplicates === 0, { duplicates }, 'warn');
  }),

  // Longest run of consecutive rows carrying the same value (or the same numeric row total)
  identical_rows_across_periods: defineCheck(
    z.object({ column: col.optional(), min_consecutive: z.number().int().min(2).default(2) }),
    (rows, p) => {
      if (p.column) {
        const missing = missingColumns(rows, [p.column]);
        if (missing) return missing;
      }
      const numeric = numericColumns(rows);
      const values: (number | null)[] = p.column
        ? column(rows, p.column)
        : rows.map((r) => numeric.reduce((s, c) => s + (toNumber(r[c]) ?? 0), 0));
      let streak = values.length ? 1 : 0;
      let run = 1;
      for (let i = 1; i < values.length; i++) {
        const same = values[i] !== null && values[i] === values[i - 1];
        run = same ? run + 1 : 1;
        streak = Math.max(streak, run);
      }
      return bounded(streak < p.min_consecutive, { maxIdenticalStreak: streak });
    }
  ),

  outlier_sigma_intents: defineCheck(z.object({ column: col, sigma: num.positive().default(3) }), (rows, p) => {
    const missing = missingColumns(rows, [p.column]);
    if (missing) return missing;
    const xs = present(column(rows, p.column));
    const mu = mean(xs);
    const sd = std(xs);
    if (mu === null || sd === null) return soft('insufficient_points');
    const maxZ = maxOf(xs.map((x) => Math.abs(x - mu) / (sd + EPS))) ?? 0;
    return bounded(maxZ <= p.sigma, { maxZ });
  }),

  non_negative: defineCheck(z.object({ columns: colList.optional() }), (rows, p) => {
    const names = (p.columns ?? numericColumns(rows).filter((c) => c.endsWith('_intent'))).filter((c) =>
      hasColumn(rows, c)
    );
    const negRows = rows.filter((r) => names.some((c) => {
      const v = toNumber(r[c]);
      return v !== null && v < 0;
    })).length;
    return bounded(negRows === 0, { negRows, columns: names });
  }),

  min_value: defineCheck(z.object({ column: col, min: num, group_by: groupBy }), (rows, p) => {
    const missing = missingColumns(rows, [p.column]);
    if (missing) return missing;
    return perGroup(rows, p.group_by, (g) => {
      const xs = present(column(g, p.column));
      const details: Details = xs.length ? { minSeen: minOf(xs) } : {};
      return { ok: xs.every((x) => x >= p.min), details };
    });
  }),

  policy_presence: defineCheck(
    z.object({ docs_required: cols, column: col.default('policy_category_intent') }),
    (rows, p) => {
      const have = new Set(
        rows.map((r) => r[p.column]).filter((v): v is string | number => v !== null && v !== undefined)
          .map((v) => String(v).trim().toLowerCase())
      );
      const missing = p.docs_required.filter((d) => !have.has(d.trim().toLowerCase()));
      return bounded(missing.length === 0, { missing }, 'warn');
    }
  ),

  policy_age_max_days: defineCheck(
    z.object({ max_days: num.nonnegative(), column: col.default('policy_last_modified_days') }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.column]);
      if (missing) return missing;
      const ages = present(column(rows, p.column));
      const maxAgeDays = maxOf(ages);
      return bounded(ages.every((a) => a <= p.max_days), { maxAgeDays });
    }
  ),

  pii_scan: defineCheck(
    z.object({ columns: colList.optional(), default_region: countryCode.default('US') }),
    (rows, p) => {
      const names = p.columns ?? columnNames(rows);
      const emailColumns = new Set<string>();
      const phoneColumns = new Set<string>();
      for (const r of rows) {
        for (const c of names) {
          const v: CellValue | undefined = r[c];
          if (typeof v !== 'string') continue;
          if (looksLikeEmail(v)) emailColumns.add(c);
          if (looksLikePhone(v, p.default_region)) phoneColumns.add(c);
        }
      }
      return bounded(emailColumns.size === 0 && phoneColumns.size === 0, {
        emailLike: emailColumns.size > 0,
        phoneLike: phoneColumns.size > 0,
        columns: Array.from(new Set([...emailColumns, ...phoneColumns])),
      });
    }
  ),

  document_metadata_check: defineCheck(z.object({ required_fields: cols }), (rows, p) => {
    const missingFields = p.required_fields.filter((f) => !hasColumn(rows, f));
    return bounded(missingFields.length === 0, { missingFields }, 'warn');
  }),

  mapping_consistency: defineCheck(
    z.object({ left_key: colList, right_key: col, max_conflict_rate: num.nonnegative().default(0.05) }),
    (rows, p) => {
      const missing = missingColumns(rows, [...p.left_key, p.right_key]);
      if (missing) return missing;
      const targets = new Map<string, Set<string>>();
      for (const r of rows) {
        const k = rowSignature(r, p.left_key);
        const set = targets.get(k) ?? new Set<string>();
        set.add(keyOf(r[p.right_key]));
        targets.set(k, set);
      }
      const conflicts = Array.from(targets.values()).filter((s) => s.size > 1).length;
      const conflictRate = targets.size ? conflicts / targets.size : 0;
      return bounded(conflictRate <= p.max_conflict_rate, { conflictRate });
    }
  ),

  // Flags when any row satisfies every expression of one condition
  heuristic_flag: defineCheck(
    z.object({ conditions: z.array(z.object({ exprs: z.array(z.string().min(1)).min(1) })).min(1) }),
    (rows, p) => {
      for (const [i, cond] of p.conditions.entries()) {
        const compiled = compileAll(cond.exprs);
        if (typeof compiled === 'string') return soft('evaluation_error', { condition: i, error: compiled });
        const missing = missingColumns(rows, compiled.flatMap(references));
        if (missing) return missing;
        const hit = rows.some((r) => compiled.every((e) => {
          const v = evaluate(e, r);
          return v !== null && v !== 0;
        }));
        if (hit) return bounded(false, { flagged: true, condition: i });
      }
      return bounded(true, { flagged: false });
    }
  ),
};
