/*
  Ratio, equation and value checks
  -------------------------------------
  Equations are written as "lhs = rhs" over column names. Relative mode
  passes when |lhs - rhs| <= tolerance * (|lhs| + 1e-9) on every row that has
  both sides; absolute mode compares against the tolerance directly.
*/

import { z } from 'zod';
import { compile, evaluate, references, splitEquation, ExpressionError, type Expr } from '../expression';
import { EPS, column, maxOf, minOf, present, safeDiv, toNumber } from '../series';
import type { CheckOutcome, Dataset } from '../types';
import { bounded, col, cols, defineCheck, evaluated, groupBy, missingColumns, num, perGroup, soft } from './shared';

const DEFAULT_EQUATION_TOLERANCE = 1e-6;

type ToleranceMode = 'relative' | 'absolute';

interface Equation {
  lhs: Expr;
  rhs: Expr;
}

function parseEquation(expression: string): Equation | CheckOutcome {
  const sides = splitEquation(expression);
  if (!sides) return soft('evaluation_error', { expression, error: 'Expected "lhs = rhs"' });
  try {
    return { lhs: compile(sides[0]), rhs: compile(sides[1]) };
  } catch (e) {
    if (e instanceof ExpressionError) return soft('evaluation_error', { expression, error: e.message });
    throw e;
  }
}

function isOutcome(v: Equation | CheckOutcome): v is CheckOutcome {
  return 'kind' in v;
}

function runEquation(
  rows: Dataset,
  expression: string,
  tolerance: number,
  mode: ToleranceMode,
  group?: string,
  violation: 'fail' | 'warn' = 'fail'
): CheckOutcome {
  const eq = parseEquation(expression);
  if (isOutcome(eq)) return eq;
  const missing = missingColumns(rows, [...references(eq.lhs), ...references(eq.rhs)]);
  if (missing) return missing;

  return perGroup(
    rows,
    group,
    (g) => {
      let ok = true;
      let maxErr = 0;
      let maxRelErr = 0;
      let checked = 0;
      for (const r of g) {
        const l = evaluate(eq.lhs, r);
        const rv = evaluate(eq.rhs, r);
        if (l === null || rv === null) continue;
        checked++;
        const err = Math.abs(l - rv);
        const bound = mode === 'relative' ? tolerance * (Math.abs(l) + EPS) : tolerance;
        if (err > bound) ok = false;
        maxErr = Math.max(maxErr, err);
        maxRelErr = Math.max(maxRelErr, err / (Math.abs(l) + EPS));
      }
      return { ok, details: { maxErr, maxRelErr, rowsChecked: checked } };
    },
    violation
  );
}

// --------------------------
// Schemas
// --------------------------
const equationShape = z.object({
  expression: z.string().min(1).optional(),
  left: z.string().min(1).optional(),
  right: z.string().min(1).optional(),
  left_sum: cols.optional(),
  right_sum: cols.optional(),
  group_by: groupBy,
  tolerance_abs: num.nonnegative().optional(),
  tolerance_mode: z.string().optional(),
});

const toleranceEquation = z.object({
  expression: z.string().min(1),
  tolerance_abs: num.nonnegative().default(DEFAULT_EQUATION_TOLERANCE),
  group_by: groupBy,
});

const ratioParams = z.object({
  numerator: col,
  denominator: col,
  low: num.optional(),
  high: num.optional(),
  group_by: groupBy,
});

// --------------------------
// Checks
// --------------------------
export const ratioChecks = {
  ratio_bounds_intents: defineCheck(ratioParams, (rows, p) => {
    const missing = missingColumns(rows, [p.numerator, p.denominator]);
    if (missing) return missing;
    return perGroup(rows, p.group_by, (g) => {
      const ratios: number[] = [];
      for (const r of g) {
        const n = toNumber(r[p.numerator]);
        const d = toNumber(r[p.denominator]);
        if (n === null || d === null) continue;
        ratios.push(n / Math.max(d, EPS));
      }
      const ok = ratios.every((x) => (p.low === undefined || x >= p.low) && (p.high === undefined || x <= p.high));
      return { ok, details: ratios.length ? { min: minOf(ratios), max: maxOf(ratios) } : {} };
    });
  }),

  ratio_bounds_intents_grouped: defineCheck(
    z.object({
      numerator: col,
      denominator: col,
      group_by: col,
      defaults: z.object({ low: num, high: num }),
    }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.numerator, p.denominator, p.group_by]);
      if (missing) return missing;
      return perGroup(rows, p.group_by, (g) => {
        const ratios: number[] = [];
        for (const r of g) {
          const n = toNumber(r[p.numerator]);
          const d = toNumber(r[p.denominator]);
          if (n === null || d === null) continue;
          ratios.push(safeDiv(n, d));
        }
        const ok = ratios.every((x) => x >= p.defaults.low && x <= p.defaults.high);
        return { ok, details: ratios.length ? { min: minOf(ratios), max: maxOf(ratios) } : {} };
      });
    }
  ),

  equation_intents: defineCheck(equationShape, (rows, p) => {
    let expression = p.expression;
    if (!expression) {
      const left = p.left_sum ? p.left_sum.join(' + ') : p.left;
      const right = p.right_sum ? p.right_sum.join(' + ') : p.right;
      if (!left || !right) {
        return soft('equation_missing_params', { hint: 'Provide expression, left/right or left_sum/right_sum.' });
      }
      expression = `${left} = ${right}`;
    }
    const mode: ToleranceMode = ['absolute', 'abs'].includes((p.tolerance_mode ?? '').trim().toLowerCase())
      ? 'absolute'
      : 'relative';
    return runEquation(rows, expression, p.tolerance_abs ?? DEFAULT_EQUATION_TOLERANCE, mode, p.group_by);
  }),

  equation_intents_tolerance: defineCheck(toleranceEquation, (rows, p) =>
    runEquation(rows, p.expression, p.tolerance_abs, 'relative', p.group_by)
  ),

  // Advisory: unusable input is skipped, violations only warn
  equation_tolerance_optional: defineCheck(toleranceEquation, (rows, p) => {
    const res = runEquation(rows, p.expression, p.tolerance_abs, 'relative', p.group_by, 'warn');
    return res.kind === 'soft' ? soft('optional_equation_skipped', { cause: res.reason, ...res.details }) : res;
  }),

  equation_intents_absolute: defineCheck(toleranceEquation, (rows, p) =>
    runEquation(rows, p.expression, p.tolerance_abs, 'absolute', p.group_by)
  ),

  value_bounds: defineCheck(
    z.object({ column: col, low: num.optional(), high: num.optional(), group_by: groupBy }),
    (rows, p) => {
      const missing = missingColumns(rows, [p.column]);
      if (missing) return missing;
      return perGroup(rows, p.group_by, (g) => {
        const vals = present(column(g, p.column));
        const ok = vals.every((v) => (p.low === undefined || v >= p.low) && (p.high === undefined || v <= p.high));
        return { ok, details: vals.length ? { min: minOf(vals), max: maxOf(vals) } : {} };
      });
    }
  ),

  value_in_range: defineCheck(z.object({ value: col, low_ref: col, high_ref: col }), (rows, p) => {
    const missing = missingColumns(rows, [p.value, p.low_ref, p.high_ref]);
    if (missing) return missing;
    let violations = 0;
    for (const r of rows) {
      const v = toNumber(r[p.value]);
      const lo = toNumber(r[p.low_ref]);
      const hi = toNumber(r[p.high_ref]);
      if (v === null || lo === null || hi === null) continue;
      if (v < lo || v > hi) violations++;
    }
    return bounded(violations === 0, { violations }, 'warn');
  }),

  derived_metric: defineCheck(z.object({ name: col, expression: z.string().min(1) }), (rows, p) => {
    let expr: Expr;
    try {
      expr = compile(p.expression);
    } catch (e) {
      if (e instanceof ExpressionError) return soft('evaluation_error', { expression: p.expression, error: e.message });
      throw e;
    }
    const missing = missingColumns(rows, references(expr));
    if (missing) return missing;
    const values = rows.map((r) => evaluate(expr, r));
    return evaluated('pass', { created: p.name }, { name: p.name, values });
  }),
};
