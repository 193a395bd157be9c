/*
  Table-style checks
  -------------------------------------
  Older rule files address raw named tables directly instead of resolved
  intent columns:

    { "type": "equation", "table": "balance", "expression": "assets = liabilities + equity" }
    { "type": "period_align", "tables": ["pnl", "balance"] }

  Each check reports ok + a list of problems; the engine maps a failure to
  fail (block rules) or warn (everything else).
*/

import { z } from 'zod';
import { toNumber } from './series';
import type { CellValue, CheckSpec, Dataset } from './types';

const LEGACY_TOLERANCE = 1e-6;

export interface LegacyResult {
  ok: boolean;
  problems: string[];
}

const tableName = z.string().min(1);
const names = z.array(z.string().min(1)).min(1);

const legacySchemas = {
  required_columns: z.object({ table: tableName, columns: names }),
  equation: z.object({ table: tableName, expression: z.string().min(1), group_by: z.string().optional() }),
  range_check: z.object({ table: tableName, columns: names, min: z.number().optional(), max: z.number().optional() }),
  period_align: z.object({ tables: names, column: z.string().default('period') }),
  ratio_bounds: z.object({
    table: tableName,
    numerator: z.string().min(1),
    denominator: z.string().min(1),
    min: z.number().optional(),
    max: z.number().optional(),
    require_denominator_positive: z.boolean().default(false),
  }),
  monotonic_time: z.object({ table: tableName, column: z.string().default('period') }),
};

export type LegacyKind = keyof typeof legacySchemas;

export function isLegacyKind(type: string): type is LegacyKind {
  return Object.prototype.hasOwnProperty.call(legacySchemas, type);
}

function periodsOf(rows: Dataset, col: string): string[] {
  return rows.map((r) => r[col]).filter((v): v is string | number => v !== null && v !== undefined).map(String);
}

function num(v: CellValue | undefined): number | null {
  return v === undefined ? 0 : toNumber(v);
}

export function runLegacyCheck(spec: CheckSpec, tables: Record<string, Dataset>): LegacyResult {
  const fail = (...problems: string[]): LegacyResult => ({ ok: false, problems });
  const result = (problems: string[]): LegacyResult => ({ ok: problems.length === 0, problems });
  const table = (name: string): Dataset => tables[name] ?? [];

  switch (spec.type) {
    case 'required_columns': {
      const p = legacySchemas.required_columns.safeParse(spec);
      if (!p.success) return fail(`invalid_params: ${p.error.issues[0]?.message}`);
      const rows = table(p.data.table);
      if (!rows.length) return fail(...p.data.columns);
      const seen = new Set(rows.flatMap((r) => Object.keys(r)));
      return result(p.data.columns.filter((c) => !seen.has(c)));
    }

    case 'equation': {
      const p = legacySchemas.equation.safeParse(spec);
      if (!p.success) return fail(`invalid_params: ${p.error.issues[0]?.message}`);
      const [lhs, rhs] = p.data.expression.split('=').map((s) => s.trim());
      if (!lhs || !rhs) return fail('parse_error');
      const terms = rhs.split('+').map((s) => s.trim());
      const problems: string[] = [];
      for (const row of table(p.data.table)) {
        const l = num(row[lhs]);
        const parts = terms.map((t) => num(row[t]));
        if (l === null || parts.some((x) => x === null)) {
          problems.push('parse_error');
          continue;
        }
        const r = parts.reduce<number>((s, x) => s + (x ?? 0), 0);
        if (Math.abs(l - r) > LEGACY_TOLERANCE) {
          problems.push(p.data.group_by ? `${p.data.group_by}=${row[p.data.group_by] ?? ''}` : 'row_mismatch');
        }
      }
      return result(problems);
    }

    case 'range_check': {
      const p = legacySchemas.range_check.safeParse(spec);
      if (!p.success) return fail(`invalid_params: ${p.error.issues[0]?.message}`);
      const { min, max } = p.data;
      const problems: string[] = [];
      table(p.data.table).forEach((row, i) => {
        for (const c of p.data.columns) {
          const raw = row[c];
          if (raw === null || raw === undefined) continue;
          const v = toNumber(raw);
          if (v === null) problems.push(`row${i}:${c}=?`);
          else if ((min !== undefined && v < min) || (max !== undefined && v > max)) problems.push(`row${i}:${c}=${v}`);
        }
      });
      return result(problems);
    }

    case 'period_align': {
      const p = legacySchemas.period_align.safeParse(spec);
      if (!p.success) return fail(`invalid_params: ${p.error.issues[0]?.message}`);
      const [baseName, ...others] = p.data.tables;
      const base = new Set(periodsOf(table(baseName), p.data.column));
      const problems = others.filter((name) => {
        const s = new Set(periodsOf(table(name), p.data.column));
        return s.size !== base.size || Array.from(s).some((x) => !base.has(x));
      });
      return result(problems.map((name) => `${name} != ${baseName}`));
    }

    case 'ratio_bounds': {
      const p = legacySchemas.ratio_bounds.safeParse(spec);
      if (!p.success) return fail(`invalid_params: ${p.error.issues[0]?.message}`);
      const { numerator, denominator, min, max, require_denominator_positive } = p.data;
      const problems: string[] = [];
      table(p.data.table).forEach((row, i) => {
        const n = num(row[numerator]);
        const d = num(row[denominator]);
        if (n === null || d === null) {
          problems.push(`row${i}:calc_err`);
        } else if (require_denominator_positive && d <= 0) {
          problems.push(`row${i}:den=${d}`);
        } else if (d === 0) {
          problems.push(`row${i}:den=0`);
        } else {
          const r = n / d;
          if ((min !== undefined && r < min) || (max !== undefined && r > max)) problems.push(`row${i}:ratio=${r}`);
        }
      });
      return result(problems);
    }

    case 'monotonic_time': {
      const p = legacySchemas.monotonic_time.safeParse(spec);
      if (!p.success) return fail(`invalid_params: ${p.error.issues[0]?.message}`);
      const periods = periodsOf(table(p.data.table), p.data.column);
      const sorted = [...periods].sort();
      return periods.every((x, i) => x === sorted[i]) ? result([]) : fail('non_monotonic_or_gaps');
    }

    default:
      return fail(`unknown_check:${spec.type}`);
  }
}
