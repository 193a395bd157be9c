/*
  Intent resolver
  -------------------------------------
  Maps inconsistently named input columns onto stable `*_intent` columns that
  rules reference. Generic aliases first, then the domain's own table; an intent
  that is already present is never overwritten. Also synthesises a period when
  none is found, derives output per employee, normalises period text and coerces
  the numeric intents.
*/

import { z } from 'zod';
import rawAliases from '../config/aliases.json';
import { normalizePeriods } from './period';
import { EPS, toNumber, columnNames } from './series';
import type { CellValue, Dataset, Domain } from './types';

export const PERIOD_INTENT = 'period_intent';

const aliasTableSchema = z.record(z.string(), z.array(z.string()).min(1));

export const intentConfigSchema = z.object({
  generic: aliasTableSchema,
  domains: z.record(z.string(), aliasTableSchema),
  numeric: z.array(z.string()),
});

export type AliasTable = Readonly<Record<string, readonly string[]>>;

export interface IntentConfig {
  readonly generic: AliasTable;
  readonly domains: Readonly<Record<string, AliasTable>>;
  readonly numeric: ReadonlySet<string>;
}

export function buildIntentConfig(raw: unknown): IntentConfig {
  const parsed = intentConfigSchema.parse(raw);
  return Object.freeze({
    generic: Object.freeze(parsed.generic),
    domains: Object.freeze(parsed.domains),
    numeric: new Set(parsed.numeric),
  });
}

export const defaultIntentConfig: IntentConfig = buildIntentConfig(rawAliases);

// --------------------------
// Helpers
// --------------------------

/** Case, whitespace and punctuation insensitive key. */
export const canon = (name: string) => name.trim().toLowerCase().replace(/[^a-z0-9]/g, '');

function applyAliases(rows: Dataset, columns: string[], table: AliasTable) {
  // first raw column wins a canonical collision
  const lookup = new Map<string, string>();
  for (const c of columns) {
    const key = canon(c);
    if (!lookup.has(key)) lookup.set(key, c);
  }
  for (const [intent, candidates] of Object.entries(table)) {
    if (columns.includes(intent)) continue;
    for (const cand of candidates) {
      const source = lookup.get(canon(cand));
      if (source === undefined) continue;
      for (const r of rows) r[intent] = r[source] ?? null;
      columns.push(intent);
      break;
    }
  }
}

function synthesizePeriods(rows: Dataset, columns: string[]): CellValue[] {
  const first = columns[0];
  if (first !== undefined && first !== PERIOD_INTENT) {
    const values = rows.map((r) => r[first] ?? null);
    const distinct = new Set(values.map((v) => (v === null ? '\u0000null' : String(v))));
    if (distinct.size === rows.length) return values.map((v) => (v === null ? null : String(v)));
  }
  return rows.map((_, i) => String(i + 1));
}

// --------------------------
// Resolver
// --------------------------

/**
 * Returns a copy of `rows` with intent columns added. Original columns are
 * untouched. Never throws for well-formed rows; an unknown domain gets the
 * generic table only.
 */
export function resolveIntents(
  rows: Dataset,
  domain: Domain | string,
  config: IntentConfig = defaultIntentConfig
): Dataset {
  const out: Dataset = rows.map((r) => ({ ...r }));
  const columns = columnNames(out);

  applyAliases(out, columns, config.generic);
  const domainTable = config.domains[domain];
  if (domainTable) applyAliases(out, columns, domainTable);

  if (columns.includes(PERIOD_INTENT)) {
    const normalized = normalizePeriods(out.map((r) => r[PERIOD_INTENT] ?? null));
    out.forEach((r, i) => (r[PERIOD_INTENT] = normalized[i]));
  } else {
    const synthesized = synthesizePeriods(out, columns);
    out.forEach((r, i) => (r[PERIOD_INTENT] = synthesized[i]));
    columns.push(PERIOD_INTENT);
  }

  if (
    !columns.includes('output_per_employee_intent') &&
    columns.includes('total_revenue_intent') &&
    columns.includes('headcount_total_intent')
  ) {
    for (const r of out) {
      const num = toNumber(r.total_revenue_intent);
      const den = toNumber(r.headcount_total_intent);
      r.output_per_employee_intent = num === null || den === null ? null : num / Math.max(den, EPS);
    }
    columns.push('output_per_employee_intent');
  }

  for (const c of columns) {
    if (!config.numeric.has(c)) continue;
    for (const r of out) r[c] = toNumber(r[c]);
  }

  return out;
}

