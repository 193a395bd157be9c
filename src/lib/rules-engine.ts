/*
  Domain rule engine
  -------------------------------------
  Evaluates one domain's rule bank against one domain payload.

  - Intents are resolved once per payload; every rule sees the same resolved rows
  - Each check is routed: table-style check -> registry check -> unknown type
  - Rule status is the worst check status, score the minimum check score
  - A rule with no checks passes; a rule whose required tables are absent fails
  - Anything a rule throws is recorded on that rule only (warn 0.6)

  Usage (sketch):
    const engine = new RuleEngine('finance', rules);
    const { label, score, breakdown } = engine.evaluate(rows);
    // or, streaming each rule as it finishes
    const engine = new RuleEngine('finance', rules, { onRule: (res) => log(res) });
*/

import { isCheckKind, runCheckOutcome, STATUS_SCORE, suggestCheckKind, toCheckResult, worstStatus } from './checks';
import { soft } from './checks/shared';
import { describeError } from './errors';
import { defaultIntentConfig, resolveIntents, type IntentConfig } from './intent-resolver';
import { isLegacyKind, runLegacyCheck } from './legacy-checks';
import { aggregateScores, runLabel } from './scoring';
import type {
  CellValue,
  CheckResult,
  CheckSpec,
  CheckTrace,
  Dataset,
  Domain,
  DomainInput,
  Row,
  Rule,
  RuleResult,
  TableSet,
} from './types';

// --------------------------
// Types
// --------------------------
export interface EngineOptions {
  intentConfig?: IntentConfig;
  onRule?: (res: RuleResult, index: number) => void;
}

export interface DomainEvaluation {
  label: string;
  rationale: string;
  score: number;
  findings: RuleResult[];
  breakdown: RuleResult[];
}

// Everything a rule needs, built once per payload
interface EvaluationContext {
  primary: Dataset;
  rawTables: Record<string, Dataset>;
  resolvedTable: (name: string) => Dataset | null;
}

// --------------------------
// Helpers
// --------------------------
export const isTableSet = (input: DomainInput): input is TableSet => !Array.isArray(input);

const TABLE_COLUMN = '_table';

/** A plain dataset as is; a table set as all its tables stacked, tagged with a `_table` column. */
export function flattenInput(input: DomainInput): Dataset {
  if (!isTableSet(input)) return input;
  return Object.entries(input.tables).flatMap(([name, rows]) =>
    rows.map((r): Row => ({ ...r, [TABLE_COLUMN]: name }))
  );
}

function withColumn(rows: Dataset, name: string, values: (number | null)[]): Dataset {
  return rows.map((r, i): Row => {
    const v: CellValue = values[i] ?? null;
    return { ...r, [name]: v };
  });
}

// --------------------------
// RuleEngine
// --------------------------
export class RuleEngine {
  private domain: Domain;
  private rules: Rule[];
  private options: EngineOptions;
  private intentConfig: IntentConfig;

  constructor(domain: Domain, rules: Rule[], options: EngineOptions = {}) {
    this.domain = domain;
    this.rules = rules;
    this.options = options;
    this.intentConfig = options.intentConfig ?? defaultIntentConfig;
  }

  public get activeRules(): Rule[] {
    return this.rules.filter((r) => r.enabled);
  }

  public evaluate(input: DomainInput): DomainEvaluation {
    const ctx = this.buildContext(input);
    const breakdown: RuleResult[] = [];
    this.activeRules.forEach((rule, i) => {
      const res = this.applyRule(rule, ctx);
      breakdown.push(res);
      if (this.options.onRule) this.options.onRule(res, i);
    });
    const { label, rationale } = runLabel(breakdown);
    return {
      label,
      rationale,
      score: aggregateScores(breakdown),
      findings: breakdown.filter((r) => r.status !== 'pass'),
      breakdown,
    };
  }

  private buildContext(input: DomainInput): EvaluationContext {
    const rawTables = isTableSet(input) ? input.tables : { main: input };
    const primary = resolveIntents(flattenInput(input), this.domain, this.intentConfig);
    const cache = new Map<string, Dataset>();
    if (!isTableSet(input)) cache.set('main', primary);
    const resolvedTable = (name: string): Dataset | null => {
      const hit = cache.get(name);
      if (hit) return hit;
      const raw = rawTables[name];
      if (!raw) return null;
      const resolved = resolveIntents(raw, this.domain, this.intentConfig);
      cache.set(name, resolved);
      return resolved;
    };
    return { primary, rawTables, resolvedTable };
  }

  private applyRule(rule: Rule, ctx: EvaluationContext): RuleResult {
    const base = {
      id: rule.id,
      title: rule.title,
      severity: rule.severity,
      ...(rule.bucket ? { bucket: rule.bucket } : {}),
      file: rule.file,
    };
    try {
      const missingTables = rule.requiresTables.filter((t) => !(t in ctx.rawTables));
      if (missingTables.length) {
        const check: CheckTrace = {
          type: 'requires_tables',
          status: 'fail',
          score: STATUS_SCORE.fail,
          details: { missingTables },
        };
        return { ...base, status: 'fail', score: check.score, checks: [check] };
      }

      // derived columns stay local to this rule
      let view = ctx.primary;
      const checks: CheckTrace[] = [];
      for (const spec of rule.checks) {
        const { result, derived } = this.runCheck(spec, rule, ctx, view);
        if (derived) view = withColumn(view, derived.name, derived.values);
        checks.push({ type: spec.type, ...result });
      }
      if (!checks.length) return { ...base, status: 'pass', score: STATUS_SCORE.pass, checks };
      return {
        ...base,
        status: worstStatus(checks.map((c) => c.status)),
        score: Math.min(...checks.map((c) => c.score)),
        checks,
      };
    } catch (e) {
      return { ...base, status: 'warn', score: STATUS_SCORE.warn, checks: [], error: describeError(e) };
    }
  }

  private runCheck(
    spec: CheckSpec,
    rule: Rule,
    ctx: EvaluationContext,
    view: Dataset
  ): { result: CheckResult; derived?: { name: string; values: (number | null)[] } } {
    const blocking = rule.severity === 'block';

    if (isLegacyKind(spec.type)) {
      const res = runLegacyCheck(spec, ctx.rawTables);
      const status = res.ok ? 'pass' : blocking ? 'fail' : 'warn';
      return { result: { status, score: STATUS_SCORE[status], details: { problems: res.problems } } };
    }

    if (isCheckKind(spec.type)) {
      const rows = typeof spec.table === 'string' ? ctx.resolvedTable(spec.table) : view;
      if (rows === null) return { result: toCheckResult(soft('missing_table', { table: spec.table })) };
      const outcome = runCheckOutcome(spec, rows);
      const result = toCheckResult(outcome);
      return outcome.kind === 'evaluated' && outcome.derived && rows === view
        ? { result, derived: outcome.derived }
        : { result };
    }

    const status = blocking ? 'fail' : 'warn';
    return {
      result: {
        status,
        score: STATUS_SCORE[status],
        details: { note: 'unknown_check_type', type: spec.type, suggestion: suggestCheckKind(spec.type) },
      },
    };
  }
}
