export const DOMAINS = ['finance', 'marketing', 'operations', 'people', 'talent'] as const;
export type Domain = (typeof DOMAINS)[number];

/** One entry per domain. */
export function byDomain<T>(fn: (domain: Domain) => T): Record<Domain, T> {
  return {
    finance: fn('finance'),
    marketing: fn('marketing'),
    operations: fn('operations'),
    people: fn('people'),
    talent: fn('talent'),
  };
}

export type CellValue = number | string | null;
export type Row = Record<string, CellValue>;
export type Dataset = Row[];

// Legacy table-style payload: several named tables for one domain
export interface TableSet {
  tables: Record<string, Dataset>;
}
export type DomainInput = Dataset | TableSet;
export type DomainInputs = Partial<Record<Domain, DomainInput>>;

export type Severity = 'block' | 'warn' | 'info';
export type CheckStatus = 'pass' | 'warn' | 'fail';
export type FindingStatus = CheckStatus | 'na' | 'error';
export type Details = Record<string, unknown>;

export interface CheckResult {
  status: CheckStatus;
  score: number; // 0..1
  details: Details;
}

export interface DerivedColumn {
  name: string;
  values: (number | null)[];
}

export type CheckOutcome =
  | { kind: 'evaluated'; status: CheckStatus; details: Details; derived?: DerivedColumn }
  | { kind: 'soft'; reason: string; details: Details };

export interface CheckSpec {
  type: string;
  [param: string]: unknown;
}

export interface Rule {
  id: string;
  title: string;
  severity: string; // block | warn | info, anything else weighs 0.5
  description?: string;
  bucket?: string;
  checks: CheckSpec[];
  requiresTables: string[];
  enabled: boolean;
  file: string;
}

export interface CheckTrace extends CheckResult {
  type: string;
}

export interface RuleResult {
  id: string;
  title: string;
  severity: string;
  bucket?: string;
  file: string;
  status: CheckStatus;
  score: number;
  checks: CheckTrace[];
  error?: string;
}

export interface LoadError {
  file: string;
  message: string;
}

export type DomainState = 'evaluated' | 'skipped' | 'error';

export interface DomainReport {
  domain: Domain;
  state: DomainState;
  label: string;
  rationale: string;
  score: number;
  rulesCount: number;
  findings: RuleResult[];
  breakdown: RuleResult[];
  loadErrors: LoadError[];
  error?: string;
}

export interface CrossFinding {
  ruleId: string;
  title: string;
  severity: Severity;
  status: FindingStatus;
  score: number;
  detail: string;
  error?: { name: string; message: string };
}

export interface CrossReport {
  meta: { engine: string; rulesCount: number; status: 'ok' | 'skipped' | 'error'; error: string | null };
  findings: CrossFinding[];
  aggregateScore: number | null;
}

export type CompositeScheme = 'standard' | 'granular';

export interface RiskItem {
  domain: Domain;
  ruleId: string;
  title: string;
  severity: string;
  status: CheckStatus;
  score: number;
}

export interface CompositeIndex {
  scheme: CompositeScheme;
  score: number | null;
  label: string;
  weights: Record<string, number>;
  domainsIncluded: string[];
  topRisks: RiskItem[];
}

export type InsightLevel = 'high' | 'medium' | 'low';

// 0-100, starting at 100 and reduced by a penalty per failing rule
export interface PenaltyIndex {
  label: string;
  index: number;
  domainIndices: Record<Domain, number>;
  bucketScores: Record<Domain, Record<string, number>>;
  insights: Record<Domain, string[]>;
}

export type SignalSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface RealitySignal {
  id: string;
  domain: Domain | string;
  title: string;
  statement: string;
  severity: string;
  confidence: string;
  horizon: string;
  validUntil: string | null;
  tags: string[];
  file: string;
}

export type FeasibilityStatus = 'ok' | 'risk_low' | 'risk_medium' | 'risk_high';

export interface FeasibilityFlag {
  status: FeasibilityStatus;
  message: string;
  internal: { fail: number; warn: number };
  reality: {
    signalsCount: number;
    maxSeverity: SignalSeverity | null;
    topSignals: Pick<RealitySignal, 'id' | 'title' | 'severity' | 'statement'>[];
  };
}

export interface RealityReport {
  meta: { status: 'ok' | 'skipped' | 'error'; error: string | null; signalsDir: string; asOf: string };
  signals: RealitySignal[];
  expired: string[];
  loadErrors: LoadError[];
  feasibility: Record<Domain, FeasibilityFlag>;
}

export interface EvaluationReport {
  domains: Record<Domain, DomainReport>;
  cross: CrossReport;
  composite: CompositeIndex;
  penalty: PenaltyIndex;
  reality: RealityReport;
  options: { scheme: CompositeScheme; workerPoolSize: number };
}
