/*
  Reality overlay
  -------------------------------------
  Curated external constraints ("reality signals") read from JSON files under
  signals/, combined with each domain's internal warn/fail counts into a
  feasibility flag. Annotation only: scores are never touched.

  A signal file holds one signal or an array of them:

    {
      "id": "RS-FIN-001",
      "domain": "cfo",
      "title": "Credit tightening",
      "statement": "Working-capital lines are being repriced upward.",
      "severity": "high",
      "valid_until": "2026-12-31",
      "tags": ["credit"]
    }
*/

import { promises as fs } from 'node:fs';
import path from 'node:path';
import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { describeError } from './errors';
import { listJsonFiles } from './rule-loader';
import {
  byDomain,
  type Domain,
  type DomainReport,
  type FeasibilityFlag,
  type FeasibilityStatus,
  type LoadError,
  type RealityReport,
  type RealitySignal,
  type SignalSeverity,
} from './types';

dayjs.extend(customParseFormat);

const DOMAIN_ALIASES: Readonly<Record<string, Domain>> = {
  finance: 'finance',
  cfo: 'finance',
  marketing: 'marketing',
  cmo: 'marketing',
  operations: 'operations',
  ops: 'operations',
  coo: 'operations',
  people: 'people',
  hr: 'people',
  chro: 'people',
  talent: 'talent',
  workforce: 'talent',
  hiring: 'talent',
  cpo: 'talent',
};

export function normalizeSignalDomain(raw: string): Domain | string {
  const d = raw.trim().toLowerCase();
  return DOMAIN_ALIASES[d] ?? d;
}

const SEVERITY_RANK: Readonly<Record<SignalSeverity, number>> = { low: 1, medium: 2, high: 3, critical: 4 };
const RANKED: readonly SignalSeverity[] = ['low', 'medium', 'high', 'critical'];

export function severityRank(severity: string): number {
  const s = severity.trim().toLowerCase();
  const hit = RANKED.find((r) => r === s);
  return hit ? SEVERITY_RANK[hit] : 2;
}

const signalSchema = z.object({
  id: z.string().min(1).optional(),
  signal_id: z.string().min(1).optional(),
  domain: z.string().default('unknown'),
  title: z.string().default(''),
  statement: z.string().default(''),
  severity: z.string().default('medium'),
  confidence: z.string().default('medium'),
  horizon: z.string().default('6_12_months'),
  valid_until: z.string().nullable().optional(),
  tags: z.preprocess((v) => (v === undefined || v === null ? [] : Array.isArray(v) ? v : [v]), z.array(z.coerce.string())),
});

const signalFileSchema = z.union([signalSchema, z.array(signalSchema)]);

export interface LoadedSignals {
  signals: RealitySignal[];
  errors: LoadError[];
}

export function parseSignalFile(raw: unknown, file: string): RealitySignal[] {
  const parsed = signalFileSchema.parse(raw);
  const list = Array.isArray(parsed) ? parsed : [parsed];
  const stem = path.basename(file, path.extname(file));
  return list.map((s, i) => ({
    id: s.id ?? s.signal_id ?? (list.length > 1 ? `${stem}#${i + 1}` : stem),
    domain: normalizeSignalDomain(s.domain),
    title: s.title,
    statement: s.statement,
    severity: s.severity.trim().toLowerCase(),
    confidence: s.confidence.trim().toLowerCase(),
    horizon: s.horizon,
    validUntil: s.valid_until ? s.valid_until.trim() : null,
    tags: s.tags,
    file,
  }));
}

/** Missing directory -> no signals. Unreadable or invalid files are skipped and reported. */
export async function loadRealitySignals(dir: string): Promise<LoadedSignals> {
  const signals: RealitySignal[] = [];
  const errors: LoadError[] = [];
  for (const file of await listJsonFiles(dir)) {
    try {
      const text = await fs.readFile(path.join(dir, file), 'utf8');
      signals.push(...parseSignalFile(JSON.parse(text), file));
    } catch (e) {
      const message = e instanceof z.ZodError
        ? e.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        : describeError(e);
      errors.push({ file, message });
      logger.warn('Skipping invalid signal file', { file, message });
    }
  }
  return { signals, errors };
}

// --------------------------
// Feasibility
// --------------------------
export const FEASIBILITY_MESSAGES = {
  ok: 'No major feasibility flags.',
  risk: 'Feasibility risk flagged based on internal findings and/or reality constraints.',
  unavailable: 'Reality signals unavailable.',
} as const;

export function isExpired(signal: Pick<RealitySignal, 'validUntil'>, asOf: string): boolean {
  if (!signal.validUntil) return false;
  const until = dayjs(signal.validUntil, ['YYYY-MM-DD', 'YYYY-MM'], true);
  return until.isValid() && until.isBefore(dayjs(asOf, 'YYYY-MM-DD'), 'day');
}

function feasibilityStatus(fail: number, warn: number, maxRank: number): FeasibilityStatus {
  if (fail >= 1 || maxRank >= 4) return 'risk_high';
  if (warn >= 2 || maxRank >= 3) return 'risk_medium';
  if (warn === 1 || maxRank === 2) return 'risk_low';
  return 'ok';
}

export function emptyFeasibility(message: string = FEASIBILITY_MESSAGES.ok): Record<Domain, FeasibilityFlag> {
  return byDomain((): FeasibilityFlag => ({
    status: 'ok',
    message,
    internal: { fail: 0, warn: 0 },
    reality: { signalsCount: 0, maxSeverity: null, topSignals: [] },
  }));
}

export function computeFeasibility(
  reports: Partial<Record<Domain, DomainReport>>,
  signals: RealitySignal[],
  asOf: string
): { feasibility: Record<Domain, FeasibilityFlag>; expired: string[] } {
  const expired = signals.filter((s) => isExpired(s, asOf)).map((s) => s.id);
  const active = signals.filter((s) => !isExpired(s, asOf));

  const feasibility = byDomain((domain): FeasibilityFlag => {
    const findings = reports[domain]?.findings ?? [];
    const internal = {
      fail: findings.filter((f) => f.status === 'fail').length,
      warn: findings.filter((f) => f.status === 'warn').length,
    };
    const mine = active
      .filter((s) => s.domain === domain)
      .map((s, i) => ({ s, i, rank: severityRank(s.severity) }))
      .sort((a, b) => b.rank - a.rank || a.i - b.i);
    const maxRank = mine.length ? mine[0].rank : 0;
    const status = feasibilityStatus(internal.fail, internal.warn, maxRank);
    return {
      status,
      message: status === 'ok' ? FEASIBILITY_MESSAGES.ok : FEASIBILITY_MESSAGES.risk,
      internal,
      reality: {
        signalsCount: mine.length,
        maxSeverity: maxRank ? RANKED[maxRank - 1] : null,
        topSignals: mine.slice(0, 3).map(({ s }) => ({ id: s.id, title: s.title, severity: s.severity, statement: s.statement })),
      },
    };
  });

  return { feasibility, expired };
}

export async function evaluateReality(
  dir: string,
  reports: Partial<Record<Domain, DomainReport>>,
  asOf: string = dayjs().format('YYYY-MM-DD')
): Promise<RealityReport> {
  try {
    const { signals, errors } = await loadRealitySignals(dir);
    const { feasibility, expired } = computeFeasibility(reports, signals, asOf);
    return { meta: { status: 'ok', error: null, signalsDir: dir, asOf }, signals, expired, loadErrors: errors, feasibility };
  } catch (e) {
    logger.error('Reality overlay failed', { dir, error: describeError(e) });
    return {
      meta: { status: 'error', error: describeError(e), signalsDir: dir, asOf },
      signals: [],
      expired: [],
      loadErrors: [],
      feasibility: emptyFeasibility(FEASIBILITY_MESSAGES.unavailable),
    };
  }
}
