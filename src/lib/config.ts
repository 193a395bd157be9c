/*
  Runtime configuration
  -------------------------------------
  Read from the environment (the CLI loads .env first):

    RULES_DIR          rule bank root, one folder per domain   (default: rules)
    SIGNALS_DIR        reality signal files                    (default: signals)
    WORKER_POOL_SIZE   concurrent domain evaluations           (default: 5)
    COMPOSITE_SCHEME   standard | granular                     (default: standard)
    DOMAIN_WEIGHTS     JSON object, e.g. {"finance":0.4,"marketing":0.6}

  An invalid value falls back to its default with a warning.
*/

import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { DEFAULT_DOMAIN_WEIGHTS } from './scoring';
import { DOMAINS, type CompositeScheme, type Domain } from './types';

export interface EngineConfig {
  rulesDir: string;
  signalsDir: string;
  workerPoolSize: number;
  scheme: CompositeScheme;
  domainWeights: Partial<Record<Domain, number>>;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
  rulesDir: 'rules',
  signalsDir: 'signals',
  workerPoolSize: 5,
  scheme: 'standard',
  domainWeights: DEFAULT_DOMAIN_WEIGHTS,
});

function toWeights(raw: Record<string, number | undefined>): Partial<Record<Domain, number>> {
  const out: Partial<Record<Domain, number>> = {};
  for (const d of DOMAINS) {
    const w = raw[d];
    if (w !== undefined) out[d] = w;
  }
  return out;
}

const dirSchema = z.string().trim().min(1);
const poolSchema = z.coerce.number().int().min(1).max(64);
const schemeSchema = z.preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), z.enum(['standard', 'granular']));

const weightsSchema = z
  .string()
  .transform((s, ctx): unknown => {
    try {
      return JSON.parse(s);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'DOMAIN_WEIGHTS is not valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.object(Object.fromEntries(DOMAINS.map((d) => [d, z.number().nonnegative().optional()]))).strict())
  .transform(toWeights);

function read<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string | undefined, fallback: T): T {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  logger.warn('Invalid configuration value, using default', {
    name,
    value: raw,
    issues: parsed.error.issues.map((i) => i.message),
  });
  return fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    rulesDir: read('RULES_DIR', dirSchema, env.RULES_DIR, DEFAULT_CONFIG.rulesDir),
    signalsDir: read('SIGNALS_DIR', dirSchema, env.SIGNALS_DIR, DEFAULT_CONFIG.signalsDir),
    workerPoolSize: read('WORKER_POOL_SIZE', poolSchema, env.WORKER_POOL_SIZE, DEFAULT_CONFIG.workerPoolSize),
    scheme: read('COMPOSITE_SCHEME', schemeSchema, env.COMPOSITE_SCHEME, DEFAULT_CONFIG.scheme),
    domainWeights: read('DOMAIN_WEIGHTS', weightsSchema, env.DOMAIN_WEIGHTS, DEFAULT_CONFIG.domainWeights),
  };
}
