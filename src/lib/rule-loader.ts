/*
  Rule loader
  -------------------------------------
  One JSON file per rule under rules/<domain>/ (nested folders allowed).

    {
      "id": "FIN-001",
      "title": "Gross margin within band",
      "severity": "block",
      "evidence": {
        "checks": [{ "type": "ratio_bounds_intents", "numerator": "gross_profit_intent", ... }],
        "requires_tables": []
      }
    }

  Files are read in lexicographic order of their relative path. A file that
  fails to parse or validate is skipped and reported; the rest still load.
*/

import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { describeError } from './errors';
import type { CheckSpec, Domain, LoadError, Rule } from './types';

const checkSpecSchema = z.object({ type: z.string().min(1) }).passthrough();

export const ruleFileSchema = z
  .object({
    id: z.string().min(1).optional(),
    rule_id: z.string().min(1).optional(),
    title: z.string().default(''),
    severity: z.string().default('warn'),
    description: z.string().optional(),
    bucket: z.string().trim().min(1).optional(),
    enabled: z.boolean().default(true),
    evidence: z
      .object({
        checks: z.array(checkSpecSchema).default([]),
        requires_tables: z.array(z.string()).default([]),
      })
      .default({}),
  });

export interface LoadedRules {
  rules: Rule[];
  errors: LoadError[];
}

/** Every *.json below dir, as paths relative to dir, sorted. Missing dir -> []. */
export async function listJsonFiles(dir: string, prefix = ''): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(path.join(dir, prefix), { withFileTypes: true });
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return [];
    throw e;
  }
  const out: string[] = [];
  for (const d of entries) {
    const rel = prefix ? `${prefix}/${d.name}` : d.name;
    if (d.isDirectory()) out.push(...(await listJsonFiles(dir, rel)));
    else if (d.isFile() && d.name.toLowerCase().endsWith('.json')) out.push(rel);
  }
  return out.sort();
}

function toCheckSpec(raw: z.infer<typeof checkSpecSchema>): CheckSpec {
  const { type, ...params } = raw;
  return { ...params, type };
}

export function parseRuleFile(raw: unknown, file: string): Rule {
  const r = ruleFileSchema.parse(raw);
  const id = r.id ?? r.rule_id ?? path.basename(file, path.extname(file));
  return {
    id,
    title: r.title || id,
    severity: r.severity.trim().toLowerCase(),
    description: r.description,
    bucket: r.bucket,
    checks: r.evidence.checks.map(toCheckSpec),
    requiresTables: r.evidence.requires_tables,
    enabled: r.enabled,
    file,
  };
}

export async function loadDomainRules(rulesRoot: string, domain: Domain): Promise<LoadedRules> {
  const dir = path.join(rulesRoot, domain);
  const rules: Rule[] = [];
  const errors: LoadError[] = [];

  for (const rel of await listJsonFiles(dir)) {
    const file = `${domain}/${rel}`;
    try {
      const text = await fs.readFile(path.join(dir, rel), 'utf8');
      rules.push(parseRuleFile(JSON.parse(text), file));
    } catch (e) {
      const message = e instanceof z.ZodError
        ? e.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        : describeError(e);
      errors.push({ file, message });
      logger.warn('Skipping invalid rule file', { file, message });
    }
  }

  return { rules, errors };
}
