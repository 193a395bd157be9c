/*
  Dataset loader (CLI input)
  -------------------------------------
  Reads <domain>.csv, <domain>.tsv or <domain>.json from one directory.
  JSON is either an array of rows or { "tables": { name: rows } }.
  Numeric-looking cells become numbers, empty cells null.
*/

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as csvParse } from 'csv-parse/sync';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { DOMAINS, type CellValue, type Dataset, type DomainInput, type DomainInputs } from './types';

const cell = z.union([z.number(), z.string(), z.boolean(), z.null()]).transform((v): CellValue => {
  if (typeof v === 'boolean') return v ? 1 : 0;
  return v;
});
const rowsSchema = z.array(z.record(z.string(), cell));
const inputSchema = z.union([rowsSchema, z.object({ tables: z.record(z.string(), rowsSchema) })]);

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function castCell(value: string): CellValue {
  const v = value.trim();
  if (v === '') return null;
  return NUMERIC.test(v) ? Number(v) : v;
}

export function parseCsv(text: string, delimiter = ','): Dataset {
  const records: Record<string, string>[] = csvParse(text, {
    columns: true,
    delimiter,
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  return records.map((r) => Object.fromEntries(Object.entries(r).map(([k, v]) => [k.trim(), castCell(v)])));
}

export function parseJsonInput(text: string): DomainInput {
  return inputSchema.parse(JSON.parse(text));
}

const EXTENSIONS = ['.csv', '.tsv', '.json'] as const;

export async function loadDomainInputs(dir: string): Promise<DomainInputs> {
  const inputs: DomainInputs = {};
  const present = new Set(await fs.readdir(dir));
  for (const domain of DOMAINS) {
    const ext = EXTENSIONS.find((e) => present.has(`${domain}${e}`));
    if (!ext) continue;
    const file = path.join(dir, `${domain}${ext}`);
    const text = await fs.readFile(file, 'utf8');
    inputs[domain] = ext === '.json' ? parseJsonInput(text) : parseCsv(text, ext === '.tsv' ? '\t' : ',');
    logger.info('Loaded domain input', { domain, file });
  }
  return inputs;
}
