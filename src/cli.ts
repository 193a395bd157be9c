import { config } from 'dotenv';
config();

import { promises as fs } from 'node:fs';
import { parseArgs } from 'node:util';
import * as logger from 'firebase-functions/logger';
import { loadConfig } from './lib/config';
import { loadDomainInputs } from './lib/dataset-loader';
import { describeError } from './lib/errors';
import { evaluateAll } from './lib/orchestrator';
import type { CompositeScheme } from './lib/types';

const USAGE = `Usage: tsx src/cli.ts --input <dir> [--rules dir] [--signals dir] [--scheme standard|granular]
                      [--as-of YYYY-MM-DD] [--output file] [--no-cross] [--no-reality]`;

const OPTIONS = {
  input: { type: 'string', short: 'i' },
  rules: { type: 'string' },
  signals: { type: 'string' },
  scheme: { type: 'string' },
  'as-of': { type: 'string' },
  output: { type: 'string', short: 'o' },
  'no-cross': { type: 'boolean', default: false },
  'no-reality': { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

const isScheme = (s: string): s is CompositeScheme => s === 'standard' || s === 'granular';

function parseCli(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true }).values;
  } catch (e) {
    console.error(describeError(e));
    return null;
  }
}

async function main(argv: string[]): Promise<number> {
  const args = parseCli(argv);
  if (!args) {
    console.error(USAGE);
    return 2;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (!args.input) {
    console.error(USAGE);
    return 2;
  }
  const scheme = args.scheme;
  if (scheme !== undefined && !isScheme(scheme)) {
    console.error(`Unknown scheme: ${scheme}`);
    return 2;
  }

  const env = loadConfig();
  const inputs = await loadDomainInputs(args.input);
  const report = await evaluateAll(inputs, {
    rulesDir: args.rules ?? env.rulesDir,
    signalsDir: args.signals ?? env.signalsDir,
    workerPoolSize: env.workerPoolSize,
    scheme: scheme ?? env.scheme,
    domainWeights: env.domainWeights,
    asOf: args['as-of'],
    cross: !args['no-cross'],
    reality: !args['no-reality'],
  });

  const json = JSON.stringify(report, null, 2);
  if (args.output) {
    await fs.writeFile(args.output, json + '\n', 'utf8');
    logger.info('Report written', { output: args.output });
  } else {
    console.log(json);
  }
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    logger.error('Evaluation run failed', { error: describeError(e) });
    process.exitCode = 1;
  }
);
