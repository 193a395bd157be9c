import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { listJsonFiles, loadDomainRules, parseRuleFile } from '../lib/rule-loader';

describe('parseRuleFile', () => {
  it('fills defaults', () => {
    expect(parseRuleFile({ rule_id: 'R-1' }, 'finance/r1.json')).toEqual({
      id: 'R-1',
      title: 'R-1',
      severity: 'warn',
      description: undefined,
      bucket: undefined,
      checks: [],
      requiresTables: [],
      enabled: true,
      file: 'finance/r1.json',
    });
  });

  it('falls back to the file name and normalises severity', () => {
    const rule = parseRuleFile({ severity: ' BLOCK ', evidence: { checks: [{ type: 'non_negative', columns: ['a'] }] } }, 'x/margin.json');
    expect(rule.id).toBe('margin');
    expect(rule.severity).toBe('block');
    expect(rule.checks).toEqual([{ type: 'non_negative', columns: ['a'] }]);
  });

  it('keeps the rule bucket', () => {
    expect(parseRuleFile({ id: 'R-2', bucket: ' liquidity ' }, 'finance/r2.json').bucket).toBe('liquidity');
  });

  it('rejects a check without a type', () => {
    expect(() => parseRuleFile({ evidence: { checks: [{ column: 'a' }] } }, 'x.json')).toThrow();
  });
});

describe('loadDomainRules', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'rules-'));
    await fs.mkdir(path.join(root, 'finance', 'nested'), { recursive: true });
    await fs.writeFile(path.join(root, 'finance', 'b.json'), JSON.stringify({ id: 'B', title: 'Second' }));
    await fs.writeFile(path.join(root, 'finance', 'a.json'), JSON.stringify({ id: 'A', enabled: false }));
    await fs.writeFile(path.join(root, 'finance', 'nested', 'c.json'), JSON.stringify({ id: 'C' }));
    await fs.writeFile(path.join(root, 'finance', 'broken.json'), '{ not json');
    await fs.writeFile(path.join(root, 'finance', 'bad.json'), JSON.stringify({ enabled: 'yes' }));
    await fs.writeFile(path.join(root, 'finance', 'notes.txt'), 'ignored');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists json files in path order', async () => {
    expect(await listJsonFiles(path.join(root, 'finance'))).toEqual(['a.json', 'b.json', 'bad.json', 'broken.json', 'nested/c.json']);
  });

  it('loads valid rules and reports the rest', async () => {
    const { rules, errors } = await loadDomainRules(root, 'finance');
    expect(rules.map((r) => r.id)).toEqual(['A', 'B', 'C']);
    expect(rules[2].file).toBe('finance/nested/c.json');
    expect(errors.map((e) => e.file)).toEqual(['finance/bad.json', 'finance/broken.json']);
    expect(errors[0].message).toBe('enabled: Expected boolean, received string');
    expect(errors[1].message.startsWith('SyntaxError: ')).toBe(true);
  });

  it('returns nothing for a missing domain folder', async () => {
    expect(await loadDomainRules(root, 'talent')).toEqual({ rules: [], errors: [] });
  });

  it('loads the bundled rule banks', async () => {
    const { rules, errors } = await loadDomainRules('rules', 'finance');
    expect(errors).toEqual([]);
    expect(rules.map((r) => r.id)).toEqual(['FIN-001', 'FIN-002', 'FIN-003', 'FIN-004', 'FIN-005']);
    expect(rules.filter((r) => !r.enabled).map((r) => r.id)).toEqual(['FIN-005']);
  });
});
