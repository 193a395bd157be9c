import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { castCell, loadDomainInputs, parseCsv, parseJsonInput } from '../lib/dataset-loader';

describe('castCell', () => {
  it('turns numeric text into numbers and blanks into null', () => {
    expect(castCell(' 42 ')).toBe(42);
    expect(castCell('-1.5e3')).toBe(-1500);
    expect(castCell('.5')).toBe(0.5);
    expect(castCell('')).toBeNull();
    expect(castCell('2024-01')).toBe('2024-01');
    expect(castCell('1,200')).toBe('1,200');
  });
});

describe('parseCsv', () => {
  it('reads headed rows', () => {
    const text = 'period, revenue ,note\n2024-01,100,ok\n2024-02,,\n';
    expect(parseCsv(text)).toEqual([
      { period: '2024-01', revenue: 100, note: 'ok' },
      { period: '2024-02', revenue: null, note: null },
    ]);
  });

  it('honours the delimiter', () => {
    expect(parseCsv('a\tb\n1\tx\n', '\t')).toEqual([{ a: 1, b: 'x' }]);
  });
});

describe('parseJsonInput', () => {
  it('accepts rows or named tables', () => {
    expect(parseJsonInput('[{"a":true,"b":null,"c":"x"}]')).toEqual([{ a: 1, b: null, c: 'x' }]);
    expect(parseJsonInput('{"tables":{"pnl":[{"a":1}]}}')).toEqual({ tables: { pnl: [{ a: 1 }] } });
  });

  it('rejects other shapes', () => {
    expect(() => parseJsonInput('{"a":1}')).toThrow();
  });
});

describe('loadDomainInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'inputs-'));
    await fs.writeFile(path.join(dir, 'finance.csv'), 'period,revenue\n2024-01,100\n');
    await fs.writeFile(path.join(dir, 'people.tsv'), 'period\theadcount\n2024-01\t12\n');
    await fs.writeFile(path.join(dir, 'marketing.json'), '[{"period":"2024-01","spend":5}]');
    await fs.writeFile(path.join(dir, 'legal.csv'), 'a\n1\n');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads one file per known domain', async () => {
    const inputs = await loadDomainInputs(dir);
    expect(Object.keys(inputs)).toEqual(['finance', 'marketing', 'people']);
    expect(inputs.people).toEqual([{ period: '2024-01', headcount: 12 }]);
    expect(inputs.marketing).toEqual([{ period: '2024-01', spend: 5 }]);
  });
});
