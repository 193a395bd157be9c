import { describe, it, expect } from 'vitest';
import { buildIntentConfig, resolveIntents, canon } from '../lib/intent-resolver';

describe('resolveIntents', () => {
  it('takes the first alias in table order', () => {
    const [row] = resolveIntents([{ Revenue: 100, total_revenue: 90 }], 'finance');
    expect(row.revenue_intent).toBe(100);
    expect(row.booked_revenue_intent).toBe(100);
  });

  it('never overwrites an intent already present', () => {
    const [row] = resolveIntents([{ revenue_intent: 5, revenue: 100 }], 'finance');
    expect(row.revenue_intent).toBe(5);
  });

  it('leaves the input rows untouched', () => {
    const rows = [{ Sales: '1,200', Period: '2024-01-01' }];
    const [row] = resolveIntents(rows, 'finance');
    expect(rows[0]).toEqual({ Sales: '1,200', Period: '2024-01-01' });
    expect(row.revenue_intent).toBe(1200);
    expect(row.period_intent).toBe('2024-01');
  });

  it('synthesises a period from a unique first column', () => {
    const out = resolveIntents([{ region: 'N', x: 1 }, { region: 'S', x: 2 }], 'operations');
    expect(out.map((r) => r.period_intent)).toEqual(['N', 'S']);
  });

  it('falls back to row numbers when the first column repeats', () => {
    const out = resolveIntents([{ region: 'N' }, { region: 'N' }, { region: 'S' }], 'operations');
    expect(out.map((r) => r.period_intent)).toEqual(['1', '2', '3']);
  });

  it('derives output per employee for talent data', () => {
    const [row] = resolveIntents([{ total_revenue: 1000, headcount: 10 }], 'talent');
    expect(row.headcount_total_intent).toBe(10);
    expect(row.output_per_employee_intent).toBe(100);
  });

  it('uses only the generic table for an unknown domain', () => {
    const [row] = resolveIntents([{ revenue: 1, ltv: 2 }], 'legal');
    expect(row.revenue_intent).toBe(1);
    expect(row).not.toHaveProperty('ltv_intent');
  });

  it('accepts a custom alias table', () => {
    const config = buildIntentConfig({
      generic: { units_intent: ['qty'] },
      domains: {},
      numeric: ['units_intent'],
    });
    const [row] = resolveIntents([{ QTY: '7' }], 'operations', config);
    expect(row.units_intent).toBe(7);
  });
});

describe('canon', () => {
  it('ignores case, spacing and punctuation', () => {
    expect(canon(' Total-Revenue ')).toBe('totalrevenue');
  });
});
