import { describe, it, expect } from 'vitest';
import { isLegacyKind, runLegacyCheck } from '../lib/legacy-checks';

const tables = {
  balance: [
    { period: '2024-01', assets: 100, liabilities: 60, equity: 40, entity: 'A' },
    { period: '2024-02', assets: 120, liabilities: 60, equity: 50, entity: 'B' },
  ],
  pnl: [
    { period: '2024-01', revenue: 50, cogs: 20 },
    { period: '2024-02', revenue: 0, cogs: 10 },
  ],
  headcount: [{ period: '2024-01' }],
};

describe('legacy table checks', () => {
  it('recognises its kinds', () => {
    expect(isLegacyKind('period_align')).toBe(true);
    expect(isLegacyKind('ratio_bounds_intents')).toBe(false);
    expect(isLegacyKind('toString')).toBe(false);
  });

  it('lists missing required columns', () => {
    expect(runLegacyCheck({ type: 'required_columns', table: 'pnl', columns: ['revenue', 'opex'] }, tables)).toEqual({
      ok: false,
      problems: ['opex'],
    });
    expect(runLegacyCheck({ type: 'required_columns', table: 'cash', columns: ['a', 'b'] }, tables)).toEqual({
      ok: false,
      problems: ['a', 'b'],
    });
  });

  it('checks equations row by row', () => {
    const spec = { type: 'equation', table: 'balance', expression: 'assets = liabilities + equity' };
    expect(runLegacyCheck(spec, tables)).toEqual({ ok: false, problems: ['row_mismatch'] });
    expect(runLegacyCheck({ ...spec, group_by: 'entity' }, tables)).toEqual({ ok: false, problems: ['entity=B'] });
  });

  it('reports out-of-range values', () => {
    const spec = { type: 'range_check', table: 'pnl', columns: ['revenue', 'cogs'], min: 15 };
    expect(runLegacyCheck(spec, tables)).toEqual({ ok: false, problems: ['row1:revenue=0', 'row1:cogs=10'] });
  });

  it('compares period sets across tables', () => {
    expect(runLegacyCheck({ type: 'period_align', tables: ['balance', 'pnl'] }, tables).ok).toBe(true);
    expect(runLegacyCheck({ type: 'period_align', tables: ['balance', 'pnl', 'headcount'] }, tables)).toEqual({
      ok: false,
      problems: ['headcount != balance'],
    });
  });

  it('bounds ratios and flags zero denominators', () => {
    const spec = { type: 'ratio_bounds', table: 'pnl', numerator: 'cogs', denominator: 'revenue', max: 0.5 };
    expect(runLegacyCheck(spec, tables)).toEqual({ ok: false, problems: ['row1:den=0'] });
    expect(runLegacyCheck({ ...spec, max: 0.3 }, tables)).toEqual({ ok: false, problems: ['row0:ratio=0.4', 'row1:den=0'] });
  });

  it('requires ascending periods', () => {
    const rows = { t: [{ period: '2024-02' }, { period: '2024-01' }] };
    expect(runLegacyCheck({ type: 'monotonic_time', table: 't' }, rows)).toEqual({
      ok: false,
      problems: ['non_monotonic_or_gaps'],
    });
    expect(runLegacyCheck({ type: 'monotonic_time', table: 'balance' }, tables).ok).toBe(true);
  });

  it('reports invalid parameters', () => {
    const res = runLegacyCheck({ type: 'range_check', table: 'pnl' }, tables);
    expect(res).toEqual({ ok: false, problems: ['invalid_params: Required'] });
  });
});
