import { describe, it, expect } from 'vitest';
import { dispatch, isCheckKind, normalizeParams, runCheckOutcome, suggestCheckKind, worstStatus } from '../lib/checks';

describe('check registry', () => {
  it('knows its kinds and suggests near misses', () => {
    expect(isCheckKind('pii_scan')).toBe(true);
    expect(isCheckKind('pii_scanner')).toBe(false);
    expect(suggestCheckKind('ratio_bound_intents')).toBe('ratio_bounds_intents');
    expect(suggestCheckKind('completely_different')).toBeNull();
  });

  it('maps parameter synonyms without overriding canonical keys', () => {
    expect(normalizeParams({ type: 'x', tol: 0.1, lhs: 'a' })).toEqual({ tolerance_abs: 0.1, left: 'a' });
    expect(normalizeParams({ type: 'x', tolerance: 0.1, tolerance_abs: 0.2 })).toEqual({ tolerance_abs: 0.2 });
  });

  it('picks the worst status', () => {
    expect(worstStatus(['pass', 'warn', 'pass'])).toBe('warn');
    expect(worstStatus(['warn', 'fail'])).toBe('fail');
    expect(worstStatus([])).toBe('pass');
  });

  it('turns unknown kinds into a soft warning', () => {
    expect(dispatch({ type: 'ratio_bound_intents' }, [])).toEqual({
      status: 'warn',
      score: 0.6,
      details: { note: 'unknown_check_type', type: 'ratio_bound_intents', suggestion: 'ratio_bounds_intents' },
    });
  });

  it('reports invalid parameters', () => {
    const res = dispatch({ type: 'ratio_bounds_intents', numerator: 'n' }, [{ n: 1 }]);
    expect(res.status).toBe('warn');
    expect(res.details).toEqual({ note: 'invalid_params', issues: ['denominator: Required'] });
  });

  it('reports missing columns', () => {
    const res = dispatch({ type: 'ratio_bounds_intents', numerator: 'n', denominator: 'd' }, [{ n: 1 }]);
    expect(res).toEqual({ status: 'warn', score: 0.6, details: { note: 'missing_columns', missing: ['d'] } });
  });
});

describe('ratio and equation checks', () => {
  it('fails a ratio outside its bounds', () => {
    const res = dispatch(
      { type: 'ratio_bounds_intents', numerator: 'n', denominator: 'd', low: 0, high: 1 },
      [{ n: 50, d: 100 }, { n: 120, d: 100 }]
    );
    expect(res).toEqual({ status: 'fail', score: 0, details: { byGroup: { all: { min: 0.5, max: 1.2 } } } });
  });

  it('handles columns of a few hundred thousand rows', () => {
    const rows = Array.from({ length: 300_000 }, () => ({ n: 50, d: 100 }));
    const res = dispatch({ type: 'ratio_bounds_intents', numerator: 'n', denominator: 'd', low: 0, high: 1 }, rows);
    expect(res).toEqual({ status: 'pass', score: 1, details: { byGroup: { all: { min: 0.5, max: 0.5 } } } });

    const spread = Array.from({ length: 300_000 }, (_, i) => ({ x: i % 10 }));
    expect(dispatch({ type: 'outlier_sigma_intents', column: 'x' }, spread).status).toBe('pass');
  });

  it('keeps a null group apart from the string "null"', () => {
    const res = dispatch(
      { type: 'ratio_bounds_intents', numerator: 'n', denominator: 'd', high: 2, group_by: 'g' },
      [{ g: null, n: 1, d: 1 }, { g: 'null', n: 5, d: 1 }]
    );
    expect(res).toEqual({
      status: 'fail',
      score: 0,
      details: { byGroup: { null: { min: 5, max: 5 } }, nullGroup: { min: 1, max: 1 } },
    });
  });

  it('applies relative tolerance', () => {
    const spec = { type: 'equation_intents', expression: 'a = b', tolerance: 0.01 };
    expect(dispatch(spec, [{ a: 100, b: 100.5 }]).status).toBe('pass');
    expect(dispatch(spec, [{ a: 100, b: 102 }]).status).toBe('fail');
  });

  it('applies absolute tolerance when asked', () => {
    const spec = { type: 'equation_intents', expression: 'a = b', tolerance_abs: 0.5, tolerance_mode: 'abs' };
    expect(dispatch(spec, [{ a: 1000, b: 1000.4 }]).status).toBe('pass');
    expect(dispatch(spec, [{ a: 1000, b: 1001 }]).status).toBe('fail');
  });

  it('builds the equation from summed sides', () => {
    const spec = { type: 'equation_intents', left_sum: ['total'], right_sum: ['a', 'b'] };
    expect(dispatch(spec, [{ total: 10, a: 4, b: 6 }]).status).toBe('pass');
  });

  it('asks for an equation when none is given', () => {
    expect(dispatch({ type: 'equation_intents', left: 'a' }, [{ a: 1 }]).details.note).toBe('equation_missing_params');
  });

  it('evaluates per group', () => {
    const res = dispatch(
      { type: 'equation_intents_tolerance', expression: 'a = b', tolerance_abs: 0.01, group_by: 'g' },
      [
        { g: 'x', a: 10, b: 10 },
        { g: 'y', a: 10, b: 20 },
      ]
    );
    expect(res.status).toBe('fail');
    expect(Object.keys(res.details.byGroup ?? {})).toEqual(['x', 'y']);
  });

  it('only warns for the optional equation', () => {
    const spec = { type: 'equation_tolerance_optional', expression: 'a = b', tolerance_abs: 0.01 };
    expect(dispatch(spec, [{ a: 10, b: 20 }]).status).toBe('warn');
    expect(dispatch(spec, [{ a: 10 }]).details.note).toBe('optional_equation_skipped');
  });

  it('warns for values outside their reference range', () => {
    const res = dispatch({ type: 'value_in_range', value: 'v', low_ref: 'lo', high_ref: 'hi' }, [{ v: 5, lo: 0, hi: 4 }]);
    expect(res).toEqual({ status: 'warn', score: 0.6, details: { violations: 1 } });
  });

  it('emits derived columns', () => {
    const out = runCheckOutcome({ type: 'derived_metric', name: 'r', expression: 'a / b' }, [{ a: 10, b: 2 }, { a: 1, b: 0 }]);
    expect(out).toEqual({
      kind: 'evaluated',
      status: 'pass',
      details: { created: 'r' },
      derived: { name: 'r', values: [5, null] },
    });
  });
});

describe('trend checks', () => {
  it('finds the lag at which left trails right', () => {
    const right = [1, 5, 2, 8, 3, 9];
    const left = [0, 1, 5, 2, 8, 3];
    const rows = right.map((r, i) => ({ l: left[i], r }));
    const res = dispatch({ type: 'lead_lag_correlation', left: 'l', right: 'r', max_lag_periods: 2, min_corr: 0.9 }, rows);
    expect(res.status).toBe('pass');
    expect(res.details.bestLag).toBe(1);
    expect(res.details.bestCorr).toBeCloseTo(1, 9);
  });
});

describe('period checks', () => {
  it('fails out-of-order periods', () => {
    const rows = ['2024-01', '2024-03', '2024-02'].map((p) => ({ period_intent: p }));
    expect(dispatch({ type: 'monotonic_time_intents' }, rows)).toEqual({
      status: 'fail',
      score: 0,
      details: { unparsed: 0 },
    });
  });

  it('needs a fiscal close month', () => {
    const rows = ['2024-01', '2024-02'].map((p) => ({ period_intent: p }));
    expect(dispatch({ type: 'fiscal_year_close_present' }, rows).status).toBe('fail');
    expect(dispatch({ type: 'fiscal_year_close_present' }, [...rows, { period_intent: '2024-03' }]).status).toBe('pass');
  });
});

describe('integrity checks', () => {
  it('measures identical streaks', () => {
    const rows = [5, 5, 5, 7].map((x) => ({ x }));
    expect(dispatch({ type: 'identical_rows_across_periods', column: 'x', min_consecutive: 3 }, rows)).toEqual({
      status: 'fail',
      score: 0,
      details: { maxIdenticalStreak: 3 },
    });
  });

  it('does not count missing values as identical', () => {
    const rows = [{ x: 5 }, { x: null }, { x: null }];
    expect(dispatch({ type: 'identical_rows_across_periods', column: 'x' }, rows).details).toEqual({
      maxIdenticalStreak: 1,
    });
  });

  it('warns on duplicates', () => {
    const res = dispatch({ type: 'duplicate_values', column: 'id' }, [{ id: 'a' }, { id: 'a' }, { id: 'b' }]);
    expect(res).toEqual({ status: 'warn', score: 0.6, details: { duplicates: 2 } });
  });

  it('detects email and phone numbers', () => {
    expect(dispatch({ type: 'pii_scan', columns: 'notes' }, [{ notes: 'contact alice@example.com' }]).details).toEqual({
      emailLike: true,
      phoneLike: false,
      columns: ['notes'],
    });
    expect(dispatch({ type: 'pii_scan' }, [{ notes: 'call +1 213 373 4253' }]).details).toEqual({
      emailLike: false,
      phoneLike: true,
      columns: ['notes'],
    });
    expect(dispatch({ type: 'pii_scan' }, [{ notes: 'all good', n: 3 }]).status).toBe('pass');
  });

  it('flags rows matching every expression of a condition', () => {
    const spec = { type: 'heuristic_flag', conditions: [{ exprs: ['spend > 1000', 'leads < 10'] }] };
    expect(dispatch(spec, [{ spend: 2000, leads: 5 }])).toEqual({
      status: 'fail',
      score: 0,
      details: { flagged: true, condition: 0 },
    });
    expect(dispatch(spec, [{ spend: 2000, leads: 50 }]).details).toEqual({ flagged: false });
  });

  it('reconciles parts to a total', () => {
    const spec = { type: 'sum_reconciliation_intents', total: 't', parts: ['a', 'b'] };
    expect(dispatch(spec, [{ t: 100, a: 60, b: 40 }]).status).toBe('pass');
    expect(dispatch(spec, [{ t: 100, a: 60, b: 30 }]).status).toBe('fail');
  });
});

describe('people checks', () => {
  it('checks headcount against hires and exits', () => {
    const rows = [
      { headcount: 100, hires: 5, exits: 0 },
      { headcount: 105, hires: 3, exits: 5 },
      { headcount: 103, hires: 0, exits: 2 },
    ];
    const res = dispatch({ type: 'headcount_flow_consistency', headcount: 'headcount', hires: 'hires', exits: 'exits' }, rows);
    expect(res.status).toBe('fail');
    expect(res.details).toEqual({
      byGroup: {
        all: {
          maxErr: 7,
          periods: [
            { period: '2', status: 'fail', err: 7 },
            { period: '3', status: 'pass', err: 0 },
          ],
        },
      },
    });
  });

  it('checks experience against band', () => {
    const spec = { type: 'band_alignment_check', experience: 'years', band: 'band' };
    expect(dispatch(spec, [{ years: 4, band: 2 }, { years: 10, band: 3 }]).status).toBe('pass');
    expect(dispatch(spec, [{ years: 1, band: 4 }]).details).toEqual({ maxBandGap: 3 });
  });

  it('checks onboarding completion', () => {
    const spec = { type: 'onboarding_completion_rate', numerator: 'done', denominator: 'started', min_rate: 0.8 };
    expect(dispatch(spec, [{ done: 9, started: 10 }]).status).toBe('pass');
    expect(dispatch(spec, [{ done: 5, started: 10 }]).status).toBe('fail');
  });
});

describe('dispatch', () => {
  it('is repeatable and leaves its input alone', () => {
    const rows = [{ a: 100, b: 100.5 }, { a: 50, b: 49 }];
    const before = JSON.stringify(rows);
    const spec = { type: 'equation_intents', expression: 'a = b', tolerance_abs: 0.01 };
    expect(dispatch(spec, rows)).toEqual(dispatch(spec, rows));
    expect(JSON.stringify(rows)).toBe(before);
  });
});
