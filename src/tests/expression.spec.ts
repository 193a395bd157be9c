import { describe, it, expect } from 'vitest';
import { compile, evaluate, references, splitEquation, ExpressionError } from '../lib/expression';

describe('compile/evaluate', () => {
  const row = { revenue_intent: 120, cogs_intent: 20, headcount: 0, label: 'x', gap: null, 'Gross Margin': 0.4 };

  it('follows arithmetic precedence', () => {
    expect(evaluate(compile('revenue_intent - cogs_intent * 2'), row)).toBe(80);
    expect(evaluate(compile('(revenue_intent - cogs_intent) / 4'), row)).toBe(25);
  });

  it('returns null on division by zero and missing operands', () => {
    expect(evaluate(compile('revenue_intent / headcount'), row)).toBeNull();
    expect(evaluate(compile('gap + 1'), row)).toBeNull();
    expect(evaluate(compile('gap > 1'), row)).toBeNull();
  });

  it('treats booleans as 1/0', () => {
    expect(evaluate(compile('revenue_intent > 100 and cogs_intent < 10'), row)).toBe(0);
    expect(evaluate(compile('revenue_intent > 100 or cogs_intent < 10'), row)).toBe(1);
    expect(evaluate(compile('not headcount'), row)).toBe(1);
    expect(evaluate(compile('revenue_intent >= 120 && !headcount'), row)).toBe(1);
  });

  it('supports functions and quoted names', () => {
    expect(evaluate(compile('max(headcount, 1e-9) * 0 + abs(-3)'), row)).toBe(3);
    expect(evaluate(compile('min(revenue_intent, cogs_intent, 50)'), row)).toBe(20);
    expect(evaluate(compile('`Gross Margin` >= 0.2'), row)).toBe(1);
  });

  it('lists referenced columns once', () => {
    expect(references(compile('a + b * a - max(c, 1)'))).toEqual(['a', 'b', 'c']);
  });

  it('rejects malformed input', () => {
    expect(() => compile('')).toThrow(ExpressionError);
    expect(() => compile('a +')).toThrow('Unexpected end of expression');
    expect(() => compile('sqrt(a)')).toThrow("Unknown function 'sqrt'");
    expect(() => compile('abs(a, b)')).toThrow('Wrong number of arguments for abs()');
    expect(() => compile('a $ b')).toThrow("Unexpected character '$' at 2");
    expect(() => compile('(a + b')).toThrow('Expected )');
  });
});

describe('splitEquation', () => {
  it('splits on the assignment sign only', () => {
    expect(splitEquation('a = b + c')).toEqual(['a', 'b + c']);
    expect(splitEquation('a >= b = c')).toEqual(['a >= b', 'c']);
  });

  it('returns null without both sides', () => {
    expect(splitEquation('a == b')).toBeNull();
    expect(splitEquation('a =')).toBeNull();
  });
});
