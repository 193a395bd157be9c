/*
  Row expressions
  -------------------------------------
  Small arithmetic/boolean language used by equation, derived-metric and
  heuristic-flag checks. Parsed once, evaluated per row, never passed to eval().

    revenue_intent - cogs_intent
    total_revenue_intent / max(headcount_total_intent, 1e-9)
    spend_intent > 1000 and leads_intent < 10
    `Gross Margin` >= 0.2

  Booleans evaluate to 1/0. A missing operand (null) makes the whole
  result null, comparisons included.
*/

import { toNumber } from './series';
import type { Row } from './types';

// --------------------------
// Types
// --------------------------
const BINARY_OPS = ['+', '-', '*', '/', '<', '<=', '>', '>=', '==', '!=', 'and', 'or'] as const;
type BinaryOp = (typeof BINARY_OPS)[number];
const FUNCTIONS = ['max', 'min', 'abs'] as const;
type FnName = (typeof FUNCTIONS)[number];

export type Expr =
  | { kind: 'num'; value: number }
  | { kind: 'ref'; name: string }
  | { kind: 'neg'; arg: Expr }
  | { kind: 'not'; arg: Expr }
  | { kind: 'binary'; op: BinaryOp; left: Expr; right: Expr }
  | { kind: 'call'; fn: FnName; args: Expr[] };

type Token =
  | { kind: 'num'; value: number }
  | { kind: 'ident'; value: string }
  | { kind: 'op'; value: string }
  | { kind: 'lparen' }
  | { kind: 'rparen' }
  | { kind: 'comma' };

export class ExpressionError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

// --------------------------
// Tokenizer
// --------------------------
const OPS = ['<=', '>=', '==', '!=', '&&', '||', '+', '-', '*', '/', '<', '>', '&', '|', '!'];

function tokenize(src: string): Token[] {
  const out: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === '(') { out.push({ kind: 'lparen' }); i++; continue; }
    if (ch === ')') { out.push({ kind: 'rparen' }); i++; continue; }
    if (ch === ',') { out.push({ kind: 'comma' }); i++; continue; }

    if (ch === '`') {
      const end = src.indexOf('`', i + 1);
      if (end < 0) throw new ExpressionError('Unterminated quoted name', src);
      out.push({ kind: 'ident', value: src.slice(i + 1, end) });
      i = end + 1;
      continue;
    }

    const num = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(src.slice(i));
    if (num) {
      out.push({ kind: 'num', value: Number(num[0]) });
      i += num[0].length;
      continue;
    }

    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(src.slice(i));
    if (ident) {
      const word = ident[0];
      const lower = word.toLowerCase();
      if (lower === 'and' || lower === 'or' || lower === 'not') out.push({ kind: 'op', value: lower });
      else out.push({ kind: 'ident', value: word });
      i += word.length;
      continue;
    }

    const op = OPS.find((o) => src.startsWith(o, i));
    if (op) {
      out.push({ kind: 'op', value: op });
      i += op.length;
      continue;
    }
    throw new ExpressionError(`Unexpected character '${ch}' at ${i}`, src);
  }
  return out;
}

// --------------------------
// Parser
// --------------------------
class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly src: string) {}

  parse(): Expr {
    if (!this.tokens.length) throw new ExpressionError('Empty expression', this.src);
    const e = this.or();
    if (this.pos < this.tokens.length) throw new ExpressionError('Unexpected trailing input', this.src);
    return e;
  }

  private peekOp(...ops: string[]): string | null {
    const t = this.tokens[this.pos];
    return t && t.kind === 'op' && ops.includes(t.value) ? t.value : null;
  }

  private or(): Expr {
    let left = this.and();
    while (this.peekOp('or', '|', '||')) {
      this.pos++;
      left = { kind: 'binary', op: 'or', left, right: this.and() };
    }
    return left;
  }

  private and(): Expr {
    let left = this.not();
    while (this.peekOp('and', '&', '&&')) {
      this.pos++;
      left = { kind: 'binary', op: 'and', left, right: this.not() };
    }
    return left;
  }

  private not(): Expr {
    if (this.peekOp('not', '!')) {
      this.pos++;
      return { kind: 'not', arg: this.not() };
    }
    return this.comparison();
  }

  private comparison(): Expr {
    const left = this.additive();
    const op = this.peekOp('<', '<=', '>', '>=', '==', '!=');
    if (!op) return left;
    this.pos++;
    return { kind: 'binary', op: toBinaryOp(op), left, right: this.additive() };
  }

  private additive(): Expr {
    let left = this.multiplicative();
    for (let op = this.peekOp('+', '-'); op; op = this.peekOp('+', '-')) {
      this.pos++;
      left = { kind: 'binary', op: toBinaryOp(op), left, right: this.multiplicative() };
    }
    return left;
  }

  private multiplicative(): Expr {
    let left = this.unary();
    for (let op = this.peekOp('*', '/'); op; op = this.peekOp('*', '/')) {
      this.pos++;
      left = { kind: 'binary', op: toBinaryOp(op), left, right: this.unary() };
    }
    return left;
  }

  private unary(): Expr {
    if (this.peekOp('-')) {
      this.pos++;
      return { kind: 'neg', arg: this.unary() };
    }
    if (this.peekOp('+')) {
      this.pos++;
      return this.unary();
    }
    return this.primary();
  }

  private primary(): Expr {
    const t = this.tokens[this.pos];
    if (!t) throw new ExpressionError('Unexpected end of expression', this.src);
    this.pos++;
    if (t.kind === 'num') return { kind: 'num', value: t.value };
    if (t.kind === 'lparen') {
      const inner = this.or();
      this.expect('rparen');
      return inner;
    }
    if (t.kind === 'ident') {
      const next = this.tokens[this.pos];
      if (next && next.kind === 'lparen') return this.call(t.value);
      return { kind: 'ref', name: t.value };
    }
    throw new ExpressionError(`Unexpected token '${describeToken(t)}'`, this.src);
  }

  private call(name: string): Expr {
    const fn = FUNCTIONS.find((f) => f === name.toLowerCase());
    if (!fn) throw new ExpressionError(`Unknown function '${name}'`, this.src);
    this.expect('lparen');
    const args: Expr[] = [];
    if (this.tokens[this.pos]?.kind !== 'rparen') {
      args.push(this.or());
      while (this.tokens[this.pos]?.kind === 'comma') {
        this.pos++;
        args.push(this.or());
      }
    }
    this.expect('rparen');
    if (fn === 'abs' ? args.length !== 1 : args.length < 1) {
      throw new ExpressionError(`Wrong number of arguments for ${fn}()`, this.src);
    }
    return { kind: 'call', fn, args };
  }

  private expect(kind: 'lparen' | 'rparen') {
    const t = this.tokens[this.pos];
    if (!t || t.kind !== kind) throw new ExpressionError(`Expected ${kind === 'lparen' ? '(' : ')'}`, this.src);
    this.pos++;
  }
}

function toBinaryOp(op: string): BinaryOp {
  const found = BINARY_OPS.find((o) => o === op);
  if (!found) throw new ExpressionError(`Unknown operator '${op}'`, op);
  return found;
}

function describeToken(t: Token): string {
  if (t.kind === 'num' || t.kind === 'ident' || t.kind === 'op') return String(t.value);
  return t.kind === 'lparen' ? '(' : t.kind === 'rparen' ? ')' : ',';
}

// --------------------------
// Public API
// --------------------------
export function compile(src: string): Expr {
  return new Parser(tokenize(src), src).parse();
}

export function references(expr: Expr): string[] {
  const out = new Set<string>();
  const walk = (e: Expr) => {
    switch (e.kind) {
      case 'ref': out.add(e.name); break;
      case 'neg': case 'not': walk(e.arg); break;
      case 'binary': walk(e.left); walk(e.right); break;
      case 'call': e.args.forEach(walk); break;
      case 'num': break;
    }
  };
  walk(expr);
  return Array.from(out);
}

export function evaluate(expr: Expr, row: Row): number | null {
  switch (expr.kind) {
    case 'num':
      return expr.value;
    case 'ref':
      return toNumber(row[expr.name]);
    case 'neg': {
      const v = evaluate(expr.arg, row);
      return v === null ? null : -v;
    }
    case 'not': {
      const v = evaluate(expr.arg, row);
      return v === null ? null : v === 0 ? 1 : 0;
    }
    case 'call': {
      const vals = expr.args.map((a) => evaluate(a, row));
      const nums: number[] = [];
      for (const v of vals) {
        if (v === null) return null;
        nums.push(v);
      }
      if (expr.fn === 'abs') return Math.abs(nums[0]);
      return expr.fn === 'max' ? Math.max(...nums) : Math.min(...nums);
    }
    case 'binary': {
      const l = evaluate(expr.left, row);
      const r = evaluate(expr.right, row);
      if (l === null || r === null) return null;
      switch (expr.op) {
        case '+': return l + r;
        case '-': return l - r;
        case '*': return l * r;
        case '/': return r === 0 ? null : l / r;
        case '<': return l < r ? 1 : 0;
        case '<=': return l <= r ? 1 : 0;
        case '>': return l > r ? 1 : 0;
        case '>=': return l >= r ? 1 : 0;
        case '==': return l === r ? 1 : 0;
        case '!=': return l !== r ? 1 : 0;
        case 'and': return l !== 0 && r !== 0 ? 1 : 0;
        case 'or': return l !== 0 || r !== 0 ? 1 : 0;
      }
    }
  }
}

/** Split "lhs = rhs" on the single assignment-style '=' (not ==, <=, >=, !=). */
export function splitEquation(src: string): [string, string] | null {
  for (let i = 0; i < src.length; i++) {
    if (src[i] !== '=') continue;
    const prev = src[i - 1];
    const next = src[i + 1];
    if (next === '=' || prev === '=' || prev === '<' || prev === '>' || prev === '!') continue;
    const lhs = src.slice(0, i).trim();
    const rhs = src.slice(i + 1).trim();
    return lhs && rhs ? [lhs, rhs] : null;
  }
  return null;
}
