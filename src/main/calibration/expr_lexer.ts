/**
 * Tokenizer for calibration expressions.
 *
 * Recognises numbers (decimal, float, exponent, `0x`/`0o`/`0b`, `_`
 * separators), single- or double-quoted strings, identifiers and the
 * operator set. Characters outside that set are rejected here.
 *
 * @module calibration/expr_lexer
 */

import { ExpressionError } from '../protocol/errors';
import type { Token } from './expr_types';

/** Operators, longest first so that `**` wins over `*`. */
const OPERATORS: readonly string[] = [
  '**', '//', '==', '!=', '<=', '>=', ':=', '<<', '>>', '->',
  '+', '-', '*', '/', '%', '<', '>', '(', ')', ',', '.', '=',
  '[', ']', '{', '}', ':', '&', '|', '^', '~', '@', ';'
];

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;

const DECIMAL_RE = /^(?:\d(?:_?\d)*)?(?:\.(?:\d(?:_?\d)*)?)?(?:[eE][+-]?\d(?:_?\d)*)?/;
const RADIX_RE = /^0(?:[xX][0-9a-fA-F](?:_?[0-9a-fA-F])*|[oO][0-7](?:_?[0-7])*|[bB][01](?:_?[01])*)/;

const RADIX_BASES: Record<string, number> = { x: 16, o: 8, b: 2 };

const ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
  '0': '\0'
};

/**
 * Split an expression into tokens. The last token is always `eof`.
 *
 * @throws ExpressionError on an unexpected character, a malformed number or
 *   an unterminated string.
 */
export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < expression.length) {
    const ch = expression[pos];

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      pos++;
      continue;
    }

    if (is_digit(ch) || (ch === '.' && is_digit(expression[pos + 1] ?? ''))) {
      const token = read_number(expression, pos);
      tokens.push(token);
      pos += token.text.length;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const { token, end } = read_string(expression, pos);
      tokens.push(token);
      pos = end;
      continue;
    }

    if (NAME_START.test(ch)) {
      let end = pos + 1;
      while (end < expression.length && NAME_PART.test(expression[end])) end++;
      tokens.push({ kind: 'name', text: expression.slice(pos, end), pos });
      pos = end;
      continue;
    }

    const op = OPERATORS.find((candidate) => expression.startsWith(candidate, pos));
    if (op) {
      tokens.push({ kind: 'op', text: op, pos });
      pos += op.length;
      continue;
    }

    throw new ExpressionError(expression, `Unexpected character '${ch}' at position ${pos}`);
  }

  tokens.push({ kind: 'eof', text: '', pos });
  return tokens;
}

function is_digit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function read_number(expression: string, pos: number): Token {
  const rest = expression.slice(pos);
  const radix = RADIX_RE.exec(rest);
  const text = radix ? radix[0] : (DECIMAL_RE.exec(rest)?.[0] ?? '');
  const after = expression[pos + text.length] ?? '';

  if (text === '' || NAME_PART.test(after) || after === '.') {
    throw new ExpressionError(expression, `Invalid number literal at position ${pos}`);
  }

  const digits = text.replace(/_/g, '');
  let value: number;
  if (radix) {
    const base = RADIX_BASES[digits[1].toLowerCase()];
    value = parseInt(digits.slice(2), base);
  } else {
    value = Number(digits);
  }
  if (Number.isNaN(value)) {
    throw new ExpressionError(expression, `Invalid number literal '${text}' at position ${pos}`);
  }
  return { kind: 'number', text, value, pos };
}

function read_string(expression: string, pos: number): { token: Token; end: number } {
  const quote = expression[pos];
  let out = '';
  let i = pos + 1;

  while (i < expression.length) {
    const ch = expression[i];
    if (ch === quote) {
      return { token: { kind: 'string', text: out, pos }, end: i + 1 };
    }
    if (ch === '\n') break;
    if (ch === '\\' && i + 1 < expression.length) {
      const next = expression[i + 1];
      // Unknown escapes keep their backslash.
      out += ESCAPES[next] ?? `\\${next}`;
      i += 2;
      continue;
    }
    out += ch;
    i++;
  }

  throw new ExpressionError(expression, `Unterminated string literal at position ${pos}`);
}
