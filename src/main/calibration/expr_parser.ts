/**
 * Recursive-descent parser for calibration expressions.
 *
 * Builds a typed {@link ExprNode} tree. Statements and constructs that can
 * never be part of an expression (assignment, lambda, import,
 * comprehensions, keyword arguments) fail here; everything else is left for
 * the validator to check against the allow-lists.
 *
 * Precedence, loosest first:
 *   conditional, or, and, not, comparison, |, ^, &, shifts, + -,
 *   * / // % @, unary + - ~, **, call/attribute/subscript.
 *
 * @module calibration/expr_parser
 */

import { ExpressionError } from '../protocol/errors';
import { tokenize } from './expr_lexer';
import type { BinaryOp, CompareOp, ExprNode, Token } from './expr_types';

/** Reserved words that may not be used as identifiers. */
const RESERVED: ReadonlySet<string> = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally',
  'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal',
  'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield'
]);

const SIMPLE_COMPARE_OPS: readonly CompareOp[] = ['==', '!=', '<', '<=', '>', '>='];

/**
 * Parse an expression into a syntax tree.
 *
 * @throws ExpressionError on a syntax error or a statement-level construct.
 */
export function parse_expression(expression: string): ExprNode {
  if (expression.trim() === '') {
    throw new ExpressionError(expression, 'Empty expression');
  }
  return new Parser(expression, tokenize(expression)).parse();
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[]
  ) {}

  parse(): ExprNode {
    const tree = this.expression();
    const next = this.peek();
    if (next.kind !== 'eof') {
      if (this.is_op('=') || this.is_op(':=')) {
        this.fail('Assignment is not allowed');
      }
      this.fail(`Unexpected '${next.text}' at position ${next.pos}`);
    }
    return tree;
  }

  // -------------------------------------------------------------------------
  // Token helpers
  // -------------------------------------------------------------------------

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private is_op(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'op' && token.text === text;
  }

  private is_keyword(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'name' && token.text === text;
  }

  private expect_op(text: string): void {
    if (!this.is_op(text)) {
      const token = this.peek();
      const found = token.kind === 'eof' ? 'end of expression' : `'${token.text}'`;
      this.fail(`Expected '${text}' but found ${found} at position ${token.pos}`);
    }
    this.advance();
  }

  private fail(reason: string): never {
    throw new ExpressionError(this.source, reason);
  }

  // -------------------------------------------------------------------------
  // Grammar
  // -------------------------------------------------------------------------

  private expression(): ExprNode {
    if (this.is_keyword('lambda')) this.fail('lambda is not allowed');

    const body = this.disjunction();
    if (!this.is_keyword('if')) return body;

    this.advance();
    const test = this.disjunction();
    if (!this.is_keyword('else')) {
      this.fail("Conditional expression requires 'else'");
    }
    this.advance();
    const orelse = this.expression();
    return { kind: 'conditional', test, body, orelse };
  }

  private disjunction(): ExprNode {
    const operands = [this.conjunction()];
    while (this.is_keyword('or')) {
      this.advance();
      operands.push(this.conjunction());
    }
    return operands.length === 1 ? operands[0] : { kind: 'logical', op: 'or', operands };
  }

  private conjunction(): ExprNode {
    const operands = [this.inversion()];
    while (this.is_keyword('and')) {
      this.advance();
      operands.push(this.inversion());
    }
    return operands.length === 1 ? operands[0] : { kind: 'logical', op: 'and', operands };
  }

  private inversion(): ExprNode {
    if (this.is_keyword('not')) {
      this.advance();
      return { kind: 'unary', op: 'not', operand: this.inversion() };
    }
    return this.comparison();
  }

  private comparison(): ExprNode {
    const first = this.bit_or();
    const rest: Array<{ op: CompareOp; operand: ExprNode }> = [];

    for (;;) {
      const op = this.compare_op();
      if (op === null) break;
      rest.push({ op, operand: this.bit_or() });
    }
    return rest.length === 0 ? first : { kind: 'compare', first, rest };
  }

  /** Consume a comparison operator, or return null if none follows. */
  private compare_op(): CompareOp | null {
    const token = this.peek();
    const simple = SIMPLE_COMPARE_OPS.find((op) => token.kind === 'op' && token.text === op);
    if (simple !== undefined) {
      this.advance();
      return simple;
    }
    if (this.is_keyword('in')) {
      this.advance();
      return 'in';
    }
    if (this.is_keyword('not') && this.is_keyword('in', 1)) {
      this.advance();
      this.advance();
      return 'not in';
    }
    if (this.is_keyword('is')) {
      this.advance();
      if (this.is_keyword('not')) {
        this.advance();
        return 'is not';
      }
      return 'is';
    }
    return null;
  }

  private binary_level(ops: readonly BinaryOp[], next: () => ExprNode): ExprNode {
    let left = next();
    for (;;) {
      const token = this.peek();
      const op = ops.find((candidate) => token.kind === 'op' && token.text === candidate);
      if (op === undefined) return left;
      this.advance();
      left = { kind: 'binary', op, left, right: next() };
    }
  }

  private bit_or(): ExprNode {
    return this.binary_level(['|'], () => this.bit_xor());
  }

  private bit_xor(): ExprNode {
    return this.binary_level(['^'], () => this.bit_and());
  }

  private bit_and(): ExprNode {
    return this.binary_level(['&'], () => this.shift());
  }

  private shift(): ExprNode {
    return this.binary_level(['<<', '>>'], () => this.sum());
  }

  private sum(): ExprNode {
    return this.binary_level(['+', '-'], () => this.term());
  }

  private term(): ExprNode {
    return this.binary_level(['*', '/', '//', '%', '@'], () => this.factor());
  }

  private factor(): ExprNode {
    if (this.is_op('+') || this.is_op('-') || this.is_op('~')) {
      const op = this.advance().text;
      const operand = this.factor();
      return { kind: 'unary', op: op === '+' ? '+' : op === '-' ? '-' : '~', operand };
    }
    return this.power();
  }

  private power(): ExprNode {
    const base = this.primary();
    if (!this.is_op('**')) return base;
    this.advance();
    // Right-associative; the exponent may carry its own unary sign.
    return { kind: 'binary', op: '**', left: base, right: this.factor() };
  }

  private primary(): ExprNode {
    let node = this.atom();
    for (;;) {
      if (this.is_op('(')) {
        this.advance();
        node = { kind: 'call', callee: node, args: this.call_arguments() };
      } else if (this.is_op('.')) {
        this.advance();
        const attr = this.advance();
        if (attr.kind !== 'name') {
          this.fail(`Expected attribute name at position ${attr.pos}`);
        }
        node = { kind: 'attribute', object: node, attr: attr.text };
      } else if (this.is_op('[')) {
        this.advance();
        const index = this.expression();
        if (this.is_op(':')) this.fail('Slicing is not allowed');
        this.expect_op(']');
        node = { kind: 'subscript', object: node, index };
      } else {
        return node;
      }
    }
  }

  private call_arguments(): ExprNode[] {
    const args: ExprNode[] = [];
    while (!this.is_op(')')) {
      if (this.peek().kind === 'name' && this.is_op('=', 1)) {
        this.fail('Keyword arguments are not allowed');
      }
      if (this.is_op('*') || this.is_op('**')) {
        this.fail('Starred arguments are not allowed');
      }
      args.push(this.expression());
      if (this.is_keyword('for')) this.fail('Comprehensions are not allowed');
      if (!this.is_op(',')) break;
      this.advance();
    }
    this.expect_op(')');
    return args;
  }

  private atom(): ExprNode {
    const token = this.peek();

    switch (token.kind) {
      case 'number':
        this.advance();
        return { kind: 'literal', value: token.value ?? Number(token.text) };

      case 'string': {
        // Adjacent string literals concatenate.
        let value = '';
        while (this.peek().kind === 'string') value += this.advance().text;
        return { kind: 'literal', value };
      }

      case 'name':
        return this.name_atom(token);

      case 'op':
        if (token.text === '(') return this.parenthesised();
        if (token.text === '[') return this.list_display();
        if (token.text === '{') this.fail('Dict and set displays are not allowed');
        this.fail(`Unexpected '${token.text}' at position ${token.pos}`);

      case 'eof':
        this.fail('Unexpected end of expression');
    }
  }

  private name_atom(token: Token): ExprNode {
    this.advance();
    switch (token.text) {
      case 'True':
        return { kind: 'literal', value: true };
      case 'False':
        return { kind: 'literal', value: false };
      case 'None':
        return { kind: 'literal', value: null };
      case 'lambda':
        this.fail('lambda is not allowed');
      case 'import':
      case 'from':
        this.fail('import is not allowed');
      case 'yield':
      case 'await':
        this.fail(`'${token.text}' is not allowed`);
    }
    if (RESERVED.has(token.text)) {
      this.fail(`Unexpected keyword '${token.text}' at position ${token.pos}`);
    }
    return { kind: 'variable', name: token.text };
  }

  private parenthesised(): ExprNode {
    this.advance();
    if (this.is_op(')')) {
      this.advance();
      return { kind: 'tuple', items: [] };
    }

    const first = this.expression();
    if (this.is_op(':=')) this.fail('Assignment expressions are not allowed');
    if (this.is_keyword('for')) this.fail('Comprehensions are not allowed');

    if (!this.is_op(',')) {
      this.expect_op(')');
      return first;
    }

    const items = [first];
    while (this.is_op(',')) {
      this.advance();
      if (this.is_op(')')) break;
      items.push(this.expression());
    }
    this.expect_op(')');
    return { kind: 'tuple', items };
  }

  private list_display(): ExprNode {
    this.advance();
    const items: ExprNode[] = [];
    while (!this.is_op(']')) {
      items.push(this.expression());
      if (this.is_keyword('for')) this.fail('Comprehensions are not allowed');
      if (!this.is_op(',')) break;
      this.advance();
    }
    this.expect_op(']');
    return { kind: 'list', items };
  }
}
