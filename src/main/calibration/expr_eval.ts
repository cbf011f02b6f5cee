/**
 * Safe evaluator for calibration expressions.
 *
 * An expression is tokenized, parsed and validated against the allow-lists
 * before it is ever evaluated; only validated trees are cached. Evaluation
 * walks the tree directly with an environment of exactly `raw` and the math
 * allow-list, so there is no route to host globals, modules or I/O.
 *
 * Arithmetic follows the calibration language's rules: `/` is true
 * division, `//` floors, `%` takes the divisor's sign, booleans count as
 * 0/1, division by zero fails.
 *
 * @module calibration/expr_eval
 */

import { ExpressionError } from '../protocol/errors';
import { parse_expression } from './expr_parser';
import { validate_tree, function_name } from './expr_validate';
import { call_math_function, math_constant, power } from './math_functions';
import type { ArithmeticOp, BinaryOp, CompareOp, ExprNode, ExprValue } from './expr_types';

/** A parsed and validated expression, ready to evaluate. */
export interface CompiledExpression {
  source: string;
  tree: ExprNode;
}

/** Thrown while evaluating; surfaced to callers as an ExpressionError. */
class EvaluationFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationFailure';
  }
}

const compiled_cache = new Map<string, CompiledExpression>();

/**
 * Parse and validate an expression.
 *
 * @throws ExpressionError if the expression is malformed or uses anything
 *   outside the allow-lists.
 */
export function compile_expression(expression: string): CompiledExpression {
  const cached = compiled_cache.get(expression);
  if (cached) return cached;

  const tree = parse_expression(expression);
  validate_tree(tree, expression);
  const compiled: CompiledExpression = { source: expression, tree };
  compiled_cache.set(expression, compiled);
  return compiled;
}

/**
 * Evaluate `expression` with `raw` bound to the given value.
 *
 * @returns The result coerced to a float.
 * @throws ExpressionError for syntax, validation or evaluation failures;
 *   the message names the expression and the cause.
 */
export function evaluate_expression(expression: string, raw: number): number {
  return evaluate_compiled(compile_expression(expression), raw);
}

/** Evaluate an already compiled expression. */
export function evaluate_compiled(compiled: CompiledExpression, raw: number): number {
  try {
    return to_float(evaluate_node(compiled.tree, raw));
  } catch (err) {
    if (err instanceof ExpressionError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ExpressionError(compiled.source, reason, { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Tree walk
// ---------------------------------------------------------------------------

function evaluate_node(node: ExprNode, raw: number): ExprValue {
  switch (node.kind) {
    case 'literal':
      return node.value;

    case 'variable':
      return raw;

    case 'unary': {
      const operand = as_number(evaluate_node(node.operand, raw), `unary ${node.op}`);
      if (node.op === '-') return -operand;
      if (node.op === '+') return operand;
      throw new EvaluationFailure(`Disallowed unary operator '${node.op}'`);
    }

    case 'binary':
      return apply_binary(node.op, evaluate_node(node.left, raw), evaluate_node(node.right, raw));

    case 'compare': {
      let left = evaluate_node(node.first, raw);
      for (const { op, operand } of node.rest) {
        const right = evaluate_node(operand, raw);
        if (!compare(op, left, right)) return false;
        left = right;
      }
      return true;
    }

    case 'logical': {
      let value: ExprValue = null;
      for (const operand of node.operands) {
        value = evaluate_node(operand, raw);
        if (node.op === 'and' ? !is_truthy(value) : is_truthy(value)) return value;
      }
      return value;
    }

    case 'conditional':
      return is_truthy(evaluate_node(node.test, raw))
        ? evaluate_node(node.body, raw)
        : evaluate_node(node.orelse, raw);

    case 'call': {
      const name = function_name(node.callee, (reason) => {
        throw new EvaluationFailure(reason);
      });
      const args = node.args.map((arg) => as_number(evaluate_node(arg, raw), `${name}()`));
      return call_math_function(name, args);
    }

    case 'attribute': {
      const constant = math_constant(node);
      if (constant !== undefined) return constant;
      throw new EvaluationFailure(`Disallowed expression element: attribute access '.${node.attr}'`);
    }

    case 'subscript':
    case 'tuple':
    case 'list':
      throw new EvaluationFailure(`Disallowed expression element: ${node.kind}`);
  }
}

// ---------------------------------------------------------------------------
// Value helpers
// ---------------------------------------------------------------------------

function type_name(value: ExprValue): string {
  if (value === null) return 'NoneType';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'string') return 'str';
  return 'float';
}

function as_number(value: ExprValue, context: string): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw new EvaluationFailure(`unsupported operand type for ${context}: '${type_name(value)}'`);
}

function is_numeric(value: ExprValue): value is number | boolean {
  return typeof value === 'number' || typeof value === 'boolean';
}

function is_truthy(value: ExprValue): boolean {
  if (value === null) return false;
  if (typeof value === 'string') return value.length > 0;
  if (typeof value === 'boolean') return value;
  return value !== 0;
}

function apply_binary(op: BinaryOp, left: ExprValue, right: ExprValue): ExprValue {
  if (op === '+' && typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }
  if (!is_numeric(left) || !is_numeric(right)) {
    throw new EvaluationFailure(
      `unsupported operand type(s) for ${op}: '${type_name(left)}' and '${type_name(right)}'`
    );
  }
  return arithmetic(op, as_number(left, op), as_number(right, op));
}

function arithmetic(op: BinaryOp, a: number, b: number): number {
  if (!is_arithmetic(op)) {
    throw new EvaluationFailure(`Disallowed binary operator '${op}'`);
  }
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      if (b === 0) throw new EvaluationFailure('float division by zero');
      return a / b;
    case '//':
      if (b === 0) throw new EvaluationFailure('float floor division by zero');
      return Math.floor(a / b);
    case '%': {
      if (b === 0) throw new EvaluationFailure('float modulo');
      const r = a % b;
      return r !== 0 && (r < 0) !== (b < 0) ? r + b : r;
    }
    case '**':
      return power(a, b);
  }
}

function is_arithmetic(op: BinaryOp): op is ArithmeticOp {
  return op === '+' || op === '-' || op === '*' || op === '/' || op === '//' || op === '%' || op === '**';
}

function compare(op: CompareOp, left: ExprValue, right: ExprValue): boolean {
  if (op === '==' || op === '!=') {
    const equal = is_numeric(left) && is_numeric(right)
      ? as_number(left, op) === as_number(right, op)
      : left === right;
    return op === '==' ? equal : !equal;
  }

  let a: number | string;
  let b: number | string;
  if (is_numeric(left) && is_numeric(right)) {
    a = as_number(left, op);
    b = as_number(right, op);
  } else if (typeof left === 'string' && typeof right === 'string') {
    a = left;
    b = right;
  } else {
    throw new EvaluationFailure(
      `'${op}' not supported between instances of '${type_name(left)}' and '${type_name(right)}'`
    );
  }

  switch (op) {
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
    default:
      throw new EvaluationFailure(`Disallowed comparison operator '${op}'`);
  }
}

const FLOAT_STRING_RE = /^[+-]?(?:(?:\d(?:_?\d)*)?\.?\d(?:_?\d)*(?:[eE][+-]?\d+)?|\d+\.|inf(?:inity)?|nan)$/i;

/** Coerce an evaluation result to a float. */
function to_float(value: ExprValue): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const text = value.trim();
    if (!FLOAT_STRING_RE.test(text)) {
      throw new EvaluationFailure(`could not convert string to float: '${value}'`);
    }
    const lowered = text.toLowerCase().replace(/_/g, '');
    const negative = lowered.startsWith('-');
    const unsigned = lowered.replace(/^[+-]/, '');
    if (unsigned.startsWith('inf')) return negative ? -Infinity : Infinity;
    if (unsigned === 'nan') return Number.NaN;
    return Number(lowered);
  }
  throw new EvaluationFailure(`float() argument must be a string or a real number, not '${type_name(value)}'`);
}
