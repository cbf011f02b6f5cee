/**
 * Allow-list validation of parsed calibration expressions.
 *
 * Walks the whole tree before anything is evaluated. Only `raw`, numeric,
 * string and boolean constants, arithmetic, comparison, `and`/`or`, the
 * conditional, calls to the math allow-list (bare or `math.`-qualified) and
 * `math.` constants get through.
 *
 * @module calibration/expr_validate
 */

import { ExpressionError } from '../protocol/errors';
import { FUNCTION_NAMES, MATH_NAMESPACE, math_constant } from './math_functions';
import type { ArithmeticOp, CompareOp, ExprNode, UnaryOp } from './expr_types';

/** The only free variable of a calibration expression. */
export const RAW_VARIABLE = 'raw';

const ALLOWED_BINARY: ReadonlySet<string> = new Set<ArithmeticOp>(['+', '-', '*', '/', '//', '%', '**']);
const ALLOWED_UNARY: ReadonlySet<string> = new Set<UnaryOp>(['+', '-']);
const ALLOWED_COMPARE: ReadonlySet<string> = new Set<CompareOp>(['==', '!=', '<', '<=', '>', '>=']);

/**
 * Check every node, operator, identifier and function reference.
 *
 * @throws ExpressionError naming the first disallowed construct.
 */
export function validate_tree(node: ExprNode, expression: string): void {
  const fail: (reason: string) => never = (reason) => {
    throw new ExpressionError(expression, reason);
  };

  const visit = (n: ExprNode): void => {
    switch (n.kind) {
      case 'literal':
        return;

      case 'variable':
        if (n.name !== RAW_VARIABLE) {
          fail(`Unknown variable '${n.name}'. Allowed: ['${RAW_VARIABLE}']`);
        }
        return;

      case 'unary':
        if (!ALLOWED_UNARY.has(n.op)) fail(`Disallowed unary operator '${n.op}'`);
        visit(n.operand);
        return;

      case 'binary':
        if (!ALLOWED_BINARY.has(n.op)) fail(`Disallowed binary operator '${n.op}'`);
        visit(n.left);
        visit(n.right);
        return;

      case 'compare':
        visit(n.first);
        for (const { op, operand } of n.rest) {
          if (!ALLOWED_COMPARE.has(op)) fail(`Disallowed comparison operator '${op}'`);
          visit(operand);
        }
        return;

      case 'logical':
        n.operands.forEach(visit);
        return;

      case 'conditional':
        visit(n.test);
        visit(n.body);
        visit(n.orelse);
        return;

      case 'call':
        function_name(n.callee, fail);
        n.args.forEach(visit);
        return;

      case 'attribute':
        if (math_constant(n) !== undefined) return;
        fail(`Disallowed expression element: attribute access '.${n.attr}'`);

      case 'subscript':
        fail('Disallowed expression element: subscript');

      case 'tuple':
      case 'list':
        fail(`Disallowed expression element: ${n.kind}`);
    }
  };

  visit(node);
}

/**
 * Resolve the allow-listed function a call refers to.
 *
 * @returns The bare function name (`math.sqrt` resolves to `sqrt`).
 */
export function function_name(callee: ExprNode, fail: (reason: string) => never): string {
  if (callee.kind === 'variable') {
    if (!FUNCTION_NAMES.has(callee.name)) fail(`Function '${callee.name}' not allowed`);
    return callee.name;
  }
  if (callee.kind === 'attribute') {
    const qualified = callee.object.kind === 'variable' && callee.object.name === MATH_NAMESPACE;
    if (!qualified || !FUNCTION_NAMES.has(callee.attr)) {
      fail(`Only ${MATH_NAMESPACE}.<func> calls are allowed`);
    }
    return callee.attr;
  }
  return fail('Only simple function calls are allowed');
}
