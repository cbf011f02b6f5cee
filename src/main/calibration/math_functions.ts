/**
 * Allow-listed math functions callable from calibration expressions.
 *
 * Each function receives already-numeric arguments and reports domain and
 * range failures with the messages a calibration author would expect
 * ("math domain error", "math range error").
 *
 * @module calibration/math_functions
 */

import type { ExprNode } from './expr_types';
import { round_to_digits } from './rounding';

/** Raised by a math function; the evaluator wraps it into an ExpressionError. */
export class MathFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MathFailure';
  }
}

interface MathFunction {
  min_args: number;
  /** `Infinity` for variadic functions. */
  max_args: number;
  apply(args: number[]): number;
}

function domain_checked(fn: (x: number) => number): (args: number[]) => number {
  return ([x]) => {
    const result = fn(x);
    if (Number.isNaN(result) && !Number.isNaN(x)) {
      throw new MathFailure('math domain error');
    }
    return result;
  };
}

function to_integral(name: string, fn: (x: number) => number): (args: number[]) => number {
  return ([x]) => {
    if (Number.isNaN(x)) throw new MathFailure(`cannot convert float NaN to integer in ${name}()`);
    if (!Number.isFinite(x)) throw new MathFailure(`cannot convert float infinity to integer in ${name}()`);
    return fn(x);
  };
}

function natural_log(x: number): number {
  if (x <= 0) throw new MathFailure('math domain error');
  return Math.log(x);
}

/**
 * `base ** exponent` with the failure modes of real-valued exponentiation:
 * zero to a negative power, negative base to a fractional power, overflow.
 */
export function power(base: number, exponent: number): number {
  if (base === 0 && exponent < 0) {
    throw new MathFailure('0.0 cannot be raised to a negative power');
  }
  if (base < 0 && Number.isFinite(exponent) && !Number.isInteger(exponent)) {
    throw new MathFailure('negative number cannot be raised to a fractional power');
  }
  const result = base ** exponent;
  if (!Number.isFinite(result) && Number.isFinite(base) && Number.isFinite(exponent)) {
    throw new MathFailure('Numerical result out of range');
  }
  return result;
}

const MATH_FUNCTIONS: Record<string, MathFunction> = {
  sin: { min_args: 1, max_args: 1, apply: domain_checked(Math.sin) },
  cos: { min_args: 1, max_args: 1, apply: domain_checked(Math.cos) },
  tan: { min_args: 1, max_args: 1, apply: domain_checked(Math.tan) },
  asin: { min_args: 1, max_args: 1, apply: domain_checked(Math.asin) },
  acos: { min_args: 1, max_args: 1, apply: domain_checked(Math.acos) },
  atan: { min_args: 1, max_args: 1, apply: domain_checked(Math.atan) },
  sqrt: { min_args: 1, max_args: 1, apply: domain_checked(Math.sqrt) },
  log: {
    min_args: 1,
    max_args: 2,
    apply: (args) => {
      const [x, base] = args;
      if (args.length === 1) return natural_log(x);
      const denominator = natural_log(base);
      if (denominator === 0) throw new MathFailure('float division by zero');
      return natural_log(x) / denominator;
    }
  },
  log10: {
    min_args: 1,
    max_args: 1,
    apply: ([x]) => {
      if (x <= 0) throw new MathFailure('math domain error');
      return Math.log10(x);
    }
  },
  exp: {
    min_args: 1,
    max_args: 1,
    apply: ([x]) => {
      const result = Math.exp(x);
      if (result === Infinity && Number.isFinite(x)) throw new MathFailure('math range error');
      return result;
    }
  },
  fabs: { min_args: 1, max_args: 1, apply: ([x]) => Math.abs(x) },
  abs: { min_args: 1, max_args: 1, apply: ([x]) => Math.abs(x) },
  floor: { min_args: 1, max_args: 1, apply: to_integral('floor', Math.floor) },
  ceil: { min_args: 1, max_args: 1, apply: to_integral('ceil', Math.ceil) },
  round: {
    min_args: 1,
    max_args: 2,
    apply: (args) => {
      const [x, digits] = args;
      if (args.length === 1) return to_integral('round', (v) => round_to_digits(v, 0))([x]);
      if (!Number.isInteger(digits)) {
        throw new MathFailure('round() digits must be an integer');
      }
      return round_to_digits(x, digits);
    }
  },
  min: { min_args: 2, max_args: Infinity, apply: (args) => Math.min(...args) },
  max: { min_args: 2, max_args: Infinity, apply: (args) => Math.max(...args) },
  pow: { min_args: 2, max_args: 2, apply: ([x, y]) => power(x, y) }
};

/** Names callable bare or as `math.<name>`. */
export const FUNCTION_NAMES: ReadonlySet<string> = new Set(Object.keys(MATH_FUNCTIONS));

/** The namespace prefix accepted in front of a function or constant name. */
export const MATH_NAMESPACE = 'math';

/** Constants readable only as `math.<name>`. */
export const MATH_CONSTANTS: ReadonlyMap<string, number> = new Map([
  ['pi', Math.PI],
  ['e', Math.E],
  ['tau', 2 * Math.PI]
]);

/** Value of a `math.<constant>` reference, or undefined for any other node. */
export function math_constant(node: ExprNode): number | undefined {
  if (node.kind !== 'attribute') return undefined;
  if (node.object.kind !== 'variable' || node.object.name !== MATH_NAMESPACE) return undefined;
  return MATH_CONSTANTS.get(node.attr);
}

/**
 * Apply an allow-listed function.
 *
 * @throws MathFailure on an unknown name, a wrong argument count, or a
 *   domain/range error.
 */
export function call_math_function(name: string, args: number[]): number {
  if (!FUNCTION_NAMES.has(name)) {
    throw new MathFailure(`Function '${name}' not allowed`);
  }
  const fn = MATH_FUNCTIONS[name];
  if (args.length < fn.min_args || args.length > fn.max_args) {
    const expected = fn.min_args === fn.max_args
      ? `${fn.min_args}`
      : fn.max_args === Infinity ? `at least ${fn.min_args}` : `${fn.min_args} to ${fn.max_args}`;
    throw new MathFailure(`${name}() takes ${expected} argument(s), got ${args.length}`);
  }
  return fn.apply(args);
}
