/**
 * Decimal rounding of calibrated values.
 *
 * Uses the runtime's own decimal rounding primitive,
 * `Number.prototype.toFixed`, which rounds the exact binary value and
 * breaks ties away from zero. `round()` inside calibration expressions uses
 * the same function, so both paths agree bit for bit.
 *
 * @module calibration/rounding
 */

import { MAX_ROUND_DIGITS } from '../protocol/constants';

/**
 * Round `value` to `digits` decimal places.
 *
 * Negative `digits` round to tens, hundreds, and so on. Non-finite values
 * are returned unchanged.
 *
 * @throws RangeError if `digits` is not an integer or exceeds 100.
 */
export function round_to_digits(value: number, digits: number): number {
  if (!Number.isInteger(digits) || digits > MAX_ROUND_DIGITS) {
    throw new RangeError(`round digits must be an integer no greater than ${MAX_ROUND_DIGITS}, got ${digits}`);
  }
  if (!Number.isFinite(value)) return value;

  if (digits >= 0) {
    return Number(value.toFixed(digits));
  }
  const scale = 10 ** -digits;
  return Number((value / scale).toFixed(0)) * scale;
}
