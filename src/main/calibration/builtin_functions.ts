/**
 * Calibration functions available to every schema without a user plugin.
 */

import { OBT_EPOCH_MS } from '../protocol/constants';
import { PluginError } from '../protocol/errors';
import type { CalibrationFunction, RawValue } from '../protocol/types';

function raw_seconds(name: string, raw: RawValue): number {
  if (raw instanceof Uint8Array) {
    throw new PluginError(name, `${name} expects a numeric raw value, got ${raw.length} bytes`);
  }
  return Number(raw);
}

/**
 * On-board time in seconds since the GPS epoch (1980-01-06T00:00:00Z) to a
 * UTC date.
 */
export const obt_seconds_to_datetime: CalibrationFunction = (raw) => {
  const seconds = raw_seconds('obt_seconds_to_datetime', raw);
  return new Date(OBT_EPOCH_MS + seconds * 1000);
};

export const BUILTIN_FUNCTIONS: Readonly<Record<string, CalibrationFunction>> = {
  obt_seconds_to_datetime
};
