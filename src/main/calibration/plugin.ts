/**
 * Calibration plugin capability.
 *
 * A plugin is a static table of named functions. The decoder only asks
 * whether a name exists and calls it; where the table came from (built-ins,
 * a user module loaded by the CLI) is decided by the caller.
 *
 * @module calibration/plugin
 */

import { PluginError } from '../protocol/errors';
import type { CalibratedValue, CalibrationPlugin, RawValue } from '../protocol/types';
import { BUILTIN_FUNCTIONS } from './builtin_functions';

/** Anything a plugin table may hold; only functions are callable. */
export type PluginTable = Readonly<Record<string, unknown>>;

type Callable = (raw: RawValue) => unknown;

function is_callable(value: unknown): value is Callable {
  return typeof value === 'function';
}

function is_calibrated_value(value: unknown): value is CalibratedValue {
  return (
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    value instanceof Uint8Array ||
    value instanceof Date
  );
}

/**
 * Build a plugin from a table of functions.
 *
 * Entries that are not functions are kept but report `has() === false`.
 */
export function create_plugin(table: PluginTable): CalibrationPlugin {
  const functions = new Map<string, Callable>();
  for (const [name, entry] of Object.entries(table)) {
    if (is_callable(entry)) functions.set(name, entry);
  }

  return {
    has(name: string): boolean {
      return functions.has(name);
    },

    call(name: string, raw: RawValue): CalibratedValue {
      const fn = functions.get(name);
      if (!fn) {
        throw new PluginError(name, `Calibration function '${name}' not found in plugin.`);
      }

      let result: unknown;
      try {
        result = fn(raw);
      } catch (err) {
        if (err instanceof PluginError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new PluginError(name, `Calibration function '${name}' failed: ${message}`, { cause: err });
      }

      if (!is_calibrated_value(result)) {
        throw new PluginError(
          name,
          `Calibration function '${name}' returned unsupported value of type ${result === null ? 'null' : typeof result}`
        );
      }
      return result;
    }
  };
}

/** A plugin with no functions. */
export const EMPTY_PLUGIN: CalibrationPlugin = create_plugin({});

/** The built-in functions, optionally overlaid by a user table. */
export function default_plugin(user_table: PluginTable = {}): CalibrationPlugin {
  return create_plugin({ ...BUILTIN_FUNCTIONS, ...user_table });
}
