import { describe, it, expect } from 'vitest';
import { create_plugin, default_plugin, EMPTY_PLUGIN } from '../plugin';
import { PluginError } from '../../protocol/errors';

describe('create_plugin', () => {
  it('calls a function from the table', () => {
    const plugin = create_plugin({ double: (raw: unknown) => Number(raw) * 2 });
    expect(plugin.has('double')).toBe(true);
    expect(plugin.call('double', 5)).toBe(10);
  });

  it('reports non-function entries as absent', () => {
    const plugin = create_plugin({ scale: 42 });
    expect(plugin.has('scale')).toBe(false);
    expect(() => plugin.call('scale', 1)).toThrow(PluginError);
  });

  it('fails with PluginError on a missing function', () => {
    expect(() => EMPTY_PLUGIN.call('missing', 1)).toThrow(
      "Calibration function 'missing' not found in plugin."
    );
  });

  it('wraps a throwing function in PluginError with its cause', () => {
    const cause = new Error('bad input');
    const plugin = create_plugin({
      boom: () => {
        throw cause;
      }
    });
    try {
      plugin.call('boom', 1);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PluginError);
      if (!(err instanceof PluginError)) return;
      expect(err.message).toBe("Calibration function 'boom' failed: bad input");
      expect(err.function_name).toBe('boom');
      expect(err.cause).toBe(cause);
    }
  });

  it('rejects unsupported return values', () => {
    const plugin = create_plugin({ obj: () => ({}) });
    expect(() => plugin.call('obj', 1)).toThrow(
      "Calibration function 'obj' returned unsupported value of type object"
    );
  });
});

describe('default_plugin', () => {
  it('converts OBT seconds to a UTC date', () => {
    const value = default_plugin().call('obt_seconds_to_datetime', 1_116_547_200);
    expect(value).toBeInstanceOf(Date);
    expect(value instanceof Date && value.toISOString()).toBe('2015-05-25T00:00:00.000Z');
  });

  it('accepts 64-bit raw values', () => {
    const value = default_plugin().call('obt_seconds_to_datetime', 60n);
    expect(value instanceof Date && value.toISOString()).toBe('1980-01-06T00:01:00.000Z');
  });

  it('lets a user table override a built-in', () => {
    const plugin = default_plugin({ obt_seconds_to_datetime: () => 'overridden' });
    expect(plugin.call('obt_seconds_to_datetime', 0)).toBe('overridden');
  });
});
