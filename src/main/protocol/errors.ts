/**
 * Error taxonomy for schema loading, frame decoding and calibration.
 *
 * Every error carries a {@link ErrorCategory} and a {@link DecodeContext}
 * that locates it in the schema and the dump. The decoder adds context as
 * an error propagates outwards; context set closer to the fault wins.
 *
 * @module protocol/errors
 */

import type { DecodeContext, RawValue } from './types';

export type ErrorCategory =
  | 'expression'
  | 'type'
  | 'bounds'
  | 'plugin'
  | 'frame_size'
  | 'schema';

/** Label printed by the CLI in front of each category. */
export const ERROR_LABELS: Record<ErrorCategory, string> = {
  expression: 'EXPR',
  type: 'TYPE',
  bounds: 'BOUNDS',
  plugin: 'PLUGIN',
  frame_size: 'FRAME SIZE',
  schema: 'SCHEMA'
};

/** Render a raw value for an error message. Byte arrays print as hex. */
export function format_raw(raw: RawValue): string {
  if (raw instanceof Uint8Array) {
    return `0x${Buffer.from(raw).toString('hex')}`;
  }
  return String(raw);
}

function format_context(context: DecodeContext): string {
  const parts: string[] = [];
  if (context.frame_index !== undefined) parts.push(`frame ${context.frame_index}`);
  if (context.subsystem !== undefined) parts.push(`subsystem ${context.subsystem}`);
  if (context.field !== undefined) parts.push(`field ${context.field}`);
  if (context.offset !== undefined) parts.push(`offset ${context.offset}`);
  if (context.size !== undefined) parts.push(`size ${context.size}`);
  if (context.raw !== undefined) parts.push(`raw ${format_raw(context.raw)}`);
  return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
}

/** Base class of every error raised by satframe. */
export class SatframeError extends Error {
  readonly category: ErrorCategory;
  /** Message without the context suffix. */
  readonly detail: string;
  context: DecodeContext;

  constructor(
    category: ErrorCategory,
    detail: string,
    context: DecodeContext = {},
    options?: ErrorOptions
  ) {
    super(detail + format_context(context), options);
    this.name = 'SatframeError';
    this.category = category;
    this.detail = detail;
    this.context = { ...context };
  }

  /**
   * Merge outer context into this error. Keys already present are kept.
   *
   * @returns The same error, for `throw err.with_context(...)`.
   */
  with_context(outer: DecodeContext): this {
    this.context = { ...outer, ...this.context };
    this.message = this.detail + format_context(this.context);
    return this;
  }
}

/** Malformed, disallowed or failing calibration expression. */
export class ExpressionError extends SatframeError {
  readonly expression: string;
  readonly reason: string;

  constructor(expression: string, reason: string, options?: ErrorOptions) {
    super('expression', `Error evaluating expr '${expression}': ${reason}`, {}, options);
    this.name = 'ExpressionError';
    this.expression = expression;
    this.reason = reason;
  }
}

/** Unknown type tag, or a `bytes` field without a usable length. */
export class FieldTypeError extends SatframeError {
  constructor(detail: string, context: DecodeContext = {}) {
    super('type', detail, context);
    this.name = 'FieldTypeError';
  }
}

/** A field's byte range runs past the end of the frame. */
export class BoundsError extends SatframeError {
  readonly frame_size: number;

  constructor(subsystem: string, field: string, offset: number, size: number, frame_size: number) {
    super(
      'bounds',
      `Field '${subsystem}.${field}' overflows frame boundary: ends at byte ${offset + size}, frame size is ${frame_size}`,
      { subsystem, field, offset, size }
    );
    this.name = 'BoundsError';
    this.frame_size = frame_size;
  }
}

/** Calibration function missing from, or failing inside, the plugin. */
export class PluginError extends SatframeError {
  readonly function_name: string;

  constructor(function_name: string, detail: string, options?: ErrorOptions) {
    super('plugin', detail, {}, options);
    this.name = 'PluginError';
    this.function_name = function_name;
  }
}

/** Buffer or file length does not fit the schema's frame size. */
export class FrameSizeError extends SatframeError {
  readonly expected: number;
  readonly actual: number;

  constructor(detail: string, expected: number, actual: number, context: DecodeContext = {}) {
    super('frame_size', detail, context);
    this.name = 'FrameSizeError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** Schema document or object failed validation. */
export class SchemaError extends SatframeError {
  constructor(detail: string, options?: ErrorOptions) {
    super('schema', detail, {}, options);
    this.name = 'SchemaError';
  }
}
