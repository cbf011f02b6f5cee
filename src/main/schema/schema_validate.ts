/**
 * Structural validation of schema objects.
 *
 * Whatever the source of a schema (the XML loader, a test, a library
 * caller), it goes through {@link validate_schema} before the decoder sees
 * it. The result is deeply frozen.
 *
 * @module schema/schema_validate
 */

import { z } from 'zod';
import { compile_expression } from '../calibration/expr_eval';
import { BYTES_TYPE, MAX_ROUND_DIGITS } from '../protocol/constants';
import { SchemaError, SatframeError } from '../protocol/errors';
import { is_type_tag } from '../protocol/type_codec';
import type { Field, Schema, Subsystem, TypeTag } from '../protocol/types';

const FieldSchema = z
  .object({
    name: z.string().min(1),
    type: z.string().refine((tag): tag is TypeTag => is_type_tag(tag), (tag) => ({
      message: `Unknown field type '${tag}'`
    })),
    offset: z.number().int().nonnegative(),
    byte_length: z.number().int().positive().optional(),
    calibration_expression: z.string().min(1).optional(),
    calibration_function: z.string().min(1).optional(),
    units: z.string().optional(),
    round_digits: z.number().int().min(0).max(MAX_ROUND_DIGITS).optional()
  })
  .superRefine((field, ctx) => {
    if (field.calibration_expression !== undefined && field.calibration_function !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `field ${field.name}: use either calibration expr or func, not both`
      });
    }
    if (field.type === BYTES_TYPE) {
      if (field.byte_length === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['byte_length'],
          message: `field ${field.name}: bytes type requires a positive integer 'bytes' attribute`
        });
      }
      if (field.calibration_expression !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['calibration_expression'],
          message: `field ${field.name}: calibration expressions need a numeric type, not bytes`
        });
      }
    }
    if (field.calibration_expression !== undefined) {
      try {
        compile_expression(field.calibration_expression);
      } catch (err) {
        if (!(err instanceof SatframeError)) throw err;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['calibration_expression'],
          message: err.message
        });
      }
    }
  });

const SubsystemSchema = z.object({
  name: z.string().min(1),
  offset: z.number().int().nonnegative(),
  fields: z.array(FieldSchema)
});

const SchemaSchema = z
  .object({
    frame_size: z.number().int().positive(),
    default_endian: z.enum(['little', 'big']),
    include_frame_index: z.boolean(),
    read_in_memory: z.boolean(),
    sort_by: z.string().min(1).optional(),
    subsystems: z.array(SubsystemSchema)
  })
  .superRefine((schema, ctx) => {
    if (schema.sort_by !== undefined && !schema.read_in_memory) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sort_by'],
        message: 'sort_by can only be used if read_in_memory is true'
      });
    }
  });

/** Input shape accepted by {@link validate_schema}. */
export type SchemaInput = z.input<typeof SchemaSchema>;

function format_issue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function freeze_field(field: Field): Field {
  return Object.freeze({ ...field });
}

function freeze_subsystem(subsystem: Subsystem): Subsystem {
  return Object.freeze({
    ...subsystem,
    fields: Object.freeze(subsystem.fields.map(freeze_field))
  });
}

/**
 * Validate an untrusted schema object.
 *
 * @returns A frozen copy with unknown keys stripped.
 * @throws SchemaError listing every violation.
 */
export function validate_schema(input: unknown): Schema {
  const result = SchemaSchema.safeParse(input);
  if (!result.success) {
    throw new SchemaError(`Invalid schema: ${result.error.issues.map(format_issue).join('; ')}`, {
      cause: result.error
    });
  }
  const schema: Schema = result.data;
  return Object.freeze({
    ...schema,
    subsystems: Object.freeze(schema.subsystems.map(freeze_subsystem))
  });
}
