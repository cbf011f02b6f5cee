/**
 * XML schema loader.
 *
 * Reads the `<schema>` document format:
 *
 * ```xml
 * <schema version="1.0">
 *   <schema_settings read_in_memory="true" sort_by="CDH.OBT" frame_size="4000"
 *                    endian="big" include_frame_index="false"/>
 *   <subsystems>
 *     <subsystem name="PCS" offset="1604">
 *       <fields>
 *         <field name="vBatAverage" type="u16" offset="750">
 *           <calibration expr="raw * 0.01873128 + (-38.682956)" units="V" round="3"/>
 *         </field>
 *       </fields>
 *     </subsystem>
 *   </subsystems>
 * </schema>
 * ```
 *
 * Document-level rules are checked here; field and settings values are then
 * checked by {@link validate_schema}.
 *
 * @module schema/schema_loader
 */

import { readFile } from 'fs/promises';
import { DOMParser } from '@xmldom/xmldom';
import { DEFAULT_ENDIAN, FALSE_STRINGS, TRUTH_STRINGS } from '../protocol/constants';
import { SchemaError } from '../protocol/errors';
import type { Schema } from '../protocol/types';
import { validate_schema } from './schema_validate';

const ELEMENT_NODE = 1;

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;

function is_element(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** Direct element children named `tag`, in document order. */
function children(parent: Element, tag: string): Element[] {
  const found: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes[i];
    if (is_element(node) && node.tagName === tag) found.push(node);
  }
  return found;
}

function child(parent: Element, tag: string): Element | null {
  return children(parent, tag)[0] ?? null;
}

/** Attribute value, or undefined when absent. Empty values count as absent. */
function attribute(el: Element, name: string): string | undefined {
  const value = el.getAttribute(name);
  return value === null || value === '' ? undefined : value;
}

function required_attribute(el: Element, name: string, where: string): string {
  const value = attribute(el, name);
  if (value === undefined) {
    throw new SchemaError(`${where} requires a '${name}' attribute`);
  }
  return value;
}

function parse_integer(text: string, where: string): number {
  if (!INTEGER_RE.test(text)) {
    throw new SchemaError(`${where} must be an integer, got '${text}'`);
  }
  return Number.parseInt(text, 10);
}

function parse_flag(el: Element, name: string): boolean {
  const message = `<schema_settings ${name}> must be defined and be true, false, yes, no, 1 or 0`;
  const value = attribute(el, name);
  if (value === undefined) throw new SchemaError(message);

  const lowered = value.toLowerCase();
  if (TRUTH_STRINGS.has(lowered)) return true;
  if (FALSE_STRINGS.has(lowered)) return false;
  throw new SchemaError(message);
}

function parse_field(el: Element, subsystem: string): Record<string, unknown> {
  const name = required_attribute(el, 'name', `<field> in subsystem ${subsystem}`);
  const where = `<field ${subsystem}.${name}>`;

  const field: Record<string, unknown> = {
    name,
    type: required_attribute(el, 'type', where),
    offset: parse_integer(required_attribute(el, 'offset', where), `${where} offset`)
  };

  const byte_length = attribute(el, 'bytes');
  if (byte_length !== undefined) field.byte_length = parse_integer(byte_length, `${where} bytes`);

  const calibration = child(el, 'calibration');
  if (calibration) {
    const expr = attribute(calibration, 'expr');
    const func = attribute(calibration, 'func');
    if (expr !== undefined && func !== undefined) {
      throw new SchemaError(`field ${name}: use either calibration expr or func, not both`);
    }
    if (expr !== undefined) field.calibration_expression = expr;
    if (func !== undefined) field.calibration_function = func;

    const units = attribute(calibration, 'units');
    if (units !== undefined) field.units = units;

    const round = attribute(calibration, 'round');
    if (round !== undefined) field.round_digits = parse_integer(round, `${where} round`);
  }
  return field;
}

function parse_subsystem(el: Element): Record<string, unknown> {
  const name = required_attribute(el, 'name', '<subsystem>');
  const offset = parse_integer(required_attribute(el, 'offset', `<subsystem ${name}>`), `<subsystem ${name}> offset`);

  const fields = child(el, 'fields');
  if (!fields) {
    throw new SchemaError(`<subsystem ${name}> -> <fields> element is required`);
  }
  return {
    name,
    offset,
    fields: children(fields, 'field').map((f) => parse_field(f, name))
  };
}

function parse_document(text: string): Document {
  const parser = new DOMParser({
    errorHandler: (level: string, message: unknown) => {
      throw new SchemaError(`Malformed XML (${level}): ${String(message).trim()}`);
    }
  });
  return parser.parseFromString(text, 'text/xml');
}

/**
 * Parse a schema document.
 *
 * @throws SchemaError for malformed XML or any violated schema rule.
 */
export function parse_schema_xml(text: string): Schema {
  const root = parse_document(text).documentElement;
  if (!root || root.tagName !== 'schema') {
    throw new SchemaError('Root element must be <schema>');
  }

  const settings = child(root, 'schema_settings');
  if (!settings) {
    throw new SchemaError('<schema_settings> element is required');
  }

  const read_in_memory = parse_flag(settings, 'read_in_memory');
  const include_frame_index = parse_flag(settings, 'include_frame_index');

  const sort_by = attribute(settings, 'sort_by');
  if (sort_by !== undefined && !read_in_memory) {
    throw new SchemaError('<schema_settings sort_by> can only be used if read_in_memory is true');
  }

  const frame_size = parse_integer(attribute(settings, 'frame_size') ?? '0', '<schema_settings frame_size>');
  if (frame_size <= 0) {
    throw new SchemaError('<schema_settings frame_size> must be positive and not 0');
  }

  const default_endian = (attribute(settings, 'endian') ?? DEFAULT_ENDIAN).toLowerCase();
  if (default_endian !== 'little' && default_endian !== 'big') {
    throw new SchemaError(`<schema_settings endian> must be 'little' or 'big', got '${default_endian}'`);
  }

  const subsystems = child(root, 'subsystems');
  if (!subsystems) {
    throw new SchemaError('<subsystems> element is required');
  }

  return validate_schema({
    frame_size,
    default_endian,
    include_frame_index,
    read_in_memory,
    ...(sort_by !== undefined ? { sort_by } : {}),
    subsystems: children(subsystems, 'subsystem').map(parse_subsystem)
  });
}

/** Read and parse a schema file. */
export async function load_schema(path: string): Promise<Schema> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`Cannot read schema file ${path}: ${message}`, { cause: err });
  }
  return parse_schema_xml(text);
}
