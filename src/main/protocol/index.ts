/**
 * Library entry point.
 *
 * @module protocol
 */

export * from './types';
export * from './errors';
export { type_size, decode_value, encode_value, is_type_tag, is_numeric_type } from './type_codec';
export { decode_frame, decode_frame_unchecked, decode_frames, column_key, column_keys } from './frame_decoder';
export { evaluate_expression, compile_expression, evaluate_compiled } from '../calibration/expr_eval';
export type { CompiledExpression } from '../calibration/expr_eval';
export { round_to_digits } from '../calibration/rounding';
export { create_plugin, default_plugin, EMPTY_PLUGIN } from '../calibration/plugin';
export type { PluginTable } from '../calibration/plugin';
export { obt_seconds_to_datetime } from '../calibration/builtin_functions';
export { validate_schema } from '../schema/schema_validate';
export type { SchemaInput } from '../schema/schema_validate';
export { parse_schema_xml, load_schema } from '../schema/schema_loader';
export { CsvWriter, write_csv_from_rows, format_cell, format_csv_line, format_row } from '../export/csv_writer';
export { read_frames } from '../transport/frame_stream';
export { run_reader, sort_rows } from '../run/reader_run';
export type { ReaderRunOptions, ReaderRunResult } from '../run/reader_run';
export { find_obt_candidates, obt_to_date } from '../tools/obt_search';
export type { ObtCandidate, ObtRejection, ObtSearchOptions, ObtSearchResult } from '../tools/obt_search';
