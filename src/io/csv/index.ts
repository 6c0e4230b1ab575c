/**
 * CSV input for the chart builders.
 */

export { numericColumn, parseCsv, readCsvFile } from './reader.ts';
export type { DataTable } from './reader.ts';
export { DEFAULT_CSV_OPTIONS, resolveOptions } from './options.ts';
export type { CsvOptions } from './options.ts';
