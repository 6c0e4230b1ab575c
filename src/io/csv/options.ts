/**
 * CSV parsing options.
 */
export interface CsvOptions {
  /** Column delimiter (default: ",") */
  delimiter?: string;

  /** Quote character (default: '"') */
  quote?: string;

  /** Whether first row is header (default: true) */
  hasHeader?: boolean;

  /** Name used for the input in error messages (default: "csv") */
  source?: string;
}

/** Default CSV options */
export const DEFAULT_CSV_OPTIONS = {
  delimiter: ',',
  quote: '"',
  hasHeader: true,
  source: 'csv',
} as const;

export type ResolvedCsvOptions = Required<CsvOptions>;

export function resolveOptions(options?: CsvOptions): ResolvedCsvOptions {
  return {
    delimiter: options?.delimiter ?? DEFAULT_CSV_OPTIONS.delimiter,
    quote: options?.quote ?? DEFAULT_CSV_OPTIONS.quote,
    hasHeader: options?.hasHeader ?? DEFAULT_CSV_OPTIONS.hasHeader,
    source: options?.source ?? DEFAULT_CSV_OPTIONS.source,
  };
}
