import { readFile } from 'node:fs/promises';
import { ConfigurationError, DataShapeError, ResourceError } from '../../errors/index.ts';
import { err, ok, type Result } from '../../types/result.ts';
import { createLogger } from '../../utils/logger.ts';
import { type CsvOptions, resolveOptions } from './options.ts';

const log = createLogger('csv');

/**
 * Parsed delimited data: one header per column and every row the same width.
 */
export interface DataTable {
  readonly headers: readonly string[];
  readonly rows: readonly (readonly string[])[];
  /** Line of the input each row starts on, for error messages */
  readonly lines: readonly number[];
}

interface RawRecord {
  fields: string[];
  /** 1-based line on which the record starts */
  line: number;
}

/**
 * Parses delimited text. Quoted fields may contain delimiters, doubled quotes
 * and line breaks; CRLF and LF line endings are both accepted and blank lines
 * are skipped.
 *
 * Ragged rows and unterminated quotes are returned as a DataShapeError naming
 * the line they start on.
 */
export function parseCsv(text: string, options?: CsvOptions): Result<DataTable, DataShapeError> {
  const opts = resolveOptions(options);
  if (opts.delimiter.length !== 1 || opts.quote.length !== 1 || opts.delimiter === opts.quote) {
    throw new ConfigurationError(
      'csv',
      `delimiter '${opts.delimiter}' and quote '${opts.quote}' must be two different single characters`,
    );
  }

  const split = splitRecords(text, opts.delimiter, opts.quote, opts.source);
  if (!split.ok) return split;
  const records = split.data;

  if (records.length === 0) {
    return err(new DataShapeError(opts.source, 'contains no data'));
  }

  const first = records[0]!;
  const headers = opts.hasHeader
    ? first.fields.map((h) => h.trim())
    : first.fields.map((_, i) => `column_${i}`);
  const body = opts.hasHeader ? records.slice(1) : records;

  const rows: string[][] = [];
  const lines: number[] = [];
  for (const record of body) {
    if (record.fields.length !== headers.length) {
      return err(
        new DataShapeError(
          opts.source,
          `has ${record.fields.length} fields, expected ${headers.length}`,
          record.line,
          'every row needs one value per column',
        ),
      );
    }
    rows.push(record.fields);
    lines.push(record.line);
  }

  log.debug('%s: %d columns, %d rows', opts.source, headers.length, rows.length);
  return ok({ headers, rows, lines });
}

/**
 * Reads and parses a delimited file. A file that cannot be read is a
 * ResourceError; malformed content is a DataShapeError.
 */
export async function readCsvFile(path: string, options?: CsvOptions): Promise<DataTable> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (cause) {
    throw new ResourceError(`input file '${path}'`, 'could not be read', { cause });
  }
  const result = parseCsv(text, { ...options, source: options?.source ?? path });
  if (!result.ok) throw result.error;
  return result.data;
}

/**
 * Values of one column as numbers. Empty or non-numeric cells are a
 * DataShapeError for the row they are on.
 */
export function numericColumn(
  table: DataTable,
  column: number,
  source = 'csv',
): Result<number[], DataShapeError> {
  const header = table.headers[column];
  if (header === undefined) {
    return err(new DataShapeError(source, `has no column ${column + 1}`));
  }
  const values: number[] = [];
  for (let i = 0; i < table.rows.length; i++) {
    const cell = (table.rows[i]![column] ?? '').trim();
    const value = cell === '' ? Number.NaN : Number(cell);
    if (!Number.isFinite(value)) {
      return err(
        new DataShapeError(
          source,
          `column '${header}' value '${cell}' is not a number`,
          table.lines[i],
        ),
      );
    }
    values.push(value);
  }
  return ok(values);
}

function splitRecords(
  text: string,
  delimiter: string,
  quote: string,
  source: string,
): Result<RawRecord[], DataShapeError> {
  const records: RawRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  // Distinguishes an empty line from a line holding one empty field
  let recordHasContent = false;

  const endRecord = () => {
    if (recordHasContent || fields.length > 0) {
      fields.push(field);
      records.push({ fields, line: recordLine });
    }
    fields = [];
    field = '';
    recordHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i]!;

    if (inQuotes) {
      if (ch === quote) {
        if (text[i + 1] === quote) {
          field += quote;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === quote) {
      inQuotes = true;
      recordHasContent = true;
    } else if (ch === delimiter) {
      fields.push(field);
      field = '';
      recordHasContent = true;
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += ch;
      recordHasContent = true;
    }
  }

  if (inQuotes) {
    return err(new DataShapeError(source, 'has a quoted field that is never closed', recordLine));
  }
  endRecord();
  return ok(records);
}
