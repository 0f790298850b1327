/**
 * Record (CSV) document: one row per transaction, nine columns, optional header.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { RECORD_HEADER, Statement, type StatementOptions, type TransactionOptions } from '@ledgerjob/ledger';
import { FormatError, DEFAULT_DECIMAL, type DecimalSeparator } from '@ledgerjob/types';

export interface RecordWriteOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
}

export interface RecordReadOptions extends TransactionOptions {
  delimiter?: string;
  /** Account details for the statement being read back; the record format does not carry them. */
  account?: Omit<StatementOptions, 'decimal' | 'transactions'>;
}

const RowsSchema = z.array(z.array(z.string()));

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
function escapeCsvValue(value: string, delimiter: string): string {
  const needsQuoting =
    value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r');

  if (needsQuoting) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function rowToCsvLine(row: readonly string[], delimiter: string): string {
  return row.map((value) => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Serialize a statement's transactions. Every line, the last included, ends in "\n"
 * so documents can be appended to.
 */
export function writeRecordDocument(statement: Statement, options: RecordWriteOptions = {}): string {
  const includeHeader = options.includeHeader ?? true;
  const delimiter = options.delimiter ?? ',';

  const lines: string[] = [];
  if (includeHeader) {
    lines.push(rowToCsvLine(RECORD_HEADER, delimiter));
  }
  for (const row of statement.toRecordRows()) {
    lines.push(rowToCsvLine(row, delimiter));
  }
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Split CSV text into rows. Rows of any width come back as-is; checking the
 * field count is up to the reader of each row.
 */
export function parseRecordRows(text: string, delimiter = ','): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      delimiter,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FormatError(`Malformed record document: ${reason}`);
  }
  const rows = RowsSchema.safeParse(parsed);
  if (!rows.success) {
    throw new FormatError('Malformed record document: rows are not lists of text fields');
  }
  return rows.data;
}

/** Rebuild a statement from a record document written by writeRecordDocument. */
export function readRecordDocument(
  text: string,
  decimal: DecimalSeparator = DEFAULT_DECIMAL,
  options: RecordReadOptions = {}
): Statement {
  const { delimiter, account, ...transactionOptions } = options;
  const rows = parseRecordRows(text, delimiter);
  return new Statement({ ...account, decimal }).addRecordRows(rows, transactionOptions);
}
