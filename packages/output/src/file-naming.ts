import { stat } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import type { Statement } from '@ledgerjob/ledger';
import { toDayStamp } from '@ledgerjob/types';

export type OutputOption = string | boolean | undefined;

/** "YYYYMMDD-YYYYMMDD" of the statement's period; "empty" for a statement with no dates. */
export function rangeStamp(statement: Statement): string {
  const from = toDayStamp(statement.fromDate);
  const to = toDayStamp(statement.toDate);
  if (from === '' && to === '') {
    return 'empty';
  }
  return `${from}-${to}`;
}

export function fileNameForStatement(statement: Statement, extension: string): string {
  return `${rangeStamp(statement)}.${extension}`;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Where an output option points: `null` for stdout (flag given without a value),
 * a file named after the statement's period inside a directory, or the path itself.
 */
export async function fileNameFromOption(
  option: OutputOption,
  statement: Statement,
  extension: string
): Promise<string | null> {
  if (option === undefined || option === false || option === true || option === '' || option === '-') {
    return null;
  }
  if (await isDirectory(option)) {
    return join(option, fileNameForStatement(statement, extension));
  }
  return option;
}

/** Sibling of `file` for a statement that could not be merged into it. */
export function mergeFailedFileName(file: string, statement: Statement): string {
  const extension = extname(file);
  const stem = basename(file, extension);
  return join(dirname(file), `${stem}_${rangeStamp(statement)}_merge_failed${extension === '' ? '.csv' : extension}`);
}
