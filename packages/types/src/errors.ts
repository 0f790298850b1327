/**
 * Error kinds raised by the ledger core. Each is thrown synchronously by the operation
 * that detects the problem; callers decide whether to retry, divert output or abort.
 */

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

/** A record row that cannot be turned back into a transaction. */
export class FormatError extends LedgerError {
  readonly row: readonly string[];

  constructor(message: string, row: readonly string[] = []) {
    super(message);
    this.name = 'FormatError';
    this.row = row;
  }
}

/** A field value outside its allowed range or format. */
export class ValidationError extends LedgerError {
  readonly field: string;
  readonly value: unknown;

  constructor(message: string, field: string, value?: unknown) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }
}

/** Date range of a statement, in interchange encoding ("" when the statement is empty). */
export interface StatementRange {
  from: string;
  to: string;
}

export interface MergeConflictDetail {
  selfRange: StatementRange;
  otherRange: StatementRange;
  /** Index in the merged list where the order of one of the statements was broken. */
  position: number;
  /** Transaction that statement has at that point. */
  expected: string;
  /** Transaction the union placed there instead, if any. */
  found: string | null;
}

/**
 * The other statement does not extend this one contiguously: their overlap would
 * interleave transactions or leave a gap.
 */
export class MergeConflictError extends LedgerError {
  readonly detail: MergeConflictDetail;

  constructor(detail: MergeConflictDetail) {
    const found = detail.found ?? 'nothing (merged list too short)';
    super(
      `Cannot merge statement ${formatRange(detail.otherRange)} into ${formatRange(detail.selfRange)}: ` +
        `transactions are not contiguous at position ${detail.position} ` +
        `(expected ${detail.expected}, found ${found})`
    );
    this.name = 'MergeConflictError';
    this.detail = detail;
  }
}

function formatRange(range: StatementRange): string {
  if (range.from === '' && range.to === '') {
    return '[empty]';
  }
  return `[${range.from}..${range.to}]`;
}

export function isMergeConflictError(error: unknown): error is MergeConflictError {
  return error instanceof MergeConflictError;
}
