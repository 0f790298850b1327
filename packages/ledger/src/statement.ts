import {
  MergeConflictError,
  ValidationError,
  AccountNumberSchema,
  AccountTypeSchema,
  BankIdSchema,
  CurrencySchema,
  DEFAULT_CURRENCY,
  DEFAULT_DECIMAL,
  formatZodIssues,
  normalizeAmountText,
  parseFlexibleDateTime,
  toInterchangeDateTime,
  type AccountType,
  type DateInput,
  type DecimalSeparator,
  type StatementRange,
} from '@ledgerjob/types';
import type { z } from 'zod';
import { aggregate, element, type InterchangeNode } from './interchange.js';
import { Transaction, type TransactionOptions } from './transaction.js';

export interface StatementOptions {
  accountNumber?: string;
  accountType?: AccountType;
  bankId?: string;
  currency?: string;
  /** Decimal separator of closing balances and transaction amounts (default "."). */
  decimal?: DecimalSeparator;
  transactions?: Transaction[];
}

function validated<S extends z.ZodTypeAny>(schema: S, value: unknown, field: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${field} "${String(value)}": ${formatZodIssues(result.error)}`, field, value);
  }
  return result.data;
}

/**
 * Transactions of one account over one period.
 *
 * The transaction list must follow a single chronological convention (most recent
 * first, as extraction sessions produce it, or most recent last) and so must every
 * statement merged into it. Closing balances default to the first transaction's new
 * balance and the period to the earlier/later of the first and last transaction
 * dates; nothing here sorts.
 */
export class Statement {
  transactions: Transaction[];
  readonly decimal: DecimalSeparator;

  private _accountNumber: string | undefined;
  private _accountType: AccountType = 'CHECKING';
  private _bankId: string | undefined;
  private _currency: string = DEFAULT_CURRENCY;

  private _closingBalance: string | undefined;
  private _closingAvailable: string | undefined;
  private _fromDate: Date | null = null;
  private _toDate: Date | null = null;

  constructor(options: StatementOptions = {}) {
    this.decimal = options.decimal ?? DEFAULT_DECIMAL;
    this.transactions = options.transactions ?? [];
    if (options.accountNumber !== undefined) this.accountNumber = options.accountNumber;
    if (options.accountType !== undefined) this.accountType = options.accountType;
    if (options.bankId !== undefined) this.bankId = options.bankId;
    if (options.currency !== undefined) this.currency = options.currency;
  }

  // ─── Account ────────────────────────────────────────────────────────────────

  get accountNumber(): string | undefined {
    return this._accountNumber;
  }

  set accountNumber(value: string) {
    this._accountNumber = validated(AccountNumberSchema, value, 'accountNumber');
  }

  get accountType(): AccountType {
    return this._accountType;
  }

  set accountType(value: AccountType) {
    this._accountType = validated(AccountTypeSchema, value, 'accountType');
  }

  get bankId(): string | undefined {
    return this._bankId;
  }

  set bankId(value: string) {
    this._bankId = validated(BankIdSchema, value, 'bankId');
  }

  get currency(): string {
    return this._currency;
  }

  set currency(value: string) {
    this._currency = validated(CurrencySchema, value, 'currency');
  }

  // ─── Derived balances and period ────────────────────────────────────────────

  get closingBalance(): string | null {
    return this._closingBalance ?? this.transactions[0]?.newBalance ?? null;
  }

  set closingBalance(value: string | null) {
    this._closingBalance = value ?? undefined;
  }

  get closingAvailable(): string | null {
    return this._closingAvailable ?? this.transactions[0]?.newBalance ?? null;
  }

  set closingAvailable(value: string | null) {
    this._closingAvailable = value ?? undefined;
  }

  get fromDate(): Date | null {
    return this._fromDate ?? this.endDates()[0];
  }

  set fromDate(raw: DateInput) {
    this._fromDate = parseFlexibleDateTime(raw);
  }

  get toDate(): Date | null {
    return this._toDate ?? this.endDates()[1];
  }

  set toDate(raw: DateInput) {
    this._toDate = parseFlexibleDateTime(raw);
  }

  /** Period in interchange encoding, for messages and file names. */
  range(): StatementRange {
    return {
      from: toInterchangeDateTime(this.fromDate),
      to: toInterchangeDateTime(this.toDate),
    };
  }

  addTransaction(transaction: Transaction): void {
    this.transactions.push(transaction);
  }

  /**
   * Pin every derived value (balances, period) to what the current transaction
   * list gives, so later list changes no longer move them.
   */
  finalize(): this {
    this._closingBalance = this.closingBalance ?? undefined;
    this._closingAvailable = this.closingAvailable ?? undefined;
    this._fromDate = this.fromDate;
    this._toDate = this.toDate;
    return this;
  }

  // ─── Merge ──────────────────────────────────────────────────────────────────

  /**
   * Ordered set union of both transaction lists, checked for contiguity.
   *
   * This statement's transactions keep their order and come first; transactions only
   * the other statement has follow in its order. The other statement must then sit
   * as one unbroken run inside the union: it extends this one, overlaps its end or
   * lies within it. Anything else (an overlap with a hole in it, novel transactions
   * on the wrong side) throws MergeConflictError.
   */
  mergeTransactions(other: Statement): Transaction[] {
    const union: Transaction[] = [];
    const positions = new Map<string, number>();
    for (const tx of [...this.transactions, ...other.transactions]) {
      const key = tx.identityKey();
      if (!positions.has(key)) {
        positions.set(key, union.length);
        union.push(tx);
      }
    }

    // Only a list with repeated transactions can lose its own order in the union.
    this.transactions.forEach((expected, i) => {
      const found = union[i];
      if (found === undefined || !found.equals(expected)) {
        throw this.conflict(other, i, expected, found);
      }
    });

    const window = dedupe(other.transactions);
    const first = window[0];
    const start = first !== undefined ? positions.get(first.identityKey()) ?? 0 : 0;
    window.forEach((expected, j) => {
      const found = union[start + j];
      if (found === undefined || !found.equals(expected)) {
        throw this.conflict(other, start + j, expected, found);
      }
    });

    return union;
  }

  private conflict(
    other: Statement,
    position: number,
    expected: Transaction,
    found: Transaction | undefined
  ): MergeConflictError {
    return new MergeConflictError({
      selfRange: this.range(),
      otherRange: other.range(),
      position,
      expected: expected.toString(),
      found: found !== undefined ? found.toString() : null,
    });
  }

  /**
   * New statement with the merged transactions and this statement's account details.
   * Balances and period are cleared so they derive from the merged list.
   */
  merge(other: Statement): Statement {
    const union = this.mergeTransactions(other);
    const merged = this.clone();
    merged.transactions = union;
    merged.resetDerived();
    return merged;
  }

  /** Same as merge, updating this statement. Leaves it untouched when the merge fails. */
  mergeInPlace(other: Statement): this {
    const union = this.mergeTransactions(other);
    this.transactions = union;
    this.resetDerived();
    return this;
  }

  private resetDerived(): void {
    this._closingBalance = undefined;
    this._closingAvailable = undefined;
    this._fromDate = null;
    this._toDate = null;
  }

  // ─── Equality ───────────────────────────────────────────────────────────────

  equals(other: Statement): boolean {
    if (
      toInterchangeDateTime(this.fromDate) !== toInterchangeDateTime(other.fromDate) ||
      toInterchangeDateTime(this.toDate) !== toInterchangeDateTime(other.toDate) ||
      this.closingBalance !== other.closingBalance ||
      this.closingAvailable !== other.closingAvailable ||
      this.transactions.length !== other.transactions.length
    ) {
      return false;
    }
    return this.transactions.every((tx, i) => {
      const counterpart = other.transactions[i];
      return counterpart !== undefined && tx.equals(counterpart);
    });
  }

  /** Shallow copy: the transaction list is new, the transactions are shared. */
  clone(): Statement {
    const copy = new Statement({ decimal: this.decimal, transactions: [...this.transactions] });
    copy._accountNumber = this._accountNumber;
    copy._accountType = this._accountType;
    copy._bankId = this._bankId;
    copy._currency = this._currency;
    copy._closingBalance = this._closingBalance;
    copy._closingAvailable = this._closingAvailable;
    copy._fromDate = this._fromDate;
    copy._toDate = this._toDate;
    return copy;
  }

  // ─── Serialization ──────────────────────────────────────────────────────────

  toRecordRows(): string[][] {
    return this.transactions.map((tx) => tx.toRecordRow());
  }

  /**
   * Append the transactions held in record rows. A row equal to the record header
   * is skipped so files written with a header read back cleanly.
   */
  addRecordRows(rows: readonly (readonly string[])[], options: TransactionOptions = {}): this {
    for (const row of rows) {
      if (isRecordHeaderRow(row)) {
        continue;
      }
      this.addTransaction(Transaction.fromRecordRow(row, this.decimal, options));
    }
    return this;
  }

  static fromRecordRows(
    rows: readonly (readonly string[])[],
    decimal: DecimalSeparator = DEFAULT_DECIMAL,
    options: Omit<StatementOptions, 'decimal' | 'transactions'> = {}
  ): Statement {
    return new Statement({ ...options, decimal }).addRecordRows(rows);
  }

  /**
   * STMTTRNRS aggregate holding the statement response: currency, account, the
   * transaction list, then ledger and available balances as of the period end.
   */
  toInterchangeRecord(): InterchangeNode {
    const accountNumber = this._accountNumber;
    if (accountNumber === undefined) {
      throw new ValidationError('Statement has no account number; one is required for interchange output', 'accountNumber');
    }
    const dtEnd = toInterchangeDateTime(this.toDate);

    return aggregate('STMTTRNRS', [
      element('TRNUID', '0'),
      aggregate('STATUS', [element('CODE', '0'), element('SEVERITY', 'INFO')]),
      aggregate('STMTRS', [
        element('CURDEF', this._currency),
        aggregate('BANKACCTFROM', [
          element('BANKID', this._bankId ?? ''),
          element('ACCTID', accountNumber),
          element('ACCTTYPE', this._accountType),
        ]),
        aggregate('BANKTRANLIST', [
          element('DTSTART', toInterchangeDateTime(this.fromDate)),
          element('DTEND', dtEnd),
          ...this.transactions.map((tx) => tx.toInterchangeRecord()),
        ]),
        aggregate('LEDGERBAL', [
          element('BALAMT', normalizeAmountText(this.closingBalance, this.decimal)),
          element('DTASOF', dtEnd),
        ]),
        aggregate('AVAILBAL', [
          element('BALAMT', normalizeAmountText(this.closingAvailable, this.decimal)),
          element('DTASOF', dtEnd),
        ]),
      ]),
    ]);
  }

  toString(): string {
    const lines = this.transactions.map((tx) => `\t${tx.toString()}`);
    return [
      `Statement: account = ${this._accountNumber ?? '(none)'}, close_bal = ${this.closingBalance ?? ''}, ` +
        `avail = ${this.closingAvailable ?? ''}, curr = ${this._currency}, transactions:`,
      ...lines,
    ].join('\n');
  }

  private endDates(): [Date | null, Date | null] {
    const first = this.transactions[0]?.date ?? null;
    const last = this.transactions[this.transactions.length - 1]?.date ?? null;
    if (first === null || last === null) {
      return [first ?? last, first ?? last];
    }
    return first.getTime() <= last.getTime() ? [first, last] : [last, first];
  }
}

function isRecordHeaderRow(row: readonly string[]): boolean {
  return row.length > 0 && row[0]?.trim() === 'Date' && row[1]?.trim() === 'Value-Date';
}

function dedupe(transactions: readonly Transaction[]): Transaction[] {
  const seen = new Set<string>();
  return transactions.filter((tx) => {
    const key = tx.identityKey();
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
