import { createHash } from 'crypto';
import {
  FormatError,
  DEFAULT_DECIMAL,
  hashString,
  parseAmountStrict,
  parseFlexibleDateTime,
  toRealAmount,
  normalizeAmountText,
  toInterchangeDateTime,
  toRecordDateTime,
  type DateInput,
  type DecimalSeparator,
  type TransactionType,
} from '@ledgerjob/types';
import { aggregate, element, type InterchangeNode } from './interchange.js';
import { Payee } from './payee.js';

export const RECORD_FIELD_COUNT = 9;

export const RECORD_HEADER = [
  'Date',
  'Value-Date',
  'Description',
  'Amount',
  'New-Balance',
  'Raw-Amount',
  'Raw-New-Balance',
  'Raw-Description',
  'OFX-ID',
] as const;

export interface TransactionOptions {
  /** Decimal separator used by `amount` and `newBalance` (default "."). */
  decimal?: DecimalSeparator;
  /** Make `realAmount`/`realNewBalance` throw on unparsable text instead of reading zero. */
  strictAmounts?: boolean;
  /** Date formats tried when `date`/`valueDate` are assigned text. */
  dateFormats?: readonly string[];
}

/**
 * One ledger entry, as extracted from a bank statement.
 *
 * Identity (equals, hashCode, id) depends only on date, raw description, amount, type
 * and new balance, with the date compared through its interchange encoding. The value
 * date is left out because banks often fill it in later.
 *
 * `amount` and `newBalance` keep the text exactly as scraped; the numeric views are
 * `realAmount` and `realNewBalance`. Changing an identity field after `id` has been
 * read leaves the cached id stale.
 */
export class Transaction {
  type: TransactionType = 'OTHER';
  rawDescription = '';
  amount = '0';
  newBalance = '0';
  payee: Payee | undefined = undefined;
  checkNumber: string | undefined = undefined;

  readonly decimal: DecimalSeparator;
  private readonly strictAmounts: boolean;
  private readonly dateFormats: readonly string[] | undefined;

  private _date: Date | null = null;
  private _valueDate: Date | null = null;
  private _description: string | undefined = undefined;
  private _id: string | undefined = undefined;

  constructor(options: TransactionOptions = {}) {
    this.decimal = options.decimal ?? DEFAULT_DECIMAL;
    this.strictAmounts = options.strictAmounts ?? false;
    this.dateFormats = options.dateFormats;
  }

  get date(): Date | null {
    return this._date;
  }

  set date(raw: DateInput) {
    this._date = parseFlexibleDateTime(raw, this.dateFormats);
  }

  get valueDate(): Date | null {
    return this._valueDate;
  }

  set valueDate(raw: DateInput) {
    this._valueDate = parseFlexibleDateTime(raw, this.dateFormats);
  }

  /** Rule-assigned description, falling back to the raw description. */
  get description(): string {
    return this._description ?? this.rawDescription;
  }

  set description(value: string) {
    this._description = value;
  }

  /** Description prefixed with the payee name when one is known. */
  get effectiveDescription(): string {
    if (this.payee !== undefined && this.payee.hasName()) {
      return `${this.payee.name ?? ''} - ${this.description}`;
    }
    return this.description;
  }

  get realAmount(): number {
    return this.toNumber(this.amount, 'amount');
  }

  get realNewBalance(): number {
    return this.toNumber(this.newBalance, 'newBalance');
  }

  /**
   * Content-derived identifier, used as the interchange FITID.
   * Computed once on first read; an id assigned from outside is kept as-is.
   */
  get id(): string {
    if (this._id === undefined) {
      this._id = this.computeId();
    }
    return this._id;
  }

  set id(value: string) {
    this._id = value;
  }

  computeId(): string {
    const canonical = [
      toInterchangeDateTime(this._date),
      this.rawDescription,
      this.type,
      this.amount,
      this.newBalance,
    ].join('|');
    return createHash('sha256').update(canonical, 'utf8').digest('hex').substring(0, 32);
  }

  /** Unambiguous key over the identity fields; equal keys mean equal transactions. */
  identityKey(): string {
    return JSON.stringify([
      toInterchangeDateTime(this._date),
      this.rawDescription,
      this.amount,
      this.type,
      this.newBalance,
    ]);
  }

  equals(other: Transaction): boolean {
    return (
      toInterchangeDateTime(this._date) === toInterchangeDateTime(other.date) &&
      this.rawDescription === other.rawDescription &&
      this.amount === other.amount &&
      this.type === other.type &&
      this.newBalance === other.newBalance
    );
  }

  hashCode(): number {
    return hashString(this.identityKey());
  }

  toRecordRow(): string[] {
    return [
      toRecordDateTime(this._date),
      toRecordDateTime(this._valueDate),
      this.effectiveDescription,
      String(this.realAmount),
      String(this.realNewBalance),
      this.amount,
      this.newBalance,
      this.rawDescription,
      this.id,
    ];
  }

  /**
   * Rebuild a transaction from a record row. The numeric columns (3 and 4) are
   * derived data and are recomputed rather than read.
   */
  static fromRecordRow(row: readonly string[], decimal: DecimalSeparator, options: TransactionOptions = {}): Transaction {
    if (row.length !== RECORD_FIELD_COUNT) {
      throw new FormatError(
        `Failed to create Transaction from record row with ${row.length} fields: [${row.join(', ')}]. ` +
          `${RECORD_FIELD_COUNT} fields are required: date, value_date, description, real_amount, ` +
          'real_new_balance, amount, new_balance, raw_description, id',
        row
      );
    }
    const field = (index: number): string => row[index] ?? '';

    const tx = new Transaction({ ...options, decimal });
    tx.date = field(0);
    tx.valueDate = field(1);
    tx.description = field(2);
    tx.amount = field(5);
    tx.newBalance = field(6);
    tx.rawDescription = field(7);
    tx.id = field(8);
    return tx;
  }

  /** STMTTRN aggregate. CHECKNUM and PAYEE are left out when absent. */
  toInterchangeRecord(): InterchangeNode {
    const children: InterchangeNode[] = [
      element('TRNTYPE', this.type),
      element('DTPOSTED', toInterchangeDateTime(this._date)),
      element('TRNAMT', normalizeAmountText(this.amount, this.decimal)),
      element('FITID', this.id),
    ];
    if (this.checkNumber !== undefined) {
      children.push(element('CHECKNUM', this.checkNumber));
    }
    if (this.payee !== undefined) {
      children.push(this.payee.toInterchangeRecord());
    }
    children.push(element('MEMO', this.effectiveDescription));
    return aggregate('STMTTRN', children);
  }

  clone(): Transaction {
    const copy = new Transaction({
      decimal: this.decimal,
      strictAmounts: this.strictAmounts,
      ...(this.dateFormats !== undefined ? { dateFormats: this.dateFormats } : {}),
    });
    copy.type = this.type;
    copy.rawDescription = this.rawDescription;
    copy.amount = this.amount;
    copy.newBalance = this.newBalance;
    copy.checkNumber = this.checkNumber;
    copy.payee = this.payee?.clone();
    copy._date = this._date;
    copy._valueDate = this._valueDate;
    copy._description = this._description;
    copy._id = this._id;
    return copy;
  }

  toString(): string {
    return (
      `Transaction - id: ${this._id ?? '(not computed)'}, date: ${toInterchangeDateTime(this._date)}, ` +
      `raw description: ${this.rawDescription}, type: ${this.type}, amount: ${this.amount}, ` +
      `new balance: ${this.newBalance}`
    );
  }

  private toNumber(text: string, field: string): number {
    if (this.strictAmounts) {
      return parseAmountStrict(text, this.decimal, field);
    }
    return toRealAmount(text, this.decimal);
  }
}
