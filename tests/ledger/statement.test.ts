import { describe, it, expect } from 'vitest';
import { RECORD_HEADER, Statement, Transaction, childOf } from '@ledgerjob/ledger';
import { MergeConflictError, ValidationError, isMergeConflictError } from '@ledgerjob/types';

const createTransaction = (date: string, description: string, amount: string, newBalance: string): Transaction => {
  const tx = new Transaction({ decimal: ',' });
  tx.date = date;
  tx.valueDate = '20240311120000';
  tx.rawDescription = description;
  tx.amount = amount;
  tx.newBalance = newBalance;
  return tx;
};

// Most recent first.
const tx1 = createTransaction('20240310000000', '1 Stamp duty 001', '-2,40', '1.087,43');
const tx2 = createTransaction('20240308000000', '2 Interest payment 001', '-59,94', '1.089,83');
const tx3 = createTransaction('20240306000000', '3 Loan payment 001', '-256,13', '1.149,77');
const tx4 = createTransaction('20240304000000', '4 Transfer to bank 2', '-1.000,00', '1.405,90');
const tx5 = createTransaction('20240302000000', '5 Internet payment 838', '-32,07', '2.405,90');

const statementOf = (...transactions: Transaction[]): Statement =>
  new Statement({ decimal: ',', transactions: transactions.map((tx) => tx.clone()) });

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('Statement derived values', () => {
  it('should take closing balances from the first transaction', () => {
    const s = statementOf(tx1, tx2, tx3);
    expect(s.closingBalance).toBe('1.087,43');
    expect(s.closingAvailable).toBe('1.087,43');
  });

  it('should take the period from the first and last transactions', () => {
    const s = statementOf(tx1, tx2, tx3);
    expect(s.fromDate?.toISOString()).toBe('2024-03-06T00:00:00.000Z');
    expect(s.toDate?.toISOString()).toBe('2024-03-10T00:00:00.000Z');
    expect(s.range()).toEqual({ from: '20240306000000', to: '20240310000000' });
  });

  it('should report nothing for an empty statement', () => {
    const s = new Statement();
    expect(s.closingBalance).toBeNull();
    expect(s.fromDate).toBeNull();
    expect(s.range()).toEqual({ from: '', to: '' });
  });

  it('should prefer explicitly set values', () => {
    const s = statementOf(tx1, tx2);
    s.closingAvailable = '1.000,00';
    s.fromDate = '20240301';
    expect(s.closingAvailable).toBe('1.000,00');
    expect(s.fromDate?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
  });

  it('should pin derived values on finalize', () => {
    const s = statementOf(tx2, tx3).finalize();
    s.transactions.unshift(tx1.clone());
    expect(s.closingBalance).toBe('1.089,83');
    expect(s.toDate?.toISOString()).toBe('2024-03-08T00:00:00.000Z');
  });
});

describe('Statement account validation', () => {
  it('should accept account numbers of 1 to 22 characters', () => {
    expect(new Statement({ accountNumber: '1' }).accountNumber).toBe('1');
    expect(new Statement({ accountNumber: 'A'.repeat(22) }).accountNumber).toHaveLength(22);
  });

  it('should reject empty and overlong account numbers', () => {
    expect(() => new Statement({ accountNumber: '' })).toThrow(ValidationError);
    expect(() => new Statement({ accountNumber: 'A'.repeat(23) })).toThrow(ValidationError);
  });

  it('should reject bank ids over 9 characters', () => {
    expect(new Statement({ bankId: '' }).bankId).toBe('');
    expect(() => new Statement({ bankId: '1234567890' })).toThrow(ValidationError);
  });

  it('should reject currencies that are not 3-letter codes', () => {
    expect(() => new Statement({ currency: 'euro' })).toThrow(ValidationError);
    expect(new Statement().currency).toBe('EUR');
  });
});

describe('Statement merge', () => {
  it('should merge a statement with a duplicate of itself without changing it', () => {
    const s123 = statementOf(tx1, tx2, tx3);
    expect(s123.merge(s123.clone()).equals(s123)).toBe(true);
  });

  it('should merge consecutive statements', () => {
    const merged = statementOf(tx1, tx2, tx3).merge(statementOf(tx4, tx5));
    expect(merged.equals(statementOf(tx1, tx2, tx3, tx4, tx5))).toBe(true);
  });

  it('should merge overlapping statements', () => {
    const merged = statementOf(tx1, tx2, tx3).merge(statementOf(tx2, tx3, tx4, tx5));
    expect(merged.equals(statementOf(tx1, tx2, tx3, tx4, tx5))).toBe(true);
    expect(merged.transactions).toHaveLength(5);
  });

  it('should merge a statement contained in this one without change', () => {
    const s12345 = statementOf(tx1, tx2, tx3, tx4, tx5);
    expect(s12345.merge(statementOf(tx3)).equals(s12345)).toBe(true);
    expect(s12345.merge(statementOf(tx2, tx3, tx4)).equals(s12345)).toBe(true);
  });

  it('should reject statements that overlap non-contiguously', () => {
    const s123 = statementOf(tx1, tx2, tx3);
    const error = captureError(() => s123.merge(statementOf(tx2, tx5)));

    expect(error).toBeInstanceOf(MergeConflictError);
    if (!isMergeConflictError(error)) return;
    expect(error.detail.position).toBe(2);
    expect(error.detail.selfRange).toEqual({ from: '20240306000000', to: '20240310000000' });
    expect(error.detail.otherRange).toEqual({ from: '20240302000000', to: '20240308000000' });
    expect(error.detail.expected).toContain('5 Internet payment 838');
    expect(error.detail.found).toContain('3 Loan payment 001');
    expect(error.message).toContain('Cannot merge statement [20240302000000..20240308000000] into [20240306000000..20240310000000]');
  });

  it('should reject statements whose new transactions are on the wrong side', () => {
    expect(() => statementOf(tx2, tx3).merge(statementOf(tx1, tx2))).toThrow(MergeConflictError);
  });

  it('should not change either statement', () => {
    const s123 = statementOf(tx1, tx2, tx3);
    const s45 = statementOf(tx4, tx5);
    s123.merge(s45);
    expect(s123.transactions).toHaveLength(3);
    expect(s45.transactions).toHaveLength(2);
  });

  it('should keep account details of the receiving statement', () => {
    const s = new Statement({ accountNumber: '12345678', currency: 'USD', decimal: ',', transactions: [tx1.clone()] });
    const merged = s.merge(statementOf(tx2));
    expect(merged.accountNumber).toBe('12345678');
    expect(merged.currency).toBe('USD');
  });

  it('should reset derived values', () => {
    const s = statementOf(tx2, tx3);
    s.closingBalance = '5,00';
    s.toDate = '20240309';
    const merged = s.merge(statementOf(tx3, tx4));
    expect(merged.closingBalance).toBe('1.089,83');
    expect(merged.toDate?.toISOString()).toBe('2024-03-08T00:00:00.000Z');
    expect(merged.fromDate?.toISOString()).toBe('2024-03-04T00:00:00.000Z');
  });
});

describe('Statement mergeInPlace', () => {
  it('should update the receiving statement', () => {
    const s = statementOf(tx1, tx2, tx3);
    s.closingBalance = '0,00';
    const result = s.mergeInPlace(statementOf(tx3, tx4, tx5));

    expect(result).toBe(s);
    expect(s.equals(statementOf(tx1, tx2, tx3, tx4, tx5))).toBe(true);
    expect(s.closingBalance).toBe('1.087,43');
  });

  it('should leave the statement untouched when the merge fails', () => {
    const s = statementOf(tx1, tx2, tx3);
    expect(() => s.mergeInPlace(statementOf(tx2, tx5))).toThrow(MergeConflictError);
    expect(s.equals(statementOf(tx1, tx2, tx3))).toBe(true);
  });
});

describe('Statement equality', () => {
  it('should compare transactions in order', () => {
    expect(statementOf(tx1, tx2).equals(statementOf(tx2, tx1))).toBe(false);
    expect(statementOf(tx1, tx2).equals(statementOf(tx1))).toBe(false);
  });

  it('should compare closing balances', () => {
    const a = statementOf(tx1, tx2);
    const b = statementOf(tx1, tx2);
    b.closingBalance = '0,00';
    expect(a.equals(b)).toBe(false);
  });
});

describe('Statement record rows', () => {
  it('should read back a statement as it was written', () => {
    const s123 = statementOf(tx1, tx2, tx3);
    const copy = Statement.fromRecordRows(s123.toRecordRows(), ',');
    expect(copy.equals(s123)).toBe(true);
  });

  it('should read back and merge a statement with itself without change', () => {
    const s123 = statementOf(tx1, tx2, tx3);
    const copy = Statement.fromRecordRows(s123.toRecordRows(), ',');
    expect(s123.merge(copy).equals(s123)).toBe(true);
  });

  it('should skip a header row', () => {
    const s = statementOf(tx1, tx2);
    const copy = Statement.fromRecordRows([[...RECORD_HEADER], ...s.toRecordRows()], ',');
    expect(copy.transactions).toHaveLength(2);
  });
});

describe('Statement interchange record', () => {
  it('should require an account number', () => {
    expect(() => statementOf(tx1).toInterchangeRecord()).toThrow(ValidationError);
  });

  it('should build the statement response', () => {
    const s = new Statement({
      accountNumber: '12345678',
      bankId: '0033',
      decimal: ',',
      transactions: [tx1.clone(), tx2.clone()],
    });
    const node = s.toInterchangeRecord();
    const stmtrs = childOf(node, 'STMTRS');

    expect(node.tag).toBe('STMTTRNRS');
    expect(stmtrs?.children?.map((child) => child.tag)).toEqual([
      'CURDEF',
      'BANKACCTFROM',
      'BANKTRANLIST',
      'LEDGERBAL',
      'AVAILBAL',
    ]);

    const account = stmtrs !== undefined ? childOf(stmtrs, 'BANKACCTFROM') : undefined;
    expect(account?.children?.map((child) => child.value)).toEqual(['0033', '12345678', 'CHECKING']);

    const list = stmtrs !== undefined ? childOf(stmtrs, 'BANKTRANLIST') : undefined;
    expect(list?.children?.filter((child) => child.tag === 'STMTTRN')).toHaveLength(2);
    expect(list !== undefined ? childOf(list, 'DTSTART')?.value : undefined).toBe('20240308000000');

    const ledger = stmtrs !== undefined ? childOf(stmtrs, 'LEDGERBAL') : undefined;
    expect(ledger?.children?.map((child) => child.value)).toEqual(['1087.43', '20240310000000']);
  });
});
