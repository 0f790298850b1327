import { describe, it, expect } from 'vitest';
import { Statement, Transaction } from '@ledgerjob/ledger';
import { parseRecordRows, readRecordDocument, writeRecordDocument } from '@ledgerjob/output';
import { FormatError } from '@ledgerjob/types';

const HEADER = 'Date,Value-Date,Description,Amount,New-Balance,Raw-Amount,Raw-New-Balance,Raw-Description,OFX-ID';

const createTransaction = (date: string, description: string, amount: string, newBalance: string): Transaction => {
  const tx = new Transaction({ decimal: ',' });
  tx.date = date;
  tx.rawDescription = description;
  tx.amount = amount;
  tx.newBalance = newBalance;
  return tx;
};

const createStatement = (): Statement =>
  new Statement({
    decimal: ',',
    transactions: [
      createTransaction('20240305101500', 'Coffee, Lisbon', '-2,40', '1.087,43'),
      createTransaction('20240304000000', 'Says "hello"', '-10,00', '1.089,83'),
    ],
  });

describe('writeRecordDocument', () => {
  it('should write a header and one line per transaction', () => {
    const statement = createStatement();
    const [first, second] = statement.transactions;
    const lines = writeRecordDocument(statement).split('\n');

    expect(lines).toEqual([
      HEADER,
      `2024-03-05 10:15:00,,"Coffee, Lisbon",-2.4,1087.43,"-2,40","1.087,43","Coffee, Lisbon",${first?.id ?? ''}`,
      `2024-03-04 00:00:00,,"Says ""hello""",-10,1089.83,"-10,00","1.089,83","Says ""hello""",${second?.id ?? ''}`,
      '',
    ]);
  });

  it('should leave out the header on request', () => {
    const text = writeRecordDocument(createStatement(), { includeHeader: false });
    expect(text.startsWith('2024-03-05 10:15:00,')).toBe(true);
    expect(text.endsWith('\n')).toBe(true);
  });

  it('should write only the header for an empty statement', () => {
    expect(writeRecordDocument(new Statement())).toBe(`${HEADER}\n`);
  });

  it('should use another delimiter', () => {
    const text = writeRecordDocument(createStatement(), { includeHeader: false, delimiter: ';' });
    expect(text.split('\n')[0]?.split(';').slice(0, 6)).toEqual([
      '2024-03-05 10:15:00',
      '',
      'Coffee, Lisbon',
      '-2.4',
      '1087.43',
      '-2,40',
    ]);
  });
});

describe('readRecordDocument', () => {
  it('should read back a statement as it was written', () => {
    const statement = createStatement();
    const copy = readRecordDocument(writeRecordDocument(statement), ',');

    expect(copy.equals(statement)).toBe(true);
    expect(copy.transactions[1]?.rawDescription).toBe('Says "hello"');
  });

  it('should read documents written without a header', () => {
    const statement = createStatement();
    const copy = readRecordDocument(writeRecordDocument(statement, { includeHeader: false }), ',');
    expect(copy.equals(statement)).toBe(true);
  });

  it('should attach account details it is given', () => {
    const copy = readRecordDocument(writeRecordDocument(createStatement()), ',', {
      account: { accountNumber: '12345678', currency: 'GBP' },
    });
    expect(copy.accountNumber).toBe('12345678');
    expect(copy.currency).toBe('GBP');
  });

  it('should read an empty document as an empty statement', () => {
    expect(readRecordDocument('', ',').transactions).toHaveLength(0);
  });

  it('should reject rows with the wrong number of fields', () => {
    expect(() => readRecordDocument('2024-03-05 10:15:00,,Coffee\n', ',')).toThrow(FormatError);
  });
});

describe('parseRecordRows', () => {
  it('should keep quoted delimiters and newlines', () => {
    expect(parseRecordRows('a,"b,c","d\ne"\n')).toEqual([['a', 'b,c', 'd\ne']]);
  });

  it('should reject unterminated quotes', () => {
    expect(() => parseRecordRows('a,"b\n')).toThrow(FormatError);
  });
});
