import { describe, it, expect } from 'vitest';
import { Payee, Statement, Transaction, aggregate, element } from '@ledgerjob/ledger';
import { OFX_PREAMBLE, escapeOfx, renderNode, renderOfxDocument } from '@ledgerjob/output';

const createStatement = (accountNumber: string): Statement => {
  const tx = new Transaction({ decimal: ',' });
  tx.date = '20240305101500';
  tx.rawDescription = 'Coffee & Cake';
  tx.amount = '-2,40';
  tx.newBalance = '1.087,43';
  tx.type = 'POS';
  return new Statement({ accountNumber, bankId: '0033', decimal: ',', transactions: [tx] });
};

describe('escapeOfx', () => {
  it('should escape XML special characters', () => {
    expect(escapeOfx(`Tom & Jerry's <"shop">`)).toBe('Tom &amp; Jerry&apos;s &lt;&quot;shop&quot;&gt;');
  });
});

describe('renderNode', () => {
  it('should render elements on one line', () => {
    expect(renderNode(element('CODE', '0'))).toBe('<CODE>0</CODE>');
  });

  it('should render aggregates one tag per line', () => {
    const node = aggregate('STATUS', [element('CODE', '0'), element('SEVERITY', 'INFO')]);
    expect(renderNode(node)).toBe('<STATUS>\n<CODE>0</CODE>\n<SEVERITY>INFO</SEVERITY>\n</STATUS>');
  });
});

describe('renderOfxDocument', () => {
  it('should start with the preamble and wrap statements in BANKMSGSRSV1', () => {
    const document = renderOfxDocument([createStatement('12345678')]);

    expect(document.startsWith(
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
        '<?OFX OFXHEADER="200" SECURITY="NONE" OLDFILEUID="NONE" NEWFILEUID="NONE" VERSION="200"?>\n' +
        '<OFX>\n<BANKMSGSRSV1>\n<STMTTRNRS>\n<TRNUID>0</TRNUID>\n'
    )).toBe(true);
    expect(document.startsWith(OFX_PREAMBLE)).toBe(true);
    expect(document.endsWith('</STMTTRNRS>\n</BANKMSGSRSV1>\n</OFX>\n')).toBe(true);
  });

  it('should render account, transactions and balances', () => {
    const lines = renderOfxDocument([createStatement('12345678')]).split('\n');

    expect(lines).toContain('<CURDEF>EUR</CURDEF>');
    expect(lines).toContain('<ACCTID>12345678</ACCTID>');
    expect(lines).toContain('<BANKID>0033</BANKID>');
    expect(lines).toContain('<TRNTYPE>POS</TRNTYPE>');
    expect(lines).toContain('<DTPOSTED>20240305101500</DTPOSTED>');
    expect(lines).toContain('<TRNAMT>-2.40</TRNAMT>');
    expect(lines).toContain('<MEMO>Coffee &amp; Cake</MEMO>');
    expect(lines).toContain('<BALAMT>1087.43</BALAMT>');
  });

  it('should render the payee block', () => {
    const statement = createStatement('12345678');
    const tx = statement.transactions[0];
    if (tx !== undefined) {
      tx.payee = new Payee({ name: 'Cafe', city: 'Lisboa', country: 'PRT' });
    }
    const document = renderOfxDocument([statement]);

    expect(document).toContain(
      '<PAYEE>\n<NAME>Cafe</NAME>\n<ADDR1></ADDR1>\n<CITY>Lisboa</CITY>\n<STATE></STATE>\n<POSTALCODE></POSTALCODE>\n<COUNTRY>PRT</COUNTRY>\n<PHONE></PHONE>\n</PAYEE>'
    );
    expect(document).toContain('<MEMO>Cafe - Coffee &amp; Cake</MEMO>');
  });

  it('should put every statement into one document', () => {
    const document = renderOfxDocument([createStatement('111'), createStatement('222')]);
    expect(document.match(/<STMTTRNRS>/g)).toHaveLength(2);
    expect(document.match(/<OFX>/g)).toHaveLength(1);
  });
});
