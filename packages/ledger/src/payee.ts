import type { PayeeFields } from '@ledgerjob/types';
import { aggregate, element, type InterchangeNode } from './interchange.js';

/**
 * Who a transaction was paid to or received from. Owned by a single Transaction.
 */
export class Payee {
  name?: string;
  address?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
  phone?: string;

  constructor(fields: PayeeFields = {}) {
    Object.assign(this, fields);
  }

  hasName(): boolean {
    return this.name !== undefined && this.name !== '';
  }

  clone(): Payee {
    return new Payee(this.toFields());
  }

  toFields(): PayeeFields {
    return {
      ...(this.name !== undefined ? { name: this.name } : {}),
      ...(this.address !== undefined ? { address: this.address } : {}),
      ...(this.city !== undefined ? { city: this.city } : {}),
      ...(this.state !== undefined ? { state: this.state } : {}),
      ...(this.postalCode !== undefined ? { postalCode: this.postalCode } : {}),
      ...(this.country !== undefined ? { country: this.country } : {}),
      ...(this.phone !== undefined ? { phone: this.phone } : {}),
    };
  }

  /** PAYEE aggregate; COUNTRY is optional in the schema and left out when unknown. */
  toInterchangeRecord(): InterchangeNode {
    const children: InterchangeNode[] = [
      element('NAME', this.name ?? ''),
      element('ADDR1', this.address ?? ''),
      element('CITY', this.city ?? ''),
      element('STATE', this.state ?? ''),
      element('POSTALCODE', this.postalCode ?? ''),
    ];
    if (this.country !== undefined) {
      children.push(element('COUNTRY', this.country));
    }
    children.push(element('PHONE', this.phone ?? ''));
    return aggregate('PAYEE', children);
  }

  toString(): string {
    return this.name ?? '';
  }
}
