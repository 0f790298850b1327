export { aggregate, childOf, element, type InterchangeNode } from './interchange.js';
export { Payee } from './payee.js';
export { Transaction, RECORD_FIELD_COUNT, RECORD_HEADER, type TransactionOptions } from './transaction.js';
export { Statement, type StatementOptions } from './statement.js';
