export {
  TRANSACTION_TYPES,
  ACCOUNT_TYPES,
  TransactionTypeSchema,
  AccountTypeSchema,
  DecimalSeparatorSchema,
  CurrencySchema,
  AccountNumberSchema,
  BankIdSchema,
  PayeeSchema,
} from './ledger.js';
export type { TransactionType, AccountType, PayeeFields } from './ledger.js';

export { SourceConfigSchema } from './source-config.js';
export type { SourceConfig, SourceConfigInput } from './source-config.js';

export { RuleDefinitionSchema } from './rule-definition.js';
export type { RuleDefinition, RuleDefinitionInput } from './rule-definition.js';

export { parseWithSchema, formatZodIssues } from './parse.js';
