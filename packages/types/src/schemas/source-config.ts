import { z } from 'zod';
import { DEFAULT_CURRENCY } from '../utils/constants.js';
import {
  AccountNumberSchema,
  AccountTypeSchema,
  BankIdSchema,
  CurrencySchema,
  DecimalSeparatorSchema,
} from './ledger.js';

/**
 * Settings an extraction source fixes for every statement and transaction it creates.
 */
export const SourceConfigSchema = z.object({
  currency: CurrencySchema.default(DEFAULT_CURRENCY),
  decimal: DecimalSeparatorSchema.default('.'),
  accountNumber: AccountNumberSchema,
  accountType: AccountTypeSchema.default('CHECKING'),
  bankId: BankIdSchema.optional(),
  /** Throw on unparsable amounts instead of reading them as zero. */
  strictAmounts: z.boolean().default(false),
  /** Date formats tried before the built-in list. */
  dateFormats: z.array(z.string().min(1)).optional(),
});
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type SourceConfigInput = z.input<typeof SourceConfigSchema>;
