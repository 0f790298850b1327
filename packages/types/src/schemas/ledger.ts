import { z } from 'zod';
import { ACCOUNT_NUMBER_MAX_LENGTH, BANK_ID_MAX_LENGTH } from '../utils/constants.js';

export const TRANSACTION_TYPES = [
  'CREDIT', // Generic credit
  'DEBIT', // Generic debit
  'INT', // Interest earned or paid (sign decides)
  'DIV', // Dividend
  'FEE', // FI fee
  'SRVCHG', // Service charge
  'DEP', // Deposit
  'ATM', // ATM debit or credit (sign decides)
  'POS', // Point of sale debit or credit (sign decides)
  'XFER', // Transfer
  'CHECK', // Check
  'PAYMENT', // Electronic payment
  'CASH', // Cash withdrawal
  'DIRECTDEP', // Direct deposit
  'DIRECTDEBIT', // Merchant initiated debit
  'REPEATPMT', // Repeating payment / standing order
  'OTHER',
] as const;

export const TransactionTypeSchema = z.enum(TRANSACTION_TYPES);
export type TransactionType = z.infer<typeof TransactionTypeSchema>;

export const ACCOUNT_TYPES = ['CHECKING', 'SAVINGS', 'MONEYMRKT', 'CREDITLINE'] as const;

export const AccountTypeSchema = z.enum(ACCOUNT_TYPES);
export type AccountType = z.infer<typeof AccountTypeSchema>;

export const DecimalSeparatorSchema = z.enum(['.', ',']);

export const CurrencySchema = z.string().regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter code');

export const AccountNumberSchema = z
  .string()
  .min(1, 'Account number is required')
  .max(ACCOUNT_NUMBER_MAX_LENGTH, `Account number must be at most ${ACCOUNT_NUMBER_MAX_LENGTH} characters`);

export const BankIdSchema = z
  .string()
  .max(BANK_ID_MAX_LENGTH, `Bank id must be at most ${BANK_ID_MAX_LENGTH} characters`);

export const PayeeSchema = z.object({
  name: z.string().optional(),
  address: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postalCode: z.string().optional(),
  country: z.string().optional(),
  phone: z.string().optional(),
});
export type PayeeFields = z.infer<typeof PayeeSchema>;
