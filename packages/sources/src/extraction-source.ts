import type { Rule } from '@ledgerjob/rules';
import type { SourceConfig, TransactionType } from '@ledgerjob/types';
import type { PageDocument } from './page-fetcher.js';

/** Field text exactly as a source read it, before any normalization. */
export interface RawTransactionFields {
  date: string;
  valueDate?: string;
  description: string;
  amount: string;
  newBalance?: string;
  type?: TransactionType;
  checkNumber?: string;
}

/**
 * Knows one institution's document layout. Returns transactions most recent first.
 */
export interface ExtractionSource {
  readonly name: string;
  readonly config: Readonly<SourceConfig>;
  /** Where to fetch from when no input document is given. */
  readonly location?: string;
  /** Site-specific rules, registered ahead of the built-in ones. */
  rules(): readonly Rule[];
  extract(document: PageDocument): RawTransactionFields[];
}
