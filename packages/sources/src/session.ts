import { Statement, Transaction } from '@ledgerjob/ledger';
import { RuleEngine, builtinRules } from '@ledgerjob/rules';
import { DEFAULT_DATE_FORMATS, silentLogger, type Logger, type SourceConfig } from '@ledgerjob/types';
import type { ExtractionSource, RawTransactionFields } from './extraction-source.js';
import type { PageFetcher } from './page-fetcher.js';

export interface ExtractionSessionOptions {
  logger?: Logger;
  /** Engine to run; defaults to one holding only the built-in rules. */
  rules?: RuleEngine;
}

/**
 * One extraction run under a fixed source configuration: creates statements and
 * transactions carrying that configuration and runs the rule pipeline over them.
 */
export class ExtractionSession {
  readonly rules: RuleEngine;
  private readonly logger: Logger;
  private readonly dateFormats: readonly string[];

  constructor(
    readonly config: Readonly<SourceConfig>,
    options: ExtractionSessionOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.rules = options.rules ?? new RuleEngine().registerAll(builtinRules());
    this.dateFormats = [...(config.dateFormats ?? []), ...DEFAULT_DATE_FORMATS];
  }

  /** Session for a source: its own rules first, then the built-ins. */
  static forSource(source: ExtractionSource, logger?: Logger): ExtractionSession {
    const rules = new RuleEngine().registerAll(source.rules()).registerAll(builtinRules());
    return new ExtractionSession(source.config, { rules, ...(logger !== undefined ? { logger } : {}) });
  }

  createStatement(): Statement {
    return new Statement({
      accountNumber: this.config.accountNumber,
      accountType: this.config.accountType,
      currency: this.config.currency,
      decimal: this.config.decimal,
      ...(this.config.bankId !== undefined ? { bankId: this.config.bankId } : {}),
    });
  }

  createTransaction(fields: RawTransactionFields): Transaction {
    const transaction = new Transaction({
      decimal: this.config.decimal,
      strictAmounts: this.config.strictAmounts,
      dateFormats: this.dateFormats,
    });
    transaction.date = fields.date;
    if (fields.valueDate !== undefined) {
      transaction.valueDate = fields.valueDate;
    }
    transaction.rawDescription = fields.description.trim();
    transaction.amount = fields.amount.trim();
    if (fields.newBalance !== undefined) {
      transaction.newBalance = fields.newBalance.trim();
    }
    if (fields.type !== undefined) {
      transaction.type = fields.type;
    }
    if (fields.checkNumber !== undefined) {
      transaction.checkNumber = fields.checkNumber;
    }
    return transaction;
  }

  /** Statement of the given records, with every rule applied. */
  buildStatement(records: readonly RawTransactionFields[]): Statement {
    const statement = this.createStatement();
    for (const fields of records) {
      statement.addTransaction(this.createTransaction(fields));
    }
    this.rules.applyAll(statement);
    this.logger.debug(`Applied ${this.rules.size} rule(s) to ${statement.transactions.length} transaction(s)`);
    return statement;
  }

  /**
   * Restore the transaction types of a statement read back from records, which do
   * not keep them. Rules run on copies, so descriptions and payees stay as read.
   */
  restoreTypes(statement: Statement): Statement {
    const scratch = statement.clone();
    scratch.transactions = statement.transactions.map((transaction) => transaction.clone());
    this.rules.applyAll(scratch);
    scratch.transactions.forEach((copy, i) => {
      const original = statement.transactions[i];
      if (original !== undefined) {
        original.type = copy.type;
      }
    });
    return statement;
  }

  /** Fetch, extract and build, in that order. */
  async run(source: ExtractionSource, fetcher: PageFetcher, location: string): Promise<Statement> {
    this.logger.info(`Fetching ${location} for source ${source.name}`);
    const document = await fetcher.fetch(location);
    const records = source.extract(document);
    this.logger.info(`Extracted ${records.length} transaction(s) from ${document.location}`);
    return this.buildStatement(records);
  }
}
