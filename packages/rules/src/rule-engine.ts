import type { Statement, Transaction } from '@ledgerjob/ledger';

/** Rewrites one transaction in place (description, type, check number, payee). */
export type RuleBody = (transaction: Transaction) => void;

export interface Rule {
  name: string;
  priority: number;
  body: RuleBody;
}

/**
 * Ordered post-processing pipeline for extracted transactions.
 *
 * Rules run from highest to lowest priority; rules of equal priority run in the
 * order they were registered. The order holds however registrations interleave.
 */
export class RuleEngine {
  private readonly queue: Rule[] = [];

  register(priority: number, body: RuleBody, name?: string): this {
    return this.registerRule({ priority, body, name: name ?? `rule#${this.queue.length + 1}` });
  }

  registerRule(rule: Rule): this {
    // After the last rule that outranks or ties the new one; at the front otherwise.
    let index = 0;
    for (let i = this.queue.length - 1; i >= 0; i--) {
      const existing = this.queue[i];
      if (existing !== undefined && existing.priority >= rule.priority) {
        index = i + 1;
        break;
      }
    }
    this.queue.splice(index, 0, rule);
    return this;
  }

  registerAll(rules: readonly Rule[]): this {
    for (const rule of rules) {
      this.registerRule(rule);
    }
    return this;
  }

  /** Registered rules in execution order. */
  rules(): readonly Rule[] {
    return [...this.queue];
  }

  get size(): number {
    return this.queue.length;
  }

  apply(transaction: Transaction): Transaction {
    for (const rule of this.queue) {
      rule.body(transaction);
    }
    return transaction;
  }

  /** Rule-major: every transaction goes through rule 1, then every one through rule 2, ... */
  applyAll(statement: Statement): Statement {
    for (const rule of this.queue) {
      for (const transaction of statement.transactions) {
        rule.body(transaction);
      }
    }
    return statement;
  }
}

