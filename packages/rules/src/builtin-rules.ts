import { LAST_RULE_PRIORITY, capitalizeWords } from '@ledgerjob/types';
import type { Rule } from './rule-engine.js';

/** Untyped transactions become CREDIT or DEBIT by the sign of their amount. */
export const typeFromSignRule: Rule = {
  name: 'type-from-sign',
  priority: LAST_RULE_PRIORITY,
  body: (transaction) => {
    if (transaction.type === 'OTHER') {
      transaction.type = transaction.realAmount < 0 ? 'DEBIT' : 'CREDIT';
    }
  },
};

/** Descriptions no earlier rule customized are title-cased. */
export const capitalizeDescriptionRule: Rule = {
  name: 'capitalize-description',
  priority: LAST_RULE_PRIORITY,
  body: (transaction) => {
    if (transaction.description === transaction.rawDescription) {
      transaction.description = capitalizeWords(transaction.rawDescription);
    }
  },
};

export function builtinRules(): Rule[] {
  return [typeFromSignRule, capitalizeDescriptionRule];
}
