import { Payee, type Transaction } from '@ledgerjob/ledger';
import {
  RuleDefinitionSchema,
  ValidationError,
  parseWithSchema,
  type RuleDefinition,
  type RuleDefinitionInput,
} from '@ledgerjob/types';
import type { Rule } from './rule-engine.js';

const TEMPLATE_TOKEN = /\$(\d|<before>|<after>)/g;

/**
 * Fill a description template from a match against the raw description.
 * Unknown groups expand to nothing; the result is trimmed.
 */
export function expandTemplate(template: string, match: RegExpExecArray): string {
  const input = match.input;
  const before = input.slice(0, match.index);
  const after = input.slice(match.index + match[0].length);

  return template
    .replace(TEMPLATE_TOKEN, (_token, key: string) => {
      if (key === '<before>') return before.trim();
      if (key === '<after>') return after.trim();
      return match[Number(key)] ?? '';
    })
    .replace(/\s+/g, ' ')
    .trim();
}

function compilePattern(definition: RuleDefinition): RegExp {
  try {
    return new RegExp(definition.pattern, definition.flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid rule pattern /${definition.pattern}/: ${reason}`, 'pattern', definition.pattern);
  }
}

function signMatches(definition: RuleDefinition, transaction: Transaction): boolean {
  if (definition.sign === undefined) {
    return true;
  }
  const amount = transaction.realAmount;
  return definition.sign === 'negative' ? amount < 0 : amount >= 0;
}

/**
 * Build a rule from a declarative definition: when the pattern matches the raw
 * description (and the amount has the required sign), set whichever of type,
 * description, check number and payee the definition names.
 */
export function createPatternRule(input: RuleDefinitionInput): Rule {
  const definition = parseWithSchema(RuleDefinitionSchema, input, 'rule definition');
  const pattern = compilePattern(definition);

  return {
    name: definition.name ?? `pattern:${definition.pattern}`,
    priority: definition.priority,
    body: (transaction) => {
      const match = pattern.exec(transaction.rawDescription);
      if (match === null || !signMatches(definition, transaction)) {
        return;
      }
      if (definition.type !== undefined) {
        transaction.type = definition.type;
      }
      if (definition.description !== undefined) {
        transaction.description = expandTemplate(definition.description, match);
      }
      if (definition.checkNumberGroup !== undefined) {
        const checkNumber = match[definition.checkNumberGroup];
        if (checkNumber !== undefined && checkNumber !== '') {
          transaction.checkNumber = checkNumber;
        }
      }
      if (definition.payeeName !== undefined) {
        transaction.payee = new Payee({ name: expandTemplate(definition.payeeName, match) });
      }
    },
  };
}
