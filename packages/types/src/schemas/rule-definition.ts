import { z } from 'zod';
import { TransactionTypeSchema } from './ledger.js';

/**
 * Declarative transaction rule, as written in a source profile.
 *
 * `description` is a template: `$1`..`$9` are capture groups, `$<before>` and
 * `$<after>` the raw description text around the match.
 */
export const RuleDefinitionSchema = z.object({
  name: z.string().min(1).optional(),
  priority: z.number().int().default(0),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, 'Only i, m, s and u flags are allowed').default('i'),
  sign: z.enum(['negative', 'positive']).optional(),
  type: TransactionTypeSchema.optional(),
  description: z.string().optional(),
  checkNumberGroup: z.number().int().min(0).max(9).optional(),
  payeeName: z.string().optional(),
});
export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>;
export type RuleDefinitionInput = z.input<typeof RuleDefinitionSchema>;
