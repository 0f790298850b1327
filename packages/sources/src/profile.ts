import { readFile } from 'fs/promises';
import { z } from 'zod';
import { RuleDefinitionSchema, SourceConfigSchema, ValidationError, parseWithSchema } from '@ledgerjob/types';

const ColumnIndexSchema = z.number().int().min(0);

/** Zero-based column positions of each field in a delimited export. */
export const DelimitedColumnsSchema = z.object({
  date: ColumnIndexSchema,
  valueDate: ColumnIndexSchema.optional(),
  description: ColumnIndexSchema,
  amount: ColumnIndexSchema,
  newBalance: ColumnIndexSchema.optional(),
});
export type DelimitedColumns = z.infer<typeof DelimitedColumnsSchema>;

/**
 * Everything needed to read one institution's delimited export: account settings,
 * column layout and the rules to run over its transactions.
 */
export const SourceProfileSchema = z.object({
  name: z.string().min(1).default('delimited'),
  location: z.string().min(1).optional(),
  config: SourceConfigSchema,
  delimiter: z.string().length(1).default(','),
  headerRows: z.number().int().min(0).default(1),
  order: z.enum(['newest-first', 'oldest-first']).default('newest-first'),
  columns: DelimitedColumnsSchema,
  rules: z.array(RuleDefinitionSchema).default([]),
});
export type SourceProfile = z.infer<typeof SourceProfileSchema>;
export type SourceProfileInput = z.input<typeof SourceProfileSchema>;

export function parseSourceProfile(input: unknown): SourceProfile {
  return parseWithSchema(SourceProfileSchema, input, 'source profile');
}

export async function loadSourceProfile(path: string): Promise<SourceProfile> {
  const text = await readFile(path, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Source profile ${path} is not valid JSON: ${reason}`, 'profile', path);
  }
  return parseSourceProfile(json);
}
