import { SourceConfigSchema, parseWithSchema, type SourceConfig, type SourceConfigInput } from '@ledgerjob/types';

/**
 * Validated, frozen settings for one extraction source. Defaults: EUR, ".",
 * CHECKING, lenient amounts.
 */
export function createSourceConfig(input: SourceConfigInput): Readonly<SourceConfig> {
  const config = parseWithSchema(SourceConfigSchema, input, 'source config');
  if (config.dateFormats !== undefined) {
    Object.freeze(config.dateFormats);
  }
  return Object.freeze(config);
}
