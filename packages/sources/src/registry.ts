import { ValidationError } from '@ledgerjob/types';
import { DelimitedSource } from './delimited-source.js';
import type { ExtractionSource } from './extraction-source.js';
import { loadSourceProfile } from './profile.js';

export type SourceFactory = (args: readonly string[]) => ExtractionSource | Promise<ExtractionSource>;

/** Named factories for extraction sources; the CLI picks one by `--source`. */
export class SourceRegistry {
  private readonly factories = new Map<string, SourceFactory>();

  register(name: string, factory: SourceFactory): this {
    if (this.factories.has(name)) {
      throw new ValidationError(`Source "${name}" is already registered`, 'source', name);
    }
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  async create(name: string, args: readonly string[] = []): Promise<ExtractionSource> {
    const factory = this.factories.get(name);
    if (factory === undefined) {
      const known = this.names();
      throw new ValidationError(
        `Unknown source "${name}"${known.length > 0 ? ` (available: ${known.join(', ')})` : ''}`,
        'source',
        name
      );
    }
    return factory(args);
  }
}

/** `delimited <profile.json>`: a DelimitedSource from a profile file. */
async function createDelimitedSource(args: readonly string[]): Promise<ExtractionSource> {
  const profilePath = args[0];
  if (profilePath === undefined || profilePath === '') {
    throw new ValidationError('The delimited source needs a profile file argument', 'sourceArgs');
  }
  return new DelimitedSource(await loadSourceProfile(profilePath));
}

export function createDefaultRegistry(): SourceRegistry {
  return new SourceRegistry().register('delimited', createDelimitedSource);
}
