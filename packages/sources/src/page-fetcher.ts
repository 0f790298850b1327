import { readFile } from 'fs/promises';
import { extname, resolve } from 'path';

/** A fetched page or file, handed to an extraction source as-is. */
export interface PageDocument {
  location: string;
  contentType: string;
  body: string;
}

export interface PageFetcher {
  fetch(location: string): Promise<PageDocument>;
}

const CONTENT_TYPES: Record<string, string> = {
  '.csv': 'text/csv',
  '.tsv': 'text/tab-separated-values',
  '.txt': 'text/plain',
  '.html': 'text/html',
  '.htm': 'text/html',
  '.json': 'application/json',
};

/**
 * Reads documents from the local filesystem, for statements exported by hand
 * and for `--input`.
 */
export class FilePageFetcher implements PageFetcher {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async fetch(location: string): Promise<PageDocument> {
    const path = resolve(this.baseDir, location);
    const body = await readFile(path, 'utf-8');
    return {
      location: path,
      contentType: CONTENT_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream',
      body,
    };
  }
}
