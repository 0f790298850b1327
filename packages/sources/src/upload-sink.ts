import { silentLogger, type Logger } from '@ledgerjob/types';
import { withRetry, type RetryOptions } from './retry.js';

export interface UploadStatus {
  ok: boolean;
  status: number;
  message: string;
}

/** Accepts a serialized interchange document and reports what became of it. */
export interface UploadSink {
  upload(document: string): Promise<UploadStatus>;
}

/** Non-2xx answer from the upload endpoint. */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`Upload endpoint answered HTTP ${status}${body !== '' ? `: ${body}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpUploadSinkOptions {
  url: string;
  token?: string;
  /** Defaults to the global fetch. */
  fetch?: FetchLike;
  retry?: RetryOptions;
  logger?: Logger;
}

/**
 * POSTs OFX documents to an HTTP endpoint with a bearer token. 429 and 5xx answers
 * and dropped connections are retried; the final answer comes back as a status.
 */
export class HttpUploadSink implements UploadSink {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly options: HttpUploadSinkOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  async upload(document: string): Promise<UploadStatus> {
    const headers: Record<string, string> = { 'Content-Type': 'application/x-ofx' };
    if (this.options.token !== undefined && this.options.token !== '') {
      headers['Authorization'] = `Bearer ${this.options.token}`;
    }

    try {
      return await withRetry(
        async () => {
          const response = await this.fetchImpl(this.options.url, { method: 'POST', headers, body: document });
          const body = (await response.text()).trim();
          if (!response.ok) {
            throw new HttpStatusError(response.status, body);
          }
          return { ok: true, status: response.status, message: body !== '' ? body : response.statusText };
        },
        {
          ...this.options.retry,
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn(`Upload attempt ${attempt} failed (${error.message}); retrying in ${Math.round(delayMs)}ms`);
          },
        }
      );
    } catch (error) {
      if (error instanceof HttpStatusError) {
        return { ok: false, status: error.status, message: error.message };
      }
      throw error;
    }
  }
}
