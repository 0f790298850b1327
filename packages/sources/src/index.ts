export { createSourceConfig } from './source-config.js';
export { FilePageFetcher, type PageDocument, type PageFetcher } from './page-fetcher.js';
export type { ExtractionSource, RawTransactionFields } from './extraction-source.js';
export { ExtractionSession, type ExtractionSessionOptions } from './session.js';
export {
  DelimitedColumnsSchema,
  SourceProfileSchema,
  parseSourceProfile,
  loadSourceProfile,
  type DelimitedColumns,
  type SourceProfile,
  type SourceProfileInput,
} from './profile.js';
export { DelimitedSource } from './delimited-source.js';
export { SourceRegistry, createDefaultRegistry, type SourceFactory } from './registry.js';
export { withRetry, isRetryableError, calculateDelay, type RetryOptions } from './retry.js';
export {
  HttpUploadSink,
  HttpStatusError,
  type UploadSink,
  type UploadStatus,
  type FetchLike,
  type HttpUploadSinkOptions,
} from './upload-sink.js';
