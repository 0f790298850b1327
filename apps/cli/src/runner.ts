import { access, readFile, writeFile } from 'fs/promises';
import type { Statement } from '@ledgerjob/ledger';
import {
  fileNameFromOption,
  mergeFailedFileName,
  readRecordDocument,
  renderOfxDocument,
  writeRecordDocument,
  type OutputOption,
} from '@ledgerjob/output';
import {
  DelimitedSource,
  ExtractionSession,
  FilePageFetcher,
  HttpUploadSink,
  createDefaultRegistry,
  loadSourceProfile,
  type ExtractionSource,
  type PageFetcher,
  type SourceRegistry,
  type UploadSink,
  type UploadStatus,
} from '@ledgerjob/sources';
import { ValidationError, isMergeConflictError, type Logger } from '@ledgerjob/types';

export interface RunOptions {
  /** Registered source name. */
  source?: string;
  sourceArgs?: string[];
  /** Source profile file; builds a delimited source without going through the registry. */
  profile?: string;
  /** Local document to extract from instead of the source's own location. */
  input?: string;
  /** `true` writes to stdout; a directory gets a file named after the period. */
  csv?: OutputOption;
  ofx?: OutputOption;
  uploadUrl?: string;
  uploadToken?: string;
}

export interface RunContext {
  logger: Logger;
  registry?: SourceRegistry;
  fetcher?: PageFetcher;
  /** Overrides the HTTP sink built from `uploadUrl`. */
  uploadSink?: UploadSink;
  stdout?: (text: string) => void;
}

export interface RunResult {
  statement: Statement;
  csvFile: string | null;
  /** Set when the new statement could not be merged into the existing CSV file. */
  mergeFailedFile: string | null;
  ofxFile: string | null;
  upload: UploadStatus | null;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function resolveSource(options: RunOptions, registry: SourceRegistry): Promise<ExtractionSource> {
  if (options.profile !== undefined) {
    return new DelimitedSource(await loadSourceProfile(options.profile));
  }
  if (options.source !== undefined) {
    return registry.create(options.source, options.sourceArgs ?? []);
  }
  throw new ValidationError('Either a source or a source profile must be given', 'source');
}

/**
 * Write `statement` as CSV. An existing file is read back, its transaction types
 * restored through the session's rules, and the new statement merged in front
 * of it. A statement that does not fit goes to a separate `_merge_failed` file
 * and the existing one is left alone.
 */
async function writeCsv(
  statement: Statement,
  option: OutputOption,
  session: ExtractionSession,
  context: RunContext
): Promise<Pick<RunResult, 'csvFile' | 'mergeFailedFile'>> {
  const { logger } = context;
  const file = await fileNameFromOption(option, statement, 'csv');
  if (file === null) {
    (context.stdout ?? ((text) => process.stdout.write(text)))(writeRecordDocument(statement));
    return { csvFile: null, mergeFailedFile: null };
  }

  if (!(await exists(file))) {
    await writeFile(file, writeRecordDocument(statement), 'utf-8');
    logger.info(`Statement written as csv to ${file}`);
    return { csvFile: file, mergeFailedFile: null };
  }

  const { config } = session;
  const existing = readRecordDocument(await readFile(file, 'utf-8'), config.decimal, {
    strictAmounts: config.strictAmounts,
    ...(config.dateFormats !== undefined ? { dateFormats: config.dateFormats } : {}),
  });
  session.restoreTypes(existing);

  try {
    const merged = statement.merge(existing);
    await writeFile(file, writeRecordDocument(merged), 'utf-8');
    logger.info(`Statement merged into ${file} (${merged.transactions.length} transaction(s))`);
    return { csvFile: file, mergeFailedFile: null };
  } catch (error) {
    if (!isMergeConflictError(error)) {
      throw error;
    }
    const failed = mergeFailedFileName(file, statement);
    await writeFile(failed, writeRecordDocument(statement), 'utf-8');
    logger.warn(`Merge failed, storing new data in ${failed} instead of merging it into ${file}`);
    logger.debug(`Merge failed due to: ${error.message}`);
    return { csvFile: file, mergeFailedFile: failed };
  }
}

async function writeOfx(statement: Statement, option: OutputOption, context: RunContext): Promise<string | null> {
  const file = await fileNameFromOption(option, statement, 'ofx');
  const document = renderOfxDocument([statement]);
  if (file === null) {
    (context.stdout ?? ((text) => process.stdout.write(text)))(document);
    return null;
  }
  await writeFile(file, document, 'utf-8');
  context.logger.info(`Statement written as ofx to ${file}`);
  return file;
}

/**
 * One pipeline run: extract a statement, apply the rules, then write and upload
 * it as asked.
 */
export async function run(options: RunOptions, context: RunContext): Promise<RunResult> {
  const { logger } = context;
  const source = await resolveSource(options, context.registry ?? createDefaultRegistry());
  const session = ExtractionSession.forSource(source, logger);

  const location = options.input ?? source.location;
  if (location === undefined) {
    throw new ValidationError(`Source ${source.name} has no default location; give an input document`, 'input');
  }

  const statement = await session.run(source, context.fetcher ?? new FilePageFetcher(), location);
  logger.debug(statement.toString());

  const result: RunResult = { statement, csvFile: null, mergeFailedFile: null, ofxFile: null, upload: null };

  if (options.csv !== undefined && options.csv !== false) {
    Object.assign(result, await writeCsv(statement, options.csv, session, context));
  }
  if (options.ofx !== undefined && options.ofx !== false) {
    result.ofxFile = await writeOfx(statement, options.ofx, context);
  }

  const sink =
    context.uploadSink ??
    (options.uploadUrl !== undefined
      ? new HttpUploadSink({
          url: options.uploadUrl,
          logger,
          ...(options.uploadToken !== undefined ? { token: options.uploadToken } : {}),
        })
      : undefined);
  if (sink !== undefined) {
    const status = await sink.upload(renderOfxDocument([statement]));
    if (status.ok) {
      logger.info(`Uploaded statement (HTTP ${status.status})`);
    } else {
      logger.error(`Upload failed (HTTP ${status.status}): ${status.message}`);
    }
    result.upload = status;
  }

  return result;
}
