#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { LEDGERJOB_VERSION } from '@ledgerjob/types';
import { createLogger, logLevelFromFlags } from './log.js';
import { run } from './runner.js';

const program = new Command();

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

/** `--csv` / `--ofx` take an optional path; the env var stands in for a missing flag. */
const envOutput = (key: string): string | undefined => {
  const val = process.env[key];
  return val === undefined || val === '' ? undefined : val;
};

interface CliOptions {
  source?: string;
  sourceArgs?: string;
  profile?: string;
  input?: string;
  csv?: string | boolean;
  ofx?: string | boolean;
  upload?: string;
  verbose: boolean;
  debug: boolean;
  quiet: boolean;
}

program
  .name('ledgerjob')
  .description('Extract bank statements into a deduplicated ledger, written as CSV and OFX')
  .version(LEDGERJOB_VERSION)
  .option('-s, --source <name>', 'Registered extraction source', process.env['LEDGERJOB_SOURCE'])
  .option('--source-args <args>', 'Space-separated arguments for the source', process.env['LEDGERJOB_SOURCE_ARGS'])
  .option('-p, --profile <file>', 'Source profile JSON (delimited export layout, account, rules)', process.env['LEDGERJOB_PROFILE'])
  .option('-i, --input <file>', 'Local document to extract from', process.env['LEDGERJOB_INPUT'])
  .option('--csv [file|dir]', 'Write CSV; merges into an existing file (default: stdout)', envOutput('LEDGERJOB_CSV'))
  .option('--ofx [file|dir]', 'Write OFX (default: stdout)', envOutput('LEDGERJOB_OFX'))
  .option('--upload <url>', 'POST the OFX document to this URL (token from LEDGERJOB_UPLOAD_TOKEN)', process.env['LEDGERJOB_UPLOAD_URL'])
  .option('-v, --verbose', 'Log progress', envBool('LEDGERJOB_VERBOSE', false))
  .option('--debug', 'Log everything, with stack traces on failure', envBool('LEDGERJOB_DEBUG', false))
  .option('-q, --quiet', 'Only log errors', envBool('LEDGERJOB_QUIET', false))
  .action(async (options: CliOptions) => {
    const logger = createLogger(logLevelFromFlags(options));
    try {
      const sourceArgs = options.sourceArgs?.split(/\s+/).filter((arg) => arg !== '');
      const uploadToken = process.env['LEDGERJOB_UPLOAD_TOKEN'];
      await run(
        {
          ...(options.source !== undefined ? { source: options.source } : {}),
          ...(sourceArgs !== undefined ? { sourceArgs } : {}),
          ...(options.profile !== undefined ? { profile: options.profile } : {}),
          ...(options.input !== undefined ? { input: options.input } : {}),
          ...(options.csv !== undefined ? { csv: options.csv } : {}),
          ...(options.ofx !== undefined ? { ofx: options.ofx } : {}),
          ...(options.upload !== undefined ? { uploadUrl: options.upload } : {}),
          ...(uploadToken !== undefined && uploadToken !== '' ? { uploadToken } : {}),
        },
        { logger }
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.debug && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

await program.parseAsync();
