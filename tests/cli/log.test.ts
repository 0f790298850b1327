import { describe, it, expect } from 'vitest';
import { createLogger, logLevelFromFlags } from '../../apps/cli/src/log.js';

describe('createLogger', () => {
  it('should prefix each line with its level', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', (line) => lines.push(line));

    logger.error('boom');
    logger.debug('details');

    expect(lines).toEqual(['[ERROR] boom', '[DEBUG] details']);
  });

  it('should drop messages below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => lines.push(line));

    logger.info('fetching');
    logger.debug('details');
    logger.warn('merge failed');

    expect(lines).toEqual(['[WARN] merge failed']);
  });
});

describe('logLevelFromFlags', () => {
  it('should default to warn', () => {
    expect(logLevelFromFlags({ quiet: false, verbose: false, debug: false })).toBe('warn');
  });

  it('should let debug win over verbose and quiet', () => {
    expect(logLevelFromFlags({ quiet: true, verbose: true, debug: true })).toBe('debug');
    expect(logLevelFromFlags({ quiet: false, verbose: true, debug: false })).toBe('info');
    expect(logLevelFromFlags({ quiet: true, verbose: false, debug: false })).toBe('error');
  });
});
