/**
 * Unit tests for the logger
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { Writable } from 'stream';
import winston from 'winston';
import { Logger, getLogger, parseLogSize, resetLogger } from './index.js';
import { ConfigurationError } from '../errors/index.js';
import type { LogLevel } from '../config/schema.js';

function captureJson(level: LogLevel): { logger: Logger; entries: () => Promise<Array<Record<string, unknown>>> } {
  const logger = new Logger({ level, format: 'json', console: false, maxFiles: 1, maxSize: '1m' });
  const lines: string[] = [];

  logger.winston.silent = false;
  logger.winston.add(
    new winston.transports.Stream({
      stream: new Writable({
        write(chunk: Buffer, _encoding, callback) {
          lines.push(chunk.toString());
          callback();
        },
      }),
    })
  );

  return {
    logger,
    entries: async () => {
      await new Promise(resolve => setImmediate(resolve));
      return lines.map(line => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
      });
    },
  };
}

describe('parseLogSize', () => {
  it('should convert unit suffixes to bytes', () => {
    expect(parseLogSize('512b')).toBe(512);
    expect(parseLogSize('4k')).toBe(4096);
    expect(parseLogSize('10M')).toBe(10 * 1024 * 1024);
    expect(parseLogSize('1g')).toBe(1024 * 1024 * 1024);
  });

  it('should fall back to 10 MiB', () => {
    expect(parseLogSize('huge')).toBe(10 * 1024 * 1024);
  });
});

describe('Logger', () => {
  afterEach(() => {
    resetLogger();
  });

  it('should drop entries below the configured level', async () => {
    const { logger, entries } = captureJson('warn');

    logger.info('Resolved NUMA topology');
    logger.warn('Unmapped CPUs');

    const logged = await entries();
    expect(logged.map(entry => entry['message'])).toEqual(['Unmapped CPUs']);
  });

  it('should attach error code and severity', async () => {
    const { logger, entries } = captureJson('debug');

    logger.error('Shutdown hook failed: restore terminal', new ConfigurationError('bad'), { attempt: 1 });

    const [entry] = await entries();
    expect(entry?.['attempt']).toBe(1);
    expect(entry?.['error']).toMatchObject({ message: 'bad', code: 1001, severity: 'high' });
  });

  it('should tag child logger entries', async () => {
    const { logger, entries } = captureJson('debug');

    logger.child({ component: 'sampler' }).debug('Skipping malformed counter row');

    const [entry] = await entries();
    expect(entry).toMatchObject({ component: 'sampler', level: 'debug', message: 'Skipping malformed counter row' });
  });

  it('should require a config for the first getLogger call', () => {
    expect(() => getLogger()).toThrow('Logger not initialized');

    const logger = getLogger({ level: 'warn', format: 'simple', console: false, maxFiles: 1, maxSize: '1m' });
    expect(getLogger()).toBe(logger);
  });
});
