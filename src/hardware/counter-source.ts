/**
 * Interrupt counter sources: the live kernel file, or a fixed pair of files to compare
 */

import * as fs from 'fs/promises';
import { CounterSourceError, ConfigurationError, ErrorCode, errnoCode, toError } from '../errors/index.js';
import { DEFAULT_INTERRUPTS_FILE } from '../config/defaults.js';
import type { SourcesConfig } from '../config/schema.js';

export interface CounterSource {
  /** False for static sources, which are never polled or slept on */
  readonly live: boolean;
  read(): Promise<string>;
}

/**
 * Read a counter file. Any failure is fatal: skipping a sample would corrupt the delta baseline.
 */
export async function readCounterFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error) {
    const code = errnoCode(error);
    const reason =
      code === 'ENOENT'
        ? 'file not found'
        : code === 'EACCES'
          ? 'permission denied'
          : toError(error).message;
    throw new CounterSourceError(
      `cannot read interrupt counters from ${path}: ${reason}`,
      ErrorCode.COUNTER_SOURCE_UNREADABLE,
      { path, code },
      toError(error)
    );
  }
}

/**
 * Re-reads the same file every cycle
 */
export class FileCounterSource implements CounterSource {
  readonly live = true;
  private readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  read(): Promise<string> {
    return readCounterFile(this.path);
  }
}

/**
 * Yields the baseline file, then the file compared against it
 */
export class ComparisonCounterSource implements CounterSource {
  readonly live = false;
  private readonly paths: [string, string];
  private reads = 0;

  constructor(baselinePath: string, comparePath: string) {
    this.paths = [baselinePath, comparePath];
  }

  read(): Promise<string> {
    const path = this.paths[this.reads];
    if (path === undefined) {
      return Promise.reject(
        new CounterSourceError(
          'comparison source holds only two samples',
          ErrorCode.COUNTER_SOURCE_UNREADABLE
        )
      );
    }
    this.reads++;
    return readCounterFile(path);
  }
}

/**
 * Live file polling, or a two-sample comparison when a compare file is configured
 */
export function createCounterSource(sources: Pick<SourcesConfig, 'interruptsFile' | 'compareFile'>): CounterSource {
  if (sources.compareFile === undefined) {
    return new FileCounterSource(sources.interruptsFile ?? DEFAULT_INTERRUPTS_FILE);
  }
  if (sources.interruptsFile === undefined) {
    throw new ConfigurationError('a comparison file requires an interrupts file to compare against', {
      compareFile: sources.compareFile,
    });
  }
  return new ComparisonCounterSource(sources.interruptsFile, sources.compareFile);
}
