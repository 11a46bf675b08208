import type { Config } from './schema.js';

/**
 * Default configuration values
 * Used when no config file, environment variable or command-line option overrides them
 */
export const defaultConfig: Config = {
  monitor: {
    intervalMs: 1000,
    iterations: 0,
    rows: 0,
    sortBy: 'totals',
    hideZero: false,
    filters: [],
    includeNonNumeric: false,
    startNode: -1,
    overall: false,
    batch: false,
    sleepSliceMs: 100,
  },
  sources: {
    interruptsFile: undefined,
    compareFile: undefined,
    topologyFile: undefined,
    topologyCommand: 'numactl --hardware',
  },
  logging: {
    level: 'warn',
    format: 'simple',
    console: true,
    dir: undefined,
    maxFiles: 5,
    maxSize: '10m',
  },
};

/** Counter file read when no interrupts file is configured */
export const DEFAULT_INTERRUPTS_FILE = '/proc/interrupts';
