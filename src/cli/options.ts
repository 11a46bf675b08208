/**
 * Command-line options, mapped onto configuration overrides
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { LogLevelSchema, type ConfigOverrides } from '../config/schema.js';

interface CliOptions {
  interval?: number;
  iterations?: number;
  rows?: number;
  sort?: string;
  hideZero?: boolean;
  filter?: string[];
  all?: boolean;
  node?: number;
  overall?: boolean;
  batch?: boolean;
  interrupts?: string;
  compare?: string;
  topology?: string;
  topologyCommand?: string;
  logLevel?: string;
  logDir?: string;
}

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parseInt(value, 10);
}

export function createProgram(): Command {
  return new Command()
    .name('numa-irq-top')
    .description('Per-NUMA-node view of hardware interrupt activity')
    .option('-i, --interval <ms>', 'sampling interval in milliseconds', parseInteger)
    .option('-n, --iterations <count>', 'number of delta updates before exiting (0 = forever)', parseInteger)
    .option('-r, --rows <count>', 'maximum rows to show (0 = all)', parseInteger)
    .option('-s, --sort <key>', 'sort by "totals", "irq-number", "name" or a node id')
    .option('-z, --hide-zero', 'hide rows without activity in the current view')
    .option('-f, --filter <substring...>', 'only show rows whose name contains one of these')
    .option('-a, --all', 'include non-numeric rows such as NMI and LOC')
    .option('-N, --node <id>', 'start in the per-CPU view of this node', parseInteger)
    .option('-o, --overall', 'show counts since boot before the first update')
    .option('-b, --batch', 'append tables instead of repainting; ignore the keyboard')
    .option('--interrupts <file>', 'read counters from this file instead of /proc/interrupts')
    .option('--compare <file>', 'compare --interrupts against this file once and exit')
    .option('--topology <file>', 'read "node <id> cpus: ..." lines from this file')
    .option('--topology-command <command>', 'command printing the NUMA topology')
    .addOption(new Option('--log-level <level>', 'log level').choices(LogLevelSchema.options))
    .option('--log-dir <dir>', 'also write logs to this directory')
    .exitOverride();
}

/**
 * Parse user arguments (without the node and script entries)
 */
export function parseOptions(args: readonly string[]): ConfigOverrides {
  const program = createProgram();
  program.parse([...args], { from: 'user' });
  const opts = program.opts<CliOptions>();

  return {
    monitor: {
      intervalMs: opts.interval,
      iterations: opts.iterations,
      rows: opts.rows,
      sortBy: opts.sort,
      hideZero: opts.hideZero,
      filters: opts.filter,
      includeNonNumeric: opts.all,
      startNode: opts.node,
      overall: opts.overall,
      batch: opts.batch,
    },
    sources: {
      interruptsFile: opts.interrupts,
      compareFile: opts.compare,
      topologyFile: opts.topology,
      topologyCommand: opts.topologyCommand,
    },
    logging: {
      level: opts.logLevel === undefined ? undefined : LogLevelSchema.parse(opts.logLevel),
      dir: opts.logDir,
    },
  };
}
