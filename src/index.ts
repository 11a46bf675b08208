#!/usr/bin/env node

/**
 * numa-irq-top - Entry Point
 * Interactive per-NUMA-node monitor for hardware interrupt counters
 */

import { CommanderError } from 'commander';
import { getConfig, type ConfigOverrides } from './config/index.js';
import { getLogger } from './logger/index.js';
import { parseOptions } from './cli/options.js';
import { LifecycleManager } from './lifecycle/index.js';
import { TopologyResolver } from './hardware/numa.js';
import { createCounterSource } from './hardware/counter-source.js';
import { TerminalDisplay, type TableOutput } from './view/display.js';
import { PendingKey } from './input/mailbox.js';
import { InputChannel, type KeyInput } from './input/channel.js';
import { SampleLoop } from './sampler/loop.js';
import { toError } from './errors/index.js';

/**
 * Run one monitoring session and resolve to the exit code.
 * The screen is repainted and keys are read only when both ends are terminals.
 */
export async function main(
  args: readonly string[] = process.argv.slice(2),
  input: KeyInput = process.stdin,
  output: TableOutput = process.stdout
): Promise<number> {
  let overrides: ConfigOverrides;
  try {
    overrides = parseOptions(args);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander already printed help, the version or the usage error
      return error.exitCode;
    }
    throw error;
  }

  const config = getConfig(overrides);
  const logger = getLogger(config.logging);

  const controller = new AbortController();
  const lifecycle = new LifecycleManager(logger, controller);
  const mailbox = new PendingKey();
  const counterSource = createCounterSource(config.sources);

  const interactive =
    !config.monitor.batch && counterSource.live && input.isTTY === true && output.isTTY === true;
  const display = new TerminalDisplay(output, interactive);

  const loop = new SampleLoop({
    settings: config.monitor,
    topologySource: new TopologyResolver(config.sources, logger),
    counterSource,
    display,
    mailbox,
    signal: controller.signal,
    logger: logger.child({ component: 'sampler' }),
  });

  lifecycle.installSignalHandlers();
  if (interactive) {
    const channel = new InputChannel(input, mailbox, controller);
    lifecycle.onShutdown('restore terminal', () => channel.stop());
    channel.start();
  }

  try {
    const result = await loop.run();
    logger.info('Sampling finished', { ...result });
    return 0;
  } finally {
    await lifecycle.shutdown();
  }
}

if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      process.stderr.write(`numa-irq-top: ${toError(error).message}\n`);
      process.exit(1);
    });
}
