import type { Logger } from '../logger/index.js';
import { toError } from '../errors/index.js';

/**
 * Session lifecycle manager
 * Turns termination signals into a cooperative abort and runs restore hooks exactly once
 */

export interface LifecycleHook {
  name: string;
  handler: () => void | Promise<void>;
}

export class LifecycleManager {
  private logger: Logger;
  private controller: AbortController;
  private shutdownHooks: LifecycleHook[] = [];
  private isShuttingDown = false;
  private installed: Array<{ event: NodeJS.Signals; listener: () => void }> = [];

  constructor(logger: Logger, controller: AbortController) {
    this.logger = logger;
    this.controller = controller;
  }

  /**
   * Register a shutdown hook
   */
  onShutdown(name: string, handler: () => void | Promise<void>): void {
    this.shutdownHooks.push({ name, handler });
  }

  /**
   * Abort the sampling loop on SIGINT, SIGTERM and SIGHUP
   */
  installSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

    for (const signal of signals) {
      const listener = (): void => {
        this.logger.info(`Received ${signal}, stopping`);
        this.controller.abort();
      };
      process.on(signal, listener);
      this.installed.push({ event: signal, listener });
    }
  }

  /**
   * Execute all shutdown hooks in reverse order; later calls are no-ops
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    for (const { event, listener } of this.installed) {
      process.off(event, listener);
    }
    this.installed = [];

    const hooks = [...this.shutdownHooks].reverse();
    for (const hook of hooks) {
      try {
        this.logger.debug(`Executing shutdown hook: ${hook.name}`);
        await hook.handler();
      } catch (error) {
        // Later hooks still run so the terminal is always restored
        this.logger.error(`Shutdown hook failed: ${hook.name}`, toError(error));
      }
    }
  }

  isShuttingDownStatus(): boolean {
    return this.isShuttingDown;
  }
}
