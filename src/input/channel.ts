/**
 * Single-key view switching
 */

import { PendingKey } from './mailbox.js';
import { NumaTopology } from '../types/topology.js';
import { TOTALS_MODE, ViewMode } from '../types/view.js';
import type { Logger } from '../logger/index.js';

const ACCEPTED_KEY = /^[0-9t]$/;

/**
 * The parts of a readable TTY the channel needs; process.stdin satisfies it
 */
export interface KeyInput {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export function isAcceptedKey(key: string): boolean {
  return ACCEPTED_KEY.test(key);
}

/**
 * Map an accepted key to a view mode. `t` and digits naming no node both mean Totals.
 */
export function resolveViewMode(key: string, topology: NumaTopology, logger?: Logger): ViewMode {
  if (key === 't') {
    return TOTALS_MODE;
  }

  const node = parseInt(key, 10);
  if (!isNaN(node) && topology.nodeToCpus.has(node)) {
    return { kind: 'node', node };
  }

  logger?.info(`No NUMA node ${key}; showing totals`, { key });
  return TOTALS_MODE;
}

/**
 * Listens for keystrokes while the loop runs. Accepted keys land in the
 * mailbox; any other key aborts the controller, which the loop treats as quit.
 */
export class InputChannel {
  private readonly input: KeyInput;
  private readonly mailbox: PendingKey;
  private readonly controller: AbortController;
  private rawModeSet = false;
  private listening = false;

  constructor(input: KeyInput, mailbox: PendingKey, controller: AbortController) {
    this.input = input;
    this.mailbox = mailbox;
    this.controller = controller;
  }

  start(): void {
    if (this.listening) return;

    if (this.input.isTTY && this.input.setRawMode && this.input.isRaw !== true) {
      this.input.setRawMode(true);
      this.rawModeSet = true;
    }
    this.input.on('data', this.onData);
    this.input.resume();
    this.listening = true;
  }

  /**
   * Stop listening and hand the terminal back in the mode it was found in. Safe to call twice.
   */
  stop(): void {
    if (this.listening) {
      this.input.off('data', this.onData);
      this.input.pause();
      this.listening = false;
    }
    if (this.rawModeSet) {
      this.input.setRawMode?.(false);
      this.rawModeSet = false;
    }
  }

  private readonly onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    for (const key of text) {
      if (!isAcceptedKey(key)) {
        this.controller.abort();
        return;
      }
      this.mailbox.put(key);
    }
  };
}
