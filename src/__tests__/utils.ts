/**
 * Test utilities and helper functions
 */

import { jest } from '@jest/globals';
import { EventEmitter } from 'events';
import { Logger } from '../logger/index.js';
import { parseNumaTopology } from '../hardware/numa.js';
import type { NumaTopology } from '../types/topology.js';
import type { ViewState } from '../types/view.js';
import type { Display, TableOutput } from '../view/display.js';
import type { KeyInput } from '../input/channel.js';

/**
 * Logger with no transports
 */
export function createTestLogger(): Logger {
  return new Logger({
    level: 'error',
    format: 'simple',
    console: false,
    maxFiles: 1,
    maxSize: '1m',
  });
}

/**
 * Build a topology from node → CPU lists
 */
export function createTopology(nodes: Record<number, number[]>): NumaTopology {
  const text = Object.entries(nodes)
    .map(([node, cpus]) => `node ${node} cpus: ${cpus.join(' ')}`)
    .join('\n');
  return parseNumaTopology(text);
}

/**
 * Render an /proc/interrupts-style table
 */
export function interruptsText(cpus: number[], rows: Array<[string, number[], string]>): string {
  const header = cpus.map(cpu => `CPU${cpu}`.padStart(11)).join('');
  const body = rows.map(
    ([id, counts, label]) =>
      `${`${id}:`.padStart(4)}${counts.map(c => String(c).padStart(11)).join('')}   ${label}`
  );
  return [`     ${header}`, ...body, ''].join('\n');
}

export function createView(overrides: Partial<ViewState> = {}): ViewState {
  return {
    mode: { kind: 'totals' },
    sortKey: { kind: 'totals' },
    filters: new Set(),
    showZero: true,
    rowBudget: 0,
    ...overrides,
  };
}

/**
 * Display that keeps every painted table
 */
export class RecordingDisplay implements Display {
  readonly frames: string[][] = [];

  paint(lines: readonly string[]): void {
    this.frames.push([...lines]);
  }
}

/**
 * In-process stand-in for a TTY stdin
 */
export class FakeTerminal extends EventEmitter implements KeyInput {
  isTTY = true;
  isRaw = false;
  paused = true;
  setRawMode = jest.fn((mode: boolean) => {
    this.isRaw = mode;
  });

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }

  type(text: string): void {
    this.emit('data', Buffer.from(text, 'utf8'));
  }
}

/**
 * Stdout stand-in keeping every write; `onWrite` sees the running count
 */
export class CapturingOutput implements TableOutput {
  readonly isTTY: boolean;
  readonly chunks: string[] = [];
  onWrite?: (count: number) => void;

  constructor(isTTY = true) {
    this.isTTY = isTTY;
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    this.onWrite?.(this.chunks.length);
    return true;
  }
}
