/**
 * Unit tests for the sampling cycle
 */

import { describe, it, expect, jest } from '@jest/globals';
import { SampleLoop, LoopSettings, SampleLoopOptions } from './loop.js';
import { PendingKey } from '../input/mailbox.js';
import { ConfigurationError, CounterSourceError, ErrorCode } from '../errors/index.js';
import {
  RecordingDisplay,
  createTestLogger,
  createTopology,
  interruptsText,
} from '../__tests__/utils.js';
import type { CounterSource } from '../hardware/counter-source.js';
import type { NumaTopology, TopologySource } from '../types/topology.js';

/**
 * Counter source replaying fixed samples; the last one repeats
 */
class ScriptedCounterSource implements CounterSource {
  readonly live: boolean;
  reads = 0;
  private readonly samples: string[];
  private readonly onRead?: (index: number) => void;

  constructor(samples: string[], live = true, onRead?: (index: number) => void) {
    this.samples = samples;
    this.live = live;
    this.onRead = onRead;
  }

  read(): Promise<string> {
    const sample = this.samples[Math.min(this.reads, this.samples.length - 1)] ?? '';
    this.onRead?.(this.reads);
    this.reads++;
    return Promise.resolve(sample);
  }
}

function topologySource(...topologies: NumaTopology[]): TopologySource & {
  resolve: jest.Mock<() => Promise<NumaTopology>>;
} {
  const resolve = jest.fn<() => Promise<NumaTopology>>();
  for (const topology of topologies) {
    resolve.mockResolvedValueOnce(topology);
  }
  return { resolve };
}

const CPUS = [0, 1, 2, 3];
const TWO_NODES = createTopology({ 0: [0, 1], 1: [2, 3] });

const settings: LoopSettings = {
  intervalMs: 5,
  iterations: 1,
  rows: 0,
  sortBy: 'totals',
  hideZero: false,
  filters: [],
  includeNonNumeric: false,
  startNode: -1,
  overall: false,
  sleepSliceMs: 5,
};

function createLoop(overrides: Partial<SampleLoopOptions> & { counterSource: CounterSource }): {
  loop: SampleLoop;
  display: RecordingDisplay;
} {
  const display = new RecordingDisplay();
  const loop = new SampleLoop({
    settings,
    topologySource: topologySource(TWO_NODES),
    display,
    mailbox: new PendingKey(),
    signal: new AbortController().signal,
    logger: createTestLogger(),
    ...overrides,
  });
  return { loop, display };
}

const sample = (counts: number[], label = 'eth0'): string => interruptsText(CPUS, [['16', counts, label]]);

describe('SampleLoop', () => {
  it('should paint interval deltas per node after the baseline', async () => {
    const counterSource = new ScriptedCounterSource([sample([100, 50, 0, 0]), sample([110, 60, 0, 0])]);
    const { loop, display } = createLoop({ counterSource });

    const result = await loop.run();

    expect(result).toEqual({ cycles: 2, reason: 'completed' });
    expect(display.frames).toEqual([['IRQ TOTAL NODE0 NODE1 NAME', ' 16    20    20     0 eth0']]);
  });

  it('should paint counts since boot first when overall is set', async () => {
    const counterSource = new ScriptedCounterSource([sample([100, 50, 0, 0]), sample([110, 60, 0, 0])]);
    const { loop, display } = createLoop({ counterSource, settings: { ...settings, overall: true } });

    await loop.run();

    expect(display.frames).toEqual([
      ['IRQ TOTAL NODE0 NODE1 NAME', ' 16   150   150     0 eth0'],
      ['IRQ TOTAL NODE0 NODE1 NAME', ' 16    20    20     0 eth0'],
    ]);
  });

  it('should run exactly two cycles for a comparison source', async () => {
    const counterSource = new ScriptedCounterSource([sample([1, 0, 0, 0]), sample([4, 0, 0, 0])], false);
    const { loop, display } = createLoop({
      counterSource,
      settings: { ...settings, iterations: 0, intervalMs: 60_000 },
    });

    const result = await loop.run();

    expect(result).toEqual({ cycles: 2, reason: 'completed' });
    expect(counterSource.reads).toBe(2);
    expect(display.frames).toHaveLength(1);
  });

  it('should apply a pending key at the start of the next cycle', async () => {
    const mailbox = new PendingKey();
    const counterSource = new ScriptedCounterSource(
      [sample([100, 50, 0, 0]), sample([110, 60, 0, 0]), sample([111, 60, 0, 5])],
      true,
      index => {
        if (index === 1) mailbox.put('0');
      }
    );
    const { loop, display } = createLoop({
      counterSource,
      mailbox,
      settings: { ...settings, iterations: 2 },
    });

    await loop.run();

    expect(display.frames[0]?.[0]).toBe('IRQ TOTAL NODE0 NODE1 NAME');
    expect(display.frames[1]).toEqual([
      'IRQ TOTAL NODE0  CPU0  CPU1 NAME',
      ' 16     6     1     1     0 eth0',
    ]);
    expect(loop.getViewMode()).toEqual({ kind: 'node', node: 0 });
  });

  it('should fall back to Totals for a key naming a missing node', async () => {
    const mailbox = new PendingKey();
    mailbox.put('9');
    const counterSource = new ScriptedCounterSource([sample([1, 0, 0, 0])]);
    const { loop } = createLoop({
      counterSource,
      mailbox,
      settings: { ...settings, startNode: 1 },
    });

    await loop.run();

    expect(loop.getViewMode()).toEqual({ kind: 'totals' });
  });

  it('should start in the configured node view', async () => {
    const counterSource = new ScriptedCounterSource([sample([0, 0, 0, 0]), sample([0, 0, 2, 1])]);
    const { loop, display } = createLoop({ counterSource, settings: { ...settings, startNode: 1 } });

    await loop.run();

    expect(display.frames).toEqual([
      ['IRQ TOTAL NODE1  CPU2  CPU3 NAME', ' 16     3     3     2     1 eth0'],
    ]);
  });

  it('should stop at the next safe point once cancelled', async () => {
    const controller = new AbortController();
    const counterSource = new ScriptedCounterSource([sample([1, 0, 0, 0])]);
    const display = new RecordingDisplay();
    const loop = new SampleLoop({
      settings: { ...settings, iterations: 0, overall: true, intervalMs: 60_000, sleepSliceMs: 10 },
      topologySource: topologySource(TWO_NODES),
      counterSource,
      display: {
        paint: lines => {
          display.paint(lines);
          controller.abort();
        },
      },
      mailbox: new PendingKey(),
      signal: controller.signal,
      logger: createTestLogger(),
    });

    const result = await loop.run();

    expect(result).toEqual({ cycles: 1, reason: 'cancelled' });
    expect(display.frames).toHaveLength(1);
  });

  it('should re-resolve the topology when new CPUs appear', async () => {
    const source = topologySource(createTopology({ 0: [0, 1] }), createTopology({ 0: [0, 1], 1: [2] }));
    const counterSource = new ScriptedCounterSource([
      interruptsText([0, 1], [['16', [1, 1], 'eth0']]),
      interruptsText([0, 1, 2], [['16', [2, 2, 4], 'eth0']]),
    ]);
    const { loop, display } = createLoop({ counterSource, topologySource: source });

    await loop.run();

    expect(source.resolve).toHaveBeenCalledTimes(2);
    expect(display.frames).toEqual([['IRQ TOTAL NODE0 NODE1 NAME', ' 16     6     2     4 eth0']]);
  });

  it('should fail when a CPU still has no node after re-resolving', async () => {
    const narrow = createTopology({ 0: [0, 1] });
    const counterSource = new ScriptedCounterSource([sample([1, 1, 1, 1])]);
    const { loop } = createLoop({ counterSource, topologySource: topologySource(narrow, narrow) });

    await expect(loop.run()).rejects.toMatchObject({
      code: ErrorCode.TOPOLOGY_UNMAPPED_CPU,
      message: 'CPUs 2, 3 belong to no NUMA node',
    });
  });

  it('should reject an invalid sort key before sampling', () => {
    const counterSource = new ScriptedCounterSource([sample([1, 0, 0, 0])]);

    expect(() => createLoop({ counterSource, settings: { ...settings, sortBy: 'cpu' } })).toThrow(
      ConfigurationError
    );
    expect(counterSource.reads).toBe(0);
  });

  it('should reject a node sort key the topology lacks', async () => {
    const counterSource = new ScriptedCounterSource([sample([1, 0, 0, 0])]);
    const { loop } = createLoop({ counterSource, settings: { ...settings, sortBy: '5' } });

    await expect(loop.run()).rejects.toThrow('Invalid sort key: node 5 does not exist');
    expect(counterSource.reads).toBe(0);
  });

  it('should stop on a counter source failure', async () => {
    const failing: CounterSource = {
      live: true,
      read: () =>
        Promise.reject(
          new CounterSourceError(
            'cannot read interrupt counters from /proc/interrupts: permission denied',
            ErrorCode.COUNTER_SOURCE_UNREADABLE
          )
        ),
    };
    const { loop, display } = createLoop({ counterSource: failing });

    await expect(loop.run()).rejects.toBeInstanceOf(CounterSourceError);
    expect(display.frames).toHaveLength(0);
  });
});
