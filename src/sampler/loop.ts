/**
 * Fixed-interval sampling cycle
 */

import { AggregatedRows, Snapshot } from '../types/interrupts.js';
import { NumaTopology, TopologySource } from '../types/topology.js';
import { TOTALS_MODE, ViewMode, ViewState } from '../types/view.js';
import type { MonitorConfig } from '../config/schema.js';
import type { Logger } from '../logger/index.js';
import type { CounterSource } from '../hardware/counter-source.js';
import type { Display } from '../view/display.js';
import { parseInterrupts } from '../hardware/interrupts.js';
import { findUnmappedCpus } from '../hardware/numa.js';
import { aggregate, toCumulative } from '../analyzers/aggregate.js';
import { parseSortKey, rank, validateSortKey } from '../analyzers/ranking.js';
import { render } from '../view/renderer.js';
import { PendingKey } from '../input/mailbox.js';
import { resolveViewMode } from '../input/channel.js';
import { sleepInterruptible } from './sleep.js';
import { TopologyError, ErrorCode } from '../errors/index.js';

export type LoopSettings = Pick<
  MonitorConfig,
  | 'intervalMs'
  | 'iterations'
  | 'rows'
  | 'sortBy'
  | 'hideZero'
  | 'filters'
  | 'includeNonNumeric'
  | 'startNode'
  | 'overall'
  | 'sleepSliceMs'
>;

export interface SampleLoopOptions {
  settings: LoopSettings;
  topologySource: TopologySource;
  counterSource: CounterSource;
  display: Display;
  mailbox: PendingKey;
  signal: AbortSignal;
  logger: Logger;
}

export interface LoopResult {
  /** Samples taken, the baseline included */
  cycles: number;
  reason: 'completed' | 'cancelled';
}

/**
 * Drives sample → aggregate → rank → render → sleep.
 *
 * The first sample only establishes the baseline (and the optional cumulative
 * pre-pass); `iterations` counts the delta paints after it. A static
 * comparison source always yields exactly one delta paint and never sleeps.
 */
export class SampleLoop {
  private readonly settings: LoopSettings;
  private readonly topologySource: TopologySource;
  private readonly counterSource: CounterSource;
  private readonly display: Display;
  private readonly mailbox: PendingKey;
  private readonly signal: AbortSignal;
  private readonly logger: Logger;
  private view: ViewState;
  private previous: AggregatedRows = new Map();

  constructor(options: SampleLoopOptions) {
    this.settings = options.settings;
    this.topologySource = options.topologySource;
    this.counterSource = options.counterSource;
    this.display = options.display;
    this.mailbox = options.mailbox;
    this.signal = options.signal;
    this.logger = options.logger;

    this.view = {
      mode: TOTALS_MODE,
      sortKey: parseSortKey(this.settings.sortBy),
      filters: new Set(this.settings.filters),
      showZero: !this.settings.hideZero,
      rowBudget: this.settings.rows,
    };
  }

  async run(): Promise<LoopResult> {
    let topology = await this.topologySource.resolve();
    validateSortKey(this.view.sortKey, topology);
    if (this.settings.startNode >= 0) {
      this.view = { ...this.view, mode: resolveViewMode(String(this.settings.startNode), topology, this.logger) };
    }

    const deltaPaints = this.counterSource.live ? this.settings.iterations : 1;
    let cycle = 0;

    for (;;) {
      if (this.signal.aborted) {
        return { cycles: cycle, reason: 'cancelled' };
      }

      const key = this.mailbox.take();
      if (key !== undefined) {
        this.view = { ...this.view, mode: resolveViewMode(key, topology, this.logger) };
      }

      const snapshot = parseInterrupts(await this.counterSource.read(), {
        includeNonNumeric: this.settings.includeNonNumeric,
        onMalformedRow: (line, reason) => this.logger.debug('Skipping malformed counter row', { line, reason }),
      });
      topology = await this.ensureMapped(snapshot, topology);

      const rows = aggregate(snapshot, topology, this.previous);
      this.previous = rows;

      if (cycle > 0) {
        this.display.paint(render(rank(rows.values(), this.view), this.view, topology));
      } else if (this.settings.overall) {
        const cumulative = [...rows.values()].map(toCumulative);
        this.display.paint(render(rank(cumulative, this.view), this.view, topology));
      }
      cycle++;

      if (deltaPaints > 0 && cycle > deltaPaints) {
        return { cycles: cycle, reason: 'completed' };
      }
      if (!this.counterSource.live) {
        continue;
      }
      if (!(await sleepInterruptible(this.settings.intervalMs, this.signal, this.settings.sleepSliceMs))) {
        return { cycles: cycle, reason: 'cancelled' };
      }
    }
  }

  getViewMode(): ViewMode {
    return this.view.mode;
  }

  /**
   * Re-resolve the topology when the header names CPUs it does not map (hotplug)
   */
  private async ensureMapped(snapshot: Snapshot, topology: NumaTopology): Promise<NumaTopology> {
    if (findUnmappedCpus(snapshot.cpus, topology).length === 0) {
      return topology;
    }

    this.logger.info('Unmapped CPUs in counter header; re-resolving NUMA topology');
    const refreshed = await this.topologySource.resolve();
    const unmapped = findUnmappedCpus(snapshot.cpus, refreshed);
    if (unmapped.length > 0) {
      throw new TopologyError(
        `CPUs ${unmapped.join(', ')} belong to no NUMA node`,
        ErrorCode.TOPOLOGY_UNMAPPED_CPU,
        { cpus: unmapped }
      );
    }

    if (this.view.mode.kind === 'node' && !refreshed.nodeToCpus.has(this.view.mode.node)) {
      this.view = { ...this.view, mode: TOTALS_MODE };
    }
    return refreshed;
  }
}
