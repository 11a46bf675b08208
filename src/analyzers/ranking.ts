/**
 * Row ordering, filtering and truncation
 */

import { AggregatedRow } from '../types/interrupts.js';
import { NumaTopology } from '../types/topology.js';
import { SortKey, ViewMode, ViewState } from '../types/view.js';
import { ConfigurationError } from '../errors/index.js';
import { nodeDelta, totalDelta } from './aggregate.js';

/**
 * Turn a configured sort key into its typed form
 */
export function parseSortKey(raw: string): SortKey {
  switch (raw) {
    case 'totals':
      return { kind: 'totals' };
    case 'irq-number':
      return { kind: 'irq-number' };
    case 'name':
      return { kind: 'name' };
    default:
      if (/^\d+$/.test(raw)) {
        return { kind: 'node', node: parseInt(raw, 10) };
      }
      throw new ConfigurationError(`Invalid sort key: ${raw}`, { sortKey: raw });
  }
}

/**
 * A node sort key must name a node the topology knows about
 */
export function validateSortKey(key: SortKey, topology: NumaTopology): void {
  if (key.kind === 'node' && !topology.nodeToCpus.has(key.node)) {
    throw new ConfigurationError(`Invalid sort key: node ${key.node} does not exist`, {
      sortKey: key.node,
      nodes: [...topology.nodeToCpus.keys()],
    });
  }
}

/**
 * Larger delta first
 */
function descending(a: bigint, b: bigint): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

function irqNumber(row: AggregatedRow): number {
  return /^\d+$/.test(row.id) ? parseInt(row.id, 10) : Number.POSITIVE_INFINITY;
}

/**
 * Comparator for a sort key. Count keys sort descending, irq-number and name ascending.
 */
export function compareRows(key: SortKey): (a: AggregatedRow, b: AggregatedRow) => number {
  switch (key.kind) {
    case 'node':
      return (a, b) => descending(nodeDelta(a, key.node), nodeDelta(b, key.node));
    case 'totals':
      return (a, b) => descending(totalDelta(a), totalDelta(b));
    case 'irq-number':
      return (a, b) => {
        const left = irqNumber(a);
        const right = irqNumber(b);
        if (left === right) return 0;
        return left < right ? -1 : 1;
      };
    case 'name':
      return (a, b) => {
        if (a.label === b.label) return 0;
        return a.label < b.label ? -1 : 1;
      };
  }
}

/**
 * Delta that decides whether a row counts as active in the given mode
 */
export function relevantDelta(row: AggregatedRow, mode: ViewMode): bigint {
  return mode.kind === 'node' ? nodeDelta(row, mode.node) : totalDelta(row);
}

export function matchesFilters(row: AggregatedRow, filters: ReadonlySet<string>): boolean {
  if (filters.size === 0) return true;
  for (const filter of filters) {
    if (row.label.includes(filter)) return true;
  }
  return false;
}

/**
 * Stable sort, then name filters, then the zero-activity filter, then the row budget
 */
export function rank(rows: Iterable<AggregatedRow>, view: ViewState): AggregatedRow[] {
  const ranked = [...rows]
    .sort(compareRows(view.sortKey))
    .filter(row => matchesFilters(row, view.filters))
    .filter(row => view.showZero || relevantDelta(row, view.mode) !== 0n);

  return view.rowBudget > 0 ? ranked.slice(0, view.rowBudget) : ranked;
}
