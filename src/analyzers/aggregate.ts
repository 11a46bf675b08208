/**
 * Interrupt aggregation: per-node sums and interval deltas
 */

import { AggregatedRow, AggregatedRows, Snapshot } from '../types/interrupts.js';
import { NumaTopology } from '../types/topology.js';

function sum(values: readonly bigint[]): bigint {
  return values.reduce((acc, value) => acc + value, 0n);
}

/**
 * Sum per-CPU counts into one bucket per topology node.
 * Every node gets an entry; CPUs without a node only count toward the total.
 */
export function sumByNode(
  cpus: readonly number[],
  counts: readonly bigint[],
  topology: NumaTopology
): Map<number, bigint> {
  const perNode = new Map<number, bigint>();
  for (const node of topology.nodeToCpus.keys()) {
    perNode.set(node, 0n);
  }

  cpus.forEach((cpu, index) => {
    const node = topology.cpuToNode.get(cpu);
    if (node === undefined) return;
    perNode.set(node, (perNode.get(node) ?? 0n) + (counts[index] ?? 0n));
  });

  return perNode;
}

/**
 * Counts of a previous row realigned to a (possibly different) CPU order
 */
function alignPrevious(cpus: readonly number[], previous: AggregatedRow | undefined): bigint[] {
  if (!previous) {
    return cpus.map(() => 0n);
  }

  const byCpu = new Map<number, bigint>();
  previous.cpus.forEach((cpu, index) => {
    byCpu.set(cpu, previous.perCpuCurrent[index] ?? 0n);
  });
  return cpus.map(cpu => byCpu.get(cpu) ?? 0n);
}

/**
 * The previous row's node sums, with a zero entry for any node it lacks
 */
function carryNodes(previous: AggregatedRow | undefined, topology: NumaTopology): Map<number, bigint> {
  const perNode = new Map<number, bigint>();
  for (const node of topology.nodeToCpus.keys()) {
    perNode.set(node, previous?.perNodeCurrent.get(node) ?? 0n);
  }
  return perNode;
}

/**
 * Combine a fresh snapshot with the previous cycle's rows.
 *
 * Pure: the returned map replaces `previous` wholesale, so rows missing from
 * the snapshot disappear and rows new to it start from a zero baseline.
 */
export function aggregate(
  snapshot: Snapshot,
  topology: NumaTopology,
  previous: ReadonlyMap<string, AggregatedRow>
): AggregatedRows {
  const rows: AggregatedRows = new Map();

  for (const row of snapshot.rows) {
    const prior = previous.get(row.id);
    const perCpuCurrent = [...row.counts];
    const perCpuPrevious = alignPrevious(snapshot.cpus, prior);

    rows.set(row.id, {
      id: row.id,
      label: row.label,
      cpus: [...snapshot.cpus],
      perCpuCurrent,
      perCpuPrevious,
      totalCurrent: sum(perCpuCurrent),
      totalPrevious: prior ? prior.totalCurrent : 0n,
      perNodeCurrent: sumByNode(snapshot.cpus, perCpuCurrent, topology),
      perNodePrevious: carryNodes(prior, topology),
    });
  }

  return rows;
}

/**
 * The same row with every previous field zeroed: counts since boot
 */
export function toCumulative(row: AggregatedRow): AggregatedRow {
  return {
    ...row,
    perCpuPrevious: row.cpus.map(() => 0n),
    totalPrevious: 0n,
    perNodePrevious: new Map([...row.perNodePrevious.keys()].map((node): [number, bigint] => [node, 0n])),
  };
}

export function totalDelta(row: AggregatedRow): bigint {
  return row.totalCurrent - row.totalPrevious;
}

export function nodeDelta(row: AggregatedRow, node: number): bigint {
  return (row.perNodeCurrent.get(node) ?? 0n) - (row.perNodePrevious.get(node) ?? 0n);
}

export function cpuDelta(row: AggregatedRow, cpu: number): bigint {
  const index = row.cpus.indexOf(cpu);
  if (index < 0) return 0n;
  return (row.perCpuCurrent[index] ?? 0n) - (row.perCpuPrevious[index] ?? 0n);
}
