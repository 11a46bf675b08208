/**
 * Table rendering for the Totals and single-node views
 */

import { AggregatedRow } from '../types/interrupts.js';
import { NumaTopology } from '../types/topology.js';
import { ViewMode, ViewState } from '../types/view.js';
import { cpuDelta, nodeDelta, totalDelta } from '../analyzers/aggregate.js';

export interface Column {
  header: string;
  value: (row: AggregatedRow) => bigint;
}

const ID_HEADER = 'IRQ';
const LABEL_HEADER = 'NAME';

/**
 * Numeric columns for a view mode.
 * Totals: TOTAL then every node ascending. Node: TOTAL, the node, then each of its CPUs.
 */
export function columnsFor(mode: ViewMode, topology: NumaTopology): Column[] {
  const total: Column = { header: 'TOTAL', value: totalDelta };
  const nodeColumn = (node: number): Column => ({
    header: `NODE${node}`,
    value: row => nodeDelta(row, node),
  });

  if (mode.kind === 'totals') {
    return [total, ...[...topology.nodeToCpus.keys()].map(nodeColumn)];
  }

  const cpus = topology.nodeToCpus.get(mode.node) ?? [];
  return [
    total,
    nodeColumn(mode.node),
    ...cpus.map(cpu => ({ header: `CPU${cpu}`, value: (row: AggregatedRow) => cpuDelta(row, cpu) })),
  ];
}

/**
 * Widest header token or rendered value across the current rows
 */
export function computeFieldWidth(rows: readonly AggregatedRow[], columns: readonly Column[]): number {
  const minimum = columns.reduce((width, column) => Math.max(width, column.header.length), 0);
  return rows.reduce(
    (width, row) =>
      columns.reduce((inner, column) => Math.max(inner, String(column.value(row)).length), width),
    minimum
  );
}

/**
 * Header line plus one right-aligned line per row
 */
export function render(
  rows: readonly AggregatedRow[],
  view: Pick<ViewState, 'mode'>,
  topology: NumaTopology
): string[] {
  const columns = columnsFor(view.mode, topology);
  const width = computeFieldWidth(rows, columns);
  const idWidth = rows.reduce((w, row) => Math.max(w, row.id.length), ID_HEADER.length);

  const header = [
    ID_HEADER.padStart(idWidth),
    ...columns.map(column => column.header.padStart(width)),
    LABEL_HEADER,
  ].join(' ');

  const lines = rows.map(row =>
    [
      row.id.padStart(idWidth),
      ...columns.map(column => String(column.value(row)).padStart(width)),
      row.label,
    ]
      .join(' ')
      .trimEnd()
  );

  return [header, ...lines];
}
