/**
 * Interrupt counter type definitions
 */

export interface SnapshotRow {
  /** Leading token without its colon: an IRQ number, or a pseudo-row such as NMI or LOC */
  id: string;
  /** Counts aligned to Snapshot.cpus; the kernel's counters are unsigned 64-bit */
  counts: bigint[];
  label: string;
}

export interface Snapshot {
  /** CPU ids in header order */
  cpus: number[];
  rows: SnapshotRow[];
}

export interface AggregatedRow {
  id: string;
  label: string;
  cpus: number[];
  perCpuCurrent: bigint[];
  /** Aligned to cpus, looked up by CPU id in the previous sample */
  perCpuPrevious: bigint[];
  totalCurrent: bigint;
  totalPrevious: bigint;
  perNodeCurrent: Map<number, bigint>;
  perNodePrevious: Map<number, bigint>;
}

export type AggregatedRows = Map<string, AggregatedRow>;

export interface ParseOptions {
  includeNonNumeric?: boolean;
  onMalformedRow?: (line: string, reason: string) => void;
}
