/**
 * View state type definitions
 */

export type ViewMode = { kind: 'totals' } | { kind: 'node'; node: number };

export type SortKey =
  | { kind: 'node'; node: number }
  | { kind: 'totals' }
  | { kind: 'irq-number' }
  | { kind: 'name' };

export interface ViewState {
  mode: ViewMode;
  sortKey: SortKey;
  filters: ReadonlySet<string>;
  showZero: boolean;
  /** 0 means unlimited */
  rowBudget: number;
}

export const TOTALS_MODE: ViewMode = { kind: 'totals' };
