/**
 * /proc/interrupts parsing
 */

import { Snapshot, SnapshotRow, ParseOptions } from '../types/interrupts.js';
import { CounterSourceError, ErrorCode } from '../errors/index.js';

/** Every header column is `CPU<n>` */
const CPU_COLUMN_PREFIX_LENGTH = 3;

const INTEGER = /^\d+$/;

/**
 * Decode the header line into CPU ids
 */
export function parseHeader(line: string): number[] {
  const columns = line.trim().split(/\s+/).filter(c => c !== '');
  if (columns.length === 0) {
    throw new CounterSourceError('Interrupt counter header is empty', ErrorCode.COUNTER_HEADER_INVALID);
  }

  return columns.map(column => {
    const id = column.slice(CPU_COLUMN_PREFIX_LENGTH);
    if (!INTEGER.test(id)) {
      throw new CounterSourceError(
        `Unrecognised CPU column in interrupt counter header: ${column}`,
        ErrorCode.COUNTER_HEADER_INVALID,
        { column }
      );
    }
    return parseInt(id, 10);
  });
}

/**
 * Parse one counter table. Rows with non-numeric ids (NMI, LOC, ERR, ...) are
 * dropped unless includeNonNumeric is set; rows that are too short or carry a
 * non-numeric count are skipped without aborting the parse.
 */
export function parseInterrupts(text: string, options: ParseOptions = {}): Snapshot {
  const lines = text.split('\n').filter(line => line.trim() !== '');
  const [header, ...body] = lines;
  if (header === undefined) {
    throw new CounterSourceError('Interrupt counter source is empty', ErrorCode.COUNTER_HEADER_INVALID);
  }

  const cpus = parseHeader(header);
  const rows: SnapshotRow[] = [];

  for (const line of body) {
    const tokens = line.trim().split(/\s+/);
    const id = (tokens[0] ?? '').replace(/:$/, '');

    if (!options.includeNonNumeric && !INTEGER.test(id)) {
      continue;
    }

    const countTokens = tokens.slice(1, 1 + cpus.length);
    if (countTokens.length < cpus.length) {
      options.onMalformedRow?.(line, `expected ${cpus.length} counts, found ${countTokens.length}`);
      continue;
    }
    const badCount = countTokens.find(token => !INTEGER.test(token));
    if (badCount !== undefined) {
      options.onMalformedRow?.(line, `non-numeric count "${badCount}"`);
      continue;
    }

    rows.push({
      id,
      counts: countTokens.map(token => BigInt(token)),
      label: tokens.slice(1 + cpus.length).join(' '),
    });
  }

  return { cpus, rows };
}
