import { setTimeout as delay } from 'timers/promises';

/**
 * Sleep in small slices so an abort is noticed within one slice.
 * Resolves true when the full interval elapsed, false when cancelled.
 */
export async function sleepInterruptible(ms: number, signal: AbortSignal, sliceMs = 100): Promise<boolean> {
  let remaining = ms;
  while (remaining > 0) {
    if (signal.aborted) return false;
    const slice = Math.min(sliceMs, remaining);
    await delay(slice);
    remaining -= slice;
  }
  return !signal.aborted;
}
