import type { ActivityRecord } from '../data/types';

export function compareTimestamps(a: string, b: string): number {
  const ta = Date.parse(a);
  const tb = Date.parse(b);
  if (!Number.isNaN(ta) && !Number.isNaN(tb) && ta !== tb) {
    return ta - tb;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Records in timestamp order. The sort is stable, so records sharing a
 * timestamp keep the order the store returned them in.
 */
export function sortChronologically(records: readonly ActivityRecord[]): ActivityRecord[] {
  return [...records].sort((a, b) => compareTimestamps(a.timestamp, b.timestamp));
}
