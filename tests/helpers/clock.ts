import type { Clock } from '../../src/engagement/types';

export function fixedClock(iso: string): Clock {
  return () => new Date(iso);
}

/**
 * Each call returns the previous time plus `stepMs`, starting at `startIso`
 */
export function steppingClock(startIso: string, stepMs: number): Clock {
  let next = Date.parse(startIso);
  return () => {
    const current = new Date(next);
    next += stepMs;
    return current;
  };
}
