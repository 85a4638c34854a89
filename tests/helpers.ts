/**
 * Deterministic clocks and randomness for tests.
 */

/** Each call returns the previous time plus `stepMs`, starting at `startIso`. */
export function steppingClock(startIso = '2026-01-01T00:00:00.000Z', stepMs = 1000): () => Date {
  let next = Date.parse(startIso);
  return () => {
    const now = new Date(next);
    next += stepMs;
    return now;
  };
}

/** Settable clock: returns `current` until moved. */
export class ManualClock {
  private current: number;

  constructor(startIso = '2026-01-01T00:00:00.000Z') {
    this.current = Date.parse(startIso);
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

/** mulberry32 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Cycles through `values` forever. */
export function sequenceRandom(values: number[]): () => number {
  let i = 0;
  return () => {
    const value = values[i % values.length] ?? 0;
    i++;
    return value;
  };
}
