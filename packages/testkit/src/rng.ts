/**
 * Seeded LCG for property sweeps.
 *
 * Sequences are stable across platforms so a failing seed can be replayed.
 */
export type Rng = Readonly<{
  seed: number;
  /** Next unsigned 32-bit value. */
  u32: () => number;
  /** Next float in [0, 1). */
  next: () => number;
  /** Next integer in [min, max] (inclusive). */
  int: (min: number, max: number) => number;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const u32 = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
  const next = (): number => u32() / 4294967296;
  const int = (min: number, max: number): number => {
    const lo = Math.ceil(Math.min(min, max));
    const hi = Math.floor(Math.max(min, max));
    return lo + Math.floor(next() * (hi - lo + 1));
  };
  return Object.freeze({ seed: seed >>> 0, u32, next, int });
}
