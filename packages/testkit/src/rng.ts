/**
 * Seeded PRNG (mulberry32) for reproducible randomized tests.
 * The same seed always yields the same sequence.
 */
export type Rng = Readonly<{
  /** Float in [0, 1). */
  next: () => number;
  /** Integer in [min, max], inclusive. */
  int: (min: number, max: number) => number;
  /** `count` integers in [min, max]. */
  ints: (count: number, min: number, max: number) => number[];
}>;

export function createRng(seed: number): Rng {
  let s = seed >>> 0;

  const next = (): number => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const int = (min: number, max: number): number => {
    if (max < min) throw new RangeError(`createRng.int: max (${max}) < min (${min})`);
    return min + Math.floor(next() * (max - min + 1));
  };

  const ints = (count: number, min: number, max: number): number[] => {
    const out: number[] = [];
    for (let i = 0; i < count; i++) out.push(int(min, max));
    return out;
  };

  return Object.freeze({ next, int, ints });
}
