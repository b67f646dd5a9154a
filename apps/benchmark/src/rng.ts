/** Seeded RNG so generated datasets are reproducible across runs. */
export function splitmix32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x9e3779b9) | 0;
    let t = seed ^ (seed >>> 16);
    t = Math.imul(t, 0x21f0aaad);
    t = t ^ (t >>> 15);
    t = Math.imul(t, 0x735a2d97);
    t = t ^ (t >>> 15);
    return (t >>> 0) / 0xffffffff;
  };
}

/** Integers in `[0, max)`, drawn from a fresh generator for `seed`. */
export function randomIntegers(count: number, max: number, seed: number): number[] {
  const rng = splitmix32(seed);
  const values = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    // rng() can return exactly 1
    values[i] = Math.min(max - 1, Math.floor(rng() * max));
  }
  return values;
}
