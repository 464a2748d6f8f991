/**
 * Small seeded PRNG so generated graphs are the same on every run.
 */
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

/**
 * Random DAG: every edge points at a lower index.
 */
export function randomDag(random: () => number, size: number): { blockedBy: number[] }[] {
  return Array.from({ length: size }, (_, index) => {
    const deps: number[] = [];
    for (let dep = 0; dep < index; dep++) {
      if (random() < 0.3) {
        deps.push(dep);
      }
    }
    return { blockedBy: deps };
  });
}
