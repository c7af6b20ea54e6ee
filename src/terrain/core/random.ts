export type SeedSource = () => number;

export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

/**
 * Seed source owned by a single builder. Each call yields a fresh uint32 seed;
 * two sources created from the same entropy yield the same sequence.
 */
export function createSeedSource(entropy: number = Date.now()): SeedSource {
  const random = createRng(entropy);
  return () => Math.floor(random() * 4294967296) >>> 0;
}
