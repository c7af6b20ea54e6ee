import { createNoise2D } from 'simplex-noise';
import { createRng } from './core/random';
import { dependencyFailure, describeError } from './errors';
import type { NoiseFactory, NoiseFunction } from './types';

export type FbmOptions = {
  octaves: number;
  frequency: number;
  lacunarity: number;
  persistence: number;
};

export const DEFAULT_FBM_OPTIONS: FbmOptions = {
  octaves: 6,
  frequency: 1,
  lacunarity: 2,
  persistence: 0.5,
};

/**
 * Fractal Brownian motion over simplex noise. Every octave gets its own
 * permutation derived from `seed`; the sum is normalized back to [-1, 1].
 */
export function createFbmNoise(seed: number, options: Partial<FbmOptions> = {}): NoiseFunction {
  const { octaves, frequency, lacunarity, persistence } = { ...DEFAULT_FBM_OPTIONS, ...options };
  const layers = Array.from({ length: Math.max(1, Math.round(octaves)) }, (_, octave) =>
    createNoise2D(createRng(seed + octave * 1013))
  );
  return (x, y) => {
    let amp = 1;
    let freq = frequency;
    let sum = 0;
    let norm = 0;
    for (const layer of layers) {
      sum += amp * layer(x * freq, y * freq);
      norm += amp;
      amp *= persistence;
      freq *= lacunarity;
    }
    return norm > 0 ? sum / norm : 0;
  };
}

export const createFbmNoiseFactory =
  (options: Partial<FbmOptions> = {}): NoiseFactory =>
  (seed) =>
    createFbmNoise(seed, options);

export function instantiateNoise(factory: NoiseFactory, seed: number): NoiseFunction {
  try {
    return factory(seed);
  } catch (error) {
    throw dependencyFailure(`Noise source could not be created for seed ${seed}: ${describeError(error)}`, error);
  }
}
