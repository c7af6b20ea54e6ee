import type { Vec2 } from './core/math';
import { createSeedSource, type SeedSource } from './core/random';
import {
  DEFAULT_TERRAIN_BUILD_CONFIG,
  normalizeBounds,
  normalizeSeed,
  normalizeSites,
  normalizeTerrainBuildConfig,
  normalizeUnsigned,
} from './controls';
import { buildTerrainGeneration, defaultTerrainCapabilities } from './pipeline';
import type {
  TerrainBounds,
  TerrainBuildConfig,
  TerrainCapabilities,
  VoronoiTerrain as TerrainModel,
} from './types';

export type VoronoiTerrainBuilderOptions = Partial<TerrainCapabilities> & {
  // Supplies the seed when setSeed is never called. Defaults to a clock-seeded source.
  seedSource?: SeedSource;
};

/**
 * Fluent configuration for a single terrain. Setters normalize their input the
 * same way `normalizeTerrainBuildConfig` does; `build` validates and runs the
 * whole pipeline, throwing a `TerrainError` on failure.
 */
export class VoronoiTerrainBuilder {
  private readonly capabilities: TerrainCapabilities;
  private config: TerrainBuildConfig;

  constructor(options: VoronoiTerrainBuilderOptions = {}) {
    const defaults = defaultTerrainCapabilities();
    const seedSource = options.seedSource ?? createSeedSource();
    this.capabilities = {
      tessellator: options.tessellator ?? defaults.tessellator,
      noise: options.noise ?? defaults.noise,
      logger: options.logger ?? defaults.logger,
    };
    this.config = {
      ...DEFAULT_TERRAIN_BUILD_CONFIG,
      sites: [],
      seed: normalizeSeed(seedSource()),
    };
  }

  /** Builder preloaded from an untrusted config object; fields it lacks keep their defaults. */
  static fromConfig(raw: unknown, options?: VoronoiTerrainBuilderOptions): VoronoiTerrainBuilder {
    const builder = new VoronoiTerrainBuilder(options);
    const hasSeed = Boolean(raw && typeof raw === 'object' && 'seed' in raw);
    const config = normalizeTerrainBuildConfig(raw);
    builder.config = hasSeed ? config : { ...config, seed: builder.config.seed };
    return builder;
  }

  setSeed(seed: number): this {
    this.config.seed = normalizeSeed(seed, this.config.seed);
    return this;
  }

  setSites(sites: readonly Vec2[]): this {
    this.config.sites = normalizeSites(sites);
    return this;
  }

  setWaterLevel(waterLevel: number): this {
    this.config.waterLevel = normalizeUnsigned(waterLevel, this.config.waterLevel);
    return this;
  }

  setHeight(heightScale: number): this {
    this.config.heightScale = normalizeUnsigned(heightScale, this.config.heightScale);
    return this;
  }

  setBounds(bounds: TerrainBounds | null): this {
    this.config.bounds = normalizeBounds(bounds);
    return this;
  }

  getConfig(): TerrainBuildConfig {
    return {
      ...this.config,
      sites: this.config.sites.map((site) => ({ ...site })),
      bounds: this.config.bounds ? [...this.config.bounds] : null,
    };
  }

  build(): TerrainModel {
    return buildTerrainGeneration(this.getConfig(), this.capabilities);
  }
}

export type VoronoiTerrain = TerrainModel;

export const VoronoiTerrain = {
  builder: (options?: VoronoiTerrainBuilderOptions): VoronoiTerrainBuilder => new VoronoiTerrainBuilder(options),
};
