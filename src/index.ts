export { VoronoiTerrain, VoronoiTerrainBuilder, type VoronoiTerrainBuilderOptions } from './terrain/builder';
export {
  DEFAULT_TERRAIN_BUILD_CONFIG,
  MIN_SITE_COUNT,
  deriveBounds,
  normalizeTerrainBuildConfig,
  validateBounds,
  validateSites,
} from './terrain/controls';
export { TerrainError, isTerrainError, type TerrainErrorKind } from './terrain/errors';
export { collectGraphIssues, collectTerrainIssues, type Graph, type GraphEdge } from './terrain/graph';
export { DEFAULT_FBM_OPTIONS, createFbmNoise, createFbmNoiseFactory, type FbmOptions } from './terrain/noise';
export {
  SILENT_TERRAIN_LOGGER,
  buildTerrainGeneration,
  defaultTerrainCapabilities,
  iterateTerrainGeneration,
} from './terrain/pipeline';
export { cornerQuantum, createDelaunayTessellator, validateTessellation } from './terrain/stages/tessellation';
export { runTopologyStage } from './terrain/stages/topology';
export { createRng, createSeedSource, type SeedSource } from './terrain/core/random';
export type { Vec2, Vec3 } from './terrain/core/math';
export type {
  NoiseFactory,
  NoiseFunction,
  Region,
  TerrainBounds,
  TerrainBuildConfig,
  TerrainCapabilities,
  TerrainGenerationIteration,
  TerrainGenerationStage,
  TerrainLogger,
  TerrainVertex,
  Tessellation,
  Tessellator,
} from './terrain/types';
