/**
 * Terrain generation pipeline orchestrator.
 * Stages run once each, in a fixed order:
 * tessellation -> topology -> elevation -> assembly.
 */
import { deriveBounds, validateBounds, validateSites } from './controls';
import { createFbmNoiseFactory, instantiateNoise } from './noise';
import { createDelaunayTessellator, runTessellationStage } from './stages/tessellation';
import { runTopologyStage } from './stages/topology';
import { runElevationStage } from './stages/elevation';
import { runAssemblyStage } from './stages/assembly';
import type {
  TerrainBuildConfig,
  TerrainCapabilities,
  TerrainGenerationIteration,
  TerrainLogger,
  VoronoiTerrain,
} from './types';

const LOG_TAG = '[VoronoiTerrain]';

// Building is silent unless a logger is passed in, e.g. `console`.
export const SILENT_TERRAIN_LOGGER: TerrainLogger = {
  debug: () => {},
  warn: () => {},
};

export function defaultTerrainCapabilities(): TerrainCapabilities {
  return {
    tessellator: createDelaunayTessellator(),
    noise: createFbmNoiseFactory(),
    logger: SILENT_TERRAIN_LOGGER,
  };
}

export function* iterateTerrainGeneration(
  config: TerrainBuildConfig,
  capabilities: TerrainCapabilities = defaultTerrainCapabilities()
): Generator<TerrainGenerationIteration, VoronoiTerrain> {
  const { tessellator, noise, logger } = capabilities;
  const sites = config.sites;
  validateSites(sites);
  const bounds = config.bounds ?? deriveBounds(sites, logger);
  validateBounds(bounds, sites);

  const tessellation = runTessellationStage(sites, bounds, tessellator);
  logger.debug(
    `${LOG_TAG} tessellation: ${tessellation.vertices.length} vertices, ${tessellation.cells.length} cells`
  );
  yield { stage: 'tessellation', state: tessellation };

  const topology = runTopologyStage(tessellation.cells, tessellation.vertices.length);
  logger.debug(
    `${LOG_TAG} topology: ${topology.terrainEdges.length} terrain edges (${topology.interiorEdgeCount} interior), ` +
      `${topology.regionEdges.length} region edges`
  );
  yield { stage: 'topology', state: topology };

  const elevation = runElevationStage(tessellation.vertices, tessellation.cells, instantiateNoise(noise, config.seed));
  logger.debug(`${LOG_TAG} elevation: seed ${config.seed}`);
  yield { stage: 'elevation', state: elevation };

  const terrain = runAssemblyStage(config, sites, tessellation, topology, elevation);
  yield { stage: 'assembly', state: terrain };

  return terrain;
}

export function buildTerrainGeneration(
  config: TerrainBuildConfig,
  capabilities?: TerrainCapabilities
): VoronoiTerrain {
  const iterator = iterateTerrainGeneration(config, capabilities);
  let step = iterator.next();
  while (!step.done) {
    step = iterator.next();
  }
  return step.value;
}
