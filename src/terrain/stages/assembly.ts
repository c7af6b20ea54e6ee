import type { Vec2 } from '../core/math';
import type { Graph } from '../graph';
import type {
  Region,
  TerrainBuildConfig,
  TerrainElevationState,
  TerrainTessellationState,
  TerrainTopologyState,
  TerrainVertex,
  VoronoiTerrain,
} from '../types';

export function runAssemblyStage(
  config: Pick<TerrainBuildConfig, 'seed' | 'waterLevel' | 'heightScale'>,
  sites: readonly Vec2[],
  tessellation: TerrainTessellationState,
  topology: TerrainTopologyState,
  elevation: TerrainElevationState
): VoronoiTerrain {
  const terrainVertices: TerrainVertex[] = elevation.positions.map((position, index) => ({
    position,
    normal: elevation.vertexNormals[index],
    edges: topology.edgesByVertex[index],
  }));

  const regions: Region[] = tessellation.cells.map((cell, index) => ({
    site: { x: sites[index].x, y: sites[index].y },
    center: elevation.regionCenters[index],
    normal: elevation.regionNormals[index],
    edges: [],
    vertices: [...cell],
    boundary: topology.boundaryByRegion[index],
  }));
  topology.regionEdges.forEach(([a, b], edgeIndex) => {
    regions[a].edges.push(edgeIndex);
    regions[b].edges.push(edgeIndex);
  });

  const terrainGraph: Graph<TerrainVertex> = {
    vertices: terrainVertices,
    edges: topology.terrainEdges,
  };
  const regionGraph: Graph<Region> = {
    vertices: regions,
    edges: topology.regionEdges,
  };

  return {
    terrainGraph,
    regionGraph,
    waterLevel: config.waterLevel,
    heightScale: config.heightScale,
    seed: config.seed,
    bounds: tessellation.bounds,
  };
}
