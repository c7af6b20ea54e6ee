import { describe, expect, it, vi } from 'vitest';
import type { Vec2 } from '../src/terrain/core/math';
import { DEFAULT_TERRAIN_BUILD_CONFIG } from '../src/terrain/controls';
import { collectTerrainIssues } from '../src/terrain/graph';
import { createFbmNoiseFactory } from '../src/terrain/noise';
import { buildTerrainGeneration, iterateTerrainGeneration } from '../src/terrain/pipeline';
import { createDelaunayTessellator } from '../src/terrain/stages/tessellation';
import type { TerrainBuildConfig, TerrainCapabilities, VoronoiTerrain } from '../src/terrain/types';

const UNIT_SQUARE_SITES: Vec2[] = [
  { x: 0, y: 0 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: 1, y: 1 },
];

const SCATTERED_SITES: Vec2[] = [
  { x: 0.13, y: 0.27 },
  { x: 0.81, y: 0.09 },
  { x: 0.47, y: 0.52 },
  { x: 0.92, y: 0.71 },
  { x: 0.22, y: 0.88 },
  { x: 0.63, y: 0.34 },
  { x: 0.35, y: 0.11 },
  { x: 0.74, y: 0.93 },
  { x: 0.05, y: 0.61 },
  { x: 0.56, y: 0.77 },
];

function capabilities(): TerrainCapabilities {
  return {
    tessellator: createDelaunayTessellator(),
    noise: createFbmNoiseFactory(),
    logger: { debug: vi.fn(), warn: vi.fn() },
  };
}

function config(overrides: Partial<TerrainBuildConfig>): TerrainBuildConfig {
  return { ...DEFAULT_TERRAIN_BUILD_CONFIG, ...overrides };
}

function summarize(terrain: VoronoiTerrain): {
  vertexCount: number;
  edgeCount: number;
  regionCount: number;
  regionEdgeCount: number;
  terrainEdgeSignature: string;
  regionEdgeSignature: string;
} {
  return {
    vertexCount: terrain.terrainGraph.vertices.length,
    edgeCount: terrain.terrainGraph.edges.length,
    regionCount: terrain.regionGraph.vertices.length,
    regionEdgeCount: terrain.regionGraph.edges.length,
    terrainEdgeSignature: terrain.terrainGraph.edges.map((edge) => edge.join(':')).join(','),
    regionEdgeSignature: terrain.regionGraph.edges.map((edge) => edge.join(':')).join(','),
  };
}

const heights = (terrain: VoronoiTerrain): number[] =>
  terrain.terrainGraph.vertices.map((vertex) => vertex.position.z);

describe('terrain generation pipeline', () => {
  it('iterates stages in order', () => {
    const stages = Array.from(
      iterateTerrainGeneration(config({ seed: 3, sites: SCATTERED_SITES }), capabilities())
    ).map((entry) => entry.stage);
    expect(stages).toEqual(['tessellation', 'topology', 'elevation', 'assembly']);
  });

  it('splits unit square sites into four quadrant regions', () => {
    const terrain = buildTerrainGeneration(config({ seed: 1, sites: UNIT_SQUARE_SITES }), capabilities());
    expect(terrain.bounds).toEqual([-1, -1, 2, 2]);
    expect(terrain.terrainGraph.vertices).toHaveLength(9);
    expect(terrain.terrainGraph.edges).toHaveLength(12);
    expect(terrain.regionGraph.vertices).toHaveLength(4);
    expect(terrain.regionGraph.edges).toHaveLength(4);

    const pairs = terrain.regionGraph.edges.map(([a, b]) => [Math.min(a, b), Math.max(a, b)].join('-')).sort();
    expect(pairs).toEqual(['0-1', '0-2', '1-3', '2-3']);
    expect(terrain.regionGraph.vertices.map((region) => region.edges.length)).toEqual([2, 2, 2, 2]);

    // Corners touch 2 edges, box-side crossings 3, the shared center 4.
    const degrees = terrain.terrainGraph.vertices.map((vertex) => vertex.edges.length).sort();
    expect(degrees).toEqual([2, 2, 2, 2, 3, 3, 3, 3, 4]);
    expect(collectTerrainIssues(terrain)).toEqual([]);
  });

  it('logs a summary of each stage', () => {
    const caps = capabilities();
    buildTerrainGeneration(config({ seed: 1, sites: UNIT_SQUARE_SITES }), caps);
    expect(caps.logger.debug).toHaveBeenCalledWith('[VoronoiTerrain] tessellation: 9 vertices, 4 cells');
    expect(caps.logger.debug).toHaveBeenCalledWith(
      '[VoronoiTerrain] topology: 12 terrain edges (4 interior), 4 region edges'
    );
    expect(caps.logger.debug).toHaveBeenCalledWith('[VoronoiTerrain] elevation: seed 1');
  });

  it('keeps every index in range and stores each edge once', () => {
    const terrain = buildTerrainGeneration(config({ seed: 11, sites: SCATTERED_SITES }), capabilities());
    expect(collectTerrainIssues(terrain)).toEqual([]);
    expect(terrain.regionGraph.vertices).toHaveLength(SCATTERED_SITES.length);
    for (const [a, b] of terrain.regionGraph.edges) {
      expect(a).not.toBe(b);
    }
  });

  it('satisfies the Euler characteristic of a bounded planar subdivision', () => {
    const terrain = buildTerrainGeneration(config({ seed: 11, sites: SCATTERED_SITES }), capabilities());
    const v = terrain.terrainGraph.vertices.length;
    const e = terrain.terrainGraph.edges.length;
    const f = terrain.regionGraph.vertices.length;
    // The unbounded outer face is not a region.
    expect(v - e + f).toBe(1);
  });

  it('is deterministic for identical seed and sites', () => {
    const a = buildTerrainGeneration(config({ seed: 42, sites: SCATTERED_SITES }), capabilities());
    const b = buildTerrainGeneration(config({ seed: 42, sites: SCATTERED_SITES }), capabilities());
    expect(summarize(a)).toEqual(summarize(b));
    expect(heights(a)).toEqual(heights(b));
  });

  it('keeps topology but changes heights when only the seed changes', () => {
    const a = buildTerrainGeneration(config({ seed: 42, sites: SCATTERED_SITES }), capabilities());
    const b = buildTerrainGeneration(config({ seed: 43, sites: SCATTERED_SITES }), capabilities());
    expect(summarize(a)).toEqual(summarize(b));
    expect(heights(a)).not.toEqual(heights(b));
  });

  it('carries water level, height scale and seed onto the result', () => {
    const terrain = buildTerrainGeneration(
      config({ seed: 8, sites: SCATTERED_SITES, waterLevel: 20, heightScale: 250, bounds: [-1, -1, 2, 2] }),
      capabilities()
    );
    expect(terrain.waterLevel).toBe(20);
    expect(terrain.heightScale).toBe(250);
    expect(terrain.seed).toBe(8);
    expect(terrain.bounds).toEqual([-1, -1, 2, 2]);
  });

  it('links each region to its cell loop, boundary edges and site', () => {
    const terrain = buildTerrainGeneration(config({ seed: 5, sites: SCATTERED_SITES }), capabilities());
    const { terrainGraph, regionGraph } = terrain;
    regionGraph.vertices.forEach((region, index) => {
      expect(region.site).toEqual(SCATTERED_SITES[index]);
      expect(region.boundary).toHaveLength(region.vertices.length);
      region.boundary.forEach((edgeIndex, side) => {
        const from = region.vertices[side];
        const to = region.vertices[(side + 1) % region.vertices.length];
        const [a, b] = terrainGraph.edges[edgeIndex];
        expect([Math.min(a, b), Math.max(a, b)]).toEqual([Math.min(from, to), Math.max(from, to)]);
      });
      const normal = region.normal;
      expect(Math.hypot(normal.x, normal.y, normal.z)).toBeCloseTo(1, 9);
    });
  });
});
