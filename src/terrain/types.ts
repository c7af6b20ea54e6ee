import type { Vec2, Vec3 } from './core/math';
import type { Graph, GraphEdge } from './graph';

/** Rectangle handed to the tessellation engine: `[x0, y0, x1, y1]`. */
export type TerrainBounds = [number, number, number, number];

export type Tessellation = {
  vertices: Vec2[];
  // One loop of vertex indices per site, in winding order.
  cells: number[][];
};

export type Tessellator = (sites: readonly Vec2[], bounds: TerrainBounds) => Tessellation;

export type NoiseFunction = (x: number, y: number) => number;

export type NoiseFactory = (seed: number) => NoiseFunction;

export type TerrainLogger = Pick<Console, 'debug' | 'warn'>;

export type TerrainBuildConfig = {
  seed: number;
  sites: Vec2[];
  waterLevel: number;
  heightScale: number;
  // null derives the rectangle from the site extent.
  bounds: TerrainBounds | null;
};

export type TerrainCapabilities = {
  tessellator: Tessellator;
  noise: NoiseFactory;
  logger: TerrainLogger;
};

export type TerrainVertex = {
  position: Vec3;
  normal: Vec3;
  // Indices into terrainGraph.edges.
  edges: number[];
};

export type Region = {
  site: Vec2;
  center: Vec3;
  normal: Vec3;
  // Indices into regionGraph.edges.
  edges: number[];
  // Cell loop as indices into terrainGraph.vertices.
  vertices: number[];
  // Indices into terrainGraph.edges, one per polygon side, aligned with `vertices`.
  boundary: number[];
};

export type VoronoiTerrain = {
  readonly terrainGraph: Graph<TerrainVertex>;
  readonly regionGraph: Graph<Region>;
  readonly waterLevel: number;
  readonly heightScale: number;
  readonly seed: number;
  readonly bounds: TerrainBounds;
};

export type TerrainTessellationState = Tessellation & {
  bounds: TerrainBounds;
};

export type TerrainTopologyState = {
  terrainEdges: GraphEdge[];
  regionEdges: GraphEdge[];
  edgesByVertex: number[][];
  boundaryByRegion: number[][];
  // Terrain edges traversed by two cells.
  interiorEdgeCount: number;
};

export type TerrainElevationState = {
  positions: Vec3[];
  vertexNormals: Vec3[];
  regionNormals: Vec3[];
  regionCenters: Vec3[];
};

export type TerrainGenerationIteration =
  | { stage: 'tessellation'; state: TerrainTessellationState }
  | { stage: 'topology'; state: TerrainTopologyState }
  | { stage: 'elevation'; state: TerrainElevationState }
  | { stage: 'assembly'; state: VoronoiTerrain };

export type TerrainGenerationStage = TerrainGenerationIteration['stage'];
