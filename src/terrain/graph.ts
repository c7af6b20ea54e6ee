/**
 * Index-based graph containers and their structural checks.
 * Vertices and edges reference each other only through array indices.
 */
import type { VoronoiTerrain } from './types';

export type GraphEdge = [number, number];

export type Graph<T> = {
  vertices: T[];
  edges: GraphEdge[];
};

export type GraphIncidence<T> = (vertex: T) => readonly number[];

const undirectedKey = (a: number, b: number): string => (a < b ? `${a}:${b}` : `${b}:${a}`);

const isIndex = (value: number, length: number): boolean =>
  Number.isInteger(value) && value >= 0 && value < length;

export function collectGraphIssues<T>(graph: Graph<T>, incidence: GraphIncidence<T>, label = 'graph'): string[] {
  const issues: string[] = [];
  const vertexCount = graph.vertices.length;
  const edgeCount = graph.edges.length;
  const seen = new Map<string, number>();

  for (let edgeIndex = 0; edgeIndex < edgeCount; edgeIndex += 1) {
    const [a, b] = graph.edges[edgeIndex];
    if (!isIndex(a, vertexCount) || !isIndex(b, vertexCount)) {
      issues.push(`${label}: edge ${edgeIndex} (${a}, ${b}) references a missing vertex`);
      continue;
    }
    if (a === b) {
      issues.push(`${label}: edge ${edgeIndex} is a self-loop on ${a}`);
      continue;
    }
    const key = undirectedKey(a, b);
    const previous = seen.get(key);
    if (previous !== undefined) {
      issues.push(`${label}: edge ${edgeIndex} duplicates edge ${previous}`);
      continue;
    }
    seen.set(key, edgeIndex);
  }

  graph.vertices.forEach((vertex, vertexIndex) => {
    for (const edgeIndex of incidence(vertex)) {
      if (!isIndex(edgeIndex, edgeCount)) {
        issues.push(`${label}: vertex ${vertexIndex} lists missing edge ${edgeIndex}`);
      }
    }
  });

  return issues;
}

/**
 * Structural checks over a finished terrain: both graphs free of dangling or
 * duplicated edges, and the region graph dual to the shared terrain edges.
 */
export function collectTerrainIssues(terrain: VoronoiTerrain): string[] {
  const { terrainGraph, regionGraph } = terrain;
  const issues = [
    ...collectGraphIssues(terrainGraph, (vertex) => vertex.edges, 'terrain'),
    ...collectGraphIssues(regionGraph, (region) => region.edges, 'region'),
  ];

  const cellsByTerrainEdge = new Array<number>(terrainGraph.edges.length).fill(0);
  regionGraph.vertices.forEach((region, regionIndex) => {
    for (const edgeIndex of region.boundary) {
      if (!isIndex(edgeIndex, terrainGraph.edges.length)) {
        issues.push(`region: region ${regionIndex} boundary lists missing terrain edge ${edgeIndex}`);
        continue;
      }
      cellsByTerrainEdge[edgeIndex] += 1;
    }
  });
  const sharedCount = cellsByTerrainEdge.filter((count) => count === 2).length;
  if (sharedCount !== regionGraph.edges.length) {
    issues.push(
      `duality: ${sharedCount} shared terrain edges but ${regionGraph.edges.length} region edges`
    );
  }

  regionGraph.edges.forEach(([a, b], edgeIndex) => {
    const listedA = regionGraph.vertices[a]?.edges.includes(edgeIndex) ?? false;
    const listedB = regionGraph.vertices[b]?.edges.includes(edgeIndex) ?? false;
    if (!listedA || !listedB) {
      issues.push(`region: edge ${edgeIndex} is not listed by both regions ${a} and ${b}`);
    }
  });

  return issues;
}
