/**
 * Edge and adjacency builder.
 *
 * Cells arrive wound in one direction, so a side shared by two cells is walked
 * once in each direction. Looking up the reverse of every directed side is
 * enough to deduplicate terrain edges and to find neighbouring regions without
 * comparing coordinates.
 */
import { topologyInconsistency } from '../errors';
import type { GraphEdge } from '../graph';
import type { TerrainTopologyState } from '../types';

type DirectedEdgeRecord = {
  to: number;
  // Index into terrainEdges.
  edgeIndex: number;
  // Region whose loop walked this direction first.
  region: number;
  // Set once the opposite direction has been matched to a region edge.
  shared: boolean;
};

const directedKey = (from: number, to: number): string => from + '>' + to;

export function runTopologyStage(cells: readonly (readonly number[])[], vertexCount: number): TerrainTopologyState {
  const terrainEdges: GraphEdge[] = [];
  const regionEdges: GraphEdge[] = [];
  const edgesByVertex: number[][] = Array.from({ length: vertexCount }, () => []);
  const boundaryByRegion: number[][] = cells.map(() => []);
  const directedEdges = new Map<string, DirectedEdgeRecord>();
  let interiorEdgeCount = 0;

  const checkVertex = (vertexIndex: number, regionIndex: number): void => {
    if (!Number.isInteger(vertexIndex) || vertexIndex < 0 || vertexIndex >= vertexCount) {
      throw topologyInconsistency(`Region ${regionIndex} references missing vertex ${vertexIndex}`);
    }
  };

  cells.forEach((cell, regionIndex) => {
    for (let i = 0; i < cell.length; i += 1) {
      const current = cell[i];
      const next = cell[(i + 1) % cell.length];
      checkVertex(current, regionIndex);
      checkVertex(next, regionIndex);

      const forwardKey = directedKey(current, next);
      const forward = directedEdges.get(forwardKey);
      if (forward) {
        throw topologyInconsistency(
          `Regions ${forward.region} and ${regionIndex} both walk edge ${current} -> ${next}; cell winding is inconsistent`
        );
      }

      let edgeIndex: number;
      const reverse = directedEdges.get(directedKey(next, current));
      if (reverse) {
        if (reverse.shared) {
          throw topologyInconsistency(`Edge ${next} - ${current} is shared by more than two regions`);
        }
        if (reverse.region === regionIndex) {
          throw topologyInconsistency(`Region ${regionIndex} walks edge ${next} - ${current} in both directions`);
        }
        reverse.shared = true;
        regionEdges.push([regionIndex, reverse.region]);
        interiorEdgeCount += 1;
        edgeIndex = reverse.edgeIndex;
      } else {
        edgeIndex = terrainEdges.length;
        terrainEdges.push([current, next]);
        directedEdges.set(forwardKey, { to: next, edgeIndex, region: regionIndex, shared: false });
      }

      edgesByVertex[current].push(edgeIndex);
      boundaryByRegion[regionIndex].push(edgeIndex);
    }
  });

  // Exterior sides are walked once, so their far endpoint has not seen them yet.
  for (const record of directedEdges.values()) {
    if (!record.shared) {
      edgesByVertex[record.to].push(record.edgeIndex);
    }
  }

  return {
    terrainEdges,
    regionEdges,
    edgesByVertex,
    boundaryByRegion,
    interiorEdgeCount,
  };
}
