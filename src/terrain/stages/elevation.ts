import { Vector3 } from 'three';
import type { Vec2, Vec3 } from '../core/math';
import { dependencyFailure, describeError } from '../errors';
import type { NoiseFunction, TerrainElevationState } from '../types';

const toVec3 = (v: Vector3): Vec3 => ({ x: v.x, y: v.y, z: v.z });

function sampleHeight(noise: NoiseFunction, vertex: Vec2, vertexIndex: number): number {
  let height: number;
  try {
    height = noise(vertex.x, vertex.y);
  } catch (error) {
    throw dependencyFailure(`Noise failed at vertex ${vertexIndex}: ${describeError(error)}`, error);
  }
  if (!Number.isFinite(height)) {
    throw dependencyFailure(`Noise returned ${height} at vertex ${vertexIndex}`);
  }
  return height;
}

/**
 * Lifts tessellation vertices to 3D with `z = noise(x, y)` and derives normals.
 * Region normals use the first three corners only, which is exact for
 * triangles and an approximation for displaced polygons with more corners.
 */
export function runElevationStage(
  vertices: readonly Vec2[],
  cells: readonly (readonly number[])[],
  noise: NoiseFunction
): TerrainElevationState {
  const points = vertices.map(
    (vertex, index) => new Vector3(vertex.x, vertex.y, sampleHeight(noise, vertex, index))
  );
  const normalSums = points.map(() => new Vector3());
  const regionNormals: Vec3[] = [];
  const regionCenters: Vec3[] = [];

  for (const cell of cells) {
    const p0 = points[cell[0]];
    const e1 = new Vector3().subVectors(points[cell[1]], p0);
    const e2 = new Vector3().subVectors(points[cell[2]], p0);
    const normal = e1.cross(e2).normalize();

    const center = new Vector3();
    for (const vertexIndex of cell) {
      center.add(points[vertexIndex]);
      normalSums[vertexIndex].add(normal);
    }
    center.divideScalar(cell.length);

    regionNormals.push(toVec3(normal));
    regionCenters.push(toVec3(center));
  }

  return {
    positions: points.map(toVec3),
    vertexNormals: normalSums.map((sum) => toVec3(sum.normalize())),
    regionNormals,
    regionCenters,
  };
}
