import { Delaunay } from 'd3-delaunay';
import { isFiniteVec2, signedArea2, type Vec2 } from '../core/math';
import { dependencyFailure, describeError, topologyInconsistency } from '../errors';
import type { Tessellation, Tessellator, TerrainBounds, TerrainTessellationState } from '../types';

// Corners closer than this fraction of the bounds extent are merged into one vertex.
export const DEFAULT_MERGE_TOLERANCE = 1e-9;

export function cornerQuantum(bounds: TerrainBounds, tolerance = DEFAULT_MERGE_TOLERANCE): number {
  const [x0, y0, x1, y1] = bounds;
  const extent = Math.max(x1 - x0, y1 - y0);
  return 1 / (extent > 0 ? extent * tolerance : tolerance);
}

/**
 * Voronoi tessellation backed by d3-delaunay. Cells are clipped to `bounds`,
 * shared corners are merged and every loop is emitted counter-clockwise.
 */
export function createDelaunayTessellator(options: { tolerance?: number } = {}): Tessellator {
  const tolerance = options.tolerance ?? DEFAULT_MERGE_TOLERANCE;
  return (sites, bounds) => {
    const quantum = cornerQuantum(bounds, tolerance);
    const delaunay = Delaunay.from(
      sites,
      (site) => site.x,
      (site) => site.y
    );
    const voronoi = delaunay.voronoi(bounds);
    const vertices: Vec2[] = [];
    const cornerLookup = new Map<string, number>();

    const getCornerIndex = (x: number, y: number): number => {
      const key = Math.round(x * quantum) + ':' + Math.round(y * quantum);
      const existing = cornerLookup.get(key);
      if (existing !== undefined) {
        return existing;
      }
      const index = vertices.length;
      vertices.push({ x, y });
      cornerLookup.set(key, index);
      return index;
    };

    const cells = sites.map((_, siteIndex) => {
      const polygon = voronoi.cellPolygon(siteIndex);
      if (!polygon) {
        throw new Error(`Voronoi cell missing for site ${siteIndex}`);
      }
      const loop: number[] = [];
      for (const [x, y] of polygon) {
        const cornerIndex = getCornerIndex(x, y);
        if (loop[loop.length - 1] !== cornerIndex) {
          loop.push(cornerIndex);
        }
      }
      // cellPolygon repeats its first point at the end.
      while (loop.length > 1 && loop[0] === loop[loop.length - 1]) {
        loop.pop();
      }
      if (signedArea2(loop, vertices) < 0) {
        loop.reverse();
      }
      return loop;
    });

    return { vertices, cells };
  };
}

/**
 * Checks the contract every consumer of a tessellation relies on: one cell per
 * site, at least three distinct valid corners per cell, finite corners, and a
 * single winding direction shared by all cells.
 */
export function validateTessellation(tessellation: Tessellation, siteCount: number): void {
  const { vertices, cells } = tessellation;
  if (cells.length !== siteCount) {
    throw topologyInconsistency(`Tessellation produced ${cells.length} cells for ${siteCount} sites`);
  }
  vertices.forEach((vertex, index) => {
    if (!isFiniteVec2(vertex)) {
      throw topologyInconsistency(`Tessellation vertex ${index} is not finite`);
    }
  });

  const used = new Array<boolean>(vertices.length).fill(false);
  let windingSign = 0;
  cells.forEach((cell, cellIndex) => {
    if (cell.length < 3) {
      throw topologyInconsistency(`Cell ${cellIndex} has ${cell.length} vertices; at least 3 are required`);
    }
    const distinct = new Set<number>();
    for (const vertexIndex of cell) {
      if (!Number.isInteger(vertexIndex) || vertexIndex < 0 || vertexIndex >= vertices.length) {
        throw topologyInconsistency(`Cell ${cellIndex} references missing vertex ${vertexIndex}`);
      }
      if (distinct.has(vertexIndex)) {
        throw topologyInconsistency(`Cell ${cellIndex} visits vertex ${vertexIndex} more than once`);
      }
      distinct.add(vertexIndex);
      used[vertexIndex] = true;
    }

    const sign = Math.sign(signedArea2(cell, vertices));
    if (sign === 0) {
      throw topologyInconsistency(`Cell ${cellIndex} has zero area`);
    }
    if (windingSign === 0) {
      windingSign = sign;
    } else if (sign !== windingSign) {
      throw topologyInconsistency(`Cell ${cellIndex} is wound opposite to cell 0`);
    }
  });

  const orphan = used.indexOf(false);
  if (orphan >= 0) {
    throw topologyInconsistency(`Tessellation vertex ${orphan} belongs to no cell`);
  }
}

export function runTessellationStage(
  sites: readonly Vec2[],
  bounds: TerrainBounds,
  tessellator: Tessellator
): TerrainTessellationState {
  let tessellation: Tessellation;
  try {
    tessellation = tessellator(sites, bounds);
  } catch (error) {
    throw dependencyFailure(`Tessellation failed: ${describeError(error)}`, error);
  }
  validateTessellation(tessellation, sites.length);
  return {
    vertices: tessellation.vertices,
    cells: tessellation.cells,
    bounds,
  };
}
