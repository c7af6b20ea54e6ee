import { isFiniteVec2, type Vec2 } from './core/math';
import { invalidInput } from './errors';
import type { TerrainBounds, TerrainBuildConfig, TerrainLogger } from './types';

export const MIN_SITE_COUNT = 3;

export const DEFAULT_TERRAIN_BUILD_CONFIG: TerrainBuildConfig = {
  seed: 0,
  sites: [],
  waterLevel: 50,
  heightScale: 100,
  bounds: null,
};

function readNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readCoordinate(value: unknown): number {
  return typeof value === 'number' ? value : Number.NaN;
}

export function normalizeSeed(value: unknown, fallback = DEFAULT_TERRAIN_BUILD_CONFIG.seed): number {
  return Math.round(readNumber(value, fallback)) >>> 0;
}

export function normalizeUnsigned(value: unknown, fallback: number): number {
  return Math.max(0, Math.round(readNumber(value, fallback)));
}

// Non-numeric coordinates become NaN so validateSites reports them instead of dropping the site.
export function normalizeSites(raw: unknown): Vec2[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.map((entry: unknown) => {
    const source = entry && typeof entry === 'object' ? (entry as Partial<Vec2>) : {};
    return { x: readCoordinate(source.x), y: readCoordinate(source.y) };
  });
}

export function normalizeBounds(raw: unknown): TerrainBounds | null {
  if (!Array.isArray(raw) || raw.length !== 4) {
    return null;
  }
  const [x0, y0, x1, y1] = raw.map((value: unknown) => readCoordinate(value));
  return [x0, y0, x1, y1];
}

export function normalizeTerrainBuildConfig(raw: unknown): TerrainBuildConfig {
  const source = raw && typeof raw === 'object' ? (raw as Partial<TerrainBuildConfig>) : {};
  const defaults = DEFAULT_TERRAIN_BUILD_CONFIG;
  return {
    seed: normalizeSeed(source.seed, defaults.seed),
    sites: normalizeSites(source.sites),
    waterLevel: normalizeUnsigned(source.waterLevel, defaults.waterLevel),
    heightScale: normalizeUnsigned(source.heightScale, defaults.heightScale),
    bounds: normalizeBounds(source.bounds),
  };
}

const siteKey = (site: Vec2): string => `${site.x}:${site.y}`;

export function validateSites(sites: readonly Vec2[]): void {
  if (sites.length < MIN_SITE_COUNT) {
    throw invalidInput(`At least ${MIN_SITE_COUNT} sites are required, got ${sites.length}`);
  }
  const seen = new Map<string, number>();
  sites.forEach((site, index) => {
    if (!isFiniteVec2(site)) {
      throw invalidInput(`Site ${index} has a non-finite coordinate (${site.x}, ${site.y})`);
    }
    const key = siteKey(site);
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw invalidInput(`Site ${index} duplicates site ${previous} at (${site.x}, ${site.y})`);
    }
    seen.set(key, index);
  });
}

export function validateBounds(bounds: TerrainBounds, sites: readonly Vec2[]): void {
  const [x0, y0, x1, y1] = bounds;
  if (![x0, y0, x1, y1].every(Number.isFinite) || x1 <= x0 || y1 <= y0) {
    throw invalidInput(`Bounds [${bounds.join(', ')}] do not describe a non-empty rectangle`);
  }
  sites.forEach((site, index) => {
    if (site.x < x0 || site.x > x1 || site.y < y0 || site.y > y1) {
      throw invalidInput(`Site ${index} at (${site.x}, ${site.y}) lies outside bounds [${bounds.join(', ')}]`);
    }
  });
}

/**
 * Site extent padded on every side by its larger dimension (at least 1), so
 * every cell is closed well away from the sites.
 */
export function deriveBounds(sites: readonly Vec2[], logger?: TerrainLogger): TerrainBounds {
  let minX = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  for (const site of sites) {
    minX = Math.min(minX, site.x);
    maxX = Math.max(maxX, site.x);
    minY = Math.min(minY, site.y);
    maxY = Math.max(maxY, site.y);
  }
  const width = maxX - minX;
  const height = maxY - minY;
  const padding = Math.max(width, height, 1);
  if (width === 0 || height === 0) {
    logger?.warn(`[VoronoiTerrain] sites span a degenerate ${width}x${height} extent; padding bounds by ${padding}`);
  }
  return [minX - padding, minY - padding, maxX + padding, maxY + padding];
}
