export type Vec2 = {
  x: number;
  y: number;
};

export type Vec3 = {
  x: number;
  y: number;
  z: number;
};

export const vec2Cross = (a: Vec2, b: Vec2): number => a.x * b.y - a.y * b.x;

export const isFiniteVec2 = (v: Vec2): boolean => Number.isFinite(v.x) && Number.isFinite(v.y);

/**
 * Twice the signed area of a closed loop (shoelace). Positive for
 * counter-clockwise loops with y pointing up.
 */
export function signedArea2(loop: readonly number[], points: readonly Vec2[]): number {
  let sum = 0;
  for (let i = 0; i < loop.length; i += 1) {
    const a = points[loop[i]];
    const b = points[loop[(i + 1) % loop.length]];
    sum += vec2Cross(a, b);
  }
  return sum;
}
