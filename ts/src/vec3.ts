/** Immutable 3-component vector. Every operation returns a new tuple. */
export type Vec3 = readonly [number, number, number];

export const ZERO: Vec3 = [0, 0, 0];

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function length(v: Vec3): number {
  return Math.sqrt(dot(v, v));
}

export function distance(a: Vec3, b: Vec3): number {
  return length(sub(a, b));
}

/** Unit vector in the direction of `v`. A zero vector stays zero. */
export function normalize(v: Vec3): Vec3 {
  const len = length(v);
  if (len === 0) return ZERO;
  return scale(v, 1 / len);
}

export function isFiniteVec3(v: Vec3): boolean {
  return Number.isFinite(v[0]) && Number.isFinite(v[1]) && Number.isFinite(v[2]);
}

/**
 * Shortest distance from `point` to the segment `a`→`b`.
 * Degenerates to the point distance when `a` and `b` coincide.
 */
export function segmentPointDistance(a: Vec3, b: Vec3, point: Vec3): number {
  const ab = sub(b, a);
  const lenSq = dot(ab, ab);
  if (lenSq === 0) return distance(a, point);
  const t = Math.min(1, Math.max(0, dot(sub(point, a), ab) / lenSq));
  return distance(add(a, scale(ab, t)), point);
}
