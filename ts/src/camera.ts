import type { Vec3 } from './vec3';
import { cross, dot, normalize, sub } from './vec3';

/**
 * 4x4 matrices are column-major Float32Arrays in the WebGL clip convention
 * (depth -1..1). They are uploaded to `mat4` uniforms untransposed.
 */
export type Mat4 = Float32Array;

export function identity(): Mat4 {
  return new Float32Array([
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ]);
}

export function translation(v: Vec3): Mat4 {
  return new Float32Array([
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    v[0], v[1], v[2], 1,
  ]);
}

/**
 * Perspective projection (right-handed, looking down -Z).
 *
 * Maps view-space depth -near..-far to NDC -1..1.
 */
export function perspective(
  fovYDegrees: number,
  aspect: number,
  near: number,
  far: number
): Mat4 {
  const f = 1 / Math.tan((fovYDegrees * Math.PI) / 360);
  const nf = 1 / (near - far);

  return new Float32Array([
    f / aspect, 0, 0,                    0,  // col 0
    0,          f, 0,                    0,  // col 1
    0,          0, (far + near) * nf,   -1,  // col 2
    0,          0, 2 * far * near * nf,  0,  // col 3
  ]);
}

/**
 * View matrix for an eye at `eye` looking at `target`.
 * `up` only needs to be non-parallel to the viewing direction.
 */
export function lookAt(eye: Vec3, target: Vec3, up: Vec3): Mat4 {
  const f = normalize(sub(target, eye));
  const s = normalize(cross(f, up));
  const u = cross(s, f);

  return new Float32Array([
    s[0], u[0], -f[0], 0,
    s[1], u[1], -f[1], 0,
    s[2], u[2], -f[2], 0,
    -dot(s, eye), -dot(u, eye), dot(f, eye), 1,
  ]);
}
