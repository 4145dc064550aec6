import type { MeshData } from './gpu-context';

export type Rgba = readonly [number, number, number, number];

/**
 * Axis-aligned billboard quad in the XY plane, centred on the origin.
 * Vertex order is counter-clockwise from the bottom-left corner, which
 * draws as two triangles under a triangle fan.
 */
export function quad(halfSize: number, color?: Rgba): MeshData {
  const h = halfSize;
  const positions = new Float32Array([
    -h, -h, 0.0,
     h, -h, 0.0,
     h,  h, 0.0,
    -h,  h, 0.0,
  ]);
  return {
    positions,
    colors: color ? repeatColor(color, 4) : null,
    vertexCount: 4,
  };
}

/**
 * Filled disk as a triangle fan: the centre vertex, then `segments + 1` rim
 * vertices (the first rim vertex is repeated to close the fan). Colour is
 * interpolated from `centerColor` to `rimColor`.
 */
export function fanDisk(
  radius: number,
  segments: number,
  centerColor: Rgba,
  rimColor: Rgba = centerColor,
): MeshData {
  if (!Number.isInteger(segments) || segments < 3) {
    throw new Error('fanDisk: segments must be an integer >= 3');
  }
  const vertexCount = segments + 2;
  const positions = new Float32Array(vertexCount * 3);
  const colors = new Float32Array(vertexCount * 4);

  colors.set(centerColor, 0);
  for (let i = 0; i <= segments; i++) {
    const angle = (i / segments) * Math.PI * 2;
    const v = i + 1;
    positions[v * 3] = Math.cos(angle) * radius;
    positions[v * 3 + 1] = Math.sin(angle) * radius;
    colors.set(rimColor, v * 4);
  }

  return { positions, colors, vertexCount };
}

function repeatColor(color: Rgba, count: number): Float32Array {
  const out = new Float32Array(count * 4);
  for (let i = 0; i < count; i++) out.set(color, i * 4);
  return out;
}
