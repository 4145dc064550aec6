import type { Rgb } from '../types';
import type { Mat4 } from '../camera';

/** Matrix uniforms every layer program must declare, as column-major `mat4`. */
export const MATRIX_UNIFORMS = ['model', 'view', 'proj'] as const;
export type MatrixUniform = (typeof MATRIX_UNIFORMS)[number];

export type BlendMode = 'opaque' | 'alpha' | 'additive';

/**
 * Backend object types. The pipeline only passes these values back to the
 * context that created them.
 */
export interface GpuHandles {
  program: unknown;
  location: unknown;
  mesh: unknown;
}

/** A named pair of shader sources, loaded as assets before compilation. */
export interface ShaderSource {
  readonly name: string;
  readonly vertex: string;
  readonly fragment: string;
}

/** Compiled program with its matrix uniform locations resolved at creation. */
export interface ProgramHandle<H extends GpuHandles = GpuHandles> {
  readonly name: string;
  readonly program: H['program'];
  readonly uniforms: Readonly<Record<MatrixUniform, H['location']>>;
}

/** Vertex data for a triangle fan: xyz positions plus optional rgba colours. */
export interface MeshData {
  readonly positions: Float32Array;
  readonly colors: Float32Array | null;
  readonly vertexCount: number;
}

export interface MeshHandle<H extends GpuHandles = GpuHandles> {
  readonly mesh: H['mesh'];
  readonly vertexCount: number;
}

/**
 * The GPU services the frame loop calls into. Context and surface creation
 * happen before an instance exists; `destroy()` releases the context itself.
 */
export interface GpuContext<H extends GpuHandles = GpuHandles> {
  /** Compile and link. Throws if compilation fails or a matrix uniform is missing. */
  createProgram(source: ShaderSource): ProgramHandle<H>;
  /** Upload static vertex data bound to `program`'s `in_vert` / `in_color`. */
  createMesh(program: ProgramHandle<H>, data: MeshData): MeshHandle<H>;
  useProgram(program: ProgramHandle<H>): void;
  setBlendMode(mode: BlendMode): void;
  setMatrix(location: H['location'], matrix: Mat4): void;
  drawTriangleFan(mesh: MeshHandle<H>): void;
  clear(color: Rgb): void;
  present(): void;
  deleteMesh(mesh: MeshHandle<H>): void;
  deleteProgram(program: ProgramHandle<H>): void;
  destroy(): void;
}
