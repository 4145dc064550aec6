import type {
  BlendMode,
  GpuContext,
  MeshData,
  MeshHandle,
  ProgramHandle,
  ShaderSource,
} from '../render/gpu-context';
import type { Mat4 } from '../camera';
import type { Rgb } from '../types';

/** Handles are plain strings so recorded calls read as `draw:ring`. */
export interface FakeHandles {
  program: string;
  location: string;
  mesh: string;
}

export interface FakeGpuOptions {
  /** Program name whose compilation throws. */
  failProgram?: string;
  /** Throw from drawTriangleFan for this mesh. */
  failDraw?: string;
  /** Throw from deleteProgram for this program. */
  failDeleteProgram?: string;
}

/**
 * In-process GpuContext that records every call. Meshes are named after the
 * program they were created for.
 */
export class FakeGpuContext implements GpuContext<FakeHandles> {
  readonly calls: string[] = [];
  readonly uploads = new Map<string, Mat4>();
  readonly meshData = new Map<string, MeshData>();
  readonly sources = new Map<string, ShaderSource>();
  readonly liveMeshes = new Set<string>();
  readonly livePrograms = new Set<string>();
  destroyCount = 0;

  constructor(private readonly options: FakeGpuOptions = {}) {}

  createProgram(source: ShaderSource): ProgramHandle<FakeHandles> {
    this.calls.push(`createProgram:${source.name}`);
    if (source.name === this.options.failProgram) {
      throw new Error(`FakeGpuContext: shader '${source.name}' failed to compile`);
    }
    this.sources.set(source.name, source);
    this.livePrograms.add(source.name);
    return {
      name: source.name,
      program: source.name,
      uniforms: {
        model: `${source.name}.model`,
        view: `${source.name}.view`,
        proj: `${source.name}.proj`,
      },
    };
  }

  createMesh(program: ProgramHandle<FakeHandles>, data: MeshData): MeshHandle<FakeHandles> {
    this.calls.push(`createMesh:${program.name}`);
    this.meshData.set(program.name, data);
    this.liveMeshes.add(program.name);
    return { mesh: program.name, vertexCount: data.vertexCount };
  }

  useProgram(program: ProgramHandle<FakeHandles>): void {
    this.calls.push(`useProgram:${program.name}`);
  }

  setBlendMode(mode: BlendMode): void {
    this.calls.push(`blend:${mode}`);
  }

  setMatrix(location: string, matrix: Mat4): void {
    this.calls.push(`setMatrix:${location}`);
    this.uploads.set(location, matrix);
  }

  drawTriangleFan(mesh: MeshHandle<FakeHandles>): void {
    if (mesh.mesh === this.options.failDraw) {
      throw new Error(`FakeGpuContext: draw of '${mesh.mesh}' failed`);
    }
    this.calls.push(`draw:${mesh.mesh}`);
  }

  clear(color: Rgb): void {
    this.calls.push(`clear:${color.join(',')}`);
  }

  present(): void {
    this.calls.push('present');
  }

  deleteMesh(mesh: MeshHandle<FakeHandles>): void {
    this.calls.push(`deleteMesh:${mesh.mesh}`);
    this.liveMeshes.delete(mesh.mesh);
  }

  deleteProgram(program: ProgramHandle<FakeHandles>): void {
    if (program.name === this.options.failDeleteProgram) {
      throw new Error(`FakeGpuContext: delete of '${program.name}' failed`);
    }
    this.calls.push(`deleteProgram:${program.name}`);
    this.livePrograms.delete(program.name);
  }

  destroy(): void {
    this.calls.push('destroy');
    this.destroyCount++;
  }

  /** Recorded calls whose name starts with `prefix:`. */
  callsOf(prefix: string): string[] {
    return this.calls.filter(c => c.startsWith(`${prefix}:`));
  }

  reset(): void {
    this.calls.length = 0;
    this.uploads.clear();
  }
}
