import type { Mat4 } from '../camera';
import type { Rgb } from '../types';
import type {
  BlendMode,
  GpuContext,
  GpuHandles,
  MatrixUniform,
  MeshData,
  MeshHandle,
  ProgramHandle,
  ShaderSource,
} from './gpu-context';

type GlMethod =
  | 'createShader' | 'shaderSource' | 'compileShader' | 'getShaderParameter'
  | 'getShaderInfoLog' | 'deleteShader'
  | 'createProgram' | 'attachShader' | 'linkProgram' | 'getProgramParameter'
  | 'getProgramInfoLog' | 'deleteProgram' | 'useProgram'
  | 'getUniformLocation' | 'getAttribLocation' | 'uniformMatrix4fv'
  | 'createVertexArray' | 'bindVertexArray' | 'deleteVertexArray'
  | 'createBuffer' | 'bindBuffer' | 'bufferData' | 'deleteBuffer'
  | 'enableVertexAttribArray' | 'vertexAttribPointer'
  | 'enable' | 'disable' | 'blendFunc' | 'viewport'
  | 'clearColor' | 'clear' | 'drawArrays' | 'flush' | 'getExtension';

type GlConstant =
  | 'VERTEX_SHADER' | 'FRAGMENT_SHADER' | 'COMPILE_STATUS' | 'LINK_STATUS'
  | 'ARRAY_BUFFER' | 'STATIC_DRAW' | 'FLOAT'
  | 'BLEND' | 'DEPTH_TEST' | 'SRC_ALPHA' | 'ONE_MINUS_SRC_ALPHA' | 'ONE'
  | 'TRIANGLE_FAN' | 'COLOR_BUFFER_BIT';

/** The slice of WebGL2 this backend calls. A real context satisfies it. */
export type WebGL2Api = Pick<WebGL2RenderingContext, GlMethod | GlConstant>;

export interface WebGLMesh {
  readonly vao: WebGLVertexArrayObject;
  readonly buffers: readonly WebGLBuffer[];
}

export interface WebGLHandles extends GpuHandles {
  program: WebGLProgram;
  location: WebGLUniformLocation;
  mesh: WebGLMesh;
}

export interface WebGL2ContextOptions {
  width: number;
  height: number;
}

const POSITION_ATTRIBUTE = 'in_vert';
const COLOR_ATTRIBUTE = 'in_color';

/**
 * GpuContext over a WebGL2 rendering context.
 *
 * Depth testing is off: layers composite strictly in draw order.
 */
export class WebGL2Context implements GpuContext<WebGLHandles> {
  private readonly gl: WebGL2Api;
  private destroyed = false;

  constructor(gl: WebGL2Api, options: WebGL2ContextOptions) {
    this.gl = gl;
    gl.viewport(0, 0, options.width, options.height);
    gl.disable(gl.DEPTH_TEST);
  }

  createProgram(source: ShaderSource): ProgramHandle<WebGLHandles> {
    const gl = this.gl;
    const vertex = this.compileShader(source.name, gl.VERTEX_SHADER, source.vertex);
    let fragment: WebGLShader;
    try {
      fragment = this.compileShader(source.name, gl.FRAGMENT_SHADER, source.fragment);
    } catch (e) {
      gl.deleteShader(vertex);
      throw e;
    }

    const program = gl.createProgram();
    if (!program) {
      gl.deleteShader(vertex);
      gl.deleteShader(fragment);
      throw new Error(`WebGL2Context: could not create program '${source.name}'`);
    }
    gl.attachShader(program, vertex);
    gl.attachShader(program, fragment);
    gl.linkProgram(program);
    // Shaders are only flagged; they stay alive while attached.
    gl.deleteShader(vertex);
    gl.deleteShader(fragment);

    if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
      const log = gl.getProgramInfoLog(program) ?? '';
      gl.deleteProgram(program);
      throw new Error(`WebGL2Context: program '${source.name}' failed to link: ${log}`);
    }

    try {
      return {
        name: source.name,
        program,
        uniforms: {
          model: this.uniformLocation(program, source.name, 'model'),
          view: this.uniformLocation(program, source.name, 'view'),
          proj: this.uniformLocation(program, source.name, 'proj'),
        },
      };
    } catch (e) {
      gl.deleteProgram(program);
      throw e;
    }
  }

  createMesh(program: ProgramHandle<WebGLHandles>, data: MeshData): MeshHandle<WebGLHandles> {
    const gl = this.gl;
    const vao = gl.createVertexArray();
    if (!vao) throw new Error(`WebGL2Context: could not create vertex array for '${program.name}'`);

    const buffers: WebGLBuffer[] = [];
    try {
      gl.bindVertexArray(vao);
      buffers.push(this.bindAttribute(program, POSITION_ATTRIBUTE, data.positions, 3));
      if (data.colors) {
        buffers.push(this.bindAttribute(program, COLOR_ATTRIBUTE, data.colors, 4));
      }
    } catch (e) {
      for (const buffer of buffers) gl.deleteBuffer(buffer);
      gl.deleteVertexArray(vao);
      throw e;
    } finally {
      gl.bindVertexArray(null);
    }

    return { mesh: { vao, buffers }, vertexCount: data.vertexCount };
  }

  useProgram(program: ProgramHandle<WebGLHandles>): void {
    this.gl.useProgram(program.program);
  }

  setBlendMode(mode: BlendMode): void {
    const gl = this.gl;
    switch (mode) {
      case 'opaque':
        gl.disable(gl.BLEND);
        break;
      case 'alpha':
        gl.enable(gl.BLEND);
        gl.blendFunc(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA);
        break;
      case 'additive':
        gl.enable(gl.BLEND);
        gl.blendFunc(gl.SRC_ALPHA, gl.ONE);
        break;
    }
  }

  setMatrix(location: WebGLUniformLocation, matrix: Mat4): void {
    this.gl.uniformMatrix4fv(location, false, matrix);
  }

  drawTriangleFan(mesh: MeshHandle<WebGLHandles>): void {
    const gl = this.gl;
    gl.bindVertexArray(mesh.mesh.vao);
    gl.drawArrays(gl.TRIANGLE_FAN, 0, mesh.vertexCount);
    gl.bindVertexArray(null);
  }

  clear(color: Rgb): void {
    const gl = this.gl;
    gl.clearColor(color[0], color[1], color[2], 1.0);
    gl.clear(gl.COLOR_BUFFER_BIT);
  }

  /** The browser swaps buffers when the task ends; flushing hands the frame over. */
  present(): void {
    this.gl.flush();
  }

  deleteMesh(mesh: MeshHandle<WebGLHandles>): void {
    const gl = this.gl;
    gl.deleteVertexArray(mesh.mesh.vao);
    for (const buffer of mesh.mesh.buffers) gl.deleteBuffer(buffer);
  }

  deleteProgram(program: ProgramHandle<WebGLHandles>): void {
    this.gl.deleteProgram(program.program);
  }

  /** Unbind all state and give the context back to the browser. Idempotent. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    const gl = this.gl;
    gl.useProgram(null);
    gl.bindVertexArray(null);
    gl.bindBuffer(gl.ARRAY_BUFFER, null);
    gl.getExtension('WEBGL_lose_context')?.loseContext();
  }

  private compileShader(name: string, type: GLenum, source: string): WebGLShader {
    const gl = this.gl;
    const stage = type === gl.VERTEX_SHADER ? 'vertex' : 'fragment';
    const shader = gl.createShader(type);
    if (!shader) throw new Error(`WebGL2Context: could not create ${stage} shader for '${name}'`);
    gl.shaderSource(shader, source);
    gl.compileShader(shader);
    if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
      const log = gl.getShaderInfoLog(shader) ?? '';
      gl.deleteShader(shader);
      throw new Error(`WebGL2Context: ${stage} shader '${name}' failed to compile: ${log}`);
    }
    return shader;
  }

  private uniformLocation(program: WebGLProgram, name: string, uniform: MatrixUniform): WebGLUniformLocation {
    const location = this.gl.getUniformLocation(program, uniform);
    if (location === null) {
      throw new Error(`WebGL2Context: program '${name}' has no uniform '${uniform}'`);
    }
    return location;
  }

  private bindAttribute(
    program: ProgramHandle<WebGLHandles>,
    attribute: string,
    data: Float32Array,
    size: number,
  ): WebGLBuffer {
    const gl = this.gl;
    const location = gl.getAttribLocation(program.program, attribute);
    if (location < 0) {
      throw new Error(`WebGL2Context: program '${program.name}' has no attribute '${attribute}'`);
    }
    const buffer = gl.createBuffer();
    if (!buffer) throw new Error(`WebGL2Context: could not create buffer for '${program.name}'`);
    gl.bindBuffer(gl.ARRAY_BUFFER, buffer);
    gl.bufferData(gl.ARRAY_BUFFER, data, gl.STATIC_DRAW);
    gl.enableVertexAttribArray(location);
    gl.vertexAttribPointer(location, size, gl.FLOAT, false, 0, 0);
    return buffer;
  }
}
