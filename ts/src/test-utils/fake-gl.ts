import { vi } from 'vitest';
import type { WebGL2Api } from '../render/webgl2-context';

/**
 * WebGL2Api backed by `vi.fn()` stubs. Every create call succeeds, every
 * compile and link reports success, uniforms resolve to `{ name }` and
 * attributes to 0 (`in_vert`) or 1 (anything else).
 */
export function fakeGl(overrides: Partial<WebGL2Api> = {}): WebGL2Api {
  const base: WebGL2Api = {
    VERTEX_SHADER: 0x8b31,
    FRAGMENT_SHADER: 0x8b30,
    COMPILE_STATUS: 0x8b81,
    LINK_STATUS: 0x8b82,
    ARRAY_BUFFER: 0x8892,
    STATIC_DRAW: 0x88e4,
    FLOAT: 0x1406,
    BLEND: 0x0be2,
    DEPTH_TEST: 0x0b71,
    SRC_ALPHA: 0x0302,
    ONE_MINUS_SRC_ALPHA: 0x0303,
    ONE: 1,
    TRIANGLE_FAN: 0x0006,
    COLOR_BUFFER_BIT: 0x4000,
    createShader: vi.fn(() => ({})),
    shaderSource: vi.fn(),
    compileShader: vi.fn(),
    getShaderParameter: vi.fn(() => true),
    getShaderInfoLog: vi.fn(() => ''),
    deleteShader: vi.fn(),
    createProgram: vi.fn(() => ({})),
    attachShader: vi.fn(),
    linkProgram: vi.fn(),
    getProgramParameter: vi.fn(() => true),
    getProgramInfoLog: vi.fn(() => ''),
    deleteProgram: vi.fn(),
    useProgram: vi.fn(),
    getUniformLocation: vi.fn((_program: WebGLProgram, name: string) => ({ name })),
    getAttribLocation: vi.fn((_program: WebGLProgram, name: string) => (name === 'in_vert' ? 0 : 1)),
    uniformMatrix4fv: vi.fn(),
    createVertexArray: vi.fn(() => ({})),
    bindVertexArray: vi.fn(),
    deleteVertexArray: vi.fn(),
    createBuffer: vi.fn(() => ({})),
    bindBuffer: vi.fn(),
    bufferData: vi.fn(),
    deleteBuffer: vi.fn(),
    enableVertexAttribArray: vi.fn(),
    vertexAttribPointer: vi.fn(),
    enable: vi.fn(),
    disable: vi.fn(),
    blendFunc: vi.fn(),
    viewport: vi.fn(),
    clearColor: vi.fn(),
    clear: vi.fn(),
    drawArrays: vi.fn(),
    flush: vi.fn(),
    getExtension: vi.fn(() => null),
  };
  return { ...base, ...overrides };
}
