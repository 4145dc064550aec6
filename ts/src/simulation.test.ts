import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ExitCode, Simulation, runSimulation } from './simulation';
import type { CanvasSurface } from './simulation';
import { InputManager } from './input-manager';
import { createScene } from './render/scene';
import { SCENE_SHADERS } from './render/shader-assets';
import type { WebGL2Api } from './render/webgl2-context';
import { validateConfig } from './types';
import type { SimulationConfig } from './types';
import { FakeGpuContext } from './test-utils/fake-gpu';
import { fakeGl } from './test-utils/fake-gl';

function fakeCanvas(gl: WebGL2Api | null = fakeGl()) {
  const canvas = {
    width: 300,
    height: 150,
    getContext: vi.fn(() => gl),
  } satisfies CanvasSurface;
  return canvas;
}

function keyEvent(type: 'keydown' | 'keyup', code: string): Event {
  return Object.assign(new Event(type), { code });
}

const ORBIT: SimulationConfig = {
  gravitationalConstant: 1,
  blackHoleMass: 100,
  starPosition: [10, 0, 0],
  starVelocity: [0, 1, 0],
};

function fromParts(config: SimulationConfig = ORBIT, input = new InputManager()) {
  const gpu = new FakeGpuContext();
  const pipeline = createScene(gpu, SCENE_SHADERS);
  const sim = Simulation.fromParts(validateConfig(config), gpu, pipeline, input);
  return { sim, gpu, input };
}

describe('Simulation', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'group').mockImplementation(() => {});
    vi.spyOn(console, 'groupEnd').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('create', () => {
    it('sizes the canvas and acquires WebGL2', () => {
      const canvas = fakeCanvas();
      const sim = Simulation.create({ canvas });
      expect(canvas.width).toBe(800);
      expect(canvas.height).toBe(600);
      expect(canvas.getContext).toHaveBeenCalledWith('webgl2', { antialias: true, depth: false });
      expect(sim.status).toBe('running');
      expect(console.info).toHaveBeenCalledWith('[EventHorizon] Simulation initialized');
      sim.destroy();
    });

    it('throws when WebGL2 is unavailable', () => {
      expect(() => Simulation.create({ canvas: fakeCanvas(null) })).toThrow(
        'Simulation: WebGL2 is not available',
      );
    });

    it('rejects an invalid configuration before touching the canvas', () => {
      const canvas = fakeCanvas();
      expect(() => Simulation.create({ canvas, width: 0 })).toThrow('width must be a positive integer');
      expect(canvas.getContext).not.toHaveBeenCalled();
    });

    it('loses the context when a shader fails to build', () => {
      const loseContext = vi.fn();
      const getExtension = vi.fn();
      getExtension.mockReturnValue({ loseContext });
      const gl = fakeGl({ getShaderParameter: vi.fn(() => false), getExtension });
      expect(() => Simulation.create({ canvas: fakeCanvas(gl) })).toThrow(
        "WebGL2Context: vertex shader 'background' failed to compile: ",
      );
      expect(loseContext).toHaveBeenCalledTimes(1);
    });

    it('routes keyboard and pagehide events into the loop', () => {
      const keyTarget = new EventTarget();
      const closeTarget = new EventTarget();
      const sim = Simulation.create({ canvas: fakeCanvas(), keyTarget, closeTarget });
      keyTarget.dispatchEvent(keyEvent('keydown', 'KeyW'));
      expect(sim.step()).toBe('running');
      expect(sim.state.camera.position).toEqual([0, 0, 19.5]);
      closeTarget.dispatchEvent(new Event('pagehide'));
      expect(sim.step()).toBe('stopped');
      sim.destroy();
    });
  });

  describe('fromParts', () => {
    it('reports frame count, separation and capture in stats', () => {
      const { sim } = fromParts();
      sim.step();
      const stats = sim.stats;
      expect(stats.frameCount).toBe(1);
      expect(stats.separation).toBeCloseTo(9.9999, 3);
      expect(stats.captured).toBe(false);
      sim.destroy();
    });

    it('warns on capture when no callback is installed', () => {
      const { sim } = fromParts({});
      sim.step();
      expect(sim.stats.captured).toBe(true);
      expect(sim.stats.separation).toBe(0);
      expect(console.warn).toHaveBeenCalledWith('[EventHorizon] Star captured on frame 1 at', [0, 0, 0]);
      sim.destroy();
    });

    it('calls the capture callback instead of warning', () => {
      const onStarCaptured = vi.fn();
      const { sim } = fromParts({ onStarCaptured });
      sim.step();
      expect(onStarCaptured).toHaveBeenCalledTimes(1);
      expect(console.warn).not.toHaveBeenCalled();
      sim.destroy();
    });

    it('run() resolves on quit and releases GPU resources', async () => {
      const input = new InputManager();
      const { sim, gpu } = fromParts(ORBIT, input);
      input.requestQuit();
      await sim.run();
      expect(sim.status).toBe('stopped');
      expect(gpu.destroyCount).toBe(1);
      expect(gpu.livePrograms.size).toBe(0);
      expect(console.info).toHaveBeenCalledWith('[EventHorizon] Simulation stopped after 0 frames');
    });

    it('destroy is idempotent and blocks further use', () => {
      const { sim, gpu } = fromParts();
      sim[Symbol.dispose]();
      sim.destroy();
      expect(gpu.destroyCount).toBe(1);
      expect(() => sim.step()).toThrow('Simulation instance has been destroyed');
    });
  });
});

describe('runSimulation', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'group').mockImplementation(() => {});
    vi.spyOn(console, 'groupEnd').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns Clean when the user quits', async () => {
    const input = new InputManager();
    input.requestQuit();
    expect(await runSimulation({ canvas: fakeCanvas(), input })).toBe(ExitCode.Clean);
    expect(ExitCode.Clean).toBe(0);
  });

  it('returns InitFailure when the simulation cannot be created', async () => {
    expect(await runSimulation({ canvas: fakeCanvas(null) })).toBe(ExitCode.InitFailure);
    expect(ExitCode.InitFailure).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('returns RuntimeFailure when a frame throws', async () => {
    const gl = fakeGl({
      drawArrays: vi.fn(() => {
        throw new Error('context lost');
      }),
    });
    const onFatalError = vi.fn();
    const code = await runSimulation({ canvas: fakeCanvas(gl), onFatalError });
    expect(code).toBe(ExitCode.RuntimeFailure);
    expect(ExitCode.RuntimeFailure).toBe(2);
    expect(onFatalError).toHaveBeenCalledWith(new Error('context lost'));
    expect(console.error).toHaveBeenCalledWith('[EventHorizon] Simulation failed:', new Error('context lost'));
  });

  it('returns RuntimeFailure even when the fatal-error callback throws', async () => {
    const gl = fakeGl({
      drawArrays: vi.fn(() => {
        throw new Error('context lost');
      }),
    });
    const onFatalError = vi.fn(() => {
      throw new Error('handler failed');
    });
    const code = await runSimulation({ canvas: fakeCanvas(gl), onFatalError });
    expect(code).toBe(ExitCode.RuntimeFailure);
    expect(onFatalError).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith('[EventHorizon] onFatalError threw:', new Error('handler failed'));
  });
});
