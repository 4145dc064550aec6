import { projectionMatrix } from './camera-controller';
import { FrameLoop } from './frame-loop';
import type { FrameScheduler, LoopStatus } from './frame-loop';
import { InputManager } from './input-manager';
import type { GpuContext, GpuHandles } from './render/gpu-context';
import type { RenderLayerPipeline } from './render/layer-pipeline';
import { createScene } from './render/scene';
import type { SceneShaders } from './render/shader-assets';
import { SCENE_SHADERS } from './render/shader-assets';
import type { WebGL2Api, WebGLHandles } from './render/webgl2-context';
import { WebGL2Context } from './render/webgl2-context';
import type { SimulationState, StarState } from './simulation-state';
import { createInitialState } from './simulation-state';
import type { ResolvedConfig, SimulationConfig, SimulationStats } from './types';
import { validateConfig } from './types';
import { distance } from './vec3';

/** The drawing surface. An `HTMLCanvasElement` satisfies it. */
export interface CanvasSurface {
  width: number;
  height: number;
  getContext(contextId: 'webgl2', options?: WebGLContextAttributes): WebGL2Api | null;
}

export interface SimulationOptions extends SimulationConfig {
  canvas: CanvasSurface;
  /** Receives keydown/keyup. Usually the canvas. */
  keyTarget?: EventTarget;
  /** Receives `pagehide`, which quits. Usually `window`. */
  closeTarget?: EventTarget;
  input?: InputManager;
  scheduler?: FrameScheduler;
  shaders?: SceneShaders;
}

export const enum ExitCode {
  Clean = 0,
  InitFailure = 1,
  RuntimeFailure = 2,
}

const TAG = '[EventHorizon]';

/**
 * Top-level facade. Owns the frame loop, the input queue and, through the
 * loop, the GPU context and render pipeline.
 *
 * Construct via `Simulation.create(options)` in the browser, or
 * `Simulation.fromParts(...)` with prepared parts in tests.
 *
 * Implements `Disposable` for use with `using` declarations.
 */
export class Simulation<H extends GpuHandles = GpuHandles> implements Disposable {
  private readonly input: InputManager;
  private readonly loop: FrameLoop<H>;
  private destroyed = false;

  private constructor(
    config: ResolvedConfig,
    gpu: GpuContext<H>,
    pipeline: RenderLayerPipeline<H>,
    input: InputManager,
    scheduler?: FrameScheduler,
  ) {
    const state = createInitialState(config);
    this.input = input;
    this.loop = new FrameLoop<H>({
      context: {
        gpu,
        pipeline,
        physics: {
          gravitationalConstant: config.gravitationalConstant,
          timestep: config.timestep,
          captureRadius: config.captureRadius,
        },
        projection: projectionMatrix(state.camera, config.width / config.height),
        cameraStep: config.cameraStep,
        clearColor: config.clearColor,
        onStarCaptured: config.onStarCaptured ?? warnCaptured,
      },
      input,
      initialState: state,
      targetFps: config.targetFps,
      scheduler,
      onFatalError: config.onFatalError,
    });
  }

  /**
   * Build a Simulation from an already compiled pipeline. The simulation
   * takes ownership of `gpu` and `pipeline`.
   */
  static fromParts<H extends GpuHandles>(
    config: ResolvedConfig,
    gpu: GpuContext<H>,
    pipeline: RenderLayerPipeline<H>,
    input: InputManager,
    scheduler?: FrameScheduler,
  ): Simulation<H> {
    return new Simulation(config, gpu, pipeline, input, scheduler);
  }

  /**
   * Validate the config, size the canvas, acquire WebGL2 and build the
   * scene. Throws on any failure, after releasing whatever was acquired.
   */
  static create(options: SimulationOptions): Simulation<WebGLHandles> {
    const config = validateConfig(options);
    const { canvas } = options;
    canvas.width = config.width;
    canvas.height = config.height;

    const gl = canvas.getContext('webgl2', { antialias: true, depth: false });
    if (!gl) throw new Error('Simulation: WebGL2 is not available');

    const gpu = new WebGL2Context(gl, { width: config.width, height: config.height });
    let pipeline: RenderLayerPipeline<WebGLHandles>;
    try {
      pipeline = createScene(gpu, options.shaders ?? SCENE_SHADERS);
    } catch (e) {
      gpu.destroy();
      throw e;
    }

    const input = options.input ?? new InputManager();
    if (options.keyTarget) input.attach(options.keyTarget, options.closeTarget);

    logStartup(config);
    return new Simulation(config, gpu, pipeline, input, options.scheduler);
  }

  get status(): LoopStatus {
    return this.loop.status;
  }

  get state(): SimulationState {
    return this.loop.state;
  }

  get stats(): SimulationStats {
    const { star, blackHole } = this.loop.state;
    return {
      ...this.loop.stats,
      separation: distance(star.position, blackHole.position),
      captured: star.captured,
    };
  }

  /**
   * Run paced frames until quit, `stop()`, or a frame error. Rejects with
   * that error; GPU resources are already released by then.
   */
  async run(): Promise<void> {
    this.checkDestroyed();
    try {
      await this.loop.start();
    } finally {
      this.input.detach();
      console.info(`${TAG} Simulation stopped after ${this.loop.stats.frameCount} frames`);
    }
  }

  /** Run a single unpaced frame. */
  step(): LoopStatus {
    this.checkDestroyed();
    return this.loop.step();
  }

  stop(): void {
    this.loop.stop();
  }

  /** Stop the loop, release GPU resources and detach input. Idempotent. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.loop.stop();
    this.input.destroy();
  }

  /** Disposable protocol -- delegates to `destroy()`. */
  [Symbol.dispose](): void {
    this.destroy();
  }

  private checkDestroyed(): void {
    if (this.destroyed) throw new Error('Simulation instance has been destroyed');
  }
}

/**
 * Create and run a simulation, mapping the outcome to an exit code.
 * Never rejects.
 */
export async function runSimulation(options: SimulationOptions): Promise<ExitCode> {
  let simulation: Simulation<WebGLHandles>;
  try {
    simulation = Simulation.create(options);
  } catch (e) {
    console.error(`${TAG} Initialization failed:`, e);
    return ExitCode.InitFailure;
  }

  try {
    await simulation.run();
    return ExitCode.Clean;
  } catch (e) {
    console.error(`${TAG} Simulation failed:`, e);
    return ExitCode.RuntimeFailure;
  } finally {
    simulation.destroy();
  }
}

function warnCaptured(star: StarState, frame: number): void {
  console.warn(`${TAG} Star captured on frame ${frame} at`, star.position);
}

function logStartup(config: ResolvedConfig): void {
  console.group(`${TAG} Black Hole Simulation`);
  console.log('Surface:', `${config.width}x${config.height}`);
  console.log('G:', config.gravitationalConstant);
  console.log('Black hole mass:', config.blackHoleMass);
  console.log('Star:', config.starPosition, 'velocity', config.starVelocity);
  console.log('Timestep:', config.timestep, 'Target fps:', config.targetFps);
  console.groupEnd();
  console.info(`${TAG} Simulation initialized`);
}
