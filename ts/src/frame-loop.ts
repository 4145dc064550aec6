import type { Mat4 } from './camera';
import { translation } from './camera';
import { commandForKey, moveCamera, viewMatrix } from './camera-controller';
import type { InputSignal } from './input-manager';
import type { PhysicsConstants } from './physics';
import { stepStar } from './physics';
import type { GpuContext, GpuHandles } from './render/gpu-context';
import type { RenderLayerPipeline } from './render/layer-pipeline';
import type { SimulationState, StarState } from './simulation-state';
import type { Rgb } from './types';

export type LoopStatus = 'running' | 'stopped';

/** Everything one iteration needs besides the state it advances. */
export interface FrameContext<H extends GpuHandles = GpuHandles> {
  gpu: GpuContext<H>;
  pipeline: RenderLayerPipeline<H>;
  physics: PhysicsConstants;
  /** Constant for the run: the surface size never changes. */
  projection: Mat4;
  cameraStep: number;
  clearColor: Rgb;
  onStarCaptured?: (star: StarState, frame: number) => void;
}

export interface FrameResult {
  status: LoopStatus;
  state: SimulationState;
}

/**
 * One frame iteration: input, physics, camera, clear, layers, present.
 *
 * A quit signal returns `stopped` with `state` untouched and skips the rest
 * of the iteration, including commands queued before it.
 */
export function runFrame<H extends GpuHandles>(
  state: SimulationState,
  signals: readonly InputSignal[],
  ctx: FrameContext<H>,
): FrameResult {
  let camera = state.camera;
  for (const signal of signals) {
    if (signal.kind === 'quit') return { status: 'stopped', state };
    const command = commandForKey(signal.code);
    if (command) camera = moveCamera(camera, command, ctx.cameraStep);
  }

  const star = stepStar(state.star, state.blackHole, ctx.physics);
  const view = viewMatrix(camera);

  ctx.gpu.clear(ctx.clearColor);
  ctx.pipeline.render(ctx.gpu, {
    view,
    projection: ctx.projection,
    starModel: translation(star.position),
  });
  ctx.gpu.present();

  const frame = state.frame + 1;
  if (star.captured && !state.star.captured) ctx.onStarCaptured?.(star, frame);
  return { status: 'running', state: { ...state, star, camera, frame } };
}

/** Clock and timer the loop paces itself with. */
export interface FrameScheduler {
  /** Milliseconds, monotonic. */
  now(): number;
  /** Run `callback` once after `delayMs`. Returns a function that cancels it. */
  schedule(callback: () => void, delayMs: number): () => void;
}

export const timerScheduler: FrameScheduler = {
  now: () => performance.now(),
  schedule: (callback, delayMs) => {
    const id = setTimeout(callback, delayMs);
    return () => clearTimeout(id);
  },
};

export interface SignalSource {
  drain(): InputSignal[];
}

export interface FrameLoopOptions<H extends GpuHandles = GpuHandles> {
  context: FrameContext<H>;
  input: SignalSource;
  initialState: SimulationState;
  targetFps: number;
  scheduler?: FrameScheduler;
  /** Called with the error after resources are released and `start()` has settled. */
  onFatalError?: (error: unknown) => void;
}

export interface LoopStats {
  frameCount: number;
  fps: number;
  frameTimeAvg: number;
  frameTimeMax: number;
}

interface Failure {
  error: unknown;
}

/**
 * Drives `runFrame` until a quit signal, `stop()`, or an error.
 *
 * The loop owns the pipeline and the GPU context: on the transition to
 * `stopped` it destroys the pipeline, then the context, exactly once.
 * Frame times are in seconds; fps is recomputed once per ≥1 s window.
 */
export class FrameLoop<H extends GpuHandles = GpuHandles> {
  private readonly context: FrameContext<H>;
  private readonly input: SignalSource;
  private readonly scheduler: FrameScheduler;
  private readonly onFatalError?: (error: unknown) => void;
  private readonly frameBudgetMs: number;

  private _status: LoopStatus = 'running';
  private _state: SimulationState;
  private failure: Failure | null = null;
  private completion: Promise<void> | null = null;
  private settle: { resolve: () => void; reject: (error: unknown) => void } | null = null;
  private cancelPending: (() => void) | null = null;

  private lastTime = -1;
  private _fps = 0;
  private windowFrames = 0;
  private fpsAccum = 0;
  private _frameTimeAvg = 0;
  private _frameTimeMax = 0;
  private dtSum = 0;
  private dtMax = 0;

  constructor(options: FrameLoopOptions<H>) {
    this.context = options.context;
    this.input = options.input;
    this._state = options.initialState;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.onFatalError = options.onFatalError;
    this.frameBudgetMs = 1000 / options.targetFps;
  }

  get status(): LoopStatus {
    return this._status;
  }

  get state(): SimulationState {
    return this._state;
  }

  get stats(): LoopStats {
    return {
      frameCount: this._state.frame,
      fps: this._fps,
      frameTimeAvg: this._frameTimeAvg,
      frameTimeMax: this._frameTimeMax,
    };
  }

  /**
   * Begin paced iteration. Resolves when the loop stops cleanly, rejects
   * with the error that stopped it otherwise. Calling again returns the
   * same promise.
   */
  start(): Promise<void> {
    if (this.completion) return this.completion;
    this.completion = new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
    });
    if (this._status === 'stopped') this.settleCompletion();
    else this.scheduleNext(0);
    return this.completion;
  }

  /** Run one iteration now, without pacing. Rethrows a frame error after cleanup. */
  step(): LoopStatus {
    if (this._status === 'stopped') return 'stopped';
    this.advance();
    if (this.failure) throw this.failure.error;
    return this._status;
  }

  stop(): void {
    this.finish(null);
  }

  private tick(): void {
    this.cancelPending = null;
    const started = this.scheduler.now();
    this.advance();
    if (this._status === 'stopped') return;
    const elapsed = this.scheduler.now() - started;
    this.scheduleNext(Math.max(0, this.frameBudgetMs - elapsed));
  }

  private advance(): void {
    if (this._status === 'stopped') return;
    this.recordFrameStart(this.scheduler.now());

    let result: FrameResult;
    try {
      result = runFrame(this._state, this.input.drain(), this.context);
    } catch (error) {
      this.finish({ error });
      return;
    }
    this._state = result.state;
    if (result.status === 'stopped') this.finish(null);
  }

  private scheduleNext(delayMs: number): void {
    this.cancelPending = this.scheduler.schedule(() => this.tick(), delayMs);
  }

  private finish(failure: Failure | null): void {
    if (this._status === 'stopped') return;
    this._status = 'stopped';
    this.cancelPending?.();
    this.cancelPending = null;

    let outcome = failure;
    try {
      this.release();
    } catch (error) {
      if (outcome) console.error('[EventHorizon] Release failed after a frame error:', error);
      else outcome = { error };
    }

    this.failure = outcome;
    this.settleCompletion();
    if (outcome) this.reportFatal(outcome.error);
  }

  private reportFatal(error: unknown): void {
    try {
      this.onFatalError?.(error);
    } catch (callbackError) {
      console.error('[EventHorizon] onFatalError threw:', callbackError);
    }
  }

  private release(): void {
    const { gpu, pipeline } = this.context;
    try {
      pipeline.destroy(gpu);
    } finally {
      gpu.destroy();
    }
  }

  private settleCompletion(): void {
    if (!this.settle) return;
    if (this.failure) this.settle.reject(this.failure.error);
    else this.settle.resolve();
  }

  private recordFrameStart(now: number): void {
    const dt = this.lastTime < 0 ? this.frameBudgetMs / 1000 : (now - this.lastTime) / 1000;
    this.lastTime = now;

    this.dtSum += dt;
    if (dt > this.dtMax) this.dtMax = dt;
    this.windowFrames++;
    this.fpsAccum += dt;
    if (this.fpsAccum >= 1.0) {
      this._fps = Math.round(this.windowFrames / this.fpsAccum);
      this._frameTimeAvg = this.dtSum / this.windowFrames;
      this._frameTimeMax = this.dtMax;
      this.dtSum = 0;
      this.dtMax = 0;
      this.windowFrames = 0;
      this.fpsAccum = 0;
    }
  }
}
