export { Simulation, runSimulation, ExitCode } from './simulation';
export type { CanvasSurface, SimulationOptions } from './simulation';
export type { SimulationConfig, ResolvedConfig, SimulationStats, Rgb } from './types';
export { validateConfig } from './types';
export type { SimulationState, StarState, Body } from './simulation-state';
export { createInitialState } from './simulation-state';

// Frame loop
export { FrameLoop, runFrame, timerScheduler } from './frame-loop';
export type { FrameContext, FrameResult, FrameScheduler, LoopStatus, LoopStats, SignalSource } from './frame-loop';
export { InputManager } from './input-manager';
export type { InputSignal } from './input-manager';

// Physics
export { stepStar, gravitationalAcceleration } from './physics';
export type { PhysicsConstants } from './physics';
export type { Vec3 } from './vec3';

// Camera
export type { Camera, CameraCommand } from './camera-controller';
export {
  CAMERA_KEY_BINDINGS,
  commandForKey,
  moveCamera,
  projectionMatrix,
  validateCamera,
  viewMatrix,
} from './camera-controller';
export type { Mat4 } from './camera';

// Rendering
export { RenderLayerPipeline } from './render/layer-pipeline';
export { SCENE_ORDER } from './render/render-layer';
export type { FrameUniforms, LayerName, RenderLayer } from './render/render-layer';
export type { BlendMode, GpuContext, GpuHandles, MeshData, ShaderSource } from './render/gpu-context';
export { WebGL2Context } from './render/webgl2-context';
export type { WebGL2Api, WebGLHandles } from './render/webgl2-context';
export { createScene } from './render/scene';
export { SCENE_SHADERS } from './render/shader-assets';
