import type { Vec3 } from './vec3';
import { isFiniteVec3 } from './vec3';
import { DEFAULT_CAMERA_STEP, validateCamera } from './camera-controller';
import type { StarState } from './simulation-state';

export type Rgb = readonly [number, number, number];

/** Configuration for Simulation.create(). Every field is optional. */
export interface SimulationConfig {
  /** Drawing-surface size in pixels. Default 800×600. */
  width?: number;
  height?: number;
  gravitationalConstant?: number;
  /** Black hole mass in kg. */
  blackHoleMass?: number;
  /** Star mass in kg. */
  starMass?: number;
  starPosition?: Vec3;
  starVelocity?: Vec3;
  /** Simulated seconds advanced per frame iteration. */
  timestep?: number;
  captureRadius?: number;
  cameraPosition?: Vec3;
  cameraFront?: Vec3;
  cameraUp?: Vec3;
  /** Vertical field of view in degrees. */
  fieldOfView?: number;
  near?: number;
  far?: number;
  /** World units moved per camera key press. */
  cameraStep?: number;
  targetFps?: number;
  clearColor?: Rgb;
  /** Fired once, on the frame the star is absorbed. */
  onStarCaptured?: (star: StarState, frame: number) => void;
  /** Fired when a running frame throws; the loop has already stopped. */
  onFatalError?: (error: unknown) => void;
}

/** Resolved config with all defaults applied. */
export interface ResolvedConfig {
  width: number;
  height: number;
  gravitationalConstant: number;
  blackHoleMass: number;
  starMass: number;
  starPosition: Vec3;
  starVelocity: Vec3;
  timestep: number;
  captureRadius: number;
  cameraPosition: Vec3;
  cameraFront: Vec3;
  cameraUp: Vec3;
  fieldOfView: number;
  near: number;
  far: number;
  cameraStep: number;
  targetFps: number;
  clearColor: Rgb;
  onStarCaptured?: (star: StarState, frame: number) => void;
  onFatalError?: (error: unknown) => void;
}

/** Live loop statistics. */
export interface SimulationStats {
  frameCount: number;
  fps: number;
  frameTimeAvg: number;
  frameTimeMax: number;
  /** Distance between star and black hole. */
  separation: number;
  captured: boolean;
}

function requirePositive(name: string, value: number): number {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new Error(`${name} must be a finite number > 0`);
  }
  return value;
}

function requireSize(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

function requireFinite(name: string, value: Vec3): Vec3 {
  if (!isFiniteVec3(value)) {
    throw new Error(`${name} must have finite components`);
  }
  return value;
}

export function validateConfig(config: SimulationConfig = {}): ResolvedConfig {
  const resolved: ResolvedConfig = {
    width: requireSize('width', config.width ?? 800),
    height: requireSize('height', config.height ?? 600),
    gravitationalConstant: requirePositive('gravitationalConstant', config.gravitationalConstant ?? 6.6743e-11),
    blackHoleMass: requirePositive('blackHoleMass', config.blackHoleMass ?? 1e31),
    starMass: requirePositive('starMass', config.starMass ?? 1e30),
    starPosition: requireFinite('starPosition', config.starPosition ?? [0, 0, 10]),
    starVelocity: requireFinite('starVelocity', config.starVelocity ?? [0, 0, -0.1]),
    timestep: requirePositive('timestep', config.timestep ?? 0.01),
    captureRadius: requirePositive('captureRadius', config.captureRadius ?? 1e-3),
    cameraPosition: requireFinite('cameraPosition', config.cameraPosition ?? [0, 0, 20]),
    cameraFront: requireFinite('cameraFront', config.cameraFront ?? [0, 0, -1]),
    cameraUp: requireFinite('cameraUp', config.cameraUp ?? [0, 1, 0]),
    fieldOfView: config.fieldOfView ?? 45,
    near: config.near ?? 0.1,
    far: config.far ?? 100,
    cameraStep: requirePositive('cameraStep', config.cameraStep ?? DEFAULT_CAMERA_STEP),
    targetFps: requirePositive('targetFps', config.targetFps ?? 60),
    clearColor: config.clearColor ?? [0.1, 0.1, 0.15],
    onStarCaptured: config.onStarCaptured,
    onFatalError: config.onFatalError,
  };
  validateCamera({
    position: resolved.cameraPosition,
    front: resolved.cameraFront,
    up: resolved.cameraUp,
    fieldOfView: resolved.fieldOfView,
    near: resolved.near,
    far: resolved.far,
  });
  return resolved;
}
