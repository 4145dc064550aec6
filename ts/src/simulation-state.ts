import type { Vec3 } from './vec3';
import { ZERO } from './vec3';
import type { Camera } from './camera-controller';
import type { ResolvedConfig } from './types';

export interface Body {
  readonly position: Vec3;
  readonly velocity: Vec3;
  /** Mass in kg. Always > 0. */
  readonly mass: number;
}

/** The orbiting body. `captured` is terminal: once set, the star never moves again. */
export interface StarState extends Body {
  readonly captured: boolean;
}

/**
 * Everything that changes from one frame to the next. Each frame step takes
 * the previous value and returns the next one.
 */
export interface SimulationState {
  readonly star: StarState;
  /** Fixed at the origin, never integrated. */
  readonly blackHole: Body;
  readonly camera: Camera;
  /** Completed frame iterations. */
  readonly frame: number;
}

export function createInitialState(config: ResolvedConfig): SimulationState {
  return {
    star: {
      position: config.starPosition,
      velocity: config.starVelocity,
      mass: config.starMass,
      captured: false,
    },
    blackHole: {
      position: ZERO,
      velocity: ZERO,
      mass: config.blackHoleMass,
    },
    camera: {
      position: config.cameraPosition,
      front: config.cameraFront,
      up: config.cameraUp,
      fieldOfView: config.fieldOfView,
      near: config.near,
      far: config.far,
    },
    frame: 0,
  };
}
