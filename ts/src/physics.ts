import type { Vec3 } from './vec3';
import { ZERO, add, distance, isFiniteVec3, scale, segmentPointDistance, sub } from './vec3';
import type { Body, StarState } from './simulation-state';

export interface PhysicsConstants {
  /** G, in m³·kg⁻¹·s⁻². */
  readonly gravitationalConstant: number;
  /** Fixed simulated seconds per step. Never derived from wall-clock time. */
  readonly timestep: number;
  /** Separation at or below which the star is absorbed. */
  readonly captureRadius: number;
}

/**
 * Acceleration exerted on a point at `position` by `attractor`:
 * magnitude G·M / r², directed toward the attractor.
 *
 * The separation is clamped to `minSeparation`, so the magnitude never
 * exceeds G·M / minSeparation². Coincident points yield a zero vector.
 */
export function gravitationalAcceleration(
  position: Vec3,
  attractor: Body,
  gravitationalConstant: number,
  minSeparation: number,
): Vec3 {
  const offset = sub(attractor.position, position);
  const r = distance(attractor.position, position);
  if (r === 0) return ZERO;
  const clamped = Math.max(r, minSeparation);
  const magnitude = (gravitationalConstant * attractor.mass) / (clamped * clamped);
  return scale(offset, magnitude / r);
}

function capture(star: StarState, blackHole: Body): StarState {
  return { ...star, position: blackHole.position, velocity: ZERO, captured: true };
}

/**
 * Advance the star by one semi-implicit Euler step around a fixed black hole:
 * velocity first, then position from the updated velocity.
 *
 * The star is captured instead of stepped when it is already within
 * `captureRadius`, when the step would carry it within `captureRadius` of the
 * black hole (including straight through it), or when the result is not
 * finite. A captured star is returned as is.
 */
export function stepStar(star: StarState, blackHole: Body, constants: PhysicsConstants): StarState {
  if (star.captured) return star;

  const { gravitationalConstant, timestep, captureRadius } = constants;
  if (distance(star.position, blackHole.position) <= captureRadius) {
    return capture(star, blackHole);
  }

  const acceleration = gravitationalAcceleration(
    star.position, blackHole, gravitationalConstant, captureRadius,
  );
  const velocity = add(star.velocity, scale(acceleration, timestep));
  const position = add(star.position, scale(velocity, timestep));

  if (
    !isFiniteVec3(velocity) ||
    !isFiniteVec3(position) ||
    segmentPointDistance(star.position, position, blackHole.position) <= captureRadius
  ) {
    return capture(star, blackHole);
  }

  return { ...star, position, velocity };
}
