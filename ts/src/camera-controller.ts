import type { Vec3 } from './vec3';
import { add, cross, length, normalize, scale } from './vec3';
import type { Mat4 } from './camera';
import { lookAt, perspective } from './camera';

/** Camera pose and lens. Replaced, never mutated, by `moveCamera`. */
export interface Camera {
  readonly position: Vec3;
  readonly front: Vec3;
  readonly up: Vec3;
  /** Vertical field of view in degrees. */
  readonly fieldOfView: number;
  readonly near: number;
  readonly far: number;
}

export type CameraCommand = 'forward' | 'backward' | 'left' | 'right';

/** Physical key codes (KeyboardEvent.code) mapped to camera commands. */
export const CAMERA_KEY_BINDINGS: Readonly<Record<string, CameraCommand>> = {
  KeyW: 'forward',
  KeyS: 'backward',
  KeyA: 'left',
  KeyD: 'right',
};

export const DEFAULT_CAMERA_STEP = 0.5;

const PARALLEL_EPSILON = 1e-9;

export function commandForKey(code: string): CameraCommand | undefined {
  return Object.hasOwn(CAMERA_KEY_BINDINGS, code) ? CAMERA_KEY_BINDINGS[code] : undefined;
}

/** Throws if the pose cannot produce a view matrix or the lens is out of range. */
export function validateCamera(camera: Camera): void {
  if (length(camera.front) === 0) {
    throw new Error('Camera front must be non-zero');
  }
  if (length(camera.up) === 0) {
    throw new Error('Camera up must be non-zero');
  }
  if (length(cross(normalize(camera.front), normalize(camera.up))) < PARALLEL_EPSILON) {
    throw new Error('Camera up must not be parallel to front');
  }
  if (!(camera.fieldOfView > 0 && camera.fieldOfView < 180)) {
    throw new Error('Camera fieldOfView must be within (0, 180) degrees');
  }
  if (!(camera.near > 0) || !(camera.far > camera.near)) {
    throw new Error('Camera planes must satisfy 0 < near < far');
  }
}

/** Unit strafe direction (camera right). */
export function rightVector(camera: Camera): Vec3 {
  return normalize(cross(camera.front, camera.up));
}

/**
 * Apply one discrete movement command. Each call displaces the camera by
 * exactly `step` units, regardless of frame timing.
 */
export function moveCamera(
  camera: Camera,
  command: CameraCommand,
  step = DEFAULT_CAMERA_STEP,
): Camera {
  return { ...camera, position: add(camera.position, commandOffset(camera, command, step)) };
}

function commandOffset(camera: Camera, command: CameraCommand, step: number): Vec3 {
  switch (command) {
    case 'forward': return scale(normalize(camera.front), step);
    case 'backward': return scale(normalize(camera.front), -step);
    case 'left': return scale(rightVector(camera), -step);
    case 'right': return scale(rightVector(camera), step);
  }
}

/** View matrix derived from the current pose. Recomputed on every call. */
export function viewMatrix(camera: Camera): Mat4 {
  return lookAt(camera.position, add(camera.position, camera.front), camera.up);
}

export function projectionMatrix(camera: Camera, aspect: number): Mat4 {
  return perspective(camera.fieldOfView, aspect, camera.near, camera.far);
}
