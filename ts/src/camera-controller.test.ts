import { describe, it, expect } from 'vitest';
import type { Camera } from './camera-controller';
import {
  CAMERA_KEY_BINDINGS,
  commandForKey,
  moveCamera,
  projectionMatrix,
  rightVector,
  validateCamera,
  viewMatrix,
} from './camera-controller';
import { transformPoint } from './test-utils/matrix';

function makeCamera(overrides: Partial<Camera> = {}): Camera {
  return {
    position: [0, 0, 20],
    front: [0, 0, -1],
    up: [0, 1, 0],
    fieldOfView: 45,
    near: 0.1,
    far: 100,
    ...overrides,
  };
}

describe('camera key bindings', () => {
  it('maps WASD to the four movement commands', () => {
    expect(CAMERA_KEY_BINDINGS).toEqual({
      KeyW: 'forward',
      KeyS: 'backward',
      KeyA: 'left',
      KeyD: 'right',
    });
  });

  it('returns undefined for unbound keys', () => {
    expect(commandForKey('KeyQ')).toBeUndefined();
    expect(commandForKey('toString')).toBeUndefined();
  });
});

describe('moveCamera', () => {
  it('forward moves by exactly 0.5 * front', () => {
    const cam = moveCamera(makeCamera(), 'forward');
    expect(cam.position).toEqual([0, 0, 19.5]);
  });

  it('backward moves by exactly -0.5 * front', () => {
    const cam = moveCamera(makeCamera(), 'backward');
    expect(cam.position).toEqual([0, 0, 20.5]);
  });

  it('strafes along normalize(cross(front, up))', () => {
    const cam = makeCamera();
    const [rx, ry, rz] = rightVector(cam);
    expect(rx).toBe(1);
    expect(ry).toBeCloseTo(0, 12);
    expect(rz).toBeCloseTo(0, 12);
    expect(moveCamera(cam, 'right').position).toEqual([0.5, 0, 20]);
    expect(moveCamera(cam, 'left').position).toEqual([-0.5, 0, 20]);
  });

  it('normalizes a non-unit front before stepping', () => {
    const cam = moveCamera(makeCamera({ front: [0, 0, -4] }), 'forward');
    expect(cam.position).toEqual([0, 0, 19.5]);
  });

  it('honours a custom step', () => {
    const cam = moveCamera(makeCamera(), 'forward', 2);
    expect(cam.position).toEqual([0, 0, 18]);
  });

  it('returns a new camera and leaves the input untouched', () => {
    const before = makeCamera();
    const after = moveCamera(before, 'right');
    expect(after).not.toBe(before);
    expect(before.position).toEqual([0, 0, 20]);
    expect(after.front).toBe(before.front);
  });

  it('repeated commands accumulate step by step', () => {
    let cam = makeCamera();
    for (let i = 0; i < 4; i++) cam = moveCamera(cam, 'forward');
    expect(cam.position).toEqual([0, 0, 18]);
  });
});

describe('viewMatrix', () => {
  it('reflects the pose after a move', () => {
    const cam = moveCamera(makeCamera(), 'forward');
    const [, , z] = transformPoint(viewMatrix(cam), [0, 0, 0]);
    expect(z).toBeCloseTo(-19.5, 5);
  });

  it('places the origin straight ahead of the default camera', () => {
    const cam = makeCamera();
    const clip = transformPoint(projectionMatrix(cam, 800 / 600), transformPoint(viewMatrix(cam), [0, 0, 0]));
    expect(clip[0]).toBeCloseTo(0, 6);
    expect(clip[1]).toBeCloseTo(0, 6);
  });
});

describe('validateCamera', () => {
  it('accepts the default pose', () => {
    expect(() => validateCamera(makeCamera())).not.toThrow();
  });

  it('rejects a zero front', () => {
    expect(() => validateCamera(makeCamera({ front: [0, 0, 0] }))).toThrow(/front must be non-zero/);
  });

  it('rejects a zero up', () => {
    expect(() => validateCamera(makeCamera({ up: [0, 0, 0] }))).toThrow(/up must be non-zero/);
  });

  it('rejects up parallel to front', () => {
    expect(() => validateCamera(makeCamera({ up: [0, 0, 3] }))).toThrow(/parallel/);
  });

  it('rejects an out-of-range field of view', () => {
    expect(() => validateCamera(makeCamera({ fieldOfView: 180 }))).toThrow(/fieldOfView/);
  });

  it('rejects far <= near', () => {
    expect(() => validateCamera(makeCamera({ near: 10, far: 10 }))).toThrow(/near < far/);
  });
});
