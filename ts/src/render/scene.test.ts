import { describe, it, expect } from 'vitest';
import { createScene } from './scene';
import { SCENE_SHADERS } from './shader-assets';
import { SCENE_ORDER } from './render-layer';
import { identity, translation } from '../camera';
import { FakeGpuContext } from '../test-utils/fake-gpu';

describe('SCENE_SHADERS', () => {
  it('declares model, view and proj in every vertex shader', () => {
    for (const name of SCENE_ORDER) {
      const { vertex } = SCENE_SHADERS[name];
      expect(vertex).toContain('uniform mat4 model;');
      expect(vertex).toContain('uniform mat4 view;');
      expect(vertex).toContain('uniform mat4 proj;');
    }
  });

  it('uses the lensing falloff for the background', () => {
    expect(SCENE_SHADERS.background.fragment).toContain('1.0 / (1.0 + LENS_STRENGTH * pow(r, 3.0))');
    expect(SCENE_SHADERS.background.fragment).toContain('const float LENS_STRENGTH = 20.0;');
  });

  it('boosts the photon ring colour', () => {
    expect(SCENE_SHADERS.ring.fragment).toContain('const float INTENSITY = 1.5;');
  });
});

describe('createScene', () => {
  it('creates one program and one mesh per layer, in scene order', () => {
    const gpu = new FakeGpuContext();
    createScene(gpu, SCENE_SHADERS);
    expect(gpu.callsOf('createProgram')).toEqual(SCENE_ORDER.map(n => `createProgram:${n}`));
    expect(gpu.callsOf('createMesh')).toEqual(SCENE_ORDER.map(n => `createMesh:${n}`));
  });

  it('builds quads for the bodies and fan disks for disk and ring', () => {
    const gpu = new FakeGpuContext();
    createScene(gpu, SCENE_SHADERS);
    expect(gpu.meshData.get('background')?.vertexCount).toBe(4);
    expect(gpu.meshData.get('background')?.colors).toBeNull();
    expect(gpu.meshData.get('blackhole')?.vertexCount).toBe(4);
    expect(gpu.meshData.get('star')?.vertexCount).toBe(4);
    expect(gpu.meshData.get('disk')?.vertexCount).toBe(66);
    expect(gpu.meshData.get('ring')?.vertexCount).toBe(66);
  });

  it('sizes the backdrop to span -40..40', () => {
    const gpu = new FakeGpuContext();
    createScene(gpu, SCENE_SHADERS);
    expect(Array.from(gpu.meshData.get('background')?.positions ?? []).slice(0, 3)).toEqual([-40, -40, 0]);
  });

  it('returns a compiled pipeline that moves only the star', () => {
    const gpu = new FakeGpuContext();
    const pipeline = createScene(gpu, SCENE_SHADERS);
    expect(pipeline.needsRecompile).toBe(false);
    gpu.reset();
    const starModel = translation([0, 0, 5]);
    pipeline.render(gpu, { view: identity(), projection: identity(), starModel });
    expect(gpu.uploads.get('star.model')).toBe(starModel);
    expect(gpu.uploads.get('blackhole.model')).not.toBe(starModel);
    expect(gpu.callsOf('blend')).toEqual([
      'blend:opaque', 'blend:alpha', 'blend:additive', 'blend:opaque', 'blend:opaque',
    ]);
  });

  it('releases everything created so far when a program fails', () => {
    const gpu = new FakeGpuContext({ failProgram: 'ring' });
    expect(() => createScene(gpu, SCENE_SHADERS)).toThrow(/'ring' failed to compile/);
    expect(gpu.livePrograms.size).toBe(0);
    expect(gpu.liveMeshes.size).toBe(0);
    expect(gpu.callsOf('deleteProgram')).toEqual(['deleteProgram:background', 'deleteProgram:disk']);
  });
});
