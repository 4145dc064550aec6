import type { BlendMode, GpuContext, GpuHandles, MeshData, ProgramHandle } from './gpu-context';
import type { LayerName } from './render-layer';
import { SCENE_ORDER } from './render-layer';
import { RenderLayerPipeline } from './layer-pipeline';
import type { SceneShaders } from './shader-assets';
import type { Rgba } from './meshes';
import { fanDisk, quad } from './meshes';

const BACKDROP_HALF_SIZE = 40;
const DISK_RADIUS = 6;
const RING_RADIUS = 2.6;
const BLACK_HOLE_HALF_SIZE = 2;
const STAR_HALF_SIZE = 1;
const FAN_SEGMENTS = 64;

const DISK_CENTER: Rgba = [1.0, 0.55, 0.15, 0.95];
const DISK_RIM: Rgba = [0.6, 0.2, 0.05, 0.0];
const RING_COLOR: Rgba = [1.0, 0.85, 0.6, 1.0];
const BLACK_HOLE_COLOR: Rgba = [0.0, 0.0, 0.0, 1.0];
const STAR_COLOR: Rgba = [1.0, 1.0, 0.7, 1.0];

interface LayerRecipe {
  mesh: MeshData;
  blend: BlendMode;
  dynamic: boolean;
}

const LAYER_RECIPES: Record<LayerName, () => LayerRecipe> = {
  background: () => ({ mesh: quad(BACKDROP_HALF_SIZE), blend: 'opaque', dynamic: false }),
  disk: () => ({ mesh: fanDisk(DISK_RADIUS, FAN_SEGMENTS, DISK_CENTER, DISK_RIM), blend: 'alpha', dynamic: false }),
  ring: () => ({ mesh: fanDisk(RING_RADIUS, FAN_SEGMENTS, RING_COLOR), blend: 'additive', dynamic: false }),
  blackhole: () => ({ mesh: quad(BLACK_HOLE_HALF_SIZE, BLACK_HOLE_COLOR), blend: 'opaque', dynamic: false }),
  star: () => ({ mesh: quad(STAR_HALF_SIZE, STAR_COLOR), blend: 'opaque', dynamic: true }),
};

/**
 * Compile the five layer programs and upload their meshes, once.
 *
 * If any step throws, everything created so far is released before the
 * error propagates.
 */
export function createScene<H extends GpuHandles>(
  gpu: GpuContext<H>,
  shaders: SceneShaders,
): RenderLayerPipeline<H> {
  const pipeline = new RenderLayerPipeline<H>();
  // Program compiled for a layer not yet owned by the pipeline.
  let pending: ProgramHandle<H> | null = null;

  try {
    for (const name of SCENE_ORDER) {
      const recipe = LAYER_RECIPES[name]();
      const program = gpu.createProgram(shaders[name]);
      pending = program;
      const mesh = gpu.createMesh(program, recipe.mesh);
      pipeline.addLayer({ name, program, mesh, blend: recipe.blend, dynamic: recipe.dynamic });
      pending = null;
    }
    pipeline.compile();
  } catch (e) {
    if (pending) gpu.deleteProgram(pending);
    pipeline.destroy(gpu);
    throw e;
  }

  return pipeline;
}
