import type { Mat4 } from '../camera';
import type { BlendMode, GpuHandles, MeshHandle, ProgramHandle } from './gpu-context';

/**
 * Back-to-front draw order. There is no depth test between layers, so this
 * order alone decides what covers what.
 */
export const SCENE_ORDER = ['background', 'disk', 'ring', 'blackhole', 'star'] as const;
export type LayerName = (typeof SCENE_ORDER)[number];

/** Per-frame values shared by every layer. */
export interface FrameUniforms {
  view: Mat4;
  projection: Mat4;
  /** Model matrix for the layer that follows the star. */
  starModel: Mat4;
}

export interface RenderLayer<H extends GpuHandles = GpuHandles> {
  readonly name: LayerName;
  readonly program: ProgramHandle<H>;
  readonly mesh: MeshHandle<H>;
  readonly blend: BlendMode;
  /** Dynamic layers take `FrameUniforms.starModel`; static ones use identity. */
  readonly dynamic: boolean;
}
