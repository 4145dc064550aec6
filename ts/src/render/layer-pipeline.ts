import type { GpuContext, GpuHandles } from './gpu-context';
import type { FrameUniforms, LayerName, RenderLayer } from './render-layer';
import { SCENE_ORDER } from './render-layer';
import { identity } from '../camera';

/**
 * Fixed-order sequence of render layers.
 *
 * Layers are registered once at startup; `compile()` checks they form the
 * scene order exactly. Call `render()` each frame to upload `model`, `view`
 * and `proj` to every layer's program and draw its mesh as a triangle fan.
 */
export class RenderLayerPipeline<H extends GpuHandles = GpuHandles> {
  private layers = new Map<LayerName, RenderLayer<H>>();
  private executionOrder: RenderLayer<H>[] = [];
  private readonly identityModel = identity();
  private _needsRecompile = true;
  private destroyed = false;

  get needsRecompile(): boolean {
    return this._needsRecompile;
  }

  get size(): number {
    return this.layers.size;
  }

  addLayer(layer: RenderLayer<H>): void {
    if (this.layers.has(layer.name)) {
      throw new Error(`RenderLayer '${layer.name}' already registered`);
    }
    this.layers.set(layer.name, layer);
    this._needsRecompile = true;
  }

  /**
   * Resolve the execution order. Throws unless exactly the scene's layers
   * are registered.
   */
  compile(): LayerName[] {
    const missing = SCENE_ORDER.filter(name => !this.layers.has(name));
    if (missing.length > 0) {
      throw new Error(`RenderLayerPipeline is missing layers: ${missing.join(', ')}`);
    }
    this.executionOrder = SCENE_ORDER.map(name => this.mustGet(name));
    this._needsRecompile = false;
    return [...SCENE_ORDER];
  }

  /**
   * Draw every layer in scene order. Returns the names drawn, in order.
   */
  render(gpu: GpuContext<H>, frame: FrameUniforms): LayerName[] {
    if (this.destroyed) throw new Error('RenderLayerPipeline has been destroyed');
    if (this._needsRecompile) this.compile();

    const drawn: LayerName[] = [];
    for (const layer of this.executionOrder) {
      const { program } = layer;
      gpu.useProgram(program);
      gpu.setBlendMode(layer.blend);
      gpu.setMatrix(program.uniforms.model, layer.dynamic ? frame.starModel : this.identityModel);
      gpu.setMatrix(program.uniforms.view, frame.view);
      gpu.setMatrix(program.uniforms.proj, frame.projection);
      gpu.drawTriangleFan(layer.mesh);
      drawn.push(layer.name);
    }
    return drawn;
  }

  /** Release every layer's mesh and program. Idempotent. */
  destroy(gpu: GpuContext<H>): void {
    if (this.destroyed) return;
    this.destroyed = true;
    for (const layer of this.layers.values()) {
      gpu.deleteMesh(layer.mesh);
      gpu.deleteProgram(layer.program);
    }
    this.layers.clear();
    this.executionOrder = [];
  }

  private mustGet(name: LayerName): RenderLayer<H> {
    const layer = this.layers.get(name);
    if (!layer) throw new Error(`RenderLayer '${name}' is not registered`);
    return layer;
  }
}
