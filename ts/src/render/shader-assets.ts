import backgroundVert from '../shaders/background.vert?raw';
import lensingFrag from '../shaders/lensing.frag?raw';
import billboardVert from '../shaders/billboard.vert?raw';
import colorFrag from '../shaders/color.frag?raw';
import ringFrag from '../shaders/ring.frag?raw';
import type { ShaderSource } from './gpu-context';
import type { LayerName } from './render-layer';

export type SceneShaders = Readonly<Record<LayerName, ShaderSource>>;

/** GLSL ES 3.00 sources for each scene layer, bundled as raw text assets. */
export const SCENE_SHADERS: SceneShaders = {
  background: { name: 'background', vertex: backgroundVert, fragment: lensingFrag },
  disk: { name: 'disk', vertex: billboardVert, fragment: colorFrag },
  ring: { name: 'ring', vertex: billboardVert, fragment: ringFrag },
  blackhole: { name: 'blackhole', vertex: billboardVert, fragment: colorFrag },
  star: { name: 'star', vertex: billboardVert, fragment: colorFrag },
};
