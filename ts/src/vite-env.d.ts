/// <reference types="vite/client" />

// GLSL sources under shaders/ are imported as raw text via Vite's ?raw suffix,
// which vite/client declares.
