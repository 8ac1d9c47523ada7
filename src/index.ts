/**
 * starmap-gl - WebGL2 star map renderer with desktop (GLSL ES 3.00) and
 * web (GLSL ES 1.00) shader variants behind one backend seam
 */

export const VERSION = "0.1.0";

export { StarMap, DEFAULT_STAR_MAP_OPTIONS, type StarMapOptions, type OverlayItem, type MarkerLayerName } from "./StarMap";
export { Camera } from "./Camera";

// Backend
export { RenderBackend, DEFAULT_BACKEND_OPTIONS, type RenderBackendOptions } from "./backend/RenderBackend";
export { Frame, type FrameStats } from "./backend/Frame";
export { ProgramLibrary, type ProgramInfo } from "./backend/ProgramLibrary";
export { GpuBuffer, type BufferTarget, type BufferUsage, type FrameLock } from "./backend/GpuBuffer";
export { VertexArray, type VertexStream } from "./backend/VertexArray";
export { MarkerLayer, JumpLayer, QuadIndexBuffer } from "./backend/layers";
export { createAtlasTexture, type AtlasFormat, type AtlasOptions } from "./backend/textures";

// Shaders
export { ShaderProgramError, createProgram, compileShader, type ShaderStage } from "./shaders/compile";
export { PROGRAM_CONTRACTS, PROGRAM_SOURCES, getShaderSources, checkSourcePair, checkProgramContract } from "./shaders/programs";
export { reflectShader, type ShaderInterface } from "./shaders/reflect";
export {
  BACKEND_KINDS,
  PROGRAM_IDS,
  type BackendKind,
  type ProgramId,
  type ShaderSourcePair,
  type ShaderVariants,
  type ProgramContract,
} from "./shaders/types";

// Layout
export * from "./layout/types";
export * from "./layout/layouts";
export * from "./layout/pack";
export * from "./layout/geometry";

// Compositor
export { PASS_ORDER, PASS_STATES, BLEND_OVER, PassStateCache, type PassKind, type BlendPolicy } from "./compositor/passes";
export * from "./compositor/shading";
export * from "./compositor/display";

// Transform
export * from "./transform/frameUniforms";
export * from "./transform/project";
export * as mat3 from "./math/mat3";
export * as vec2 from "./math/vec2";

// Text
export { layoutText, measureText, uiScale, type TextMeasurement } from "./text/layoutText";
export { DEFAULT_TEXT_STYLE, type GlyphAtlas, type GlyphMetrics, type TextAnchor, type TextStyle } from "./text/types";

// Map scene
export * from "./map/types";
export * from "./map/palette";
export * from "./map/scene";
export * from "./map/picking";
export * from "./map/labels";

export * from "./constants";
export { TRANSPARENT, WHITE, withAlpha, clampColor, type Color, type Rgb } from "./types/color";
