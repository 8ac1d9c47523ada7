/**
 * Numeric constants shared by the shader sources and their CPU mirrors.
 *
 * Shader modules interpolate these values with `glslFloat`, so the GLSL
 * and the TypeScript reference implementation always agree.
 */

/** Exponent of the display encoding curve (linear -> display) */
export const GAMMA = 2.2;

/** Smallest marker-space distance fed to a falloff (avoids 1/0 at the center) */
export const MIN_FALLOFF_DISTANCE = 0.001;

/** Lower bound of the (1 - 1/d) falloff base; keeps its powers inside mediump range */
export const FALLOFF_BASE_FLOOR = -1;

/** Polynomial disc falloff: inner = 1 - (d + DISC_INNER_OFFSET)^DISC_INNER_EXPONENT */
export const DISC_INNER_OFFSET = 0.4;
export const DISC_INNER_EXPONENT = 20;
/** Polynomial disc highlight band: 1 - (d + DISC_BAND_OFFSET)^2 */
export const DISC_BAND_OFFSET = 0.3;

/** Jump line edge: alpha = (1 - smoothstep(EDGE_START, EDGE_END, |n|)) * LINE_MAX_ALPHA */
export const LINE_EDGE_START = 0.4;
export const LINE_EDGE_END = 1.0;
export const LINE_MAX_ALPHA = 0.8;

/** Half width of a jump line in view units at zoom 1 (divided by zoom, so constant on screen) */
export const LINE_HALF_WIDTH = 0.004;
/** Line level for jumps on the active route */
export const ROUTE_LINE_LEVEL = 1.0;
/** Line level for every other jump */
export const DEFAULT_LINE_LEVEL = 0.5;
/** Clip-space depth of a line vertex is level * LINE_DEPTH_SCALE (kept inside the far plane) */
export const LINE_DEPTH_SCALE = 0.5;

/** World-to-view factor applied to marker scale * radius */
export const RADIUS_UNIT = 0.002;
/** Zoom beyond which markers stop keeping a constant on-screen size */
export const MARKER_ZOOM_CLAMP = 25;
/** Radius a marker is clamped to when given a non-positive one */
export const MIN_MARKER_RADIUS = 0.5;

/** Camera zoom limits */
export const MIN_ZOOM = 0.25;
export const MAX_ZOOM = 100;

/** Reference window height that UI sizes are authored against */
export const UI_REFERENCE_HEIGHT = 2160;

/** Format a number as a GLSL float literal (always carries a decimal point) */
export function glslFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`Cannot express ${value} as a GLSL float`);
  }
  const text = String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}
