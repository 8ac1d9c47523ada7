/**
 * GLSL snippets valid in both GLSL ES 1.00 and 3.00.
 * Numeric constants come from ../constants so the CPU mirror stays exact.
 */

import {
  DISC_BAND_OFFSET,
  FALLOFF_BASE_FLOOR,
  DISC_INNER_EXPONENT,
  DISC_INNER_OFFSET,
  GAMMA,
  LINE_DEPTH_SCALE,
  LINE_EDGE_END,
  LINE_EDGE_START,
  LINE_HALF_WIDTH,
  LINE_MAX_ALPHA,
  MARKER_ZOOM_CLAMP,
  MIN_FALLOFF_DISTANCE,
  MIN_ZOOM,
  RADIUS_UNIT,
  glslFloat,
} from "../constants";

export const MARKER_PLACEMENT_CONSTANTS = `
const float MIN_ZOOM = ${glslFloat(MIN_ZOOM)};
const float MARKER_ZOOM_CLAMP = ${glslFloat(MARKER_ZOOM_CLAMP)};
const float RADIUS_UNIT = ${glslFloat(RADIUS_UNIT)};
`;

export const LINE_PLACEMENT_CONSTANTS = `
const float MIN_ZOOM = ${glslFloat(MIN_ZOOM)};
const float LINE_HALF_WIDTH = ${glslFloat(LINE_HALF_WIDTH)};
const float LINE_DEPTH_SCALE = ${glslFloat(LINE_DEPTH_SCALE)};
`;

/** Linear color to display encoding. Desktop fragment shaders only. */
export const GAMMA_CORRECT = `
vec3 gamma_correct(vec3 c) {
  return pow(c, vec3(${glslFloat(1 / GAMMA)}));
}
`;

export const MIN_DISTANCE = `
const float MIN_FALLOFF_DISTANCE = ${glslFloat(MIN_FALLOFF_DISTANCE)};
`;

/**
 * Soft glow: inner = (1 - 1/d)^4, band = (1 - 1/d)^2.
 * The base is negative for d < 1, so powers are products, not pow().
 * Flooring it at -1 leaves the clamped result unchanged.
 */
export const GLOW_FALLOFF = `
vec2 marker_falloff(float dist) {
  float t = max(1.0 - 1.0 / dist, ${glslFloat(FALLOFF_BASE_FLOOR)});
  float t2 = t * t;
  return clamp(vec2(t2 * t2, t2), 0.0, 1.0);
}
`;

/** Sharp disc with a thin ring just outside the core */
export const DISC_FALLOFF = `
vec2 marker_falloff(float dist) {
  float inner = 1.0 - pow(dist + ${glslFloat(DISC_INNER_OFFSET)}, ${glslFloat(DISC_INNER_EXPONENT)});
  float b = dist + ${glslFloat(DISC_BAND_OFFSET)};
  return clamp(vec2(inner, 1.0 - b * b), 0.0, 1.0);
}
`;

export const FLAT_FALLOFF = `
float flat_falloff(float dist) {
  float t = max(1.0 - 1.0 / dist, ${glslFloat(FALLOFF_BASE_FLOOR)});
  return clamp(t * t, 0.0, 1.0);
}
`;

export const LINE_EDGE = `
float line_alpha(float n) {
  return (1.0 - smoothstep(${glslFloat(LINE_EDGE_START)}, ${glslFloat(LINE_EDGE_END)}, n)) * ${glslFloat(LINE_MAX_ALPHA)};
}
`;
