/**
 * System marker shaders.
 *
 * Each system is an instanced quad over the corners [-1,1]^2. The fragment
 * stage evaluates a falloff of the distance from the marker center and
 * composites the marker color over a highlight ring.
 *
 * Per-vertex attributes:
 * - a_position: quad corner in marker space
 *
 * Per-instance attributes:
 * - a_color: linear RGBA; alpha fades the whole marker
 * - a_highlight: linear RGBA ring tint; alpha 0 disables the ring
 * - a_center: world position
 * - a_scale, a_radius: size factors
 *
 * Uniforms:
 * - u_map_view_matrix, u_map_scale_matrix: see transform/frameUniforms
 * - u_zoom: current zoom
 */

import {
  DISC_FALLOFF,
  FLAT_FALLOFF,
  GAMMA_CORRECT,
  GLOW_FALLOFF,
  MARKER_PLACEMENT_CONSTANTS,
  MIN_DISTANCE,
} from "./chunks";
import type { ShaderVariants } from "./types";

const MARKER_MAIN = `
void main() {
  float zoom = clamp(u_zoom, MIN_ZOOM, MARKER_ZOOM_CLAMP);
  float extent = a_scale * a_radius * RADIUS_UNIT / zoom;
  vec3 local = u_map_view_matrix * vec3(a_position * extent, 0.0);
  vec3 center = u_map_view_matrix * vec3(a_center, 1.0);
  vec3 clip = u_map_scale_matrix * (local + center);
  gl_Position = vec4(clip.xy, 0.0, 1.0);
  v_position = a_position;
  v_color = a_color;
  v_highlight = a_highlight;
}
`;

const systemsVertexDesktop = `#version 300 es
precision highp float;

in vec2 a_position;
in vec4 a_color;
in vec4 a_highlight;
in vec2 a_center;
in float a_scale;
in float a_radius;

uniform mat3 u_map_view_matrix;
uniform mat3 u_map_scale_matrix;
uniform float u_zoom;

out vec2 v_position;
out vec4 v_color;
out vec4 v_highlight;
${MARKER_PLACEMENT_CONSTANTS}${MARKER_MAIN}`;

const systemsVertexWeb = `precision highp float;

attribute vec2 a_position;
attribute vec4 a_color;
attribute vec4 a_highlight;
attribute vec2 a_center;
attribute float a_scale;
attribute float a_radius;

uniform mat3 u_map_view_matrix;
uniform mat3 u_map_scale_matrix;
uniform float u_zoom;

varying vec2 v_position;
varying vec4 v_color;
varying vec4 v_highlight;
${MARKER_PLACEMENT_CONSTANTS}${MARKER_MAIN}`;

function markerFragmentDesktop(falloff: string): string {
  return `#version 300 es
precision highp float;

in vec2 v_position;
in vec4 v_color;
in vec4 v_highlight;

out vec4 out_color;
${MIN_DISTANCE}${GAMMA_CORRECT}${falloff}
void main() {
  float dist = max(length(v_position), MIN_FALLOFF_DISTANCE);
  if (dist > 1.0) discard;

  vec2 falloff = marker_falloff(dist);
  float inner = falloff.x;
  float ring = falloff.y * v_highlight.a * (1.0 - inner);

  vec3 color = gamma_correct(v_color.rgb);
  vec3 highlight = gamma_correct(v_highlight.rgb);
  out_color = vec4(color * inner + highlight * ring, (inner + ring) * v_color.a);
}
`;
}

function markerFragmentWeb(falloff: string): string {
  return `precision mediump float;

varying vec2 v_position;
varying vec4 v_color;
varying vec4 v_highlight;
${MIN_DISTANCE}${falloff}
void main() {
  float dist = max(length(v_position), MIN_FALLOFF_DISTANCE);
  if (dist > 1.0) discard;

  vec2 falloff = marker_falloff(dist);
  float inner = falloff.x;
  float ring = falloff.y * v_highlight.a * (1.0 - inner);

  gl_FragColor = vec4(v_color.rgb * inner + v_highlight.rgb * ring, (inner + ring) * v_color.a);
}
`;
}

/** Soft glow markers (inverse-power falloff) */
export const SYSTEMS_GLOW: ShaderVariants = {
  desktop: { vertex: systemsVertexDesktop, fragment: markerFragmentDesktop(GLOW_FALLOFF) },
  web: { vertex: systemsVertexWeb, fragment: markerFragmentWeb(GLOW_FALLOFF) },
};

/** Sharp disc markers (polynomial falloff) */
export const SYSTEMS_DISC: ShaderVariants = {
  desktop: { vertex: systemsVertexDesktop, fragment: markerFragmentDesktop(DISC_FALLOFF) },
  web: { vertex: systemsVertexWeb, fragment: markerFragmentWeb(DISC_FALLOFF) },
};

// Minimap discs: one color, one falloff term, the highlight is ignored
const flatFragmentDesktop = `#version 300 es
precision highp float;

in vec2 v_position;
in vec4 v_color;

out vec4 out_color;
${MIN_DISTANCE}${GAMMA_CORRECT}${FLAT_FALLOFF}
void main() {
  float dist = max(length(v_position), MIN_FALLOFF_DISTANCE);
  if (dist > 1.0) discard;
  out_color = vec4(gamma_correct(v_color.rgb), v_color.a * flat_falloff(dist));
}
`;

const flatFragmentWeb = `precision mediump float;

varying vec2 v_position;
varying vec4 v_color;
${MIN_DISTANCE}${FLAT_FALLOFF}
void main() {
  float dist = max(length(v_position), MIN_FALLOFF_DISTANCE);
  if (dist > 1.0) discard;
  gl_FragColor = vec4(v_color.rgb, v_color.a * flat_falloff(dist));
}
`;

export const SYSTEMS_FLAT: ShaderVariants = {
  desktop: { vertex: systemsVertexDesktop, fragment: flatFragmentDesktop },
  web: { vertex: systemsVertexWeb, fragment: flatFragmentWeb },
};
