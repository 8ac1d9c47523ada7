/**
 * Jump line shaders.
 *
 * A jump is a quad of four vertices, two per endpoint, pushed apart along
 * the segment's unit normal. The normal is interpolated across the quad,
 * so |v_normal| is 0 on the centerline and 1 on the outer edges.
 *
 * a_position.z is the line level: it widens the line and is written as
 * depth, so route segments win the GEQUAL depth test over plain ones.
 */

import { GAMMA_CORRECT, LINE_EDGE, LINE_PLACEMENT_CONSTANTS } from "./chunks";
import type { ShaderVariants } from "./types";

const LINE_MAIN = `
void main() {
  float half_width = LINE_HALF_WIDTH * a_position.z / max(u_zoom, MIN_ZOOM);
  vec3 offset = u_map_view_matrix * vec3(a_normal * half_width, 0.0);
  vec3 center = u_map_view_matrix * vec3(a_position.xy, 1.0);
  vec3 clip = u_map_scale_matrix * (offset + center);
  gl_Position = vec4(clip.xy, a_position.z * LINE_DEPTH_SCALE, 1.0);
  v_normal = a_normal;
  v_color = a_color;
}
`;

const jumpsVertexDesktop = `#version 300 es
precision highp float;

in vec3 a_position;
in vec2 a_normal;
in vec3 a_color;

uniform mat3 u_map_view_matrix;
uniform mat3 u_map_scale_matrix;
uniform float u_zoom;

out vec2 v_normal;
out vec3 v_color;
${LINE_PLACEMENT_CONSTANTS}${LINE_MAIN}`;

const jumpsVertexWeb = `precision highp float;

attribute vec3 a_position;
attribute vec2 a_normal;
attribute vec3 a_color;

uniform mat3 u_map_view_matrix;
uniform mat3 u_map_scale_matrix;
uniform float u_zoom;

varying vec2 v_normal;
varying vec3 v_color;
${LINE_PLACEMENT_CONSTANTS}${LINE_MAIN}`;

const jumpsFragmentDesktop = `#version 300 es
precision highp float;

in vec2 v_normal;
in vec3 v_color;

out vec4 out_color;
${GAMMA_CORRECT}${LINE_EDGE}
void main() {
  out_color = vec4(gamma_correct(v_color), line_alpha(length(v_normal)));
}
`;

const jumpsFragmentWeb = `precision mediump float;

varying vec2 v_normal;
varying vec3 v_color;
${LINE_EDGE}
void main() {
  gl_FragColor = vec4(v_color, line_alpha(length(v_normal)));
}
`;

export const JUMPS: ShaderVariants = {
  desktop: { vertex: jumpsVertexDesktop, fragment: jumpsFragmentDesktop },
  web: { vertex: jumpsVertexWeb, fragment: jumpsFragmentWeb },
};
