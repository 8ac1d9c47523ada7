/**
 * Screen-space shaders: UI quads and text glyphs.
 *
 * Positions arrive in pixels with the origin at the top-left corner:
 * clip = (vec2(x, h - y) / size) * 2 - 1
 */

import { GAMMA_CORRECT } from "./chunks";
import type { ShaderVariants } from "./types";

const PIXEL_TO_CLIP = `
vec4 pixel_to_clip(vec2 pixel) {
  vec2 size = max(u_window_size, vec2(1.0));
  vec2 clip = vec2(pixel.x, size.y - pixel.y) / size * 2.0 - 1.0;
  return vec4(clip, 0.0, 1.0);
}
`;

// UI quads: one per draw call; the tint is a uniform

const quadVertexDesktop = `#version 300 es
precision highp float;

in vec2 a_position;
in vec2 a_uv;

uniform vec2 u_window_size;

out vec2 v_uv;
${PIXEL_TO_CLIP}
void main() {
  gl_Position = pixel_to_clip(a_position);
  v_uv = a_uv;
}
`;

const quadVertexWeb = `precision highp float;

attribute vec2 a_position;
attribute vec2 a_uv;

uniform vec2 u_window_size;

varying vec2 v_uv;
${PIXEL_TO_CLIP}
void main() {
  gl_Position = pixel_to_clip(a_position);
  v_uv = a_uv;
}
`;

const quadFragmentDesktop = `#version 300 es
precision highp float;

in vec2 v_uv;

uniform sampler2D u_texture_atlas;
uniform bool u_textured;
uniform vec4 u_color;

out vec4 out_color;
${GAMMA_CORRECT}
void main() {
  vec4 tint = vec4(gamma_correct(u_color.rgb), u_color.a);
  if (u_textured) {
    vec4 texel = texture(u_texture_atlas, v_uv);
    out_color = vec4(gamma_correct(texel.rgb) * tint.rgb, texel.a * tint.a);
  } else {
    out_color = tint;
  }
}
`;

const quadFragmentWeb = `precision mediump float;

varying vec2 v_uv;

uniform sampler2D u_texture_atlas;
uniform bool u_textured;
uniform vec4 u_color;

void main() {
  if (u_textured) {
    gl_FragColor = texture2D(u_texture_atlas, v_uv) * u_color;
  } else {
    gl_FragColor = u_color;
  }
}
`;

export const QUAD: ShaderVariants = {
  desktop: { vertex: quadVertexDesktop, fragment: quadFragmentDesktop },
  web: { vertex: quadVertexWeb, fragment: quadFragmentWeb },
};

// Text: per-vertex RGBA tint (alpha embedded), coverage from the atlas alpha channel

const textVertexDesktop = `#version 300 es
precision highp float;

in vec2 a_position;
in vec2 a_uv;
in vec4 a_color;

uniform vec2 u_window_size;

out vec2 v_uv;
out vec4 v_color;
${PIXEL_TO_CLIP}
void main() {
  gl_Position = pixel_to_clip(a_position);
  v_uv = a_uv;
  v_color = a_color;
}
`;

const textVertexWeb = `precision highp float;

attribute vec2 a_position;
attribute vec2 a_uv;
attribute vec4 a_color;

uniform vec2 u_window_size;

varying vec2 v_uv;
varying vec4 v_color;
${PIXEL_TO_CLIP}
void main() {
  gl_Position = pixel_to_clip(a_position);
  v_uv = a_uv;
  v_color = a_color;
}
`;

const textFragmentDesktop = `#version 300 es
precision highp float;

in vec2 v_uv;
in vec4 v_color;

uniform sampler2D u_font_atlas;

out vec4 out_color;
${GAMMA_CORRECT}
void main() {
  float coverage = texture(u_font_atlas, v_uv).a;
  out_color = vec4(gamma_correct(v_color.rgb) * coverage, v_color.a * coverage);
}
`;

const textFragmentWeb = `precision mediump float;

varying vec2 v_uv;
varying vec4 v_color;

uniform sampler2D u_font_atlas;

void main() {
  float coverage = texture2D(u_font_atlas, v_uv).a;
  gl_FragColor = vec4(v_color.rgb * coverage, v_color.a * coverage);
}
`;

export const TEXT: ShaderVariants = {
  desktop: { vertex: textVertexDesktop, fragment: textFragmentDesktop },
  web: { vertex: textVertexWeb, fragment: textFragmentWeb },
};
