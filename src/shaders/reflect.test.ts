import { describe, it, expect } from "vitest";
import { reflectShader } from "./reflect";

const VERTEX_300 = `#version 300 es
precision highp float;
in vec2 a_position;   // corner
in highp vec4 a_color;
uniform mat3 u_matrix;
out vec4 v_color;
/* out vec2 v_commented; */
vec2 helper(in vec2 p) { return p; }
void main() {
  vec4 unused;
  gl_Position = vec4(helper(a_position), 0.0, 1.0);
  v_color = a_color;
}
`;

const FRAGMENT_300 = `#version 300 es
precision highp float;
in vec4 v_color;
uniform sampler2D u_atlas;
out vec4 out_color;
void main() { out_color = v_color; }
`;

const VERTEX_100 = `precision highp float;
attribute vec2 a_position;
uniform vec2 u_window_size;
varying vec2 v_uv;
void main() { gl_Position = vec4(a_position, 0.0, 1.0); v_uv = a_position; }
`;

const FRAGMENT_100 = `precision mediump float;
varying vec2 v_uv;
uniform bool u_textured;
void main() { gl_FragColor = vec4(v_uv, 0.0, 1.0); }
`;

describe("reflectShader", () => {
  it("reads a GLSL ES 3.00 vertex shader", () => {
    const info = reflectShader(VERTEX_300, "vertex");
    expect(info.version).toBe(300);
    expect(info.attributes).toEqual({ a_position: "vec2", a_color: "vec4" });
    expect(info.uniforms).toEqual({ u_matrix: "mat3" });
    expect(info.varyings).toEqual({ v_color: "vec4" });
    expect(info.outputs).toEqual({});
  });

  it("reads a GLSL ES 3.00 fragment shader", () => {
    const info = reflectShader(FRAGMENT_300, "fragment");
    expect(info.varyings).toEqual({ v_color: "vec4" });
    expect(info.uniforms).toEqual({ u_atlas: "sampler2D" });
    expect(info.outputs).toEqual({ out_color: "vec4" });
  });

  it("reads GLSL ES 1.00 shaders", () => {
    const vertex = reflectShader(VERTEX_100, "vertex");
    expect(vertex.version).toBe(100);
    expect(vertex.attributes).toEqual({ a_position: "vec2" });
    expect(vertex.uniforms).toEqual({ u_window_size: "vec2" });
    expect(vertex.varyings).toEqual({ v_uv: "vec2" });

    const fragment = reflectShader(FRAGMENT_100, "fragment");
    expect(fragment.varyings).toEqual({ v_uv: "vec2" });
    expect(fragment.uniforms).toEqual({ u_textured: "bool" });
    expect(fragment.outputs).toEqual({});
  });

  it("ignores declarations inside function bodies and comments", () => {
    const info = reflectShader(VERTEX_300, "vertex");
    expect(Object.keys(info.varyings)).not.toContain("v_commented");
    expect(Object.keys(info.attributes)).toHaveLength(2);
  });
});
