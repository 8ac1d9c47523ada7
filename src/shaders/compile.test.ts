import { describe, it, expect, vi } from "vitest";
import { createProgram, compileShader, ShaderProgramError } from "./compile";
import { createMockGL } from "../testing/mockGL";

const label = { id: "quad", variant: "web" };

describe("compileShader", () => {
  it("compiles a vertex shader", () => {
    const gl = createMockGL();
    compileShader(gl, "vertex", "void main() {}", label);
    expect(gl.createShader).toHaveBeenCalledWith(gl.VERTEX_SHADER);
    expect(gl.shaderSource).toHaveBeenCalledWith(expect.anything(), "void main() {}");
  });

  it("names the program, variant and stage on failure", () => {
    const gl = createMockGL();
    vi.mocked(gl.getShaderParameter).mockReturnValue(false);
    vi.mocked(gl.getShaderInfoLog).mockReturnValue("ERROR: 0:3: 'vec5' : syntax error\n");

    let caught: unknown;
    try {
      compileShader(gl, "fragment", "bad", label);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ShaderProgramError);
    if (!(caught instanceof ShaderProgramError)) return;
    expect(caught.message).toBe(
      `Program "quad" (web) fragment failed: ERROR: 0:3: 'vec5' : syntax error`
    );
    expect(caught.programId).toBe("quad");
    expect(caught.variant).toBe("web");
    expect(caught.stage).toBe("fragment");
    expect(gl.deleteShader).toHaveBeenCalledTimes(1);
  });
});

describe("createProgram", () => {
  it("binds attribute locations before linking", () => {
    const gl = createMockGL();
    createProgram(gl, "v", "f", label, { a_position: 0, a_uv: 7 });

    expect(gl.bindAttribLocation).toHaveBeenCalledWith(expect.anything(), 0, "a_position");
    expect(gl.bindAttribLocation).toHaveBeenCalledWith(expect.anything(), 7, "a_uv");
    const bindOrder = vi.mocked(gl.bindAttribLocation).mock.invocationCallOrder[0] ?? 0;
    const linkOrder = vi.mocked(gl.linkProgram).mock.invocationCallOrder[0] ?? 0;
    expect(bindOrder).toBeLessThan(linkOrder);
  });

  it("releases the vertex shader when the fragment shader fails", () => {
    const gl = createMockGL();
    vi.mocked(gl.getShaderParameter).mockReturnValueOnce(true).mockReturnValueOnce(false);

    expect(() => createProgram(gl, "v", "f", label)).toThrow(ShaderProgramError);
    expect(gl.deleteShader).toHaveBeenCalledTimes(2);
    expect(gl.createProgram).not.toHaveBeenCalled();
  });

  it("reports link failures", () => {
    const gl = createMockGL();
    vi.mocked(gl.getProgramParameter).mockReturnValue(false);
    vi.mocked(gl.getProgramInfoLog).mockReturnValue("varying v_uv type mismatch");

    expect(() => createProgram(gl, "v", "f", { id: "text", variant: "desktop" })).toThrow(
      `Program "text" (desktop) link failed: varying v_uv type mismatch`
    );
    expect(gl.deleteProgram).toHaveBeenCalled();
  });
});
