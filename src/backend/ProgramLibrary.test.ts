import { describe, it, expect, vi, afterEach } from "vitest";
import { ProgramLibrary } from "./ProgramLibrary";
import { ShaderProgramError } from "../shaders/compile";
import { getShaderSources } from "../shaders/programs";
import { PROGRAM_IDS } from "../shaders/types";
import { createMockGL, isMockLocation } from "../testing/mockGL";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ProgramLibrary", () => {
  it("links every program of the variant at construction", () => {
    const gl = createMockGL();
    const library = new ProgramLibrary(gl, "web");

    expect(gl.linkProgram).toHaveBeenCalledTimes(PROGRAM_IDS.length);
    for (const id of PROGRAM_IDS) {
      expect(library.get(id).id).toBe(id);
      expect(library.get(id).generation).toBe(0);
    }
  });

  it("compiles the sources of its own dialect", () => {
    const gl = createMockGL();
    new ProgramLibrary(gl, "desktop");

    expect(gl.shaderSource).toHaveBeenCalledWith(
      expect.anything(),
      getShaderSources("jumps", "desktop").vertex
    );
  });

  it("binds the global attribute locations", () => {
    const gl = createMockGL();
    const library = new ProgramLibrary(gl, "web");
    const quad = library.get("quad").program;

    const quadBindings = vi
      .mocked(gl.bindAttribLocation)
      .mock.calls.filter(([program]) => program === quad)
      .map(([, location, name]) => [name, location]);

    expect(quadBindings).toEqual([
      ["a_position", 0],
      ["a_uv", 7],
    ]);
  });

  it("resolves every contract uniform", () => {
    const gl = createMockGL();
    const library = new ProgramLibrary(gl, "web");
    const uniforms = library.get("quad").uniforms;

    expect([...uniforms.keys()]).toEqual(["u_window_size", "u_texture_atlas", "u_textured", "u_color"]);
    const color = uniforms.get("u_color");
    expect(isMockLocation(color) && color.name).toBe("u_color");
  });

  it("fails when a uniform is not active", () => {
    const gl = createMockGL();
    vi.mocked(gl.getUniformLocation).mockImplementation((_program, name) =>
      name === "u_zoom" ? null : { name }
    );

    expect(() => new ProgramLibrary(gl, "desktop")).toThrow(
      'Program "systems.glow" (desktop) validate failed: uniform u_zoom is not active'
    );
    expect(gl.deleteProgram).toHaveBeenCalledTimes(1);
  });

  it("rejects sources of the wrong dialect before compiling them", () => {
    const gl = createMockGL();

    let caught: unknown;
    try {
      new ProgramLibrary(gl, "web", { quad: getShaderSources("quad", "desktop") });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ShaderProgramError);
    if (!(caught instanceof ShaderProgramError)) return;
    expect(caught.stage).toBe("validate");
    expect(caught.programId).toBe("quad");
    expect(caught.log).toContain("quad (web): expected GLSL 100");
    // the four programs linked before quad are released
    expect(gl.deleteProgram).toHaveBeenCalledTimes(4);
  });

  describe("reload", () => {
    it("swaps in the new program", () => {
      const gl = createMockGL();
      const library = new ProgramLibrary(gl, "web");
      const before = library.get("text").program;

      const ok = library.reload("text", getShaderSources("text", "web"));

      expect(ok).toBe(true);
      expect(library.get("text").program).not.toBe(before);
      expect(library.get("text").generation).toBe(1);
      expect(gl.deleteProgram).toHaveBeenCalledWith(before);
    });

    it("keeps the previous program when the new one fails", () => {
      const gl = createMockGL();
      const library = new ProgramLibrary(gl, "web");
      const before = library.get("text").program;
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      vi.mocked(gl.getShaderParameter).mockReturnValue(false);
      vi.mocked(gl.getShaderInfoLog).mockReturnValue("syntax error");

      const ok = library.reload("text", getShaderSources("text", "web"));

      expect(ok).toBe(false);
      expect(library.get("text").program).toBe(before);
      expect(library.get("text").generation).toBe(0);
      expect(error).toHaveBeenCalledWith(
        '[ProgramLibrary] Reload of text failed, keeping previous program: Program "text" (web) vertex failed: syntax error'
      );
    });
  });

  it("deletes every program on destroy", () => {
    const gl = createMockGL();
    const library = new ProgramLibrary(gl, "web");

    library.destroy();
    library.destroy();

    expect(gl.deleteProgram).toHaveBeenCalledTimes(PROGRAM_IDS.length);
    expect(() => library.get("quad")).toThrow("Cannot use destroyed program library");
  });
});
