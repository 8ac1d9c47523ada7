/**
 * Shader compilation utilities
 */

export type ShaderStage = "vertex" | "fragment" | "link" | "validate";

/** Identifies a program in error messages */
export interface ProgramLabel {
  readonly id: string;
  readonly variant: string;
}

/** Fatal program error; names the failing program, variant and stage */
export class ShaderProgramError extends Error {
  readonly programId: string;
  readonly variant: string;
  readonly stage: ShaderStage;
  readonly log: string;

  constructor(label: ProgramLabel, stage: ShaderStage, log: string) {
    super(`Program "${label.id}" (${label.variant}) ${stage} failed: ${log}`);
    this.name = "ShaderProgramError";
    this.programId = label.id;
    this.variant = label.variant;
    this.stage = stage;
    this.log = log;
  }
}

/** Compile a shader from source */
export function compileShader(
  gl: WebGL2RenderingContext,
  stage: "vertex" | "fragment",
  source: string,
  label: ProgramLabel
): WebGLShader {
  const shader = gl.createShader(stage === "vertex" ? gl.VERTEX_SHADER : gl.FRAGMENT_SHADER);
  if (!shader) {
    throw new Error("Failed to create shader");
  }

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader) ?? "";
    gl.deleteShader(shader);
    throw new ShaderProgramError(label, stage, log.trim() || "no info log");
  }

  return shader;
}

/**
 * Create and link a shader program.
 * Attribute locations are bound before linking so every program (and
 * both dialects) agree on where a named attribute lives.
 */
export function createProgram(
  gl: WebGL2RenderingContext,
  vertexSource: string,
  fragmentSource: string,
  label: ProgramLabel,
  attributeLocations: Readonly<Record<string, number>> = {}
): WebGLProgram {
  const vs = compileShader(gl, "vertex", vertexSource, label);
  let fs: WebGLShader;
  try {
    fs = compileShader(gl, "fragment", fragmentSource, label);
  } catch (err) {
    gl.deleteShader(vs);
    throw err;
  }

  const program = gl.createProgram();
  if (!program) {
    gl.deleteShader(vs);
    gl.deleteShader(fs);
    throw new Error("Failed to create program");
  }

  gl.attachShader(program, vs);
  gl.attachShader(program, fs);
  for (const [name, location] of Object.entries(attributeLocations)) {
    gl.bindAttribLocation(program, location, name);
  }
  gl.linkProgram(program);

  // Shaders are owned by the program once linked (or discarded on failure)
  gl.deleteShader(vs);
  gl.deleteShader(fs);

  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const log = gl.getProgramInfoLog(program) ?? "";
    gl.deleteProgram(program);
    throw new ShaderProgramError(label, "link", log.trim() || "no info log");
  }

  return program;
}
