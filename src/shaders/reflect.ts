/**
 * Reads the interface of a GLSL ES 1.00 or 3.00 shader from its global
 * declarations. Only the subset these shaders use is understood: one
 * declaration per statement, no arrays, no interface blocks.
 */

export type ShaderStageKind = "vertex" | "fragment";

export interface ShaderInterface {
  /** 100 or 300 */
  readonly version: number;
  /** Vertex inputs */
  readonly attributes: Readonly<Record<string, string>>;
  readonly uniforms: Readonly<Record<string, string>>;
  /** Vertex outputs, or fragment inputs */
  readonly varyings: Readonly<Record<string, string>>;
  /** Fragment outputs (3.00 only; 1.00 writes gl_FragColor) */
  readonly outputs: Readonly<Record<string, string>>;
}

const DECLARATION =
  /^\s*(attribute|varying|uniform|in|out)\s+(?:(?:highp|mediump|lowp)\s+)?(\w+)\s+(\w+)\s*;/;

function stripComments(source: string): string {
  return source.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\/\/.*$/gm, "");
}

export function reflectShader(source: string, stage: ShaderStageKind): ShaderInterface {
  const text = stripComments(source);
  const version = /^\s*#version\s+300\s+es\b/.test(text) ? 300 : 100;

  const attributes: Record<string, string> = {};
  const uniforms: Record<string, string> = {};
  const varyings: Record<string, string> = {};
  const outputs: Record<string, string> = {};

  let depth = 0;
  for (const line of text.split("\n")) {
    // Only global scope declares the interface
    if (depth === 0) {
      const match = DECLARATION.exec(line);
      if (match) {
        const [, qualifier, type, name] = match;
        if (qualifier && type && name) {
          const target = classify(qualifier, stage, version, { attributes, uniforms, varyings, outputs });
          if (target) target[name] = type;
        }
      }
    }
    for (const ch of line) {
      if (ch === "{") depth++;
      else if (ch === "}") depth--;
    }
  }

  return { version, attributes, uniforms, varyings, outputs };
}

function classify(
  qualifier: string,
  stage: ShaderStageKind,
  version: number,
  tables: {
    attributes: Record<string, string>;
    uniforms: Record<string, string>;
    varyings: Record<string, string>;
    outputs: Record<string, string>;
  }
): Record<string, string> | null {
  switch (qualifier) {
    case "uniform":
      return tables.uniforms;
    case "attribute":
      return version === 100 && stage === "vertex" ? tables.attributes : null;
    case "varying":
      return version === 100 ? tables.varyings : null;
    case "in":
      if (version !== 300) return null;
      return stage === "vertex" ? tables.attributes : tables.varyings;
    case "out":
      if (version !== 300) return null;
      return stage === "vertex" ? tables.varyings : tables.outputs;
    default:
      return null;
  }
}
