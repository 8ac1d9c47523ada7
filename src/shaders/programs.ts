/**
 * Program registry: sources per dialect and the contract both must honor.
 */

import { JUMPS } from "./jumps";
import { reflectShader } from "./reflect";
import { QUAD, TEXT } from "./screen";
import { SYSTEMS_DISC, SYSTEMS_FLAT, SYSTEMS_GLOW } from "./systems";
import {
  BACKEND_KINDS,
  type BackendKind,
  type ProgramContract,
  type ProgramId,
  type ShaderSourcePair,
  type ShaderVariants,
} from "./types";

const MAP_UNIFORMS = {
  u_map_view_matrix: "mat3",
  u_map_scale_matrix: "mat3",
  u_zoom: "float",
} as const;

const SYSTEMS_CONTRACT: ProgramContract = {
  attributes: {
    a_position: "vec2",
    a_color: "vec4",
    a_highlight: "vec4",
    a_center: "vec2",
    a_scale: "float",
    a_radius: "float",
  },
  uniforms: MAP_UNIFORMS,
};

export const PROGRAM_CONTRACTS: Readonly<Record<ProgramId, ProgramContract>> = {
  "systems.glow": SYSTEMS_CONTRACT,
  "systems.disc": SYSTEMS_CONTRACT,
  "systems.flat": SYSTEMS_CONTRACT,
  jumps: {
    attributes: { a_position: "vec3", a_normal: "vec2", a_color: "vec3" },
    uniforms: MAP_UNIFORMS,
  },
  quad: {
    attributes: { a_position: "vec2", a_uv: "vec2" },
    uniforms: {
      u_window_size: "vec2",
      u_texture_atlas: "sampler2D",
      u_textured: "bool",
      u_color: "vec4",
    },
  },
  text: {
    attributes: { a_position: "vec2", a_uv: "vec2", a_color: "vec4" },
    uniforms: { u_window_size: "vec2", u_font_atlas: "sampler2D" },
  },
};

export const PROGRAM_SOURCES: Readonly<Record<ProgramId, ShaderVariants>> = {
  "systems.glow": SYSTEMS_GLOW,
  "systems.disc": SYSTEMS_DISC,
  "systems.flat": SYSTEMS_FLAT,
  jumps: JUMPS,
  quad: QUAD,
  text: TEXT,
};

export function getShaderSources(id: ProgramId, kind: BackendKind): ShaderSourcePair {
  return PROGRAM_SOURCES[id][kind];
}

const EXPECTED_VERSION: Record<BackendKind, number> = { desktop: 300, web: 100 };

/**
 * Compare one source pair against a program's contract.
 * Returns human-readable mismatches; empty when the pair conforms.
 */
export function checkSourcePair(
  id: ProgramId,
  kind: BackendKind,
  sources: ShaderSourcePair
): string[] {
  const contract = PROGRAM_CONTRACTS[id];
  const vertex = reflectShader(sources.vertex, "vertex");
  const fragment = reflectShader(sources.fragment, "fragment");
  const problems: string[] = [];
  const where = `${id} (${kind})`;

  if (vertex.version !== EXPECTED_VERSION[kind] || fragment.version !== EXPECTED_VERSION[kind]) {
    problems.push(`${where}: expected GLSL ${EXPECTED_VERSION[kind]}`);
  }

  compareDeclarations(`${where} attribute`, contract.attributes, vertex.attributes, problems);

  const uniforms: Record<string, string> = { ...vertex.uniforms };
  for (const [name, type] of Object.entries(fragment.uniforms)) {
    const existing = uniforms[name];
    if (existing !== undefined && existing !== type) {
      problems.push(`${where} uniform ${name}: vertex ${existing}, fragment ${type}`);
    }
    uniforms[name] = type;
  }
  compareDeclarations(`${where} uniform`, contract.uniforms, uniforms, problems);

  for (const [name, type] of Object.entries(fragment.varyings)) {
    const produced = vertex.varyings[name];
    if (produced === undefined) {
      problems.push(`${where} varying ${name}: read by fragment, not written by vertex`);
    } else if (produced !== type) {
      problems.push(`${where} varying ${name}: vertex ${produced}, fragment ${type}`);
    }
  }

  return problems;
}

function compareDeclarations(
  what: string,
  expected: Readonly<Record<string, string>>,
  actual: Readonly<Record<string, string>>,
  problems: string[]
): void {
  for (const [name, type] of Object.entries(expected)) {
    const declared = actual[name];
    if (declared === undefined) {
      problems.push(`${what} ${name}: missing`);
    } else if (declared !== type) {
      problems.push(`${what} ${name}: declared ${declared}, expected ${type}`);
    }
  }
  for (const name of Object.keys(actual)) {
    if (!(name in expected)) {
      problems.push(`${what} ${name}: not in contract`);
    }
  }
}

/** Check every variant of a program; both dialects must declare the same interface */
export function checkProgramContract(id: ProgramId): string[] {
  return BACKEND_KINDS.flatMap((kind) => checkSourcePair(id, kind, PROGRAM_SOURCES[id][kind]));
}
