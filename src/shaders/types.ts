/** Target backend; selects which shader dialect every program is compiled from */
export type BackendKind = "desktop" | "web";

export const BACKEND_KINDS: readonly BackendKind[] = ["desktop", "web"];

export type ProgramId =
  | "systems.glow"
  | "systems.disc"
  | "systems.flat"
  | "jumps"
  | "quad"
  | "text";

export const PROGRAM_IDS: readonly ProgramId[] = [
  "systems.glow",
  "systems.disc",
  "systems.flat",
  "jumps",
  "quad",
  "text",
];

export interface ShaderSourcePair {
  readonly vertex: string;
  readonly fragment: string;
}

/** One program written once per dialect */
export type ShaderVariants = Readonly<Record<BackendKind, ShaderSourcePair>>;

export type GlslType = "float" | "bool" | "vec2" | "vec3" | "vec4" | "mat3" | "sampler2D";

/**
 * Inputs both variants of a program must declare, with identical names
 * and types, so one binding path serves either dialect.
 */
export interface ProgramContract {
  readonly attributes: Readonly<Record<string, GlslType>>;
  readonly uniforms: Readonly<Record<string, GlslType>>;
}
