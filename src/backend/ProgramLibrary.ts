/**
 * Compiled programs for one backend variant, keyed by program id.
 *
 * Every program is checked against its contract before compiling, gets the
 * global attribute locations bound before linking, and has every contract
 * uniform resolved up front. Any failure is a ShaderProgramError.
 */

import { attributeLocationsFor, isAttributeName } from "../layout/layouts";
import { createProgram, ShaderProgramError, type ProgramLabel } from "../shaders/compile";
import { checkSourcePair, getShaderSources, PROGRAM_CONTRACTS } from "../shaders/programs";
import { PROGRAM_IDS, type BackendKind, type ProgramId, type ShaderSourcePair } from "../shaders/types";

export interface ProgramInfo {
  readonly id: ProgramId;
  readonly program: WebGLProgram;
  /** Location of every contract uniform */
  readonly uniforms: ReadonlyMap<string, WebGLUniformLocation>;
  /** Incremented on each successful reload */
  readonly generation: number;
}

export class ProgramLibrary {
  readonly gl: WebGL2RenderingContext;
  readonly kind: BackendKind;

  private programs = new Map<ProgramId, ProgramInfo>();
  private _destroyed = false;

  /**
   * @param overrides - replacement sources for individual programs; the
   *   rest come from the built-in table
   */
  constructor(
    gl: WebGL2RenderingContext,
    kind: BackendKind,
    overrides: Partial<Record<ProgramId, ShaderSourcePair>> = {}
  ) {
    this.gl = gl;
    this.kind = kind;

    try {
      for (const id of PROGRAM_IDS) {
        const sources = overrides[id] ?? getShaderSources(id, kind);
        this.programs.set(id, this.build(id, sources, 0));
      }
    } catch (err) {
      this.destroy();
      throw err;
    }
  }

  get(id: ProgramId): ProgramInfo {
    if (this._destroyed) {
      throw new Error("Cannot use destroyed program library");
    }
    const info = this.programs.get(id);
    if (!info) {
      throw new Error(`Unknown program "${id}"`);
    }
    return info;
  }

  /**
   * Compile `sources` and swap them in for `id`.
   * On failure the current program stays in use and false is returned.
   */
  reload(id: ProgramId, sources: ShaderSourcePair): boolean {
    const current = this.get(id);
    let next: ProgramInfo;
    try {
      next = this.build(id, sources, current.generation + 1);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[ProgramLibrary] Reload of ${id} failed, keeping previous program: ${message}`);
      return false;
    }
    this.gl.deleteProgram(current.program);
    this.programs.set(id, next);
    return true;
  }

  destroy(): void {
    if (this._destroyed) return;
    for (const info of this.programs.values()) {
      this.gl.deleteProgram(info.program);
    }
    this.programs.clear();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  private build(id: ProgramId, sources: ShaderSourcePair, generation: number): ProgramInfo {
    const label: ProgramLabel = { id, variant: this.kind };
    const contract = PROGRAM_CONTRACTS[id];

    const problems = checkSourcePair(id, this.kind, sources);
    if (problems.length > 0) {
      throw new ShaderProgramError(label, "validate", problems.join("; "));
    }

    const attributes = Object.keys(contract.attributes);
    const unplaced = attributes.filter((name) => !isAttributeName(name));
    if (unplaced.length > 0) {
      throw new ShaderProgramError(
        label,
        "validate",
        `no attribute location for ${unplaced.join(", ")}`
      );
    }

    const program = createProgram(
      this.gl,
      sources.vertex,
      sources.fragment,
      label,
      attributeLocationsFor(attributes)
    );

    const uniforms = new Map<string, WebGLUniformLocation>();
    for (const name of Object.keys(contract.uniforms)) {
      const location = this.gl.getUniformLocation(program, name);
      if (location === null) {
        this.gl.deleteProgram(program);
        throw new ShaderProgramError(label, "validate", `uniform ${name} is not active`);
      }
      uniforms.set(name, location);
    }

    return { id, program, uniforms, generation };
  }
}
