/**
 * Draw passes and the GL state each one runs under.
 *
 * Passes run back to front in a fixed order; later passes blend over
 * earlier ones, so the order is part of the output.
 */

export type PassKind = "systems" | "jumps" | "quads" | "text";

export const PASS_ORDER: readonly PassKind[] = ["systems", "jumps", "quads", "text"];

export function passIndex(pass: PassKind): number {
  return PASS_ORDER.indexOf(pass);
}

export type BlendFactor = "zero" | "one" | "srcAlpha" | "oneMinusSrcAlpha";

export interface BlendPolicy {
  /** [source, destination] factors for RGB */
  readonly color: readonly [BlendFactor, BlendFactor];
  /** [source, destination] factors for alpha */
  readonly alpha: readonly [BlendFactor, BlendFactor];
}

/** Source over destination for color; destination alpha is left untouched */
export const BLEND_OVER: BlendPolicy = {
  color: ["srcAlpha", "oneMinusSrcAlpha"],
  alpha: ["zero", "one"],
};

export interface PassState {
  readonly blend: BlendPolicy;
  /** GEQUAL depth test with depth writes; the frame clears depth to 0 */
  readonly depthTest: boolean;
}

export const PASS_STATES: Readonly<Record<PassKind, PassState>> = {
  systems: { blend: BLEND_OVER, depthTest: false },
  jumps: { blend: BLEND_OVER, depthTest: true },
  quads: { blend: BLEND_OVER, depthTest: false },
  text: { blend: BLEND_OVER, depthTest: false },
};

function glFactor(gl: WebGL2RenderingContext, factor: BlendFactor): GLenum {
  switch (factor) {
    case "zero":
      return gl.ZERO;
    case "one":
      return gl.ONE;
    case "srcAlpha":
      return gl.SRC_ALPHA;
    case "oneMinusSrcAlpha":
      return gl.ONE_MINUS_SRC_ALPHA;
  }
}

/**
 * Applies pass state, skipping GL calls when nothing changes.
 * Call reset() at frame start since other code may have touched GL state.
 */
export class PassStateCache {
  private gl: WebGL2RenderingContext;
  private blend: BlendPolicy | null = null;
  private depthTest: boolean | null = null;

  constructor(gl: WebGL2RenderingContext) {
    this.gl = gl;
  }

  apply(pass: PassKind): void {
    const state = PASS_STATES[pass];
    const gl = this.gl;

    if (this.blend !== state.blend) {
      gl.enable(gl.BLEND);
      gl.blendEquation(gl.FUNC_ADD);
      gl.blendFuncSeparate(
        glFactor(gl, state.blend.color[0]),
        glFactor(gl, state.blend.color[1]),
        glFactor(gl, state.blend.alpha[0]),
        glFactor(gl, state.blend.alpha[1])
      );
      this.blend = state.blend;
    }

    if (this.depthTest !== state.depthTest) {
      if (state.depthTest) {
        gl.enable(gl.DEPTH_TEST);
        gl.depthFunc(gl.GEQUAL);
        gl.depthMask(true);
      } else {
        gl.disable(gl.DEPTH_TEST);
      }
      this.depthTest = state.depthTest;
    }
  }

  reset(): void {
    this.blend = null;
    this.depthTest = null;
  }
}
