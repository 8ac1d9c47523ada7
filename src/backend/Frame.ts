import { PASS_ORDER, passIndex, type PassKind } from "../compositor/passes";
import type { FrameUniforms } from "../transform/frameUniforms";

export interface FrameStats {
  readonly drawCalls: number;
  /** Markers, jump segments, quads and glyph quads submitted */
  readonly instances: number;
  /** Draws refused for pass order, a missing atlas or a dropped frame */
  readonly skipped: number;
  /** The frame was invalidated (e.g. by a resize) before it ended */
  readonly dropped: boolean;
}

/**
 * One frame between beginFrame and endFrame. Passes may only move
 * forward through PASS_ORDER; a draw for an earlier pass is refused.
 */
export class Frame {
  readonly uniforms: FrameUniforms;
  readonly index: number;

  private cursor = -1;
  private _ended = false;
  private _dropped = false;
  private drawCalls = 0;
  private instances = 0;
  private skipped = 0;

  constructor(uniforms: FrameUniforms, index: number) {
    this.uniforms = uniforms;
    this.index = index;
  }

  /** Current pass, or null before the first draw */
  get pass(): PassKind | null {
    return PASS_ORDER[this.cursor] ?? null;
  }

  get ended(): boolean {
    return this._ended;
  }

  get dropped(): boolean {
    return this._dropped;
  }

  /** Move to `pass`; false when the frame has already moved past it */
  enter(pass: PassKind): boolean {
    const index = passIndex(pass);
    if (index < this.cursor) return false;
    this.cursor = index;
    return true;
  }

  recordDraw(instances: number): void {
    this.drawCalls++;
    this.instances += instances;
  }

  recordSkip(): void {
    this.skipped++;
  }

  drop(): void {
    this._dropped = true;
  }

  finish(): FrameStats {
    this._ended = true;
    return {
      drawCalls: this.drawCalls,
      instances: this.instances,
      skipped: this.skipped,
      dropped: this._dropped,
    };
  }
}
