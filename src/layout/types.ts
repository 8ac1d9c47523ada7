import type { Vec2 } from "../math/mat3";
import type { Color, Rgb } from "../types/color";

/** One system marker; placed in world space by the transform uniforms */
export interface SystemMarkerInstance {
  readonly center: Vec2;
  readonly scale: number;
  /** Must be positive; clamped when packed */
  readonly radius: number;
  readonly color: Color;
  readonly highlight: Color;
}

/** A jump between two world positions */
export interface JumpSegment {
  readonly from: Vec2;
  readonly to: Vec2;
  readonly fromColor: Rgb;
  readonly toColor: Rgb;
  /** Width multiplier and depth; 1.0 for route jumps, 0.5 otherwise */
  readonly level: number;
}

export interface JumpVertex {
  /** xy endpoint, z line level */
  readonly position: readonly [number, number, number];
  readonly normal: Vec2;
  readonly color: Rgb;
}

export interface QuadVertex {
  /** Pixels, origin top-left */
  readonly position: Vec2;
  readonly uv: Vec2;
}

export interface TextVertex {
  /** Pixels, origin top-left */
  readonly position: Vec2;
  readonly uv: Vec2;
  /** Tint with the glyph's alpha embedded */
  readonly color: Color;
}

/** Axis-aligned rectangle; pixels for UI, normalized texture space for UVs */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}
