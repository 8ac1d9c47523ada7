/**
 * Glyph atlas metadata and text styling.
 *
 * The atlas texture itself is an ALPHA-format image; coverage is read from
 * its .a channel. Metrics here are in atlas pixels at the base font size.
 */

import { WHITE, type Color } from "../types/color";

/** Metrics for a single glyph in the atlas */
export interface GlyphMetrics {
  /** Position in atlas texture (pixels) */
  readonly x: number;
  readonly y: number;
  /** Size in atlas texture (pixels) */
  readonly width: number;
  readonly height: number;
  /** Offset from pen position to glyph top-left (pixels, at base font size) */
  readonly xOffset: number;
  readonly yOffset: number;
  /** Horizontal advance after this glyph (pixels, at base font size) */
  readonly xAdvance: number;
}

export interface GlyphAtlas {
  /** Atlas texture dimensions */
  readonly width: number;
  readonly height: number;
  /** Font size the glyphs were rasterized at */
  readonly size: number;
  /** Line height (pixels, at base font size) */
  readonly lineHeight: number;
  /** Glyph metrics indexed by code point */
  readonly glyphs: Readonly<Record<number, GlyphMetrics>>;
  /** Code point drawn in place of glyphs the atlas lacks */
  readonly fallback?: number;
}

/** Which point of the text block sits at the layout position */
export type TextAnchor =
  | "topLeft"
  | "top"
  | "topRight"
  | "left"
  | "center"
  | "right"
  | "bottomLeft"
  | "bottom"
  | "bottomRight";

export interface TextStyle {
  /** Tint; alpha is carried into every vertex */
  color?: Color;
  /** Font size in pixels */
  fontSize?: number;
  anchor?: TextAnchor;
  /** Emit a dark copy behind the text */
  shadow?: boolean;
  /** Shadow displacement in pixels, both axes */
  shadowOffset?: number;
}

export const DEFAULT_TEXT_STYLE: Required<TextStyle> = {
  color: WHITE,
  fontSize: 16,
  anchor: "topLeft",
  shadow: false,
  shadowOffset: 3,
};

/** Shadow tint; alpha comes from the text color */
export const SHADOW_SHADE = 0.01;
