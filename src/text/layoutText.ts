/**
 * Turns strings into glyph quads for the text pass.
 *
 * Output is four TextVertex per visible glyph in TL, TR, BL, BR order,
 * matching buildQuadIndices. When a shadow is requested every shadow quad
 * precedes every text quad, so text always lands on top.
 */

import { UI_REFERENCE_HEIGHT } from "../constants";
import type { Vec2 } from "../math/mat3";
import type { TextVertex } from "../layout/types";
import type { Color } from "../types/color";
import {
  DEFAULT_TEXT_STYLE,
  SHADOW_SHADE,
  type GlyphAtlas,
  type GlyphMetrics,
  type TextAnchor,
  type TextStyle,
} from "./types";

export interface TextMeasurement {
  readonly width: number;
  readonly height: number;
}

/** UI size factor relative to a 2160-pixel-tall window */
export function uiScale(windowHeight: number): number {
  return windowHeight / UI_REFERENCE_HEIGHT;
}

function lookupGlyph(atlas: GlyphAtlas, codePoint: number): GlyphMetrics | undefined {
  const glyph = atlas.glyphs[codePoint];
  if (glyph || atlas.fallback === undefined) return glyph;
  return atlas.glyphs[atlas.fallback];
}

/** Pen advance for one character at `fontSize` */
function advanceOf(atlas: GlyphAtlas, glyph: GlyphMetrics | undefined, fontSize: number): number {
  return glyph ? glyph.xAdvance * (fontSize / atlas.size) : fontSize / 2;
}

function lineWidth(atlas: GlyphAtlas, line: string, fontSize: number): number {
  let width = 0;
  for (const ch of line) {
    width += advanceOf(atlas, lookupGlyph(atlas, ch.codePointAt(0) ?? 0), fontSize);
  }
  return width;
}

export function measureText(atlas: GlyphAtlas, text: string, fontSize: number): TextMeasurement {
  const lines = text.split("\n");
  let width = 0;
  for (const line of lines) {
    width = Math.max(width, lineWidth(atlas, line, fontSize));
  }
  return { width, height: lines.length * atlas.lineHeight * (fontSize / atlas.size) };
}

/** Fraction of the block's size to step back from the position */
function anchorFactors(anchor: TextAnchor): Vec2 {
  switch (anchor) {
    case "topLeft":
      return [0, 0];
    case "top":
      return [0.5, 0];
    case "topRight":
      return [1, 0];
    case "left":
      return [0, 0.5];
    case "center":
      return [0.5, 0.5];
    case "right":
      return [1, 0.5];
    case "bottomLeft":
      return [0, 1];
    case "bottom":
      return [0.5, 1];
    case "bottomRight":
      return [1, 1];
  }
}

interface GlyphQuad {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  u0: number;
  v0: number;
  u1: number;
  v1: number;
}

function pushQuad(out: TextVertex[], q: GlyphQuad, dx: number, dy: number, color: Color): void {
  out.push(
    { position: [q.x0 + dx, q.y0 + dy], uv: [q.u0, q.v0], color },
    { position: [q.x1 + dx, q.y0 + dy], uv: [q.u1, q.v0], color },
    { position: [q.x0 + dx, q.y1 + dy], uv: [q.u0, q.v1], color },
    { position: [q.x1 + dx, q.y1 + dy], uv: [q.u1, q.v1], color }
  );
}

/**
 * Lay out `text` at `position` (pixels, origin top-left).
 * The block's origin is snapped to whole pixels.
 */
export function layoutText(
  atlas: GlyphAtlas,
  text: string,
  position: Vec2,
  style: TextStyle = {}
): TextVertex[] {
  const { color, fontSize, anchor, shadow, shadowOffset } = { ...DEFAULT_TEXT_STYLE, ...style };
  const scale = fontSize / atlas.size;
  const lineHeight = atlas.lineHeight * scale;

  const size = measureText(atlas, text, fontSize);
  const [fx, fy] = anchorFactors(anchor);
  const originX = Math.round(position[0] - size.width * fx);
  const originY = Math.round(position[1] - size.height * fy);

  const quads: GlyphQuad[] = [];
  text.split("\n").forEach((line, row) => {
    let penX = originX;
    const penY = originY + row * lineHeight;

    for (const ch of line) {
      const glyph = lookupGlyph(atlas, ch.codePointAt(0) ?? 0);
      if (glyph && glyph.width > 0 && glyph.height > 0) {
        const x0 = penX + glyph.xOffset * scale;
        const y0 = penY + glyph.yOffset * scale;
        quads.push({
          x0,
          y0,
          x1: x0 + glyph.width * scale,
          y1: y0 + glyph.height * scale,
          u0: glyph.x / atlas.width,
          v0: glyph.y / atlas.height,
          u1: (glyph.x + glyph.width) / atlas.width,
          v1: (glyph.y + glyph.height) / atlas.height,
        });
      }
      penX += advanceOf(atlas, glyph, fontSize);
    }
  });

  const vertices: TextVertex[] = [];
  if (shadow) {
    const shade: Color = [SHADOW_SHADE, SHADOW_SHADE, SHADOW_SHADE, color[3]];
    for (const q of quads) pushQuad(vertices, q, shadowOffset, shadowOffset, shade);
  }
  for (const q of quads) pushQuad(vertices, q, 0, 0, color);
  return vertices;
}
