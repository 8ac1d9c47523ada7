/**
 * Runtime glyph atlas for the demo, rasterized with Canvas 2D.
 *
 * Glyphs are drawn white on transparent, so uploading the canvas as an
 * ALPHA texture keeps exactly the coverage the text shader reads.
 */

import type { GlyphAtlas, GlyphMetrics } from "../src/index";

const DEFAULT_CHARSET =
  " !\"#$%&'()*+,-./0123456789:;<=>?@ABCDEFGHIJKLMNOPQRSTUVWXYZ[\\]^_`abcdefghijklmnopqrstuvwxyz{|}~";

export interface GlyphAtlasOptions {
  /** Font family (default: "Arial, sans-serif") */
  fontFamily?: string;
  /** Rasterized font size in pixels (default: 48) */
  fontSize?: number;
  /** Atlas texture size (default: 512) */
  atlasSize?: number;
  charset?: string;
  /** Gap between glyphs (default: 2) */
  padding?: number;
}

export interface RasterizedGlyphAtlas {
  atlas: GlyphAtlas;
  canvas: HTMLCanvasElement;
}

export function rasterizeGlyphAtlas(options: GlyphAtlasOptions = {}): RasterizedGlyphAtlas {
  const {
    fontFamily = "Arial, sans-serif",
    fontSize = 48,
    atlasSize = 512,
    charset = DEFAULT_CHARSET,
    padding = 2,
  } = options;

  const canvas = document.createElement("canvas");
  canvas.width = atlasSize;
  canvas.height = atlasSize;
  const ctx = canvas.getContext("2d");
  if (!ctx) {
    throw new Error("Canvas 2D not supported");
  }

  ctx.clearRect(0, 0, atlasSize, atlasSize);
  ctx.font = `${fontSize}px ${fontFamily}`;
  ctx.textBaseline = "top";
  ctx.fillStyle = "white";

  const glyphs: Record<number, GlyphMetrics> = {};
  const height = Math.ceil(fontSize * 1.2);
  let cursorX = padding;
  let cursorY = padding;

  for (const char of charset) {
    const codePoint = char.codePointAt(0) ?? 0;
    const advance = ctx.measureText(char).width;
    // Whitespace only advances the pen
    const width = char.trim() === "" ? 0 : Math.ceil(advance) + 2;

    if (cursorX + width + padding > atlasSize) {
      cursorX = padding;
      cursorY += height + padding;
    }
    if (cursorY + height + padding > atlasSize) {
      console.warn(`[GlyphAtlas] Atlas full, stopping at character '${char}'`);
      break;
    }

    if (width > 0) {
      ctx.fillText(char, cursorX + 1, cursorY);
    }

    glyphs[codePoint] = {
      x: cursorX,
      y: cursorY,
      width,
      height: width > 0 ? height : 0,
      xOffset: -1,
      yOffset: 0,
      xAdvance: advance,
    };

    cursorX += width + padding;
  }

  const atlas: GlyphAtlas = {
    width: atlasSize,
    height: atlasSize,
    size: fontSize,
    lineHeight: height,
    glyphs,
    fallback: "?".codePointAt(0),
  };

  return { atlas, canvas };
}
