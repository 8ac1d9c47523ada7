/**
 * Reference implementation of the fragment stage.
 *
 * Every function here evaluates the same expression as the matching GLSL
 * in src/shaders, with the same constants, so shading can be checked
 * without a GPU. Results are premultiplied by nothing: they are the raw
 * fragment outputs that blending then consumes.
 */

import {
  DISC_BAND_OFFSET,
  DISC_INNER_EXPONENT,
  DISC_INNER_OFFSET,
  FALLOFF_BASE_FLOOR,
  GAMMA,
  LINE_EDGE_END,
  LINE_EDGE_START,
  LINE_MAX_ALPHA,
  MIN_FALLOFF_DISTANCE,
} from "../constants";
import type { BackendKind } from "../shaders/types";
import { type Color, type Rgb, clamp01 } from "../types/color";

/** Selectable marker look; each maps to one systems.* program */
export type MarkerStyle = "glow" | "disc" | "flat";

export interface Falloff {
  /** Core coverage */
  readonly inner: number;
  /** Highlight ring coverage */
  readonly band: number;
}

export function glowFalloff(dist: number): Falloff {
  const t = Math.max(1 - 1 / dist, FALLOFF_BASE_FLOOR);
  const t2 = t * t;
  return { inner: clamp01(t2 * t2), band: clamp01(t2) };
}

export function discFalloff(dist: number): Falloff {
  const b = dist + DISC_BAND_OFFSET;
  return {
    inner: clamp01(1 - Math.pow(dist + DISC_INNER_OFFSET, DISC_INNER_EXPONENT)),
    band: clamp01(1 - b * b),
  };
}

export function flatFalloff(dist: number): number {
  const t = Math.max(1 - 1 / dist, FALLOFF_BASE_FLOOR);
  return clamp01(t * t);
}

/** Falloff for a style; the flat style has no ring */
export function markerFalloff(style: MarkerStyle, dist: number): Falloff {
  const d = Math.max(dist, MIN_FALLOFF_DISTANCE);
  switch (style) {
    case "glow":
      return glowFalloff(d);
    case "disc":
      return discFalloff(d);
    case "flat":
      return { inner: flatFalloff(d), band: 0 };
  }
}

/** Linear to display encoding, per channel */
export function gammaCorrect(rgb: Rgb): Rgb {
  const k = 1 / GAMMA;
  return [
    Math.pow(Math.max(rgb[0], 0), k),
    Math.pow(Math.max(rgb[1], 0), k),
    Math.pow(Math.max(rgb[2], 0), k),
  ];
}

/** Desktop shaders encode in the fragment stage; web shaders pass linear color through */
function encode(backend: BackendKind, rgb: Rgb): Rgb {
  return backend === "desktop" ? gammaCorrect(rgb) : rgb;
}

function rgbOf(color: Color): Rgb {
  return [color[0], color[1], color[2]];
}

/**
 * Marker fragment at marker-space distance `dist`. Returns null where the
 * shader discards (outside the unit circle). A null highlight is the same
 * marker drawn with no ring at all.
 */
export function shadeMarker(
  backend: BackendKind,
  style: MarkerStyle,
  color: Color,
  highlight: Color | null,
  dist: number
): Color | null {
  const d = Math.max(dist, MIN_FALLOFF_DISTANCE);
  if (d > 1) return null;

  const c = encode(backend, rgbOf(color));

  if (style === "flat") {
    return [c[0], c[1], c[2], color[3] * flatFalloff(d)];
  }

  const { inner, band } = markerFalloff(style, d);
  if (!highlight) {
    return [c[0] * inner, c[1] * inner, c[2] * inner, inner * color[3]];
  }

  const h = encode(backend, rgbOf(highlight));
  const ring = band * highlight[3] * (1 - inner);
  return [
    c[0] * inner + h[0] * ring,
    c[1] * inner + h[1] * ring,
    c[2] * inner + h[2] * ring,
    (inner + ring) * color[3],
  ];
}

/** GLSL smoothstep */
export function smoothstep(edge0: number, edge1: number, x: number): number {
  const t = clamp01((x - edge0) / (edge1 - edge0));
  return t * t * (3 - 2 * t);
}

/** Jump line opacity at interpolated normal length n (0 on the centerline, 1 at the edge) */
export function jumpAlpha(n: number): number {
  return (1 - smoothstep(LINE_EDGE_START, LINE_EDGE_END, n)) * LINE_MAX_ALPHA;
}

export function shadeJump(backend: BackendKind, color: Rgb, normalLength: number): Color {
  const c = encode(backend, color);
  return [c[0], c[1], c[2], jumpAlpha(normalLength)];
}

/** UI quad fragment; `texel` is null for a flat (untextured) quad */
export function shadeQuad(backend: BackendKind, tint: Color, texel: Color | null): Color {
  const t = encode(backend, rgbOf(tint));
  if (!texel) {
    return [t[0], t[1], t[2], tint[3]];
  }
  const s = encode(backend, rgbOf(texel));
  return [s[0] * t[0], s[1] * t[1], s[2] * t[2], texel[3] * tint[3]];
}

/** Text fragment for atlas coverage in [0, 1] */
export function shadeText(backend: BackendKind, tint: Color, coverage: number): Color {
  const t = encode(backend, rgbOf(tint));
  return [t[0] * coverage, t[1] * coverage, t[2] * coverage, tint[3] * coverage];
}
