/** Linear RGBA color, components in [0, 1] */
export type Color = readonly [number, number, number, number];

/** Linear RGB color, components in [0, 1] */
export type Rgb = readonly [number, number, number];

export const TRANSPARENT: Color = [0, 0, 0, 0];
export const WHITE: Color = [1, 1, 1, 1];

/** Attach an alpha channel to an RGB color */
export function withAlpha(rgb: Rgb, alpha: number): Color {
  return [rgb[0], rgb[1], rgb[2], alpha];
}

/** Clamp every channel to [0, 1] */
export function clampColor(color: Color): Color {
  return [clamp01(color[0]), clamp01(color[1]), clamp01(color[2]), clamp01(color[3])];
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
