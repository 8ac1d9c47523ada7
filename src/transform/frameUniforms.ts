/**
 * Per-frame transform state shared by every draw call.
 *
 * World space is the map plane. The view matrix applies zoom and pan,
 * the scale matrix squeezes the longer window axis so a unit circle stays
 * round, and the screen matrix takes clip space to pixels for picking and
 * label placement.
 */

import { MIN_ZOOM } from "../constants";
import { warnOnce } from "../log";
import { type Mat3, type Vec2, create, multiply, clipToPixels } from "../math/mat3";

/** Camera state the renderer reads once per frame */
export interface CameraView {
  /** Pan offset in world units */
  readonly offset: Vec2;
  readonly zoom: number;
}

export interface FrameUniforms {
  readonly viewMatrix: Mat3;
  readonly scaleMatrix: Mat3;
  readonly zoom: number;
  /** Window size in pixels, never below 1x1 */
  readonly windowSize: Vec2;
  /** World to pixel: clipToPixels * scale * view */
  readonly screenMatrix: Mat3;
}

/** Aspect factor of the longer axis: (w/h, 1) for landscape, (1, h/w) for portrait */
export function windowScale(width: number, height: number): [number, number] {
  if (width > height) return [width / height, 1];
  if (height > width) return [1, height / width];
  return [1, 1];
}

/** Reciprocal of windowScale; converts clip-space deltas back into view space */
export function windowRatio(width: number, height: number): [number, number] {
  if (width > height) return [height / width, 1];
  if (height > width) return [1, width / height];
  return [1, 1];
}

export function computeViewMatrix(offset: Vec2, zoom: number): Mat3 {
  const m = create();
  m[0] = zoom;
  m[4] = zoom;
  m[6] = -offset[0] * zoom;
  m[7] = offset[1] * zoom;
  return m;
}

export function computeScaleMatrix(width: number, height: number): Mat3 {
  const [sx, sy] = windowScale(width, height);
  const m = create();
  m[0] = 1 / sx;
  m[4] = 1 / sy;
  return m;
}

/** Round to whole pixels and keep both dimensions at least 1 */
export function clampWindowSize(width: number, height: number): [number, number] {
  const w = Number.isFinite(width) ? Math.max(1, Math.round(width)) : 1;
  const h = Number.isFinite(height) ? Math.max(1, Math.round(height)) : 1;
  if (w !== Math.round(width) || h !== Math.round(height)) {
    warnOnce(
      `window:${width}x${height}`,
      `[Transform] Window size ${width}x${height} clamped to ${w}x${h}`
    );
  }
  return [w, h];
}

export function createFrameUniforms(camera: CameraView, width: number, height: number): FrameUniforms {
  const [w, h] = clampWindowSize(width, height);

  let zoom = camera.zoom;
  if (!(zoom > 0)) {
    warnOnce(`zoom:${zoom}`, `[Transform] Zoom ${zoom} clamped to ${MIN_ZOOM}`);
    zoom = MIN_ZOOM;
  }

  const viewMatrix = computeViewMatrix(camera.offset, zoom);
  const scaleMatrix = computeScaleMatrix(w, h);
  const screenMatrix = multiply(clipToPixels(w, h), multiply(scaleMatrix, viewMatrix));

  return Object.freeze({
    viewMatrix,
    scaleMatrix,
    zoom,
    windowSize: [w, h] as const,
    screenMatrix,
  });
}
