/**
 * CPU mirrors of the vertex stage. The shaders in src/shaders compute the
 * same expressions; these are used for picking, label placement and tests.
 */

import { LINE_DEPTH_SCALE, LINE_HALF_WIDTH, MARKER_ZOOM_CLAMP, MIN_ZOOM, RADIUS_UNIT } from "../constants";
import { type Vec2, invertAffine, transformPoint, transformVector } from "../math/mat3";
import type { FrameUniforms } from "./frameUniforms";

/** Half extent of a marker quad in world units at the given zoom */
export function markerExtent(scale: number, radius: number, zoom: number): number {
  const clampedZoom = Math.min(Math.max(zoom, MIN_ZOOM), MARKER_ZOOM_CLAMP);
  return (scale * radius * RADIUS_UNIT) / clampedZoom;
}

/** Half width of a jump line in world units */
export function lineHalfWidth(level: number, zoom: number): number {
  return (LINE_HALF_WIDTH * level) / Math.max(zoom, MIN_ZOOM);
}

/**
 * clip = scale * (view * offset + view * center), where offset is a
 * direction (w = 0) and center a point (w = 1).
 */
function composeClip(uniforms: FrameUniforms, offset: Vec2, center: Vec2): [number, number] {
  const local = transformVector(uniforms.viewMatrix, offset);
  const placed = transformPoint(uniforms.viewMatrix, center);
  return transformPoint(uniforms.scaleMatrix, [local[0] + placed[0], local[1] + placed[1]]);
}

export function projectMarkerCorner(
  corner: Vec2,
  marker: { readonly center: Vec2; readonly scale: number; readonly radius: number },
  uniforms: FrameUniforms
): [number, number] {
  const extent = markerExtent(marker.scale, marker.radius, uniforms.zoom);
  return composeClip(uniforms, [corner[0] * extent, corner[1] * extent], marker.center);
}

/** Clip position of a jump vertex; z is the depth derived from the line level */
export function projectJumpVertex(
  position: readonly [number, number, number],
  normal: Vec2,
  uniforms: FrameUniforms
): [number, number, number] {
  const half = lineHalfWidth(position[2], uniforms.zoom);
  const [x, y] = composeClip(uniforms, [normal[0] * half, normal[1] * half], [position[0], position[1]]);
  return [x, y, position[2] * LINE_DEPTH_SCALE];
}

/** Clip position of a jump's centerline endpoint */
export function projectJumpEndpoint(world: Vec2, uniforms: FrameUniforms): [number, number] {
  return composeClip(uniforms, [0, 0], world);
}

/** Screen-space pass transform: pixels (origin top-left) to clip space */
export function pixelToClip(pixel: Vec2, windowSize: Vec2): [number, number] {
  const w = Math.max(windowSize[0], 1);
  const h = Math.max(windowSize[1], 1);
  return [(pixel[0] / w) * 2 - 1, ((h - pixel[1]) / h) * 2 - 1];
}

export function worldToScreen(world: Vec2, uniforms: FrameUniforms): [number, number] {
  return transformPoint(uniforms.screenMatrix, world);
}

export function screenToWorld(pixel: Vec2, uniforms: FrameUniforms): [number, number] {
  const inverse = invertAffine(uniforms.screenMatrix);
  if (!inverse) {
    throw new Error("Screen matrix is singular");
  }
  return transformPoint(inverse, pixel);
}
