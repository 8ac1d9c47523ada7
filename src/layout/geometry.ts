/**
 * Shared meshes and the per-segment geometry for jump lines
 */

import { type Vec2 } from "../math/mat3";
import { normalize, perpendicular, sub } from "../math/vec2";
import type { JumpSegment, JumpVertex, QuadVertex, Rect } from "./types";

/** Marker quad as a triangle strip over [-1,1]^2; shared by every instance */
export const MARKER_CORNERS = new Float32Array([
  -1, -1,
  1, -1,
  -1, 1,
  1, 1,
]);

/** Direction used for a segment whose endpoints coincide */
export const DEGENERATE_NORMAL: Vec2 = [0, 1];

/**
 * Four vertices per jump, extruded along the unit normal:
 * (from, +n), (to, +n), (from, -n), (to, -n).
 * With buildQuadIndices, triangles (0,1,2) and (1,2,3) split the ribbon
 * along its diagonal and cover it once.
 */
export function buildJumpVertices(segments: readonly JumpSegment[]): JumpVertex[] {
  const vertices: JumpVertex[] = [];

  for (const segment of segments) {
    const n = normalize(perpendicular(sub(segment.from, segment.to)), DEGENERATE_NORMAL);
    const flipped: Vec2 = [-n[0], -n[1]];
    const from = [segment.from[0], segment.from[1], segment.level] as const;
    const to = [segment.to[0], segment.to[1], segment.level] as const;

    vertices.push(
      { position: from, normal: n, color: segment.fromColor },
      { position: to, normal: n, color: segment.toColor },
      { position: from, normal: flipped, color: segment.fromColor },
      { position: to, normal: flipped, color: segment.toColor }
    );
  }

  return vertices;
}

/** Triangle indices for `quadCount` quads of four vertices each */
export function buildQuadIndices(quadCount: number): Uint32Array {
  const indices = new Uint32Array(quadCount * 6);
  for (let k = 0; k < quadCount; k++) {
    const b = k * 4;
    const o = k * 6;
    indices[o] = b;
    indices[o + 1] = b + 1;
    indices[o + 2] = b + 2;
    indices[o + 3] = b + 1;
    indices[o + 4] = b + 2;
    indices[o + 5] = b + 3;
  }
  return indices;
}

/** Two triangles covering a pixel rectangle */
export function rectTriangles(rect: Rect, uv: Rect = { x: 0, y: 0, width: 1, height: 1 }): QuadVertex[] {
  const x0 = rect.x;
  const y0 = rect.y;
  const x1 = rect.x + rect.width;
  const y1 = rect.y + rect.height;
  const u0 = uv.x;
  const v0 = uv.y;
  const u1 = uv.x + uv.width;
  const v1 = uv.y + uv.height;

  return [
    { position: [x0, y0], uv: [u0, v0] },
    { position: [x1, y0], uv: [u1, v0] },
    { position: [x0, y1], uv: [u0, v1] },
    { position: [x0, y1], uv: [u0, v1] },
    { position: [x1, y0], uv: [u1, v0] },
    { position: [x1, y1], uv: [u1, v1] },
  ];
}
