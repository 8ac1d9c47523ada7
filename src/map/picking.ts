import { distanceSquared } from "../math/vec2";
import type { Vec2 } from "../math/mat3";
import { worldToScreen } from "../transform/project";
import type { FrameUniforms } from "../transform/frameUniforms";
import type { MapSystem } from "./types";

/** Base pick radius in pixels; grows with zoom past 25 */
const PICK_RADIUS = 8;

/** Pixel radius within which the nearest system is accepted */
export function pickRadius(zoom: number): number {
  return Math.min(Math.max(zoom / 25, 1), 25) * PICK_RADIUS;
}

/**
 * System nearest to `pointer` (pixels, origin top-left), or null when the
 * nearest one is outside pickRadius.
 */
export function pickSystem(
  systems: readonly MapSystem[],
  pointer: Vec2,
  uniforms: FrameUniforms
): MapSystem | null {
  let best: MapSystem | null = null;
  let bestDistance = Infinity;

  for (const system of systems) {
    const d = distanceSquared(worldToScreen(system.position, uniforms), pointer);
    if (d < bestDistance) {
      bestDistance = d;
      best = system;
    }
  }

  const radius = pickRadius(uniforms.zoom);
  return bestDistance < radius * radius ? best : null;
}
