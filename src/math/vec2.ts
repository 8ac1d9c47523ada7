/**
 * 2D vector helpers over plain tuples
 */

import type { Vec2 } from "./mat3";

export type { Vec2 };

export function add(a: Vec2, b: Vec2): [number, number] {
  return [a[0] + b[0], a[1] + b[1]];
}

export function sub(a: Vec2, b: Vec2): [number, number] {
  return [a[0] - b[0], a[1] - b[1]];
}

export function length(v: Vec2): number {
  return Math.hypot(v[0], v[1]);
}

export function distanceSquared(a: Vec2, b: Vec2): number {
  const dx = a[0] - b[0];
  const dy = a[1] - b[1];
  return dx * dx + dy * dy;
}

/** Counter-clockwise perpendicular: (x, y) -> (-y, x) */
export function perpendicular(v: Vec2): [number, number] {
  return [-v[1], v[0]];
}

/**
 * Unit vector in the direction of v. Vectors shorter than `epsilon`
 * have no direction and yield `fallback`.
 */
export function normalize(v: Vec2, fallback: Vec2 = [0, 1], epsilon = 1e-9): [number, number] {
  const len = length(v);
  if (len < epsilon) {
    return [fallback[0], fallback[1]];
  }
  return [v[0] / len, v[1] / len];
}
