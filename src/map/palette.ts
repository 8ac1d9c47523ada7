/**
 * Map color scales. All colors are linear RGB.
 */

import type { Rgb } from "../types/color";
import type { JumpType } from "./types";

/** Red through yellow to green, turning cyan-white above 0.9 */
export function securityColor(security: number): Rgb {
  const sec = Math.min(Math.max(security, 0), 1);
  const blue = sec >= 0.9 ? 1 : 0;
  const green = sec >= 0.5 ? 1 : sec;
  const red = sec >= 0.6 ? 1 - sec : 1;
  return [red, green, blue];
}

export function standingColor(standing: number): Rgb {
  if (standing === 0) return [0.5, 0.5, 0.5];
  if (standing > 0.5) return [0, 0.15, 1];
  if (standing > 0) return [0, 0.5, 1];
  if (standing < -0.5) return [1, 0.02, 0];
  return [1, 0.5, 0];
}

const JUMP_TYPE_COLORS: Readonly<Record<JumpType, Rgb>> = {
  system: [0, 0, 1],
  constellation: [0.2, 0, 0],
  region: [0.1, 0, 0.15],
  jumpGate: [0, 0.2, 0],
  wormhole: [0.1, 0.15, 0],
};

export function jumpTypeColor(type: JumpType): Rgb {
  return JUMP_TYPE_COLORS[type];
}

/** Distance overlay: white at the origin, then security colors fading with jumps */
export function distanceColor(jumps: number): Rgb {
  if (jumps === 0) return [1, 1, 1];
  return securityColor((20 - Math.min(jumps, 20)) / 20);
}
