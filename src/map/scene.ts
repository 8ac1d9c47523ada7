/**
 * Builds renderer input (marker instances and jump segments) from map data.
 */

import { DEFAULT_LINE_LEVEL, ROUTE_LINE_LEVEL } from "../constants";
import type { Vec2 } from "../math/mat3";
import type { JumpSegment, SystemMarkerInstance } from "../layout/types";
import { clamp01, TRANSPARENT, withAlpha, type Color, type Rgb } from "../types/color";
import { distanceColor, jumpTypeColor, securityColor, standingColor } from "./palette";
import type { MapJump, MapSelection, MapSystem } from "./types";

const PLAYER_HIGHLIGHT: Color = [0, 1, 1, 1];
const SELECTED_HIGHLIGHT: Color = [1, 1, 1, 1];
/** Alpha of systems outside a non-empty focus set */
const UNFOCUSED_ALPHA = 0.1;
const SYSTEM_RADIUS = 5;

const SOVEREIGNTY_SCALE = 8;
const SOVEREIGNTY_RADIUS = 25;
const SOVEREIGNTY_ALPHA = 0.65;

/** Added to jump endpoint colors at the selected system */
const SELECTED_JUMP_BOOST = 0.1;

function isSelected(selection: MapSelection, id: number): boolean {
  return id === selection.selected || id === selection.hovered;
}

export function buildSystemMarkers(
  systems: readonly MapSystem[],
  selection: MapSelection = {}
): SystemMarkerInstance[] {
  const focused = selection.focused;
  const hasFocus = focused !== undefined && focused.size > 0;

  return systems.map((system) => {
    const selected = isSelected(selection, system.id);
    const isFocused = focused?.has(system.id) ?? false;
    const isPlayer = system.id === selection.player;

    let highlight = TRANSPARENT;
    if (isPlayer) highlight = PLAYER_HIGHLIGHT;
    else if (isFocused || selected) highlight = SELECTED_HIGHLIGHT;

    const alpha = !hasFocus || isFocused || selected ? 1 : UNFOCUSED_ALPHA;
    const scale = isPlayer ? 4 : isFocused ? 2 : 1;

    let color = securityColor(system.security);
    const distance = selection.distances?.get(system.id);
    if (distance !== undefined) {
      color = distanceColor(distance);
    }

    return {
      center: system.position,
      scale,
      radius: SYSTEM_RADIUS,
      color: withAlpha(color, alpha),
      highlight,
    };
  });
}

export interface MarkerRun {
  readonly first: number;
  readonly instances: SystemMarkerInstance[];
}

function sameTuple(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

function sameMarker(a: SystemMarkerInstance, b: SystemMarkerInstance): boolean {
  return (
    a.scale === b.scale &&
    a.radius === b.radius &&
    sameTuple(a.center, b.center) &&
    sameTuple(a.color, b.color) &&
    sameTuple(a.highlight, b.highlight)
  );
}

/**
 * Contiguous runs of `next` that differ from `previous`, for in-place
 * updates. Null when the counts differ and the layer must be re-uploaded.
 */
export function changedMarkerRuns(
  previous: readonly SystemMarkerInstance[],
  next: readonly SystemMarkerInstance[]
): MarkerRun[] | null {
  if (previous.length !== next.length) return null;

  const runs: MarkerRun[] = [];
  let current: SystemMarkerInstance[] | null = null;
  for (let i = 0; i < next.length; i++) {
    const marker = next[i];
    const before = previous[i];
    if (!marker || (before && sameMarker(before, marker))) {
      current = null;
    } else if (current) {
      current.push(marker);
    } else {
      current = [marker];
      runs.push({ first: i, instances: current });
    }
  }
  return runs;
}

/** Large translucent discs under held systems */
export function buildSovereigntyMarkers(systems: readonly MapSystem[]): SystemMarkerInstance[] {
  const markers: SystemMarkerInstance[] = [];
  for (const system of systems) {
    if (system.standing === undefined || system.standing === null) continue;
    markers.push({
      center: system.position,
      scale: SOVEREIGNTY_SCALE,
      radius: SOVEREIGNTY_RADIUS,
      color: withAlpha(standingColor(system.standing), SOVEREIGNTY_ALPHA),
      highlight: TRANSPARENT,
    });
  }
  return markers;
}

function boost(color: Rgb): Rgb {
  return [
    clamp01(color[0] + SELECTED_JUMP_BOOST),
    clamp01(color[1] + SELECTED_JUMP_BOOST),
    clamp01(color[2] + SELECTED_JUMP_BOOST),
  ];
}

/** Jumps whose endpoints are not both known are left out */
export function buildJumpSegments(
  systems: readonly MapSystem[],
  jumps: readonly MapJump[],
  selection: MapSelection = {}
): JumpSegment[] {
  const byId = new Map<number, MapSystem>();
  for (const system of systems) byId.set(system.id, system);

  const segments: JumpSegment[] = [];
  for (const jump of jumps) {
    const from = byId.get(jump.from);
    const to = byId.get(jump.to);
    if (!from || !to) continue;

    let fromColor = jump.onRoute ? securityColor(from.security) : jumpTypeColor(jump.type);
    let toColor = jump.onRoute ? securityColor(to.security) : jumpTypeColor(jump.type);
    if (isSelected(selection, from.id)) fromColor = boost(fromColor);
    if (isSelected(selection, to.id)) toColor = boost(toColor);

    segments.push({
      from: from.position,
      to: to.position,
      fromColor,
      toColor,
      level: jump.onRoute ? ROUTE_LINE_LEVEL : DEFAULT_LINE_LEVEL,
    });
  }
  return segments;
}

/** Scale points so the farthest lies on the unit circle */
export function normalizeToUnit(points: readonly Vec2[]): Vec2[] {
  let max = 0;
  for (const [x, y] of points) max = Math.max(max, Math.hypot(x, y));
  if (max === 0) return points.map(([x, y]): Vec2 => [x, y]);
  return points.map(([x, y]): Vec2 => [x / max, y / max]);
}

/** Mean position; [0, 0] for no points */
export function centroid(points: readonly Vec2[]): Vec2 {
  if (points.length === 0) return [0, 0];
  let x = 0;
  let y = 0;
  for (const p of points) {
    x += p[0];
    y += p[1];
  }
  return [x / points.length, y / points.length];
}
