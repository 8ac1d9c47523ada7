/**
 * Zoom-dependent system and region labels.
 *
 * Labels are laid out in screen pixels each time the view changes; anything
 * whose padded box misses the window is culled before layout.
 */

import type { Vec2 } from "../math/mat3";
import type { TextVertex } from "../layout/types";
import { layoutText, uiScale } from "../text/layoutText";
import type { GlyphAtlas } from "../text/types";
import { worldToScreen } from "../transform/project";
import type { FrameUniforms } from "../transform/frameUniforms";
import type { MapRegion, MapSelection, MapSystem } from "./types";

/** Zoom above which system names appear */
const SYSTEM_LABEL_ZOOM = 6;
/** Zoom at which system names reach full opacity */
const SYSTEM_LABEL_FULL_ZOOM = 13;
const SYSTEM_LABEL_SHADE = 0.8;
const SYSTEM_LABEL_SIZE = 25;
const SYSTEM_LABEL_MIN_SIZE = 14;
const SYSTEM_LABEL_MARGIN = 50;
const REGION_LABEL_MARGIN = 400;

export type RegionLabelLayer = "background" | "foreground";

export function systemLabelAlpha(zoom: number): number {
  if (zoom <= SYSTEM_LABEL_ZOOM) return 0;
  return Math.min((zoom - SYSTEM_LABEL_ZOOM) / (SYSTEM_LABEL_FULL_ZOOM - SYSTEM_LABEL_ZOOM), 1);
}

/** Large dark names behind the map when zoomed in, bright names when zoomed out */
export function regionLabelLayer(zoom: number): RegionLabelLayer | null {
  if (zoom >= 15) return "background";
  if (zoom > 1) return "foreground";
  return null;
}

export function regionLabelAlpha(zoom: number): number {
  if (zoom >= 1 && zoom < 2) return zoom - 1;
  if (zoom >= 10 && zoom < 15) return (15 - zoom) / 5;
  if (zoom >= 15 && zoom < 25) return 1 - (25 - zoom) / 5;
  return 1;
}

/** True when a box of half-size `margin` around `point` touches the window */
function onScreen(point: Vec2, margin: number, windowSize: Vec2): boolean {
  return !(
    point[0] + margin < 0 ||
    point[1] + margin < 0 ||
    point[0] - margin > windowSize[0] ||
    point[1] - margin > windowSize[1]
  );
}

function jumpSuffix(jumps: number | undefined): string {
  if (jumps === undefined || jumps < 1) return "";
  return jumps === 1 ? " (1 jump)" : ` (${jumps} jumps)`;
}

export function buildSystemLabels(
  atlas: GlyphAtlas,
  systems: readonly MapSystem[],
  uniforms: FrameUniforms,
  selection: MapSelection = {}
): TextVertex[] {
  const alpha = systemLabelAlpha(uniforms.zoom);
  if (alpha === 0) return [];

  const scale = uiScale(uniforms.windowSize[1]);
  const margin = SYSTEM_LABEL_MARGIN * scale;
  const fontSize = Math.max(SYSTEM_LABEL_SIZE * scale, SYSTEM_LABEL_MIN_SIZE);
  const nudge = 0.2 * Math.min(uniforms.zoom, 50);

  const vertices: TextVertex[] = [];
  for (const system of systems) {
    const point = worldToScreen(system.position, uniforms);
    if (!onScreen(point, margin, uniforms.windowSize)) continue;

    const text = system.name + jumpSuffix(selection.distances?.get(system.id));
    const placed = layoutText(atlas, text, [point[0] + nudge, point[1] + nudge], {
      color: [SYSTEM_LABEL_SHADE, SYSTEM_LABEL_SHADE, SYSTEM_LABEL_SHADE, alpha],
      fontSize,
      anchor: "topLeft",
      shadow: true,
      shadowOffset: 3 * scale,
    });
    for (const v of placed) vertices.push(v);
  }
  return vertices;
}

export function buildRegionLabels(
  atlas: GlyphAtlas,
  regions: readonly MapRegion[],
  uniforms: FrameUniforms
): TextVertex[] {
  const layer = regionLabelLayer(uniforms.zoom);
  if (!layer) return [];

  const alpha = regionLabelAlpha(uniforms.zoom);
  const scale = uiScale(uniforms.windowSize[1]);
  const margin = REGION_LABEL_MARGIN * scale;
  const background = layer === "background";
  const shade = background ? 0.02 : 1;

  const vertices: TextVertex[] = [];
  for (const region of regions) {
    const point = worldToScreen(region.position, uniforms);
    if (!onScreen(point, margin, uniforms.windowSize)) continue;

    const placed = layoutText(atlas, region.name, point, {
      color: [shade, shade, shade, alpha],
      fontSize: (background ? 110 : 50) * scale,
      anchor: "center",
      shadow: !background,
      shadowOffset: 3 * scale,
    });
    for (const v of placed) vertices.push(v);
  }
  return vertices;
}
