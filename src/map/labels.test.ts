import { describe, it, expect } from "vitest";
import {
  buildRegionLabels,
  buildSystemLabels,
  regionLabelAlpha,
  regionLabelLayer,
  systemLabelAlpha,
} from "./labels";
import { createFrameUniforms } from "../transform/frameUniforms";
import type { GlyphAtlas } from "../text/types";
import type { MapSystem } from "./types";

const atlas: GlyphAtlas = {
  width: 64,
  height: 64,
  size: 10,
  lineHeight: 12,
  glyphs: {
    65: { x: 0, y: 0, width: 8, height: 10, xOffset: 0, yOffset: 0, xAdvance: 10 },
  },
};

/** Square window at the reference height: uiScale 1, world (0,0) at pixel (1080,1080) */
function uniformsAt(zoom: number) {
  return createFrameUniforms({ offset: [0, 0], zoom }, 2160, 2160);
}

describe("label visibility", () => {
  it("fades system names in between zoom 6 and 13", () => {
    expect(systemLabelAlpha(6)).toBe(0);
    expect(systemLabelAlpha(9.5)).toBe(0.5);
    expect(systemLabelAlpha(20)).toBe(1);
  });

  it("switches region names from foreground to background at zoom 15", () => {
    expect(regionLabelLayer(1)).toBeNull();
    expect(regionLabelLayer(1.01)).toBe("foreground");
    expect(regionLabelLayer(14.9)).toBe("foreground");
    expect(regionLabelLayer(15)).toBe("background");
  });

  it("ramps region names around the layer switch", () => {
    expect(regionLabelAlpha(1.5)).toBe(0.5);
    expect(regionLabelAlpha(5)).toBe(1);
    expect(regionLabelAlpha(12.5)).toBe(0.5);
    expect(regionLabelAlpha(20)).toBe(0);
    expect(regionLabelAlpha(22.5)).toBe(0.5);
    expect(regionLabelAlpha(30)).toBe(1);
  });
});

describe("buildSystemLabels", () => {
  const systems: MapSystem[] = [
    { id: 1, name: "A", position: [0, 0], security: 1 },
    { id: 2, name: "A", position: [2, 0], security: 1 },
  ];

  it("draws nothing at low zoom", () => {
    expect(buildSystemLabels(atlas, systems, uniformsAt(6))).toEqual([]);
  });

  it("places shadowed names beside visible systems and culls the rest", () => {
    const vertices = buildSystemLabels(atlas, systems, uniformsAt(13));

    // one glyph: shadow quad then text quad; the second system is off screen
    expect(vertices).toHaveLength(8);
    expect(vertices[0]).toEqual({
      position: [1086, 1086],
      uv: [0, 0],
      color: [0.01, 0.01, 0.01, 1],
    });
    expect(vertices[4]).toEqual({
      position: [1083, 1083],
      uv: [0, 0],
      color: [0.8, 0.8, 0.8, 1],
    });
  });

  it("appends the jump count in the distance overlay", () => {
    const everyGlyph: GlyphAtlas = { ...atlas, fallback: 65 };
    const [first] = systems;
    if (!first) throw new Error("fixture");

    const plain = buildSystemLabels(everyGlyph, [first], uniformsAt(13));
    const withDistance = buildSystemLabels(everyGlyph, [first], uniformsAt(13), {
      distances: new Map([[1, 2]]),
    });

    // "A" versus "A (2 jumps)", shadow and text quads for each character
    expect(plain).toHaveLength(1 * 2 * 4);
    expect(withDistance).toHaveLength(11 * 2 * 4);
  });
});

describe("buildRegionLabels", () => {
  const regions = [
    { name: "A", position: [0, 0] as const },
    { name: "A", position: [1, 0] as const },
  ];

  it("draws nothing when fully zoomed out", () => {
    expect(buildRegionLabels(atlas, regions, uniformsAt(1))).toEqual([]);
  });

  it("centers bright shadowed names in the foreground layer", () => {
    const vertices = buildRegionLabels(atlas, regions, uniformsAt(1.5));

    // the second region sits at x = 2700, beyond the window plus margin
    expect(vertices).toHaveLength(8);
    expect(vertices[4]).toEqual({
      position: [1055, 1050],
      uv: [0, 0],
      color: [1, 1, 1, 0.5],
    });
  });

  it("draws large dark names without shadow in the background layer", () => {
    const vertices = buildRegionLabels(atlas, regions, uniformsAt(22.5));

    expect(vertices).toHaveLength(4);
    expect(vertices[0]).toEqual({
      position: [1025, 1014],
      uv: [0, 0],
      color: [0.02, 0.02, 0.02, 0.5],
    });
  });
});
