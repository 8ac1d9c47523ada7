import { describe, it, expect } from "vitest";
import {
  buildJumpSegments,
  buildSovereigntyMarkers,
  buildSystemMarkers,
  centroid,
  changedMarkerRuns,
  normalizeToUnit,
} from "./scene";
import type { MapJump, MapSystem } from "./types";

const systems: MapSystem[] = [
  { id: 1, name: "Alpha", position: [0, 0], security: 1, standing: 0.8 },
  { id: 2, name: "Beta", position: [1, 0], security: 0.3, standing: null },
  { id: 3, name: "Gamma", position: [0, 1], security: 0.5 },
];

describe("buildSystemMarkers", () => {
  it("colors by security with no highlight by default", () => {
    const markers = buildSystemMarkers(systems);

    expect(markers).toHaveLength(3);
    expect(markers[0]).toEqual({
      center: [0, 0],
      scale: 1,
      radius: 5,
      color: [0, 1, 1, 1],
      highlight: [0, 0, 0, 0],
    });
    expect(markers[1]?.color).toEqual([1, 0.3, 0, 1]);
  });

  it("marks the player, the hovered system and the focus set", () => {
    const markers = buildSystemMarkers(systems, {
      player: 1,
      hovered: 2,
      focused: new Set([3]),
    });

    expect(markers[0]).toMatchObject({ highlight: [0, 1, 1, 1], scale: 4, color: [0, 1, 1, 0.1] });
    expect(markers[1]).toMatchObject({ highlight: [1, 1, 1, 1], scale: 1, color: [1, 0.3, 0, 1] });
    expect(markers[2]).toMatchObject({ highlight: [1, 1, 1, 1], scale: 2, color: [1, 1, 0, 1] });
  });

  it("does not dim anything for an empty focus set", () => {
    const markers = buildSystemMarkers(systems, { focused: new Set() });
    expect(markers.map((m) => m.color[3])).toEqual([1, 1, 1]);
  });

  it("recolors by jump distance when an overlay is given", () => {
    const markers = buildSystemMarkers(systems, {
      distances: new Map([
        [1, 0],
        [2, 10],
      ]),
    });

    expect(markers[0]?.color).toEqual([1, 1, 1, 1]);
    expect(markers[1]?.color).toEqual([1, 1, 0, 1]);
    expect(markers[2]?.color).toEqual([1, 1, 0, 1]);
  });
});

describe("buildSovereigntyMarkers", () => {
  it("emits one large disc per held system", () => {
    expect(buildSovereigntyMarkers(systems)).toEqual([
      { center: [0, 0], scale: 8, radius: 25, color: [0, 0.15, 1, 0.65], highlight: [0, 0, 0, 0] },
    ]);
  });

  it("treats a neutral standing as held", () => {
    const neutral: MapSystem = { id: 9, name: "N", position: [0, 0], security: 0, standing: 0 };
    expect(buildSovereigntyMarkers([neutral])[0]?.color).toEqual([0.5, 0.5, 0.5, 0.65]);
  });
});

describe("buildJumpSegments", () => {
  const jumps: MapJump[] = [
    { from: 1, to: 2, type: "system", onRoute: false },
    { from: 2, to: 3, type: "region", onRoute: true },
    { from: 1, to: 99, type: "system", onRoute: false },
  ];

  it("colors by jump type, or by security along the route", () => {
    const segments = buildJumpSegments(systems, jumps);

    expect(segments).toEqual([
      { from: [0, 0], to: [1, 0], fromColor: [0, 0, 1], toColor: [0, 0, 1], level: 0.5 },
      { from: [1, 0], to: [0, 1], fromColor: [1, 0.3, 0], toColor: [1, 1, 0], level: 1 },
    ]);
  });

  it("brightens endpoints at the selected system", () => {
    const [first] = buildJumpSegments(systems, jumps, { selected: 1 });

    expect(first?.fromColor).toEqual([0.1, 0.1, 1]);
    expect(first?.toColor).toEqual([0, 0, 1]);
  });
});

describe("normalizeToUnit", () => {
  it("puts the farthest point on the unit circle", () => {
    expect(normalizeToUnit([[3, 4], [1, 0]])).toEqual([[0.6, 0.8], [0.2, 0]]);
  });

  it("leaves a collapsed set alone", () => {
    expect(normalizeToUnit([[0, 0]])).toEqual([[0, 0]]);
  });
});

describe("centroid", () => {
  it("averages the points", () => {
    expect(centroid([[0, 0], [2, 4]])).toEqual([1, 2]);
    expect(centroid([])).toEqual([0, 0]);
  });
});

describe("changedMarkerRuns", () => {
  it("returns nothing when the markers are unchanged", () => {
    expect(changedMarkerRuns(buildSystemMarkers(systems), buildSystemMarkers(systems))).toEqual([]);
  });

  it("groups adjacent changes into one run", () => {
    const before = buildSystemMarkers(systems);
    const after = buildSystemMarkers(systems, { hovered: 2, selected: 3 });

    expect(changedMarkerRuns(before, after)).toEqual([{ first: 1, instances: [after[1], after[2]] }]);
  });

  it("keeps separated changes in separate runs", () => {
    const before = buildSystemMarkers(systems);
    const after = buildSystemMarkers(systems, { player: 1, selected: 3 });

    expect(changedMarkerRuns(before, after)).toEqual([
      { first: 0, instances: [after[0]] },
      { first: 2, instances: [after[2]] },
    ]);
  });

  it("returns null when the count changes", () => {
    expect(changedMarkerRuns([], buildSystemMarkers(systems))).toBeNull();
  });
});
