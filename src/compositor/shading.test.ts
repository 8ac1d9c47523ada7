import { describe, it, expect } from "vitest";
import {
  discFalloff,
  flatFalloff,
  gammaCorrect,
  glowFalloff,
  jumpAlpha,
  markerFalloff,
  shadeJump,
  shadeMarker,
  shadeQuad,
  shadeText,
  smoothstep,
  type Falloff,
} from "./shading";
import type { Color } from "../types/color";

const samples = (from: number, to: number, count: number) =>
  Array.from({ length: count + 1 }, (_, i) => from + ((to - from) * i) / count);

function expectNonIncreasing(values: number[]): void {
  for (let i = 1; i < values.length; i++) {
    expect(values[i]!).toBeLessThanOrEqual(values[i - 1]! + 1e-12);
  }
}

describe.each([
  ["glow", glowFalloff],
  ["disc", discFalloff],
])("%s falloff", (_name: string, falloff: (d: number) => Falloff) => {
  const distances = samples(0.001, 1, 1000);

  it("never increases moving outward", () => {
    expectNonIncreasing(distances.map((d) => falloff(d).inner));
    expectNonIncreasing(distances.map((d) => falloff(d).band));
  });

  it("reaches zero at the quad edge", () => {
    expect(falloff(1).inner).toBeCloseTo(0, 12);
    expect(falloff(1).band).toBeCloseTo(0, 12);
  });

  it("stays within [0, 1]", () => {
    for (const d of distances) {
      const { inner, band } = falloff(d);
      expect(inner).toBeGreaterThanOrEqual(0);
      expect(inner).toBeLessThanOrEqual(1);
      expect(band).toBeGreaterThanOrEqual(0);
      expect(band).toBeLessThanOrEqual(1);
    }
  });
});

describe("flatFalloff", () => {
  it("fades to zero at the edge without rising", () => {
    expectNonIncreasing(samples(0.001, 1, 500).map(flatFalloff));
    expect(flatFalloff(1)).toBe(0);
    expect(flatFalloff(0.25)).toBe(1);
  });
});

describe("markerFalloff", () => {
  it("guards the center against division by zero", () => {
    expect(markerFalloff("glow", 0)).toEqual({ inner: 1, band: 1 });
    expect(markerFalloff("flat", 0)).toEqual({ inner: 1, band: 0 });
  });
});

describe("shadeMarker", () => {
  const color: Color = [0.8, 0.4, 0.2, 1];

  it("discards outside the unit circle", () => {
    expect(shadeMarker("web", "glow", color, null, 1.01)).toBeNull();
  });

  it.each(["desktop", "web"] as const)(
    "renders a zero-alpha highlight exactly like no highlight (%s)",
    (backend) => {
      for (const style of ["glow", "disc"] as const) {
        for (const d of samples(0, 1, 40)) {
          expect(shadeMarker(backend, style, color, [0, 1, 1, 0], d)).toEqual(
            shadeMarker(backend, style, color, null, d)
          );
        }
      }
    }
  );

  it("draws the disc ring just outside the core", () => {
    // d = 0.65: inner = 1 - 1.05^20 < 0 -> 0; band = 1 - 0.95^2
    const fragment = shadeMarker("web", "disc", [1, 0, 0, 1], [0, 1, 0, 1], 0.65);
    expect(fragment).not.toBeNull();
    if (!fragment) return;
    const band = 1 - 0.95 * 0.95;
    expect(fragment[0]).toBe(0);
    expect(fragment[1]).toBeCloseTo(band, 12);
    expect(fragment[3]).toBeCloseTo(band, 12);
  });

  it("scales the whole marker by the instance alpha", () => {
    const opaque = shadeMarker("web", "glow", color, [1, 1, 1, 1], 0.6);
    const faded = shadeMarker("web", "glow", [0.8, 0.4, 0.2, 0.1], [1, 1, 1, 1], 0.6);
    if (!opaque || !faded) throw new Error("expected fragments");
    expect(faded[3]).toBeCloseTo(opaque[3] * 0.1, 12);
    expect(faded.slice(0, 3)).toEqual(opaque.slice(0, 3));
  });

  it("gamma-corrects colors on desktop only", () => {
    const web = shadeMarker("web", "glow", [0.5, 0.5, 0.5, 1], null, 0.2);
    const desktop = shadeMarker("desktop", "glow", [0.5, 0.5, 0.5, 1], null, 0.2);
    expect(web?.[0]).toBe(0.5);
    expect(desktop?.[0]).toBeCloseTo(Math.pow(0.5, 1 / 2.2), 12);
  });

  it("uses a single color and falloff for flat markers", () => {
    const fragment = shadeMarker("web", "flat", [0.2, 0.3, 0.4, 0.5], [1, 1, 1, 1], 0.8);
    if (!fragment) throw new Error("expected a fragment");
    expect(fragment.slice(0, 3)).toEqual([0.2, 0.3, 0.4]);
    // (1 - 1/0.8)^2 = 0.0625
    expect(fragment[3]).toBeCloseTo(0.5 * 0.0625, 12);
  });
});

describe("jumpAlpha", () => {
  it("never exceeds 0.8 across the line", () => {
    for (const n of samples(0, 1, 1000)) {
      expect(jumpAlpha(n)).toBeLessThanOrEqual(0.8);
    }
  });

  it("is opaque up to 40% of the half width and clear at the edge", () => {
    expect(jumpAlpha(0)).toBe(0.8);
    expect(jumpAlpha(0.4)).toBe(0.8);
    expect(jumpAlpha(0.7)).toBeCloseTo(0.4, 12);
    expect(jumpAlpha(1)).toBe(0);
  });

  it("matches GLSL smoothstep", () => {
    expect(smoothstep(0, 1, 0.5)).toBe(0.5);
    expect(smoothstep(0, 1, -1)).toBe(0);
    expect(smoothstep(0, 1, 2)).toBe(1);
  });
});

describe("gammaCorrect", () => {
  it("keeps black and white and brightens midtones", () => {
    expect(gammaCorrect([0, 1, 0.5])).toEqual([0, 1, Math.pow(0.5, 1 / 2.2)]);
  });
});

describe("shadeJump / shadeQuad / shadeText", () => {
  it("outputs the line color with the edge alpha", () => {
    expect(shadeJump("web", [0, 0.2, 0], 0)).toEqual([0, 0.2, 0, 0.8]);
  });

  it("outputs the flat tint for untextured quads", () => {
    expect(shadeQuad("web", [0.1, 0.2, 0.3, 0.4], null)).toEqual([0.1, 0.2, 0.3, 0.4]);
  });

  it("multiplies texel and tint for textured quads", () => {
    expect(shadeQuad("web", [0.5, 1, 1, 0.5], [0.5, 0.5, 1, 1])).toEqual([0.25, 0.5, 1, 0.5]);
  });

  it("applies coverage to text color and alpha", () => {
    expect(shadeText("web", [1, 0.5, 0.25, 0.8], 0.5)).toEqual([0.5, 0.25, 0.125, 0.4]);
  });
});
