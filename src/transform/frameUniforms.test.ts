import { describe, it, expect, vi, afterEach } from "vitest";
import {
  windowScale,
  windowRatio,
  computeViewMatrix,
  computeScaleMatrix,
  clampWindowSize,
  createFrameUniforms,
} from "./frameUniforms";
import { resetWarnings } from "../log";
import { transformPoint } from "../math/mat3";

afterEach(() => {
  resetWarnings();
  vi.restoreAllMocks();
});

describe("windowScale", () => {
  it("stretches the longer axis", () => {
    expect(windowScale(800, 400)).toEqual([2, 1]);
    expect(windowScale(400, 800)).toEqual([1, 2]);
    expect(windowScale(500, 500)).toEqual([1, 1]);
  });

  it("is the reciprocal of windowRatio", () => {
    const [sx, sy] = windowScale(1920, 1080);
    const [rx, ry] = windowRatio(1920, 1080);
    expect(sx * rx).toBeCloseTo(1, 12);
    expect(sy * ry).toBe(1);
  });
});

describe("computeViewMatrix", () => {
  it("places zoom on the diagonal and the scaled offset in the last column", () => {
    const m = computeViewMatrix([2, 3], 4);
    expect(Array.from(m)).toEqual([4, 0, 0, 0, 4, 0, -8, 12, 1]);
  });
});

describe("computeScaleMatrix", () => {
  it("keeps a unit circle round on a wide window", () => {
    const m = computeScaleMatrix(1000, 500);
    const [x] = transformPoint(m, [1, 0]);
    const [, y] = transformPoint(m, [0, 1]);
    // one world unit spans the same number of pixels on both axes
    expect(x * 1000).toBeCloseTo(y * 500, 6);
  });

  it("keeps a unit circle round on a tall window", () => {
    const m = computeScaleMatrix(300, 900);
    const [x] = transformPoint(m, [1, 0]);
    const [, y] = transformPoint(m, [0, 1]);
    expect(x * 300).toBeCloseTo(y * 900, 4);
  });
});

describe("clampWindowSize", () => {
  it("passes valid sizes through", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(clampWindowSize(640, 480)).toEqual([640, 480]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("clamps zero and invalid dimensions to 1 and warns once", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(clampWindowSize(0, 480)).toEqual([1, 480]);
    expect(clampWindowSize(0, 480)).toEqual([1, 480]);
    expect(clampWindowSize(Number.NaN, -5)).toEqual([1, 1]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith("[Transform] Window size 0x480 clamped to 1x480");
  });
});

describe("createFrameUniforms", () => {
  it("builds matrices from the camera and window", () => {
    const uniforms = createFrameUniforms({ offset: [1, 1], zoom: 2 }, 800, 400);
    expect(uniforms.zoom).toBe(2);
    expect(uniforms.windowSize).toEqual([800, 400]);
    expect(uniforms.viewMatrix[0]).toBe(2);
    expect(uniforms.scaleMatrix[0]).toBe(0.5);
    expect(Object.isFrozen(uniforms)).toBe(true);
  });

  it("maps the camera focus to the window center", () => {
    const uniforms = createFrameUniforms({ offset: [3, -2], zoom: 5 }, 1024, 768);
    // view translation is (-x * zoom, y * zoom), so the focus is (3, 2) in world space
    const [px, py] = transformPoint(uniforms.screenMatrix, [3, 2]);
    expect(px).toBeCloseTo(512, 3);
    expect(py).toBeCloseTo(384, 3);
  });

  it("replaces a non-positive zoom with the minimum", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(createFrameUniforms({ offset: [0, 0], zoom: 0 }, 10, 10).zoom).toBe(0.25);
  });
});
