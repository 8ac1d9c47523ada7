import { describe, it, expect } from "vitest";
import { Camera } from "./Camera";
import { createFrameUniforms } from "./transform/frameUniforms";
import { worldToScreen } from "./transform/project";

describe("Camera", () => {
  describe("initial state", () => {
    it("starts at the origin with zoom 1", () => {
      const cam = new Camera();
      expect(cam.getView()).toEqual({ offset: [0, 0], zoom: 1 });
      expect(cam.isAnimating()).toBe(false);
    });
  });

  describe("scroll", () => {
    it("zooms in for negative deltas and out for positive ones", () => {
      const cam = new Camera();
      cam.scroll(-2);
      expect(cam.targetZoom).toBeCloseTo(1.1, 12);

      const other = new Camera();
      other.scroll(2);
      expect(other.targetZoom).toBeCloseTo(0.9, 12);
    });

    it("clamps the target zoom", () => {
      const cam = new Camera();
      for (let i = 0; i < 200; i++) cam.scroll(-10);
      expect(cam.targetZoom).toBe(100);

      for (let i = 0; i < 200; i++) cam.scroll(10);
      expect(cam.targetZoom).toBe(0.25);
    });

    it("does not move the rendered zoom until update", () => {
      const cam = new Camera();
      cam.scroll(-4);
      expect(cam.zoom).toBe(1);
      expect(cam.isAnimating()).toBe(true);
    });
  });

  describe("update", () => {
    it("limits each step to 5% of the current zoom", () => {
      const cam = new Camera();
      cam.targetZoom = 10;
      expect(cam.update()).toBe(true);
      // |1 - 10| / 10 = 0.9, limited to 1 / 20
      expect(cam.zoom).toBeCloseTo(1.05, 12);
    });

    it("steps a tenth of the remaining distance when that is smaller", () => {
      const cam = new Camera();
      cam.zoom = 10;
      cam.targetZoom = 9;
      cam.update();
      expect(cam.zoom).toBeCloseTo(9.9, 12);
    });

    it("converges and snaps to the target", () => {
      const cam = new Camera();
      cam.scroll(-6);
      let frames = 0;
      while (cam.update()) {
        frames++;
        expect(frames).toBeLessThan(1000);
      }
      expect(cam.zoom).toBe(cam.targetZoom);
      expect(cam.isAnimating()).toBe(false);
    });
  });

  describe("setZoom", () => {
    it("sets both zoom values within limits", () => {
      const cam = new Camera();
      cam.setZoom(500);
      expect(cam.zoom).toBe(100);
      expect(cam.targetZoom).toBe(100);
    });
  });

  describe("pan", () => {
    it("moves the map by the dragged number of pixels", () => {
      const cam = new Camera();
      cam.setZoom(3);
      const before = worldToScreen([0, 0], createFrameUniforms(cam.getView(), 800, 600));

      // pointer moved 40px right and 10px down: delta is previous minus current
      cam.pan(-40, -10, 800, 600);

      const after = worldToScreen([0, 0], createFrameUniforms(cam.getView(), 800, 600));
      expect(after[0] - before[0]).toBeCloseTo(40, 3);
      expect(after[1] - before[1]).toBeCloseTo(10, 3);
    });
  });

  describe("centerOn", () => {
    it("brings a world point to the middle of the window", () => {
      const cam = new Camera();
      cam.setZoom(7);
      cam.centerOn([2.5, -1]);
      const [x, y] = worldToScreen([2.5, -1], createFrameUniforms(cam.getView(), 640, 480));
      expect(x).toBeCloseTo(320, 2);
      expect(y).toBeCloseTo(240, 2);
    });
  });
});
