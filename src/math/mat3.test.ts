import { describe, it, expect } from "vitest";
import {
  create,
  multiply,
  translate,
  scale,
  screenProjection,
  clipToPixels,
  transformPoint,
  transformVector,
  invertAffine,
} from "./mat3";

describe("mat3", () => {
  describe("create", () => {
    it("creates an identity matrix", () => {
      expect(create()).toEqual(new Float32Array([
        1, 0, 0,
        0, 1, 0,
        0, 0, 1,
      ]));
    });
  });

  describe("multiply", () => {
    it("multiplies identity by identity", () => {
      expect(multiply(create(), create())).toEqual(create());
    });

    it("applies the right-hand matrix first", () => {
      // translate to (2,3), then scale by 10
      const m = multiply(scale(10, 10), translate(2, 3));
      expect(transformPoint(m, [0, 0])).toEqual([20, 30]);
    });

    it("is not commutative for translate and scale", () => {
      const m = multiply(translate(2, 3), scale(10, 10));
      expect(transformPoint(m, [0, 0])).toEqual([2, 3]);
      expect(transformPoint(m, [1, 1])).toEqual([12, 13]);
    });
  });

  describe("transformVector", () => {
    it("ignores translation", () => {
      const m = multiply(translate(5, 5), scale(2, 4));
      expect(transformVector(m, [1, 1])).toEqual([2, 4]);
    });
  });

  describe("screenProjection", () => {
    it("maps the top-left pixel to (-1, 1) and the bottom-right to (1, -1)", () => {
      const p = screenProjection(800, 600);
      const [x0, y0] = transformPoint(p, [0, 0]);
      const [x1, y1] = transformPoint(p, [800, 600]);
      expect(x0).toBeCloseTo(-1, 6);
      expect(y0).toBeCloseTo(1, 6);
      expect(x1).toBeCloseTo(1, 6);
      expect(y1).toBeCloseTo(-1, 6);
    });
  });

  describe("clipToPixels", () => {
    it("undoes screenProjection", () => {
      const roundTrip = multiply(clipToPixels(1024, 768), screenProjection(1024, 768));
      const [x, y] = transformPoint(roundTrip, [300, 200]);
      expect(x).toBeCloseTo(300, 3);
      expect(y).toBeCloseTo(200, 3);
    });
  });

  describe("invertAffine", () => {
    it("inverts scale and translation", () => {
      const m = multiply(translate(4, -2), scale(2, 0.5));
      const inv = invertAffine(m);
      expect(inv).not.toBeNull();
      if (!inv) return;
      const [x, y] = transformPoint(inv, transformPoint(m, [3, 7]));
      expect(x).toBeCloseTo(3, 5);
      expect(y).toBeCloseTo(7, 5);
    });

    it("returns null for a singular matrix", () => {
      expect(invertAffine(scale(0, 1))).toBeNull();
    });
  });
});
