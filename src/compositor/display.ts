/**
 * Simulated framebuffer blending and display.
 *
 * Desktop fragments are already display-encoded when they are blended.
 * Web fragments are blended linear and the browser's output path is
 * modeled as one encoding curve applied after blending.
 */

import { GAMMA } from "../constants";
import type { BackendKind } from "../shaders/types";
import { type Color, type Rgb, clamp01 } from "../types/color";
import { BLEND_OVER, type BlendFactor, type BlendPolicy } from "./passes";
import { gammaCorrect } from "./shading";

/** Web output curve: linear framebuffer value to displayed value */
export function webDisplayCurve(x: number): number {
  return Math.pow(clamp01(x), 1 / GAMMA);
}

function factorValue(factor: BlendFactor, src: Color): number {
  switch (factor) {
    case "zero":
      return 0;
    case "one":
      return 1;
    case "srcAlpha":
      return src[3];
    case "oneMinusSrcAlpha":
      return 1 - src[3];
  }
}

/** Fixed-function blend of one fragment onto a framebuffer value */
export function blend(policy: BlendPolicy, src: Color, dst: Color): Color {
  const cs = factorValue(policy.color[0], src);
  const cd = factorValue(policy.color[1], src);
  const as = factorValue(policy.alpha[0], src);
  const ad = factorValue(policy.alpha[1], src);
  return [
    clamp01(src[0] * cs + dst[0] * cd),
    clamp01(src[1] * cs + dst[1] * cd),
    clamp01(src[2] * cs + dst[2] * cd),
    clamp01(src[3] * as + dst[3] * ad),
  ];
}

/** Value the frame is cleared to for a linear background color */
export function framebufferClearColor(backend: BackendKind, background: Color): Color {
  if (backend === "web") return background;
  const [r, g, b] = gammaCorrect([background[0], background[1], background[2]]);
  return [r, g, b, background[3]];
}

/** What reaches the screen for a framebuffer value */
export function displayedColor(backend: BackendKind, framebuffer: Color): Rgb {
  if (backend === "desktop") {
    return [framebuffer[0], framebuffer[1], framebuffer[2]];
  }
  return [
    webDisplayCurve(framebuffer[0]),
    webDisplayCurve(framebuffer[1]),
    webDisplayCurve(framebuffer[2]),
  ];
}

/**
 * Blend a back-to-front stack of fragments (null = discarded) over a
 * linear background and return the displayed color.
 */
export function compositeFragments(
  backend: BackendKind,
  fragments: readonly (Color | null)[],
  background: Color,
  policy: BlendPolicy = BLEND_OVER
): Rgb {
  let framebuffer = framebufferClearColor(backend, background);
  for (const fragment of fragments) {
    if (fragment) {
      framebuffer = blend(policy, fragment, framebuffer);
    }
  }
  return displayedColor(backend, framebuffer);
}
