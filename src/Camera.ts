/**
 * 2D map camera with pan and eased zoom
 */

import { MAX_ZOOM, MIN_ZOOM } from "./constants";
import type { Vec2 } from "./math/mat3";
import { windowRatio, type CameraView } from "./transform/frameUniforms";

export class Camera {
  /** Pan offset in world units */
  offsetX = 0;
  offsetY = 0;
  /** Zoom currently rendered */
  zoom = 1;
  /** Zoom the camera is easing toward */
  targetZoom = 1;

  static readonly MIN_ZOOM = MIN_ZOOM;
  static readonly MAX_ZOOM = MAX_ZOOM;

  // Easing: each update covers a tenth of the remaining distance,
  // but never more than 5% of the current zoom
  private static readonly ZOOM_EASE_DIVISOR = 10;
  private static readonly ZOOM_STEP_LIMIT = 20;
  private static readonly ZOOM_SNAP_THRESHOLD = 0.0001;

  /** Snapshot consumed by createFrameUniforms */
  getView(): CameraView {
    return { offset: [this.offsetX, this.offsetY], zoom: this.zoom };
  }

  /**
   * Accumulate scroll input. Positive deltas (wheel down) zoom out,
   * proportionally to the current target.
   */
  scroll(delta: number): void {
    this.targetZoom += (this.targetZoom * delta) / -20;
    this.targetZoom = Math.max(Camera.MIN_ZOOM, Math.min(Camera.MAX_ZOOM, this.targetZoom));
  }

  /** Jump straight to a zoom level without easing */
  setZoom(zoom: number): void {
    this.zoom = Math.max(Camera.MIN_ZOOM, Math.min(Camera.MAX_ZOOM, zoom));
    this.targetZoom = this.zoom;
  }

  /**
   * Advance zoom easing by one step.
   * Returns true while still animating (caller should request another frame).
   */
  update(): boolean {
    const step = Math.abs(this.zoom - this.targetZoom) / Camera.ZOOM_EASE_DIVISOR;

    if (step > Camera.ZOOM_SNAP_THRESHOLD) {
      const limited = Math.min(step, this.zoom / Camera.ZOOM_STEP_LIMIT);
      this.zoom += this.targetZoom > this.zoom ? limited : -limited;
      return true;
    }

    if (this.zoom !== this.targetZoom) {
      this.zoom = this.targetZoom;
    }
    return false;
  }

  /** Check if zoom easing is active */
  isAnimating(): boolean {
    return this.zoom !== this.targetZoom;
  }

  /**
   * Pan by a pointer delta in pixels (previous position minus current),
   * so the map follows the pointer while dragging.
   */
  pan(dx: number, dy: number, viewportWidth: number, viewportHeight: number): void {
    const width = Math.max(viewportWidth, 1);
    const height = Math.max(viewportHeight, 1);
    const [rx, ry] = windowRatio(width, height);

    this.offsetX += (dx * 2) / width / rx / this.zoom;
    this.offsetY += (dy * 2) / height / ry / this.zoom;
  }

  /** Center the view on a world position */
  centerOn(world: Vec2): void {
    this.offsetX = world[0];
    this.offsetY = -world[1];
  }
}
