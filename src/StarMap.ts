/**
 * StarMap - owns the canvas, camera and render backend, and draws the
 * scene in the fixed pass order: markers, jumps, UI quads, text.
 */

import { Camera } from "./Camera";
import type { Frame, FrameStats } from "./backend/Frame";
import type { JumpLayer, MarkerLayer } from "./backend/layers";
import { RenderBackend } from "./backend/RenderBackend";
import type { MarkerStyle } from "./compositor/shading";
import type { JumpSegment, Rect, SystemMarkerInstance, TextVertex } from "./layout/types";
import type { BackendKind, ProgramId, ShaderSourcePair } from "./shaders/types";
import { createFrameUniforms, type FrameUniforms } from "./transform/frameUniforms";
import type { Color } from "./types/color";

export type MarkerLayerName = "sovereignty" | "systems";

/** Screen-space UI element, pixels with origin top-left */
export type OverlayItem =
  | { readonly kind: "quad"; readonly rect: Rect; readonly color: Color }
  | { readonly kind: "image"; readonly rect: Rect; readonly uv: Rect; readonly tint?: Color };

export interface StarMapOptions {
  canvas: HTMLCanvasElement;
  /** Shader dialect; fixed for the lifetime of the map */
  backend: BackendKind;
  /** Style of the system marker layer */
  markerStyle: MarkerStyle;
  /** Style of the sovereignty marker layer */
  sovereigntyStyle: MarkerStyle;
  /** Linear background color */
  clearColor: Color;
  /** Log frame statistics once per second */
  debugStats: boolean;
  /** Overrides window.devicePixelRatio */
  devicePixelRatio?: number;
  /** Called before each frame with the uniforms it will use; safe place to rebuild labels */
  onBeforeRender?: (uniforms: FrameUniforms) => void;
}

export const DEFAULT_STAR_MAP_OPTIONS: Omit<StarMapOptions, "canvas"> = {
  backend: "web",
  markerStyle: "glow",
  sovereigntyStyle: "flat",
  clearColor: [0.004, 0.004, 0.008, 1],
  debugStats: false,
};

export class StarMap {
  readonly canvas: HTMLCanvasElement;
  readonly gl: WebGL2RenderingContext;
  readonly camera: Camera;
  readonly backend: RenderBackend;

  private options: StarMapOptions;
  private markerLayers = new Map<MarkerLayerName, MarkerLayer>();
  private jumpLayer: JumpLayer | null = null;
  private overlay: readonly OverlayItem[] = [];
  private overlayAtlas: WebGLTexture | null = null;
  private labels: readonly TextVertex[] = [];
  private labelAtlas: WebGLTexture | null = null;

  private animationId: number | null = null;
  private needsRender = true;
  private frameCount = 0;
  private lastDebugTime = 0;

  constructor(options: Partial<StarMapOptions> & { canvas: HTMLCanvasElement }) {
    this.options = { ...DEFAULT_STAR_MAP_OPTIONS, ...options };
    this.canvas = options.canvas;

    const gl = this.canvas.getContext("webgl2", {
      depth: true,
      alpha: true,
      antialias: true,
    });
    if (!gl) {
      throw new Error("WebGL2 not supported");
    }
    this.gl = gl;

    this.camera = new Camera();
    this.backend = new RenderBackend(gl, {
      kind: this.options.backend,
      clearColor: this.options.clearColor,
    });

    this.resize();
  }

  get kind(): BackendKind {
    return this.backend.kind;
  }

  // ============================================
  // Scene
  // ============================================

  setMarkers(layer: MarkerLayerName, instances: readonly SystemMarkerInstance[]): void {
    const existing = this.markerLayers.get(layer);
    if (existing) {
      this.backend.updateMarkerLayer(existing, instances);
    } else {
      this.markerLayers.set(layer, this.backend.createMarkerLayer(instances));
    }
    this.requestRender();
  }

  /** Patch instances `first..` of a layer previously filled by setMarkers */
  updateMarkers(layer: MarkerLayerName, first: number, instances: readonly SystemMarkerInstance[]): void {
    const existing = this.markerLayers.get(layer);
    if (!existing) {
      throw new Error(`Marker layer "${layer}" has not been set`);
    }
    this.backend.updateMarkerRange(existing, first, instances);
    this.requestRender();
  }

  setJumps(segments: readonly JumpSegment[]): void {
    if (this.jumpLayer) {
      this.backend.updateJumpLayer(this.jumpLayer, segments);
    } else {
      this.jumpLayer = this.backend.createJumpLayer(segments);
    }
    this.requestRender();
  }

  /** Replace the UI quads; image items sample `atlas` */
  setOverlay(items: readonly OverlayItem[], atlas: WebGLTexture | null = null): void {
    this.overlay = items;
    this.overlayAtlas = atlas;
    this.requestRender();
  }

  /** Replace the label glyph quads (from layoutText or the map label builders) */
  setLabels(vertices: readonly TextVertex[], atlas: WebGLTexture | null): void {
    this.labels = vertices;
    this.labelAtlas = atlas;
    this.requestRender();
  }

  /** Hot-reload one program; the previous one stays on failure */
  reloadProgram(id: ProgramId, sources: ShaderSourcePair): boolean {
    const ok = this.backend.reloadProgram(id, sources);
    if (ok) this.requestRender();
    return ok;
  }

  // ============================================
  // Frame
  // ============================================

  /** Resize the drawing buffer to the canvas' display size */
  resize(): void {
    const dpr =
      this.options.devicePixelRatio ??
      (typeof window !== "undefined" ? window.devicePixelRatio : 1);
    const scale = dpr > 0 ? dpr : 1;
    const width = Math.round(this.canvas.clientWidth * scale);
    const height = Math.round(this.canvas.clientHeight * scale);

    if (this.canvas.width !== width || this.canvas.height !== height) {
      this.canvas.width = width;
      this.canvas.height = height;
    }

    const [currentWidth, currentHeight] = this.backend.size;
    if (currentWidth !== this.canvas.width || currentHeight !== this.canvas.height) {
      this.backend.resize(this.canvas.width, this.canvas.height);
      this.requestRender();
    }
  }

  /** Request a render on the next frame */
  requestRender(): void {
    this.needsRender = true;
  }

  /** Uniforms the next frame will be drawn with; used for picking and labels */
  getFrameUniforms(): FrameUniforms {
    const [width, height] = this.backend.size;
    return createFrameUniforms(this.camera.getView(), width, height);
  }

  /** Render a single frame */
  render(): FrameStats {
    this.options.onBeforeRender?.(this.getFrameUniforms());

    const frame = this.backend.beginFrame(this.camera.getView());
    let stats: FrameStats;
    try {
      this.drawScene(frame);
    } finally {
      stats = this.backend.endFrame(frame);
    }

    if (stats.dropped) {
      this.requestRender();
    }

    this.frameCount++;
    if (this.options.debugStats) {
      const now = Date.now();
      if (now - this.lastDebugTime > 1000) {
        console.log(
          `[StarMap] frame=${this.frameCount}, drawCalls=${stats.drawCalls}, ` +
            `instances=${stats.instances}, skipped=${stats.skipped}, zoom=${this.camera.zoom.toFixed(2)}`
        );
        this.lastDebugTime = now;
      }
    }

    return stats;
  }

  private drawScene(frame: Frame): void {
    const backend = this.backend;

    const sovereignty = this.markerLayers.get("sovereignty");
    if (sovereignty) backend.drawMarkers(frame, sovereignty, this.options.sovereigntyStyle);
    const systems = this.markerLayers.get("systems");
    if (systems) backend.drawMarkers(frame, systems, this.options.markerStyle);

    if (this.jumpLayer) backend.drawJumps(frame, this.jumpLayer);

    for (const item of this.overlay) {
      if (item.kind === "quad") {
        backend.drawQuad(frame, item.rect, item.color);
      } else {
        backend.drawImage(frame, item.rect, item.uv, this.overlayAtlas, item.tint);
      }
    }

    if (this.labels.length > 0) {
      backend.drawText(frame, this.labels, this.labelAtlas);
    }
  }

  /** Start the render loop */
  start(): void {
    if (this.animationId !== null) return;

    const loop = () => {
      this.resize();
      if (this.camera.update()) {
        this.needsRender = true;
      }
      if (this.needsRender) {
        this.needsRender = false; // Set false BEFORE render so render can re-request
        this.render();
      }
      this.animationId = requestAnimationFrame(loop);
    };

    this.animationId = requestAnimationFrame(loop);
  }

  /** Stop the render loop */
  stop(): void {
    if (this.animationId !== null) {
      cancelAnimationFrame(this.animationId);
      this.animationId = null;
    }
  }

  get running(): boolean {
    return this.animationId !== null;
  }

  /** Clean up resources */
  destroy(): void {
    this.stop();
    for (const layer of this.markerLayers.values()) layer.destroy();
    this.markerLayers.clear();
    this.jumpLayer?.destroy();
    this.jumpLayer = null;
    this.backend.destroy();
  }
}
