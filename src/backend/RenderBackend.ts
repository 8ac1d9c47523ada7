/**
 * Backend adapter: owns the programs and shared buffers for one shader
 * dialect and turns the four draw kinds into GL calls.
 *
 * Usage per frame:
 *   const frame = backend.beginFrame(camera);
 *   backend.drawMarkers(frame, layer, "glow");
 *   ...
 *   const stats = backend.endFrame(frame);
 */

import { framebufferClearColor } from "../compositor/display";
import { PassStateCache, type PassKind } from "../compositor/passes";
import type { MarkerStyle } from "../compositor/shading";
import { MARKER_CORNERS, rectTriangles } from "../layout/geometry";
import { QUAD_VERTEX_LAYOUT, TEXT_VERTEX_LAYOUT } from "../layout/layouts";
import { packQuadVertices, packTextVertices } from "../layout/pack";
import type {
  JumpSegment,
  Rect,
  SystemMarkerInstance,
  TextVertex,
} from "../layout/types";
import { warnOnce } from "../log";
import type { ShaderSourcePair, BackendKind, ProgramId } from "../shaders/types";
import {
  clampWindowSize,
  createFrameUniforms,
  type CameraView,
  type FrameUniforms,
} from "../transform/frameUniforms";
import { WHITE, type Color } from "../types/color";
import { Frame, type FrameStats } from "./Frame";
import { GpuBuffer, type FrameLock } from "./GpuBuffer";
import { JumpLayer, MarkerLayer, QuadIndexBuffer } from "./layers";
import { ProgramLibrary, type ProgramInfo } from "./ProgramLibrary";
import { createAtlasTexture, type AtlasOptions } from "./textures";
import { VertexArray } from "./VertexArray";

export interface RenderBackendOptions {
  kind: BackendKind;
  /** Linear background color; the desktop variant clears to its encoded value */
  clearColor: Color;
  /** Source replacements, e.g. from a shader hot-reload watcher */
  programSources?: Partial<Record<ProgramId, ShaderSourcePair>>;
}

export const DEFAULT_BACKEND_OPTIONS: RenderBackendOptions = {
  kind: "web",
  clearColor: [0, 0, 0, 1],
};

export class RenderBackend implements FrameLock {
  readonly gl: WebGL2RenderingContext;
  readonly kind: BackendKind;
  readonly clearColor: Color;

  private programs: ProgramLibrary;
  private passState: PassStateCache;
  private corners: GpuBuffer;
  private quadIndices: QuadIndexBuffer;
  private quadStream: GpuBuffer;
  private quadArray: VertexArray;
  private textStream: GpuBuffer;
  private textArray: VertexArray;

  private windowSize: [number, number];
  private current: Frame | null = null;
  private frameCount = 0;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, options: Partial<RenderBackendOptions> = {}) {
    const opts = { ...DEFAULT_BACKEND_OPTIONS, ...options };
    this.gl = gl;
    this.kind = opts.kind;
    this.clearColor = opts.clearColor;

    this.programs = new ProgramLibrary(gl, this.kind, opts.programSources);
    this.passState = new PassStateCache(gl);

    this.corners = new GpuBuffer(gl, "array", "static");
    this.corners.setData(MARKER_CORNERS);
    this.quadIndices = new QuadIndexBuffer(gl);

    this.quadStream = new GpuBuffer(gl, "array", "stream");
    this.quadArray = new VertexArray(gl, [{ buffer: this.quadStream, layout: QUAD_VERTEX_LAYOUT }]);
    this.textStream = new GpuBuffer(gl, "array", "stream");
    this.textArray = new VertexArray(
      gl,
      [{ buffer: this.textStream, layout: TEXT_VERTEX_LAYOUT }],
      this.quadIndices.buffer
    );

    this.windowSize = clampWindowSize(gl.canvas.width, gl.canvas.height);
  }

  /** True between beginFrame and endFrame */
  get frameActive(): boolean {
    return this.current !== null;
  }

  /** Drawing-buffer size in pixels, as used for the next frame's uniforms */
  get size(): readonly [number, number] {
    return this.windowSize;
  }

  /**
   * Set the drawing-buffer size. A frame in progress is dropped: its
   * remaining draws are skipped and its stats report `dropped`.
   */
  resize(width: number, height: number): void {
    this.windowSize = clampWindowSize(width, height);
    if (this.current) {
      this.current.drop();
    }
  }

  // ============================================
  // Scene data
  // ============================================

  createMarkerLayer(instances: readonly SystemMarkerInstance[]): MarkerLayer {
    this.checkAlive();
    const layer = new MarkerLayer(this.gl, this.corners, this);
    layer.setInstances(instances);
    return layer;
  }

  updateMarkerLayer(layer: MarkerLayer, instances: readonly SystemMarkerInstance[]): void {
    this.checkAlive();
    layer.setInstances(instances);
  }

  /** Replace a run of instances without reallocating the layer's buffer */
  updateMarkerRange(layer: MarkerLayer, first: number, instances: readonly SystemMarkerInstance[]): void {
    this.checkAlive();
    layer.updateInstances(first, instances);
  }

  createJumpLayer(segments: readonly JumpSegment[]): JumpLayer {
    this.checkAlive();
    const layer = new JumpLayer(this.gl, this.quadIndices, this);
    layer.setSegments(segments);
    return layer;
  }

  updateJumpLayer(layer: JumpLayer, segments: readonly JumpSegment[]): void {
    this.checkAlive();
    layer.setSegments(segments);
  }

  /** Upload an atlas for drawImage or drawText; the caller owns it */
  createAtlas(source: TexImageSource, options?: AtlasOptions): WebGLTexture {
    this.checkAlive();
    return createAtlasTexture(this.gl, source, options);
  }

  deleteAtlas(atlas: WebGLTexture): void {
    this.gl.deleteTexture(atlas);
  }

  // ============================================
  // Frame lifecycle
  // ============================================

  beginFrame(camera: CameraView): Frame {
    this.checkAlive();
    if (this.current) {
      throw new Error(`Frame ${this.current.index} is still active`);
    }

    const gl = this.gl;
    const [width, height] = this.windowSize;
    const frame = new Frame(createFrameUniforms(camera, width, height), this.frameCount++);

    this.passState.reset();
    gl.viewport(0, 0, width, height);
    const [r, g, b, a] = framebufferClearColor(this.kind, this.clearColor);
    gl.clearColor(r, g, b, a);
    gl.clearDepth(0);
    gl.depthMask(true);
    gl.clear(gl.COLOR_BUFFER_BIT | gl.DEPTH_BUFFER_BIT);

    this.current = frame;
    return frame;
  }

  endFrame(frame: Frame): FrameStats {
    if (frame !== this.current) {
      throw new Error(`Frame ${frame.index} is not the active frame`);
    }
    this.gl.bindVertexArray(null);
    this.gl.useProgram(null);
    this.current = null;
    return frame.finish();
  }

  // ============================================
  // Draws
  // ============================================

  drawMarkers(frame: Frame, layer: MarkerLayer, style: MarkerStyle): void {
    if (!this.enterPass(frame, "systems")) return;
    if (layer.count === 0) return;

    const program = this.useProgram(`systems.${style}`);
    this.setMapUniforms(program, frame.uniforms);

    layer.vertexArray.bind();
    this.gl.drawArraysInstanced(this.gl.TRIANGLE_STRIP, 0, 4, layer.count);
    frame.recordDraw(layer.count);
  }

  drawJumps(frame: Frame, layer: JumpLayer): void {
    if (!this.enterPass(frame, "jumps")) return;
    if (layer.count === 0) return;

    const program = this.useProgram("jumps");
    this.setMapUniforms(program, frame.uniforms);

    layer.vertexArray.bind();
    this.gl.drawElements(this.gl.TRIANGLES, layer.count * 6, this.gl.UNSIGNED_INT, 0);
    frame.recordDraw(layer.count);
  }

  /** Solid rectangle in pixels */
  drawQuad(frame: Frame, rect: Rect, color: Color): void {
    if (!this.enterPass(frame, "quads")) return;
    this.submitQuad(frame, rect, undefined, null, color);
  }

  /** Textured rectangle; skipped when there is no atlas */
  drawImage(
    frame: Frame,
    rect: Rect,
    uvRect: Rect,
    atlas: WebGLTexture | null,
    tint: Color = WHITE
  ): void {
    if (!this.enterPass(frame, "quads")) return;
    if (!atlas) {
      warnOnce("image-atlas", "[RenderBackend] Image drawn without an atlas; skipping");
      frame.recordSkip();
      return;
    }
    this.submitQuad(frame, rect, uvRect, atlas, tint);
  }

  /** Glyph quads from layoutText, four vertices per glyph */
  drawText(frame: Frame, vertices: readonly TextVertex[], atlas: WebGLTexture | null): void {
    if (!this.enterPass(frame, "text")) return;
    if (!atlas) {
      warnOnce("text-atlas", "[RenderBackend] Text drawn without a font atlas; skipping");
      frame.recordSkip();
      return;
    }

    const quads = Math.floor(vertices.length / 4);
    if (quads * 4 !== vertices.length) {
      warnOnce(
        `text-count:${vertices.length}`,
        `[RenderBackend] Text vertex count ${vertices.length} is not a multiple of 4; extra vertices ignored`
      );
    }
    if (quads === 0) return;

    const gl = this.gl;
    this.quadIndices.ensure(quads);
    this.textStream.setData(packTextVertices(vertices.slice(0, quads * 4)));

    const program = this.useProgram("text");
    const [width, height] = frame.uniforms.windowSize;
    gl.uniform2f(uniform(program, "u_window_size"), width, height);

    this.withAtlas(atlas, uniform(program, "u_font_atlas"), () => {
      this.textArray.bind();
      gl.drawElements(gl.TRIANGLES, quads * 6, gl.UNSIGNED_INT, 0);
    });
    frame.recordDraw(quads);
  }

  // ============================================
  // Programs and teardown
  // ============================================

  /** Hot-reload one program; false keeps the previous program */
  reloadProgram(id: ProgramId, sources: ShaderSourcePair): boolean {
    this.checkAlive();
    return this.programs.reload(id, sources);
  }

  /** Release backend-owned resources; layers belong to their creator */
  destroy(): void {
    if (this._destroyed) return;
    this.current = null;
    this.quadArray.destroy();
    this.textArray.destroy();
    this.quadStream.destroy();
    this.textStream.destroy();
    this.quadIndices.destroy();
    this.corners.destroy();
    this.programs.destroy();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  // ============================================
  // Internals
  // ============================================

  private checkAlive(): void {
    if (this._destroyed) {
      throw new Error("Cannot use destroyed render backend");
    }
  }

  /** Validate the frame and move it to `pass`; false means skip the draw */
  private enterPass(frame: Frame, pass: PassKind): boolean {
    this.checkAlive();
    if (frame !== this.current) {
      throw new Error(`Frame ${frame.index} is not the active frame`);
    }
    if (frame.dropped) {
      frame.recordSkip();
      return false;
    }
    if (!frame.enter(pass)) {
      warnOnce(
        `order:${frame.pass}:${pass}`,
        `[RenderBackend] ${pass} draw after ${frame.pass} pass; skipping`
      );
      frame.recordSkip();
      return false;
    }
    this.passState.apply(pass);
    return true;
  }

  private useProgram(id: ProgramId): ProgramInfo {
    const info = this.programs.get(id);
    this.gl.useProgram(info.program);
    return info;
  }

  private setMapUniforms(program: ProgramInfo, uniforms: FrameUniforms): void {
    const gl = this.gl;
    gl.uniformMatrix3fv(uniform(program, "u_map_view_matrix"), false, uniforms.viewMatrix);
    gl.uniformMatrix3fv(uniform(program, "u_map_scale_matrix"), false, uniforms.scaleMatrix);
    gl.uniform1f(uniform(program, "u_zoom"), uniforms.zoom);
  }

  private submitQuad(
    frame: Frame,
    rect: Rect,
    uvRect: Rect | undefined,
    atlas: WebGLTexture | null,
    color: Color
  ): void {
    const gl = this.gl;
    this.quadStream.setData(packQuadVertices(rectTriangles(rect, uvRect)));

    const program = this.useProgram("quad");
    const [width, height] = frame.uniforms.windowSize;
    gl.uniform2f(uniform(program, "u_window_size"), width, height);
    gl.uniform4f(uniform(program, "u_color"), color[0], color[1], color[2], color[3]);
    gl.uniform1i(uniform(program, "u_textured"), atlas ? 1 : 0);

    const draw = () => {
      this.quadArray.bind();
      gl.drawArrays(gl.TRIANGLES, 0, 6);
    };
    if (atlas) {
      this.withAtlas(atlas, uniform(program, "u_texture_atlas"), draw);
    } else {
      gl.uniform1i(uniform(program, "u_texture_atlas"), 0);
      draw();
    }
    frame.recordDraw(1);
  }

  /** Bind `atlas` to unit 0 for the duration of `draw` */
  private withAtlas(atlas: WebGLTexture, sampler: WebGLUniformLocation, draw: () => void): void {
    const gl = this.gl;
    gl.activeTexture(gl.TEXTURE0);
    gl.bindTexture(gl.TEXTURE_2D, atlas);
    gl.uniform1i(sampler, 0);
    try {
      draw();
    } finally {
      gl.bindTexture(gl.TEXTURE_2D, null);
    }
  }
}

function uniform(program: ProgramInfo, name: string): WebGLUniformLocation {
  const location = program.uniforms.get(name);
  if (location === undefined) {
    throw new Error(`Program "${program.id}" has no uniform ${name}`);
  }
  return location;
}
