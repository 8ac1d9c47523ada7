/**
 * GPU-resident scene data. Layers are created and updated through
 * RenderBackend and drawn by reference each frame.
 */

import { buildJumpVertices, buildQuadIndices } from "../layout/geometry";
import {
  JUMP_VERTEX_LAYOUT,
  MARKER_CORNER_LAYOUT,
  SYSTEM_INSTANCE_LAYOUT,
} from "../layout/layouts";
import { packJumpVertices, packSystemInstances } from "../layout/pack";
import type { JumpSegment, SystemMarkerInstance } from "../layout/types";
import { GpuBuffer, type FrameLock } from "./GpuBuffer";
import { VertexArray } from "./VertexArray";

/**
 * Shared element buffer holding quad indices. Grows by doubling and is
 * re-uploaded in place, so VAOs that captured it stay valid.
 */
export class QuadIndexBuffer {
  readonly buffer: GpuBuffer;
  private _capacity = 0;

  constructor(private gl: WebGL2RenderingContext) {
    this.buffer = new GpuBuffer(gl, "element", "static");
  }

  /** Make room for at least `quadCount` quads */
  ensure(quadCount: number): void {
    if (quadCount <= this._capacity) return;
    const capacity = Math.max(quadCount, this._capacity * 2, 64);
    // Element bindings are VAO state; upload with no VAO bound
    this.gl.bindVertexArray(null);
    this.buffer.setData(buildQuadIndices(capacity));
    this._capacity = capacity;
  }

  get capacity(): number {
    return this._capacity;
  }

  destroy(): void {
    this.buffer.destroy();
  }
}

/** Instanced system markers over the shared corner strip */
export class MarkerLayer {
  readonly vertexArray: VertexArray;
  private instances: GpuBuffer;
  private _count = 0;

  constructor(gl: WebGL2RenderingContext, corners: GpuBuffer, lock: FrameLock) {
    this.instances = new GpuBuffer(gl, "array", "dynamic", lock);
    this.vertexArray = new VertexArray(gl, [
      { buffer: corners, layout: MARKER_CORNER_LAYOUT },
      { buffer: this.instances, layout: SYSTEM_INSTANCE_LAYOUT },
    ]);
  }

  setInstances(instances: readonly SystemMarkerInstance[]): void {
    this.instances.setData(packSystemInstances(instances));
    this._count = instances.length;
  }

  /** Overwrite instances `first..first+n` in place; the count is unchanged */
  updateInstances(first: number, instances: readonly SystemMarkerInstance[]): void {
    if (!Number.isInteger(first) || first < 0 || first + instances.length > this._count) {
      throw new Error(
        `Marker update out of range: ${first}+${instances.length} > ${this._count} instances`
      );
    }
    if (instances.length === 0) return;
    this.instances.updateData(packSystemInstances(instances), first * SYSTEM_INSTANCE_LAYOUT.stride);
  }

  get count(): number {
    return this._count;
  }

  get destroyed(): boolean {
    return this.vertexArray.destroyed;
  }

  destroy(): void {
    this.vertexArray.destroy();
    this.instances.destroy();
  }
}

/** Jump quads, four vertices each, drawn through the shared index buffer */
export class JumpLayer {
  readonly vertexArray: VertexArray;
  private vertices: GpuBuffer;
  private indices: QuadIndexBuffer;
  private _count = 0;

  constructor(gl: WebGL2RenderingContext, indices: QuadIndexBuffer, lock: FrameLock) {
    this.indices = indices;
    this.vertices = new GpuBuffer(gl, "array", "dynamic", lock);
    this.vertexArray = new VertexArray(
      gl,
      [{ buffer: this.vertices, layout: JUMP_VERTEX_LAYOUT }],
      indices.buffer
    );
  }

  setSegments(segments: readonly JumpSegment[]): void {
    this.vertices.setData(packJumpVertices(buildJumpVertices(segments)));
    this.indices.ensure(segments.length);
    this._count = segments.length;
  }

  /** Number of segments */
  get count(): number {
    return this._count;
  }

  get destroyed(): boolean {
    return this.vertexArray.destroyed;
  }

  destroy(): void {
    this.vertexArray.destroy();
    this.vertices.destroy();
  }
}
