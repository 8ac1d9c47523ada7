/**
 * VAO over one or more vertex streams and an optional index buffer.
 *
 * The vertex array does not own its buffers: the marker corner stream and
 * the quad index buffer are shared between layers.
 */

import { ATTRIBUTE_LOCATIONS, type VertexLayout } from "../layout/layouts";
import type { GpuBuffer } from "./GpuBuffer";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_FLOAT = 0x1406;

export interface VertexStream {
  readonly buffer: GpuBuffer;
  readonly layout: VertexLayout;
}

export class VertexArray {
  readonly gl: WebGL2RenderingContext;
  readonly vao: WebGLVertexArrayObject;
  readonly indexBuffer: GpuBuffer | null;

  private _destroyed = false;

  constructor(
    gl: WebGL2RenderingContext,
    streams: readonly VertexStream[],
    indexBuffer: GpuBuffer | null = null
  ) {
    if (streams.length === 0) {
      throw new Error("At least one vertex stream is required");
    }
    this.gl = gl;
    this.indexBuffer = indexBuffer;

    const vao = gl.createVertexArray();
    if (!vao) {
      throw new Error("Failed to create VAO");
    }
    this.vao = vao;

    const used = new Set<number>();
    gl.bindVertexArray(vao);

    for (const { buffer, layout } of streams) {
      buffer.bind();
      for (const attr of layout.attributes) {
        const location = ATTRIBUTE_LOCATIONS[attr.name];
        if (used.has(location)) {
          gl.bindVertexArray(null);
          gl.deleteVertexArray(vao);
          throw new Error(`Attribute ${attr.name} is supplied by more than one stream`);
        }
        used.add(location);
        gl.enableVertexAttribArray(location);
        gl.vertexAttribPointer(location, attr.size, GL_FLOAT, false, layout.stride, attr.offset);
        gl.vertexAttribDivisor(location, layout.divisor);
      }
    }

    indexBuffer?.bind();
    gl.bindVertexArray(null);
  }

  /** Bind the VAO for rendering */
  bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed vertex array");
    }
    this.gl.bindVertexArray(this.vao);
  }

  /** Unbind the VAO */
  unbind(): void {
    this.gl.bindVertexArray(null);
  }

  /** Delete the VAO; streams and index buffer are left to their owners */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteVertexArray(this.vao);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
