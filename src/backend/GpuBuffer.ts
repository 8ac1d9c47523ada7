/**
 * WebGL buffer wrapper with lifecycle management
 */

export type BufferTarget = "array" | "element";
export type BufferUsage = "static" | "dynamic" | "stream";

/** Anything that knows whether a frame is currently being drawn */
export interface FrameLock {
  readonly frameActive: boolean;
}

function usageEnum(gl: WebGL2RenderingContext, usage: BufferUsage): GLenum {
  switch (usage) {
    case "static":
      return gl.STATIC_DRAW;
    case "dynamic":
      return gl.DYNAMIC_DRAW;
    case "stream":
      return gl.STREAM_DRAW;
  }
}

export class GpuBuffer {
  readonly gl: WebGL2RenderingContext;
  readonly handle: WebGLBuffer;
  readonly target: GLenum;
  readonly usage: GLenum;

  private lock: FrameLock | null;
  private _byteLength = 0;
  private _destroyed = false;

  /**
   * @param lock - when given, uploads are refused while lock.frameActive;
   *   scene data must be complete before a frame's first draw
   */
  constructor(
    gl: WebGL2RenderingContext,
    target: BufferTarget = "array",
    usage: BufferUsage = "static",
    lock: FrameLock | null = null
  ) {
    this.gl = gl;
    this.target = target === "element" ? gl.ELEMENT_ARRAY_BUFFER : gl.ARRAY_BUFFER;
    this.usage = usageEnum(gl, usage);
    this.lock = lock;

    const handle = gl.createBuffer();
    if (!handle) {
      throw new Error("Failed to create WebGL buffer");
    }
    this.handle = handle;
  }

  /** Bind this buffer to its target */
  bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed buffer");
    }
    this.gl.bindBuffer(this.target, this.handle);
  }

  /** Unbind this buffer's target */
  unbind(): void {
    this.gl.bindBuffer(this.target, null);
  }

  /** Upload data to the buffer (replaces existing data) */
  setData(data: ArrayBufferView): void {
    this.checkWritable("set data on");
    this.bind();
    this.gl.bufferData(this.target, data, this.usage);
    this._byteLength = data.byteLength;
  }

  /** Update a portion of the buffer's data */
  updateData(data: ArrayBufferView, offset: number = 0): void {
    this.checkWritable("update data on");
    if (offset + data.byteLength > this._byteLength) {
      throw new Error(
        `Buffer update out of range: ${offset}+${data.byteLength} > ${this._byteLength} bytes`
      );
    }
    this.bind();
    this.gl.bufferSubData(this.target, offset, data);
  }

  private checkWritable(action: string): void {
    if (this._destroyed) {
      throw new Error(`Cannot ${action} destroyed buffer`);
    }
    if (this.lock?.frameActive) {
      throw new Error(`Cannot ${action} buffer while a frame is being drawn`);
    }
  }

  /** Bytes uploaded by the last setData */
  get byteLength(): number {
    return this._byteLength;
  }

  /** Delete the buffer and release GPU memory */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteBuffer(this.handle);
    this._destroyed = true;
  }

  /** Check if buffer has been destroyed */
  get destroyed(): boolean {
    return this._destroyed;
  }
}
