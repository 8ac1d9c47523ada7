/**
 * Atlas texture creation
 */

/** "alpha" stores coverage in .a (glyph atlases); "rgba" stores color (image atlases) */
export type AtlasFormat = "alpha" | "rgba";

export interface AtlasOptions {
  format?: AtlasFormat;
  /** Build mipmaps and sample trilinearly (default: false) */
  mipmaps?: boolean;
}

/**
 * Create an atlas texture from an image source.
 * Texels are stored unmodified; shaders treat them as linear.
 */
export function createAtlasTexture(
  gl: WebGL2RenderingContext,
  source: TexImageSource,
  options: AtlasOptions = {}
): WebGLTexture {
  const format = options.format === "alpha" ? gl.ALPHA : gl.RGBA;

  const texture = gl.createTexture();
  if (!texture) throw new Error("Failed to create atlas texture");

  gl.bindTexture(gl.TEXTURE_2D, texture);
  // ALPHA rows are one byte per texel
  gl.pixelStorei(gl.UNPACK_ALIGNMENT, 1);
  gl.texImage2D(gl.TEXTURE_2D, 0, format, format, gl.UNSIGNED_BYTE, source);

  gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE);
  gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE);
  if (options.mipmaps) {
    gl.generateMipmap(gl.TEXTURE_2D);
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.LINEAR_MIPMAP_LINEAR);
  } else {
    gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.LINEAR);
  }
  gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.LINEAR);

  gl.bindTexture(gl.TEXTURE_2D, null);
  return texture;
}
