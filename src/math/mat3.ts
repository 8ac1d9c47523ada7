/**
 * 3x3 Matrix utilities for 2D affine transformations
 * Matrices are stored in column-major order (WebGL convention)
 */

export type Mat3 = Float32Array;

/** 2D point or vector */
export type Vec2 = readonly [number, number];

/** Create an identity matrix */
export function create(): Mat3 {
  const m = new Float32Array(9);
  m[0] = 1;
  m[4] = 1;
  m[8] = 1;
  return m;
}

/** Multiply two matrices: out = a * b */
export function multiply(a: Mat3, b: Mat3): Mat3 {
  const out = new Float32Array(9);

  for (let col = 0; col < 3; col++) {
    const b0 = b[col * 3]!;
    const b1 = b[col * 3 + 1]!;
    const b2 = b[col * 3 + 2]!;
    out[col * 3] = a[0]! * b0 + a[3]! * b1 + a[6]! * b2;
    out[col * 3 + 1] = a[1]! * b0 + a[4]! * b1 + a[7]! * b2;
    out[col * 3 + 2] = a[2]! * b0 + a[5]! * b1 + a[8]! * b2;
  }

  return out;
}

/** Create a translation matrix */
export function translate(x: number, y: number): Mat3 {
  const m = create();
  m[6] = x;
  m[7] = y;
  return m;
}

/** Create a scale matrix */
export function scale(sx: number, sy: number): Mat3 {
  const m = new Float32Array(9);
  m[0] = sx;
  m[4] = sy;
  m[8] = 1;
  return m;
}

/**
 * Pixel space (origin top-left, y down) to clip space.
 * (0,0) maps to (-1,1) and (width,height) to (1,-1).
 */
export function screenProjection(width: number, height: number): Mat3 {
  const m = new Float32Array(9);
  m[0] = 2 / width;
  m[4] = -2 / height;
  m[6] = -1;
  m[7] = 1;
  m[8] = 1;
  return m;
}

/** Clip space to pixel space; inverse of screenProjection */
export function clipToPixels(width: number, height: number): Mat3 {
  const m = new Float32Array(9);
  m[0] = width / 2;
  m[4] = -height / 2;
  m[6] = width / 2;
  m[7] = height / 2;
  m[8] = 1;
  return m;
}

/** Apply m to the point (x, y, 1) */
export function transformPoint(m: Mat3, p: Vec2): [number, number] {
  return [
    m[0]! * p[0] + m[3]! * p[1] + m[6]!,
    m[1]! * p[0] + m[4]! * p[1] + m[7]!,
  ];
}

/** Apply m to the direction (x, y, 0); translation is ignored */
export function transformVector(m: Mat3, v: Vec2): [number, number] {
  return [m[0]! * v[0] + m[3]! * v[1], m[1]! * v[0] + m[4]! * v[1]];
}

/** Invert an affine matrix. Returns null when it is singular. */
export function invertAffine(m: Mat3): Mat3 | null {
  const a = m[0]!;
  const b = m[1]!;
  const c = m[3]!;
  const d = m[4]!;
  const det = a * d - b * c;
  if (det === 0) return null;

  const out = create();
  out[0] = d / det;
  out[1] = -b / det;
  out[3] = -c / det;
  out[4] = a / det;
  out[6] = -(out[0] * m[6]! + out[3] * m[7]!);
  out[7] = -(out[1] * m[6]! + out[4] * m[7]!);
  return out;
}
