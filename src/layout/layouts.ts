/**
 * Attribute layouts for every vertex stream.
 *
 * Locations are global: a name maps to the same location in every program
 * and both dialects (bound with bindAttribLocation before linking), so a
 * VAO does not depend on which program draws it.
 */

/** Bytes per float */
const FLOAT_SIZE = 4;

export const ATTRIBUTE_LOCATIONS = {
  a_position: 0,
  a_normal: 1,
  a_color: 2,
  a_highlight: 3,
  a_center: 4,
  a_scale: 5,
  a_radius: 6,
  a_uv: 7,
} as const;

export type AttributeName = keyof typeof ATTRIBUTE_LOCATIONS;

export interface AttributeSpec {
  readonly name: AttributeName;
  /** Float components (1-4) */
  readonly size: 1 | 2 | 3 | 4;
  /** Byte offset within one element */
  readonly offset: number;
}

export interface VertexLayout {
  /** Bytes per element */
  readonly stride: number;
  /** Floats per element */
  readonly floats: number;
  /** 0 = per vertex, 1 = per instance */
  readonly divisor: 0 | 1;
  readonly attributes: readonly AttributeSpec[];
}

function defineLayout(
  divisor: 0 | 1,
  fields: readonly (readonly [AttributeName, AttributeSpec["size"]])[]
): VertexLayout {
  let floats = 0;
  const attributes = fields.map(([name, size]) => {
    const spec: AttributeSpec = { name, size, offset: floats * FLOAT_SIZE };
    floats += size;
    return spec;
  });
  return { stride: floats * FLOAT_SIZE, floats, divisor, attributes };
}

/** Marker quad corners: a_position vec2 */
export const MARKER_CORNER_LAYOUT = defineLayout(0, [["a_position", 2]]);

/** One record per system marker */
export const SYSTEM_INSTANCE_LAYOUT = defineLayout(1, [
  ["a_color", 4],
  ["a_highlight", 4],
  ["a_center", 2],
  ["a_scale", 1],
  ["a_radius", 1],
]);

export const JUMP_VERTEX_LAYOUT = defineLayout(0, [
  ["a_position", 3],
  ["a_normal", 2],
  ["a_color", 3],
]);

export const QUAD_VERTEX_LAYOUT = defineLayout(0, [
  ["a_position", 2],
  ["a_uv", 2],
]);

/** Text keeps alpha inside a_color; there is no separate alpha stream */
export const TEXT_VERTEX_LAYOUT = defineLayout(0, [
  ["a_position", 2],
  ["a_uv", 2],
  ["a_color", 4],
]);

/** Location table restricted to the attributes a program declares */
export function attributeLocationsFor(names: readonly string[]): Record<string, number> {
  const locations: Record<string, number> = {};
  for (const name of names) {
    if (isAttributeName(name)) {
      locations[name] = ATTRIBUTE_LOCATIONS[name];
    }
  }
  return locations;
}

export function isAttributeName(name: string): name is AttributeName {
  return Object.prototype.hasOwnProperty.call(ATTRIBUTE_LOCATIONS, name);
}
