/**
 * Packing of instance and vertex records into interleaved Float32Arrays,
 * following the layouts in ./layouts. Records keep insertion order, which
 * is their draw order within one call.
 */

import { MIN_MARKER_RADIUS } from "../constants";
import { warnOnce } from "../log";
import {
  JUMP_VERTEX_LAYOUT,
  QUAD_VERTEX_LAYOUT,
  SYSTEM_INSTANCE_LAYOUT,
  TEXT_VERTEX_LAYOUT,
} from "./layouts";
import type { JumpVertex, QuadVertex, SystemMarkerInstance, TextVertex } from "./types";

export function packSystemInstances(instances: readonly SystemMarkerInstance[]): Float32Array {
  const stride = SYSTEM_INSTANCE_LAYOUT.floats;
  const data = new Float32Array(instances.length * stride);

  for (let i = 0; i < instances.length; i++) {
    const inst = instances[i]!;
    const o = i * stride;

    let radius = inst.radius;
    if (!(radius > 0)) {
      warnOnce(
        `marker-radius:${radius}`,
        `[Layout] Marker radius ${radius} clamped to ${MIN_MARKER_RADIUS}`
      );
      radius = MIN_MARKER_RADIUS;
    }

    data.set(inst.color, o);
    data.set(inst.highlight, o + 4);
    data[o + 8] = inst.center[0];
    data[o + 9] = inst.center[1];
    data[o + 10] = inst.scale;
    data[o + 11] = radius;
  }

  return data;
}

export function packJumpVertices(vertices: readonly JumpVertex[]): Float32Array {
  const stride = JUMP_VERTEX_LAYOUT.floats;
  const data = new Float32Array(vertices.length * stride);

  for (let i = 0; i < vertices.length; i++) {
    const v = vertices[i]!;
    const o = i * stride;
    data.set(v.position, o);
    data[o + 3] = v.normal[0];
    data[o + 4] = v.normal[1];
    data.set(v.color, o + 5);
  }

  return data;
}

export function packQuadVertices(vertices: readonly QuadVertex[]): Float32Array {
  const stride = QUAD_VERTEX_LAYOUT.floats;
  const data = new Float32Array(vertices.length * stride);

  for (let i = 0; i < vertices.length; i++) {
    const v = vertices[i]!;
    const o = i * stride;
    data[o] = v.position[0];
    data[o + 1] = v.position[1];
    data[o + 2] = v.uv[0];
    data[o + 3] = v.uv[1];
  }

  return data;
}

export function packTextVertices(vertices: readonly TextVertex[]): Float32Array {
  const stride = TEXT_VERTEX_LAYOUT.floats;
  const data = new Float32Array(vertices.length * stride);

  for (let i = 0; i < vertices.length; i++) {
    const v = vertices[i]!;
    const o = i * stride;
    data[o] = v.position[0];
    data[o + 1] = v.position[1];
    data[o + 2] = v.uv[0];
    data[o + 3] = v.uv[1];
    data.set(v.color, o + 4);
  }

  return data;
}
