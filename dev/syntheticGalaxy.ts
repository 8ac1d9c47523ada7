/**
 * Deterministic galaxy generator for the demo page.
 */

import { centroid, normalizeToUnit, type MapJump, type MapRegion, type MapSystem } from "../src/index";
import type { Vec2 } from "../src/math/mat3";

export interface Galaxy {
  systems: MapSystem[];
  jumps: MapJump[];
  regions: MapRegion[];
}

export interface GalaxyOptions {
  seed?: number;
  regionCount?: number;
  systemsPerRegion?: number;
  /** Share of systems held by someone, 0..1 */
  sovereigntyShare?: number;
}

const REGION_NAMES = [
  "Aster Reach",
  "Cold Verge",
  "Dusk Hollow",
  "Ember Fields",
  "Far Lantern",
  "Gloam",
  "Halcyon Drift",
  "Iron Shoal",
  "Jade Basin",
  "Kestrel Span",
  "Lumen Deep",
  "Mire",
];

const SYLLABLES = ["ka", "ro", "vel", "tis", "an", "or", "mu", "sei", "da", "lin", "qu", "ex"];

/** Small seeded PRNG (mulberry32) */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) throw new Error("Cannot pick from an empty list");
  return item;
}

function systemName(random: () => number, id: number): string {
  const first = pick(random, SYLLABLES);
  const second = pick(random, SYLLABLES);
  return `${first[0]?.toUpperCase() ?? ""}${first.slice(1)}${second}-${id % 100}`;
}

export function generateGalaxy(options: GalaxyOptions = {}): Galaxy {
  const { seed = 1, regionCount = 8, systemsPerRegion = 40, sovereigntyShare = 0.3 } = options;
  const random = createRandom(seed);

  const raw: Vec2[] = [];
  const regionOf: number[] = [];

  for (let region = 0; region < regionCount; region++) {
    const angle = (region / regionCount) * Math.PI * 2;
    const distance = 3 + random() * 4;
    const cx = Math.cos(angle) * distance;
    const cy = Math.sin(angle) * distance;

    for (let i = 0; i < systemsPerRegion; i++) {
      const r = Math.sqrt(random()) * 2;
      const a = random() * Math.PI * 2;
      raw.push([cx + Math.cos(a) * r, cy + Math.sin(a) * r]);
      regionOf.push(region);
    }
  }

  const positions = normalizeToUnit(raw);
  const systems: MapSystem[] = positions.map((position, id) => ({
    id,
    name: systemName(random, id),
    position,
    security: Math.round((random() * 1.3 - 0.3) * 10) / 10,
    standing: random() < sovereigntyShare ? Math.round((random() * 2 - 1) * 10) / 10 : null,
  }));

  const jumps = connectSystems(systems, regionOf, random);

  const regions: MapRegion[] = [];
  for (let region = 0; region < regionCount; region++) {
    const members = systems.filter((_, id) => regionOf[id] === region).map((s) => s.position);
    regions.push({
      name: REGION_NAMES[region % REGION_NAMES.length] ?? `Region ${region}`,
      position: centroid(members),
    });
  }

  return { systems, jumps, regions };
}

/** Link each system to its two nearest neighbours, plus a gate between adjacent regions */
function connectSystems(systems: readonly MapSystem[], regionOf: readonly number[], random: () => number): MapJump[] {
  const seen = new Set<string>();
  const jumps: MapJump[] = [];

  const link = (from: number, to: number, type: MapJump["type"]) => {
    const key = from < to ? `${from}:${to}` : `${to}:${from}`;
    if (from === to || seen.has(key)) return;
    seen.add(key);
    jumps.push({ from, to, type, onRoute: false });
  };

  for (const system of systems) {
    const nearest = systems
      .filter((other) => other.id !== system.id && regionOf[other.id] === regionOf[system.id])
      .map((other) => ({ id: other.id, d: squaredDistance(system.position, other.position) }))
      .sort((a, b) => a.d - b.d)
      .slice(0, 2);
    for (const { id } of nearest) {
      link(system.id, id, random() < 0.7 ? "system" : "constellation");
    }
  }

  const regionCount = Math.max(...regionOf) + 1;
  for (let region = 0; region < regionCount; region++) {
    const next = (region + 1) % regionCount;
    const a = systems.filter((s) => regionOf[s.id] === region);
    const b = systems.filter((s) => regionOf[s.id] === next);

    let best: [number, number] | null = null;
    let bestDistance = Infinity;
    for (const sa of a) {
      for (const sb of b) {
        const d = squaredDistance(sa.position, sb.position);
        if (d < bestDistance) {
          bestDistance = d;
          best = [sa.id, sb.id];
        }
      }
    }
    if (best) link(best[0], best[1], random() < 0.25 ? "jumpGate" : "region");
  }

  return jumps;
}

function squaredDistance(a: Vec2, b: Vec2): number {
  const dx = a[0] - b[0];
  const dy = a[1] - b[1];
  return dx * dx + dy * dy;
}

function adjacency(jumps: readonly MapJump[]): Map<number, number[]> {
  const neighbours = new Map<number, number[]>();
  const add = (a: number, b: number) => {
    const list = neighbours.get(a);
    if (list) list.push(b);
    else neighbours.set(a, [b]);
  };
  for (const jump of jumps) {
    add(jump.from, jump.to);
    add(jump.to, jump.from);
  }
  return neighbours;
}

/** Jump counts from `origin` to every reachable system (breadth-first) */
export function jumpDistances(jumps: readonly MapJump[], origin: number): Map<number, number> {
  const neighbours = adjacency(jumps);
  const distances = new Map<number, number>([[origin, 0]]);
  const queue = [origin];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    const d = distances.get(current) ?? 0;
    for (const next of neighbours.get(current) ?? []) {
      if (distances.has(next)) continue;
      distances.set(next, d + 1);
      queue.push(next);
    }
  }
  return distances;
}

/** Shortest path from `from` to `to` as system ids, or null when unreachable */
export function findRoute(jumps: readonly MapJump[], from: number, to: number): number[] | null {
  const neighbours = adjacency(jumps);
  const previous = new Map<number, number>();
  const visited = new Set([from]);
  const queue = [from];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;
    if (current === to) break;
    for (const next of neighbours.get(current) ?? []) {
      if (visited.has(next)) continue;
      visited.add(next);
      previous.set(next, current);
      queue.push(next);
    }
  }

  if (!visited.has(to)) return null;

  const path = [to];
  let step = to;
  while (step !== from) {
    const prev = previous.get(step);
    if (prev === undefined) return null;
    path.push(prev);
    step = prev;
  }
  return path.reverse();
}

/** Copy of `jumps` with the legs of `route` flagged onRoute */
export function markRoute(jumps: readonly MapJump[], route: readonly number[]): MapJump[] {
  const legs = new Set<string>();
  for (let i = 1; i < route.length; i++) {
    const a = route[i - 1];
    const b = route[i];
    if (a === undefined || b === undefined) continue;
    legs.add(`${a}:${b}`);
    legs.add(`${b}:${a}`);
  }
  return jumps.map((jump) => ({ ...jump, onRoute: legs.has(`${jump.from}:${jump.to}`) }));
}
