import type { Vec2 } from "../math/mat3";

export type JumpType = "system" | "constellation" | "region" | "jumpGate" | "wormhole";

export interface MapSystem {
  readonly id: number;
  readonly name: string;
  /** Map-plane position, normalized so the galaxy fits the unit circle */
  readonly position: Vec2;
  /** Security status; clamped to [0, 1] for coloring */
  readonly security: number;
  /** Sovereignty standing of the holder, if the system is held */
  readonly standing?: number | null;
}

export interface MapJump {
  readonly from: number;
  readonly to: number;
  readonly type: JumpType;
  readonly onRoute: boolean;
}

export interface MapRegion {
  readonly name: string;
  /** Label anchor in map space, usually the centroid of its systems */
  readonly position: Vec2;
}

/** Interaction state that changes how the scene is drawn */
export interface MapSelection {
  readonly player?: number | null;
  readonly hovered?: number | null;
  readonly selected?: number | null;
  /** When non-empty, systems outside the set are dimmed */
  readonly focused?: ReadonlySet<number>;
  /** Jump counts from the reference system, for the distance overlay */
  readonly distances?: ReadonlyMap<number, number>;
}
