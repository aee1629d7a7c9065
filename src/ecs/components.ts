/**
 * ECS component definitions (bitECS v0.4.0 API).
 *
 * Components are plain objects with stores indexed by entity ID (eid).
 * Numeric fields use pre-allocated TypedArrays; strings and object
 * references use plain arrays.
 *
 * Stores belong to one world: createGameWorld() builds a fresh set and
 * hangs it on the world as `world.components`, so two worlds handing out
 * the same eids never share component data.
 *
 * Convention: Float64Array for accumulated playback time,
 *             Uint8Array for enums,
 *             Int32Array/Uint32Array for layers and sequence stamps.
 */

import type { Vector2 } from 'three';
import { MAX_ENTITIES } from '../config';
import type { SpriteActor } from '../stage/spriteActor';
import type { Tint } from '../types';

// ── Spawning ─────────────────────────────────────────────────────

/**
 * Pending spawn request. Lives on a transient entity that the
 * EntitySpawnSystem removes on its next tick.
 */
export interface SpawnStore {
  type: string[];
  /** World units. */
  location: Vector2[];
  tint: Tint[];
}

// ── Rendering ────────────────────────────────────────────────────

/**
 * Drawable actor plus its draw-order bucket. `order` is a creation stamp
 * used as the final sort key so equal (layer, x) pairs keep their order.
 */
export interface RenderableStore {
  actor: SpriteActor[];
  layer: Int32Array;
  order: Uint32Array;
}

// ── Animation ────────────────────────────────────────────────────

/**
 * Per-entity playback state. Clips are shared and immutable, so every
 * mutable playback field lives here.
 * clipId / nextClipId use '' for "none".
 */
export interface AnimationStore {
  atlasKey: string[];
  elapsed: Float64Array;
  playMode: Uint8Array;
  clipId: string[];
  nextClipId: string[];
}

// ── Tags (marker components, no data) ────────────────────────────

export type TagComponent = Record<string, never>;

export interface GameComponents {
  Spawn: SpawnStore;
  Renderable: RenderableStore;
  Animation: AnimationStore;
  /** Actor created from the active map's entities layer. */
  IsMapEntity: TagComponent;
  PendingRemoval: TagComponent;
}

export function createComponents(capacity: number = MAX_ENTITIES): GameComponents {
  return {
    Spawn: {
      type: [],
      location: [],
      tint: [],
    },
    Renderable: {
      actor: [],
      layer: new Int32Array(capacity),
      order: new Uint32Array(capacity),
    },
    Animation: {
      atlasKey: [],
      elapsed: new Float64Array(capacity),
      playMode: new Uint8Array(capacity),
      clipId: [],
      nextClipId: [],
    },
    IsMapEntity: {},
    PendingRemoval: {},
  };
}
