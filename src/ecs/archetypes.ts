/**
 * Entity archetype factory functions.
 *
 * These are the canonical way to create and destroy entities in the
 * pipeline. Actor lifecycle hooks are explicit: createActorEntity adds the
 * actor to the stage, destroyActorEntity removes it, so an actor is never
 * drawn after its entity is gone.
 */

import { addComponent, addEntity, hasComponent, removeEntity } from 'bitecs';
import type { Vector2 } from 'three';
import { DEFAULT_RENDER_LAYER } from '../config';
import type { Stage } from '../stage/stage';
import type { SpriteActor } from '../stage/spriteActor';
import type { Tint } from '../types';
import { PlayMode } from './enums';
import type { GameWorld } from './world';

// ── Spawn Request ────────────────────────────────────────────────

export function createSpawnEntity(
  world: GameWorld,
  type: string,
  location: Vector2,
  tint: Tint,
): number {
  const { Spawn } = world.components;
  const eid = addEntity(world);
  addComponent(world, eid, Spawn);
  Spawn.type[eid] = type;
  Spawn.location[eid] = location;
  Spawn.tint[eid] = tint;
  return eid;
}

/** Remove a consumed spawn request. */
export function destroySpawnEntity(world: GameWorld, eid: number): void {
  const { Spawn } = world.components;
  delete Spawn.type[eid];
  delete Spawn.location[eid];
  delete Spawn.tint[eid];
  removeEntity(world, eid);
}

// ── Actor ────────────────────────────────────────────────────────

export interface ActorOptions {
  /** Clip to switch to on the first animation tick. */
  nextClipId: string;
  atlasKey: string;
  layer?: number;
  playMode?: PlayMode;
  fromMap?: boolean;
}

/**
 * Create an animated actor entity. The actor must be fully configured
 * before this call; registration with the stage and component attachment
 * happen together here.
 */
export function createActorEntity(
  world: GameWorld,
  stage: Stage,
  actor: SpriteActor,
  options: ActorOptions,
): number {
  const { Renderable, Animation, IsMapEntity } = world.components;
  const eid = addEntity(world);

  addComponent(world, eid, Renderable);
  Renderable.actor[eid] = actor;
  Renderable.layer[eid] = options.layer ?? DEFAULT_RENDER_LAYER;
  Renderable.order[eid] = world.nextRenderOrder++;

  addComponent(world, eid, Animation);
  Animation.atlasKey[eid] = options.atlasKey;
  Animation.elapsed[eid] = 0;
  Animation.playMode[eid] = options.playMode ?? PlayMode.LOOP;
  Animation.clipId[eid] = '';
  Animation.nextClipId[eid] = options.nextClipId;

  if (options.fromMap) addComponent(world, eid, IsMapEntity);

  stage.addActor(actor);
  return eid;
}

/** Remove an actor entity and take its actor off the stage. */
export function destroyActorEntity(world: GameWorld, stage: Stage, eid: number): void {
  const { Renderable } = world.components;
  if (hasComponent(world, eid, Renderable)) {
    const actor = Renderable.actor[eid];
    if (actor) stage.removeActor(actor);
    delete Renderable.actor[eid];
  }
  removeEntity(world, eid);
}
