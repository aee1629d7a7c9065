/**
 * System #1: CleanupSystem
 *
 * Destroys entities tagged with PendingRemoval. Actor entities are taken
 * off the stage first; anything else is just removed from the world.
 *
 * Runs first so removals never happen while the render system is walking
 * its sorted list.
 *
 * Frequency: every frame
 */

import { query } from 'bitecs';
import type { Stage } from '../../stage/stage';
import { destroyActorEntity } from '../archetypes';
import type { EcsSystem } from '../pipeline';
import type { GameWorld } from '../world';

export class CleanupSystem implements EcsSystem {
  readonly name = 'CleanupSystem';

  constructor(private readonly stage: Stage) {}

  update(world: GameWorld, _delta: number): void {
    for (const eid of Array.from(query(world, [world.components.PendingRemoval]))) {
      destroyActorEntity(world, this.stage, eid);
    }
  }
}
