/**
 * ECS system pipeline.
 *
 * All systems execute in fixed order on one thread; the Game calls
 * `pipeline.run(world, delta)` once per frame.
 *
 *   1. CleanupSystem      removes entities tagged PendingRemoval
 *   2. AnimationSystem    applies clip switches, advances playback
 *   3. RenderSystem       sorts actors, draws tile layers and the stage
 *   4. EntitySpawnSystem  materializes spawn requests (visible next frame)
 *
 * Creation and destruction happen at the ends of the frame, never while
 * RenderSystem is iterating.
 */

import type { GameWorld } from './world';

export interface EcsSystem {
  readonly name: string;
  update(world: GameWorld, delta: number): void;
}

export class Pipeline {
  constructor(private readonly systems: readonly EcsSystem[]) {}

  get systemNames(): string[] {
    return this.systems.map((system) => system.name);
  }

  /** Run all systems in order. Errors propagate and end the frame early. */
  run(world: GameWorld, delta: number): void {
    for (const system of this.systems) {
      system.update(world, delta);
    }
  }
}
