/**
 * ECS world factory.
 *
 * Each world carries its own component stores and creation-order counter,
 * so several games (or test cases) can run side by side in one process.
 * The engine creates one per Game; tests create a fresh one per case.
 */

import { createWorld } from 'bitecs';
import type { World } from 'bitecs';
import { createComponents, type GameComponents } from './components';

export interface GameContext {
  components: GameComponents;
  /** Next Renderable.order stamp. */
  nextRenderOrder: number;
}

export type GameWorld = World<GameContext>;

export function createGameWorld(capacity?: number): GameWorld {
  return createWorld<GameContext>({
    components: createComponents(capacity),
    nextRenderOrder: 0,
  });
}
