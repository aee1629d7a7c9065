/**
 * Presentation surface consumed by the pipeline.
 *
 * The entity materializer registers actors here and the render system
 * drives the per-frame sequence. Actor draw order is the order of the
 * stage's actor list; setPaintOrder moves the given actors, in the given
 * order, to the end of it.
 */

import type { TileLayer } from '../types';
import type { SpriteActor } from './spriteActor';

export interface Stage {
  addActor(actor: SpriteActor): void;
  removeActor(actor: SpriteActor): void;
  setPaintOrder(actors: readonly SpriteActor[]): void;
  applyViewport(): void;
  renderTileLayer(layer: TileLayer): void;
  act(delta: number): void;
  draw(): void;
}
