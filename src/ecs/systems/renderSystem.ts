/**
 * System #3: RenderSystem
 *
 * Each frame:
 *   1. Sort renderable entities (layer asc, x desc, creation order asc)
 *      and hand the stage their actors as its paint order
 *   2. Apply the viewport
 *   3. Draw background tile layers
 *   4. Act + draw the stage's actors
 *   5. Draw foreground tile layers
 *
 * On map change the map's tile layers are split by name: layers whose
 * name starts with the foreground prefix go in front of the actors, all
 * others behind. Both lists keep map order.
 *
 * Frequency: every frame
 */

import { query } from 'bitecs';
import { FOREGROUND_LAYER_PREFIX } from '../../config';
import type { GameEvent, GameEventListener } from '../../core/eventBus';
import { createLogger } from '../../core/logger';
import type { SpriteActor } from '../../stage/spriteActor';
import type { Stage } from '../../stage/stage';
import type { TileLayer, TileMap } from '../../types';
import type { RenderableStore } from '../components';
import type { EcsSystem } from '../pipeline';
import type { GameWorld } from '../world';

const log = createLogger('RenderSystem');

/**
 * Draw-order comparator: lower layer first, then larger x first (right to
 * left within a layer), then earlier-created first.
 */
export function compareRenderables(store: RenderableStore, a: number, b: number): number {
  const layerDiff = (store.layer[a] ?? 0) - (store.layer[b] ?? 0);
  if (layerDiff !== 0) return layerDiff;

  const xA = store.actor[a]?.x ?? 0;
  const xB = store.actor[b]?.x ?? 0;
  if (xA !== xB) return xB > xA ? 1 : -1;

  return (store.order[a] ?? 0) - (store.order[b] ?? 0);
}

/** Sorted copy of every renderable entity, back to front. */
export function sortRenderables(world: GameWorld): number[] {
  const { Renderable } = world.components;
  return Array.from(query(world, [Renderable])).sort((a, b) => compareRenderables(Renderable, a, b));
}

export interface LayerPartition {
  background: TileLayer[];
  foreground: TileLayer[];
}

export function partitionTileLayers(
  map: TileMap,
  foregroundPrefix: string = FOREGROUND_LAYER_PREFIX,
): LayerPartition {
  const background: TileLayer[] = [];
  const foreground: TileLayer[] = [];
  for (const layer of map.layers) {
    if (layer.kind !== 'tiles') continue;
    if (layer.name.startsWith(foregroundPrefix)) {
      foreground.push(layer);
    } else {
      background.push(layer);
    }
  }
  return { background, foreground };
}

export class RenderSystem implements EcsSystem, GameEventListener {
  readonly name = 'RenderSystem';

  private background: TileLayer[] = [];
  private foreground: TileLayer[] = [];

  constructor(
    private readonly stage: Stage,
    private readonly foregroundPrefix: string = FOREGROUND_LAYER_PREFIX,
  ) {}

  get backgroundLayers(): readonly TileLayer[] {
    return this.background;
  }

  get foregroundLayers(): readonly TileLayer[] {
    return this.foreground;
  }

  update(world: GameWorld, delta: number): void {
    const { Renderable } = world.components;
    const paintOrder: SpriteActor[] = [];
    for (const eid of sortRenderables(world)) {
      const actor = Renderable.actor[eid];
      if (actor) paintOrder.push(actor);
    }
    this.stage.setPaintOrder(paintOrder);

    this.stage.applyViewport();

    for (const layer of this.background) {
      this.stage.renderTileLayer(layer);
    }

    this.stage.act(delta);
    this.stage.draw();

    for (const layer of this.foreground) {
      this.stage.renderTileLayer(layer);
    }
  }

  handle(event: GameEvent): boolean {
    switch (event.type) {
      case 'map_changed': {
        const { background, foreground } = partitionTileLayers(event.map, this.foregroundPrefix);
        this.background = background;
        this.foreground = foreground;
        log.debug(
          `Map "${event.map.name}": ${background.length} background, ${foreground.length} foreground layers`,
        );
        return true;
      }
    }
    return false;
  }
}
