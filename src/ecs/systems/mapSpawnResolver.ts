/**
 * MapSpawnResolver: turns the active map's entities layer into spawn
 * requests.
 *
 * Runs on map change, not per frame. Each object becomes one transient
 * Spawn entity carrying its type, world-space location and tint; the
 * EntitySpawnSystem materializes them on its next tick. Leftovers from a
 * previous map (unprocessed requests, spawned actors) are discarded or
 * tagged for removal first, so delivering the same map twice does not
 * duplicate actors.
 */

import { addComponent, hasComponent, query } from 'bitecs';
import { Vector2 } from 'three';
import { ENTITY_LAYER_NAME, UNIT_SCALE } from '../../config';
import { parseTint } from '../../core/color';
import { ConfigError } from '../../core/errors';
import type { GameEvent, GameEventListener } from '../../core/eventBus';
import { createLogger } from '../../core/logger';
import type { ObjectLayer, TileMap } from '../../types';
import { createSpawnEntity, destroySpawnEntity } from '../archetypes';
import type { GameWorld } from '../world';

const log = createLogger('MapSpawnResolver');

export interface MapSpawnResolverOptions {
  unitScale?: number;
  entityLayerName?: string;
}

export function findObjectLayer(map: TileMap, name: string): ObjectLayer | undefined {
  for (const layer of map.layers) {
    if (layer.kind === 'objects' && layer.name === name) return layer;
  }
  return undefined;
}

export class MapSpawnResolver implements GameEventListener {
  private readonly unitScale: number;
  private readonly entityLayerName: string;

  constructor(
    private readonly world: GameWorld,
    options: MapSpawnResolverOptions = {},
  ) {
    this.unitScale = options.unitScale ?? UNIT_SCALE;
    this.entityLayerName = options.entityLayerName ?? ENTITY_LAYER_NAME;
  }

  handle(event: GameEvent): boolean {
    switch (event.type) {
      case 'map_changed':
        this.onMapChanged(event.map);
        return true;
    }
    return false;
  }

  /** Returns the number of spawn requests created. */
  onMapChanged(map: TileMap): number {
    this.discardPreviousMap();

    const layer = findObjectLayer(map, this.entityLayerName);
    if (!layer) {
      throw new ConfigError(`map "${map.name}" has no "${this.entityLayerName}" object layer`);
    }

    let created = 0;
    for (const object of layer.objects) {
      const type = object.type?.trim();
      if (!type) {
        throw new ConfigError(
          `MapObject ${object.id} of '${this.entityLayerName}' layer is missing entity type`,
        );
      }

      createSpawnEntity(
        this.world,
        type,
        new Vector2(object.x * this.unitScale, object.y * this.unitScale),
        parseTint(object.properties?.['color']),
      );
      created++;
    }

    log.debug(`Queued ${created} spawn requests from map "${map.name}"`);
    return created;
  }

  private discardPreviousMap(): void {
    const { Spawn, IsMapEntity, PendingRemoval } = this.world.components;
    for (const eid of Array.from(query(this.world, [Spawn]))) {
      destroySpawnEntity(this.world, eid);
    }
    for (const eid of Array.from(query(this.world, [IsMapEntity]))) {
      if (!hasComponent(this.world, eid, PendingRemoval)) {
        addComponent(this.world, eid, PendingRemoval);
      }
    }
  }
}
