/**
 * System #4: EntitySpawnSystem
 *
 * Materializes pending Spawn requests into animated actors:
 *   - entity type → SpawnConfig (atlas key), cached per type
 *   - atlas key → reference size from the first idle frame, cached
 *   - new actor entity with Renderable + Animation, idle clip pending
 *
 * Anything that can fail is resolved before the actor entity exists, so a
 * failed spawn never leaves a half-built actor on the stage. The request
 * entity is removed either way and the error is rethrown.
 *
 * Runs last in the pipeline: actors created here are sorted and drawn from
 * the next frame on.
 *
 * Frequency: every frame
 */

import { query } from 'bitecs';
import { Vector2 } from 'three';
import { UNIT_SCALE } from '../../config';
import { WHITE } from '../../core/color';
import { ConfigError } from '../../core/errors';
import { createLogger } from '../../core/logger';
import { SpriteActor } from '../../stage/spriteActor';
import type { Stage } from '../../stage/stage';
import type { Tint } from '../../types';
import { createActorEntity, destroySpawnEntity } from '../archetypes';
import type { ClipCache } from '../clipCache';
import { animationPath, AnimationType } from '../enums';
import type { EcsSystem } from '../pipeline';
import type { GameWorld } from '../world';

const log = createLogger('EntitySpawnSystem');

export interface SpawnConfig {
  readonly atlasKey: string;
}

export interface SpawnRequest {
  type: string;
  location: Vector2;
  tint: Tint;
}

/** Map types whose atlas key is not their lowercase name. */
const SPAWN_ALIASES: ReadonlyMap<string, string> = new Map([
  ['Player', 'player'],
  ['Slime', 'slime'],
]);

export class EntitySpawnSystem implements EcsSystem {
  readonly name = 'EntitySpawnSystem';

  private readonly cachedConfigs = new Map<string, SpawnConfig>();
  private readonly cachedSizes = new Map<string, Vector2>();

  constructor(
    private readonly stage: Stage,
    private readonly clips: ClipCache,
    private readonly unitScale: number = UNIT_SCALE,
  ) {}

  update(world: GameWorld, _delta: number): void {
    const { Spawn } = world.components;
    for (const eid of Array.from(query(world, [Spawn]))) {
      const request: SpawnRequest = {
        type: Spawn.type[eid] ?? '',
        location: Spawn.location[eid] ?? new Vector2(),
        tint: Spawn.tint[eid] ?? WHITE,
      };
      try {
        this.materialize(world, request);
      } finally {
        destroySpawnEntity(world, eid);
      }
    }
  }

  /** Create one actor entity for `request` and return its eid. */
  materialize(world: GameWorld, request: SpawnRequest): number {
    const config = this.spawnConfig(request.type);
    const size = this.size(config.atlasKey);

    const actor = new SpriteActor()
      .setPosition(request.location.x, request.location.y)
      .setSize(size.x, size.y);
    actor.tint = request.tint;

    const eid = createActorEntity(world, this.stage, actor, {
      atlasKey: config.atlasKey,
      nextClipId: animationPath(config.atlasKey, AnimationType.IDLE),
      fromMap: true,
    });
    log.debug(`Spawned ${request.type} as entity ${eid}`);
    return eid;
  }

  spawnConfig(type: string): SpawnConfig {
    let config = this.cachedConfigs.get(type);
    if (!config) {
      config = Object.freeze({ atlasKey: resolveAtlasKey(type) });
      this.cachedConfigs.set(type, config);
    }
    return config;
  }

  /** World-space size of the first idle frame for `atlasKey`. */
  size(atlasKey: string): Vector2 {
    let size = this.cachedSizes.get(atlasKey);
    if (!size) {
      const [firstFrame] = this.clips.getOrBuildClip(animationPath(atlasKey, AnimationType.IDLE)).frames;
      size = new Vector2(firstFrame.originalWidth * this.unitScale, firstFrame.originalHeight * this.unitScale);
      this.cachedSizes.set(atlasKey, size);
    }
    return size.clone();
  }
}

export function resolveAtlasKey(type: string): string {
  const alias = SPAWN_ALIASES.get(type);
  if (alias !== undefined) return alias;
  if (type.trim().length === 0) {
    throw new ConfigError('spawn type must be specified');
  }
  return type.toLowerCase();
}
