/**
 * Game: wires the ECS world, systems and event bus around a stage.
 *
 * Owns:
 *   - the bitECS world and the clip cache
 *   - the system pipeline (cleanup → animation → render → spawn)
 *   - the map-change event bus
 *
 * The host shell (window, render loop, asset loading) calls show() once a
 * map loader is available, tick() once per frame and dispose() on exit.
 *
 * Map-change listeners are registered in a fixed order: RenderSystem
 * repartitions tile layers first, then MapSpawnResolver queues spawns.
 */

import { query } from 'bitecs';
import { APP_NAME, type GameConfig, validateAndLoadConfig } from '../config';
import { ConfigError } from '../core/errors';
import { EventBus, type GameEvent, mapChanged } from '../core/eventBus';
import { createLogger, setLogLevel } from '../core/logger';
import { ClipCache } from '../ecs/clipCache';
import { destroyActorEntity } from '../ecs/archetypes';
import { Pipeline } from '../ecs/pipeline';
import { AnimationSystem } from '../ecs/systems/animationSystem';
import { CleanupSystem } from '../ecs/systems/cleanupSystem';
import { EntitySpawnSystem } from '../ecs/systems/entitySpawnSystem';
import { MapSpawnResolver } from '../ecs/systems/mapSpawnResolver';
import { RenderSystem } from '../ecs/systems/renderSystem';
import { createGameWorld, type GameWorld } from '../ecs/world';
import type { Stage } from '../stage/stage';
import { err, ok, type Result, type TextureAtlas, type TileMap } from '../types';

const log = createLogger('Game');

export interface GameOptions {
  atlas: TextureAtlas;
  stage: Stage;
  config?: Partial<GameConfig>;
}

export type MapLoader = () => TileMap;

/** Run a map loader, turning a thrown error into a failed Result. */
export function loadMapSafely(loadMap: MapLoader): Result<TileMap> {
  try {
    return ok(loadMap());
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export class Game {
  readonly world: GameWorld;
  readonly config: GameConfig;
  readonly clips: ClipCache;
  readonly events = new EventBus<GameEvent>();

  readonly animationSystem: AnimationSystem;
  readonly renderSystem: RenderSystem;
  readonly spawnSystem: EntitySpawnSystem;
  readonly spawnResolver: MapSpawnResolver;

  private readonly stage: Stage;
  private readonly pipeline: Pipeline;
  private map: TileMap | null = null;

  constructor(options: GameOptions) {
    const { valid, config, errors } = validateAndLoadConfig(options.config);
    if (!valid) {
      throw new ConfigError(`Invalid game config: ${errors.join('; ')}`);
    }
    setLogLevel(config.logLevel);

    this.config = config;
    this.stage = options.stage;
    this.world = createGameWorld();
    this.clips = new ClipCache(options.atlas, config.frameDuration);

    this.animationSystem = new AnimationSystem(this.clips);
    this.renderSystem = new RenderSystem(this.stage, config.foregroundLayerPrefix);
    this.spawnSystem = new EntitySpawnSystem(this.stage, this.clips, config.unitScale);
    this.spawnResolver = new MapSpawnResolver(this.world, {
      unitScale: config.unitScale,
      entityLayerName: config.entityLayerName,
    });

    this.pipeline = new Pipeline([
      new CleanupSystem(this.stage),
      this.animationSystem,
      this.renderSystem,
      this.spawnSystem,
    ]);

    this.events.addListener(this.renderSystem);
    this.events.addListener(this.spawnResolver);

    log.info(`${APP_NAME} game created (${this.pipeline.systemNames.join(' → ')})`);
  }

  get currentMap(): TileMap | null {
    return this.map;
  }

  /**
   * Load the first map. A loader failure is logged and the game keeps
   * running without a map; errors from map-change handlers propagate.
   */
  show(loadMap: MapLoader): boolean {
    const result = loadMapSafely(loadMap);
    if (!result.ok) {
      log.error(`Failed to load map: ${result.error.message}`, result.error);
      return false;
    }
    this.changeMap(result.value);
    return true;
  }

  changeMap(map: TileMap): void {
    this.map = map;
    this.events.fire(mapChanged(map));
    log.info(`Map "${map.name}" active`);
  }

  tick(delta: number): void {
    this.pipeline.run(this.world, delta);
  }

  /** Number of actor entities currently alive. */
  get actorCount(): number {
    return query(this.world, [this.world.components.Renderable]).length;
  }

  dispose(): void {
    for (const eid of Array.from(query(this.world, [this.world.components.Renderable]))) {
      destroyActorEntity(this.world, this.stage, eid);
    }
    this.events.clear();
    this.map = null;
    log.info('Game disposed');
  }
}
