/**
 * Public API: spawn, animate and depth-order sprite actors for a tile map.
 */

export * from './ecs';
export { Game, loadMapSafely } from './engine/Game';
export type { GameOptions, MapLoader } from './engine/Game';
export { ThreeStage } from './stage/threeStage';
export type { SceneRenderer, ThreeStageOptions } from './stage/threeStage';
export { SpriteActor } from './stage/spriteActor';
export type { Stage } from './stage/stage';
export { RegionAtlas, frameStrip } from './assets/textureAtlas';
export { EventBus, mapChanged } from './core/eventBus';
export type { EventListener, GameEvent, GameEventListener, MapChangeEvent } from './core/eventBus';
export { GameError, ConfigError, AssetError } from './core/errors';
export { createLogger, setLogLevel, getLogLevel } from './core/logger';
export type { LogLevel, Logger } from './core/logger';
export { parseTint, parseHexTint, WHITE } from './core/color';
export * from './config';
export * from './types';
