/**
 * ECS public API.
 *
 * Re-exports the pieces needed by the Game and by gameplay code.
 */

export { createGameWorld } from './world';
export type { GameContext, GameWorld } from './world';
export { Pipeline } from './pipeline';
export type { EcsSystem } from './pipeline';

// Components
export { createComponents } from './components';
export type {
  GameComponents, SpawnStore, RenderableStore, AnimationStore, TagComponent,
} from './components';

// Enums
export { PlayMode, AnimationType, animationPath, isPlayMode } from './enums';

// Archetypes
export {
  createSpawnEntity, destroySpawnEntity,
  createActorEntity, destroyActorEntity,
} from './archetypes';
export type { ActorOptions } from './archetypes';

// Animation
export { AnimationClip, ClipCache } from './clipCache';
export {
  NO_ANIMATION, playAnimation, clearNextAnimation, hasPendingAnimation,
  getPlayMode, setPlayMode, isAnimationFinished,
} from './animationState';

// Systems
export { CleanupSystem } from './systems/cleanupSystem';
export { AnimationSystem } from './systems/animationSystem';
export { RenderSystem, compareRenderables, sortRenderables, partitionTileLayers } from './systems/renderSystem';
export type { LayerPartition } from './systems/renderSystem';
export { EntitySpawnSystem, resolveAtlasKey } from './systems/entitySpawnSystem';
export type { SpawnConfig, SpawnRequest } from './systems/entitySpawnSystem';
export { MapSpawnResolver, findObjectLayer } from './systems/mapSpawnResolver';
export type { MapSpawnResolverOptions } from './systems/mapSpawnResolver';
