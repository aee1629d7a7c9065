/**
 * Read/write helpers for the Animation component.
 *
 * Gameplay code requests clip switches through these; the switch itself
 * is applied by the AnimationSystem on its next tick.
 */

import type { ClipCache } from './clipCache';
import { animationPath, type AnimationType, isPlayMode, PlayMode } from './enums';
import type { GameWorld } from './world';

/** Empty sentinel for Animation.nextClipId. */
export const NO_ANIMATION = '';

/**
 * Request a switch to `type`. Passing `atlasKey` also changes which atlas
 * family the entity animates from.
 */
export function playAnimation(world: GameWorld, eid: number, type: AnimationType, atlasKey?: string): string {
  const { Animation } = world.components;
  if (atlasKey !== undefined) Animation.atlasKey[eid] = atlasKey;
  const path = animationPath(Animation.atlasKey[eid] ?? '', type);
  Animation.nextClipId[eid] = path;
  return path;
}

export function clearNextAnimation(world: GameWorld, eid: number): void {
  world.components.Animation.nextClipId[eid] = NO_ANIMATION;
}

export function hasPendingAnimation(world: GameWorld, eid: number): boolean {
  return (world.components.Animation.nextClipId[eid] ?? NO_ANIMATION) !== NO_ANIMATION;
}

export function getPlayMode(world: GameWorld, eid: number): PlayMode {
  const mode = world.components.Animation.playMode[eid] ?? PlayMode.LOOP;
  return isPlayMode(mode) ? mode : PlayMode.LOOP;
}

/** Takes effect on the next tick without restarting the clip. */
export function setPlayMode(world: GameWorld, eid: number, mode: PlayMode): void {
  world.components.Animation.playMode[eid] = mode;
}

/**
 * True once a NORMAL or REVERSED clip has played through. False while a
 * switch is pending or before the first clip is applied.
 */
export function isAnimationFinished(world: GameWorld, clips: ClipCache, eid: number): boolean {
  if (hasPendingAnimation(world, eid)) return false;
  const { Animation } = world.components;
  const clipId = Animation.clipId[eid];
  if (!clipId) return false;
  return clips.getOrBuildClip(clipId).isFinished(Animation.elapsed[eid] ?? 0, getPlayMode(world, eid));
}
