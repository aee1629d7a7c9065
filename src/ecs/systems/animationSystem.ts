/**
 * System #2: AnimationSystem
 *
 * For every entity with Animation + Renderable:
 *   - Switch pending: resolve the clip from the ClipCache, clear the
 *     request, reset elapsed time and show the frame at time 0.
 *   - Otherwise: advance elapsed time and show the frame for it under the
 *     entity's current play mode (read fresh every tick).
 *
 * Entities with no clip and no pending switch are left alone.
 *
 * Frequency: every frame
 */

import { query } from 'bitecs';
import type { ClipCache } from '../clipCache';
import { clearNextAnimation, getPlayMode, NO_ANIMATION } from '../animationState';
import type { EcsSystem } from '../pipeline';
import type { GameWorld } from '../world';

export class AnimationSystem implements EcsSystem {
  readonly name = 'AnimationSystem';

  constructor(private readonly clips: ClipCache) {}

  update(world: GameWorld, delta: number): void {
    const { Animation, Renderable } = world.components;
    for (const eid of query(world, [Animation, Renderable])) {
      const actor = Renderable.actor[eid];
      if (!actor) continue;

      const mode = getPlayMode(world, eid);
      const next = Animation.nextClipId[eid] ?? NO_ANIMATION;

      if (next !== NO_ANIMATION) {
        // cleared before the build, so a failed build is not retried
        clearNextAnimation(world, eid);
        const clip = this.clips.getOrBuildClip(next);
        Animation.clipId[eid] = next;
        Animation.elapsed[eid] = 0;
        actor.frame = clip.keyFrame(0, mode);
        continue;
      }

      const clipId = Animation.clipId[eid];
      if (!clipId) continue;

      const clip = this.clips.getOrBuildClip(clipId);
      const elapsed = (Animation.elapsed[eid] ?? 0) + delta;
      Animation.elapsed[eid] = elapsed;
      actor.frame = clip.keyFrame(elapsed, mode);
    }
  }
}
