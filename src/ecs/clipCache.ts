/**
 * Animation clips and the session-wide clip cache.
 *
 * A clip is an immutable, non-empty frame sequence with a fixed frame
 * duration. Clips are shared by every entity playing them, so playback
 * state (elapsed time, play mode) is passed in, never stored here.
 *
 * The cache is keyed by clip id ("atlasKey/kind") and never evicts.
 */

import { DEFAULT_FRAME_DURATION } from '../config';
import { AssetError } from '../core/errors';
import { createLogger } from '../core/logger';
import { isNonEmpty, type AtlasRegion, type NonEmptyArray, type TextureAtlas } from '../types';
import { PlayMode } from './enums';

const log = createLogger('ClipCache');

// ── Clip ──────────────────────────────────────────────────────────

export class AnimationClip {
  constructor(
    readonly id: string,
    readonly frames: NonEmptyArray<AtlasRegion>,
    readonly frameDuration: number,
  ) {
    Object.freeze(this);
  }

  get frameCount(): number {
    return this.frames.length;
  }

  /** Total play time of one pass. */
  get duration(): number {
    return this.frames.length * this.frameDuration;
  }

  keyFrameIndex(time: number, mode: PlayMode): number {
    const count = this.frames.length;
    if (count === 1) return 0;

    const step = Math.floor(Math.max(0, time) / this.frameDuration);
    switch (mode) {
      case PlayMode.NORMAL:
        return Math.min(count - 1, step);
      case PlayMode.REVERSED:
        return Math.max(count - step - 1, 0);
      case PlayMode.LOOP:
        return step % count;
      case PlayMode.LOOP_REVERSED:
        return count - (step % count) - 1;
      case PlayMode.LOOP_PINGPONG: {
        const bounce = step % (count * 2 - 2);
        return bounce >= count ? count - 2 - (bounce - count) : bounce;
      }
    }
  }

  keyFrame(time: number, mode: PlayMode): AtlasRegion {
    return this.frames[this.keyFrameIndex(time, mode)] ?? this.frames[0];
  }

  /** Looping modes never finish. */
  isFinished(time: number, mode: PlayMode): boolean {
    if (mode !== PlayMode.NORMAL && mode !== PlayMode.REVERSED) return false;
    return time >= this.duration;
  }
}

// ── Cache ─────────────────────────────────────────────────────────

export class ClipCache {
  private readonly clips = new Map<string, AnimationClip>();

  constructor(
    private readonly atlas: TextureAtlas,
    private readonly frameDuration: number = DEFAULT_FRAME_DURATION,
  ) {}

  /**
   * Return the cached clip for `clipId`, building it from the atlas on the
   * first request. Frames come out in the atlas's region order.
   */
  getOrBuildClip(clipId: string): AnimationClip {
    const cached = this.clips.get(clipId);
    if (cached) return cached;

    log.debug(`Building clip ${clipId}`);
    const regions = this.atlas.findRegions(clipId);
    if (!isNonEmpty(regions)) {
      throw new AssetError(`no regions for atlas key "${clipId}"`);
    }

    const frames: NonEmptyArray<AtlasRegion> = [regions[0], ...regions.slice(1)];
    const clip = new AnimationClip(clipId, frames, this.frameDuration);
    this.clips.set(clipId, clip);
    return clip;
  }

  has(clipId: string): boolean {
    return this.clips.has(clipId);
  }

  get size(): number {
    return this.clips.size;
  }
}
