import { describe, it, expect, vi } from 'vitest';
import { frameStrip, RegionAtlas } from '../assets/textureAtlas';
import { AssetError } from '../core/errors';
import { AnimationClip, ClipCache } from '../ecs/clipCache';
import { PlayMode } from '../ecs/enums';
import type { AtlasRegion, NonEmptyArray } from '../types';

const F = 1 / 8;

function clipOf(count: number): AnimationClip {
  const [first, ...rest] = frameStrip('slime/run', count, 16, 16);
  if (!first) throw new Error('count must be positive');
  const frames: NonEmptyArray<AtlasRegion> = [first, ...rest];
  return new AnimationClip('slime/run', frames, F);
}

// ---------------------------------------------------------------------------
// AnimationClip
// ---------------------------------------------------------------------------

describe('AnimationClip', () => {
  const clip = clipOf(4);

  it('reports frame count and duration', () => {
    expect(clip.frameCount).toBe(4);
    expect(clip.duration).toBe(0.5);
  });

  it('wraps under LOOP', () => {
    expect(clip.keyFrameIndex(0, PlayMode.LOOP)).toBe(0);
    expect(clip.keyFrameIndex(0.125, PlayMode.LOOP)).toBe(1);
    expect(clip.keyFrameIndex(0.375, PlayMode.LOOP)).toBe(3);
    expect(clip.keyFrameIndex(0.5, PlayMode.LOOP)).toBe(0);
    expect(clip.keyFrameIndex(0.625, PlayMode.LOOP)).toBe(1);
  });

  it('is periodic under LOOP', () => {
    for (const t of [0, 0.0625, 0.124]) {
      const base = clip.keyFrameIndex(t, PlayMode.LOOP);
      for (let k = 0; k < 4; k++) {
        expect(clip.keyFrameIndex(k * 4 * F + t, PlayMode.LOOP)).toBe(base);
      }
    }
  });

  it('clamps to the last frame under NORMAL', () => {
    expect(clip.keyFrameIndex(0.25, PlayMode.NORMAL)).toBe(2);
    expect(clip.keyFrameIndex(0.375, PlayMode.NORMAL)).toBe(3);
    expect(clip.keyFrameIndex(10, PlayMode.NORMAL)).toBe(3);
  });

  it('indexes from the end under REVERSED and clamps at frame 0', () => {
    expect(clip.keyFrameIndex(0, PlayMode.REVERSED)).toBe(3);
    expect(clip.keyFrameIndex(0.125, PlayMode.REVERSED)).toBe(2);
    expect(clip.keyFrameIndex(0.5, PlayMode.REVERSED)).toBe(0);
    expect(clip.keyFrameIndex(3, PlayMode.REVERSED)).toBe(0);
  });

  it('wraps from the end under LOOP_REVERSED', () => {
    expect(clip.keyFrameIndex(0, PlayMode.LOOP_REVERSED)).toBe(3);
    expect(clip.keyFrameIndex(0.375, PlayMode.LOOP_REVERSED)).toBe(0);
    expect(clip.keyFrameIndex(0.5, PlayMode.LOOP_REVERSED)).toBe(3);
  });

  it('bounces under LOOP_PINGPONG', () => {
    const indices = [0, 1, 2, 3, 4, 5, 6, 7].map((step) =>
      clip.keyFrameIndex(step * F, PlayMode.LOOP_PINGPONG),
    );
    expect(indices).toEqual([0, 1, 2, 3, 2, 1, 0, 1]);
  });

  it('always shows frame 0 for a single-frame clip', () => {
    const still = clipOf(1);
    expect(still.keyFrameIndex(5, PlayMode.LOOP)).toBe(0);
    expect(still.keyFrameIndex(5, PlayMode.REVERSED)).toBe(0);
    expect(still.keyFrameIndex(5, PlayMode.LOOP_PINGPONG)).toBe(0);
  });

  it('returns the region for the key frame index', () => {
    expect(clip.keyFrame(0.25, PlayMode.LOOP)).toBe(clip.frames[2]);
  });

  it('finishes NORMAL and REVERSED exactly at the clip duration', () => {
    expect(clip.isFinished(0.499, PlayMode.NORMAL)).toBe(false);
    expect(clip.isFinished(0.5, PlayMode.NORMAL)).toBe(true);
    expect(clip.isFinished(0.75, PlayMode.NORMAL)).toBe(true);
    expect(clip.isFinished(0.25, PlayMode.REVERSED)).toBe(false);
    expect(clip.isFinished(0.5, PlayMode.REVERSED)).toBe(true);
  });

  it('never finishes looping modes', () => {
    expect(clip.isFinished(100, PlayMode.LOOP)).toBe(false);
    expect(clip.isFinished(100, PlayMode.LOOP_REVERSED)).toBe(false);
    expect(clip.isFinished(100, PlayMode.LOOP_PINGPONG)).toBe(false);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(clip)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// ClipCache
// ---------------------------------------------------------------------------

describe('ClipCache', () => {
  it('returns the same clip instance and scans the atlas once', () => {
    const atlas = new RegionAtlas(frameStrip('player/idle', 3, 32, 32));
    const findRegions = vi.spyOn(atlas, 'findRegions');
    const cache = new ClipCache(atlas);

    const first = cache.getOrBuildClip('player/idle');
    const second = cache.getOrBuildClip('player/idle');

    expect(second).toBe(first);
    expect(findRegions).toHaveBeenCalledOnce();
    expect(findRegions).toHaveBeenCalledWith('player/idle');
    expect(cache.size).toBe(1);
    expect(cache.has('player/idle')).toBe(true);
  });

  it('builds frames in atlas region order with the default frame duration', () => {
    const regions: AtlasRegion[] = [
      { name: 'chest/open', index: 2, originalWidth: 16, originalHeight: 16 },
      { name: 'chest/open', index: 0, originalWidth: 16, originalHeight: 16 },
      { name: 'chest/open', index: 1, originalWidth: 16, originalHeight: 16 },
    ];
    const cache = new ClipCache(new RegionAtlas(regions));

    const clip = cache.getOrBuildClip('chest/open');

    expect(clip.frames.map((frame) => frame.index)).toEqual([0, 1, 2]);
    expect(clip.frameDuration).toBe(0.125);
  });

  it('uses the configured frame duration', () => {
    const cache = new ClipCache(new RegionAtlas(frameStrip('slime/run', 2, 8, 8)), 0.25);
    expect(cache.getOrBuildClip('slime/run').duration).toBe(0.5);
  });

  it('throws AssetError when no region matches', () => {
    const cache = new ClipCache(new RegionAtlas(frameStrip('player/idle', 1, 8, 8)));

    expect(() => cache.getOrBuildClip('ghost/idle')).toThrow(AssetError);
    expect(() => cache.getOrBuildClip('ghost/idle')).toThrow('no regions for atlas key "ghost/idle"');
    expect(cache.has('ghost/idle')).toBe(false);
  });

  it('keeps clips separate per clip id', () => {
    const atlas = new RegionAtlas([
      ...frameStrip('slime/idle', 2, 8, 8),
      ...frameStrip('slime/attack', 5, 8, 8),
    ]);
    const cache = new ClipCache(atlas);

    expect(cache.getOrBuildClip('slime/idle').frameCount).toBe(2);
    expect(cache.getOrBuildClip('slime/attack').frameCount).toBe(5);
    expect(cache.size).toBe(2);
  });
});
