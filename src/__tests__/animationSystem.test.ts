/**
 * Tests for AnimationSystem and the Animation component helpers.
 *
 * Each test builds a fresh bitECS world and a small in-memory atlas. Frame
 * duration is the default 1/8 s, so deltas are multiples of 0.125 to keep
 * the arithmetic exact.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { frameStrip, RegionAtlas } from '../assets/textureAtlas';
import { AssetError } from '../core/errors';
import { createActorEntity } from '../ecs/archetypes';
import {
  clearNextAnimation, hasPendingAnimation, isAnimationFinished,
  playAnimation, setPlayMode,
} from '../ecs/animationState';
import { ClipCache } from '../ecs/clipCache';
import { AnimationType, PlayMode } from '../ecs/enums';
import { AnimationSystem } from '../ecs/systems/animationSystem';
import { createGameWorld, type GameWorld } from '../ecs/world';
import { SpriteActor } from '../stage/spriteActor';
import { createRecordingStage } from './helpers/fakeStage';

const atlas = new RegionAtlas([
  ...frameStrip('slime/idle', 4, 32, 32),
  ...frameStrip('slime/attack', 3, 32, 32),
  ...frameStrip('slime/death', 2, 32, 32),
]);

let world: GameWorld;
let clips: ClipCache;
let system: AnimationSystem;

function spawnSlime(nextClipId: string): { eid: number; actor: SpriteActor } {
  const { stage } = createRecordingStage();
  const actor = new SpriteActor();
  const eid = createActorEntity(world, stage, actor, { atlasKey: 'slime', nextClipId });
  return { eid, actor };
}

beforeEach(() => {
  world = createGameWorld();
  clips = new ClipCache(atlas);
  system = new AnimationSystem(clips);
});

describe('AnimationSystem', () => {
  it('applies a pending clip on the next tick', () => {
    const { eid, actor } = spawnSlime('slime/attack');
    world.components.Animation.elapsed[eid] = 0.5;

    system.update(world, 0.3);

    const attack = clips.getOrBuildClip('slime/attack');
    expect(world.components.Animation.elapsed[eid]).toBe(0);
    expect(world.components.Animation.clipId[eid]).toBe('slime/attack');
    expect(world.components.Animation.nextClipId[eid]).toBe('');
    expect(actor.frame).toBe(attack.frames[0]);
  });

  it('advances elapsed time and frames while playing', () => {
    const { eid, actor } = spawnSlime('slime/idle');
    const idle = clips.getOrBuildClip('slime/idle');

    system.update(world, 0.125);
    system.update(world, 0.125);
    expect(world.components.Animation.elapsed[eid]).toBe(0.125);
    expect(actor.frame).toBe(idle.frames[1]);

    system.update(world, 0.25);
    expect(world.components.Animation.elapsed[eid]).toBe(0.375);
    expect(actor.frame).toBe(idle.frames[3]);

    // LOOP wraps back to the first frame
    system.update(world, 0.125);
    expect(actor.frame).toBe(idle.frames[0]);
  });

  it('restarts on a new request regardless of elapsed time', () => {
    const { eid, actor } = spawnSlime('slime/idle');
    system.update(world, 0);
    system.update(world, 0.375);

    playAnimation(world, eid, AnimationType.ATTACK);
    expect(hasPendingAnimation(world, eid)).toBe(true);
    system.update(world, 0.125);

    expect(world.components.Animation.clipId[eid]).toBe('slime/attack');
    expect(world.components.Animation.elapsed[eid]).toBe(0);
    expect(actor.frame).toBe(clips.getOrBuildClip('slime/attack').frames[0]);
    expect(hasPendingAnimation(world, eid)).toBe(false);
  });

  it('picks up play mode changes between ticks', () => {
    const { eid, actor } = spawnSlime('slime/idle');
    const idle = clips.getOrBuildClip('slime/idle');
    system.update(world, 0);
    system.update(world, 0.375);

    setPlayMode(world, eid, PlayMode.NORMAL);
    system.update(world, 0.5);

    expect(world.components.Animation.elapsed[eid]).toBe(0.875);
    expect(actor.frame).toBe(idle.frames[3]);

    setPlayMode(world, eid, PlayMode.LOOP_REVERSED);
    system.update(world, 0.125);
    // step 8 → 8 % 4 = 0 → last frame
    expect(actor.frame).toBe(idle.frames[3]);
  });

  it('presents the frame at time 0 under the play mode when switching', () => {
    const { eid, actor } = spawnSlime('slime/attack');
    setPlayMode(world, eid, PlayMode.REVERSED);

    system.update(world, 0.125);

    expect(actor.frame).toBe(clips.getOrBuildClip('slime/attack').frames[2]);
  });

  it('shares one clip between entities while keeping playback per entity', () => {
    const a = spawnSlime('slime/idle');
    const b = spawnSlime('slime/idle');

    system.update(world, 0);
    system.update(world, 0.125);
    playAnimation(world, b.eid, AnimationType.IDLE);
    system.update(world, 0.125);

    const idle = clips.getOrBuildClip('slime/idle');
    expect(clips.size).toBe(1);
    expect(world.components.Animation.elapsed[a.eid]).toBe(0.25);
    expect(world.components.Animation.elapsed[b.eid]).toBe(0);
    expect(a.actor.frame).toBe(idle.frames[2]);
    expect(b.actor.frame).toBe(idle.frames[0]);
  });

  it('leaves entities without a clip untouched', () => {
    const { eid, actor } = spawnSlime('');

    system.update(world, 0.25);

    expect(world.components.Animation.elapsed[eid]).toBe(0);
    expect(world.components.Animation.clipId[eid]).toBe('');
    expect(actor.frame).toBeNull();
  });

  it('throws AssetError for an unknown clip and drops the request', () => {
    const { eid } = spawnSlime('slime/jump');

    expect(() => system.update(world, 0.125)).toThrow(AssetError);
    expect(hasPendingAnimation(world, eid)).toBe(false);
    expect(() => system.update(world, 0.125)).not.toThrow();
  });
});

describe('animation helpers', () => {
  it('playAnimation can switch the atlas family', () => {
    const { eid } = spawnSlime('');

    const path = playAnimation(world, eid, AnimationType.RUN, 'player');

    expect(path).toBe('player/run');
    expect(world.components.Animation.atlasKey[eid]).toBe('player');
    expect(world.components.Animation.nextClipId[eid]).toBe('player/run');
  });

  it('clearNextAnimation empties the pending request', () => {
    const { eid } = spawnSlime('slime/idle');
    clearNextAnimation(world, eid);
    expect(hasPendingAnimation(world, eid)).toBe(false);
  });

  it('reports a NORMAL clip finished once elapsed reaches its duration', () => {
    const { eid } = spawnSlime('slime/death');
    setPlayMode(world, eid, PlayMode.NORMAL);

    expect(isAnimationFinished(world, clips, eid)).toBe(false);
    system.update(world, 0);
    system.update(world, 0.125);
    expect(isAnimationFinished(world, clips, eid)).toBe(false);
    system.update(world, 0.125);
    expect(isAnimationFinished(world, clips, eid)).toBe(true);
  });

  it('never reports a looping clip finished', () => {
    const { eid } = spawnSlime('slime/death');
    system.update(world, 0);
    system.update(world, 2);
    expect(isAnimationFinished(world, clips, eid)).toBe(false);
  });
});
