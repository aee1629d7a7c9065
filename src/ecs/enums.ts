/**
 * Enum definitions for ECS component fields.
 *
 * Stored as small integers in the Animation.playMode Uint8Array.
 */

// ── Play Mode ────────────────────────────────────────────────────

/** How elapsed time maps to a frame index. */
export const PlayMode = {
  NORMAL: 0,
  REVERSED: 1,
  LOOP: 2,
  LOOP_REVERSED: 3,
  LOOP_PINGPONG: 4,
} as const;
export type PlayMode = (typeof PlayMode)[keyof typeof PlayMode];

const PLAY_MODES: readonly number[] = Object.values(PlayMode);

export function isPlayMode(value: number): value is PlayMode {
  return PLAY_MODES.includes(value);
}

// ── Animation Type ───────────────────────────────────────────────

/** Animation kinds; the value is the atlas path suffix. */
export const AnimationType = {
  IDLE: 'idle',
  RUN: 'run',
  ATTACK: 'attack',
  DEATH: 'death',
  OPEN: 'open',
} as const;
export type AnimationType = (typeof AnimationType)[keyof typeof AnimationType];

/** Clip id for an atlas key and animation kind, e.g. "slime/attack". */
export function animationPath(atlasKey: string, type: AnimationType): string {
  return `${atlasKey}/${type}`;
}
