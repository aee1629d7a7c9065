/**
 * A positioned, tinted image on the stage.
 *
 * The ECS Renderable component points at one of these; the animation
 * system swaps `frame`, the stage turns it into a draw call.
 */

import { WHITE } from '../core/color';
import type { AtlasRegion, Tint } from '../types';

export class SpriteActor {
  x = 0;
  y = 0;
  width = 0;
  height = 0;
  tint: Tint = WHITE;
  visible = true;
  frame: AtlasRegion | null = null;

  setPosition(x: number, y: number): this {
    this.x = x;
    this.y = y;
    return this;
  }

  setSize(width: number, height: number): this {
    this.width = width;
    this.height = height;
    return this;
  }

  /** Per-frame hook called by the stage before drawing. Subclasses override it. */
  act(_delta: number): void {}
}
