/**
 * Stage implementation on a three.js scene.
 *
 * Each registered SpriteActor gets a THREE.Sprite anchored at its
 * bottom-left corner. act() copies actor state onto the sprites and
 * assigns renderOrder from the actor list, so setPaintOrder() controls
 * paint order. Tile layers are Object3D groups built by the map loader and
 * bound by layer name; each is rendered in its own pass.
 *
 * A frame is several passes layered over each other, so the renderer's
 * autoClear is switched off: applyViewport() clears color and depth once,
 * and each pass only clears depth.
 */

import * as THREE from 'three';
import { WORLD_HEIGHT, WORLD_WIDTH } from '../config';
import { createLogger } from '../core/logger';
import type { TileLayer } from '../types';
import type { SpriteActor } from './spriteActor';
import type { Stage } from './stage';

const log = createLogger('ThreeStage');

/** The part of THREE.WebGLRenderer the stage drives. */
export interface SceneRenderer {
  render(scene: THREE.Object3D, camera: THREE.Camera): void;
  setViewport(x: number, y: number, width: number, height: number): void;
  autoClear: boolean;
  clear(): void;
  clearDepth(): void;
}

export interface ThreeStageOptions {
  /** Visible world size in units. */
  worldWidth?: number;
  worldHeight?: number;
  /** Drawing buffer size in pixels. */
  screenWidth?: number;
  screenHeight?: number;
}

export class ThreeStage implements Stage {
  readonly scene = new THREE.Scene();
  readonly camera: THREE.OrthographicCamera;

  private actors: SpriteActor[] = [];
  private readonly sprites = new Map<SpriteActor, THREE.Sprite>();
  private readonly tileLayers = new Map<string, THREE.Object3D>();
  private screenWidth: number;
  private screenHeight: number;

  constructor(
    private readonly renderer: SceneRenderer,
    options: ThreeStageOptions = {},
  ) {
    const worldWidth = options.worldWidth ?? WORLD_WIDTH;
    const worldHeight = options.worldHeight ?? WORLD_HEIGHT;
    this.screenWidth = options.screenWidth ?? 1280;
    this.screenHeight = options.screenHeight ?? 720;

    // y-up world with the origin at the bottom-left of the view
    this.camera = new THREE.OrthographicCamera(0, worldWidth, worldHeight, 0, 0.1, 100);
    this.camera.position.set(0, 0, 10);

    renderer.autoClear = false;
  }

  // ── Actors ────────────────────────────────────────────────────

  addActor(actor: SpriteActor): void {
    if (this.sprites.has(actor)) return;

    const sprite = new THREE.Sprite(new THREE.SpriteMaterial({ transparent: true }));
    sprite.center.set(0, 0);
    this.sprites.set(actor, sprite);
    this.actors.push(actor);
    this.scene.add(sprite);
    this.syncSprite(actor, sprite, this.actors.length - 1);
  }

  removeActor(actor: SpriteActor): void {
    const sprite = this.sprites.get(actor);
    if (!sprite) return;

    this.scene.remove(sprite);
    sprite.material.dispose();
    this.sprites.delete(actor);
    const index = this.actors.indexOf(actor);
    if (index >= 0) this.actors.splice(index, 1);
  }

  /**
   * Paint `actors` last, in the given order. Registered actors not in the
   * list keep their relative order behind them; unregistered ones are
   * ignored.
   */
  setPaintOrder(actors: readonly SpriteActor[]): void {
    const listed = new Set<SpriteActor>();
    for (const actor of actors) {
      if (this.sprites.has(actor)) listed.add(actor);
    }
    const rest = this.actors.filter((actor) => !listed.has(actor));
    this.actors = [...rest, ...listed];
  }

  hasActor(actor: SpriteActor): boolean {
    return this.sprites.has(actor);
  }

  /** Actors in paint order, back first. */
  getActors(): readonly SpriteActor[] {
    return this.actors;
  }

  getSprite(actor: SpriteActor): THREE.Sprite | undefined {
    return this.sprites.get(actor);
  }

  // ── Tile Layers ───────────────────────────────────────────────

  bindTileLayer(name: string, object: THREE.Object3D): void {
    this.tileLayers.set(name, object);
  }

  unbindTileLayer(name: string): void {
    this.tileLayers.delete(name);
  }

  renderTileLayer(layer: TileLayer): void {
    if (layer.visible === false) return;
    const object = this.tileLayers.get(layer.name);
    if (!object) {
      log.debug(`No geometry bound for tile layer "${layer.name}"`);
      return;
    }
    this.renderPass(object);
  }

  // ── Frame ─────────────────────────────────────────────────────

  resize(width: number, height: number): void {
    this.screenWidth = width;
    this.screenHeight = height;
  }

  applyViewport(): void {
    this.renderer.setViewport(0, 0, this.screenWidth, this.screenHeight);
    this.renderer.clear();
    this.camera.updateProjectionMatrix();
  }

  act(delta: number): void {
    for (let i = 0; i < this.actors.length; i++) {
      const actor = this.actors[i];
      if (!actor) continue;
      actor.act(delta);
      const sprite = this.sprites.get(actor);
      if (sprite) this.syncSprite(actor, sprite, i);
    }
  }

  draw(): void {
    this.renderPass(this.scene);
  }

  dispose(): void {
    for (const actor of [...this.actors]) {
      this.removeActor(actor);
    }
    this.tileLayers.clear();
  }

  private renderPass(object: THREE.Object3D): void {
    this.renderer.clearDepth();
    this.renderer.render(object, this.camera);
  }

  private syncSprite(actor: SpriteActor, sprite: THREE.Sprite, order: number): void {
    sprite.position.set(actor.x, actor.y, 0);
    sprite.scale.set(actor.width, actor.height, 1);
    sprite.visible = actor.visible;
    sprite.renderOrder = order;

    const material = sprite.material;
    material.color.setRGB(actor.tint.r, actor.tint.g, actor.tint.b);
    material.opacity = actor.tint.a;

    const texture = actor.frame?.texture ?? null;
    if (material.map !== texture) {
      material.map = texture;
      material.needsUpdate = true;
    }
  }
}
