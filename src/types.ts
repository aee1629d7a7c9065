/**
 * Shared type definitions for the actor pipeline.
 * Map data, atlas regions, colors and the Result helper.
 */

import type * as THREE from 'three';

// ── Color ───────────────────────────────────────────────────────

/** RGBA tint, each channel in 0..1. */
export interface Tint {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

// ── Map Data ────────────────────────────────────────────────────

/** A placed object on an object layer, in map pixels. */
export interface MapObject {
  id: number;
  /** Entity type tag ("Player", "Slime", ...). */
  type?: string;
  x: number;
  y: number;
  properties?: Readonly<Record<string, unknown>>;
}

export interface TileLayer {
  kind: 'tiles';
  name: string;
  visible?: boolean;
}

export interface ObjectLayer {
  kind: 'objects';
  name: string;
  objects: readonly MapObject[];
}

export type MapLayer = TileLayer | ObjectLayer;

/** An already-parsed tile map. Layers are in draw order, bottom first. */
export interface TileMap {
  name: string;
  layers: readonly MapLayer[];
}

// ── Atlas ───────────────────────────────────────────────────────

/** One packed image in a texture atlas. */
export interface AtlasRegion {
  /** Region name, e.g. "player/idle". Frames of one animation share a name. */
  readonly name: string;
  /** Frame index within the name, -1 for a standalone image. */
  readonly index: number;
  /** Size in pixels before whitespace stripping. */
  readonly originalWidth: number;
  readonly originalHeight: number;
  /** Texture already cropped to this region, if the loader produced one. */
  readonly texture?: THREE.Texture;
}

/** Asset catalog query. Returns an empty list for unknown names. */
export interface TextureAtlas {
  findRegions(name: string): readonly AtlasRegion[];
}

// ── Collections ─────────────────────────────────────────────────

export type NonEmptyArray<T> = readonly [T, ...T[]];

export function isNonEmpty<T>(items: readonly T[]): items is NonEmptyArray<T> {
  return items.length > 0;
}

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = Error>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

/** Return the value or throw the error (wrapped in Error when it is not one). */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  if (result.error instanceof Error) throw result.error;
  throw new Error(String(result.error));
}
