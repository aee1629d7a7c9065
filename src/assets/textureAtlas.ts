/**
 * In-memory texture atlas.
 *
 * Holds regions produced by an external atlas loader and answers
 * name lookups the way packed atlases do: every region with exactly the
 * requested name, ordered by frame index.
 */

import type { AtlasRegion, TextureAtlas } from '../types';

export class RegionAtlas implements TextureAtlas {
  private readonly byName = new Map<string, AtlasRegion[]>();

  constructor(regions: Iterable<AtlasRegion> = []) {
    for (const region of regions) {
      this.addRegion(region);
    }
  }

  addRegion(region: AtlasRegion): void {
    let list = this.byName.get(region.name);
    if (!list) {
      list = [];
      this.byName.set(region.name, list);
    }
    list.push(region);
    // Stable: regions sharing an index keep insertion order
    list.sort((a, b) => a.index - b.index);
  }

  findRegions(name: string): readonly AtlasRegion[] {
    const list = this.byName.get(name);
    return list ? [...list] : [];
  }

  /** Single region lookup; the lowest index when several share the name. */
  findRegion(name: string): AtlasRegion | undefined {
    return this.byName.get(name)?.[0];
  }

  get regionCount(): number {
    let count = 0;
    for (const list of this.byName.values()) count += list.length;
    return count;
  }
}

/** Build `count` frames named `name` with indices 0..count-1. */
export function frameStrip(
  name: string,
  count: number,
  originalWidth: number,
  originalHeight: number,
): AtlasRegion[] {
  return Array.from({ length: count }, (_, index) => ({
    name,
    index,
    originalWidth,
    originalHeight,
  }));
}
