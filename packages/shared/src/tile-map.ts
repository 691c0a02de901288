// tile-map.ts
// Summary: Sparse tile storage used for the exterior world and for each floor of each container.
// Structure: A Map keyed by tileKey holding static variants or entity references. Absent keys read as
//            EMPTY_TILE so irregular layouts never need fixed bounds.
// Usage: const floor = new TileMap(); floor.setStatic({ x: 1, y: 1 }, StaticTiles.metalFloor);
// ---------------------------------------------------------------------------

import { parseTileKey, tileKey, type TilePos } from './coordinates.js';
import { EMPTY_TILE, type OccupiedContent, type StaticTile, type TileContent } from './tiles.js';

export class TileMap {
  private readonly slots = new Map<string, OccupiedContent>();

  get size(): number {
    return this.slots.size;
  }

  get(pos: TilePos): TileContent {
    return this.slots.get(tileKey(pos)) ?? EMPTY_TILE;
  }

  has(pos: TilePos): boolean {
    return this.slots.has(tileKey(pos));
  }

  setStatic(pos: TilePos, tile: StaticTile): void {
    this.slots.set(tileKey(pos), { kind: 'static', tile });
  }

  setEntity(pos: TilePos, entity: number): void {
    this.slots.set(tileKey(pos), { kind: 'entity', entity });
  }

  /** Returns true when a slot was actually removed. */
  clear(pos: TilePos): boolean {
    return this.slots.delete(tileKey(pos));
  }

  *entries(): IterableIterator<[TilePos, OccupiedContent]> {
    for (const [key, content] of this.slots) {
      const pos = parseTileKey(key);
      if (pos) yield [pos, content];
    }
  }
}
