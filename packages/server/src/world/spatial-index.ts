// spatial-index.ts
// Summary: Cell-bucketed index of entity tiles per frame, used for radius queries.
// Structure: Buckets keyed by frame key then by 8x8-tile cell; a reverse table remembers each
//            entity's frame, cells and tiles so removal and distance checks avoid a full scan.
// Usage: index.insert(eid, frame, tiles); for (const eid of index.queryRadius(frame, center, 3)) {...}
// ---------------------------------------------------------------------------

import { type FrameRef, frameKey, type TilePos } from '@hullsight/shared';

export const SPATIAL_CELL_TILES = 8;

interface IndexedEntry {
  frame: string;
  cells: string[];
  tiles: TilePos[];
}

function cellOf(tile: TilePos): { cx: number; cy: number } {
  return { cx: Math.floor(tile.x / SPATIAL_CELL_TILES), cy: Math.floor(tile.y / SPATIAL_CELL_TILES) };
}

function cellKey(cx: number, cy: number): string {
  return `${cx}:${cy}`;
}

export class SpatialIndex {
  private readonly buckets = new Map<string, Map<string, Set<number>>>();
  private readonly entries = new Map<number, IndexedEntry>();

  get size(): number {
    return this.entries.size;
  }

  insert(entity: number, frame: FrameRef, tiles: readonly TilePos[]): void {
    this.remove(entity);
    const key = frameKey(frame);
    let frameBuckets = this.buckets.get(key);
    if (!frameBuckets) {
      frameBuckets = new Map();
      this.buckets.set(key, frameBuckets);
    }
    const cells = new Set<string>();
    for (const tile of tiles) {
      const { cx, cy } = cellOf(tile);
      cells.add(cellKey(cx, cy));
    }
    for (const cell of cells) {
      let bucket = frameBuckets.get(cell);
      if (!bucket) {
        bucket = new Set();
        frameBuckets.set(cell, bucket);
      }
      bucket.add(entity);
    }
    this.entries.set(entity, { frame: key, cells: [...cells], tiles: tiles.map((tile) => ({ ...tile })) });
  }

  remove(entity: number): boolean {
    const entry = this.entries.get(entity);
    if (!entry) return false;
    const frameBuckets = this.buckets.get(entry.frame);
    if (frameBuckets) {
      for (const cell of entry.cells) {
        const bucket = frameBuckets.get(cell);
        if (!bucket) continue;
        bucket.delete(entity);
        if (bucket.size === 0) frameBuckets.delete(cell);
      }
      if (frameBuckets.size === 0) this.buckets.delete(entry.frame);
    }
    this.entries.delete(entity);
    return true;
  }

  /**
   * Entities in the frame with at least one tile within `radius` tiles (Euclidean, tile coordinates)
   * of `center`. Each entity is yielded once.
   */
  *queryRadius(frame: FrameRef, center: TilePos, radius: number): IterableIterator<number> {
    if (!Number.isFinite(radius) || radius < 0) return;
    if (!Number.isFinite(center.x) || !Number.isFinite(center.y)) return;
    const frameBuckets = this.buckets.get(frameKey(frame));
    if (!frameBuckets) return;

    const min = cellOf({ x: Math.floor(center.x - radius), y: Math.floor(center.y - radius) });
    const max = cellOf({ x: Math.ceil(center.x + radius), y: Math.ceil(center.y + radius) });
    const seen = new Set<number>();
    for (let cx = min.cx; cx <= max.cx; cx += 1) {
      for (let cy = min.cy; cy <= max.cy; cy += 1) {
        const bucket = frameBuckets.get(cellKey(cx, cy));
        if (!bucket) continue;
        for (const entity of bucket) {
          if (seen.has(entity)) continue;
          seen.add(entity);
          const entry = this.entries.get(entity);
          if (!entry) continue;
          const inRange = entry.tiles.some(
            (tile) => Math.hypot(tile.x - center.x, tile.y - center.y) <= radius
          );
          if (inRange) yield entity;
        }
      }
    }
  }
}
