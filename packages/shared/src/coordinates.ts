// coordinates.ts
// Summary: Pure conversions between world space, the tile grid and container-local frames.
// Structure: Position interfaces, world<->tile helpers, container frame helpers, then direction math.
//            Nothing here reads mutable state, so the server and clients agree on every result.
// Usage: import { worldToTile, tileCenter, locateInFrame } from '@hullsight/shared';
// ---------------------------------------------------------------------------

import { TILE_SIZE } from './constants.js';
import type { Direction } from './tiles.js';

export interface WorldPos {
  readonly x: number;
  readonly y: number;
}

export interface TilePos {
  readonly x: number;
  readonly y: number;
}

/**
 * Placement of a container's local grid in world space. `origin` is the world position of local
 * (0, 0); width and height are the footprint in tiles.
 */
export interface ContainerFrame {
  readonly origin: WorldPos;
  readonly width: number;
  readonly height: number;
}

// Math.floor(-0) stays -0, which breaks Object.is and deepStrictEqual comparisons.
function toIndex(value: number): number {
  const index = Math.floor(value);
  return index === 0 ? 0 : index;
}

export function isFiniteWorldPos(pos: WorldPos): boolean {
  return Number.isFinite(pos.x) && Number.isFinite(pos.y);
}

export function worldToTile(pos: WorldPos): TilePos {
  return { x: toIndex(pos.x / TILE_SIZE), y: toIndex(pos.y / TILE_SIZE) };
}

/** Top-left corner of a tile in world units. */
export function tileToWorld(tile: TilePos): WorldPos {
  return { x: tile.x * TILE_SIZE, y: tile.y * TILE_SIZE };
}

export function tileCenter(tile: TilePos): WorldPos {
  return { x: tile.x * TILE_SIZE + TILE_SIZE / 2, y: tile.y * TILE_SIZE + TILE_SIZE / 2 };
}

export function tileKey(tile: TilePos): string {
  return `${tile.x},${tile.y}`;
}

export function parseTileKey(key: string): TilePos | null {
  const [rawX, rawY] = key.split(',');
  const x = Number(rawX);
  const y = Number(rawY);
  if (!Number.isInteger(x) || !Number.isInteger(y)) return null;
  return { x, y };
}

export function worldToLocal(frame: ContainerFrame, pos: WorldPos): WorldPos {
  return { x: pos.x - frame.origin.x, y: pos.y - frame.origin.y };
}

export function localToWorld(frame: ContainerFrame, local: WorldPos): WorldPos {
  return { x: local.x + frame.origin.x, y: local.y + frame.origin.y };
}

export function containsLocalTile(frame: ContainerFrame, tile: TilePos): boolean {
  return tile.x >= 0 && tile.y >= 0 && tile.x < frame.width && tile.y < frame.height;
}

/** Local tile under a world position, or null when the position is outside the footprint. */
export function locateInFrame(frame: ContainerFrame, pos: WorldPos): TilePos | null {
  if (!isFiniteWorldPos(pos)) return null;
  const tile = worldToTile(worldToLocal(frame, pos));
  return containsLocalTile(frame, tile) ? tile : null;
}

/** World position of the center of a container-local tile. */
export function localTileCenterWorld(frame: ContainerFrame, tile: TilePos): WorldPos {
  return localToWorld(frame, tileCenter(tile));
}

export function distance(a: WorldPos, b: WorldPos): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

const DIRECTION_DEGREES: Record<Direction, number> = {
  east: 0,
  south: 90,
  west: 180,
  north: 270
};

/** Facing angle in radians; y grows southward so south is +90°. */
export function directionAngle(direction: Direction): number {
  return (DIRECTION_DEGREES[direction] * Math.PI) / 180;
}

export function directionVector(direction: Direction): WorldPos {
  switch (direction) {
    case 'east':
      return { x: 1, y: 0 };
    case 'south':
      return { x: 0, y: 1 };
    case 'west':
      return { x: -1, y: 0 };
    case 'north':
      return { x: 0, y: -1 };
  }
}
