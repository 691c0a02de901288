// container.ts
// Summary: Mobile multi-floor structure (a mech) with its own local tile grid per floor.
// Structure: Layout description types, then the Container class which owns one TileMap per floor and
//            integrates its world position from a velocity.
// Usage: const mech = new Container({ team: 'red', position, layout }); mech.floor(0)?.get(tile);
// ---------------------------------------------------------------------------

import crypto from 'node:crypto';

import {
  type ContainerFrame,
  containsLocalTile,
  locateInFrame,
  type StaticTile,
  TileMap,
  type TilePos,
  type WorldPos
} from '@hullsight/shared';

export type TeamId = 'red' | 'blue';

export const TEAMS: readonly TeamId[] = ['red', 'blue'];

export interface LayoutTile {
  tile: TilePos;
  content: StaticTile;
}

/** Static interior description; floors[i] lists the static tiles of floor i. */
export interface ContainerLayout {
  width: number;
  height: number;
  floors: LayoutTile[][];
}

export interface ContainerOptions {
  id?: string;
  team: TeamId;
  position: WorldPos;
  velocity?: WorldPos;
  layout: ContainerLayout;
}

export class Container {
  readonly id: string;
  readonly team: TeamId;
  readonly width: number;
  readonly height: number;
  readonly floors: readonly TileMap[];
  position: WorldPos;
  velocity: WorldPos;

  constructor(options: ContainerOptions) {
    this.id = options.id ?? crypto.randomUUID();
    this.team = options.team;
    this.width = options.layout.width;
    this.height = options.layout.height;
    this.position = { ...options.position };
    this.velocity = options.velocity ? { ...options.velocity } : { x: 0, y: 0 };
    this.floors = options.layout.floors.map((tiles) => {
      const map = new TileMap();
      for (const { tile, content } of tiles) {
        map.setStatic(tile, content);
      }
      return map;
    });
  }

  get floorCount(): number {
    return this.floors.length;
  }

  get frame(): ContainerFrame {
    return { origin: this.position, width: this.width, height: this.height };
  }

  floor(index: number): TileMap | null {
    if (!Number.isInteger(index)) return null;
    return this.floors[index] ?? null;
  }

  /** Local tile under a world position, or null outside the footprint. */
  localTileAt(pos: WorldPos): TilePos | null {
    return locateInFrame(this.frame, pos);
  }

  /** Moves the container by velocity * dt; returns true when the position changed. */
  advance(dt: number): boolean {
    if (!Number.isFinite(dt) || dt <= 0) return false;
    if (this.velocity.x === 0 && this.velocity.y === 0) return false;
    this.position = {
      x: this.position.x + this.velocity.x * dt,
      y: this.position.y + this.velocity.y * dt
    };
    return true;
  }
}

export function validateLayout(layout: ContainerLayout): string | null {
  if (!Number.isInteger(layout.width) || layout.width <= 0) return 'layout width must be a positive integer';
  if (!Number.isInteger(layout.height) || layout.height <= 0) return 'layout height must be a positive integer';
  if (layout.floors.length === 0) return 'layout needs at least one floor';
  const frame: ContainerFrame = { origin: { x: 0, y: 0 }, width: layout.width, height: layout.height };
  for (const [index, tiles] of layout.floors.entries()) {
    for (const { tile } of tiles) {
      if (!Number.isInteger(tile.x) || !Number.isInteger(tile.y)) return `floor ${index} has a non-integer tile`;
      if (!containsLocalTile(frame, tile)) {
        return `floor ${index} tile ${tile.x},${tile.y} is outside the footprint`;
      }
    }
  }
  return null;
}
