// tiles.ts
// Summary: Tagged-variant description of simple tiles plus the slot content type stored in tile maps.
// Structure: Variant unions, a fixed traits table per variant/material, and small constructors used by
//            layout generation and tests.
// Usage: import { StaticTiles, tileTraits, type TileContent } from '@hullsight/shared';
// ---------------------------------------------------------------------------

export type Direction = 'north' | 'east' | 'south' | 'west';
export type FloorMaterial = 'grass' | 'metal' | 'cargo';
export type WallMaterial = 'rock' | 'metal' | 'reinforced';
export type WindowTint = 'clear' | 'tinted';
export type ConnectorKind = 'ladder' | 'stairs' | 'hatch';

export type StaticTile =
  | { readonly kind: 'floor'; readonly material: FloorMaterial }
  | { readonly kind: 'wall'; readonly material: WallMaterial }
  | { readonly kind: 'window'; readonly facing: Direction; readonly tint: WindowTint }
  | { readonly kind: 'connector'; readonly connector: ConnectorKind; readonly targetFloor: number | null };

export type TileContent =
  | { readonly kind: 'empty' }
  | { readonly kind: 'static'; readonly tile: StaticTile }
  | { readonly kind: 'entity'; readonly entity: number };

/** Slot values a tile map actually stores; absence stands for empty. */
export type OccupiedContent = Exclude<TileContent, { kind: 'empty' }>;

export interface TileTraits {
  readonly walkable: boolean;
  readonly blocksVision: boolean;
  /** Opacity added to a ray's running total when it enters the tile. */
  readonly attenuation: number;
}

export const EMPTY_TILE: TileContent = { kind: 'empty' };

const CLEAR: TileTraits = { walkable: true, blocksVision: false, attenuation: 0 };
const SOLID: TileTraits = { walkable: false, blocksVision: true, attenuation: 1 };

const WINDOW_TRAITS: Record<WindowTint, TileTraits> = {
  clear: { walkable: false, blocksVision: false, attenuation: 0.2 },
  tinted: { walkable: false, blocksVision: false, attenuation: 0.35 }
};

export function tileTraits(tile: StaticTile): TileTraits {
  switch (tile.kind) {
    case 'floor':
    case 'connector':
      return CLEAR;
    case 'wall':
      return SOLID;
    case 'window':
      return WINDOW_TRAITS[tile.tint];
  }
}

export const StaticTiles = {
  grass: { kind: 'floor', material: 'grass' },
  metalFloor: { kind: 'floor', material: 'metal' },
  cargoFloor: { kind: 'floor', material: 'cargo' },
  rock: { kind: 'wall', material: 'rock' },
  metalWall: { kind: 'wall', material: 'metal' },
  reinforcedWall: { kind: 'wall', material: 'reinforced' },
  hatch: { kind: 'connector', connector: 'hatch', targetFloor: null },
  window(facing: Direction, tint: WindowTint = 'clear'): StaticTile {
    return { kind: 'window', facing, tint };
  },
  ladder(targetFloor: number): StaticTile {
    return { kind: 'connector', connector: 'ladder', targetFloor };
  },
  stairs(targetFloor: number): StaticTile {
    return { kind: 'connector', connector: 'stairs', targetFloor };
  }
} as const satisfies Record<string, StaticTile | ((...args: never[]) => StaticTile)>;
