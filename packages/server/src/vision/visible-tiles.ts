// visible-tiles.ts
// Summary: Shared vision types: the per-viewer result, the tile accumulator that keeps the lowest
//          attenuation seen for each location, and the opacity lookup for slot contents.
// Structure: VisibleTile/VisibilityResult -> VisibleTileSet -> opacityOf.
// Usage: const seen = new VisibleTileSet(); seen.mark(location, 0.2);
// ---------------------------------------------------------------------------

import { locationKey, tileTraits, type TileContent, type TileLocation, type ViewerLocation } from '@hullsight/shared';

import type { EntityOpacity } from '../world/entity-store.js';
import type { GameWorld } from '../world/game-world.js';

export interface VisibleTile {
  readonly location: TileLocation;
  /** Opacity accumulated before the ray reached this tile; 0 is fully clear. */
  readonly attenuation: number;
}

export interface VisibilityResult {
  readonly viewerId: string;
  /** Location the result was computed from, or null when the viewer was not valid. */
  readonly origin: ViewerLocation | null;
  readonly version: number;
  readonly tiles: ReadonlyMap<string, VisibleTile>;
}

export class VisibleTileSet {
  readonly tiles = new Map<string, VisibleTile>();

  mark(location: TileLocation, attenuation: number): void {
    const key = locationKey(location);
    const existing = this.tiles.get(key);
    if (!existing || attenuation < existing.attenuation) {
      this.tiles.set(key, { location, attenuation });
    }
  }
}

const CLEAR: EntityOpacity = { attenuation: 0, blocksVision: false };

export function opacityOf(world: GameWorld, content: TileContent): EntityOpacity {
  switch (content.kind) {
    case 'empty':
      return CLEAR;
    case 'static': {
      const traits = tileTraits(content.tile);
      return { attenuation: traits.attenuation, blocksVision: traits.blocksVision };
    }
    case 'entity':
      return world.entities.opacity(content.entity);
  }
}
