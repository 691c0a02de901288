// visibility-engine.ts
// Summary: Per-viewer visibility computation with a cache keyed on the viewer's frame, a dead zone
//          around its last position and the world structural version.
// Structure: VisibilityEngine (compute, drop, assertFresh) delegating ray work to raycaster.ts and
//            window-cone.ts. Invalid viewers, including outside viewers standing under a hull, get an
//            empty result instead of an exception.
// Usage: const engine = new VisibilityEngine(world, config.vision); engine.compute('p1', location);
// ---------------------------------------------------------------------------

import {
  containerTile,
  distance,
  isFiniteWorldPos,
  sameFrame,
  TILE_SIZE,
  type ViewerLocation,
  worldToTile
} from '@hullsight/shared';

import { DEFAULT_VISIBILITY, type VisibilitySettings } from '../config.js';
import type { GameWorld } from '../world/game-world.js';
import { StaleResultError } from '../world/outcome.js';
import { castFromInside, castFromOutside } from './raycaster.js';
import { type VisibilityResult, type VisibleTile, VisibleTileSet } from './visible-tiles.js';
import { addWindowCone } from './window-cone.js';

export class VisibilityEngine {
  private readonly cache = new Map<string, VisibilityResult>();
  readonly settings: Readonly<VisibilitySettings>;

  constructor(
    private readonly world: GameWorld,
    settings: Partial<VisibilitySettings> = {}
  ) {
    this.settings = { ...DEFAULT_VISIBILITY, ...settings };
  }

  get cachedViewers(): number {
    return this.cache.size;
  }

  /**
   * Visible tiles for the viewer. A cached result is returned as-is while the frame matches, the viewer
   * stays inside the dead zone and the structural version is unchanged.
   */
  compute(viewerId: string, origin: ViewerLocation): VisibilityResult {
    const version = this.world.structuralVersion;
    const cached = this.cache.get(viewerId);
    if (cached && this.isReusable(cached, origin, version)) return cached;

    try {
      const tiles = this.world.withReadLock(() => this.trace(origin));
      if (!tiles) {
        this.cache.delete(viewerId);
        return { viewerId, origin: null, version, tiles: new Map() };
      }
      const result: VisibilityResult = { viewerId, origin, version, tiles };
      this.cache.set(viewerId, result);
      return result;
    } catch (error) {
      console.error(`Visibility computation failed for ${viewerId}`, error);
      this.cache.delete(viewerId);
      return { viewerId, origin: null, version, tiles: new Map() };
    }
  }

  drop(viewerId: string): boolean {
    return this.cache.delete(viewerId);
  }

  assertFresh(result: VisibilityResult, version: number = this.world.structuralVersion): void {
    if (result.version !== version) {
      throw new StaleResultError(result.viewerId, result.version, version);
    }
  }

  private isReusable(cached: VisibilityResult, origin: ViewerLocation, version: number): boolean {
    if (cached.version !== version || !cached.origin) return false;
    if (!sameFrame(cached.origin, origin) || !isFiniteWorldPos(origin.position)) return false;
    return distance(cached.origin.position, origin.position) <= this.settings.deadZoneTiles * TILE_SIZE;
  }

  private trace(origin: ViewerLocation): Map<string, VisibleTile> | null {
    if (!isFiniteWorldPos(origin.position)) return null;
    const seen = new VisibleTileSet();

    if (origin.frame === 'world') {
      // A hull driven over an outside viewer would otherwise expose its interior.
      if (this.world.containerAt(origin.position)) return null;
      castFromOutside(this.world, origin.position, this.settings, seen);
      return seen.tiles;
    }

    const container = this.world.getContainer(origin.containerId);
    if (!container) return null;
    const standing = containerTile(container.id, origin.floor, worldToTile(origin.position));
    if (!this.world.getTileInFrame(standing)) return null;

    const openings = castFromInside(this.world, container, origin.floor, origin.position, this.settings, seen);
    for (const opening of openings.values()) {
      addWindowCone(this.world, container, opening, this.settings, seen);
    }
    return seen.tiles;
  }
}
