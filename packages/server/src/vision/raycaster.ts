// raycaster.ts
// Summary: Fixed-step ray marching for outside and inside viewers.
// Structure: rayDirections -> castFromOutside (exterior frame through getTileAt) -> castFromInside
//            (current floor inside the footprint, the exterior frame beyond it once a window is crossed).
// Usage: castFromOutside(world, position, settings, seen);
// ---------------------------------------------------------------------------

import {
  type ContainerFrame,
  containerTile,
  containsLocalTile,
  type Direction,
  directionVector,
  GROUND_FLOOR,
  locationKey,
  localToWorld,
  TILE_SIZE,
  type TileLocation,
  type TilePos,
  worldToTile,
  type WorldPos
} from '@hullsight/shared';

import type { VisibilitySettings } from '../config.js';
import type { Container } from '../world/container.js';
import type { GameWorld, TileLookup } from '../world/game-world.js';
import { opacityOf, type VisibleTileSet } from './visible-tiles.js';
import type { WindowOpening } from './window-cone.js';

interface Ray {
  dx: number;
  dy: number;
}

export function rayDirections(rayCount: number): Ray[] {
  const rays: Ray[] = [];
  for (let index = 0; index < rayCount; index += 1) {
    const angle = (2 * Math.PI * index) / rayCount;
    rays.push({ dx: Math.cos(angle), dy: Math.sin(angle) });
  }
  return rays;
}

function sampleCount(settings: VisibilitySettings): number {
  return Math.floor(settings.maxRangeTiles / settings.stepTiles);
}

/**
 * Tracks one ray: each tile is charged once, on entry, and the ray ends on a blocker or once the
 * running total reaches 1.
 */
class RayWalk {
  total = 0;
  private lastKey: string | null = null;

  constructor(
    private readonly world: GameWorld,
    private readonly seen: VisibleTileSet
  ) {}

  /** Returns false when the ray must stop. */
  visit(lookup: TileLookup): boolean {
    const key = locationKey(lookup.location);
    if (key === this.lastKey) return true;
    this.lastKey = key;
    this.seen.mark(lookup.location, this.total);
    const opacity = opacityOf(this.world, lookup.content);
    this.total += opacity.attenuation;
    return !opacity.blocksVision && this.total < 1;
  }
}

export function castFromOutside(
  world: GameWorld,
  origin: WorldPos,
  settings: VisibilitySettings,
  seen: VisibleTileSet
): void {
  const samples = sampleCount(settings);
  const stride = settings.stepTiles * TILE_SIZE;
  for (const { dx, dy } of rayDirections(settings.rayCount)) {
    const walk = new RayWalk(world, seen);
    for (let s = 0; s <= samples; s += 1) {
      const sample = { x: origin.x + dx * s * stride, y: origin.y + dy * s * stride };
      const lookup = world.getTileAt(sample, GROUND_FLOOR);
      if (!lookup || !walk.visit(lookup)) break;
    }
  }
}

/**
 * Rays resolve on the viewer's floor while their samples are inside the footprint, so walls behind a
 * window still stop them. Past the footprint edge a ray continues through the exterior only if it has
 * crossed a window. Windows on the hull edge are reported so the caller can open their cones.
 */
export function castFromInside(
  world: GameWorld,
  container: Container,
  floor: number,
  origin: WorldPos,
  settings: VisibilitySettings,
  seen: VisibleTileSet
): Map<string, WindowOpening> {
  const openings = new Map<string, WindowOpening>();
  const samples = sampleCount(settings);
  const stride = settings.stepTiles * TILE_SIZE;
  const frame = container.frame;

  for (const { dx, dy } of rayDirections(settings.rayCount)) {
    const walk = new RayWalk(world, seen);
    let throughWindow = false;
    for (let s = 0; s <= samples; s += 1) {
      const local = { x: origin.x + dx * s * stride, y: origin.y + dy * s * stride };
      const tile = worldToTile(local);

      if (!containsLocalTile(frame, tile)) {
        if (!throughWindow) break;
        const lookup = world.resolveExterior(localToWorld(frame, local), container.id);
        if (!lookup || !walk.visit(lookup)) break;
        continue;
      }

      const location: TileLocation = containerTile(container.id, floor, tile);
      const lookup = world.getTileInFrame(location);
      if (!lookup) break;
      const keepGoing = walk.visit(lookup);
      const content = lookup.content;
      if (content.kind === 'static' && content.tile.kind === 'window') {
        throughWindow = true;
        const facing = content.tile.facing;
        const key = locationKey(location);
        const previous = openings.get(key);
        if (opensOntoExterior(frame, tile, facing) && (!previous || walk.total < previous.baseAttenuation)) {
          openings.set(key, { tile, facing, baseAttenuation: walk.total });
        }
      }
      if (!keepGoing) break;
    }
  }
  return openings;
}

/** A window only opens a cone when the tile it faces lies outside the footprint. */
function opensOntoExterior(frame: ContainerFrame, tile: TilePos, facing: Direction): boolean {
  const step = directionVector(facing);
  return !containsLocalTile(frame, { x: tile.x + step.x, y: tile.y + step.y });
}
