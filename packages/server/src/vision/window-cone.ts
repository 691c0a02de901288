// window-cone.ts
// Summary: Exterior view cone opened by a window: every world tile within range and within the
//          half-angle of the window's facing is added, without occlusion.
// Structure: WindowOpening record plus addWindowCone, which scans the bounding box of the cone.
// Usage: addWindowCone(world, container, opening, settings, seen);
// ---------------------------------------------------------------------------

import {
  type Direction,
  directionAngle,
  distance,
  localTileCenterWorld,
  TILE_SIZE,
  tileCenter,
  type TilePos,
  worldToTile
} from '@hullsight/shared';

import type { VisibilitySettings } from '../config.js';
import type { Container } from '../world/container.js';
import type { GameWorld } from '../world/game-world.js';
import type { VisibleTileSet } from './visible-tiles.js';

export interface WindowOpening {
  tile: TilePos;
  facing: Direction;
  /** Ray attenuation right after passing the window glass. */
  baseAttenuation: number;
}

// Keeps tiles sitting exactly on the cone edge inside despite trig rounding.
const ANGLE_EPSILON = 1e-9;

function angleBetween(a: number, b: number): number {
  const diff = Math.abs(a - b) % (2 * Math.PI);
  return diff > Math.PI ? 2 * Math.PI - diff : diff;
}

export function addWindowCone(
  world: GameWorld,
  container: Container,
  opening: WindowOpening,
  settings: VisibilitySettings,
  seen: VisibleTileSet
): void {
  const attenuation = opening.baseAttenuation + settings.windowConeAttenuation;
  if (attenuation >= 1) return;

  const apex = localTileCenterWorld(container.frame, opening.tile);
  const facing = directionAngle(opening.facing);
  const halfAngle = (settings.windowHalfAngleDegrees * Math.PI) / 180;
  const reach = settings.windowRangeTiles * TILE_SIZE;
  const min = worldToTile({ x: apex.x - reach, y: apex.y - reach });
  const max = worldToTile({ x: apex.x + reach, y: apex.y + reach });

  for (let x = min.x; x <= max.x; x += 1) {
    for (let y = min.y; y <= max.y; y += 1) {
      const center = tileCenter({ x, y });
      const range = distance(apex, center);
      if (range === 0 || range > reach) continue;
      if (container.localTileAt(center)) continue;
      const bearing = Math.atan2(center.y - apex.y, center.x - apex.x);
      if (angleBetween(bearing, facing) > halfAngle + ANGLE_EPSILON) continue;
      const lookup = world.resolveExterior(center, container.id);
      if (lookup) seen.mark(lookup.location, attenuation);
    }
  }
}
