// layout.ts
// Summary: Standard mech interior: a 10x10, three-floor hull with a hatch, ladders, windows and the
//          crew stations spawned as entities.
// Structure: Station catalog -> generateStandardLayout (static tiles only) -> spawnStandardMech which
//            installs the container and then its stations, rolling back on failure.
// Usage: const mech = spawnStandardMech(world, { team: 'red', position: config.spawns.red.mech });
// ---------------------------------------------------------------------------

import {
  type EntityAttributes,
  MECH_FLOORS,
  MECH_HEIGHT_TILES,
  MECH_WIDTH_TILES,
  type StationKind,
  StaticTiles,
  tileKey,
  type TilePos,
  type WorldPos
} from '@hullsight/shared';

import type { Container, ContainerLayout, LayoutTile, TeamId } from '../world/container.js';
import type { GameWorld } from '../world/game-world.js';
import { fail, type Outcome, succeed } from '../world/outcome.js';

const STATION_POWER: Record<StationKind, number> = {
  pilot: 60,
  engine: 50,
  laser: 100,
  projectile: 80,
  shield: 150,
  repair: 30,
  electrical: 40,
  upgrade: 20
};

export interface StationPlacement {
  name: string;
  kind: StationKind;
  floor: number;
  tiles: TilePos[];
}

export const STANDARD_STATIONS: readonly StationPlacement[] = [
  {
    name: 'Engine',
    kind: 'engine',
    floor: 0,
    tiles: [
      { x: 4, y: 6 },
      { x: 5, y: 6 },
      { x: 4, y: 7 },
      { x: 5, y: 7 }
    ]
  },
  {
    name: 'Pilot Seat',
    kind: 'pilot',
    floor: 1,
    tiles: [
      { x: 4, y: 2 },
      { x: 5, y: 2 }
    ]
  },
  { name: 'Laser Turret', kind: 'laser', floor: 2, tiles: [{ x: 2, y: 2 }] },
  { name: 'Shield Generator', kind: 'shield', floor: 2, tiles: [{ x: 6, y: 6 }] }
];

export const STANDARD_HATCH: TilePos = { x: 0, y: 5 };

export function stationAttributes(kind: StationKind): EntityAttributes {
  const attributes: EntityAttributes = {
    station: { kind, interactionRange: 1.5, powerRequired: STATION_POWER[kind], operating: false },
    solid: { blocksMovement: false }
  };
  if (kind === 'laser') {
    attributes.turret = { damage: 10, fireRate: 0.5, range: 50, ammo: 1000 };
  }
  return attributes;
}

/** Static tiles of the standard hull. Station tiles are left empty for spawnStandardMech. */
export function generateStandardLayout(): ContainerLayout {
  const reserved = new Set<string>();
  for (const station of STANDARD_STATIONS) {
    for (const tile of station.tiles) reserved.add(`${station.floor}:${tileKey(tile)}`);
  }

  const floors: LayoutTile[][] = [];
  for (let floor = 0; floor < MECH_FLOORS; floor += 1) {
    const tiles: LayoutTile[] = [];
    for (let y = 0; y < MECH_HEIGHT_TILES; y += 1) {
      for (let x = 0; x < MECH_WIDTH_TILES; x += 1) {
        if (reserved.has(`${floor}:${x},${y}`)) continue;
        const border = x === 0 || y === 0 || x === MECH_WIDTH_TILES - 1 || y === MECH_HEIGHT_TILES - 1;
        tiles.push({ tile: { x, y }, content: border ? StaticTiles.metalWall : StaticTiles.metalFloor });
      }
    }
    floors.push(tiles);
  }

  const put = (floor: number, tile: TilePos, content: LayoutTile['content']): void => {
    const list = floors[floor];
    if (!list) return;
    const index = list.findIndex((entry) => entry.tile.x === tile.x && entry.tile.y === tile.y);
    if (index >= 0) list[index] = { tile, content };
    else list.push({ tile, content });
  };

  // Cargo bay in the south-west corner of the ground floor.
  for (let y = 6; y <= 8; y += 1) {
    for (let x = 1; x <= 3; x += 1) put(0, { x, y }, StaticTiles.cargoFloor);
  }
  put(0, STANDARD_HATCH, StaticTiles.hatch);
  put(0, { x: 8, y: 8 }, StaticTiles.ladder(1));
  put(1, { x: 8, y: 8 }, StaticTiles.ladder(0));
  put(1, { x: 1, y: 1 }, StaticTiles.ladder(2));
  put(2, { x: 1, y: 1 }, StaticTiles.ladder(1));
  for (const floor of [1, 2]) {
    put(floor, { x: 5, y: 0 }, StaticTiles.window('north'));
    put(floor, { x: 0, y: 5 }, StaticTiles.window('west'));
    put(floor, { x: MECH_WIDTH_TILES - 1, y: 5 }, StaticTiles.window('east'));
  }

  return { width: MECH_WIDTH_TILES, height: MECH_HEIGHT_TILES, floors };
}

export interface StandardMechOptions {
  id?: string;
  team: TeamId;
  position: WorldPos;
}

export function spawnStandardMech(world: GameWorld, options: StandardMechOptions): Outcome<Container> {
  const spawned = world.spawnContainer({ ...options, layout: generateStandardLayout() });
  if (!spawned.ok) return spawned;
  const container = spawned.value;

  for (const station of STANDARD_STATIONS) {
    const placed = world.entities.spawn(
      { name: station.name, attributes: stationAttributes(station.kind) },
      { frame: 'container', containerId: container.id, floor: station.floor },
      station.tiles
    );
    if (!placed.ok) {
      world.destroyContainer(container.id);
      return fail(placed.error.code, `station ${station.name}: ${placed.error.message}`);
    }
  }
  console.log(`Spawned ${options.team} mech ${container.id} at ${options.position.x},${options.position.y}`);
  return succeed(container);
}
