// player-registry.ts
// Summary: Viewer positions and the movement rules that change them: walking, entering and leaving
//          mechs through hatches, climbing between floors and interacting with stations.
// Structure: Player types -> walkability helper -> PlayerRegistry (lifecycle, move, transitions,
//            interaction, container ejection).
// Usage: const players = new PlayerRegistry(world); players.add('p1', 'red', { frame: 'world', position });
// ---------------------------------------------------------------------------

import {
  containerTile,
  distance,
  GROUND_FLOOR,
  isFiniteWorldPos,
  localTileCenterWorld,
  localToWorld,
  TILE_SIZE,
  tileCenter,
  tileTraits,
  type TileContent,
  type TilePos,
  type ViewerLocation,
  worldTile,
  worldToLocal,
  worldToTile,
  type WorldPos
} from '@hullsight/shared';

import type { Container, TeamId } from './container.js';
import type { Activation } from './entity-store.js';
import type { GameWorld } from './game-world.js';
import { fail, type Outcome, succeed } from './outcome.js';

export const INTERACTION_RANGE_TILES = 1.5;

export interface Player {
  readonly id: string;
  readonly team: TeamId;
  location: ViewerLocation;
}

export class PlayerRegistry {
  private readonly players = new Map<string, Player>();

  constructor(private readonly world: GameWorld) {
    world.onContainerDestroyed((container) => this.ejectFrom(container));
  }

  get size(): number {
    return this.players.size;
  }

  add(id: string, team: TeamId, location: ViewerLocation): Outcome<Player> {
    if (this.players.has(id)) return fail('invalid-position', `player ${id} is already registered`);
    const problem = this.validateLocation(location);
    if (problem) return problem;
    const player: Player = { id, team, location };
    this.players.set(id, player);
    return succeed(player);
  }

  remove(id: string): boolean {
    return this.players.delete(id);
  }

  get(id: string): Player | null {
    return this.players.get(id) ?? null;
  }

  list(): Player[] {
    return [...this.players.values()];
  }

  /** Empty tiles are passable; statics use their traits and entities their solid component. */
  isWalkable(content: TileContent): boolean {
    switch (content.kind) {
      case 'empty':
        return true;
      case 'static':
        return tileTraits(content.tile).walkable;
      case 'entity':
        return !this.world.entities.blocksMovement(content.entity);
    }
  }

  /** Moves within the player's current frame. Stepping onto a friendly hatch from outside enters the mech. */
  move(id: string, position: WorldPos): Outcome<ViewerLocation> {
    const player = this.players.get(id);
    if (!player) return fail('unknown-player', `player ${id} is not registered`);
    if (this.world.isReadLocked()) return fail('world-locked', 'cannot move while visibility is being computed');
    if (!isFiniteWorldPos(position)) return fail('invalid-position', 'destination must be finite');

    const here = player.location;
    if (here.frame === 'container') {
      const tile = worldToTile(position);
      const lookup = this.world.getTileInFrame(containerTile(here.containerId, here.floor, tile));
      if (!lookup) {
        return fail('invalid-position', `tile ${tile.x},${tile.y} is outside container ${here.containerId}`);
      }
      if (!this.isWalkable(lookup.content)) return fail('blocked', `tile ${tile.x},${tile.y} is not walkable`);
      return this.place(player, { ...here, position: { x: position.x, y: position.y } });
    }

    const container = this.world.containerAt(position);
    if (container) return this.moveOntoContainer(player, container, position);

    const lookup = this.world.getTileAt(position);
    if (!lookup) return fail('invalid-position', 'destination must be finite');
    if (!this.isWalkable(lookup.content)) {
      return fail('blocked', `tile ${lookup.location.tile.x},${lookup.location.tile.y} is not walkable`);
    }
    return this.place(player, { frame: 'world', position: { x: position.x, y: position.y } });
  }

  enter(id: string, containerId: string): Outcome<ViewerLocation> {
    const player = this.players.get(id);
    if (!player) return fail('unknown-player', `player ${id} is not registered`);
    if (this.world.isReadLocked()) return fail('world-locked', 'cannot enter while visibility is being computed');
    if (player.location.frame !== 'world') return fail('invalid-position', `player ${id} is already inside`);
    const container = this.world.getContainer(containerId);
    if (!container) return fail('unknown-container', `container ${containerId} does not exist`);
    if (container.team !== player.team) return fail('wrong-team', `container ${containerId} belongs to ${container.team}`);

    const origin = player.location.position;
    let nearest: { tile: TilePos; range: number } | null = null;
    for (const hatch of this.hatchesOf(container)) {
      const range = distance(origin, localTileCenterWorld(container.frame, hatch));
      if (range <= INTERACTION_RANGE_TILES * TILE_SIZE && (!nearest || range < nearest.range)) {
        nearest = { tile: hatch, range };
      }
    }
    if (!nearest) return fail('no-connector', `no hatch of ${containerId} within reach`);
    return this.place(player, {
      frame: 'container',
      containerId,
      floor: GROUND_FLOOR,
      position: tileCenter(nearest.tile)
    });
  }

  exit(id: string): Outcome<ViewerLocation> {
    const player = this.players.get(id);
    if (!player) return fail('unknown-player', `player ${id} is not registered`);
    if (this.world.isReadLocked()) return fail('world-locked', 'cannot exit while visibility is being computed');
    const here = player.location;
    if (here.frame !== 'container') return fail('invalid-position', `player ${id} is not inside a container`);
    const container = this.world.getContainer(here.containerId);
    if (!container) return fail('unknown-container', `container ${here.containerId} does not exist`);

    const tile = worldToTile(here.position);
    const lookup = this.world.getTileInFrame(containerTile(container.id, here.floor, tile));
    const standingOnHatch =
      here.floor === GROUND_FLOOR &&
      lookup?.content.kind === 'static' &&
      lookup.content.tile.kind === 'connector' &&
      lookup.content.tile.connector === 'hatch';
    if (!standingOnHatch) return fail('no-connector', `player ${id} is not standing on a hatch`);

    const step = outwardStep(container, tile);
    if (!step) return fail('blocked', `hatch ${tile.x},${tile.y} of ${container.id} is not on the hull edge`);
    const position = localTileCenterWorld(container.frame, { x: tile.x + step.x, y: tile.y + step.y });
    const landing = this.world.getTileAt(position);
    if (!landing || landing.location.frame !== 'world' || !this.isWalkable(landing.content)) {
      return fail('blocked', `no walkable ground outside hatch ${tile.x},${tile.y} of ${container.id}`);
    }
    return this.place(player, { frame: 'world', position });
  }

  climb(id: string): Outcome<ViewerLocation> {
    const player = this.players.get(id);
    if (!player) return fail('unknown-player', `player ${id} is not registered`);
    if (this.world.isReadLocked()) return fail('world-locked', 'cannot climb while visibility is being computed');
    const here = player.location;
    if (here.frame !== 'container') return fail('no-connector', `player ${id} is not inside a container`);

    const tile = worldToTile(here.position);
    const lookup = this.world.getTileInFrame(containerTile(here.containerId, here.floor, tile));
    const content = lookup?.content;
    if (
      content?.kind !== 'static' ||
      content.tile.kind !== 'connector' ||
      content.tile.connector === 'hatch' ||
      content.tile.targetFloor === null
    ) {
      return fail('no-connector', `player ${id} is not standing on a ladder or stairs`);
    }
    const targetFloor = content.tile.targetFloor;
    const container = this.world.getContainer(here.containerId);
    if (!container?.floor(targetFloor)) {
      return fail('invalid-position', `floor ${targetFloor} does not exist in ${here.containerId}`);
    }
    return this.place(player, { ...here, floor: targetFloor });
  }

  /** Activates the entity on `target` (a tile in the player's own frame) when it is within reach. */
  interact(id: string, target: TilePos): Outcome<Activation> {
    const player = this.players.get(id);
    if (!player) return fail('unknown-player', `player ${id} is not registered`);
    const here = player.location;
    if (distance(here.position, tileCenter(target)) > INTERACTION_RANGE_TILES * TILE_SIZE) {
      return fail('blocked', `tile ${target.x},${target.y} is out of reach`);
    }
    const location =
      here.frame === 'world' ? worldTile(target) : containerTile(here.containerId, here.floor, target);
    const entity = this.world.entities.queryAt(location);
    if (entity === null) return fail('unknown-entity', `nothing to interact with at ${target.x},${target.y}`);
    return this.world.entities.activate(entity);
  }

  private moveOntoContainer(player: Player, container: Container, position: WorldPos): Outcome<ViewerLocation> {
    const local = worldToLocal(container.frame, position);
    const tile = worldToTile(local);
    const lookup = this.world.getTileInFrame(containerTile(container.id, GROUND_FLOOR, tile));
    const content = lookup?.content;
    const isHatch =
      content?.kind === 'static' && content.tile.kind === 'connector' && content.tile.connector === 'hatch';
    if (!isHatch) return fail('blocked', `container ${container.id} hull blocks the way`);
    if (container.team !== player.team) {
      return fail('wrong-team', `hatch of ${container.id} belongs to ${container.team}`);
    }
    return this.place(player, {
      frame: 'container',
      containerId: container.id,
      floor: GROUND_FLOOR,
      position: tileCenter(tile)
    });
  }

  private *hatchesOf(container: Container): IterableIterator<TilePos> {
    const ground = container.floor(GROUND_FLOOR);
    if (!ground) return;
    for (const [tile, content] of ground.entries()) {
      if (content.kind === 'static' && content.tile.kind === 'connector' && content.tile.connector === 'hatch') {
        yield tile;
      }
    }
  }

  private place(player: Player, location: ViewerLocation): Outcome<ViewerLocation> {
    player.location = location;
    return succeed(location);
  }

  private validateLocation(location: ViewerLocation): Outcome<Player> | null {
    if (!isFiniteWorldPos(location.position)) return fail('invalid-position', 'position must be finite');
    if (location.frame === 'world') return null;
    const container = this.world.getContainer(location.containerId);
    if (!container) return fail('unknown-container', `container ${location.containerId} does not exist`);
    if (!container.floor(location.floor)) {
      return fail('invalid-position', `floor ${location.floor} does not exist in ${location.containerId}`);
    }
    if (!this.world.getTileInFrame(containerTile(container.id, location.floor, worldToTile(location.position)))) {
      return fail('invalid-position', 'position is outside the container footprint');
    }
    return null;
  }

  private ejectFrom(container: Container): void {
    for (const player of this.players.values()) {
      const here = player.location;
      if (here.frame !== 'container' || here.containerId !== container.id) continue;
      player.location = { frame: 'world', position: localToWorld(container.frame, here.position) };
      console.log(`Player ${player.id} ejected from destroyed container ${container.id}`);
    }
  }
}

/** Offset from a hatch on the hull edge to the exterior tile beside it, or null for interior tiles. */
function outwardStep(container: Container, tile: TilePos): TilePos | null {
  if (tile.x === 0) return { x: -1, y: 0 };
  if (tile.x === container.width - 1) return { x: 1, y: 0 };
  if (tile.y === 0) return { x: 0, y: -1 };
  if (tile.y === container.height - 1) return { x: 0, y: 1 };
  return null;
}
