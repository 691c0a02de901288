// game-world.ts
// Summary: Authoritative world model: the exterior tile map, every container and its floors, the entity
//          store, and the structural version that visibility caches are checked against.
// Structure: Lookup types -> GameWorld class (read lock, frame resolution, tile lookups, static tile
//            mutations, container lifecycle and movement).
// Usage: const world = new GameWorld(); world.setStaticTile(worldTile({ x: 1, y: 0 }), StaticTiles.rock);
// ---------------------------------------------------------------------------

import {
  containerTile,
  containsLocalTile,
  type FrameRef,
  frameKey,
  GROUND_FLOOR,
  isFiniteWorldPos,
  type StaticTile,
  type TileContent,
  type TileLocation,
  TileMap,
  worldTile,
  worldToTile,
  type WorldPos
} from '@hullsight/shared';

import { Container, type ContainerOptions, validateLayout } from './container.js';
import { EntityStore, type FloorDirectory, type ResolvedFrame } from './entity-store.js';
import { fail, type Outcome, succeed } from './outcome.js';

export interface TileLookup {
  location: TileLocation;
  content: TileContent;
}

export type ContainerDestroyedListener = (container: Container) => void;

export class GameWorld implements FloorDirectory {
  readonly exterior = new TileMap();
  readonly entities: EntityStore;
  private readonly containerMap = new Map<string, Container>();
  private readonly destroyedListeners = new Set<ContainerDestroyedListener>();
  private version = 0;
  private lockDepth = 0;

  constructor() {
    this.entities = new EntityStore(this);
  }

  get structuralVersion(): number {
    return this.version;
  }

  markStructuralChange(): void {
    this.version += 1;
  }

  isReadLocked(): boolean {
    return this.lockDepth > 0;
  }

  /**
   * Runs `read` with mutations disabled. Dangling references found while locked are cleared once the
   * outermost lock is released.
   */
  withReadLock<T>(read: () => T): T {
    this.lockDepth += 1;
    try {
      return read();
    } finally {
      this.lockDepth -= 1;
      if (this.lockDepth === 0) this.entities.flushDeferredHeals();
    }
  }

  resolveFrame(frame: FrameRef): ResolvedFrame | null {
    if (frame.frame === 'world') {
      return { map: this.exterior, contains: () => true };
    }
    const container = this.containerMap.get(frame.containerId);
    const map = container?.floor(frame.floor);
    if (!container || !map) return null;
    return { map, contains: (tile) => containsLocalTile(container.frame, tile) };
  }

  onContainerDestroyed(listener: ContainerDestroyedListener): () => void {
    this.destroyedListeners.add(listener);
    return () => this.destroyedListeners.delete(listener);
  }

  spawnContainer(options: ContainerOptions): Outcome<Container> {
    if (this.isReadLocked()) return fail('world-locked', 'cannot spawn containers while visibility is being computed');
    if (!isFiniteWorldPos(options.position) || (options.velocity && !isFiniteWorldPos(options.velocity))) {
      return fail('invalid-position', 'container position and velocity must be finite');
    }
    const layoutProblem = validateLayout(options.layout);
    if (layoutProblem) return fail('invalid-position', layoutProblem);
    if (options.id && this.containerMap.has(options.id)) {
      return fail('invalid-position', `container ${options.id} already exists`);
    }
    const container = new Container(options);
    this.containerMap.set(container.id, container);
    this.markStructuralChange();
    return succeed(container);
  }

  /** Despawns the container's entities, notifies listeners (which eject players) and drops it. */
  destroyContainer(id: string): Outcome<Container> {
    if (this.isReadLocked()) return fail('world-locked', 'cannot destroy containers while visibility is being computed');
    const container = this.containerMap.get(id);
    if (!container) return fail('unknown-container', `container ${id} does not exist`);
    const removed = this.entities.despawnWithin(id);
    for (const listener of this.destroyedListeners) {
      listener(container);
    }
    this.containerMap.delete(id);
    this.markStructuralChange();
    console.log(`Container ${id} destroyed with ${removed} entities`);
    return succeed(container);
  }

  getContainer(id: string): Container | null {
    return this.containerMap.get(id) ?? null;
  }

  containers(): IterableIterator<Container> {
    return this.containerMap.values();
  }

  /** First container whose current footprint covers the position. */
  containerAt(pos: WorldPos, excludeId?: string): Container | null {
    if (!isFiniteWorldPos(pos)) return null;
    for (const container of this.containerMap.values()) {
      if (container.id === excludeId) continue;
      if (container.localTileAt(pos)) return container;
    }
    return null;
  }

  /**
   * Tile under a world position. Inside a container footprint the lookup goes to that container's
   * `floor`, otherwise to the exterior map. Null for non-finite input or a floor the container lacks.
   */
  getTileAt(pos: WorldPos, floor = GROUND_FLOOR): TileLookup | null {
    if (!isFiniteWorldPos(pos)) return null;
    const container = this.containerAt(pos);
    if (!container) return this.lookupExterior(pos);
    const local = container.localTileAt(pos);
    const map = container.floor(floor);
    if (!local || !map) return null;
    const location = containerTile(container.id, floor, local);
    return { location, content: this.entities.liveContent(map, location) };
  }

  /** Exterior lookup that ignores one container's footprint (used for rays leaving through a window). */
  resolveExterior(pos: WorldPos, excludeContainerId: string): TileLookup | null {
    if (!isFiniteWorldPos(pos)) return null;
    const container = this.containerAt(pos, excludeContainerId);
    if (!container) return this.lookupExterior(pos);
    const local = container.localTileAt(pos);
    const map = container.floor(GROUND_FLOOR);
    if (!local || !map) return null;
    const location = containerTile(container.id, GROUND_FLOOR, local);
    return { location, content: this.entities.liveContent(map, location) };
  }

  getTileInFrame(location: TileLocation): TileLookup | null {
    const resolved = this.resolveFrame(location);
    if (!resolved || !resolved.contains(location.tile)) return null;
    return { location, content: this.entities.liveContent(resolved.map, location) };
  }

  setStaticTile(location: TileLocation, tile: StaticTile): Outcome<void> {
    const target = this.writableSlot(location);
    if (!target.ok) return target;
    target.value.setStatic(location.tile, tile);
    this.markStructuralChange();
    return succeed(undefined);
  }

  clearStaticTile(location: TileLocation): Outcome<void> {
    const target = this.writableSlot(location);
    if (!target.ok) return target;
    if (target.value.clear(location.tile)) this.markStructuralChange();
    return succeed(undefined);
  }

  setContainerVelocity(id: string, velocity: WorldPos): Outcome<void> {
    const container = this.containerMap.get(id);
    if (!container) return fail('unknown-container', `container ${id} does not exist`);
    if (!isFiniteWorldPos(velocity)) return fail('invalid-position', 'velocity must be finite');
    container.velocity = { x: velocity.x, y: velocity.y };
    return succeed(undefined);
  }

  /** Integrates container positions; a moved container counts as a structural change. */
  advanceContainers(dt: number): boolean {
    if (this.isReadLocked()) return false;
    let moved = false;
    for (const container of this.containerMap.values()) {
      if (container.advance(dt)) moved = true;
    }
    if (moved) this.markStructuralChange();
    return moved;
  }

  private lookupExterior(pos: WorldPos): TileLookup {
    const location = worldTile(worldToTile(pos));
    return { location, content: this.entities.liveContent(this.exterior, location) };
  }

  private writableSlot(location: TileLocation): Outcome<TileMap> {
    if (this.isReadLocked()) return fail('world-locked', 'cannot change tiles while visibility is being computed');
    const { tile } = location;
    if (!Number.isInteger(tile.x) || !Number.isInteger(tile.y)) {
      return fail('invalid-position', `tile ${tile.x},${tile.y} is not an integer position`);
    }
    const resolved = this.resolveFrame(location);
    if (!resolved) return fail('unknown-container', `no floor for ${frameKey(location)}`);
    if (!resolved.contains(tile)) {
      return fail('invalid-position', `tile ${tile.x},${tile.y} is outside ${frameKey(location)}`);
    }
    const current = this.entities.liveContent(resolved.map, location);
    if (current.kind === 'entity') {
      return fail('occupied-tile', `tile ${tile.x},${tile.y} holds entity ${current.entity}`);
    }
    return succeed(resolved.map);
  }
}
