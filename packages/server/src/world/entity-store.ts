// entity-store.ts
// Summary: Registry of complex tile objects (stations, turrets, breakable fixtures) backed by a bitecs
//          world, with every occupied tile slot pointing back at a single record.
// Structure: FloorDirectory contract implemented by GameWorld -> EntityRecord types -> EntityStore with
//            validate-then-commit spawn, synchronous despawn, self-healing lookups and radius queries.
// Usage: const eid = world.entities.spawn({ name: 'Engine', attributes }, frame, tiles);
// ---------------------------------------------------------------------------

import {
  createEntity,
  createEntityWorld,
  destroyEntity,
  type EntityAttributes,
  type EntityWorld,
  type FrameRef,
  frameKey,
  locationKey,
  readAttributes,
  tileKey,
  type TileContent,
  type TileLocation,
  type TileMap,
  type TilePos,
  toFrameRef,
  toggleStation,
  writeAttributes,
  EMPTY_TILE
} from '@hullsight/shared';

import { fail, type Outcome, succeed, warnDanglingReference } from './outcome.js';
import { SpatialIndex } from './spatial-index.js';

export interface ResolvedFrame {
  readonly map: TileMap;
  contains(tile: TilePos): boolean;
}

/** What the store needs from the world that owns the tile maps. */
export interface FloorDirectory {
  resolveFrame(frame: FrameRef): ResolvedFrame | null;
  isReadLocked(): boolean;
  markStructuralChange(): void;
}

export interface EntityDefinition {
  name: string;
  attributes: EntityAttributes;
}

export interface EntityRecord {
  readonly id: number;
  readonly name: string;
  readonly placement: FrameRef;
  readonly tiles: readonly TilePos[];
}

export interface EntityOpacity {
  attenuation: number;
  blocksVision: boolean;
}

export interface Activation {
  record: EntityRecord;
  /** New station state, or null when the entity has nothing to toggle. */
  operating: boolean | null;
}

const CLEAR_OPACITY: Readonly<EntityOpacity> = Object.freeze({ attenuation: 0, blocksVision: false });

interface PendingHeal {
  map: TileMap;
  tile: TilePos;
  entity: number;
}

export class EntityStore {
  private readonly ecs: EntityWorld = createEntityWorld();
  private readonly records = new Map<number, EntityRecord>();
  private readonly index = new SpatialIndex();
  private readonly pendingHeals = new Map<string, PendingHeal>();

  constructor(private readonly directory: FloorDirectory) {}

  get size(): number {
    return this.records.size;
  }

  /**
   * Places a new entity on every listed tile. All targets are validated before anything is written,
   * so a failure leaves the world exactly as it was.
   */
  spawn(definition: EntityDefinition, placement: FrameRef, tiles: readonly TilePos[]): Outcome<number> {
    if (this.directory.isReadLocked()) {
      return fail('world-locked', 'cannot spawn entities while visibility is being computed');
    }
    if (tiles.length === 0) {
      return fail('invalid-position', `entity ${definition.name} needs at least one tile`);
    }
    const resolved = this.directory.resolveFrame(placement);
    if (!resolved) {
      return fail('unknown-container', `no floor for ${frameKey(placement)}`);
    }
    const seen = new Set<string>();
    for (const tile of tiles) {
      const key = tileKey(tile);
      if (!Number.isInteger(tile.x) || !Number.isInteger(tile.y) || !resolved.contains(tile)) {
        return fail('invalid-position', `tile ${key} is not addressable in ${frameKey(placement)}`);
      }
      if (seen.has(key)) {
        return fail('invalid-position', `tile ${key} listed twice for ${definition.name}`);
      }
      seen.add(key);
      const content = this.liveContent(resolved.map, { ...placement, tile });
      if (content.kind !== 'empty') {
        return fail('occupied-tile', `tile ${key} in ${frameKey(placement)} is already occupied`);
      }
    }

    const id = createEntity(this.ecs);
    writeAttributes(this.ecs, id, definition.attributes);
    const record: EntityRecord = {
      id,
      name: definition.name,
      placement: toFrameRef(placement),
      tiles: tiles.map((tile) => ({ x: tile.x, y: tile.y }))
    };
    for (const tile of record.tiles) {
      resolved.map.setEntity(tile, id);
    }
    this.index.insert(id, record.placement, record.tiles);
    this.records.set(id, record);
    this.directory.markStructuralChange();
    return succeed(id);
  }

  /** Clears every slot of the entity, its index entry and its components in one step. */
  despawn(id: number): Outcome<EntityRecord> {
    if (this.directory.isReadLocked()) {
      return fail('world-locked', 'cannot despawn entities while visibility is being computed');
    }
    const record = this.records.get(id);
    if (!record) return fail('unknown-entity', `entity ${id} does not exist`);

    const resolved = this.directory.resolveFrame(record.placement);
    if (resolved) {
      for (const tile of record.tiles) {
        const content = resolved.map.get(tile);
        if (content.kind === 'entity' && content.entity === id) resolved.map.clear(tile);
      }
    }
    this.index.remove(id);
    this.records.delete(id);
    destroyEntity(this.ecs, id);
    this.directory.markStructuralChange();
    return succeed(record);
  }

  /** Despawns every entity placed on any floor of the container; returns how many were removed. */
  despawnWithin(containerId: string): number {
    let removed = 0;
    for (const record of [...this.records.values()]) {
      if (record.placement.frame !== 'container' || record.placement.containerId !== containerId) continue;
      if (this.despawn(record.id).ok) removed += 1;
    }
    return removed;
  }

  get(id: number): EntityRecord | null {
    return this.records.get(id) ?? null;
  }

  isAlive(id: number): boolean {
    return this.records.has(id);
  }

  /** Entity occupying the tile, or null for empty, static or unresolvable slots. */
  queryAt(location: TileLocation): number | null {
    const resolved = this.directory.resolveFrame(location);
    if (!resolved || !resolved.contains(location.tile)) return null;
    const content = this.liveContent(resolved.map, location);
    return content.kind === 'entity' ? content.entity : null;
  }

  /**
   * Slot content with dangling references treated as empty. Outside the read lock the slot is cleared
   * immediately; inside it the clear waits for flushDeferredHeals.
   */
  liveContent(map: TileMap, location: TileLocation): TileContent {
    const content = map.get(location.tile);
    if (content.kind !== 'entity' || this.records.has(content.entity)) return content;

    const key = locationKey(location);
    const deferred = this.directory.isReadLocked();
    if (deferred) {
      if (!this.pendingHeals.has(key)) {
        warnDanglingReference(key, content.entity, true);
        this.pendingHeals.set(key, { map, tile: location.tile, entity: content.entity });
      }
    } else {
      warnDanglingReference(key, content.entity, false);
      map.clear(location.tile);
    }
    return EMPTY_TILE;
  }

  flushDeferredHeals(): number {
    const pending = [...this.pendingHeals.values()];
    this.pendingHeals.clear();
    let cleared = 0;
    for (const { map, tile, entity } of pending) {
      const content = map.get(tile);
      if (content.kind === 'entity' && content.entity === entity && !this.records.has(entity)) {
        map.clear(tile);
        cleared += 1;
      }
    }
    return cleared;
  }

  *queryInRadius(center: TileLocation, radiusTiles: number): IterableIterator<number> {
    for (const id of this.index.queryRadius(center, center.tile, radiusTiles)) {
      if (this.records.has(id)) yield id;
    }
  }

  attributes(id: number): EntityAttributes | null {
    if (!this.records.has(id)) return null;
    return readAttributes(this.ecs, id);
  }

  opacity(id: number): EntityOpacity {
    const opaque = this.attributes(id)?.opaque;
    return opaque ? { attenuation: opaque.attenuation, blocksVision: opaque.blocksVision } : CLEAR_OPACITY;
  }

  blocksMovement(id: number): boolean {
    return this.attributes(id)?.solid?.blocksMovement ?? false;
  }

  /** Interaction entry point: toggles a station and reports the record every tile resolves to. */
  activate(id: number): Outcome<Activation> {
    if (this.directory.isReadLocked()) {
      return fail('world-locked', 'cannot activate entities while visibility is being computed');
    }
    const record = this.records.get(id);
    if (!record) return fail('unknown-entity', `entity ${id} does not exist`);
    return succeed({ record, operating: toggleStation(this.ecs, id) });
  }

  list(): IterableIterator<EntityRecord> {
    return this.records.values();
  }
}
