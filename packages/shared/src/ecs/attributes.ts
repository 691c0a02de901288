// attributes.ts
// Summary: Plain-object attribute records and the helpers that pack them into (and read them back
//          out of) bitecs component arrays.
// Structure: Serialisable record interfaces, a writer that adds components on demand, and a reader
//            used for gameplay queries and visibility summaries.
// Usage: writeAttributes(world, eid, { station: { kind: 'engine' }, solid: { blocksMovement: true } });
// ---------------------------------------------------------------------------

import { addComponent, hasComponent } from 'bitecs';

import {
  BreakableComponent,
  type EntityWorld,
  OpaqueComponent,
  SolidComponent,
  STATION_KINDS,
  StationComponent,
  type StationKind,
  stationKindIndex,
  TurretComponent
} from './components.js';

export interface StationAttributes {
  kind: StationKind;
  interactionRange?: number;
  powerRequired?: number;
  operating?: boolean;
}

export interface TurretAttributes {
  damage: number;
  fireRate: number;
  range: number;
  ammo: number;
}

export interface SolidAttributes {
  blocksMovement: boolean;
}

export interface OpaqueAttributes {
  attenuation: number;
  blocksVision: boolean;
}

export interface BreakableAttributes {
  health: number;
  maxHealth: number;
  armor?: number;
}

/**
 * Named attribute records composing a complex object. Every field is optional; an entity carries
 * exactly the components for the records present here.
 */
export interface EntityAttributes {
  station?: StationAttributes;
  turret?: TurretAttributes;
  solid?: SolidAttributes;
  opaque?: OpaqueAttributes;
  breakable?: BreakableAttributes;
}

export type AttributeName = keyof EntityAttributes;

const DEFAULT_INTERACTION_RANGE = 1.5;

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function writeAttributes(world: EntityWorld, entity: number, attributes: EntityAttributes): void {
  const { station, turret, solid, opaque, breakable } = attributes;

  if (station) {
    if (!hasComponent(world, StationComponent, entity)) addComponent(world, StationComponent, entity);
    StationComponent.kind[entity] = Math.max(0, stationKindIndex(station.kind));
    StationComponent.interactionRange[entity] = finiteOr(station.interactionRange, DEFAULT_INTERACTION_RANGE);
    StationComponent.powerRequired[entity] = finiteOr(station.powerRequired, 0);
    StationComponent.operating[entity] = station.operating ? 1 : 0;
  }
  if (turret) {
    if (!hasComponent(world, TurretComponent, entity)) addComponent(world, TurretComponent, entity);
    TurretComponent.damage[entity] = finiteOr(turret.damage, 0);
    TurretComponent.fireRate[entity] = finiteOr(turret.fireRate, 0);
    TurretComponent.range[entity] = finiteOr(turret.range, 0);
    TurretComponent.ammo[entity] = Math.max(0, Math.floor(finiteOr(turret.ammo, 0)));
  }
  if (solid) {
    if (!hasComponent(world, SolidComponent, entity)) addComponent(world, SolidComponent, entity);
    SolidComponent.blocksMovement[entity] = solid.blocksMovement ? 1 : 0;
  }
  if (opaque) {
    if (!hasComponent(world, OpaqueComponent, entity)) addComponent(world, OpaqueComponent, entity);
    OpaqueComponent.attenuation[entity] = Math.max(0, finiteOr(opaque.attenuation, 0));
    OpaqueComponent.blocksVision[entity] = opaque.blocksVision ? 1 : 0;
  }
  if (breakable) {
    if (!hasComponent(world, BreakableComponent, entity)) addComponent(world, BreakableComponent, entity);
    BreakableComponent.maxHealth[entity] = Math.max(0, finiteOr(breakable.maxHealth, 0));
    BreakableComponent.health[entity] = Math.min(
      BreakableComponent.maxHealth[entity],
      Math.max(0, finiteOr(breakable.health, 0))
    );
    BreakableComponent.armor[entity] = finiteOr(breakable.armor, 0);
  }
}

export function readAttributes(world: EntityWorld, entity: number): EntityAttributes {
  const attributes: EntityAttributes = {};
  if (hasComponent(world, StationComponent, entity)) {
    attributes.station = {
      kind: STATION_KINDS[StationComponent.kind[entity]] ?? 'pilot',
      interactionRange: StationComponent.interactionRange[entity],
      powerRequired: StationComponent.powerRequired[entity],
      operating: StationComponent.operating[entity] === 1
    };
  }
  if (hasComponent(world, TurretComponent, entity)) {
    attributes.turret = {
      damage: TurretComponent.damage[entity],
      fireRate: TurretComponent.fireRate[entity],
      range: TurretComponent.range[entity],
      ammo: TurretComponent.ammo[entity]
    };
  }
  if (hasComponent(world, SolidComponent, entity)) {
    attributes.solid = { blocksMovement: SolidComponent.blocksMovement[entity] === 1 };
  }
  if (hasComponent(world, OpaqueComponent, entity)) {
    attributes.opaque = {
      attenuation: OpaqueComponent.attenuation[entity],
      blocksVision: OpaqueComponent.blocksVision[entity] === 1
    };
  }
  if (hasComponent(world, BreakableComponent, entity)) {
    attributes.breakable = {
      health: BreakableComponent.health[entity],
      maxHealth: BreakableComponent.maxHealth[entity],
      armor: BreakableComponent.armor[entity]
    };
  }
  return attributes;
}

export function attributeNames(attributes: EntityAttributes): AttributeName[] {
  const names: AttributeName[] = [];
  if (attributes.station) names.push('station');
  if (attributes.turret) names.push('turret');
  if (attributes.solid) names.push('solid');
  if (attributes.opaque) names.push('opaque');
  if (attributes.breakable) names.push('breakable');
  return names;
}

/** Flips a station's operating flag; returns the new state or null when the entity has no station. */
export function toggleStation(world: EntityWorld, entity: number): boolean | null {
  if (!hasComponent(world, StationComponent, entity)) return null;
  const next = StationComponent.operating[entity] === 1 ? 0 : 1;
  StationComponent.operating[entity] = next;
  return next === 1;
}
