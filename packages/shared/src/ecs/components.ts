// components.ts
// Summary: bitecs component declarations for the complex tiles (stations, turrets, breakable hull
//          fixtures) that carry open-ended state instead of a fixed static variant.
// Structure: Component schemas first, then the enum tables that map numeric slots back to names, then
//            helpers for creating worlds and entities.
// Usage: import { StationComponent, createEntityWorld } from '@hullsight/shared';
// ---------------------------------------------------------------------------

import {
  type IWorld,
  addEntity,
  createWorld,
  defineComponent,
  entityExists,
  removeEntity,
  Types
} from 'bitecs';

/**
 * StationComponent marks crew stations. `kind` indexes STATION_KINDS so the component stays numeric.
 */
export const StationComponent = defineComponent({
  kind: Types.ui8,
  interactionRange: Types.f32,
  powerRequired: Types.f32,
  operating: Types.ui8
});

/**
 * TurretComponent stores the weapon statistics of mounted turrets.
 */
export const TurretComponent = defineComponent({
  damage: Types.f32,
  fireRate: Types.f32,
  range: Types.f32,
  ammo: Types.ui32
});

/** SolidComponent decides whether an entity tile stops movement. */
export const SolidComponent = defineComponent({
  blocksMovement: Types.ui8
});

/**
 * OpaqueComponent feeds the visibility engine: attenuation is added to a ray's running total and
 * blocksVision ends the ray outright.
 */
export const OpaqueComponent = defineComponent({
  attenuation: Types.f32,
  blocksVision: Types.ui8
});

export const BreakableComponent = defineComponent({
  health: Types.f32,
  maxHealth: Types.f32,
  armor: Types.f32
});

export const STATION_KINDS = [
  'pilot',
  'engine',
  'laser',
  'projectile',
  'shield',
  'repair',
  'electrical',
  'upgrade'
] as const;
export type StationKind = (typeof STATION_KINDS)[number];

export function stationKindIndex(kind: StationKind): number {
  return STATION_KINDS.indexOf(kind);
}

export function createEntityWorld(): IWorld {
  return createWorld();
}

export function createEntity(world: IWorld): number {
  return addEntity(world);
}

/** Removes the entity and every component slot it holds. */
export function destroyEntity(world: IWorld, entity: number): void {
  if (!entityExists(world, entity)) return;
  removeEntity(world, entity);
}

export type EntityWorld = IWorld;
