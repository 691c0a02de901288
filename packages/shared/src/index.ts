// index.ts
// Summary: Public entry point for the shared workspace: coordinates, tiles, locations, ECS attributes
//          and message channels.
// Structure: Named re-exports. The Colyseus schema lives behind the './schema' subpath so plain
//          consumers never load decorated classes.
// Usage: import { worldToTile, StaticTiles, GAME_COMMAND } from '@hullsight/shared';
// ---------------------------------------------------------------------------

export { TILE_SIZE, MECH_FLOORS, MECH_WIDTH_TILES, MECH_HEIGHT_TILES, GROUND_FLOOR } from './constants.js';
export {
  isFiniteWorldPos,
  worldToTile,
  tileToWorld,
  tileCenter,
  tileKey,
  parseTileKey,
  worldToLocal,
  localToWorld,
  containsLocalTile,
  locateInFrame,
  localTileCenterWorld,
  distance,
  directionAngle,
  directionVector,
  type WorldPos,
  type TilePos,
  type ContainerFrame
} from './coordinates.js';
export {
  EMPTY_TILE,
  StaticTiles,
  tileTraits,
  type Direction,
  type FloorMaterial,
  type WallMaterial,
  type WindowTint,
  type ConnectorKind,
  type StaticTile,
  type TileContent,
  type OccupiedContent,
  type TileTraits
} from './tiles.js';
export { TileMap } from './tile-map.js';
export {
  WORLD_FRAME,
  frameKey,
  locationKey,
  sameFrame,
  toFrameRef,
  worldTile,
  containerTile,
  type FrameRef,
  type TileLocation,
  type ViewerLocation
} from './locations.js';
export {
  StationComponent,
  TurretComponent,
  SolidComponent,
  OpaqueComponent,
  BreakableComponent,
  STATION_KINDS,
  stationKindIndex,
  createEntityWorld,
  createEntity,
  destroyEntity,
  type StationKind,
  type EntityWorld
} from './ecs/components.js';
export {
  writeAttributes,
  readAttributes,
  attributeNames,
  toggleStation,
  type EntityAttributes,
  type AttributeName,
  type StationAttributes,
  type TurretAttributes,
  type SolidAttributes,
  type OpaqueAttributes,
  type BreakableAttributes
} from './ecs/attributes.js';
export { GAME_COMMAND, GAME_EVENT, type GameCommand, type GameEvent } from './channels.js';
