// constants.ts
// Summary: Geometry constants shared by the authoritative server and any client mirroring it.
// Usage: import { TILE_SIZE, MECH_FLOORS } from '@hullsight/shared';
// ---------------------------------------------------------------------------

/** World units per tile edge. */
export const TILE_SIZE = 32;

/** Floors carried by every standard mech. */
export const MECH_FLOORS = 3;

/** Footprint of the standard mech, in tiles. */
export const MECH_WIDTH_TILES = 10;
export const MECH_HEIGHT_TILES = 10;

/** Floor an outside observer resolves when looking into a container. */
export const GROUND_FLOOR = 0;
