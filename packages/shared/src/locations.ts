// locations.ts
// Summary: Frame references that tag every tile and viewer position as either exterior world space
//          or a (container, floor) pair with a local position.
// Structure: FrameRef union, TileLocation/ViewerLocation built on it, and string keys for maps/sets.
// Usage: const here: ViewerLocation = { frame: 'container', containerId, floor: 0, position };
// ---------------------------------------------------------------------------

import { tileKey, type TilePos, type WorldPos } from './coordinates.js';

export type FrameRef =
  | { readonly frame: 'world' }
  | { readonly frame: 'container'; readonly containerId: string; readonly floor: number };

export type TileLocation = FrameRef & { readonly tile: TilePos };

/** Where a player stands. Container positions are local to the container origin. */
export type ViewerLocation = FrameRef & { readonly position: WorldPos };

export const WORLD_FRAME: FrameRef = { frame: 'world' };

export function frameKey(frame: FrameRef): string {
  return frame.frame === 'world' ? 'world' : `container:${frame.containerId}:${frame.floor}`;
}

export function locationKey(location: TileLocation): string {
  return `${frameKey(location)}@${tileKey(location.tile)}`;
}

export function sameFrame(a: FrameRef, b: FrameRef): boolean {
  if (a.frame === 'world' || b.frame === 'world') return a.frame === b.frame;
  return a.containerId === b.containerId && a.floor === b.floor;
}

export function toFrameRef(frame: FrameRef): FrameRef {
  return frame.frame === 'world'
    ? WORLD_FRAME
    : { frame: 'container', containerId: frame.containerId, floor: frame.floor };
}

export function worldTile(tile: TilePos): TileLocation {
  return { frame: 'world', tile };
}

export function containerTile(containerId: string, floor: number, tile: TilePos): TileLocation {
  return { frame: 'container', containerId, floor, tile };
}
