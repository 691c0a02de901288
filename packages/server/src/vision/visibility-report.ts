// visibility-report.ts
// Summary: Turns a VisibilityResult into the payload sent to a client: each visible tile with its
//          attenuation and a summary of what occupies it.
// Structure: Report types -> summarizeContent -> buildVisibilityReport (sorted for stable output).
// Usage: client.send(GAME_EVENT.Visibility, buildVisibilityReport(world, result));
// ---------------------------------------------------------------------------

import {
  type EntityAttributes,
  type FrameRef,
  type StaticTile,
  type TileContent,
  type TilePos,
  toFrameRef,
  type ViewerLocation
} from '@hullsight/shared';

import type { GameWorld } from '../world/game-world.js';
import type { VisibilityResult } from './visible-tiles.js';

export type ContentSummary =
  | { kind: 'empty' }
  | { kind: 'static'; tile: StaticTile }
  | { kind: 'entity'; id: number; name: string; attributes: EntityAttributes };

export interface ReportedTile {
  frame: FrameRef;
  tile: TilePos;
  attenuation: number;
  content: ContentSummary;
}

export interface VisibilityReport {
  viewerId: string;
  version: number;
  origin: ViewerLocation | null;
  tiles: ReportedTile[];
}

export function summarizeContent(world: GameWorld, content: TileContent): ContentSummary {
  switch (content.kind) {
    case 'empty':
      return { kind: 'empty' };
    case 'static':
      return { kind: 'static', tile: content.tile };
    case 'entity': {
      const record = world.entities.get(content.entity);
      const attributes = world.entities.attributes(content.entity);
      if (!record || !attributes) return { kind: 'empty' };
      return { kind: 'entity', id: record.id, name: record.name, attributes };
    }
  }
}

export function buildVisibilityReport(world: GameWorld, result: VisibilityResult): VisibilityReport {
  const tiles: ReportedTile[] = [];
  const keys = [...result.tiles.keys()].sort();
  for (const key of keys) {
    const visible = result.tiles.get(key);
    if (!visible) continue;
    const lookup = world.getTileInFrame(visible.location);
    tiles.push({
      frame: toFrameRef(visible.location),
      tile: { x: visible.location.tile.x, y: visible.location.tile.y },
      attenuation: visible.attenuation,
      content: summarizeContent(world, lookup?.content ?? { kind: 'empty' })
    });
  }
  return { viewerId: result.viewerId, version: result.version, origin: result.origin, tiles };
}
