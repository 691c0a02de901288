// fixtures.ts
// Summary: Shared builders for server tests: walled box layouts and Outcome unwrapping.
// Structure: boxLayout -> expectOk/expectError helpers.
// Usage: const layout = boxLayout(7, 11, { windows: [{ tile: { x: 6, y: 5 }, facing: 'east' }] });
// ---------------------------------------------------------------------------

import assert from 'node:assert';

import { type Direction, StaticTiles, tileKey, type TilePos } from '@hullsight/shared';

import type { ContainerLayout, LayoutTile } from '../src/world/container.js';
import type { Outcome, WorldErrorCode } from '../src/world/outcome.js';

export interface BoxOptions {
  floors?: number;
  /** Tiles on every floor that stay empty (no static tile). */
  empty?: TilePos[];
  windows?: Array<{ tile: TilePos; facing: Direction; floor?: number }>;
}

/** Metal walls around the border, metal floor inside. */
export function boxLayout(width: number, height: number, options: BoxOptions = {}): ContainerLayout {
  const empty = new Set((options.empty ?? []).map(tileKey));
  const floors: LayoutTile[][] = [];
  for (let floor = 0; floor < (options.floors ?? 1); floor += 1) {
    const tiles: LayoutTile[] = [];
    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        if (empty.has(tileKey({ x, y }))) continue;
        const pane = options.windows?.find(
          (entry) => entry.tile.x === x && entry.tile.y === y && (entry.floor ?? 0) === floor
        );
        const border = x === 0 || y === 0 || x === width - 1 || y === height - 1;
        const content = pane
          ? StaticTiles.window(pane.facing)
          : border
            ? StaticTiles.metalWall
            : StaticTiles.metalFloor;
        tiles.push({ tile: { x, y }, content });
      }
    }
    floors.push(tiles);
  }
  return { width, height, floors };
}

export function expectOk<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    assert.fail(`expected success, got ${outcome.error.code}: ${outcome.error.message}`);
  }
  return outcome.value;
}

export function expectError<T>(outcome: Outcome<T>, code: WorldErrorCode): void {
  assert.strictEqual(outcome.ok, false);
  if (!outcome.ok) assert.strictEqual(outcome.error.code, code);
}
