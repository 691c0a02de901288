// visibility.test.ts
// Summary: Ray casting from outside and inside containers, window cones, entity opacity and the
//          per-viewer cache.
// Structure: exterior walls -> viewer on a blocking tile -> window cone from inside a mech ->
//            walls behind windows -> recomputation -> attenuating entities -> cache reuse and
//            invalidation -> invalid viewers.
// Usage: run with `npm test` which executes every workspace test through the tsx loader.
// ---------------------------------------------------------------------------

import test from 'node:test';
import assert from 'node:assert';

import { StaticTiles, tileCenter, type ViewerLocation, worldTile } from '@hullsight/shared';

import { VisibilityEngine } from '../src/vision/visibility-engine.js';
import { GameWorld } from '../src/world/game-world.js';
import { StaleResultError } from '../src/world/outcome.js';
import { boxLayout, expectOk } from './fixtures.js';

function attenuationAt(tiles: ReadonlyMap<string, { attenuation: number }>, key: string): number | undefined {
  return tiles.get(key)?.attenuation;
}

const atOrigin: ViewerLocation = { frame: 'world', position: { x: 16, y: 16 } };

test('a wall is visible but hides what lies behind it', () => {
  const world = new GameWorld();
  expectOk(world.setStaticTile(worldTile({ x: 1, y: 0 }), StaticTiles.metalWall));
  const engine = new VisibilityEngine(world);

  const result = engine.compute('v1', { frame: 'world', position: { x: 0, y: 0 } });
  assert.strictEqual(attenuationAt(result.tiles, 'world@0,0'), 0);
  assert.strictEqual(attenuationAt(result.tiles, 'world@1,0'), 0);
  assert.strictEqual(result.tiles.has('world@2,0'), false);
});

test('a viewer standing on a blocking tile sees only that tile', () => {
  const world = new GameWorld();
  expectOk(world.setStaticTile(worldTile({ x: 3, y: 3 }), StaticTiles.rock));
  const engine = new VisibilityEngine(world);

  const result = engine.compute('v1', { frame: 'world', position: tileCenter({ x: 3, y: 3 }) });
  assert.strictEqual(result.tiles.size, 1);
  assert.strictEqual(attenuationAt(result.tiles, 'world@3,3'), 0);
});

function eastWindowWorld(): GameWorld {
  const world = new GameWorld();
  expectOk(
    world.spawnContainer({
      id: 'mech-b',
      team: 'red',
      position: { x: 320, y: 320 },
      layout: boxLayout(7, 11, { windows: [{ tile: { x: 6, y: 5 }, facing: 'east' }] })
    })
  );
  return world;
}

const besideWindow: ViewerLocation = {
  frame: 'container',
  containerId: 'mech-b',
  floor: 0,
  position: tileCenter({ x: 5, y: 5 })
};

test('a window opens an attenuated cone onto the exterior', () => {
  const world = eastWindowWorld();
  expectOk(world.setStaticTile(worldTile({ x: 17, y: 15 }), StaticTiles.rock));
  const result = new VisibilityEngine(world).compute('v1', besideWindow);

  assert.strictEqual(attenuationAt(result.tiles, 'container:mech-b:0@6,5'), 0);
  assert.strictEqual(attenuationAt(result.tiles, 'container:mech-b:0@5,5'), 0);
  assert.strictEqual(attenuationAt(result.tiles, 'world@17,15'), 0.2);
  assert.strictEqual(attenuationAt(result.tiles, 'world@20,15'), 0.5);
  for (const hidden of ['world@5,15', 'world@9,15', 'world@13,5', 'world@17,20']) {
    assert.strictEqual(result.tiles.has(hidden), false, hidden);
  }
});

test('rays grazing a window corner still stop at the wall beside it', () => {
  const result = new VisibilityEngine(eastWindowWorld()).compute('v1', besideWindow);
  assert.strictEqual(attenuationAt(result.tiles, 'world@20,15'), 0.2);
  assert.strictEqual(result.tiles.has('world@20,19'), false);
  assert.strictEqual(result.tiles.has('world@19,18'), false);
});

test('a window inside the hull does not see through the outer wall', () => {
  const world = new GameWorld();
  expectOk(
    world.spawnContainer({
      id: 'vault',
      team: 'red',
      position: { x: 320, y: 320 },
      layout: boxLayout(9, 9, { windows: [{ tile: { x: 4, y: 4 }, facing: 'east' }] })
    })
  );
  const result = new VisibilityEngine(world).compute('v1', {
    frame: 'container',
    containerId: 'vault',
    floor: 0,
    position: tileCenter({ x: 2, y: 4 })
  });
  assert.strictEqual(attenuationAt(result.tiles, 'container:vault:0@4,4'), 0);
  assert.strictEqual(attenuationAt(result.tiles, 'container:vault:0@8,4'), 0.2);
  assert.deepStrictEqual(
    [...result.tiles.keys()].filter((key) => key.startsWith('world@')),
    []
  );
});

test('recomputing for the same viewer and version yields the same tiles', () => {
  const world = eastWindowWorld();
  expectOk(world.setStaticTile(worldTile({ x: 18, y: 14 }), StaticTiles.rock));
  const engine = new VisibilityEngine(world);
  const first = engine.compute('v1', besideWindow);
  assert.ok(first.tiles.size > 0);

  const fresh = new VisibilityEngine(world).compute('v1', besideWindow);
  assert.notStrictEqual(fresh, first);
  assert.deepStrictEqual(fresh.tiles, first.tiles);

  engine.drop('v1');
  const again = engine.compute('v1', besideWindow);
  assert.notStrictEqual(again, first);
  assert.deepStrictEqual(again.tiles, first.tiles);
  assert.strictEqual(again.version, first.version);
});

test('an outside viewer covered by a hull sees nothing', () => {
  const world = new GameWorld();
  expectOk(world.spawnContainer({ id: 'box', team: 'blue', position: { x: 0, y: 0 }, layout: boxLayout(4, 4) }));
  const engine = new VisibilityEngine(world);
  const result = engine.compute('v1', { frame: 'world', position: { x: 48, y: 48 } });
  assert.strictEqual(result.origin, null);
  assert.strictEqual(result.tiles.size, 0);
  assert.strictEqual(engine.cachedViewers, 0);
});

test('attenuating entities add up along a ray', () => {
  const world = new GameWorld();
  const glass = { name: 'Glass', attributes: { opaque: { attenuation: 0.5, blocksVision: false } } };
  expectOk(world.entities.spawn(glass, { frame: 'world' }, [{ x: 2, y: 0 }]));
  const engine = new VisibilityEngine(world);
  assert.strictEqual(attenuationAt(engine.compute('v1', atOrigin).tiles, 'world@3,0'), 0.5);

  expectOk(world.entities.spawn(glass, { frame: 'world' }, [{ x: 3, y: 0 }]));
  const result = engine.compute('v1', atOrigin);
  assert.strictEqual(attenuationAt(result.tiles, 'world@3,0'), 0.5);
  assert.strictEqual(result.tiles.has('world@4,0'), false);
});

test('an entity that blocks vision hides the tiles behind it', () => {
  const world = new GameWorld();
  const screen = { name: 'Screen', attributes: { opaque: { attenuation: 0, blocksVision: true } } };
  expectOk(world.entities.spawn(screen, { frame: 'world' }, [{ x: 2, y: 0 }]));
  const result = new VisibilityEngine(world).compute('v1', atOrigin);
  assert.strictEqual(attenuationAt(result.tiles, 'world@2,0'), 0);
  assert.strictEqual(result.tiles.has('world@3,0'), false);
});

test('results are reused inside the dead zone while the version holds', () => {
  const world = new GameWorld();
  const engine = new VisibilityEngine(world);
  const first = engine.compute('v1', atOrigin);
  assert.strictEqual(engine.compute('v1', atOrigin), first);
  assert.strictEqual(engine.compute('v1', { frame: 'world', position: { x: 18, y: 16 } }), first);

  const moved = engine.compute('v1', { frame: 'world', position: { x: 20, y: 16 } });
  assert.notStrictEqual(moved, first);
  assert.deepStrictEqual(moved.origin, { frame: 'world', position: { x: 20, y: 16 } });

  expectOk(world.setStaticTile(worldTile({ x: 40, y: 40 }), StaticTiles.rock));
  const rebuilt = engine.compute('v1', { frame: 'world', position: { x: 20, y: 16 } });
  assert.notStrictEqual(rebuilt, moved);
  assert.strictEqual(rebuilt.version, world.structuralVersion);
});

test('changing frame at the same position recomputes', () => {
  const world = new GameWorld();
  expectOk(world.spawnContainer({ id: 'box', team: 'blue', position: { x: 640, y: 640 }, layout: boxLayout(4, 4) }));
  const engine = new VisibilityEngine(world);
  const outside = engine.compute('v1', atOrigin);
  const inside = engine.compute('v1', { frame: 'container', containerId: 'box', floor: 0, position: { x: 16, y: 16 } });
  assert.notStrictEqual(inside, outside);
  assert.strictEqual(attenuationAt(inside.tiles, 'container:box:0@0,0'), 0);
  assert.strictEqual(inside.tiles.has('world@0,0'), false);
});

test('invalid viewers get an empty result and no cache entry', () => {
  const world = new GameWorld();
  expectOk(world.spawnContainer({ id: 'box', team: 'blue', position: { x: 640, y: 640 }, layout: boxLayout(4, 4) }));
  const engine = new VisibilityEngine(world);
  const invalid: ViewerLocation[] = [
    { frame: 'world', position: { x: Number.NaN, y: 0 } },
    { frame: 'container', containerId: 'ghost', floor: 0, position: { x: 16, y: 16 } },
    { frame: 'container', containerId: 'box', floor: 5, position: { x: 16, y: 16 } },
    { frame: 'container', containerId: 'box', floor: 0, position: { x: 400, y: 16 } }
  ];
  for (const origin of invalid) {
    const result = engine.compute('v1', origin);
    assert.strictEqual(result.origin, null);
    assert.strictEqual(result.tiles.size, 0);
    assert.strictEqual(engine.cachedViewers, 0);
  }
});

test('dropping a viewer clears its cache entry', () => {
  const engine = new VisibilityEngine(new GameWorld());
  engine.compute('v1', atOrigin);
  assert.strictEqual(engine.cachedViewers, 1);
  assert.strictEqual(engine.drop('v1'), true);
  assert.strictEqual(engine.drop('v1'), false);
  assert.strictEqual(engine.cachedViewers, 0);
});

test('stale results are rejected', () => {
  const world = new GameWorld();
  const engine = new VisibilityEngine(world);
  const result = engine.compute('v1', atOrigin);
  engine.assertFresh(result);
  expectOk(world.setStaticTile(worldTile({ x: 9, y: 9 }), StaticTiles.rock));
  assert.throws(() => engine.assertFresh(result), StaleResultError);
});

test('settings override the defaults', () => {
  const world = new GameWorld();
  const engine = new VisibilityEngine(world, { maxRangeTiles: 2, rayCount: 4 });
  assert.strictEqual(engine.settings.maxRangeTiles, 2);
  assert.strictEqual(engine.settings.stepTiles, 0.25);
  const result = engine.compute('v1', atOrigin);
  assert.strictEqual(result.tiles.has('world@2,0'), true);
  assert.strictEqual(result.tiles.has('world@3,0'), false);
});
