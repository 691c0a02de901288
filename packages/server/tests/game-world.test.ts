// game-world.test.ts
// Summary: Tile lookups across the exterior and container frames, static tile mutations, container
//          movement and destruction.
// Structure: exterior lookups -> container delegation and floors -> movement -> mutation failures ->
//            read lock -> destruction with ejection.
// Usage: run with `npm test` which executes every workspace test through the tsx loader.
// ---------------------------------------------------------------------------

import test from 'node:test';
import assert from 'node:assert';

import { containerTile, StaticTiles, worldTile } from '@hullsight/shared';

import { GameWorld } from '../src/world/game-world.js';
import { PlayerRegistry } from '../src/world/player-registry.js';
import { boxLayout, expectError, expectOk } from './fixtures.js';

function worldWithMech(floors = 1): GameWorld {
  const world = new GameWorld();
  expectOk(
    world.spawnContainer({
      id: 'mech-a',
      team: 'red',
      position: { x: 320, y: 320 },
      layout: boxLayout(7, 11, { floors, empty: [{ x: 3, y: 3 }] })
    })
  );
  return world;
}

test('exterior lookups read the tile under a world position', () => {
  const world = new GameWorld();
  const before = world.structuralVersion;
  expectOk(world.setStaticTile(worldTile({ x: 2, y: 3 }), StaticTiles.rock));
  assert.strictEqual(world.structuralVersion, before + 1);

  assert.deepStrictEqual(world.getTileAt({ x: 69, y: 101 }), {
    location: { frame: 'world', tile: { x: 2, y: 3 } },
    content: { kind: 'static', tile: StaticTiles.rock }
  });
  assert.deepStrictEqual(world.getTileAt({ x: 5, y: 5 })?.content, { kind: 'empty' });
  assert.strictEqual(world.getTileAt({ x: Number.NaN, y: 0 }), null);
  assert.strictEqual(world.getTileAt({ x: 0, y: Number.POSITIVE_INFINITY }), null);
});

test('positions inside a footprint resolve to the container floor', () => {
  const world = worldWithMech(2);
  const lookup = world.getTileAt({ x: 336, y: 336 });
  assert.deepStrictEqual(lookup?.location, containerTile('mech-a', 0, { x: 0, y: 0 }));
  assert.deepStrictEqual(lookup?.content, { kind: 'static', tile: StaticTiles.metalWall });

  expectOk(world.setStaticTile(containerTile('mech-a', 1, { x: 3, y: 3 }), StaticTiles.cargoFloor));
  assert.deepStrictEqual(world.getTileAt({ x: 432, y: 432 }, 1)?.content, {
    kind: 'static',
    tile: StaticTiles.cargoFloor
  });
  assert.deepStrictEqual(world.getTileAt({ x: 432, y: 432 }, 0)?.content, { kind: 'empty' });
  assert.strictEqual(world.getTileAt({ x: 432, y: 432 }, 2), null);
});

test('moving a container changes what a world position resolves to', () => {
  const world = worldWithMech();
  expectOk(world.setContainerVelocity('mech-a', { x: 32, y: 0 }));
  const before = world.structuralVersion;

  assert.strictEqual(world.advanceContainers(1), true);
  assert.strictEqual(world.structuralVersion, before + 1);
  assert.deepStrictEqual(world.getContainer('mech-a')?.position, { x: 352, y: 320 });
  assert.deepStrictEqual(world.getTileAt({ x: 336, y: 336 })?.location, worldTile({ x: 10, y: 10 }));
  assert.deepStrictEqual(world.getTileAt({ x: 368, y: 336 })?.location, containerTile('mech-a', 0, { x: 0, y: 0 }));

  expectOk(world.setContainerVelocity('mech-a', { x: 0, y: 0 }));
  assert.strictEqual(world.advanceContainers(1), false);
  assert.strictEqual(world.structuralVersion, before + 1);
});

test('static tile mutations validate their target', () => {
  const world = worldWithMech();
  expectOk(world.entities.spawn({ name: 'Crate', attributes: {} }, { frame: 'world' }, [{ x: 0, y: 0 }]));
  const version = world.structuralVersion;

  expectError(world.setStaticTile(worldTile({ x: 0, y: 0 }), StaticTiles.rock), 'occupied-tile');
  expectError(world.clearStaticTile(worldTile({ x: 0, y: 0 })), 'occupied-tile');
  expectError(world.setStaticTile(containerTile('mech-a', 0, { x: 20, y: 20 }), StaticTiles.rock), 'invalid-position');
  expectError(world.setStaticTile(worldTile({ x: 0.5, y: 1 }), StaticTiles.rock), 'invalid-position');
  expectError(world.setStaticTile(containerTile('ghost', 0, { x: 1, y: 1 }), StaticTiles.rock), 'unknown-container');
  expectError(world.setStaticTile(containerTile('mech-a', 4, { x: 1, y: 1 }), StaticTiles.rock), 'unknown-container');
  assert.strictEqual(world.structuralVersion, version);
});

test('clearing a static tile bumps the version only when something was removed', () => {
  const world = new GameWorld();
  expectOk(world.setStaticTile(worldTile({ x: 4, y: 4 }), StaticTiles.rock));
  const version = world.structuralVersion;
  expectOk(world.clearStaticTile(worldTile({ x: 4, y: 4 })));
  assert.strictEqual(world.structuralVersion, version + 1);
  expectOk(world.clearStaticTile(worldTile({ x: 4, y: 4 })));
  assert.strictEqual(world.structuralVersion, version + 1);
});

test('mutations fail while the read lock is held', () => {
  const world = worldWithMech();
  world.withReadLock(() => {
    expectError(world.setStaticTile(worldTile({ x: 1, y: 1 }), StaticTiles.rock), 'world-locked');
    expectError(world.destroyContainer('mech-a'), 'world-locked');
    expectError(
      world.spawnContainer({ team: 'blue', position: { x: 0, y: 0 }, layout: boxLayout(3, 3) }),
      'world-locked'
    );
    assert.strictEqual(world.advanceContainers(1), false);
  });
  assert.strictEqual(world.isReadLocked(), false);
  expectOk(world.setStaticTile(worldTile({ x: 1, y: 1 }), StaticTiles.rock));
});

test('the read lock is released when the reader throws', () => {
  const world = new GameWorld();
  assert.throws(() =>
    world.withReadLock(() => {
      throw new Error('reader failed');
    })
  );
  assert.strictEqual(world.isReadLocked(), false);
});

test('container spawns reject bad layouts and duplicate ids', () => {
  const world = worldWithMech();
  expectError(
    world.spawnContainer({ id: 'mech-a', team: 'red', position: { x: 0, y: 0 }, layout: boxLayout(3, 3) }),
    'invalid-position'
  );
  expectError(
    world.spawnContainer({ team: 'red', position: { x: 0, y: 0 }, layout: { width: 0, height: 3, floors: [[]] } }),
    'invalid-position'
  );
  expectError(
    world.spawnContainer({ team: 'red', position: { x: Number.NaN, y: 0 }, layout: boxLayout(3, 3) }),
    'invalid-position'
  );
  const spawned = expectOk(world.spawnContainer({ team: 'blue', position: { x: 0, y: 0 }, layout: boxLayout(3, 3) }));
  assert.match(spawned.id, /^[0-9a-f-]{36}$/);
});

test('destroying a container despawns its entities and ejects players', () => {
  const world = worldWithMech();
  const players = new PlayerRegistry(world);
  expectOk(
    world.entities.spawn({ name: 'Crate', attributes: {} }, { frame: 'container', containerId: 'mech-a', floor: 0 }, [
      { x: 3, y: 3 }
    ])
  );
  expectOk(players.add('p1', 'red', { frame: 'container', containerId: 'mech-a', floor: 0, position: { x: 48, y: 48 } }));

  const destroyed = expectOk(world.destroyContainer('mech-a'));
  assert.strictEqual(destroyed.id, 'mech-a');
  assert.strictEqual(world.getContainer('mech-a'), null);
  assert.strictEqual(world.entities.size, 0);
  assert.deepStrictEqual(players.get('p1')?.location, { frame: 'world', position: { x: 368, y: 368 } });
  expectError(world.destroyContainer('mech-a'), 'unknown-container');
});
