// tiles.test.ts
// Summary: Covers the static tile traits table, sparse TileMap behaviour and ECS attribute records.
// Structure: traits per variant -> TileMap slot lifecycle -> attribute write/read and station toggling.
// Usage: run with `npm test` which executes every workspace test through the tsx loader.
// ---------------------------------------------------------------------------

import test from 'node:test';
import assert from 'node:assert';

import {
  attributeNames,
  createEntity,
  createEntityWorld,
  readAttributes,
  StaticTiles,
  TileMap,
  tileTraits,
  toggleStation,
  writeAttributes
} from '../src/index.js';

test('tile traits come from the variant and material table', () => {
  assert.deepStrictEqual(tileTraits(StaticTiles.metalFloor), { walkable: true, blocksVision: false, attenuation: 0 });
  assert.deepStrictEqual(tileTraits(StaticTiles.rock), { walkable: false, blocksVision: true, attenuation: 1 });
  assert.deepStrictEqual(tileTraits(StaticTiles.window('east')), {
    walkable: false,
    blocksVision: false,
    attenuation: 0.2
  });
  assert.strictEqual(tileTraits(StaticTiles.window('north', 'tinted')).attenuation, 0.35);
  assert.strictEqual(tileTraits(StaticTiles.hatch).walkable, true);
  assert.strictEqual(tileTraits(StaticTiles.ladder(1)).walkable, true);
});

test('connectors carry their target floor', () => {
  assert.deepStrictEqual(StaticTiles.ladder(2), { kind: 'connector', connector: 'ladder', targetFloor: 2 });
  assert.deepStrictEqual(StaticTiles.hatch, { kind: 'connector', connector: 'hatch', targetFloor: null });
});

test('tile map treats absent slots as empty', () => {
  const map = new TileMap();
  assert.deepStrictEqual(map.get({ x: 5, y: -2 }), { kind: 'empty' });
  map.setStatic({ x: 1, y: 1 }, StaticTiles.metalWall);
  map.setEntity({ x: 2, y: 1 }, 7);
  assert.strictEqual(map.size, 2);
  assert.deepStrictEqual(map.get({ x: 1, y: 1 }), { kind: 'static', tile: StaticTiles.metalWall });
  assert.deepStrictEqual(map.get({ x: 2, y: 1 }), { kind: 'entity', entity: 7 });
  assert.strictEqual(map.clear({ x: 1, y: 1 }), true);
  assert.strictEqual(map.clear({ x: 1, y: 1 }), false);
  assert.deepStrictEqual([...map.entries()], [[{ x: 2, y: 1 }, { kind: 'entity', entity: 7 }]]);
});

test('attribute records round trip through bitecs components', () => {
  const world = createEntityWorld();
  const eid = createEntity(world);
  writeAttributes(world, eid, {
    station: { kind: 'engine', powerRequired: 50 },
    solid: { blocksMovement: true },
    opaque: { attenuation: 0.5, blocksVision: false }
  });
  const attributes = readAttributes(world, eid);
  assert.deepStrictEqual(attributes.station, {
    kind: 'engine',
    interactionRange: 1.5,
    powerRequired: 50,
    operating: false
  });
  assert.deepStrictEqual(attributes.solid, { blocksMovement: true });
  assert.deepStrictEqual(attributes.opaque, { attenuation: 0.5, blocksVision: false });
  assert.deepStrictEqual(attributeNames(attributes), ['station', 'solid', 'opaque']);
});

test('breakable health is clamped to its maximum', () => {
  const world = createEntityWorld();
  const eid = createEntity(world);
  writeAttributes(world, eid, { breakable: { health: 250, maxHealth: 100 } });
  assert.deepStrictEqual(readAttributes(world, eid).breakable, { health: 100, maxHealth: 100, armor: 0 });
});

test('toggling flips station state and ignores other entities', () => {
  const world = createEntityWorld();
  const station = createEntity(world);
  const crate = createEntity(world);
  writeAttributes(world, station, { station: { kind: 'shield' } });
  writeAttributes(world, crate, { solid: { blocksMovement: true } });
  assert.strictEqual(toggleStation(world, station), true);
  assert.strictEqual(toggleStation(world, station), false);
  assert.strictEqual(toggleStation(world, crate), null);
});
