// schema.ts
// Summary: Colyseus schema definitions for the replicated mech world.
// Structure: Container and player schemas nested in MechWorldState. Visibility is delivered per client
//            as a message (see channels.ts), never through shared state.
// Usage: import { MechWorldState } from '@hullsight/shared/schema';
// ---------------------------------------------------------------------------

import { Schema, type, MapSchema } from '@colyseus/schema';

/**
 * ContainerStateSchema mirrors a mech's placement. Interior tiles are not replicated; clients only
 * learn them through visibility reports.
 */
export class ContainerStateSchema extends Schema {
  @type('string') declare id: string;
  @type('string') declare team: string;
  @type('number') declare x: number;
  @type('number') declare y: number;
  @type('number') declare vx: number;
  @type('number') declare vy: number;
  @type('number') declare width: number;
  @type('number') declare height: number;
  @type('number') declare floors: number;

  constructor() {
    super();
    this.id = '';
    this.team = '';
    this.x = 0;
    this.y = 0;
    this.vx = 0;
    this.vy = 0;
    this.width = 0;
    this.height = 0;
    this.floors = 0;
  }
}

/**
 * PlayerStateSchema stores where a player stands. `frame` is 'world' or 'container'; containerId and
 * floor are only meaningful for the latter and x/y are then container-local.
 */
export class PlayerStateSchema extends Schema {
  @type('string') declare id: string;
  @type('string') declare team: string;
  @type('string') declare frame: string;
  @type('string') declare containerId: string;
  @type('number') declare floor: number;
  @type('number') declare x: number;
  @type('number') declare y: number;

  constructor() {
    super();
    this.id = '';
    this.team = '';
    this.frame = 'world';
    this.containerId = '';
    this.floor = 0;
    this.x = 0;
    this.y = 0;
  }
}

export class MechWorldState extends Schema {
  @type({ map: ContainerStateSchema })
  declare containers: MapSchema<ContainerStateSchema>;

  @type({ map: PlayerStateSchema })
  declare players: MapSchema<PlayerStateSchema>;

  @type('number')
  declare tick: number;

  @type('number')
  declare structuralVersion: number;

  constructor() {
    super();
    this.containers = new MapSchema<ContainerStateSchema>();
    this.players = new MapSchema<PlayerStateSchema>();
    this.tick = 0;
    this.structuralVersion = 0;
  }
}
