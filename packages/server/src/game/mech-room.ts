// mech-room.ts
// Summary: Colyseus room hosting one mech world: spawns both team mechs, places joining players,
//          queues their commands and steps the simulation on the room clock.
// Structure: Options contract -> MechRoom lifecycle (onCreate/onJoin/onLeave) -> command intake ->
//            tick handler that forwards visibility reports and command rejections -> state mirroring.
// Usage: gameServer.define('mech', MechRoom, { config });
// ---------------------------------------------------------------------------

import type { Client } from 'colyseus';
import { Room } from 'colyseus';
import { GAME_COMMAND, GAME_EVENT } from '@hullsight/shared';
import { ContainerStateSchema, MechWorldState, PlayerStateSchema } from '@hullsight/shared/schema';

import type { ServerConfig } from '../config.js';
import { TEAMS, type TeamId } from '../world/container.js';
import { parseCommand } from './commands.js';
import { spawnStandardMech } from './layout.js';
import { Simulation, type TickResult } from './simulation.js';

export interface MechRoomOptions {
  config: ServerConfig;
}

export class MechRoom extends Room<MechWorldState> {
  private config!: ServerConfig;
  private simulation!: Simulation;

  onCreate(options: MechRoomOptions): void {
    this.config = options.config;
    this.simulation = new Simulation({ vision: this.config.vision });
    this.setState(new MechWorldState());

    for (const team of TEAMS) {
      const spawned = spawnStandardMech(this.simulation.world, { team, position: this.config.spawns[team].mech });
      if (!spawned.ok) console.warn(`Could not spawn ${team} mech: ${spawned.error.message}`);
    }
    this.synchroniseState();

    const dt = this.config.tickIntervalMs / 1000;
    this.clock.setInterval(() => this.stepSimulation(dt), this.config.tickIntervalMs);
    for (const channel of Object.values(GAME_COMMAND)) {
      this.onMessage(channel, (client, message: unknown) => {
        this.handleCommand(client, channel, message);
      });
    }
  }

  onJoin(client: Client): void {
    const team = this.pickTeam();
    const added = this.simulation.addPlayer(client.sessionId, team, {
      frame: 'world',
      position: this.config.spawns[team].player
    });
    if (!added.ok) {
      console.warn(`Join denied for ${client.sessionId}: ${added.error.message}`);
      client.send(GAME_EVENT.JoinDenied, added.error);
      throw new Error(added.error.message);
    }
    console.log(`Player ${client.sessionId} joined team ${team}`);
    this.synchroniseState();
  }

  onLeave(client: Client, _consented: boolean): void {
    this.simulation.removePlayer(client.sessionId);
    this.synchroniseState();
  }

  private handleCommand(client: Client, channel: string, payload: unknown): void {
    const command = parseCommand(client.sessionId, channel, payload);
    if (!command) {
      client.send(GAME_EVENT.CommandRejected, {
        channel,
        error: { code: 'invalid-position', message: 'malformed command payload' }
      });
      return;
    }
    this.simulation.enqueue(command);
  }

  private stepSimulation(dt: number): void {
    try {
      const result = this.simulation.step(dt);
      this.forwardResults(result);
      this.synchroniseState();
    } catch (error) {
      console.error('Simulation error', error);
    }
  }

  private forwardResults(result: TickResult): void {
    for (const outcome of result.outcomes) {
      if (outcome.ok) continue;
      const client = this.clients.find((candidate) => candidate.sessionId === outcome.command.playerId);
      client?.send(GAME_EVENT.CommandRejected, { command: outcome.command.kind, error: outcome.error });
    }
    for (const client of this.clients) {
      const report = this.simulation.report(client.sessionId);
      if (report) client.send(GAME_EVENT.Visibility, report);
    }
  }

  private pickTeam(): TeamId {
    const counts: Record<TeamId, number> = { red: 0, blue: 0 };
    for (const player of this.simulation.players.list()) counts[player.team] += 1;
    return counts.blue < counts.red ? 'blue' : 'red';
  }

  private synchroniseState(): void {
    const { world, players } = this.simulation;
    this.state.tick = this.simulation.tick;
    this.state.structuralVersion = world.structuralVersion;

    const liveContainers = new Set<string>();
    for (const container of world.containers()) {
      liveContainers.add(container.id);
      const entry = this.state.containers.get(container.id) ?? new ContainerStateSchema();
      entry.id = container.id;
      entry.team = container.team;
      entry.x = container.position.x;
      entry.y = container.position.y;
      entry.vx = container.velocity.x;
      entry.vy = container.velocity.y;
      entry.width = container.width;
      entry.height = container.height;
      entry.floors = container.floorCount;
      this.state.containers.set(container.id, entry);
    }
    for (const id of [...this.state.containers.keys()]) {
      if (!liveContainers.has(id)) this.state.containers.delete(id);
    }

    const livePlayers = new Set<string>();
    for (const player of players.list()) {
      livePlayers.add(player.id);
      const entry = this.state.players.get(player.id) ?? new PlayerStateSchema();
      const here = player.location;
      entry.id = player.id;
      entry.team = player.team;
      entry.frame = here.frame;
      entry.containerId = here.frame === 'container' ? here.containerId : '';
      entry.floor = here.frame === 'container' ? here.floor : 0;
      entry.x = here.position.x;
      entry.y = here.position.y;
      this.state.players.set(player.id, entry);
    }
    for (const id of [...this.state.players.keys()]) {
      if (!livePlayers.has(id)) this.state.players.delete(id);
    }
  }
}
