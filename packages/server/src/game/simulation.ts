// simulation.ts
// Summary: Tick driver tying the world, player registry and visibility engine together.
// Structure: Outcome/result types -> Simulation (player lifecycle, command application, step, report).
//            Each step applies queued commands, advances containers, then computes visibility for
//            every player under a single read lock.
// Usage: const sim = new Simulation({ vision: config.vision }); const result = sim.step(0.05);
// ---------------------------------------------------------------------------

import type { ViewerLocation } from '@hullsight/shared';

import type { VisibilitySettings } from '../config.js';
import { VisibilityEngine } from '../vision/visibility-engine.js';
import { buildVisibilityReport, type VisibilityReport } from '../vision/visibility-report.js';
import type { VisibilityResult } from '../vision/visible-tiles.js';
import type { TeamId } from '../world/container.js';
import { GameWorld } from '../world/game-world.js';
import type { Outcome, WorldError } from '../world/outcome.js';
import { type Player, PlayerRegistry } from '../world/player-registry.js';
import { CommandQueue, type PlayerCommand } from './commands.js';

export type CommandOutcome =
  | { command: PlayerCommand; ok: true }
  | { command: PlayerCommand; ok: false; error: WorldError };

export interface TickResult {
  tick: number;
  version: number;
  outcomes: CommandOutcome[];
  visibility: Map<string, VisibilityResult>;
}

export interface SimulationOptions {
  world?: GameWorld;
  vision?: Partial<VisibilitySettings>;
}

export class Simulation {
  readonly world: GameWorld;
  readonly players: PlayerRegistry;
  readonly vision: VisibilityEngine;
  readonly commands = new CommandQueue();
  private tickCount = 0;

  constructor(options: SimulationOptions = {}) {
    this.world = options.world ?? new GameWorld();
    this.players = new PlayerRegistry(this.world);
    this.vision = new VisibilityEngine(this.world, options.vision);
  }

  get tick(): number {
    return this.tickCount;
  }

  enqueue(command: PlayerCommand): void {
    this.commands.push(command);
  }

  addPlayer(id: string, team: TeamId, location: ViewerLocation): Outcome<Player> {
    return this.players.add(id, team, location);
  }

  removePlayer(id: string): boolean {
    this.vision.drop(id);
    return this.players.remove(id);
  }

  apply(command: PlayerCommand): CommandOutcome {
    const outcome = this.dispatch(command);
    return outcome.ok ? { command, ok: true } : { command, ok: false, error: outcome.error };
  }

  step(dt: number): TickResult {
    const outcomes = this.commands.drain().map((command) => this.apply(command));
    this.world.advanceContainers(dt);

    const visibility = this.world.withReadLock(() => {
      const results = new Map<string, VisibilityResult>();
      for (const player of this.players.list()) {
        results.set(player.id, this.vision.compute(player.id, player.location));
      }
      return results;
    });

    const version = this.world.structuralVersion;
    for (const result of visibility.values()) {
      this.vision.assertFresh(result, version);
    }
    this.tickCount += 1;
    return { tick: this.tickCount, version, outcomes, visibility };
  }

  /** Current visibility payload for a player, or null when the player is unknown. */
  report(viewerId: string): VisibilityReport | null {
    const player = this.players.get(viewerId);
    if (!player) return null;
    const result = this.vision.compute(player.id, player.location);
    return buildVisibilityReport(this.world, result);
  }

  private dispatch(command: PlayerCommand): Outcome<unknown> {
    switch (command.kind) {
      case 'move':
        return this.players.move(command.playerId, command.position);
      case 'enter':
        return this.players.enter(command.playerId, command.containerId);
      case 'exit':
        return this.players.exit(command.playerId);
      case 'climb':
        return this.players.climb(command.playerId);
      case 'interact':
        return this.players.interact(command.playerId, command.target);
    }
  }
}
