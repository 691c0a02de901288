// commands.ts
// Summary: Player command model, validation of raw client payloads into commands, and the queue that
//          buffers them between simulation ticks.
// Structure: PlayerCommand union -> payload helpers -> parseCommand -> CommandQueue.
// Usage: const command = parseCommand(client.sessionId, GAME_COMMAND.Move, message); if (command) queue.push(command);
// ---------------------------------------------------------------------------

import { GAME_COMMAND, type TilePos, type WorldPos } from '@hullsight/shared';

export type PlayerCommand =
  | { kind: 'move'; playerId: string; position: WorldPos }
  | { kind: 'enter'; playerId: string; containerId: string }
  | { kind: 'exit'; playerId: string }
  | { kind: 'climb'; playerId: string }
  | { kind: 'interact'; playerId: string; target: TilePos };

export type CommandKind = PlayerCommand['kind'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function integer(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

/**
 * Validates a raw message from `channel`. Returns null for unknown channels and malformed payloads;
 * the player id always comes from the session, never from the payload.
 */
export function parseCommand(playerId: string, channel: string, payload: unknown): PlayerCommand | null {
  switch (channel) {
    case GAME_COMMAND.Move: {
      if (!isRecord(payload)) return null;
      const x = finiteNumber(payload.x);
      const y = finiteNumber(payload.y);
      if (x === undefined || y === undefined) return null;
      return { kind: 'move', playerId, position: { x, y } };
    }
    case GAME_COMMAND.Enter: {
      const containerId = isRecord(payload) ? payload.containerId : payload;
      if (typeof containerId !== 'string' || containerId.length === 0) return null;
      return { kind: 'enter', playerId, containerId };
    }
    case GAME_COMMAND.Exit:
      return { kind: 'exit', playerId };
    case GAME_COMMAND.Climb:
      return { kind: 'climb', playerId };
    case GAME_COMMAND.Interact: {
      if (!isRecord(payload)) return null;
      const x = integer(payload.x);
      const y = integer(payload.y);
      if (x === undefined || y === undefined) return null;
      return { kind: 'interact', playerId, target: { x, y } };
    }
    default:
      return null;
  }
}

export class CommandQueue {
  private pending: PlayerCommand[] = [];

  get size(): number {
    return this.pending.length;
  }

  push(command: PlayerCommand): void {
    this.pending.push(command);
  }

  /** Removes and returns every queued command in arrival order. */
  drain(): PlayerCommand[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }
}
