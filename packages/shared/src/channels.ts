// channels.ts
// Summary: Command/event channel catalogs shared by the server room and clients.
// Structure: Literal maps plus the union types derived from them. Kept apart from schema.ts so
//            code that only parses commands does not load the decorated schema classes.
// Usage: room.onMessage(GAME_COMMAND.Move, handler);
// ---------------------------------------------------------------------------

/**
 * Message channels for client -> server commands.
 */
export const GAME_COMMAND = {
  Move: 'cmd:player:move',
  Enter: 'cmd:player:enter',
  Exit: 'cmd:player:exit',
  Climb: 'cmd:player:climb',
  Interact: 'cmd:player:interact'
} as const;
export type GameCommand = (typeof GAME_COMMAND)[keyof typeof GAME_COMMAND];

/**
 * Message channels for server -> client events that are not covered by schema replication.
 */
export const GAME_EVENT = {
  Visibility: 'evt:player:visibility',
  CommandRejected: 'evt:error:command-rejected',
  JoinDenied: 'evt:error:join-denied'
} as const;
export type GameEvent = (typeof GAME_EVENT)[keyof typeof GAME_EVENT];
