// outcome.ts
// Summary: Result type for world mutations and the error classes reserved for programmer bugs.
// Structure: WorldErrorCode union -> Outcome helpers -> StaleResultError -> dangling reference logging.
// Usage: return fail('occupied-tile', `tile ${key} already holds entity ${id}`);
// ---------------------------------------------------------------------------

export type WorldErrorCode =
  | 'occupied-tile'
  | 'invalid-position'
  | 'unknown-container'
  | 'unknown-entity'
  | 'unknown-player'
  | 'blocked'
  | 'wrong-team'
  | 'no-connector'
  | 'world-locked';

export interface WorldError {
  readonly code: WorldErrorCode;
  readonly message: string;
}

export type Outcome<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: WorldError };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: WorldErrorCode, message: string): Outcome<T> {
  return { ok: false, error: { code, message } };
}

/**
 * Raised when a visibility result is handed out against a newer structural version than it was
 * computed for. Seeing this means cache invalidation is broken.
 */
export class StaleResultError extends Error {
  constructor(
    readonly viewerId: string,
    readonly resultVersion: number,
    readonly worldVersion: number
  ) {
    super(`Stale visibility for ${viewerId}: computed at version ${resultVersion}, world is at ${worldVersion}`);
    this.name = 'StaleResultError';
  }
}

export function warnDanglingReference(location: string, entity: number, deferred: boolean): void {
  console.warn(
    `Dangling entity reference ${entity} at ${location}; treating as empty${deferred ? ' (clear deferred)' : ''}`
  );
}
