// health.ts
// Summary: Express handler reporting server liveness and the number of active mech rooms.
// Structure: Response contract, HealthStatus payload type and a factory taking the room counter.
// Usage: app.get('/api/health', createHealthHandler(countRooms));
// ---------------------------------------------------------------------------

/** The part of an Express response the handler writes to. */
export interface JsonResponder {
  json(body: unknown): unknown;
  status(code: number): JsonResponder;
}

export interface HealthStatus {
  status: 'ok';
  rooms: number;
}

/** Builds the health handler around a room counter so it can run without a live matchmaker. */
export function createHealthHandler(countRooms: () => Promise<number>) {
  return async (_req: unknown, res: JsonResponder): Promise<void> => {
    try {
      const body: HealthStatus = { status: 'ok', rooms: await countRooms() };
      res.json(body);
    } catch (error) {
      console.error('Health check failed', error);
      res.status(500).json({ error: 'health check failed' });
    }
  };
}
