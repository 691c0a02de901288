// config.ts
// Summary: Environment-driven server configuration: port, tick rate, visibility tuning and spawn points.
// Structure: Defaults table -> small numeric parsers -> loadConfig which assembles a ServerConfig.
// Usage: const config = loadConfig(); new Simulation({ vision: config.vision });
// ---------------------------------------------------------------------------

import { tileToWorld, type WorldPos } from '@hullsight/shared';

import type { TeamId } from './world/container.js';

export interface VisibilitySettings {
  /** Rays cast per viewer per recomputation. */
  rayCount: number;
  /** Ray sampling step in tiles. */
  stepTiles: number;
  maxRangeTiles: number;
  /** Movement below this distance (in tiles) reuses the cached result. */
  deadZoneTiles: number;
  windowHalfAngleDegrees: number;
  windowRangeTiles: number;
  windowConeAttenuation: number;
}

export interface TeamSpawn {
  mech: WorldPos;
  player: WorldPos;
}

export interface ServerConfig {
  port: number;
  tickIntervalMs: number;
  vision: VisibilitySettings;
  spawns: Record<TeamId, TeamSpawn>;
}

export const DEFAULT_VISIBILITY: Readonly<VisibilitySettings> = Object.freeze({
  rayCount: 360,
  stepTiles: 0.25,
  maxRangeTiles: 15,
  deadZoneTiles: 0.1,
  windowHalfAngleDegrees: 30,
  windowRangeTiles: 8,
  windowConeAttenuation: 0.3
});

export const DEFAULT_PORT = 2567;
export const DEFAULT_TICK_INTERVAL_MS = 50;

export function defaultSpawns(): Record<TeamId, TeamSpawn> {
  return {
    red: { mech: tileToWorld({ x: 20, y: 20 }), player: tileToWorld({ x: 15, y: 20 }) },
    blue: { mech: tileToWorld({ x: 80, y: 80 }), player: tileToWorld({ x: 75, y: 80 }) }
  };
}

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10) || fallback;
  return parsed > 0 ? parsed : fallback;
}

function positiveFloat(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    tickIntervalMs: positiveInt(env.TICK_INTERVAL_MS, DEFAULT_TICK_INTERVAL_MS),
    vision: {
      rayCount: positiveInt(env.VISION_RAY_COUNT, DEFAULT_VISIBILITY.rayCount),
      stepTiles: positiveFloat(env.VISION_STEP_TILES, DEFAULT_VISIBILITY.stepTiles),
      maxRangeTiles: positiveFloat(env.VISION_RANGE_TILES, DEFAULT_VISIBILITY.maxRangeTiles),
      deadZoneTiles: positiveFloat(env.VISION_DEAD_ZONE_TILES, DEFAULT_VISIBILITY.deadZoneTiles),
      windowHalfAngleDegrees: positiveFloat(
        env.WINDOW_HALF_ANGLE_DEGREES,
        DEFAULT_VISIBILITY.windowHalfAngleDegrees
      ),
      windowRangeTiles: positiveFloat(env.WINDOW_RANGE_TILES, DEFAULT_VISIBILITY.windowRangeTiles),
      windowConeAttenuation: positiveFloat(
        env.WINDOW_CONE_ATTENUATION,
        DEFAULT_VISIBILITY.windowConeAttenuation
      )
    },
    spawns: defaultSpawns()
  };
}
