// hullsight-server.ts
// Summary: Entry point hosting an Express health endpoint and the Colyseus transport for mech rooms.
// Structure: configuration -> express setup -> Colyseus bootstrap -> room definition -> server start.
// Usage: Run with `npm start` (tsx executes this file); set PORT and the VISION_* variables to tune.
// ---------------------------------------------------------------------------

import express from 'express';
import http from 'node:http';
import { fileURLToPath } from 'node:url';
import { matchMaker, Server as ColyseusServer } from 'colyseus';
import { WebSocketTransport } from '@colyseus/ws-transport';

import { loadConfig } from './config.js';
import { createHealthHandler } from './health.js';
import { MechRoom } from './game/mech-room.js';

export const MECH_ROOM = 'mech';

const config = loadConfig();

const app = express();
const server = http.createServer(app);
const gameServer = new ColyseusServer({
  transport: new WebSocketTransport({
    server,
    path: '/colyseus'
  })
});

app.get(
  '/api/health',
  createHealthHandler(async () => (await matchMaker.query({ name: MECH_ROOM })).length)
);

gameServer.define(MECH_ROOM, MechRoom, { config });

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await gameServer.listen(config.port);
  console.log(`Hullsight server and Colyseus transport running on port ${config.port}`);
}

export { app, server, config };
