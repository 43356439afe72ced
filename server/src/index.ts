import { Server as SocketIOServer } from "socket.io";
import { pino } from "pino";
import { DEFAULT_PHYSICS_PARAMS } from "@verletbox/shared";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { buildApp } from "./app.js";
import { SimulationRoom } from "./rooms/SimulationRoom.js";
import { attachViewers } from "./net/viewers.js";
import { SOCKET_PATH } from "./net/events.js";
import { createInitialParticles } from "./world/initial.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const room = new SimulationRoom(logger.child({ room: "sim" }), {
    bounds: config.bounds,
    particles: createInitialParticles(),
    params: {
      ...DEFAULT_PHYSICS_PARAMS,
      gravity: config.gravity,
      substeps: config.substeps
    },
    spawn: {
      intervalSec: config.spawnIntervalSec,
      maxParticles: config.maxParticles
    },
    tickEveryMs: config.tickEveryMs
  });

  const app = await buildApp(room, logger);

  const io = new SocketIOServer(app.server, {
    path: SOCKET_PATH,
    cors: {
      origin: true,
      methods: ["GET", "POST"]
    }
  });
  attachViewers(io, room, logger.child({ channel: "viewers" }), config.displayScale);

  await app.listen({ port: config.port, host: config.host });
  room.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    room.stop();
    io.disconnectSockets(true);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  pino().fatal({ err }, "startup failed");
  process.exit(1);
});
