import Fastify from "fastify";
import cors from "@fastify/cors";
import type { Logger } from "pino";
import type { SimulationRoom } from "./rooms/SimulationRoom.js";

export async function buildApp(room: SimulationRoom, logger: Logger) {
  const app = Fastify({ loggerInstance: logger });

  await app.register(cors, {
    origin: true
  });

  app.get("/health", async () => ({
    ok: true,
    frame: room.frameCount,
    particles: room.particleCount
  }));

  // Read-only view for renderers that poll instead of subscribing.
  app.get("/snapshot", async () => room.makeSnapshot());

  return app;
}
