import type { Logger } from "pino";
import type { Server as SocketIOServer } from "socket.io";
import { PROTOCOL_VERSION, isClientToServer, type ServerToClient } from "@verletbox/shared";
import type { SimulationRoom } from "../rooms/SimulationRoom.js";
import { SOCKET_EVENT } from "./events.js";

export function replyToViewer(room: SimulationRoom, raw: unknown): ServerToClient {
  if (!isClientToServer(raw)) {
    return { t: "error", code: "bad_message", message: "Unrecognized message." };
  }

  switch (raw.t) {
    case "ping":
      return { t: "pong", clientTimeMs: raw.clientTimeMs, serverTimeMs: Date.now() };
    case "frame/request":
      return { t: "frame/snapshot", snapshot: room.makeSnapshot() };
  }
}

export function attachViewers(io: SocketIOServer, room: SimulationRoom, log: Logger, displayScale: number) {
  io.on("connection", (socket) => {
    log.info({ sid: socket.id }, "viewer connected");

    socket.emit(SOCKET_EVENT, {
      t: "hello",
      protocol: PROTOCOL_VERSION,
      sid: socket.id,
      displayScale,
      bounds: room.bounds
    } satisfies ServerToClient);
    socket.emit(SOCKET_EVENT, {
      t: "frame/snapshot",
      snapshot: room.makeSnapshot()
    } satisfies ServerToClient);

    socket.on(SOCKET_EVENT, (raw: unknown) => {
      socket.emit(SOCKET_EVENT, replyToViewer(room, raw));
    });

    socket.on("disconnect", (reason) => {
      log.info({ sid: socket.id, reason }, "viewer disconnected");
    });
  });

  return room.subscribe((msg) => {
    io.emit(SOCKET_EVENT, msg);
  });
}
