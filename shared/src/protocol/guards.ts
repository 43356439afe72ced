import type { ClientToServer } from "./messages.js";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

export function isClientToServer(v: unknown): v is ClientToServer {
  if (!isRecord(v) || typeof v.t !== "string") return false;

  switch (v.t) {
    case "frame/request":
      return true;
    case "ping":
      return isFiniteNumber(v.clientTimeMs);
    default:
      return false;
  }
}
