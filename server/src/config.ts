import type { LevelWithSilent } from "pino";
import {
  DEFAULT_DISPLAY_SCALE,
  DEFAULT_PHYSICS_PARAMS,
  DEFAULT_SPAWN_OPTIONS,
  createBounds,
  type BoundsState
} from "@verletbox/shared";

export type HostConfig = {
  port: number;
  host: string;
  logLevel: LevelWithSilent;
  tickEveryMs: number;
  spawnIntervalSec: number;
  maxParticles: number;
  bounds: BoundsState;
  gravity: number;
  substeps: number;
  displayScale: number;
};

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly LevelWithSilent[];

function raw(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  accept: (n: number) => boolean,
  expected: string
): number {
  const value = raw(env, name);
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isFinite(n) || !accept(n)) {
    throw new ConfigError(name, `expected ${expected}, got "${value}"`);
  }
  return n;
}

const positive = (n: number) => n > 0;
const positiveInt = (n: number) => Number.isInteger(n) && n > 0;

function readLogLevel(env: Env): LevelWithSilent {
  const value = raw(env, "LOG_LEVEL");
  if (value === undefined) return "info";
  const level = LOG_LEVELS.find((l) => l === value);
  if (!level) throw new ConfigError("LOG_LEVEL", `expected one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  return level;
}

// BOUNDS=minX,minY,maxX,maxY
function readBounds(env: Env): BoundsState {
  const value = raw(env, "BOUNDS");
  if (value === undefined) return createBounds(0, 0, 21, 50);

  const parts = value.split(",").map((s) => Number(s.trim()));
  const [minX, minY, maxX, maxY] = parts;
  if (
    parts.length !== 4 ||
    minX === undefined ||
    minY === undefined ||
    maxX === undefined ||
    maxY === undefined ||
    !parts.every(Number.isFinite)
  ) {
    throw new ConfigError("BOUNDS", `expected four numbers "minX,minY,maxX,maxY", got "${value}"`);
  }
  if (minX >= maxX || minY >= maxY) {
    throw new ConfigError("BOUNDS", `min must be below max on both axes, got "${value}"`);
  }
  return createBounds(minX, minY, maxX, maxY);
}

export function loadConfig(env: Env = process.env): HostConfig {
  return {
    port: readNumber(env, "PORT", 3001, (n) => Number.isInteger(n) && n >= 0 && n <= 65535, "a port number"),
    host: raw(env, "HOST") ?? "0.0.0.0",
    logLevel: readLogLevel(env),
    tickEveryMs: readNumber(env, "TICK_MS", 16, positive, "a positive number"),
    spawnIntervalSec: readNumber(env, "SPAWN_INTERVAL_SEC", DEFAULT_SPAWN_OPTIONS.intervalSec, positive, "a positive number"),
    maxParticles: readNumber(env, "MAX_PARTICLES", DEFAULT_SPAWN_OPTIONS.maxParticles, positiveInt, "a positive integer"),
    bounds: readBounds(env),
    gravity: readNumber(env, "GRAVITY", DEFAULT_PHYSICS_PARAMS.gravity, () => true, "a number"),
    substeps: readNumber(env, "SUBSTEPS", DEFAULT_PHYSICS_PARAMS.substeps, positiveInt, "a positive integer"),
    displayScale: readNumber(env, "DISPLAY_SCALE", DEFAULT_DISPLAY_SCALE, positive, "a positive number")
  };
}
