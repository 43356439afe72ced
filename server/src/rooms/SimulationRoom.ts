import type { Logger } from "pino";
import {
  DEFAULT_PHYSICS_PARAMS,
  DEFAULT_SPAWN_OPTIONS,
  SpawnScheduler,
  makeFrameSnapshot,
  stepParticlesInPlace,
  type BoundsState,
  type FrameSnapshot,
  type ParticleState,
  type PhysicsParams,
  type ServerToClient,
  type SpawnOptions,
  type StepResult
} from "@verletbox/shared";

export type FrameListener = (msg: ServerToClient) => void;

export type SimulationRoomOptions = {
  bounds: BoundsState;
  particles: ParticleState[];
  params?: PhysicsParams;
  spawn?: Partial<SpawnOptions>;
  tickEveryMs?: number;
};

/**
 * Owns one particle collection and drives it with a fixed frame delta.
 * Spawned particles join between frames, never during a step.
 */
export class SimulationRoom {
  readonly bounds: BoundsState;
  private readonly log: Logger;
  private readonly params: PhysicsParams;
  private readonly particles: ParticleState[];
  private readonly spawner: SpawnScheduler;
  private readonly maxParticles: number;
  private readonly listeners = new Set<FrameListener>();
  private interval: NodeJS.Timeout | null = null;
  private frame = 0;
  private capReported = false;

  readonly tickEveryMs: number;
  private readonly dt: number;

  constructor(log: Logger, opts: SimulationRoomOptions) {
    this.log = log;
    this.bounds = opts.bounds;
    this.particles = opts.particles;
    this.params = opts.params ?? DEFAULT_PHYSICS_PARAMS;
    this.spawner = new SpawnScheduler(opts.spawn);
    this.maxParticles = opts.spawn?.maxParticles ?? DEFAULT_SPAWN_OPTIONS.maxParticles;
    this.tickEveryMs = opts.tickEveryMs ?? 16;
    this.dt = this.tickEveryMs / 1000;
  }

  get frameCount(): number {
    return this.frame;
  }

  get particleCount(): number {
    return this.particles.length;
  }

  get running(): boolean {
    return this.interval !== null;
  }

  start() {
    if (this.interval) return;
    this.interval = setInterval(() => this.advance(), this.tickEveryMs);
    this.log.info({ tickEveryMs: this.tickEveryMs, particles: this.particles.length }, "simulation started");
  }

  stop() {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    this.log.info({ frame: this.frame }, "simulation stopped");
  }

  subscribe(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  advance(): StepResult {
    for (const p of this.spawner.tick(this.dt, this.particles.length)) {
      this.particles.push(p);
      this.log.info({ id: p.id, particles: this.particles.length }, "particle spawned");
    }
    if (this.particles.length >= this.maxParticles && !this.capReported) {
      this.capReported = true;
      this.log.info({ maxParticles: this.maxParticles }, "spawn cap reached");
    }

    const res = stepParticlesInPlace(this.particles, this.bounds, this.dt, this.params);
    this.frame++;
    this.log.debug({ frame: this.frame, contacts: res.contacts, wallHits: res.wallHits }, "frame stepped");

    this.broadcast({ t: "frame/snapshot", snapshot: this.makeSnapshot() });
    return res;
  }

  makeSnapshot(): FrameSnapshot {
    return makeFrameSnapshot(this.frame, this.bounds, this.particles, Date.now());
  }

  private broadcast(msg: ServerToClient) {
    for (const listener of this.listeners) listener(msg);
  }
}
