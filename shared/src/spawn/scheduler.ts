import type { ParticleId, ParticleState } from "../state/types.js";
import type { Vec2 } from "../math/vec2.js";
import { createParticle } from "../physics/particle.js";

export type SpawnOptions = {
  // Seconds between spawns.
  intervalSec: number;
  firstId: ParticleId;
  origin: Vec2;
  // Initial velocity, in units per substep (see createParticle).
  velocity: Vec2;
  color: number;
  // No spawn once the active set reaches this size.
  maxParticles: number;
};

export const DEFAULT_SPAWN_OPTIONS: SpawnOptions = {
  intervalSec: 5,
  firstId: 10,
  origin: { x: 0, y: 20 },
  velocity: { x: 0.05, y: 0 },
  color: 1,
  maxParticles: 256
};

/**
 * Repeating timer that hands out new particles. The host applies them
 * between frames; the scheduler never touches the active collection.
 */
export class SpawnScheduler {
  private readonly opts: SpawnOptions;
  private elapsed = 0;
  private next: ParticleId;

  constructor(opts: Partial<SpawnOptions> = {}) {
    this.opts = { ...DEFAULT_SPAWN_OPTIONS, ...opts };
    if (!Number.isFinite(this.opts.intervalSec) || this.opts.intervalSec <= 0) {
      throw new RangeError(`Spawn interval must be a positive number, got ${this.opts.intervalSec}`);
    }
    this.next = this.opts.firstId;
  }

  get nextId(): ParticleId {
    return this.next;
  }

  /**
   * Emits one particle per whole interval elapsed since the last spawn.
   * Intervals that elapse while the cap is reached are dropped, not queued.
   */
  tick(dt: number, activeCount: number): ParticleState[] {
    this.elapsed += dt;
    const spawned: ParticleState[] = [];

    while (this.elapsed >= this.opts.intervalSec) {
      this.elapsed -= this.opts.intervalSec;
      if (activeCount + spawned.length >= this.opts.maxParticles) continue;

      const { origin, velocity } = this.opts;
      spawned.push(
        createParticle(this.next, origin.x, origin.y, velocity.x, velocity.y, {
          color: this.opts.color
        })
      );
      this.next++;
    }

    return spawned;
  }
}
