import type { Axis, BoundsState, ParticleId, ParticleState } from "../state/types.js";
import { colliding, resolveCollision } from "./collision.js";
import { integrate } from "./integrate.js";
import { DEFAULT_PHYSICS_PARAMS, substepCount, type PhysicsParams } from "./params.js";
import { applyAcceleration } from "./particle.js";

export type PhysicsEvent =
  | { kind: "particle_particle"; a: ParticleId; b: ParticleId }
  | { kind: "particle_wall"; particle: ParticleId; axis: Axis };

export type StepResult = {
  substeps: number;
  contacts: number;
  wallHits: number;
  events: PhysicsEvent[];
};

/**
 * Advances every particle by one frame. The frame is split into equal
 * substeps; each substep integrates all particles first and only then
 * resolves every overlapping pair (naive O(n^2) enumeration).
 *
 * The collection must not change while this runs.
 */
export function stepParticlesInPlace(
  particles: ParticleState[],
  bounds: BoundsState,
  dtFrame: number,
  params: PhysicsParams = DEFAULT_PHYSICS_PARAMS
): StepResult {
  const substeps = substepCount(params);
  const subDt = dtFrame / substeps;
  const events: PhysicsEvent[] = [];
  let contacts = 0;
  let wallHits = 0;

  for (let s = 0; s < substeps; s++) {
    for (const p of particles) {
      applyAcceleration(p, 0, params.gravity);
      for (const axis of integrate(p, bounds, subDt, params)) {
        wallHits++;
        events.push({ kind: "particle_wall", particle: p.id, axis });
      }
    }

    for (let i = 0; i < particles.length; i++) {
      const a = particles[i];
      if (!a) continue;
      for (let j = i + 1; j < particles.length; j++) {
        const b = particles[j];
        if (!b || !colliding(a, b)) continue;
        resolveCollision(a, b, params);
        contacts++;
        events.push({ kind: "particle_particle", a: a.id, b: b.id });
      }
    }
  }

  return { substeps, contacts, wallHits, events };
}
