import { createParticle, type ParticleState } from "@verletbox/shared";

// The world opens with one particle drifting right from mid-height.
export function createInitialParticles(): ParticleState[] {
  return [createParticle(0, 5, 20, 0.1, 0, { color: 0 })];
}
