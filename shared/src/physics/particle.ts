import type { ParticleId, ParticleState } from "../state/types.js";
import { sub, type Vec2 } from "../math/vec2.js";

export type ParticleOptions = {
  radius?: number;
  color?: number;
};

export const DEFAULT_PARTICLE_RADIUS = 1;

/**
 * Builds a particle whose previous position sits one velocity step behind,
 * so the first integration sees exactly (velX, velY) as its implicit velocity.
 */
export function createParticle(
  id: ParticleId,
  x: number,
  y: number,
  velX: number,
  velY: number,
  opts: ParticleOptions = {}
): ParticleState {
  return {
    id,
    pos: { x, y },
    prev: { x: x - velX, y: y - velY },
    acc: { x: 0, y: 0 },
    radius: opts.radius ?? DEFAULT_PARTICLE_RADIUS,
    color: opts.color ?? 0
  };
}

export function velocityOf(p: ParticleState): Vec2 {
  return sub(p.pos, p.prev);
}

export function applyAcceleration(p: ParticleState, ax: number, ay: number) {
  p.acc.x += ax;
  p.acc.y += ay;
}

// A copy never carries a half-accumulated force.
export function cloneParticle(p: ParticleState): ParticleState {
  return {
    id: p.id,
    pos: { ...p.pos },
    prev: { ...p.prev },
    acc: { x: 0, y: 0 },
    radius: p.radius,
    color: p.color
  };
}
