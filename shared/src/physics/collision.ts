import type { ParticleState } from "../state/types.js";
import { len, sub, type Vec2 } from "../math/vec2.js";
import { DEFAULT_PHYSICS_PARAMS, type PhysicsParams } from "./params.js";

// Contact normal used when two centres coincide.
export const COINCIDENT_NORMAL: Readonly<Vec2> = { x: 1, y: 0 };

export function distance(a: ParticleState, b: ParticleState): number {
  return len(sub(a.pos, b.pos));
}

export function colliding(a: ParticleState, b: ParticleState): boolean {
  return a.radius + b.radius > distance(a, b);
}

/**
 * Pushes an overlapping pair apart along the contact normal, half the
 * penetration each (scaled by friction). Equal and opposite, no masses.
 *
 * Coincident centres use {@link COINCIDENT_NORMAL}: `a` moves towards +x and
 * `b` towards -x.
 */
export function resolveCollision(
  a: ParticleState,
  b: ParticleState,
  params: PhysicsParams = DEFAULT_PHYSICS_PARAMS
) {
  const d = sub(a.pos, b.pos);
  const dist = len(d);
  const n = dist === 0 ? COINCIDENT_NORMAL : { x: d.x / dist, y: d.y / dist };

  const delta = a.radius + b.radius - dist;
  const push = 0.5 * delta * params.friction;

  a.pos.x += push * n.x;
  a.pos.y += push * n.y;
  b.pos.x -= push * n.x;
  b.pos.y -= push * n.y;
}
