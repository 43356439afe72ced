import type { Axis, BoundsState, ParticleState } from "../state/types.js";
import { constrainParticle } from "./bounds.js";
import { DEFAULT_PHYSICS_PARAMS, type PhysicsParams } from "./params.js";

/**
 * Advances one particle by a single Verlet substep, then applies the
 * boundary constraint (horizontal first, then vertical).
 *
 * Friction damps the implicit velocity once per call, so the effective drag
 * depends on the substep count.
 *
 * @returns the axes on which the particle hit a wall
 */
export function integrate(
  p: ParticleState,
  bounds: BoundsState,
  dt: number,
  params: PhysicsParams = DEFAULT_PHYSICS_PARAMS
): Axis[] {
  const vx = (p.pos.x - p.prev.x) * params.friction;
  const vy = (p.pos.y - p.prev.y) * params.friction;

  p.prev.x = p.pos.x;
  p.prev.y = p.pos.y;

  const dt2 = dt * dt;
  p.pos.x += vx + p.acc.x * dt2;
  p.pos.y += vy + p.acc.y * dt2;

  p.acc.x = 0;
  p.acc.y = 0;

  const hits: Axis[] = [];
  if (constrainParticle(bounds, p, "horizontal", params)) hits.push("horizontal");
  if (constrainParticle(bounds, p, "vertical", params)) hits.push("vertical");
  return hits;
}
