import type { Axis, BoundsState, ParticleState } from "../state/types.js";
import { DEFAULT_PHYSICS_PARAMS, type PhysicsParams } from "./params.js";

export function createBounds(minX: number, minY: number, maxX: number, maxY: number): BoundsState {
  return { minX, maxX, minY, maxY };
}

export function containsPoint(bounds: BoundsState, x: number, y: number): boolean {
  return x >= bounds.minX && x <= bounds.maxX && y >= bounds.minY && y <= bounds.maxY;
}

/**
 * Clamps the particle to the bounds on one axis and reflects its implicit
 * velocity by moving `prev` to the far side of the wall.
 *
 * The reflected velocity is scaled by `friction` here even though the
 * integrator already applied it this substep. Both applications are part of
 * the physical model and tests depend on the combined factor.
 *
 * @returns whether the particle was clamped
 */
export function constrainParticle(
  bounds: BoundsState,
  p: ParticleState,
  axis: Axis,
  params: PhysicsParams = DEFAULT_PHYSICS_PARAMS
): boolean {
  const k = axis === "horizontal" ? "x" : "y";
  const min = axis === "horizontal" ? bounds.minX : bounds.minY;
  const max = axis === "horizontal" ? bounds.maxX : bounds.maxY;

  let wall: number;
  if (p.pos[k] > max) wall = max;
  else if (p.pos[k] < min) wall = min;
  else return false;

  const reflected = (p.pos[k] - p.prev[k]) * params.friction;
  p.pos[k] = wall;
  p.prev[k] = wall + reflected * params.bounce;
  return true;
}
