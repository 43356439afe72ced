export type PhysicsParams = {
  // Vertical acceleration applied to every particle each substep (units/s^2, +y is up).
  gravity: number;
  // Velocity multiplier per substep (0..1). Also scales wall reflection and collision push.
  friction: number;
  // Attenuation of the reflected velocity on a wall hit (0..1).
  bounce: number;
  // Substeps per frame. Floored, and never less than 1.
  substeps: number;
};

export const DEFAULT_PHYSICS_PARAMS: PhysicsParams = {
  gravity: -9.8,
  friction: 0.99,
  bounce: 0.95,
  substeps: 8
};

export function substepCount(params: PhysicsParams): number {
  const n = Math.floor(params.substeps);
  return Number.isFinite(n) && n >= 1 ? n : 1;
}
