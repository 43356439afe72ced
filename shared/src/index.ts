export type { Vec2 } from "./math/vec2.js";
export { len, lenSq, sub } from "./math/vec2.js";

export { PROTOCOL_VERSION } from "./protocol/messages.js";
export type { ClientToServer, ServerToClient } from "./protocol/messages.js";
export { isClientToServer } from "./protocol/guards.js";

export type {
  Axis,
  BoundsState,
  FrameSnapshot,
  ParticleId,
  ParticleState,
  ParticleView
} from "./state/types.js";
export { DEFAULT_DISPLAY_SCALE, makeFrameSnapshot, toParticleView } from "./state/view.js";

export { DEFAULT_PHYSICS_PARAMS, substepCount } from "./physics/params.js";
export type { PhysicsParams } from "./physics/params.js";
export {
  DEFAULT_PARTICLE_RADIUS,
  applyAcceleration,
  cloneParticle,
  createParticle,
  velocityOf
} from "./physics/particle.js";
export type { ParticleOptions } from "./physics/particle.js";
export { constrainParticle, containsPoint, createBounds } from "./physics/bounds.js";
export { integrate } from "./physics/integrate.js";
export { COINCIDENT_NORMAL, colliding, distance, resolveCollision } from "./physics/collision.js";
export { stepParticlesInPlace } from "./physics/step.js";
export type { PhysicsEvent, StepResult } from "./physics/step.js";

export { DEFAULT_SPAWN_OPTIONS, SpawnScheduler } from "./spawn/scheduler.js";
export type { SpawnOptions } from "./spawn/scheduler.js";
