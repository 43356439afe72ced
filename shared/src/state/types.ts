import type { Vec2 } from "../math/vec2.js";

export type ParticleId = number;

export type ParticleState = {
  id: ParticleId;
  pos: Vec2;
  // Resolved position one substep ago; pos - prev is the implicit velocity.
  prev: Vec2;
  // Acceleration accumulated for the next substep only.
  acc: Vec2;
  radius: number;
  // Cosmetic, renderers pick the actual colour.
  color: number;
};

export type BoundsState = {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
};

export type Axis = "horizontal" | "vertical";

export type ParticleView = {
  id: ParticleId;
  x: number;
  y: number;
  radius: number;
  color: number;
};

export type FrameSnapshot = {
  frame: number;
  serverTimeMs: number;
  bounds: BoundsState;
  particles: ParticleView[];
};
