import type { BoundsState, FrameSnapshot, ParticleState, ParticleView } from "./types.js";

// Screen units per simulation unit suggested to renderers.
export const DEFAULT_DISPLAY_SCALE = 20;

export function toParticleView(p: ParticleState): ParticleView {
  return { id: p.id, x: p.pos.x, y: p.pos.y, radius: p.radius, color: p.color };
}

export function makeFrameSnapshot(
  frame: number,
  bounds: BoundsState,
  particles: readonly ParticleState[],
  serverTimeMs: number
): FrameSnapshot {
  return {
    frame,
    serverTimeMs,
    bounds: { ...bounds },
    particles: particles.map(toParticleView)
  };
}
