import { describe, expect, it } from "vitest";
import { createBounds } from "../src/physics/bounds.js";
import { createParticle } from "../src/physics/particle.js";
import { makeFrameSnapshot, toParticleView } from "../src/state/view.js";

describe("views", () => {
  it("exposes position and radius in simulation units", () => {
    const p = createParticle(3, 1.25, 7.5, 1, 1, { radius: 0.5, color: 2 });
    expect(toParticleView(p)).toEqual({ id: 3, x: 1.25, y: 7.5, radius: 0.5, color: 2 });
  });

  it("snapshots without sharing particle state", () => {
    const bounds = createBounds(0, 0, 21, 50);
    const particles = [createParticle(0, 5, 20, 0.1, 0)];

    const snap = makeFrameSnapshot(4, bounds, particles, 1000);
    particles[0]!.pos.x = 6;

    expect(snap).toEqual({
      frame: 4,
      serverTimeMs: 1000,
      bounds: { minX: 0, maxX: 21, minY: 0, maxY: 50 },
      particles: [{ id: 0, x: 5, y: 20, radius: 1, color: 0 }]
    });
  });
});
