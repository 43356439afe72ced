import { afterEach, describe, expect, it, vi } from "vitest";
import { pino } from "pino";
import { createBounds, type FrameSnapshot, type ServerToClient } from "@verletbox/shared";
import { SimulationRoom, type SimulationRoomOptions } from "../src/rooms/SimulationRoom.js";
import { createInitialParticles } from "../src/world/initial.js";

function room(opts: Partial<SimulationRoomOptions> = {}): SimulationRoom {
  return new SimulationRoom(pino({ level: "silent" }), {
    bounds: createBounds(0, 0, 21, 50),
    particles: createInitialParticles(),
    tickEveryMs: 250,
    spawn: { intervalSec: 0.5 },
    ...opts
  });
}

function snapshots(msgs: ServerToClient[]): FrameSnapshot[] {
  return msgs.flatMap((m) => (m.t === "frame/snapshot" ? [m.snapshot] : []));
}

describe("SimulationRoom", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("steps one frame per advance and broadcasts the result", () => {
    const r = room();
    const seen: ServerToClient[] = [];
    r.subscribe((m) => seen.push(m));

    const res = r.advance();

    expect(res.substeps).toBe(8);
    expect(r.frameCount).toBe(1);
    const snaps = snapshots(seen);
    expect(snaps.length).toBe(1);
    expect(snaps[0]!.frame).toBe(1);
    expect(snaps[0]!.particles.map((p) => p.id)).toEqual([0]);
    // Falling under gravity.
    expect(snaps[0]!.particles[0]!.y).toBeLessThan(20);
  });

  it("adds spawned particles before the frame is stepped", () => {
    const r = room();
    const seen: ServerToClient[] = [];
    r.subscribe((m) => seen.push(m));

    r.advance();
    r.advance();

    const last = snapshots(seen)[1]!;
    expect(last.frame).toBe(2);
    expect(last.particles.map((p) => p.id)).toEqual([0, 10]);
    // Already moved by one frame from its spawn point.
    expect(last.particles[1]!.x).toBeGreaterThan(0);
    expect(last.particles[1]!.y).toBeLessThan(20);
  });

  it("stops spawning at the cap", () => {
    const r = room({ spawn: { intervalSec: 0.25, maxParticles: 2 } });

    for (let i = 0; i < 3; i++) r.advance();

    expect(r.particleCount).toBe(2);
    expect(r.makeSnapshot().particles.map((p) => p.id)).toEqual([0, 10]);
  });

  it("stops notifying after unsubscribe", () => {
    const r = room();
    const seen: ServerToClient[] = [];
    const off = r.subscribe((m) => seen.push(m));

    r.advance();
    off();
    r.advance();

    expect(seen.length).toBe(1);
  });

  it("ticks on its interval until stopped", () => {
    vi.useFakeTimers();
    const r = room();

    r.start();
    r.start();
    expect(r.running).toBe(true);
    vi.advanceTimersByTime(1000);
    expect(r.frameCount).toBe(4);

    r.stop();
    vi.advanceTimersByTime(1000);
    expect(r.frameCount).toBe(4);
    expect(r.running).toBe(false);
  });
});
