import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      host: "0.0.0.0",
      logLevel: "info",
      tickEveryMs: 16,
      spawnIntervalSec: 5,
      maxParticles: 256,
      bounds: { minX: 0, maxX: 21, minY: 0, maxY: 50 },
      gravity: -9.8,
      substeps: 8,
      displayScale: 20
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: " ",
      LOG_LEVEL: "debug",
      BOUNDS: "-10, -12, 10, 100",
      GRAVITY: "-100",
      SUBSTEPS: "4"
    });

    expect(config.port).toBe(8080);
    expect(config.host).toBe("0.0.0.0");
    expect(config.logLevel).toBe("debug");
    expect(config.bounds).toEqual({ minX: -10, maxX: 10, minY: -12, maxY: 100 });
    expect(config.gravity).toBe(-100);
    expect(config.substeps).toBe(4);
  });

  it("names the variable that is wrong", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrowError(ConfigError);
    expect(() => loadConfig({ PORT: "70000" })).toThrowError(/^PORT:/);
    expect(() => loadConfig({ MAX_PARTICLES: "2.5" })).toThrowError(/^MAX_PARTICLES:/);
    expect(() => loadConfig({ TICK_MS: "0" })).toThrowError(/^TICK_MS:/);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrowError(/^LOG_LEVEL:/);
  });

  it("validates bounds", () => {
    expect(() => loadConfig({ BOUNDS: "0,0,21" })).toThrowError(/^BOUNDS: expected four numbers/);
    expect(() => loadConfig({ BOUNDS: "a,b,c,d" })).toThrowError(/^BOUNDS: expected four numbers/);
    expect(() => loadConfig({ BOUNDS: "5,0,1,50" })).toThrowError(/^BOUNDS: min must be below max/);

    try {
      loadConfig({ BOUNDS: "0,0,0,0" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) expect(err.variable).toBe("BOUNDS");
    }
  });
});
