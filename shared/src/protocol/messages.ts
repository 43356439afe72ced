import type { BoundsState, FrameSnapshot } from "../state/types.js";

export const PROTOCOL_VERSION = 1 as const;

// Viewers are read-only: nothing they send changes the simulation.
export type ClientToServer =
  | {
      t: "frame/request";
    }
  | {
      t: "ping";
      clientTimeMs: number;
    };

export type ServerToClient =
  | {
      t: "hello";
      protocol: typeof PROTOCOL_VERSION;
      sid: string;
      displayScale: number;
      bounds: BoundsState;
    }
  | {
      t: "frame/snapshot";
      snapshot: FrameSnapshot;
    }
  | {
      t: "pong";
      clientTimeMs: number;
      serverTimeMs: number;
    }
  | {
      t: "error";
      code: string;
      message: string;
    };
