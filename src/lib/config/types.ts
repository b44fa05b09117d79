// Path: src/lib/config/types.ts
// Configuration type definitions

import type { SimulatedSurfaceKind } from '../transport/simulated.js';

/**
 * Rotation timing, in seconds
 */
export interface RotationConfig {
  /** Seconds between timer-driven rotations (0 disables the timer) */
  rotateIntervalSeconds: number;
  /** Upper bound of the slack added to each interval */
  jitterSeconds: number;
  /** Minimum time between two rotation attempts on one connection */
  minGapSeconds: number;
  /** Restart the minimum gap after a failed attempt too (default: true) */
  resetGapOnFailure: boolean;
}

/**
 * Simulated transport settings
 */
export interface SimulationConfig {
  /** Connections opened when the server starts */
  connections: number;
  /** Rotation surface exposed by simulated endpoints */
  surface: SimulatedSurfaceKind;
  /** Close each connection after this many seconds (0 = never) */
  autoCloseSeconds: number;
}

/**
 * Rotor configuration
 */
export interface RotorConfig {
  rotation: RotationConfig;
  /** JSONL file rotation events are appended to */
  rotationLogPath: string;
  /** Wake-up period of the per-connection rotation loop */
  tickIntervalMs: number;
  /** Bound on a rotation operation that returns a promise */
  strategyTimeoutMs: number;
  /** Delay before a new connection's first tick */
  initialDelayMs: number;
  simulation: SimulationConfig;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: RotorConfig = {
  rotation: {
    rotateIntervalSeconds: 30,
    jitterSeconds: 3,
    minGapSeconds: 10,
    resetGapOnFailure: true,
  },
  rotationLogPath: './logs/rotation.jsonl',
  tickIntervalMs: 200,
  strategyTimeoutMs: 250,
  initialDelayMs: 800,
  simulation: {
    connections: 2,
    surface: 'manager-rotate',
    autoCloseSeconds: 0,
  },
};

/**
 * Fresh copy of the defaults; callers may mutate the result.
 */
export function defaultConfig(): RotorConfig {
  return {
    ...DEFAULT_CONFIG,
    rotation: { ...DEFAULT_CONFIG.rotation },
    simulation: { ...DEFAULT_CONFIG.simulation },
  };
}
