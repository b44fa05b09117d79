// Path: src/commands/options.ts
// Option parsing shared by the runtime commands

import { InvalidArgumentError } from 'commander';
import type { RotorConfig } from '../lib/config/index.js';
import { isSimulatedSurfaceKind, SIMULATED_SURFACE_KINDS } from '../lib/transport/simulated.js';
import type { RotationCommandOptions } from './types.js';

/**
 * Commander argument parser for non-negative numbers
 */
export function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

/**
 * Commander argument parser for non-negative integers
 */
export function parseCount(value: string): number {
  const parsed = parseNonNegative(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return parsed;
}

/**
 * Commander argument parser for simulated surface kinds
 */
export function parseSurface(value: string): string {
  if (!isSimulatedSurfaceKind(value)) {
    throw new InvalidArgumentError(`Expected one of: ${SIMULATED_SURFACE_KINDS.join(', ')}.`);
  }
  return value;
}

/**
 * Apply command-line flags over a loaded config (flags win over file and env).
 */
export function applyRotationOptions(config: RotorConfig, options: RotationCommandOptions): RotorConfig {
  const rotation = { ...config.rotation };
  if (options.rotateInterval !== undefined) rotation.rotateIntervalSeconds = options.rotateInterval;
  if (options.jitter !== undefined) rotation.jitterSeconds = options.jitter;
  if (options.minGap !== undefined) rotation.minGapSeconds = options.minGap;
  if (options.keepGapOnFailure === true) rotation.resetGapOnFailure = false;

  const simulation = { ...config.simulation };
  if (options.surface !== undefined && isSimulatedSurfaceKind(options.surface)) {
    simulation.surface = options.surface;
  }

  return {
    ...config,
    rotation,
    simulation,
    rotationLogPath: options.rotationLog ?? config.rotationLogPath,
    tickIntervalMs: options.tick ?? config.tickIntervalMs,
    strategyTimeoutMs: options.strategyTimeout ?? config.strategyTimeoutMs,
  };
}
