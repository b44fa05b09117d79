// Path: src/lib/validation.ts
// Configuration validation for cid-rotor

import path from 'node:path';
import type { RotorConfig } from './config/index.js';
import { configLogger as log } from './logger.js';
import { SIMULATED_SURFACE_KINDS, isSimulatedSurfaceKind } from './transport/simulated.js';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

/** Tick periods above this make rotation timing noticeably coarse */
const MAX_RECOMMENDED_TICK_MS = 1000;

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Validate rotation timing
 */
function validateRotation(config: RotorConfig): { errors: ValidationError[]; warnings: ValidationWarning[] } {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const { rotateIntervalSeconds, jitterSeconds, minGapSeconds } = config.rotation;

  const fields = { rotateIntervalSeconds, jitterSeconds, minGapSeconds };
  for (const [field, value] of Object.entries(fields)) {
    if (!isNonNegative(value)) {
      errors.push({ field: `rotation.${field}`, message: 'Must be a non-negative number of seconds', value });
    }
  }

  if (errors.length === 0) {
    if (rotateIntervalSeconds === 0) {
      warnings.push({
        field: 'rotation.rotateIntervalSeconds',
        message: 'Timer-driven rotation is disabled',
        suggestion: 'Connections will only rotate from the operator console',
      });
    } else if (minGapSeconds > rotateIntervalSeconds + jitterSeconds) {
      warnings.push({
        field: 'rotation.minGapSeconds',
        message: 'Minimum gap exceeds the rotation interval, some timer rotations will be skipped',
        suggestion: `Use a gap of at most ${rotateIntervalSeconds + jitterSeconds}s`,
      });
    }
  }

  return { errors, warnings };
}

/**
 * Validate the full rotor configuration
 */
export function validateConfig(config: RotorConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  const rotation = validateRotation(config);
  errors.push(...rotation.errors);
  warnings.push(...rotation.warnings);

  // Event log
  if (!config.rotationLogPath || config.rotationLogPath.trim() === '') {
    errors.push({ field: 'rotationLogPath', message: 'Rotation log path is required' });
  } else if (!path.isAbsolute(config.rotationLogPath)) {
    warnings.push({
      field: 'rotationLogPath',
      message: 'Rotation log path is relative to the working directory',
      suggestion: 'Use an absolute path for service deployments',
    });
  }

  // Scheduling
  if (!Number.isFinite(config.tickIntervalMs) || config.tickIntervalMs <= 0) {
    errors.push({ field: 'tickIntervalMs', message: 'Tick interval must be a positive number of milliseconds', value: config.tickIntervalMs });
  } else if (config.tickIntervalMs > MAX_RECOMMENDED_TICK_MS) {
    warnings.push({
      field: 'tickIntervalMs',
      message: 'Tick interval is longer than one second',
      suggestion: 'Rotations may fire up to one tick after they are due; consider 200ms',
    });
  }

  if (!Number.isFinite(config.strategyTimeoutMs) || config.strategyTimeoutMs <= 0) {
    errors.push({ field: 'strategyTimeoutMs', message: 'Strategy timeout must be a positive number of milliseconds', value: config.strategyTimeoutMs });
  }

  if (!isNonNegative(config.initialDelayMs)) {
    errors.push({ field: 'initialDelayMs', message: 'Initial delay must be a non-negative number of milliseconds', value: config.initialDelayMs });
  }

  // Simulation
  const { connections, surface, autoCloseSeconds } = config.simulation;
  if (!Number.isInteger(connections) || connections < 0) {
    errors.push({ field: 'simulation.connections', message: 'Connection count must be a non-negative integer', value: connections });
  }
  if (!isSimulatedSurfaceKind(surface)) {
    errors.push({
      field: 'simulation.surface',
      message: `Unknown surface. Use one of: ${SIMULATED_SURFACE_KINDS.join(', ')}`,
      value: surface,
    });
  }
  if (!isNonNegative(autoCloseSeconds)) {
    errors.push({ field: 'simulation.autoCloseSeconds', message: 'Auto-close must be a non-negative number of seconds', value: autoCloseSeconds });
  }

  const result = {
    valid: errors.length === 0,
    errors,
    warnings,
  };

  // Log validation results
  if (errors.length > 0) {
    log.error({ errors }, 'Configuration validation failed');
  }
  if (warnings.length > 0) {
    log.warn({ warnings }, 'Configuration has warnings');
  }

  return result;
}

/**
 * Format validation result for display
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  ✗ ${error.field}: ${error.message}`);
      if (error.value !== undefined) {
        lines.push(`    Value: ${JSON.stringify(error.value)}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning.field}: ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`    Suggestion: ${warning.suggestion}`);
      }
    }
  }

  if (result.valid && result.warnings.length === 0) {
    lines.push('✓ Configuration is valid');
  } else if (result.valid) {
    lines.push('');
    lines.push('✓ Configuration is valid (with warnings)');
  }

  return lines.join('\n');
}
