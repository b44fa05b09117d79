// Path: src/lib/config/loader.ts
// Configuration loading and retrieval

import fs from 'node:fs';
import { configLogger as log } from '../logger.js';
import { isSimulatedSurfaceKind } from '../transport/simulated.js';
import { defaultConfig, type RotorConfig } from './types.js';
import { getConfigFile, getUserConfig } from './storage.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' ? value : fallback;
}

/**
 * Merge a parsed config document over the defaults. Fields with the wrong
 * type are ignored; range checks are left to validateConfig().
 */
export function mergeConfig(parsed: unknown): RotorConfig {
  const config = defaultConfig();
  if (!isObject(parsed)) {
    return config;
  }

  const rotation = isObject(parsed.rotation) ? parsed.rotation : {};
  config.rotation = {
    rotateIntervalSeconds: numberField(rotation, 'rotateIntervalSeconds', config.rotation.rotateIntervalSeconds),
    jitterSeconds: numberField(rotation, 'jitterSeconds', config.rotation.jitterSeconds),
    minGapSeconds: numberField(rotation, 'minGapSeconds', config.rotation.minGapSeconds),
    resetGapOnFailure: typeof rotation.resetGapOnFailure === 'boolean'
      ? rotation.resetGapOnFailure
      : config.rotation.resetGapOnFailure,
  };

  if (typeof parsed.rotationLogPath === 'string') {
    config.rotationLogPath = parsed.rotationLogPath;
  }
  config.tickIntervalMs = numberField(parsed, 'tickIntervalMs', config.tickIntervalMs);
  config.strategyTimeoutMs = numberField(parsed, 'strategyTimeoutMs', config.strategyTimeoutMs);
  config.initialDelayMs = numberField(parsed, 'initialDelayMs', config.initialDelayMs);

  const simulation = isObject(parsed.simulation) ? parsed.simulation : {};
  config.simulation = {
    connections: numberField(simulation, 'connections', config.simulation.connections),
    surface: typeof simulation.surface === 'string' && isSimulatedSurfaceKind(simulation.surface)
      ? simulation.surface
      : config.simulation.surface,
    autoCloseSeconds: numberField(simulation, 'autoCloseSeconds', config.simulation.autoCloseSeconds),
  };

  return config;
}

/**
 * Parse a numeric environment override; unparseable values are ignored.
 */
function numericEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    log.warn({ name, value: raw }, 'Ignoring non-numeric environment override');
    return undefined;
  }
  return value;
}

/**
 * Load configuration from file or user config, with environment variable overrides.
 *
 * Environment variables:
 * - CID_ROTOR_ROTATE_INTERVAL: rotation interval in seconds
 * - CID_ROTOR_JITTER: jitter in seconds
 * - CID_ROTOR_MIN_GAP: minimum gap in seconds
 * - CID_ROTOR_ROTATION_LOG: rotation event log path
 */
export function loadConfig(): RotorConfig {
  let config: RotorConfig;

  // Try system config first
  const configFile = getConfigFile();
  if (fs.existsSync(configFile)) {
    try {
      const content = fs.readFileSync(configFile, 'utf-8');
      config = mergeConfig(JSON.parse(content));
      log.debug({ path: configFile }, 'Loaded system config');
    } catch (err) {
      log.error({ err, path: configFile }, 'Failed to load system config');
      config = defaultConfig();
    }
  } else if (process.env.CID_ROTOR_CONFIG_DIR) {
    // Custom config dir without a file yet: defaults, never the user store
    config = defaultConfig();
    log.debug({ path: configFile }, 'Using default config for custom config dir');
  } else {
    const userConfig = getUserConfig();
    config = mergeConfig(userConfig.store);
    log.debug({ path: userConfig.path }, 'Loaded user config');
  }

  // Apply environment variable overrides
  const interval = numericEnv('CID_ROTOR_ROTATE_INTERVAL');
  if (interval !== undefined) {
    config.rotation.rotateIntervalSeconds = interval;
  }
  const jitter = numericEnv('CID_ROTOR_JITTER');
  if (jitter !== undefined) {
    config.rotation.jitterSeconds = jitter;
  }
  const minGap = numericEnv('CID_ROTOR_MIN_GAP');
  if (minGap !== undefined) {
    config.rotation.minGapSeconds = minGap;
  }
  if (process.env.CID_ROTOR_ROTATION_LOG) {
    config.rotationLogPath = process.env.CID_ROTOR_ROTATION_LOG;
  }

  return config;
}

/**
 * Get config file path for display
 */
export function getConfigPath(): string {
  const configFile = getConfigFile();
  if (process.env.CID_ROTOR_CONFIG_DIR || fs.existsSync(configFile)) {
    return configFile;
  }
  return getUserConfig().path;
}
