// Path: src/lib/config/loader.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG, getConfigPath, loadConfig, mergeConfig, saveConfig } from './index.js';

const ENV_KEYS = [
  'CID_ROTOR_CONFIG_DIR',
  'CID_ROTOR_ROTATE_INTERVAL',
  'CID_ROTOR_JITTER',
  'CID_ROTOR_MIN_GAP',
  'CID_ROTOR_ROTATION_LOG',
] as const;

describe('config loading', () => {
  let dir: string;
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cid-rotor-config-'));
    process.env.CID_ROTOR_CONFIG_DIR = dir;
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should use defaults when the config dir has no file', () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should not share nested objects with the defaults', () => {
    const config = loadConfig();
    config.rotation.minGapSeconds = 99;
    expect(DEFAULT_CONFIG.rotation.minGapSeconds).toBe(10);
  });

  it('should merge the config file over defaults', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({
      rotation: { rotateIntervalSeconds: 12 },
      rotationLogPath: '/var/log/cid-rotor/rotation.jsonl',
      simulation: { surface: 'direct' },
    }));

    const config = loadConfig();

    expect(config.rotation).toEqual({
      rotateIntervalSeconds: 12,
      jitterSeconds: 3,
      minGapSeconds: 10,
      resetGapOnFailure: true,
    });
    expect(config.rotationLogPath).toBe('/var/log/cid-rotor/rotation.jsonl');
    expect(config.simulation).toEqual({ connections: 2, surface: 'direct', autoCloseSeconds: 0 });
  });

  it('should fall back to defaults for an unparseable file', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), '{ not json');
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should apply environment overrides over the file', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ rotation: { jitterSeconds: 1 } }));
    process.env.CID_ROTOR_ROTATE_INTERVAL = '45';
    process.env.CID_ROTOR_JITTER = '0.5';
    process.env.CID_ROTOR_MIN_GAP = '0';
    process.env.CID_ROTOR_ROTATION_LOG = '/tmp/override.jsonl';

    const config = loadConfig();

    expect(config.rotation).toEqual({
      rotateIntervalSeconds: 45,
      jitterSeconds: 0.5,
      minGapSeconds: 0,
      resetGapOnFailure: true,
    });
    expect(config.rotationLogPath).toBe('/tmp/override.jsonl');
  });

  it('should ignore non-numeric environment overrides', () => {
    process.env.CID_ROTOR_ROTATE_INTERVAL = 'soon';
    expect(loadConfig().rotation.rotateIntervalSeconds).toBe(30);
  });

  it('should save to the config dir and load it back', () => {
    const config = loadConfig();
    config.tickIntervalMs = 100;

    const written = saveConfig(config);

    expect(written).toBe(path.join(dir, 'config.json'));
    expect(getConfigPath()).toBe(written);
    expect(loadConfig().tickIntervalMs).toBe(100);
  });
});

describe('mergeConfig', () => {
  it('should ignore fields with the wrong type', () => {
    const config = mergeConfig({
      rotation: { rotateIntervalSeconds: '10', resetGapOnFailure: 'no' },
      tickIntervalMs: null,
      simulation: { surface: 'quic', connections: 4 },
    });

    expect(config.rotation.rotateIntervalSeconds).toBe(30);
    expect(config.rotation.resetGapOnFailure).toBe(true);
    expect(config.tickIntervalMs).toBe(200);
    expect(config.simulation.surface).toBe('manager-rotate');
    expect(config.simulation.connections).toBe(4);
  });

  it('should return defaults for non-object input', () => {
    expect(mergeConfig(null)).toEqual(DEFAULT_CONFIG);
    expect(mergeConfig([1, 2])).toEqual(DEFAULT_CONFIG);
  });
});
