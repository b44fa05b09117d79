// Path: src/lib/config/storage.ts
// Internal config storage management

import Conf from 'conf';
import path from 'node:path';
import { DEFAULT_CONFIG, type RotorConfig } from './types.js';

/**
 * Get config directory path - computed dynamically to support test isolation
 */
export function getConfigDir(): string {
  return process.env.CID_ROTOR_CONFIG_DIR ?? '/etc/cid-rotor';
}

/**
 * Get config file path
 */
export function getConfigFile(): string {
  return path.join(getConfigDir(), 'config.json');
}

let userStore: Conf<RotorConfig> | null = null;

/**
 * User-level config store (development/non-root usage).
 * Created on first use so that commands which never touch it stay side-effect free.
 */
export function getUserConfig(): Conf<RotorConfig> {
  if (!userStore) {
    userStore = new Conf<RotorConfig>({
      projectName: 'cid-rotor',
      defaults: DEFAULT_CONFIG,
    });
  }
  return userStore;
}
