// Path: src/lib/config/saver.ts
// Configuration saving

import fs from 'node:fs';
import { configLogger as log } from '../logger.js';
import type { RotorConfig } from './types.js';
import { getConfigDir, getConfigFile, getUserConfig } from './storage.js';

function writeConfigFile(config: RotorConfig): void {
  const configDir = getConfigDir();
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o755 });
  }
  fs.writeFileSync(getConfigFile(), JSON.stringify(config, null, 2) + '\n', { mode: 0o644 });
}

/**
 * Save configuration. Returns the path written.
 */
export function saveConfig(config: RotorConfig): string {
  const configFile = getConfigFile();

  // CID_ROTOR_CONFIG_DIR always wins, so tests and custom deployments stay isolated
  if (process.env.CID_ROTOR_CONFIG_DIR) {
    writeConfigFile(config);
    log.debug({ path: configFile }, 'Config saved (env override)');
    return configFile;
  }

  if (process.getuid?.() === 0) {
    writeConfigFile(config);
    log.debug({ path: configFile }, 'Config saved (root)');
    return configFile;
  }

  if (fs.existsSync(configFile)) {
    try {
      fs.accessSync(configFile, fs.constants.W_OK);
      writeConfigFile(config);
      log.debug({ path: configFile }, 'Config saved (system config)');
      return configFile;
    } catch {
      // Not writable, fall through to user config
      log.debug({ path: configFile }, 'System config not writable, using user config');
    }
  }

  const userConfig = getUserConfig();
  userConfig.store = config;
  log.debug({ path: userConfig.path }, 'Config saved (user config)');
  return userConfig.path;
}
