// Path: src/lib/config/index.ts
// Public API for configuration module

export type { RotationConfig, RotorConfig, SimulationConfig } from './types.js';
export { DEFAULT_CONFIG, defaultConfig } from './types.js';

export { getConfigDir, getConfigFile } from './storage.js';
export { loadConfig, mergeConfig, getConfigPath } from './loader.js';
export { saveConfig } from './saver.js';
