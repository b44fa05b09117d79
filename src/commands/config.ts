// Path: src/commands/config.ts
// Config commands - show, initialize and validate configuration

import type { Command } from 'commander';
import chalk from 'chalk';
import fs from 'node:fs';
import {
  loadConfig,
  saveConfig,
  defaultConfig,
  getConfigFile,
  getConfigPath,
} from '../lib/config/index.js';
import { validateConfig, formatValidationResult } from '../lib/validation.js';
import { describeError } from '../utils/error.js';
import type { ConfigInitCommandOptions, ConfigShowCommandOptions } from './types.js';

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Manage cid-rotor configuration');

  config
    .command('show')
    .description('Show the effective configuration (file + environment)')
    .option('--json', 'Output as JSON')
    .action((options: ConfigShowCommandOptions) => {
      const current = loadConfig();

      if (options.json === true) {
        console.log(JSON.stringify(current, null, 2));
        return;
      }

      console.log();
      console.log(chalk.bold('cid-rotor configuration'));
      console.log(chalk.gray(`  ${getConfigPath()}`));
      console.log();
      console.log(chalk.bold('Rotation'));
      console.log(`  Interval:          ${current.rotation.rotateIntervalSeconds}s`);
      console.log(`  Jitter:            ${current.rotation.jitterSeconds}s`);
      console.log(`  Minimum gap:       ${current.rotation.minGapSeconds}s`);
      console.log(`  Gap on failure:    ${current.rotation.resetGapOnFailure ? 'restart' : 'keep'}`);
      console.log();
      console.log(chalk.bold('Runtime'));
      console.log(`  Event log:         ${current.rotationLogPath}`);
      console.log(`  Tick interval:     ${current.tickIntervalMs}ms`);
      console.log(`  Strategy timeout:  ${current.strategyTimeoutMs}ms`);
      console.log(`  Initial delay:     ${current.initialDelayMs}ms`);
      console.log();
      console.log(chalk.bold('Simulation'));
      console.log(`  Connections:       ${current.simulation.connections}`);
      console.log(`  Surface:           ${current.simulation.surface}`);
      console.log(`  Auto-close:        ${current.simulation.autoCloseSeconds > 0 ? `${current.simulation.autoCloseSeconds}s` : 'never'}`);
      console.log();
    });

  config
    .command('init')
    .description('Write a configuration file with default values')
    .option('-f, --force', 'Overwrite an existing configuration file')
    .action((options: ConfigInitCommandOptions) => {
      const configFile = getConfigFile();
      if (fs.existsSync(configFile) && options.force !== true) {
        console.error(chalk.yellow(`Config already exists: ${configFile}`));
        console.error('Use ' + chalk.cyan('--force') + ' to overwrite.');
        process.exit(1);
      }

      try {
        const written = saveConfig(defaultConfig());
        console.log(chalk.green('Configuration written:'), written);
      } catch (err) {
        console.error(chalk.red('Failed to write config:'), describeError(err));
        process.exit(1);
      }
    });

  config
    .command('validate')
    .description('Validate the effective configuration')
    .action(() => {
      const result = validateConfig(loadConfig());
      console.log(formatValidationResult(result));
      if (!result.valid) {
        process.exit(1);
      }
    });
}
