// Path: src/commands/client.ts
// Client command - one connection rotating on the client side

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../lib/config/index.js';
import { validateConfig, formatValidationResult } from '../lib/validation.js';
import { logger, flushLogs } from '../lib/logger.js';
import { JsonlEventLog } from '../lib/event-log.js';
import { SimulatedTransportEngine } from '../lib/transport/simulated.js';
import { RotationClient } from '../services/rotation-client.js';
import { createRotationPolicy, describePolicy } from '../services/cid-lifecycle/index.js';
import { describeError } from '../utils/error.js';
import { applyRotationOptions, parseNonNegative, parseSurface } from './options.js';
import type { ClientCommandOptions } from './types.js';

export function registerClientCommand(program: Command): void {
  program
    .command('client')
    .description('Run one client connection with connection ID rotation')
    .option('--rotate-interval <seconds>', 'Seconds between timer rotations, 0 disables (default: 30)', parseNonNegative)
    .option('--jitter <seconds>', 'Jitter added to each interval (default: 3)', parseNonNegative)
    .option('--min-gap <seconds>', 'Minimum seconds between rotations (default: 10)', parseNonNegative)
    .option('--keep-gap-on-failure', 'Do not restart the minimum gap after a failed rotation')
    .option('--rotation-log <path>', 'JSONL file rotation events are appended to')
    .option('--tick <ms>', 'Rotation loop period in milliseconds (default: 200)', parseNonNegative)
    .option('--strategy-timeout <ms>', 'Timeout for asynchronous rotation operations (default: 250)', parseNonNegative)
    .option('--surface <kind>', 'Rotation surface of the simulated endpoint', parseSurface)
    .option('--duration <seconds>', 'Close the connection after this many seconds (default: until Ctrl+C)', parseNonNegative)
    .option('-v, --verbose', 'Enable verbose logging')
    .addHelpText('after', `
Examples:
  # Rotate every 10s for one minute
  cid-rotor client --rotate-interval 10 --jitter 0 --duration 60 --rotation-log ./logs/client.jsonl
`)
    .action(async (options: ClientCommandOptions) => {
      if (options.verbose) {
        logger.level = 'debug';
      }

      const config = applyRotationOptions(loadConfig(), options);
      const validation = validateConfig(config);
      if (!validation.valid) {
        console.log(formatValidationResult(validation));
        console.error(chalk.red('Configuration validation failed.'));
        process.exit(1);
      }

      const policy = createRotationPolicy(config.rotation);
      const eventLog = new JsonlEventLog(config.rotationLogPath);
      const engine = new SimulatedTransportEngine({
        connections: 1,
        surface: config.simulation.surface,
        autoCloseSeconds: options.duration ?? 0,
      });
      const client = new RotationClient({
        engine,
        eventLog,
        policy,
        tickIntervalMs: config.tickIntervalMs,
        initialDelayMs: config.initialDelayMs,
        strategyTimeoutMs: config.strategyTimeoutMs,
      });

      console.log();
      console.log(chalk.bold('cid-rotor client'));
      console.log(`  Policy:      ${describePolicy(policy)}`);
      console.log(`  Event log:   ${config.rotationLogPath}`);
      console.log(`  Surface:     ${chalk.cyan(config.simulation.surface)}`);
      console.log(`  Duration:    ${options.duration !== undefined ? `${options.duration}s` : 'until interrupted'}`);
      console.log();

      const stop = async (): Promise<void> => {
        await client.stop();
        await eventLog.close();
      };

      process.on('SIGINT', () => {
        stop().catch((e: unknown) => {
          logger.error({ err: e }, 'Shutdown error');
        });
      });

      let exitCode = 0;
      try {
        await client.start();
        await client.closed();
      } catch (err) {
        exitCode = 1;
        console.error(chalk.red('Client failed:'), describeError(err));
        logger.error({ err }, 'Client failed');
      }

      try {
        await stop();
      } catch (err) {
        exitCode = 1;
        console.error(chalk.red('Shutdown failed:'), describeError(err));
        logger.error({ err }, 'Shutdown failed');
      }

      if (exitCode === 0) {
        console.log(`Done. ${eventLog.count} rotation event(s) written to ${eventLog.path}`);
      }

      await flushLogs();
      process.exit(exitCode);
    });
}
