// Path: src/commands/serve.ts
// Serve command - runs the rotation server with the operator console

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../lib/config/index.js';
import { validateConfig, formatValidationResult } from '../lib/validation.js';
import { logger, flushLogs } from '../lib/logger.js';
import { JsonlEventLog } from '../lib/event-log.js';
import { SimulatedTransportEngine } from '../lib/transport/simulated.js';
import { RotationServer } from '../services/rotation-server.js';
import { OperatorConsole } from '../services/operator-console.js';
import { createRotationPolicy, describePolicy } from '../services/cid-lifecycle/index.js';
import { describeError } from '../utils/error.js';
import { applyRotationOptions, parseCount, parseNonNegative, parseSurface } from './options.js';
import type { ServeCommandOptions } from './types.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run the rotation server over simulated connections')
    .option('--rotate-interval <seconds>', 'Seconds between timer rotations, 0 disables (default: 30)', parseNonNegative)
    .option('--jitter <seconds>', 'Jitter added to each interval (default: 3)', parseNonNegative)
    .option('--min-gap <seconds>', 'Minimum seconds between rotations (default: 10)', parseNonNegative)
    .option('--keep-gap-on-failure', 'Do not restart the minimum gap after a failed rotation')
    .option('--rotation-log <path>', 'JSONL file rotation events are appended to')
    .option('--tick <ms>', 'Rotation loop period in milliseconds (default: 200)', parseNonNegative)
    .option('--strategy-timeout <ms>', 'Timeout for asynchronous rotation operations (default: 250)', parseNonNegative)
    .option('--connections <n>', 'Simulated connections opened at startup (default: 2)', parseCount)
    .option('--surface <kind>', 'Rotation surface of simulated endpoints', parseSurface)
    .option('--auto-close <seconds>', 'Close each connection after this many seconds', parseNonNegative)
    .option('--no-console', 'Run without the operator console')
    .option('--validate', 'Validate configuration and exit')
    .option('-v, --verbose', 'Enable verbose logging')
    .addHelpText('after', `
Examples:
  # Defaults: 30s interval, 3s jitter, 10s gap, two connections
  cid-rotor serve --rotation-log ./logs/server.jsonl

  # Fast rotation to exercise the gap
  cid-rotor serve --rotate-interval 10 --jitter 0 --min-gap 5

  # Manual rotation only
  cid-rotor serve --rotate-interval 0

  # Endpoints without any rotation surface
  cid-rotor serve --surface none --connections 3
`)
    .action(async (options: ServeCommandOptions) => {
      if (options.verbose) {
        logger.level = 'debug';
      }

      const config = applyRotationOptions(loadConfig(), options);
      if (options.connections !== undefined) config.simulation.connections = options.connections;
      if (options.autoClose !== undefined) config.simulation.autoCloseSeconds = options.autoClose;

      const validation = validateConfig(config);
      if (options.validate || !validation.valid) {
        console.log(formatValidationResult(validation));
        if (!validation.valid) {
          console.error(chalk.red('Configuration validation failed. Fix errors before starting.'));
          process.exit(1);
        }
        return;
      }

      const policy = createRotationPolicy(config.rotation);
      const eventLog = new JsonlEventLog(config.rotationLogPath);
      const engine = new SimulatedTransportEngine({
        connections: config.simulation.connections,
        surface: config.simulation.surface,
        autoCloseSeconds: config.simulation.autoCloseSeconds,
      });
      const server = new RotationServer({
        engine,
        eventLog,
        policy,
        tickIntervalMs: config.tickIntervalMs,
        initialDelayMs: config.initialDelayMs,
        strategyTimeoutMs: config.strategyTimeoutMs,
      });

      // Print startup banner
      console.log();
      console.log(chalk.bold('cid-rotor server'));
      console.log();
      console.log(`  Policy:      ${describePolicy(policy)}`);
      console.log(`  Tick:        every ${config.tickIntervalMs}ms`);
      console.log(`  Event log:   ${config.rotationLogPath}`);
      console.log(`  Transport:   ${engine.kind} (${config.simulation.connections} x ${chalk.cyan(config.simulation.surface)})`);
      if (config.simulation.autoCloseSeconds > 0) {
        console.log(`  Auto-close:  after ${config.simulation.autoCloseSeconds}s`);
      }
      if (policy.rotateIntervalSeconds === 0) {
        console.log(chalk.yellow('  Timer rotation disabled, use "rotate" in the console'));
      }
      console.log();

      let shuttingDown = false;
      let operatorConsole: OperatorConsole | null = null;

      const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info({ signal }, 'Shutting down');
        operatorConsole?.stop();

        let exitCode = 0;
        try {
          await server.stop();
          await eventLog.close();
        } catch (err) {
          exitCode = 1;
          logger.error({ err }, 'Shutdown failed');
          console.error(chalk.red('Shutdown failed:'), describeError(err));
        }
        await flushLogs();
        process.exit(exitCode);
      };

      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
          shutdown(signal).catch((e: unknown) => {
            logger.error({ err: e }, 'Shutdown error');
          });
        });
      }

      try {
        await server.start();
      } catch (err) {
        console.error(chalk.red('Failed to start server:'), describeError(err));
        logger.error({ err }, 'Server start failed');
        await flushLogs();
        process.exit(1);
      }

      if (options.console !== false) {
        operatorConsole = new OperatorConsole({
          target: server,
          onQuit: () => shutdown('console'),
        });
        operatorConsole.start();
      } else {
        console.log(chalk.gray('Running without console. Press Ctrl+C to stop.'));
      }
    });
}
