// Path: src/lib/logger.ts
// Centralized Pino logger for cid-rotor

import pino from 'pino';
import fs from 'node:fs';
import path from 'node:path';
import { createRequire } from 'node:module';

const isDev = process.env.NODE_ENV !== 'production';
const logFile = process.env.LOG_FILE;

/**
 * Create file stream for logging if LOG_FILE is set
 */
function createFileStream(): pino.DestinationStream | undefined {
  if (!logFile) return undefined;

  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    try {
      fs.mkdirSync(logDir, { recursive: true, mode: 0o750 });
    } catch {
      // Can't create log directory, skip file logging
      return undefined;
    }
  }

  try {
    return pino.destination({
      dest: logFile,
      sync: false,
      mkdir: true,
    });
  } catch {
    return undefined;
  }
}

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

function isPinoPrettyAvailable(): boolean {
  if (pinoPrettyAvailable === null) {
    try {
      createRequire(import.meta.url).resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }
  return pinoPrettyAvailable;
}

/**
 * Pretty transport for interactive development sessions
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  // A file destination and a worker transport can't be combined on one logger
  if (!isDev || logFile || !isPinoPrettyAvailable()) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

/**
 * Base logger instance
 *
 * In development: pino-pretty on stderr when it is installed
 * In production: JSON logs on stderr, or to LOG_FILE when set
 *
 * The operator console owns stdout, so process logs never go there.
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal (default: info)
 * - LOG_FILE: Path to log file
 */
const baseOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? 'info',
  base: {
    service: 'cid-rotor',
    pid: process.pid,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport = createTransport();

export const logger: pino.Logger = transport
  ? pino({ ...baseOptions, transport })
  : pino(baseOptions, createFileStream() ?? pino.destination(2));

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'rotation-server' });
 * log.info({ connectionId: 'conn-1' }, 'Connection accepted');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

// Pre-configured module loggers
export const configLogger = createLogger({ module: 'config' });
export const metricsLogger = createLogger({ module: 'metrics' });
export const transportLogger = createLogger({ module: 'transport' });

/**
 * Flush logs before process exit
 */
export async function flushLogs(): Promise<void> {
  await new Promise((resolve) => {
    logger.flush();
    // Give some time for async writes to complete
    setTimeout(resolve, 100);
  });
}

export type Logger = pino.Logger;
