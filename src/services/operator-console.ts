// Path: src/services/operator-console.ts
// Line-oriented operator console for a running rotation server

import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { createLogger } from '../lib/logger.js';
import { exportMetrics } from '../lib/metrics.js';
import { describePolicy } from './cid-lifecycle/index.js';
import { describeError } from '../utils/error.js';
import type { RotationServer } from './rotation-server.js';

const log = createLogger({ module: 'operator-console' });

/** The parts of the server the console drives */
export type ConsoleTarget = Pick<RotationServer, 'getStatus' | 'listConnections' | 'rotateAll' | 'currentCid'>;

export type ConsoleResult = 'continue' | 'quit';

const HELP_TEXT = [
  'Commands:',
  '  help, ?            Show this help',
  '  status             Active connections and rotation policy',
  '  connections, conn  List live connections',
  '  rotate, r          Force a connection ID rotation on every connection',
  '  metrics            Print rotation metrics',
  '  quit, exit, q      Shut down the server',
];

/**
 * Execute one console line against the server. Output goes through `write`,
 * one call per line.
 */
export async function handleConsoleCommand(
  line: string,
  target: ConsoleTarget,
  write: (line: string) => void
): Promise<ConsoleResult> {
  const input = line.trim();
  if (input === '') {
    return 'continue';
  }

  switch (input.toLowerCase()) {
    case 'help':
    case '?':
      HELP_TEXT.forEach((text) => write(text));
      return 'continue';

    case 'status': {
      const status = target.getStatus();
      write(`Active connections: ${status.activeConnections}`);
      write(`Policy: ${describePolicy(status.policy)}`);
      write(`Tick interval: ${status.tickIntervalMs}ms`);
      return 'continue';
    }

    case 'connections':
    case 'conn': {
      const connections = target.listConnections();
      if (connections.length === 0) {
        write('No active connections');
        return 'continue';
      }
      for (const connection of connections) {
        const cid = target.currentCid(connection.id);
        const suffix = cid ? ` cid=${cid}` : '';
        write(`${connection.id}  ${connection.remoteAddress}  opened ${connection.openedAt.toISOString()}${suffix}`);
      }
      return 'continue';
    }

    case 'rotate':
    case 'r': {
      const summary = await target.rotateAll();
      write(`Forced rotation on ${summary.attempted} connection(s): ${summary.succeeded} ok, ${summary.failed} failed`);
      return 'continue';
    }

    case 'metrics':
      exportMetrics().trimEnd().split('\n').forEach((text) => write(text));
      return 'continue';

    case 'quit':
    case 'exit':
    case 'q':
      write('Shutting down...');
      return 'quit';

    default:
      write(`Unknown command: ${input}. Type "help" for commands.`);
      return 'continue';
  }
}

export interface OperatorConsoleOptions {
  target: ConsoleTarget;
  input?: Readable;
  output?: Writable;
  /** Called once, on `quit` or when input ends */
  onQuit: () => Promise<void> | void;
}

/**
 * Reads commands from a stream and runs them one at a time.
 */
export class OperatorConsole {
  private readonly options: OperatorConsoleOptions;
  private rl: readline.Interface | null = null;
  private pending: Promise<void> = Promise.resolve();
  private quitting = false;

  constructor(options: OperatorConsoleOptions) {
    this.options = options;
  }

  start(): void {
    if (this.rl) return;

    const output = this.options.output ?? process.stdout;
    this.rl = readline.createInterface({
      input: this.options.input ?? process.stdin,
      terminal: false,
    });

    const write = (text: string): void => {
      output.write(text + '\n');
    };

    this.rl.on('line', (line) => {
      // Commands run strictly in order; a slow rotate holds later input
      this.pending = this.pending.then(async () => {
        if (this.quitting) return;
        try {
          const result = await handleConsoleCommand(line, this.options.target, write);
          if (result === 'quit') {
            await this.quit();
          }
        } catch (err) {
          log.error({ err, command: line.trim() }, 'Console command failed');
          write(`Command failed: ${describeError(err)}`);
        }
      });
    });

    this.rl.on('close', () => {
      this.pending = this.pending.then(() => this.quit());
    });

    write('Operator console ready. Type "help" for commands.');
  }

  /** Resolves once every queued command has finished */
  drain(): Promise<void> {
    return this.pending;
  }

  stop(): void {
    this.quitting = true;
    this.rl?.close();
    this.rl = null;
  }

  private async quit(): Promise<void> {
    if (this.quitting) return;
    this.quitting = true;
    this.rl?.close();
    this.rl = null;
    try {
      await this.options.onQuit();
    } catch (err) {
      log.error({ err }, 'Shutdown from console failed');
    }
  }
}
