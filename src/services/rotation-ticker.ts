// Path: src/services/rotation-ticker.ts
// Per-connection wake-up loop driving timer rotations

import { createLogger } from '../lib/logger.js';
import { ManagedTimer } from '../utils/timer.js';
import type { CidLifecycleManager } from './cid-lifecycle/index.js';
import { DEFAULT_INITIAL_DELAY_MS, DEFAULT_TICK_INTERVAL_MS } from './cid-lifecycle/index.js';

const log = createLogger({ module: 'rotation-ticker' });

export interface RotationTickerOptions {
  manager: CidLifecycleManager;
  /** Endpoint handle, read lazily on each tick */
  endpoint: () => unknown;
  /** Checked before every tick; a closing connection stops the loop */
  isClosing?: () => boolean;
  tickIntervalMs?: number;
  initialDelayMs?: number;
  /** Receives the error that stopped the loop (event log failures) */
  onError?: (err: unknown) => void;
}

/**
 * Fixed-period loop calling maybeRotate() on one connection.
 *
 * Each tick is scheduled only after the previous one finished, so ticks never
 * overlap. stop() takes effect immediately: no further tick is scheduled and
 * an in-flight tick does not reschedule.
 */
export class RotationTicker {
  private readonly timer = new ManagedTimer();
  private readonly options: RotationTickerOptions;
  private readonly tickIntervalMs: number;
  private readonly initialDelayMs: number;
  private running = false;
  private ticks = 0;

  constructor(options: RotationTickerOptions) {
    this.options = options;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(this.initialDelayMs);
  }

  stop(): void {
    this.running = false;
    this.timer.clear();
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Completed ticks, for diagnostics */
  get tickCount(): number {
    return this.ticks;
  }

  private schedule(delayMs: number): void {
    this.timer.setTimeout(() => {
      this.tick().catch((err: unknown) => {
        log.error({ err }, 'Rotation tick failed');
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;

    if (this.options.isClosing?.() === true) {
      log.debug('Connection closing, stopping rotation loop');
      this.stop();
      return;
    }

    let endpoint: unknown;
    try {
      endpoint = this.options.endpoint();
    } catch (err) {
      log.debug({ err }, 'Endpoint handle unavailable, stopping rotation loop');
      this.stop();
      return;
    }

    try {
      await this.options.manager.maybeRotate(endpoint, 'timer');
    } catch (err) {
      this.stop();
      log.error({ err }, 'Rotation loop stopped');
      this.options.onError?.(err);
      return;
    }

    this.ticks++;
    if (this.running) {
      this.schedule(this.tickIntervalMs);
    }
  }
}
