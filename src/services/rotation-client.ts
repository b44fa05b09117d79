// Path: src/services/rotation-client.ts
// Client-side wiring: one outbound connection with its own rotation loop

import { createLogger } from '../lib/logger.js';
import { initializeMetrics } from '../lib/metrics.js';
import type { RotationEventSink } from '../lib/event-log.js';
import type { TransportConnection, TransportEngine } from '../lib/transport/types.js';
import { RotationTicker } from './rotation-ticker.js';
import {
  CidLifecycleManager,
  RotationStrategyResolver,
  readNewestHostCid,
  type Clock,
  type RotationPolicy,
} from './cid-lifecycle/index.js';

const log = createLogger({ module: 'rotation-client' });

export interface RotationClientOptions {
  engine: TransportEngine;
  eventLog: RotationEventSink;
  policy: RotationPolicy;
  tickIntervalMs?: number;
  initialDelayMs?: number;
  strategyTimeoutMs?: number;
  clock?: Clock;
}

/**
 * Runs the rotation loop for the first connection the engine hands over.
 * Further connections are closed; a client owns exactly one.
 */
export class RotationClient {
  private readonly options: RotationClientOptions;
  private connection: TransportConnection | null = null;
  private ticker: RotationTicker | null = null;
  private closedWaiters: { resolve: () => void; reject: (err: unknown) => void }[] = [];
  /** Event log error that ended the connection */
  private failure: { error: unknown } | null = null;

  constructor(options: RotationClientOptions) {
    this.options = options;
    options.engine.onConnection((connection) => {
      this.attach(connection);
    });
  }

  async start(): Promise<void> {
    initializeMetrics();
    await this.options.engine.start();
  }

  async stop(): Promise<void> {
    this.ticker?.stop();
    await this.options.engine.stop();
  }

  get connectionId(): string | null {
    return this.connection?.id ?? null;
  }

  /**
   * Resolves when the connection closes (or immediately if there is none open).
   * Rejects with the event log error when that is what closed it.
   */
  closed(): Promise<void> {
    if (!this.connection || this.connection.isClosing()) {
      return this.failure ? Promise.reject(this.failure.error) : Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.closedWaiters.push({ resolve, reject });
    });
  }

  private attach(connection: TransportConnection): void {
    if (this.connection) {
      log.warn({ connectionId: connection.id }, 'Client already has a connection, closing extra one');
      connection.close('extra client connection');
      return;
    }
    this.connection = connection;

    const manager = new CidLifecycleManager({
      policy: this.options.policy,
      eventLog: this.options.eventLog,
      role: 'client',
      connectionId: connection.id,
      resolver: new RotationStrategyResolver({ timeoutMs: this.options.strategyTimeoutMs }),
      clock: this.options.clock,
      onRotated: (endpoint) => {
        log.info({ connectionId: connection.id, cid: readNewestHostCid(endpoint) ?? '<unknown>' }, 'Rotated outbound connection ID');
      },
    });

    const ticker = new RotationTicker({
      manager,
      endpoint: () => connection.handle,
      isClosing: () => connection.isClosing(),
      tickIntervalMs: this.options.tickIntervalMs,
      initialDelayMs: this.options.initialDelayMs,
      onError: (err) => {
        log.error({ err, connectionId: connection.id }, 'Rotation event log failed, closing connection');
        this.failure ??= { error: err };
        connection.close('event log failure');
      },
    });
    this.ticker = ticker;

    connection.onClose((reason) => {
      ticker.stop();
      log.info({ connectionId: connection.id, reason }, 'Client connection closed');
      const waiters = this.closedWaiters;
      this.closedWaiters = [];
      const failure = this.failure;
      for (const waiter of waiters) {
        if (failure) {
          waiter.reject(failure.error);
        } else {
          waiter.resolve();
        }
      }
    });

    if (!connection.isClosing()) {
      ticker.start();
      log.info({ connectionId: connection.id, remoteAddress: connection.remoteAddress }, 'Client connection established');
    }
  }
}
