// Path: src/services/rotation-server.ts
// Server-side wiring: transport connections -> registry -> rotation loops

import { createLogger } from '../lib/logger.js';
import { initializeMetrics, metrics } from '../lib/metrics.js';
import type { RotationEventSink } from '../lib/event-log.js';
import type { TransportConnection, TransportEngine } from '../lib/transport/types.js';
import { ConnectionRegistry } from './connection-registry.js';
import { forceRotateAll, type ForceRotateSummary } from './force-rotate.js';
import { RotationTicker } from './rotation-ticker.js';
import {
  CidLifecycleManager,
  RotationStrategyResolver,
  readNewestHostCid,
  DEFAULT_INITIAL_DELAY_MS,
  DEFAULT_TICK_INTERVAL_MS,
  type Clock,
  type RotationPolicy,
} from './cid-lifecycle/index.js';

const log = createLogger({ module: 'rotation-server' });

export interface RotationServerOptions {
  engine: TransportEngine;
  eventLog: RotationEventSink;
  policy: RotationPolicy;
  tickIntervalMs?: number;
  initialDelayMs?: number;
  strategyTimeoutMs?: number;
  clock?: Clock;
}

export interface RotationServerStatus {
  running: boolean;
  engine: string;
  activeConnections: number;
  policy: RotationPolicy;
  tickIntervalMs: number;
}

/**
 * Accepts connections from the transport engine, gives each one its own
 * CidLifecycleManager and RotationTicker, and tracks membership in an owned
 * ConnectionRegistry for operator-triggered rotation.
 */
export class RotationServer {
  readonly registry = new ConnectionRegistry();
  private readonly options: RotationServerOptions;
  private readonly tickers = new Map<string, RotationTicker>();
  private readonly resolver: RotationStrategyResolver;
  private readonly manualManager: CidLifecycleManager;
  private readonly tickIntervalMs: number;
  private running = false;

  constructor(options: RotationServerOptions) {
    this.options = options;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.resolver = new RotationStrategyResolver({ timeoutMs: options.strategyTimeoutMs });

    // Manual rotations never touch per-connection gating state
    this.manualManager = new CidLifecycleManager({
      policy: options.policy,
      eventLog: options.eventLog,
      role: 'server',
      resolver: this.resolver,
      clock: options.clock,
    });

    options.engine.onConnection((connection) => {
      this.accept(connection);
    });
  }

  async start(): Promise<void> {
    if (this.running) return;
    initializeMetrics();
    metrics.setActiveConnections(0);
    this.running = true;
    await this.options.engine.start();
    log.info({ engine: this.options.engine.kind, policy: this.options.policy }, 'Rotation server started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.options.engine.stop();

    // Engines close their connections on stop; release any that did not report it
    for (const connection of this.registry.list()) {
      this.release(connection, 'server stopped');
    }
    log.info('Rotation server stopped');
  }

  /**
   * Force a rotation on every live connection (operator "rotate" command).
   */
  rotateAll(): Promise<ForceRotateSummary> {
    return forceRotateAll(this.registry, this.manualManager);
  }

  listConnections(): TransportConnection[] {
    return this.registry.list();
  }

  getStatus(): RotationServerStatus {
    return {
      running: this.running,
      engine: this.options.engine.kind,
      activeConnections: this.registry.size,
      policy: this.options.policy,
      tickIntervalMs: this.tickIntervalMs,
    };
  }

  private accept(connection: TransportConnection): void {
    if (!this.running) {
      log.warn({ connectionId: connection.id }, 'Connection arrived while server stopped, ignoring');
      return;
    }

    const manager = new CidLifecycleManager({
      policy: this.options.policy,
      eventLog: this.options.eventLog,
      role: 'server',
      connectionId: connection.id,
      resolver: this.resolver,
      clock: this.options.clock,
      onRotated: (endpoint) => {
        log.info({ connectionId: connection.id, cid: readNewestHostCid(endpoint) ?? '<unknown>' }, 'Rotated outbound connection ID');
      },
    });

    const ticker = new RotationTicker({
      manager,
      endpoint: () => connection.handle,
      isClosing: () => connection.isClosing(),
      tickIntervalMs: this.tickIntervalMs,
      initialDelayMs: this.options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS,
      onError: (err) => {
        log.error({ err, connectionId: connection.id }, 'Rotation event log failed, rotation disabled for connection');
      },
    });

    this.registry.registerOnAccept(connection);
    this.tickers.set(connection.id, ticker);
    metrics.setActiveConnections(this.registry.size);

    connection.onClose((reason) => {
      this.release(connection, reason);
    });

    // onClose fires synchronously for a connection that closed during accept
    if (this.tickers.has(connection.id)) {
      ticker.start();
      log.info({ connectionId: connection.id, remoteAddress: connection.remoteAddress }, 'Connection accepted');
    }
  }

  private release(connection: TransportConnection, reason: string): void {
    const ticker = this.tickers.get(connection.id);
    if (ticker) {
      ticker.stop();
      this.tickers.delete(connection.id);
    }
    if (this.registry.unregisterOnClose(connection)) {
      metrics.setActiveConnections(this.registry.size);
      log.info({ connectionId: connection.id, reason }, 'Connection closed');
    }
  }

  /**
   * Newest outbound CID of a live connection, when its handle exposes one.
   */
  currentCid(connectionId: string): string | null {
    const connection = this.registry.list().find((c) => c.id === connectionId);
    if (!connection || connection.isClosing()) {
      return null;
    }

    let handle: unknown;
    try {
      handle = connection.handle;
    } catch {
      // Closed between the check and the read
      return null;
    }
    return readNewestHostCid(handle);
  }
}
