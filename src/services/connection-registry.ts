// Path: src/services/connection-registry.ts
// Live connection membership for the rotation server

import { createLogger } from '../lib/logger.js';
import type { TransportConnection } from '../lib/transport/types.js';

const log = createLogger({ module: 'connection-registry' });

/**
 * Set of live connections, keyed by connection ID.
 * Membership mirrors the connection lifetime: insert on accept, remove on close.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, TransportConnection>();

  registerOnAccept(connection: TransportConnection): void {
    if (this.connections.has(connection.id)) {
      log.warn({ connectionId: connection.id }, 'Connection registered twice, keeping the latest');
    }
    this.connections.set(connection.id, connection);
    log.debug({ connectionId: connection.id, size: this.connections.size }, 'Connection registered');
  }

  /**
   * @returns false when the connection was not registered
   */
  unregisterOnClose(connection: TransportConnection): boolean {
    const removed = this.connections.delete(connection.id);
    if (removed) {
      log.debug({ connectionId: connection.id, size: this.connections.size }, 'Connection unregistered');
    }
    return removed;
  }

  has(connectionId: string): boolean {
    return this.connections.has(connectionId);
  }

  get size(): number {
    return this.connections.size;
  }

  /**
   * Snapshot of the current membership, safe to iterate while connections close.
   */
  list(): TransportConnection[] {
    return Array.from(this.connections.values());
  }
}
