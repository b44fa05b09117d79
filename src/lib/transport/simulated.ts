// Path: src/lib/transport/simulated.ts
// In-process transport engine with configurable connection-ID surfaces

import { EventEmitter } from 'node:events';
import { randomBytes } from 'node:crypto';
import { transportLogger as log } from '../logger.js';
import { RotorError } from '../../utils/error.js';
import { TimerGroup } from '../../utils/timer.js';
import type { TransportConnection, TransportEngine } from './types.js';

/** Host connection IDs are 8 bytes, like the server's configured CID length */
const CID_LENGTH = 8;

/** First fake client port handed out */
const BASE_REMOTE_PORT = 50000;

/**
 * Which rotation surface simulated endpoints expose:
 * - manager-rotate: `localCidManager.rotate()`
 * - manager-issue: `cidManager.issueConnectionId()`
 * - direct: `changeConnectionId()` on the endpoint itself
 * - none: no rotation surface
 * - throwing: `connectionIdManager.rotate()` that always throws
 */
export type SimulatedSurfaceKind = 'manager-rotate' | 'manager-issue' | 'direct' | 'none' | 'throwing';

export const SIMULATED_SURFACE_KINDS: readonly SimulatedSurfaceKind[] = [
  'manager-rotate',
  'manager-issue',
  'direct',
  'none',
  'throwing',
];

export function isSimulatedSurfaceKind(value: string): value is SimulatedSurfaceKind {
  return SIMULATED_SURFACE_KINDS.some((kind) => kind === value);
}

export interface HostCid {
  cid: Buffer;
  sequenceNumber: number;
}

/**
 * Connection IDs issued by the local endpoint, oldest first.
 */
export class HostCidTable {
  readonly entries: HostCid[] = [];
  private nextSequence = 0;

  constructor() {
    this.issue();
  }

  issue(): HostCid {
    const entry: HostCid = { cid: randomBytes(CID_LENGTH), sequenceNumber: this.nextSequence++ };
    this.entries.push(entry);
    return entry;
  }

  newest(): HostCid {
    return this.entries[this.entries.length - 1];
  }
}

/**
 * Shape of a simulated endpoint handle. Only the members of the chosen
 * surface kind are present on the object.
 */
export interface SimulatedHandle {
  readonly hostCids: HostCid[];
  readonly originalDestinationCid: Buffer;
  readonly localCid: Buffer;
  localCidManager?: { rotate(): HostCid };
  cidManager?: { issueConnectionId(): Buffer };
  connectionIdManager?: { rotate(): HostCid };
  changeConnectionId?: () => HostCid;
}

export function createSimulatedHandle(kind: SimulatedSurfaceKind, table: HostCidTable): SimulatedHandle {
  const handle: SimulatedHandle = {
    hostCids: table.entries,
    originalDestinationCid: randomBytes(CID_LENGTH),
    get localCid(): Buffer {
      return table.newest().cid;
    },
  };

  switch (kind) {
    case 'manager-rotate':
      handle.localCidManager = { rotate: () => table.issue() };
      break;
    case 'manager-issue':
      handle.cidManager = { issueConnectionId: () => table.issue().cid };
      break;
    case 'direct':
      handle.changeConnectionId = () => table.issue();
      break;
    case 'throwing':
      handle.connectionIdManager = {
        rotate: (): HostCid => {
          throw new RotorError('connection ID pool exhausted', 'CID_POOL_EXHAUSTED');
        },
      };
      break;
    case 'none':
      break;
  }

  return handle;
}

/**
 * A simulated connection. Its handle becomes unusable once closed.
 */
export class SimulatedConnection extends EventEmitter implements TransportConnection {
  readonly id: string;
  readonly remoteAddress: string;
  readonly openedAt: Date;
  readonly cids: HostCidTable;
  private readonly endpoint: SimulatedHandle;
  private closed = false;

  constructor(id: string, remoteAddress: string, surface: SimulatedSurfaceKind) {
    super();
    this.id = id;
    this.remoteAddress = remoteAddress;
    this.openedAt = new Date();
    this.cids = new HostCidTable();
    this.endpoint = createSimulatedHandle(surface, this.cids);
  }

  get handle(): SimulatedHandle {
    if (this.closed) {
      throw new RotorError(`Connection ${this.id} is closed`, 'CONNECTION_CLOSED');
    }
    return this.endpoint;
  }

  isClosing(): boolean {
    return this.closed;
  }

  onClose(listener: (reason: string) => void): void {
    if (this.closed) {
      listener('already closed');
      return;
    }
    this.once('close', listener);
  }

  close(reason = 'closed'): void {
    if (this.closed) return;
    this.closed = true;
    log.debug({ connectionId: this.id, reason }, 'Simulated connection closed');
    this.emit('close', reason);
  }
}

export interface SimulatedTransportOptions {
  /** Connections opened by start() */
  connections: number;
  surface: SimulatedSurfaceKind;
  /** Close each connection after this many seconds (0 keeps them open) */
  autoCloseSeconds?: number;
}

/**
 * Transport engine that opens connections in-process. Stands in for a
 * QUIC engine, which Node.js does not ship.
 */
export class SimulatedTransportEngine implements TransportEngine {
  readonly kind = 'simulated';
  private readonly options: SimulatedTransportOptions;
  private readonly listeners: ((connection: TransportConnection) => void)[] = [];
  private readonly connections = new Map<string, SimulatedConnection>();
  private readonly closeTimers = new TimerGroup();
  private sequence = 0;
  private running = false;

  constructor(options: SimulatedTransportOptions) {
    this.options = options;
  }

  get openCount(): number {
    return this.connections.size;
  }

  onConnection(listener: (connection: TransportConnection) => void): void {
    this.listeners.push(listener);
  }

  async start(): Promise<void> {
    this.running = true;
    log.info({
      connections: this.options.connections,
      surface: this.options.surface,
      autoCloseSeconds: this.options.autoCloseSeconds ?? 0,
    }, 'Simulated transport started');

    for (let i = 0; i < this.options.connections; i++) {
      this.openConnection();
    }
  }

  /**
   * Accept one more connection, optionally with a different surface.
   */
  openConnection(surface: SimulatedSurfaceKind = this.options.surface): SimulatedConnection {
    if (!this.running) {
      throw new RotorError('Simulated transport is not running', 'TRANSPORT_STOPPED');
    }

    this.sequence++;
    const id = `conn-${this.sequence}`;
    const connection = new SimulatedConnection(id, `127.0.0.1:${BASE_REMOTE_PORT + this.sequence}`, surface);
    this.connections.set(id, connection);

    connection.onClose(() => {
      this.connections.delete(id);
      this.closeTimers.clear(id);
    });

    const autoCloseSeconds = this.options.autoCloseSeconds ?? 0;
    if (autoCloseSeconds > 0) {
      this.closeTimers.get(id).setTimeout(() => {
        connection.close('auto-close');
      }, autoCloseSeconds * 1000);
    }

    log.debug({ connectionId: id, surface }, 'Simulated connection opened');
    for (const listener of this.listeners) {
      listener(connection);
    }
    return connection;
  }

  async stop(): Promise<void> {
    this.running = false;
    for (const connection of [...this.connections.values()]) {
      connection.close('engine stopped');
    }
    this.closeTimers.clearAll();
    log.info('Simulated transport stopped');
  }
}
