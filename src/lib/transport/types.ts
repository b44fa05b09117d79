// Path: src/lib/transport/types.ts
// Contract with the transport engine that owns the connections

/**
 * A live transport connection as seen by the rotation subsystem.
 */
export interface TransportConnection {
  readonly id: string;
  readonly remoteAddress: string;
  readonly openedAt: Date;
  /**
   * Opaque engine object, probed for connection-ID operations.
   * Engines may throw from this accessor once the connection is torn down.
   */
  readonly handle: unknown;
  isClosing(): boolean;
  /** Called once when the connection closes, normally or not */
  onClose(listener: (reason: string) => void): void;
  close(reason?: string): void;
}

/**
 * Source of connections for the rotation server.
 */
export interface TransportEngine {
  readonly kind: string;
  onConnection(listener: (connection: TransportConnection) => void): void;
  start(): Promise<void>;
  /** Close every open connection and stop accepting new ones */
  stop(): Promise<void>;
}
