// Path: src/services/cid-lifecycle/types.ts
// Constants and types for connection-ID rotation

// ============================================================================
// Configuration Constants
// ============================================================================

/** Wake-up period of the per-connection rotation loop */
export const DEFAULT_TICK_INTERVAL_MS = 200;

/** Upper bound on a single rotation operation that returns a promise */
export const DEFAULT_STRATEGY_TIMEOUT_MS = 250;

/** Delay before the first tick, so the handshake can settle */
export const DEFAULT_INITIAL_DELAY_MS = 800;

/** Identifier-manager attachment points probed on an endpoint, in priority order */
export const MANAGER_ATTACHMENT_NAMES = [
  'localCidManager',
  'cidManager',
  'connectionIdManager',
  'localConnectionIdManager',
] as const;

/** Manager-level "issue new identifier" operations, in priority order */
export const ISSUE_OPERATION_NAMES = ['issueConnectionId', 'issue', 'new'] as const;

/** Endpoint-level "change identifier" operations, in priority order */
export const DIRECT_OPERATION_NAMES = [
  'changeConnectionId',
  'rotateConnectionId',
  'requestConnectionId',
] as const;

/** Endpoint fields snapshotted for postmortem when no strategy applies */
export const DIAGNOSTIC_FIELDS = ['localCid', 'originalDestinationCid', 'hostCid'] as const;

export const NO_ROTATION_SURFACE_NOTE = 'No known connection-ID rotation surface found on this endpoint.';

// ============================================================================
// Types
// ============================================================================

export type RotationRole = 'client' | 'server';

export type RotationReason = 'timer' | 'manual';

export type RotationEventKind = 'rotate_ok' | 'rotate_failed';

export type DiagnosticField = (typeof DIAGNOSTIC_FIELDS)[number];

export type DiagnosticSnapshot = Record<DiagnosticField, string | null>;

/** Rotation timing policy. Treat as immutable; see createRotationPolicy(). */
export interface RotationPolicy {
  /** Seconds between timer-driven rotations (0 disables the timer path) */
  readonly rotateIntervalSeconds: number;
  /** Upper bound (exclusive) of the slack added to each interval */
  readonly jitterSeconds: number;
  /** Hard floor between two rotation attempts */
  readonly minGapSeconds: number;
  /** Whether a failed attempt also restarts the minimum gap */
  readonly resetGapOnFailure: boolean;
}

export const DEFAULT_ROTATION_POLICY: RotationPolicy = Object.freeze({
  rotateIntervalSeconds: 30,
  jitterSeconds: 3,
  minGapSeconds: 10,
  resetGapOnFailure: true,
});

/**
 * Diagnostic detail attached to every rotation event.
 * The diagnostic fields are only present on the fallback path.
 */
export interface RotationDetail extends Partial<DiagnosticSnapshot> {
  /** Strategy label, e.g. `cidManager.rotate()`; null when nothing was invoked */
  strategy: string | null;
  /** Identifier-manager attachment points present on the endpoint */
  found: string[];
  note: string;
  /** Rendered return value of an issue operation */
  issued?: string;
  /** Connection the attempt was made against, when known */
  connectionId?: string;
}

export interface RotationOutcome {
  success: boolean;
  detail: RotationDetail;
}

/** One rotation record as handed to the event log */
export interface RotationEvent {
  event: RotationEventKind;
  role: RotationRole;
  reason: RotationReason;
  detail: RotationDetail;
}

/** A rotation record as written to disk; `ts` is seconds since the epoch */
export interface RotationRecord extends RotationEvent {
  ts: number;
}

/** Path taken by a single maybeRotate() call */
export type RotationDecision = 'not_due' | 'suppressed' | 'rotated' | 'failed';

/** Monotonic clock in seconds */
export type Clock = () => number;
