// Path: src/services/cid-lifecycle/manager.ts
// Per-connection rotation gating and event recording

import { createLogger } from '../../lib/logger.js';
import { metrics } from '../../lib/metrics.js';
import type { RotationEventSink } from '../../lib/event-log.js';
import { monotonicSeconds } from '../../utils/timer.js';
import { computeNextDeadline } from './policy.js';
import { RotationStrategyResolver } from './resolver.js';
import { ProbingRotationSurface, type RotationSurface } from './surface.js';
import type {
  Clock,
  RotationDecision,
  RotationDetail,
  RotationOutcome,
  RotationPolicy,
  RotationReason,
  RotationRole,
} from './types.js';

const log = createLogger({ module: 'cid-lifecycle' });

export interface CidLifecycleManagerOptions {
  policy: RotationPolicy;
  eventLog: RotationEventSink;
  role: RotationRole;
  /** Identifies the owning connection in events and logs */
  connectionId?: string;
  resolver?: RotationStrategyResolver;
  /** Monotonic seconds; defaults to performance.now() */
  clock?: Clock;
  /** Adapter from an opaque endpoint handle to a rotation surface */
  surfaceFor?: (endpoint: unknown) => RotationSurface;
  /** Called after each successful rotation with the endpoint it applied to */
  onRotated?: (endpoint: unknown) => void;
}

export interface CidLifecycleState {
  nextDeadline: number;
  lastRotateTime: number;
}

/**
 * CID Lifecycle Manager
 *
 * Decides when a rotation is due (interval + jitter, gated by the minimum
 * gap), delegates the attempt to the resolver and appends one event per
 * attempt. The gating state belongs to a single connection and is only
 * touched from that connection's tick loop; forceRotate() never reads or
 * writes it.
 */
export class CidLifecycleManager {
  readonly policy: RotationPolicy;
  readonly role: RotationRole;
  private readonly eventLog: RotationEventSink;
  private readonly connectionId?: string;
  private readonly resolver: RotationStrategyResolver;
  private readonly clock: Clock;
  private readonly surfaceFor: (endpoint: unknown) => RotationSurface;
  private readonly onRotated?: (endpoint: unknown) => void;
  private nextDeadline: number;
  private lastRotateTime = Number.NEGATIVE_INFINITY;

  constructor(options: CidLifecycleManagerOptions) {
    this.policy = options.policy;
    this.role = options.role;
    this.eventLog = options.eventLog;
    this.connectionId = options.connectionId;
    this.resolver = options.resolver ?? new RotationStrategyResolver();
    this.clock = options.clock ?? monotonicSeconds;
    this.surfaceFor = options.surfaceFor ?? ((endpoint) => new ProbingRotationSurface(endpoint));
    this.onRotated = options.onRotated;
    this.nextDeadline = computeNextDeadline(this.policy, this.clock());
  }

  /**
   * Timer path. Cheap when not due: one clock read and one comparison.
   * Rejects only when the event log can't be written.
   */
  async maybeRotate(endpoint: unknown, reason: RotationReason = 'timer'): Promise<RotationDecision> {
    const now = this.clock();

    if (now < this.nextDeadline) {
      return 'not_due';
    }

    if (now - this.lastRotateTime < this.policy.minGapSeconds) {
      this.nextDeadline = computeNextDeadline(this.policy, now);
      metrics.rotationSuppressed(this.role);
      log.debug({
        connectionId: this.connectionId,
        sinceLastRotation: now - this.lastRotateTime,
        minGapSeconds: this.policy.minGapSeconds,
      }, 'Rotation due but inside minimum gap, deferred');
      return 'suppressed';
    }

    const outcome = await this.attempt(endpoint, reason);

    // Gating state moves before the append, so a failing sink can't cause a retry storm
    if (outcome.success || this.policy.resetGapOnFailure) {
      this.lastRotateTime = now;
    }
    this.nextDeadline = computeNextDeadline(this.policy, now);

    await this.record(outcome, reason);
    return outcome.success ? 'rotated' : 'failed';
  }

  /**
   * Manual path: attempt and record without policy gating.
   */
  async forceRotate(
    endpoint: unknown,
    reason: RotationReason = 'manual',
    connectionId?: string
  ): Promise<RotationOutcome> {
    const outcome = await this.attempt(endpoint, reason);
    await this.record(outcome, reason, connectionId);
    return outcome;
  }

  /**
   * Record a failed rotation that never reached the resolver.
   */
  async recordFailure(note: string, reason: RotationReason, connectionId?: string): Promise<void> {
    const detail: RotationDetail = { strategy: null, found: [], note };
    await this.record({ success: false, detail }, reason, connectionId);
  }

  getState(): CidLifecycleState {
    return {
      nextDeadline: this.nextDeadline,
      lastRotateTime: this.lastRotateTime,
    };
  }

  private async attempt(endpoint: unknown, reason: RotationReason): Promise<RotationOutcome> {
    const startedAt = Date.now();
    const outcome = await this.resolver.attemptRotation(this.surfaceFor(endpoint));

    metrics.rotationAttempt(
      outcome.success ? 'ok' : 'failed',
      { role: this.role, reason, strategy: outcome.detail.strategy },
      Date.now() - startedAt
    );
    if (outcome.success) {
      this.onRotated?.(endpoint);
    }
    return outcome;
  }

  private async record(
    outcome: RotationOutcome,
    reason: RotationReason,
    connectionId = this.connectionId
  ): Promise<void> {
    const detail: RotationDetail =
      connectionId === undefined ? outcome.detail : { ...outcome.detail, connectionId };

    if (outcome.success) {
      log.info({ connectionId, reason, strategy: detail.strategy }, 'Connection ID rotated');
    } else {
      log.warn({ connectionId, reason, strategy: detail.strategy, note: detail.note }, 'Connection ID rotation failed');
    }

    try {
      await this.eventLog.append({
        event: outcome.success ? 'rotate_ok' : 'rotate_failed',
        role: this.role,
        reason,
        detail,
      });
    } catch (err) {
      metrics.eventLogFailure();
      throw err;
    }
  }
}
