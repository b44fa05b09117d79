// Path: src/services/cid-lifecycle/index.ts
// Re-exports for the connection-ID lifecycle subsystem

export { CidLifecycleManager } from './manager.js';
export type { CidLifecycleManagerOptions, CidLifecycleState } from './manager.js';

export { RotationStrategyResolver } from './resolver.js';
export type { RotationStrategyResolverOptions } from './resolver.js';

export {
  ProbingRotationSurface,
  readNewestHostCid,
  renderValue,
  toHex,
} from './surface.js';
export type { RotationOperation, RotationOperationKind, RotationSurface } from './surface.js';

export { computeNextDeadline, createRotationPolicy, describePolicy } from './policy.js';

export type {
  Clock,
  DiagnosticSnapshot,
  RotationDecision,
  RotationDetail,
  RotationEvent,
  RotationEventKind,
  RotationOutcome,
  RotationPolicy,
  RotationReason,
  RotationRecord,
  RotationRole,
} from './types.js';

// Constants (for testing/external use)
export {
  DEFAULT_INITIAL_DELAY_MS,
  DEFAULT_ROTATION_POLICY,
  DEFAULT_STRATEGY_TIMEOUT_MS,
  DEFAULT_TICK_INTERVAL_MS,
  NO_ROTATION_SURFACE_NOTE,
} from './types.js';
