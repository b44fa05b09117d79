// Path: src/services/cid-lifecycle/policy.ts
// Rotation policy construction and deadline scheduling

import { RotorError } from '../../utils/error.js';
import { DEFAULT_ROTATION_POLICY, type RotationPolicy } from './types.js';

type NumericPolicyField = 'rotateIntervalSeconds' | 'jitterSeconds' | 'minGapSeconds';

const NUMERIC_FIELDS: readonly NumericPolicyField[] = [
  'rotateIntervalSeconds',
  'jitterSeconds',
  'minGapSeconds',
];

/**
 * Build a frozen policy from defaults plus overrides.
 * Throws a RotorError (code INVALID_ROTATION_POLICY) for negative or non-finite values.
 */
export function createRotationPolicy(overrides: Partial<RotationPolicy> = {}): RotationPolicy {
  const policy: RotationPolicy = {
    ...DEFAULT_ROTATION_POLICY,
    ...overrides,
  };

  for (const field of NUMERIC_FIELDS) {
    const value = policy[field];
    if (!Number.isFinite(value) || value < 0) {
      throw new RotorError(
        `${field} must be a non-negative number`,
        'INVALID_ROTATION_POLICY',
        { metadata: { field, value } }
      );
    }
  }

  return Object.freeze(policy);
}

/**
 * Next timer deadline for a decision taken at `now` (monotonic seconds).
 *
 * Returns +Infinity when the timer path is disabled. Otherwise the jitter is
 * the fractional part of `now` scaled by jitterSeconds, so the result lies in
 * [now + interval, now + interval + jitter). This is not a randomness source.
 */
export function computeNextDeadline(policy: RotationPolicy, now: number): number {
  if (policy.rotateIntervalSeconds <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  const fraction = now - Math.floor(now);
  const jitter = fraction * policy.jitterSeconds;
  return now + policy.rotateIntervalSeconds + jitter;
}

/**
 * One-line policy summary for console and log output
 */
export function describePolicy(policy: RotationPolicy): string {
  return [
    `interval=${policy.rotateIntervalSeconds}s`,
    `jitter=${policy.jitterSeconds}s`,
    `minGap=${policy.minGapSeconds}s`,
    `resetGapOnFailure=${String(policy.resetGapOnFailure)}`,
  ].join(' ');
}
