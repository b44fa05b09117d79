// Path: src/services/cid-lifecycle/policy.test.ts

import { describe, it, expect } from 'vitest';
import { computeNextDeadline, createRotationPolicy, describePolicy } from './policy.js';
import { DEFAULT_ROTATION_POLICY } from './types.js';
import { RotorError } from '../../utils/error.js';

describe('createRotationPolicy', () => {
  it('should fill missing fields from defaults', () => {
    const policy = createRotationPolicy({ minGapSeconds: 5 });
    expect(policy).toEqual({
      rotateIntervalSeconds: 30,
      jitterSeconds: 3,
      minGapSeconds: 5,
      resetGapOnFailure: true,
    });
  });

  it('should return a frozen policy', () => {
    expect(Object.isFrozen(createRotationPolicy())).toBe(true);
    expect(Object.isFrozen(DEFAULT_ROTATION_POLICY)).toBe(true);
  });

  it('should accept zero for every numeric field', () => {
    const policy = createRotationPolicy({ rotateIntervalSeconds: 0, jitterSeconds: 0, minGapSeconds: 0 });
    expect(policy.rotateIntervalSeconds).toBe(0);
  });

  it('should reject negative values', () => {
    expect(() => createRotationPolicy({ jitterSeconds: -1 })).toThrow(RotorError);
    expect(() => createRotationPolicy({ jitterSeconds: -1 })).toThrow('jitterSeconds must be a non-negative number');
  });

  it('should reject non-finite values', () => {
    expect(() => createRotationPolicy({ minGapSeconds: Number.NaN })).toThrow('minGapSeconds');
    expect(() => createRotationPolicy({ rotateIntervalSeconds: Infinity })).toThrow('rotateIntervalSeconds');
  });

  it('should tag validation errors with a code', () => {
    try {
      createRotationPolicy({ minGapSeconds: -2 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RotorError);
      if (err instanceof RotorError) {
        expect(err.code).toBe('INVALID_ROTATION_POLICY');
      }
    }
  });
});

describe('computeNextDeadline', () => {
  it('should be +Infinity when the interval is zero', () => {
    const policy = createRotationPolicy({ rotateIntervalSeconds: 0 });
    expect(computeNextDeadline(policy, 1234.5)).toBe(Number.POSITIVE_INFINITY);
  });

  it('should add no jitter at whole seconds', () => {
    const policy = createRotationPolicy({ rotateIntervalSeconds: 30, jitterSeconds: 3 });
    expect(computeNextDeadline(policy, 100)).toBe(130);
  });

  it('should scale the fractional part of now by the jitter bound', () => {
    const policy = createRotationPolicy({ rotateIntervalSeconds: 10, jitterSeconds: 4 });
    expect(computeNextDeadline(policy, 50.5)).toBe(62.5);
  });

  it('should be exactly now + interval with zero jitter', () => {
    const policy = createRotationPolicy({ rotateIntervalSeconds: 10, jitterSeconds: 0 });
    expect(computeNextDeadline(policy, 7.25)).toBe(17.25);
  });

  it('should stay within [now + interval, now + interval + jitter)', () => {
    const policy = createRotationPolicy({ rotateIntervalSeconds: 30, jitterSeconds: 3 });
    for (const now of [0, 0.001, 12.999, 500.42, 9999.9]) {
      const deadline = computeNextDeadline(policy, now);
      expect(deadline).toBeGreaterThanOrEqual(now + 30);
      expect(deadline).toBeLessThan(now + 33);
    }
  });
});

describe('describePolicy', () => {
  it('should render every field', () => {
    expect(describePolicy(DEFAULT_ROTATION_POLICY)).toBe('interval=30s jitter=3s minGap=10s resetGapOnFailure=true');
  });
});
