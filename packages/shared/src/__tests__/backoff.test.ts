import { describe, it, expect } from 'vitest';
import { computeBackoffDelay } from '../backoff.js';

const policy = { delayMs: 1000, maxDelayMs: 10_000, jitterRatio: 0.2 };

describe('computeBackoffDelay', () => {
  it('uses the fixed delay when nothing has failed', () => {
    expect(computeBackoffDelay(policy, 0, () => 0.9)).toBe(1000);
  });

  it('waits the fixed delay after the first failure and doubles after that', () => {
    const noJitter = () => 0;
    expect([1, 2, 3, 4].map((n) => computeBackoffDelay(policy, n, noJitter))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(computeBackoffDelay(policy, 12, () => 0)).toBe(10_000);
  });

  it('takes at most jitterRatio off the delay', () => {
    expect(computeBackoffDelay(policy, 3, () => 1)).toBe(3200);
    expect(computeBackoffDelay(policy, 3, () => 0.5)).toBe(3600);
  });

  it('stays at the fixed delay when the ceiling is not above it', () => {
    const fixed = { delayMs: 30_000, maxDelayMs: 30_000, jitterRatio: 0 };
    expect(computeBackoffDelay(fixed, 5)).toBe(30_000);
  });
});
