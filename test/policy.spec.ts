/**
 * Limit Policy Tests
 */

import Decimal from 'decimal.js';
import { decide } from '../src/lib/policy';

const d = (value: string) => new Decimal(value);

describe('decide', () => {
  it('should accept an expense that stays under the limit', () => {
    const decision = decide({
      currentTotal: d('0'),
      existingAmount: null,
      proposed: d('45.50'),
      limit: d('210.00'),
    });

    expect(decision.kind).toBe('accept');
    if (decision.kind === 'accept') {
      expect(decision.newTotal.toFixed(2)).toBe('45.50');
      expect(decision.recordAmount.toFixed(2)).toBe('45.50');
    }
  });

  it('should accept a total exactly at the limit', () => {
    const decision = decide({
      currentTotal: d('60.00'),
      existingAmount: null,
      proposed: d('40.00'),
      limit: d('100.00'),
    });

    expect(decision.kind).toBe('accept');
  });

  it('should reject a total one cent over the limit', () => {
    const decision = decide({
      currentTotal: d('60.00'),
      existingAmount: null,
      proposed: d('40.01'),
      limit: d('100.00'),
    });

    expect(decision).toEqual({
      kind: 'reject',
      current: d('60.00'),
      attempted: d('40.01'),
      limit: d('100.00'),
    });
  });

  it('should merge into the existing amount of the same day', () => {
    const decision = decide({
      currentTotal: d('80.00'),
      existingAmount: d('30.00'),
      proposed: d('15.25'),
      limit: d('210.00'),
    });

    expect(decision.kind).toBe('accept');
    if (decision.kind === 'accept') {
      expect(decision.recordAmount.toFixed(2)).toBe('45.25');
      expect(decision.newTotal.toFixed(2)).toBe('95.25');
    }
  });

  it('should report the raw attempted amount, not the merged one, on rejection', () => {
    const decision = decide({
      currentTotal: d('45.50'),
      existingAmount: d('45.50'),
      proposed: d('200'),
      limit: d('210.00'),
    });

    expect(decision.kind).toBe('reject');
    if (decision.kind === 'reject') {
      expect(decision.current.toFixed(2)).toBe('45.50');
      expect(decision.attempted.toFixed(2)).toBe('200.00');
      expect(decision.limit.toFixed(2)).toBe('210.00');
    }
  });

  it('should keep decimal arithmetic exact', () => {
    const decision = decide({
      currentTotal: d('0.1'),
      existingAmount: null,
      proposed: d('0.2'),
      limit: d('0.3'),
    });

    expect(decision.kind).toBe('accept');
    if (decision.kind === 'accept') {
      expect(decision.newTotal.toString()).toBe('0.3');
    }
  });
});
