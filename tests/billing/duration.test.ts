import { describe, it, expect } from 'vitest';
import type { RoundingPolicy } from '../../src/types/tariff';
import { computeDurationDays, elapsedHours, roundDuration } from '../../src/utils/duration';

describe('roundDuration', () => {
  it('ceil_day rounds partial days up', () => {
    expect(roundDuration(25, 'ceil_day')).toBe(2);
    expect(roundDuration(48, 'ceil_day')).toBe(2);
  });

  it('ceil_day bills at least one day', () => {
    expect(roundDuration(0, 'ceil_day')).toBe(1);
    expect(roundDuration(3, 'ceil_day')).toBe(1);
  });

  it('half_up only distinguishes half and full days', () => {
    expect(roundDuration(6, 'half_up')).toBe(0.5);
    expect(roundDuration(24, 'half_up')).toBe(1);
    expect(roundDuration(72, 'half_up')).toBe(1);
  });

  it('exact_hours keeps two decimals of a day', () => {
    expect(roundDuration(36, 'exact_hours')).toBe(1.5);
    expect(roundDuration(1, 'exact_hours')).toBe(0.04);
  });

  it('2h_step rounds up to the next even hour', () => {
    expect(roundDuration(3, '2h_step')).toBeCloseTo(4 / 24, 10);
    expect(roundDuration(0.5, '2h_step')).toBeCloseTo(2 / 24, 10);
    expect(roundDuration(4, '2h_step')).toBeCloseTo(4 / 24, 10);
  });

  it('treats negative spans as zero', () => {
    expect(roundDuration(-5, 'exact_hours')).toBe(0);
  });
});

describe('computeDurationDays', () => {
  it('applies the default one-day floor after rounding', () => {
    expect(computeDurationDays(25, { rounding_policy: 'ceil_day' })).toBe(2);
    expect(computeDurationDays(3, { rounding_policy: '2h_step' })).toBe(1);
  });

  it('uses the rule minimum when set', () => {
    expect(computeDurationDays(3, { rounding_policy: '2h_step', min_bill_days: 0 })).toBeCloseTo(
      4 / 24,
      10
    );
    expect(computeDurationDays(6, { rounding_policy: 'half_up', min_bill_days: 3 })).toBe(3);
  });
});

describe('computeDurationDays over a range of spans', () => {
  const policies: RoundingPolicy[] = ['ceil_day', 'half_up', 'exact_hours', '2h_step'];
  const minimums = [undefined, 0, 0.5, 1, 3];

  it('never decreases and never bills under the minimum', () => {
    for (const rounding_policy of policies) {
      for (const min_bill_days of minimums) {
        const rule = { rounding_policy, min_bill_days };
        const floor = min_bill_days ?? 1;
        let previous = 0;

        for (let step = 0; step <= 2000; step++) {
          const days = computeDurationDays(step / 10, rule);
          expect(days).toBeGreaterThanOrEqual(previous);
          expect(days).toBeGreaterThanOrEqual(floor);
          previous = days;
        }
      }
    }
  });
});

describe('elapsedHours', () => {
  it('never goes negative', () => {
    expect(elapsedHours(10_000, 0)).toBe(0);
    expect(elapsedHours(0, 90 * 60 * 1000)).toBe(1.5);
  });
});
