/**
 * Duration Calculator
 *
 * Turns an elapsed storage span into billable days under a tariff's
 * rounding policy.
 *
 * Policies:
 * - ceil_day:    whole days, rounded up, at least 1
 * - half_up:     0.5 below one day, 1.0 from one day on (never more than 1.0)
 * - exact_hours: days to 2 decimals, no floor
 * - 2h_step:     hours rounded up to the next even hour
 *
 * The rule's min_bill_days is applied after policy rounding.
 */

import { MS_PER_HOUR } from './dates';
import type { RoundingPolicy, TariffRule } from '../types/tariff';

export const DEFAULT_MIN_BILL_DAYS = 1.0;

/** Hours between two timestamps, never negative */
export function elapsedHours(start: number, end: number): number {
  return Math.max(0, (end - start) / MS_PER_HOUR);
}

/** Policy rounding only, before the minimum billable days floor */
export function roundDuration(hours: number, policy: RoundingPolicy): number {
  const safeHours = Math.max(0, hours);
  const days = safeHours / 24;

  switch (policy) {
    case 'ceil_day':
      return Math.max(1.0, Math.ceil(days));
    case 'half_up':
      // Only distinguishes a half day from a full day
      return days >= 1.0 ? 1.0 : 0.5;
    case 'exact_hours':
      return Math.round(days * 100) / 100;
    case '2h_step':
      return (Math.ceil(safeHours / 2) * 2) / 24;
    default: {
      const unknown: never = policy;
      throw new Error(`Unsupported rounding policy: ${String(unknown)}`);
    }
  }
}

export function minBillDays(rule: Pick<TariffRule, 'min_bill_days'>): number {
  return rule.min_bill_days ?? DEFAULT_MIN_BILL_DAYS;
}

/**
 * Billable days for a span of hours under a rule
 *
 * Example: 25 hours, ceil_day, min 1 → ceil(1.04) = 2 days
 */
export function computeDurationDays(
  hours: number,
  rule: Pick<TariffRule, 'rounding_policy' | 'min_bill_days'>
): number {
  return Math.max(roundDuration(hours, rule.rounding_policy), minBillDays(rule));
}
