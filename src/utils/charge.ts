/**
 * Charge Calculator
 *
 * Lifetime subtotal of a storage line: rate × billable quantity × billable
 * days, where the days run from the line's check-in to its release (once
 * fully released) or to now. Everything here is a pure derivation; callers
 * recompute on read instead of storing side effects.
 */

import { computeDurationDays, elapsedHours } from './duration';
import type { BillingBasis, TariffRule } from '../types/tariff';
import type { Intake, IntakeTotals, StorageLine } from '../types/intake';

export interface LineCharge {
  duration_hours: number;
  duration_days: number;
  billable_qty: number;
  amount: number;
}

export interface LinePricing {
  basis: BillingBasis;
  rate: number;
}

/**
 * Quantity charged under a basis
 *
 * weight falls back to qty_in when no weight was recorded;
 * volume and pallet have no fallback; flat is always 1.
 */
export function billableQuantity(
  basis: BillingBasis,
  line: Pick<StorageLine, 'weight' | 'volume' | 'pallet_count' | 'qty_in'>
): number {
  switch (basis) {
    case 'weight':
      return line.weight || line.qty_in || 0;
    case 'volume':
      return line.volume || 0;
    case 'pallet':
      return line.pallet_count || 0;
    case 'flat':
      return 1;
    default: {
      const unknown: never = basis;
      throw new Error(`Unsupported billing basis: ${String(unknown)}`);
    }
  }
}

/** Line override first, rule default otherwise */
export function resolvePricing(line: StorageLine, rule: TariffRule): LinePricing {
  return {
    basis: line.bill_basis ?? rule.basis,
    rate: line.price_unit ?? rule.rate,
  };
}

export function isFullyReleased(line: Pick<StorageLine, 'qty_in' | 'qty_out'>): boolean {
  return line.qty_out >= line.qty_in;
}

/** End of the billable stay: release time once fully out, else now */
export function storageEnd(line: StorageLine, now: number): number {
  if (isFullyReleased(line) && line.date_out !== undefined) {
    return line.date_out;
  }
  return now;
}

export function computeLineCharge(line: StorageLine, rule: TariffRule, now: number): LineCharge {
  const { basis, rate } = resolvePricing(line, rule);
  const durationHours = elapsedHours(line.date_in, storageEnd(line, now));
  const durationDays = computeDurationDays(durationHours, rule);
  const billableQty = billableQuantity(basis, line);

  return {
    duration_hours: durationHours,
    duration_days: durationDays,
    billable_qty: billableQty,
    amount: rate * billableQty * durationDays,
  };
}

/** Recompute the derived fields of a line; no rule means no charge */
export function deriveLine(
  line: StorageLine,
  rules: Map<string, TariffRule>,
  now: number
): StorageLine {
  const rule = line.tariff_rule_id ? rules.get(line.tariff_rule_id) : undefined;
  const durationHours = elapsedHours(line.date_in, storageEnd(line, now));

  if (!rule) {
    return {
      ...line,
      duration_hours: durationHours,
      duration_days: durationHours / 24,
      amount_subtotal: 0,
    };
  }

  const charge = computeLineCharge(line, rule, now);
  return {
    ...line,
    duration_hours: charge.duration_hours,
    duration_days: charge.duration_days,
    amount_subtotal: charge.amount,
  };
}

export function deriveIntake(intake: Intake, rules: Map<string, TariffRule>, now: number): Intake {
  return {
    ...intake,
    lines: intake.lines.map((line) => deriveLine(line, rules, now)),
  };
}

export function summarizeIntake(intake: Pick<Intake, 'lines'>): IntakeTotals {
  const totals: IntakeTotals = {
    total_qty_in: 0,
    total_qty_out: 0,
    total_weight: 0,
    total_volume: 0,
    total_amount: 0,
  };

  for (const line of intake.lines) {
    totals.total_qty_in += line.qty_in;
    totals.total_qty_out += line.qty_out;
    totals.total_weight += line.weight;
    totals.total_volume += line.volume;
    totals.total_amount += line.amount_subtotal;
  }

  return totals;
}

/**
 * Share of the lifetime subtotal attributable to a released quantity
 *
 * Example: subtotal 900, qty_in 30, releasing 10 → 300
 */
export function computeReleaseAmount(
  line: Pick<StorageLine, 'amount_subtotal' | 'qty_in'>,
  releasedQty: number
): number {
  if (line.qty_in <= 0) {
    return 0;
  }
  return (line.amount_subtotal * releasedQty) / line.qty_in;
}

export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}
