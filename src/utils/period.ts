/**
 * Period Biller
 *
 * Bills a still-open intake for only the slice of its stay that falls inside
 * a billing window, independent of the lifetime subtotal.
 *
 *   billing start  = day after the watermark, or the check-in date
 *   period start   = max(date_from, billing start)
 *                    (exact check-in time when that is the check-in date)
 *   period end     = end of date_to
 *   line amount    = billable qty × rate × max(period days, min_bill_days)
 *
 * The watermark is the last date already billed, so consecutive windows
 * never overlap. min_bill_days applies to every period, so a short window
 * still bills the floor.
 */

import { addDays, endOfDay, maxDate, MS_PER_DAY, startOfDay, toDateString } from './dates';
import { billableQuantity, isFullyReleased, resolvePricing } from './charge';
import { minBillDays } from './duration';
import type { TariffRule } from '../types/tariff';
import type { Intake } from '../types/intake';
import type { BillingWindow, DaysInfo, PeriodCharge, PeriodLineCharge } from '../types/billing';

export interface PeriodBounds {
  start: number;
  end: number;
}

/** First calendar date not yet billed */
export function billingStartDate(intake: Pick<Intake, 'date_in' | 'last_billed_date'>): string {
  return intake.last_billed_date
    ? addDays(intake.last_billed_date, 1)
    : toDateString(intake.date_in);
}

/** Precise span the window bills for this intake, or null when nothing is new */
export function computePeriodBounds(
  intake: Pick<Intake, 'date_in' | 'last_billed_date'>,
  window: BillingWindow
): PeriodBounds | null {
  const effectiveStart = maxDate(window.date_from, billingStartDate(intake));
  if (effectiveStart > window.date_to) {
    return null;
  }

  const start =
    effectiveStart === toDateString(intake.date_in) ? intake.date_in : startOfDay(effectiveStart);
  const end = endOfDay(window.date_to);

  if (end - start <= 0) {
    return null;
  }
  return { start, end };
}

export function computePeriodCharge(
  intake: Intake,
  rules: Map<string, TariffRule>,
  window: BillingWindow
): PeriodCharge {
  const bounds = computePeriodBounds(intake, window);
  if (!bounds) {
    return {
      intake_id: intake.id,
      period_start: null,
      period_end: null,
      period_days: 0,
      lines: [],
      amount: 0,
    };
  }

  const periodDays = (bounds.end - bounds.start) / MS_PER_DAY;
  const lines: PeriodLineCharge[] = [];
  let amount = 0;

  for (const line of intake.lines) {
    const rule = line.tariff_rule_id ? rules.get(line.tariff_rule_id) : undefined;
    if (!rule) continue;

    // Goods that left before the period are not stored in it
    if (isFullyReleased(line) && line.date_out !== undefined && line.date_out < bounds.start) {
      continue;
    }

    const { basis, rate } = resolvePricing(line, rule);
    const billableQty = billableQuantity(basis, line);
    const effectiveDays = Math.max(periodDays, minBillDays(rule));
    const lineAmount = billableQty * rate * effectiveDays;

    lines.push({
      line_id: line.id,
      product_id: line.product_id,
      product_name: line.product_name,
      tariff_rule_id: rule.id,
      service_product: rule.service_product,
      basis,
      rate,
      billable_qty: billableQty,
      effective_days: effectiveDays,
      amount: lineAmount,
    });
    amount += lineAmount;
  }

  return {
    intake_id: intake.id,
    period_start: bounds.start,
    period_end: bounds.end,
    period_days: periodDays,
    lines,
    amount,
  };
}

/** Total, billed and pending days shown in the billing preview */
export function computeDaysInfo(
  intake: Pick<Intake, 'date_in' | 'last_billed_date'>,
  window: BillingWindow,
  now: number
): DaysInfo {
  const totalDays = Math.max(0, (now - intake.date_in) / MS_PER_DAY);
  const billedDays = intake.last_billed_date
    ? Math.max(0, (endOfDay(intake.last_billed_date) - intake.date_in) / MS_PER_DAY)
    : 0;
  const bounds = computePeriodBounds(intake, window);

  return {
    total_days: totalDays,
    billed_days: billedDays,
    pending_days: bounds ? (bounds.end - bounds.start) / MS_PER_DAY : 0,
  };
}
