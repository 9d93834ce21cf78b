/**
 * Invoice line construction
 *
 * Turns computed storage charges into invoice line items with resolved
 * income accounts. Amounts are rounded to cents here and nowhere earlier.
 */

import { resolveAccountOrThrow } from './accounts';
import { roundCurrency } from './charge';
import { toDateString } from './dates';
import type { AccountResolver } from '../types/services';
import type { InvoiceLineItem } from '../types/invoice';
import type { BillingWindow, PeriodCharge } from '../types/billing';
import type { Intake } from '../types/intake';
import type { Release } from '../types/release';
import type { TariffRule } from '../types/tariff';

export function periodReference(window: BillingWindow): string {
  return `Cold storage charges from ${window.date_from} to ${window.date_to}`;
}

/**
 * One line per service product of the intake
 *
 * Example: "Cold storage charges for IN/2024/00001 from 2024-01-01 to 2024-01-31, 31.00 days"
 */
export async function buildPeriodLineItems(
  intake: Intake,
  charge: PeriodCharge,
  accounts: AccountResolver
): Promise<InvoiceLineItem[]> {
  if (charge.period_start === null || charge.period_end === null) {
    return [];
  }

  const from = toDateString(charge.period_start);
  const to = toDateString(charge.period_end);
  const byProduct = new Map<string, { amount: number; category?: string }>();

  for (const line of charge.lines) {
    if (line.amount <= 0) continue;

    const storageLine = intake.lines.find((l) => l.id === line.line_id);
    const entry = byProduct.get(line.service_product) ?? {
      amount: 0,
      category: storageLine?.product_category,
    };
    entry.amount += line.amount;
    byProduct.set(line.service_product, entry);
  }

  const items: InvoiceLineItem[] = [];
  for (const [product, entry] of byProduct) {
    const accountRef = await resolveAccountOrThrow(accounts, {
      product_id: product,
      product_category: entry.category,
    });
    items.push({
      description: `Cold storage charges for ${intake.name} from ${from} to ${to}, ${charge.period_days.toFixed(2)} days`,
      amount: roundCurrency(entry.amount),
      account_ref: accountRef,
      product_ref: product,
    });
  }

  return items;
}

/**
 * One line per released storage line with a positive charge
 *
 * Example: "Storage: Frozen peas (LOT-7) from 2024-01-01 to 2024-01-11, 10.00 days @ 0.50/weight"
 */
export async function buildReleaseLineItems(
  release: Release,
  intake: Intake,
  rules: Map<string, TariffRule>,
  accounts: AccountResolver
): Promise<InvoiceLineItem[]> {
  const items: InvoiceLineItem[] = [];

  for (const releaseLine of release.lines) {
    if (releaseLine.amount_line <= 0) continue;

    const line = intake.lines.find((l) => l.id === releaseLine.intake_line_id);
    const rule = line?.tariff_rule_id ? rules.get(line.tariff_rule_id) : undefined;
    if (!line || !rule) continue;

    const accountRef = await resolveAccountOrThrow(accounts, {
      product_id: rule.service_product,
      product_category: line.product_category,
    });
    const rate = line.price_unit ?? rule.rate;
    const basis = line.bill_basis ?? rule.basis;

    items.push({
      description:
        `Storage: ${line.product_name} (${line.lot_id ?? 'No Lot'}) ` +
        `from ${toDateString(line.date_in)} to ${toDateString(release.date_out)}, ` +
        `${releaseLine.duration_days.toFixed(2)} days @ ${rate.toFixed(2)}/${basis}`,
      amount: roundCurrency(releaseLine.amount_line),
      account_ref: accountRef,
      product_ref: rule.service_product,
    });
  }

  return items;
}

export function invoiceTotal(items: InvoiceLineItem[]): number {
  return roundCurrency(items.reduce((sum, item) => sum + item.amount, 0));
}
