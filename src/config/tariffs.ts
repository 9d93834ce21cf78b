/**
 * Default Tariff Catalog
 *
 * Starting set of storage tariffs loaded by scripts/seed-tariffs.ts.
 * Rules are evaluated by ascending sequence; the catch-all weight rule
 * comes last.
 */

import { DEFAULT_CURRENCY } from './billing';
import type { TariffRule } from '../types/tariff';

type TariffTemplate = Omit<TariffRule, 'company_id' | 'currency'>;

export const DEFAULT_TARIFF_CATALOG: TariffTemplate[] = [
  {
    id: 'tariff_frozen_pallet',
    name: 'Frozen pallet storage',
    active: true,
    sequence: 5,
    basis: 'pallet',
    rate: 1.5,         // per pallet per day
    rounding_policy: 'ceil_day',
    min_bill_days: 1,
    max_temp: -15,
    min_qty: 1,
    service_product: 'svc_storage_frozen',
  },
  {
    id: 'tariff_chilled_volume',
    name: 'Chilled storage by volume',
    active: true,
    sequence: 10,
    basis: 'volume',
    rate: 0.8,         // per m³ per day
    rounding_policy: 'ceil_day',
    min_bill_days: 1,
    min_temp: 0,
    max_temp: 8,
    service_product: 'svc_storage_chilled',
  },
  {
    id: 'tariff_short_stay',
    name: 'Short stay handling',
    active: true,
    sequence: 15,
    basis: 'flat',
    rate: 12,          // per line per day
    rounding_policy: '2h_step',
    min_bill_days: 0.25,
    product_category: 'express',
    service_product: 'svc_storage_handling',
  },
  {
    id: 'tariff_general_weight',
    name: 'General storage by weight',
    active: true,
    sequence: 100,
    basis: 'weight',
    rate: 0.05,        // per kg per day
    rounding_policy: 'ceil_day',
    min_bill_days: 1,
    service_product: 'svc_storage_chilled',
  },
];

/**
 * Catalog rules for one company
 */
export function getDefaultTariffs(companyId: string, currency: string = DEFAULT_CURRENCY): TariffRule[] {
  return DEFAULT_TARIFF_CATALOG.map((template) => ({
    ...template,
    id: `${template.id}_${companyId}`,
    company_id: companyId,
    currency,
  }));
}
