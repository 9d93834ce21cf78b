/**
 * Tariff Types
 *
 * A tariff rule is a pricing policy: what physical quantity is charged
 * (basis), at what rate per unit per day, and how elapsed time is rounded
 * into billable days.
 */

export type BillingBasis = 'weight' | 'volume' | 'pallet' | 'flat';

export type RoundingPolicy = 'ceil_day' | 'half_up' | 'exact_hours' | '2h_step';

export interface TariffRule {
  id: string;
  name: string;
  company_id: string;
  /** Inactive rules are never matched */
  active: boolean;
  /** Evaluation order, lower first */
  sequence: number;
  basis: BillingBasis;
  /** Price per basis unit per day */
  rate: number;
  currency: string;
  rounding_policy: RoundingPolicy;
  /** Floor applied after policy rounding (default 1.0) */
  min_bill_days?: number;

  // Optional match filters
  product_id?: string;
  product_category?: string;
  min_temp?: number;
  max_temp?: number;
  min_qty?: number;

  /** Service product used on invoice lines for storage charges */
  service_product: string;
}

/** What the matcher needs to know about a stored line */
export interface TariffMatchContext {
  product_id: string;
  product_category?: string;
  qty_in: number;
  /** Target temperature of the owning intake (°C) */
  temperature_target?: number;
}

export interface CreateTariffParams {
  name: string;
  company_id: string;
  basis: BillingBasis;
  rate: number;
  service_product: string;
  active?: boolean;
  sequence?: number;
  currency?: string;
  rounding_policy?: RoundingPolicy;
  min_bill_days?: number;
  product_id?: string;
  product_category?: string;
  min_temp?: number;
  max_temp?: number;
  min_qty?: number;
}
