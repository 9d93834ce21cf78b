/**
 * Billing Run Types
 *
 * Types for period billing and the batch billing run.
 */

import type { BillingBasis } from './tariff';
import type { InvoiceHandle } from './invoice';

/** Billing window, both ends inclusive (YYYY-MM-DD) */
export interface BillingWindow {
  date_from: string;
  date_to: string;
}

/** Amount attributed to one storage line for a billing window */
export interface PeriodLineCharge {
  line_id: string;
  product_id: string;
  product_name: string;
  tariff_rule_id: string;
  service_product: string;
  basis: BillingBasis;
  rate: number;
  billable_qty: number;
  /** Period days after the rule's minimum billable days */
  effective_days: number;
  amount: number;
}

/** Amount attributed to one intake for a billing window */
export interface PeriodCharge {
  intake_id: string;
  /** Unix ms, null when nothing is billable */
  period_start: number | null;
  period_end: number | null;
  period_days: number;
  lines: PeriodLineCharge[];
  amount: number;
}

export interface DaysInfo {
  /** Days since check-in */
  total_days: number;
  /** Days from check-in through the end of the watermark day */
  billed_days: number;
  /** Days the window would bill */
  pending_days: number;
}

export type BillingRunMode = 'unbilled_only' | 'all_in_range';

export type InvoiceGrouping = 'customer' | 'intake';

/** Parameters for a billing run */
export interface BillingRunParams extends BillingWindow {
  company_id: string;
  mode?: BillingRunMode;
  customer_ids?: string[];
  contract_ids?: string[];
  /** Intakes deselected in the preview */
  excluded_intake_ids?: string[];
  grouping?: InvoiceGrouping;
  /** Clear watermarks of intakes without an active invoice before selecting */
  reset_watermarks?: boolean;
  /** Defaults to today */
  invoice_date?: string;
}

/** One selected intake in the run's working set */
export interface BillingIntakeLine extends DaysInfo {
  intake_id: string;
  intake_name: string;
  customer_id: string;
  location_id: string;
  date_in: number;
  last_billed_date: string | null;
  period_amount: number;
  total_amount: number;
  selected: boolean;
  charge: PeriodCharge;
}

export interface IssuedInvoice extends InvoiceHandle {
  customer_id: string;
  intake_ids: string[];
  total: number;
}

export interface BillingFailure {
  /** Customer id or intake id depending on grouping */
  group: string;
  intake_ids: string[];
  code: string;
  reason: string;
}

/** Result of a billing run or preview */
export interface BillingRunResult {
  run_id: string;
  company_id: string;
  window: BillingWindow;
  mode: BillingRunMode;
  grouping: InvoiceGrouping;
  preview: boolean;
  reset_count: number;
  intakes: BillingIntakeLine[];
  invoices: IssuedInvoice[];
  failures: BillingFailure[];
  total_amount: number;
}
