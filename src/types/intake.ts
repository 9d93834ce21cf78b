/**
 * Intake Types
 */

import type { BillingBasis } from './tariff';

export type IntakeState = 'draft' | 'checked_in' | 'partially_out' | 'closed' | 'cancelled';

/** One stored batch of a product within an intake */
export interface StorageLine {
  id: string;
  product_id: string;
  product_name: string;
  product_category?: string;
  lot_id?: string;
  qty_in: number;
  /** Released so far, never above qty_in */
  qty_out: number;
  /** Kilograms */
  weight: number;
  /** Cubic meters */
  volume: number;
  pallet_count: number;
  /** Storage space (bin) the line is placed in */
  space_id?: string;
  /** Check-in time of the line (Unix ms) */
  date_in: number;
  /** Time of the latest release touching this line (Unix ms) */
  date_out?: number;
  tariff_rule_id?: string;
  /** Line-level overrides, copied from the rule on assignment */
  price_unit?: number;
  bill_basis?: BillingBasis;
  /** Set when an operator picked the rule; suggestions never replace it */
  tariff_manual: boolean;
  /** Derived values, recomputed on every read */
  duration_hours: number;
  duration_days: number;
  amount_subtotal: number;
  expiry_date?: string;
  remark?: string;
}

export interface Intake {
  id: string;
  /** Document number, e.g. IN/2024/00001 */
  name: string;
  company_id: string;
  customer_id: string;
  location_id: string;
  /** Check-in time (Unix ms) */
  date_in: number;
  planned_date_out?: number;
  temperature_target?: number;
  state: IntakeState;
  /** Last date (YYYY-MM-DD) this intake has been billed through */
  last_billed_date: string | null;
  contract_id?: string;
  currency: string;
  lines: StorageLine[];
  note?: string;
  gate_in_id?: string;
  vehicle_number?: string;
  driver_name?: string;
}

export interface IntakeTotals {
  total_qty_in: number;
  total_qty_out: number;
  total_weight: number;
  total_volume: number;
  total_amount: number;
}

export interface StorageLineInput {
  product_id: string;
  product_name: string;
  product_category?: string;
  lot_id?: string;
  qty_in: number;
  weight?: number;
  volume?: number;
  pallet_count?: number;
  space_id?: string;
  /** Defaults to the intake's check-in time */
  date_in?: number;
  /** Manual rule assignment; skips suggestion */
  tariff_rule_id?: string;
  expiry_date?: string;
  remark?: string;
}

export interface CreateIntakeParams {
  company_id: string;
  customer_id: string;
  location_id: string;
  date_in?: number;
  planned_date_out?: number;
  temperature_target?: number;
  contract_id?: string;
  currency?: string;
  note?: string;
  lines: StorageLineInput[];
  /** Set when the intake is opened from a gate-in entry */
  gate_in_id?: string;
  vehicle_number?: string;
  driver_name?: string;
}
