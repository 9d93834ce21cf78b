/**
 * Release Types
 */

export type ReleaseState = 'draft' | 'done' | 'cancelled';

export interface ReleaseLine {
  intake_line_id: string;
  product_name: string;
  lot_id?: string;
  qty_out: number;
  /** Pro-rata storage charge, fixed when the release is validated */
  amount_line: number;
  /** Billable days of the intake line at release time */
  duration_days: number;
}

export interface Release {
  id: string;
  /** Document number, e.g. OUT/2024/00001 */
  name: string;
  company_id: string;
  intake_id: string;
  customer_id: string;
  /** Release time (Unix ms) */
  date_out: number;
  state: ReleaseState;
  lines: ReleaseLine[];
  gate_out_id?: string;
  vehicle_number?: string;
  driver_name?: string;
  /** Set once the release has been invoiced on its own */
  invoice_id?: string;
}

export interface CreateReleaseParams {
  intake_id: string;
  date_out?: number;
  lines: Array<{ intake_line_id: string; qty_out: number }>;
}

export interface BulkReleaseParams {
  intake_id: string;
  date_out?: number;
  /** Omit to release the full remaining quantity of every open line */
  lines?: Array<{ intake_line_id: string; qty_out: number }>;
}
