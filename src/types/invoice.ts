/**
 * Invoice Types
 *
 * The accounting system owns invoices. The core hands it a customer, line
 * items with resolved income accounts, a currency and a date, and keeps the
 * returned handle.
 */

export interface InvoiceLineItem {
  /** Human-readable description printed on the invoice */
  description: string;
  /** Line amount, never negative, rounded to cents */
  amount: number;
  /** Income account the line posts to */
  account_ref: string;
  /** Service product the line is sold as */
  product_ref?: string;
}

/**
 * `period` invoices bill storage up to an intake's watermark; `release`
 * invoices bill the charge fixed on a release and leave the watermark alone.
 */
export type InvoiceKind = 'period' | 'release';

export interface InvoiceRequest {
  kind: InvoiceKind;
  customer_id: string;
  company_id: string;
  lines: InvoiceLineItem[];
  currency: string;
  /** Invoice date (YYYY-MM-DD) */
  invoice_date: string;
  /** Free-text reference (e.g. "Cold storage charges from ... to ...") */
  reference: string;
  /** Intakes whose charges the invoice carries */
  intake_ids: string[];
}

export type InvoiceState = 'posted' | 'cancelled';

export interface InvoiceHandle {
  invoice_id: string;
  /** Document number, e.g. INV/2024/00001 */
  number: string;
}

export interface InvoiceRecord extends InvoiceRequest, InvoiceHandle {
  state: InvoiceState;
  total: number;
  created_at: number;
}
