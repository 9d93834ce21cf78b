/**
 * Billing & Warehouse Configuration
 */

/** Currency used when an intake or contract does not name one */
export const DEFAULT_CURRENCY = process.env.DEFAULT_CURRENCY || 'USD';

/** How long a company billing-run lock lives if the holder dies (ms) */
export const BILLING_LOCK_TTL_MS = parseInt(process.env.BILLING_LOCK_TTL_MS || '300000', 10);

/** Per-intake lock around compute-invoice-advance (ms) */
export const INTAKE_LOCK_TTL_MS = parseInt(process.env.INTAKE_LOCK_TTL_MS || '60000', 10);

/** Virtual locations goods arrive from and leave to; never run out */
export const SUPPLIER_LOCATION = 'partner/suppliers';
export const CUSTOMER_LOCATION = 'partner/customers';

/** Document number series and their printed prefixes */
export const DOCUMENT_SERIES: Record<string, string> = {
  intake: 'IN',
  release: 'OUT',
  contract: 'CTR',
  invoice: 'INV',
  gate_in: 'GIN',
  gate_out: 'GOUT',
};

/** Days added to next_invoice_date per contract cycle */
export const INVOICE_CYCLE_DAYS = {
  weekly: 7,
  monthly: 30,
  manual: 0,
} as const;

/** Redis key prefixes */
export const LOCK_PREFIX = 'lock:';
export const WATERMARK_PREFIX = 'watermark:';
export const SEQUENCE_PREFIX = 'sequence:';
export const STOCK_PREFIX = 'stock:';
