/**
 * Income Account Catalog
 *
 * Maps storage service products and product categories to income accounts.
 * Static catalog - the accounting system remains the source of truth for
 * the accounts themselves.
 */

export interface IncomeAccountMapping {
  product_id?: string;
  product_category?: string;
  account_ref: string;
}

/** Fallback when neither product nor category is mapped (empty = none) */
export const DEFAULT_INCOME_ACCOUNT = process.env.DEFAULT_INCOME_ACCOUNT || '';

export const INCOME_ACCOUNT_CATALOG: IncomeAccountMapping[] = [
  { product_id: 'svc_storage_frozen', account_ref: '4100-frozen-storage' },
  { product_id: 'svc_storage_chilled', account_ref: '4110-chilled-storage' },
  { product_id: 'svc_storage_handling', account_ref: '4150-handling' },
  { product_category: 'frozen', account_ref: '4100-frozen-storage' },
  { product_category: 'chilled', account_ref: '4110-chilled-storage' },
];
