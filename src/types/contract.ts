/**
 * Storage Contract Types
 */

export type PricingModel = 'pre_paid' | 'post_paid' | 'cap';

export type InvoiceCycle = 'monthly' | 'weekly' | 'manual';

export type ContractState = 'draft' | 'active' | 'suspended' | 'closed';

export interface StorageContract {
  id: string;
  /** Document number, e.g. CTR/2024/00001 */
  name: string;
  company_id: string;
  customer_id: string;
  pricing_model: PricingModel;
  tariff_rule_id?: string;
  /** Storage credit for pre-paid contracts */
  credit_limit: number;
  currency: string;
  invoice_cycle: InvoiceCycle;
  next_invoice_date: string;
  /** Last date the contract's intakes were invoiced through */
  last_invoiced_date: string | null;
  state: ContractState;
  date_start: string;
  date_end?: string;
}

export interface CreateContractParams {
  company_id: string;
  customer_id: string;
  pricing_model?: PricingModel;
  tariff_rule_id?: string;
  credit_limit?: number;
  currency?: string;
  invoice_cycle?: InvoiceCycle;
  date_start?: string;
  date_end?: string;
}

/** Outcome of the scheduled contract billing sweep */
export interface ContractSweepResult {
  processed: number;
  invoiced: Array<{ contract_id: string; invoice_ids: string[] }>;
  failed: Array<{ contract_id: string; reason: string }>;
}
