/**
 * Storage contracts
 *
 * A contract ties a customer's intakes to an invoice cycle. Contract
 * invoicing goes through the billing run, so it shares the watermark with
 * every other way an intake gets billed.
 */

import { v4 as uuidv4 } from 'uuid';
import { runBillingCycle } from './billing';
import { addDays, isValidDate, toDateString } from './dates';
import { NotFoundError, StateError, ValidationError, errorMessage } from './errors';
import { DEFAULT_CURRENCY, INVOICE_CYCLE_DAYS } from '../config/billing';
import type {
  ContractState,
  ContractSweepResult,
  CreateContractParams,
  InvoiceCycle,
  StorageContract,
} from '../types/contract';
import type { BillingRunResult } from '../types/billing';
import type { WarehouseServices } from '../types/services';

export interface ContractInvoiceOutcome {
  contract: StorageContract;
  run: BillingRunResult;
}

export function nextInvoiceDate(cycle: InvoiceCycle, from: string): string {
  return addDays(from, INVOICE_CYCLE_DAYS[cycle]);
}

export function validateContract(
  contract: Pick<StorageContract, 'pricing_model' | 'credit_limit' | 'date_start' | 'date_end'>
): void {
  if (!isValidDate(contract.date_start)) {
    throw new ValidationError(`Invalid start date "${contract.date_start}".`);
  }
  if (contract.date_end !== undefined) {
    if (!isValidDate(contract.date_end)) {
      throw new ValidationError(`Invalid end date "${contract.date_end}".`);
    }
    if (contract.date_end < contract.date_start) {
      throw new ValidationError('End date cannot be before start date.');
    }
  }
  if (contract.pricing_model === 'pre_paid' && contract.credit_limit <= 0) {
    throw new ValidationError('Pre-paid contracts must have a positive credit limit.');
  }
}

export async function loadContract(
  contractId: string,
  services: WarehouseServices
): Promise<StorageContract> {
  const contract = await services.contracts.get(contractId);
  if (!contract) {
    throw new NotFoundError(`Contract ${contractId} not found.`);
  }
  return contract;
}

export async function createContract(
  params: CreateContractParams,
  services: WarehouseServices
): Promise<StorageContract> {
  const today = toDateString(services.now());
  const cycle = params.invoice_cycle ?? 'monthly';

  if (params.tariff_rule_id && !(await services.tariffs.get(params.tariff_rule_id))) {
    throw new ValidationError(`Tariff rule ${params.tariff_rule_id} not found.`);
  }

  const draft = {
    pricing_model: params.pricing_model ?? 'post_paid',
    credit_limit: params.credit_limit ?? 0,
    date_start: params.date_start ?? today,
    date_end: params.date_end,
  };
  validateContract(draft);

  const contract: StorageContract = {
    id: uuidv4(),
    name: await services.sequencer.nextDocumentNumber('contract'),
    company_id: params.company_id,
    customer_id: params.customer_id,
    tariff_rule_id: params.tariff_rule_id,
    currency: params.currency ?? DEFAULT_CURRENCY,
    invoice_cycle: cycle,
    next_invoice_date: nextInvoiceDate(cycle, today),
    last_invoiced_date: null,
    state: 'draft',
    ...draft,
  };

  await services.contracts.save(contract);
  services.logger.info({ contract_id: contract.id, name: contract.name }, 'contract created');
  return contract;
}

export type ContractAction = 'activate' | 'suspend' | 'resume' | 'close';

const TRANSITIONS: Record<ContractAction, { from: ContractState[]; to: ContractState; error: string }> = {
  activate: { from: ['draft'], to: 'active', error: 'Only draft contracts can be activated.' },
  suspend: { from: ['active'], to: 'suspended', error: 'Only active contracts can be suspended.' },
  resume: { from: ['suspended'], to: 'active', error: 'Only suspended contracts can be resumed.' },
  close: {
    from: ['active', 'suspended'],
    to: 'closed',
    error: 'Only active or suspended contracts can be closed.',
  },
};

export async function transitionContract(
  contractId: string,
  action: ContractAction,
  services: WarehouseServices
): Promise<StorageContract> {
  const contract = await loadContract(contractId, services);
  const transition = TRANSITIONS[action];
  if (!transition.from.includes(contract.state)) {
    throw new StateError(transition.error);
  }

  const updated: StorageContract = { ...contract, state: transition.to };
  await services.contracts.save(updated);
  services.logger.info({ contract_id: contract.id, state: updated.state }, `contract ${action}`);
  return updated;
}

/**
 * Bill the contract's open intakes from the day after the last contract
 * invoice (or the start date) through `today`, then schedule the next cycle.
 */
export async function invoiceContract(
  contractId: string,
  services: WarehouseServices,
  today: string = toDateString(services.now())
): Promise<ContractInvoiceOutcome> {
  const contract = await loadContract(contractId, services);
  if (contract.state !== 'active') {
    throw new StateError('Only active contracts can be invoiced.');
  }
  if (contract.pricing_model === 'pre_paid' && contract.credit_limit <= 0) {
    throw new StateError('Pre-paid contract has no credit available.');
  }

  const dateFrom = contract.last_invoiced_date
    ? addDays(contract.last_invoiced_date, 1)
    : contract.date_start;
  if (dateFrom > today) {
    throw new ValidationError(
      `Contract ${contract.name} is already invoiced through ${contract.last_invoiced_date}.`
    );
  }

  const run = await runBillingCycle(
    {
      company_id: contract.company_id,
      date_from: dateFrom,
      date_to: today,
      mode: 'unbilled_only',
      customer_ids: [contract.customer_id],
      contract_ids: [contract.id],
      grouping: 'customer',
      invoice_date: today,
    },
    services
  );

  if (run.invoices.length === 0) {
    const reasons = run.failures.map((failure) => failure.reason);
    throw new ValidationError(reasons.length > 0 ? reasons.join('; ') : 'No charges to invoice.');
  }

  const updated: StorageContract = {
    ...contract,
    last_invoiced_date: today,
    next_invoice_date: nextInvoiceDate(contract.invoice_cycle, today),
  };
  await services.contracts.save(updated);
  services.logger.info(
    {
      contract_id: contract.id,
      invoice_ids: run.invoices.map((invoice) => invoice.invoice_id),
      next_invoice_date: updated.next_invoice_date,
    },
    'contract invoiced'
  );

  return { contract: updated, run };
}

/** Contracts the scheduled sweep should invoice on `today` */
export function dueContracts(contracts: StorageContract[], today: string): StorageContract[] {
  return contracts.filter(
    (contract) =>
      contract.state === 'active' &&
      contract.invoice_cycle !== 'manual' &&
      contract.next_invoice_date <= today
  );
}

export async function runContractSweep(
  today: string,
  services: WarehouseServices
): Promise<ContractSweepResult> {
  const due = dueContracts(await services.contracts.list(), today);
  const result: ContractSweepResult = { processed: due.length, invoiced: [], failed: [] };

  for (const contract of due) {
    try {
      const { run } = await invoiceContract(contract.id, services, today);
      result.invoiced.push({
        contract_id: contract.id,
        invoice_ids: run.invoices.map((invoice) => invoice.invoice_id),
      });
    } catch (err) {
      const reason = errorMessage(err);
      services.logger.warn({ contract_id: contract.id, err }, `contract billing failed: ${reason}`);
      result.failed.push({ contract_id: contract.id, reason });
    }
  }

  return result;
}
