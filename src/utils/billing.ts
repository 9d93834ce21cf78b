/**
 * Billing Run Orchestrator
 *
 * Selects open intakes for a billing window, prices the slice of each stay
 * that falls inside it (Period Biller), groups the results by customer (or
 * per intake) and issues one invoice per group.
 *
 * Double-billing is prevented by the watermark alone, so for every group:
 *
 *   lock intakes → re-read watermarks → build lines → issue invoice
 *     → compare-and-swap watermark to date_to
 *
 * If the invoice fails the watermark stays put. A failing group is logged
 * and reported; the remaining groups are still billed.
 *
 * In production the run is triggered on a timer (see scripts/billing-sweep.ts)
 * or from the API. Only one run per company executes at a time.
 */

import { v4 as uuidv4 } from 'uuid';
import { computeDaysInfo, computePeriodCharge } from './period';
import { deriveIntake, roundCurrency, summarizeIntake } from './charge';
import { indexRules } from './tariff';
import { buildPeriodLineItems, invoiceTotal, periodReference } from './invoice';
import { intakeLockKey, withLocks } from './lock';
import { startOfDay, toDateString } from './dates';
import {
  BillingEligibilityError,
  ConflictError,
  NotFoundError,
  ValidationError,
  errorMessage,
  isWarehouseError,
} from './errors';
import { BILLING_LOCK_TTL_MS, INTAKE_LOCK_TTL_MS } from '../config/billing';
import type { Intake } from '../types/intake';
import type { TariffRule } from '../types/tariff';
import type { InvoiceLineItem } from '../types/invoice';
import type { WarehouseServices } from '../types/services';
import type {
  BillingFailure,
  BillingIntakeLine,
  BillingRunMode,
  BillingRunParams,
  BillingRunResult,
  BillingWindow,
  InvoiceGrouping,
  IssuedInvoice,
} from '../types/billing';

const OPEN_STATES = new Set(['checked_in', 'partially_out']);

interface BillingGroup {
  key: string;
  customer_id: string;
  currency: string;
  lines: BillingIntakeLine[];
}

/** Snapshot of an intake as selected, used to detect concurrent billing */
export interface PeriodInvoiceTarget {
  intake_id: string;
  last_billed_date: string | null;
}

export interface PeriodInvoiceParams {
  company_id: string;
  customer_id: string;
  window: BillingWindow;
  invoice_date: string;
  targets: PeriodInvoiceTarget[];
}

export interface PeriodInvoiceOutcome {
  invoice: IssuedInvoice;
  /** Intakes whose watermark could not be advanced after invoicing */
  unadvanced: string[];
}

export function validateWindow(window: BillingWindow): void {
  startOfDay(window.date_from);
  startOfDay(window.date_to);
  if (window.date_from > window.date_to) {
    throw new ValidationError('From date cannot be after to date.');
  }
}

export function isOpenIntake(intake: Pick<Intake, 'state'>): boolean {
  return OPEN_STATES.has(intake.state);
}

function checkInDate(intake: Intake): string {
  return toDateString(intake.date_in);
}

/**
 * Intakes a run picks up
 *
 * unbilled_only: not billed into this window yet and checked in by date_to
 * all_in_range:  checked in within the window
 */
export function selectEligibleIntakes(intakes: Intake[], params: BillingRunParams): Intake[] {
  const mode = params.mode ?? 'unbilled_only';

  return intakes.filter((intake) => {
    if (!isOpenIntake(intake) || intake.company_id !== params.company_id) return false;
    if (params.customer_ids?.length && !params.customer_ids.includes(intake.customer_id)) {
      return false;
    }
    if (
      params.contract_ids?.length &&
      (!intake.contract_id || !params.contract_ids.includes(intake.contract_id))
    ) {
      return false;
    }

    const dateIn = checkInDate(intake);
    if (mode === 'unbilled_only') {
      const unbilled = intake.last_billed_date === null || intake.last_billed_date < params.date_from;
      return unbilled && dateIn <= params.date_to;
    }
    return dateIn >= params.date_from && dateIn <= params.date_to;
  });
}

/** Explain why a run found nothing to bill */
export function diagnoseNoEligible(
  intakes: Intake[],
  params: BillingRunParams
): BillingEligibilityError {
  const mode = params.mode ?? 'unbilled_only';
  const active = intakes.filter(
    (intake) => isOpenIntake(intake) && intake.company_id === params.company_id
  );

  if (active.length === 0) {
    return new BillingEligibilityError(
      'no_active_intakes',
      'No active intakes found. Only intakes in "Checked In" or "Partially Released" state can be billed.'
    );
  }

  const inRange = active.filter((intake) => {
    const dateIn = checkInDate(intake);
    return mode === 'unbilled_only'
      ? dateIn <= params.date_to
      : dateIn >= params.date_from && dateIn <= params.date_to;
  });

  if (inRange.length === 0) {
    return new BillingEligibilityError(
      'none_in_range',
      `No billable intakes found for the selected date range (${params.date_from} to ${params.date_to}). ` +
        'Check that the range includes intake check-in dates.'
    );
  }

  if (mode === 'unbilled_only') {
    const unbilled = inRange.filter(
      (intake) => intake.last_billed_date === null || intake.last_billed_date < params.date_from
    );
    if (unbilled.length === 0) {
      return new BillingEligibilityError(
        'all_already_billed',
        'No unbilled intakes found for the selected criteria. ' +
          'All intakes in the date range have already been billed. ' +
          'To bill them again, use "all in range" mode or adjust the date range.'
      );
    }
  }

  return new BillingEligibilityError(
    'no_match',
    'No billable intakes found for the selected customer and contract filters.'
  );
}

export function buildIntakeLine(
  intake: Intake,
  rules: Map<string, TariffRule>,
  window: BillingWindow,
  now: number,
  excluded: string[]
): BillingIntakeLine {
  const charge = computePeriodCharge(intake, rules, window);
  const days = computeDaysInfo(intake, window, now);
  const totals = summarizeIntake(deriveIntake(intake, rules, now));

  return {
    intake_id: intake.id,
    intake_name: intake.name,
    customer_id: intake.customer_id,
    location_id: intake.location_id,
    date_in: intake.date_in,
    last_billed_date: intake.last_billed_date,
    ...days,
    period_amount: charge.amount,
    total_amount: totals.total_amount,
    selected: !excluded.includes(intake.id),
    charge,
  };
}

function groupLines(
  lines: BillingIntakeLine[],
  intakes: Map<string, Intake>,
  grouping: InvoiceGrouping
): BillingGroup[] {
  const groups = new Map<string, BillingGroup>();

  for (const line of lines) {
    const currency = intakes.get(line.intake_id)?.currency ?? '';
    // One currency per invoice document
    const key =
      grouping === 'intake' ? line.intake_id : `${line.customer_id}|${currency}`;

    const group = groups.get(key) ?? {
      key,
      customer_id: line.customer_id,
      currency,
      lines: [],
    };
    group.lines.push(line);
    groups.set(key, group);
  }

  return [...groups.values()];
}

/**
 * Invoice the window for a set of intakes of one customer and advance their
 * watermarks. Holds every intake's lock throughout.
 */
export async function issuePeriodInvoice(
  params: PeriodInvoiceParams,
  rules: Map<string, TariffRule>,
  services: WarehouseServices
): Promise<PeriodInvoiceOutcome> {
  const keys = params.targets.map((t) => intakeLockKey(t.intake_id));

  return withLocks(services.locks, keys, INTAKE_LOCK_TTL_MS, async () => {
    const billable: Intake[] = [];
    const items: InvoiceLineItem[] = [];

    for (const target of params.targets) {
      const intake = await services.intakes.get(target.intake_id);
      if (!intake) {
        throw new NotFoundError(`Intake ${target.intake_id} not found.`);
      }
      if (intake.last_billed_date !== target.last_billed_date) {
        throw new ConflictError(
          `Intake ${intake.name} was billed through ${intake.last_billed_date ?? 'nothing'} by another run.`
        );
      }

      // Resolve every account before anything reaches the accounting system
      const charge = computePeriodCharge(intake, rules, params.window);
      const intakeItems = await buildPeriodLineItems(intake, charge, services.accounts);
      if (intakeItems.length > 0) {
        billable.push(intake);
        items.push(...intakeItems);
      }
    }

    if (items.length === 0) {
      throw new ValidationError('No charges to invoice.');
    }

    const handle = await services.invoices.createInvoice({
      kind: 'period',
      customer_id: params.customer_id,
      company_id: params.company_id,
      lines: items,
      currency: billable[0].currency,
      invoice_date: params.invoice_date,
      reference: `${periodReference(params.window)} (${billable.map((i) => i.name).join(', ')})`,
      intake_ids: billable.map((i) => i.id),
    });

    const unadvanced: string[] = [];
    for (const intake of billable) {
      const moved = await services.intakes.compareAndSetWatermark(
        intake.id,
        intake.last_billed_date,
        params.window.date_to
      );
      if (!moved) {
        unadvanced.push(intake.id);
        services.logger.error(
          { intake_id: intake.id, invoice_id: handle.invoice_id },
          'watermark moved after invoicing; intake may be billed twice'
        );
      }
    }

    return {
      invoice: {
        ...handle,
        customer_id: params.customer_id,
        intake_ids: billable.map((i) => i.id),
        total: invoiceTotal(items),
      },
      unadvanced,
    };
  });
}

/**
 * Clear the watermark of open intakes that no active period invoice covers,
 * e.g. after invoices were cancelled in the accounting system. Release
 * invoices never hold a watermark in place.
 */
export async function resetWatermarks(
  companyId: string,
  services: WarehouseServices
): Promise<number> {
  const intakes = await services.intakes.list();
  let resetCount = 0;

  for (const intake of intakes) {
    if (
      intake.company_id !== companyId ||
      !isOpenIntake(intake) ||
      intake.last_billed_date === null
    ) {
      continue;
    }

    if (await services.invoices.hasActivePeriodInvoice(intake.id)) continue;

    if (await services.intakes.compareAndSetWatermark(intake.id, intake.last_billed_date, null)) {
      resetCount++;
    }
  }

  if (resetCount > 0) {
    services.logger.info(
      { company_id: companyId, reset_count: resetCount },
      'reset watermarks of intakes with no active invoices'
    );
  }
  return resetCount;
}

async function executeRun(
  params: BillingRunParams,
  services: WarehouseServices,
  preview: boolean
): Promise<BillingRunResult> {
  validateWindow(params);

  const mode: BillingRunMode = params.mode ?? 'unbilled_only';
  const grouping: InvoiceGrouping = params.grouping ?? 'customer';
  const window: BillingWindow = { date_from: params.date_from, date_to: params.date_to };
  const runId = `run_${uuidv4().slice(0, 8)}`;
  const log = services.logger.child({ run_id: runId, company_id: params.company_id });

  const lockKey = `billing-run:${params.company_id}`;
  const token = await services.locks.acquire(lockKey, BILLING_LOCK_TTL_MS);
  if (!token) {
    throw new ConflictError(`A billing run is already in progress for company ${params.company_id}.`);
  }

  try {
    let resetCount = 0;
    if (params.reset_watermarks && !preview) {
      resetCount = await resetWatermarks(params.company_id, services);
    }

    const [intakes, rules] = await Promise.all([services.intakes.list(), services.tariffs.list()]);
    const eligible = selectEligibleIntakes(intakes, { ...params, mode });

    if (eligible.length === 0) {
      throw diagnoseNoEligible(intakes, { ...params, mode });
    }

    const ruleIndex = indexRules(rules);
    const now = services.now();
    const excluded = params.excluded_intake_ids ?? [];
    const lines = eligible.map((intake) => buildIntakeLine(intake, ruleIndex, window, now, excluded));

    log.info(
      { window, mode, eligible: eligible.length, selected: lines.filter((l) => l.selected).length },
      'billing run selected intakes'
    );

    const byId = new Map(eligible.map((intake) => [intake.id, intake]));
    const groups = groupLines(
      lines.filter((line) => line.selected),
      byId,
      grouping
    );

    const invoices: IssuedInvoice[] = [];
    const failures: BillingFailure[] = [];
    let previewTotal = 0;
    const invoiceDate = params.invoice_date ?? toDateString(now);

    for (const group of groups) {
      const groupTotal = group.lines.reduce((sum, line) => sum + line.period_amount, 0);
      if (groupTotal <= 0) continue;
      previewTotal += groupTotal;

      if (preview) continue;

      const intakeIds = group.lines.map((line) => line.intake_id);
      try {
        const outcome = await issuePeriodInvoice(
          {
            company_id: params.company_id,
            customer_id: group.customer_id,
            window,
            invoice_date: invoiceDate,
            targets: group.lines.map((line) => ({
              intake_id: line.intake_id,
              last_billed_date: line.last_billed_date,
            })),
          },
          ruleIndex,
          services
        );
        invoices.push(outcome.invoice);

        if (outcome.unadvanced.length > 0) {
          failures.push({
            group: group.key,
            intake_ids: outcome.unadvanced,
            code: 'watermark_conflict',
            reason: `Invoice ${outcome.invoice.number} issued but watermark not advanced.`,
          });
        }
      } catch (err) {
        const code = isWarehouseError(err) ? err.code : 'internal_error';
        log.warn({ group: group.key, intake_ids: intakeIds, code, err }, 'billing group failed');
        failures.push({ group: group.key, intake_ids: intakeIds, code, reason: errorMessage(err) });
      }
    }

    const totalAmount = preview
      ? roundCurrency(previewTotal)
      : roundCurrency(invoices.reduce((sum, invoice) => sum + invoice.total, 0));

    log.info(
      { invoices: invoices.length, failures: failures.length, total_amount: totalAmount, preview },
      'billing run finished'
    );

    return {
      run_id: runId,
      company_id: params.company_id,
      window,
      mode,
      grouping,
      preview,
      reset_count: resetCount,
      intakes: lines,
      invoices,
      failures,
      total_amount: totalAmount,
    };
  } finally {
    await services.locks.release(lockKey, token);
  }
}

/** Compute the run without invoicing or touching watermarks */
export function previewBillingRun(
  params: BillingRunParams,
  services: WarehouseServices
): Promise<BillingRunResult> {
  return executeRun(params, services, true);
}

export function runBillingCycle(
  params: BillingRunParams,
  services: WarehouseServices
): Promise<BillingRunResult> {
  return executeRun(params, services, false);
}
