/**
 * Intake lifecycle
 *
 * draft → checked_in → partially_out → closed, or cancelled from draft or
 * checked_in. Derived amounts are recomputed on every load.
 */

import { v4 as uuidv4 } from 'uuid';
import { assignTariff, indexRules, suggestTariff } from './tariff';
import { deriveIntake } from './charge';
import { billingStartDate } from './period';
import { issuePeriodInvoice, isOpenIntake, validateWindow, type PeriodInvoiceOutcome } from './billing';
import { intakeLockKey, withLocks } from './lock';
import { checkLinePlacement } from './space';
import { NotFoundError, StateError, ValidationError } from './errors';
import { toDateString } from './dates';
import { DEFAULT_CURRENCY, INTAKE_LOCK_TTL_MS, SUPPLIER_LOCATION } from '../config/billing';
import type { CreateIntakeParams, Intake, StorageLine, StorageLineInput } from '../types/intake';
import type { WarehouseServices } from '../types/services';

export function validateLineInput(input: StorageLineInput): void {
  if (!(input.qty_in > 0)) {
    throw new ValidationError('Quantity in must be positive.');
  }
  if (input.weight !== undefined && input.weight < 0) {
    throw new ValidationError('Weight cannot be negative.');
  }
  if (input.volume !== undefined && input.volume < 0) {
    throw new ValidationError('Volume cannot be negative.');
  }
  if (input.pallet_count !== undefined && input.pallet_count < 0) {
    throw new ValidationError('Pallet count cannot be negative.');
  }
}

/** Invariants every stored line must hold */
export function assertLineInvariants(line: StorageLine): void {
  if (line.qty_in <= 0) {
    throw new ValidationError('Quantity in must be positive.');
  }
  if (line.qty_out > line.qty_in) {
    throw new ValidationError('Quantity out cannot exceed quantity in.');
  }
}

export async function loadIntake(intakeId: string, services: WarehouseServices): Promise<Intake> {
  const intake = await services.intakes.get(intakeId);
  if (!intake) {
    throw new NotFoundError(`Intake ${intakeId} not found.`);
  }
  return intake;
}

/** Intake with durations and subtotals derived as of now */
export async function getIntake(intakeId: string, services: WarehouseServices): Promise<Intake> {
  const [intake, rules] = await Promise.all([
    loadIntake(intakeId, services),
    services.tariffs.list(),
  ]);
  return deriveIntake(intake, indexRules(rules), services.now());
}

export async function createIntake(
  params: CreateIntakeParams,
  services: WarehouseServices
): Promise<Intake> {
  if (params.lines.length === 0) {
    throw new ValidationError('Please add at least one item line.');
  }
  params.lines.forEach(validateLineInput);
  await checkLinePlacement(
    params.location_id,
    params.lines.flatMap((input) => (input.space_id ? [input.space_id] : [])),
    services
  );

  const rules = await services.tariffs.list();
  const ruleIndex = indexRules(rules);
  const now = services.now();
  const dateIn = params.date_in ?? now;

  const header = {
    company_id: params.company_id,
    temperature_target: params.temperature_target,
  };

  const lines = params.lines.map((input): StorageLine => {
    const line: StorageLine = {
      id: uuidv4(),
      product_id: input.product_id,
      product_name: input.product_name,
      product_category: input.product_category,
      lot_id: input.lot_id,
      qty_in: input.qty_in,
      qty_out: 0,
      weight: input.weight ?? 0,
      volume: input.volume ?? 0,
      pallet_count: input.pallet_count ?? 0,
      space_id: input.space_id,
      date_in: input.date_in ?? dateIn,
      tariff_manual: false,
      duration_hours: 0,
      duration_days: 0,
      amount_subtotal: 0,
      expiry_date: input.expiry_date,
      remark: input.remark,
    };

    if (input.tariff_rule_id) {
      const rule = ruleIndex.get(input.tariff_rule_id);
      if (!rule) {
        throw new ValidationError(`Tariff rule ${input.tariff_rule_id} not found.`);
      }
      return assignTariff(line, rule);
    }
    return suggestTariff(line, header, rules);
  });

  const intake: Intake = {
    id: uuidv4(),
    name: await services.sequencer.nextDocumentNumber('intake'),
    company_id: params.company_id,
    customer_id: params.customer_id,
    location_id: params.location_id,
    date_in: dateIn,
    planned_date_out: params.planned_date_out,
    temperature_target: params.temperature_target,
    state: 'draft',
    last_billed_date: null,
    contract_id: params.contract_id,
    currency: params.currency ?? DEFAULT_CURRENCY,
    lines,
    note: params.note,
    gate_in_id: params.gate_in_id,
    vehicle_number: params.vehicle_number,
    driver_name: params.driver_name,
  };

  const derived = deriveIntake(intake, ruleIndex, now);
  await services.intakes.save(derived);
  services.logger.info({ intake_id: intake.id, name: intake.name }, 'intake created');
  return derived;
}

/**
 * Run `fn` holding the intake's lock
 *
 * Every read-modify-save of an intake goes through here, so callers load
 * and check state inside `fn`, never before it.
 */
export function withIntakeLock<T>(
  intakeId: string,
  services: WarehouseServices,
  fn: () => Promise<T>
): Promise<T> {
  return withLocks(services.locks, [intakeLockKey(intakeId)], INTAKE_LOCK_TTL_MS, fn);
}

export async function checkInIntake(intakeId: string, services: WarehouseServices): Promise<Intake> {
  return withIntakeLock(intakeId, services, async () => {
    const intake = await loadIntake(intakeId, services);
    if (intake.state !== 'draft') {
      throw new StateError('Only draft intakes can be checked in.');
    }
    if (intake.lines.length === 0) {
      throw new ValidationError('Please add at least one item line.');
    }

    for (const line of intake.lines) {
      await services.stock.moveGoods({
        product_id: line.product_id,
        qty: line.qty_in,
        from_location: SUPPLIER_LOCATION,
        to_location: intake.location_id,
        lot_id: line.lot_id,
      });
    }

    const updated: Intake = { ...intake, state: 'checked_in' };
    await services.intakes.save(updated);
    services.logger.info({ intake_id: intake.id }, 'intake checked in');
    return updated;
  });
}

export async function cancelIntake(intakeId: string, services: WarehouseServices): Promise<Intake> {
  return withIntakeLock(intakeId, services, async () => {
    const intake = await loadIntake(intakeId, services);
    if (intake.state !== 'draft' && intake.state !== 'checked_in') {
      throw new StateError(`Cannot cancel an intake in state "${intake.state}".`);
    }

    const updated: Intake = { ...intake, state: 'cancelled' };
    await services.intakes.save(updated);
    services.logger.info({ intake_id: intake.id }, 'intake cancelled');
    return updated;
  });
}

export async function closeIntake(intakeId: string, services: WarehouseServices): Promise<Intake> {
  return withIntakeLock(intakeId, services, async () => {
    const intake = await loadIntake(intakeId, services);
    if (intake.state !== 'partially_out') {
      throw new StateError('Only partially released intakes can be closed.');
    }
    if (intake.lines.some((line) => line.qty_out < line.qty_in)) {
      throw new StateError('Cannot close intake with unreleased items.');
    }

    const updated: Intake = { ...intake, state: 'closed' };
    await services.intakes.save(updated);
    services.logger.info({ intake_id: intake.id }, 'intake closed');
    return updated;
  });
}

/** Operator override of the matched tariff for one line */
export async function assignLineTariff(
  intakeId: string,
  lineId: string,
  ruleId: string,
  services: WarehouseServices
): Promise<Intake> {
  return withIntakeLock(intakeId, services, async () => {
    const [intake, rules] = await Promise.all([
      loadIntake(intakeId, services),
      services.tariffs.list(),
    ]);
    if (intake.state === 'closed' || intake.state === 'cancelled') {
      throw new StateError(`Cannot change tariffs of a ${intake.state} intake.`);
    }

    const ruleIndex = indexRules(rules);
    const rule = ruleIndex.get(ruleId);
    if (!rule) {
      throw new NotFoundError(`Tariff rule ${ruleId} not found.`);
    }
    if (!intake.lines.some((line) => line.id === lineId)) {
      throw new NotFoundError(`Line ${lineId} not found on intake ${intake.name}.`);
    }

    const updated = deriveIntake(
      {
        ...intake,
        lines: intake.lines.map((line) => (line.id === lineId ? assignTariff(line, rule) : line)),
      },
      ruleIndex,
      services.now()
    );
    await services.intakes.save(updated);
    return updated;
  });
}

/**
 * Ad-hoc billing of one open intake from its watermark through `dateTo`
 */
export async function invoiceIntake(
  intakeId: string,
  dateTo: string | undefined,
  services: WarehouseServices
): Promise<PeriodInvoiceOutcome> {
  const [intake, rules] = await Promise.all([
    loadIntake(intakeId, services),
    services.tariffs.list(),
  ]);
  if (!isOpenIntake(intake)) {
    throw new StateError('Only checked-in or partially released intakes can be invoiced.');
  }

  const today = toDateString(services.now());
  const window = { date_from: billingStartDate(intake), date_to: dateTo ?? today };
  if (window.date_from > window.date_to) {
    throw new ValidationError(
      `Intake ${intake.name} is already billed through ${intake.last_billed_date}.`
    );
  }
  validateWindow(window);

  return issuePeriodInvoice(
    {
      company_id: intake.company_id,
      customer_id: intake.customer_id,
      window,
      invoice_date: today,
      targets: [{ intake_id: intake.id, last_billed_date: intake.last_billed_date }],
    },
    indexRules(rules),
    services
  );
}

/** Open intakes whose planned release time has passed */
export function findOverdueIntakes(intakes: Intake[], now: number): Intake[] {
  return intakes.filter(
    (intake) =>
      isOpenIntake(intake) && intake.planned_date_out !== undefined && intake.planned_date_out < now
  );
}
