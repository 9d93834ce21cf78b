/**
 * Release lifecycle
 *
 * A release takes goods out of an open intake. Validating it moves the stock,
 * stamps the release time on the touched lines and fixes the pro-rata
 * storage charge of the released quantity on the release line.
 */

import { v4 as uuidv4 } from 'uuid';
import { computeReleaseAmount, deriveLine } from './charge';
import { indexRules } from './tariff';
import { buildReleaseLineItems, invoiceTotal } from './invoice';
import { isOpenIntake } from './billing';
import { loadIntake, withIntakeLock } from './intake';
import { toDateString } from './dates';
import { NotFoundError, StateError, ValidationError } from './errors';
import { CUSTOMER_LOCATION } from '../config/billing';
import type { Intake, StorageLine } from '../types/intake';
import type {
  BulkReleaseParams,
  CreateReleaseParams,
  Release,
  ReleaseLine,
} from '../types/release';
import type { IssuedInvoice } from '../types/billing';
import type { WarehouseServices } from '../types/services';

type ReleaseRequestLine = CreateReleaseParams['lines'][number];

function remainingQty(line: StorageLine): number {
  return line.qty_in - line.qty_out;
}

function findLine(intake: Intake, lineId: string): StorageLine {
  const line = intake.lines.find((l) => l.id === lineId);
  if (!line) {
    throw new NotFoundError(`Line ${lineId} not found on intake ${intake.name}.`);
  }
  return line;
}

/** Every requested quantity is positive and still on hand */
export function checkAvailability(intake: Intake, lines: ReleaseRequestLine[]): void {
  const requested = new Map<string, number>();
  for (const { intake_line_id, qty_out } of lines) {
    if (!(qty_out > 0)) {
      throw new ValidationError('Release quantity must be positive.');
    }
    requested.set(intake_line_id, (requested.get(intake_line_id) ?? 0) + qty_out);
  }

  for (const [lineId, qty] of requested) {
    const line = findLine(intake, lineId);
    const remaining = remainingQty(line);
    if (qty > remaining) {
      throw new ValidationError(
        `Cannot release ${qty} of ${line.product_name}; only ${remaining} remaining.`
      );
    }
  }
}

export async function loadRelease(releaseId: string, services: WarehouseServices): Promise<Release> {
  const release = await services.releases.get(releaseId);
  if (!release) {
    throw new NotFoundError(`Release ${releaseId} not found.`);
  }
  return release;
}

export async function createRelease(
  params: CreateReleaseParams,
  services: WarehouseServices
): Promise<Release> {
  const intake = await loadIntake(params.intake_id, services);
  if (!isOpenIntake(intake)) {
    throw new StateError('Goods can only be released from checked-in or partially released intakes.');
  }
  if (params.lines.length === 0) {
    throw new ValidationError('Please add at least one line to release.');
  }
  checkAvailability(intake, params.lines);

  const release: Release = {
    id: uuidv4(),
    name: await services.sequencer.nextDocumentNumber('release'),
    company_id: intake.company_id,
    intake_id: intake.id,
    customer_id: intake.customer_id,
    date_out: params.date_out ?? services.now(),
    state: 'draft',
    lines: params.lines.map((requested) => {
      const line = findLine(intake, requested.intake_line_id);
      return {
        intake_line_id: line.id,
        product_name: line.product_name,
        lot_id: line.lot_id,
        qty_out: requested.qty_out,
        amount_line: 0,
        duration_days: 0,
      };
    }),
  };

  await services.releases.save(release);
  services.logger.info({ release_id: release.id, intake_id: intake.id }, 'release created');
  return release;
}

export async function validateRelease(
  releaseId: string,
  services: WarehouseServices
): Promise<Release> {
  const draft = await loadRelease(releaseId, services);
  if (draft.state !== 'draft') {
    throw new StateError('Only draft releases can be validated.');
  }

  return withIntakeLock(draft.intake_id, services, async () => {
    const release = await loadRelease(releaseId, services);
    if (release.state !== 'draft') {
      throw new StateError('Only draft releases can be validated.');
    }
    const [intake, rules] = await Promise.all([
      loadIntake(release.intake_id, services),
      services.tariffs.list(),
    ]);
    if (!isOpenIntake(intake)) {
      throw new StateError(`Cannot release goods from a ${intake.state} intake.`);
    }

    // All lines are checked before any stock moves
    checkAvailability(intake, release.lines);

    for (const releaseLine of release.lines) {
      const line = findLine(intake, releaseLine.intake_line_id);
      await services.stock.moveGoods({
        product_id: line.product_id,
        qty: releaseLine.qty_out,
        from_location: intake.location_id,
        to_location: CUSTOMER_LOCATION,
        lot_id: line.lot_id,
      });
    }

    const ruleIndex = indexRules(rules);
    const lines = new Map(intake.lines.map((line) => [line.id, line]));
    const releaseLines: ReleaseLine[] = [];

    for (const releaseLine of release.lines) {
      const current = lines.get(releaseLine.intake_line_id);
      if (!current) {
        throw new NotFoundError(`Line ${releaseLine.intake_line_id} not found on intake ${intake.name}.`);
      }
      const frozen = deriveLine(
        { ...current, qty_out: current.qty_out + releaseLine.qty_out, date_out: release.date_out },
        ruleIndex,
        release.date_out
      );
      lines.set(frozen.id, frozen);
      releaseLines.push({
        ...releaseLine,
        amount_line: computeReleaseAmount(frozen, releaseLine.qty_out),
        duration_days: frozen.duration_days,
      });
    }

    const updatedIntake: Intake = {
      ...intake,
      state: 'partially_out',
      lines: intake.lines.map((line) => lines.get(line.id) ?? line),
    };
    const done: Release = { ...release, state: 'done', lines: releaseLines };

    await services.intakes.save(updatedIntake);
    await services.releases.save(done);
    services.logger.info(
      { release_id: release.id, intake_id: intake.id, lines: releaseLines.length },
      'release validated'
    );
    return done;
  });
}

export async function cancelRelease(releaseId: string, services: WarehouseServices): Promise<Release> {
  const { intake_id } = await loadRelease(releaseId, services);

  return withIntakeLock(intake_id, services, async () => {
    const release = await loadRelease(releaseId, services);
    if (release.state !== 'draft') {
      throw new StateError('Only draft releases can be cancelled.');
    }

    const cancelled: Release = { ...release, state: 'cancelled' };
    await services.releases.save(cancelled);
    services.logger.info({ release_id: release.id }, 'release cancelled');
    return cancelled;
  });
}

/**
 * Bill the pro-rata charges fixed on a validated release
 *
 * The invoiced check and the invoice run under the intake lock, so a
 * release is billed at most once.
 */
export async function invoiceRelease(
  releaseId: string,
  services: WarehouseServices
): Promise<IssuedInvoice> {
  const { intake_id } = await loadRelease(releaseId, services);

  return withIntakeLock(intake_id, services, async () => {
    const release = await loadRelease(releaseId, services);
    if (release.state !== 'done') {
      throw new StateError('Only validated releases can be invoiced.');
    }
    if (release.invoice_id) {
      throw new StateError(`Release ${release.name} is already invoiced.`);
    }

    const [intake, rules] = await Promise.all([
      loadIntake(release.intake_id, services),
      services.tariffs.list(),
    ]);
    const items = await buildReleaseLineItems(release, intake, indexRules(rules), services.accounts);
    if (items.length === 0) {
      throw new ValidationError('No storage charges to invoice for this release.');
    }

    const handle = await services.invoices.createInvoice({
      kind: 'release',
      customer_id: release.customer_id,
      company_id: release.company_id,
      lines: items,
      currency: intake.currency,
      invoice_date: toDateString(services.now()),
      reference: `Storage charges for release ${release.name}`,
      intake_ids: [intake.id],
    });

    await services.releases.save({ ...release, invoice_id: handle.invoice_id });
    services.logger.info(
      { release_id: release.id, invoice_id: handle.invoice_id },
      'release invoiced'
    );

    return {
      ...handle,
      customer_id: release.customer_id,
      intake_ids: [intake.id],
      total: invoiceTotal(items),
    };
  });
}

/**
 * Create and validate a release in one step
 *
 * Without explicit lines, releases everything still on hand.
 */
export async function bulkRelease(
  params: BulkReleaseParams,
  services: WarehouseServices
): Promise<Release> {
  let lines = params.lines;
  if (!lines) {
    const intake = await loadIntake(params.intake_id, services);
    lines = intake.lines
      .filter((line) => remainingQty(line) > 0)
      .map((line) => ({ intake_line_id: line.id, qty_out: remainingQty(line) }));
    if (lines.length === 0) {
      throw new ValidationError(`Nothing left to release on intake ${intake.name}.`);
    }
  }

  const release = await createRelease(
    { intake_id: params.intake_id, date_out: params.date_out, lines },
    services
  );
  return validateRelease(release.id, services);
}
