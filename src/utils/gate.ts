/**
 * Gate entries
 *
 * Vehicle arrivals and departures. Confirming an entry copies the vehicle
 * and driver onto the intake or release it serves; an arrival can also open
 * the intake for the goods it brought.
 */

import { v4 as uuidv4 } from 'uuid';
import { intakeLockKey, withLocks } from './lock';
import { createIntake, loadIntake } from './intake';
import { loadRelease } from './release';
import { NotFoundError, StateError, ValidationError } from './errors';
import { INTAKE_LOCK_TTL_MS } from '../config/billing';
import type { CreateGateEntryParams, GateEntry } from '../types/gate';
import type { CreateIntakeParams, Intake } from '../types/intake';
import type { WarehouseServices } from '../types/services';

export async function loadGateEntry(entryId: string, services: WarehouseServices): Promise<GateEntry> {
  const entry = await services.gates.get(entryId);
  if (!entry) {
    throw new NotFoundError(`Gate entry ${entryId} not found.`);
  }
  return entry;
}

export async function createGateEntry(
  params: CreateGateEntryParams,
  services: WarehouseServices
): Promise<GateEntry> {
  if (!params.vehicle_number.trim()) {
    throw new ValidationError('Vehicle number is required.');
  }
  if (!params.driver_name.trim()) {
    throw new ValidationError('Driver name is required.');
  }
  if (params.entry_type === 'gate_in' && params.release_id) {
    throw new ValidationError('A gate-in entry cannot reference a release.');
  }
  if (params.entry_type === 'gate_out' && params.intake_id) {
    throw new ValidationError('A gate-out entry cannot reference an intake.');
  }

  const entry: GateEntry = {
    id: uuidv4(),
    name: await services.sequencer.nextDocumentNumber(params.entry_type),
    company_id: params.company_id,
    entry_type: params.entry_type,
    vehicle_number: params.vehicle_number.trim(),
    driver_name: params.driver_name.trim(),
    driver_contact: params.driver_contact,
    entry_time: params.entry_time ?? services.now(),
    intake_id: params.intake_id,
    release_id: params.release_id,
    state: 'draft',
    notes: params.notes,
  };

  await services.gates.save(entry);
  return entry;
}

/**
 * Confirm a draft entry and stamp its vehicle on the linked documents
 *
 * Holds the entry's lock and the lock of every intake it touches, the
 * intake behind a linked release included.
 */
export async function confirmGateEntry(
  entryId: string,
  services: WarehouseServices
): Promise<GateEntry> {
  const draft = await loadGateEntry(entryId, services);
  const keys = [`gate:${draft.id}`];
  if (draft.intake_id) {
    keys.push(intakeLockKey(draft.intake_id));
  }
  if (draft.release_id) {
    keys.push(intakeLockKey((await loadRelease(draft.release_id, services)).intake_id));
  }

  return withLocks(services.locks, keys, INTAKE_LOCK_TTL_MS, async () => {
    const entry = await loadGateEntry(entryId, services);
    if (entry.state !== 'draft') {
      throw new StateError('Only draft gate entries can be confirmed.');
    }

    const vehicle = { vehicle_number: entry.vehicle_number, driver_name: entry.driver_name };

    if (entry.intake_id) {
      const intake = await loadIntake(entry.intake_id, services);
      await services.intakes.save({ ...intake, ...vehicle, gate_in_id: entry.id });
    }

    if (entry.release_id) {
      const release = await loadRelease(entry.release_id, services);
      await services.releases.save({ ...release, ...vehicle, gate_out_id: entry.id });
    }

    const confirmed: GateEntry = { ...entry, state: 'confirmed' };
    await services.gates.save(confirmed);
    services.logger.info({ gate_entry_id: entry.id, entry_type: entry.entry_type }, 'gate entry confirmed');
    return confirmed;
  });
}

/** What the gate cannot know about the goods it lets in */
export type GateIntakeParams = Omit<
  CreateIntakeParams,
  'company_id' | 'date_in' | 'gate_in_id' | 'vehicle_number' | 'driver_name'
>;

/**
 * Open a draft intake for the goods a gate-in entry brought
 *
 * The intake takes the entry's time, vehicle and driver. An entry opens at
 * most one intake; asking again returns the one already linked.
 */
export async function createIntakeFromGateEntry(
  entryId: string,
  params: GateIntakeParams,
  services: WarehouseServices
): Promise<Intake> {
  return withLocks(services.locks, [`gate:${entryId}`], INTAKE_LOCK_TTL_MS, async () => {
    const entry = await loadGateEntry(entryId, services);
    if (entry.entry_type !== 'gate_in') {
      throw new ValidationError('Can only create intake from gate-in entries.');
    }
    if (entry.intake_id) {
      return loadIntake(entry.intake_id, services);
    }
    if (entry.state === 'cancelled') {
      throw new StateError('Cannot create an intake from a cancelled gate entry.');
    }

    const intake = await createIntake(
      {
        ...params,
        company_id: entry.company_id,
        date_in: entry.entry_time,
        note:
          params.note ??
          `Created from gate entry ${entry.name}\nVehicle: ${entry.vehicle_number}\nDriver: ${entry.driver_name}`,
        gate_in_id: entry.id,
        vehicle_number: entry.vehicle_number,
        driver_name: entry.driver_name,
      },
      services
    );

    await services.gates.save({ ...entry, intake_id: intake.id });
    services.logger.info({ gate_entry_id: entry.id, intake_id: intake.id }, 'intake opened from gate entry');
    return intake;
  });
}

export async function cancelGateEntry(
  entryId: string,
  services: WarehouseServices
): Promise<GateEntry> {
  const entry = await loadGateEntry(entryId, services);
  if (entry.state === 'confirmed') {
    throw new StateError('Cannot cancel confirmed gate entries.');
  }

  const cancelled: GateEntry = { ...entry, state: 'cancelled' };
  await services.gates.save(cancelled);
  return cancelled;
}
