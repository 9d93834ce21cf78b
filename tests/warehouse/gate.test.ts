import { describe, it, expect, beforeEach } from 'vitest';
import {
  cancelGateEntry,
  confirmGateEntry,
  createGateEntry,
  createIntakeFromGateEntry,
} from '../../src/utils/gate';
import { ConflictError, StateError, ValidationError } from '../../src/utils/errors';
import { createTestServices, type TestServices } from '../helpers/fakes';
import { JAN_1, makeIntake } from '../helpers/builders';

describe('gate entries', () => {
  let services: TestServices;

  beforeEach(async () => {
    services = createTestServices();
    await services.intakes.seed(makeIntake({ id: 'in_1', state: 'draft', last_billed_date: '2024-01-15' }));
    await services.releases.save({
      id: 'out_1',
      name: 'OUT/2024/00001',
      company_id: 'co1',
      intake_id: 'in_1',
      customer_id: 'cust_1',
      date_out: JAN_1,
      state: 'draft',
      lines: [],
    });
  });

  it('numbers arrivals and departures in their own series', async () => {
    const arrival = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_in', vehicle_number: ' TRK-100 ', driver_name: 'Sam' },
      services
    );
    const departure = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_out', vehicle_number: 'TRK-200', driver_name: 'Alex' },
      services
    );

    expect(arrival.name).toBe('GIN/2024/00001');
    expect(arrival.vehicle_number).toBe('TRK-100');
    expect(arrival.state).toBe('draft');
    expect(departure.name).toBe('GOUT/2024/00001');
  });

  it('requires vehicle and driver', async () => {
    await expect(
      createGateEntry(
        { company_id: 'co1', entry_type: 'gate_in', vehicle_number: '  ', driver_name: 'Sam' },
        services
      )
    ).rejects.toThrow('Vehicle number is required.');
  });

  it('keeps arrivals and departures to their own documents', async () => {
    await expect(
      createGateEntry(
        { company_id: 'co1', entry_type: 'gate_in', vehicle_number: 'TRK-100', driver_name: 'Sam', release_id: 'out_1' },
        services
      )
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      createGateEntry(
        { company_id: 'co1', entry_type: 'gate_out', vehicle_number: 'TRK-100', driver_name: 'Sam', intake_id: 'in_1' },
        services
      )
    ).rejects.toThrow('A gate-out entry cannot reference an intake.');
  });

  it('copies vehicle details onto the intake when confirmed', async () => {
    const entry = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_in', vehicle_number: 'TRK-100', driver_name: 'Sam', intake_id: 'in_1' },
      services
    );

    const confirmed = await confirmGateEntry(entry.id, services);

    expect(confirmed.state).toBe('confirmed');
    const intake = await services.intakes.get('in_1');
    expect(intake?.vehicle_number).toBe('TRK-100');
    expect(intake?.driver_name).toBe('Sam');
    expect(intake?.gate_in_id).toBe(entry.id);
    expect(intake?.last_billed_date).toBe('2024-01-15');

    await expect(confirmGateEntry(entry.id, services)).rejects.toBeInstanceOf(StateError);
  });

  it('refuses to confirm while the release intake is locked', async () => {
    const entry = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_out', vehicle_number: 'TRK-200', driver_name: 'Alex', release_id: 'out_1' },
      services
    );
    await services.locks.acquire('intake:in_1');

    await expect(confirmGateEntry(entry.id, services)).rejects.toBeInstanceOf(ConflictError);
    expect((await services.gates.get(entry.id))?.state).toBe('draft');
    expect((await services.releases.get('out_1'))?.gate_out_id).toBeUndefined();
  });

  it('copies vehicle details onto the release when confirmed', async () => {
    const entry = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_out', vehicle_number: 'TRK-200', driver_name: 'Alex', release_id: 'out_1' },
      services
    );

    await confirmGateEntry(entry.id, services);

    const release = await services.releases.get('out_1');
    expect(release?.gate_out_id).toBe(entry.id);
    expect(release?.driver_name).toBe('Alex');
  });

  it('cancels drafts but not confirmed entries', async () => {
    const draft = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_in', vehicle_number: 'TRK-100', driver_name: 'Sam' },
      services
    );
    expect((await cancelGateEntry(draft.id, services)).state).toBe('cancelled');

    const other = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_in', vehicle_number: 'TRK-101', driver_name: 'Sam' },
      services
    );
    await confirmGateEntry(other.id, services);
    await expect(cancelGateEntry(other.id, services)).rejects.toThrow(
      'Cannot cancel confirmed gate entries.'
    );
  });

  it('opens one intake per gate-in entry', async () => {
    const entry = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_in', vehicle_number: 'TRK-100', driver_name: 'Sam', entry_time: JAN_1 },
      services
    );
    const goods = {
      customer_id: 'cust_1',
      location_id: 'wh/cold-1',
      lines: [{ product_id: 'prod_peas', product_name: 'Frozen peas', qty_in: 10, weight: 100 }],
    };

    const intake = await createIntakeFromGateEntry(entry.id, goods, services);

    expect(intake.name).toBe('IN/2024/00001');
    expect(intake.state).toBe('draft');
    expect(intake.company_id).toBe('co1');
    expect(intake.date_in).toBe(JAN_1);
    expect(intake.gate_in_id).toBe(entry.id);
    expect(intake.vehicle_number).toBe('TRK-100');
    expect(intake.driver_name).toBe('Sam');
    expect(intake.note).toBe('Created from gate entry GIN/2024/00001\nVehicle: TRK-100\nDriver: Sam');
    expect((await services.gates.get(entry.id))?.intake_id).toBe(intake.id);

    const again = await createIntakeFromGateEntry(entry.id, goods, services);
    expect(again.id).toBe(intake.id);
    expect(await services.intakes.list()).toHaveLength(2);
  });

  it('opens intakes only from arrivals', async () => {
    const departure = await createGateEntry(
      { company_id: 'co1', entry_type: 'gate_out', vehicle_number: 'TRK-200', driver_name: 'Alex' },
      services
    );
    await expect(
      createIntakeFromGateEntry(
        departure.id,
        { customer_id: 'cust_1', location_id: 'wh/cold-1', lines: [] },
        services
      )
    ).rejects.toThrow('Can only create intake from gate-in entries.');
  });
});
