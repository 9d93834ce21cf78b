import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildServer } from '../../src/api/server';
import { createTestServices, type TestServices } from '../helpers/fakes';
import { JAN_1, makeRule } from '../helpers/builders';

describe('HTTP API', () => {
  let services: TestServices;
  let app: ReturnType<typeof buildServer>;

  beforeEach(async () => {
    services = createTestServices();
    app = buildServer(services);
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function createCheckedInIntake(): Promise<string> {
    const created = await app.inject({
      method: 'POST',
      url: '/v1/intakes',
      payload: {
        company_id: 'co1',
        customer_id: 'cust_1',
        location_id: 'wh/cold-1',
        date_in: JAN_1,
        lines: [{ product_id: 'prod_peas', product_name: 'Frozen peas', qty_in: 10, weight: 100 }],
      },
    });
    expect(created.statusCode).toBe(200);
    const id: string = created.json().id;

    const checkedIn = await app.inject({ method: 'POST', url: `/v1/intakes/${id}/check-in` });
    expect(checkedIn.json().state).toBe('checked_in');
    return id;
  }

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('creates and lists tariff rules', async () => {
    const created = await app.inject({
      method: 'POST',
      url: '/v1/tariffs',
      payload: {
        name: 'Chilled by volume',
        company_id: 'co1',
        basis: 'volume',
        rate: 0.8,
        service_product: 'svc_storage_chilled',
      },
    });

    expect(created.statusCode).toBe(200);
    expect(created.json()).toMatchObject({
      sequence: 10,
      active: true,
      currency: 'USD',
      rounding_policy: 'ceil_day',
    });
    expect(created.json().id).toMatch(/^tariff_[0-9a-f]{8}$/);

    const listed = await app.inject({ method: 'GET', url: '/v1/tariffs?company_id=co1' });
    expect(listed.json().tariffs).toHaveLength(1);
  });

  it('rejects a body that fails the schema', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/tariffs',
      payload: { name: 'Broken', company_id: 'co1', basis: 'weight', rate: -1, service_product: 'svc' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('validation_error');
  });

  it('maps domain errors to status codes', async () => {
    const missing = await app.inject({ method: 'GET', url: '/v1/intakes/nope' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'Intake nope not found.', code: 'not_found' });

    await services.tariffs.save(makeRule());
    const id = await createCheckedInIntake();
    const again = await app.inject({ method: 'POST', url: `/v1/intakes/${id}/check-in` });
    expect(again.statusCode).toBe(409);
    expect(again.json().code).toBe('state_error');
  });

  it('returns the intake with totals as of now', async () => {
    await services.tariffs.save(makeRule());
    const id = await createCheckedInIntake();

    const res = await app.inject({ method: 'GET', url: `/v1/intakes/${id}` });

    // Jan 1 00:00 to Feb 1 12:00 is 31.5 days, billed as 32
    expect(res.json().totals.total_amount).toBe(6400);
    expect(res.json().intake.lines[0].duration_days).toBe(32);
  });

  it('runs billing, archives the run and refuses to bill it twice', async () => {
    await services.tariffs.save(makeRule());
    await createCheckedInIntake();
    const window = { company_id: 'co1', date_from: '2024-01-01', date_to: '2024-01-31' };

    const preview = await app.inject({ method: 'POST', url: '/v1/billing/preview', payload: window });
    expect(preview.json().total_amount).toBe(6200);
    expect(services.invoices.records.size).toBe(0);

    const run = await app.inject({ method: 'POST', url: '/v1/billing/run', payload: window });
    const body = run.json();
    expect(run.statusCode).toBe(200);
    expect(body.invoices).toHaveLength(1);
    expect(body.total_amount).toBe(6200);
    expect(body.archive_key).toBe(`billing-runs/2024/02/01/${body.run_id}.json`);
    expect(services.archive.runs.size).toBe(1);

    const again = await app.inject({ method: 'POST', url: '/v1/billing/run', payload: window });
    expect(again.statusCode).toBe(422);
    expect(again.json().code).toBe('billing_eligibility');
  });

  it('still answers when archiving fails', async () => {
    await services.tariffs.save(makeRule());
    await createCheckedInIntake();
    services.archive.archiveRun = async () => {
      throw new Error('bucket unavailable');
    };

    const run = await app.inject({
      method: 'POST',
      url: '/v1/billing/run',
      payload: { company_id: 'co1', date_from: '2024-01-01', date_to: '2024-01-31' },
    });

    expect(run.statusCode).toBe(200);
    expect(run.json().archive_key).toBeUndefined();
    expect(run.json().invoices).toHaveLength(1);
  });

  it('stores valid readings and reports the rest by index', async () => {
    const now = services.now();
    const res = await app.inject({
      method: 'POST',
      url: '/v1/temperature-logs',
      payload: {
        readings: [
          { location_id: 'wh/cold-1', timestamp: now, temperature: -18 },
          { location_id: 'wh/cold-1', timestamp: now, temperature: 80 },
        ],
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      accepted: 1,
      alerts: 0,
      failed: [{ index: 1, reason: 'Temperature must be between -50°C and 50°C.' }],
    });
    expect(services.temperatures.logs).toHaveLength(1);
  });

  it('reports location and space capacity', async () => {
    const location = await app.inject({
      method: 'POST',
      url: '/v1/locations',
      payload: { id: 'freezer-a', name: 'Freezer A', company_id: 'co1', is_freezer: true, max_weight: 500 },
    });
    expect(location.statusCode).toBe(200);

    const space = await app.inject({
      method: 'POST',
      url: '/v1/spaces',
      payload: { name: 'Bin A', company_id: 'co1', location_id: 'freezer-a', max_weight: 100 },
    });
    const spaceId: string = space.json().id;

    const created = await app.inject({
      method: 'POST',
      url: '/v1/intakes',
      payload: {
        company_id: 'co1',
        customer_id: 'cust_1',
        location_id: 'freezer-a',
        lines: [{ product_id: 'prod_peas', product_name: 'Frozen peas', qty_in: 10, weight: 100, space_id: spaceId }],
      },
    });
    await app.inject({ method: 'POST', url: `/v1/intakes/${created.json().id}/check-in` });

    const capacity = await app.inject({ method: 'GET', url: '/v1/locations/freezer-a/capacity' });
    expect(capacity.json()).toEqual({
      location_id: 'freezer-a',
      intake_count: 1,
      current_volume: 0,
      current_weight: 100,
      volume_utilization: 0,
      weight_utilization: 20,
    });

    const bin = await app.inject({ method: 'GET', url: `/v1/spaces/${spaceId}/capacity` });
    expect(bin.json()).toMatchObject({ is_available: false, availability_status: 'occupied', weight_utilization: 100 });

    const missing = await app.inject({ method: 'GET', url: '/v1/spaces/nope/capacity' });
    expect(missing.statusCode).toBe(404);
  });
});
