import Fastify, { type FastifyBaseLogger } from 'fastify';
import { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import {
  AssignTariffRequestSchema,
  BillingRunRequestSchema,
  BillingRunResponseSchema,
  BulkReleaseRequestSchema,
  ContractInvoiceResponseSchema,
  ContractSchema,
  CreateContractRequestSchema,
  CreateGateEntryRequestSchema,
  CreateIntakeRequestSchema,
  CreateReleaseRequestSchema,
  CreateSpaceRequestSchema,
  CreateTariffRequestSchema,
  GateEntrySchema,
  GateIntakeRequestSchema,
  IdParamsSchema,
  IntakeDetailResponseSchema,
  IntakeSchema,
  InvoiceIntakeRequestSchema,
  InvoiceRecordSchema,
  IssuedInvoiceSchema,
  LineParamsSchema,
  LocationCapacitySchema,
  PeriodInvoiceResponseSchema,
  ReleaseSchema,
  ResetWatermarksRequestSchema,
  ResetWatermarksResponseSchema,
  SaveLocationRequestSchema,
  SpaceCapacitySchema,
  StorageLocationSchema,
  StorageSpaceSchema,
  TariffListQuerySchema,
  TariffListResponseSchema,
  TariffMatchRequestSchema,
  TariffMatchResponseSchema,
  TariffRuleSchema,
  TemperatureBatchRequestSchema,
  TemperatureBatchResponseSchema,
  TemperatureQueryResponseSchema,
  TemperatureQuerySchema,
} from './schemas';
import { partitionReadings } from './validation';
import { createTariffRule, listTariffRules, matchTariffRule } from '../utils/tariff';
import {
  assignLineTariff,
  cancelIntake,
  checkInIntake,
  closeIntake,
  createIntake,
  getIntake,
  invoiceIntake,
} from '../utils/intake';
import {
  bulkRelease,
  cancelRelease,
  createRelease,
  invoiceRelease,
  validateRelease,
} from '../utils/release';
import {
  createContract,
  invoiceContract,
  transitionContract,
  type ContractAction,
} from '../utils/contract';
import { previewBillingRun, resetWatermarks, runBillingCycle } from '../utils/billing';
import {
  cancelGateEntry,
  confirmGateEntry,
  createGateEntry,
  createIntakeFromGateEntry,
} from '../utils/gate';
import { createSpace, getLocationCapacity, getSpaceCapacity, saveLocation } from '../utils/space';
import { queryTemperatures, recordTemperatures } from '../utils/temperature';
import { summarizeIntake } from '../utils/charge';
import { isWarehouseError } from '../utils/errors';
import type { BillingRunResult } from '../types/billing';
import type { WarehouseServices } from '../types/services';

const CONTRACT_ACTIONS: ContractAction[] = ['activate', 'suspend', 'resume', 'close'];

/**
 * Build the HTTP API over a set of collaborators
 *
 * The server owns no state; everything goes through `services`, so tests
 * pass in-memory fakes and production passes the Redis-backed set.
 */
export function buildServer(services: WarehouseServices) {
  const logger: FastifyBaseLogger = services.logger;
  const app = Fastify({ logger }).withTypeProvider<TypeBoxTypeProvider>();

  app.setErrorHandler((error, request, reply) => {
    if (isWarehouseError(error)) {
      return reply.status(error.statusCode).send({ error: error.message, code: error.code });
    }
    if (error.validation) {
      return reply.status(400).send({ error: error.message, code: 'validation_error' });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ error: 'Internal server error', code: 'internal_error' });
  });

  /** Store the run in the archive; a failed upload never fails the run */
  async function archive(result: BillingRunResult): Promise<string | undefined> {
    try {
      return await services.archive.archiveRun(result);
    } catch (err) {
      services.logger.error({ err, run_id: result.run_id }, 'failed to archive billing run');
      return undefined;
    }
  }

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  /**
   * GET /v1/tariffs - List tariff rules in evaluation order
   */
  app.get(
    '/v1/tariffs',
    {
      schema: {
        querystring: TariffListQuerySchema,
        response: { 200: TariffListResponseSchema },
      },
    },
    async (request) => {
      return { tariffs: await listTariffRules(request.query.company_id, services) };
    }
  );

  /**
   * POST /v1/tariffs - Create a tariff rule
   */
  app.post(
    '/v1/tariffs',
    {
      schema: {
        body: CreateTariffRequestSchema,
        response: { 200: TariffRuleSchema },
      },
    },
    async (request) => {
      return createTariffRule(request.body, services);
    }
  );

  /**
   * POST /v1/tariffs/match - Which rule would price a line
   */
  app.post(
    '/v1/tariffs/match',
    {
      schema: {
        body: TariffMatchRequestSchema,
        response: { 200: TariffMatchResponseSchema },
      },
    },
    async (request) => {
      const { company_id, ...context } = request.body;
      const rule = matchTariffRule(await services.tariffs.list(), context, company_id);
      return { rule: rule ?? null };
    }
  );

  /**
   * POST /v1/intakes - Create a draft intake; tariffs are suggested per line
   */
  app.post(
    '/v1/intakes',
    {
      schema: {
        body: CreateIntakeRequestSchema,
        response: { 200: IntakeSchema },
      },
    },
    async (request) => {
      return createIntake(request.body, services);
    }
  );

  /**
   * GET /v1/intakes/:id - Intake with durations and amounts as of now
   */
  app.get(
    '/v1/intakes/:id',
    {
      schema: {
        params: IdParamsSchema,
        response: { 200: IntakeDetailResponseSchema },
      },
    },
    async (request) => {
      const intake = await getIntake(request.params.id, services);
      return { intake, totals: summarizeIntake(intake) };
    }
  );

  app.post(
    '/v1/intakes/:id/check-in',
    { schema: { params: IdParamsSchema, response: { 200: IntakeSchema } } },
    async (request) => checkInIntake(request.params.id, services)
  );

  app.post(
    '/v1/intakes/:id/cancel',
    { schema: { params: IdParamsSchema, response: { 200: IntakeSchema } } },
    async (request) => cancelIntake(request.params.id, services)
  );

  app.post(
    '/v1/intakes/:id/close',
    { schema: { params: IdParamsSchema, response: { 200: IntakeSchema } } },
    async (request) => closeIntake(request.params.id, services)
  );

  /**
   * POST /v1/intakes/:id/invoice - Bill one intake from its watermark to date_to
   */
  app.post(
    '/v1/intakes/:id/invoice',
    {
      schema: {
        params: IdParamsSchema,
        body: InvoiceIntakeRequestSchema,
        response: { 200: PeriodInvoiceResponseSchema },
      },
    },
    async (request) => invoiceIntake(request.params.id, request.body.date_to, services)
  );

  app.post(
    '/v1/intakes/:id/lines/:line_id/tariff',
    {
      schema: {
        params: LineParamsSchema,
        body: AssignTariffRequestSchema,
        response: { 200: IntakeSchema },
      },
    },
    async (request) =>
      assignLineTariff(request.params.id, request.params.line_id, request.body.tariff_rule_id, services)
  );

  /**
   * POST /v1/releases - Draft a release of goods from an open intake
   */
  app.post(
    '/v1/releases',
    {
      schema: {
        body: CreateReleaseRequestSchema,
        response: { 200: ReleaseSchema },
      },
    },
    async (request) => createRelease(request.body, services)
  );

  /**
   * POST /v1/releases/bulk - Create and validate in one step
   *
   * Without lines, releases everything still on hand.
   */
  app.post(
    '/v1/releases/bulk',
    {
      schema: {
        body: BulkReleaseRequestSchema,
        response: { 200: ReleaseSchema },
      },
    },
    async (request) => bulkRelease(request.body, services)
  );

  app.post(
    '/v1/releases/:id/validate',
    { schema: { params: IdParamsSchema, response: { 200: ReleaseSchema } } },
    async (request) => validateRelease(request.params.id, services)
  );

  app.post(
    '/v1/releases/:id/cancel',
    { schema: { params: IdParamsSchema, response: { 200: ReleaseSchema } } },
    async (request) => cancelRelease(request.params.id, services)
  );

  app.post(
    '/v1/releases/:id/invoice',
    { schema: { params: IdParamsSchema, response: { 200: IssuedInvoiceSchema } } },
    async (request) => invoiceRelease(request.params.id, services)
  );

  /**
   * POST /v1/contracts - Create a draft storage contract
   */
  app.post(
    '/v1/contracts',
    {
      schema: {
        body: CreateContractRequestSchema,
        response: { 200: ContractSchema },
      },
    },
    async (request) => createContract(request.body, services)
  );

  for (const action of CONTRACT_ACTIONS) {
    app.post(
      `/v1/contracts/:id/${action}`,
      { schema: { params: IdParamsSchema, response: { 200: ContractSchema } } },
      async (request) => transitionContract(request.params.id, action, services)
    );
  }

  /**
   * POST /v1/contracts/:id/invoice - Bill the contract's intakes through today
   */
  app.post(
    '/v1/contracts/:id/invoice',
    {
      schema: {
        params: IdParamsSchema,
        response: { 200: ContractInvoiceResponseSchema },
      },
    },
    async (request) => {
      const outcome = await invoiceContract(request.params.id, services);
      const archiveKey = await archive(outcome.run);
      return { contract: outcome.contract, run: { ...outcome.run, archive_key: archiveKey } };
    }
  );

  /**
   * POST /v1/billing/preview - What a run would bill, without invoicing
   */
  app.post(
    '/v1/billing/preview',
    {
      schema: {
        body: BillingRunRequestSchema,
        response: { 200: BillingRunResponseSchema },
      },
    },
    async (request) => previewBillingRun(request.body, services)
  );

  /**
   * POST /v1/billing/run - Invoice every selected intake for the window
   *
   * One invoice per customer (or per intake). A failing group is reported
   * in `failures` and does not stop the others. The result is archived.
   */
  app.post(
    '/v1/billing/run',
    {
      schema: {
        body: BillingRunRequestSchema,
        response: { 200: BillingRunResponseSchema },
      },
    },
    async (request) => {
      const result = await runBillingCycle(request.body, services);
      return { ...result, archive_key: await archive(result) };
    }
  );

  app.post(
    '/v1/billing/reset-watermarks',
    {
      schema: {
        body: ResetWatermarksRequestSchema,
        response: { 200: ResetWatermarksResponseSchema },
      },
    },
    async (request) => {
      return { reset_count: await resetWatermarks(request.body.company_id, services) };
    }
  );

  /**
   * POST /v1/invoices/:id/cancel - Cancel an invoice
   *
   * Watermarks are not touched; run reset-watermarks to bill the period again.
   */
  app.post(
    '/v1/invoices/:id/cancel',
    { schema: { params: IdParamsSchema, response: { 200: InvoiceRecordSchema } } },
    async (request) => services.invoices.cancelInvoice(request.params.id)
  );

  app.post(
    '/v1/gate-entries',
    {
      schema: {
        body: CreateGateEntryRequestSchema,
        response: { 200: GateEntrySchema },
      },
    },
    async (request) => createGateEntry(request.body, services)
  );

  app.post(
    '/v1/gate-entries/:id/confirm',
    { schema: { params: IdParamsSchema, response: { 200: GateEntrySchema } } },
    async (request) => confirmGateEntry(request.params.id, services)
  );

  app.post(
    '/v1/gate-entries/:id/cancel',
    { schema: { params: IdParamsSchema, response: { 200: GateEntrySchema } } },
    async (request) => cancelGateEntry(request.params.id, services)
  );

  /**
   * POST /v1/gate-entries/:id/intake - Open a draft intake for a gate-in entry
   *
   * Returns the already linked intake if the entry has one.
   */
  app.post(
    '/v1/gate-entries/:id/intake',
    {
      schema: {
        params: IdParamsSchema,
        body: GateIntakeRequestSchema,
        response: { 200: IntakeSchema },
      },
    },
    async (request) => createIntakeFromGateEntry(request.params.id, request.body, services)
  );

  /**
   * POST /v1/locations - Create or replace a stock location record
   */
  app.post(
    '/v1/locations',
    {
      schema: {
        body: SaveLocationRequestSchema,
        response: { 200: StorageLocationSchema },
      },
    },
    async (request) => saveLocation(request.body, services)
  );

  app.get(
    '/v1/locations/:id/capacity',
    { schema: { params: IdParamsSchema, response: { 200: LocationCapacitySchema } } },
    async (request) => getLocationCapacity(request.params.id, services)
  );

  app.post(
    '/v1/spaces',
    {
      schema: {
        body: CreateSpaceRequestSchema,
        response: { 200: StorageSpaceSchema },
      },
    },
    async (request) => createSpace(request.body, services)
  );

  app.get(
    '/v1/spaces/:id/capacity',
    { schema: { params: IdParamsSchema, response: { 200: SpaceCapacitySchema } } },
    async (request) => getSpaceCapacity(request.params.id, services)
  );

  /**
   * POST /v1/temperature-logs - Ingest a batch of sensor readings
   *
   * Invalid readings are reported by index; the rest are stored.
   */
  app.post(
    '/v1/temperature-logs',
    {
      schema: {
        body: TemperatureBatchRequestSchema,
        response: { 200: TemperatureBatchResponseSchema },
      },
    },
    async (request) => {
      const { valid, failed } = partitionReadings(request.body.readings, services.now());
      const logs = valid.length > 0 ? await recordTemperatures(valid, services) : [];

      return {
        accepted: logs.length,
        alerts: logs.filter((log) => log.status === 'critical').length,
        failed,
      };
    }
  );

  app.get(
    '/v1/temperature-logs',
    {
      schema: {
        querystring: TemperatureQuerySchema,
        response: { 200: TemperatureQueryResponseSchema },
      },
    },
    async (request) => {
      return { logs: await queryTemperatures(request.query, services) };
    }
  );

  return app;
}
