import { Type, Static, type TSchema } from '@sinclair/typebox';

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const DateString = Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' });
const Id = Type.String({ minLength: 1, maxLength: 255 });

export const IdParamsSchema = Type.Object({
  id: Id,
});

export const LineParamsSchema = Type.Object({
  id: Id,
  line_id: Id,
});

/**
 * Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
  code: Type.String(),
});

// ---------------------------------------------------------------------------
// Tariffs
// ---------------------------------------------------------------------------

const BillingBasisSchema = Type.Union([
  Type.Literal('weight'),
  Type.Literal('volume'),
  Type.Literal('pallet'),
  Type.Literal('flat'),
]);

const RoundingPolicySchema = Type.Union([
  Type.Literal('ceil_day'),
  Type.Literal('half_up'),
  Type.Literal('exact_hours'),
  Type.Literal('2h_step'),
]);

export const TariffRuleSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  company_id: Type.String(),
  active: Type.Boolean(),
  sequence: Type.Number(),
  basis: BillingBasisSchema,
  rate: Type.Number(),
  currency: Type.String(),
  rounding_policy: RoundingPolicySchema,
  min_bill_days: Type.Optional(Type.Number()),
  product_id: Type.Optional(Type.String()),
  product_category: Type.Optional(Type.String()),
  min_temp: Type.Optional(Type.Number()),
  max_temp: Type.Optional(Type.Number()),
  min_qty: Type.Optional(Type.Number()),
  service_product: Type.String(),
});

export const CreateTariffRequestSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 255 }),
  company_id: Id,
  basis: BillingBasisSchema,
  rate: Type.Number({ minimum: 0 }),
  service_product: Id,
  active: Type.Optional(Type.Boolean()),
  sequence: Type.Optional(Type.Integer()),
  currency: Type.Optional(Type.String({ minLength: 3, maxLength: 3 })),
  rounding_policy: Type.Optional(RoundingPolicySchema),
  min_bill_days: Type.Optional(Type.Number({ minimum: 0 })),
  product_id: Type.Optional(Id),
  product_category: Type.Optional(Id),
  min_temp: Type.Optional(Type.Number()),
  max_temp: Type.Optional(Type.Number()),
  min_qty: Type.Optional(Type.Number({ minimum: 0 })),
});

export const TariffListQuerySchema = Type.Object({
  company_id: Type.Optional(Id),
});

export const TariffListResponseSchema = Type.Object({
  tariffs: Type.Array(TariffRuleSchema),
});

export const TariffMatchRequestSchema = Type.Object({
  company_id: Type.Optional(Id),
  product_id: Id,
  product_category: Type.Optional(Id),
  qty_in: Type.Number({ minimum: 0 }),
  temperature_target: Type.Optional(Type.Number()),
});

export const TariffMatchResponseSchema = Type.Object({
  rule: Nullable(TariffRuleSchema),
});

// ---------------------------------------------------------------------------
// Intakes
// ---------------------------------------------------------------------------

const IntakeStateSchema = Type.Union([
  Type.Literal('draft'),
  Type.Literal('checked_in'),
  Type.Literal('partially_out'),
  Type.Literal('closed'),
  Type.Literal('cancelled'),
]);

export const StorageLineSchema = Type.Object({
  id: Type.String(),
  product_id: Type.String(),
  product_name: Type.String(),
  product_category: Type.Optional(Type.String()),
  lot_id: Type.Optional(Type.String()),
  qty_in: Type.Number(),
  qty_out: Type.Number(),
  weight: Type.Number(),
  volume: Type.Number(),
  pallet_count: Type.Number(),
  space_id: Type.Optional(Type.String()),
  date_in: Type.Number(),
  date_out: Type.Optional(Type.Number()),
  tariff_rule_id: Type.Optional(Type.String()),
  price_unit: Type.Optional(Type.Number()),
  bill_basis: Type.Optional(BillingBasisSchema),
  tariff_manual: Type.Boolean(),
  duration_hours: Type.Number(),
  duration_days: Type.Number(),
  amount_subtotal: Type.Number(),
  expiry_date: Type.Optional(Type.String()),
  remark: Type.Optional(Type.String()),
});

export const IntakeSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  company_id: Type.String(),
  customer_id: Type.String(),
  location_id: Type.String(),
  date_in: Type.Number(),
  planned_date_out: Type.Optional(Type.Number()),
  temperature_target: Type.Optional(Type.Number()),
  state: IntakeStateSchema,
  last_billed_date: Nullable(Type.String()),
  contract_id: Type.Optional(Type.String()),
  currency: Type.String(),
  lines: Type.Array(StorageLineSchema),
  note: Type.Optional(Type.String()),
  gate_in_id: Type.Optional(Type.String()),
  vehicle_number: Type.Optional(Type.String()),
  driver_name: Type.Optional(Type.String()),
});

export const IntakeTotalsSchema = Type.Object({
  total_qty_in: Type.Number(),
  total_qty_out: Type.Number(),
  total_weight: Type.Number(),
  total_volume: Type.Number(),
  total_amount: Type.Number(),
});

export const IntakeDetailResponseSchema = Type.Object({
  intake: IntakeSchema,
  totals: IntakeTotalsSchema,
});

export const StorageLineInputSchema = Type.Object({
  product_id: Id,
  product_name: Type.String({ minLength: 1, maxLength: 255 }),
  product_category: Type.Optional(Id),
  lot_id: Type.Optional(Id),
  qty_in: Type.Number({ exclusiveMinimum: 0 }),
  weight: Type.Optional(Type.Number({ minimum: 0 })),
  volume: Type.Optional(Type.Number({ minimum: 0 })),
  pallet_count: Type.Optional(Type.Integer({ minimum: 0 })),
  space_id: Type.Optional(Id),
  date_in: Type.Optional(Type.Number({ minimum: 0 })),
  tariff_rule_id: Type.Optional(Id),
  expiry_date: Type.Optional(DateString),
  remark: Type.Optional(Type.String({ maxLength: 1000 })),
});

export const CreateIntakeRequestSchema = Type.Object({
  company_id: Id,
  customer_id: Id,
  location_id: Id,
  date_in: Type.Optional(Type.Number({ minimum: 0 })),
  planned_date_out: Type.Optional(Type.Number({ minimum: 0 })),
  temperature_target: Type.Optional(Type.Number({ minimum: -50, maximum: 50 })),
  contract_id: Type.Optional(Id),
  currency: Type.Optional(Type.String({ minLength: 3, maxLength: 3 })),
  note: Type.Optional(Type.String({ maxLength: 1000 })),
  lines: Type.Array(StorageLineInputSchema, { minItems: 1, maxItems: 500 }),
});

export const AssignTariffRequestSchema = Type.Object({
  tariff_rule_id: Id,
});

export const InvoiceIntakeRequestSchema = Type.Object({
  date_to: Type.Optional(DateString),
});

// ---------------------------------------------------------------------------
// Invoices
// ---------------------------------------------------------------------------

export const IssuedInvoiceSchema = Type.Object({
  invoice_id: Type.String(),
  number: Type.String(),
  customer_id: Type.String(),
  intake_ids: Type.Array(Type.String()),
  total: Type.Number(),
});

export const PeriodInvoiceResponseSchema = Type.Object({
  invoice: IssuedInvoiceSchema,
  unadvanced: Type.Array(Type.String()),
});

export const InvoiceRecordSchema = Type.Object({
  invoice_id: Type.String(),
  kind: Type.Union([Type.Literal('period'), Type.Literal('release')]),
  number: Type.String(),
  customer_id: Type.String(),
  company_id: Type.String(),
  lines: Type.Array(
    Type.Object({
      description: Type.String(),
      amount: Type.Number(),
      account_ref: Type.String(),
      product_ref: Type.Optional(Type.String()),
    })
  ),
  currency: Type.String(),
  invoice_date: Type.String(),
  reference: Type.String(),
  intake_ids: Type.Array(Type.String()),
  state: Type.Union([Type.Literal('posted'), Type.Literal('cancelled')]),
  total: Type.Number(),
  created_at: Type.Number(),
});

// ---------------------------------------------------------------------------
// Releases
// ---------------------------------------------------------------------------

const ReleaseRequestLineSchema = Type.Object({
  intake_line_id: Id,
  qty_out: Type.Number({ exclusiveMinimum: 0 }),
});

export const CreateReleaseRequestSchema = Type.Object({
  intake_id: Id,
  date_out: Type.Optional(Type.Number({ minimum: 0 })),
  lines: Type.Array(ReleaseRequestLineSchema, { minItems: 1, maxItems: 500 }),
});

export const BulkReleaseRequestSchema = Type.Object({
  intake_id: Id,
  date_out: Type.Optional(Type.Number({ minimum: 0 })),
  lines: Type.Optional(Type.Array(ReleaseRequestLineSchema, { minItems: 1, maxItems: 500 })),
});

export const ReleaseSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  company_id: Type.String(),
  intake_id: Type.String(),
  customer_id: Type.String(),
  date_out: Type.Number(),
  state: Type.Union([Type.Literal('draft'), Type.Literal('done'), Type.Literal('cancelled')]),
  lines: Type.Array(
    Type.Object({
      intake_line_id: Type.String(),
      product_name: Type.String(),
      lot_id: Type.Optional(Type.String()),
      qty_out: Type.Number(),
      amount_line: Type.Number(),
      duration_days: Type.Number(),
    })
  ),
  gate_out_id: Type.Optional(Type.String()),
  vehicle_number: Type.Optional(Type.String()),
  driver_name: Type.Optional(Type.String()),
  invoice_id: Type.Optional(Type.String()),
});

// ---------------------------------------------------------------------------
// Contracts
// ---------------------------------------------------------------------------

const PricingModelSchema = Type.Union([
  Type.Literal('pre_paid'),
  Type.Literal('post_paid'),
  Type.Literal('cap'),
]);

const InvoiceCycleSchema = Type.Union([
  Type.Literal('monthly'),
  Type.Literal('weekly'),
  Type.Literal('manual'),
]);

export const CreateContractRequestSchema = Type.Object({
  company_id: Id,
  customer_id: Id,
  pricing_model: Type.Optional(PricingModelSchema),
  tariff_rule_id: Type.Optional(Id),
  credit_limit: Type.Optional(Type.Number({ minimum: 0 })),
  currency: Type.Optional(Type.String({ minLength: 3, maxLength: 3 })),
  invoice_cycle: Type.Optional(InvoiceCycleSchema),
  date_start: Type.Optional(DateString),
  date_end: Type.Optional(DateString),
});

export const ContractSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  company_id: Type.String(),
  customer_id: Type.String(),
  pricing_model: PricingModelSchema,
  tariff_rule_id: Type.Optional(Type.String()),
  credit_limit: Type.Number(),
  currency: Type.String(),
  invoice_cycle: InvoiceCycleSchema,
  next_invoice_date: Type.String(),
  last_invoiced_date: Nullable(Type.String()),
  state: Type.Union([
    Type.Literal('draft'),
    Type.Literal('active'),
    Type.Literal('suspended'),
    Type.Literal('closed'),
  ]),
  date_start: Type.String(),
  date_end: Type.Optional(Type.String()),
});

// ---------------------------------------------------------------------------
// Billing runs
// ---------------------------------------------------------------------------

export const BillingRunRequestSchema = Type.Object({
  company_id: Id,
  date_from: DateString,
  date_to: DateString,
  mode: Type.Optional(Type.Union([Type.Literal('unbilled_only'), Type.Literal('all_in_range')])),
  customer_ids: Type.Optional(Type.Array(Id, { maxItems: 1000 })),
  contract_ids: Type.Optional(Type.Array(Id, { maxItems: 1000 })),
  excluded_intake_ids: Type.Optional(Type.Array(Id, { maxItems: 10000 })),
  grouping: Type.Optional(Type.Union([Type.Literal('customer'), Type.Literal('intake')])),
  reset_watermarks: Type.Optional(Type.Boolean()),
  invoice_date: Type.Optional(DateString),
});

const PeriodChargeSchema = Type.Object({
  intake_id: Type.String(),
  period_start: Nullable(Type.Number()),
  period_end: Nullable(Type.Number()),
  period_days: Type.Number(),
  lines: Type.Array(
    Type.Object({
      line_id: Type.String(),
      product_id: Type.String(),
      product_name: Type.String(),
      tariff_rule_id: Type.String(),
      service_product: Type.String(),
      basis: BillingBasisSchema,
      rate: Type.Number(),
      billable_qty: Type.Number(),
      effective_days: Type.Number(),
      amount: Type.Number(),
    })
  ),
  amount: Type.Number(),
});

const BillingIntakeLineSchema = Type.Object({
  intake_id: Type.String(),
  intake_name: Type.String(),
  customer_id: Type.String(),
  location_id: Type.String(),
  date_in: Type.Number(),
  last_billed_date: Nullable(Type.String()),
  total_days: Type.Number(),
  billed_days: Type.Number(),
  pending_days: Type.Number(),
  period_amount: Type.Number(),
  total_amount: Type.Number(),
  selected: Type.Boolean(),
  charge: PeriodChargeSchema,
});

export const BillingRunResponseSchema = Type.Object({
  run_id: Type.String(),
  company_id: Type.String(),
  window: Type.Object({ date_from: Type.String(), date_to: Type.String() }),
  mode: Type.Union([Type.Literal('unbilled_only'), Type.Literal('all_in_range')]),
  grouping: Type.Union([Type.Literal('customer'), Type.Literal('intake')]),
  preview: Type.Boolean(),
  reset_count: Type.Number(),
  intakes: Type.Array(BillingIntakeLineSchema),
  invoices: Type.Array(IssuedInvoiceSchema),
  failures: Type.Array(
    Type.Object({
      group: Type.String(),
      intake_ids: Type.Array(Type.String()),
      code: Type.String(),
      reason: Type.String(),
    })
  ),
  total_amount: Type.Number(),
  archive_key: Type.Optional(Type.String()),
});

export const ContractInvoiceResponseSchema = Type.Object({
  contract: ContractSchema,
  run: BillingRunResponseSchema,
});

export const ResetWatermarksRequestSchema = Type.Object({
  company_id: Id,
});

export const ResetWatermarksResponseSchema = Type.Object({
  reset_count: Type.Number(),
});

// ---------------------------------------------------------------------------
// Gate entries
// ---------------------------------------------------------------------------

const GateEntryTypeSchema = Type.Union([Type.Literal('gate_in'), Type.Literal('gate_out')]);

export const CreateGateEntryRequestSchema = Type.Object({
  company_id: Id,
  entry_type: GateEntryTypeSchema,
  vehicle_number: Type.String({ minLength: 1, maxLength: 50 }),
  driver_name: Type.String({ minLength: 1, maxLength: 255 }),
  driver_contact: Type.Optional(Type.String({ maxLength: 255 })),
  entry_time: Type.Optional(Type.Number({ minimum: 0 })),
  intake_id: Type.Optional(Id),
  release_id: Type.Optional(Id),
  notes: Type.Optional(Type.String({ maxLength: 1000 })),
});

export const GateEntrySchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  company_id: Type.String(),
  entry_type: GateEntryTypeSchema,
  vehicle_number: Type.String(),
  driver_name: Type.String(),
  driver_contact: Type.Optional(Type.String()),
  entry_time: Type.Number(),
  intake_id: Type.Optional(Type.String()),
  release_id: Type.Optional(Type.String()),
  state: Type.Union([Type.Literal('draft'), Type.Literal('confirmed'), Type.Literal('cancelled')]),
  notes: Type.Optional(Type.String()),
});

export const GateIntakeRequestSchema = Type.Omit(CreateIntakeRequestSchema, ['company_id', 'date_in']);

// ---------------------------------------------------------------------------
// Locations & storage spaces
// ---------------------------------------------------------------------------

const Capacity = Type.Number({ minimum: 0 });

export const SaveLocationRequestSchema = Type.Object({
  id: Id,
  name: Type.String({ minLength: 1, maxLength: 255 }),
  company_id: Id,
  is_freezer: Type.Optional(Type.Boolean()),
  temperature_range_min: Type.Optional(Type.Number({ minimum: -50, maximum: 50 })),
  temperature_range_max: Type.Optional(Type.Number({ minimum: -50, maximum: 50 })),
  max_volume: Type.Optional(Capacity),
  max_weight: Type.Optional(Capacity),
});

export const StorageLocationSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  company_id: Type.String(),
  is_freezer: Type.Boolean(),
  temperature_range_min: Type.Optional(Type.Number()),
  temperature_range_max: Type.Optional(Type.Number()),
  max_volume: Type.Optional(Type.Number()),
  max_weight: Type.Optional(Type.Number()),
});

export const CreateSpaceRequestSchema = Type.Object({
  name: Type.String({ minLength: 1, maxLength: 255 }),
  company_id: Id,
  location_id: Id,
  max_volume: Type.Optional(Capacity),
  max_weight: Type.Optional(Capacity),
  active: Type.Optional(Type.Boolean()),
  notes: Type.Optional(Type.String({ maxLength: 1000 })),
});

export const StorageSpaceSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  company_id: Type.String(),
  location_id: Type.String(),
  max_volume: Type.Optional(Type.Number()),
  max_weight: Type.Optional(Type.Number()),
  active: Type.Boolean(),
  notes: Type.Optional(Type.String()),
});

const CapacityUsageFields = {
  current_volume: Type.Number(),
  current_weight: Type.Number(),
  volume_utilization: Type.Number(),
  weight_utilization: Type.Number(),
};

export const LocationCapacitySchema = Type.Object({
  location_id: Type.String(),
  intake_count: Type.Number(),
  ...CapacityUsageFields,
});

export const SpaceCapacitySchema = Type.Object({
  space_id: Type.String(),
  location_id: Type.String(),
  is_available: Type.Boolean(),
  availability_status: Type.Union([
    Type.Literal('available'),
    Type.Literal('occupied'),
    Type.Literal('maintenance'),
  ]),
  ...CapacityUsageFields,
});

// ---------------------------------------------------------------------------
// Temperature logs
// ---------------------------------------------------------------------------

export const TemperatureReadingSchema = Type.Object({
  location_id: Id,
  intake_id: Type.Optional(Id),
  timestamp: Type.Number({ minimum: 0 }),
  temperature: Type.Number(),
  sensor_id: Type.Optional(Id),
});

export const TemperatureBatchRequestSchema = Type.Object({
  readings: Type.Array(TemperatureReadingSchema, { minItems: 1, maxItems: 1000 }),
});

export const TemperatureBatchResponseSchema = Type.Object({
  accepted: Type.Number(),
  alerts: Type.Number(),
  failed: Type.Array(
    Type.Object({
      index: Type.Number(),
      reason: Type.String(),
    })
  ),
});

export const TemperatureQuerySchema = Type.Object({
  location_id: Id,
  start: Type.Number({ minimum: 0 }),
  end: Type.Number({ minimum: 0 }),
});

export const TemperatureLogSchema = Type.Object({
  location_id: Type.String(),
  intake_id: Type.Optional(Type.String()),
  timestamp: Type.Number(),
  temperature: Type.Number(),
  sensor_id: Type.Optional(Type.String()),
  status: Type.Union([
    Type.Literal('normal'),
    Type.Literal('high'),
    Type.Literal('low'),
    Type.Literal('critical'),
  ]),
});

export const TemperatureQueryResponseSchema = Type.Object({
  logs: Type.Array(TemperatureLogSchema),
});

export type TemperatureReadingInput = Static<typeof TemperatureReadingSchema>;
export type BillingRunRequest = Static<typeof BillingRunRequestSchema>;
