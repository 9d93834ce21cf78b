/**
 * Tariff Rule Matcher
 *
 * Rules are evaluated as an ordered predicate chain: ascending sequence,
 * every present filter must hold, first match wins.
 */

import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from './errors';
import { DEFAULT_CURRENCY } from '../config/billing';
import type { CreateTariffParams, TariffMatchContext, TariffRule } from '../types/tariff';
import type { Intake, StorageLine } from '../types/intake';
import type { WarehouseServices } from '../types/services';

type RulePredicate = (rule: TariffRule, context: TariffMatchContext) => boolean;

const FILTERS: RulePredicate[] = [
  (rule, ctx) => rule.product_id === undefined || rule.product_id === ctx.product_id,
  (rule, ctx) =>
    rule.product_category === undefined || rule.product_category === ctx.product_category,
  (rule, ctx) =>
    rule.min_temp === undefined ||
    (ctx.temperature_target !== undefined && ctx.temperature_target >= rule.min_temp),
  (rule, ctx) =>
    rule.max_temp === undefined ||
    (ctx.temperature_target !== undefined && ctx.temperature_target <= rule.max_temp),
  (rule, ctx) => rule.min_qty === undefined || ctx.qty_in >= rule.min_qty,
];

export function matchesRule(rule: TariffRule, context: TariffMatchContext): boolean {
  return FILTERS.every((filter) => filter(rule, context));
}

/** Sequence order, name as tie-break */
export function sortRules(rules: TariffRule[]): TariffRule[] {
  return [...rules].sort((a, b) => a.sequence - b.sequence || a.name.localeCompare(b.name));
}

/**
 * First active rule of the company matching the context, or undefined
 */
export function matchTariffRule(
  rules: TariffRule[],
  context: TariffMatchContext,
  companyId?: string
): TariffRule | undefined {
  const candidates = rules.filter(
    (rule) => rule.active && (companyId === undefined || rule.company_id === companyId)
  );
  return sortRules(candidates).find((rule) => matchesRule(rule, context));
}

export function matchContext(line: StorageLine, intake: Pick<Intake, 'temperature_target'>): TariffMatchContext {
  return {
    product_id: line.product_id,
    product_category: line.product_category,
    qty_in: line.qty_in,
    temperature_target: intake.temperature_target,
  };
}

/** Manual assignment: copies rate and basis and pins the rule */
export function assignTariff(line: StorageLine, rule: TariffRule): StorageLine {
  return {
    ...line,
    tariff_rule_id: rule.id,
    price_unit: rule.rate,
    bill_basis: rule.basis,
    tariff_manual: true,
  };
}

/**
 * Fill in the first matching rule unless an operator already chose one.
 * No match leaves the line unpriced.
 */
export function suggestTariff(
  line: StorageLine,
  intake: Pick<Intake, 'company_id' | 'temperature_target'>,
  rules: TariffRule[]
): StorageLine {
  if (line.tariff_manual && line.tariff_rule_id) {
    return line;
  }

  const rule = matchTariffRule(rules, matchContext(line, intake), intake.company_id);
  if (!rule) {
    return line;
  }

  return {
    ...line,
    tariff_rule_id: rule.id,
    price_unit: rule.rate,
    bill_basis: rule.basis,
    tariff_manual: false,
  };
}

export function indexRules(rules: TariffRule[]): Map<string, TariffRule> {
  return new Map(rules.map((rule) => [rule.id, rule]));
}

export function validateTariffRule(rule: TariffRule): void {
  if (rule.min_temp !== undefined && rule.max_temp !== undefined && rule.min_temp > rule.max_temp) {
    throw new ValidationError('Minimum temperature cannot be greater than maximum temperature.');
  }
  if (rule.min_qty !== undefined && rule.min_qty < 0) {
    throw new ValidationError('Minimum quantity cannot be negative.');
  }
  if (rule.rate < 0) {
    throw new ValidationError('Rate cannot be negative.');
  }
  if (rule.min_bill_days !== undefined && rule.min_bill_days < 0) {
    throw new ValidationError('Minimum billable days cannot be negative.');
  }
}

export async function createTariffRule(
  params: CreateTariffParams,
  services: WarehouseServices
): Promise<TariffRule> {
  if (!params.name.trim()) {
    throw new ValidationError('Tariff name is required.');
  }

  const rule: TariffRule = {
    ...params,
    id: `tariff_${uuidv4().slice(0, 8)}`,
    active: params.active ?? true,
    sequence: params.sequence ?? 10,
    currency: params.currency ?? DEFAULT_CURRENCY,
    rounding_policy: params.rounding_policy ?? 'ceil_day',
  };
  validateTariffRule(rule);

  await services.tariffs.save(rule);
  services.logger.info({ tariff_rule_id: rule.id, name: rule.name }, 'tariff rule created');
  return rule;
}

/** Rules of a company in evaluation order */
export async function listTariffRules(
  companyId: string | undefined,
  services: WarehouseServices
): Promise<TariffRule[]> {
  const rules = await services.tariffs.list();
  return sortRules(
    companyId === undefined ? rules : rules.filter((rule) => rule.company_id === companyId)
  );
}
