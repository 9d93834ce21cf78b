import { describe, it, expect } from 'vitest';
import {
  matchTariffRule,
  suggestTariff,
  assignTariff,
  validateTariffRule,
} from '../../src/utils/tariff';
import { makeLine, makeRule } from '../helpers/builders';

const context = { product_id: 'prod_peas', product_category: 'frozen', qty_in: 10 };

describe('matchTariffRule', () => {
  it('picks the lowest sequence among matching rules', () => {
    const rules = [
      makeRule({ id: 'late', sequence: 10 }),
      makeRule({ id: 'early', sequence: 5 }),
    ];
    expect(matchTariffRule(rules, context)?.id).toBe('early');
  });

  it('skips inactive rules and other companies', () => {
    const rules = [
      makeRule({ id: 'off', sequence: 1, active: false }),
      makeRule({ id: 'other', sequence: 2, company_id: 'co2' }),
      makeRule({ id: 'mine', sequence: 3 }),
    ];
    expect(matchTariffRule(rules, context, 'co1')?.id).toBe('mine');
  });

  it('requires every present filter to hold', () => {
    const rules = [
      makeRule({ id: 'chilled', sequence: 1, product_category: 'chilled' }),
      makeRule({ id: 'bulk', sequence: 2, min_qty: 50 }),
      makeRule({ id: 'peas', sequence: 3, product_id: 'prod_peas' }),
    ];
    expect(matchTariffRule(rules, context)?.id).toBe('peas');
  });

  it('matches temperature filters against the intake target', () => {
    const rule = makeRule({ id: 'deep_frozen', max_temp: -15 });
    expect(matchTariffRule([rule], { ...context, temperature_target: -20 })?.id).toBe('deep_frozen');
    expect(matchTariffRule([rule], { ...context, temperature_target: -5 })).toBeUndefined();
  });

  it('does not match a temperature-filtered rule without a target', () => {
    const rule = makeRule({ min_temp: -25 });
    expect(matchTariffRule([rule], context)).toBeUndefined();
  });

  it('returns undefined when nothing matches', () => {
    expect(matchTariffRule([], context)).toBeUndefined();
  });
});

describe('suggestTariff', () => {
  const intake = { company_id: 'co1', temperature_target: -18 };

  it('copies rate and basis from the matched rule', () => {
    const line = suggestTariff(
      makeLine({ tariff_rule_id: undefined }),
      intake,
      [makeRule({ id: 'r', rate: 3, basis: 'pallet' })]
    );
    expect(line.tariff_rule_id).toBe('r');
    expect(line.price_unit).toBe(3);
    expect(line.bill_basis).toBe('pallet');
    expect(line.tariff_manual).toBe(false);
  });

  it('keeps a manually assigned rule', () => {
    const manual = assignTariff(makeLine(), makeRule({ id: 'manual', sequence: 50 }));
    const line = suggestTariff(manual, intake, [makeRule({ id: 'better', sequence: 1 })]);
    expect(line.tariff_rule_id).toBe('manual');
    expect(line.tariff_manual).toBe(true);
  });

  it('leaves the line unpriced without a match', () => {
    const line = suggestTariff(makeLine({ tariff_rule_id: undefined }), intake, []);
    expect(line.tariff_rule_id).toBeUndefined();
  });
});

describe('validateTariffRule', () => {
  it('rejects an inverted temperature range', () => {
    expect(() => validateTariffRule(makeRule({ min_temp: 5, max_temp: -5 }))).toThrow(
      'Minimum temperature cannot be greater than maximum temperature.'
    );
  });

  it('rejects a negative rate', () => {
    expect(() => validateTariffRule(makeRule({ rate: -1 }))).toThrow('Rate cannot be negative.');
  });
});
