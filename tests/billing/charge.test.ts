import { describe, it, expect } from 'vitest';
import {
  billableQuantity,
  computeLineCharge,
  computeReleaseAmount,
  deriveLine,
  roundCurrency,
  summarizeIntake,
} from '../../src/utils/charge';
import { indexRules } from '../../src/utils/tariff';
import { HOUR, JAN_1, makeLine, makeRule } from '../helpers/builders';

describe('billableQuantity', () => {
  it('falls back to quantity when no weight is recorded', () => {
    expect(billableQuantity('weight', { weight: 0, volume: 0, pallet_count: 0, qty_in: 10 })).toBe(10);
    expect(billableQuantity('weight', { weight: 250, volume: 0, pallet_count: 0, qty_in: 10 })).toBe(250);
  });

  it('has no fallback for volume and pallets', () => {
    expect(billableQuantity('volume', { weight: 100, volume: 0, pallet_count: 0, qty_in: 10 })).toBe(0);
    expect(billableQuantity('pallet', { weight: 100, volume: 2, pallet_count: 0, qty_in: 10 })).toBe(0);
  });

  it('charges one unit for flat', () => {
    expect(billableQuantity('flat', { weight: 100, volume: 2, pallet_count: 4, qty_in: 10 })).toBe(1);
  });
});

describe('computeLineCharge', () => {
  const rule = makeRule({ rate: 2, rounding_policy: 'ceil_day' });

  it('multiplies rate, quantity and rounded days', () => {
    const charge = computeLineCharge(makeLine({ weight: 100 }), rule, JAN_1 + 25 * HOUR);
    expect(charge.duration_hours).toBe(25);
    expect(charge.duration_days).toBe(2);
    expect(charge.amount).toBe(400);
  });

  it('prefers the line price override', () => {
    const charge = computeLineCharge(makeLine({ price_unit: 3 }), rule, JAN_1 + 25 * HOUR);
    expect(charge.amount).toBe(600);
  });

  it('stops the clock at release once fully out', () => {
    const line = makeLine({ qty_out: 10, date_out: JAN_1 + 10 * HOUR });
    const charge = computeLineCharge(line, rule, JAN_1 + 500 * HOUR);
    expect(charge.duration_hours).toBe(10);
    expect(charge.amount).toBe(200);
  });

  it('keeps running for a partial release', () => {
    const line = makeLine({ qty_out: 4, date_out: JAN_1 + 10 * HOUR });
    const charge = computeLineCharge(line, rule, JAN_1 + 50 * HOUR);
    expect(charge.duration_hours).toBe(50);
    expect(charge.duration_days).toBe(3);
  });
});

describe('deriveLine', () => {
  it('charges nothing without a rule', () => {
    const line = deriveLine(makeLine({ tariff_rule_id: undefined }), new Map(), JAN_1 + 36 * HOUR);
    expect(line.amount_subtotal).toBe(0);
    expect(line.duration_days).toBe(1.5);
  });

  it('fills in derived fields from the rule', () => {
    const line = deriveLine(makeLine(), indexRules([makeRule()]), JAN_1 + 25 * HOUR);
    expect(line.duration_days).toBe(2);
    expect(line.amount_subtotal).toBe(400);
  });
});

describe('computeReleaseAmount', () => {
  it('attributes the subtotal pro rata', () => {
    expect(computeReleaseAmount({ amount_subtotal: 900, qty_in: 30 }, 10)).toBe(300);
  });

  it('splits the whole subtotal across full release', () => {
    const line = { amount_subtotal: 900, qty_in: 30 };
    expect(computeReleaseAmount(line, 10) + computeReleaseAmount(line, 20)).toBe(900);
  });

  it('returns zero when nothing came in', () => {
    expect(computeReleaseAmount({ amount_subtotal: 900, qty_in: 0 }, 10)).toBe(0);
  });
});

describe('summarizeIntake', () => {
  it('adds up quantities and amounts', () => {
    const totals = summarizeIntake({
      lines: [
        makeLine({ qty_in: 10, qty_out: 2, weight: 100, amount_subtotal: 50 }),
        makeLine({ id: 'line_2', qty_in: 5, weight: 40, volume: 1.5, amount_subtotal: 25 }),
      ],
    });
    expect(totals).toEqual({
      total_qty_in: 15,
      total_qty_out: 2,
      total_weight: 140,
      total_volume: 1.5,
      total_amount: 75,
    });
  });
});

describe('roundCurrency', () => {
  it('rounds to cents', () => {
    expect(roundCurrency(1.006)).toBe(1.01);
    expect(roundCurrency(6199.999997685)).toBe(6200);
  });
});
