import { describe, it, expect } from 'vitest';
import {
  classifyTemperature,
  queryTemperatures,
  recordTemperatures,
  validateReading,
} from '../../src/utils/temperature';
import { ValidationError } from '../../src/utils/errors';
import { createTestServices } from '../helpers/fakes';
import { HOUR, makeIntake } from '../helpers/builders';

const MINUTE = 60 * 1000;

describe('classifyTemperature', () => {
  it('grades deviation from the target', () => {
    expect(classifyTemperature(-17, -18)).toBe('normal');
    expect(classifyTemperature(-16, -18)).toBe('normal');
    expect(classifyTemperature(-14, -18)).toBe('high');
    expect(classifyTemperature(-13, -18)).toBe('high');
    expect(classifyTemperature(-22, -18)).toBe('low');
    expect(classifyTemperature(-10, -18)).toBe('critical');
    expect(classifyTemperature(-30, -18)).toBe('critical');
  });

  it('treats every reading as normal without a target', () => {
    expect(classifyTemperature(25)).toBe('normal');
  });
});

describe('validateReading', () => {
  const now = Date.UTC(2024, 1, 1, 12);
  const reading = { location_id: 'wh/cold-1', timestamp: now, temperature: -18 };

  it('bounds the temperature', () => {
    expect(() => validateReading({ ...reading, temperature: 51 }, now)).toThrow(
      'Temperature must be between -50°C and 50°C.'
    );
    expect(() => validateReading({ ...reading, temperature: 50 }, now)).not.toThrow();
  });

  it('tolerates a little sensor clock drift', () => {
    expect(() => validateReading({ ...reading, timestamp: now + 4 * MINUTE }, now)).not.toThrow();
    expect(() => validateReading({ ...reading, timestamp: now + 10 * MINUTE }, now)).toThrow(
      ValidationError
    );
  });
});

describe('recordTemperatures', () => {
  it('classifies against the intake target and stores the batch', async () => {
    const services = createTestServices();
    const now = services.now();
    await services.intakes.seed(makeIntake({ id: 'in_1', temperature_target: -18 }));

    const logs = await recordTemperatures(
      [
        { location_id: 'wh/cold-1', intake_id: 'in_1', timestamp: now - HOUR, temperature: -17.5 },
        { location_id: 'wh/cold-1', intake_id: 'in_1', timestamp: now, temperature: -9 },
        { location_id: 'wh/cold-2', timestamp: now, temperature: 4 },
      ],
      services
    );

    expect(logs.map((log) => log.status)).toEqual(['normal', 'critical', 'normal']);
    expect(services.temperatures.logs).toHaveLength(3);

    const history = await queryTemperatures(
      { location_id: 'wh/cold-1', start: now - 2 * HOUR, end: now },
      services
    );
    expect(history.map((log) => log.temperature)).toEqual([-17.5, -9]);
  });

  it('stores nothing when a reading is invalid', async () => {
    const services = createTestServices();
    await expect(
      recordTemperatures(
        [
          { location_id: 'wh/cold-1', timestamp: services.now(), temperature: -18 },
          { location_id: 'wh/cold-1', timestamp: services.now(), temperature: 80 },
        ],
        services
      )
    ).rejects.toBeInstanceOf(ValidationError);
    expect(services.temperatures.logs).toEqual([]);
  });

  it('rejects an inverted query range', async () => {
    const services = createTestServices();
    await expect(
      queryTemperatures({ location_id: 'wh/cold-1', start: 10, end: 5 }, services)
    ).rejects.toThrow('Start time cannot be after end time.');
  });
});
