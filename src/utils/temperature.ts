/**
 * Temperature logs
 *
 * Sensor readings per location, classified against the target temperature
 * of the intake stored there.
 */

import { ValidationError } from './errors';
import type {
  TemperatureLog,
  TemperatureQueryParams,
  TemperatureReading,
  TemperatureStatus,
} from '../types/temperature';
import type { WarehouseServices } from '../types/services';

export const MIN_TEMPERATURE = -50;
export const MAX_TEMPERATURE = 50;
/** Allowed sensor clock drift into the future (ms) */
export const CLOCK_SKEW_MS = 5 * 60 * 1000;

const NORMAL_DEVIATION = 2;
const WARNING_DEVIATION = 5;

export function validateReading(reading: TemperatureReading, now: number): void {
  if (!Number.isFinite(reading.temperature)) {
    throw new ValidationError('Temperature must be a number.');
  }
  if (reading.temperature < MIN_TEMPERATURE || reading.temperature > MAX_TEMPERATURE) {
    throw new ValidationError(
      `Temperature must be between ${MIN_TEMPERATURE}°C and ${MAX_TEMPERATURE}°C.`
    );
  }
  if (reading.timestamp > now + CLOCK_SKEW_MS) {
    throw new ValidationError('Reading timestamp cannot be in the future.');
  }
}

/**
 * Within 2°C of target is normal, within 5°C high or low, beyond that
 * critical. Without a target every reading is normal.
 */
export function classifyTemperature(temperature: number, target?: number): TemperatureStatus {
  if (target === undefined) {
    return 'normal';
  }
  const deviation = temperature - target;
  if (Math.abs(deviation) <= NORMAL_DEVIATION) {
    return 'normal';
  }
  if (Math.abs(deviation) <= WARNING_DEVIATION) {
    return deviation > 0 ? 'high' : 'low';
  }
  return 'critical';
}

/** Validate, classify and store a batch of readings */
export async function recordTemperatures(
  readings: TemperatureReading[],
  services: WarehouseServices
): Promise<TemperatureLog[]> {
  const now = services.now();
  readings.forEach((reading) => validateReading(reading, now));

  const targets = new Map<string, number | undefined>();
  for (const reading of readings) {
    if (!reading.intake_id || targets.has(reading.intake_id)) continue;
    const intake = await services.intakes.get(reading.intake_id);
    targets.set(reading.intake_id, intake?.temperature_target);
  }

  const logs = readings.map((reading) => ({
    ...reading,
    status: classifyTemperature(
      reading.temperature,
      reading.intake_id ? targets.get(reading.intake_id) : undefined
    ),
  }));

  await services.temperatures.insert(logs);

  const alerts = logs.filter((log) => log.status === 'critical');
  if (alerts.length > 0) {
    services.logger.warn(
      { locations: [...new Set(alerts.map((log) => log.location_id))], count: alerts.length },
      'critical temperature readings'
    );
  }
  return logs;
}

export async function queryTemperatures(
  params: TemperatureQueryParams,
  services: WarehouseServices
): Promise<TemperatureLog[]> {
  if (params.start > params.end) {
    throw new ValidationError('Start time cannot be after end time.');
  }
  return services.temperatures.query(params);
}
