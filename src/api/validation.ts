import type { TemperatureReadingInput } from './schemas';
import { validateReading } from '../utils/temperature';
import { errorMessage } from '../utils/errors';

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

const ID_PATTERN = /^[a-zA-Z0-9_./-]+$/;

/**
 * Validate a single sensor reading beyond schema validation
 */
export function validateTemperatureReading(
  reading: TemperatureReadingInput,
  now: number = Date.now()
): ValidationResult {
  if (!ID_PATTERN.test(reading.location_id)) {
    return { valid: false, reason: 'Invalid location_id format' };
  }
  if (reading.sensor_id !== undefined && !ID_PATTERN.test(reading.sensor_id)) {
    return { valid: false, reason: 'Invalid sensor_id format' };
  }

  try {
    validateReading(reading, now);
  } catch (err) {
    return { valid: false, reason: errorMessage(err) };
  }

  return { valid: true };
}

/** Split a batch into readings to store and rejected indexes */
export function partitionReadings(
  readings: TemperatureReadingInput[],
  now: number
): { valid: TemperatureReadingInput[]; failed: Array<{ index: number; reason: string }> } {
  const valid: TemperatureReadingInput[] = [];
  const failed: Array<{ index: number; reason: string }> = [];

  readings.forEach((reading, index) => {
    const result = validateTemperatureReading(reading, now);
    if (result.valid) {
      valid.push(reading);
    } else {
      failed.push({ index, reason: result.reason ?? 'Invalid reading' });
    }
  });

  return { valid, failed };
}
