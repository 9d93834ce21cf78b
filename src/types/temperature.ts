/**
 * Temperature Log Types
 */

export type TemperatureStatus = 'normal' | 'high' | 'low' | 'critical';

export interface TemperatureReading {
  location_id: string;
  intake_id?: string;
  /** Unix ms */
  timestamp: number;
  /** Degrees Celsius */
  temperature: number;
  sensor_id?: string;
}

export interface TemperatureLog extends TemperatureReading {
  status: TemperatureStatus;
}

export interface TemperatureQueryParams {
  location_id: string;
  start: number;
  end: number;
}

export interface TemperatureLogStore {
  insert(logs: TemperatureLog[]): Promise<void>;
  /** Readings of a location within [start, end], oldest first */
  query(params: TemperatureQueryParams): Promise<TemperatureLog[]>;
}
