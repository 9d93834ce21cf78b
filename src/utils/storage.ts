import type { ClickHouseClient } from '@clickhouse/client';
import type {
  TemperatureLog,
  TemperatureLogStore,
  TemperatureQueryParams,
  TemperatureStatus,
} from '../types/temperature';

interface TemperatureRow {
  location_id: string;
  intake_id: string;
  sensor_id: string;
  timestamp: number | string;
  temperature: number;
  status: TemperatureStatus;
}

/** Unix ms to the DateTime64 text ClickHouse accepts */
function toDateTime64(ms: number): string {
  return new Date(ms).toISOString().replace('T', ' ').replace('Z', '');
}

/**
 * Temperature readings in ClickHouse
 * Inserts are batched per request
 */
export class ClickHouseTemperatureStore implements TemperatureLogStore {
  constructor(private readonly client: ClickHouseClient) {}

  async insert(logs: TemperatureLog[]): Promise<void> {
    if (logs.length === 0) {
      return;
    }

    await this.client.insert({
      table: 'temperature_logs',
      values: logs.map((log) => ({
        location_id: log.location_id,
        intake_id: log.intake_id ?? '',
        sensor_id: log.sensor_id ?? '',
        timestamp: toDateTime64(log.timestamp),
        temperature: log.temperature,
        status: log.status,
      })),
      format: 'JSONEachRow',
    });
  }

  async query(params: TemperatureQueryParams): Promise<TemperatureLog[]> {
    const result = await this.client.query({
      query: `
        SELECT
          location_id,
          intake_id,
          sensor_id,
          toUnixTimestamp64Milli(timestamp) AS timestamp,
          temperature,
          status
        FROM temperature_logs
        WHERE location_id = {locationId: String}
          AND timestamp >= fromUnixTimestamp64Milli({start: Int64})
          AND timestamp <= fromUnixTimestamp64Milli({end: Int64})
        ORDER BY timestamp
      `,
      query_params: {
        locationId: params.location_id,
        start: params.start,
        end: params.end,
      },
      format: 'JSONEachRow',
    });

    const rows = await result.json<TemperatureRow>();

    return rows.map((row) => ({
      location_id: row.location_id,
      intake_id: row.intake_id || undefined,
      sensor_id: row.sensor_id || undefined,
      // Int64 comes back as a string
      timestamp: Number(row.timestamp),
      temperature: row.temperature,
      status: row.status,
    }));
  }
}
