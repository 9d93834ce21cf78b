import { createClient } from '@clickhouse/client';
import { logger } from './logger';

const CLICKHOUSE_HOST = process.env.CLICKHOUSE_HOST || 'http://localhost:8123';
const CLICKHOUSE_USER = process.env.CLICKHOUSE_USER || 'default';
const CLICKHOUSE_PASSWORD = process.env.CLICKHOUSE_PASSWORD || '';
const CLICKHOUSE_DATABASE = process.env.CLICKHOUSE_DATABASE || 'coldstore';

export const clickhouse = createClient({
  url: CLICKHOUSE_HOST,
  username: CLICKHOUSE_USER,
  password: CLICKHOUSE_PASSWORD,
  database: CLICKHOUSE_DATABASE,
});

/**
 * Initialize ClickHouse: create database and tables if they don't exist
 */
export async function initClickHouse(): Promise<void> {
  await clickhouse.command({
    query: `CREATE DATABASE IF NOT EXISTS ${CLICKHOUSE_DATABASE}`,
  });

  // Sensor readings, one row per reading, read back per location and time range
  await clickhouse.command({
    query: `
      CREATE TABLE IF NOT EXISTS ${CLICKHOUSE_DATABASE}.temperature_logs (
        location_id String,
        intake_id String,
        sensor_id String,
        timestamp DateTime64(3),
        temperature Float64,
        status LowCardinality(String),
        ingested_at DateTime64(3) DEFAULT now64(3)
      )
      ENGINE = MergeTree()
      ORDER BY (location_id, timestamp)
      PRIMARY KEY (location_id, timestamp)
    `,
  });

  logger.info('ClickHouse initialized');
}
