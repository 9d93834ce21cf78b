import { redis } from './redis';
import { clickhouse } from './clickhouse';
import { s3Client, BUCKET_NAME } from './minio';
import { logger } from './logger';
import { DEFAULT_INCOME_ACCOUNT, INCOME_ACCOUNT_CATALOG } from './accounts';
import { RedisIntakeStore, RedisRecordStore } from '../utils/records';
import { RedisLockManager } from '../utils/lock';
import { RedisSequencer } from '../utils/sequence';
import { RedisStockMover } from '../utils/stock';
import { RedisInvoiceIssuer } from '../utils/issuer';
import { CatalogAccountResolver } from '../utils/accounts';
import { ClickHouseTemperatureStore } from '../utils/storage';
import { S3RunArchive } from '../utils/backup';
import type { Release } from '../types/release';
import type { TariffRule } from '../types/tariff';
import type { StorageContract } from '../types/contract';
import type { GateEntry } from '../types/gate';
import type { StorageLocation, StorageSpace } from '../types/location';
import type { WarehouseServices } from '../types/services';

/**
 * Production collaborators backed by Redis, ClickHouse and MinIO
 */
export function createServices(): WarehouseServices {
  const now = Date.now;
  const sequencer = new RedisSequencer(redis, now);

  return {
    intakes: new RedisIntakeStore(redis),
    releases: new RedisRecordStore<Release>(redis, 'releases'),
    tariffs: new RedisRecordStore<TariffRule>(redis, 'tariffs'),
    contracts: new RedisRecordStore<StorageContract>(redis, 'contracts'),
    gates: new RedisRecordStore<GateEntry>(redis, 'gate_entries'),
    locations: new RedisRecordStore<StorageLocation>(redis, 'locations'),
    spaces: new RedisRecordStore<StorageSpace>(redis, 'storage_spaces'),
    locks: new RedisLockManager(redis),
    sequencer,
    stock: new RedisStockMover(redis),
    invoices: new RedisInvoiceIssuer(redis, sequencer, now),
    accounts: new CatalogAccountResolver(INCOME_ACCOUNT_CATALOG, DEFAULT_INCOME_ACCOUNT),
    temperatures: new ClickHouseTemperatureStore(clickhouse),
    archive: new S3RunArchive(s3Client, BUCKET_NAME, now),
    logger,
    now,
  };
}
