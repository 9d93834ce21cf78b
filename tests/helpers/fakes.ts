import pino from 'pino';
import { CatalogAccountResolver } from '../../src/utils/accounts';
import { validateInvoiceRequest } from '../../src/utils/issuer';
import { invoiceTotal } from '../../src/utils/invoice';
import { formatDocumentNumber, seriesPrefix } from '../../src/utils/sequence';
import { stockField, validateMove } from '../../src/utils/stock';
import { runArchiveKey } from '../../src/utils/backup';
import { NotFoundError, StateError, StockError } from '../../src/utils/errors';
import { INCOME_ACCOUNT_CATALOG } from '../../src/config/accounts';
import { CUSTOMER_LOCATION, SUPPLIER_LOCATION } from '../../src/config/billing';
import type { Intake } from '../../src/types/intake';
import type { Release } from '../../src/types/release';
import type { TariffRule } from '../../src/types/tariff';
import type { StorageContract } from '../../src/types/contract';
import type { GateEntry } from '../../src/types/gate';
import type { StorageLocation, StorageSpace } from '../../src/types/location';
import type { InvoiceHandle, InvoiceRecord, InvoiceRequest } from '../../src/types/invoice';
import type { BillingRunResult } from '../../src/types/billing';
import type {
  TemperatureLog,
  TemperatureLogStore,
  TemperatureQueryParams,
} from '../../src/types/temperature';
import type {
  IntakeStore,
  InvoiceIssuer,
  LockManager,
  RecordStore,
  RunArchive,
  Sequencer,
  StockMoveParams,
  StockMover,
  WarehouseServices,
} from '../../src/types/services';

export class MemoryRecordStore<T extends { id: string }> implements RecordStore<T> {
  protected records = new Map<string, T>();

  async get(id: string): Promise<T | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async save(record: T): Promise<void> {
    this.records.set(record.id, structuredClone(record));
  }

  async list(): Promise<T[]> {
    return [...this.records.values()].map((record) => structuredClone(record));
  }
}

/** Keeps the watermark apart from the document, like the Redis store */
export class MemoryIntakeStore extends MemoryRecordStore<Intake> implements IntakeStore {
  private watermarks = new Map<string, string>();

  async get(id: string): Promise<Intake | null> {
    const intake = await super.get(id);
    return intake ? { ...intake, last_billed_date: this.watermarks.get(id) ?? null } : null;
  }

  async save(intake: Intake): Promise<void> {
    await super.save({ ...intake, last_billed_date: null });
  }

  async list(): Promise<Intake[]> {
    const intakes = await super.list();
    return intakes.map((intake) => ({
      ...intake,
      last_billed_date: this.watermarks.get(intake.id) ?? null,
    }));
  }

  async compareAndSetWatermark(
    intakeId: string,
    expected: string | null,
    next: string | null
  ): Promise<boolean> {
    if (!this.records.has(intakeId)) return false;
    if ((this.watermarks.get(intakeId) ?? null) !== expected) return false;

    if (next === null) {
      this.watermarks.delete(intakeId);
    } else {
      this.watermarks.set(intakeId, next);
    }
    return true;
  }

  /** Seed a document together with its watermark */
  async seed(intake: Intake): Promise<void> {
    await this.save(intake);
    if (intake.last_billed_date !== null) {
      this.watermarks.set(intake.id, intake.last_billed_date);
    }
  }
}

export class MemoryLockManager implements LockManager {
  readonly held = new Map<string, string>();
  private counter = 0;

  async acquire(key: string): Promise<string | null> {
    if (this.held.has(key)) return null;
    const token = `token_${++this.counter}`;
    this.held.set(key, token);
    return token;
  }

  async release(key: string, token: string): Promise<void> {
    if (this.held.get(key) === token) {
      this.held.delete(key);
    }
  }
}

export class MemorySequencer implements Sequencer {
  private counters = new Map<string, number>();

  constructor(private readonly now: () => number) {}

  async nextDocumentNumber(seriesCode: string): Promise<string> {
    const year = new Date(this.now()).getUTCFullYear();
    const key = `${seriesCode}:${year}`;
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next);
    return formatDocumentNumber(seriesPrefix(seriesCode), year, next);
  }
}

export class MemoryStockMover implements StockMover {
  readonly moves: StockMoveParams[] = [];
  private onHand = new Map<string, number>();

  private key(location: string, params: StockMoveParams): string {
    return `${location}#${stockField(params.product_id, params.lot_id)}`;
  }

  quantity(location: string, productId: string, lotId?: string): number {
    return this.onHand.get(`${location}#${stockField(productId, lotId)}`) ?? 0;
  }

  async moveGoods(params: StockMoveParams): Promise<string> {
    validateMove(params);
    const bounded = (location: string) =>
      location !== SUPPLIER_LOCATION && location !== CUSTOMER_LOCATION;

    if (bounded(params.from_location)) {
      const from = this.key(params.from_location, params);
      const have = this.onHand.get(from) ?? 0;
      if (have < params.qty) {
        throw new StockError(`Insufficient quantity of ${params.product_id} at ${params.from_location}.`);
      }
      this.onHand.set(from, have - params.qty);
    }
    if (bounded(params.to_location)) {
      const to = this.key(params.to_location, params);
      this.onHand.set(to, (this.onHand.get(to) ?? 0) + params.qty);
    }

    this.moves.push(params);
    return `move_${this.moves.length}`;
  }
}

export class MemoryInvoiceIssuer implements InvoiceIssuer {
  readonly records = new Map<string, InvoiceRecord>();
  /** Customers whose invoices the accounting system rejects */
  readonly failingCustomers = new Set<string>();
  private counter = 0;

  constructor(
    private readonly sequencer: Sequencer,
    private readonly now: () => number
  ) {}

  async createInvoice(request: InvoiceRequest): Promise<InvoiceHandle> {
    if (this.failingCustomers.has(request.customer_id)) {
      throw new Error('accounting system unavailable');
    }
    validateInvoiceRequest(request);

    const record: InvoiceRecord = {
      ...structuredClone(request),
      invoice_id: `inv_${++this.counter}`,
      number: await this.sequencer.nextDocumentNumber('invoice'),
      state: 'posted',
      total: invoiceTotal(request.lines),
      created_at: this.now(),
    };
    this.records.set(record.invoice_id, record);
    return { invoice_id: record.invoice_id, number: record.number };
  }

  async cancelInvoice(invoiceId: string): Promise<InvoiceRecord> {
    const record = this.records.get(invoiceId);
    if (!record) {
      throw new NotFoundError(`Invoice ${invoiceId} not found.`);
    }
    if (record.state === 'cancelled') {
      throw new StateError(`Invoice ${record.number} is already cancelled.`);
    }
    const cancelled: InvoiceRecord = { ...record, state: 'cancelled' };
    this.records.set(invoiceId, cancelled);
    return cancelled;
  }

  async hasActivePeriodInvoice(intakeId: string): Promise<boolean> {
    return [...this.records.values()].some(
      (record) =>
        record.kind === 'period' && record.state === 'posted' && record.intake_ids.includes(intakeId)
    );
  }
}

export class MemoryTemperatureStore implements TemperatureLogStore {
  readonly logs: TemperatureLog[] = [];

  async insert(logs: TemperatureLog[]): Promise<void> {
    this.logs.push(...logs);
  }

  async query(params: TemperatureQueryParams): Promise<TemperatureLog[]> {
    return this.logs
      .filter(
        (log) =>
          log.location_id === params.location_id &&
          log.timestamp >= params.start &&
          log.timestamp <= params.end
      )
      .sort((a, b) => a.timestamp - b.timestamp);
  }
}

export class MemoryRunArchive implements RunArchive {
  readonly runs = new Map<string, BillingRunResult>();

  constructor(private readonly now: () => number) {}

  async archiveRun(result: BillingRunResult): Promise<string> {
    const key = runArchiveKey(result.run_id, this.now());
    this.runs.set(key, result);
    return key;
  }
}

export interface TestClock {
  now: number;
}

export interface TestServices extends WarehouseServices {
  intakes: MemoryIntakeStore;
  releases: MemoryRecordStore<Release>;
  tariffs: MemoryRecordStore<TariffRule>;
  contracts: MemoryRecordStore<StorageContract>;
  gates: MemoryRecordStore<GateEntry>;
  locations: MemoryRecordStore<StorageLocation>;
  spaces: MemoryRecordStore<StorageSpace>;
  locks: MemoryLockManager;
  stock: MemoryStockMover;
  invoices: MemoryInvoiceIssuer;
  temperatures: MemoryTemperatureStore;
  archive: MemoryRunArchive;
  clock: TestClock;
}

export function createTestServices(startAt: number = Date.UTC(2024, 1, 1, 12)): TestServices {
  const clock: TestClock = { now: startAt };
  const now = () => clock.now;
  const sequencer = new MemorySequencer(now);

  return {
    intakes: new MemoryIntakeStore(),
    releases: new MemoryRecordStore<Release>(),
    tariffs: new MemoryRecordStore<TariffRule>(),
    contracts: new MemoryRecordStore<StorageContract>(),
    gates: new MemoryRecordStore<GateEntry>(),
    locations: new MemoryRecordStore<StorageLocation>(),
    spaces: new MemoryRecordStore<StorageSpace>(),
    locks: new MemoryLockManager(),
    sequencer,
    stock: new MemoryStockMover(),
    invoices: new MemoryInvoiceIssuer(sequencer, now),
    accounts: new CatalogAccountResolver(INCOME_ACCOUNT_CATALOG, ''),
    temperatures: new MemoryTemperatureStore(),
    archive: new MemoryRunArchive(now),
    logger: pino({ enabled: false }),
    now,
    clock,
  };
}
