/**
 * Collaborator Contracts
 *
 * Everything the core calls but does not own: persistence, locks, document
 * numbering, stock movement, invoicing and account resolution.
 */

import type { Logger } from 'pino';
import type { Intake } from './intake';
import type { Release } from './release';
import type { TariffRule } from './tariff';
import type { StorageContract } from './contract';
import type { GateEntry } from './gate';
import type { StorageLocation, StorageSpace } from './location';
import type { InvoiceHandle, InvoiceRecord, InvoiceRequest } from './invoice';
import type { TemperatureLogStore } from './temperature';
import type { BillingRunResult } from './billing';

export interface RecordStore<T extends { id: string }> {
  get(id: string): Promise<T | null>;
  save(record: T): Promise<void>;
  list(): Promise<T[]>;
}

export interface IntakeStore extends RecordStore<Intake> {
  /**
   * Set the watermark only if it still equals `expected`.
   * Returns false when another writer moved it first.
   */
  compareAndSetWatermark(
    intakeId: string,
    expected: string | null,
    next: string | null
  ): Promise<boolean>;
}

export interface LockManager {
  /** Returns a release token, or null when the lock is held elsewhere */
  acquire(key: string, ttlMs: number): Promise<string | null>;
  release(key: string, token: string): Promise<void>;
}

export interface Sequencer {
  /** Unique and monotonically increasing per series */
  nextDocumentNumber(seriesCode: string): Promise<string>;
}

export interface StockMoveParams {
  product_id: string;
  qty: number;
  from_location: string;
  to_location: string;
  lot_id?: string;
}

export interface StockMover {
  /** Throws StockError on insufficient quantity or unknown locations */
  moveGoods(params: StockMoveParams): Promise<string>;
}

export interface InvoiceIssuer {
  createInvoice(request: InvoiceRequest): Promise<InvoiceHandle>;
  cancelInvoice(invoiceId: string): Promise<InvoiceRecord>;
  /** True when a non-cancelled period invoice carries charges of the intake */
  hasActivePeriodInvoice(intakeId: string): Promise<boolean>;
}

export interface AccountLookup {
  product_id: string;
  product_category?: string;
}

export interface AccountResolver {
  resolveIncomeAccount(lookup: AccountLookup): Promise<string | null>;
}

export interface RunArchive {
  /** Store a finished billing run; returns the object key */
  archiveRun(result: BillingRunResult): Promise<string>;
}

/** The full set of collaborators passed to every core operation */
export interface WarehouseServices {
  intakes: IntakeStore;
  releases: RecordStore<Release>;
  tariffs: RecordStore<TariffRule>;
  contracts: RecordStore<StorageContract>;
  gates: RecordStore<GateEntry>;
  locations: RecordStore<StorageLocation>;
  spaces: RecordStore<StorageSpace>;
  locks: LockManager;
  sequencer: Sequencer;
  stock: StockMover;
  invoices: InvoiceIssuer;
  accounts: AccountResolver;
  temperatures: TemperatureLogStore;
  archive: RunArchive;
  logger: Logger;
  /** Current time (Unix ms) */
  now: () => number;
}
