/**
 * Invoice issuer
 *
 * Stands in for the accounting system: invoices are stored as Redis records
 * with a set per intake pointing at the period invoices that carry its
 * charges.
 */

import type Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, StateError, ValidationError } from './errors';
import { invoiceTotal } from './invoice';
import type { InvoiceHandle, InvoiceRecord, InvoiceRequest } from '../types/invoice';
import type { InvoiceIssuer, Sequencer } from '../types/services';

const INVOICE_HASH = 'invoices';
const INTAKE_INDEX_PREFIX = 'invoice-index:';

export function validateInvoiceRequest(request: InvoiceRequest): void {
  if (request.lines.length === 0) {
    throw new ValidationError('An invoice needs at least one line.');
  }
  const negative = request.lines.find((line) => line.amount < 0);
  if (negative) {
    throw new ValidationError(`Invoice line "${negative.description}" has a negative amount.`);
  }
  if (request.lines.some((line) => !line.account_ref)) {
    throw new ValidationError('Every invoice line needs an income account.');
  }
}

export class RedisInvoiceIssuer implements InvoiceIssuer {
  constructor(
    private readonly redis: Redis,
    private readonly sequencer: Sequencer,
    private readonly now: () => number = Date.now
  ) {}

  private async load(invoiceId: string): Promise<InvoiceRecord> {
    const raw = await this.redis.hget(INVOICE_HASH, invoiceId);
    if (raw === null) {
      throw new NotFoundError(`Invoice ${invoiceId} not found.`);
    }
    const record: InvoiceRecord = JSON.parse(raw);
    return record;
  }

  async createInvoice(request: InvoiceRequest): Promise<InvoiceHandle> {
    validateInvoiceRequest(request);

    const record: InvoiceRecord = {
      ...request,
      invoice_id: `inv_${uuidv4().slice(0, 8)}`,
      number: await this.sequencer.nextDocumentNumber('invoice'),
      state: 'posted',
      total: invoiceTotal(request.lines),
      created_at: this.now(),
    };

    const pipeline = this.redis.multi().hset(INVOICE_HASH, record.invoice_id, JSON.stringify(record));
    const indexed = request.kind === 'period' ? request.intake_ids : [];
    for (const intakeId of indexed) {
      pipeline.sadd(`${INTAKE_INDEX_PREFIX}${intakeId}`, record.invoice_id);
    }
    await pipeline.exec();

    return { invoice_id: record.invoice_id, number: record.number };
  }

  async cancelInvoice(invoiceId: string): Promise<InvoiceRecord> {
    const record = await this.load(invoiceId);
    if (record.state === 'cancelled') {
      throw new StateError(`Invoice ${record.number} is already cancelled.`);
    }

    const cancelled: InvoiceRecord = { ...record, state: 'cancelled' };
    await this.redis.hset(INVOICE_HASH, invoiceId, JSON.stringify(cancelled));
    return cancelled;
  }

  async hasActivePeriodInvoice(intakeId: string): Promise<boolean> {
    const ids = await this.redis.smembers(`${INTAKE_INDEX_PREFIX}${intakeId}`);
    if (ids.length === 0) {
      return false;
    }

    const raws = await this.redis.hmget(INVOICE_HASH, ...ids);
    return raws.some((raw) => {
      if (raw === null) return false;
      const record: InvoiceRecord = JSON.parse(raw);
      return record.state === 'posted';
    });
  }
}
