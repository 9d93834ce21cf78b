import { describe, it, expect } from 'vitest';
import { formatDocumentNumber, seriesPrefix } from '../../src/utils/sequence';
import { runArchiveKey } from '../../src/utils/backup';
import { validateMove } from '../../src/utils/stock';
import { validateInvoiceRequest } from '../../src/utils/issuer';
import { CatalogAccountResolver, resolveAccountOrThrow } from '../../src/utils/accounts';
import { INCOME_ACCOUNT_CATALOG } from '../../src/config/accounts';
import { ResolutionError, StockError } from '../../src/utils/errors';
import type { InvoiceRequest } from '../../src/types/invoice';
import { createTestServices } from '../helpers/fakes';

describe('document numbers', () => {
  it('pads the counter under the series prefix', () => {
    expect(formatDocumentNumber(seriesPrefix('release'), 2024, 42)).toBe('OUT/2024/00042');
    expect(seriesPrefix('pickup')).toBe('PICKUP');
  });

  it('keeps every digit past the padded width', () => {
    expect(formatDocumentNumber('IN', 2024, 99999)).toBe('IN/2024/99999');
    expect(formatDocumentNumber('IN', 2024, 100000)).toBe('IN/2024/100000');
  });
});

describe('runArchiveKey', () => {
  it('files runs by day', () => {
    expect(runArchiveKey('run_ab12cd34', Date.UTC(2024, 2, 5, 9))).toBe(
      'billing-runs/2024/03/05/run_ab12cd34.json'
    );
    expect(runArchiveKey('ab12cd34', Date.UTC(2024, 2, 5))).toBe(
      'billing-runs/2024/03/05/run_ab12cd34.json'
    );
  });
});

describe('validateMove', () => {
  const move = { product_id: 'prod_peas', qty: 5, from_location: 'a', to_location: 'b' };

  it('accepts a positive move between two locations', () => {
    expect(() => validateMove(move)).not.toThrow();
  });

  it('rejects empty and circular moves', () => {
    expect(() => validateMove({ ...move, qty: 0 })).toThrow(StockError);
    expect(() => validateMove({ ...move, to_location: 'a' })).toThrow(
      'Source and destination locations must differ.'
    );
  });
});

describe('validateInvoiceRequest', () => {
  const request: InvoiceRequest = {
    kind: 'period',
    customer_id: 'cust_1',
    company_id: 'co1',
    currency: 'USD',
    invoice_date: '2024-02-01',
    reference: 'Cold storage charges',
    intake_ids: ['a'],
    lines: [{ description: 'Storage', amount: 10, account_ref: '4100-frozen-storage', product_ref: 'svc' }],
  };

  it('rejects empty invoices and negative lines', () => {
    expect(() => validateInvoiceRequest({ ...request, lines: [] })).toThrow(
      'An invoice needs at least one line.'
    );
    expect(() =>
      validateInvoiceRequest({ ...request, lines: [{ ...request.lines[0], amount: -1 }] })
    ).toThrow('Invoice line "Storage" has a negative amount.');
  });
});

describe('in-memory invoice issuer', () => {
  it('keeps concurrent invoices apart', async () => {
    const { invoices } = createTestServices();
    const request: InvoiceRequest = {
      kind: 'release',
      customer_id: 'cust_1',
      company_id: 'co1',
      currency: 'USD',
      invoice_date: '2024-02-01',
      reference: 'Storage charges',
      intake_ids: ['a'],
      lines: [{ description: 'Storage', amount: 10, account_ref: '4100-frozen-storage' }],
    };

    const [first, second] = await Promise.all([invoices.createInvoice(request), invoices.createInvoice(request)]);

    expect(first.invoice_id).not.toBe(second.invoice_id);
    expect(invoices.records.size).toBe(2);
    expect(await invoices.hasActivePeriodInvoice('a')).toBe(false);
  });
});

describe('CatalogAccountResolver', () => {
  it('prefers the product mapping over the category', async () => {
    const resolver = new CatalogAccountResolver(INCOME_ACCOUNT_CATALOG, '');
    expect(
      await resolver.resolveIncomeAccount({ product_id: 'svc_storage_chilled', product_category: 'frozen' })
    ).toBe('4110-chilled-storage');
    expect(
      await resolver.resolveIncomeAccount({ product_id: 'svc_other', product_category: 'frozen' })
    ).toBe('4100-frozen-storage');
  });

  it('falls back to the default account, then fails', async () => {
    const withDefault = new CatalogAccountResolver(INCOME_ACCOUNT_CATALOG, '4000-sales');
    expect(await withDefault.resolveIncomeAccount({ product_id: 'svc_other' })).toBe('4000-sales');

    const without = new CatalogAccountResolver(INCOME_ACCOUNT_CATALOG, '');
    await expect(resolveAccountOrThrow(without, { product_id: 'svc_other' })).rejects.toBeInstanceOf(
      ResolutionError
    );
  });
});
