/**
 * Income account resolution
 *
 * Product mapping first, then category, then the default income account.
 */

import { ResolutionError } from './errors';
import type { AccountLookup, AccountResolver } from '../types/services';
import type { IncomeAccountMapping } from '../config/accounts';

export class CatalogAccountResolver implements AccountResolver {
  constructor(
    private readonly catalog: IncomeAccountMapping[],
    private readonly defaultAccount: string
  ) {}

  async resolveIncomeAccount(lookup: AccountLookup): Promise<string | null> {
    const byProduct = this.catalog.find((m) => m.product_id === lookup.product_id);
    if (byProduct) return byProduct.account_ref;

    if (lookup.product_category) {
      const byCategory = this.catalog.find(
        (m) => m.product_id === undefined && m.product_category === lookup.product_category
      );
      if (byCategory) return byCategory.account_ref;
    }

    return this.defaultAccount || null;
  }
}

/** Resolve or fail before anything is sent to the accounting system */
export async function resolveAccountOrThrow(
  resolver: AccountResolver,
  lookup: AccountLookup
): Promise<string> {
  const account = await resolver.resolveIncomeAccount(lookup);
  if (!account) {
    const category = lookup.product_category ? ` or category "${lookup.product_category}"` : '';
    throw new ResolutionError(
      `No income account found for product "${lookup.product_id}"${category}. ` +
        'Map the service product or its category to an income account, ' +
        'or set DEFAULT_INCOME_ACCOUNT.'
    );
  }
  return account;
}
