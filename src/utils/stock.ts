import type Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { StockError } from './errors';
import { CUSTOMER_LOCATION, STOCK_PREFIX, SUPPLIER_LOCATION } from '../config/billing';
import type { StockMoveParams, StockMover } from '../types/services';

const UNBOUNDED_LOCATIONS = new Set([SUPPLIER_LOCATION, CUSTOMER_LOCATION]);

// KEYS[1] source hash, KEYS[2] destination hash
// ARGV[1] product|lot field, ARGV[2] qty, ARGV[3] source bounded, ARGV[4] destination bounded
const MOVE_SCRIPT = `
local qty = tonumber(ARGV[2])
if ARGV[3] == '1' then
  local have = tonumber(redis.call('HGET', KEYS[1], ARGV[1]) or '0')
  if have < qty then
    return 0
  end
  redis.call('HINCRBYFLOAT', KEYS[1], ARGV[1], -qty)
end
if ARGV[4] == '1' then
  redis.call('HINCRBYFLOAT', KEYS[2], ARGV[1], qty)
end
return 1
`;

export function stockField(productId: string, lotId?: string): string {
  return `${productId}|${lotId ?? ''}`;
}

export function validateMove(params: StockMoveParams): void {
  if (!(params.qty > 0)) {
    throw new StockError('Stock move quantity must be positive.');
  }
  if (!params.from_location || !params.to_location) {
    throw new StockError('Stock moves need a source and a destination location.');
  }
  if (params.from_location === params.to_location) {
    throw new StockError('Source and destination locations must differ.');
  }
}

/**
 * On-hand quantities per location in Redis hashes
 *
 * Supplier and customer locations have no stock count; goods come from and
 * go to them without limit.
 */
export class RedisStockMover implements StockMover {
  constructor(private readonly redis: Redis) {}

  async moveGoods(params: StockMoveParams): Promise<string> {
    validateMove(params);

    const moved = await this.redis.eval(
      MOVE_SCRIPT,
      2,
      `${STOCK_PREFIX}${params.from_location}`,
      `${STOCK_PREFIX}${params.to_location}`,
      stockField(params.product_id, params.lot_id),
      String(params.qty),
      UNBOUNDED_LOCATIONS.has(params.from_location) ? '0' : '1',
      UNBOUNDED_LOCATIONS.has(params.to_location) ? '0' : '1'
    );

    if (moved !== 1) {
      throw new StockError(
        `Insufficient quantity of ${params.product_id} at ${params.from_location} to move ${params.qty}.`
      );
    }
    return `move_${uuidv4().slice(0, 8)}`;
  }
}
