import type Redis from 'ioredis';
import { DOCUMENT_SERIES, SEQUENCE_PREFIX } from '../config/billing';
import type { Sequencer } from '../types/services';

/**
 * Counters pad to five digits. From 100000 on they keep every digit, so
 * numbers still increase within a series but no longer sort as strings
 * against the padded ones.
 */
export function formatDocumentNumber(prefix: string, year: number, counter: number): string {
  return `${prefix}/${year}/${String(counter).padStart(5, '0')}`;
}

export function seriesPrefix(seriesCode: string): string {
  return DOCUMENT_SERIES[seriesCode] ?? seriesCode.toUpperCase();
}

/**
 * Document numbers from a Redis counter per series and year
 *
 * INCR is atomic, so concurrent callers never share a number.
 * Example: IN/2024/00001
 */
export class RedisSequencer implements Sequencer {
  constructor(
    private readonly redis: Redis,
    private readonly now: () => number = Date.now
  ) {}

  async nextDocumentNumber(seriesCode: string): Promise<string> {
    const year = new Date(this.now()).getUTCFullYear();
    const counter = await this.redis.incr(`${SEQUENCE_PREFIX}${seriesCode}:${year}`);
    return formatDocumentNumber(seriesPrefix(seriesCode), year, counter);
  }
}
