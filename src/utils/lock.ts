/**
 * Exclusive locks
 *
 * Redis SET NX PX with a random token; release deletes the key only if the
 * token still matches, so an expired holder cannot free someone else's lock.
 */

import type Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { ConflictError } from './errors';
import { LOCK_PREFIX } from '../config/billing';
import type { LockManager } from '../types/services';

const RELEASE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

export class RedisLockManager implements LockManager {
  constructor(private readonly redis: Redis) {}

  async acquire(key: string, ttlMs: number): Promise<string | null> {
    const token = uuidv4();
    const result = await this.redis.set(`${LOCK_PREFIX}${key}`, token, 'PX', ttlMs, 'NX');
    return result === 'OK' ? token : null;
  }

  async release(key: string, token: string): Promise<void> {
    await this.redis.eval(RELEASE_SCRIPT, 1, `${LOCK_PREFIX}${key}`, token);
  }
}

/**
 * Lock guarding every read-modify-save of an intake and of the releases
 * drawn from it
 */
export function intakeLockKey(intakeId: string): string {
  return `intake:${intakeId}`;
}

/**
 * Run `fn` holding every lock in `keys`
 *
 * Keys are taken in sorted order so two callers never wait on each other
 * crosswise. Throws ConflictError if any key is held elsewhere.
 */
export async function withLocks<T>(
  locks: LockManager,
  keys: string[],
  ttlMs: number,
  fn: () => Promise<T>
): Promise<T> {
  const held: Array<{ key: string; token: string }> = [];
  const ordered = [...new Set(keys)].sort();

  try {
    for (const key of ordered) {
      const token = await locks.acquire(key, ttlMs);
      if (!token) {
        throw new ConflictError(`Resource "${key}" is locked by another operation.`);
      }
      held.push({ key, token });
    }
    return await fn();
  } finally {
    for (const { key, token } of held.reverse()) {
      await locks.release(key, token);
    }
  }
}
