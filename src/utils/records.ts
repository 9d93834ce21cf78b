import type Redis from 'ioredis';
import { WATERMARK_PREFIX } from '../config/billing';
import type { Intake } from '../types/intake';
import type { IntakeStore, RecordStore } from '../types/services';

/**
 * Documents kept as JSON in one Redis hash per type, keyed by id
 */
export class RedisRecordStore<T extends { id: string }> implements RecordStore<T> {
  constructor(
    protected readonly redis: Redis,
    protected readonly hashKey: string
  ) {}

  async get(id: string): Promise<T | null> {
    const raw = await this.redis.hget(this.hashKey, id);
    if (raw === null) {
      return null;
    }
    const record: T = JSON.parse(raw);
    return record;
  }

  async save(record: T): Promise<void> {
    await this.redis.hset(this.hashKey, record.id, JSON.stringify(record));
  }

  async list(): Promise<T[]> {
    const values = await this.redis.hvals(this.hashKey);
    return values.map((raw) => {
      const record: T = JSON.parse(raw);
      return record;
    });
  }
}

// KEYS[1] watermark key, KEYS[2] intake hash
// ARGV[1] intake id, ARGV[2] expected, ARGV[3] next ('' means none)
const WATERMARK_CAS_SCRIPT = `
if redis.call('HEXISTS', KEYS[2], ARGV[1]) == 0 then
  return 0
end
local current = redis.call('GET', KEYS[1])
if not current then
  current = ''
end
if current ~= ARGV[2] then
  return 0
end
if ARGV[3] == '' then
  redis.call('DEL', KEYS[1])
else
  redis.call('SET', KEYS[1], ARGV[3])
end
return 1
`;

/**
 * Intakes with the watermark in its own key
 *
 * `save` never writes the watermark, so a document saved from a stale read
 * cannot roll billing back. Only compareAndSetWatermark moves it.
 */
export class RedisIntakeStore extends RedisRecordStore<Intake> implements IntakeStore {
  constructor(redis: Redis, hashKey: string = 'intakes') {
    super(redis, hashKey);
  }

  private watermarkKey(intakeId: string): string {
    return `${WATERMARK_PREFIX}${intakeId}`;
  }

  async get(id: string): Promise<Intake | null> {
    const [intake, watermark] = await Promise.all([
      super.get(id),
      this.redis.get(this.watermarkKey(id)),
    ]);
    return intake ? { ...intake, last_billed_date: watermark || null } : null;
  }

  async save(intake: Intake): Promise<void> {
    const { last_billed_date: _watermark, ...document } = intake;
    await this.redis.hset(this.hashKey, intake.id, JSON.stringify(document));
  }

  async list(): Promise<Intake[]> {
    const intakes = await super.list();
    if (intakes.length === 0) {
      return [];
    }

    const watermarks = await this.redis.mget(intakes.map((intake) => this.watermarkKey(intake.id)));
    return intakes.map((intake, i) => ({ ...intake, last_billed_date: watermarks[i] || null }));
  }

  async compareAndSetWatermark(
    intakeId: string,
    expected: string | null,
    next: string | null
  ): Promise<boolean> {
    const result = await this.redis.eval(
      WATERMARK_CAS_SCRIPT,
      2,
      this.watermarkKey(intakeId),
      this.hashKey,
      intakeId,
      expected ?? '',
      next ?? ''
    );
    return result === 1;
  }
}
