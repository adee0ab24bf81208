import { z } from 'zod';
import { CallControlError } from '../errors';
import { log } from '../log';
import type { RedisClient } from '../redis/client';
import type {
  CallHistoryRecord,
  CallHistoryStore,
  CallHistoryUpdate,
  ListOptions,
  NewCallHistoryRecord,
} from './types';

const isoDate = z.string().datetime().transform((value) => new Date(value));

const StoredRecordSchema = z.object({
  id: z.string().min(1),
  remoteUri: z.string(),
  direction: z.enum(['inbound', 'outbound']),
  status: z.enum(['calling', 'ringing', 'answered', 'ended', 'failed']),
  startTime: isoDate,
  connectTime: isoDate.nullable().default(null),
  endTime: isoDate.nullable().default(null),
  duration: z.number().nonnegative().default(0),
  endReason: z.enum(['local_hangup', 'remote_hangup', 'rejected', 'failure']).nullable().default(null),
  recordingPath: z.string().nullable().default(null),
  transcript: z.string().nullable().default(null),
  sentiment: z.object({ label: z.string(), confidence: z.number() }).nullable().default(null),
  summary: z.string().nullable().default(null),
});

/**
 * Each record is a Redis hash with one JSON-encoded field per attribute, so a
 * writer touching `status` and a writer touching `transcript` never clobber
 * each other. Null values are removed from the hash.
 */
export class RedisCallHistoryStore implements CallHistoryStore {
  constructor(
    private readonly redis: RedisClient,
    private readonly prefix: string,
  ) {}

  public recordKey(id: string): string {
    return `${this.prefix}:call:${id}`;
  }

  public indexKey(): string {
    return `${this.prefix}:calls`;
  }

  private sequenceKey(): string {
    return `${this.prefix}:seq:call`;
  }

  public async create(input: NewCallHistoryRecord): Promise<CallHistoryRecord> {
    const id = String(await this.redis.incr(this.sequenceKey()));
    const fields = encodeFields({
      id,
      remoteUri: input.remoteUri,
      direction: input.direction,
      status: input.status,
      startTime: input.startTime.toISOString(),
      duration: 0,
    });

    await this.redis.hset(this.recordKey(id), fields);
    await this.redis.zadd(this.indexKey(), input.startTime.getTime(), id);

    return {
      id,
      remoteUri: input.remoteUri,
      direction: input.direction,
      status: input.status,
      startTime: new Date(input.startTime),
      connectTime: null,
      endTime: null,
      duration: 0,
      endReason: null,
      recordingPath: null,
      transcript: null,
      sentiment: null,
      summary: null,
    };
  }

  public async update(id: string, fields: CallHistoryUpdate): Promise<CallHistoryRecord> {
    const key = this.recordKey(id);
    const exists = await this.redis.exists(key);
    if (exists === 0) {
      throw new CallControlError('NotFound', `call history record ${id} not found`);
    }

    const toSet: Record<string, unknown> = {};
    const toDelete: string[] = [];
    for (const [field, value] of Object.entries(fields)) {
      if (value === undefined) {
        continue;
      }
      if (value === null) {
        toDelete.push(field);
      } else {
        toSet[field] = value instanceof Date ? value.toISOString() : value;
      }
    }

    if (Object.keys(toSet).length > 0) {
      await this.redis.hset(key, encodeFields(toSet));
    }
    if (toDelete.length > 0) {
      await this.redis.hdel(key, ...toDelete);
    }

    const updated = await this.get(id);
    if (!updated) {
      throw new CallControlError('NotFound', `call history record ${id} not found`);
    }
    return updated;
  }

  public async get(id: string): Promise<CallHistoryRecord | null> {
    const raw = await this.redis.hgetall(this.recordKey(id));
    if (Object.keys(raw).length === 0) {
      return null;
    }
    return this.decode(id, raw);
  }

  public async list(options: ListOptions): Promise<CallHistoryRecord[]> {
    if (options.limit <= 0) {
      return [];
    }

    const ids = await this.redis.zrevrange(this.indexKey(), options.offset, options.offset + options.limit - 1);
    const records = await Promise.all(ids.map((id) => this.get(id)));
    return records.filter((record): record is CallHistoryRecord => record !== null);
  }

  private decode(id: string, raw: Record<string, string>): CallHistoryRecord | null {
    const decoded: Record<string, unknown> = {};
    try {
      for (const [field, value] of Object.entries(raw)) {
        decoded[field] = JSON.parse(value);
      }
    } catch (error) {
      log.error({ err: error, event: 'history_record_decode_failed', record_id: id }, 'history record decode failed');
      return null;
    }

    const parsed = StoredRecordSchema.safeParse(decoded);
    if (!parsed.success) {
      log.error(
        { event: 'history_record_invalid', record_id: id, issues: parsed.error.issues },
        'history record invalid',
      );
      return null;
    }
    return parsed.data;
  }
}

function encodeFields(fields: Record<string, unknown>): Record<string, string> {
  const encoded: Record<string, string> = {};
  for (const [field, value] of Object.entries(fields)) {
    encoded[field] = JSON.stringify(value);
  }
  return encoded;
}
