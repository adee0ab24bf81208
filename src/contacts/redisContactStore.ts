import { z } from 'zod';
import { CallControlError } from '../errors';
import { log } from '../log';
import type { RedisClient } from '../redis/client';
import {
  applyContactPatch,
  compareContactsByName,
  newContact,
  type Contact,
  type ContactInput,
  type ContactPatch,
  type ContactStore,
} from './types';

const StoredContactSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  sipUri: z.string(),
  phoneNumber: z.string().nullable(),
  email: z.string().nullable(),
  notes: z.string().nullable(),
  createdAt: z.string().datetime().transform((value) => new Date(value)),
  updatedAt: z.string().datetime().transform((value) => new Date(value)),
});

export class RedisContactStore implements ContactStore {
  constructor(
    private readonly redis: RedisClient,
    private readonly prefix: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private contactKey(id: string): string {
    return `${this.prefix}:contact:${id}`;
  }

  private indexKey(): string {
    return `${this.prefix}:contacts`;
  }

  private uriIndexKey(): string {
    return `${this.prefix}:contacts:by_uri`;
  }

  private sequenceKey(): string {
    return `${this.prefix}:seq:contact`;
  }

  public async list(): Promise<Contact[]> {
    const ids = await this.redis.smembers(this.indexKey());
    const contacts = await Promise.all(ids.map((id) => this.get(id)));
    return contacts.filter((contact): contact is Contact => contact !== null).sort(compareContactsByName);
  }

  public async get(id: string): Promise<Contact | null> {
    const raw = await this.redis.get(this.contactKey(id));
    if (!raw) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.error({ err: error, event: 'contact_decode_failed', contact_id: id }, 'contact json parse failed');
      return null;
    }

    const result = StoredContactSchema.safeParse(parsed);
    if (!result.success) {
      log.error({ event: 'contact_invalid', contact_id: id, issues: result.error.issues }, 'contact invalid');
      return null;
    }
    return result.data;
  }

  public async create(input: ContactInput): Promise<Contact> {
    const id = String(await this.redis.incr(this.sequenceKey()));
    await this.claimUri(input.sip_uri, id);

    const contact = newContact(id, input, this.clock());
    await this.redis.set(this.contactKey(id), JSON.stringify(contact));
    await this.redis.sadd(this.indexKey(), id);
    return contact;
  }

  public async update(id: string, patch: ContactPatch): Promise<Contact> {
    const existing = await this.get(id);
    if (!existing) {
      throw new CallControlError('NotFound', `contact ${id} not found`);
    }

    if (patch.sip_uri !== undefined && patch.sip_uri !== existing.sipUri) {
      await this.claimUri(patch.sip_uri, id);
      await this.redis.hdel(this.uriIndexKey(), existing.sipUri);
    }

    const updated = applyContactPatch(existing, patch, this.clock());
    await this.redis.set(this.contactKey(id), JSON.stringify(updated));
    return updated;
  }

  public async delete(id: string): Promise<void> {
    const existing = await this.get(id);
    if (!existing) {
      throw new CallControlError('NotFound', `contact ${id} not found`);
    }

    await this.redis.del(this.contactKey(id));
    await this.redis.srem(this.indexKey(), id);
    await this.redis.hdel(this.uriIndexKey(), existing.sipUri);
  }

  private async claimUri(sipUri: string, id: string): Promise<void> {
    const claimed = await this.redis.hsetnx(this.uriIndexKey(), sipUri, id);
    if (claimed === 0) {
      throw new CallControlError('Conflict', 'contact already exists', { sip_uri: sipUri });
    }
  }
}
