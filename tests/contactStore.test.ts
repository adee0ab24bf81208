import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { ContactStore } from '../src/contacts/types';
import { MockRedis } from './mockRedis';
import { setTestEnv } from './testEnv';

setTestEnv();

const NOW = new Date('2026-03-01T10:00:00.000Z');

async function stores(): Promise<Array<{ name: string; store: ContactStore }>> {
  const { MemoryContactStore } = await import('../src/contacts/memoryContactStore');
  const { RedisContactStore } = await import('../src/contacts/redisContactStore');
  return [
    { name: 'memory', store: new MemoryContactStore(() => NOW) },
    { name: 'redis', store: new RedisContactStore(new MockRedis() as never, 'test', () => NOW) },
  ];
}

test('contacts are listed by name and round trip their fields', async () => {
  for (const { name, store } of await stores()) {
    await store.create({ name: 'Zed', sip_uri: 'sip:zed@pbx.test' });
    const alice = await store.create({
      name: 'Alice',
      sip_uri: 'sip:alice@pbx.test',
      phone_number: '+15550100',
      email: 'alice@example.org',
      notes: 'front desk',
    });

    const listed = await store.list();
    assert.deepEqual(
      listed.map((contact) => contact.name),
      ['Alice', 'Zed'],
      name,
    );
    assert.deepEqual(
      await store.get(alice.id),
      {
        id: '2',
        name: 'Alice',
        sipUri: 'sip:alice@pbx.test',
        phoneNumber: '+15550100',
        email: 'alice@example.org',
        notes: 'front desk',
        createdAt: NOW,
        updatedAt: NOW,
      },
      name,
    );
  }
});

test('duplicate sip uris fail Conflict on create and update', async () => {
  const { hasErrorCode } = await import('../src/errors');
  for (const { name, store } of await stores()) {
    await store.create({ name: 'Alice', sip_uri: 'sip:alice@pbx.test' });
    const bob = await store.create({ name: 'Bob', sip_uri: 'sip:bob@pbx.test' });

    await assert.rejects(
      store.create({ name: 'Alias', sip_uri: 'sip:alice@pbx.test' }),
      (error: unknown) => hasErrorCode(error, 'Conflict'),
      name,
    );
    await assert.rejects(
      store.update(bob.id, { sip_uri: 'sip:alice@pbx.test' }),
      (error: unknown) => hasErrorCode(error, 'Conflict'),
      name,
    );
  }
});

test('update patches only the given fields and delete frees the uri', async () => {
  const { hasErrorCode } = await import('../src/errors');
  for (const { name, store } of await stores()) {
    const carol = await store.create({ name: 'Carol', sip_uri: 'sip:carol@pbx.test', notes: 'vip' });

    const updated = await store.update(carol.id, { phone_number: '+15550199', notes: null });
    assert.equal(updated.name, 'Carol', name);
    assert.equal(updated.phoneNumber, '+15550199', name);
    assert.equal(updated.notes, null, name);

    await store.delete(carol.id);
    assert.equal(await store.get(carol.id), null, name);
    await assert.rejects(store.delete(carol.id), (error: unknown) => hasErrorCode(error, 'NotFound'), name);
    await assert.rejects(store.update(carol.id, { name: 'Ghost' }), (error: unknown) => hasErrorCode(error, 'NotFound'), name);

    const again = await store.create({ name: 'Carol', sip_uri: 'sip:carol@pbx.test' });
    assert.equal(again.sipUri, 'sip:carol@pbx.test', name);
  }
});

test('ids that name the store bookkeeping keys are unknown contacts', async () => {
  const { hasErrorCode } = await import('../src/errors');
  for (const { name, store } of await stores()) {
    await store.create({ name: 'Dana', sip_uri: 'sip:dana@pbx.test' });

    for (const id of ['seq', 'by_uri']) {
      assert.equal(await store.get(id), null, `${name} ${id}`);
      await assert.rejects(store.delete(id), (error: unknown) => hasErrorCode(error, 'NotFound'), `${name} ${id}`);
    }
  }
});

test('contact input validation rejects a missing name and a bad email', async () => {
  const { ContactInputSchema } = await import('../src/contacts/types');

  assert.equal(ContactInputSchema.safeParse({ sip_uri: 'sip:x@pbx.test' }).success, false);
  assert.equal(ContactInputSchema.safeParse({ name: 'X', sip_uri: 'sip:x@pbx.test', email: 'nope' }).success, false);
  assert.equal(ContactInputSchema.safeParse({ name: 'X', sip_uri: 'sip:x@pbx.test' }).success, true);
});
