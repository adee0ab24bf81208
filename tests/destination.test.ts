import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('bare destinations are qualified with the sip domain', async () => {
  const { normalizeDestination } = await import('../src/calls/destination');

  assert.equal(normalizeDestination('1001', 'pbx.test'), 'sip:1001@pbx.test');
  assert.equal(normalizeDestination('  +15551234567 ', 'pbx.test'), 'sip:+15551234567@pbx.test');
  assert.equal(normalizeDestination('sip:alice@example.org', 'pbx.test'), 'sip:alice@example.org');
});

test('malformed destinations fail InvalidDestination', async () => {
  const { normalizeDestination } = await import('../src/calls/destination');
  const { hasErrorCode } = await import('../src/errors');

  for (const bad of ['', '   ', 'sip:missing-host', 'sip:@host', 'two words', 'bob@host']) {
    assert.throws(
      () => normalizeDestination(bad, 'pbx.test'),
      (error: unknown) => hasErrorCode(error, 'InvalidDestination'),
      bad,
    );
  }
});

test('dtmf digits must match the keypad alphabet', async () => {
  const { assertDtmfDigits } = await import('../src/calls/destination');
  const { hasErrorCode } = await import('../src/errors');

  assert.equal(assertDtmfDigits('123*#ABCD'), '123*#ABCD');
  for (const bad of ['', '12E', 'a', '1 2']) {
    assert.throws(
      () => assertDtmfDigits(bad),
      (error: unknown) => hasErrorCode(error, 'InvalidDigits'),
    );
  }
});

test('remoteUserPart extracts the user from uris and display forms', async () => {
  const { remoteUserPart } = await import('../src/calls/destination');

  assert.equal(remoteUserPart('sip:1001@pbx.test'), '1001');
  assert.equal(remoteUserPart('"Alice" <sip:alice@example.org>'), 'alice');
  assert.equal(remoteUserPart('sips:bob;transport=tls@host'), 'bob');
  assert.equal(remoteUserPart('2002'), '2002');
});
