import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

interface RecordedRequest {
  method: string;
  url: string;
  authorization: string | null;
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

async function withFetch<T>(
  responder: (request: RecordedRequest) => Response,
  run: (requests: RecordedRequest[]) => Promise<T>,
): Promise<T> {
  const originalFetch = globalThis.fetch;
  const requests: RecordedRequest[] = [];
  globalThis.fetch = async (input, init) => {
    const headers = new Headers(init?.headers);
    const request = { method: init?.method ?? 'GET', url: String(input), authorization: headers.get('authorization') };
    requests.push(request);
    return responder(request);
  };
  try {
    return await run(requests);
  } finally {
    globalThis.fetch = originalFetch;
  }
}

async function client(maxRetries = 0) {
  const { AriClient } = await import('../src/ari/ariClient');
  return new AriClient({
    baseUrl: 'http://asterisk.test:8088/',
    username: 'softphone',
    password: 'test-secret',
    app: 'softphone',
    timeoutMs: 1000,
    maxRetries,
  });
}

test('urls carry the ari prefix and the event socket uses ws with api_key', async () => {
  const ari = await client();

  assert.equal(ari.buildUrl('/channels/abc/hold'), 'http://asterisk.test:8088/ari/channels/abc/hold');
  assert.equal(
    ari.eventsUrl(),
    'ws://asterisk.test:8088/ari/events?app=softphone&subscribeAll=false&api_key=softphone%3Atest-secret',
  );
});

test('originate posts to channels with basic auth and parses the channel', async () => {
  const ari = await client();

  await withFetch(
    () => jsonResponse(200, { id: 'chan-1', name: 'PJSIP/softphone-0001', state: 'Down' }),
    async (requests) => {
      const channel = await ari.originate('PJSIP/softphone/sip:1001@pbx.test');

      assert.equal(channel.id, 'chan-1');
      assert.equal(channel.state, 'Down');
      assert.equal(requests.length, 1);
      assert.equal(requests[0].method, 'POST');
      assert.equal(
        requests[0].url,
        'http://asterisk.test:8088/ari/channels?endpoint=PJSIP%2Fsoftphone%2Fsip%3A1001%40pbx.test&app=softphone',
      );
      assert.equal(
        requests[0].authorization,
        `Basic ${Buffer.from('softphone:test-secret').toString('base64')}`,
      );
    },
  );
});

test('channel operations on a vanished channel resolve quietly', async () => {
  const ari = await client();

  await withFetch(
    () => jsonResponse(404, { message: 'Channel not found' }),
    async (requests) => {
      await ari.hangup('gone', 'busy');
      await ari.stopRecording('call_1001_20260301_100000');
      assert.deepEqual(
        requests.map((request) => `${request.method} ${request.url}`),
        [
          'DELETE http://asterisk.test:8088/ari/channels/gone?reason=busy',
          'POST http://asterisk.test:8088/ari/recordings/live/call_1001_20260301_100000/stop',
        ],
      );
    },
  );
});

test('client errors are thrown without retry', async () => {
  const { AriRequestError } = await import('../src/ari/ariClient');
  const ari = await client(2);

  await withFetch(
    () => jsonResponse(400, { message: 'bad dtmf' }),
    async (requests) => {
      await assert.rejects(ari.sendDtmf('chan-1', '1'), (error: unknown) => {
        return error instanceof AriRequestError && error.status === 400;
      });
      assert.equal(requests.length, 1);
    },
  );
});

test('server errors are retried before succeeding', async () => {
  const ari = await client(1);
  let calls = 0;

  await withFetch(
    () => {
      calls += 1;
      return calls === 1 ? jsonResponse(503, { message: 'busy' }) : jsonResponse(200, { id: 'chan-2', state: 'Up' });
    },
    async (requests) => {
      const channel = await ari.originate('PJSIP/softphone/sip:2002@pbx.test');
      assert.equal(channel.state, 'Up');
      assert.equal(requests.length, 2);
    },
  );
});

test('record asks asterisk to refuse an existing file of the same name', async () => {
  const ari = await client();

  await withFetch(
    () => jsonResponse(201, { name: 'call_1001_20260301_100000', state: 'queued' }),
    async (requests) => {
      await ari.record('chan-1', 'call_1001_20260301_100000', 'wav');
      assert.equal(
        requests[0].url,
        'http://asterisk.test:8088/ari/channels/chan-1/record?name=call_1001_20260301_100000&format=wav&ifExists=fail&beep=false',
      );
    },
  );
});
