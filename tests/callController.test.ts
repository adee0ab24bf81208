import assert from 'node:assert/strict';
import { mkdtempSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import type { SignalingEngine } from '../src/engine/types';
import type { MemoryCallHistoryStore as MemoryHistory } from '../src/history/memoryHistoryStore';
import { FakeEngine } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

interface SetupOptions {
  engine?: SignalingEngine;
  history?: MemoryHistory;
  autoAnswer?: boolean;
  autoRecord?: boolean;
}

async function setup(options: SetupOptions = {}) {
  const { CallController } = await import('../src/calls/callController');
  const { SessionRegistry } = await import('../src/calls/sessionRegistry');
  const { MemoryCallHistoryStore } = await import('../src/history/memoryHistoryStore');
  const { RecordingController } = await import('../src/recording/recordingController');

  const engine = options.engine ?? new FakeEngine();
  const history = options.history ?? new MemoryCallHistoryStore();
  const registry = new SessionRegistry();
  const recordingDir = mkdtempSync(path.join(os.tmpdir(), 'softphone-calls-'));
  const submitted: string[] = [];

  const controller = new CallController({
    engine,
    registry,
    history,
    recordings: new RecordingController(engine, { baseDir: recordingDir, format: 'wav' }),
    enrichment: {
      submit: (recordId: string) => {
        submitted.push(recordId);
        return true;
      },
    },
    sipDomain: 'pbx.test',
    autoRecord: options.autoRecord ?? true,
    autoAnswer: options.autoAnswer ?? false,
  });

  return { controller, history, registry, submitted, recordingDir };
}

test('demo dial then hangup leaves one ended record without a recording', async () => {
  const { DemoEngine } = await import('../src/engine/demoEngine');
  const { controller, history, submitted } = await setup({ engine: new DemoEngine() });

  const dialed = await controller.dial('1001');
  assert.equal(dialed.state, 'connected');
  assert.equal(dialed.remoteUri, 'sip:1001@pbx.test');
  assert.equal(dialed.direction, 'outbound');

  const ended = await controller.hangup();
  assert.equal(ended.state, 'ended');
  assert.equal(ended.endReason, 'local_hangup');

  const records = await history.list({ limit: 10, offset: 0 });
  assert.equal(records.length, 1);
  assert.equal(records[0].status, 'ended');
  assert.equal(records[0].recordingPath, null);
  assert.equal(records[0].endReason, 'local_hangup');
  assert.ok(records[0].duration >= 0);
  assert.ok(records[0].connectTime instanceof Date);
  assert.deepEqual(submitted, []);
  assert.deepEqual(controller.getStatus(), { active: false, engine: 'demo' });
});

test('inbound call is recorded once and handed to enrichment after remote hangup', async () => {
  const engine = new FakeEngine();
  const { controller, history, submitted } = await setup({ engine });

  engine.emit({ type: 'incoming', handle: 'in-1', remoteUri: 'sip:2002@pbx.test' });
  await controller.idle();

  const ringing = controller.getStatus();
  assert.equal(ringing.active, true);
  if (ringing.active) {
    assert.equal(ringing.state, 'ringing');
    assert.equal(ringing.direction, 'inbound');
    assert.equal(ringing.recording, false);
  }
  const [created] = await history.list({ limit: 1, offset: 0 });
  assert.equal(created.status, 'ringing');
  assert.equal(created.direction, 'inbound');

  const answered = await controller.answer();
  assert.equal(answered.state, 'connected');
  assert.equal(engine.count('answer'), 1);
  assert.equal(engine.count('startRecording'), 1);
  assert.match(answered.recordingPath ?? '', /call_2002_\d{8}_\d{6}\.wav$/);

  // duplicate connect notification from the engine
  engine.emit({ type: 'state', handle: 'in-1', state: 'connected', stateText: 'Up' });
  await controller.idle();
  assert.equal(engine.count('startRecording'), 1);

  engine.emit({ type: 'state', handle: 'in-1', state: 'disconnected', stateText: 'Destroyed' });
  await controller.idle();

  assert.equal(engine.count('stopRecording'), 1);
  const record = await history.get(created.id);
  assert.ok(record);
  assert.equal(record.status, 'ended');
  assert.equal(record.endReason, 'remote_hangup');
  assert.equal(record.recordingPath, answered.recordingPath);
  assert.deepEqual(submitted, [created.id]);
  assert.equal(controller.getStatus().active, false);
});

test('concurrent dials admit exactly one session', async () => {
  const engine = new FakeEngine();
  engine.dialDelayMs = 10;
  const { controller, history } = await setup({ engine });
  const { hasErrorCode } = await import('../src/errors');

  const results = await Promise.allSettled([controller.dial('1001'), controller.dial('1002')]);
  const fulfilled = results.filter((result) => result.status === 'fulfilled');
  const busy = results.filter(
    (result) => result.status === 'rejected' && hasErrorCode(result.reason, 'SessionBusy'),
  );

  assert.equal(fulfilled.length, 1);
  assert.equal(busy.length, 1);
  assert.equal(engine.count('dial'), 1);
  assert.equal(history.size(), 1);
});

test('dial failure records a failed call and frees the slot', async () => {
  const engine = new FakeEngine();
  engine.failDial = true;
  const { controller, history } = await setup({ engine });
  const { hasErrorCode } = await import('../src/errors');

  await assert.rejects(controller.dial('1001'), (error: unknown) => hasErrorCode(error, 'ResourceUnavailable'));

  const [record] = await history.list({ limit: 1, offset: 0 });
  assert.equal(record.status, 'failed');
  assert.equal(record.endReason, 'failure');
  assert.equal(record.duration, 0);
  assert.ok(record.endTime instanceof Date);
  assert.equal(controller.getStatus().active, false);
});

test('invalid destination is refused before any record exists', async () => {
  const { controller, history } = await setup();
  const { hasErrorCode } = await import('../src/errors');

  await assert.rejects(controller.dial('not valid'), (error: unknown) => hasErrorCode(error, 'InvalidDestination'));
  assert.equal(history.size(), 0);
});

test('hangup is idempotent once the call has ended', async () => {
  const engine = new FakeEngine();
  engine.answerOnDial = true;
  const { controller, history } = await setup({ engine });
  const { hasErrorCode } = await import('../src/errors');

  await assert.rejects(controller.hangup(), (error: unknown) => hasErrorCode(error, 'NotFound'));

  await controller.dial('1001');
  const first = await controller.hangup();
  const [afterFirst] = await history.list({ limit: 1, offset: 0 });
  const second = await controller.hangup();
  const [afterSecond] = await history.list({ limit: 1, offset: 0 });

  assert.equal(second.state, 'ended');
  assert.equal(second.id, first.id);
  assert.deepEqual(second.endedAt, first.endedAt);
  assert.equal(engine.count('hangup'), 1);
  assert.deepEqual(afterSecond, afterFirst);
});

test('engine hangup failure still ends the call locally', async () => {
  const engine = new FakeEngine();
  engine.answerOnDial = true;
  engine.failHangup = true;
  const { controller } = await setup({ engine });

  await controller.dial('1001');
  const ended = await controller.hangup();
  assert.equal(ended.state, 'ended');
  assert.equal(controller.getStatus().active, false);
});

test('hold and resume toggle the hold flag and guard their states', async () => {
  const engine = new FakeEngine();
  engine.answerOnDial = true;
  const { controller, history } = await setup({ engine, autoRecord: false });
  const { hasErrorCode } = await import('../src/errors');

  const dialed = await controller.dial('sip:carol@example.org');
  assert.equal(dialed.state, 'connected');
  await assert.rejects(controller.resume(), (error: unknown) => hasErrorCode(error, 'InvalidState'));

  const held = await controller.hold();
  assert.equal(held.state, 'held');
  assert.equal(held.onHold, true);
  await assert.rejects(controller.hold(), (error: unknown) => hasErrorCode(error, 'InvalidState'));
  await assert.rejects(controller.sendDtmf('1'), (error: unknown) => hasErrorCode(error, 'InvalidState'));

  // a stale connected event while held does not resume the call
  engine.emit({ type: 'state', handle: 'fake-1', state: 'connected', stateText: 'Up' });
  await controller.idle();
  const status = controller.getStatus();
  assert.equal(status.active && status.state, 'held');

  const resumed = await controller.resume();
  assert.equal(resumed.state, 'connected');
  assert.equal(resumed.onHold, false);

  const record = await history.get(dialed.historyId);
  assert.equal(record?.status, 'answered');
  assert.equal(engine.count('startRecording'), 0);
});

test('mute, unmute and dtmf reach the engine', async () => {
  const engine = new FakeEngine();
  engine.answerOnDial = true;
  const { controller } = await setup({ engine });
  const { hasErrorCode } = await import('../src/errors');

  await assert.rejects(controller.mute(), (error: unknown) => hasErrorCode(error, 'NotFound'));

  await controller.dial('1001');
  assert.equal((await controller.mute()).muted, true);
  assert.equal((await controller.unmute()).muted, false);
  await controller.sendDtmf('12#');
  await assert.rejects(controller.sendDtmf('12X'), (error: unknown) => hasErrorCode(error, 'InvalidDigits'));

  assert.deepEqual(
    engine.calls.filter((call) => ['mute', 'unmute', 'dtmf'].includes(call.op)),
    [
      { op: 'mute', handle: 'fake-1' },
      { op: 'unmute', handle: 'fake-1' },
      { op: 'dtmf', handle: 'fake-1', arg: '12#' },
    ],
  );
});

test('answer requires a ringing inbound call', async () => {
  const engine = new FakeEngine();
  const { controller } = await setup({ engine });
  const { hasErrorCode } = await import('../src/errors');

  await assert.rejects(controller.answer(), (error: unknown) => hasErrorCode(error, 'NoIncomingCall'));

  await controller.dial('1001');
  await assert.rejects(controller.answer(), (error: unknown) => hasErrorCode(error, 'NoIncomingCall'));
});

test('incoming call while busy is rejected without a record', async () => {
  const engine = new FakeEngine();
  engine.answerOnDial = true;
  const { controller, history } = await setup({ engine });

  await controller.dial('1001');
  engine.emit({ type: 'incoming', handle: 'in-2', remoteUri: 'sip:3003@pbx.test' });
  await controller.idle();

  assert.deepEqual(engine.calls.filter((call) => call.op === 'reject'), [{ op: 'reject', handle: 'in-2' }]);
  assert.equal(history.size(), 1);
});

test('auto-answer connects incoming calls immediately', async () => {
  const engine = new FakeEngine();
  const { controller } = await setup({ engine, autoAnswer: true });

  engine.emit({ type: 'incoming', handle: 'in-3', remoteUri: 'sip:4004@pbx.test' });
  await controller.idle();

  const status = controller.getStatus();
  assert.equal(status.active && status.state, 'connected');
  assert.equal(status.active && status.recording, true);
  assert.equal(engine.count('answer'), 1);
});

test('recording failure leaves the call connected and unrecorded', async () => {
  const engine = new FakeEngine();
  engine.answerOnDial = true;
  engine.failRecording = true;
  const { controller, history } = await setup({ engine });

  const dialed = await controller.dial('1001');
  assert.equal(dialed.state, 'connected');
  assert.equal(dialed.recordingPath, undefined);

  await controller.hangup();
  const record = await history.get(dialed.historyId);
  assert.equal(record?.recordingPath, null);
  assert.equal(engine.count('stopRecording'), 0);
});

test('engine failure before connect marks the call failed', async () => {
  const engine = new FakeEngine();
  const { controller, history, submitted } = await setup({ engine });

  const dialed = await controller.dial('1001');
  assert.equal(dialed.state, 'ringing');

  engine.emit({ type: 'state', handle: 'fake-1', state: 'disconnected', stateText: 'Congestion', failed: true });
  engine.emit({ type: 'state', handle: 'other', state: 'connected', stateText: 'Up' });
  await controller.idle();

  const record = await history.get(dialed.historyId);
  assert.equal(record?.status, 'failed');
  assert.equal(record?.endReason, 'failure');
  assert.deepEqual(submitted, []);
});

async function unavailableHistory(): Promise<MemoryHistory> {
  const { MemoryCallHistoryStore } = await import('../src/history/memoryHistoryStore');
  class UnavailableHistory extends MemoryCallHistoryStore {
    public async create(): Promise<never> {
      throw new Error('redis down');
    }
  }
  return new UnavailableHistory();
}

test('incoming call is rejected when its history record cannot be created', async () => {
  const engine = new FakeEngine();
  const { controller } = await setup({ engine, history: await unavailableHistory() });

  engine.emit({ type: 'incoming', handle: 'in-9', remoteUri: 'sip:9009@pbx.test' });
  await controller.idle();

  assert.deepEqual(engine.calls, [{ op: 'reject', handle: 'in-9' }]);
  assert.deepEqual(controller.getStatus(), { active: false, engine: 'ari' });
});

test('dial fails ResourceUnavailable when its history record cannot be created', async () => {
  const engine = new FakeEngine();
  const { controller } = await setup({ engine, history: await unavailableHistory() });
  const { hasErrorCode } = await import('../src/errors');

  await assert.rejects(controller.dial('1001'), (error: unknown) => hasErrorCode(error, 'ResourceUnavailable'));
  assert.equal(engine.count('dial'), 0);
  assert.equal(controller.getStatus().active, false);
});

test('mixed operations and engine events never leave more than one live call', async () => {
  const engine = new FakeEngine();
  const { controller, history } = await setup({ engine, autoRecord: false });
  const live = new Set(['calling', 'ringing', 'answered']);

  const steps: Array<[string, () => Promise<unknown> | void, string | null]> = [
    ['dial 1001', () => controller.dial('1001'), 'ringing'],
    ['incoming while ringing', () => engine.emit({ type: 'incoming', handle: 'in-1', remoteUri: 'sip:2002@pbx.test' }), 'ringing'],
    ['second dial', () => controller.dial('1002'), 'ringing'],
    ['remote answers', () => engine.emit({ type: 'state', handle: 'fake-1', state: 'connected', stateText: 'Up' }), 'connected'],
    ['hold', () => controller.hold(), 'held'],
    ['incoming while held', () => engine.emit({ type: 'incoming', handle: 'in-2', remoteUri: 'sip:2002@pbx.test' }), 'held'],
    ['resume', () => controller.resume(), 'connected'],
    ['remote hangup', () => engine.emit({ type: 'state', handle: 'fake-1', state: 'disconnected', stateText: 'Destroyed' }), null],
    ['incoming while idle', () => engine.emit({ type: 'incoming', handle: 'in-3', remoteUri: 'sip:3003@pbx.test' }), 'ringing'],
    ['dial while an incoming call rings', () => controller.dial('1003'), 'ringing'],
    ['answer', () => controller.answer(), 'connected'],
    ['hangup', () => controller.hangup(), null],
    ['dial 1004', () => controller.dial('1004'), 'ringing'],
    ['failure before connect', () => engine.emit({ type: 'state', handle: 'fake-2', state: 'disconnected', stateText: 'Congestion', failed: true }), null],
  ];

  for (const [label, run, expected] of steps) {
    await Promise.allSettled([run()]);
    await controller.idle();

    const status = controller.getStatus();
    assert.equal(status.active ? status.state : null, expected, label);

    const records = await history.list({ limit: 50, offset: 0 });
    const liveRecords = records.filter((record) => live.has(record.status));
    assert.equal(liveRecords.length, expected === null ? 0 : 1, label);
  }

  assert.deepEqual(
    engine.calls.filter((call) => call.op === 'reject').map((call) => call.handle),
    ['in-1', 'in-2'],
  );
  assert.equal(engine.count('dial'), 2);
  assert.equal(history.size(), 3);
});
