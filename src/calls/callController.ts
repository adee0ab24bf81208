import { randomUUID } from 'crypto';
import { CallControlError } from '../errors';
import type { EnrichmentSink } from '../enrichment/types';
import type { DialResult, EngineEvent, EngineKind, SignalingEngine } from '../engine/types';
import type { CallHistoryControlUpdate, CallHistoryRecord, CallHistoryStore } from '../history/types';
import { log } from '../log';
import { recordCallCompleted } from '../metrics';
import type { RecordingController } from '../recording/recordingController';
import { CallSession } from './callSession';
import { assertDtmfDigits, normalizeDestination } from './destination';
import type { SessionRegistry } from './sessionRegistry';
import { historyStatusFor } from './stateMachine';
import type { CallEvent, CallSnapshot, CallState, TransitionResult } from './types';

export interface CallControllerOptions {
  engine: SignalingEngine;
  registry: SessionRegistry;
  history: CallHistoryStore;
  recordings: RecordingController;
  enrichment: EnrichmentSink;
  sipDomain: string;
  autoRecord: boolean;
  autoAnswer: boolean;
  clock?: () => Date;
}

export type CallStatus =
  | { active: false; engine: EngineKind }
  | ({ active: true; engine: EngineKind; recording: boolean } & CallSnapshot);

/**
 * Entry point for every call-control operation. Each state change runs under
 * the registry lock, applies the pure transition, then performs its I/O
 * (recording, history writes) before the lock is released.
 */
export class CallController {
  private readonly engine: SignalingEngine;
  private readonly registry: SessionRegistry;
  private readonly history: CallHistoryStore;
  private readonly recordings: RecordingController;
  private readonly enrichment: EnrichmentSink;
  private readonly sipDomain: string;
  private readonly autoRecord: boolean;
  private readonly autoAnswer: boolean;
  private readonly clock: () => Date;

  constructor(options: CallControllerOptions) {
    this.engine = options.engine;
    this.registry = options.registry;
    this.history = options.history;
    this.recordings = options.recordings;
    this.enrichment = options.enrichment;
    this.sipDomain = options.sipDomain;
    this.autoRecord = options.autoRecord;
    this.autoAnswer = options.autoAnswer;
    this.clock = options.clock ?? (() => new Date());

    this.engine.onEvent((event) => {
      void this.handleEngineEvent(event);
    });
  }

  public get engineKind(): EngineKind {
    return this.engine.kind;
  }

  public async dial(destination: string): Promise<CallSnapshot> {
    const remoteUri = normalizeDestination(destination, this.sipDomain);

    return this.registry.runExclusive('dial', async () => {
      const active = this.registry.getCurrent();
      if (active) {
        throw new CallControlError('SessionBusy', 'another call is already active', { active_call_id: active.id });
      }

      const startTime = this.clock();
      let record: CallHistoryRecord;
      try {
        record = await this.history.create({
          remoteUri,
          direction: 'outbound',
          status: 'calling',
          startTime,
        });
      } catch (error) {
        log.error(
          { err: error, event: 'call_history_create_failed', direction: 'outbound', remote_uri: remoteUri },
          'call history create failed',
        );
        throw new CallControlError('ResourceUnavailable', 'call history is unavailable', { remote_uri: remoteUri });
      }

      let dialed: DialResult;
      try {
        dialed = await this.engine.dial(remoteUri);
      } catch (error) {
        log.warn(
          { err: error, event: 'call_dial_failed', remote_uri: remoteUri, record_id: record.id },
          'dial failed',
        );
        await this.writeHistory(record.id, {
          status: 'failed',
          endTime: this.clock(),
          duration: 0,
          endReason: 'failure',
        });
        recordCallCompleted({ direction: 'outbound', status: 'failed', durationSeconds: 0 });
        throw new CallControlError('ResourceUnavailable', 'signaling engine could not place the call', {
          remote_uri: remoteUri,
        });
      }

      const session = new CallSession({
        id: randomUUID(),
        direction: 'outbound',
        remoteUri: dialed.remoteUri,
        handle: dialed.handle,
        historyId: record.id,
        startedAt: startTime,
      });
      this.registry.claim(session);

      log.info(
        {
          event: 'call_dialed',
          call_id: session.id,
          handle: session.handle,
          remote_uri: session.remoteUri,
          record_id: record.id,
          engine: this.engine.kind,
        },
        'call dialed',
      );

      await this.applyEvent(session, { type: 'ringing' });
      if (dialed.answered) {
        await this.applyEvent(session, { type: 'connected' });
      }

      return session.snapshot(this.clock());
    });
  }

  public async answer(): Promise<CallSnapshot> {
    return this.registry.runExclusive('answer', async () => {
      const session = this.registry.getCurrent();
      if (!session || session.direction !== 'inbound' || session.getState() !== 'ringing') {
        throw new CallControlError('NoIncomingCall', 'no incoming call to answer');
      }

      await this.engineCall('answer', session, () => this.engine.answer(session.handle));
      await this.applyEvent(session, { type: 'connected' });
      return session.snapshot(this.clock());
    });
  }

  /**
   * Ends the current call. Once a call has ended, repeating the hangup
   * returns its final snapshot without touching history.
   */
  public async hangup(): Promise<CallSnapshot> {
    return this.registry.runExclusive('hangup', async () => {
      const session = this.registry.getCurrent();
      if (!session) {
        const last = this.registry.getLastEnded();
        if (last) {
          return last.snapshot(this.clock());
        }
        throw new CallControlError('NotFound', 'no active call');
      }

      try {
        await this.engine.hangup(session.handle);
      } catch (error) {
        log.warn(
          { err: error, event: 'call_hangup_engine_failed', call_id: session.id, handle: session.handle },
          'engine hangup failed; ending call locally',
        );
      }

      await this.applyEvent(session, { type: 'ended', reason: 'local_hangup' });
      return session.snapshot(this.clock());
    });
  }

  public async hold(): Promise<CallSnapshot> {
    return this.registry.runExclusive('hold', async () => {
      const session = this.requireSession();
      this.requireState(session, ['connected'], 'hold');

      await this.engineCall('hold', session, () => this.engine.hold(session.handle));
      await this.applyEvent(session, { type: 'held' });
      return session.snapshot(this.clock());
    });
  }

  public async resume(): Promise<CallSnapshot> {
    return this.registry.runExclusive('resume', async () => {
      const session = this.requireSession();
      this.requireState(session, ['held'], 'resume');

      await this.engineCall('resume', session, () => this.engine.resume(session.handle));
      await this.applyEvent(session, { type: 'connected' });
      return session.snapshot(this.clock());
    });
  }

  public async mute(): Promise<CallSnapshot> {
    return this.setMuted(true);
  }

  public async unmute(): Promise<CallSnapshot> {
    return this.setMuted(false);
  }

  public async sendDtmf(digits: string): Promise<CallSnapshot> {
    assertDtmfDigits(digits);

    return this.registry.runExclusive('dtmf', async () => {
      const session = this.requireSession();
      this.requireState(session, ['connected'], 'dtmf');

      await this.engineCall('dtmf', session, () => this.engine.sendDtmf(session.handle, digits));
      log.info({ event: 'call_dtmf_sent', call_id: session.id, digits }, 'dtmf sent');
      return session.snapshot(this.clock());
    });
  }

  /** Lock-free read of the current call. */
  public getStatus(): CallStatus {
    const session = this.registry.getCurrent();
    if (!session) {
      return { active: false, engine: this.engine.kind };
    }
    return {
      active: true,
      engine: this.engine.kind,
      recording: session.isRecording(),
      ...session.snapshot(this.clock()),
    };
  }

  /** Resolves after every state change queued so far has finished. */
  public async idle(): Promise<void> {
    await this.registry.runExclusive('idle', () => undefined);
  }

  public async handleEngineEvent(event: EngineEvent): Promise<void> {
    try {
      await this.registry.runExclusive(`engine_${event.type}`, () => this.applyEngineEvent(event));
    } catch (error) {
      log.error(
        { err: error, event: 'engine_event_failed', engine_event: event.type, handle: event.handle },
        'engine event handling failed',
      );
    }
  }

  public async shutdown(): Promise<void> {
    if (this.registry.getCurrent()) {
      await this.hangup();
    }
  }

  private async applyEngineEvent(event: EngineEvent): Promise<void> {
    if (event.type === 'incoming') {
      await this.acceptIncoming(event.handle, event.remoteUri);
      return;
    }

    const session = this.registry.getCurrent();
    if (!session || session.handle !== event.handle) {
      log.debug(
        { event: 'engine_event_ignored', handle: event.handle, state_text: event.stateText },
        'engine event for unknown call ignored',
      );
      return;
    }

    switch (event.state) {
      case 'ringing':
        await this.applyEvent(session, { type: 'ringing' });
        return;
      case 'connected':
        if (session.getState() === 'held') {
          return;
        }
        if (session.getState() === 'initiated') {
          await this.applyEvent(session, { type: 'ringing' });
        }
        await this.applyEvent(session, { type: 'connected' });
        return;
      case 'disconnected':
        await this.applyEvent(session, { type: 'ended', reason: event.failed ? 'failure' : 'remote_hangup' });
        return;
    }
  }

  private async acceptIncoming(handle: string, remoteUri: string): Promise<void> {
    const active = this.registry.getCurrent();
    if (active) {
      log.warn(
        { event: 'incoming_call_rejected_busy', handle, remote_uri: remoteUri, active_call_id: active.id },
        'incoming call rejected: another call is active',
      );
      await this.rejectIncoming(handle);
      return;
    }

    const startTime = this.clock();
    let record: CallHistoryRecord;
    try {
      record = await this.history.create({
        remoteUri,
        direction: 'inbound',
        status: 'ringing',
        startTime,
      });
    } catch (error) {
      log.error(
        { err: error, event: 'call_history_create_failed', direction: 'inbound', handle, remote_uri: remoteUri },
        'call history create failed; rejecting incoming call',
      );
      await this.rejectIncoming(handle);
      return;
    }

    const session = new CallSession({
      id: randomUUID(),
      direction: 'inbound',
      remoteUri,
      handle,
      historyId: record.id,
      startedAt: startTime,
    });
    this.registry.claim(session);

    log.info(
      { event: 'incoming_call', call_id: session.id, handle, remote_uri: remoteUri, record_id: record.id },
      'incoming call',
    );

    await this.applyEvent(session, { type: 'ringing' });

    if (this.autoAnswer) {
      try {
        await this.engine.answer(handle);
        await this.applyEvent(session, { type: 'connected' });
        log.info({ event: 'incoming_call_auto_answered', call_id: session.id }, 'incoming call auto-answered');
      } catch (error) {
        log.warn({ err: error, event: 'auto_answer_failed', call_id: session.id }, 'auto-answer failed');
      }
    }
  }

  private async rejectIncoming(handle: string): Promise<void> {
    try {
      await this.engine.reject(handle);
    } catch (error) {
      log.warn({ err: error, event: 'incoming_call_reject_failed', handle }, 'incoming call reject failed');
    }
  }

  /**
   * The single transition handler: pure decision on the session, then the
   * history write and recording side effects, all before returning.
   */
  private async applyEvent(session: CallSession, event: CallEvent): Promise<TransitionResult> {
    const now = this.clock();
    const result = session.apply(event, now);
    if (result.kind !== 'applied') {
      if (result.kind === 'rejected') {
        log.debug(
          { event: 'call_transition_rejected', call_id: session.id, state: result.state, call_event: result.event },
          'call transition rejected',
        );
      }
      return result;
    }

    const effects = new Set(result.effects);
    const fields: CallHistoryControlUpdate = {
      status: historyStatusFor(result.to, session.wasConnected(), session.getEndReason()),
    };

    if (effects.has('stamp_connected')) {
      fields.connectTime = now;
    }
    if (effects.has('stop_recording')) {
      await this.recordings.stop(session);
    }
    if (effects.has('stamp_ended')) {
      fields.endTime = now;
      fields.duration = session.durationSeconds(now);
      fields.endReason = session.getEndReason() ?? null;
    }

    await this.writeHistory(session.historyId, fields);

    log.info(
      {
        event: 'call_state_changed',
        call_id: session.id,
        from: result.from,
        to: result.to,
        status: fields.status,
        record_id: session.historyId,
      },
      'call state changed',
    );

    if (effects.has('start_recording') && this.autoRecord) {
      const recordingPath = await this.recordings.start(session);
      if (recordingPath) {
        await this.writeHistory(session.historyId, { recordingPath });
      }
    }

    if (effects.has('release_slot')) {
      this.registry.release(session);
      recordCallCompleted({
        direction: session.direction,
        status: fields.status ?? 'ended',
        durationSeconds: fields.duration ?? 0,
      });

      const recordingPath = session.getRecordingPath();
      if (recordingPath) {
        this.enrichment.submit(session.historyId);
      }
    }

    return result;
  }

  private async writeHistory(recordId: string, fields: CallHistoryControlUpdate): Promise<void> {
    try {
      await this.history.update(recordId, fields);
    } catch (error) {
      log.error(
        { err: error, event: 'call_history_write_failed', record_id: recordId, fields: Object.keys(fields) },
        'call history write failed',
      );
    }
  }

  private async setMuted(muted: boolean): Promise<CallSnapshot> {
    const operation = muted ? 'mute' : 'unmute';
    return this.registry.runExclusive(operation, async () => {
      const session = this.requireSession();
      this.requireState(session, ['connected', 'held'], operation);

      await this.engineCall(operation, session, () =>
        muted ? this.engine.mute(session.handle) : this.engine.unmute(session.handle),
      );
      session.setMuted(muted);
      log.info({ event: muted ? 'call_muted' : 'call_unmuted', call_id: session.id }, `call ${operation}d`);
      return session.snapshot(this.clock());
    });
  }

  private requireSession(): CallSession {
    const session = this.registry.getCurrent();
    if (!session) {
      throw new CallControlError('NotFound', 'no active call');
    }
    return session;
  }

  private requireState(session: CallSession, allowed: CallState[], operation: string): void {
    const state = session.getState();
    if (!allowed.includes(state)) {
      throw new CallControlError('InvalidState', `${operation} is not allowed while ${state}`, {
        state,
        operation,
      });
    }
  }

  private async engineCall(operation: string, session: CallSession, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      log.warn(
        { err: error, event: 'engine_operation_failed', operation, call_id: session.id, handle: session.handle },
        'engine operation failed',
      );
      throw new CallControlError('ResourceUnavailable', `signaling engine failed to ${operation}`);
    }
  }
}
