import { randomUUID } from 'crypto';
import { CallControlError } from '../errors';
import { log } from '../log';
import type { DialResult, EngineEvent, EngineEventListener, SignalingEngine } from './types';

/**
 * Simulated engine used when no signaling server is reachable. Calls connect
 * instantly, media operations only log, and nothing is ever recorded.
 */
export class DemoEngine implements SignalingEngine {
  public readonly kind = 'demo' as const;
  public readonly capabilities = { recording: false };

  private readonly listeners: EngineEventListener[] = [];
  private readonly calls = new Map<string, { remoteUri: string }>();

  public async start(): Promise<void> {
    log.info({ event: 'demo_engine_started' }, 'demo signaling engine started');
  }

  public async stop(): Promise<void> {
    this.calls.clear();
  }

  public async dial(remoteUri: string): Promise<DialResult> {
    const handle = `demo-${randomUUID()}`;
    this.calls.set(handle, { remoteUri });
    log.info({ event: 'demo_dial', handle, remote_uri: remoteUri }, 'demo call connected');
    return { handle, remoteUri, answered: true };
  }

  public async answer(handle: string): Promise<void> {
    this.requireCall(handle);
  }

  public async reject(handle: string): Promise<void> {
    this.calls.delete(handle);
  }

  public async hangup(handle: string): Promise<void> {
    this.calls.delete(handle);
  }

  public async hold(handle: string): Promise<void> {
    this.requireCall(handle);
  }

  public async resume(handle: string): Promise<void> {
    this.requireCall(handle);
  }

  public async mute(handle: string): Promise<void> {
    this.requireCall(handle);
  }

  public async unmute(handle: string): Promise<void> {
    this.requireCall(handle);
  }

  public async sendDtmf(handle: string, digits: string): Promise<void> {
    this.requireCall(handle);
    log.info({ event: 'demo_dtmf', handle, digits }, 'demo dtmf sent');
  }

  public async startRecording(_handle: string, _path: string): Promise<void> {
    throw new CallControlError('ResourceUnavailable', 'demo engine cannot record');
  }

  public async stopRecording(_handle: string): Promise<void> {
    return;
  }

  public onEvent(listener: EngineEventListener): void {
    this.listeners.push(listener);
  }

  /** Delivers an inbound call as if the signaling server had offered one. */
  public simulateIncoming(remoteUri: string): string {
    const handle = `demo-${randomUUID()}`;
    this.calls.set(handle, { remoteUri });
    this.emit({ type: 'incoming', handle, remoteUri });
    return handle;
  }

  public simulateRemoteHangup(handle: string): void {
    const call = this.calls.get(handle);
    this.calls.delete(handle);
    this.emit({
      type: 'state',
      handle,
      state: 'disconnected',
      stateText: 'DISCONNECTED',
      remoteUri: call?.remoteUri,
    });
  }

  private requireCall(handle: string): void {
    if (!this.calls.has(handle)) {
      throw new CallControlError('NotFound', `demo call ${handle} not found`);
    }
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
