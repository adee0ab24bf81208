import type { DialResult, EngineEvent, EngineEventListener, SignalingEngine } from '../src/engine/types';

export interface EngineCall {
  op: string;
  handle?: string;
  arg?: string;
}

/** Scriptable in-process signaling engine with recording support. */
export class FakeEngine implements SignalingEngine {
  public readonly kind = 'ari' as const;
  public readonly capabilities = { recording: true };
  public readonly calls: EngineCall[] = [];
  public answerOnDial = false;
  public failDial = false;
  public failRecording = false;
  public failHangup = false;
  public dialDelayMs = 0;

  private readonly listeners: EngineEventListener[] = [];
  private sequence = 0;

  public async start(): Promise<void> {
    this.calls.push({ op: 'start' });
  }

  public async stop(): Promise<void> {
    this.calls.push({ op: 'stop' });
  }

  public async dial(remoteUri: string): Promise<DialResult> {
    this.calls.push({ op: 'dial', arg: remoteUri });
    if (this.dialDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.dialDelayMs));
    }
    if (this.failDial) {
      throw new Error('dial refused');
    }
    this.sequence += 1;
    return { handle: `fake-${this.sequence}`, remoteUri, answered: this.answerOnDial };
  }

  public async answer(handle: string): Promise<void> {
    this.calls.push({ op: 'answer', handle });
  }

  public async reject(handle: string): Promise<void> {
    this.calls.push({ op: 'reject', handle });
  }

  public async hangup(handle: string): Promise<void> {
    this.calls.push({ op: 'hangup', handle });
    if (this.failHangup) {
      throw new Error('hangup refused');
    }
  }

  public async hold(handle: string): Promise<void> {
    this.calls.push({ op: 'hold', handle });
  }

  public async resume(handle: string): Promise<void> {
    this.calls.push({ op: 'resume', handle });
  }

  public async mute(handle: string): Promise<void> {
    this.calls.push({ op: 'mute', handle });
  }

  public async unmute(handle: string): Promise<void> {
    this.calls.push({ op: 'unmute', handle });
  }

  public async sendDtmf(handle: string, digits: string): Promise<void> {
    this.calls.push({ op: 'dtmf', handle, arg: digits });
  }

  public async startRecording(handle: string, path: string): Promise<void> {
    this.calls.push({ op: 'startRecording', handle, arg: path });
    if (this.failRecording) {
      throw new Error('recorder unavailable');
    }
  }

  public async stopRecording(handle: string): Promise<void> {
    this.calls.push({ op: 'stopRecording', handle });
  }

  public onEvent(listener: EngineEventListener): void {
    this.listeners.push(listener);
  }

  public emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  public count(op: string): number {
    return this.calls.filter((call) => call.op === op).length;
  }
}
