import { computeDurationSeconds, isActiveState, transition } from './stateMachine';
import type {
  CallDirection,
  CallEvent,
  CallSessionConfig,
  CallSessionId,
  CallSnapshot,
  CallState,
  EndReason,
  TransitionResult,
} from './types';

export class CallSession {
  public readonly id: CallSessionId;
  public readonly direction: CallDirection;
  public readonly remoteUri: string;
  public readonly handle: string;
  public readonly historyId: string;
  public readonly startedAt: Date;

  private state: CallState = 'initiated';
  private connectedAt?: Date;
  private endedAt?: Date;
  private endReason?: EndReason;
  private onHold = false;
  private muted = false;
  private recordingPath?: string;
  private recordingActive = false;

  constructor(config: CallSessionConfig) {
    this.id = config.id;
    this.direction = config.direction;
    this.remoteUri = config.remoteUri;
    this.handle = config.handle;
    this.historyId = config.historyId;
    this.startedAt = config.startedAt ?? new Date();
  }

  /**
   * Applies the pure transition decision to this session's own fields. I/O
   * effects listed in the result are left to the caller.
   */
  public apply(event: CallEvent, now: Date = new Date()): TransitionResult {
    const result = transition(this.state, event);
    if (result.kind !== 'applied') {
      return result;
    }

    for (const effect of result.effects) {
      switch (effect) {
        case 'stamp_connected':
          this.connectedAt = now;
          break;
        case 'set_hold':
          this.onHold = true;
          break;
        case 'clear_hold':
          this.onHold = false;
          break;
        case 'stamp_ended':
          this.endedAt = now;
          this.onHold = false;
          if (event.type === 'ended') {
            this.endReason = event.reason;
          }
          break;
        default:
          break;
      }
    }

    this.state = result.to;
    return result;
  }

  public getState(): CallState {
    return this.state;
  }

  public isActive(): boolean {
    return isActiveState(this.state);
  }

  public isEnded(): boolean {
    return this.state === 'ended';
  }

  public wasConnected(): boolean {
    return this.connectedAt !== undefined;
  }

  public getEndReason(): EndReason | undefined {
    return this.endReason;
  }

  public getConnectedAt(): Date | undefined {
    return this.connectedAt;
  }

  public getEndedAt(): Date | undefined {
    return this.endedAt;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  public setMuted(muted: boolean): void {
    this.muted = muted;
  }

  public attachRecording(path: string): void {
    this.recordingPath = path;
    this.recordingActive = true;
  }

  public isRecording(): boolean {
    return this.recordingActive;
  }

  public markRecordingStopped(): void {
    this.recordingActive = false;
  }

  public getRecordingPath(): string | undefined {
    return this.recordingPath;
  }

  /** Seconds connected: frozen at hangup, live while the call is up. */
  public durationSeconds(now: Date = new Date()): number {
    return computeDurationSeconds(this.connectedAt, this.endedAt ?? now);
  }

  public snapshot(now: Date = new Date()): CallSnapshot {
    return {
      id: this.id,
      direction: this.direction,
      remoteUri: this.remoteUri,
      state: this.state,
      startedAt: new Date(this.startedAt),
      connectedAt: this.connectedAt ? new Date(this.connectedAt) : undefined,
      endedAt: this.endedAt ? new Date(this.endedAt) : undefined,
      endReason: this.endReason,
      onHold: this.onHold,
      muted: this.muted,
      recordingPath: this.recordingPath,
      historyId: this.historyId,
      durationSeconds: this.durationSeconds(now),
    };
  }
}
