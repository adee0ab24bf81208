export type CallSessionId = string;

export type CallDirection = 'inbound' | 'outbound';

export type CallState = 'initiated' | 'ringing' | 'connected' | 'held' | 'ended';

export type EndReason = 'local_hangup' | 'remote_hangup' | 'rejected' | 'failure';

/**
 * Signaling-level happenings fed into the transition function. Resume is a
 * `connected` event observed while held.
 */
export type CallEvent =
  | { type: 'ringing' }
  | { type: 'connected' }
  | { type: 'held' }
  | { type: 'ended'; reason: EndReason };

export type TransitionEffect =
  | 'stamp_connected'
  | 'start_recording'
  | 'set_hold'
  | 'clear_hold'
  | 'stamp_ended'
  | 'stop_recording'
  | 'release_slot';

export type TransitionResult =
  | { kind: 'applied'; from: CallState; to: CallState; effects: TransitionEffect[] }
  | { kind: 'noop'; state: CallState }
  | { kind: 'rejected'; state: CallState; event: CallEvent['type'] };

export interface CallSessionConfig {
  id: CallSessionId;
  direction: CallDirection;
  remoteUri: string;
  handle: string;
  historyId: string;
  startedAt?: Date;
}

export interface CallSnapshot {
  id: CallSessionId;
  direction: CallDirection;
  remoteUri: string;
  state: CallState;
  startedAt: Date;
  connectedAt?: Date;
  endedAt?: Date;
  endReason?: EndReason;
  onHold: boolean;
  muted: boolean;
  recordingPath?: string;
  historyId: string;
  durationSeconds: number;
}
