export type EngineKind = 'ari' | 'demo';

export type EngineCallState = 'ringing' | 'connected' | 'disconnected';

export type EngineEvent =
  | { type: 'incoming'; handle: string; remoteUri: string }
  | {
      type: 'state';
      handle: string;
      state: EngineCallState;
      /** Engine-native state text, kept for logs. */
      stateText: string;
      remoteUri?: string;
      failed?: boolean;
    };

export type EngineEventListener = (event: EngineEvent) => void;

export interface DialResult {
  handle: string;
  remoteUri: string;
  /** True when the engine reports the far end as already connected. */
  answered: boolean;
}

export interface EngineCapabilities {
  recording: boolean;
}

/**
 * Capability set every signaling backend implements. Selected once at startup
 * and injected; callers never inspect which variant they hold.
 */
export interface SignalingEngine {
  readonly kind: EngineKind;
  readonly capabilities: EngineCapabilities;
  /** Creates the account and registers it with the signaling server. */
  start(): Promise<void>;
  stop(): Promise<void>;
  dial(remoteUri: string): Promise<DialResult>;
  answer(handle: string): Promise<void>;
  /** Refuses an incoming call, signalling busy. */
  reject(handle: string): Promise<void>;
  hangup(handle: string): Promise<void>;
  hold(handle: string): Promise<void>;
  resume(handle: string): Promise<void>;
  mute(handle: string): Promise<void>;
  unmute(handle: string): Promise<void>;
  sendDtmf(handle: string, digits: string): Promise<void>;
  startRecording(handle: string, path: string): Promise<void>;
  stopRecording(handle: string): Promise<void>;
  onEvent(listener: EngineEventListener): void;
}
