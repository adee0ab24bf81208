import path from 'path';
import WebSocket from 'ws';
import type { DialResult, EngineEvent, EngineEventListener, SignalingEngine } from '../engine/types';
import { log } from '../log';
import { AriClient } from './ariClient';
import { mapAriEvent } from './ariEvents';
import { AriEventSchema } from './types';

const RECONNECT_DELAY_MS = 2000;

export interface AriEngineOptions {
  outboundEndpoint: string;
  sipDomain: string;
  connectTimeoutMs: number;
}

/**
 * Real signaling engine: Asterisk drives SIP and media, this process drives
 * Asterisk through ARI REST calls and listens on the ARI event socket.
 */
export class AriEngine implements SignalingEngine {
  public readonly kind = 'ari' as const;
  public readonly capabilities = { recording: true };

  private readonly listeners: EngineEventListener[] = [];
  private readonly ownChannels = new Set<string>();
  private readonly liveRecordings = new Map<string, string>();
  private socket?: WebSocket;
  private reconnectTimer?: NodeJS.Timeout;
  private stopped = false;

  constructor(
    private readonly client: AriClient,
    private readonly options: AriEngineOptions,
  ) {}

  public async start(): Promise<void> {
    this.stopped = false;
    await this.client.getInfo();
    await this.connectEvents();
    log.info({ event: 'ari_engine_started', app: this.client.app }, 'ari signaling engine started');
  }

  public async stop(): Promise<void> {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.socket?.close(1000, 'shutdown');
    this.socket = undefined;
  }

  public async dial(remoteUri: string): Promise<DialResult> {
    const endpoint = `PJSIP/${this.options.outboundEndpoint}/${remoteUri}`;
    const channel = await this.client.originate(endpoint);
    this.ownChannels.add(channel.id);
    return { handle: channel.id, remoteUri, answered: channel.state === 'Up' };
  }

  public async answer(handle: string): Promise<void> {
    await this.client.answer(handle);
  }

  public async reject(handle: string): Promise<void> {
    await this.client.hangup(handle, 'busy');
  }

  public async hangup(handle: string): Promise<void> {
    await this.client.hangup(handle, 'normal');
    this.ownChannels.delete(handle);
  }

  public async hold(handle: string): Promise<void> {
    await this.client.hold(handle);
  }

  public async resume(handle: string): Promise<void> {
    await this.client.unhold(handle);
  }

  public async mute(handle: string): Promise<void> {
    await this.client.mute(handle);
  }

  public async unmute(handle: string): Promise<void> {
    await this.client.unmute(handle);
  }

  public async sendDtmf(handle: string, digits: string): Promise<void> {
    await this.client.sendDtmf(handle, digits);
  }

  /** Asterisk writes `<name>.<format>` into its recording spool, which RECORDING_DIR mirrors. */
  public async startRecording(handle: string, recordingPath: string): Promise<void> {
    const format = path.extname(recordingPath).replace(/^\./, '') || 'wav';
    const name = path.basename(recordingPath, path.extname(recordingPath));
    await this.client.record(handle, name, format);
    this.liveRecordings.set(handle, name);
  }

  public async stopRecording(handle: string): Promise<void> {
    const name = this.liveRecordings.get(handle);
    if (!name) {
      return;
    }
    this.liveRecordings.delete(handle);
    await this.client.stopRecording(name);
  }

  public onEvent(listener: EngineEventListener): void {
    this.listeners.push(listener);
  }

  public handleRawEvent(raw: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      log.warn({ err: error, event: 'ari_event_parse_failed' }, 'ari event json parse failed');
      return;
    }

    const parsed = AriEventSchema.safeParse(payload);
    if (!parsed.success) {
      log.debug({ event: 'ari_event_ignored', issues: parsed.error.issues }, 'ari event ignored');
      return;
    }

    const mapped = mapAriEvent(parsed.data, this.ownChannels, this.options.sipDomain);
    if (!mapped) {
      return;
    }

    if (mapped.type === 'incoming') {
      this.client.ring(mapped.handle).catch((error: unknown) => {
        log.warn({ err: error, event: 'ari_ring_failed', handle: mapped.handle }, 'ari ring failed');
      });
    }
    if (mapped.type === 'state' && mapped.state === 'disconnected') {
      this.ownChannels.delete(mapped.handle);
      this.liveRecordings.delete(mapped.handle);
    }

    this.emit(mapped);
  }

  private connectEvents(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.client.eventsUrl());
      let settled = false;
      const timer = setTimeout(() => {
        if (!settled) {
          settled = true;
          socket.terminate();
          reject(new Error(`ari event socket did not open within ${this.options.connectTimeoutMs}ms`));
        }
      }, this.options.connectTimeoutMs);

      socket.on('open', () => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        this.socket = socket;
        log.info({ event: 'ari_events_connected' }, 'ari event socket connected');
        resolve();
      });

      socket.on('message', (data) => {
        this.handleRawEvent(data.toString());
      });

      socket.on('error', (error) => {
        log.error({ err: error, event: 'ari_events_error' }, 'ari event socket error');
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          reject(error);
        }
      });

      socket.on('close', (code, reason) => {
        if (this.socket === socket) {
          this.socket = undefined;
        }
        log.warn({ event: 'ari_events_closed', code, reason: reason.toString() }, 'ari event socket closed');
        if (settled && !this.stopped) {
          this.scheduleReconnect();
        }
      });
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return;
    }
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.connectEvents().catch((error: unknown) => {
        log.warn({ err: error, event: 'ari_events_reconnect_failed' }, 'ari event socket reconnect failed');
        this.scheduleReconnect();
      });
    }, RECONNECT_DELAY_MS);
    this.reconnectTimer.unref?.();
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
