import { log } from '../log';
import type { AriChannel, AriClientOptions, AriQuery } from './types';
import { AriChannelSchema } from './types';

const DEFAULT_MAX_RETRIES = 2;

// Retry backoff tuning (keep small; call-control is latency-sensitive)
const ARI_RETRY_BASE_MS = 250;
const ARI_RETRY_MAX_MS = 1500;

export class AriRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody: unknown,
  ) {
    super(message);
    this.name = 'AriRequestError';
  }
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(attempt: number): number {
  const exp = Math.min(ARI_RETRY_MAX_MS, ARI_RETRY_BASE_MS * Math.pow(2, attempt));
  const jitter = Math.floor(Math.random() * 120);
  return exp + jitter;
}

function truncateForLog(value: unknown, max = 800): string {
  try {
    const s = typeof value === 'string' ? value : JSON.stringify(value);
    if (s.length <= max) return s;
    return `${s.slice(0, max)}…(truncated)`;
  } catch {
    return '[unserializable]';
  }
}

async function safeReadBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    try {
      return await response.json();
    } catch {
      // fall through to text
    }
  }
  try {
    return await response.text();
  } catch (e) {
    return `<<failed to read response body: ${String(e)}>>`;
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || /aborted|AbortError/i.test(err.message));
}

/**
 * Asterisk REST Interface client. Channel operations on a channel that is
 * already gone (404) resolve quietly: the call ended under us.
 */
export class AriClient {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly maxRetries: number;

  constructor(private readonly options: AriClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.authHeader = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString('base64')}`;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  }

  public get app(): string {
    return this.options.app;
  }

  public buildUrl(path: string, query: AriQuery = {}): string {
    const url = new URL(`${this.baseUrl}/ari${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /** WebSocket URL for the application's event stream. */
  public eventsUrl(): string {
    const url = new URL(this.buildUrl('/events', { app: this.options.app, subscribeAll: false }));
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
    url.searchParams.set('api_key', `${this.options.username}:${this.options.password}`);
    return url.toString();
  }

  public async getInfo(): Promise<unknown> {
    return this.request('GET', '/asterisk/info');
  }

  public async originate(endpoint: string, callerId?: string): Promise<AriChannel> {
    const body = await this.request('POST', '/channels', {
      endpoint,
      app: this.options.app,
      callerId,
    });
    const parsed = AriChannelSchema.safeParse(body);
    if (!parsed.success) {
      throw new AriRequestError('ARI originate returned an unexpected channel payload', 200, body);
    }
    return parsed.data;
  }

  public async answer(channelId: string): Promise<void> {
    await this.channelRequest('POST', channelId, '/answer');
  }

  public async ring(channelId: string): Promise<void> {
    await this.channelRequest('POST', channelId, '/ring');
  }

  public async hangup(channelId: string, reason: 'normal' | 'busy' = 'normal'): Promise<void> {
    await this.channelRequest('DELETE', channelId, '', { reason });
  }

  public async hold(channelId: string): Promise<void> {
    await this.channelRequest('POST', channelId, '/hold');
  }

  public async unhold(channelId: string): Promise<void> {
    await this.channelRequest('DELETE', channelId, '/hold');
  }

  public async mute(channelId: string): Promise<void> {
    await this.channelRequest('POST', channelId, '/mute', { direction: 'out' });
  }

  public async unmute(channelId: string): Promise<void> {
    await this.channelRequest('DELETE', channelId, '/mute', { direction: 'out' });
  }

  public async sendDtmf(channelId: string, digits: string): Promise<void> {
    await this.channelRequest('POST', channelId, '/dtmf', { dtmf: digits });
  }

  public async record(channelId: string, name: string, format: string): Promise<void> {
    await this.request('POST', `/channels/${encodeURIComponent(channelId)}/record`, {
      name,
      format,
      ifExists: 'fail',
      beep: false,
    });
  }

  public async stopRecording(name: string): Promise<void> {
    try {
      await this.request('POST', `/recordings/live/${encodeURIComponent(name)}/stop`);
    } catch (error) {
      if (error instanceof AriRequestError && error.status === 404) {
        log.warn({ event: 'ari_recording_already_stopped', recording: name }, 'ari recording already stopped');
        return;
      }
      throw error;
    }
  }

  private async channelRequest(method: string, channelId: string, suffix: string, query: AriQuery = {}): Promise<void> {
    try {
      await this.request(method, `/channels/${encodeURIComponent(channelId)}${suffix}`, query);
    } catch (error) {
      if (error instanceof AriRequestError && error.status === 404) {
        log.warn(
          { event: 'ari_channel_gone', channel_id: channelId, action: `${method} ${suffix || '/'}` },
          'ari channel already gone',
        );
        return;
      }
      throw error;
    }
  }

  public async request(method: string, path: string, query: AriQuery = {}, attempt = 0): Promise<unknown> {
    const url = this.buildUrl(path, query);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const startedAt = Date.now();

    try {
      const response = await fetch(url, {
        method,
        headers: {
          Authorization: this.authHeader,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });

      const responseBody = await safeReadBody(response);
      const durationMs = Date.now() - startedAt;

      if (!response.ok) {
        if (shouldRetry(response.status) && attempt < this.maxRetries) {
          const waitMs = backoffMs(attempt);
          log.warn(
            {
              event: 'ari_request_retry',
              method,
              path,
              status: response.status,
              duration_ms: durationMs,
              wait_ms: waitMs,
              attempt,
              body: truncateForLog(responseBody),
            },
            'ari request retry',
          );
          await sleep(waitMs);
          return this.request(method, path, query, attempt + 1);
        }

        throw new AriRequestError(
          `ARI ${method} ${path} failed: ${response.status} ${truncateForLog(responseBody, 400)}`,
          response.status,
          responseBody,
        );
      }

      log.debug(
        { event: 'ari_request_completed', method, path, status: response.status, duration_ms: durationMs },
        'ari request completed',
      );
      return responseBody;
    } catch (error) {
      if (error instanceof AriRequestError) {
        throw error;
      }

      // aborts come from our own timeout and are not retried
      if (!isAbortError(error) && attempt < this.maxRetries) {
        const waitMs = backoffMs(attempt);
        log.warn({ event: 'ari_request_error_retry', method, path, attempt, wait_ms: waitMs, err: error }, 'ari request error retry');
        await sleep(waitMs);
        return this.request(method, path, query, attempt + 1);
      }

      log.error({ event: 'ari_request_error', method, path, err: error }, 'ari request error');
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
