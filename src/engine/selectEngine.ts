import { AriClient } from '../ari/ariClient';
import { AriEngine } from '../ari/ariEngine';
import type { Env } from '../env';
import { CallControlError } from '../errors';
import { log } from '../log';
import { DemoEngine } from './demoEngine';
import type { SignalingEngine } from './types';

export type EngineSettings = Pick<
  Env,
  | 'SIGNALING_MODE'
  | 'ARI_URL'
  | 'ARI_USERNAME'
  | 'ARI_PASSWORD'
  | 'ARI_APP'
  | 'ARI_OUTBOUND_ENDPOINT'
  | 'ARI_TIMEOUT_MS'
  | 'SIP_DOMAIN'
>;

export type RealEngineFactory = (settings: EngineSettings) => SignalingEngine;

export const createAriEngine: RealEngineFactory = (settings) => {
  if (!settings.ARI_URL || !settings.ARI_USERNAME || !settings.ARI_PASSWORD) {
    throw new CallControlError(
      'ResourceUnavailable',
      'ARI_URL, ARI_USERNAME and ARI_PASSWORD are required for the ari engine',
    );
  }
  const client = new AriClient({
    baseUrl: settings.ARI_URL,
    username: settings.ARI_USERNAME,
    password: settings.ARI_PASSWORD,
    app: settings.ARI_APP,
    timeoutMs: settings.ARI_TIMEOUT_MS,
  });
  return new AriEngine(client, {
    outboundEndpoint: settings.ARI_OUTBOUND_ENDPOINT,
    sipDomain: settings.SIP_DOMAIN,
    connectTimeoutMs: settings.ARI_TIMEOUT_MS,
  });
};

async function startDemo(): Promise<SignalingEngine> {
  const demo = new DemoEngine();
  await demo.start();
  return demo;
}

/**
 * Picks the signaling engine once at startup. A real engine that cannot be
 * built or started degrades to the demo engine instead of failing the process.
 */
export async function selectSignalingEngine(
  settings: EngineSettings,
  factory: RealEngineFactory = createAriEngine,
): Promise<SignalingEngine> {
  if (settings.SIGNALING_MODE === 'demo') {
    return startDemo();
  }

  if (settings.SIGNALING_MODE === 'auto' && !settings.ARI_URL) {
    log.info({ event: 'engine_selected', engine: 'demo' }, 'no signaling server configured, using demo engine');
    return startDemo();
  }

  try {
    const engine = factory(settings);
    await engine.start();
    log.info({ event: 'engine_selected', engine: engine.kind }, 'signaling engine selected');
    return engine;
  } catch (error) {
    log.warn(
      { err: error, event: 'engine_fallback', code: 'ResourceUnavailable', engine: 'demo' },
      'signaling engine unavailable, falling back to demo engine',
    );
    return startDemo();
  }
}
