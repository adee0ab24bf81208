import { CallController } from './calls/callController';
import { SessionRegistry } from './calls/sessionRegistry';
import { MemoryContactStore } from './contacts/memoryContactStore';
import { RedisContactStore } from './contacts/redisContactStore';
import type { ContactStore } from './contacts/types';
import { selectSignalingEngine } from './engine/selectEngine';
import { DisabledEnrichmentBackend } from './enrichment/disabledBackend';
import { HttpEnrichmentBackend } from './enrichment/httpBackend';
import { EnrichmentPipeline } from './enrichment/pipeline';
import type { EnrichmentBackend } from './enrichment/types';
import { env } from './env';
import { MemoryCallHistoryStore } from './history/memoryHistoryStore';
import { RedisCallHistoryStore } from './history/redisHistoryStore';
import type { CallHistoryStore } from './history/types';
import { log } from './log';
import { closeRedisClient, createRedisClient } from './redis/client';
import type { RedisClient } from './redis/client';
import { RecordingController } from './recording/recordingController';
import { buildServer } from './server';

function buildEnrichmentBackend(): EnrichmentBackend {
  if (!env.ENRICHMENT_ENABLED) {
    log.info({ event: 'enrichment_disabled' }, 'post-call enrichment disabled');
    return new DisabledEnrichmentBackend();
  }
  return new HttpEnrichmentBackend({
    transcribeUrl: env.TRANSCRIBE_URL,
    sentimentUrl: env.SENTIMENT_URL,
    summaryUrl: env.SUMMARY_URL,
  });
}

async function main(): Promise<void> {
  let redis: RedisClient | undefined;
  let history: CallHistoryStore;
  let contacts: ContactStore;

  if (env.REDIS_URL) {
    redis = createRedisClient(env.REDIS_URL);
    history = new RedisCallHistoryStore(redis, env.HISTORY_PREFIX);
    contacts = new RedisContactStore(redis, env.HISTORY_PREFIX);
  } else {
    log.warn({ event: 'storage_in_memory' }, 'REDIS_URL not set, call history is kept in memory');
    history = new MemoryCallHistoryStore();
    contacts = new MemoryContactStore();
  }

  const pipeline = new EnrichmentPipeline({
    backend: buildEnrichmentBackend(),
    store: history,
    timeoutMs: env.ENRICHMENT_TIMEOUT_MS,
    concurrency: env.ENRICHMENT_CONCURRENCY,
    queueLimit: env.ENRICHMENT_QUEUE_LIMIT,
  });

  const engine = await selectSignalingEngine(env);
  const controller = new CallController({
    engine,
    registry: new SessionRegistry(),
    history,
    recordings: new RecordingController(engine, { baseDir: env.RECORDING_DIR, format: env.RECORDING_FORMAT }),
    enrichment: pipeline,
    sipDomain: env.SIP_DOMAIN,
    autoRecord: env.AUTO_RECORD,
    autoAnswer: env.AUTO_ANSWER,
  });

  const { server } = buildServer({ controller, history, contacts, redis });

  server.on('error', (error) => {
    log.fatal({ err: error, event: 'listen_failed', port: env.PORT, host: env.HOST }, 'control surface failed to bind');
    process.exit(1);
  });

  server.listen(env.PORT, env.HOST, () => {
    log.info({ event: 'server_listening', port: env.PORT, host: env.HOST, engine: engine.kind }, 'server listening');
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ event: 'shutdown', signal }, 'shutting down');
    try {
      await controller.shutdown();
      await engine.stop();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      if (redis) {
        await closeRedisClient(redis);
      }
    } catch (error) {
      log.error({ err: error, event: 'shutdown_failed' }, 'shutdown failed');
      process.exitCode = 1;
    }
    process.exit();
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((error: unknown) => {
  log.fatal({ err: error, event: 'startup_failed' }, 'startup failed');
  process.exit(1);
});
