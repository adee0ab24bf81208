import { Router } from 'express';
import type { EngineKind } from '../engine/types';
import type { RedisClient } from '../redis/client';
import { log } from '../log';

export interface HealthDeps {
  engineKind: EngineKind;
  redis?: Pick<RedisClient, 'ping'>;
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    let redisStatus: 'ok' | 'down' | 'disabled' = 'disabled';
    if (deps.redis) {
      try {
        await deps.redis.ping();
        redisStatus = 'ok';
      } catch (error) {
        log.warn({ err: error, event: 'health_redis_failed' }, 'redis health check failed');
        redisStatus = 'down';
      }
    }

    const ok = redisStatus !== 'down';
    res.status(ok ? 200 : 503).json({
      status: ok ? 'ok' : 'degraded',
      engine: deps.engineKind,
      redis: redisStatus,
    });
  });

  return router;
}
