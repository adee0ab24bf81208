import type { NextFunction, Request, RequestHandler, Response } from 'express';
import client from 'prom-client';

/**
 * prom-client Histogram.startTimer() measures seconds; the *_ms metrics
 * here are fed true milliseconds.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'softphone_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}enrichment_stage_duration_ms`,
  help: 'Enrichment stage duration in milliseconds (transcribe/sentiment/summary)',
  labelNames: ['stage'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}enrichment_stage_errors_total`,
  help: 'Enrichment stage failures, timeouts included',
  labelNames: ['stage'] as const,
  registers: [register],
});

const enrichmentDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}enrichment_dropped_total`,
  help: 'Enrichment jobs dropped because the queue was full',
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls reaching the ended state',
  labelNames: ['direction', 'status'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Connected call duration in seconds',
  labelNames: ['direction'] as const,
  buckets: [5, 10, 30, 60, 120, 300, 900, 1800],
  registers: [register],
});

const recordingFailuresTotal = new client.Counter({
  name: `${METRICS_PREFIX}recording_failures_total`,
  help: 'Recording start/stop failures',
  labelNames: ['operation'] as const,
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  if (route && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }

  const raw = req.path || req.url || 'unknown';
  return raw.replace(/\/\d+(?=\/|$)/g, '/:id');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/** Starts a stage timer and returns its end() function. */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();
  return () => {
    stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incEnrichmentDropped(): void {
  enrichmentDroppedTotal.inc();
}

export function incRecordingFailure(operation: 'start' | 'stop'): void {
  recordingFailuresTotal.inc({ operation });
}

export function recordCallCompleted(opts: { direction: string; status: string; durationSeconds: number }): void {
  callCompletionsTotal.inc({ direction: opts.direction, status: opts.status });
  if (opts.durationSeconds > 0) {
    callDurationSeconds.observe({ direction: opts.direction }, opts.durationSeconds);
  }
}
