import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import type { CallController } from './calls/callController';
import type { ContactStore } from './contacts/types';
import { isCallControlError } from './errors';
import type { CallHistoryStore } from './history/types';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import type { RedisClient } from './redis/client';
import { createCallRouter } from './routes/calls';
import { createContactRouter } from './routes/contacts';
import { createHealthRouter } from './routes/health';
import { createHistoryRouter } from './routes/history';

export interface ServerDeps {
  controller: CallController;
  history: CallHistoryStore;
  contacts: ContactStore;
  redis?: Pick<RedisClient, 'ping'>;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId: unknown = res.locals.requestId;

  if (isCallControlError(err)) {
    log.warn(
      { event: 'call_control_rejected', code: err.code, path: req.path, requestId, details: err.details },
      err.message,
    );
    res.status(err.httpStatus).json({ success: false, error: err.code, message: err.message });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ success: false, error: 'ValidationFailed', message: 'malformed json body' });
    return;
  }

  log.error({ err, event: 'unhandled_error', path: req.path, requestId }, 'unhandled error');
  res.status(500).json({ success: false, error: 'internal_server_error' });
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.json({ limit: '64kb' }));

  app.use('/health', createHealthRouter({ engineKind: deps.controller.engineKind, redis: deps.redis }));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/api/call', createCallRouter(deps.controller));
  app.use('/api/history', createHistoryRouter(deps.history));
  app.use('/api/contacts', createContactRouter(deps.contacts));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'NotFound', message: 'route not found' });
  });
  app.use(errorHandler);

  const server = http.createServer(app);

  return { app, server };
}
