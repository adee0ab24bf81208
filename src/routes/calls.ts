import { Router } from 'express';
import { z } from 'zod';
import type { CallController, CallStatus } from '../calls/callController';
import type { CallSnapshot } from '../calls/types';
import { CallControlError } from '../errors';
import { asyncRoute } from './asyncRoute';

const MakeCallSchema = z.object({ destination: z.string().trim().min(1).max(256) });
const DtmfSchema = z.object({ digits: z.string().trim().min(1).max(32) });

export function toCallDto(snapshot: CallSnapshot): Record<string, unknown> {
  return {
    id: snapshot.id,
    history_id: snapshot.historyId,
    direction: snapshot.direction,
    remote_uri: snapshot.remoteUri,
    state: snapshot.state,
    started_at: snapshot.startedAt.toISOString(),
    connected_at: snapshot.connectedAt ? snapshot.connectedAt.toISOString() : null,
    ended_at: snapshot.endedAt ? snapshot.endedAt.toISOString() : null,
    end_reason: snapshot.endReason ?? null,
    on_hold: snapshot.onHold,
    muted: snapshot.muted,
    recording_path: snapshot.recordingPath ?? null,
    duration: snapshot.durationSeconds,
  };
}

function toStatusDto(status: CallStatus): Record<string, unknown> {
  if (!status.active) {
    return { active: false, engine: status.engine };
  }
  return { active: true, engine: status.engine, recording: status.recording, ...toCallDto(status) };
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new CallControlError('ValidationFailed', 'invalid request body', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function createCallRouter(controller: CallController): Router {
  const router = Router();

  const simple = (operation: (c: CallController) => Promise<CallSnapshot>) =>
    asyncRoute(async (_req, res) => {
      const snapshot = await operation(controller);
      res.status(200).json({ success: true, call: toCallDto(snapshot) });
    });

  router.post(
    '/make',
    asyncRoute(async (req, res) => {
      const { destination } = parseBody(MakeCallSchema, req.body);
      const snapshot = await controller.dial(destination);
      res.status(200).json({ success: true, call: toCallDto(snapshot) });
    }),
  );

  router.post('/answer', simple((c) => c.answer()));
  router.post('/hangup', simple((c) => c.hangup()));
  router.post('/hold', simple((c) => c.hold()));
  router.post('/resume', simple((c) => c.resume()));
  router.post('/mute', simple((c) => c.mute()));
  router.post('/unmute', simple((c) => c.unmute()));

  router.post(
    '/dtmf',
    asyncRoute(async (req, res) => {
      const { digits } = parseBody(DtmfSchema, req.body);
      const snapshot = await controller.sendDtmf(digits);
      res.status(200).json({ success: true, call: toCallDto(snapshot) });
    }),
  );

  router.get('/status', (_req, res) => {
    res.status(200).json({ success: true, ...toStatusDto(controller.getStatus()) });
  });

  return router;
}
