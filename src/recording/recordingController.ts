import { promises as fs } from 'fs';
import path from 'path';
import type { CallSession } from '../calls/callSession';
import { remoteUserPart } from '../calls/destination';
import type { SignalingEngine } from '../engine/types';
import { log } from '../log';
import { incRecordingFailure } from '../metrics';

export interface RecordingControllerOptions {
  baseDir: string;
  format: string;
  clock?: () => Date;
}

export function sanitizeSegment(value: string): string {
  const sanitized = value.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 48);
  return sanitized.length > 0 ? sanitized : 'unknown';
}

export function formatRecordingTimestamp(date: Date): string {
  const pad = (value: number): string => value.toString().padStart(2, '0');
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_${pad(
    date.getUTCHours(),
  )}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

/** Appends `_2`, `_3`, ... to the name until it matches no existing file. */
export async function unusedPath(candidate: string): Promise<string> {
  const ext = path.extname(candidate);
  const stem = candidate.slice(0, candidate.length - ext.length);
  for (let attempt = 1; ; attempt += 1) {
    const next = attempt === 1 ? candidate : `${stem}_${attempt}${ext}`;
    if (!(await fileExists(next))) {
      return next;
    }
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Starts and stops capture for one session at a time. All per-call state
 * lives on the session itself.
 */
export class RecordingController {
  private readonly baseDir: string;
  private readonly format: string;
  private readonly clock: () => Date;

  constructor(
    private readonly engine: SignalingEngine,
    options: RecordingControllerOptions,
  ) {
    this.baseDir = options.baseDir;
    this.format = options.format;
    this.clock = options.clock ?? (() => new Date());
  }

  public buildPath(remoteUri: string, at: Date): string {
    const remote = sanitizeSegment(remoteUserPart(remoteUri));
    return path.join(this.baseDir, `call_${remote}_${formatRecordingTimestamp(at)}.${this.format}`);
  }

  /**
   * Returns the recording path, or null when capture could not start. Never
   * throws: a failed recording leaves the call running unrecorded.
   */
  public async start(session: CallSession): Promise<string | null> {
    const logContext = { call_id: session.id, handle: session.handle, engine: this.engine.kind };

    if (session.isRecording()) {
      return session.getRecordingPath() ?? null;
    }

    if (!this.engine.capabilities.recording) {
      log.info({ event: 'recording_unsupported', ...logContext }, 'engine cannot record; call left unrecorded');
      return null;
    }

    let recordingPath = this.buildPath(session.remoteUri, this.clock());
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      recordingPath = await unusedPath(recordingPath);
      await this.engine.startRecording(session.handle, recordingPath);
    } catch (error) {
      incRecordingFailure('start');
      log.warn(
        { err: error, event: 'recording_start_failed', recording_path: recordingPath, ...logContext },
        'recording start failed',
      );
      return null;
    }

    session.attachRecording(recordingPath);
    log.info({ event: 'recording_started', recording_path: recordingPath, ...logContext }, 'recording started');
    return recordingPath;
  }

  public async stop(session: CallSession): Promise<void> {
    if (!session.isRecording()) {
      return;
    }

    const logContext = { call_id: session.id, handle: session.handle, recording_path: session.getRecordingPath() };
    try {
      await this.engine.stopRecording(session.handle);
      log.info({ event: 'recording_stopped', ...logContext }, 'recording stopped');
    } catch (error) {
      incRecordingFailure('stop');
      log.warn({ err: error, event: 'recording_stop_failed', ...logContext }, 'recording stop failed');
    } finally {
      session.markRecordingStopped();
    }
  }
}
