import type { CallDirection, EndReason } from '../calls/types';

export type CallHistoryStatus = 'calling' | 'ringing' | 'answered' | 'ended' | 'failed';

export interface SentimentResult {
  label: string;
  confidence: number;
}

export interface CallHistoryRecord {
  id: string;
  remoteUri: string;
  direction: CallDirection;
  status: CallHistoryStatus;
  startTime: Date;
  connectTime: Date | null;
  endTime: Date | null;
  /** Seconds between connect and end; 0 for calls that never connected. */
  duration: number;
  endReason: EndReason | null;
  recordingPath: string | null;
  transcript: string | null;
  sentiment: SentimentResult | null;
  summary: string | null;
}

export interface NewCallHistoryRecord {
  remoteUri: string;
  direction: CallDirection;
  status: CallHistoryStatus;
  startTime: Date;
}

/** Call-control fields. Written only by the transition handler. */
export type CallHistoryControlUpdate = Partial<
  Pick<CallHistoryRecord, 'status' | 'connectTime' | 'endTime' | 'duration' | 'endReason' | 'recordingPath'>
>;

/** Enrichment fields. Written only by the enrichment pipeline. */
export type CallHistoryEnrichmentUpdate = Partial<Pick<CallHistoryRecord, 'transcript' | 'sentiment' | 'summary'>>;

export type CallHistoryUpdate = CallHistoryControlUpdate & CallHistoryEnrichmentUpdate;

export interface ListOptions {
  limit: number;
  offset: number;
}

export interface CallHistoryStore {
  create(input: NewCallHistoryRecord): Promise<CallHistoryRecord>;
  /** Writes only the given fields; fails NotFound for an unknown id. */
  update(id: string, fields: CallHistoryUpdate): Promise<CallHistoryRecord>;
  get(id: string): Promise<CallHistoryRecord | null>;
  /** Newest first by start time. */
  list(options: ListOptions): Promise<CallHistoryRecord[]>;
}

export function toHistoryDto(record: CallHistoryRecord): Record<string, unknown> {
  return {
    id: record.id,
    remote_uri: record.remoteUri,
    direction: record.direction,
    status: record.status,
    start_time: record.startTime.toISOString(),
    connect_time: record.connectTime ? record.connectTime.toISOString() : null,
    end_time: record.endTime ? record.endTime.toISOString() : null,
    duration: record.duration,
    end_reason: record.endReason,
    recording_path: record.recordingPath,
    transcript: record.transcript,
    sentiment: record.sentiment,
    summary: record.summary,
  };
}
