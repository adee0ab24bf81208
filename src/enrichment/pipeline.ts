import { promises as fs } from 'fs';
import type { CallHistoryEnrichmentUpdate, CallHistoryStore, SentimentResult } from '../history/types';
import { log } from '../log';
import { incEnrichmentDropped, incStageError, startStageTimer } from '../metrics';
import type { EnrichmentBackend, EnrichmentSink, SummaryLength } from './types';
import { WorkQueue } from './workQueue';

export const SENTIMENT_INPUT_CAP = 512;
export const SUMMARY_INPUT_CAP = 1024;
export const SUMMARY_MIN_WORDS = 50;
export const SHORT_CALL_SUMMARY = 'Call too short for summary';
export const SUMMARY_LENGTH: SummaryLength = { minLength: 30, maxLength: 130 };

export type EnrichmentStage = 'transcribe' | 'sentiment' | 'summary';

export interface EnrichmentPipelineOptions {
  backend: EnrichmentBackend;
  store: CallHistoryStore;
  timeoutMs: number;
  concurrency: number;
  queueLimit: number;
}

class StageTimeoutError extends Error {
  constructor(stage: EnrichmentStage, timeoutMs: number) {
    super(`${stage} timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
  }
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Post-call transcribe -> sentiment -> summary. Each stage persists its own
 * result as soon as it has one; a stage failure leaves only its field unset.
 * Nothing here is ever surfaced to call control.
 */
export class EnrichmentPipeline implements EnrichmentSink {
  private readonly backend: EnrichmentBackend;
  private readonly store: CallHistoryStore;
  private readonly timeoutMs: number;
  private readonly queue: WorkQueue;

  constructor(options: EnrichmentPipelineOptions) {
    this.backend = options.backend;
    this.store = options.store;
    this.timeoutMs = options.timeoutMs;
    this.queue = new WorkQueue({
      name: 'enrichment',
      concurrency: options.concurrency,
      limit: options.queueLimit,
    });
  }

  public submit(recordId: string): boolean {
    const accepted = this.queue.push({
      name: `enrich:${recordId}`,
      run: () => this.process(recordId),
    });
    if (!accepted) {
      incEnrichmentDropped();
    } else {
      log.info({ event: 'enrichment_queued', record_id: recordId, backend: this.backend.id }, 'enrichment queued');
    }
    return accepted;
  }

  public onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  public async process(recordId: string): Promise<void> {
    const logContext = { record_id: recordId, backend: this.backend.id };
    const record = await this.store.get(recordId);
    if (!record) {
      log.warn({ event: 'enrichment_record_missing', ...logContext }, 'enrichment skipped: record not found');
      return;
    }

    const recordingPath = record.recordingPath;
    if (!recordingPath) {
      log.info({ event: 'enrichment_no_recording', ...logContext }, 'enrichment skipped: no recording');
      return;
    }

    try {
      await fs.access(recordingPath);
    } catch (error) {
      log.warn(
        { err: error, event: 'enrichment_recording_missing', recording_path: recordingPath, ...logContext },
        'enrichment skipped: recording file not found',
      );
      return;
    }

    const transcript = await this.transcribe(recordingPath);
    if (!transcript) {
      log.info({ event: 'enrichment_no_transcript', ...logContext }, 'no transcript; sentiment and summary skipped');
      return;
    }
    if (!(await this.commit(recordId, { transcript }, 'transcribe'))) {
      return;
    }

    const sentiment = await this.analyzeSentiment(transcript);
    if (sentiment) {
      await this.commit(recordId, { sentiment }, 'sentiment');
    }

    const summary = await this.summarize(transcript);
    if (summary) {
      await this.commit(recordId, { summary }, 'summary');
    }

    log.info(
      {
        event: 'enrichment_complete',
        transcript_chars: transcript.length,
        has_sentiment: sentiment !== null,
        has_summary: summary !== null,
        ...logContext,
      },
      'enrichment complete',
    );
  }

  public async transcribe(audioPath: string): Promise<string | null> {
    const text = await this.runStage('transcribe', (signal) => this.backend.transcribe(audioPath, signal));
    if (text === null) {
      return null;
    }
    const trimmed = text.trim();
    return trimmed === '' ? null : trimmed;
  }

  public async analyzeSentiment(text: string): Promise<SentimentResult | null> {
    if (text.trim() === '') {
      return null;
    }
    const input = text.slice(0, SENTIMENT_INPUT_CAP);
    return this.runStage('sentiment', (signal) => this.backend.classifySentiment(input, signal));
  }

  public async summarize(text: string): Promise<string | null> {
    if (text.trim() === '') {
      return null;
    }
    if (countWords(text) < SUMMARY_MIN_WORDS) {
      return SHORT_CALL_SUMMARY;
    }
    const input = text.slice(0, SUMMARY_INPUT_CAP);
    return this.runStage('summary', (signal) => this.backend.summarize(input, SUMMARY_LENGTH, signal));
  }

  private async runStage<T>(stage: EnrichmentStage, call: (signal: AbortSignal) => Promise<T | null>): Promise<T | null> {
    const endTimer = startStageTimer(stage);
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new StageTimeoutError(stage, this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([call(controller.signal), deadline]);
    } catch (error) {
      incStageError(stage);
      log.warn(
        { err: error, event: 'enrichment_stage_failed', stage, backend: this.backend.id },
        'enrichment stage failed',
      );
      return null;
    } finally {
      clearTimeout(timer);
      endTimer();
    }
  }

  private async commit(recordId: string, fields: CallHistoryEnrichmentUpdate, stage: EnrichmentStage): Promise<boolean> {
    try {
      await this.store.update(recordId, fields);
      return true;
    } catch (error) {
      log.error(
        { err: error, event: 'enrichment_commit_failed', stage, record_id: recordId },
        'enrichment result could not be stored',
      );
      return false;
    }
  }
}
