import type { SentimentResult } from '../history/types';

export interface SummaryLength {
  minLength: number;
  maxLength: number;
}

/**
 * Black-box text-in/label-or-text-out service. Every method resolves null when
 * it has nothing to offer; thrown errors are treated the same way upstream.
 */
export interface EnrichmentBackend {
  readonly id: string;
  transcribe(audioPath: string, signal: AbortSignal): Promise<string | null>;
  classifySentiment(text: string, signal: AbortSignal): Promise<SentimentResult | null>;
  summarize(text: string, length: SummaryLength, signal: AbortSignal): Promise<string | null>;
}

export interface EnrichmentSink {
  /** Queues a finished call for enrichment. False when the job was not accepted. */
  submit(recordId: string): boolean;
}
