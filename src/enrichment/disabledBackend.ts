import type { SentimentResult } from '../history/types';
import type { EnrichmentBackend, SummaryLength } from './types';

export class DisabledEnrichmentBackend implements EnrichmentBackend {
  public readonly id = 'disabled';

  public async transcribe(_audioPath: string, _signal: AbortSignal): Promise<string | null> {
    return null;
  }

  public async classifySentiment(_text: string, _signal: AbortSignal): Promise<SentimentResult | null> {
    return null;
  }

  public async summarize(_text: string, _length: SummaryLength, _signal: AbortSignal): Promise<string | null> {
    return null;
  }
}
