import { promises as fs } from 'fs';
import { fetch } from 'undici';
import { z } from 'zod';
import type { SentimentResult } from '../history/types';
import { log } from '../log';
import type { EnrichmentBackend, SummaryLength } from './types';

export interface HttpEnrichmentBackendOptions {
  transcribeUrl?: string;
  sentimentUrl?: string;
  summaryUrl?: string;
}

const TranscriptResponseSchema = z.object({ text: z.string().nullable().optional() }).passthrough();

const SentimentResponseSchema = z
  .object({
    label: z.string().min(1),
    score: z.number().min(0).max(1),
  })
  .passthrough();

const SummaryResponseSchema = z
  .object({
    summary_text: z.string().optional(),
    summary: z.string().optional(),
  })
  .passthrough();

async function readErrorPreview(response: { text(): Promise<string> }): Promise<string> {
  try {
    const body = await response.text();
    return body.length > 300 ? `${body.slice(0, 300)}...` : body;
  } catch {
    return '';
  }
}

/**
 * Talks to Whisper-style transcription and Hugging Face-style
 * text-classification / summarization HTTP services.
 */
export class HttpEnrichmentBackend implements EnrichmentBackend {
  public readonly id = 'http';

  constructor(private readonly options: HttpEnrichmentBackendOptions) {}

  public async transcribe(audioPath: string, signal: AbortSignal): Promise<string | null> {
    if (!this.options.transcribeUrl) {
      return null;
    }

    const audio = await fs.readFile(audioPath);
    const response = await fetch(this.options.transcribeUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'audio/wav' },
      body: audio,
      signal,
    });

    if (!response.ok) {
      const preview = await readErrorPreview(response);
      throw new Error(`transcribe http ${response.status}: ${preview}`);
    }

    const parsed = TranscriptResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      log.warn({ event: 'transcribe_response_invalid', issues: parsed.error.issues }, 'transcribe response invalid');
      return null;
    }
    return parsed.data.text ?? null;
  }

  public async classifySentiment(text: string, signal: AbortSignal): Promise<SentimentResult | null> {
    if (!this.options.sentimentUrl) {
      return null;
    }

    const data = await this.postJson(this.options.sentimentUrl, { text }, signal, 'sentiment');
    // text-classification endpoints answer either one object or a list ranked by score
    const candidate = Array.isArray(data) ? data[0] : data;
    const parsed = SentimentResponseSchema.safeParse(candidate);
    if (!parsed.success) {
      log.warn({ event: 'sentiment_response_invalid', issues: parsed.error.issues }, 'sentiment response invalid');
      return null;
    }
    return { label: parsed.data.label.toLowerCase(), confidence: parsed.data.score };
  }

  public async summarize(text: string, length: SummaryLength, signal: AbortSignal): Promise<string | null> {
    if (!this.options.summaryUrl) {
      return null;
    }

    const data = await this.postJson(
      this.options.summaryUrl,
      { text, min_length: length.minLength, max_length: length.maxLength },
      signal,
      'summary',
    );
    const candidate = Array.isArray(data) ? data[0] : data;
    const parsed = SummaryResponseSchema.safeParse(candidate);
    if (!parsed.success) {
      log.warn({ event: 'summary_response_invalid', issues: parsed.error.issues }, 'summary response invalid');
      return null;
    }
    return parsed.data.summary_text ?? parsed.data.summary ?? null;
  }

  private async postJson(url: string, body: Record<string, unknown>, signal: AbortSignal, label: string): Promise<unknown> {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const preview = await readErrorPreview(response);
      throw new Error(`${label} http ${response.status}: ${preview}`);
    }

    return response.json();
  }
}
