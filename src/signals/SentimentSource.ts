import { z } from 'zod';
import type { MarketContext } from '../types/trading';
import type { SignalSourceConfig } from '../types/config';
import { BaseSignalSource, type SourceScore } from './SignalSource';

const sentimentResponseSchema = z.object({
  score: z.number().min(-1).max(1),
  confidence: z.number().min(0).max(1).optional()
});

/**
 * Remote sentiment scorer. POSTs `{symbol, price}` and expects
 * `{score: -1..1, confidence?: 0..1}`; scores inside the neutral band read
 * as HOLD.
 */
export class SentimentSource extends BaseSignalSource {
  private readonly url: string;
  private readonly apiKey: string;
  private readonly neutralBand: number;

  constructor(config: SignalSourceConfig, private readonly fetchFn: typeof fetch = fetch) {
    super(config);
    this.url = this.stringParam('url');
    this.apiKey = this.stringParam('apiKey');
    this.neutralBand = this.numberParam('neutralBand', 0.1);
  }

  async score(symbol: string, context: MarketContext, signal: AbortSignal): Promise<SourceScore> {
    if (!this.url) {
      return this.noOpinion('no sentiment endpoint configured');
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await this.fetchFn(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({ symbol, price: context.price }),
      signal
    });

    if (!response.ok) {
      throw new Error(`Sentiment API error: ${response.status}`);
    }

    const parsed = sentimentResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Malformed sentiment response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const { score, confidence } = parsed.data;
    if (Math.abs(score) < this.neutralBand) {
      return this.opinion('HOLD', confidence ?? 1 - Math.abs(score));
    }
    return this.opinion(score > 0 ? 'BUY' : 'SELL', confidence ?? Math.abs(score));
  }
}
