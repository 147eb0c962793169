import { z } from 'zod';
import type { MarketContext } from '../types/trading';
import type { SignalSourceConfig } from '../types/config';
import { TechnicalIndicators } from '../indicators/technical';
import { BaseSignalSource, type SourceScore } from './SignalSource';

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() })
  })).min(1)
});

const decisionSchema = z.object({
  direction: z.preprocess(
    value => (typeof value === 'string' ? value.toUpperCase() : value),
    z.enum(['BUY', 'SELL', 'HOLD'])
  ),
  confidence: z.number().min(0).max(1)
});

/**
 * Chat-completion scorer against any OpenAI-compatible endpoint. The model
 * sees a compact indicator summary and must answer with
 * `{"direction": "BUY|SELL|HOLD", "confidence": 0..1}`.
 */
export class LLMSource extends BaseSignalSource {
  private readonly apiKey: string;
  private readonly baseURL: string;
  private readonly model: string;

  constructor(config: SignalSourceConfig, private readonly fetchFn: typeof fetch = fetch) {
    super(config);
    this.apiKey = this.stringParam('apiKey');
    this.baseURL = this.stringParam('baseURL', 'https://api.openai.com/v1');
    this.model = this.stringParam('model', 'gpt-4o-mini');
  }

  buildPrompt(symbol: string, context: MarketContext): string {
    const closes = context.candles.map(candle => candle.close);
    const rsi = TechnicalIndicators.rsi(closes, 14);
    const ema9 = TechnicalIndicators.ema(closes, 9);
    const ema21 = TechnicalIndicators.ema(closes, 21);
    const roc = TechnicalIndicators.rateOfChange(closes, 10);
    const fmt = (value: number | null | undefined, digits = 2): string =>
      value === null || value === undefined ? 'N/A' : value.toFixed(digits);

    return `Assess the short-term direction of ${symbol}.

Price: ${fmt(context.price)}
Volatility (std of returns): ${fmt(context.volatility, 4)}
RSI(14): ${fmt(rsi[rsi.length - 1])}
EMA(9): ${fmt(ema9[ema9.length - 1])} | EMA(21): ${fmt(ema21[ema21.length - 1])}
Rate of change (10 bars): ${fmt(roc === null ? null : roc * 100)}%

Respond ONLY with JSON: {"direction": "BUY|SELL|HOLD", "confidence": 0.0-1.0}`;
  }

  async score(symbol: string, context: MarketContext, signal: AbortSignal): Promise<SourceScore> {
    if (!this.apiKey) {
      return this.noOpinion('no API key configured');
    }

    const response = await this.fetchFn(`${this.baseURL}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`
      },
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: 'system', content: 'You are a trading signal generator. Respond only with valid JSON.' },
          { role: 'user', content: this.buildPrompt(symbol, context) }
        ],
        temperature: 0.1,
        max_tokens: 60,
        response_format: { type: 'json_object' }
      }),
      signal
    });

    if (!response.ok) {
      throw new Error(`LLM API error: ${response.status}`);
    }

    const completion = completionSchema.safeParse(await response.json());
    const content = completion.success ? completion.data.choices[0].message.content : null;
    if (!content) {
      throw new Error('No content in LLM response');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch {
      throw new Error(`LLM response is not JSON: ${content.slice(0, 80)}`);
    }

    const decision = decisionSchema.safeParse(payload);
    if (!decision.success) {
      throw new Error(`Malformed LLM decision: ${content.slice(0, 80)}`);
    }

    this.logger.debug('LLM decision', { symbol, model: this.model, ...decision.data });
    return this.opinion(decision.data.direction, decision.data.confidence);
  }
}
