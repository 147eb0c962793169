import { describe, expect, it, vi } from 'vitest';
import type { SignalSourceConfig } from '../types/config';
import { MomentumSource } from './MomentumSource';
import { MeanReversionSource } from './MeanReversionSource';
import { SentimentSource } from './SentimentSource';
import { LLMSource } from './LLMSource';
import { marketContext } from '../testing/fakes';

function config(overrides: Partial<SignalSourceConfig> = {}): SignalSourceConfig {
  return { id: 'src', type: 'momentum', weight: 1, enabled: true, params: {}, ...overrides };
}

function series(start: number, step: number, count: number): number[] {
  return Array.from({ length: count }, (_, index) => start + step * index);
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const signal = new AbortController().signal;

describe('MomentumSource', () => {
  const source = new MomentumSource(config());

  it('buys a steady uptrend and sells a downtrend', async () => {
    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', series(100, 1, 30)))).resolves
      .toEqual({ direction: 'BUY', confidence: 1 });
    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', series(130, -1, 30)))).resolves
      .toEqual({ direction: 'SELL', confidence: 1 });
  });

  it('holds a flat market', async () => {
    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', series(100, 0, 30)))).resolves
      .toEqual({ direction: 'HOLD', confidence: 0.5 });
  });

  it('abstains without enough history', async () => {
    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', series(100, 1, 5)))).resolves
      .toEqual({ noOpinion: true, reason: 'need 21 candles, have 5' });
  });
});

describe('MeanReversionSource', () => {
  const source = new MeanReversionSource(config({ type: 'mean_reversion' }));

  it('buys a deeply oversold market', async () => {
    const score = await source.score('BTC/USDT', marketContext('BTC/USDT', series(130, -1, 30)));

    expect(score).toMatchObject({ direction: 'BUY' });
    expect('confidence' in score && score.confidence).toBeCloseTo(0.9, 10);
  });

  it('adds conviction when price breaks the lower band', async () => {
    const closes = [...series(100, 0, 29), 90];

    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', closes))).resolves
      .toEqual({ direction: 'BUY', confidence: 1 });
  });

  it('sells an overbought market and holds a flat one', async () => {
    const overbought = await source.score('BTC/USDT', marketContext('BTC/USDT', series(100, 1, 30)));

    expect(overbought).toMatchObject({ direction: 'SELL' });
    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', series(100, 0, 30)))).resolves
      .toEqual({ direction: 'HOLD', confidence: 0.5 });
  });
});

describe('SentimentSource', () => {
  function sentiment(body: unknown, status = 200) {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse(body, status));
    const source = new SentimentSource(
      config({ type: 'sentiment', params: { url: 'http://sentiment.test/score', apiKey: 'test-secret' } }),
      fetchFn
    );
    return { fetchFn, source };
  }

  it('posts the symbol and price and maps the score to a direction', async () => {
    const { fetchFn, source } = sentiment({ score: 0.6 });

    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', [100, 101]), signal)).resolves
      .toEqual({ direction: 'BUY', confidence: 0.6 });

    const call = fetchFn.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('http://sentiment.test/score');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({ symbol: 'BTC/USDT', price: 101 });
  });

  it('uses the reported confidence for a bearish score', async () => {
    const { source } = sentiment({ score: -0.4, confidence: 0.7 });

    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal)).resolves
      .toEqual({ direction: 'SELL', confidence: 0.7 });
  });

  it('reads a score inside the neutral band as hold', async () => {
    const { source } = sentiment({ score: 0.05 });

    const score = await source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal);

    expect(score).toMatchObject({ direction: 'HOLD' });
    expect('confidence' in score && score.confidence).toBeCloseTo(0.95, 10);
  });

  it('throws on an HTTP error or a malformed body', async () => {
    await expect(sentiment({}, 503).source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal))
      .rejects.toThrow('Sentiment API error: 503');
    await expect(sentiment({ score: 3 }).source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal))
      .rejects.toThrow(/^Malformed sentiment response/);
  });

  it('abstains without an endpoint', async () => {
    const source = new SentimentSource(config({ type: 'sentiment' }), vi.fn<typeof fetch>());

    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal)).resolves
      .toEqual({ noOpinion: true, reason: 'no sentiment endpoint configured' });
  });
});

describe('LLMSource', () => {
  function completion(content: string | null) {
    return { choices: [{ message: { content } }] };
  }

  function llm(body: unknown, status = 200) {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse(body, status));
    const source = new LLMSource(
      config({ type: 'llm', params: { apiKey: 'test-secret', baseURL: 'http://llm.test/v1', model: 'test-model' } }),
      fetchFn
    );
    return { fetchFn, source };
  }

  it('parses the model decision', async () => {
    const { fetchFn, source } = llm(completion('{"direction":"buy","confidence":0.7}'));

    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal)).resolves
      .toEqual({ direction: 'BUY', confidence: 0.7 });

    const call = fetchFn.mock.calls[0];
    expect(call?.[0]).toBe('http://llm.test/v1/chat/completions');
    expect(JSON.parse(String(call?.[1]?.body))).toMatchObject({ model: 'test-model', temperature: 0.1 });
  });

  it('rejects answers that are not a decision', async () => {
    await expect(llm(completion('I think it goes up')).source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal))
      .rejects.toThrow('LLM response is not JSON: I think it goes up');
    await expect(llm(completion('{"direction":"UP","confidence":0.7}')).source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal))
      .rejects.toThrow(/^Malformed LLM decision/);
    await expect(llm(completion(null)).source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal))
      .rejects.toThrow('No content in LLM response');
    await expect(llm({}, 429).source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal))
      .rejects.toThrow('LLM API error: 429');
  });

  it('summarises the market in the prompt', () => {
    const prompt = llm(completion(null)).source.buildPrompt('BTC/USDT', marketContext('BTC/USDT', [100], 0.0123));

    expect(prompt).toContain('Price: 100.00');
    expect(prompt).toContain('Volatility (std of returns): 0.0123');
    expect(prompt).toContain('RSI(14): N/A');
  });

  it('abstains without an API key', async () => {
    const source = new LLMSource(config({ type: 'llm' }), vi.fn<typeof fetch>());

    await expect(source.score('BTC/USDT', marketContext('BTC/USDT', [100]), signal)).resolves
      .toEqual({ noOpinion: true, reason: 'no API key configured' });
  });
});
