import { describe, expect, it } from 'vitest';
import type { SignalSourceConfig, SignalSourceType } from '../types/config';
import { createSignalSources } from './registry';
import { MomentumSource } from './MomentumSource';
import { MeanReversionSource } from './MeanReversionSource';
import { SentimentSource } from './SentimentSource';
import { LLMSource } from './LLMSource';

function source(id: string, type: SignalSourceType, params: SignalSourceConfig['params'] = {}, enabled = true): SignalSourceConfig {
  return { id, type, weight: 1, enabled, params };
}

describe('createSignalSources', () => {
  it('builds one source per enabled, usable entry', () => {
    const sources = createSignalSources([
      source('mom', 'momentum'),
      source('rev', 'mean_reversion'),
      source('news', 'sentiment', { url: 'http://sentiment.test' }),
      source('model', 'llm', { apiKey: 'test-secret' })
    ]);

    expect(sources.map(s => s.id)).toEqual(['mom', 'rev', 'news', 'model']);
    expect(sources[0]).toBeInstanceOf(MomentumSource);
    expect(sources[1]).toBeInstanceOf(MeanReversionSource);
    expect(sources[2]).toBeInstanceOf(SentimentSource);
    expect(sources[3]).toBeInstanceOf(LLMSource);
  });

  it('skips disabled sources and remote sources without credentials', () => {
    const sources = createSignalSources([
      source('off', 'momentum', {}, false),
      source('news', 'sentiment'),
      source('model', 'llm'),
      source('mom', 'momentum')
    ]);

    expect(sources.map(s => s.id)).toEqual(['mom']);
  });
});
