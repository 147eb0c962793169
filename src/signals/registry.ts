import type { SignalSourceConfig, SignalSourceType } from '../types/config';
import { createLogger } from '../utils/logger';
import type { SignalSource } from './SignalSource';
import { MomentumSource } from './MomentumSource';
import { MeanReversionSource } from './MeanReversionSource';
import { SentimentSource } from './SentimentSource';
import { LLMSource } from './LLMSource';

const logger = createLogger('SignalRegistry');

export interface RegistryDeps {
  fetchFn?: typeof fetch;
}

type SourceFactory = (config: SignalSourceConfig, deps: RegistryDeps) => SignalSource;

const FACTORIES: Record<SignalSourceType, SourceFactory> = {
  momentum: config => new MomentumSource(config),
  mean_reversion: config => new MeanReversionSource(config),
  sentiment: (config, deps) => new SentimentSource(config, deps.fetchFn),
  llm: (config, deps) => new LLMSource(config, deps.fetchFn)
};

// Remote sources without credentials would never answer and only dilute the quorum
function missingRequirement(config: SignalSourceConfig): string | null {
  if (config.type === 'sentiment' && !config.params.url) return 'SENTIMENT_URL';
  if (config.type === 'llm' && !config.params.apiKey) return 'LLM_API_KEY';
  return null;
}

/** Instantiates the enabled, usable sources named in the configuration. */
export function createSignalSources(configs: readonly SignalSourceConfig[], deps: RegistryDeps = {}): SignalSource[] {
  const sources: SignalSource[] = [];

  for (const config of configs) {
    if (!config.enabled) {
      logger.info('Signal source disabled', { id: config.id });
      continue;
    }

    const missing = missingRequirement(config);
    if (missing) {
      logger.warn(`Signal source ${config.id} skipped: ${missing} not set`);
      continue;
    }

    sources.push(FACTORIES[config.type](config, deps));
  }

  logger.info('Signal sources loaded', {
    sources: sources.map(source => `${source.id}:${source.weight}`)
  });
  return sources;
}
