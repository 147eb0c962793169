import type { Direction, MarketContext } from '../types/trading';
import type { SignalSourceConfig, SignalSourceType } from '../types/config';
import { createLogger, type Logger } from '../utils/logger';

export interface SourceOpinion {
  direction: Direction;
  confidence: number;
}

export interface NoOpinion {
  noOpinion: true;
  reason: string;
}

export type SourceScore = SourceOpinion | NoOpinion;

export function isNoOpinion(score: SourceScore): score is NoOpinion {
  return 'noOpinion' in score;
}

export interface SignalSource {
  readonly id: string;
  readonly type: SignalSourceType;
  readonly weight: number;
  isEnabled(): boolean;
  score(symbol: string, context: MarketContext, signal: AbortSignal): Promise<SourceScore>;
}

export abstract class BaseSignalSource implements SignalSource {
  protected logger: Logger;
  protected enabled: boolean;

  constructor(protected readonly config: SignalSourceConfig) {
    this.enabled = config.enabled;
    this.logger = createLogger(`Source:${config.id}`);
  }

  get id(): string {
    return this.config.id;
  }

  get type(): SignalSourceType {
    return this.config.type;
  }

  get weight(): number {
    return this.config.weight;
  }

  abstract score(symbol: string, context: MarketContext, signal: AbortSignal): Promise<SourceScore>;

  enable(): void {
    this.enabled = true;
    this.logger.info('Source enabled');
  }

  disable(): void {
    this.enabled = false;
    this.logger.info('Source disabled');
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  protected opinion(direction: Direction, confidence: number): SourceOpinion {
    return { direction, confidence: Math.max(0, Math.min(1, confidence)) };
  }

  protected noOpinion(reason: string): NoOpinion {
    return { noOpinion: true, reason };
  }

  protected numberParam(key: string, defaultValue: number): number {
    const value = this.config.params[key];
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) return Number(value);
    return defaultValue;
  }

  protected stringParam(key: string, defaultValue = ''): string {
    const value = this.config.params[key];
    return typeof value === 'string' && value.length > 0 ? value : defaultValue;
  }
}
