import { z } from 'zod';
import type { MarketContext, Signal } from '../types/trading';
import { createLogger } from '../utils/logger';
import { SignalUnavailable, errorMessage } from '../utils/errors';
import { TimeoutError, withTimeout } from '../utils/timeout';
import type { WeightedSource } from '../managers/ConsensusAggregator';
import { isNoOpinion, type SignalSource, type SourceScore } from './SignalSource';

const scoreSchema: z.ZodType<SourceScore> = z.union([
  z.object({
    direction: z.enum(['BUY', 'SELL', 'HOLD']),
    confidence: z.number().min(0).max(1)
  }),
  z.object({ noOpinion: z.literal(true), reason: z.string() })
]);

export interface SourceFailure {
  sourceId: string;
  error: SignalUnavailable;
}

export interface Collection {
  signals: Signal[];
  abstained: string[];
  failures: SourceFailure[];
}

/**
 * Calls every enabled source concurrently under a per-call timeout. A
 * source that times out, throws or answers malformed data yields no signal
 * and so carries zero weight in the vote.
 */
export class SignalCollector {
  private logger = createLogger('SignalCollector');

  constructor(
    private readonly sources: readonly SignalSource[],
    private readonly timeoutMs: number,
    private readonly now: () => number = Date.now
  ) {}

  weightedSources(): WeightedSource[] {
    return this.sources
      .filter(source => source.isEnabled())
      .map(source => ({ id: source.id, weight: source.weight }));
  }

  async collect(symbol: string, context: MarketContext): Promise<Collection> {
    const active = this.sources.filter(source => source.isEnabled());
    const outcomes = await Promise.all(active.map(source => this.query(source, symbol, context)));

    const collection: Collection = { signals: [], abstained: [], failures: [] };
    outcomes.forEach((outcome, index) => {
      const sourceId = active[index].id;
      if (outcome instanceof SignalUnavailable) {
        collection.failures.push({ sourceId, error: outcome });
      } else if (outcome === null) {
        collection.abstained.push(sourceId);
      } else {
        collection.signals.push(outcome);
      }
    });

    this.logger.debug('Signals collected', {
      symbol,
      signals: collection.signals.map(s => `${s.sourceId}:${s.direction}@${s.confidence.toFixed(2)}`),
      abstained: collection.abstained,
      failed: collection.failures.map(f => f.sourceId)
    });
    return collection;
  }

  private async query(source: SignalSource, symbol: string, context: MarketContext): Promise<Signal | SignalUnavailable | null> {
    const controller = new AbortController();
    try {
      const raw: unknown = await withTimeout(
        source.score(symbol, context, controller.signal),
        this.timeoutMs,
        `source ${source.id}`
      );

      const parsed = scoreSchema.safeParse(raw);
      if (!parsed.success) {
        return this.unavailable(source.id, `malformed response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }

      const score = parsed.data;
      if (isNoOpinion(score)) {
        this.logger.debug('Source abstained', { source: source.id, symbol, reason: score.reason });
        return null;
      }

      return {
        sourceId: source.id,
        symbol,
        direction: score.direction,
        confidence: score.confidence,
        timestamp: this.now()
      };
    } catch (error) {
      if (error instanceof TimeoutError) {
        controller.abort();
      }
      return this.unavailable(source.id, errorMessage(error), error);
    }
  }

  private unavailable(sourceId: string, message: string, cause?: unknown): SignalUnavailable {
    const error = new SignalUnavailable(sourceId, message, { cause });
    this.logger.warn('Signal source unavailable', { source: sourceId, message });
    return error;
  }
}
