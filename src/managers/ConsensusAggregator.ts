import type { Hold, HoldReason, Signal, TradeIntent } from '../types/trading';
import type { ConsensusParams } from '../types/config';
import { createLogger } from '../utils/logger';

export interface WeightedSource {
  id: string;
  weight: number;
}

function directionSign(signal: Signal): number {
  if (signal.direction === 'BUY') return 1;
  if (signal.direction === 'SELL') return -1;
  return 0;
}

/**
 * Weighted vote over the sources that answered. A source that failed simply
 * has no signal here; it drops out of both numerator and denominator.
 *
 *   score = Σ(wᵢ·cᵢ·sign(dᵢ)) / Σ(wᵢ)
 */
export class ConsensusAggregator {
  private logger = createLogger('ConsensusAggregator');
  private readonly weights: Map<string, number>;

  constructor(
    private readonly params: ConsensusParams,
    sources: readonly WeightedSource[],
    private readonly now: () => number = Date.now
  ) {
    this.weights = new Map(sources.map(source => [source.id, source.weight]));
  }

  get configuredSources(): number {
    return this.weights.size;
  }

  aggregate(symbol: string, signals: readonly Signal[]): TradeIntent | Hold {
    const responding = new Map<string, Signal>();
    for (const signal of signals) {
      if (signal.symbol === symbol && this.weights.has(signal.sourceId) && !responding.has(signal.sourceId)) {
        responding.set(signal.sourceId, signal);
      }
    }

    const configured = this.weights.size;
    const hold = (reason: HoldReason, score: number): Hold => {
      this.logger.debug('Holding', { symbol, reason, score, responding: responding.size, configured });
      return Object.freeze({
        kind: 'hold',
        symbol,
        reason,
        score,
        respondingSources: responding.size,
        configuredSources: configured,
        timestamp: this.now()
      });
    };

    if (configured === 0 || responding.size / configured < this.params.minQuorum) {
      return hold('INSUFFICIENT_QUORUM', 0);
    }

    let weighted = 0;
    let totalWeight = 0;
    for (const signal of responding.values()) {
      const weight = this.weights.get(signal.sourceId) ?? 0;
      weighted += weight * signal.confidence * directionSign(signal);
      totalWeight += weight;
    }

    if (totalWeight <= 0) {
      return hold('NO_WEIGHT', 0);
    }

    const score = weighted / totalWeight;
    const threshold = this.params.confidenceThreshold;
    if (score <= threshold && score >= -threshold) {
      return hold('BELOW_THRESHOLD', score);
    }

    const direction = score > 0 ? 'BUY' : 'SELL';
    const contributing = [...responding.values()].filter(signal => signal.direction === direction).length;

    const intent: TradeIntent = Object.freeze({
      symbol,
      direction,
      aggregateConfidence: Math.abs(score),
      contributingSignalCount: contributing,
      timestamp: this.now()
    });

    this.logger.info('Consensus reached', {
      symbol,
      direction,
      score: Number(score.toFixed(4)),
      contributing,
      responding: responding.size
    });

    return intent;
  }
}
