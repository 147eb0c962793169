import type { MarketContext } from '../types/trading';
import type { SignalSourceConfig } from '../types/config';
import { TechnicalIndicators } from '../indicators/technical';
import { BaseSignalSource, type SourceScore } from './SignalSource';

/**
 * EMA crossover confirmed by rate of change. Both must agree on direction;
 * confidence grows with the EMA spread and the size of the move.
 */
export class MomentumSource extends BaseSignalSource {
  private readonly fastPeriod: number;
  private readonly slowPeriod: number;
  private readonly rocPeriod: number;
  private readonly spreadScale: number;
  private readonly rocScale: number;

  constructor(config: SignalSourceConfig) {
    super(config);
    this.fastPeriod = this.numberParam('fastPeriod', 9);
    this.slowPeriod = this.numberParam('slowPeriod', 21);
    this.rocPeriod = this.numberParam('rocPeriod', 10);
    this.spreadScale = this.numberParam('spreadScale', 0.01);
    this.rocScale = this.numberParam('rocScale', 0.02);
  }

  async score(symbol: string, context: MarketContext): Promise<SourceScore> {
    const closes = context.candles.map(candle => candle.close);
    if (closes.length < Math.max(this.slowPeriod, this.rocPeriod + 1)) {
      return this.noOpinion(`need ${this.slowPeriod} candles, have ${closes.length}`);
    }

    const fast = TechnicalIndicators.ema(closes, this.fastPeriod);
    const slow = TechnicalIndicators.ema(closes, this.slowPeriod);
    const roc = TechnicalIndicators.rateOfChange(closes, this.rocPeriod);
    const fastLast = fast[fast.length - 1];
    const slowLast = slow[slow.length - 1];

    if (roc === null || slowLast === undefined || fastLast === undefined || slowLast === 0) {
      return this.noOpinion('indicators unavailable');
    }

    const spread = (fastLast - slowLast) / slowLast;
    const strength = Math.min(1, (Math.abs(spread) / this.spreadScale + Math.abs(roc) / this.rocScale) / 2);
    const confidence = 0.5 + 0.5 * strength;

    this.logger.debug('Momentum evaluated', { symbol, spread, roc, confidence });

    if (spread > 0 && roc > 0) return this.opinion('BUY', confidence);
    if (spread < 0 && roc < 0) return this.opinion('SELL', confidence);
    return this.opinion('HOLD', 0.5);
  }
}
