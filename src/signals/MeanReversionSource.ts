import type { MarketContext } from '../types/trading';
import type { SignalSourceConfig } from '../types/config';
import { TechnicalIndicators } from '../indicators/technical';
import { BaseSignalSource, type SourceScore } from './SignalSource';

// Oversold RSI favours a bounce, overbought a pullback; a band breach adds conviction
export class MeanReversionSource extends BaseSignalSource {
  private readonly rsiPeriod: number;
  private readonly oversold: number;
  private readonly overbought: number;
  private readonly bbPeriod: number;
  private readonly bbStdDev: number;

  constructor(config: SignalSourceConfig) {
    super(config);
    this.rsiPeriod = this.numberParam('rsiPeriod', 14);
    this.oversold = this.numberParam('oversold', 30);
    this.overbought = this.numberParam('overbought', 70);
    this.bbPeriod = this.numberParam('bbPeriod', 20);
    this.bbStdDev = this.numberParam('bbStdDev', 2);
  }

  async score(symbol: string, context: MarketContext): Promise<SourceScore> {
    const closes = context.candles.map(candle => candle.close);
    if (closes.length < Math.max(this.rsiPeriod + 1, this.bbPeriod)) {
      return this.noOpinion(`need ${Math.max(this.rsiPeriod + 1, this.bbPeriod)} candles, have ${closes.length}`);
    }

    const rsi = TechnicalIndicators.rsi(closes, this.rsiPeriod);
    const bands = TechnicalIndicators.bollingerBands(closes, this.bbPeriod, this.bbStdDev);
    const currentRsi = rsi[rsi.length - 1];
    const upper = bands.upper[bands.upper.length - 1];
    const lower = bands.lower[bands.lower.length - 1];
    const price = closes[closes.length - 1];

    if (currentRsi === undefined || upper === undefined || lower === undefined) {
      return this.noOpinion('indicators unavailable');
    }

    this.logger.debug('Mean reversion evaluated', { symbol, rsi: currentRsi, upper, lower, price });

    if (currentRsi < this.oversold) {
      const depth = (this.oversold - currentRsi) / this.oversold;
      return this.opinion('BUY', 0.5 + 0.4 * depth + (price <= lower ? 0.1 : 0));
    }
    if (currentRsi > this.overbought) {
      const depth = (currentRsi - this.overbought) / (100 - this.overbought);
      return this.opinion('SELL', 0.5 + 0.4 * depth + (price >= upper ? 0.1 : 0));
    }
    return this.opinion('HOLD', 0.5);
  }
}
