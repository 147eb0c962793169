export class TechnicalIndicators {
  // Exponential Moving Average, seeded with the SMA of the first period
  static ema(values: number[], period: number): number[] {
    if (period <= 0 || values.length < period) return [];

    const multiplier = 2 / (period + 1);
    let current = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
    const ema: number[] = [current];

    for (let i = period; i < values.length; i++) {
      current = (values[i] - current) * multiplier + current;
      ema.push(current);
    }

    return ema;
  }

  // Simple Moving Average
  static sma(values: number[], period: number): number[] {
    if (period <= 0 || values.length < period) return [];

    const sma: number[] = [];
    for (let i = period - 1; i < values.length; i++) {
      let sum = 0;
      for (let j = 0; j < period; j++) {
        sum += values[i - j];
      }
      sma.push(sum / period);
    }

    return sma;
  }

  // Relative Strength Index with Wilder smoothing
  static rsi(values: number[], period: number = 14): number[] {
    if (values.length < period + 1) return [];

    let gains = 0;
    let losses = 0;
    for (let i = 1; i <= period; i++) {
      const change = values[i] - values[i - 1];
      if (change > 0) gains += change;
      else losses -= change;
    }

    let avgGain = gains / period;
    let avgLoss = losses / period;
    const toRsi = (): number => (avgLoss === 0 ? (avgGain === 0 ? 50 : 100) : 100 - 100 / (1 + avgGain / avgLoss));
    const rsi: number[] = [toRsi()];

    for (let i = period + 1; i < values.length; i++) {
      const change = values[i] - values[i - 1];
      avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
      avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
      rsi.push(toRsi());
    }

    return rsi;
  }

  static standardDeviation(values: number[], mean?: number): number {
    if (values.length === 0) return 0;
    const avg = mean ?? values.reduce((a, b) => a + b, 0) / values.length;
    const squareDiffs = values.map(value => Math.pow(value - avg, 2));
    return Math.sqrt(squareDiffs.reduce((a, b) => a + b, 0) / values.length);
  }

  // Bollinger Bands, aligned with the SMA output
  static bollingerBands(values: number[], period: number = 20, stdDev: number = 2): {
    upper: number[];
    middle: number[];
    lower: number[];
  } {
    const middle = this.sma(values, period);
    const upper: number[] = [];
    const lower: number[] = [];

    middle.forEach((avg, index) => {
      const slice = values.slice(index, index + period);
      const std = this.standardDeviation(slice, avg);
      upper.push(avg + stdDev * std);
      lower.push(avg - stdDev * std);
    });

    return { upper, middle, lower };
  }

  // Fractional change over `period` bars
  static rateOfChange(values: number[], period: number): number | null {
    if (period <= 0 || values.length <= period) return null;
    const past = values[values.length - 1 - period];
    if (past === 0) return null;
    return (values[values.length - 1] - past) / past;
  }

  // Standard deviation of simple returns over the last `period` bars
  static volatility(values: number[], period: number = 20): number {
    const window = values.slice(-(period + 1));
    const returns: number[] = [];
    for (let i = 1; i < window.length; i++) {
      if (window[i - 1] > 0) {
        returns.push((window[i] - window[i - 1]) / window[i - 1]);
      }
    }
    return returns.length > 1 ? this.standardDeviation(returns) : 0;
  }
}
