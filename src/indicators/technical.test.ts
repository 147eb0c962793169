import { describe, expect, it } from 'vitest';
import { TechnicalIndicators } from './technical';

describe('TechnicalIndicators', () => {
  it('seeds the EMA with the SMA', () => {
    expect(TechnicalIndicators.ema([1, 2, 3, 4, 5], 3)).toEqual([2, 3, 4]);
    expect(TechnicalIndicators.ema([1, 2], 3)).toEqual([]);
  });

  it('computes a simple moving average', () => {
    expect(TechnicalIndicators.sma([1, 2, 3, 4, 5], 3)).toEqual([2, 3, 4]);
  });

  it('smooths RSI the Wilder way', () => {
    expect(TechnicalIndicators.rsi([1, 2, 1, 2], 2)).toEqual([50, 75]);
    expect(TechnicalIndicators.rsi([5, 5, 5], 2)).toEqual([50]);
    expect(TechnicalIndicators.rsi([1, 2], 2)).toEqual([]);
  });

  it('collapses Bollinger bands on a flat series', () => {
    const bands = TechnicalIndicators.bollingerBands([10, 10, 10, 10], 3, 2);

    expect(bands).toEqual({ upper: [10, 10], middle: [10, 10], lower: [10, 10] });
  });

  it('measures rate of change over a lookback', () => {
    expect(TechnicalIndicators.rateOfChange([100, 105, 110], 2)).toBeCloseTo(0.1, 10);
    expect(TechnicalIndicators.rateOfChange([0, 5], 1)).toBeNull();
    expect(TechnicalIndicators.rateOfChange([100], 1)).toBeNull();
  });

  it('measures volatility as the deviation of returns', () => {
    expect(TechnicalIndicators.volatility([100, 110, 99])).toBeCloseTo(0.1, 10);
    expect(TechnicalIndicators.volatility([100, 110])).toBe(0);
  });
});
