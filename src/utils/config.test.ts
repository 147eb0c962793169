import { describe, expect, it } from 'vitest';
import { ConfigService } from '../services/ConfigService';
import { ConfigValidationError, loadConfig } from './config';

function fromEnv(values: Record<string, string>) {
  return loadConfig({}, ConfigService.fromValues(values));
}

describe('loadConfig', () => {
  it('applies the defaults for a moderate paper setup', () => {
    const config = fromEnv({});

    expect(config.trading).toMatchObject({ mode: 'paper', symbols: ['BTC/USDT', 'ETH/USDT'], initialEquity: 1000 });
    expect(config.consensus).toEqual({ confidenceThreshold: 0.6, minQuorum: 0.3 });
    expect(config.risk).toMatchObject({ riskLevel: 'MODERATE', baseLeverage: 2, maxLeverage: 10 });
    expect(config.breaker).toEqual({ dailyLossLimit: 0.05, maxConsecutiveLosses: 4 });
    expect(config.signals.sources.map(source => `${source.id}:${source.weight}`))
      .toEqual(['momentum:1', 'mean_reversion:1', 'sentiment:0.5', 'llm:1']);
  });

  it('derives base leverage from the risk level unless set', () => {
    expect(fromEnv({ RISK_LEVEL: 'aggressive' }).risk.baseLeverage).toBe(3);
    expect(fromEnv({ RISK_LEVEL: 'AGGRESSIVE', BASE_LEVERAGE: '4' }).risk.baseLeverage).toBe(4);
    expect(fromEnv({ RISK_LEVEL: 'reckless' }).risk.riskLevel).toBe('MODERATE');
  });

  it('parses weighted sources and their credentials', () => {
    const config = fromEnv({
      SIGNAL_SOURCES: 'momentum:2, llm:0.5',
      LLM_API_KEY: 'test-secret',
      MOMENTUM_ENABLED: 'false'
    });

    expect(config.signals.sources).toEqual([
      { id: 'momentum', type: 'momentum', weight: 2, enabled: false, params: {} },
      {
        id: 'llm',
        type: 'llm',
        weight: 0.5,
        enabled: true,
        params: { apiKey: 'test-secret', baseURL: 'https://api.openai.com/v1', model: 'gpt-4o-mini' }
      }
    ]);
  });

  it('merges overrides over the environment', () => {
    const config = loadConfig(
      { risk: { maxLeverage: 20 }, trading: { symbols: ['SOL/USDT'] } },
      ConfigService.fromValues({ MAX_LEVERAGE: '5' })
    );

    expect(config.risk.maxLeverage).toBe(20);
    expect(config.risk.baseLeverage).toBe(2);
    expect(config.trading.symbols).toEqual(['SOL/USDT']);
  });

  it('rejects a confidence threshold outside its band', () => {
    expect(() => fromEnv({ CONFIDENCE_THRESHOLD: '0.8' })).toThrow(/consensus\.confidenceThreshold/);
    expect(() => fromEnv({ CONFIDENCE_THRESHOLD: '0.5' })).toThrow(ConfigValidationError);
  });

  it('rejects inconsistent risk bounds', () => {
    expect(() => fromEnv({ BASE_LEVERAGE: '12' })).toThrow('risk.baseLeverage: baseLeverage exceeds maxLeverage');
    expect(() => fromEnv({ MIN_STOP_LOSS_PCT: '0.1' })).toThrow('risk.minStopLossPct: minStopLossPct exceeds maxStopLossPct');
  });

  it('rejects duplicate and unknown sources', () => {
    expect(() => fromEnv({ SIGNAL_SOURCES: 'momentum:1,momentum:2' }))
      .toThrow('signals.sources: duplicate source id momentum');
    expect(() => fromEnv({ SIGNAL_SOURCES: 'astrology:1' }))
      .toThrow('signals.sources: unknown source type astrology');
  });

  it('requires credentials in live mode', () => {
    expect(() => fromEnv({ TRADING_MODE: 'live' }))
      .toThrow('exchange: live mode requires EXCHANGE_API_KEY and EXCHANGE_API_SECRET');
    expect(fromEnv({ TRADING_MODE: 'live', EXCHANGE_API_KEY: 'test-key', EXCHANGE_API_SECRET: 'test-secret' }).trading.mode)
      .toBe('live');
  });
});

describe('ConfigService', () => {
  const service = ConfigService.fromValues({ FLAG: 'TRUE', COUNT: '12.5', BAD: 'abc', EMPTY: '', LIST: 'a, b,,c' });

  it('reads typed values with defaults', () => {
    expect(service.getBoolean('FLAG', false)).toBe(true);
    expect(service.getNumber('COUNT', 0)).toBe(12.5);
    expect(service.getNumber('BAD', 3)).toBe(3);
    expect(service.get('EMPTY', 'fallback')).toBe('fallback');
    expect(service.getList('LIST', [])).toEqual(['a', 'b', 'c']);
    expect(service.getList('MISSING', ['x'])).toEqual(['x']);
  });
});
