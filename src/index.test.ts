import { describe, expect, it } from 'vitest';
import { createApplication } from './index';
import { TradingEngine } from './TradingEngine';
import { testConfig } from './testing/fakes';

describe('createApplication', () => {
  it('wires a paper engine over an in-memory ledger without starting it', () => {
    const { engine, server, config } = createApplication(testConfig());

    expect(engine).toBeInstanceOf(TradingEngine);
    expect(engine.getStatus()).toMatchObject({ isRunning: false, mode: 'paper', symbols: ['BTC/USDT'], equity: 1000 });
    expect(engine.collector.weightedSources().map(source => source.id)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(config.ledger.path).toBe(':memory:');
    expect(server.app).toBeDefined();
  });
});
