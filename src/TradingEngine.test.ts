import { describe, expect, it, vi } from 'vitest';
import type { Position, Trade } from './types/trading';
import type { CycleOutcome } from './TradingEngine';
import { ExchangeError } from './exchange/ExchangeError';
import { engineFixture } from './testing/fakes';

function executed(outcome: CycleOutcome) {
  if (outcome.outcome !== 'executed') {
    throw new Error(`expected an execution, got ${outcome.outcome}`);
  }
  return outcome.result;
}

describe('TradingEngine', () => {
  it('turns a 4-of-5 consensus into a sized, recorded position', async () => {
    const { engine, ledger } = engineFixture();
    const opened: Position[] = [];
    engine.on('position_opened', (position: Position) => opened.push(position));

    const result = executed(await engine.runCycle('BTC/USDT'));

    expect(result.position).toMatchObject({ symbol: 'BTC/USDT', side: 'long', entryPrice: 100, leverage: 2 });
    expect(result.position.quantity).toBeCloseTo(2.4, 8);
    expect(result.position.margin).toBeCloseTo(120, 8);
    expect(opened).toHaveLength(1);
    expect(ledger.entries().map(entry => entry.kind)).toEqual(['POSITION_OPENED']);
    expect(engine.getStatus()).toMatchObject({ openPositions: 1, equity: 1000, breaker: 'ARMED', halted: false });
    expect(engine.getStatus().usedMargin).toBeCloseTo(120, 8);
    expect(engine.getLastPrice('BTC/USDT')).toBe(100);
  });

  it('holds without a quorum and records nothing', async () => {
    const { engine, ledger, sources } = engineFixture();
    sources.forEach(source => {
      source.behaviour = { noOpinion: true, reason: 'warming up' };
    });

    const outcome = await engine.runCycle('BTC/USDT');

    expect(outcome).toMatchObject({ outcome: 'hold', hold: { reason: 'INSUFFICIENT_QUORUM', respondingSources: 0 } });
    expect(ledger.entries()).toEqual([]);
  });

  it('records a rejection when the symbol cap is reached', async () => {
    const { engine, ledger } = engineFixture();
    const rejections: string[] = [];
    engine.on('rejection', ({ reason }: { reason: string }) => rejections.push(reason));
    await engine.runCycle('BTC/USDT');

    const outcome = await engine.runCycle('BTC/USDT');

    expect(outcome).toMatchObject({ outcome: 'rejected', reason: 'symbol_position_cap' });
    expect(ledger.rejections().map(rejection => rejection.reason)).toEqual(['symbol_position_cap']);
    expect(engine.getRejections()).toHaveLength(1);
    expect(rejections).toEqual(['symbol_position_cap']);
  });

  it('closes the opposite position before reversing', async () => {
    const { engine, sources } = engineFixture();
    const trades: Trade[] = [];
    engine.on('trade', ({ trade }: { trade: Trade }) => trades.push(trade));
    await engine.runCycle('BTC/USDT');
    sources.forEach(source => {
      if (source.id !== 'e') source.behaviour = { direction: 'SELL', confidence: 0.8 };
    });

    const result = executed(await engine.runCycle('BTC/USDT'));

    expect(result.position.side).toBe('short');
    expect(trades.map(trade => trade.exitReason)).toEqual(['SIGNAL_REVERSAL']);
    expect(engine.getTrades()).toHaveLength(1);
    expect(engine.getPositions().map(position => position.side)).toEqual(['short']);
  });

  it('contains a failing venue to the cycle', async () => {
    const { engine, exchange } = engineFixture();
    exchange.fetchCandles = async () => {
      throw new Error('venue down');
    };

    await expect(engine.runCycle('BTC/USDT')).resolves.toEqual({ symbol: 'BTC/USDT', outcome: 'error', error: 'venue down' });
  });

  it('reports a fatal execution failure as an error outcome', async () => {
    const { engine, exchange, ledger } = engineFixture();
    exchange.placeSteps = [new ExchangeError({ kind: 'INVALID_REQUEST', message: 'lot size', exchange: 'fake' })];

    const outcome = await engine.runCycle('BTC/USDT');

    expect(outcome).toEqual({ symbol: 'BTC/USDT', outcome: 'error', error: 'EXECUTION_FATAL: lot size' });
    expect(ledger.rejections()[0]).toMatchObject({ reason: 'execution_failed', detail: 'lot size' });
  });

  it('skips a cycle while the previous one for the symbol is running', async () => {
    const { engine } = engineFixture();

    const first = engine.runCycle('BTC/USDT');
    const second = await engine.runCycle('BTC/USDT');

    expect(second).toEqual({ symbol: 'BTC/USDT', outcome: 'skipped', reason: 'previous cycle still running' });
    expect((await first).outcome).toBe('executed');
  });

  it('halts on an emergency stop until an operator resets', async () => {
    const { engine } = engineFixture();
    await engine.runCycle('BTC/USDT');

    const stop = await engine.emergencyStop({ closePositions: true, reason: 'operator halt' });

    expect(stop.state).toBe('TRIPPED_MANUAL');
    expect(stop.closed.map(trade => trade.exitReason)).toEqual(['MANUAL']);
    expect(engine.getStatus()).toMatchObject({ halted: true, breaker: 'TRIPPED_MANUAL', openPositions: 0 });
    expect(engine.getBreaker()).toMatchObject({ manual: true, reason: 'operator halt' });
    expect(await engine.runCycle('BTC/USDT')).toMatchObject({ outcome: 'rejected', reason: 'circuit_breaker_tripped' });

    const reset = await engine.resetBreaker('alice');

    expect(reset).toMatchObject({ reset: true, state: 'ARMED' });
    expect(engine.getStatus().halted).toBe(false);
    expect((await engine.runCycle('BTC/USDT')).outcome).toBe('executed');
  });

  it('closes a position an aborted order filled in part during an emergency stop', async () => {
    const { engine, exchange } = engineFixture();
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    exchange.placeSteps = [
      async request => {
        await gate;
        return exchange.accept(request, { status: 'partially_filled', filledQuantity: 1.2 });
      }
    ];

    const cycle = engine.runCycle('BTC/USDT');
    await vi.waitFor(() => expect(exchange.calls.placeOrder).toBe(1));
    const stopping = engine.emergencyStop({ closePositions: true, reason: 'operator halt' });
    release();
    const stop = await stopping;
    const outcome = await cycle;

    expect(outcome).toMatchObject({ outcome: 'executed', result: { filledSize: 1.2 } });
    expect(exchange.calls.cancelOrder).toBe(1);
    expect(stop.closed.map(trade => trade.exitReason)).toEqual(['MANUAL']);
    expect(engine.getStatus()).toMatchObject({ halted: true, openPositions: 0 });
  });

  it('restores positions and a manual trip from the ledger on start-up', async () => {
    const before = engineFixture();
    await before.engine.runCycle('BTC/USDT');
    await before.engine.emergencyStop();

    const { engine } = engineFixture({ storage: before.storage });
    await engine.initialize();

    expect(engine.getStatus()).toMatchObject({ halted: true, breaker: 'TRIPPED_MANUAL', openPositions: 1 });
    expect(engine.getPositions()[0]?.symbol).toBe('BTC/USDT');
    expect(engine.getBreaker().reason).toBe('emergency stop');
  });
});
