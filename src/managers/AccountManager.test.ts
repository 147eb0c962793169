import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryLedgerStorage, TradeLedger } from '../services/TradeLedger';
import { AccountManager } from './AccountManager';
import { FakeClock, position, trade } from '../testing/fakes';

const limits = { maxPositionsPerSymbol: 1, maxOpenPositions: 2 };

describe('AccountManager', () => {
  let clock: FakeClock;
  let ledger: TradeLedger;
  let accounts: AccountManager;

  beforeEach(() => {
    clock = new FakeClock();
    ledger = new TradeLedger(new MemoryLedgerStorage(), { initialEquity: 1000, now: clock.now });
    accounts = new AccountManager(ledger, clock.now);
  });

  it('counts pending reservations against the symbol cap', async () => {
    const first = await accounts.reserve('BTC/USDT', 100, limits);
    const second = await accounts.reserve('BTC/USDT', 100, limits);

    expect(first.ok).toBe(true);
    expect(second).toEqual({ ok: false, reason: 'symbol_position_cap', detail: '1 open or pending on BTC/USDT' });
    expect(accounts.reservedMargin()).toBe(100);
  });

  it('counts open positions against the portfolio cap', async () => {
    await ledger.appendPositionOpened(position({ id: 'p1', symbol: 'ETH/USDT' }), 0);
    await accounts.reserve('SOL/USDT', 100, limits);

    const result = await accounts.reserve('BTC/USDT', 100, limits);

    expect(result).toEqual({ ok: false, reason: 'portfolio_position_cap', detail: '2 open or pending positions' });
  });

  it('does not let concurrent reservations spend the same margin', async () => {
    const wide = { maxPositionsPerSymbol: 5, maxOpenPositions: 5 };

    const results = await Promise.all([
      accounts.reserve('BTC/USDT', 600, wide),
      accounts.reserve('ETH/USDT', 600, wide)
    ]);

    expect(results.map(result => result.ok)).toEqual([true, false]);
    expect(results[1]).toMatchObject({ reason: 'insufficient_margin', detail: 'requires 600.00, available 400.00' });
  });

  it('frees margin on release', async () => {
    const result = await accounts.reserve('BTC/USDT', 100, limits);
    if (!result.ok) throw new Error('expected a reservation');

    accounts.release(result.reservation);

    expect(accounts.reservedMargin()).toBe(0);
    expect((await accounts.reserve('BTC/USDT', 100, limits)).ok).toBe(true);
  });

  it('converts a reservation into position margin on open', async () => {
    const result = await accounts.reserve('BTC/USDT', 100, limits);
    if (!result.ok) throw new Error('expected a reservation');

    const state = await accounts.recordOpen(position(), 0.1, 'cid-1', result.reservation);

    expect(accounts.reservedMargin()).toBe(0);
    expect(state.usedMargin).toBe(100);
    expect(accounts.openPositions('BTC/USDT').map(p => p.id)).toEqual(['pos-1']);
    expect(accounts.openPositions('ETH/USDT')).toEqual([]);
  });

  it('records closes through the ledger', async () => {
    await accounts.recordOpen(position(), 0.1, 'cid-1');

    const state = await accounts.recordClose(trade({ realizedPnl: -4 }));

    expect(state.equity).toBe(996);
    expect(state.openPositions).toEqual([]);
  });
});
