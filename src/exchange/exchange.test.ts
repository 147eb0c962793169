import * as ccxt from 'ccxt';
import { beforeEach, describe, expect, it } from 'vitest';
import type { OrderRequest } from './ExchangeAdapter';
import { ExchangeError, toExchangeError } from './ExchangeError';
import { mapCcxtError } from './CcxtExchangeAdapter';
import { PaperExchange } from './PaperExchange';
import { FakeExchange, T0, position } from '../testing/fakes';

function order(overrides: Partial<OrderRequest> = {}): OrderRequest {
  return {
    symbol: 'BTC/USDT',
    side: 'buy',
    type: 'market',
    quantity: 2,
    leverage: 2,
    clientOrderId: 'cid-1',
    ...overrides
  };
}

describe('toExchangeError', () => {
  it('marks timeouts as ambiguous transient failures', () => {
    const error = toExchangeError('venue', new Error('connect ETIMEDOUT 10.0.0.1:443'));

    expect(error).toMatchObject({ kind: 'TRANSIENT', ambiguous: true, retryable: true, message: 'Request timeout to venue' });
  });

  it('treats a refused connection as safe to resend', () => {
    expect(toExchangeError('venue', new Error('connect ECONNREFUSED'))).toMatchObject({ kind: 'TRANSIENT', ambiguous: false });
    expect(toExchangeError('venue', new Error('socket hang up'))).toMatchObject({ kind: 'TRANSIENT', ambiguous: true });
  });

  it('passes typed errors through and wraps the rest as unknown', () => {
    const typed = new ExchangeError({ kind: 'RATE_LIMITED', message: 'slow down', exchange: 'venue' });

    expect(toExchangeError('venue', typed)).toBe(typed);
    expect(toExchangeError('venue', 'weird')).toMatchObject({ kind: 'UNKNOWN', retryable: false, message: 'weird' });
  });
});

describe('mapCcxtError', () => {
  it('maps library errors to retry semantics', () => {
    expect(mapCcxtError('binance', new ccxt.RateLimitExceeded('429'))).toMatchObject({ kind: 'RATE_LIMITED', ambiguous: false });
    expect(mapCcxtError('binance', new ccxt.RequestTimeout('timeout'))).toMatchObject({ kind: 'TRANSIENT', ambiguous: true });
    expect(mapCcxtError('binance', new ccxt.ExchangeNotAvailable('503'))).toMatchObject({ kind: 'TRANSIENT', ambiguous: false });
    expect(mapCcxtError('binance', new ccxt.InsufficientFunds('balance'))).toMatchObject({ kind: 'INSUFFICIENT_FUNDS' });
    expect(mapCcxtError('binance', new ccxt.InvalidOrder('lot size'))).toMatchObject({ kind: 'INVALID_REQUEST', retryable: false });
    expect(mapCcxtError('binance', new ccxt.AuthenticationError('bad key'))).toMatchObject({ kind: 'INVALID_REQUEST' });
  });
});

describe('PaperExchange', () => {
  let market: FakeExchange;
  let paper: PaperExchange;

  beforeEach(() => {
    market = new FakeExchange();
    paper = new PaperExchange(market, { takerFeeRate: 0.001, initialBalance: 1000, now: () => T0 });
  });

  it('fills a market order at the touch and charges the taker fee', async () => {
    const orderId = await paper.placeOrder(order());

    const snapshot = await paper.getOrderStatus('BTC/USDT', orderId);
    expect(snapshot).toMatchObject({ status: 'filled', filledQuantity: 2, averagePrice: 100, timestamp: T0 });
    expect(snapshot.fee).toBeCloseTo(0.2, 10);
    expect((await paper.getBalance()).USDT).toBeCloseTo(999.8, 10);
    expect(await paper.findOrderByClientId('BTC/USDT', 'cid-1')).toMatchObject({ orderId });
    expect(await paper.findOrderByClientId('BTC/USDT', 'cid-2')).toBeNull();
  });

  it('rests a limit order that does not cross until cancelled', async () => {
    const orderId = await paper.placeOrder(order({ type: 'limit', price: 99 }));

    expect(await paper.getOrderStatus('BTC/USDT', orderId)).toMatchObject({ status: 'open', filledQuantity: 0, averagePrice: null });

    await paper.cancelOrder('BTC/USDT', orderId);
    expect((await paper.getOrderStatus('BTC/USDT', orderId)).status).toBe('canceled');
  });

  it('keeps only the most recent settled orders and every resting one', async () => {
    paper = new PaperExchange(market, { takerFeeRate: 0, initialBalance: 1000, now: () => T0, settledOrderRetention: 2 });
    const resting = await paper.placeOrder(order({ type: 'limit', price: 99, clientOrderId: 'rest' }));
    const first = await paper.placeOrder(order({ quantity: 1, clientOrderId: 'cid-a' }));
    await paper.placeOrder(order({ quantity: 1, clientOrderId: 'cid-b' }));
    await paper.placeOrder(order({ quantity: 1, clientOrderId: 'cid-c' }));

    await expect(paper.getOrderStatus('BTC/USDT', first)).rejects.toThrow(`Unknown order ${first}`);
    expect(await paper.findOrderByClientId('BTC/USDT', 'cid-a')).toBeNull();
    expect((await paper.getOrderStatus('BTC/USDT', resting)).status).toBe('open');

    await paper.cancelOrder('BTC/USDT', resting);

    expect(await paper.findOrderByClientId('BTC/USDT', 'cid-b')).toBeNull();
    expect(await paper.findOrderByClientId('BTC/USDT', 'cid-c')).toMatchObject({ status: 'filled' });
    expect((await paper.getOrderStatus('BTC/USDT', resting)).status).toBe('canceled');
  });

  it('fills a crossing limit order at its limit price', async () => {
    const orderId = await paper.placeOrder(order({ type: 'limit', price: 101 }));

    expect(await paper.getOrderStatus('BTC/USDT', orderId)).toMatchObject({ status: 'filled', averagePrice: 101 });
  });

  it('rejects orders it cannot accept', async () => {
    await expect(paper.placeOrder(order({ quantity: 0 }))).rejects.toMatchObject({ kind: 'INVALID_REQUEST' });
    await expect(paper.placeOrder(order({ quantity: 30, leverage: 1 }))).rejects.toMatchObject({ kind: 'INSUFFICIENT_FUNDS' });
    await expect(paper.getOrderStatus('BTC/USDT', 'missing')).rejects.toThrow('Unknown order missing');
  });

  it('settles a closed position into the balance', async () => {
    market.setPrice('BTC/USDT', 110);

    const fill = await paper.closePosition(position(), 'xpos1c1');

    expect(await paper.findOrderByClientId('BTC/USDT', 'xpos1c1')).toMatchObject({
      orderId: fill.orderId,
      side: 'sell',
      status: 'filled',
      averagePrice: 110
    });
    expect(fill.price).toBe(110);
    expect(fill.quantity).toBe(2);
    expect(fill.fee).toBeCloseTo(0.22, 10);
    expect((await paper.getBalance()).USDT).toBeCloseTo(1019.78, 10);
  });
});
