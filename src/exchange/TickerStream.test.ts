import { afterEach, describe, expect, it } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import type { Ticker } from './ExchangeAdapter';
import { TickerStream, parseTickerMessage, streamName } from './TickerStream';

const symbols = new Map([['BTCUSDT', 'BTC/USDT']]);

function tickerMessage(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ e: '24hrTicker', E: 5, s: 'BTCUSDT', c: '101.5', b: '101.4', a: '101.6', ...overrides });
}

describe('streamName', () => {
  it('lowercases the pair and drops the settlement suffix', () => {
    expect(streamName('BTC/USDT')).toBe('btcusdt@ticker');
    expect(streamName('ETH/USDT:USDT')).toBe('ethusdt@ticker');
  });
});

describe('parseTickerMessage', () => {
  it('maps a ticker payload to the subscribed symbol', () => {
    expect(parseTickerMessage(tickerMessage(), symbols)).toEqual({
      symbol: 'BTC/USDT',
      bid: 101.4,
      ask: 101.6,
      last: 101.5,
      timestamp: 5
    });
  });

  it('ignores other events, unknown symbols and garbage', () => {
    expect(parseTickerMessage(tickerMessage({ e: 'trade' }), symbols)).toBeNull();
    expect(parseTickerMessage(tickerMessage({ s: 'DOGEUSDT' }), symbols)).toBeNull();
    expect(parseTickerMessage('{"result":null,"id":1}', symbols)).toBeNull();
    expect(parseTickerMessage('not json', symbols)).toBeNull();
  });
});

describe('TickerStream', () => {
  let server: WebSocketServer | undefined;
  let stream: TickerStream | undefined;

  afterEach(async () => {
    stream?.disconnect();
    server?.clients.forEach(client => client.terminate());
    await new Promise<void>(resolve => (server ? server.close(() => resolve()) : resolve()));
  });

  it('subscribes on connect and emits parsed tickers', async () => {
    const wss = new WebSocketServer({ port: 0 });
    server = wss;
    await new Promise<void>(resolve => wss.once('listening', () => resolve()));
    const address = wss.address();
    if (typeof address === 'string') throw new Error(`unexpected address ${address}`);
    const { port } = address;

    const subscription = new Promise<unknown>(resolve => {
      wss.on('connection', (socket: WebSocket) => {
        socket.once('message', data => {
          resolve(JSON.parse(data.toString()));
          socket.send(tickerMessage());
        });
      });
    });

    const ticker = new TickerStream(`ws://127.0.0.1:${port}`);
    stream = ticker;
    ticker.subscribe('BTC/USDT');
    const received = new Promise<Ticker>(resolve => ticker.once('ticker', resolve));
    ticker.connect();

    expect(await subscription).toEqual({ method: 'SUBSCRIBE', params: ['btcusdt@ticker'], id: 1 });
    expect(await received).toMatchObject({ symbol: 'BTC/USDT', last: 101.5 });
  });
});
