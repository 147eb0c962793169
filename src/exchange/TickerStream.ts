import WebSocket from 'ws';
import EventEmitter from 'events';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import type { Ticker } from './ExchangeAdapter';

// Binance-style 24h ticker payload
const tickerMessageSchema = z.object({
  e: z.literal('24hrTicker'),
  E: z.number(),
  s: z.string(),
  c: z.coerce.number(),
  b: z.coerce.number(),
  a: z.coerce.number()
});

export function streamName(symbol: string): string {
  return `${symbol.replace('/', '').replace(/:.*$/, '').toLowerCase()}@ticker`;
}

export function parseTickerMessage(raw: string, symbols: ReadonlyMap<string, string>): Ticker | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = tickerMessageSchema.safeParse(payload);
  if (!parsed.success) return null;

  const symbol = symbols.get(parsed.data.s.toUpperCase());
  if (!symbol) return null;

  return {
    symbol,
    bid: parsed.data.b,
    ask: parsed.data.a,
    last: parsed.data.c,
    timestamp: parsed.data.E
  };
}

/**
 * Public ticker stream used for push-driven exit checks. Emits `ticker`,
 * `connected` and `disconnected`; reconnects with exponential backoff and
 * closes the socket when a heartbeat ping goes unanswered.
 */
export class TickerStream extends EventEmitter {
  private ws: WebSocket | null = null;
  private logger = createLogger('TickerStream');
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private pingInterval: NodeJS.Timeout | null = null;
  private symbols = new Map<string, string>(); // BTCUSDT -> BTC/USDT
  private reconnectAttempts = 0;
  private stopped = false;
  private nextRequestId = 1;

  constructor(private url: string, private heartbeatMs = 20000) {
    super();
  }

  connect(): void {
    this.stopped = false;
    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on('open', () => {
      this.logger.info('Ticker stream connected', { url: this.url });
      this.reconnectAttempts = 0;
      this.emit('connected');
      this.startHeartbeat(ws);
      this.sendSubscription('SUBSCRIBE', [...this.symbols.values()]);
    });

    ws.on('message', (data: WebSocket.RawData) => {
      const ticker = parseTickerMessage(data.toString(), this.symbols);
      if (ticker) {
        this.emit('ticker', ticker);
      }
    });

    ws.on('error', error => {
      this.logger.error('Ticker stream error', error);
    });

    ws.on('close', () => {
      this.logger.warn('Ticker stream disconnected');
      this.stopHeartbeat();
      this.emit('disconnected');
      if (!this.stopped) {
        this.scheduleReconnect();
      }
    });
  }

  subscribe(symbol: string): void {
    const key = streamName(symbol).replace('@ticker', '').toUpperCase();
    this.symbols.set(key, symbol);
    this.sendSubscription('SUBSCRIBE', [symbol]);
  }

  unsubscribe(symbol: string): void {
    const key = streamName(symbol).replace('@ticker', '').toUpperCase();
    this.symbols.delete(key);
    this.sendSubscription('UNSUBSCRIBE', [symbol]);
  }

  private sendSubscription(method: 'SUBSCRIBE' | 'UNSUBSCRIBE', symbols: string[]): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN || symbols.length === 0) {
      return;
    }
    this.ws.send(JSON.stringify({
      method,
      params: symbols.map(streamName),
      id: this.nextRequestId++
    }));
  }

  private startHeartbeat(ws: WebSocket): void {
    let pongReceived = true;
    ws.on('pong', () => {
      pongReceived = true;
    });

    this.pingInterval = setInterval(() => {
      if (ws.readyState !== WebSocket.OPEN) return;
      if (!pongReceived) {
        this.logger.warn('No pong received, reconnecting');
        ws.terminate();
        return;
      }
      pongReceived = false;
      ws.ping();
    }, this.heartbeatMs);
  }

  private stopHeartbeat(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimeout) {
      return;
    }

    const delay = Math.min(1000 * Math.pow(2, this.reconnectAttempts) + Math.random() * 1000, 30000);
    this.reconnectAttempts++;
    this.logger.info(`Scheduling reconnect attempt ${this.reconnectAttempts} in ${Math.round(delay)}ms`);

    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.connect();
    }, delay);
  }

  disconnect(): void {
    this.stopped = true;
    this.stopHeartbeat();

    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }

    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
  }
}
