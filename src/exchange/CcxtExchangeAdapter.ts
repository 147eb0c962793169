import * as ccxt from 'ccxt';
import type { Candle, Position } from '../types/trading';
import type { ExchangeConfig } from '../types/config';
import { createLogger } from '../utils/logger';
import { ExchangeError, toExchangeError } from './ExchangeError';
import {
  closingSide,
  type CloseFill,
  type ExchangeAdapter,
  type MarketLimits,
  type OrderRequest,
  type OrderSide,
  type OrderSnapshot,
  type OrderState,
  type Ticker
} from './ExchangeAdapter';

type ExchangeFactory = new (config: Record<string, unknown>) => ccxt.Exchange;

const EXCHANGES: Record<string, ExchangeFactory> = {
  binance: ccxt.binance,
  binanceusdm: ccxt.binanceusdm,
  bybit: ccxt.bybit,
  okx: ccxt.okx,
  kraken: ccxt.kraken,
  woo: ccxt.woo
};

// Order lookups by client id scan this far back
const CLIENT_ID_LOOKBACK_MS = 24 * 60 * 60 * 1000;

export function mapCcxtError(exchange: string, error: unknown): ExchangeError {
  if (error instanceof ExchangeError) return error;
  const message = error instanceof Error ? error.message : String(error);
  const detail = { exchange, message, originalMessage: message };

  // Subclasses before their parents: RateLimitExceeded and RequestTimeout are NetworkErrors
  if (error instanceof ccxt.RateLimitExceeded || error instanceof ccxt.DDoSProtection) {
    return new ExchangeError({ ...detail, kind: 'RATE_LIMITED' });
  }
  if (error instanceof ccxt.RequestTimeout) {
    return new ExchangeError({ ...detail, kind: 'TRANSIENT', ambiguous: true });
  }
  if (error instanceof ccxt.ExchangeNotAvailable || error instanceof ccxt.OnMaintenance) {
    return new ExchangeError({ ...detail, kind: 'TRANSIENT' });
  }
  if (error instanceof ccxt.NetworkError) {
    return new ExchangeError({ ...detail, kind: 'TRANSIENT', ambiguous: true });
  }
  if (error instanceof ccxt.InsufficientFunds) {
    return new ExchangeError({ ...detail, kind: 'INSUFFICIENT_FUNDS' });
  }
  if (
    error instanceof ccxt.InvalidOrder ||
    error instanceof ccxt.BadSymbol ||
    error instanceof ccxt.BadRequest ||
    error instanceof ccxt.PermissionDenied ||
    error instanceof ccxt.AuthenticationError ||
    error instanceof ccxt.ArgumentsRequired
  ) {
    return new ExchangeError({ ...detail, kind: 'INVALID_REQUEST' });
  }

  return toExchangeError(exchange, error);
}

function mapStatus(order: ccxt.Order): OrderState {
  const raw = (order.status ?? '').toString().toLowerCase();
  const filled = Number(order.filled ?? 0);
  const amount = Number(order.amount ?? 0);

  if (raw === 'closed') return 'filled';
  if (raw === 'canceled' || raw === 'cancelled') return 'canceled';
  if (raw === 'rejected') return 'rejected';
  if (raw === 'expired') return 'expired';
  if (filled > 0 && filled < amount) return 'partially_filled';
  return 'open';
}

function toSnapshot(symbol: string, order: ccxt.Order): OrderSnapshot {
  const average = order.average ?? order.price;
  const fee = order.fee?.cost;
  return {
    orderId: String(order.id),
    clientOrderId: order.clientOrderId ?? undefined,
    symbol,
    side: order.side === 'sell' ? 'sell' : 'buy',
    status: mapStatus(order),
    quantity: Number(order.amount ?? 0),
    filledQuantity: Number(order.filled ?? 0),
    averagePrice: average !== undefined && average > 0 ? Number(average) : null,
    fee: fee !== undefined ? Number(fee) : null,
    timestamp: Number(order.timestamp ?? Date.now())
  };
}

export class CcxtExchangeAdapter implements ExchangeAdapter {
  readonly name: string;
  private exchange: ccxt.Exchange;
  private logger = createLogger('CcxtExchangeAdapter');

  constructor(config: ExchangeConfig, factory?: ExchangeFactory) {
    const Exchange = factory ?? EXCHANGES[config.id];
    if (!Exchange) {
      throw new ExchangeError({
        kind: 'INVALID_REQUEST',
        message: `Unsupported exchange id ${config.id}`,
        exchange: config.id
      });
    }

    this.name = config.id;
    this.exchange = new Exchange({
      apiKey: config.apiKey,
      secret: config.apiSecret,
      password: config.password,
      enableRateLimit: true
    });

    if (config.testnet) {
      this.exchange.setSandboxMode(true);
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const mapped = mapCcxtError(this.name, error);
      this.logger.error(`${operation} failed`, mapped.toJSON());
      throw mapped;
    }
  }

  async initialize(): Promise<void> {
    await this.call('loadMarkets', () => this.exchange.loadMarkets());
    this.logger.info('Exchange initialized', {
      exchange: this.name,
      symbols: Object.keys(this.exchange.markets).length
    });
  }

  async getBalance(): Promise<Record<string, number>> {
    const balance = await this.call('fetchBalance', () => this.exchange.fetchBalance());
    const result: Record<string, number> = {};
    for (const [currency, free] of Object.entries(balance.free ?? {})) {
      const amount = Number(free);
      if (Number.isFinite(amount)) {
        result[currency] = amount;
      }
    }
    return result;
  }

  async getTicker(symbol: string): Promise<Ticker> {
    const ticker = await this.call('fetchTicker', () => this.exchange.fetchTicker(symbol));
    const last = Number(ticker.last ?? ticker.close ?? 0);
    return {
      symbol,
      bid: Number(ticker.bid ?? last),
      ask: Number(ticker.ask ?? last),
      last,
      timestamp: Number(ticker.timestamp ?? Date.now())
    };
  }

  async fetchCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
    const ohlcv = await this.call('fetchOHLCV', () =>
      this.exchange.fetchOHLCV(symbol, timeframe, undefined, limit)
    );

    return ohlcv.map(candle => ({
      symbol,
      timestamp: Number(candle[0]),
      open: Number(candle[1]),
      high: Number(candle[2]),
      low: Number(candle[3]),
      close: Number(candle[4]),
      volume: Number(candle[5])
    }));
  }

  async getMarketLimits(symbol: string): Promise<MarketLimits> {
    const market = this.exchange.markets[symbol];
    if (!market) return {};
    const maxLeverage = market.limits.leverage?.max;
    const minNotional = market.limits.cost?.min;
    return {
      maxLeverage: maxLeverage !== undefined ? Number(maxLeverage) : undefined,
      minNotional: minNotional !== undefined ? Number(minNotional) : undefined
    };
  }

  async placeOrder(request: OrderRequest): Promise<string> {
    const market = this.exchange.markets[request.symbol];
    const params: Record<string, unknown> = { clientOrderId: request.clientOrderId };
    if (market?.contract) {
      if (request.reduceOnly) {
        params.reduceOnly = true;
      } else if (this.exchange.has['setLeverage']) {
        await this.call('setLeverage', () => this.exchange.setLeverage(request.leverage, request.symbol));
      }
    }

    const order = await this.call('createOrder', () =>
      this.exchange.createOrder(
        request.symbol,
        request.type,
        request.side,
        request.quantity,
        request.type === 'limit' ? request.price : undefined,
        params
      )
    );

    this.logger.info('Order submitted', {
      symbol: request.symbol,
      side: request.side,
      quantity: request.quantity,
      orderId: order.id,
      clientOrderId: request.clientOrderId
    });

    return String(order.id);
  }

  async getOrderStatus(symbol: string, orderId: string): Promise<OrderSnapshot> {
    const order = await this.call('fetchOrder', () => this.exchange.fetchOrder(orderId, symbol));
    return toSnapshot(symbol, order);
  }

  async findOrderByClientId(symbol: string, clientOrderId: string): Promise<OrderSnapshot | null> {
    const since = Date.now() - CLIENT_ID_LOOKBACK_MS;
    const orders = this.exchange.has['fetchOrders']
      ? await this.call('fetchOrders', () => this.exchange.fetchOrders(symbol, since))
      : [
          ...(await this.call('fetchOpenOrders', () => this.exchange.fetchOpenOrders(symbol))),
          ...(await this.call('fetchClosedOrders', () => this.exchange.fetchClosedOrders(symbol, since)))
        ];

    const match = orders.find(order => order.clientOrderId === clientOrderId);
    return match ? toSnapshot(symbol, match) : null;
  }

  async cancelOrder(symbol: string, orderId: string): Promise<void> {
    await this.call('cancelOrder', () => this.exchange.cancelOrder(orderId, symbol));
  }

  async closePosition(position: Position, clientOrderId: string): Promise<CloseFill> {
    const side: OrderSide = closingSide(position);
    const market = this.exchange.markets[position.symbol];
    const params: Record<string, unknown> = { clientOrderId };
    if (market?.contract) params.reduceOnly = true;

    const order = await this.call('closePosition', () =>
      this.exchange.createOrder(position.symbol, 'market', side, position.quantity, undefined, params)
    );
    const settled = order.average !== undefined
      ? order
      : await this.call('fetchOrder', () => this.exchange.fetchOrder(String(order.id), position.symbol));
    const snapshot = toSnapshot(position.symbol, settled);

    const price = snapshot.averagePrice ?? (await this.getTicker(position.symbol)).last;
    return {
      orderId: snapshot.orderId,
      price,
      quantity: snapshot.filledQuantity > 0 ? snapshot.filledQuantity : position.quantity,
      fee: snapshot.fee
    };
  }
}
