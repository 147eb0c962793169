import { randomUUID } from 'crypto';
import type { Candle, Position } from '../types/trading';
import { createLogger } from '../utils/logger';
import { ExchangeError } from './ExchangeError';
import {
  closingSide,
  isTerminal,
  type CloseFill,
  type ExchangeAdapter,
  type MarketLimits,
  type OrderRequest,
  type OrderSnapshot,
  type Ticker
} from './ExchangeAdapter';

export type MarketDataSource = Pick<
  ExchangeAdapter,
  'initialize' | 'getTicker' | 'fetchCandles' | 'getMarketLimits'
>;

export interface PaperExchangeOptions {
  takerFeeRate: number;
  quoteCurrency?: string;
  initialBalance: number;
  now?: () => number;
  // Filled and cancelled orders kept for status and client id lookups
  settledOrderRetention?: number;
}

const DEFAULT_SETTLED_ORDER_RETENTION = 500;

/**
 * Simulated venue: market data comes from a real source, orders fill
 * immediately at the touch (market) or at the limit price when it crosses.
 * Only the quote balance is tracked; positions are margin-based.
 */
export class PaperExchange implements ExchangeAdapter {
  readonly name = 'paper';
  private logger = createLogger('PaperExchange');
  private orders = new Map<string, OrderSnapshot>();
  private settled: string[] = [];
  private balance: number;
  private quoteCurrency: string;
  private now: () => number;

  constructor(private market: MarketDataSource, private options: PaperExchangeOptions) {
    this.balance = options.initialBalance;
    this.quoteCurrency = options.quoteCurrency ?? 'USDT';
    this.now = options.now ?? Date.now;
  }

  async initialize(): Promise<void> {
    await this.market.initialize();
    this.logger.info('Paper trading enabled', { balance: this.balance, currency: this.quoteCurrency });
  }

  async getBalance(): Promise<Record<string, number>> {
    return { [this.quoteCurrency]: this.balance };
  }

  getTicker(symbol: string): Promise<Ticker> {
    return this.market.getTicker(symbol);
  }

  fetchCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
    return this.market.fetchCandles(symbol, timeframe, limit);
  }

  getMarketLimits(symbol: string): Promise<MarketLimits> {
    return this.market.getMarketLimits(symbol);
  }

  async placeOrder(request: OrderRequest): Promise<string> {
    if (request.quantity <= 0) {
      throw new ExchangeError({ kind: 'INVALID_REQUEST', message: 'Order quantity must be positive', exchange: this.name });
    }

    const ticker = await this.market.getTicker(request.symbol);
    const touch = request.side === 'buy' ? ticker.ask : ticker.bid;
    const crosses = request.type === 'market' || request.price === undefined
      || (request.side === 'buy' ? request.price >= touch : request.price <= touch);
    const executionPrice = request.type === 'limit' && request.price !== undefined && crosses
      ? request.price
      : touch;

    const fee = crosses ? request.quantity * executionPrice * this.options.takerFeeRate : 0;
    const margin = (request.quantity * executionPrice) / request.leverage;
    if (crosses && !request.reduceOnly && margin + fee > this.balance) {
      throw new ExchangeError({ kind: 'INSUFFICIENT_FUNDS', message: 'Insufficient paper balance', exchange: this.name });
    }

    const orderId = `paper-${randomUUID()}`;
    const snapshot: OrderSnapshot = {
      orderId,
      clientOrderId: request.clientOrderId,
      symbol: request.symbol,
      side: request.side,
      status: crosses ? 'filled' : 'open',
      quantity: request.quantity,
      filledQuantity: crosses ? request.quantity : 0,
      averagePrice: crosses ? executionPrice : null,
      fee: crosses ? fee : null,
      timestamp: this.now()
    };
    this.store(snapshot);
    if (crosses) {
      this.balance -= fee;
    }

    this.logger.info('Paper order executed', {
      orderId,
      symbol: request.symbol,
      side: request.side,
      quantity: request.quantity,
      price: executionPrice,
      status: snapshot.status
    });

    return orderId;
  }

  async getOrderStatus(symbol: string, orderId: string): Promise<OrderSnapshot> {
    const order = this.orders.get(orderId);
    if (!order || order.symbol !== symbol) {
      throw new ExchangeError({ kind: 'INVALID_REQUEST', message: `Unknown order ${orderId}`, exchange: this.name });
    }
    return { ...order };
  }

  async findOrderByClientId(symbol: string, clientOrderId: string): Promise<OrderSnapshot | null> {
    for (const order of this.orders.values()) {
      if (order.symbol === symbol && order.clientOrderId === clientOrderId) {
        return { ...order };
      }
    }
    return null;
  }

  async cancelOrder(symbol: string, orderId: string): Promise<void> {
    const order = await this.getOrderStatus(symbol, orderId);
    if (order.status === 'open' || order.status === 'partially_filled') {
      this.store({ ...order, status: 'canceled' });
    }
  }

  private store(order: OrderSnapshot): void {
    this.orders.set(order.orderId, order);
    if (!isTerminal(order.status)) return;

    this.settled.push(order.orderId);
    const retention = this.options.settledOrderRetention ?? DEFAULT_SETTLED_ORDER_RETENTION;
    while (this.settled.length > retention) {
      const oldest = this.settled.shift();
      if (oldest !== undefined) this.orders.delete(oldest);
    }
  }

  async closePosition(position: Position, clientOrderId: string): Promise<CloseFill> {
    const ticker = await this.market.getTicker(position.symbol);
    const side = closingSide(position);
    const price = side === 'sell' ? ticker.bid : ticker.ask;
    const fee = position.quantity * price * this.options.takerFeeRate;
    const direction = position.side === 'long' ? 1 : -1;
    const pnl = (price - position.entryPrice) * position.quantity * direction;
    this.balance += pnl - fee;

    const orderId = `paper-${randomUUID()}`;
    this.store({
      orderId,
      clientOrderId,
      symbol: position.symbol,
      side,
      status: 'filled',
      quantity: position.quantity,
      filledQuantity: position.quantity,
      averagePrice: price,
      fee,
      timestamp: this.now()
    });

    return { orderId, price, quantity: position.quantity, fee };
  }
}
