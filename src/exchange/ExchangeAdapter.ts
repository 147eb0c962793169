import type { Candle, Position } from '../types/trading';
import type { OrderType } from '../types/config';

export type OrderSide = 'buy' | 'sell';

export type OrderState =
  | 'open'
  | 'partially_filled'
  | 'filled'
  | 'canceled'
  | 'rejected'
  | 'expired';

export const TERMINAL_ORDER_STATES: readonly OrderState[] = ['filled', 'canceled', 'rejected', 'expired'];

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  price?: number;
  leverage: number;
  clientOrderId: string;
  reduceOnly?: boolean;
}

export interface OrderSnapshot {
  orderId: string;
  clientOrderId?: string;
  symbol: string;
  side: OrderSide;
  status: OrderState;
  quantity: number;
  filledQuantity: number;
  averagePrice: number | null;
  fee: number | null;
  timestamp: number;
}

export interface Ticker {
  symbol: string;
  bid: number;
  ask: number;
  last: number;
  timestamp: number;
}

export interface MarketLimits {
  maxLeverage?: number;
  minNotional?: number;
}

export interface CloseFill {
  orderId: string;
  price: number;
  quantity: number;
  fee: number | null;
}

/**
 * Venue boundary. Every method rejects with an ExchangeError so callers can
 * branch on `kind`, `retryable` and `ambiguous`.
 */
export interface ExchangeAdapter {
  readonly name: string;
  initialize(): Promise<void>;
  getBalance(): Promise<Record<string, number>>;
  getTicker(symbol: string): Promise<Ticker>;
  fetchCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]>;
  getMarketLimits(symbol: string): Promise<MarketLimits>;
  placeOrder(request: OrderRequest): Promise<string>;
  getOrderStatus(symbol: string, orderId: string): Promise<OrderSnapshot>;
  findOrderByClientId(symbol: string, clientOrderId: string): Promise<OrderSnapshot | null>;
  cancelOrder(symbol: string, orderId: string): Promise<void>;
  closePosition(position: Position, clientOrderId: string): Promise<CloseFill>;
}

export function isTerminal(state: OrderState): boolean {
  return TERMINAL_ORDER_STATES.includes(state);
}

export function closingSide(position: Pick<Position, 'side'>): OrderSide {
  return position.side === 'long' ? 'sell' : 'buy';
}
