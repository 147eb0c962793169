import { randomUUID } from 'crypto';
import EventEmitter from 'events';
import type { ExitReason, Position, PositionSide, RiskDecision, Trade } from '../types/trading';
import type { LifecycleParams } from '../types/config';
import { isTerminal, type CloseFill, type ExchangeAdapter } from '../exchange/ExchangeAdapter';
import { ExchangeError } from '../exchange/ExchangeError';
import { createLogger } from '../utils/logger';
import { LedgerWriteFailure, errorMessage } from '../utils/errors';
import { TimeoutError, withTimeout } from '../utils/timeout';
import type { AccountManager } from './AccountManager';
import { liquidationDistance, priceAt } from './RiskManager';

export interface OrderFill {
  orderId: string;
  price: number;
  quantity: number;
  fee: number;
  timestamp: number;
}

export interface PositionManagerOptions {
  exchange: ExchangeAdapter;
  accounts: AccountManager;
  params: LifecycleParams;
  takerFeeRate: number;
  requestTimeoutMs: number;
  now?: () => number;
}

function direction(side: PositionSide): number {
  return side === 'long' ? 1 : -1;
}

/**
 * Opens a position around the actual fill: stop and target keep the
 * decision's percentages, liquidation follows the fill price.
 */
export function buildPosition(
  decision: RiskDecision,
  fill: OrderFill,
  maintenanceMarginRate: number,
  id: string = randomUUID()
): Position {
  const { side, leverage } = decision;
  return {
    id,
    symbol: decision.symbol,
    side,
    entryPrice: fill.price,
    quantity: fill.quantity,
    margin: (fill.quantity * fill.price) / leverage,
    leverage,
    entryFee: fill.fee,
    stopLossPrice: priceAt(fill.price, side, decision.stopLossPct, false),
    takeProfitPrice: priceAt(fill.price, side, decision.takeProfitPct, true),
    liquidationPrice: priceAt(fill.price, side, liquidationDistance(leverage, maintenanceMarginRate), false),
    openedAt: fill.timestamp,
    status: 'OPEN',
    orderId: fill.orderId
  };
}

/** Client order id of the `attempt`-th close order sent for a position. */
export function exitClientOrderId(positionId: string, attempt: number): string {
  return `x${positionId.replace(/-/g, '').slice(0, 28)}c${attempt}`;
}

export function unrealizedPnl(position: Position, price: number): number {
  return (price - position.entryPrice) * position.quantity * direction(position.side);
}

/** Funding on the entry notional for each whole funding interval held. Negative when received. */
export function fundingCost(
  position: Position,
  closedAt: number,
  params: Pick<LifecycleParams, 'fundingRatePerInterval' | 'fundingIntervalMs'>
): number {
  const intervals = Math.floor(Math.max(0, closedAt - position.openedAt) / params.fundingIntervalMs);
  if (intervals === 0 || params.fundingRatePerInterval === 0) return 0;
  return position.entryPrice * position.quantity * params.fundingRatePerInterval * intervals * direction(position.side);
}

type Settlement = Pick<Trade, 'exitPrice' | 'fees' | 'fundingPaid' | 'realizedPnl' | 'closedAt' | 'exitReason'>;

function settledTrade(position: Position, settlement: Settlement): Trade {
  return {
    id: randomUUID(),
    positionId: position.id,
    symbol: position.symbol,
    side: position.side,
    entryPrice: position.entryPrice,
    quantity: position.quantity,
    leverage: position.leverage,
    openedAt: position.openedAt,
    ...settlement,
    pnlPercent: position.margin > 0 ? (settlement.realizedPnl / position.margin) * 100 : 0,
    durationMinutes: Math.floor(Math.max(0, settlement.closedAt - position.openedAt) / 60_000)
  };
}

/**
 * Owns open positions from fill to exit. Exit checks run in a fixed order
 * (liquidation, stop-loss, take-profit, max holding) and are idempotent:
 * a position being closed or already closed is skipped, and a close whose
 * ledger write failed is re-recorded on the next tick without a second
 * close order. A close order whose outcome is unknown is looked up by its
 * client order id before another one is sent.
 */
export class PositionManager extends EventEmitter {
  private logger = createLogger('PositionManager');
  private positions = new Map<string, Position>();
  private closing = new Set<string>();
  private pendingExits = new Map<string, Trade>();
  private closeAttempts = new Map<string, number>();
  private unresolvedCloses = new Map<string, string>();
  private monitorTimer: NodeJS.Timeout | null = null;
  private monitoring = false;
  private readonly now: () => number;

  constructor(private readonly options: PositionManagerOptions) {
    super();
    this.now = options.now ?? Date.now;
  }

  restore(positions: readonly Position[]): void {
    for (const position of positions) {
      this.positions.set(position.id, { ...position });
      this.logger.info('Position restored from ledger', {
        id: position.id,
        symbol: position.symbol,
        side: position.side,
        entryPrice: position.entryPrice
      });
    }
  }

  track(position: Position): void {
    this.positions.set(position.id, position);
    this.logger.info('Position opened', {
      id: position.id,
      symbol: position.symbol,
      side: position.side,
      quantity: position.quantity,
      entryPrice: position.entryPrice,
      stopLoss: position.stopLossPrice,
      takeProfit: position.takeProfitPrice,
      liquidation: position.liquidationPrice
    });
    this.emit('position_opened', { ...position });
  }

  get(id: string): Position | undefined {
    const position = this.positions.get(id);
    return position ? { ...position } : undefined;
  }

  list(symbol?: string): Position[] {
    const positions = [...this.positions.values()].map(position => ({ ...position }));
    return symbol === undefined ? positions : positions.filter(position => position.symbol === symbol);
  }

  hasPendingExit(id: string): boolean {
    return this.pendingExits.has(id);
  }

  evaluateExit(position: Position, price: number, now: number = this.now()): ExitReason | null {
    const long = position.side === 'long';
    if (long ? price <= position.liquidationPrice : price >= position.liquidationPrice) return 'LIQUIDATION';
    if (long ? price <= position.stopLossPrice : price >= position.stopLossPrice) return 'STOP_LOSS';
    if (long ? price >= position.takeProfitPrice : price <= position.takeProfitPrice) return 'TAKE_PROFIT';
    if (now - position.openedAt >= this.options.params.maxHoldingDurationMs) return 'MAX_HOLDING';
    return null;
  }

  /** Runs exit checks for every open position on `symbol` at `price`. */
  async onTick(symbol: string, price: number): Promise<Trade[]> {
    const trades: Trade[] = [];
    const now = this.now();

    for (const position of [...this.positions.values()]) {
      if (position.symbol !== symbol) continue;

      const pending = this.pendingExits.get(position.id);
      if (pending) {
        const trade = await this.close(position.id, pending.exitReason);
        if (trade) trades.push(trade);
        continue;
      }

      position.lastPrice = price;
      position.unrealizedPnl = unrealizedPnl(position, price);

      const reason = this.evaluateExit(position, price, now);
      if (reason) {
        const trade = await this.close(position.id, reason, price);
        if (trade) trades.push(trade);
      }
    }

    return trades;
  }

  /**
   * Closes one position. Returns null when the position is unknown, already
   * closing, or the close could not complete (retried on the next tick).
   */
  async close(positionId: string, reason: ExitReason, observedPrice?: number): Promise<Trade | null> {
    const position = this.positions.get(positionId);
    if (!position || position.status !== 'OPEN' || this.closing.has(positionId)) {
      return null;
    }

    this.closing.add(positionId);
    try {
      let trade = this.pendingExits.get(positionId);
      if (!trade) {
        trade = reason === 'LIQUIDATION'
          ? this.liquidationTrade(position)
          : await this.exitTrade(position, reason, observedPrice);
        this.pendingExits.set(positionId, trade);
      }

      await this.options.accounts.recordClose(trade);

      this.pendingExits.delete(positionId);
      this.closeAttempts.delete(positionId);
      this.unresolvedCloses.delete(positionId);
      this.positions.delete(positionId);
      const closed: Position = {
        ...position,
        status: trade.exitReason === 'LIQUIDATION' ? 'LIQUIDATED' : 'CLOSED',
        closedAt: trade.closedAt,
        exitPrice: trade.exitPrice,
        realizedPnl: trade.realizedPnl,
        exitReason: trade.exitReason
      };

      this.logger.info('Position closed', {
        id: positionId,
        symbol: trade.symbol,
        reason: trade.exitReason,
        exitPrice: trade.exitPrice,
        realizedPnl: Number(trade.realizedPnl.toFixed(4))
      });
      this.emit('position_closed', { position: closed, trade });
      return trade;
    } catch (error) {
      if (error instanceof LedgerWriteFailure) {
        this.logger.error('Exit not recorded, retrying on next tick', { id: positionId, reason, error });
      } else {
        this.logger.error('Failed to close position', { id: positionId, reason, error: errorMessage(error) });
      }
      this.emit('close_failed', { positionId, symbol: position.symbol, reason, error });
      return null;
    } finally {
      this.closing.delete(positionId);
    }
  }

  async closeAll(reason: ExitReason): Promise<Trade[]> {
    const results = await Promise.all(
      [...this.positions.keys()].map(id => this.close(id, reason))
    );
    return results.filter((trade): trade is Trade => trade !== null);
  }

  /** Closes positions on `symbol` whose side differs from `keepSide`. */
  async closeOpposite(symbol: string, keepSide: PositionSide): Promise<Trade[]> {
    const trades: Trade[] = [];
    for (const position of [...this.positions.values()]) {
      if (position.symbol === symbol && position.side !== keepSide) {
        const trade = await this.close(position.id, 'SIGNAL_REVERSAL');
        if (trade) trades.push(trade);
      }
    }
    return trades;
  }

  private liquidationTrade(position: Position): Trade {
    // The whole margin is gone; funding already came out of it
    return settledTrade(position, {
      exitPrice: position.liquidationPrice,
      fees: position.entryFee,
      fundingPaid: 0,
      realizedPnl: -position.margin - position.entryFee,
      closedAt: this.now(),
      exitReason: 'LIQUIDATION'
    });
  }

  private async exitTrade(position: Position, reason: ExitReason, observedPrice?: number): Promise<Trade> {
    const fill = await this.sendClose(position);
    const exitPrice = fill.price > 0 ? fill.price : observedPrice ?? position.lastPrice ?? position.entryPrice;
    const exitFee = fill.fee ?? position.quantity * exitPrice * this.options.takerFeeRate;
    const gross = unrealizedPnl(position, exitPrice);
    const closedAt = this.now();
    const fundingPaid = fundingCost(position, closedAt, this.options.params);

    return settledTrade(position, {
      exitPrice,
      fees: position.entryFee + exitFee,
      fundingPaid,
      realizedPnl: gross - position.entryFee - exitFee - fundingPaid,
      closedAt,
      exitReason: reason
    });
  }

  private async sendClose(position: Position): Promise<CloseFill> {
    const { exchange, requestTimeoutMs } = this.options;

    const previous = this.unresolvedCloses.get(position.id);
    if (previous) {
      const found = await withTimeout(
        exchange.findOrderByClientId(position.symbol, previous),
        requestTimeoutMs,
        'findOrderByClientId'
      );
      if (found && !isTerminal(found.status)) {
        throw new Error(`Close order ${found.orderId} for ${position.symbol} is still working`);
      }
      this.unresolvedCloses.delete(position.id);
      if (found && found.filledQuantity > 0) {
        this.logger.info('Recovered close order by client id', {
          id: position.id,
          clientOrderId: previous,
          orderId: found.orderId,
          filled: found.filledQuantity
        });
        return {
          orderId: found.orderId,
          price: found.averagePrice ?? 0,
          quantity: found.filledQuantity,
          fee: found.fee
        };
      }
    }

    const attempt = (this.closeAttempts.get(position.id) ?? 0) + 1;
    this.closeAttempts.set(position.id, attempt);
    const clientOrderId = exitClientOrderId(position.id, attempt);

    try {
      return await withTimeout(
        exchange.closePosition(position, clientOrderId),
        requestTimeoutMs,
        `close ${position.symbol}`
      );
    } catch (error) {
      // The venue may have filled it; look it up before sending another
      if (error instanceof TimeoutError || (error instanceof ExchangeError && error.ambiguous)) {
        this.unresolvedCloses.set(position.id, clientOrderId);
      }
      throw error;
    }
  }

  /** Polls tickers for every symbol with open positions. */
  async checkAll(): Promise<Trade[]> {
    const symbols = new Set([...this.positions.values()].map(position => position.symbol));
    const trades: Trade[] = [];

    for (const symbol of symbols) {
      try {
        const ticker = await withTimeout(
          this.options.exchange.getTicker(symbol),
          this.options.requestTimeoutMs,
          `ticker ${symbol}`
        );
        trades.push(...(await this.onTick(symbol, ticker.last)));
      } catch (error) {
        this.logger.warn('Position check failed', { symbol, error: errorMessage(error) });
      }
    }

    return trades;
  }

  startMonitoring(): void {
    if (this.monitorTimer) return;
    this.monitorTimer = setInterval(() => {
      if (this.monitoring) return;
      this.monitoring = true;
      this.checkAll()
        .catch(error => this.logger.error('Position monitor failed', error))
        .finally(() => {
          this.monitoring = false;
        });
    }, this.options.params.pollIntervalMs);
  }

  stopMonitoring(): void {
    if (this.monitorTimer) {
      clearInterval(this.monitorTimer);
      this.monitorTimer = null;
    }
  }
}
