import { randomUUID } from 'crypto';
import type { AccountState, Position, RejectionReason, Trade } from '../types/trading';
import { createLogger } from '../utils/logger';
import { Mutex } from '../utils/Mutex';
import type { TradeLedger } from '../services/TradeLedger';

export interface MarginReservation {
  id: string;
  symbol: string;
  margin: number;
  createdAt: number;
}

export interface ReservationLimits {
  maxPositionsPerSymbol: number;
  maxOpenPositions: number;
}

export type ReservationResult =
  | { ok: true; reservation: MarginReservation }
  | { ok: false; reason: RejectionReason; detail: string };

/**
 * Single writer for account-affecting ledger entries. Margin for an order
 * is reserved under the lock before submission, so concurrent symbol
 * cycles cannot spend the same collateral or overrun the position caps.
 */
export class AccountManager {
  private logger = createLogger('AccountManager');
  private readonly lock = new Mutex();
  private readonly reservations = new Map<string, MarginReservation>();

  constructor(private readonly ledger: TradeLedger, private readonly now: () => number = Date.now) {}

  snapshot(): AccountState {
    return this.ledger.state(this.now());
  }

  reservedMargin(): number {
    let total = 0;
    for (const reservation of this.reservations.values()) {
      total += reservation.margin;
    }
    return total;
  }

  openPositions(symbol?: string): Position[] {
    const positions = this.snapshot().openPositions;
    return symbol === undefined ? positions : positions.filter(position => position.symbol === symbol);
  }

  private pendingCount(symbol?: string): number {
    let count = 0;
    for (const reservation of this.reservations.values()) {
      if (symbol === undefined || reservation.symbol === symbol) count++;
    }
    return count;
  }

  reserve(symbol: string, margin: number, limits: ReservationLimits): Promise<ReservationResult> {
    return this.lock.runExclusive((): ReservationResult => {
      const account = this.snapshot();
      const available = account.availableMargin - this.reservedMargin();

      const onSymbol = account.openPositions.filter(position => position.symbol === symbol).length
        + this.pendingCount(symbol);
      if (onSymbol >= limits.maxPositionsPerSymbol) {
        return { ok: false, reason: 'symbol_position_cap', detail: `${onSymbol} open or pending on ${symbol}` };
      }

      const total = account.openPositions.length + this.pendingCount();
      if (total >= limits.maxOpenPositions) {
        return { ok: false, reason: 'portfolio_position_cap', detail: `${total} open or pending positions` };
      }

      if (margin > available) {
        return {
          ok: false,
          reason: 'insufficient_margin',
          detail: `requires ${margin.toFixed(2)}, available ${available.toFixed(2)}`
        };
      }

      const reservation: MarginReservation = { id: randomUUID(), symbol, margin, createdAt: this.now() };
      this.reservations.set(reservation.id, reservation);
      this.logger.debug('Margin reserved', { symbol, margin, available: available - margin });
      return { ok: true, reservation };
    });
  }

  release(reservation: MarginReservation): void {
    this.reservations.delete(reservation.id);
  }

  /** Records the fill, then converts the reservation into position margin. */
  recordOpen(position: Position, fee: number, clientOrderId: string, reservation?: MarginReservation): Promise<AccountState> {
    return this.lock.runExclusive(async () => {
      await this.ledger.appendPositionOpened(position, fee, clientOrderId);
      if (reservation) this.release(reservation);
      return this.snapshot();
    });
  }

  recordClose(trade: Trade): Promise<AccountState> {
    return this.lock.runExclusive(async () => {
      await this.ledger.append(trade);
      return this.snapshot();
    });
  }
}
