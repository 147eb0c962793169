import EventEmitter from 'events';
import type { AccountState, BreakerState, LedgerEntry, TrippedState } from '../types/trading';
import type { BreakerParams } from '../types/config';
import { createLogger } from '../utils/logger';
import type { TradeLedger } from '../services/TradeLedger';
import { utcDay } from '../services/accounting';

export interface BreakerSnapshot {
  state: BreakerState;
  manual: boolean;
  streak: boolean;
  dailyTripDay: string | null;
  reason: string | null;
  trippedAt: number | null;
  unrecordedTrips: number;
}

interface PendingTrip {
  state: TrippedState;
  reason: string;
  timestamp: number;
}

export interface ResetResult {
  reset: boolean;
  state: BreakerState;
  message: string;
}

/**
 * Latching kill switch over account losses. Daily trips clear on the next
 * UTC trading day; streak and manual trips stay until an operator resets
 * them. Every transition is written to the ledger, and `restore` rebuilds
 * the latches from it. A trip the ledger refused stays queued and is written
 * ahead of any later breaker entry.
 */
export class CircuitBreaker extends EventEmitter {
  private logger = createLogger('CircuitBreaker');
  private manual = false;
  private streak = false;
  private dailyTripDay: string | null = null;
  private reason: string | null = null;
  private trippedAt: number | null = null;
  private unrecorded: PendingTrip[] = [];

  constructor(
    private readonly ledger: TradeLedger,
    private readonly params: BreakerParams,
    private readonly now: () => number = Date.now
  ) {
    super();
  }

  restore(entries: readonly LedgerEntry[] = this.ledger.entries()): BreakerState {
    this.manual = false;
    this.streak = false;
    this.dailyTripDay = null;
    this.reason = null;
    this.trippedAt = null;

    for (const entry of entries) {
      if (entry.kind === 'BREAKER_TRIPPED') {
        this.latch(entry.state, utcDay(entry.timestamp));
        this.reason = entry.reason;
        this.trippedAt = entry.timestamp;
      } else if (entry.kind === 'BREAKER_RESET') {
        if (entry.scope === 'DAILY') {
          this.dailyTripDay = null;
        } else {
          this.manual = false;
          this.streak = false;
        }
      }
    }

    const state = this.state;
    if (state !== 'ARMED') {
      this.logger.warn('Circuit breaker restored in tripped state', { state, reason: this.reason });
    }
    return state;
  }

  private latch(state: TrippedState, day: string): void {
    if (state === 'TRIPPED_MANUAL') this.manual = true;
    if (state === 'TRIPPED_STREAK') this.streak = true;
    if (state === 'TRIPPED_DAILY') this.dailyTripDay = day;
  }

  // Ignores a daily latch from an earlier day; evaluate() records its expiry
  get state(): BreakerState {
    if (this.manual) return 'TRIPPED_MANUAL';
    if (this.streak) return 'TRIPPED_STREAK';
    if (this.dailyTripDay !== null && this.dailyTripDay === utcDay(this.now())) return 'TRIPPED_DAILY';
    return 'ARMED';
  }

  isTripped(): boolean {
    return this.state !== 'ARMED';
  }

  snapshot(): BreakerSnapshot {
    return {
      state: this.state,
      manual: this.manual,
      streak: this.streak,
      dailyTripDay: this.dailyTripDay,
      reason: this.reason,
      trippedAt: this.trippedAt,
      unrecordedTrips: this.unrecorded.length
    };
  }

  /**
   * Checks the account against the loss limits, latching and recording any
   * new trip. Returns the resulting state.
   */
  async evaluate(account: AccountState): Promise<BreakerState> {
    await this.recordPendingTrips();

    const now = this.now();
    const today = utcDay(now);

    if (this.dailyTripDay !== null && this.dailyTripDay !== today) {
      const expiredDay = this.dailyTripDay;
      this.dailyTripDay = null;
      this.logger.info('Daily circuit breaker expired', { tripDay: expiredDay, today });
      await this.ledger.appendBreakerReset('DAILY', 'system', 'TRIPPED_DAILY', now);
      this.emit('reset', { scope: 'DAILY', state: this.state });
    }

    if (!this.streak && account.consecutiveLosses >= this.params.maxConsecutiveLosses) {
      await this.trip('TRIPPED_STREAK', `${account.consecutiveLosses} consecutive losses`, now);
    }

    const lossLimit = -this.params.dailyLossLimit * account.equityAtDayStart;
    if (this.dailyTripDay === null && account.dailyRealizedPnl <= lossLimit && account.dailyRealizedPnl < 0) {
      await this.trip(
        'TRIPPED_DAILY',
        `daily loss ${account.dailyRealizedPnl.toFixed(2)} breached limit ${lossLimit.toFixed(2)}`,
        now
      );
    }

    return this.state;
  }

  async tripManual(reason: string): Promise<BreakerState> {
    if (!this.manual) {
      await this.trip('TRIPPED_MANUAL', reason, this.now());
    } else {
      await this.recordPendingTrips();
    }
    return this.state;
  }

  /**
   * Operator reset. Clears manual and streak trips; a daily trip only clears
   * with the next trading day.
   */
  async reset(operator: string): Promise<ResetResult> {
    const previous = this.state;

    if (!this.manual && !this.streak) {
      const message = previous === 'TRIPPED_DAILY'
        ? 'Daily loss trip clears at the next trading day'
        : 'Circuit breaker is not tripped';
      return { reset: false, state: previous, message };
    }

    // Latches clear only after the ledger accepted the trips and the reset
    await this.recordPendingTrips();
    await this.ledger.appendBreakerReset('OPERATOR', operator, previous, this.now());
    this.manual = false;
    this.streak = false;
    const state = this.state;
    this.logger.warn('Circuit breaker reset by operator', { operator, previous, state });
    this.emit('reset', { scope: 'OPERATOR', operator, state });
    return { reset: true, state, message: `Reset from ${previous}` };
  }

  private async trip(state: TrippedState, reason: string, now: number): Promise<void> {
    // Latch before the write so concurrent evaluations cannot trip twice
    this.latch(state, utcDay(now));
    this.reason = reason;
    this.trippedAt = now;
    this.logger.error('Circuit breaker tripped', { state, reason });
    this.emit('tripped', { state, reason, timestamp: now });
    this.unrecorded.push({ state, reason, timestamp: now });
    await this.recordPendingTrips();
  }

  private async recordPendingTrips(): Promise<void> {
    for (const trip of [...this.unrecorded]) {
      try {
        await this.ledger.appendBreakerTrip(trip.state, trip.reason, trip.timestamp);
      } catch (error) {
        this.logger.error('Breaker trip not recorded, retrying with the next breaker call', {
          state: trip.state,
          pending: this.unrecorded.length,
          error
        });
        this.emit('trip_unrecorded', { ...trip, pending: this.unrecorded.length });
        throw error;
      }
      this.unrecorded.shift();
    }
  }
}
