import { randomUUID } from 'crypto';
import EventEmitter from 'events';
import type { ExecutionResult, RiskDecision, TradeIntent } from '../types/trading';
import type { ExecutionParams } from '../types/config';
import {
  isTerminal,
  type ExchangeAdapter,
  type OrderRequest,
  type OrderSnapshot
} from '../exchange/ExchangeAdapter';
import { ExchangeError } from '../exchange/ExchangeError';
import { createLogger } from '../utils/logger';
import { ExecutionFatal, ExecutionTransient, RiskRejected, errorMessage } from '../utils/errors';
import { RetryAbortedError, retry, sleep as defaultSleep, type SleepFn } from '../utils/retry';
import { TimeoutError, withTimeout } from '../utils/timeout';
import type { TradeLedger } from '../services/TradeLedger';
import type { AccountManager, MarginReservation, ReservationLimits } from './AccountManager';
import { buildPosition, type PositionManager } from './PositionManager';

export interface OrderExecutionOptions {
  params: ExecutionParams;
  maintenanceMarginRate: number;
  limits: ReservationLimits;
  exchange: ExchangeAdapter;
  accounts: AccountManager;
  ledger: TradeLedger;
  positions: PositionManager;
  sleep?: SleepFn;
  now?: () => number;
  random?: () => number;
  newClientOrderId?: () => string;
}

function toExchangeFailure(exchange: string, error: unknown): ExchangeError {
  if (error instanceof ExchangeError) return error;
  if (error instanceof TimeoutError) {
    return new ExchangeError({ kind: 'TRANSIENT', message: error.message, exchange, ambiguous: true });
  }
  return new ExchangeError({ kind: 'UNKNOWN', message: errorMessage(error), exchange });
}

interface InFlightOrder {
  controller: AbortController;
  done: Promise<void>;
}

export function slippageBps(side: 'long' | 'short', expected: number, filled: number): number {
  if (expected <= 0) return 0;
  const move = side === 'long' ? filled - expected : expected - filled;
  return (move / expected) * 10_000;
}

/**
 * Turns an accepted risk decision into a filled position. Submission is
 * retried with backoff on transient errors; an ambiguous failure is always
 * followed by a lookup of the client order id before anything is resent.
 */
export class OrderExecutionEngine extends EventEmitter {
  private logger = createLogger('OrderExecutionEngine');
  private inFlight = new Map<string, InFlightOrder>();
  private halted = false;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly newClientOrderId: () => string;

  constructor(private readonly options: OrderExecutionOptions) {
    super();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.newClientOrderId = options.newClientOrderId ?? (() => randomUUID().replace(/-/g, '').slice(0, 32));
  }

  isInFlight(symbol: string): boolean {
    return this.inFlight.has(symbol);
  }

  isHalted(): boolean {
    return this.halted;
  }

  /** Blocks new submissions and aborts every in-flight retry or fill wait. */
  halt(reason: string): void {
    this.halted = true;
    for (const [symbol, { controller }] of this.inFlight) {
      this.logger.warn('Aborting in-flight order', { symbol, reason });
      controller.abort();
    }
  }

  resume(): void {
    this.halted = false;
  }

  /** Resolves once every order sequence running now has ended, filled or not. */
  async settled(): Promise<void> {
    await Promise.all([...this.inFlight.values()].map(order => order.done));
  }

  async execute(decision: RiskDecision, intent: TradeIntent): Promise<ExecutionResult> {
    const { ledger } = this.options;

    if (decision.rejected) {
      throw new RiskRejected(decision.rejectionReason ?? 'execution_failed', decision.detail);
    }
    if (this.halted) {
      await ledger.appendRejection(intent, 'circuit_breaker_tripped', decision, 'execution halted');
      throw new RiskRejected('circuit_breaker_tripped', 'execution halted');
    }
    if (this.inFlight.has(decision.symbol)) {
      await ledger.appendRejection(intent, 'symbol_position_cap', decision, 'order already in flight');
      throw new RiskRejected('symbol_position_cap', `order already in flight for ${decision.symbol}`);
    }

    const controller = new AbortController();
    const run = this.reserveAndFill(decision, intent, controller.signal);
    // Failures reach the caller through `run`; `done` only marks the end
    this.inFlight.set(decision.symbol, { controller, done: run.then(() => undefined, () => undefined) });

    try {
      return await run;
    } finally {
      this.inFlight.delete(decision.symbol);
    }
  }

  private async reserveAndFill(decision: RiskDecision, intent: TradeIntent, signal: AbortSignal): Promise<ExecutionResult> {
    const { ledger, accounts } = this.options;
    let reservation: MarginReservation | undefined;

    try {
      const reserved = await accounts.reserve(decision.symbol, decision.positionSize, this.options.limits);
      if (!reserved.ok) {
        await ledger.appendRejection(intent, reserved.reason, decision, reserved.detail);
        throw new RiskRejected(reserved.reason, reserved.detail);
      }
      reservation = reserved.reservation;

      return await this.submitAndFill(decision, intent, reservation, signal);
    } finally {
      if (reservation) accounts.release(reservation);
    }
  }

  private async submitAndFill(
    decision: RiskDecision,
    intent: TradeIntent,
    reservation: MarginReservation,
    signal: AbortSignal
  ): Promise<ExecutionResult> {
    const { params } = this.options;
    const clientOrderId = this.newClientOrderId();
    const request: OrderRequest = {
      symbol: decision.symbol,
      side: decision.side === 'long' ? 'buy' : 'sell',
      type: params.orderType,
      quantity: decision.quantity,
      price: params.orderType === 'limit'
        ? decision.entryPriceHint * (1 + (decision.side === 'long' ? 1 : -1) * params.limitOffsetBps / 10_000)
        : undefined,
      leverage: decision.leverage,
      clientOrderId
    };

    let attempts = 0;
    let snapshot: OrderSnapshot;
    try {
      const submitted = await this.submit(request, signal, attempt => {
        attempts = attempt;
      });
      snapshot = await this.awaitFill(request.symbol, submitted, signal);
    } catch (error) {
      throw await this.fail(intent, decision, clientOrderId, error);
    }

    if (snapshot.filledQuantity <= 0) {
      throw await this.fail(
        intent,
        decision,
        clientOrderId,
        new ExecutionFatal(`Order ${snapshot.orderId} ended ${snapshot.status} with no fill`, clientOrderId)
      );
    }

    const filledPrice = snapshot.averagePrice ?? decision.entryPriceHint;
    const fee = snapshot.fee ?? snapshot.filledQuantity * filledPrice * params.takerFeeRate;
    const position = buildPosition(
      decision,
      {
        orderId: snapshot.orderId,
        price: filledPrice,
        quantity: snapshot.filledQuantity,
        fee,
        timestamp: this.now()
      },
      this.options.maintenanceMarginRate
    );

    if (snapshot.filledQuantity < decision.quantity) {
      this.logger.warn('Partial fill', {
        symbol: decision.symbol,
        requested: decision.quantity,
        filled: snapshot.filledQuantity
      });
    }

    try {
      await this.options.accounts.recordOpen(position, fee, clientOrderId, reservation);
    } catch (error) {
      // The venue holds the position either way; keep its exits managed
      this.options.positions.track(position);
      this.logger.error('Filled position not recorded in ledger', { positionId: position.id, clientOrderId, error });
      this.emit('execution_error', { symbol: decision.symbol, clientOrderId, message: errorMessage(error) });
      throw error;
    }
    this.options.positions.track(position);

    const result: ExecutionResult = {
      success: true,
      orderId: snapshot.orderId,
      clientOrderId,
      filledSize: snapshot.filledQuantity,
      filledPrice,
      slippageBps: slippageBps(decision.side, decision.entryPriceHint, filledPrice),
      fee,
      attempts,
      position: { ...position }
    };

    this.logger.info('Order filled', {
      symbol: decision.symbol,
      orderId: result.orderId,
      filledSize: result.filledSize,
      filledPrice,
      slippageBps: Number(result.slippageBps.toFixed(2)),
      attempts
    });
    return result;
  }

  private async submit(
    request: OrderRequest,
    signal: AbortSignal,
    onAttempt: (attempt: number) => void
  ): Promise<OrderSnapshot | string> {
    const { params, exchange } = this.options;
    let unresolved = false;

    const lookup = async (): Promise<OrderSnapshot | null> => {
      const found = await withTimeout(
        exchange.findOrderByClientId(request.symbol, request.clientOrderId),
        params.requestTimeoutMs,
        'findOrderByClientId'
      );
      if (found) {
        this.logger.info('Recovered order by client id', {
          symbol: request.symbol,
          clientOrderId: request.clientOrderId,
          orderId: found.orderId,
          status: found.status
        });
      }
      return found;
    };

    return retry<OrderSnapshot | string>(async attempt => {
      onAttempt(attempt);

      // The previous attempt may have reached the venue
      if (unresolved) {
        const found = await lookup().catch(error => {
          throw toExchangeFailure(exchange.name, error);
        });
        unresolved = false;
        if (found) return found;
      }

      try {
        return await withTimeout(exchange.placeOrder(request), params.requestTimeoutMs, 'placeOrder');
      } catch (error) {
        const failure = toExchangeFailure(exchange.name, error);
        if (!failure.ambiguous) throw failure;

        unresolved = true;
        const found = await lookup().catch(lookupError => {
          this.logger.warn('Order lookup failed after ambiguous submit', {
            symbol: request.symbol,
            clientOrderId: request.clientOrderId,
            error: errorMessage(lookupError)
          });
          return null;
        });
        if (found) {
          unresolved = false;
          return found;
        }
        throw failure;
      }
    }, {
      maxAttempts: params.retryAttempts,
      baseDelayMs: params.retryBaseDelayMs,
      multiplier: params.retryMultiplier,
      jitter: params.retryJitter,
      maxTotalMs: params.retryMaxTotalMs,
      signal,
      sleep: this.sleep,
      now: this.now,
      random: this.options.random,
      shouldRetry: error => error instanceof ExchangeError && error.retryable,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn('Order submission failed, retrying', {
          symbol: request.symbol,
          attempt,
          delayMs,
          error: errorMessage(error)
        });
      }
    });
  }

  private async awaitFill(symbol: string, submitted: OrderSnapshot | string, signal: AbortSignal): Promise<OrderSnapshot> {
    const { params, exchange } = this.options;
    const orderId = typeof submitted === 'string' ? submitted : submitted.orderId;
    let latest: OrderSnapshot | null = typeof submitted === 'string' ? null : submitted;
    const deadline = this.now() + params.fillTimeoutMs;

    let first = true;
    while (!latest || !isTerminal(latest.status)) {
      if (signal.aborted || this.now() >= deadline) break;

      if (!first) {
        try {
          await this.sleep(params.fillPollIntervalMs, signal);
        } catch (error) {
          if (error instanceof RetryAbortedError) break;
          throw error;
        }
      }
      first = false;

      try {
        latest = await withTimeout(exchange.getOrderStatus(symbol, orderId), params.requestTimeoutMs, 'getOrderStatus');
      } catch (error) {
        const failure = toExchangeFailure(exchange.name, error);
        if (!failure.retryable) throw failure;
        this.logger.warn('Order status poll failed', { symbol, orderId, error: failure.message });
      }
    }

    if (latest && isTerminal(latest.status)) {
      return latest;
    }

    // Timed out or aborted: cancel the remainder and keep what filled
    this.logger.warn('Order not terminal, cancelling remainder', { symbol, orderId, aborted: signal.aborted });
    try {
      await withTimeout(exchange.cancelOrder(symbol, orderId), params.requestTimeoutMs, 'cancelOrder');
    } catch (error) {
      // A late fill makes the cancel fail; the final status below decides
      this.logger.warn('Cancel failed', { symbol, orderId, error: errorMessage(error) });
    }
    return withTimeout(exchange.getOrderStatus(symbol, orderId), params.requestTimeoutMs, 'getOrderStatus');
  }

  private async fail(
    intent: TradeIntent,
    decision: RiskDecision,
    clientOrderId: string,
    error: unknown
  ): Promise<ExecutionFatal | ExecutionTransient> {
    const aborted = error instanceof RetryAbortedError;
    const transient = error instanceof ExchangeError && error.retryable;
    const detail = aborted ? 'aborted by emergency stop' : errorMessage(error);

    this.logger.error('Order execution failed', {
      symbol: decision.symbol,
      clientOrderId,
      detail,
      unresolved: error instanceof ExchangeError && error.ambiguous
    });
    this.emit('execution_error', { symbol: decision.symbol, clientOrderId, message: detail });

    await this.options.ledger.appendRejection(intent, 'execution_failed', decision, detail);

    return transient
      ? new ExecutionTransient(`Retries exhausted for ${decision.symbol}: ${detail}`, { cause: error })
      : new ExecutionFatal(detail, clientOrderId, { cause: error });
  }
}
