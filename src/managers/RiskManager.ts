import type {
  AccountState,
  BreakerState,
  PositionSide,
  RejectionReason,
  RiskDecision,
  SymbolStats,
  TradeIntent
} from '../types/trading';
import { sideForDirection } from '../types/trading';
import type { RiskParams } from '../types/config';
import { createLogger } from '../utils/logger';

export interface RiskContext {
  breakerState: BreakerState;
  openPositionsOnSymbol: number;
  openPositionsTotal: number;
  reservedMargin?: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function liquidationDistance(leverage: number, maintenanceMarginRate: number): number {
  return 1 / leverage - maintenanceMarginRate;
}

export function priceAt(entry: number, side: PositionSide, pct: number, favourable: boolean): number {
  const up = side === 'long' ? favourable : !favourable;
  return up ? entry * (1 + pct) : entry * (1 - pct);
}

/**
 * Sizes and prices a trade intent. Position size scales with consensus
 * confidence, leverage shrinks with volatility, and the stop is always
 * placed strictly inside the liquidation price.
 */
export class RiskManager {
  private logger = createLogger('RiskManager');

  constructor(private readonly params: RiskParams, private readonly confidenceThreshold: number) {}

  confidenceScalar(aggregateConfidence: number): number {
    return clamp(1 + (aggregateConfidence - this.confidenceThreshold) * this.params.confidenceScalarSlope, 0.5, 1.5);
  }

  /** Whole leverage steps, as venues apply them; margin and liquidation use this value. */
  leverageFor(volatility: number): number {
    const raw = this.params.baseLeverage / (1 + Math.max(0, volatility) * this.params.volatilitySensitivity);
    return Math.max(1, Math.floor(clamp(raw, 1, this.params.maxLeverage)));
  }

  // Below the sample threshold the win rate is unknown and the factor is neutral
  winRateFactor(historicalWinRate: number | null): number {
    if (historicalWinRate === null) return 1;
    return clamp(1 + (historicalWinRate - 0.5) * this.params.winRateSensitivity, 0.5, 1.5);
  }

  evaluate(intent: TradeIntent, account: AccountState, stats: SymbolStats, context: RiskContext): RiskDecision {
    const side = sideForDirection(intent.direction);
    const entry = stats.price;
    const scalar = this.confidenceScalar(intent.aggregateConfidence);
    const positionSize = Math.min(
      account.equity * this.params.baseRiskFraction * scalar,
      account.equity * this.params.maxPositionFraction
    );
    const leverage = this.leverageFor(stats.volatility);
    const liqDistance = liquidationDistance(leverage, this.params.maintenanceMarginRate);

    const factor = this.winRateFactor(stats.historicalWinRate);
    const stopCap = liqDistance * (1 - this.params.liquidationSafetyBuffer);
    const stopLossPct = Math.min(
      clamp(this.params.stopLossPct * factor, this.params.minStopLossPct, this.params.maxStopLossPct),
      stopCap
    );
    const takeProfitPct = clamp(
      this.params.takeProfitPct * factor,
      this.params.minTakeProfitPct,
      this.params.maxTakeProfitPct
    );

    const notional = positionSize * leverage;
    const valid = entry > 0 && Number.isFinite(entry);
    const draft = {
      symbol: intent.symbol,
      side,
      positionSize,
      quantity: valid ? notional / entry : 0,
      notional,
      leverage,
      entryPriceHint: entry,
      stopLossPrice: valid ? priceAt(entry, side, stopLossPct, false) : 0,
      takeProfitPrice: valid ? priceAt(entry, side, takeProfitPct, true) : 0,
      liquidationPrice: valid ? priceAt(entry, side, Math.max(liqDistance, 0), false) : 0,
      stopLossPct,
      takeProfitPct,
      confidenceScalar: scalar
    };

    const reject = (reason: RejectionReason, detail: string): RiskDecision => {
      this.logger.info('Intent rejected', { symbol: intent.symbol, reason, detail });
      return Object.freeze({ ...draft, rejected: true, rejectionReason: reason, detail });
    };

    if (context.breakerState !== 'ARMED') {
      return reject('circuit_breaker_tripped', context.breakerState);
    }
    if (context.openPositionsOnSymbol >= this.params.maxPositionsPerSymbol) {
      return reject('symbol_position_cap', `${context.openPositionsOnSymbol} open on ${intent.symbol}`);
    }
    if (context.openPositionsTotal >= this.params.maxOpenPositions) {
      return reject('portfolio_position_cap', `${context.openPositionsTotal} open positions`);
    }
    if (!valid) {
      return reject('below_min_order_size', `no usable price for ${intent.symbol}`);
    }
    if (liqDistance <= 0) {
      return reject('leverage_exceeds_ceiling', `leverage ${leverage.toFixed(2)} leaves no liquidation buffer`);
    }
    if (stats.maxLeverage !== undefined && stats.maxLeverage < leverage) {
      return reject('leverage_exceeds_ceiling', `venue limit ${stats.maxLeverage} below ${leverage.toFixed(2)}`);
    }

    const minNotional = Math.max(this.params.minOrderNotional, stats.minOrderNotional ?? 0);
    if (notional < minNotional) {
      return reject('below_min_order_size', `notional ${notional.toFixed(2)} below ${minNotional}`);
    }

    const available = account.availableMargin - (context.reservedMargin ?? 0);
    if (positionSize <= 0 || positionSize > available) {
      return reject('insufficient_margin', `requires ${positionSize.toFixed(2)}, available ${available.toFixed(2)}`);
    }

    const decision: RiskDecision = Object.freeze({ ...draft, rejected: false });
    this.logger.info('Risk decision accepted', {
      symbol: decision.symbol,
      side: decision.side,
      positionSize: Number(positionSize.toFixed(2)),
      leverage: Number(leverage.toFixed(2)),
      stopLossPrice: decision.stopLossPrice,
      liquidationPrice: decision.liquidationPrice
    });
    return decision;
  }
}
