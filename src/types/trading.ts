export type Direction = 'BUY' | 'SELL' | 'HOLD';
export type TradeDirection = Exclude<Direction, 'HOLD'>;
export type PositionSide = 'long' | 'short';
export type PositionStatus = 'OPEN' | 'CLOSED' | 'LIQUIDATED';

export type ExitReason =
  | 'TAKE_PROFIT'
  | 'STOP_LOSS'
  | 'LIQUIDATION'
  | 'MANUAL'
  | 'SIGNAL_REVERSAL'
  | 'MAX_HOLDING';

export type BreakerState = 'ARMED' | 'TRIPPED_DAILY' | 'TRIPPED_STREAK' | 'TRIPPED_MANUAL';
export type TrippedState = Exclude<BreakerState, 'ARMED'>;

export type RejectionReason =
  | 'circuit_breaker_tripped'
  | 'insufficient_margin'
  | 'below_min_order_size'
  | 'leverage_exceeds_ceiling'
  | 'symbol_position_cap'
  | 'portfolio_position_cap'
  | 'execution_failed';

export interface Candle {
  symbol: string;
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface MarketContext {
  symbol: string;
  price: number;
  candles: Candle[];
  volatility: number;
  timestamp: number;
}

export interface Signal {
  sourceId: string;
  symbol: string;
  direction: Direction;
  confidence: number; // 0-1
  timestamp: number;
}

export interface TradeIntent {
  readonly symbol: string;
  readonly direction: TradeDirection;
  readonly aggregateConfidence: number;
  readonly contributingSignalCount: number;
  readonly timestamp: number;
}

export type HoldReason = 'INSUFFICIENT_QUORUM' | 'BELOW_THRESHOLD' | 'NO_WEIGHT';

export interface Hold {
  readonly kind: 'hold';
  readonly symbol: string;
  readonly reason: HoldReason;
  readonly score: number;
  readonly respondingSources: number;
  readonly configuredSources: number;
  readonly timestamp: number;
}

export interface SymbolStats {
  price: number;
  volatility: number;
  historicalWinRate: number | null;
  // Venue limits, when the exchange reports them
  maxLeverage?: number;
  minOrderNotional?: number;
}

export interface RiskDecision {
  readonly symbol: string;
  readonly side: PositionSide;
  readonly positionSize: number; // collateral committed, quote currency
  readonly quantity: number; // base units
  readonly notional: number;
  readonly leverage: number;
  readonly entryPriceHint: number;
  readonly stopLossPrice: number;
  readonly takeProfitPrice: number;
  readonly liquidationPrice: number;
  readonly stopLossPct: number;
  readonly takeProfitPct: number;
  readonly confidenceScalar: number;
  readonly rejected: boolean;
  readonly rejectionReason?: RejectionReason;
  readonly detail?: string;
}

export interface Position {
  id: string;
  symbol: string;
  side: PositionSide;
  entryPrice: number;
  quantity: number;
  margin: number;
  leverage: number;
  entryFee: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  liquidationPrice: number;
  openedAt: number;
  status: PositionStatus;
  orderId?: string;
  lastPrice?: number;
  unrealizedPnl?: number;
  closedAt?: number;
  exitPrice?: number;
  realizedPnl?: number;
  exitReason?: ExitReason;
}

export interface Trade {
  id: string;
  positionId: string;
  symbol: string;
  side: PositionSide;
  entryPrice: number;
  exitPrice: number;
  quantity: number;
  leverage: number;
  fees: number;
  fundingPaid: number;
  realizedPnl: number; // net of fees and funding
  pnlPercent: number; // realizedPnl as a percentage of the position's margin
  openedAt: number;
  closedAt: number;
  durationMinutes: number;
  exitReason: ExitReason;
}

export interface AccountState {
  equity: number;
  availableMargin: number;
  usedMargin: number;
  dailyRealizedPnl: number;
  equityAtDayStart: number;
  tradingDay: string; // YYYY-MM-DD, UTC
  consecutiveLosses: number;
  openPositionIds: string[];
  openPositions: Position[];
  lastSequence: number;
}

interface LedgerEntryBase {
  seq: number;
  timestamp: number;
}

export interface PositionOpenedEntry extends LedgerEntryBase {
  kind: 'POSITION_OPENED';
  position: Position;
  fee: number;
  clientOrderId?: string;
}

export interface TradeEntry extends LedgerEntryBase {
  kind: 'TRADE';
  trade: Trade;
}

export interface RejectionEntry extends LedgerEntryBase {
  kind: 'REJECTION';
  symbol: string;
  reason: RejectionReason;
  intent: TradeIntent;
  decision?: RiskDecision;
  detail?: string;
}

export interface BreakerTrippedEntry extends LedgerEntryBase {
  kind: 'BREAKER_TRIPPED';
  state: TrippedState;
  reason: string;
}

// OPERATOR resets clear the loss streak; DAILY resets only mark the day rollover
export interface BreakerResetEntry extends LedgerEntryBase {
  kind: 'BREAKER_RESET';
  scope: 'OPERATOR' | 'DAILY';
  operator: string;
  previous: BreakerState;
}

export type LedgerEntry =
  | PositionOpenedEntry
  | TradeEntry
  | RejectionEntry
  | BreakerTrippedEntry
  | BreakerResetEntry;

export type LedgerEntryKind = LedgerEntry['kind'];

// Distributive omit keeps the union discriminated
type OmitSeq<T> = T extends unknown ? Omit<T, 'seq'> : never;
export type LedgerEntryDraft = OmitSeq<LedgerEntry>;

export interface ExecutionResult {
  success: true;
  orderId: string;
  clientOrderId: string;
  filledSize: number;
  filledPrice: number;
  slippageBps: number;
  fee: number;
  attempts: number;
  position: Position;
}

export interface PerformanceMetrics {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  totalPnl: number;
  avgPnl: number;
  totalFees: number;
  totalFunding: number;
  bestTrade: number;
  worstTrade: number;
  longestWinStreak: number;
  longestLossStreak: number;
  avgTradeDurationMinutes: number;
  profitFactor: number;
  sharpeRatio: number;
  rejections: number;
  rejectionRate: number;
  rejectionsByReason: Partial<Record<RejectionReason, number>>;
}

export function sideForDirection(direction: TradeDirection): PositionSide {
  return direction === 'BUY' ? 'long' : 'short';
}

export function isHold(result: TradeIntent | Hold): result is Hold {
  return 'kind' in result && result.kind === 'hold';
}
