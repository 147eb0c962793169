import { z } from 'zod';
import type { LedgerEntry, Position, RiskDecision, Trade, TradeIntent } from '../types/trading';

const side = z.enum(['long', 'short']);
const exitReason = z.enum(['TAKE_PROFIT', 'STOP_LOSS', 'LIQUIDATION', 'MANUAL', 'SIGNAL_REVERSAL', 'MAX_HOLDING']);
const rejectionReason = z.enum([
  'circuit_breaker_tripped',
  'insufficient_margin',
  'below_min_order_size',
  'leverage_exceeds_ceiling',
  'symbol_position_cap',
  'portfolio_position_cap',
  'execution_failed'
]);
const breakerState = z.enum(['ARMED', 'TRIPPED_DAILY', 'TRIPPED_STREAK', 'TRIPPED_MANUAL']);

const positionSchema: z.ZodType<Position> = z.object({
  id: z.string(),
  symbol: z.string(),
  side,
  entryPrice: z.number(),
  quantity: z.number(),
  margin: z.number(),
  leverage: z.number(),
  entryFee: z.number(),
  stopLossPrice: z.number(),
  takeProfitPrice: z.number(),
  liquidationPrice: z.number(),
  openedAt: z.number(),
  status: z.enum(['OPEN', 'CLOSED', 'LIQUIDATED']),
  orderId: z.string().optional(),
  lastPrice: z.number().optional(),
  unrealizedPnl: z.number().optional(),
  closedAt: z.number().optional(),
  exitPrice: z.number().optional(),
  realizedPnl: z.number().optional(),
  exitReason: exitReason.optional()
});

const tradeSchema: z.ZodType<Trade> = z.object({
  id: z.string(),
  positionId: z.string(),
  symbol: z.string(),
  side,
  entryPrice: z.number(),
  exitPrice: z.number(),
  quantity: z.number(),
  leverage: z.number(),
  fees: z.number(),
  fundingPaid: z.number(),
  realizedPnl: z.number(),
  pnlPercent: z.number(),
  openedAt: z.number(),
  closedAt: z.number(),
  durationMinutes: z.number(),
  exitReason
});

const intentSchema: z.ZodType<TradeIntent> = z.object({
  symbol: z.string(),
  direction: z.enum(['BUY', 'SELL']),
  aggregateConfidence: z.number(),
  contributingSignalCount: z.number(),
  timestamp: z.number()
});

const decisionSchema: z.ZodType<RiskDecision> = z.object({
  symbol: z.string(),
  side,
  positionSize: z.number(),
  quantity: z.number(),
  notional: z.number(),
  leverage: z.number(),
  entryPriceHint: z.number(),
  stopLossPrice: z.number(),
  takeProfitPrice: z.number(),
  liquidationPrice: z.number(),
  stopLossPct: z.number(),
  takeProfitPct: z.number(),
  confidenceScalar: z.number(),
  rejected: z.boolean(),
  rejectionReason: rejectionReason.optional(),
  detail: z.string().optional()
});

const base = { seq: z.number().int().positive(), timestamp: z.number() };

export const ledgerEntrySchema: z.ZodType<LedgerEntry> = z.discriminatedUnion('kind', [
  z.object({
    ...base,
    kind: z.literal('POSITION_OPENED'),
    position: positionSchema,
    fee: z.number(),
    clientOrderId: z.string().optional()
  }),
  z.object({ ...base, kind: z.literal('TRADE'), trade: tradeSchema }),
  z.object({
    ...base,
    kind: z.literal('REJECTION'),
    symbol: z.string(),
    reason: rejectionReason,
    intent: intentSchema,
    decision: decisionSchema.optional(),
    detail: z.string().optional()
  }),
  z.object({
    ...base,
    kind: z.literal('BREAKER_TRIPPED'),
    state: z.enum(['TRIPPED_DAILY', 'TRIPPED_STREAK', 'TRIPPED_MANUAL']),
    reason: z.string()
  }),
  z.object({
    ...base,
    kind: z.literal('BREAKER_RESET'),
    scope: z.enum(['OPERATOR', 'DAILY']),
    operator: z.string(),
    previous: breakerState
  })
]);
