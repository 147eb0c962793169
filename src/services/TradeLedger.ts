import fs from 'fs/promises';
import path from 'path';
import type {
  AccountState,
  BreakerState,
  LedgerEntry,
  LedgerEntryDraft,
  PerformanceMetrics,
  Position,
  RejectionEntry,
  RejectionReason,
  RiskDecision,
  Trade,
  TradeEntry,
  TradeIntent,
  TrippedState
} from '../types/trading';
import { createLogger } from '../utils/logger';
import { LedgerWriteFailure, errorMessage } from '../utils/errors';
import { Mutex } from '../utils/Mutex';
import { applyEntry, initialAccountState, reduceEntries, rollToDay, utcDay } from './accounting';
import { ledgerEntrySchema } from './ledgerSchema';

export interface LedgerStorage {
  load(): Promise<LedgerEntry[]>;
  append(entry: LedgerEntry): Promise<void>;
}

export class MemoryLedgerStorage implements LedgerStorage {
  readonly lines: string[] = [];

  async load(): Promise<LedgerEntry[]> {
    return this.lines.map(line => ledgerEntrySchema.parse(JSON.parse(line)));
  }

  async append(entry: LedgerEntry): Promise<void> {
    this.lines.push(JSON.stringify(entry));
  }
}

/**
 * Append-only JSON-lines file. A torn last line (crash mid-write) is
 * dropped on load; corruption anywhere else is an error.
 */
export class FileLedgerStorage implements LedgerStorage {
  private logger = createLogger('FileLedgerStorage');

  constructor(private readonly filePath: string) {}

  async load(): Promise<LedgerEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const lines = content.split('\n').filter(line => line.trim().length > 0);
    const entries: LedgerEntry[] = [];
    let tornTail = false;

    lines.forEach((line, index) => {
      try {
        entries.push(ledgerEntrySchema.parse(JSON.parse(line)));
      } catch (error) {
        if (index === lines.length - 1 && !content.endsWith('\n')) {
          this.logger.warn('Dropping incomplete trailing ledger line', { line: index + 1 });
          tornTail = true;
          return;
        }
        throw new Error(`Corrupt ledger line ${index + 1} in ${this.filePath}: ${errorMessage(error)}`);
      }
    });

    // The next append must start on a fresh line.
    if (tornTail) {
      await fs.truncate(this.filePath, Buffer.byteLength(content.slice(0, content.lastIndexOf('\n') + 1), 'utf-8'));
    }

    return entries;
  }

  async append(entry: LedgerEntry): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
  }
}

export function createLedgerStorage(location: string): LedgerStorage {
  return location === ':memory:' ? new MemoryLedgerStorage() : new FileLedgerStorage(location);
}

export interface TradeLedgerOptions {
  initialEquity: number;
  now?: () => number;
}

/**
 * Ledger of every open, close, rejection and breaker transition. Appends are
 * serialized; an entry is folded into the live account only after storage
 * accepted it.
 */
export class TradeLedger {
  private logger = createLogger('TradeLedger');
  private readonly writeLock = new Mutex();
  private readonly now: () => number;
  private log: LedgerEntry[] = [];
  private live: AccountState;

  constructor(private readonly storage: LedgerStorage, private readonly options: TradeLedgerOptions) {
    this.now = options.now ?? Date.now;
    this.live = initialAccountState(options.initialEquity);
  }

  async load(): Promise<AccountState> {
    const entries = await this.storage.load();
    let previous = 0;
    for (const entry of entries) {
      if (entry.seq <= previous) {
        throw new Error(`Ledger sequence out of order at seq ${entry.seq}`);
      }
      previous = entry.seq;
    }

    this.log = entries;
    this.live = entries.reduce(applyEntry, initialAccountState(this.options.initialEquity));
    this.logger.info('Ledger loaded', {
      entries: entries.length,
      equity: this.live.equity,
      openPositions: this.live.openPositions.length
    });
    return this.state();
  }

  private async write<E extends LedgerEntry>(build: (seq: number) => E): Promise<E> {
    return this.writeLock.runExclusive(async () => {
      const entry = build(this.live.lastSequence + 1);
      try {
        await this.storage.append(entry);
      } catch (error) {
        this.logger.error('Ledger append failed', { kind: entry.kind, seq: entry.seq, error });
        throw new LedgerWriteFailure(`Failed to append ${entry.kind} entry: ${errorMessage(error)}`, { cause: error });
      }
      this.log.push(entry);
      this.live = applyEntry(this.live, entry);
      return entry;
    });
  }

  appendEntry(draft: LedgerEntryDraft): Promise<LedgerEntry> {
    return this.write(seq => ({ ...draft, seq }));
  }

  append(trade: Trade): Promise<TradeEntry> {
    return this.write(seq => ({ seq, timestamp: trade.closedAt, kind: 'TRADE', trade: { ...trade } }));
  }

  appendPositionOpened(position: Position, fee: number, clientOrderId?: string) {
    return this.write(seq => ({
      seq,
      timestamp: position.openedAt,
      kind: 'POSITION_OPENED' as const,
      position: { ...position },
      fee,
      clientOrderId
    }));
  }

  appendRejection(
    intent: TradeIntent,
    reason: RejectionReason,
    decision?: RiskDecision,
    detail?: string
  ): Promise<RejectionEntry> {
    return this.write(seq => ({
      seq,
      timestamp: this.now(),
      kind: 'REJECTION',
      symbol: intent.symbol,
      reason,
      intent: { ...intent },
      decision: decision ? { ...decision } : undefined,
      detail
    }));
  }

  appendBreakerTrip(state: TrippedState, reason: string, timestamp = this.now()) {
    return this.write(seq => ({ seq, timestamp, kind: 'BREAKER_TRIPPED' as const, state, reason }));
  }

  appendBreakerReset(
    scope: 'OPERATOR' | 'DAILY',
    operator: string,
    previous: BreakerState,
    timestamp = this.now()
  ) {
    return this.write(seq => ({ seq, timestamp, kind: 'BREAKER_RESET' as const, scope, operator, previous }));
  }

  /** Account state as maintained from appends, rolled to the current trading day. */
  state(now = this.now()): AccountState {
    return rollToDay(this.live, utcDay(now));
  }

  /** Recomputes the account from the stored entries alone. */
  replay(now = this.now()): AccountState {
    return reduceEntries(this.options.initialEquity, this.log, now);
  }

  entries(): readonly LedgerEntry[] {
    return this.log;
  }

  trades(symbol?: string): Trade[] {
    const trades: Trade[] = [];
    for (const entry of this.log) {
      if (entry.kind === 'TRADE' && (symbol === undefined || entry.trade.symbol === symbol)) {
        trades.push(entry.trade);
      }
    }
    return trades;
  }

  rejections(symbol?: string): RejectionEntry[] {
    const rejections: RejectionEntry[] = [];
    for (const entry of this.log) {
      if (entry.kind === 'REJECTION' && (symbol === undefined || entry.symbol === symbol)) {
        rejections.push(entry);
      }
    }
    return rejections;
  }

  /** Share of winning trades, or null below `minTrades` closed trades. */
  historicalWinRate(symbol?: string, minTrades = 1): number | null {
    const trades = this.trades(symbol);
    if (trades.length === 0 || trades.length < minTrades) return null;
    return trades.filter(trade => trade.realizedPnl > 0).length / trades.length;
  }

  performance(): PerformanceMetrics {
    const trades = this.trades();
    const pnls = trades.map(trade => trade.realizedPnl);
    const wins = pnls.filter(pnl => pnl > 0);
    const losses = pnls.filter(pnl => pnl < 0);
    const totalPnl = pnls.reduce((sum, pnl) => sum + pnl, 0);
    const grossProfit = wins.reduce((sum, pnl) => sum + pnl, 0);
    const grossLoss = Math.abs(losses.reduce((sum, pnl) => sum + pnl, 0));
    const avgPnl = trades.length > 0 ? totalPnl / trades.length : 0;

    let longestWinStreak = 0;
    let longestLossStreak = 0;
    let run = 0; // positive while winning, negative while losing
    for (const pnl of pnls) {
      if (pnl > 0) run = run > 0 ? run + 1 : 1;
      else if (pnl < 0) run = run < 0 ? run - 1 : -1;
      else run = 0;
      longestWinStreak = Math.max(longestWinStreak, run);
      longestLossStreak = Math.max(longestLossStreak, -run);
    }

    let sharpeRatio = 0;
    if (pnls.length >= 2) {
      const variance = pnls.reduce((sum, pnl) => sum + Math.pow(pnl - avgPnl, 2), 0) / pnls.length;
      const std = Math.sqrt(variance);
      sharpeRatio = std > 0 ? avgPnl / std : 0;
    }

    const rejections = this.rejections();
    const rejectionsByReason: Partial<Record<RejectionReason, number>> = {};
    for (const rejection of rejections) {
      rejectionsByReason[rejection.reason] = (rejectionsByReason[rejection.reason] ?? 0) + 1;
    }
    const opened = this.log.filter(entry => entry.kind === 'POSITION_OPENED').length;
    const decisions = opened + rejections.length;

    return {
      totalTrades: trades.length,
      winningTrades: wins.length,
      losingTrades: losses.length,
      winRate: trades.length > 0 ? wins.length / trades.length : 0,
      totalPnl,
      avgPnl,
      totalFees: trades.reduce((sum, trade) => sum + trade.fees, 0),
      totalFunding: trades.reduce((sum, trade) => sum + trade.fundingPaid, 0),
      bestTrade: pnls.length > 0 ? Math.max(...pnls) : 0,
      worstTrade: pnls.length > 0 ? Math.min(...pnls) : 0,
      longestWinStreak,
      longestLossStreak,
      avgTradeDurationMinutes: trades.length > 0
        ? trades.reduce((sum, trade) => sum + trade.durationMinutes, 0) / trades.length
        : 0,
      profitFactor: grossLoss > 0 ? grossProfit / grossLoss : 0,
      sharpeRatio,
      rejections: rejections.length,
      rejectionRate: decisions > 0 ? rejections.length / decisions : 0,
      rejectionsByReason
    };
  }
}
