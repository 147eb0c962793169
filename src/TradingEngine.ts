import { EventEmitter } from 'events';
import type { EngineConfig } from './types/config';
import type {
  BreakerState,
  ExecutionResult,
  Hold,
  MarketContext,
  PerformanceMetrics,
  Position,
  RejectionEntry,
  RejectionReason,
  RiskDecision,
  Trade
} from './types/trading';
import { isHold, sideForDirection } from './types/trading';
import type { ExchangeAdapter, MarketLimits } from './exchange/ExchangeAdapter';
import type { TickerStream } from './exchange/TickerStream';
import { TechnicalIndicators } from './indicators/technical';
import { AccountManager } from './managers/AccountManager';
import { CircuitBreaker, type BreakerSnapshot, type ResetResult } from './managers/CircuitBreaker';
import { ConsensusAggregator } from './managers/ConsensusAggregator';
import { OrderExecutionEngine } from './managers/OrderExecutionEngine';
import { PositionManager } from './managers/PositionManager';
import { RiskManager } from './managers/RiskManager';
import type { NotificationService } from './services/NotificationService';
import type { TradeLedger } from './services/TradeLedger';
import { SignalCollector } from './signals/SignalCollector';
import type { SignalSource } from './signals/SignalSource';
import { createLogger } from './utils/logger';
import { EngineError, RiskRejected, errorMessage } from './utils/errors';
import type { SleepFn } from './utils/retry';
import { withTimeout } from './utils/timeout';

export type CycleOutcome =
  | { symbol: string; outcome: 'hold'; hold: Hold }
  | { symbol: string; outcome: 'rejected'; reason: RejectionReason; decision?: RiskDecision }
  | { symbol: string; outcome: 'executed'; result: ExecutionResult }
  | { symbol: string; outcome: 'error'; error: string }
  | { symbol: string; outcome: 'skipped'; reason: string };

export interface EngineStatus {
  isRunning: boolean;
  mode: EngineConfig['trading']['mode'];
  symbols: string[];
  breaker: BreakerState;
  halted: boolean;
  equity: number;
  availableMargin: number;
  usedMargin: number;
  reservedMargin: number;
  dailyRealizedPnl: number;
  equityAtDayStart: number;
  consecutiveLosses: number;
  openPositions: number;
  unrealizedPnl: number;
  lastSequence: number;
}

export interface TradingEngineDeps {
  config: EngineConfig;
  exchange: ExchangeAdapter;
  ledger: TradeLedger;
  sources: SignalSource[];
  notifications?: NotificationService;
  tickerStream?: TickerStream;
  now?: () => number;
  sleep?: SleepFn;
  random?: () => number;
}

/**
 * Wires the decision pipeline: signals, consensus, breaker gate, risk,
 * execution and position lifecycle, one independent cycle per symbol over a
 * shared account and breaker.
 */
export class TradingEngine extends EventEmitter {
  readonly accounts: AccountManager;
  readonly breaker: CircuitBreaker;
  readonly aggregator: ConsensusAggregator;
  readonly risk: RiskManager;
  readonly positions: PositionManager;
  readonly execution: OrderExecutionEngine;
  readonly collector: SignalCollector;

  private logger = createLogger('TradingEngine');
  private readonly config: EngineConfig;
  private readonly exchange: ExchangeAdapter;
  private readonly ledger: TradeLedger;
  private readonly notifications?: NotificationService;
  private readonly tickerStream?: TickerStream;
  private readonly now: () => number;
  private isRunning = false;
  private cycleTimers: NodeJS.Timeout[] = [];
  private runningCycles = new Set<string>();
  private lastPrices = new Map<string, number>();

  constructor(deps: TradingEngineDeps) {
    super();
    const { config } = deps;
    this.config = config;
    this.exchange = deps.exchange;
    this.ledger = deps.ledger;
    this.notifications = deps.notifications;
    this.tickerStream = deps.tickerStream;
    this.now = deps.now ?? Date.now;

    this.accounts = new AccountManager(this.ledger, this.now);
    this.breaker = new CircuitBreaker(this.ledger, config.breaker, this.now);
    this.collector = new SignalCollector(deps.sources, config.signals.timeoutMs, this.now);
    this.aggregator = new ConsensusAggregator(config.consensus, this.collector.weightedSources(), this.now);
    this.risk = new RiskManager(config.risk, config.consensus.confidenceThreshold);
    this.positions = new PositionManager({
      exchange: this.exchange,
      accounts: this.accounts,
      params: config.lifecycle,
      takerFeeRate: config.execution.takerFeeRate,
      requestTimeoutMs: config.execution.requestTimeoutMs,
      now: this.now
    });
    this.execution = new OrderExecutionEngine({
      params: config.execution,
      maintenanceMarginRate: config.risk.maintenanceMarginRate,
      limits: {
        maxPositionsPerSymbol: config.risk.maxPositionsPerSymbol,
        maxOpenPositions: config.risk.maxOpenPositions
      },
      exchange: this.exchange,
      accounts: this.accounts,
      ledger: this.ledger,
      positions: this.positions,
      sleep: deps.sleep,
      now: this.now,
      random: deps.random
    });

    this.wireEvents();
  }

  private wireEvents(): void {
    this.positions.on('position_opened', (position: Position) => {
      this.notifications?.notify({ type: 'trade_opened', position });
      this.emit('position_opened', position);
    });

    this.positions.on('position_closed', ({ position, trade }: { position: Position; trade: Trade }) => {
      this.notifications?.notify({ type: 'trade_closed', trade });
      this.emit('trade', { position, trade });
      this.breaker.evaluate(this.accounts.snapshot()).catch(error => {
        this.logger.error('Breaker evaluation after close failed', error);
      });
    });

    this.breaker.on('tripped', ({ state, reason }: { state: BreakerState; reason: string }) => {
      this.notifications?.notify({ type: 'circuit_breaker_tripped', state, reason });
      this.emit('breaker', this.breaker.snapshot());
    });

    this.breaker.on('reset', () => {
      this.emit('breaker', this.breaker.snapshot());
    });

    this.execution.on('execution_error', ({ symbol, message }: { symbol: string; message: string }) => {
      this.notifications?.notify({ type: 'execution_error', symbol, message });
      this.emit('execution_error', { symbol, message });
    });

    this.tickerStream?.on('ticker', ({ symbol, last }: { symbol: string; last: number }) => {
      this.lastPrices.set(symbol, last);
      this.positions.onTick(symbol, last).catch(error => {
        this.logger.error('Tick exit check failed', { symbol, error });
      });
    });
  }

  async initialize(): Promise<void> {
    this.logger.info('Initializing trading engine', {
      mode: this.config.trading.mode,
      symbols: this.config.trading.symbols,
      sources: this.collector.weightedSources().map(source => source.id)
    });

    const account = await this.ledger.load();
    this.breaker.restore();
    this.positions.restore(account.openPositions);
    if (this.breaker.state === 'TRIPPED_MANUAL') {
      this.execution.halt('restored manual trip');
    }

    await this.exchange.initialize();
    await this.breaker.evaluate(this.accounts.snapshot());

    this.logger.info('Trading engine initialized', {
      equity: account.equity,
      openPositions: account.openPositions.length,
      breaker: this.breaker.state
    });
  }

  start(): void {
    if (this.isRunning) {
      this.logger.warn('Engine is already running');
      return;
    }
    this.isRunning = true;
    this.logger.info('Starting trading engine');

    for (const symbol of this.config.trading.symbols) {
      const run = (): void => {
        this.runCycle(symbol).catch(error => {
          this.logger.error('Cycle crashed', { symbol, error });
        });
      };
      run();
      this.cycleTimers.push(setInterval(run, this.config.trading.cycleIntervalMs));
    }

    this.positions.startMonitoring();
    if (this.tickerStream && this.config.lifecycle.useTickerStream) {
      this.tickerStream.connect();
      this.config.trading.symbols.forEach(symbol => this.tickerStream?.subscribe(symbol));
    }
    this.emitStatus();
  }

  stop(): void {
    this.logger.info('Stopping trading engine');
    this.isRunning = false;
    this.cycleTimers.forEach(timer => clearInterval(timer));
    this.cycleTimers = [];
    this.positions.stopMonitoring();
    this.tickerStream?.disconnect();
    this.emitStatus();
  }

  private async marketContext(symbol: string): Promise<MarketContext> {
    const { timeframe, candleLimit } = this.config.trading;
    const timeoutMs = this.config.execution.requestTimeoutMs;
    const [candles, ticker] = await Promise.all([
      withTimeout(this.exchange.fetchCandles(symbol, timeframe, candleLimit), timeoutMs, `candles ${symbol}`),
      withTimeout(this.exchange.getTicker(symbol), timeoutMs, `ticker ${symbol}`)
    ]);
    const closes = candles.map(candle => candle.close);
    const price = ticker.last > 0 ? ticker.last : closes[closes.length - 1] ?? 0;
    this.lastPrices.set(symbol, price);

    return {
      symbol,
      price,
      candles,
      volatility: TechnicalIndicators.volatility(closes),
      timestamp: this.now()
    };
  }

  private async marketLimits(symbol: string): Promise<MarketLimits> {
    try {
      return await this.exchange.getMarketLimits(symbol);
    } catch (error) {
      this.logger.warn('Market limits unavailable', { symbol, error: errorMessage(error) });
      return {};
    }
  }

  /**
   * One decision cycle for `symbol`. Failures are contained here so a
   * broken symbol never stops the others.
   */
  async runCycle(symbol: string): Promise<CycleOutcome> {
    if (this.runningCycles.has(symbol)) {
      return { symbol, outcome: 'skipped', reason: 'previous cycle still running' };
    }
    this.runningCycles.add(symbol);

    try {
      const outcome = await this.decide(symbol);
      this.emit('cycle', outcome);
      return outcome;
    } catch (error) {
      this.logger.error('Decision cycle failed', { symbol, error: errorMessage(error) });
      const outcome: CycleOutcome = { symbol, outcome: 'error', error: errorMessage(error) };
      this.emit('cycle', outcome);
      return outcome;
    } finally {
      this.runningCycles.delete(symbol);
      this.emitStatus();
    }
  }

  private async decide(symbol: string): Promise<CycleOutcome> {
    const context = await this.marketContext(symbol);
    await this.positions.onTick(symbol, context.price);

    const collection = await this.collector.collect(symbol, context);
    const consensus = this.aggregator.aggregate(symbol, collection.signals);
    if (isHold(consensus)) {
      return { symbol, outcome: 'hold', hold: consensus };
    }

    const intent = consensus;
    const side = sideForDirection(intent.direction);
    const reversed = await this.positions.closeOpposite(symbol, side);
    if (reversed.length > 0) {
      this.logger.info('Positions reversed on opposite consensus', { symbol, closed: reversed.length });
    }

    const account = this.accounts.snapshot();
    const breakerState = await this.breaker.evaluate(account);
    const limits = await this.marketLimits(symbol);
    const openOnSymbol = account.openPositions.filter(position => position.symbol === symbol).length;

    const decision = this.risk.evaluate(
      intent,
      account,
      {
        price: context.price,
        volatility: context.volatility,
        historicalWinRate: this.ledger.historicalWinRate(symbol, this.config.risk.minWinRateTrades),
        maxLeverage: limits.maxLeverage,
        minOrderNotional: limits.minNotional
      },
      {
        breakerState,
        openPositionsOnSymbol: openOnSymbol,
        openPositionsTotal: account.openPositions.length,
        reservedMargin: this.accounts.reservedMargin()
      }
    );

    if (decision.rejected) {
      const reason = decision.rejectionReason ?? 'execution_failed';
      await this.ledger.appendRejection(intent, reason, decision, decision.detail);
      this.emit('rejection', { symbol, reason, detail: decision.detail });
      return { symbol, outcome: 'rejected', reason, decision };
    }

    try {
      const result = await this.execution.execute(decision, intent);
      return { symbol, outcome: 'executed', result };
    } catch (error) {
      if (error instanceof RiskRejected) {
        this.emit('rejection', { symbol, reason: error.reason, detail: error.message });
        return { symbol, outcome: 'rejected', reason: error.reason, decision };
      }
      if (error instanceof EngineError) {
        return { symbol, outcome: 'error', error: `${error.code}: ${error.message}` };
      }
      throw error;
    }
  }

  /**
   * Operator kill switch: latches a manual trip, aborts in-flight order
   * sequences and optionally closes every open position, including any an
   * aborted order filled in part before it ended.
   */
  async emergencyStop(options: { closePositions?: boolean; reason?: string } = {}): Promise<{ state: BreakerState; closed: Trade[] }> {
    const reason = options.reason ?? 'emergency stop';
    this.logger.error('EMERGENCY STOP', { reason, closePositions: options.closePositions ?? false });

    this.execution.halt(reason);
    const state = await this.breaker.tripManual(reason);
    let closed: Trade[] = [];
    if (options.closePositions) {
      await this.execution.settled();
      closed = await this.positions.closeAll('MANUAL');
    }

    this.emitStatus();
    return { state, closed };
  }

  async resetBreaker(operator: string): Promise<ResetResult> {
    const result = await this.breaker.reset(operator);
    if (result.reset) {
      this.execution.resume();
    }
    this.emitStatus();
    return result;
  }

  getStatus(): EngineStatus {
    const account = this.accounts.snapshot();
    const positions = this.positions.list();
    return {
      isRunning: this.isRunning,
      mode: this.config.trading.mode,
      symbols: this.config.trading.symbols,
      breaker: this.breaker.state,
      halted: this.execution.isHalted(),
      equity: account.equity,
      availableMargin: account.availableMargin,
      usedMargin: account.usedMargin,
      reservedMargin: this.accounts.reservedMargin(),
      dailyRealizedPnl: account.dailyRealizedPnl,
      equityAtDayStart: account.equityAtDayStart,
      consecutiveLosses: account.consecutiveLosses,
      openPositions: positions.length,
      unrealizedPnl: positions.reduce((sum, position) => sum + (position.unrealizedPnl ?? 0), 0),
      lastSequence: account.lastSequence
    };
  }

  getPositions(): Position[] {
    return this.positions.list();
  }

  getTrades(limit = 100): Trade[] {
    return this.ledger.trades().slice(-limit);
  }

  getRejections(limit = 100): RejectionEntry[] {
    return this.ledger.rejections().slice(-limit);
  }

  getPerformance(): PerformanceMetrics {
    return this.ledger.performance();
  }

  getBreaker(): BreakerSnapshot {
    return this.breaker.snapshot();
  }

  getLastPrice(symbol: string): number | undefined {
    return this.lastPrices.get(symbol);
  }

  private emitStatus(): void {
    this.emit('statusUpdate', this.getStatus());
  }
}
