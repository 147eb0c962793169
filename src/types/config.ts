export type TradingMode = 'paper' | 'live';
export type RiskLevel = 'CONSERVATIVE' | 'MODERATE' | 'AGGRESSIVE' | 'VERY_AGGRESSIVE';
export type SignalSourceType = 'momentum' | 'mean_reversion' | 'sentiment' | 'llm';
export type OrderType = 'market' | 'limit';

export interface EngineConfig {
  exchange: ExchangeConfig;
  trading: TradingParams;
  signals: SignalParams;
  consensus: ConsensusParams;
  risk: RiskParams;
  breaker: BreakerParams;
  execution: ExecutionParams;
  lifecycle: LifecycleParams;
  ledger: LedgerParams;
  notifications: NotificationParams;
  server: ServerParams;
}

export interface ExchangeConfig {
  id: string; // ccxt exchange id
  apiKey: string;
  apiSecret: string;
  password?: string;
  testnet: boolean;
  streamUrl: string;
}

export interface TradingParams {
  mode: TradingMode;
  symbols: string[];
  timeframe: string;
  candleLimit: number;
  cycleIntervalMs: number;
  initialEquity: number;
}

export interface SignalSourceConfig {
  id: string;
  type: SignalSourceType;
  weight: number;
  enabled: boolean;
  params: Record<string, string | number | boolean>;
}

export interface SignalParams {
  timeoutMs: number;
  sources: SignalSourceConfig[];
}

export interface ConsensusParams {
  confidenceThreshold: number;
  minQuorum: number; // fraction of configured sources
}

export interface RiskParams {
  riskLevel: RiskLevel;
  baseLeverage: number;
  maxLeverage: number;
  baseRiskFraction: number;
  maxPositionFraction: number;
  confidenceScalarSlope: number;
  volatilitySensitivity: number;
  maintenanceMarginRate: number;
  liquidationSafetyBuffer: number;
  stopLossPct: number;
  takeProfitPct: number;
  minStopLossPct: number;
  maxStopLossPct: number;
  minTakeProfitPct: number;
  maxTakeProfitPct: number;
  winRateSensitivity: number;
  minWinRateTrades: number;
  minOrderNotional: number;
  maxPositionsPerSymbol: number;
  maxOpenPositions: number;
}

export interface BreakerParams {
  dailyLossLimit: number; // fraction of equity at day start
  maxConsecutiveLosses: number;
}

export interface ExecutionParams {
  orderType: OrderType;
  limitOffsetBps: number;
  takerFeeRate: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
  retryMultiplier: number;
  retryJitter: number; // 0-1
  retryMaxTotalMs: number;
  requestTimeoutMs: number;
  fillPollIntervalMs: number;
  fillTimeoutMs: number;
}

export interface LifecycleParams {
  maxHoldingDurationMs: number;
  pollIntervalMs: number;
  useTickerStream: boolean;
  // Perpetual funding charged on entry notional per whole interval held; longs pay a positive rate
  fundingRatePerInterval: number;
  fundingIntervalMs: number;
}

export interface LedgerParams {
  path: string; // ':memory:' keeps entries in process only
}

export interface NotificationParams {
  telegramBotToken?: string;
  telegramChatId?: string;
  errorThrottleMs: number;
}

export interface ServerParams {
  port: number;
  operatorToken: string;
  corsOrigins: string[];
}
