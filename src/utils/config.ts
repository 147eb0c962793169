import { z } from 'zod';
import { ConfigService } from '../services/ConfigService';
import type {
  EngineConfig,
  RiskLevel,
  SignalSourceConfig,
  SignalSourceType
} from '../types/config';

export const RISK_LEVEL_LEVERAGE: Record<RiskLevel, number> = {
  CONSERVATIVE: 1,
  MODERATE: 2,
  AGGRESSIVE: 3,
  VERY_AGGRESSIVE: 5
};

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export class ConfigValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

const fraction = z.number().min(0).max(1);
const positive = z.number().positive();

const sourceSchema = z.object({
  id: z.string().min(1),
  type: z.enum(['momentum', 'mean_reversion', 'sentiment', 'llm']),
  weight: z.number().min(0),
  enabled: z.boolean(),
  params: z.record(z.union([z.string(), z.number(), z.boolean()]))
});

export const engineConfigSchema: z.ZodType<EngineConfig> = z.object({
  exchange: z.object({
    id: z.string().min(1),
    apiKey: z.string(),
    apiSecret: z.string(),
    password: z.string().optional(),
    testnet: z.boolean(),
    streamUrl: z.string()
  }),
  trading: z.object({
    mode: z.enum(['paper', 'live']),
    symbols: z.array(z.string().min(1)).min(1),
    timeframe: z.string().min(1),
    candleLimit: z.number().int().min(20),
    cycleIntervalMs: z.number().int().min(1000),
    initialEquity: positive
  }),
  signals: z.object({
    timeoutMs: z.number().int().positive(),
    sources: z.array(sourceSchema).min(1)
  }),
  consensus: z.object({
    confidenceThreshold: z.number().min(0.55).max(0.75),
    minQuorum: z.number().gt(0).max(1)
  }),
  risk: z.object({
    riskLevel: z.enum(['CONSERVATIVE', 'MODERATE', 'AGGRESSIVE', 'VERY_AGGRESSIVE']),
    baseLeverage: z.number().min(1),
    maxLeverage: z.number().min(1),
    baseRiskFraction: z.number().gt(0).max(1),
    maxPositionFraction: z.number().gt(0).max(1),
    confidenceScalarSlope: z.number().min(0),
    volatilitySensitivity: z.number().min(0),
    maintenanceMarginRate: z.number().min(0).lt(1),
    liquidationSafetyBuffer: z.number().gt(0).lt(1),
    stopLossPct: positive,
    takeProfitPct: positive,
    minStopLossPct: positive,
    maxStopLossPct: positive,
    minTakeProfitPct: positive,
    maxTakeProfitPct: positive,
    winRateSensitivity: z.number().min(0),
    minWinRateTrades: z.number().int().min(0),
    minOrderNotional: z.number().min(0),
    maxPositionsPerSymbol: z.number().int().min(1),
    maxOpenPositions: z.number().int().min(1)
  }),
  breaker: z.object({
    dailyLossLimit: z.number().gt(0).max(1),
    maxConsecutiveLosses: z.number().int().min(1)
  }),
  execution: z.object({
    orderType: z.enum(['market', 'limit']),
    limitOffsetBps: z.number().min(0),
    takerFeeRate: fraction,
    retryAttempts: z.number().int().min(1).max(10),
    retryBaseDelayMs: z.number().int().min(0),
    retryMultiplier: z.number().min(1),
    retryJitter: fraction,
    retryMaxTotalMs: z.number().int().positive(),
    requestTimeoutMs: z.number().int().positive(),
    fillPollIntervalMs: z.number().int().min(0),
    fillTimeoutMs: z.number().int().positive()
  }),
  lifecycle: z.object({
    maxHoldingDurationMs: z.number().int().positive(),
    pollIntervalMs: z.number().int().positive(),
    useTickerStream: z.boolean(),
    fundingRatePerInterval: z.number().min(-0.01).max(0.01),
    fundingIntervalMs: z.number().int().positive()
  }),
  ledger: z.object({
    path: z.string().min(1)
  }),
  notifications: z.object({
    telegramBotToken: z.string().optional(),
    telegramChatId: z.string().optional(),
    errorThrottleMs: z.number().int().min(0)
  }),
  server: z.object({
    port: z.number().int().min(0).max(65535),
    operatorToken: z.string(),
    corsOrigins: z.array(z.string())
  })
}).superRefine((config, ctx) => {
  const { risk } = config;
  if (risk.baseLeverage > risk.maxLeverage) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['risk', 'baseLeverage'], message: 'baseLeverage exceeds maxLeverage' });
  }
  if (risk.minStopLossPct > risk.maxStopLossPct) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['risk', 'minStopLossPct'], message: 'minStopLossPct exceeds maxStopLossPct' });
  }
  if (risk.minTakeProfitPct > risk.maxTakeProfitPct) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['risk', 'minTakeProfitPct'], message: 'minTakeProfitPct exceeds maxTakeProfitPct' });
  }
  const ids = new Set<string>();
  for (const source of config.signals.sources) {
    if (ids.has(source.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['signals', 'sources'], message: `duplicate source id ${source.id}` });
    }
    ids.add(source.id);
  }
});

const SOURCE_TYPES: readonly SignalSourceType[] = ['momentum', 'mean_reversion', 'sentiment', 'llm'];

const RISK_LEVELS: readonly RiskLevel[] = ['CONSERVATIVE', 'MODERATE', 'AGGRESSIVE', 'VERY_AGGRESSIVE'];

function isSourceType(value: string): value is SignalSourceType {
  return SOURCE_TYPES.some(type => type === value);
}

function isRiskLevel(value: string): value is RiskLevel {
  return RISK_LEVELS.some(level => level === value);
}

// SIGNAL_SOURCES=momentum:1,mean_reversion:0.8,sentiment:0.5
function parseSources(service: ConfigService): SignalSourceConfig[] {
  const entries = service.getList('SIGNAL_SOURCES', ['momentum:1', 'mean_reversion:1', 'sentiment:0.5', 'llm:1']);
  const sources: SignalSourceConfig[] = [];

  for (const entry of entries) {
    const [type, weight] = entry.split(':');
    if (!isSourceType(type)) {
      throw new ConfigValidationError([`signals.sources: unknown source type ${type}`]);
    }
    const key = type.toUpperCase();
    const params: Record<string, string | number | boolean> = {};
    if (type === 'sentiment') {
      params.url = service.get('SENTIMENT_URL', '') ?? '';
      params.apiKey = service.get('SENTIMENT_API_KEY', '') ?? '';
    }
    if (type === 'llm') {
      params.apiKey = service.get('LLM_API_KEY', '') ?? '';
      params.baseURL = service.get('LLM_BASE_URL', 'https://api.openai.com/v1') ?? '';
      params.model = service.get('LLM_MODEL', 'gpt-4o-mini') ?? '';
    }
    sources.push({
      id: type,
      type,
      weight: weight !== undefined ? parseFloat(weight) : 1,
      enabled: service.getBoolean(`${key}_ENABLED`, true),
      params
    });
  }

  return sources;
}

function buildFromEnv(service: ConfigService): EngineConfig {
  const riskLevel = (service.get('RISK_LEVEL', 'MODERATE') ?? 'MODERATE').toUpperCase();
  const level: RiskLevel = isRiskLevel(riskLevel) ? riskLevel : 'MODERATE';
  const mode = service.get('TRADING_MODE', 'paper') === 'live' ? 'live' : 'paper';
  const orderType = service.get('ORDER_TYPE', 'market') === 'limit' ? 'limit' : 'market';

  return {
    exchange: {
      id: service.get('EXCHANGE_ID', 'binance') ?? 'binance',
      apiKey: service.get('EXCHANGE_API_KEY', '') ?? '',
      apiSecret: service.get('EXCHANGE_API_SECRET', '') ?? '',
      password: service.get('EXCHANGE_PASSWORD'),
      testnet: service.getBoolean('EXCHANGE_TESTNET', true),
      streamUrl: service.get('TICKER_STREAM_URL', 'wss://stream.binance.com:9443/ws') ?? ''
    },
    trading: {
      mode,
      symbols: service.getList('TRADING_PAIRS', ['BTC/USDT', 'ETH/USDT']),
      timeframe: service.get('TIMEFRAME', '15m') ?? '15m',
      candleLimit: service.getNumber('CANDLE_LIMIT', 100),
      cycleIntervalMs: service.getNumber('CYCLE_INTERVAL_MS', 15 * 60 * 1000),
      initialEquity: service.getNumber('INITIAL_EQUITY', 1000)
    },
    signals: {
      timeoutMs: service.getNumber('SIGNAL_TIMEOUT_MS', 5000),
      sources: parseSources(service)
    },
    consensus: {
      confidenceThreshold: service.getNumber('CONFIDENCE_THRESHOLD', 0.6),
      minQuorum: service.getNumber('MIN_QUORUM', 0.3)
    },
    risk: {
      riskLevel: level,
      baseLeverage: service.getNumber('BASE_LEVERAGE', RISK_LEVEL_LEVERAGE[level]),
      maxLeverage: service.getNumber('MAX_LEVERAGE', 10),
      baseRiskFraction: service.getNumber('BASE_RISK_FRACTION', 0.1),
      maxPositionFraction: service.getNumber('MAX_POSITION_FRACTION', 0.5),
      confidenceScalarSlope: service.getNumber('CONFIDENCE_SCALAR_SLOPE', 1),
      volatilitySensitivity: service.getNumber('VOLATILITY_SENSITIVITY', 10),
      maintenanceMarginRate: service.getNumber('MAINTENANCE_MARGIN_RATE', 0.05),
      liquidationSafetyBuffer: service.getNumber('LIQUIDATION_SAFETY_BUFFER', 0.2),
      stopLossPct: service.getNumber('STOP_LOSS_PCT', 0.02),
      takeProfitPct: service.getNumber('TAKE_PROFIT_PCT', 0.05),
      minStopLossPct: service.getNumber('MIN_STOP_LOSS_PCT', 0.005),
      maxStopLossPct: service.getNumber('MAX_STOP_LOSS_PCT', 0.05),
      minTakeProfitPct: service.getNumber('MIN_TAKE_PROFIT_PCT', 0.01),
      maxTakeProfitPct: service.getNumber('MAX_TAKE_PROFIT_PCT', 0.1),
      winRateSensitivity: service.getNumber('WIN_RATE_SENSITIVITY', 1),
      minWinRateTrades: service.getNumber('MIN_WIN_RATE_TRADES', 10),
      minOrderNotional: service.getNumber('MIN_ORDER_NOTIONAL', 10),
      maxPositionsPerSymbol: service.getNumber('MAX_POSITIONS_PER_SYMBOL', 1),
      maxOpenPositions: service.getNumber('MAX_POSITIONS', 3)
    },
    breaker: {
      dailyLossLimit: service.getNumber('DAILY_LOSS_LIMIT', 0.05),
      maxConsecutiveLosses: service.getNumber('MAX_CONSECUTIVE_LOSSES', 4)
    },
    execution: {
      orderType,
      limitOffsetBps: service.getNumber('LIMIT_OFFSET_BPS', 5),
      takerFeeRate: service.getNumber('TAKER_FEE_RATE', 0.0005),
      retryAttempts: service.getNumber('RETRY_ATTEMPTS', 4),
      retryBaseDelayMs: service.getNumber('RETRY_BASE_DELAY_MS', 1000),
      retryMultiplier: service.getNumber('RETRY_MULTIPLIER', 2),
      retryJitter: service.getNumber('RETRY_JITTER', 0.2),
      retryMaxTotalMs: service.getNumber('RETRY_MAX_TOTAL_MS', 30000),
      requestTimeoutMs: service.getNumber('REQUEST_TIMEOUT_MS', 10000),
      fillPollIntervalMs: service.getNumber('FILL_POLL_INTERVAL_MS', 1000),
      fillTimeoutMs: service.getNumber('FILL_TIMEOUT_MS', 20000)
    },
    lifecycle: {
      maxHoldingDurationMs: service.getNumber('MAX_HOLDING_DURATION_MS', 24 * 60 * 60 * 1000),
      pollIntervalMs: service.getNumber('POSITION_POLL_INTERVAL_MS', 30000),
      useTickerStream: service.getBoolean('USE_TICKER_STREAM', false),
      fundingRatePerInterval: service.getNumber('FUNDING_RATE', 0),
      fundingIntervalMs: service.getNumber('FUNDING_INTERVAL_MS', 8 * 60 * 60 * 1000)
    },
    ledger: {
      path: service.get('LEDGER_PATH', 'data/ledger.jsonl') ?? 'data/ledger.jsonl'
    },
    notifications: {
      telegramBotToken: service.get('TELEGRAM_BOT_TOKEN'),
      telegramChatId: service.get('TELEGRAM_CHAT_ID'),
      errorThrottleMs: service.getNumber('ERROR_NOTIFY_THROTTLE_MS', 5 * 60 * 1000)
    },
    server: {
      port: service.getNumber('PORT', 3006),
      operatorToken: service.get('OPERATOR_TOKEN', '') ?? '',
      corsOrigins: service.getList('CORS_ORIGINS', ['http://localhost:3005'])
    }
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDeep(base: object, patch: object): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value;
  }
  return result;
}

export function validateConfig(candidate: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Builds the engine configuration from env files and the process environment,
 * applies overrides and validates the result. Live mode additionally requires
 * exchange credentials.
 */
export function loadConfig(
  overrides: DeepPartial<EngineConfig> = {},
  service: ConfigService = ConfigService.getInstance()
): EngineConfig {
  const merged = mergeDeep(buildFromEnv(service), overrides);
  const config = validateConfig(merged);

  if (config.trading.mode === 'live' && (!config.exchange.apiKey || !config.exchange.apiSecret)) {
    throw new ConfigValidationError(['exchange: live mode requires EXCHANGE_API_KEY and EXCHANGE_API_SECRET']);
  }

  return config;
}
