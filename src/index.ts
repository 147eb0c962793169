import type { EngineConfig } from './types/config';
import type { ExchangeAdapter } from './exchange/ExchangeAdapter';
import { CcxtExchangeAdapter } from './exchange/CcxtExchangeAdapter';
import { PaperExchange } from './exchange/PaperExchange';
import { TickerStream } from './exchange/TickerStream';
import { NotificationService } from './services/NotificationService';
import { TradeLedger, createLedgerStorage } from './services/TradeLedger';
import { createSignalSources } from './signals/registry';
import { TradingEngine } from './TradingEngine';
import { TradingServer } from './server';
import { loadConfig } from './utils/config';
import { createLogger } from './utils/logger';

const logger = createLogger('Main');

export interface Application {
  config: EngineConfig;
  engine: TradingEngine;
  server: TradingServer;
}

function createExchange(config: EngineConfig): ExchangeAdapter {
  const venue = new CcxtExchangeAdapter(config.exchange);
  if (config.trading.mode === 'live') {
    logger.warn('LIVE TRADING MODE: orders will be sent to the exchange', { exchange: config.exchange.id });
    return venue;
  }
  // Paper mode reads real market data and fills orders locally
  return new PaperExchange(venue, {
    takerFeeRate: config.execution.takerFeeRate,
    initialBalance: config.trading.initialEquity
  });
}

export function createApplication(config: EngineConfig = loadConfig()): Application {
  const ledger = new TradeLedger(createLedgerStorage(config.ledger.path), {
    initialEquity: config.trading.initialEquity
  });

  const engine = new TradingEngine({
    config,
    exchange: createExchange(config),
    ledger,
    sources: createSignalSources(config.signals.sources),
    notifications: NotificationService.fromConfig(config.notifications),
    tickerStream: config.lifecycle.useTickerStream ? new TickerStream(config.exchange.streamUrl) : undefined
  });

  return { config, engine, server: new TradingServer(engine, config.server) };
}

async function main(): Promise<void> {
  const { engine, server } = createApplication();

  await engine.initialize();
  engine.start();
  await server.listen();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down...`);
    engine.stop();
    server.close()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Failed to start', error);
    process.exit(1);
  });
}
