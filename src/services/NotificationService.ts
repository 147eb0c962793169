import type { BreakerState, Position, Trade } from '../types/trading';
import type { NotificationParams } from '../types/config';
import { createLogger } from '../utils/logger';

export type Notification =
  | { type: 'trade_opened'; position: Position }
  | { type: 'trade_closed'; trade: Trade }
  | { type: 'circuit_breaker_tripped'; state: BreakerState; reason: string }
  | { type: 'execution_error'; symbol: string; message: string };

export interface NotificationSink {
  readonly name: string;
  send(notification: Notification, text: string): Promise<void>;
}

export function formatNotification(notification: Notification): string {
  switch (notification.type) {
    case 'trade_opened': {
      const { position } = notification;
      return `📈 Opened ${position.side.toUpperCase()} ${position.symbol} ${position.quantity.toFixed(6)} @ ${position.entryPrice} `
        + `(x${position.leverage.toFixed(2)}, SL ${position.stopLossPrice.toFixed(2)}, TP ${position.takeProfitPrice.toFixed(2)})`;
    }
    case 'trade_closed': {
      const { trade } = notification;
      const sign = trade.realizedPnl >= 0 ? '+' : '';
      return `📉 Closed ${trade.side.toUpperCase()} ${trade.symbol} @ ${trade.exitPrice} `
        + `[${trade.exitReason}] PnL ${sign}${trade.realizedPnl.toFixed(2)}`;
    }
    case 'circuit_breaker_tripped':
      return `🛑 Circuit breaker ${notification.state}: ${notification.reason}`;
    case 'execution_error':
      return `⚠️ Execution error on ${notification.symbol}: ${notification.message}`;
  }
}

export class TelegramSink implements NotificationSink {
  readonly name = 'telegram';

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async send(_notification: Notification, text: string): Promise<void> {
    const response = await this.fetchFn(`https://api.telegram.org/bot${this.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text })
    });
    if (!response.ok) {
      throw new Error(`Telegram API error: ${response.status}`);
    }
  }
}

/**
 * Fire-and-forget fan-out to the configured sinks. Execution errors are
 * throttled per symbol; other events always go out.
 */
export class NotificationService {
  private logger = createLogger('NotificationService');
  private lastSent = new Map<string, number>();

  constructor(
    private readonly sinks: NotificationSink[],
    private readonly params: NotificationParams,
    private readonly now: () => number = Date.now
  ) {}

  static fromConfig(params: NotificationParams, fetchFn: typeof fetch = fetch): NotificationService {
    const sinks: NotificationSink[] = [];
    if (params.telegramBotToken && params.telegramChatId) {
      sinks.push(new TelegramSink(params.telegramBotToken, params.telegramChatId, fetchFn));
    }
    return new NotificationService(sinks, params);
  }

  addSink(sink: NotificationSink): void {
    this.sinks.push(sink);
  }

  private throttleKey(notification: Notification): string | null {
    return notification.type === 'execution_error' ? `execution_error:${notification.symbol}` : null;
  }

  /** Returns whether the notification was dispatched (not throttled). */
  notify(notification: Notification): boolean {
    const key = this.throttleKey(notification);
    const now = this.now();
    if (key) {
      const last = this.lastSent.get(key);
      if (last !== undefined && now - last < this.params.errorThrottleMs) {
        this.logger.debug('Notification throttled', { key });
        return false;
      }
      this.lastSent.set(key, now);
    }

    const text = formatNotification(notification);
    for (const sink of this.sinks) {
      sink.send(notification, text).catch(error => {
        this.logger.warn('Notification delivery failed', { sink: sink.name, type: notification.type, error });
      });
    }
    return true;
  }
}
