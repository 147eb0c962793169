import { describe, expect, it, vi } from 'vitest';
import {
  NotificationService,
  TelegramSink,
  formatNotification,
  type Notification,
  type NotificationSink
} from './NotificationService';
import { FakeClock, position, trade } from '../testing/fakes';

class RecordingSink implements NotificationSink {
  readonly name = 'recording';
  readonly sent: string[] = [];

  async send(_notification: Notification, text: string): Promise<void> {
    this.sent.push(text);
  }
}

const params = { errorThrottleMs: 60_000 };

describe('formatNotification', () => {
  it('describes opened and closed trades', () => {
    expect(formatNotification({ type: 'trade_opened', position: position() }))
      .toBe('📈 Opened LONG BTC/USDT 2.000000 @ 100 (x2.00, SL 98.00, TP 105.00)');
    expect(formatNotification({ type: 'trade_closed', trade: trade() }))
      .toBe('📉 Closed LONG BTC/USDT @ 101 [TAKE_PROFIT] PnL +1.00');
    expect(formatNotification({ type: 'trade_closed', trade: trade({ realizedPnl: -2.5 }) }))
      .toBe('📉 Closed LONG BTC/USDT @ 101 [TAKE_PROFIT] PnL -2.50');
  });

  it('describes breaker trips and execution errors', () => {
    expect(formatNotification({ type: 'circuit_breaker_tripped', state: 'TRIPPED_DAILY', reason: 'daily loss 5.20%' }))
      .toBe('🛑 Circuit breaker TRIPPED_DAILY: daily loss 5.20%');
    expect(formatNotification({ type: 'execution_error', symbol: 'BTC/USDT', message: 'venue down' }))
      .toBe('⚠️ Execution error on BTC/USDT: venue down');
  });
});

describe('NotificationService', () => {
  it('throttles repeated execution errors per symbol', () => {
    const clock = new FakeClock();
    const sink = new RecordingSink();
    const service = new NotificationService([sink], params, clock.now);
    const error = (symbol: string): Notification => ({ type: 'execution_error', symbol, message: 'venue down' });

    expect(service.notify(error('BTC/USDT'))).toBe(true);
    expect(service.notify(error('BTC/USDT'))).toBe(false);
    expect(service.notify(error('ETH/USDT'))).toBe(true);

    clock.advance(60_000);
    expect(service.notify(error('BTC/USDT'))).toBe(true);
    expect(sink.sent).toHaveLength(3);
  });

  it('never throttles trade events', () => {
    const sink = new RecordingSink();
    const service = new NotificationService([sink], params);

    service.notify({ type: 'trade_closed', trade: trade() });
    service.notify({ type: 'trade_closed', trade: trade() });

    expect(sink.sent).toHaveLength(2);
  });

  it('keeps going when a sink fails', async () => {
    const failing: NotificationSink = { name: 'failing', send: () => Promise.reject(new Error('offline')) };
    const sink = new RecordingSink();
    const service = new NotificationService([failing], params);
    service.addSink(sink);

    expect(service.notify({ type: 'trade_opened', position: position() })).toBe(true);
    await Promise.resolve();
    expect(sink.sent).toHaveLength(1);
  });

  it('delivers through Telegram when configured', () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response('{}'));
    const service = NotificationService.fromConfig(
      { errorThrottleMs: 0, telegramBotToken: 'test-token', telegramChatId: '42' },
      fetchFn
    );

    service.notify({ type: 'execution_error', symbol: 'BTC/USDT', message: 'venue down' });

    const call = fetchFn.mock.calls[0];
    expect(call?.[0]).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(JSON.parse(String(call?.[1]?.body))).toEqual({
      chat_id: '42',
      text: '⚠️ Execution error on BTC/USDT: venue down'
    });
  });

  it('reports a Telegram HTTP failure', async () => {
    const sink = new TelegramSink('test-token', '42', vi.fn<typeof fetch>(async () => new Response('', { status: 401 })));

    await expect(sink.send({ type: 'execution_error', symbol: 'BTC/USDT', message: 'x' }, 'x'))
      .rejects.toThrow('Telegram API error: 401');
  });
});
