import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TradingServer } from './server';
import type { TradingEngine } from './TradingEngine';
import { engineFixture } from './testing/fakes';

const TOKEN = 'test-secret';

describe('TradingServer', () => {
  let engine: TradingEngine;
  let server: TradingServer;
  let baseUrl: string;

  async function start(operatorToken: string): Promise<void> {
    engine = engineFixture().engine;
    server = new TradingServer(engine, { port: 0, operatorToken, corsOrigins: ['http://localhost:3005'] });
    const port = await server.listen(0);
    baseUrl = `http://127.0.0.1:${port}`;
  }

  function post(path: string, body: unknown, token: string | null = TOKEN): Promise<Response> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (token !== null) headers.Authorization = `Bearer ${token}`;
    return fetch(`${baseUrl}${path}`, { method: 'POST', headers, body: JSON.stringify(body) });
  }

  afterEach(async () => {
    await server.close();
  });

  describe('with an operator token', () => {
    beforeEach(async () => {
      await start(TOKEN);
    });

    it('serves status and account views', async () => {
      await engine.runCycle('BTC/USDT');

      const status = await (await fetch(`${baseUrl}/api/status`)).json();
      const positions = await (await fetch(`${baseUrl}/api/positions`)).json();
      const health = await (await fetch(`${baseUrl}/health`)).json();

      expect(status).toMatchObject({ openPositions: 1, breaker: 'ARMED', mode: 'paper' });
      expect(positions).toHaveLength(1);
      expect(health).toMatchObject({ status: 'ok', engineRunning: false, breaker: 'ARMED' });
    });

    it('validates list limits', async () => {
      expect((await fetch(`${baseUrl}/api/trades?limit=5`)).status).toBe(200);
      expect((await fetch(`${baseUrl}/api/rejections?limit=0`)).status).toBe(400);
      expect(await (await fetch(`${baseUrl}/api/trades?limit=abc`)).json()).toEqual({ error: 'Invalid limit' });
    });

    it('requires the bearer token for operator actions', async () => {
      expect((await post('/api/emergency-stop', {}, null)).status).toBe(401);
      expect((await post('/api/emergency-stop', {}, 'wrong-token')).status).toBe(401);
      expect(engine.getStatus().halted).toBe(false);
    });

    it('stops and resets through the operator endpoints', async () => {
      await engine.runCycle('BTC/USDT');

      const stop = await post('/api/emergency-stop', { closePositions: true, reason: 'operator halt' });
      expect(stop.status).toBe(200);
      expect(await stop.json()).toEqual({ success: true, state: 'TRIPPED_MANUAL', closed: 1 });

      const breaker = await (await fetch(`${baseUrl}/api/breaker`)).json();
      expect(breaker).toMatchObject({ state: 'TRIPPED_MANUAL', reason: 'operator halt' });

      expect((await post('/api/breaker/reset', {})).status).toBe(400);

      const reset = await post('/api/breaker/reset', { operator: 'alice' });
      expect(reset.status).toBe(200);
      expect(await reset.json()).toMatchObject({ reset: true, state: 'ARMED' });
    });

    it('answers 409 when there is nothing the operator can reset', async () => {
      const reset = await post('/api/breaker/reset', { operator: 'alice' });

      expect(reset.status).toBe(409);
      expect(await reset.json()).toMatchObject({ reset: false, state: 'ARMED' });
    });
  });

  it('keeps operator actions closed without a configured token', async () => {
    await start('');

    const response = await post('/api/emergency-stop', {});

    expect(response.status).toBe(403);
    expect(engine.getStatus().halted).toBe(false);
  });
});
