import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server as HttpServer } from 'http';
import { timingSafeEqual } from 'crypto';
import { Server } from 'socket.io';
import cors from 'cors';
import { z } from 'zod';
import type { ServerParams } from './types/config';
import type { TradingEngine } from './TradingEngine';
import { createLogger } from './utils/logger';
import { errorMessage } from './utils/errors';

const logger = createLogger('Server');

const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(100)
});

const emergencyStopSchema = z.object({
  closePositions: z.boolean().default(false),
  reason: z.string().min(1).max(200).optional()
});

const breakerResetSchema = z.object({
  operator: z.string().min(1).max(100)
});

// Events forwarded from the engine to every connected socket
const FORWARDED_EVENTS = ['statusUpdate', 'trade', 'position_opened', 'breaker', 'execution_error', 'rejection'] as const;

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Bearer-token guard for operator actions. With no token configured the
 * operator endpoints stay closed.
 */
export function operatorAuth(token: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!token) {
      res.status(403).json({ error: 'Operator actions are disabled: OPERATOR_TOKEN not set' });
      return;
    }
    const header = req.header('authorization') ?? '';
    const provided = header.startsWith('Bearer ') ? header.slice('Bearer '.length) : '';
    if (!provided || !tokensMatch(token, provided)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}

export class TradingServer {
  readonly app: express.Application;
  private httpServer: HttpServer;
  private io: Server;

  constructor(private readonly engine: TradingEngine, private readonly params: ServerParams) {
    this.app = express();
    this.httpServer = createServer(this.app);

    this.io = new Server(this.httpServer, {
      cors: {
        origin: params.corsOrigins,
        methods: ['GET', 'POST']
      },
      transports: ['websocket', 'polling']
    });

    this.setupMiddleware();
    this.setupRoutes();
    this.setupSocketHandlers();
  }

  private setupMiddleware(): void {
    this.app.use(cors({ origin: this.params.corsOrigins }));
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    const guard = operatorAuth(this.params.operatorToken);

    this.app.get('/health', (_req, res) => {
      const status = this.engine.getStatus();
      res.json({
        status: 'ok',
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        engineRunning: status.isRunning,
        breaker: status.breaker
      });
    });

    this.app.get('/api/status', (_req, res) => {
      res.json(this.engine.getStatus());
    });

    this.app.get('/api/positions', (_req, res) => {
      res.json(this.engine.getPositions());
    });

    this.app.get('/api/trades', (req, res) => {
      const query = listQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: 'Invalid limit' });
        return;
      }
      res.json(this.engine.getTrades(query.data.limit));
    });

    this.app.get('/api/rejections', (req, res) => {
      const query = listQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: 'Invalid limit' });
        return;
      }
      res.json(this.engine.getRejections(query.data.limit));
    });

    this.app.get('/api/performance', (_req, res) => {
      res.json(this.engine.getPerformance());
    });

    this.app.get('/api/breaker', (_req, res) => {
      res.json(this.engine.getBreaker());
    });

    this.app.post('/api/emergency-stop', guard, async (req, res) => {
      const body = emergencyStopSchema.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: body.error.issues[0]?.message ?? 'Invalid body' });
        return;
      }
      try {
        const result = await this.engine.emergencyStop(body.data);
        res.json({ success: true, state: result.state, closed: result.closed.length });
      } catch (error) {
        logger.error('Emergency stop failed', error);
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    this.app.post('/api/breaker/reset', guard, async (req, res) => {
      const body = breakerResetSchema.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: 'operator is required' });
        return;
      }
      try {
        const result = await this.engine.resetBreaker(body.data.operator);
        res.status(result.reset ? 200 : 409).json(result);
      } catch (error) {
        logger.error('Breaker reset failed', error);
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });
  }

  private setupSocketHandlers(): void {
    this.io.on('connection', socket => {
      logger.info('Client connected', { id: socket.id });
      socket.emit('status', this.engine.getStatus());

      const handlers = FORWARDED_EVENTS.map(event => {
        const handler = (data: unknown): void => {
          socket.emit(event === 'statusUpdate' ? 'status' : event, data);
        };
        this.engine.on(event, handler);
        return { event, handler };
      });

      socket.on('disconnect', () => {
        logger.info('Client disconnected', { id: socket.id });
        handlers.forEach(({ event, handler }) => this.engine.off(event, handler));
      });
    });
  }

  /** Starts listening and resolves with the bound port. */
  listen(port: number = this.params.port): Promise<number> {
    return new Promise((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, () => {
        const address = this.httpServer.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        logger.info(`Operator API listening on port ${bound}`);
        resolve(bound);
      });
    });
  }

  close(): Promise<void> {
    const listening = this.httpServer.listening;
    return new Promise((resolve, reject) => {
      // Closes the sockets and the underlying http server
      this.io.close(error => {
        if (error && listening) reject(error);
        else resolve();
      });
    });
  }
}
