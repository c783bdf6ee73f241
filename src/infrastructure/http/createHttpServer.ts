import type { Server } from 'node:http';
import express, { type ErrorRequestHandler, type Express, type Request, type RequestHandler, type Response } from 'express';
import type { HealthReport } from '../../application/health/HealthMonitor';
import { createConsoleLikeLogger, type ConsoleLikeLogger } from '../logging/createConsoleLikeLogger';

export const WEBHOOK_PATH = '/webhook';

export interface HealthReporter {
  report(): HealthReport;
}

export interface HttpServerOptions {
  readonly health: HealthReporter;
  readonly webhook?: RequestHandler;
  readonly serviceName?: string;
  readonly now?: () => number;
  readonly logger?: ConsoleLikeLogger;
}

/** Sonda externa: 503 apenas quando o processo está crítico. */
export function createHealthHandler(health: HealthReporter): (req: Request, res: Response) => void {
  return (req, res) => {
    const report = health.report();
    const code = report.status === 'critical' ? 503 : 200;
    if (req.method === 'HEAD') {
      res.status(code).end();
      return;
    }
    res.status(code).json({
      status: report.status,
      reasons: report.reasons,
      uptimeSec: report.snapshot.uptimeSec,
      activeSessions: report.snapshot.activeSessions,
      requests: report.snapshot.requests,
      errors: report.snapshot.errors,
    });
  };
}

export function createWakeHandler(now: () => number = () => Date.now()): (req: Request, res: Response) => void {
  return (_req, res) => {
    res.status(200).json({ status: 'awake', at: new Date(now()).toISOString() });
  };
}

export function createRootHandler(serviceName: string): (req: Request, res: Response) => void {
  return (_req, res) => {
    res.status(200).type('text/plain').send(`${serviceName} is running`);
  };
}

/** Última camada: registra a falha e responde 500 se nada foi enviado ainda. */
export function createErrorHandler(logger: ConsoleLikeLogger): ErrorRequestHandler {
  return (error, req, res, next) => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`[http] ${req.method} ${req.path} falhou: ${err.message}`);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({ error: 'internal_error' });
  };
}

export function createHttpApp(options: HttpServerOptions): Express {
  const app = express();
  const logger = options.logger ?? createConsoleLikeLogger({ component: 'http' });
  if (options.webhook) {
    app.post(WEBHOOK_PATH, express.json(), options.webhook);
  }
  const health = createHealthHandler(options.health);
  app.get('/health', health);
  app.head('/health', health);
  app.get('/wake', createWakeHandler(options.now));
  app.get('/', createRootHandler(options.serviceName ?? 'quiz-poll-bot'));
  app.use(createErrorHandler(logger));
  return app;
}

export interface HttpServerPort {
  listen(port: number): Promise<void>;
  close(): Promise<void>;
}

/** O que o servidor precisa do app do Express. */
export interface ListenableApp {
  listen(port: number): Server;
}

export class HttpServer implements HttpServerPort {
  private server: Server | null = null;
  private readonly logger: ConsoleLikeLogger;

  constructor(private readonly app: ListenableApp, logger?: ConsoleLikeLogger) {
    this.logger = logger ?? createConsoleLikeLogger({ component: 'http' });
  }

  async listen(port: number): Promise<void> {
    if (this.server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(port);
      const onStartupError = (error: Error): void => {
        this.server = null;
        reject(error);
      };
      server.once('error', onStartupError);
      server.once('listening', () => {
        server.off('error', onStartupError);
        server.on('error', (error: Error) => {
          this.logger.error(`[http] erro no servidor: ${error.message}`);
        });
        this.logger.info(`[http] ouvindo na porta ${port}`);
        resolve();
      });
      this.server = server;
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
