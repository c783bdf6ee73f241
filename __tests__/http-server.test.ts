import { EventEmitter } from 'node:events';
import type { Server } from 'node:http';
import type { NextFunction, Request, Response } from 'express';
import type { HealthReport, HealthStatus } from '../src/application/health/HealthMonitor';
import {
  createErrorHandler,
  createHealthHandler,
  createHttpApp,
  createRootHandler,
  createWakeHandler,
  HttpServer,
} from '../src/infrastructure/http/createHttpServer';
import { createSilentLogger } from './helpers/fakes';

interface FakeResponse {
  readonly status: jest.Mock;
  readonly json: jest.Mock;
  readonly end: jest.Mock;
  readonly send: jest.Mock;
  readonly type: jest.Mock;
}

function createResponse(): FakeResponse {
  const res = {} as FakeResponse;
  Object.assign(res, {
    status: jest.fn(() => res),
    json: jest.fn(() => res),
    end: jest.fn(() => res),
    send: jest.fn(() => res),
    type: jest.fn(() => res),
  });
  return res;
}

function report(status: HealthStatus, reasons: string[] = []): HealthReport {
  return {
    status,
    reasons,
    snapshot: {
      timestamp: 0,
      memory: { rssBytes: 1, heapUsedBytes: 1, heapTotalBytes: 1, ratio: 0.1 },
      cpu: { ratio: 0 },
      activeSessions: 4,
      requests: 9,
      successes: 8,
      failures: 1,
      errors: 1,
      uptimeSec: 120,
    },
  };
}

const asRequest = (method: string): Request => ({ method } as Request);
const asResponse = (res: FakeResponse): Response => res as unknown as Response;

describe('health endpoint', () => {
  test('reports a summary with 200 while not critical', () => {
    const handler = createHealthHandler({ report: () => report('degraded', ['memory degraded (0.85)']) });
    const res = createResponse();

    handler(asRequest('GET'), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({
      status: 'degraded',
      reasons: ['memory degraded (0.85)'],
      uptimeSec: 120,
      activeSessions: 4,
      requests: 9,
      errors: 1,
    });
  });

  test('answers 503 when critical', () => {
    const handler = createHealthHandler({ report: () => report('critical', ['errors critical (50)']) });
    const res = createResponse();

    handler(asRequest('GET'), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(503);
  });

  test('HEAD returns only the status code', () => {
    const handler = createHealthHandler({ report: () => report('healthy') });
    const res = createResponse();

    handler(asRequest('HEAD'), asResponse(res));

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.end).toHaveBeenCalledTimes(1);
    expect(res.json).not.toHaveBeenCalled();
  });
});

describe('other endpoints', () => {
  test('wake reports the current time', () => {
    const res = createResponse();
    createWakeHandler(() => Date.UTC(2024, 0, 2, 3, 4, 5))(asRequest('GET'), asResponse(res));
    expect(res.json).toHaveBeenCalledWith({ status: 'awake', at: '2024-01-02T03:04:05.000Z' });
  });

  test('root answers with plain text', () => {
    const res = createResponse();
    createRootHandler('quiz-poll-bot')(asRequest('GET'), asResponse(res));
    expect(res.type).toHaveBeenCalledWith('text/plain');
    expect(res.send).toHaveBeenCalledWith('quiz-poll-bot is running');
  });

  test('the webhook route is only mounted with a handler', () => {
    const paths = (app: ReturnType<typeof createHttpApp>): string[] => {
      const stack: Array<{ route?: { path: string } }> = app._router.stack;
      return stack.flatMap((layer) => (layer.route ? [layer.route.path] : []));
    };
    const health = { report: () => report('healthy') };

    expect(paths(createHttpApp({ health }))).toEqual(['/health', '/health', '/wake', '/']);
    expect(paths(createHttpApp({ health, webhook: jest.fn() }))).toEqual(['/webhook', '/health', '/health', '/wake', '/']);
  });
});

describe('error handler', () => {
  test('logs the failure and answers 500', () => {
    const logger = createSilentLogger();
    const res = createResponse();
    const next: NextFunction = jest.fn();

    createErrorHandler(logger)(new Error('bad update'), { method: 'POST', path: '/webhook' } as Request, asResponse(res), next);

    expect(logger.error).toHaveBeenCalledWith('[http] POST /webhook falhou: bad update');
    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: 'internal_error' });
    expect(next).not.toHaveBeenCalled();
  });

  test('hands over to express when the response already started', () => {
    const logger = createSilentLogger();
    const res = Object.assign(createResponse(), { headersSent: true });
    const next = jest.fn();
    const error = new Error('late failure');

    createErrorHandler(logger)(error, { method: 'POST', path: '/webhook' } as Request, res as unknown as Response, next);

    expect(next).toHaveBeenCalledWith(error);
    expect(res.status).not.toHaveBeenCalled();
  });
});

class FakeServer extends EventEmitter {
  readonly close = jest.fn((callback: (error?: Error) => void) => callback());
}

describe('HttpServer', () => {
  test('errors after startup are logged by a single listener', async () => {
    const logger = createSilentLogger();
    const server = new FakeServer();
    const http = new HttpServer({ listen: jest.fn(() => server as unknown as Server) }, logger);

    const listening = http.listen(10000);
    server.emit('listening');
    await listening;
    server.emit('error', new Error('socket reset'));

    expect(logger.info).toHaveBeenCalledWith('[http] ouvindo na porta 10000');
    expect(logger.error).toHaveBeenCalledWith('[http] erro no servidor: socket reset');
    expect(server.listenerCount('error')).toBe(1);

    await http.close();
    expect(server.close).toHaveBeenCalledTimes(1);
  });

  test('a startup failure rejects and allows another attempt', async () => {
    const servers = [new FakeServer(), new FakeServer()];
    let attempt = 0;
    const listen = jest.fn(() => servers[attempt++] as unknown as Server);
    const http = new HttpServer({ listen }, createSilentLogger());

    const first = http.listen(10000);
    servers[0].emit('error', new Error('EADDRINUSE'));
    await expect(first).rejects.toThrow('EADDRINUSE');

    const second = http.listen(10000);
    servers[1].emit('listening');
    await second;
    expect(listen).toHaveBeenCalledTimes(2);
  });
});
