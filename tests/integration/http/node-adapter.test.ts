/**
 * @file Node HTTP adapter integration tests
 * @description Drives finalized routers through `createRequestListener`
 * with in-process request injection (no sockets).
 */

import { describe, expect, it, jest } from '@jest/globals';
import { inject } from '@hapi/shot';
import {
  AccessLogMiddleware,
  AdapterOptions,
  createNodeHttpAdapter,
  createRequestListener,
  createRouter,
  ILogger,
  LogFunction,
  MuxRequest,
  NodeHttpAdapter,
  RecoveryMiddleware,
  RequestContext,
  RequestHandler,
} from '../../../src/index';
import { sleep } from '../../helpers';

type ErrorHandler = NonNullable<AdapterOptions['errorHandler']>;

function silentLogger(): ILogger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

async function readBody(request: MuxRequest): Promise<string> {
  const chunks: Buffer[] = [];
  if (request.body) {
    for await (const chunk of request.body) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('Node HTTP adapter', () => {
  // ============================================================================
  // TEST GROUP 1: Dispatch
  // ============================================================================

  describe('Dispatch', () => {
    it('should serve a mounted router', async () => {
      const api = createRouter()
        .get('/users/{id}', (request, response) => {
          response.setHeader('Content-Type', 'application/json');
          response.end(JSON.stringify({ id: request.params.id, path: request.path }));
        })
        .finalize();
      const app = createRouter().mount('/api/', api).finalize();

      const res = await inject(createRequestListener(app), { method: 'GET', url: '/api/users/5' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('application/json');
      expect(JSON.parse(res.payload)).toEqual({ id: '5', path: '/users/5' });
    });

    it('should stream the request body to handlers', async () => {
      const app = createRouter()
        .post('/echo', async (request, response) => {
          response.end(`echo:${await readBody(request)}`);
        })
        .finalize();

      const res = await inject(createRequestListener(app), {
        method: 'POST',
        url: '/echo',
        payload: 'hello',
      });

      expect(res.payload).toBe('echo:hello');
    });

    it('should answer 404 for unknown paths', async () => {
      const app = createRouter().get('/known', (_request, response) => response.end()).finalize();

      const res = await inject(createRequestListener(app), { method: 'GET', url: '/unknown' });

      expect(res.statusCode).toBe(404);
      expect(res.payload).toBe('404 page not found\n');
    });

    it('should end responses the handler left open', async () => {
      const app = createRouter()
        .get('/open', (_request, response) => {
          response.setHeader('X-Touched', 'yes');
        })
        .finalize();

      const res = await inject(createRequestListener(app), { method: 'GET', url: '/open' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['x-touched']).toBe('yes');
      expect(res.payload).toBe('');
    });

    it('should expose client address, query and headers', async () => {
      const seen: MuxRequest[] = [];
      const capture: RequestHandler = (request, response) => {
        seen.push(request);
        response.end();
      };
      const app = createRouter().get('/inspect', capture).finalize();

      await inject(createRequestListener(app), {
        method: 'GET',
        url: '/inspect?page=2',
        headers: { 'x-api-key': 'test-secret' },
      });

      expect(seen[0].ip).toBe('127.0.0.1');
      expect(seen[0].query).toEqual({ page: '2' });
      expect(seen[0].headers['x-api-key']).toBe('test-secret');
      expect(seen[0].id).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  // ============================================================================
  // TEST GROUP 2: Request context
  // ============================================================================

  describe('Request context', () => {
    it('should run handlers inside a context carrying request and trace ids', async () => {
      const seen: Array<[string, string | undefined, string | undefined]> = [];
      const app = createRouter()
        .get('/ctx', async (request, response) => {
          await Promise.resolve();
          const ctx = RequestContext.current();
          seen.push([request.id, ctx?.requestId, ctx?.traceId]);
          response.end();
        })
        .finalize();

      await inject(createRequestListener(app), {
        method: 'GET',
        url: '/ctx',
        headers: { 'x-trace-id': 'trace-123' },
      });

      expect(seen).toHaveLength(1);
      expect(seen[0][1]).toBe(seen[0][0]);
      expect(seen[0][2]).toBe('trace-123');
    });

    it('should read the trace id from a configured header', async () => {
      const traces: Array<string | undefined> = [];
      const app = createRouter()
        .get('/ctx', (request, response) => {
          traces.push(RequestContext.current()?.traceId);
          traces.push(typeof request.metadata.traceId === 'string' ? request.metadata.traceId : undefined);
          response.end();
        })
        .finalize();

      await inject(createRequestListener(app, { traceIdHeader: 'X-Correlation-Id' }), {
        method: 'GET',
        url: '/ctx',
        headers: { 'x-correlation-id': 'corr-9' },
      });

      expect(traces).toEqual(['corr-9', 'corr-9']);
    });
  });

  // ============================================================================
  // TEST GROUP 3: Faults
  // ============================================================================

  describe('Faults', () => {
    it('should report unrecovered faults and answer 500', async () => {
      const errorHandler = jest.fn<ErrorHandler>();
      const app = createRouter()
        .get('/explode', () => {
          throw new Error('boom');
        })
        .finalize();

      const res = await inject(createRequestListener(app, { errorHandler }), {
        method: 'GET',
        url: '/explode',
      });

      expect(res.statusCode).toBe(500);
      expect(res.payload).toBe('Internal Server Error');
      expect(errorHandler).toHaveBeenCalledTimes(1);
      const [fault, request] = errorHandler.mock.calls[0];
      expect(fault.message).toBe('Request fault in GET /explode: boom');
      expect(request.path).toBe('/explode');
    });

    it('should log unrecovered faults through the logger by default', async () => {
      const logger = silentLogger();
      const failure = new Error('unlogged');
      const app = createRouter()
        .get('/explode', () => {
          throw failure;
        })
        .finalize();

      await inject(createRequestListener(app, { logger }), { method: 'GET', url: '/explode' });

      expect(logger.error).toHaveBeenCalledWith(
        '[%s] Unhandled fault: %s',
        expect.any(String),
        failure.stack,
      );
    });

    it('should still answer 500 when the error handler throws', async () => {
      const logger = silentLogger();
      const errorHandler = jest.fn<ErrorHandler>(() => {
        throw new Error('handler broke');
      });
      const app = createRouter()
        .get('/explode', () => {
          throw new Error('boom');
        })
        .finalize();

      const res = await inject(createRequestListener(app, { errorHandler, logger }), {
        method: 'GET',
        url: '/explode',
      });
      await sleep(0);

      expect(res.statusCode).toBe(500);
      expect(res.payload).toBe('Internal Server Error');
      expect(errorHandler).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith(
        '[%s] Failed to finish response: %s',
        expect.any(String),
        'Error: handler broke',
      );
    });

    it('should leave recovered faults to the recovery middleware', async () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const errorHandler = jest.fn<ErrorHandler>();
      const emit = jest.fn<LogFunction>();
      const app = createRouter()
        .use(new AccessLogMiddleware(emit))
        .use(new RecoveryMiddleware())
        .get('/explode', () => {
          throw new Error('boom');
        })
        .finalize();

      const res = await inject(createRequestListener(app, { errorHandler }), {
        method: 'GET',
        url: '/explode',
      });

      expect(res.statusCode).toBe(500);
      expect(res.payload).toBe('Internal server error');
      expect(errorHandler).not.toHaveBeenCalled();
      expect(emit.mock.calls[0].slice(0, 4)).toEqual(['%d %s %s %dms', 500, 'GET', '/explode']);
      errorSpy.mockRestore();
    });
  });

  // ============================================================================
  // TEST GROUP 4: Adapter
  // ============================================================================

  describe('NodeHttpAdapter', () => {
    it('should not be running before start', async () => {
      const adapter = new NodeHttpAdapter(createRouter().finalize(), { logger: silentLogger() });

      expect(adapter.name).toBe('node-http');
      expect(adapter.isRunning()).toBe(false);
      expect(adapter.getServer()).toBeNull();
      await expect(adapter.stop()).resolves.toBeUndefined();
    });

    it('should take its name from the options', () => {
      const adapter = createNodeHttpAdapter(createRouter().finalize(), { name: 'public-api' });

      expect(adapter).toBeInstanceOf(NodeHttpAdapter);
      expect(adapter.name).toBe('public-api');
    });
  });
});
