/**
 * @muxkit/core v1.0.0 - Basic Example
 *
 * Demonstrates the core concepts:
 * - Patterns with named parameters
 * - Mounting an independently built router under a prefix
 * - Access log and recovery middleware (outermost first)
 * - Request context inside handlers
 * - Serving through the Node HTTP adapter and host
 */

import {
  AccessLogMiddleware,
  createHost,
  createMiddleware,
  createNodeHttpAdapter,
  createRouter,
  getCurrentContext,
  HttpStatus,
  RecoveryMiddleware,
  RequestHandler,
} from '../src/index';

// ==================== Handlers ====================

const users = new Map<string, { id: string; name: string }>([
  ['1', { id: '1', name: 'Ada' }],
  ['2', { id: '2', name: 'Grace' }],
]);

const json = (status: number, body: unknown): RequestHandler => (_request, response) => {
  response.setHeader('Content-Type', 'application/json');
  response.writeHead(status);
  response.end(JSON.stringify(body));
};

const getUser: RequestHandler = (request, response) => {
  const user = users.get(request.params.id);
  if (!user) {
    return json(HttpStatus.NOT_FOUND, { error: 'user not found' })(request, response);
  }
  return json(HttpStatus.OK, { ...user, requestId: getCurrentContext().requestId })(
    request,
    response,
  );
};

// ==================== Routers ====================

const api = createRouter()
  .get('/users', json(HttpStatus.OK, [...users.values()]))
  .get('/users/{id}', getUser)
  .get('/crash', () => {
    throw new Error('deliberate failure');
  })
  .finalize();

const poweredBy = createMiddleware((request, response, next) => {
  response.setHeader('X-Powered-By', 'muxkit');
  return next(request, response);
});

const app = createRouter()
  .use(new AccessLogMiddleware())
  .use(new RecoveryMiddleware())
  .use(poweredBy)
  .get('/{$}', (_request, response) => response.end('muxkit example\n'))
  .mount('/api/', api)
  .finalize();

// ==================== Host ====================

async function main(): Promise<void> {
  const host = createHost({ name: 'basic-example' }).addAdapter(
    createNodeHttpAdapter(app, { port: 3000 }),
  );

  const [info] = await host.start();
  console.log(`Try: curl ${info.url}/api/users/1`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
