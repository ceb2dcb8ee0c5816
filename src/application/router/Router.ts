/**
 * @muxkit/core - Router
 *
 * Builder for a dispatch surface. Patterns, mounts and middleware are
 * recorded in any order and combined exactly once by {@link Router.finalize}
 * into a single {@link RequestHandler}.
 *
 * @example
 * ```typescript
 * const api = createRouter()
 *   .get('/ping', (request, response) => response.end('pong'))
 *   .finalize();
 *
 * const app = createRouter()
 *   .use(new AccessLogMiddleware())
 *   .use(new RecoveryMiddleware())
 *   .mount('/api/', api)
 *   .finalize();
 *
 * // GET /api/ping -> 'pong'
 * ```
 */

import { ConfigurationError } from '../../domain/exceptions';
import { createStack, MiddlewareLike, toWrapper } from '../../infrastructure/pipeline';
import { RequestHandler, withPath, Wrapper } from '../../infrastructure/platform/types';
import { notFound, ServeMux } from '../../infrastructure/routing';

interface PatternEntry {
  pattern: string;
  handler: RequestHandler;
}

interface MountEntry {
  prefix: string;
  handler: RequestHandler;
}

export class Router {
  private readonly patterns: PatternEntry[] = [];
  private readonly mounts: MountEntry[] = [];
  private readonly middlewares: Wrapper[] = [];
  private finalized = false;

  /**
   * Register a handler for `"[METHOD ]/path"`.
   * The pattern is validated when the router is finalized.
   */
  handle(pattern: string, handler: RequestHandler): this {
    this.patterns.push({ pattern, handler });
    return this;
  }

  get(path: string, handler: RequestHandler): this {
    return this.handle(`GET ${path}`, handler);
  }

  post(path: string, handler: RequestHandler): this {
    return this.handle(`POST ${path}`, handler);
  }

  put(path: string, handler: RequestHandler): this {
    return this.handle(`PUT ${path}`, handler);
  }

  patch(path: string, handler: RequestHandler): this {
    return this.handle(`PATCH ${path}`, handler);
  }

  delete(path: string, handler: RequestHandler): this {
    return this.handle(`DELETE ${path}`, handler);
  }

  /**
   * Delegate every request under `prefix` to `handler`, with the prefix
   * removed from the path it sees.
   *
   * A prefix ending in `/` covers the whole subtree, including the bare
   * prefix (`/api` is delegated as `/`). Without the trailing `/` only the
   * exact path is mounted.
   */
  mount(prefix: string, handler: RequestHandler): this {
    this.mounts.push({ prefix, handler });
    return this;
  }

  /**
   * Append middleware. The first middleware added is the outermost.
   */
  use(middleware: MiddlewareLike): this {
    this.middlewares.push(toWrapper(middleware));
    return this;
  }

  /**
   * Combine everything recorded so far into one handler.
   *
   * Single use: a second call throws. Anything added afterwards does not
   * affect the returned handler.
   *
   * @throws ConfigurationError on malformed or colliding patterns and prefixes
   */
  finalize(): RequestHandler {
    if (this.finalized) {
      throw new ConfigurationError(
        'ROUTER_ALREADY_FINALIZED',
        'Router has already been finalized; create a new router instead',
      );
    }
    this.finalized = true;

    const patterns = [...this.patterns];
    const mounts = [...this.mounts];
    const middlewares = [...this.middlewares];

    const mux = new ServeMux();
    for (const { pattern, handler } of patterns) {
      mux.register(pattern, handler);
    }
    for (const { prefix, handler } of mounts) {
      registerMount(mux, prefix, handler);
    }

    return createStack(middlewares)(mux.dispatch);
  }

  get isFinalized(): boolean {
    return this.finalized;
  }
}

function registerMount(mux: ServeMux, prefix: string, handler: RequestHandler): void {
  if (!prefix.startsWith('/') || prefix.includes('{') || prefix.includes('}')) {
    throw new ConfigurationError(
      'INVALID_PATTERN',
      `Invalid mount prefix "${prefix}": must be a literal path beginning with '/'`,
      prefix,
    );
  }

  const strippedPrefix = prefix.endsWith('/') ? prefix.slice(0, -1) : prefix;
  const delegate = stripPrefix(strippedPrefix, handler);

  mux.register(prefix, delegate);
  // A direct pattern on the bare prefix keeps it.
  if (strippedPrefix !== '' && strippedPrefix !== prefix && !mux.has(strippedPrefix)) {
    mux.register(strippedPrefix, delegate);
  }
}

/**
 * Wrap `handler` so it sees paths relative to `prefix`.
 * Paths outside the prefix get the not-found response.
 *
 * @example
 * ```typescript
 * const files = stripPrefix('/static', serveFiles);
 * // '/static/app.js' -> '/app.js', '/static' -> '/'
 * ```
 */
export function stripPrefix(prefix: string, handler: RequestHandler): RequestHandler {
  return (request, response) => {
    if (!request.path.startsWith(prefix)) {
      return notFound(request, response);
    }

    const rest = request.path.slice(prefix.length);
    if (rest !== '' && !rest.startsWith('/')) {
      return notFound(request, response);
    }

    return handler(withPath(request, rest || '/'), response);
  };
}

/**
 * Create an empty router
 */
export function createRouter(): Router {
  return new Router();
}
