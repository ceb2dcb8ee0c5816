/**
 * @muxkit/core - ServeMux
 *
 * The pattern substrate every router registers into. Matching is delegated
 * to two find-my-way radix trees: one for method-specific patterns and one
 * for patterns without a method. Method-specific patterns are consulted
 * first; within a tree static segments win over parameters, and parameters
 * over wildcards.
 */

import fmw from 'find-my-way';
import type { HTTPMethod, HTTPVersion, Instance } from 'find-my-way';
import { ConfigurationError } from '../../domain/exceptions';
import {
  HttpStatus,
  MuxRequest,
  RequestHandler,
  ResponseWriter,
  withParams,
} from '../platform/types';
import { isHttpMethod, parsePattern, ParsedPattern } from './patterns';

/**
 * What the radix trees store for every registered pattern
 */
interface RouteEntry {
  pattern: ParsedPattern;
  handler: RequestHandler;
}

/**
 * Result of {@link ServeMux.lookup}
 */
export interface RouteMatch {
  /** Pattern source as registered */
  pattern: string;
  handler: RequestHandler;
  params: Record<string, string>;
}

// Patterns without a method all live under this key of the any-method tree,
// so requests with methods find-my-way does not know still match them.
const ANY_METHOD: HTTPMethod = 'GET';

function isRouteEntry(value: unknown): value is RouteEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pattern' in value &&
    'handler' in value &&
    typeof value.handler === 'function'
  );
}

function noop(): void {}

// find-my-way rejects longer parameter segments by default (100).
const MAX_PARAM_LENGTH = Number.MAX_SAFE_INTEGER;

export class ServeMux {
  private readonly methodRoutes: Instance<HTTPVersion.V1> = fmw({
    maxParamLength: MAX_PARAM_LENGTH,
  });
  private readonly anyRoutes: Instance<HTTPVersion.V1> = fmw({
    maxParamLength: MAX_PARAM_LENGTH,
  });
  private readonly keys = new Set<string>();
  private readonly methods = new Set<HTTPMethod>();

  /**
   * Register a handler for a pattern.
   *
   * @throws ConfigurationError when the pattern is malformed or collides
   * with one registered earlier
   */
  register(pattern: string, handler: RequestHandler): void {
    const parsed = parsePattern(pattern);

    if (this.keys.has(parsed.key)) {
      throw new ConfigurationError(
        'DUPLICATE_PATTERN',
        `Pattern "${pattern}" conflicts with a pattern registered earlier (${parsed.key})`,
        pattern,
      );
    }

    const entry: RouteEntry = { pattern: parsed, handler };
    try {
      if (parsed.method) {
        this.methodRoutes.on(parsed.method, parsed.routePath, noop, entry);
      } else {
        this.anyRoutes.on(ANY_METHOD, parsed.routePath, noop, entry);
      }
    } catch (error) {
      throw new ConfigurationError(
        'INVALID_PATTERN',
        `Pattern "${pattern}" was rejected: ${error instanceof Error ? error.message : String(error)}`,
        pattern,
      );
    }

    this.keys.add(parsed.key);
    if (parsed.method) {
      this.methods.add(parsed.method);
    }
  }

  /**
   * Whether a pattern with the same method and path shape is registered
   */
  has(pattern: string): boolean {
    return this.keys.has(parsePattern(pattern).key);
  }

  /**
   * Find the handler for a method and path, or null when nothing matches.
   */
  lookup(method: string, path: string): RouteMatch | null {
    if (isHttpMethod(method)) {
      const match =
        this.find(this.methodRoutes, method, path) ??
        (method === 'HEAD' ? this.find(this.methodRoutes, 'GET', path) : null);
      if (match) {
        return match;
      }
    }
    return this.find(this.anyRoutes, ANY_METHOD, path);
  }

  /**
   * Methods with a pattern matching `path`, including HEAD when GET matches
   */
  allowedMethods(path: string): string[] {
    const allowed = [...this.methods].filter(
      (method) => this.methodRoutes.find(method, path) !== null,
    );
    if (allowed.includes('GET') && !allowed.includes('HEAD')) {
      allowed.push('HEAD');
    }
    return allowed.sort();
  }

  /**
   * Dispatch a request to the matching handler, or answer 404/405.
   */
  readonly dispatch: RequestHandler = (request, response) => {
    const match = this.lookup(request.method, request.path);
    if (match) {
      return match.handler(withParams(request, match.params), response);
    }

    const allowed = this.allowedMethods(request.path);
    if (allowed.length > 0) {
      response.setHeader('Allow', allowed.join(', '));
      writeError(response, HttpStatus.METHOD_NOT_ALLOWED, 'Method Not Allowed');
      return;
    }

    notFound(request, response);
  };

  private find(
    routes: Instance<HTTPVersion.V1>,
    method: HTTPMethod,
    path: string,
  ): RouteMatch | null {
    const result = routes.find(method, path);
    if (!result) {
      return null;
    }

    const entry: unknown = result.store;
    if (!isRouteEntry(entry)) {
      return null;
    }

    const params: Record<string, string> = {};
    for (const [name, value] of Object.entries(result.params)) {
      if (value === undefined) {
        continue;
      }
      if (name === '*') {
        if (entry.pattern.wildcardName) {
          params[entry.pattern.wildcardName] = value;
        }
        continue;
      }
      params[name] = value;
    }

    return { pattern: entry.pattern.source, handler: entry.handler, params };
  }
}

/**
 * Plain-text error response
 */
export function writeError(response: ResponseWriter, status: number, message: string): void {
  response.setHeader('Content-Type', 'text/plain; charset=utf-8');
  response.setHeader('X-Content-Type-Options', 'nosniff');
  response.writeHead(status);
  response.end(`${message}\n`);
}

/**
 * The substrate's not-found behavior
 */
export const notFound: RequestHandler = (_request: MuxRequest, response) => {
  writeError(response, HttpStatus.NOT_FOUND, '404 page not found');
};
