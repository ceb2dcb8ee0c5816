/**
 * @fileoverview Middleware Stack - Wrapper Composition
 *
 * @packageDocumentation
 * @module @muxkit/core/infrastructure/pipeline
 *
 * A stack is an ordered list of wrappers folded around an inner handler.
 * Folding starts from the innermost entry: the last wrapper added wraps the
 * handler first, the first wrapper added ends up outermost. Requests
 * therefore traverse the stack in insertion order (onion model):
 *
 * ```
 * m1 before  →  m2 before  →  handler
 *                                ↓
 * m1 after   ←  m2 after   ←  handler returns
 * ```
 *
 * A wrapper that never calls its `next` handler short-circuits everything
 * inside it.
 */

import { IMiddleware, isMiddleware } from '../platform/middleware';
import { RequestHandler, Wrapper } from '../platform/types';

/**
 * Anything the stack accepts: a wrapper function or object-style middleware
 */
export type MiddlewareLike = Wrapper | IMiddleware;

/**
 * Normalize to the functional form
 */
export function toWrapper(middleware: MiddlewareLike): Wrapper {
  return isMiddleware(middleware) ? middleware.getMiddleware() : middleware;
}

/**
 * Fold wrappers into a single wrapper, outermost first.
 *
 * The list is copied, so later changes to `wrappers` do not affect the
 * returned wrapper.
 *
 * @example
 * ```typescript
 * const stack = createStack([withLogging, withAuth]);
 * const handler = stack(endpoint); // withLogging(withAuth(endpoint))
 * ```
 */
export function createStack(wrappers: readonly Wrapper[]): Wrapper {
  const snapshot = [...wrappers];
  return (next) =>
    snapshot.reduceRight<RequestHandler>((inner, wrapper) => wrapper(inner), next);
}

/**
 * Ordered, append-only collection of middleware.
 *
 * @example
 * ```typescript
 * const stack = new MiddlewareStack()
 *   .use(new AccessLogMiddleware())
 *   .use(new RecoveryMiddleware());
 *
 * const handler = stack.wrap(mux.dispatch);
 * ```
 */
export class MiddlewareStack {
  private readonly wrappers: Wrapper[] = [];

  /**
   * Add middleware; it runs inside everything added before it
   */
  use(middleware: MiddlewareLike): this {
    this.wrappers.push(toWrapper(middleware));
    return this;
  }

  /**
   * Add middleware conditionally
   */
  useIf(condition: boolean | (() => boolean), middleware: MiddlewareLike): this {
    const shouldUse = typeof condition === 'function' ? condition() : condition;
    if (shouldUse) {
      this.use(middleware);
    }
    return this;
  }

  /**
   * Snapshot of the wrappers in insertion order
   */
  build(): Wrapper[] {
    return [...this.wrappers];
  }

  /**
   * Fold the current wrappers around `handler`
   */
  wrap(handler: RequestHandler): RequestHandler {
    return createStack(this.wrappers)(handler);
  }

  get length(): number {
    return this.wrappers.length;
  }
}

/**
 * Compose several middlewares into one wrapper
 */
export function compose(...middlewares: MiddlewareLike[]): Wrapper {
  return createStack(middlewares.map(toWrapper));
}
