/**
 * @muxkit/core - Middleware
 *
 * Middleware is pure composition: a {@link Wrapper} takes the next handler
 * and returns a new one. Object-style middleware implements
 * {@link IMiddleware} and hands out its wrapper through `getMiddleware()`,
 * so configurable policies can keep their configuration on an instance.
 */

import { performance } from 'perf_hooks';
import { consoleLogger } from '../../application/host/host';
import { RequestFault } from '../../domain/exceptions';
import {
  HeaderValue,
  HttpStatus,
  MuxRequest,
  RequestHandler,
  ResponseWriter,
  Wrapper,
} from './types';

/**
 * Object-style middleware
 */
export interface IMiddleware {
  getMiddleware(): Wrapper;
}

/**
 * Inline middleware receiving the next handler explicitly
 */
export type MiddlewareFunction = (
  request: MuxRequest,
  response: ResponseWriter,
  next: RequestHandler,
) => void | Promise<void>;

/**
 * Type guard to check if something is object-style middleware
 */
export function isMiddleware(value: unknown): value is IMiddleware {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getMiddleware' in value &&
    typeof value.getMiddleware === 'function'
  );
}

/**
 * Convert a function to middleware object
 *
 * @example
 * ```typescript
 * const poweredBy = createMiddleware((request, response, next) => {
 *   response.setHeader('X-Powered-By', 'muxkit');
 *   return next(request, response);
 * });
 * ```
 */
export function createMiddleware(fn: MiddlewareFunction): IMiddleware {
  return {
    getMiddleware: () => (next) => (request, response) => fn(request, response, next),
  };
}

/**
 * Abstract base class for object-style middleware
 */
export abstract class MiddlewareBase implements IMiddleware {
  /**
   * Implement this method in derived classes
   */
  protected abstract handle(
    request: MuxRequest,
    response: ResponseWriter,
    next: RequestHandler,
  ): Promise<void>;

  getMiddleware(): Wrapper {
    return (next) => (request, response) => this.handle(request, response, next);
  }
}

// ==================== Status Capture ====================

/**
 * ResponseWriter decorator that remembers the status written through it.
 * One instance per request.
 */
export class StatusRecorder implements ResponseWriter {
  private recordedStatus: number = HttpStatus.OK;

  constructor(private readonly inner: ResponseWriter) {}

  /**
   * Status written by the inner handler, 200 when none was set
   */
  get status(): number {
    return this.recordedStatus;
  }

  get statusCode(): number {
    return this.inner.statusCode;
  }

  get headersSent(): boolean {
    return this.inner.headersSent;
  }

  get writableEnded(): boolean {
    return this.inner.writableEnded;
  }

  setHeader(name: string, value: HeaderValue): void {
    this.inner.setHeader(name, value);
  }

  getHeader(name: string): HeaderValue | undefined {
    return this.inner.getHeader(name);
  }

  getHeaders(): Record<string, HeaderValue> {
    return this.inner.getHeaders();
  }

  removeHeader(name: string): void {
    this.inner.removeHeader(name);
  }

  writeHead(statusCode: number, headers?: Record<string, HeaderValue>): void {
    this.inner.writeHead(statusCode, headers);
    this.recordedStatus = statusCode;
  }

  write(chunk: string | Uint8Array): void {
    this.inner.write(chunk);
  }

  end(chunk?: string | Uint8Array): void {
    this.inner.end(chunk);
  }
}

// ==================== Built-in Middlewares ====================

/**
 * Called with the fault raised by the wrapped handler chain
 */
export type RecoveryAction = (
  request: MuxRequest,
  response: ResponseWriter,
  fault: RequestFault,
) => void | Promise<void>;

/**
 * printf-style log sink, e.g. `console.log` or a logger method
 */
export type LogFunction = (format: string, ...values: unknown[]) => void;

/**
 * Default recovery: log the fault with its stack, answer 500 when possible.
 */
export const defaultRecoveryAction: RecoveryAction = (request, response, fault) => {
  consoleLogger.error(
    '[%s] Caught fault: %s. Stack trace: %s',
    request.id,
    fault.message,
    fault.originalStack,
  );

  if (!response.headersSent) {
    response.setHeader('Content-Type', 'text/plain; charset=utf-8');
    response.writeHead(HttpStatus.INTERNAL_SERVER_ERROR);
    response.end('Internal server error');
  } else if (!response.writableEnded) {
    response.end();
  }
};

/**
 * Recovery middleware - isolates faults to the request that raised them
 *
 * @example
 * ```typescript
 * router.use(new RecoveryMiddleware());
 *
 * router.use(new RecoveryMiddleware((request, response, fault) => {
 *   reportToTracker(fault);
 *   response.writeHead(503);
 *   response.end();
 * }));
 * ```
 */
export class RecoveryMiddleware extends MiddlewareBase {
  private readonly recoveryAction: RecoveryAction;

  constructor(recoveryAction?: RecoveryAction) {
    super();
    this.recoveryAction = recoveryAction ?? defaultRecoveryAction;
  }

  protected async handle(
    request: MuxRequest,
    response: ResponseWriter,
    next: RequestHandler,
  ): Promise<void> {
    try {
      await next(request, response);
    } catch (error) {
      await this.recoveryAction(request, response, RequestFault.from(error, request));
    }
  }
}

/**
 * Access log middleware - one record per request with status, method, path
 * and elapsed milliseconds.
 *
 * @remarks
 * Add it before {@link RecoveryMiddleware} so faulted requests are logged
 * with the status the recovery wrote.
 *
 * @example
 * ```typescript
 * router
 *   .use(new AccessLogMiddleware())   // '[INFO] 200 GET /users 0.42ms'
 *   .use(new RecoveryMiddleware());
 * ```
 */
export class AccessLogMiddleware extends MiddlewareBase {
  static readonly FORMAT = '%d %s %s %dms';

  private readonly emit: LogFunction;

  constructor(emit?: LogFunction) {
    super();
    this.emit = emit ?? consoleLogger.info;
  }

  protected async handle(
    request: MuxRequest,
    response: ResponseWriter,
    next: RequestHandler,
  ): Promise<void> {
    const start = performance.now();
    const recorder = new StatusRecorder(response);
    let faulted = false;

    try {
      await next(request, recorder);
    } catch (error) {
      faulted = true;
      throw error;
    } finally {
      const status =
        faulted && !recorder.headersSent ? HttpStatus.INTERNAL_SERVER_ERROR : recorder.status;
      const duration = Math.max(0, performance.now() - start);
      this.emit(AccessLogMiddleware.FORMAT, status, request.method, request.path, duration);
    }
  }
}
