/**
 * @muxkit/core - Exceptions
 *
 * Error taxonomy of the dispatch layer. Configuration errors surface while a
 * router is being finalized; request faults wrap whatever a handler chain
 * threw while serving a single request.
 */

/**
 * Minimal request shape needed to describe where a fault happened.
 * Kept structural so the domain layer does not depend on platform types.
 */
export interface FaultOrigin {
  method: string;
  path: string;
}

/**
 * Base exception class
 */
export class MuxException extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MuxException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Machine-readable configuration error codes
 */
export type ConfigurationErrorCode =
  | 'DUPLICATE_PATTERN'
  | 'INVALID_PATTERN'
  | 'ROUTER_ALREADY_FINALIZED';

/**
 * Raised by `Router.finalize()` when route setup is wrong.
 *
 * @remarks
 * Never retried: it indicates a programming error in route setup and is
 * thrown before any request handler is exposed.
 *
 * @example
 * ```typescript
 * try {
 *   createRouter()
 *     .handle('GET /users', listUsers)
 *     .handle('GET /users', listUsersAgain)
 *     .finalize();
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.error(error.code, error.pattern); // DUPLICATE_PATTERN GET /users
 *   }
 * }
 * ```
 */
export class ConfigurationError extends MuxException {
  constructor(
    public readonly code: ConfigurationErrorCode,
    message: string,
    public readonly pattern?: string,
  ) {
    super(message, code);
    this.name = 'ConfigurationError';
  }
}

/**
 * A fault raised while a handler chain was serving one request.
 */
export class RequestFault extends MuxException {
  readonly method: string;
  readonly path: string;

  constructor(cause: unknown, origin: FaultOrigin) {
    super(
      `Request fault in ${origin.method} ${origin.path}: ${describe(cause)}`,
      'REQUEST_FAULT',
      { cause },
    );
    this.name = 'RequestFault';
    this.method = origin.method;
    this.path = origin.path;
  }

  /**
   * Stack of the original error when there is one, otherwise our own
   */
  get originalStack(): string {
    if (this.cause instanceof Error && this.cause.stack) {
      return this.cause.stack;
    }
    return this.stack ?? '';
  }

  /**
   * Normalize any thrown value into a fault. Faults pass through untouched.
   */
  static from(error: unknown, origin: FaultOrigin): RequestFault {
    if (error instanceof RequestFault) {
      return error;
    }
    return new RequestFault(error, origin);
  }
}

function describe(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}
