/**
 * @muxkit/core - Platform Types
 *
 * The request/response surface shared by handlers, middleware, mounted
 * sub-dispatchers and finalized routers. Every one of them is a
 * {@link RequestHandler}, which is what makes composition recursive.
 */

import type { Readable } from 'stream';

/**
 * HTTP Status codes
 */
export enum HttpStatus {
  // 2xx Success
  OK = 200,
  CREATED = 201,
  ACCEPTED = 202,
  NO_CONTENT = 204,

  // 4xx Client Errors
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  METHOD_NOT_ALLOWED = 405,

  // 5xx Server Errors
  INTERNAL_SERVER_ERROR = 500,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Header value accepted by a response writer
 */
export type HeaderValue = string | number | string[];

/**
 * Inbound request as seen by handlers.
 *
 * @remarks
 * Requests are never mutated by the dispatch layer. Mounting and parameter
 * binding produce shallow copies, so concurrent requests cannot observe
 * each other's state.
 */
export interface MuxRequest {
  /** Request ID */
  id: string;

  /** HTTP method, upper case */
  method: string;

  /** Path relative to the current mount point */
  path: string;

  /** Path as received by the outermost dispatcher */
  originalPath: string;

  /** Query parameters */
  query: Record<string, string | string[] | undefined>;

  /** Request headers (lower-case names) */
  headers: Record<string, string | string[] | undefined>;

  /** Route parameters bound by the matched pattern */
  params: Readonly<Record<string, string>>;

  /** Request body stream */
  body?: Readable;

  /** Client IP address */
  ip?: string;

  /** Raw underlying request (IncomingMessage for the Node adapter) */
  raw?: unknown;

  /** Host-supplied contextual values */
  metadata: Readonly<Record<string, unknown>>;
}

/**
 * Response sink handed to handlers.
 *
 * Mirrors the subset of `http.ServerResponse` the dispatch layer relies on.
 * `headersSent` turns true once the status line is committed, by
 * `writeHead()` or implicitly by the first `write()`/`end()`.
 */
export interface ResponseWriter {
  readonly statusCode: number;
  readonly headersSent: boolean;
  readonly writableEnded: boolean;

  setHeader(name: string, value: HeaderValue): void;
  getHeader(name: string): HeaderValue | undefined;
  getHeaders(): Record<string, HeaderValue>;
  removeHeader(name: string): void;

  /**
   * Commit the status line and headers. Throws when they were already sent.
   */
  writeHead(statusCode: number, headers?: Record<string, HeaderValue>): void;

  write(chunk: string | Uint8Array): void;
  end(chunk?: string | Uint8Array): void;
}

/**
 * The single handler capability: endpoint handlers, mounted sub-dispatchers,
 * middleware-wrapped handlers and finalized routers all share it.
 */
export type RequestHandler = (
  request: MuxRequest,
  response: ResponseWriter,
) => void | Promise<void>;

/**
 * Middleware in its functional form: turns one handler into another.
 */
export type Wrapper = (next: RequestHandler) => RequestHandler;

/**
 * Options for {@link createRequest}
 */
export interface RequestInit {
  id?: string;
  method?: string;
  /** Path with optional query string, e.g. `/users?page=2` */
  url?: string;
  headers?: Record<string, string | string[] | undefined>;
  body?: Readable;
  ip?: string;
  raw?: unknown;
  metadata?: Record<string, unknown>;
}

let requestCounter = 0;

/**
 * Split a request target into path and query string. The target is taken
 * as origin-form, so a leading `//` stays part of the path.
 */
function splitTarget(target: string): { path: string; search: string } {
  const hash = target.indexOf('#');
  const withoutHash = hash === -1 ? target : target.slice(0, hash);
  const mark = withoutHash.indexOf('?');
  const path = mark === -1 ? withoutHash : withoutHash.slice(0, mark);
  const search = mark === -1 ? '' : withoutHash.slice(mark + 1);

  return { path: path.startsWith('/') ? path : `/${path}`, search };
}

/**
 * Create a request value, parsing the path and query out of `init.url`.
 *
 * @example
 * ```typescript
 * const request = createRequest({ method: 'GET', url: '/users?page=2' });
 * request.path;        // '/users'
 * request.query.page;  // '2'
 * ```
 */
export function createRequest(init: RequestInit = {}): MuxRequest {
  const { path, search } = splitTarget(init.url ?? '/');
  const query: Record<string, string | string[] | undefined> = {};

  new URLSearchParams(search).forEach((value, key) => {
    const existing = query[key];
    if (existing === undefined) {
      query[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      query[key] = [existing, value];
    }
  });

  return {
    id: init.id ?? `req-${++requestCounter}`,
    method: (init.method ?? 'GET').toUpperCase(),
    path,
    originalPath: path,
    query,
    headers: init.headers ?? {},
    params: {},
    body: init.body,
    ip: init.ip,
    raw: init.raw,
    metadata: init.metadata ?? {},
  };
}

/**
 * Copy of `request` with a rewritten path (used for mount delegation)
 */
export function withPath(request: MuxRequest, path: string): MuxRequest {
  return { ...request, path };
}

/**
 * Copy of `request` with bound route parameters
 */
export function withParams(
  request: MuxRequest,
  params: Readonly<Record<string, string>>,
): MuxRequest {
  return { ...request, params };
}
