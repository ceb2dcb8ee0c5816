/**
 * @muxkit/core - Node HTTP Adapter
 *
 * Serves a finalized {@link RequestHandler} over `http`. Every request runs
 * inside its own {@link RequestContext}; faults that no middleware recovered
 * are reported here and answered with a bare 500.
 */

import { randomUUID } from 'crypto';
import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { AddressInfo } from 'net';
import { consoleLogger } from '../../application/host/host';
import { AdapterBase, AdapterOptions, ServerInfo } from '../../application/ports/adapter';
import { RequestContext } from '../../domain/context';
import { RequestFault } from '../../domain/exceptions';
import {
  createRequest,
  HeaderValue,
  HttpStatus,
  MuxRequest,
  RequestHandler,
  ResponseWriter,
} from '../platform/types';

const DEFAULT_TRACE_HEADER = 'x-trace-id';

/**
 * Listener shape accepted by `http.createServer` and by in-process injectors
 */
export type NodeRequestListener = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * ResponseWriter over a `ServerResponse`
 */
export class NodeResponseWriter implements ResponseWriter {
  constructor(private readonly res: ServerResponse) {}

  get statusCode(): number {
    return this.res.statusCode;
  }

  get headersSent(): boolean {
    return this.res.headersSent;
  }

  get writableEnded(): boolean {
    return this.res.writableEnded;
  }

  setHeader(name: string, value: HeaderValue): void {
    this.res.setHeader(name, value);
  }

  getHeader(name: string): HeaderValue | undefined {
    return this.res.getHeader(name);
  }

  getHeaders(): Record<string, HeaderValue> {
    const headers: Record<string, HeaderValue> = {};
    for (const [name, value] of Object.entries(this.res.getHeaders())) {
      if (value !== undefined) {
        headers[name] = value;
      }
    }
    return headers;
  }

  removeHeader(name: string): void {
    this.res.removeHeader(name);
  }

  writeHead(statusCode: number, headers?: Record<string, HeaderValue>): void {
    this.res.writeHead(statusCode, headers);
  }

  write(chunk: string | Uint8Array): void {
    this.res.write(chunk);
  }

  end(chunk?: string | Uint8Array): void {
    if (chunk === undefined) {
      this.res.end();
    } else {
      this.res.end(chunk);
    }
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Convert an IncomingMessage into a MuxRequest
 */
export function toMuxRequest(
  req: IncomingMessage,
  traceIdHeader: string = DEFAULT_TRACE_HEADER,
): MuxRequest {
  const traceId = firstHeader(req.headers[traceIdHeader.toLowerCase()]);

  return createRequest({
    id: randomUUID(),
    method: req.method,
    url: req.url,
    headers: req.headers,
    body: req,
    ip: req.socket.remoteAddress,
    raw: req,
    metadata: traceId === undefined ? {} : { traceId },
  });
}

function respondPlain(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(message);
}

/**
 * Build a `http` request listener around a handler.
 *
 * @example
 * ```typescript
 * const server = http.createServer(createRequestListener(router.finalize()));
 * ```
 */
export function createRequestListener(
  handler: RequestHandler,
  options: AdapterOptions = {},
): NodeRequestListener {
  const logger = options.logger ?? consoleLogger;
  const traceIdHeader = options.traceIdHeader ?? DEFAULT_TRACE_HEADER;

  const report = (fault: RequestFault, request: MuxRequest): void => {
    if (options.errorHandler) {
      options.errorHandler(fault, request);
    } else {
      logger.error('[%s] Unhandled fault: %s', request.id, fault.originalStack);
    }
  };

  const serve = async (
    request: MuxRequest,
    response: NodeResponseWriter,
    res: ServerResponse,
  ): Promise<void> => {
    try {
      await handler(request, response);
      if (!res.writableEnded) {
        res.end();
      }
    } catch (error) {
      try {
        report(RequestFault.from(error, request), request);
      } finally {
        if (!res.headersSent) {
          respondPlain(res, HttpStatus.INTERNAL_SERVER_ERROR, 'Internal Server Error');
        } else {
          res.destroy();
        }
      }
    }
  };

  return (req, res) => {
    let request: MuxRequest;
    try {
      request = toMuxRequest(req, traceIdHeader);
    } catch (error) {
      logger.warn('Rejected request %s: %s', String(req.url), String(error));
      respondPlain(res, HttpStatus.BAD_REQUEST, 'Bad Request');
      return;
    }
    const traceId = firstHeader(req.headers[traceIdHeader.toLowerCase()]);

    RequestContext.run({ requestId: request.id, traceId }, () => {
      const context = RequestContext.current();
      res.on('close', () => {
        if (!res.writableEnded) {
          context?.cancel();
        }
      });

      serve(request, new NodeResponseWriter(res), res).catch((error: unknown) => {
        logger.error('[%s] Failed to finish response: %s', request.id, String(error));
      });
    });
  };
}

/**
 * NodeHttpAdapter - serves a handler on a `http.Server`
 *
 * @example
 * ```typescript
 * const adapter = new NodeHttpAdapter(router.finalize(), { port: 8080 });
 * const info = await adapter.start(); // { url: 'http://localhost:8080', ... }
 * ```
 */
export class NodeHttpAdapter extends AdapterBase {
  readonly name: string;
  private server: Server | null = null;

  constructor(handler: RequestHandler, options: AdapterOptions = {}) {
    super(handler, options);
    this.name = options.name ?? 'node-http';
  }

  async start(): Promise<ServerInfo> {
    if (this.server) {
      throw new Error(`Adapter ${this.name} is already running`);
    }

    const server = createServer(createRequestListener(this.handler, this.options));
    const port = this.options.port ?? 3000;
    const host = this.options.host ?? 'localhost';

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.running = true;

    const address = server.address();
    const boundPort = isAddressInfo(address) ? address.port : port;
    this.logger.info(`${this.name} listening on http://${host}:${boundPort}`);

    return {
      protocol: 'http',
      host,
      port: boundPort,
      url: `http://${host}:${boundPort}`,
    };
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });

    this.server = null;
    this.running = false;
    this.logger.info(`${this.name} stopped`);
  }

  getServer(): Server | null {
    return this.server;
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

/**
 * Create a Node HTTP adapter
 */
export function createNodeHttpAdapter(
  handler: RequestHandler,
  options?: AdapterOptions,
): NodeHttpAdapter {
  return new NodeHttpAdapter(handler, options);
}
