/**
 * @muxkit/core - Adapter Interface
 *
 * Adapters bridge a finalized {@link RequestHandler} to a concrete transport.
 * Each adapter is responsible for:
 * - Transforming transport requests into `MuxRequest`
 * - Exposing the transport response as a `ResponseWriter`
 * - Managing the transport's lifecycle
 */

import type { RequestFault } from '../../domain/exceptions';
import type { MuxRequest, RequestHandler } from '../../infrastructure/platform/types';
import { consoleLogger, ILogger } from '../host/host';

/**
 * Adapter configuration options
 */
export interface AdapterOptions {
  /** Adapter name for identification */
  name?: string;

  /** Port to listen on */
  port?: number;

  /** Host address to bind */
  host?: string;

  /** Logger for lifecycle messages and unrecovered faults */
  logger?: ILogger;

  /**
   * Called with faults no middleware recovered. When omitted the fault is
   * logged through `logger`.
   */
  errorHandler?: (fault: RequestFault, request: MuxRequest) => void;

  /** Header carrying an upstream trace id */
  traceIdHeader?: string;
}

/**
 * Server information returned after starting
 */
export interface ServerInfo {
  protocol: string;
  host: string;
  port: number;
  url: string;
}

/**
 * IAdapter - transport adapter interface
 */
export interface IAdapter {
  readonly name: string;

  /**
   * Start serving. Resolves once the transport accepts requests.
   */
  start(): Promise<ServerInfo>;

  /**
   * Stop serving
   */
  stop(): Promise<void>;

  isRunning(): boolean;
}

/**
 * Base adapter class with common functionality
 */
export abstract class AdapterBase implements IAdapter {
  abstract readonly name: string;

  protected running = false;
  protected readonly logger: ILogger;

  constructor(
    protected readonly handler: RequestHandler,
    protected readonly options: AdapterOptions = {},
  ) {
    this.logger = options.logger ?? consoleLogger;
  }

  abstract start(): Promise<ServerInfo>;
  abstract stop(): Promise<void>;

  isRunning(): boolean {
    return this.running;
  }
}

