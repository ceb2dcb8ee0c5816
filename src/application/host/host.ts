/**
 * @muxkit/core - Host
 *
 * Runs one or more adapters (each serving a finalized router) with a common
 * start/stop lifecycle and optional graceful shutdown.
 */

import type { IAdapter, ServerInfo } from '../ports/adapter';

/**
 * Host configuration options
 */
export interface HostOptions {
  /** Application name */
  name?: string;

  /** Stop adapters on SIGTERM/SIGINT */
  gracefulShutdown?: boolean;

  /** Shutdown timeout in milliseconds */
  shutdownTimeout?: number;

  /** Custom logger */
  logger?: ILogger;
}

/**
 * Logger interface
 *
 * Messages may contain printf-style placeholders (`%s`, `%d`) filled from
 * `args`, as with `console`.
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Host status
 */
export type HostStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

/**
 * IHost - Application host interface
 *
 * @example
 * ```typescript
 * const host = createHost({ name: 'my-api' })
 *   .addAdapter(new NodeHttpAdapter(router.finalize(), { port: 8080 }));
 *
 * await host.start();
 * ```
 */
export interface IHost {
  readonly name: string;
  readonly status: HostStatus;

  addAdapter(adapter: IAdapter): this;
  getAdapters(): IAdapter[];

  /**
   * Start the host (starts all adapters)
   */
  start(): Promise<ServerInfo[]>;

  /**
   * Stop the host (stops all adapters)
   */
  stop(): Promise<void>;
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * MuxHost - Default host implementation
 */
export class MuxHost implements IHost {
  readonly name: string;
  private _status: HostStatus = 'stopped';
  private adapters: IAdapter[] = [];
  private readonly logger: ILogger;
  private signalHandlers: Array<[NodeJS.Signals, () => void]> = [];

  constructor(private readonly options: HostOptions = {}) {
    this.name = options.name ?? 'muxkit-app';
    this.logger = options.logger ?? consoleLogger;
  }

  get status(): HostStatus {
    return this._status;
  }

  addAdapter(adapter: IAdapter): this {
    this.adapters.push(adapter);
    return this;
  }

  getAdapters(): IAdapter[] {
    return [...this.adapters];
  }

  async start(): Promise<ServerInfo[]> {
    if (this._status !== 'stopped') {
      throw new Error(`Cannot start host in ${this._status} state`);
    }

    this._status = 'starting';
    this.logger.info(`Starting host: ${this.name}`);

    try {
      if (this.options.gracefulShutdown !== false) {
        this.setupGracefulShutdown();
      }

      const serverInfos = await Promise.all(
        this.adapters.map(async (adapter) => {
          this.logger.info(`Starting adapter: ${adapter.name}`);
          return adapter.start();
        }),
      );

      this._status = 'running';
      this.logger.info(`Host ${this.name} started successfully`);

      return serverInfos;
    } catch (error) {
      this._status = 'error';
      this.removeSignalHandlers();
      this.logger.error(`Failed to start host ${this.name}: %s`, describe(error));
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (this._status !== 'running') {
      return;
    }

    this._status = 'stopping';
    this.logger.info(`Stopping host: ${this.name}`);
    this.removeSignalHandlers();

    const timeout = this.options.shutdownTimeout ?? 30000;
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        this.performShutdown(),
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Shutdown timeout')), timeout);
        }),
      ]);

      this._status = 'stopped';
      this.logger.info(`Host ${this.name} stopped successfully`);
    } catch (error) {
      this.logger.error(`Error during shutdown: %s`, describe(error));
      this._status = 'error';
    } finally {
      clearTimeout(timer);
    }
  }

  private async performShutdown(): Promise<void> {
    await Promise.all(
      this.adapters.map(async (adapter) => {
        this.logger.info(`Stopping adapter: ${adapter.name}`);
        await adapter.stop();
      }),
    );
  }

  private setupGracefulShutdown(): void {
    const shutdown = async (signal: string) => {
      this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
      await this.stop();
      process.exit(0);
    };

    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      const handler = (): void => {
        shutdown(signal).catch((error: unknown) => {
          this.logger.error('Graceful shutdown failed: %s', describe(error));
          process.exit(1);
        });
      };
      process.once(signal, handler);
      this.signalHandlers.push([signal, handler]);
    }
  }

  private removeSignalHandlers(): void {
    for (const [signal, handler] of this.signalHandlers) {
      process.removeListener(signal, handler);
    }
    this.signalHandlers = [];
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a new host
 */
export function createHost(options?: HostOptions): MuxHost {
  return new MuxHost(options);
}
