/**
 * @fileoverview Context Interface
 *
 * @packageDocumentation
 * @module @muxkit/core/domain/context
 *
 * Request-scoped values and cancellation.
 * A context is opened by the host adapter for every inbound request and is
 * reachable from any handler or middleware running inside that request,
 * across `await` boundaries, without threading it through parameters.
 *
 * ```typescript
 * async function loadProfile(id: string) {
 *   const ctx = RequestContext.current();
 *   logger.info('loading profile %s', id, { requestId: ctx?.get('requestId') });
 * }
 * ```
 */

/**
 * Values carried by a request context.
 *
 * @remarks
 * `requestId` and `traceId` are filled in by the Node HTTP adapter. Hosts may
 * add any other key.
 */
export interface MuxContextData {
  /** Correlates logs across services; taken from the incoming header when present */
  traceId?: string;

  /** Unique per inbound request */
  requestId?: string;

  [key: string]: unknown;
}

/**
 * IContext - request-scoped key/value store with cancellation.
 */
export interface IContext {
  /**
   * Read a value.
   */
  get<K extends keyof MuxContextData>(key: K): MuxContextData[K];

  /**
   * Write a value. Visible to everything running in the same request.
   */
  set<K extends keyof MuxContextData>(key: K, value: MuxContextData[K]): void;

  has(key: string): boolean;

  delete(key: string): boolean;

  /**
   * Snapshot of every value currently stored.
   */
  getAll(): Readonly<MuxContextData>;

  isCancelled(): boolean;

  /**
   * Register a callback run once when the context is cancelled. Runs
   * immediately when the context is already cancelled.
   */
  onCancel(callback: () => void): void;

  /**
   * Cancel the context. Idempotent.
   */
  cancel(): void;
}
