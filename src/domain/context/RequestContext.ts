/**
 * @fileoverview RequestContext - AsyncLocalStorage-based IContext
 *
 * @packageDocumentation
 * @module @muxkit/core/domain/context
 *
 * One `AsyncLocalStorage` instance is shared by the whole process; each call
 * to {@link RequestContext.run} opens a fresh store that follows the async
 * execution of its callback. Concurrent requests therefore never see each
 * other's values.
 *
 * ```
 * Request A ──run({ requestId: 'A' })──► handler ──await──► handler (still 'A')
 * Request B ──run({ requestId: 'B' })──► handler (sees 'B')
 * ```
 *
 * @see {@link https://nodejs.org/api/async_context.html | Node.js AsyncLocalStorage}
 */

import { AsyncLocalStorage } from 'async_hooks';
import { IContext, MuxContextData } from './IContext';

/**
 * @internal
 */
interface ContextStore {
  data: Map<string, unknown>;
  cancelCallbacks: Set<() => void>;
  cancelled: boolean;
}

/**
 * RequestContext - AsyncLocalStorage-backed implementation of IContext.
 *
 * @remarks
 * Instances are thin wrappers around the active store; two wrappers obtained
 * inside the same `run()` scope read and write the same values.
 *
 * @example
 * ```typescript
 * await RequestContext.run({ requestId: 'req-1' }, async () => {
 *   await somethingAsync();
 *   RequestContext.current()?.get('requestId'); // 'req-1'
 * });
 * ```
 */
export class RequestContext implements IContext {
  private static als = new AsyncLocalStorage<ContextStore>();

  private constructor(private readonly store: ContextStore) {}

  /**
   * Run `callback` inside a new context seeded with `initialData`.
   * Undefined entries are not stored.
   */
  static run<R>(initialData: MuxContextData, callback: () => R): R {
    const store: ContextStore = {
      data: new Map(Object.entries(initialData).filter(([, value]) => value !== undefined)),
      cancelCallbacks: new Set(),
      cancelled: false,
    };

    return RequestContext.als.run(store, callback);
  }

  /**
   * The active context, or `undefined` outside of any `run()` scope.
   */
  static current(): RequestContext | undefined {
    const store = RequestContext.als.getStore();
    if (!store) {
      return undefined;
    }
    return new RequestContext(store);
  }

  static hasContext(): boolean {
    return RequestContext.als.getStore() !== undefined;
  }

  // ==================== IContext Implementation ====================

  get<K extends keyof MuxContextData>(key: K): MuxContextData[K] {
    return this.getAll()[key];
  }

  set<K extends keyof MuxContextData>(key: K, value: MuxContextData[K]): void {
    this.store.data.set(String(key), value);
  }

  has(key: string): boolean {
    return this.store.data.has(key);
  }

  delete(key: string): boolean {
    return this.store.data.delete(key);
  }

  getAll(): Readonly<MuxContextData> {
    const result: MuxContextData = {};
    this.store.data.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  isCancelled(): boolean {
    return this.store.cancelled;
  }

  onCancel(callback: () => void): void {
    if (this.store.cancelled) {
      invokeCancelCallback(callback);
    } else {
      this.store.cancelCallbacks.add(callback);
    }
  }

  cancel(): void {
    if (this.store.cancelled) {
      return;
    }

    this.store.cancelled = true;

    for (const callback of this.store.cancelCallbacks) {
      invokeCancelCallback(callback);
    }

    this.store.cancelCallbacks.clear();
  }

  get requestId(): string | undefined {
    return this.get('requestId');
  }

  get traceId(): string | undefined {
    return this.get('traceId');
  }
}

function invokeCancelCallback(callback: () => void): void {
  try {
    callback();
  } catch (error) {
    // one failing callback must not prevent the others from running
    console.error('Error in cancel callback:', error);
  }
}

/**
 * Get the active context or throw when called outside of a request.
 */
export function getCurrentContext(): RequestContext {
  const context = RequestContext.current();
  if (!context) {
    throw new Error(
      'No active context. Make sure you are within a RequestContext.run() scope.',
    );
  }
  return context;
}
