/**
 * @fileoverview RequestContext - AsyncLocalStorage-based context
 *
 * @packageDocumentation
 * @module conduit/domain/context
 *
 * The dispatcher opens one context per request with {@link RequestContext.run}.
 * Inside that scope, `RequestContext.current()` returns a view on the same
 * store from anywhere in the async call graph: promise chains, timers and
 * nested async functions included. Outside any scope it returns `undefined`.
 *
 * ```
 * run({ requestId: 'a' }, ...)  →  store A  ←  current() in request A
 * run({ requestId: 'b' }, ...)  →  store B  ←  current() in request B
 * ```
 *
 * @see {@link https://nodejs.org/api/async_context.html | Node.js AsyncLocalStorage}
 */

import { AsyncLocalStorage } from 'async_hooks';
import { ConduitError } from '../exceptions/errors';
import { ConduitContextData, IContext } from './IContext';

/**
 * Storage behind one context scope
 *
 * @internal
 */
interface ContextStore {
  data: Partial<ConduitContextData>;
  cancelCallbacks: Set<() => void>;
  controller: AbortController;
}

/**
 * RequestContext - AsyncLocalStorage-based implementation of IContext.
 *
 * One `AsyncLocalStorage` instance is shared by the whole process; each
 * `RequestContext` object is a thin wrapper over the store of the scope it
 * was obtained in, so two wrappers obtained in the same scope see the same
 * values.
 *
 * @example
 * ```typescript
 * await RequestContext.run({ requestId: 'req-1' }, async () => {
 *   await doWork();
 *   RequestContext.current()?.get('requestId'); // 'req-1'
 * });
 * ```
 */
export class RequestContext implements IContext<ConduitContextData> {
  private static als = new AsyncLocalStorage<ContextStore>();

  private constructor(private readonly store: ContextStore) {}

  /**
   * Run `callback` inside a new context scope.
   *
   * With a `signal`, aborting it cancels the scope until the promise
   * returned by `callback` settles; the listener is removed then.
   *
   * @param initialData - Values the scope starts with
   * @param callback - Work to run in the scope; its return value is returned
   * @param signal - External signal linked to the scope's cancellation
   */
  static run<R>(
    initialData: Partial<ConduitContextData>,
    callback: () => Promise<R>,
    signal?: AbortSignal,
  ): Promise<R>;
  static run<R>(initialData: Partial<ConduitContextData>, callback: () => R): R;
  static run(
    initialData: Partial<ConduitContextData>,
    callback: () => unknown,
    signal?: AbortSignal,
  ): unknown {
    const store = RequestContext.createStore({ ...initialData });

    if (!signal) {
      return RequestContext.als.run(store, callback);
    }

    const detach = RequestContext.link(new RequestContext(store), signal);
    return RequestContext.als.run(store, async () => {
      try {
        return await callback();
      } finally {
        detach();
      }
    });
  }

  private static link(context: RequestContext, signal: AbortSignal): () => void {
    if (signal.aborted) {
      context.cancel(signal.reason);
      return () => undefined;
    }

    const onAbort = (): void => context.cancel(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  }

  /**
   * The context of the current scope, or `undefined` outside any scope
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

  private static createStore(data: Partial<ConduitContextData>): ContextStore {
    return {
      data,
      cancelCallbacks: new Set(),
      controller: new AbortController(),
    };
  }

  // ==================== IContext Implementation ====================

  get<K extends keyof ConduitContextData & string>(
    key: K,
  ): ConduitContextData[K] | undefined {
    return this.store.data[key];
  }

  set<K extends keyof ConduitContextData & string>(
    key: K,
    value: ConduitContextData[K],
  ): void {
    this.store.data[key] = value;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.store.data, key);
  }

  delete(key: string): boolean {
    if (!this.has(key)) {
      return false;
    }
    delete this.store.data[key];
    return true;
  }

  get signal(): AbortSignal {
    return this.store.controller.signal;
  }

  isCancelled(): boolean {
    return this.store.controller.signal.aborted;
  }

  onCancel(callback: () => void): void {
    if (this.isCancelled()) {
      RequestContext.invokeCancelCallback(callback);
    } else {
      this.store.cancelCallbacks.add(callback);
    }
  }

  cancel(reason?: unknown): void {
    if (this.isCancelled()) {
      return;
    }

    this.store.controller.abort(reason);

    for (const callback of this.store.cancelCallbacks) {
      RequestContext.invokeCancelCallback(callback);
    }
    this.store.cancelCallbacks.clear();
  }

  getAll(): Readonly<Partial<ConduitContextData>> {
    return { ...this.store.data };
  }

  /**
   * New, independent context holding a copy of this one's values.
   * Cancellation state and callbacks are not copied.
   */
  clone(additionalData?: Partial<ConduitContextData>): RequestContext {
    return new RequestContext(
      RequestContext.createStore({ ...this.store.data, ...additionalData }),
    );
  }

  get requestId(): string | undefined {
    return this.store.data.requestId;
  }

  get traceId(): string | undefined {
    return this.store.data.traceId;
  }

  private static invokeCancelCallback(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      console.error('Error in cancel callback:', error);
    }
  }
}

/**
 * The current context.
 *
 * @throws ConduitError outside a `RequestContext.run()` scope
 */
export function getCurrentContext(): RequestContext {
  const context = RequestContext.current();
  if (!context) {
    throw new ConduitError(
      'No active context. Make sure you are within a RequestContext.run() scope.',
    );
  }
  return context;
}

/**
 * The current context, or `null` outside any scope
 */
export function tryGetCurrentContext(): RequestContext | null {
  return RequestContext.current() ?? null;
}
