/**
 * @fileoverview IContext - Ambient request context contract
 *
 * @packageDocumentation
 * @module conduit/domain/context
 *
 * Code that receives the request {@link State} reads request data from it.
 * Code deeper in the call graph (loggers, repositories, helpers spawned from
 * a handler) reads the ambient context instead: the request id, the method
 * and path being served, and the cancellation flag.
 *
 * The context follows the async call graph, so two requests in flight at
 * the same time never see each other's values.
 *
 * @example
 * ```typescript
 * async function audit(action: string): Promise<void> {
 *   const ctx = RequestContext.current();
 *   logger.info(`[${ctx?.get('requestId') ?? '-'}] ${action}`);
 * }
 * ```
 */

/**
 * Context contract
 *
 * @template T - Shape of the context data
 */
export interface IContext<T extends object = ConduitContextData> {
  /**
   * Get a value from the context by key
   */
  get<K extends keyof T & string>(key: K): T[K] | undefined;

  /**
   * Set a value in the context
   */
  set<K extends keyof T & string>(key: K, value: T[K]): void;

  /**
   * Whether the request has been cancelled.
   *
   * Cancellation is cooperative: long-running work checks this flag (or
   * listens on {@link signal}) and stops on its own.
   */
  isCancelled(): boolean;

  /**
   * Register a callback invoked once when the context is cancelled. A
   * callback registered after cancellation runs immediately.
   */
  onCancel(callback: () => void): void;

  /**
   * Cancel the request. Idempotent.
   */
  cancel(reason?: unknown): void;

  /**
   * Abort signal tied to this context, for APIs that accept one
   * (`fetch`, `setTimeout` from `timers/promises`, streams).
   */
  readonly signal: AbortSignal;

  /**
   * Snapshot of all values
   */
  getAll(): Readonly<Partial<T>>;
}

/**
 * Data carried by the dispatcher's request context.
 *
 * Applications may store their own entries under other keys.
 */
export interface ConduitContextData {
  /** Request identifier (`X-Request-ID` or generated UUID v4) */
  requestId?: string;

  /** Distributed trace identifier, when an upstream provided one */
  traceId?: string;

  /** Request method */
  method?: string;

  /** Request path */
  path?: string;

  /** Start time in milliseconds since the epoch */
  timestamp?: number;

  [key: string]: unknown;
}

/**
 * Convenience alias
 */
export type ConduitContext = IContext<ConduitContextData>;
