/**
 * @fileoverview Pipeline Builder - Middleware Composition
 *
 * @packageDocumentation
 * @module conduit/infrastructure/pipeline
 *
 * A pipeline is a frozen, ordered sequence of middleware. It is built once
 * at start-up and shared by every request routed through it.
 *
 * ```
 * Request  →  [Middleware 1]  →  [Middleware 2]  →  [Middleware 3]  →  Handler
 * ```
 *
 * The builder keeps its middleware in a heterogeneous store. `use` appends
 * and returns the next builder; `add` does the same and also hands back a
 * typed handle for the appended middleware, so the exact instance can be
 * read back from the built pipeline.
 *
 * ```typescript
 * const { pipeline: withTimer, handle: timer } = createPipeline()
 *   .use(new LoggingMiddleware())
 *   .add(new TimingMiddleware());
 *
 * const pipeline = withTimer.use(new SecurityHeadersMiddleware()).build();
 * pipeline.middleware(timer); // TimingMiddleware
 * pipeline.length;            // 3
 * ```
 *
 * Each builder is consumed by the call made on it; keep chaining from the
 * returned value.
 */

import {
  FrozenStore,
  Handle,
  IndexOf,
  StoreBuilder,
  createStore,
} from '../../domain/store';
import {
  IConduitMiddleware,
  MiddlewareContext,
  MiddlewareFunction,
  NextFunction,
  createMiddleware,
  isMiddleware,
} from '../platform/middleware';
import { ConduitResponse } from '../platform/types';
import { runChain } from './chain';

/**
 * Brand of the store behind every pipeline
 */
export const MiddlewareSlot: unique symbol = Symbol('middleware');

export type MiddlewareSlotBrand = typeof MiddlewareSlot;

/**
 * Handle of a middleware inside a pipeline
 */
export type MiddlewareHandle<
  M extends IConduitMiddleware = IConduitMiddleware,
  I extends number = number,
> = Handle<M, I, MiddlewareSlotBrand>;

/**
 * Middleware object or inline function
 */
export type MiddlewareLike = IConduitMiddleware | MiddlewareFunction;

/**
 * Structural view of any built pipeline
 */
export interface PipelineLike {
  readonly middlewares: ReadonlyArray<IConduitMiddleware>;
  readonly length: number;
}

function toMiddleware(middleware: MiddlewareLike): IConduitMiddleware {
  return typeof middleware === 'function' ? createMiddleware(middleware) : middleware;
}

/**
 * Result of {@link PipelineBuilder.add}
 */
export interface PipelineAddition<
  Items extends readonly unknown[],
  M extends IConduitMiddleware,
  I extends number,
> {
  pipeline: PipelineBuilder<Items>;
  handle: MiddlewareHandle<M, I>;
}

/**
 * Pipeline builder for composing middlewares with fluent API.
 *
 * @template Items - Types of the slots added so far. A `useIf` whose
 *   condition is false records an empty (`undefined`) slot.
 */
export class PipelineBuilder<Items extends readonly unknown[] = []> {
  /** @internal */
  constructor(
    private readonly store: StoreBuilder<MiddlewareSlotBrand, Items>,
    private readonly count: number = 0,
  ) {}

  /**
   * Append a middleware. Consumes this builder.
   *
   * @example
   * ```typescript
   * createPipeline()
   *   .use(new LoggingMiddleware())
   *   .use(async (ctx, next) => next())
   *   .build();
   * ```
   */
  use(middleware: MiddlewareLike): PipelineBuilder<[...Items, IConduitMiddleware]> {
    return new PipelineBuilder(this.store.add(toMiddleware(middleware)).store, this.count + 1);
  }

  /**
   * Append a middleware and return its handle. Consumes this builder.
   */
  add<M extends IConduitMiddleware>(
    middleware: M,
  ): PipelineAddition<[...Items, M], M, Items['length']> {
    const { store, handle } = this.store.add(middleware);
    return { pipeline: new PipelineBuilder(store, this.count + 1), handle };
  }

  /**
   * Append a middleware only when `condition` holds. The condition is
   * evaluated now, at build time.
   *
   * @example
   * ```typescript
   * createPipeline()
   *   .useIf(process.env.NODE_ENV !== 'production', new LoggingMiddleware())
   *   .build();
   * ```
   */
  useIf(
    condition: boolean | (() => boolean),
    middleware: MiddlewareLike,
  ): PipelineBuilder<[...Items, IConduitMiddleware | undefined]> {
    const shouldUse = typeof condition === 'function' ? condition() : condition;
    const slot: IConduitMiddleware | undefined = shouldUse ? toMiddleware(middleware) : undefined;
    return new PipelineBuilder(this.store.add(slot).store, shouldUse ? this.count + 1 : this.count);
  }

  /**
   * Number of middleware added so far
   */
  get length(): number {
    return this.count;
  }

  /**
   * Freeze the order. Consumes this builder.
   */
  build(): Pipeline<Items> {
    return new Pipeline(this.store.freeze());
  }
}

/**
 * Frozen, ordered list of middleware
 */
export class Pipeline<Items extends readonly unknown[] = readonly unknown[]>
  implements PipelineLike
{
  readonly middlewares: ReadonlyArray<IConduitMiddleware>;

  /** @internal */
  constructor(private readonly store: FrozenStore<MiddlewareSlotBrand, Items>) {
    const middlewares: IConduitMiddleware[] = [];
    for (const slot of store.values()) {
      if (isMiddleware(slot)) {
        middlewares.push(slot);
      }
    }
    this.middlewares = Object.freeze(middlewares);
  }

  get length(): number {
    return this.middlewares.length;
  }

  /**
   * The middleware instance behind a handle returned by `add`
   */
  middleware<I extends IndexOf<Items>>(
    handle: Handle<Items[I], I, MiddlewareSlotBrand>,
  ): Items[I] {
    return this.store.borrow(handle);
  }

  /**
   * Run this pipeline around `terminal`
   */
  run(ctx: MiddlewareContext, terminal: NextFunction): Promise<ConduitResponse> {
    return runChain(this.middlewares, ctx, terminal);
  }

  /**
   * The whole pipeline as one middleware: its members run in order, then
   * the outer `next`.
   */
  compose(): IConduitMiddleware {
    const middlewares = this.middlewares;
    return createMiddleware((ctx, next) => runChain(middlewares, ctx, next));
  }
}

/**
 * Create a new pipeline builder
 */
export function createPipeline(): PipelineBuilder<[]> {
  return new PipelineBuilder(createStore(MiddlewareSlot, 'pipeline'));
}
