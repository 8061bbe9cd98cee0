/**
 * @fileoverview Pipeline Set - Frozen registry of pipelines
 *
 * @packageDocumentation
 * @module conduit/infrastructure/pipeline
 *
 * Routes do not hold pipelines directly. They hold a *chain*: an ordered
 * list of handles into one pipeline set. The set is finalized before the
 * router is built, and every request resolves its route's chain against the
 * same frozen set.
 *
 * ```typescript
 * const Pipelines = Symbol('pipelines');
 *
 * const a = createPipelineSet(Pipelines).add(basePipeline);
 * const b = a.set.add(apiPipeline);
 * const pipelines = b.set.finalize();
 *
 * const chain = [a.handle, b.handle] as const;
 * pipelines.resolve(chain); // base middleware, then api middleware
 * ```
 *
 * Handles are branded with the set's symbol: a handle from a set created
 * with another symbol is rejected by the compiler.
 */

import { FrozenStore, Handle, IndexOf, StoreBuilder, createStore } from '../../domain/store';
import { IConduitMiddleware } from '../platform/middleware';
import { PipelineLike } from './builder';

/**
 * Handle of one pipeline inside a set of brand `B`
 */
export type ChainHandle<
  B extends symbol = symbol,
  P extends PipelineLike = PipelineLike,
  I extends number = number,
> = Handle<P, I, B>;

/**
 * Ordered list of pipeline handles run for a route
 */
export type PipelineChain<B extends symbol = symbol> = ReadonlyArray<ChainHandle<B>>;

/**
 * Anything that turns a chain into the middleware to run
 */
export interface ChainResolver<B extends symbol = symbol> {
  resolve(chain: PipelineChain<B>): IConduitMiddleware[];
}

/**
 * Result of {@link PipelineSetBuilder.add}
 */
export interface PipelineSetAddition<
  B extends symbol,
  Items extends readonly PipelineLike[],
  P extends PipelineLike,
  I extends number,
> {
  set: PipelineSetBuilder<B, Items>;
  handle: ChainHandle<B, P, I>;
}

/**
 * Build phase of a pipeline set
 */
export class PipelineSetBuilder<
  B extends symbol,
  Items extends readonly PipelineLike[] = [],
> {
  /** @internal */
  constructor(private readonly store: StoreBuilder<B, Items>) {}

  /**
   * Register a pipeline. Consumes this builder.
   */
  add<P extends PipelineLike>(
    pipeline: P,
  ): PipelineSetAddition<B, [...Items, P], P, Items['length']> {
    const { store, handle } = this.store.add(pipeline);
    return { set: new PipelineSetBuilder(store), handle };
  }

  /**
   * Pipeline behind a handle, while still building
   */
  borrow<I extends IndexOf<Items>>(handle: ChainHandle<B, Items[I], I>): Items[I] {
    return this.store.borrow(handle);
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * End the build phase. Consumes this builder.
   */
  finalize(): PipelineSet<B, Items> {
    return new PipelineSet(this.store.freeze());
  }
}

/**
 * Frozen pipeline registry, shared read-only by every request
 */
export class PipelineSet<
  B extends symbol = symbol,
  Items extends readonly PipelineLike[] = readonly PipelineLike[],
> implements ChainResolver<B> {
  /** @internal */
  constructor(private readonly store: FrozenStore<B, Items>) {}

  get brand(): B {
    return this.store.brand;
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Pipeline behind a handle
   */
  borrow<I extends IndexOf<Items>>(handle: ChainHandle<B, Items[I], I>): Items[I] {
    return this.store.borrow(handle);
  }

  /**
   * Middleware of every pipeline in `chain`, concatenated in chain order
   *
   * @throws ForeignHandleError for a handle that did not come from this set
   */
  resolve(chain: PipelineChain<B>): IConduitMiddleware[] {
    const middlewares: IConduitMiddleware[] = [];
    for (const handle of chain) {
      middlewares.push(...this.store.lookup(handle).middlewares);
    }
    return middlewares;
  }
}

/**
 * Start a pipeline set whose handles carry `brand`
 */
export function createPipelineSet<B extends symbol>(
  brand: B,
): PipelineSetBuilder<B, []> {
  return new PipelineSetBuilder(createStore(brand, brand.description ?? 'pipelines'));
}

/**
 * Brand of the pipeline set made by {@link emptyPipelineSet}
 */
export const NoPipelines: unique symbol = Symbol('no-pipelines');

/**
 * Set with no pipelines, for routers that run handlers bare
 */
export function emptyPipelineSet(): PipelineSet<typeof NoPipelines, []> {
  return createPipelineSet(NoPipelines).finalize();
}
