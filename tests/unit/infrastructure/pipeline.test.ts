/**
 * @file Pipeline and PipelineSet Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  BuilderConsumedError,
  ForeignHandleError,
  PipelineChain,
  TimingMiddleware,
  createPipeline,
  createPipelineSet,
  emptyPipelineSet,
  runChain,
} from '../../../src/index';
import { ok, recorder, runInContext } from '../../helpers/context';

const Pipelines: unique symbol = Symbol('pipelines');
const OtherPipelines: unique symbol = Symbol('other-pipelines');

describe('Pipeline', () => {
  it('should keep middleware in the order they were added', async () => {
    const log: string[] = [];
    const pipeline = createPipeline()
      .use(recorder('A', log))
      .use(recorder('B', log))
      .build();

    await runInContext((ctx) => pipeline.run(ctx, async () => ok()));

    expect(pipeline.length).toBe(2);
    expect(log).toEqual(['A-enter', 'B-enter', 'B-exit', 'A-exit']);
  });

  it('should accept inline middleware functions', async () => {
    const pipeline = createPipeline()
      .use(async (_ctx, next) => {
        const response = await next();
        return { ...response, status: 202 };
      })
      .build();

    const response = await runInContext((ctx) => pipeline.run(ctx, async () => ok()));

    expect(response.status).toBe(202);
  });

  it('should return the exact instance behind a handle', () => {
    const timing = new TimingMiddleware('X-Elapsed');
    const { pipeline: builder, handle } = createPipeline().use(recorder('A', [])).add(timing);
    const pipeline = builder.build();

    const found: TimingMiddleware = pipeline.middleware(handle);

    expect(found).toBe(timing);
    expect(handle.index).toBe(1);
  });

  it('should leave out middleware whose condition is false', async () => {
    const log: string[] = [];
    const builder = createPipeline()
      .useIf(false, recorder('skipped', log))
      .useIf(() => true, recorder('kept', log));

    expect(builder.length).toBe(1);

    const pipeline = builder.build();
    await runInContext((ctx) => pipeline.run(ctx, async () => ok()));

    expect(pipeline.length).toBe(1);
    expect(log).toEqual(['kept-enter', 'kept-exit']);
  });

  it('should consume the builder each call is made on', () => {
    const builder = createPipeline();
    builder.use(recorder('A', []));

    expect(() => builder.build()).toThrow(BuilderConsumedError);
  });

  it('should run as one middleware once composed', async () => {
    const log: string[] = [];
    const inner = createPipeline().use(recorder('inner', log)).build();
    const outer = createPipeline().use(recorder('outer', log)).use(inner.compose()).build();

    await runInContext((ctx) => outer.run(ctx, async () => ok()));

    expect(log).toEqual(['outer-enter', 'inner-enter', 'inner-exit', 'outer-exit']);
  });
});

describe('PipelineSet', () => {
  it('should resolve a chain into the concatenated middleware', async () => {
    const log: string[] = [];
    const base = createPipeline().use(recorder('base', log)).build();
    const api = createPipeline().use(recorder('api', log)).build();

    const first = createPipelineSet(Pipelines).add(base);
    const second = first.set.add(api);
    const pipelines = second.set.finalize();

    const chain: PipelineChain<typeof Pipelines> = [first.handle, second.handle];
    const middlewares = pipelines.resolve(chain);

    await runInContext((ctx) => runChain(middlewares, ctx, async () => ok()));

    expect(pipelines.size).toBe(2);
    expect(pipelines.borrow(second.handle)).toBe(api);
    expect(log).toEqual(['base-enter', 'api-enter', 'api-exit', 'base-exit']);
  });

  it('should let a chain list the same pipeline twice', () => {
    const base = createPipeline().use(recorder('base', [])).build();
    const { set, handle } = createPipelineSet(Pipelines).add(base);
    const pipelines = set.finalize();

    expect(pipelines.resolve([handle, handle])).toHaveLength(2);
  });

  it('should reject at compile time a chain with handles of another set brand', () => {
    const base = createPipeline().build();
    const theirs = createPipelineSet(OtherPipelines).add(base);

    // @ts-expect-error chains only hold handles of their own set's brand
    const chain: PipelineChain<typeof Pipelines> = [theirs.handle];

    expect(chain).toHaveLength(1);
  });

  it('should reject at run time a handle from another set of the same brand', () => {
    const base = createPipeline().build();
    const ours = createPipelineSet(Pipelines).add(base);
    const theirs = createPipelineSet(Pipelines).add(base).set.finalize();

    expect(() => theirs.resolve([ours.handle])).toThrow(ForeignHandleError);
  });

  it('should resolve nothing from the empty set', () => {
    expect(emptyPipelineSet().resolve([])).toEqual([]);
  });
});
