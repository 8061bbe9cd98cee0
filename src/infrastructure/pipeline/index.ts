/**
 * conduit - Pipeline Module
 */

export {
  PipelineBuilder,
  Pipeline,
  MiddlewareSlot,
  createPipeline,
} from './builder';
export type {
  MiddlewareHandle,
  MiddlewareLike,
  MiddlewareSlotBrand,
  PipelineAddition,
  PipelineLike,
} from './builder';

export {
  PipelineSetBuilder,
  PipelineSet,
  NoPipelines,
  createPipelineSet,
  emptyPipelineSet,
} from './set';
export type {
  ChainHandle,
  ChainResolver,
  PipelineChain,
  PipelineSetAddition,
} from './set';

export { runChain, raceCancellation, NextCalledTwiceError } from './chain';

export {
  compose,
  branch,
  forMethods,
  forPaths,
  wrapErrors,
  withTimeout,
} from './combinators';
