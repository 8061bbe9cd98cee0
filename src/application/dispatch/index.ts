/**
 * conduit - Dispatch Module
 */

export type { DispatcherOptions, DispatchOptions } from './dispatcher';
export { Dispatcher, routingFailure } from './dispatcher';

export type {
  Finalizer,
  FinalizerContext,
  FinalizerResult,
  ResponseExtender,
} from './finalizers';
export {
  requestIdFinalizer,
  extendStatus,
  ResponseFinalizerBuilder,
} from './finalizers';
