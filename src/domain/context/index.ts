/**
 * conduit - Context Module
 *
 * Ambient request context propagation
 */

export type {
  IContext,
  ConduitContextData,
  ConduitContext,
} from './IContext';
export {
  RequestContext,
  getCurrentContext,
  tryGetCurrentContext,
} from './RequestContext';
