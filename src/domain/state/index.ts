/**
 * @fileoverview State Module Exports
 * @module conduit/domain/state
 */

export { State } from './State';
export { StateKey, stateKey, stateTypeName } from './StateKey';
export type { StateClass, StateType } from './StateKey';
export {
  Request,
  RequestHeaderMap,
  RequestId,
  PathParams,
  QueryParams,
  ClientAddress,
  PathExtract,
  QueryExtract,
} from './keys';
