/**
 * conduit - Well-known State entries
 *
 * Entries the dispatcher places in every request State before the pipeline
 * chain runs.
 */

import type {
  ConduitRequest,
  RequestHeaders as HeaderMap,
} from '../../infrastructure/platform/types';
import { stateKey } from './StateKey';

/** The request as received from the adapter */
export const Request = stateKey<ConduitRequest>('Request');

/** Request headers */
export const RequestHeaderMap = stateKey<HeaderMap>('RequestHeaderMap');

/** Request identifier, from `X-Request-ID` or generated */
export const RequestId = stateKey<string>('RequestId');

/** Raw captured path parameters; glob captures hold every matched segment */
export const PathParams = stateKey<Readonly<Record<string, string | string[]>>>('PathParams');

/** Decoded query string; repeated keys keep every value in order */
export const QueryParams = stateKey<Readonly<Record<string, string[]>>>('QueryParams');

/** Remote address of the client, when the adapter knows it */
export const ClientAddress = stateKey<string>('ClientAddress');

/** Output of the route's path extractor */
export const PathExtract = stateKey<unknown>('PathExtract');

/** Output of the route's query string extractor */
export const QueryExtract = stateKey<unknown>('QueryExtract');
