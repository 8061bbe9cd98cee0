/**
 * conduit - Route
 *
 * A route ties a set of request conditions (method, extra matchers) to a
 * handler, the pipeline chain that runs around it and the extractors that
 * run before it. The chain holds handles only; they are resolved against
 * the router's frozen pipeline set when a request is dispatched.
 */

import { PathExtract, QueryExtract, State } from '../../domain/state';
import { PipelineChain } from '../pipeline/set';
import { MiddlewareContext } from '../platform/middleware';
import { ConduitResponse } from '../platform/types';
import { PathParamValues } from './extractors';
import { MatchRequest, RouteMatcher } from './matchers';
import { RouteNonMatch } from './non-match';
import { QueryParamValues } from './query';

/**
 * What a handler receives: the middleware context plus its extracted path
 * and query values
 */
export interface HandlerContext<P = PathParamValues, Q = QueryParamValues>
  extends MiddlewareContext {
  params: P;
  query: Q;
}

/**
 * Request handler
 */
export type RouteHandler<P = PathParamValues, Q = QueryParamValues> = (
  ctx: HandlerContext<P, Q>,
) => ConduitResponse | Promise<ConduitResponse>;

/**
 * Handler with its extracted values already bound
 */
export type BoundHandler = (ctx: MiddlewareContext) => Promise<ConduitResponse>;

/**
 * Runs a route's extractors and binds their output to its handler.
 * Throws ExtractionException when extraction fails.
 */
export type RoutePreparer = (
  params: PathParamValues,
  query: QueryParamValues,
  state: State,
) => BoundHandler;

export interface RouteOptions {
  /** Full pattern, for logs and introspection */
  pattern: string;

  /** Verbs the route accepts */
  verbs: ReadonlyArray<string>;

  /** Method matcher combined with any extra matchers */
  matcher: RouteMatcher;

  /** Whether matchers beyond the method matcher were added */
  hasExtraMatchers: boolean;

  /** Handles of the pipelines run around the handler, outermost first */
  chain: PipelineChain;

  prepare: RoutePreparer;
}

export class Route {
  readonly pattern: string;
  readonly verbs: ReadonlyArray<string>;
  readonly chain: PipelineChain;
  readonly hasExtraMatchers: boolean;
  private readonly matcher: RouteMatcher;
  private readonly prepare: RoutePreparer;

  constructor(options: RouteOptions) {
    this.pattern = options.pattern;
    this.verbs = Object.freeze([...options.verbs]);
    this.chain = Object.freeze([...options.chain]);
    this.hasExtraMatchers = options.hasExtraMatchers;
    this.matcher = options.matcher;
    this.prepare = options.prepare;
  }

  /**
   * `undefined` when the route accepts the request
   */
  match(request: MatchRequest): RouteNonMatch | undefined {
    return this.matcher.match(request);
  }

  /**
   * Run the extractors and return the handler ready to be invoked at the
   * end of the chain
   *
   * @throws ExtractionException
   */
  bind(params: PathParamValues, query: QueryParamValues, state: State): BoundHandler {
    return this.prepare(params, query, state);
  }

  toString(): string {
    return `${this.verbs.join('|') || '*'} ${this.pattern}`;
  }
}

/**
 * Build the preparer for a handler and its extractors
 */
export function createPreparer<P, Q>(
  extractPath: (raw: PathParamValues) => P,
  extractQuery: (raw: QueryParamValues) => Q,
  handler: RouteHandler<P, Q>,
): RoutePreparer {
  return (rawParams, rawQuery, state) => {
    const params = extractPath(rawParams);
    const query = extractQuery(rawQuery);
    state.putAs(PathExtract, params);
    state.putAs(QueryExtract, query);

    return async (ctx) => handler({ ...ctx, params, query });
  };
}
