/**
 * conduit - Routing Module
 */

export { Router } from './router';
export type { MatchOutcome, MatchKind } from './router';

export {
  RouterBuilder,
  SingleRouteBuilder,
  AssociatedRouteBuilder,
  DelegateRouteBuilder,
  buildRouter,
  buildSimpleRouter,
} from './builder';
export type { RouterBuildOptions } from './builder';

export { Route } from './route';
export type { HandlerContext, RouteHandler, BoundHandler } from './route';

export {
  MethodOnlyRouteMatcher,
  AcceptHeaderRouteMatcher,
  ContentTypeHeaderRouteMatcher,
  AccessControlRequestMethodMatcher,
  AndRouteMatcher,
  AnyRouteMatcher,
  allOf,
} from './matchers';
export type { RouteMatcher, MatchRequest } from './matchers';

export { RouteNonMatch, higherPrecedenceStatus, sortVerbs } from './non-match';
export { runExtractor } from './extractors';
export type { Extractor, PathParamValues } from './extractors';
export { parseQueryString, flattenQuery } from './query';
export type { QueryParamValues } from './query';
export { splitPath, parsePattern, formatPattern, percentDecode } from './path';
export type { SegmentSpec } from './path';
export { RouteTree, TreeNode } from './tree';
export type { Delegation, Traversal } from './tree';
