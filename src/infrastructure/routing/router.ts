/**
 * conduit - Router
 *
 * Frozen route table. Built once by {@link buildRouter}, then shared read
 * only by every request.
 *
 * ```typescript
 * const outcome = router.match('PUT', '/widgets');
 * if (outcome.kind === 'path-matched-no-verb') {
 *   outcome.allowedVerbs; // ['GET']
 * }
 * ```
 */

import { HttpStatus, RequestHeaders } from '../platform/types';
import { ChainResolver, PipelineChain } from '../pipeline/set';
import { PathParamValues } from './extractors';
import { splitPath } from './path';
import { RouteNonMatch } from './non-match';
import { Route } from './route';
import { RouteTree } from './tree';

/**
 * Result of matching a request against the route table
 */
export type MatchOutcome =
  | {
      kind: 'matched';
      route: Route;
      /** Pipeline set the route's chain resolves against */
      pipelines: ChainResolver;
      params: PathParamValues;
      /** Decoded request segments consumed by the route */
      leafPath: string[];
    }
  | { kind: 'path-matched-no-verb'; allowedVerbs: string[] }
  | { kind: 'non-match'; status: number; allowedVerbs: string[] }
  | { kind: 'no-match' }
  | { kind: 'malformed-path'; path: string }
  | {
      kind: 'delegated';
      router: Router;
      /** Pipelines run before handing over, resolved against `pipelines` */
      chain: PipelineChain;
      pipelines: ChainResolver;
      params: PathParamValues;
      /** Number of segments consumed by the delegating path */
      offset: number;
      /** Segments left for the secondary router */
      remaining: string[];
    };

export type MatchKind = MatchOutcome['kind'];

export class Router {
  /** @internal */
  constructor(
    private readonly tree: RouteTree,
    readonly pipelines: ChainResolver,
  ) {}

  /**
   * Match a request path
   *
   * @param method - Request method
   * @param path - Request path, without the query string
   * @param headers - Request headers, read by extra route matchers
   */
  match(method: string, path: string, headers: RequestHeaders = {}): MatchOutcome {
    const segments = splitPath(path);
    if (segments === undefined) {
      return { kind: 'malformed-path', path };
    }
    return this.matchSegments(method, segments, headers);
  }

  /**
   * Match already tokenized segments
   */
  matchSegments(
    method: string,
    segments: ReadonlyArray<string>,
    headers: RequestHeaders = {},
  ): MatchOutcome {
    const traversal = this.tree.traverse(segments);
    if (!traversal) {
      return { kind: 'no-match' };
    }

    const { node, params, consumed } = traversal;

    if (node.delegation) {
      return {
        kind: 'delegated',
        router: node.delegation.router,
        chain: node.delegation.chain,
        pipelines: this.pipelines,
        params,
        offset: consumed,
        remaining: segments.slice(consumed),
      };
    }

    const request = { method: method.toUpperCase(), headers };
    let declined: RouteNonMatch | undefined;

    for (const route of node.routes) {
      const reason = route.match(request);
      if (!reason) {
        return {
          kind: 'matched',
          route,
          pipelines: this.pipelines,
          params,
          leafPath: segments.slice(0, consumed),
        };
      }
      declined = declined ? declined.union(reason) : reason;
    }

    if (!declined || declined.status === HttpStatus.NOT_FOUND) {
      return { kind: 'no-match' };
    }
    if (declined.status === HttpStatus.METHOD_NOT_ALLOWED) {
      return { kind: 'path-matched-no-verb', allowedVerbs: declined.allowedVerbs };
    }
    return { kind: 'non-match', status: declined.status, allowedVerbs: declined.allowedVerbs };
  }

  /**
   * Every registered route, depth first
   */
  routes(): Route[] {
    const found: Route[] = [];
    const visit = (node: RouteTree['root']): void => {
      found.push(...node.routes);
      node.literals.forEach(visit);
      node.constrained.forEach((child) => visit(child.node));
      if (node.dynamic) visit(node.dynamic.node);
      if (node.glob) visit(node.glob.node);
    };
    visit(this.tree.root);
    return found;
  }
}
