/**
 * @fileoverview Router Builder - Route registration DSL
 *
 * @packageDocumentation
 * @module conduit/infrastructure/routing
 *
 * Routes are drawn inside a callback. Scopes add a path prefix,
 * `withPipelineChain` swaps the chain of pipelines that runs around the
 * handlers drawn inside it, and `to` registers the handler.
 *
 * ```typescript
 * const router = buildRouter(pipelines, [base], (route) => {
 *   route.get('/').to(() => response().text().body('home').build());
 *
 *   route.scope('/api', (route) => {
 *     route.withPipelineChain([base, api], (route) => {
 *       route
 *         .get('/products/:id:[0-9]+')
 *         .withPathExtractor(z.object({ id: z.coerce.number() }))
 *         .to(({ params }) => showProduct(params.id));
 *     });
 *   });
 *
 *   route.delegate('/admin').toRouter(adminRouter);
 * });
 * ```
 *
 * When two routes at the same path accept the same verbs, the first one
 * registered serves the request. A route that can never be selected for
 * this reason is reported through the logger as a warning.
 */

import { RouteConfigurationError } from '../../domain/exceptions';
import { ILogger, consoleLogger } from '../logging';
import { ChainResolver, NoPipelines, PipelineChain, emptyPipelineSet } from '../pipeline/set';
import { HttpMethod } from '../platform/types';
import { Extractor, PathParamValues, runExtractor } from './extractors';
import {
  MethodOnlyRouteMatcher,
  RouteMatcher,
  allOf,
} from './matchers';
import { SegmentSpec, assertUniqueParams, formatPattern, parsePattern } from './path';
import { QueryParamValues, flattenQuery } from './query';
import { Route, RouteHandler, createPreparer } from './route';
import { Router } from './router';
import { RouteTree } from './tree';

/**
 * Router build options
 */
export interface RouterBuildOptions {
  /** Receives shadowed-route warnings (default: console) */
  logger?: ILogger;
}

export interface DrawScope<B extends symbol> {
  tree: RouteTree;
  prefix: ReadonlyArray<SegmentSpec>;
  chain: PipelineChain<B>;
  pipelines: ChainResolver<B>;
  logger: ILogger;
}

/**
 * Everything a {@link SingleRouteBuilder} needs to register its route
 */
export interface PendingRoute {
  specs: ReadonlyArray<SegmentSpec>;
  verbs: ReadonlyArray<string>;
  methodMatcher: RouteMatcher;
  tree: RouteTree;
  logger: ILogger;
  chain: PipelineChain;
}

function joinSpecs(
  prefix: ReadonlyArray<SegmentSpec>,
  path: string,
): SegmentSpec[] {
  const last = prefix[prefix.length - 1];
  const specs = parsePattern(path);
  if (last?.kind === 'glob' && specs.length > 0) {
    throw new RouteConfigurationError(
      `Glob segment "*${last.name}" must be the last segment`,
      formatPattern([...prefix, ...specs]),
    );
  }
  const joined = [...prefix, ...specs];
  assertUniqueParams(joined, formatPattern(joined));
  return joined;
}

// ==================== Single Route ====================

/**
 * Builder for one route. Nothing is registered until {@link to} is called.
 *
 * @template P - What the handler receives as `params`
 * @template Q - What the handler receives as `query`
 */
export class SingleRouteBuilder<P = PathParamValues, Q = QueryParamValues> {
  /** @internal */
  constructor(
    private readonly pending: PendingRoute,
    private readonly extractPath: (raw: PathParamValues) => P,
    private readonly extractQuery: (raw: QueryParamValues) => Q,
    private readonly extraMatchers: ReadonlyArray<RouteMatcher> = [],
  ) {}

  /**
   * Validate and convert the captured path segments with a zod schema
   */
  withPathExtractor<T>(extractor: Extractor<T>): SingleRouteBuilder<T, Q> {
    return new SingleRouteBuilder(
      this.pending,
      (raw) => runExtractor(extractor, 'path', raw),
      this.extractQuery,
      this.extraMatchers,
    );
  }

  /**
   * Validate and convert the query string with a zod schema. Keys given
   * once arrive as strings, repeated keys as string arrays.
   */
  withQueryStringExtractor<T>(extractor: Extractor<T>): SingleRouteBuilder<P, T> {
    return new SingleRouteBuilder(
      this.pending,
      this.extractPath,
      (raw) => runExtractor(extractor, 'query', flattenQuery(raw)),
      this.extraMatchers,
    );
  }

  /**
   * Require another condition on the request
   */
  addRouteMatcher(matcher: RouteMatcher): SingleRouteBuilder<P, Q> {
    return new SingleRouteBuilder(this.pending, this.extractPath, this.extractQuery, [
      ...this.extraMatchers,
      matcher,
    ]);
  }

  /**
   * Register the route with its handler
   */
  to(handler: RouteHandler<P, Q>): void {
    const { specs, verbs, methodMatcher, tree, logger } = this.pending;
    const pattern = formatPattern(specs);

    const route = new Route({
      pattern,
      verbs,
      matcher: allOf(methodMatcher, ...this.extraMatchers),
      hasExtraMatchers: this.extraMatchers.length > 0,
      chain: this.pending.chain,
      prepare: createPreparer(this.extractPath, this.extractQuery, handler),
    });

    const node = tree.nodeFor(specs);
    const shadowing = node.routes.find(
      (existing) =>
        !existing.hasExtraMatchers &&
        route.verbs.length > 0 &&
        route.verbs.every((verb) => existing.verbs.includes(verb)),
    );
    if (shadowing) {
      logger.warn(
        `Route ${route.toString()} is shadowed by ${shadowing.toString()} registered before it and will never be selected`,
      );
    }

    tree.addRoute(specs, route);
  }
}

// ==================== Drawing ====================

/**
 * Route drawing surface handed to `buildRouter` callbacks
 *
 * @template B - Brand of the pipeline set the router's chains point into
 */
export class RouterBuilder<B extends symbol> {
  /** @internal */
  constructor(private readonly drawing: DrawScope<B>) {}

  get(path: string): SingleRouteBuilder {
    return this.request(['GET'], path);
  }

  head(path: string): SingleRouteBuilder {
    return this.request(['HEAD'], path);
  }

  /**
   * GET and HEAD
   */
  getOrHead(path: string): SingleRouteBuilder {
    return this.request(['GET', 'HEAD'], path);
  }

  post(path: string): SingleRouteBuilder {
    return this.request(['POST'], path);
  }

  put(path: string): SingleRouteBuilder {
    return this.request(['PUT'], path);
  }

  patch(path: string): SingleRouteBuilder {
    return this.request(['PATCH'], path);
  }

  delete(path: string): SingleRouteBuilder {
    return this.request(['DELETE'], path);
  }

  options(path: string): SingleRouteBuilder {
    return this.request(['OPTIONS'], path);
  }

  /**
   * Route for a list of verbs, or for any request a custom matcher accepts
   */
  request(
    verbsOrMatcher: ReadonlyArray<HttpMethod | string> | RouteMatcher,
    path: string,
  ): SingleRouteBuilder {
    return startRoute(this.drawing, joinSpecs(this.drawing.prefix, path), verbsOrMatcher);
  }

  /**
   * Draw routes under a path prefix
   */
  scope(path: string, draw: (route: RouterBuilder<B>) => void): void {
    draw(new RouterBuilder({ ...this.drawing, prefix: joinSpecs(this.drawing.prefix, path) }));
  }

  /**
   * Draw routes that run a different chain of pipelines
   *
   * @throws ForeignHandleError for a handle that did not come from the router's pipeline set
   */
  withPipelineChain(chain: PipelineChain<B>, draw: (route: RouterBuilder<B>) => void): void {
    this.drawing.pipelines.resolve(chain);
    draw(new RouterBuilder({ ...this.drawing, chain }));
  }

  /**
   * Draw several routes sharing one path
   *
   * @example
   * ```typescript
   * route.associate('/orders/:id', (assoc) => {
   *   assoc.get().to(showOrder);
   *   assoc.delete().to(cancelOrder);
   * });
   * ```
   */
  associate(path: string, draw: (assoc: AssociatedRouteBuilder<B>) => void): void {
    draw(new AssociatedRouteBuilder(this.drawing, joinSpecs(this.drawing.prefix, path)));
  }

  /**
   * Hand every path below `path` to another router, after this scope's
   * pipeline chain
   */
  delegate(path: string): DelegateRouteBuilder<B> {
    return new DelegateRouteBuilder(this.drawing, joinSpecs(this.drawing.prefix, path), true);
  }

  /**
   * Hand every path below `path` to another router; only the secondary
   * router's own pipelines run
   */
  delegateWithoutPipelines(path: string): DelegateRouteBuilder<B> {
    return new DelegateRouteBuilder(this.drawing, joinSpecs(this.drawing.prefix, path), false);
  }
}

function startRoute<B extends symbol>(
  scope: DrawScope<B>,
  specs: ReadonlyArray<SegmentSpec>,
  verbsOrMatcher: ReadonlyArray<string> | RouteMatcher,
): SingleRouteBuilder {
  let methodMatcher: RouteMatcher;
  let verbs: ReadonlyArray<string>;

  if (isVerbList(verbsOrMatcher)) {
    const matcher = new MethodOnlyRouteMatcher(verbsOrMatcher);
    methodMatcher = matcher;
    verbs = matcher.verbs;
  } else {
    methodMatcher = verbsOrMatcher;
    verbs = verbsOrMatcher instanceof MethodOnlyRouteMatcher ? verbsOrMatcher.verbs : [];
  }

  return new SingleRouteBuilder(
    {
      specs,
      verbs,
      methodMatcher,
      tree: scope.tree,
      logger: scope.logger,
      chain: scope.chain,
    },
    (raw) => raw,
    (raw) => raw,
  );
}

function isVerbList(value: ReadonlyArray<string> | RouteMatcher): value is ReadonlyArray<string> {
  return Array.isArray(value);
}

/**
 * Routes sharing one path, one per verb set
 */
export class AssociatedRouteBuilder<B extends symbol> {
  /** @internal */
  constructor(
    private readonly drawing: DrawScope<B>,
    private readonly specs: ReadonlyArray<SegmentSpec>,
  ) {}

  get(): SingleRouteBuilder {
    return this.request(['GET']);
  }

  head(): SingleRouteBuilder {
    return this.request(['HEAD']);
  }

  getOrHead(): SingleRouteBuilder {
    return this.request(['GET', 'HEAD']);
  }

  post(): SingleRouteBuilder {
    return this.request(['POST']);
  }

  put(): SingleRouteBuilder {
    return this.request(['PUT']);
  }

  patch(): SingleRouteBuilder {
    return this.request(['PATCH']);
  }

  delete(): SingleRouteBuilder {
    return this.request(['DELETE']);
  }

  options(): SingleRouteBuilder {
    return this.request(['OPTIONS']);
  }

  request(verbsOrMatcher: ReadonlyArray<HttpMethod | string> | RouteMatcher): SingleRouteBuilder {
    return startRoute(this.drawing, this.specs, verbsOrMatcher);
  }
}

/**
 * Pending delegation, completed by {@link toRouter}
 */
export class DelegateRouteBuilder<B extends symbol> {
  /** @internal */
  constructor(
    private readonly drawing: DrawScope<B>,
    private readonly specs: ReadonlyArray<SegmentSpec>,
    private readonly withPipelines: boolean,
  ) {}

  toRouter(router: Router): void {
    this.drawing.tree.addDelegation(this.specs, {
      router,
      chain: this.withPipelines ? this.drawing.chain : [],
      pattern: formatPattern(this.specs),
    });
  }
}

// ==================== Entry points ====================

/**
 * Build a router whose routes run chains from `pipelines`. `chain` is the
 * default chain for routes not drawn inside `withPipelineChain`. Routes
 * keep their chain of handles; the router resolves it against `pipelines`
 * for each request.
 */
export function buildRouter<B extends symbol>(
  pipelines: ChainResolver<B>,
  chain: PipelineChain<B>,
  draw: (route: RouterBuilder<B>) => void,
  options: RouterBuildOptions = {},
): Router {
  const tree = new RouteTree();
  pipelines.resolve(chain);
  draw(
    new RouterBuilder<B>({
      tree,
      prefix: [],
      chain,
      pipelines,
      logger: options.logger ?? consoleLogger,
    }),
  );
  tree.freeze();
  return new Router(tree, pipelines);
}

/**
 * Build a router without pipelines
 */
export function buildSimpleRouter(
  draw: (route: RouterBuilder<typeof NoPipelines>) => void,
  options: RouterBuildOptions = {},
): Router {
  return buildRouter(emptyPipelineSet(), [], draw, options);
}
