/**
 * @file Router Builder Unit Tests
 * @description Scopes, pipeline chains, associated routes, shadowing and
 * configuration errors
 */

import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';
import {
  Dispatcher,
  ForeignHandleError,
  FrozenStructureError,
  ILogger,
  RouteConfigurationError,
  RouteTree,
  buildRouter,
  buildSimpleRouter,
  createPipeline,
  createPipelineSet,
  createRequest,
  parsePattern,
  silentLogger,
} from '../../../src/index';
import { ok, recorder } from '../../helpers/context';

const Pipelines: unique symbol = Symbol('pipelines');

function warnings(lines: string[]): ILogger {
  return { ...silentLogger, warn: (message) => lines.push(message) };
}

describe('RouterBuilder', () => {
  // ============================================================================
  // Scopes and chains
  // ============================================================================

  describe('Scopes and chains', () => {
    it('should prefix routes drawn inside a scope', () => {
      const router = buildSimpleRouter(
        (route) => {
          route.scope('/api', (route) => {
            route.scope('/v1', (route) => {
              route.get('/status').to(() => ok());
            });
          });
        },
        { logger: silentLogger },
      );

      const outcome = router.match('GET', '/api/v1/status');

      expect(outcome.kind === 'matched' && outcome.route.pattern).toBe('/api/v1/status');
    });

    it('should attach the chain in force where the route is drawn', () => {
      const log: string[] = [];
      const base = createPipeline().use(recorder('base', log)).build();
      const api = createPipeline().use(recorder('api', log)).build();
      const first = createPipelineSet(Pipelines).add(base);
      const second = first.set.add(api);
      const pipelines = second.set.finalize();

      const router = buildRouter(
        pipelines,
        [first.handle],
        (route) => {
          route.get('/').to(() => ok());
          route.withPipelineChain([first.handle, second.handle], (route) => {
            route.get('/api').to(() => ok());
          });
        },
        { logger: silentLogger },
      );

      const [home, apiRoute] = router.routes();

      expect(home.chain).toEqual([first.handle]);
      expect(apiRoute.chain).toEqual([first.handle, second.handle]);
      expect(router.pipelines.resolve(apiRoute.chain)).toEqual([
        ...base.middlewares,
        ...api.middlewares,
      ]);
    });

    it('should hand the router pipeline set to matched and delegated outcomes', () => {
      const first = createPipelineSet(Pipelines).add(createPipeline().build());
      const pipelines = first.set.finalize();
      const admin = buildSimpleRouter((route) => route.get('/').to(() => ok()), {
        logger: silentLogger,
      });

      const router = buildRouter(
        pipelines,
        [first.handle],
        (route) => {
          route.get('/home').to(() => ok());
          route.delegate('/admin').toRouter(admin);
          route.delegateWithoutPipelines('/static').toRouter(admin);
        },
        { logger: silentLogger },
      );

      const matched = router.match('GET', '/home');
      const delegated = router.match('GET', '/admin');
      const bare = router.match('GET', '/static');

      expect(matched.kind === 'matched' && matched.pipelines).toBe(pipelines);
      expect(delegated.kind === 'delegated' && delegated.chain).toEqual([first.handle]);
      expect(delegated.kind === 'delegated' && delegated.pipelines).toBe(pipelines);
      expect(bare.kind === 'delegated' && bare.chain).toEqual([]);
    });

    it('should reject a chain holding a handle from another pipeline set of the same brand', () => {
      const ours = createPipelineSet(Pipelines).add(createPipeline().build());
      const theirs = createPipelineSet(Pipelines).add(createPipeline().build());
      const pipelines = ours.set.finalize();

      expect(() =>
        buildRouter(pipelines, [theirs.handle], () => undefined, { logger: silentLogger }),
      ).toThrow(ForeignHandleError);
      expect(() =>
        buildRouter(
          pipelines,
          [ours.handle],
          (route) => {
            route.withPipelineChain([theirs.handle], (route) => {
              route.get('/').to(() => ok());
            });
          },
          { logger: silentLogger },
        ),
      ).toThrow(ForeignHandleError);
    });

    it('should register several verbs on one path', () => {
      const router = buildSimpleRouter(
        (route) => {
          route.associate('/orders/:id', (assoc) => {
            assoc.get().to(() => ok('show'));
            assoc.delete().to(() => ok('cancel'));
            assoc.request(['PATCH', 'PUT']).to(() => ok('update'));
          });
        },
        { logger: silentLogger },
      );

      expect(router.match('POST', '/orders/7')).toEqual({
        kind: 'path-matched-no-verb',
        allowedVerbs: ['DELETE', 'GET', 'PATCH', 'PUT'],
      });
      expect(router.routes().map((route) => route.toString())).toEqual([
        'GET /orders/:id',
        'DELETE /orders/:id',
        'PATCH|PUT /orders/:id',
      ]);
    });
  });

  // ============================================================================
  // Shadowed routes
  // ============================================================================

  describe('Shadowed routes', () => {
    it('should keep the first route and warn about the second', () => {
      const lines: string[] = [];
      const router = buildSimpleRouter(
        (route) => {
          route.get('/x').to(() => ok('first'));
          route.getOrHead('/x').to(() => ok('second'));
          route.get('/x').to(() => ok('third'));
        },
        { logger: warnings(lines) },
      );

      const outcome = router.match('GET', '/x');

      expect(outcome.kind === 'matched' && outcome.route).toBe(router.routes()[0]);
      expect(lines).toEqual([
        'Route GET /x is shadowed by GET /x registered before it and will never be selected',
      ]);
    });

    it('should not warn when the earlier route has extra matchers', () => {
      const lines: string[] = [];
      buildSimpleRouter(
        (route) => {
          route
            .post('/upload')
            .addRouteMatcher({ match: () => undefined })
            .to(() => ok());
          route.post('/upload').to(() => ok());
        },
        { logger: warnings(lines) },
      );

      expect(lines).toEqual([]);
    });
  });

  // ============================================================================
  // Configuration errors
  // ============================================================================

  describe('Configuration errors', () => {
    function draw(body: Parameters<typeof buildSimpleRouter>[0]): () => void {
      return () => buildSimpleRouter(body, { logger: silentLogger });
    }

    it('should reject segments after a glob scope', () => {
      expect(
        draw((route) => {
          route.scope('/files/*rest', (route) => {
            route.get('/meta').to(() => ok());
          });
        }),
      ).toThrow('Glob segment "*rest" must be the last segment');
    });

    it('should reject two names for one dynamic position', () => {
      expect(
        draw((route) => {
          route.get('/u/:id').to(() => ok());
          route.get('/u/:name/files').to(() => ok());
        }),
      ).toThrow('Conflicting parameter names ":id" and ":name" at the same position');
    });

    it('should reject one regex bound to two names', () => {
      expect(
        draw((route) => {
          route.get('/u/:id:[0-9]+').to(() => ok());
          route.get('/u/:num:[0-9]+/x').to(() => ok());
        }),
      ).toThrow(RouteConfigurationError);
    });

    it('should reject a repeated parameter name', () => {
      expect(
        draw((route) => {
          route.get('/a/:id/b/:id').to(() => ok());
        }),
      ).toThrow('Duplicate parameter name "id"');
    });

    it('should reject routes below a delegation', () => {
      const other = buildSimpleRouter(() => undefined, { logger: silentLogger });

      expect(
        draw((route) => {
          route.delegate('/admin').toRouter(other);
          route.get('/admin/users').to(() => ok());
        }),
      ).toThrow('Cannot add routes below /admin: it delegates to another router');
      expect(
        draw((route) => {
          route.get('/admin/users').to(() => ok());
          route.delegate('/admin').toRouter(other);
        }),
      ).toThrow('A delegating path must not have routes or other paths below it');
      expect(
        draw((route) => {
          route.delegate('/files/*rest').toRouter(other);
        }),
      ).toThrow('A delegating path cannot contain a glob');
    });
  });

  // ============================================================================
  // Extractors
  // ============================================================================

  describe('Extractors', () => {
    it('should type the handler parameters from the schemas', () => {
      const router = buildSimpleRouter(
        (route) => {
          route
            .get('/products/:id')
            .withPathExtractor(z.object({ id: z.coerce.number().int() }))
            .withQueryStringExtractor(z.object({ tag: z.array(z.string()).optional() }))
            .to(({ params, query }) => ok({ id: params.id + 1, tags: query.tag ?? [] }));
        },
        { logger: silentLogger },
      );

      expect(router.routes()).toHaveLength(1);
    });

    it('should pass the converted values to the handler', async () => {
      const router = buildSimpleRouter(
        (route) => {
          route
            .get('/products/:id')
            .withPathExtractor(z.object({ id: z.coerce.number().int() }))
            .withQueryStringExtractor(z.object({ tag: z.array(z.string()).optional() }))
            .to(({ params, query }) => ok({ id: params.id + 1, tags: query.tag ?? [] }));
        },
        { logger: silentLogger },
      );
      const dispatcher = new Dispatcher(router, { logger: silentLogger });

      const response = await dispatcher.dispatch(
        createRequest('GET', '/products/41?tag=new&tag=sale'),
      );

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ id: 42, tags: ['new', 'sale'] });
    });
  });

  it('should freeze the route tree once built', () => {
    const tree = new RouteTree();
    tree.addRoute(parsePattern('/'), buildSimpleRouter((route) => route.get('/').to(() => ok()), {
      logger: silentLogger,
    }).routes()[0]);
    tree.freeze();

    expect(tree.isFrozen).toBe(true);
    expect(() => tree.nodeFor(parsePattern('/x'))).toThrow(FrozenStructureError);
  });
});
