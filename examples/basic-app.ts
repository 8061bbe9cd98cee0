/**
 * conduit - Basic Example
 *
 * Demonstrates the core concepts:
 * - Pipelines and pipeline chains
 * - Segment-tree routing with scopes, extractors and matchers
 * - Exception filters and finalizers
 * - Serving in process with TestClient, or over node:http with `--serve`
 */

import { z } from 'zod';
import {
  AcceptHeaderRouteMatcher,
  ConduitApp,
  CorsMiddleware,
  LoggingMiddleware,
  NodeHttpAdapter,
  NotFoundException,
  StateMiddleware,
  TestClient,
  TestResponse,
  TimingMiddleware,
  ValidationException,
  ValidationExceptionFilter,
  buildRouter,
  createMiddleware,
  createPipeline,
  createPipelineSet,
  extendStatus,
  getHeader,
  response,
  stateKey,
} from '../src/index';

// ==================== Domain ====================

interface User {
  id: string;
  name: string;
  email: string;
}

class UserDirectory {
  private readonly users = new Map<string, User>([
    ['1', { id: '1', name: 'Alice', email: 'alice@example.com' }],
    ['2', { id: '2', name: 'Bob', email: 'bob@example.com' }],
  ]);

  list(): User[] {
    return [...this.users.values()];
  }

  find(id: string): User | undefined {
    return this.users.get(id);
  }

  add(name: string, email: string): User {
    const user = { id: String(this.users.size + 1), name, email };
    this.users.set(user.id, user);
    return user;
  }
}

const CurrentUser = stateKey<string>('CurrentUser');

// ==================== Middleware ====================

const authMiddleware = createMiddleware(async (ctx, next) => {
  if (getHeader(ctx.request.headers, 'authorization') === 'Bearer test-token') {
    ctx.state.putAs(CurrentUser, 'user-1');
  }
  return next();
});

// ==================== Pipelines ====================

const Pipelines: unique symbol = Symbol('example-pipelines');

const web = createPipeline()
  .use(new LoggingMiddleware())
  .use(new TimingMiddleware())
  .use(StateMiddleware.of(new UserDirectory()))
  .build();
const api = createPipeline().use(new CorsMiddleware({ origin: '*' })).use(authMiddleware).build();

const withWeb = createPipelineSet(Pipelines).add(web);
const withApi = withWeb.set.add(api);
const pipelines = withApi.set.finalize();

// ==================== Routes ====================

const newUser = z.object({
  name: z.string().min(1),
  email: z.string().email(),
});

const router = buildRouter(pipelines, [withWeb.handle], (route) => {
  route.getOrHead('/').to(() =>
    response().ok().json().body({ message: 'Welcome to conduit', version: '1.0.0' }).build(),
  );

  route.withPipelineChain([withWeb.handle, withApi.handle], (route) => {
    route.scope('/users', (route) => {
      route.get('/').to(({ state }) =>
        response()
          .ok()
          .json()
          .body({
            users: state.borrow(UserDirectory).list(),
            requestedBy: state.tryBorrow(CurrentUser) ?? 'anonymous',
          })
          .build(),
      );

      route
        .get('/:id:[0-9]+')
        .withPathExtractor(z.object({ id: z.string() }))
        .addRouteMatcher(new AcceptHeaderRouteMatcher(['application/json']))
        .to(({ params, state }) => {
          const user = state.borrow(UserDirectory).find(params.id);
          if (!user) {
            throw new NotFoundException(`User ${params.id} not found`);
          }
          return response().ok().json().body(user).build();
        });

      route.post('/').to(({ request, state }) => {
        const parsed = newUser.safeParse(request.body);
        if (!parsed.success) {
          const errors = Object.fromEntries(
            parsed.error.issues.map((issue): [string, string[]] => [issue.path.join('.'), [issue.message]]),
          );
          throw new ValidationException('Validation failed', errors);
        }
        const user = state.borrowMut(UserDirectory).add(parsed.data.name, parsed.data.email);
        return response().created().json().body(user).build();
      });
    });
  });

  route.get('/error').to(() => {
    throw new Error('Simulated error');
  });
});

// ==================== Application ====================

const app = ConduitApp.create(router, {
  name: 'conduit-demo',
  exceptionFilters: [new ValidationExceptionFilter()],
  finalizers: [
    extendStatus(404, ({ response: res }) => ({
      ...res,
      headers: { ...res.headers, 'Cache-Control': 'no-store' },
    })),
  ],
});

function show(label: string, res: TestResponse): void {
  console.log(`--- ${label} ---`);
  console.log(`${res.status}`, JSON.stringify(res.body, null, 2));
  console.log();
}

async function simulate(): Promise<void> {
  const client = new TestClient(app);

  show('GET /', await client.get('/'));
  show('GET /users (no auth)', await client.get('/users'));
  show(
    'GET /users (with auth)',
    await client.get('/users', { headers: { authorization: 'Bearer test-token' } }),
  );
  show('GET /users/2', await client.get('/users/2', { headers: { accept: 'application/json' } }));
  show('GET /users/2 (text/html only)', await client.get('/users/2', { headers: { accept: 'text/html' } }));
  show('POST /users (validation error)', await client.post('/users', { name: 'Test' }));
  show('POST /users', await client.post('/users', { name: 'Carol', email: 'carol@example.com' }));
  show('DELETE /users', await client.delete('/users'));
  show('GET /unknown', await client.get('/unknown'));
  show('GET /error', await client.get('/error'));
}

async function main(): Promise<void> {
  if (process.argv.includes('--serve')) {
    const adapter = new NodeHttpAdapter({ logger: app.logger });
    await app.listen(adapter, Number(process.env.PORT ?? 3000), '127.0.0.1');

    process.once('SIGINT', () => {
      app.stop().catch((error: unknown) => {
        app.logger.error('Failed to stop', error);
        process.exitCode = 1;
      });
    });
    return;
  }

  await simulate();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
