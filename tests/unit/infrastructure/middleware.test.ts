/**
 * @file Built-in Middleware and Combinator Unit Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  ConduitResponse,
  CorsMiddleware,
  ErrorBoundaryMiddleware,
  HttpStatus,
  ILogger,
  LoggingMiddleware,
  SecurityHeadersMiddleware,
  ServiceUnavailableException,
  StateMiddleware,
  TimingMiddleware,
  branch,
  compose,
  createMiddleware,
  createRequest,
  forMethods,
  forPaths,
  isMiddleware,
  runChain,
  silentLogger,
  stateKey,
  withTimeout,
  wrapErrors,
} from '../../../src/index';
import { ok, recorder, runInContext } from '../../helpers/context';

function recordingLogger(lines: string[]): ILogger {
  return {
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
}

describe('Built-in middleware', () => {
  it('should recognise middleware objects', () => {
    expect(isMiddleware(new TimingMiddleware())).toBe(true);
    expect(isMiddleware({ invoke: 'nope' })).toBe(false);
    expect(isMiddleware(null)).toBe(false);
  });

  it('should log the request and response lines', async () => {
    const lines: string[] = [];
    const logging = new LoggingMiddleware({ logger: recordingLogger(lines), logDuration: false });

    await runInContext(
      (ctx) => runChain([logging], ctx, async () => ({ status: 204, headers: {} })),
      createRequest('DELETE', '/orders/7'),
    );

    expect(lines).toEqual(['info [req-1] → DELETE /orders/7', 'info [req-1] ← 204']);
  });

  it('should add the response time header', async () => {
    const response = await runInContext((ctx) =>
      runChain([new TimingMiddleware()], ctx, async () => ok()),
    );

    expect(response.headers['X-Response-Time']).toMatch(/^\d+ms$/);
  });

  it('should convert faults into error responses', async () => {
    const boundary = new ErrorBoundaryMiddleware(undefined, silentLogger);

    const response = await runInContext((ctx) =>
      runChain([boundary], ctx, async () => {
        throw new ServiceUnavailableException('Maintenance');
      }),
    );

    expect(response.status).toBe(HttpStatus.SERVICE_UNAVAILABLE);
    expect(response.body).toMatchObject({ message: 'Maintenance', requestId: 'req-1' });
  });

  it('should answer CORS preflight requests without running the handler', async () => {
    const handler = jest.fn(async (): Promise<ConduitResponse> => ok());
    const cors = new CorsMiddleware({ origin: ['https://app.example.test'], maxAge: 600 });

    const response = await runInContext(
      (ctx) => runChain([cors], ctx, handler),
      createRequest('OPTIONS', '/orders', { headers: { origin: 'https://app.example.test' } }),
    );

    expect(handler).not.toHaveBeenCalled();
    expect(response.status).toBe(204);
    expect(response.headers).toEqual({
      'Access-Control-Allow-Origin': 'https://app.example.test',
      'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, PATCH, OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type, Authorization',
      'Access-Control-Max-Age': '600',
    });
  });

  it('should not allow an unknown origin', async () => {
    const cors = new CorsMiddleware({ origin: 'https://app.example.test' });

    const response = await runInContext(
      (ctx) => runChain([cors], ctx, async () => ok()),
      createRequest('GET', '/orders', { headers: { origin: 'https://elsewhere.example.test' } }),
    );

    expect(response.headers['Access-Control-Allow-Origin']).toBeUndefined();
  });

  it('should add security headers without overriding the handler', async () => {
    const response = await runInContext((ctx) =>
      runChain([new SecurityHeadersMiddleware()], ctx, async () => ({
        status: 200,
        headers: { 'X-Frame-Options': 'SAMEORIGIN' },
      })),
    );

    expect(response.headers).toEqual({
      'X-Frame-Options': 'SAMEORIGIN',
      'X-XSS-Protection': '1; mode=block',
      'X-Content-Type-Options': 'nosniff',
    });
  });

  it('should put values into State for the handler', async () => {
    class Tenant {
      constructor(readonly id: string) {}
    }
    const Region = stateKey<string>('Region');

    const seen = await runInContext((ctx) =>
      runChain(
        [StateMiddleware.of(new Tenant('acme')), StateMiddleware.keyed(Region, 'eu-west')],
        ctx,
        async () => ok(`${ctx.state.borrow(Tenant).id}/${ctx.state.borrow(Region)}`),
      ),
    );

    expect(seen.body).toBe('acme/eu-west');
  });
});

describe('Combinators', () => {
  it('should compose middleware into one', async () => {
    const log: string[] = [];
    const both = compose(recorder('A', log), recorder('B', log));

    await runInContext((ctx) => runChain([both, recorder('C', log)], ctx, async () => ok()));

    expect(log).toEqual(['A-enter', 'B-enter', 'C-enter', 'C-exit', 'B-exit', 'A-exit']);
  });

  it('should branch on a condition', async () => {
    const log: string[] = [];
    const split = branch(
      (ctx) => ctx.request.path.startsWith('/admin'),
      recorder('admin', log),
      recorder('public', log),
    );

    await runInContext((ctx) => runChain([split], ctx, async () => ok()), createRequest('GET', '/admin/users'));
    await runInContext((ctx) => runChain([split], ctx, async () => ok()), createRequest('GET', '/home'));

    expect(log).toEqual(['admin-enter', 'admin-exit', 'public-enter', 'public-exit']);
  });

  it('should restrict middleware to methods and paths', async () => {
    const log: string[] = [];
    const chain = [
      forMethods(['post'], recorder('writes', log)),
      forPaths(['/api'], recorder('api', log)),
      forPaths(/^\/static\//, recorder('static', log)),
    ];

    await runInContext((ctx) => runChain(chain, ctx, async () => ok()), createRequest('POST', '/api/orders'));
    await runInContext((ctx) => runChain(chain, ctx, async () => ok()), createRequest('GET', '/static/app.css'));

    expect(log).toEqual([
      'writes-enter',
      'api-enter',
      'api-exit',
      'writes-exit',
      'static-enter',
      'static-exit',
    ]);
  });

  it('should turn errors into responses', async () => {
    const catcher = wrapErrors((error) => ({
      status: 418,
      headers: {},
      body: error.message,
    }));

    const response = await runInContext((ctx) =>
      runChain([catcher], ctx, async () => {
        throw new Error('teapot');
      }),
    );

    expect(response).toEqual({ status: 418, headers: {}, body: 'teapot' });
  });

  it('should fail slow middleware with 503', async () => {
    const slow = createMiddleware(async (_ctx, next) => {
      await sleep(50);
      return next();
    });

    await expect(
      runInContext((ctx) => runChain([withTimeout(slow, 5)], ctx, async () => ok())),
    ).rejects.toThrow('Middleware timeout after 5ms');
  });

  it('should not resume the wrapped middleware chain after the timeout', async () => {
    const log: string[] = [];
    const slow = createMiddleware(async (_ctx, next) => {
      await sleep(40);
      log.push('slow-continues');
      return next();
    });
    const handler = async (): Promise<ConduitResponse> => {
      log.push('handler');
      return ok();
    };

    await expect(
      runInContext((ctx) => runChain([withTimeout(slow, 5), recorder('after', log)], ctx, handler)),
    ).rejects.toThrow('Middleware timeout after 5ms');
    await sleep(60);

    expect(log).toEqual(['slow-continues']);
  });

  it('should cancel downstream stages that were already running at the timeout', async () => {
    const log: string[] = [];
    let downstreamSignal: AbortSignal | undefined;
    const slow = createMiddleware(async (ctx, next) => {
      downstreamSignal = ctx.signal;
      await sleep(40);
      log.push('slow-continues');
      return next();
    });
    const handler = async (): Promise<ConduitResponse> => {
      log.push('handler');
      return ok();
    };

    await expect(
      runInContext((ctx) => runChain([withTimeout(recorder('guard', log), 5), slow], ctx, handler)),
    ).rejects.toThrow('Middleware timeout after 5ms');
    await sleep(60);

    expect(log).toEqual(['guard-enter', 'slow-continues']);
    expect(downstreamSignal?.aborted).toBe(true);
  });

  it('should pass fast middleware through', async () => {
    const response = await runInContext((ctx) =>
      runChain([withTimeout(recorder('fast', []), 1000)], ctx, async () => ok('quick')),
    );

    expect(response.body).toBe('quick');
  });
});
