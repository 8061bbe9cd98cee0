/**
 * Shared fixtures for middleware and chain tests
 */

import {
  ConduitRequest,
  ConduitResponse,
  IConduitMiddleware,
  MiddlewareContext,
  RequestContext,
  State,
  createMiddleware,
  createRequest,
  getCurrentContext,
} from '../../src/index';

/**
 * Run `fn` with a fresh middleware context inside a request scope
 */
export function runInContext<T>(
  fn: (ctx: MiddlewareContext) => Promise<T>,
  request: ConduitRequest = createRequest('GET', '/'),
): Promise<T> {
  return RequestContext.run({ requestId: 'req-1' }, () => {
    const context = getCurrentContext();
    return fn({
      state: new State(),
      request,
      requestId: 'req-1',
      context,
      signal: context.signal,
    });
  });
}

export function ok(body?: unknown): ConduitResponse {
  return { status: 200, headers: {}, ...(body !== undefined && { body }) };
}

/**
 * Middleware appending `<name>-enter` and `<name>-exit` to `log`
 */
export function recorder(name: string, log: string[]): IConduitMiddleware {
  return createMiddleware(async (_ctx, next) => {
    log.push(`${name}-enter`);
    const response = await next();
    log.push(`${name}-exit`);
    return response;
  });
}
