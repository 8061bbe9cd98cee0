/**
 * conduit - Middleware combinators
 *
 * Functions that build one middleware out of others. The result can be
 * placed in any pipeline like a hand-written middleware.
 */

import {
  ServiceUnavailableException,
  toError,
} from '../../domain/exceptions';
import {
  IConduitMiddleware,
  MiddlewareContext,
  createMiddleware,
} from '../platform/middleware';
import { ConduitResponse } from '../platform/types';
import { MiddlewareLike } from './builder';
import { runChain } from './chain';

function toMiddleware(middleware: MiddlewareLike): IConduitMiddleware {
  return typeof middleware === 'function' ? createMiddleware(middleware) : middleware;
}

/**
 * Compose multiple middlewares into one.
 *
 * @example
 * ```typescript
 * const api = compose(new CorsMiddleware(), new TimingMiddleware());
 * ```
 */
export function compose(...middlewares: MiddlewareLike[]): IConduitMiddleware {
  const members = middlewares.map(toMiddleware);
  return createMiddleware((ctx, next) => runChain(members, ctx, next));
}

/**
 * Run `ifTrue` when `condition` holds for the request, `ifFalse` (or
 * nothing) otherwise.
 */
export function branch(
  condition: (ctx: MiddlewareContext) => boolean,
  ifTrue: MiddlewareLike,
  ifFalse?: MiddlewareLike,
): IConduitMiddleware {
  const trueMw = toMiddleware(ifTrue);
  const falseMw = ifFalse ? toMiddleware(ifFalse) : null;

  return createMiddleware(async (ctx, next) => {
    if (condition(ctx)) {
      return trueMw.invoke(ctx, next);
    }
    if (falseMw) {
      return falseMw.invoke(ctx, next);
    }
    return next();
  });
}

/**
 * Run `middleware` only for the given request methods
 *
 * @example
 * ```typescript
 * forMethods(['POST', 'PUT'], new CsrfMiddleware());
 * ```
 */
export function forMethods(
  methods: string[],
  middleware: MiddlewareLike,
): IConduitMiddleware {
  const upperMethods = methods.map((m) => m.toUpperCase());
  return branch(
    (ctx) => upperMethods.includes(ctx.request.method.toUpperCase()),
    middleware,
  );
}

/**
 * Run `middleware` only for request paths starting with one of `paths`,
 * or matching a regular expression
 */
export function forPaths(
  paths: string[] | RegExp,
  middleware: MiddlewareLike,
): IConduitMiddleware {
  return branch(
    (ctx) =>
      Array.isArray(paths)
        ? paths.some((p) => ctx.request.path.startsWith(p))
        : paths.test(ctx.request.path),
    middleware,
  );
}

/**
 * Inline fault boundary: a fault raised downstream is handed to `handler`,
 * whose response replaces the one that was not produced.
 *
 * @example
 * ```typescript
 * wrapErrors((error) => createErrorResponse(502, 'Bad Gateway', error.message));
 * ```
 */
export function wrapErrors(
  handler: (
    error: Error,
    ctx: MiddlewareContext,
  ) => Promise<ConduitResponse> | ConduitResponse,
): IConduitMiddleware {
  return createMiddleware(async (ctx, next) => {
    try {
      return await next();
    } catch (error) {
      return handler(toError(error), ctx);
    }
  });
}

/**
 * Fail with 503 when `middleware` (including everything downstream of it)
 * has not produced a response within `timeoutMs`. The stages below run
 * with a signal that aborts on timeout, so none of them is entered once
 * the 503 has been chosen.
 */
export function withTimeout(
  middleware: MiddlewareLike,
  timeoutMs: number,
): IConduitMiddleware {
  const mw = toMiddleware(middleware);

  return createMiddleware(async (ctx, next) => {
    const controller = new AbortController();
    const stage: MiddlewareContext = { ...ctx, signal: controller.signal };
    const forward = (): void => controller.abort(ctx.signal.reason);
    if (ctx.signal.aborted) {
      forward();
    } else {
      ctx.signal.addEventListener('abort', forward, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ServiceUnavailableException(`Middleware timeout after ${timeoutMs}ms`);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        mw.invoke(stage, (override) => next(override ?? stage)),
        timeoutPromise,
      ]);
    } finally {
      clearTimeout(timer);
      ctx.signal.removeEventListener('abort', forward);
    }
  });
}
