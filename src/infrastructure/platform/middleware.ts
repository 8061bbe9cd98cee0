/**
 * conduit - Middleware Interface
 *
 * Onion-style middleware: each middleware receives the request context and
 * a `next` continuation. Awaiting `next()` runs everything downstream
 * (later middleware, then the handler) and resolves with the response they
 * produced. A middleware may change that response on the way out, or return
 * a response of its own without calling `next` at all (short-circuit).
 */

import { RequestContext } from '../../domain/context';
import {
  ExceptionContext,
  DefaultExceptionFilter,
  ExceptionFilterChain,
  IExceptionFilter,
  toError,
} from '../../domain/exceptions';
import { State, StateKey } from '../../domain/state';
import { ILogger, consoleLogger } from '../logging';
import {
  ConduitRequest,
  ConduitResponse,
  HttpStatus,
  getHeader,
  withHeaders,
} from './types';

/**
 * Continuation running the rest of the chain. Passing a context runs the
 * remaining stages with it instead of the one this stage received.
 */
export type NextFunction = (ctx?: MiddlewareContext) => Promise<ConduitResponse>;

/**
 * What every middleware and handler receives
 */
export interface MiddlewareContext {
  /** Request-scoped state */
  state: State;

  /** The request being served */
  request: ConduitRequest;

  /** Request identifier */
  requestId: string;

  /** Ambient context of this request */
  context: RequestContext;

  /** Aborted when the request is cancelled */
  signal: AbortSignal;
}

/**
 * IConduitMiddleware - Core middleware interface
 *
 * @example
 * ```typescript
 * class StopwatchMiddleware implements IConduitMiddleware {
 *   async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<ConduitResponse> {
 *     const start = Date.now();
 *     const res = await next();
 *     return withHeaders(res, { 'X-Elapsed': String(Date.now() - start) });
 *   }
 * }
 * ```
 */
export interface IConduitMiddleware {
  /**
   * Middleware execution method
   *
   * @param ctx - Middleware context
   * @param next - Runs the rest of the chain; call at most once
   */
  invoke(ctx: MiddlewareContext, next: NextFunction): Promise<ConduitResponse>;
}

/**
 * Middleware function type for inline middleware
 */
export type MiddlewareFunction = (
  ctx: MiddlewareContext,
  next: NextFunction,
) => Promise<ConduitResponse>;

/**
 * Type guard to check if something is a middleware
 */
export function isMiddleware(value: unknown): value is IConduitMiddleware {
  return (
    typeof value === 'object' &&
    value !== null &&
    'invoke' in value &&
    typeof value.invoke === 'function'
  );
}

/**
 * Convert a function to middleware object
 */
export function createMiddleware(fn: MiddlewareFunction): IConduitMiddleware {
  return {
    invoke: fn,
  };
}

/**
 * Abstract base class for middleware with common utilities
 */
export abstract class ConduitMiddlewareBase implements IConduitMiddleware {
  abstract invoke(
    ctx: MiddlewareContext,
    next: NextFunction,
  ): Promise<ConduitResponse>;

  protected getTraceId(ctx: MiddlewareContext): string | undefined {
    return ctx.context.traceId;
  }

  protected isCancelled(ctx: MiddlewareContext): boolean {
    return ctx.signal.aborted;
  }

  protected respond(
    status: number,
    body?: unknown,
    headers: Record<string, string> = {},
  ): ConduitResponse {
    return {
      status,
      headers: body === undefined ? { ...headers } : { 'Content-Type': 'application/json', ...headers },
      ...(body !== undefined && { body }),
    };
  }
}

// ==================== Built-in Middlewares ====================

/**
 * Logging middleware options
 */
export interface LoggingMiddlewareOptions {
  logger?: ILogger;
  logRequest?: boolean;
  logResponse?: boolean;
  logDuration?: boolean;
}

/**
 * Logging middleware - logs request/response lifecycle
 *
 * ```
 * [INFO] [5c8e...] → GET /widgets
 * [INFO] [5c8e...] ← 200 (3ms)
 * ```
 */
export class LoggingMiddleware extends ConduitMiddlewareBase {
  private readonly options: Required<LoggingMiddlewareOptions>;

  constructor(options: LoggingMiddlewareOptions = {}) {
    super();
    this.options = {
      logger: consoleLogger,
      logRequest: true,
      logResponse: true,
      logDuration: true,
      ...options,
    };
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<ConduitResponse> {
    const start = Date.now();
    const { logger } = this.options;

    if (this.options.logRequest) {
      logger.info(`[${ctx.requestId}] → ${ctx.request.method} ${ctx.request.path}`);
    }

    const res = await next();

    if (this.options.logResponse) {
      const duration = this.options.logDuration ? ` (${Date.now() - start}ms)` : '';
      logger.info(`[${ctx.requestId}] ← ${res.status}${duration}`);
    }

    return res;
  }
}

/**
 * Timing middleware - adds a timing header to the response
 */
export class TimingMiddleware extends ConduitMiddlewareBase {
  constructor(private readonly headerName: string = 'X-Response-Time') {
    super();
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<ConduitResponse> {
    const start = Date.now();
    const res = await next();
    return withHeaders(res, { [this.headerName]: `${Date.now() - start}ms` });
  }
}

/**
 * Error boundary middleware - converts faults raised downstream into
 * responses with its own exception filters. Faults raised upstream of it
 * are not seen.
 */
export class ErrorBoundaryMiddleware extends ConduitMiddlewareBase {
  private readonly filters: ExceptionFilterChain;

  constructor(
    filters: IExceptionFilter[] = [new DefaultExceptionFilter()],
    private readonly logger: ILogger = consoleLogger,
  ) {
    super();
    this.filters = new ExceptionFilterChain().addFilters(filters);
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<ConduitResponse> {
    try {
      return await next();
    } catch (thrown) {
      const error = toError(thrown);
      this.logger.error(`[${ctx.requestId}] ${error.name}: ${error.message}`);

      const exceptionContext: ExceptionContext = {
        error,
        requestId: ctx.requestId,
        path: ctx.request.path,
        method: ctx.request.method,
        timestamp: new Date(),
      };
      return this.filters.catch(exceptionContext);
    }
  }
}

/**
 * CORS middleware options
 */
export interface CorsOptions {
  origin?: string | string[] | ((origin: string) => boolean);
  methods?: string[];
  headers?: string[];
  credentials?: boolean;
  maxAge?: number;
}

/**
 * CORS middleware - handles Cross-Origin Resource Sharing
 */
export class CorsMiddleware extends ConduitMiddlewareBase {
  private readonly options: Required<CorsOptions>;

  constructor(options: CorsOptions = {}) {
    super();
    this.options = {
      origin: '*',
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
      headers: ['Content-Type', 'Authorization'],
      credentials: false,
      maxAge: 86400,
      ...options,
    };
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<ConduitResponse> {
    const origin = getHeader(ctx.request.headers, 'origin') ?? '';
    const corsHeaders: Record<string, string> = {};

    const allowedOrigin = this.getAllowedOrigin(origin);
    if (allowedOrigin) {
      corsHeaders['Access-Control-Allow-Origin'] = allowedOrigin;
    }

    if (this.options.credentials) {
      corsHeaders['Access-Control-Allow-Credentials'] = 'true';
    }

    // Preflight
    if (ctx.request.method === 'OPTIONS') {
      return this.respond(HttpStatus.NO_CONTENT, undefined, {
        ...corsHeaders,
        'Access-Control-Allow-Methods': this.options.methods.join(', '),
        'Access-Control-Allow-Headers': this.options.headers.join(', '),
        'Access-Control-Max-Age': String(this.options.maxAge),
      });
    }

    return withHeaders(await next(), corsHeaders);
  }

  private getAllowedOrigin(origin: string): string | null {
    const allowed = this.options.origin;
    if (allowed === '*') return '*';
    if (typeof allowed === 'string') {
      return allowed === origin ? origin : null;
    }
    if (Array.isArray(allowed)) {
      return allowed.includes(origin) ? origin : null;
    }
    return allowed(origin) ? origin : null;
  }
}

/**
 * Security headers middleware - adds a fixed set of protective headers
 * unless the downstream response already set them
 */
export class SecurityHeadersMiddleware extends ConduitMiddlewareBase {
  static readonly DEFAULT_HEADERS: Readonly<Record<string, string>> = {
    'X-Frame-Options': 'DENY',
    'X-XSS-Protection': '1; mode=block',
    'X-Content-Type-Options': 'nosniff',
  };

  constructor(
    private readonly headers: Readonly<Record<string, string>> = SecurityHeadersMiddleware.DEFAULT_HEADERS,
  ) {
    super();
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<ConduitResponse> {
    const res = await next();
    return { ...res, headers: { ...this.headers, ...res.headers } };
  }
}

/**
 * State middleware - places a shared value into every request's State
 * before the rest of the chain runs
 *
 * @example
 * ```typescript
 * const pipeline = createPipeline()
 *   .use(StateMiddleware.of(new Clock()))
 *   .use(StateMiddleware.keyed(AppName, 'storefront'))
 *   .build();
 * ```
 */
export class StateMiddleware extends ConduitMiddlewareBase {
  private constructor(private readonly provide: (state: State) => void) {
    super();
  }

  /**
   * Provide a class instance under its own class
   */
  static of<T extends object>(value: T): StateMiddleware {
    return new StateMiddleware((state) => state.put(value));
  }

  /**
   * Provide a value under a state key
   */
  static keyed<T>(key: StateKey<T>, value: T): StateMiddleware {
    return new StateMiddleware((state) => state.putAs(key, value));
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<ConduitResponse> {
    this.provide(ctx.state);
    return next();
  }
}
