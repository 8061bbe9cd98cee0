/**
 * @fileoverview Dispatcher - Runs one request through the router
 *
 * @packageDocumentation
 * @module conduit/application/dispatch
 *
 * ```
 * request ─► match ─► State ─► extractors ─► chain (onion) ─► handler
 *                                                                │
 * response ◄─ finalizers (reverse order) ◄─ fault boundary ◄─────┘
 * ```
 *
 * - A matched route's pipeline chain is resolved against the router's
 *   frozen pipeline set, then run as one onion around the handler.
 * - Routing failures (404, 405, 406, 415, malformed path 400) and
 *   extraction failures (400) become error responses before any middleware
 *   of the route runs.
 * - A fault escaping the chain is converted by the dispatcher's exception
 *   filters: an HttpException keeps its status, anything else is a 500.
 * - Cancelling the request (its AbortSignal or `RequestContext.cancel()`)
 *   stops the chain at the next stage transition and answers 499.
 * - Finalizers run in every case.
 */

import { v4 as uuidv4 } from 'uuid';
import { RequestContext, getCurrentContext } from '../../domain/context';
import {
  BadRequestException,
  DefaultExceptionFilter,
  ExceptionFilterChain,
  HttpException,
  IExceptionFilter,
  MethodNotAllowedException,
  NotAcceptableException,
  NotFoundException,
  UnsupportedMediaTypeException,
  toError,
} from '../../domain/exceptions';
import {
  ClientAddress,
  PathParams,
  QueryParams,
  Request,
  RequestHeaderMap,
  RequestId,
  State,
} from '../../domain/state';
import { ILogger, consoleLogger } from '../../infrastructure/logging';
import { raceCancellation, runChain } from '../../infrastructure/pipeline';
import {
  ConduitRequest,
  ConduitResponse,
  HttpStatus,
  MiddlewareContext,
  getHeader,
} from '../../infrastructure/platform';
import {
  MatchOutcome,
  Router,
  parseQueryString,
} from '../../infrastructure/routing';
import { Finalizer, FinalizerContext } from './finalizers';

/**
 * Dispatcher options
 */
export interface DispatcherOptions {
  /** Run after every request, last registered first */
  finalizers?: Finalizer[];

  /** Tried in order before DefaultExceptionFilter, which answers every fault */
  exceptionFilters?: IExceptionFilter[];

  logger?: ILogger;

  /** Request header carrying a caller-chosen request id */
  requestIdHeader?: string;
}

/**
 * Per-request dispatch options
 */
export interface DispatchOptions {
  /** Aborting it cancels the request */
  signal?: AbortSignal;

  /** Outcome of an earlier `router.match` for this request */
  outcome?: MatchOutcome;
}

type RoutingFailure = Exclude<MatchOutcome, { kind: 'matched' } | { kind: 'delegated' }>;

/**
 * Exception standing for a routing failure
 */
export function routingFailure(outcome: RoutingFailure, request: ConduitRequest): HttpException {
  switch (outcome.kind) {
    case 'no-match':
      return new NotFoundException(`No route matches ${request.method} ${request.path}`);
    case 'path-matched-no-verb':
      return new MethodNotAllowedException(
        outcome.allowedVerbs,
        `${request.method} is not allowed for ${request.path}`,
      );
    case 'malformed-path':
      return new BadRequestException(`Malformed request path: ${outcome.path}`);
    case 'non-match':
      if (outcome.status === HttpStatus.NOT_ACCEPTABLE) {
        return new NotAcceptableException();
      }
      if (outcome.status === HttpStatus.UNSUPPORTED_MEDIA_TYPE) {
        return new UnsupportedMediaTypeException();
      }
      return new HttpException(outcome.status, `Request declined by route (${outcome.status})`);
  }
}

export class Dispatcher {
  private readonly finalizers: ReadonlyArray<Finalizer>;
  private readonly filters: ExceptionFilterChain;
  private readonly logger: ILogger;
  private readonly requestIdHeader: string;

  constructor(
    private readonly router: Router,
    options: DispatcherOptions = {},
  ) {
    this.finalizers = [...(options.finalizers ?? [])];
    this.filters = new ExceptionFilterChain()
      .addFilters(options.exceptionFilters ?? [])
      .addFilter(new DefaultExceptionFilter());
    this.logger = options.logger ?? consoleLogger;
    this.requestIdHeader = options.requestIdHeader ?? 'x-request-id';
  }

  /**
   * Serve one request. Always resolves with a response.
   */
  async dispatch(
    request: ConduitRequest,
    options: DispatchOptions = {},
  ): Promise<ConduitResponse> {
    const requestId = this.requestIdOf(request);

    return RequestContext.run(
      {
        requestId,
        method: request.method,
        path: request.path,
        timestamp: Date.now(),
      },
      () => this.serve(request, requestId, options.outcome),
      options.signal,
    );
  }

  private async serve(
    request: ConduitRequest,
    requestId: string,
    outcome: MatchOutcome | undefined,
  ): Promise<ConduitResponse> {
    const context = getCurrentContext();
    const state = this.createState(request, requestId);
    const ctx: MiddlewareContext = {
      state,
      request,
      requestId,
      context,
      signal: context.signal,
    };

    let response: ConduitResponse;
    let error: Error | undefined;

    try {
      const matched = outcome ?? this.router.match(request.method, request.path, request.headers);
      response = await raceCancellation(this.run(matched, ctx), ctx.signal);
    } catch (thrown) {
      error = toError(thrown);
      this.logFault(error, requestId);
      response = await this.filters.catch({
        error,
        requestId,
        path: request.path,
        method: request.method,
        timestamp: new Date(),
      });
    }

    return this.finalize({ state, request, requestId, response, error });
  }

  private async run(outcome: MatchOutcome, ctx: MiddlewareContext): Promise<ConduitResponse> {
    const { request, state } = ctx;

    switch (outcome.kind) {
      case 'matched': {
        const params = { ...state.tryBorrow(PathParams), ...outcome.params };
        state.putAs(PathParams, params);

        const handler = outcome.route.bind(params, state.borrow(QueryParams), state);
        return runChain(outcome.pipelines.resolve(outcome.route.chain), ctx, (stage = ctx) =>
          handler(stage),
        );
      }

      case 'delegated': {
        state.putAs(PathParams, { ...state.tryBorrow(PathParams), ...outcome.params });
        const { router, remaining } = outcome;
        return runChain(outcome.pipelines.resolve(outcome.chain), ctx, (stage = ctx) =>
          this.run(router.matchSegments(request.method, remaining, request.headers), stage),
        );
      }

      default:
        throw routingFailure(outcome, request);
    }
  }

  private async finalize(ctx: FinalizerContext): Promise<ConduitResponse> {
    let response = ctx.response;

    for (let i = this.finalizers.length - 1; i >= 0; i--) {
      try {
        const replacement = await this.finalizers[i]({ ...ctx, response });
        if (replacement) {
          response = replacement;
        }
      } catch (thrown) {
        const error = toError(thrown);
        this.logger.warn(`[${ctx.requestId}] Finalizer #${i} failed: ${error.message}`);
      }
    }

    return response;
  }

  private createState(request: ConduitRequest, requestId: string): State {
    const state = new State();
    state.putAs(Request, request);
    state.putAs(RequestHeaderMap, request.headers);
    state.putAs(RequestId, requestId);
    state.putAs(QueryParams, parseQueryString(request.query));
    if (request.remoteAddress !== undefined) {
      state.putAs(ClientAddress, request.remoteAddress);
    }
    return state;
  }

  private requestIdOf(request: ConduitRequest): string {
    const supplied = getHeader(request.headers, this.requestIdHeader)?.trim();
    return supplied ? supplied : uuidv4();
  }

  private logFault(error: Error, requestId: string): void {
    if (error instanceof HttpException && error.statusCode < HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.debug(`[${requestId}] ${error.statusCode} ${error.message}`);
      return;
    }
    this.logger.error(`[${requestId}] ${error.name}: ${error.message}`, error.stack);
  }
}
